import { config, validateConfig } from './config.js';
import { createApp } from './app.js';
import { createEnricher } from './services/enrichment.js';
import { createRecognizer } from './services/ocr/index.js';

validateConfig();

const recognizer = createRecognizer(config);
const enricher = createEnricher(config);

const app = createApp({
  recognizer,
  enricher,
  parserOptions: { switchGroupOnHeader: config.switchGroupOnHeader },
  upload: { dir: config.uploadsDir, maxFileSizeMB: config.maxFileSizeMB },
});

app.listen(config.port, '0.0.0.0', () => {
  console.log(`Wine menu scanner backend running on port ${config.port}`);
  console.log(`  OCR engine: ${recognizer.engine}, enrichment: ${enricher ? 'on' : 'off'}`);
});
