import type { AppConfig } from '../../config.js';
import { AnthropicVisionModel, ClaudeVisionRecognizer } from './claude-recognizer.js';
import { PaddleServingRecognizer } from './paddle-recognizer.js';
import { DisabledRecognizer, type OcrRecognizer } from './recognizer.js';

export { DisabledRecognizer } from './recognizer.js';
export type { OcrImage, OcrRecognizer, OcrResult } from './recognizer.js';
export { extractFragments, toBoundingBox } from './fragment-extractors.js';

export function createRecognizer(cfg: AppConfig): OcrRecognizer {
  switch (cfg.ocrEngine) {
    case 'paddle':
      if (!cfg.ocrServiceUrl) return new DisabledRecognizer('OCR_SERVICE_URL is not set');
      return new PaddleServingRecognizer({ url: cfg.ocrServiceUrl, timeoutMs: cfg.ocrTimeoutMs });
    case 'claude':
      if (!cfg.anthropicApiKey) return new DisabledRecognizer('ANTHROPIC_API_KEY is not set');
      return new ClaudeVisionRecognizer(new AnthropicVisionModel(cfg.anthropicApiKey, cfg.anthropicModel));
    default:
      return new DisabledRecognizer();
  }
}
