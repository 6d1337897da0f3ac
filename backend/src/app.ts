import express, { type ErrorRequestHandler } from 'express';
import cors from 'cors';
import multer from 'multer';
import { createAnalyzeRouter } from './routes/analyze.js';
import { createParseRouter } from './routes/parse.js';
import type { PipelineDeps } from './services/menu-pipeline.js';
import { errorMessage } from './utils/errors.js';
import { createUpload, UnsupportedFileTypeError, type UploadOptions } from './utils/file-handler.js';
import { isRecord } from './utils/llm-json.js';

export interface AppOptions extends PipelineDeps {
  upload: UploadOptions;
}

function clientErrorStatus(err: unknown): number | null {
  if (!isRecord(err)) return null;
  const status = err.status ?? err.statusCode;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

const errorHandler: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
  if (err instanceof multer.MulterError) {
    const status = err.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
    res.status(status).json({ error: err.message });
    return;
  }
  if (err instanceof UnsupportedFileTypeError) {
    res.status(400).json({ error: err.message });
    return;
  }
  // body-parser errors (malformed JSON, body too large) carry their own status
  const status = clientErrorStatus(err);
  if (status !== null) {
    res.status(status).json({ error: errorMessage(err) });
    return;
  }

  console.error('[app] unhandled error:', err);
  res.status(500).json({ error: errorMessage(err) });
};

export function createApp(opts: AppOptions): express.Express {
  const app = express();
  const deps = { enricher: opts.enricher, parserOptions: opts.parserOptions };

  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  app.use('/api/v1/analyze', createAnalyzeRouter({ ...deps, recognizer: opts.recognizer }, createUpload(opts.upload)));
  app.use('/api/v1/parse', createParseRouter(deps));

  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use(errorHandler);
  return app;
}
