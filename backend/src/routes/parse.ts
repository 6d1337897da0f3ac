import { Router } from 'express';
import { analyzeParsedInput, type ParseInput, type PipelineDeps } from '../services/menu-pipeline.js';
import { extractFragments, toBoundingBox } from '../services/ocr/index.js';
import type { OcrFragment } from '../types/wine.js';
import { isRecord } from '../utils/llm-json.js';

/**
 * `{ fragments }` may be a list of `{ text, bbox }` or a raw OCR engine
 * payload in any of the shapes the recognizers understand.
 */
function toFragments(value: unknown): OcrFragment[] | null {
  if (Array.isArray(value) && value.every(f => isRecord(f) && typeof f.text === 'string')) {
    return value.flatMap(f =>
      isRecord(f) && typeof f.text === 'string' ? [{ text: f.text, bbox: toBoundingBox(f.bbox) }] : [],
    );
  }
  return extractFragments(value);
}

export function toParseInput(body: unknown): ParseInput | null {
  if (!isRecord(body)) return null;
  if (typeof body.text === 'string') return { text: body.text };
  if (body.fragments !== undefined) {
    const fragments = toFragments(body.fragments);
    return fragments ? { fragments } : null;
  }
  return null;
}

export function createParseRouter(deps: Omit<PipelineDeps, 'recognizer'>): Router {
  const router = Router();

  router.post('/', async (req, res, next) => {
    const input = toParseInput(req.body);
    if (!input) {
      res.status(400).json({ error: 'Body must be { "text": string } or { "fragments": [...] }' });
      return;
    }

    try {
      res.json(await analyzeParsedInput(input, deps));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
