import type { BoundingBox, OcrFragment } from '../../types/wine.js';
import { isRecord } from '../../utils/llm-json.js';

/** One extractor per engine payload shape; `null` means "not my shape". */
type FragmentExtractor = (payload: unknown) => OcrFragment[] | null;

const isFiniteNumber = (v: unknown): v is number => typeof v === 'number' && Number.isFinite(v);

function isPoint(value: unknown): value is [number, number] {
  return Array.isArray(value) && value.length === 2 && value.every(isFiniteNumber);
}

/**
 * `[x1, y1, x2, y2]` or a polygon of `[x, y]` points, as an ordered box.
 * Anything else has no usable geometry.
 */
export function toBoundingBox(value: unknown): BoundingBox | null {
  if (!Array.isArray(value)) return null;

  if (value.length === 4 && value.every(isFiniteNumber)) {
    const [x1, y1, x2, y2] = value;
    return [Math.min(x1, x2), Math.min(y1, y2), Math.max(x1, x2), Math.max(y1, y2)];
  }

  if (value.length >= 3 && value.every(isPoint)) {
    const xs = value.map(p => p[0]);
    const ys = value.map(p => p[1]);
    return [Math.min(...xs), Math.min(...ys), Math.max(...xs), Math.max(...ys)];
  }

  return null;
}

function fragment(text: unknown, box: unknown): OcrFragment | null {
  if (typeof text !== 'string' || text.trim() === '') return null;
  return { text: text.trim(), bbox: toBoundingBox(box) };
}

function compact(fragments: (OcrFragment | null)[]): OcrFragment[] {
  return fragments.filter((f): f is OcrFragment => f !== null);
}

// ── Columnar PaddleX result: { rec_texts, rec_boxes | rec_polys } ──
function columnarPages(payload: unknown): Record<string, unknown>[] | null {
  if (!isRecord(payload)) return null;
  if (Array.isArray(payload.rec_texts)) return [payload];

  const result = payload.result;
  if (!isRecord(result) || !Array.isArray(result.ocrResults)) return null;
  const pages = result.ocrResults.flatMap(page =>
    isRecord(page) && isRecord(page.prunedResult) ? [page.prunedResult] : [],
  );
  return pages.length === result.ocrResults.length ? pages : null;
}

export const extractColumnar: FragmentExtractor = payload => {
  const pages = columnarPages(payload);
  if (!pages) return null;

  const fragments: (OcrFragment | null)[] = [];
  for (const page of pages) {
    const texts = Array.isArray(page.rec_texts) ? page.rec_texts : [];
    const boxes = Array.isArray(page.rec_boxes) ? page.rec_boxes
      : Array.isArray(page.rec_polys) ? page.rec_polys
      : [];
    texts.forEach((text, i) => fragments.push(fragment(text, boxes[i])));
  }
  return compact(fragments);
};

// ── Serving records: { text, confidence, text_region | box | bbox } ──
function isTextRecord(value: unknown): value is Record<string, unknown> {
  return isRecord(value) && typeof value.text === 'string';
}

export const extractRecords: FragmentExtractor = payload => {
  const root = isRecord(payload) && Array.isArray(payload.results) ? payload.results : payload;
  if (!Array.isArray(root)) return null;

  // Per-page nesting: [[record, ...], [record, ...]]
  const records = root.flatMap(item => (Array.isArray(item) ? item : [item]));
  if (!records.every(isTextRecord)) return null;
  if (records.length === 0 && root === payload) return null;

  return compact(records.map(r => fragment(r.text, r.text_region ?? r.box ?? r.bbox)));
};

// ── Legacy PaddleOCR tuples: [[points], [text, score]] ──────────
function isLegacyItem(value: unknown): value is [unknown, [string, ...unknown[]]] {
  return Array.isArray(value)
    && value.length >= 2
    && Array.isArray(value[1])
    && typeof value[1][0] === 'string';
}

export const extractLegacyTuples: FragmentExtractor = payload => {
  if (!Array.isArray(payload)) return null;

  const fragments: (OcrFragment | null)[] = [];
  const walk = (items: unknown[], depth: number): boolean => {
    for (const item of items) {
      // Empty pages come back as null
      if (item === null) continue;
      if (isLegacyItem(item)) {
        fragments.push(fragment(item[1][0], item[0]));
      } else if (Array.isArray(item) && depth < 2) {
        if (!walk(item, depth + 1)) return false;
      } else {
        return false;
      }
    }
    return true;
  };

  return walk(payload, 0) ? compact(fragments) : null;
};

const EXTRACTORS: FragmentExtractor[] = [extractColumnar, extractRecords, extractLegacyTuples];

/** Fragments from whichever engine payload shape matches, in engine order; `null` when none does. */
export function extractFragments(payload: unknown): OcrFragment[] | null {
  for (const extract of EXTRACTORS) {
    const fragments = extract(payload);
    if (fragments) return fragments;
  }
  return null;
}
