import type { AnalyzeResponse, OcrFragment, Wine } from '../types/wine.js';
import { parseMenuRows, type MenuParserOptions } from './menu-parser.js';
import { normalizeWines } from './normalize.js';
import type { OcrImage, OcrRecognizer } from './ocr/index.js';
import { buildRows, splitTextLines } from './row-clusterer.js';

export interface Enricher {
  enrich(wines: Wine[]): Promise<Wine[]>;
}

export interface PipelineDeps {
  recognizer: OcrRecognizer;
  enricher: Enricher | null;
  parserOptions?: MenuParserOptions;
}

export type ParseInput = { text: string } | { fragments: OcrFragment[] };

async function finish(
  rows: string[],
  ocr: Omit<AnalyzeResponse['ocr'], 'rowCount'>,
  deps: Omit<PipelineDeps, 'recognizer'>,
  rawText = rows.join('\n'),
): Promise<AnalyzeResponse> {
  let wines = parseMenuRows(rows, deps.parserOptions);
  if (deps.enricher && wines.length > 0) {
    wines = await deps.enricher.enrich(wines);
  }
  return {
    rawText,
    wines: normalizeWines(wines),
    ocr: { ...ocr, rowCount: rows.length },
  };
}

/** Image → OCR → rows → wines → enrichment → normalized response. */
export async function analyzeMenuImage(image: OcrImage, deps: PipelineDeps): Promise<AnalyzeResponse> {
  const result = await deps.recognizer.recognize(image);

  if (result.status === 'unavailable') {
    return finish([], { engine: result.engine, status: 'unavailable', fragmentCount: 0 }, deps,
      `[OCR unavailable: ${result.reason}]`);
  }

  const rows = buildRows(result.fragments);
  console.log(`[analyze] ${result.engine}: ${result.fragments.length} fragments -> ${rows.length} rows`);
  return finish(rows, { engine: result.engine, status: 'ok', fragmentCount: result.fragments.length }, deps);
}

/** Already-recognized input: plain text lines or fragments. */
export async function analyzeParsedInput(
  input: ParseInput,
  deps: Omit<PipelineDeps, 'recognizer'>,
): Promise<AnalyzeResponse> {
  if ('text' in input) {
    const rows = splitTextLines(input.text);
    return finish(rows, { engine: 'input', status: 'ok', fragmentCount: rows.length }, deps);
  }
  const rows = buildRows(input.fragments);
  return finish(rows, { engine: 'input', status: 'ok', fragmentCount: input.fragments.length }, deps);
}
