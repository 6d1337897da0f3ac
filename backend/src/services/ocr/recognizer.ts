import type { OcrFragment } from '../../types/wine.js';

export type OcrResult =
  | { status: 'ok'; engine: string; fragments: OcrFragment[] }
  | { status: 'unavailable'; engine: string; reason: string };

export interface OcrImage {
  data: Buffer;
  mimeType: string;
}

/**
 * Turns one menu photo into text fragments. Implementations resolve with an
 * `unavailable` result instead of rejecting.
 */
export interface OcrRecognizer {
  readonly engine: string;
  recognize(image: OcrImage): Promise<OcrResult>;
}

export class DisabledRecognizer implements OcrRecognizer {
  readonly engine = 'none';

  constructor(private readonly reason = 'OCR is disabled (OCR_ENGINE=none)') {}

  async recognize(): Promise<OcrResult> {
    return { status: 'unavailable', engine: this.engine, reason: this.reason };
  }
}

export function unavailable(engine: string, reason: string): OcrResult {
  console.warn(`[ocr] ${engine} unavailable: ${reason}`);
  return { status: 'unavailable', engine, reason };
}
