import { errorMessage } from '../../utils/errors.js';
import { extractFragments } from './fragment-extractors.js';
import { unavailable, type OcrImage, type OcrRecognizer, type OcrResult } from './recognizer.js';

export interface PaddleServingOptions {
  url: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

/** PaddleOCR behind an HTTP serving endpoint that takes `{ images: [base64] }`. */
export class PaddleServingRecognizer implements OcrRecognizer {
  readonly engine = 'paddle';
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly opts: PaddleServingOptions) {
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  async recognize(image: OcrImage): Promise<OcrResult> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.opts.timeoutMs);
    const started = Date.now();

    try {
      const response = await this.fetchImpl(this.opts.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', 'Accept': 'application/json' },
        body: JSON.stringify({ images: [image.data.toString('base64')] }),
        signal: controller.signal,
      });

      if (!response.ok) {
        return unavailable(this.engine, `HTTP ${response.status} from OCR service`);
      }

      const body = await response.text();
      let payload: unknown;
      try {
        payload = JSON.parse(body);
      } catch {
        return unavailable(this.engine, 'OCR service returned non-JSON');
      }

      const fragments = extractFragments(payload);
      if (!fragments) {
        return unavailable(this.engine, 'unrecognized OCR payload');
      }

      console.log(`[ocr] paddle: ${fragments.length} fragments in ${Date.now() - started}ms`);
      return { status: 'ok', engine: this.engine, fragments };
    } catch (err) {
      if (controller.signal.aborted) {
        return unavailable(this.engine, `timed out after ${this.opts.timeoutMs}ms`);
      }
      return unavailable(this.engine, errorMessage(err));
    } finally {
      clearTimeout(timeout);
    }
  }
}
