import Anthropic from '@anthropic-ai/sdk';
import { errorMessage } from '../../utils/errors.js';
import { collectText, extractJsonObject } from '../../utils/llm-json.js';
import { unavailable, type OcrImage, type OcrRecognizer, type OcrResult } from './recognizer.js';

type ImageMediaType = 'image/jpeg' | 'image/png';

const MEDIA_TYPES: Record<string, ImageMediaType> = {
  'image/jpeg': 'image/jpeg',
  'image/jpg': 'image/jpeg',
  'image/png': 'image/png',
};

const TRANSCRIBE_PROMPT = `Transcribe this restaurant wine list exactly as printed, one visual row per line, top to bottom.

Keep prices, vintages, currency symbols and markers such as "n/a" or "-" on the line where they appear.
When a row has prices in separate columns, keep them on that row separated by spaces.
Do not correct, translate, merge or reorder anything.

Return ONLY a JSON object: {"lines": ["...", "..."]}`;

export interface VisionModel {
  transcribe(image: { base64: string; mediaType: ImageMediaType }, prompt: string): Promise<string>;
}

export class AnthropicVisionModel implements VisionModel {
  private client: Anthropic;

  constructor(apiKey: string, private readonly model: string) {
    this.client = new Anthropic({ apiKey, timeout: 2 * 60 * 1000 });
  }

  async transcribe(image: { base64: string; mediaType: ImageMediaType }, prompt: string): Promise<string> {
    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: 8192,
      temperature: 0,
      messages: [{
        role: 'user',
        content: [
          { type: 'image', source: { type: 'base64', media_type: image.mediaType, data: image.base64 } },
          { type: 'text', text: prompt },
        ],
      }],
    });
    console.log(`[ocr] claude: stop_reason=${response.stop_reason}, content blocks=${response.content.length}`);
    return collectText(response);
  }
}

/** Line transcription through a vision model. Fragments carry no geometry. */
export class ClaudeVisionRecognizer implements OcrRecognizer {
  readonly engine = 'claude';

  constructor(private readonly model: VisionModel) {}

  async recognize(image: OcrImage): Promise<OcrResult> {
    const mediaType = MEDIA_TYPES[image.mimeType.toLowerCase()];
    if (!mediaType) {
      return unavailable(this.engine, `unsupported image type ${image.mimeType}`);
    }

    let reply: string;
    try {
      reply = await this.model.transcribe({ base64: image.data.toString('base64'), mediaType }, TRANSCRIBE_PROMPT);
    } catch (err) {
      return unavailable(this.engine, errorMessage(err));
    }

    const parsed = extractJsonObject(reply);
    if (!parsed || !Array.isArray(parsed.lines)) {
      return unavailable(this.engine, 'transcription was not a {"lines": [...]} object');
    }

    const fragments = parsed.lines
      .filter((line): line is string => typeof line === 'string' && line.trim() !== '')
      .map(line => ({ text: line.trim(), bbox: null }));

    console.log(`[ocr] claude: ${fragments.length} lines`);
    return { status: 'ok', engine: this.engine, fragments };
  }
}
