import type Anthropic from '@anthropic-ai/sdk';

function stripCodeFences(text: string): string {
  let str = text.trim();
  if (str.startsWith('```')) {
    str = str.replace(/^```(?:json)?\s*\n?/, '').replace(/\n?```\s*$/, '');
  }
  return str;
}

function extractBetween(text: string, open: '{' | '[', close: '}' | ']'): unknown {
  const str = stripCodeFences(text);
  const first = str.indexOf(open);
  const last = str.lastIndexOf(close);
  if (first === -1 || last <= first) return undefined;
  try {
    return JSON.parse(str.substring(first, last + 1));
  } catch {
    return undefined;
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** First-brace-to-last-brace JSON object in a model reply, or null. */
export function extractJsonObject(text: string): Record<string, unknown> | null {
  const value = extractBetween(text, '{', '}');
  return isRecord(value) ? value : null;
}

/** First-bracket-to-last-bracket JSON array in a model reply, or null. */
export function extractJsonArray(text: string): unknown[] | null {
  const value = extractBetween(text, '[', ']');
  return Array.isArray(value) ? value : null;
}

export function collectText(message: Anthropic.Messages.Message): string {
  return message.content
    .flatMap(block => (block.type === 'text' ? [block.text] : []))
    .join('\n');
}
