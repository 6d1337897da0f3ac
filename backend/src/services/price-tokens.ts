import type { ClassifiedLine } from '../types/wine.js';

// ── Token patterns ──────────────────────────────────────────────
// Price: optional currency (prefix or suffix), 1-4 digit integer or 1-2 decimals,
// never glued to neighbouring digits.
const PRICE_RE = /(?:([$€£])\s*)?(?<!\d[.,]?)(\d{1,4}(?:[.,]\d{1,2})?)(?!\d)(?:\s*([$€£])(?!\s*\d))?/g;
const VINTAGE_RE = /\b(19\d{2}|20\d{2})\b/g;
// Explicit "unavailable" markers, only as standalone tokens ("Saint-Emilion" has no marker).
const NA_RE = /(?<![^\s|])(?:n\/a|n\.a\.?|na|none|nil|-)(?![^\s|,;:])/gi;

// Column labels and serving sizes that sit to the right of group headers.
const HEADER_TOKEN_RE = /\b(?:glass(?:es)?|bottles?|btg|btl|ml|cl|oz|\d{2,4}\s?(?:ml|cl|oz))\b/gi;
const COLUMN_LABEL_RE = /\b(?:glass(?:es)?|bottles?|btg|btl)\b/i;

const TRAILING_SEPARATORS_RE = /^[\s.:|/]*$/;
const CONTINUATION_LEFTOVER_RE = /^[\s|:.\-/]*$/;
const HEADER_LEFTOVER_RE = /^[\s|:./\-–—()]*$/;

const MIN_PLAUSIBLE_PRICE = 1;
const MAX_PLAUSIBLE_PRICE = 500;
const MAX_HEADER_LETTERS = 18;

interface Span {
  start: number;
  end: number;
}

export interface PriceToken extends Span {
  kind: 'num' | 'na';
  value: number | null;
  currency: string | null;
}

export interface PriceColumns {
  currency: string | null;
  tokens: PriceToken[];
}

function toNumber(raw: string): number | null {
  const value = Number(raw.replace(',', '.'));
  return Number.isFinite(value) ? value : null;
}

export function isPlausiblePrice(value: number): boolean {
  return value >= MIN_PLAUSIBLE_PRICE && value <= MAX_PLAUSIBLE_PRICE;
}

function vintageSpans(line: string): Span[] {
  return [...line.matchAll(VINTAGE_RE)].map(m => ({
    start: m.index ?? 0,
    end: (m.index ?? 0) + m[0].length,
  }));
}

function overlaps(a: Span, b: Span): boolean {
  return a.start < b.end && b.start < a.end;
}

/**
 * Every price and "unavailable" token in reading order. Numbers that overlap a
 * vintage are left out so a year never turns into a price.
 */
export function collectPriceCandidates(line: string): PriceToken[] {
  const vintages = vintageSpans(line);
  const tokens: PriceToken[] = [];

  for (const m of line.matchAll(NA_RE)) {
    const start = m.index ?? 0;
    tokens.push({ start, end: start + m[0].length, kind: 'na', value: null, currency: null });
  }

  for (const m of line.matchAll(PRICE_RE)) {
    const start = m.index ?? 0;
    const digits = m[2];
    const digitsStart = start + m[0].indexOf(digits);
    const numeric = { start: digitsStart, end: digitsStart + digits.length };
    if (vintages.some(v => overlaps(v, numeric))) continue;
    tokens.push({
      start,
      end: start + m[0].length,
      kind: 'num',
      value: toNumber(digits),
      currency: m[1] ?? m[3] ?? null,
    });
  }

  return tokens.sort((a, b) => a.start - b.start);
}

/**
 * Up to two trailing price columns, or null when the line is not a price row.
 * Columns must close the line; a number in the middle of a sentence is text.
 */
export function extractPriceColumns(line: string): PriceColumns | null {
  const candidates = collectPriceCandidates(line);
  if (candidates.length === 0) return null;

  const last = candidates[candidates.length - 1];
  if (!TRAILING_SEPARATORS_RE.test(line.slice(last.end))) return null;

  const tokens = [last];
  if (candidates.length >= 2) {
    const previous = candidates[candidates.length - 2];
    if (TRAILING_SEPARATORS_RE.test(line.slice(previous.end, last.start))) {
      tokens.unshift(previous);
    }
  }

  const currency = tokens.find(t => t.currency !== null)?.currency ?? null;
  if (currency === null) {
    const numeric = tokens.flatMap(t => (t.value === null ? [] : [t.value]));
    // 175 from "175ml" is a size, not a price.
    if (hasHeaderTokens(line) && numeric.some(v => !isPlausiblePrice(v))) return null;
    if (numeric.length > 0 && numeric.every(v => !isPlausiblePrice(v))) return null;
  }

  return { currency, tokens };
}

export function hasHeaderTokens(line: string): boolean {
  return line.match(HEADER_TOKEN_RE) !== null;
}

export function hasColumnLabel(line: string): boolean {
  return COLUMN_LABEL_RE.test(line);
}

export function extractVintage(line: string): number | null {
  const match = line.match(/\b(19\d{2}|20\d{2})\b/);
  return match ? parseInt(match[1], 10) : null;
}

/**
 * Column labels ("Glass", "BTL"), size-only rows ("125ml 175ml") and short
 * all-caps labels ("RED WINE") are headers, never wine names.
 */
export function looksLikeHeaderLabel(line: string): boolean {
  if (hasColumnLabel(line)) return true;
  if (hasHeaderTokens(line) && HEADER_LEFTOVER_RE.test(line.replace(HEADER_TOKEN_RE, ' '))) return true;
  return isShortUppercaseLabel(line);
}

export function isShortUppercaseLabel(line: string): boolean {
  const letters = line.replace(/[^\p{L}]/gu, '');
  return letters.length > 0 && letters.length <= MAX_HEADER_LETTERS && letters === letters.toUpperCase()
    && letters !== letters.toLowerCase();
}

function removeSpans(line: string, spans: Span[]): string {
  let out = '';
  let cursor = 0;
  for (const span of [...spans].sort((a, b) => a.start - b.start)) {
    if (span.start < cursor) continue;
    out += line.slice(cursor, span.start) + ' ';
    cursor = span.end;
  }
  return out + line.slice(cursor);
}

export function cleanWineName(text: string): string | null {
  const name = text
    .replace(/\s*\|\s*/g, ' ')
    .replace(/\s+/g, ' ')
    .replace(/^[\s\-–—:]+|[\s\-–—:]+$/g, '');
  return name.length > 0 ? name : null;
}

export function classifyLine(raw: string): ClassifiedLine {
  const text = raw.trim();
  const vintage = extractVintage(text);
  const columns = text ? extractPriceColumns(text) : null;

  const base = {
    text,
    vintage,
    isHeaderLike: text.length > 0 && looksLikeHeaderLabel(text),
  };

  if (columns === null) {
    return { ...base, currency: null, priceTokens: [], name: null, isPureContinuation: false };
  }

  const leftover = removeSpans(text, [...collectPriceCandidates(text), ...vintageSpans(text)]);
  const firstVintage = vintageSpans(text).slice(0, 1);

  return {
    ...base,
    currency: columns.currency,
    priceTokens: columns.tokens.map(t => t.value),
    name: cleanWineName(removeSpans(text, [...firstVintage, ...columns.tokens])),
    isPureContinuation: CONTINUATION_LEFTOVER_RE.test(leftover),
  };
}
