import Anthropic from '@anthropic-ai/sdk';
import type { AppConfig } from '../config.js';
import type { EnrichmentFields, Wine } from '../types/wine.js';
import { errorMessage } from '../utils/errors.js';
import { collectText, extractJsonArray, extractJsonObject, isRecord } from '../utils/llm-json.js';
import { RateLimiter } from '../utils/rate-limiter.js';
import { createEnrichmentCache, enrichmentCacheKey, type EnrichmentCache } from './enrichment-cache.js';
import { isCloseMatch } from './wine-matcher.js';

const MIN_VINTAGE = 1900;
const MAX_VINTAGE = 2100;
const PLACEHOLDERS = new Set(['n/a', 'na', '-']);

// Largest name distance ratio at which an echoed name still counts as the wine asked about.
export const ENRICH_NAME_MATCH_RATIO = 0.35;

const TEXT_FIELDS = ['producer', 'region', 'grape', 'description'] as const;

export interface EnrichmentModel {
  complete(prompt: string): Promise<string>;
}

export class AnthropicEnrichmentModel implements EnrichmentModel {
  private client: Anthropic;

  constructor(apiKey: string, private readonly model: string) {
    this.client = new Anthropic({ apiKey, timeout: 2 * 60 * 1000 });
  }

  async complete(prompt: string): Promise<string> {
    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: 4096,
      temperature: 0,
      messages: [{ role: 'user', content: prompt }],
    });
    return collectText(response);
  }
}

// ── Merging ─────────────────────────────────────────────────────
export function isMissing(value: string | null | undefined): boolean {
  if (value === null || value === undefined) return true;
  const trimmed = value.trim();
  return trimmed === '' || PLACEHOLDERS.has(trimmed.toLowerCase());
}

function isValidVintage(value: number | null): value is number {
  return value !== null && Number.isInteger(value) && value >= MIN_VINTAGE && value <= MAX_VINTAGE;
}

/** Copy of `wine` with only its missing fields taken from `enrichment`. */
export function mergeMissing(wine: Wine, enrichment: EnrichmentFields): Wine {
  const merged: Wine = { ...wine, price: { ...wine.price } };

  for (const field of TEXT_FIELDS) {
    const incoming = enrichment[field];
    if (isMissing(merged[field]) && !isMissing(incoming) && incoming !== null) {
      merged[field] = incoming.trim();
    }
  }

  if (merged.vintage === null && isValidVintage(enrichment.vintage)) {
    merged.vintage = enrichment.vintage;
  }

  return merged;
}

// ── Model replies ───────────────────────────────────────────────
export interface ParsedEnrichment {
  name: string | null;
  fields: EnrichmentFields;
}

function text(value: unknown): string | null {
  return typeof value === 'string' && !isMissing(value) ? value.trim() : null;
}

function vintage(value: unknown): number | null {
  const n = typeof value === 'number' ? value
    : typeof value === 'string' && /^\s*\d{4}\s*$/.test(value) ? Number(value)
    : NaN;
  return isValidVintage(n) ? n : null;
}

export function parseEnrichment(value: unknown): ParsedEnrichment | null {
  if (!isRecord(value)) return null;
  return {
    name: text(value.name),
    fields: {
      producer: text(value.producer),
      region: text(value.region),
      grape: text(value.grape),
      vintage: vintage(value.vintage),
      description: text(value.description),
    },
  };
}

const FIELD_GUIDE = `- name: the wine name exactly as given
- producer: the winery or producer
- region: the wine region (e.g. "Burgundy, France")
- grape: the grape variety or blend
- vintage: the year as a number, only if it is part of the given name, else null
- description: one short sentence on style, no tasting-note clichés
Use null for anything you are not confident about. Do not invent producers.`;

function batchPrompt(names: string[]): string {
  const list = names.map((name, i) => `${i + 1}. ${name}`).join('\n');
  return `You are a sommelier filling in details for wines on a restaurant list.

Wines:
${list}

For each wine, in the same order, return an object with:
${FIELD_GUIDE}

Return ONLY a JSON array with exactly ${names.length} objects. No other text.`;
}

function singlePrompt(name: string): string {
  return `You are a sommelier filling in details for a wine on a restaurant list.

Wine: "${name}"

Return an object with:
${FIELD_GUIDE}

Return ONLY the JSON object. No other text.`;
}

// ── Enricher ────────────────────────────────────────────────────
export interface WineEnricherOptions {
  model: EnrichmentModel;
  cache?: EnrichmentCache;
  requestsPerSecond?: number;
  debug?: boolean;
  limiter?: RateLimiter;
}

/**
 * Best-effort: fills missing producer/region/grape/vintage/description from a
 * language model. Never throws; any failure leaves the wines as they were.
 */
export class WineEnricher {
  private model: EnrichmentModel;
  private cache: EnrichmentCache | null;
  private limiter: RateLimiter;
  private debug: boolean;

  constructor(opts: WineEnricherOptions) {
    this.model = opts.model;
    this.cache = opts.cache ?? null;
    this.limiter = opts.limiter ?? new RateLimiter({ requestsPerSecond: opts.requestsPerSecond ?? 2 });
    this.debug = opts.debug ?? false;
  }

  async enrich(wines: Wine[]): Promise<Wine[]> {
    try {
      return await this.enrichAll(wines);
    } catch (err) {
      console.warn(`[enrich] skipped: ${errorMessage(err)}`);
      return wines;
    }
  }

  private log(message: string): void {
    if (this.debug) console.log(`[enrich] ${message}`);
  }

  private async enrichAll(wines: Wine[]): Promise<Wine[]> {
    const result = [...wines];
    // One request per distinct name; wines sharing a name share the answer.
    const pending = new Map<string, { name: string; indexes: number[] }>();
    let cacheHits = 0;

    for (const [index, wine] of wines.entries()) {
      const name = wine.name?.trim();
      if (!name) continue;
      const key = enrichmentCacheKey(name);

      const cached = await this.cacheGet(key);
      if (cached) {
        result[index] = mergeMissing(wine, cached);
        cacheHits++;
        continue;
      }

      const entry = pending.get(key);
      if (entry) entry.indexes.push(index);
      else pending.set(key, { name, indexes: [index] });
    }

    this.log(`${cacheHits} cached, ${pending.size} to request`);
    if (pending.size === 0) return result;

    const entries = [...pending.entries()];
    const answers = await this.requestBatch(entries.map(([, e]) => e.name));

    for (const [i, [key, entry]] of entries.entries()) {
      const fields = answers[i];
      if (!fields) continue;
      await this.cacheSet(key, fields);
      for (const index of entry.indexes) {
        result[index] = mergeMissing(result[index], fields);
      }
    }

    return result;
  }

  private async requestBatch(names: string[]): Promise<(EnrichmentFields | null)[]> {
    let reply: string;
    try {
      reply = await this.model.complete(batchPrompt(names));
    } catch (err) {
      console.warn(`[enrich] batch request failed, falling back to single requests: ${errorMessage(err)}`);
      return this.requestEach(names);
    }

    const items = extractJsonArray(reply);
    if (!items) {
      this.log('batch reply was not a JSON array; leaving wines unchanged');
      return names.map(() => null);
    }
    if (items.length !== names.length) {
      this.log(`batch reply had ${items.length} items for ${names.length} wines; leaving wines unchanged`);
      return names.map(() => null);
    }

    return items.map((item, i) => this.accept(item, names[i]));
  }

  private async requestEach(names: string[]): Promise<(EnrichmentFields | null)[]> {
    const answers: (EnrichmentFields | null)[] = [];
    for (const name of names) {
      await this.limiter.waitForSlot();
      try {
        const reply = await this.model.complete(singlePrompt(name));
        answers.push(this.accept(extractJsonObject(reply), name));
      } catch (err) {
        this.log(`"${name}" failed: ${errorMessage(err)}`);
        answers.push(null);
      }
    }
    return answers;
  }

  private accept(item: unknown, requested: string): EnrichmentFields | null {
    const parsed = parseEnrichment(item);
    if (!parsed) {
      this.log(`"${requested}": unusable item`);
      return null;
    }
    if (parsed.name && !isCloseMatch(parsed.name, requested, ENRICH_NAME_MATCH_RATIO)) {
      this.log(`"${requested}": reply was for "${parsed.name}", skipped`);
      return null;
    }
    return parsed.fields;
  }

  private async cacheGet(key: string): Promise<EnrichmentFields | null> {
    if (!this.cache) return null;
    try {
      return await this.cache.get(key);
    } catch (err) {
      console.warn(`[cache] read failed: ${errorMessage(err)}`);
      return null;
    }
  }

  private async cacheSet(key: string, fields: EnrichmentFields): Promise<void> {
    if (!this.cache) return;
    try {
      await this.cache.set(key, fields);
    } catch (err) {
      console.warn(`[cache] write failed: ${errorMessage(err)}`);
    }
  }
}

/** The configured enricher, or null when enrichment is off or has no API key. */
export function createEnricher(cfg: AppConfig): WineEnricher | null {
  if (!cfg.enrichmentEnabled || !cfg.anthropicApiKey) return null;
  return new WineEnricher({
    model: new AnthropicEnrichmentModel(cfg.anthropicApiKey, cfg.anthropicModel),
    cache: createEnrichmentCache({ dir: cfg.enrichCacheDir, ttlHours: cfg.enrichCacheTtlHours }),
    requestsPerSecond: cfg.enrichRequestsPerSecond,
    debug: cfg.enrichDebug,
  });
}
