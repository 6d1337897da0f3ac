import { createHash } from 'crypto';
import fs from 'fs/promises';
import path from 'path';
import type { EnrichmentFields } from '../types/wine.js';
import { errorMessage } from '../utils/errors.js';
import { isRecord } from '../utils/llm-json.js';
import { normalizeWineName } from './wine-matcher.js';

export interface EnrichmentCache {
  get(key: string): Promise<EnrichmentFields | null>;
  set(key: string, value: EnrichmentFields): Promise<void>;
}

export interface CacheEntry {
  data: EnrichmentFields;
  storedAt: number;
}

/** A tier hands out whole entries so a copy into another tier keeps its original age. */
export interface CacheTier extends EnrichmentCache {
  getEntry(key: string): Promise<CacheEntry | null>;
  setEntry(key: string, entry: CacheEntry): Promise<void>;
}

type Clock = () => number;

/** Cache key for a menu name: "Ch. Margaux" and "chateau  margaux" share one entry. */
export function enrichmentCacheKey(name: string): string {
  const normalized = normalizeWineName(name).toLowerCase();
  return createHash('sha256').update(normalized).digest('hex');
}

function stringOrNull(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

export function toEnrichmentFields(value: unknown): EnrichmentFields | null {
  if (!isRecord(value)) return null;
  const vintage = value.vintage;
  return {
    producer: stringOrNull(value.producer),
    region: stringOrNull(value.region),
    grape: stringOrNull(value.grape),
    vintage: typeof vintage === 'number' && Number.isInteger(vintage) ? vintage : null,
    description: stringOrNull(value.description),
  };
}

// ── In-memory tier ──────────────────────────────────────────────
export class MemoryEnrichmentCache implements CacheTier {
  private entries = new Map<string, CacheEntry>();

  constructor(private readonly ttlMs: number, private readonly now: Clock = Date.now) {}

  async getEntry(key: string): Promise<CacheEntry | null> {
    const entry = this.entries.get(key);
    if (entry && this.now() - entry.storedAt < this.ttlMs) {
      return entry;
    }
    if (entry) this.entries.delete(key);
    return null;
  }

  async get(key: string): Promise<EnrichmentFields | null> {
    return (await this.getEntry(key))?.data ?? null;
  }

  async setEntry(key: string, entry: CacheEntry): Promise<void> {
    this.entries.set(key, entry);
  }

  async set(key: string, value: EnrichmentFields): Promise<void> {
    await this.setEntry(key, { data: value, storedAt: this.now() });
  }

  get size(): number {
    return this.entries.size;
  }
}

// ── On-disk tier: one JSON file per key ─────────────────────────
export class DiskEnrichmentCache implements CacheTier {
  constructor(
    private readonly dir: string,
    private readonly ttlMs: number,
    private readonly now: Clock = Date.now,
  ) {}

  private fileFor(key: string): string {
    return path.join(this.dir, `${key.replace(/[^a-zA-Z0-9_-]/g, '_')}.json`);
  }

  async getEntry(key: string): Promise<CacheEntry | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.fileFor(key), 'utf8');
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }

    const parsed: unknown = JSON.parse(raw);
    if (!isRecord(parsed) || typeof parsed.storedAt !== 'number') return null;
    if (this.now() - parsed.storedAt >= this.ttlMs) {
      await fs.rm(this.fileFor(key), { force: true });
      return null;
    }
    const data = toEnrichmentFields(parsed.data);
    return data ? { data, storedAt: parsed.storedAt } : null;
  }

  async get(key: string): Promise<EnrichmentFields | null> {
    return (await this.getEntry(key))?.data ?? null;
  }

  async setEntry(key: string, entry: CacheEntry): Promise<void> {
    await fs.mkdir(this.dir, { recursive: true });
    const payload = JSON.stringify({ storedAt: entry.storedAt, data: entry.data });
    await fs.writeFile(this.fileFor(key), payload, 'utf8');
  }

  async set(key: string, value: EnrichmentFields): Promise<void> {
    await this.setEntry(key, { data: value, storedAt: this.now() });
  }
}

function isNotFound(err: unknown): boolean {
  return isRecord(err) && err.code === 'ENOENT';
}

/**
 * Memory in front of disk. A failing tier counts as a miss on read and is
 * skipped on write; nothing here throws. Promoted hits keep their original
 * store time, so an entry expires TTL after it was first written.
 */
export class TieredEnrichmentCache implements EnrichmentCache {
  constructor(private readonly tiers: CacheTier[]) {}

  async get(key: string): Promise<EnrichmentFields | null> {
    for (let i = 0; i < this.tiers.length; i++) {
      let hit: CacheEntry | null = null;
      try {
        hit = await this.tiers[i].getEntry(key);
      } catch (err) {
        console.warn(`[cache] read failed (tier ${i}): ${errorMessage(err)}`);
      }
      if (hit) {
        const entry = hit;
        await this.writeTiers(this.tiers.slice(0, i), tier => tier.setEntry(key, entry));
        return entry.data;
      }
    }
    return null;
  }

  async set(key: string, value: EnrichmentFields): Promise<void> {
    await this.writeTiers(this.tiers, tier => tier.set(key, value));
  }

  private async writeTiers(tiers: CacheTier[], write: (tier: CacheTier) => Promise<void>): Promise<void> {
    await Promise.all(tiers.map(async (tier, i) => {
      try {
        await write(tier);
      } catch (err) {
        console.warn(`[cache] write failed (tier ${i}): ${errorMessage(err)}`);
      }
    }));
  }
}

export function createEnrichmentCache(opts: { dir: string; ttlHours: number }): EnrichmentCache {
  const ttlMs = opts.ttlHours * 60 * 60 * 1000;
  return new TieredEnrichmentCache([
    new MemoryEnrichmentCache(ttlMs),
    new DiskEnrichmentCache(opts.dir, ttlMs),
  ]);
}
