import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import type { EnrichmentFields } from '../types/wine.js';
import {
  DiskEnrichmentCache,
  MemoryEnrichmentCache,
  TieredEnrichmentCache,
  enrichmentCacheKey,
  toEnrichmentFields,
  type CacheTier,
} from './enrichment-cache.js';

const fields: EnrichmentFields = {
  producer: 'Domaine Test',
  region: 'Chablis, France',
  grape: 'Chardonnay',
  vintage: 2019,
  description: 'Flinty and taut.',
};

describe('enrichmentCacheKey', () => {
  it('shares a key across abbreviations, case and spacing', () => {
    expect(enrichmentCacheKey('Ch. Margaux')).toBe(enrichmentCacheKey('chateau   margaux'));
    expect(enrichmentCacheKey('Ch. Margaux')).toMatch(/^[0-9a-f]{64}$/);
    expect(enrichmentCacheKey('Margaux')).not.toBe(enrichmentCacheKey('Ch. Margaux'));
  });
});

describe('toEnrichmentFields', () => {
  it('drops values of the wrong type', () => {
    expect(toEnrichmentFields({ producer: 3, region: 'Rioja', vintage: 2015.5 })).toEqual({
      producer: null,
      region: 'Rioja',
      grape: null,
      vintage: null,
      description: null,
    });
    expect(toEnrichmentFields('nope')).toBeNull();
  });
});

describe('MemoryEnrichmentCache', () => {
  it('expires entries after the TTL', async () => {
    let now = 0;
    const cache = new MemoryEnrichmentCache(1000, () => now);
    await cache.set('k', fields);

    now = 999;
    expect(await cache.get('k')).toEqual(fields);

    now = 1000;
    expect(await cache.get('k')).toBeNull();
    expect(cache.size).toBe(0);
  });
});

describe('DiskEnrichmentCache', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'enrich-cache-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('round-trips entries through one file per key', async () => {
    const cache = new DiskEnrichmentCache(path.join(dir, 'nested'), 60_000);
    await cache.set('abc', fields);

    expect(await cache.get('abc')).toEqual(fields);
    expect(await fs.readdir(path.join(dir, 'nested'))).toEqual(['abc.json']);
  });

  it('misses unknown keys', async () => {
    expect(await new DiskEnrichmentCache(dir, 60_000).get('missing')).toBeNull();
  });

  it('removes expired entries on read', async () => {
    let now = 0;
    const cache = new DiskEnrichmentCache(dir, 1000, () => now);
    await cache.set('abc', fields);

    now = 5000;
    expect(await cache.get('abc')).toBeNull();
    expect(await fs.readdir(dir)).toEqual([]);
  });
});

describe('TieredEnrichmentCache', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  const fail = async (): Promise<never> => {
    throw new Error('disk full');
  };
  const broken: CacheTier = { get: fail, set: fail, getEntry: fail, setEntry: fail };

  it('promotes lower-tier hits', async () => {
    const memory = new MemoryEnrichmentCache(60_000);
    const lower = new MemoryEnrichmentCache(60_000);
    await lower.set('k', fields);

    const tiered = new TieredEnrichmentCache([memory, lower]);
    expect(await tiered.get('k')).toEqual(fields);
    expect(await memory.get('k')).toEqual(fields);
  });

  it('keeps the original store time when promoting', async () => {
    let now = 0;
    const memory = new MemoryEnrichmentCache(100, () => now);
    const lower = new MemoryEnrichmentCache(100, () => now);
    await lower.set('k', fields);
    const tiered = new TieredEnrichmentCache([memory, lower]);

    now = 90;
    expect(await tiered.get('k')).toEqual(fields);
    expect(await memory.getEntry('k')).toEqual({ data: fields, storedAt: 0 });

    now = 180;
    expect(await tiered.get('k')).toBeNull();
    expect(memory.size).toBe(0);
  });

  it('keeps the original store time when promoting from disk', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'enrich-tiered-'));
    try {
      let now = 0;
      const memory = new MemoryEnrichmentCache(100, () => now);
      const disk = new DiskEnrichmentCache(dir, 100, () => now);
      await disk.set('k', fields);
      const tiered = new TieredEnrichmentCache([memory, disk]);

      now = 90;
      expect(await tiered.get('k')).toEqual(fields);
      now = 180;
      expect(await tiered.get('k')).toBeNull();
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it('treats failing tiers as misses and skips them on write', async () => {
    const memory = new MemoryEnrichmentCache(60_000);
    const tiered = new TieredEnrichmentCache([broken, memory]);

    expect(await tiered.get('k')).toBeNull();
    await expect(tiered.set('k', fields)).resolves.toBeUndefined();
    expect(await tiered.get('k')).toEqual(fields);
  });
});
