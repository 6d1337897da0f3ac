import type { Wine } from '../types/wine.js';

const STRING_FIELDS = ['group', 'name', 'producer', 'region', 'grape', 'description'] as const;

function collapse(value: string | null): string | null {
  if (value === null) return null;
  const collapsed = value.split(/\s+/).filter(Boolean).join(' ');
  return collapsed || null;
}

/** Whitespace clean-up on the structured string fields. Returns new wines. */
export function normalizeWines(wines: Wine[]): Wine[] {
  return wines.map(wine => {
    const out: Wine = { ...wine, price: { ...wine.price } };
    for (const field of STRING_FIELDS) {
      out[field] = collapse(wine[field]);
    }
    return out;
  });
}
