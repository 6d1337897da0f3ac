import { distance } from 'fastest-levenshtein';

const ABBREVIATIONS: [RegExp, string][] = [
  [/\bch\.\s*/gi, 'Chateau '],
  [/\bcht\.\s*/gi, 'Chateau '],
  [/\bdom\.\s*/gi, 'Domaine '],
  [/\bst\.\s*/gi, 'Saint '],
  [/\bste\.\s*/gi, 'Sainte '],
  [/\bmt\.\s*/gi, 'Mount '],
  [/\bcab\.\s*/gi, 'Cabernet '],
  [/\bsauv\.\s*/gi, 'Sauvignon '],
  [/\bchard\.\s*/gi, 'Chardonnay '],
  [/\bries\.\s*/gi, 'Riesling '],
  [/\bpnt?\.\s*/gi, 'Pinot '],
  [/\bvyd\.?\s*/gi, 'Vineyard '],
  [/\bvly\.?\s*/gi, 'Valley '],
  [/\bres\.\s*/gi, 'Reserve '],
];

export function normalizeWineName(raw: string): string {
  let name = raw.trim();

  for (const [pattern, replacement] of ABBREVIATIONS) {
    name = name.replace(pattern, replacement);
  }

  // '18 -> 2018, '98 -> 1998
  name = name.replace(/'(\d{2})\b/g, (_, year: string) => {
    const num = parseInt(year, 10);
    return num > 50 ? `19${year}` : `20${year}`;
  });

  return name.replace(/\s+/g, ' ').trim();
}

/** Edit distance between normalized names over the longer name's length: 0 is identical, 1 shares nothing. */
export function nameDistanceRatio(a: string, b: string): number {
  const na = normalizeWineName(a).toLowerCase();
  const nb = normalizeWineName(b).toLowerCase();
  const maxLen = Math.max(na.length, nb.length);
  return maxLen === 0 ? 0 : distance(na, nb) / maxLen;
}

export function isCloseMatch(a: string, b: string, maxRatio: number): boolean {
  return nameDistanceRatio(a, b) <= maxRatio;
}
