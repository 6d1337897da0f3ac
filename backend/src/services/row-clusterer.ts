import type { BoundingBox, OcrFragment } from '../types/wine.js';

export const COLUMN_MARKER = ' | ';

const MIN_OVERLAP_RATIO = 0.35;
const MIN_Y_TOLERANCE = 6;
const Y_TOLERANCE_FACTOR = 0.45;
const MIN_COLUMN_GAP = 40;
const COLUMN_GAP_FACTOR = 2.5;

interface GeoFragment {
  text: string;
  bbox: BoundingBox;
  index: number;
}

export interface RowCluster {
  bbox: BoundingBox;
  midY: number;
  fragments: GeoFragment[];
}

// ── Geometry helpers ────────────────────────────────────────────
export function isBoundingBox(value: unknown): value is BoundingBox {
  return Array.isArray(value)
    && value.length === 4
    && value.every(n => typeof n === 'number' && Number.isFinite(n));
}

function normalizeBox(box: BoundingBox): BoundingBox {
  const [x1, y1, x2, y2] = box;
  return [Math.min(x1, x2), Math.min(y1, y2), Math.max(x1, x2), Math.max(y1, y2)];
}

const height = (b: BoundingBox) => b[3] - b[1];
const midY = (b: BoundingBox) => (b[1] + b[3]) / 2;

export function median(values: number[]): number {
  const sorted = values.filter(v => Number.isFinite(v)).sort((a, b) => a - b);
  if (sorted.length === 0) return 0;
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

/** Shared vertical extent relative to the shorter of the two boxes. */
export function verticalOverlap(a: BoundingBox, b: BoundingBox): number {
  const shorter = Math.min(height(a), height(b));
  if (shorter <= 0) return 0;
  const intersection = Math.min(a[3], b[3]) - Math.max(a[1], b[1]);
  return Math.max(0, intersection) / shorter;
}

function union(a: BoundingBox, b: BoundingBox): BoundingBox {
  return [Math.min(a[0], b[0]), Math.min(a[1], b[1]), Math.max(a[2], b[2]), Math.max(a[3], b[3])];
}

export function yTolerance(fragments: { bbox: BoundingBox }[]): number {
  const h = median(fragments.map(f => height(f.bbox)));
  return Math.max(MIN_Y_TOLERANCE, h * Y_TOLERANCE_FACTOR);
}

// ── Text cleanup ────────────────────────────────────────────────
export function cleanRowText(text: string): string {
  return text
    .replace(/<\/?[a-z][^>]*>/gi, ' ')
    .replace(/[-–—‒―_]{3,}/g, ' ')
    // leaders in front of a price or a lone dash marker: "Chablis.....12", "Rosé ·· 9", "Merlot –38", "Cava ... - 30"
    .replace(/(?:\.{2,}|[·•…]+)\s*(?=[$€£]?\s*\d|[-–—](?:\s|$))/g, ' ')
    .replace(/(?<!\d)[-–—]+(?=[$€£]?\d)/g, ' ')
    .replace(/(?:\s*(?:[.·•…_|:]+|[-–—]{2,}))+$/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

// ── Clustering ──────────────────────────────────────────────────
function clusterByOverlap(fragments: GeoFragment[], tolerance: number): RowCluster[] {
  const ordered = [...fragments].sort((a, b) => (midY(a.bbox) - midY(b.bbox)) || (a.bbox[0] - b.bbox[0]));
  const clusters: RowCluster[] = [];

  for (const fragment of ordered) {
    let best: RowCluster | null = null;
    let bestOverlap = -1;
    let bestDistance = Infinity;

    for (const cluster of clusters) {
      const overlap = verticalOverlap(fragment.bbox, cluster.bbox);
      const distance = Math.abs(midY(fragment.bbox) - cluster.midY);
      if (overlap < MIN_OVERLAP_RATIO && distance > tolerance) continue;
      if (overlap > bestOverlap || (overlap === bestOverlap && distance < bestDistance)) {
        best = cluster;
        bestOverlap = overlap;
        bestDistance = distance;
      }
    }

    if (best) {
      best.fragments.push(fragment);
      best.bbox = union(best.bbox, fragment.bbox);
      best.midY = midY(best.bbox);
    } else {
      clusters.push({ bbox: fragment.bbox, midY: midY(fragment.bbox), fragments: [fragment] });
    }
  }

  return clusters;
}

// Zero-height boxes (baseline anchors) leave no overlap to measure: bucket by y alone.
function clusterByYBuckets(fragments: GeoFragment[], tolerance: number): RowCluster[] {
  const ordered = [...fragments].sort((a, b) => (midY(a.bbox) - midY(b.bbox)) || (a.bbox[0] - b.bbox[0]));
  const clusters: RowCluster[] = [];

  for (const fragment of ordered) {
    const current = clusters[clusters.length - 1];
    if (current && Math.abs(midY(fragment.bbox) - current.midY) <= tolerance) {
      current.fragments.push(fragment);
      current.bbox = union(current.bbox, fragment.bbox);
    } else {
      clusters.push({ bbox: fragment.bbox, midY: midY(fragment.bbox), fragments: [fragment] });
    }
  }

  return clusters;
}

/**
 * Groups fragments that carry geometry into visual rows, top to bottom, each
 * row sorted left to right. Fragments without geometry are not part of any cluster.
 */
export function clusterRows(fragments: OcrFragment[]): RowCluster[] {
  const geometric: GeoFragment[] = [];
  fragments.forEach((f, index) => {
    if (isBoundingBox(f.bbox)) geometric.push({ text: f.text, bbox: normalizeBox(f.bbox), index });
  });
  if (geometric.length === 0) return [];

  const tolerance = yTolerance(geometric);
  const degenerate = geometric.every(f => height(f.bbox) <= 0);
  const clusters = degenerate
    ? clusterByYBuckets(geometric, tolerance)
    : clusterByOverlap(geometric, tolerance);

  clusters.sort((a, b) => a.midY - b.midY);
  for (const cluster of clusters) {
    cluster.fragments.sort((a, b) => a.bbox[0] - b.bbox[0]);
  }
  return clusters;
}

/** Joins a row's fragments, marking wide horizontal gaps as column breaks. */
export function joinRow(cluster: RowCluster): string {
  const parts = cluster.fragments;
  if (parts.length === 0) return '';

  const steps: number[] = [];
  for (let i = 1; i < parts.length; i++) {
    steps.push(parts[i].bbox[0] - parts[i - 1].bbox[0]);
  }
  const threshold = Math.max(MIN_COLUMN_GAP, median(steps) * COLUMN_GAP_FACTOR);

  let text = parts[0].text;
  for (let i = 1; i < parts.length; i++) {
    const gap = parts[i].bbox[0] - parts[i - 1].bbox[2];
    text += (gap > threshold ? COLUMN_MARKER : ' ') + parts[i].text;
  }
  return text;
}

/**
 * Reading-order rows for one image. Without any geometry the fragments keep
 * their collection order, one row each.
 */
export function buildRows(fragments: OcrFragment[]): string[] {
  const clusters = clusterRows(fragments);
  if (clusters.length === 0) {
    return fragments.map(f => cleanRowText(f.text)).filter(Boolean);
  }

  // Fragments without geometry follow the row of their nearest geometric predecessor.
  const rowOfFragment = new Map<number, number>();
  clusters.forEach((cluster, position) => {
    for (const f of cluster.fragments) rowOfFragment.set(f.index, position);
  });

  const looseAfter = new Map<number, string[]>();
  let lastRow = -1;
  fragments.forEach((f, index) => {
    const row = rowOfFragment.get(index);
    if (row !== undefined) {
      lastRow = row;
      return;
    }
    const bucket = looseAfter.get(lastRow) ?? [];
    bucket.push(f.text);
    looseAfter.set(lastRow, bucket);
  });

  const ordered: string[] = [...(looseAfter.get(-1) ?? [])];
  clusters.forEach((cluster, position) => {
    ordered.push(joinRow(cluster), ...(looseAfter.get(position) ?? []));
  });

  return ordered.map(cleanRowText).filter(Boolean);
}

export function splitTextLines(rawText: string): string[] {
  return rawText.split(/\r?\n/).map(cleanRowText).filter(Boolean);
}
