export type BoundingBox = readonly [x1: number, y1: number, x2: number, y2: number];

export interface OcrFragment {
  text: string;
  bbox: BoundingBox | null;
}

export interface WinePrice {
  currency: string | null;
  glass: number | null;
  bottle: number | null;
}

export interface Wine {
  id: string;
  rawText: string;
  group: string | null;
  name: string | null;
  producer: string | null;
  region: string | null;
  grape: string | null;
  vintage: number | null;
  description: string | null;
  price: WinePrice;
}

// A wine before ids are handed out at the end of a parse.
export type WineDraft = Omit<Wine, 'id'>;

export interface ClassifiedLine {
  text: string;
  currency: string | null;
  priceTokens: (number | null)[];
  vintage: number | null;
  name: string | null;
  isHeaderLike: boolean;
  isPureContinuation: boolean;
}

export interface EnrichmentFields {
  producer: string | null;
  region: string | null;
  grape: string | null;
  vintage: number | null;
  description: string | null;
}

export interface AnalyzeResponse {
  rawText: string;
  wines: Wine[];
  ocr: {
    engine: string;
    status: 'ok' | 'unavailable';
    fragmentCount: number;
    rowCount: number;
  };
}
