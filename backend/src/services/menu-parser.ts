import type { ClassifiedLine, OcrFragment, Wine, WineDraft } from '../types/wine.js';
import { classifyLine, cleanWineName, hasColumnLabel, isShortUppercaseLabel } from './price-tokens.js';
import { buildRows, splitTextLines } from './row-clusterer.js';

export interface MenuParserOptions {
  /**
   * Let a short upper-case label ("WHITE WINE") replace the active group after
   * the first one. Off by default: later headers are ignored like column labels.
   */
  switchGroupOnHeader?: boolean;
}

interface PendingWine {
  draft: WineDraft;
  slotsFilled: 0 | 1 | 2;
  glassUnavailable: boolean;
}

function newDraft(rawText: string, group: string | null): WineDraft {
  return {
    rawText,
    group,
    name: null,
    producer: null,
    region: null,
    grape: null,
    vintage: null,
    description: null,
    price: { currency: null, glass: null, bottle: null },
  };
}

function groupName(text: string): string {
  return text.trim().replace(/:+$/, '').trim();
}

/**
 * Turns classified menu rows into wines. Rows arrive in reading order; a wine
 * is either one self-contained row or a name row followed by price rows.
 */
export class MenuStateMachine {
  private currentGroup: string | null = null;
  private pending: PendingWine | null = null;
  private readonly switchGroupOnHeader: boolean;

  constructor(options: MenuParserOptions = {}) {
    this.switchGroupOnHeader = options.switchGroupOnHeader ?? false;
  }

  get group(): string | null {
    return this.currentGroup;
  }

  get hasPendingWine(): boolean {
    return this.pending !== null;
  }

  /** Feeds one row; returns the wines completed by it. */
  push(input: string | ClassifiedLine): WineDraft[] {
    const line = typeof input === 'string' ? classifyLine(input) : input;
    if (!line.text) return [];

    const emitted: WineDraft[] = [];
    const hasPrices = line.priceTokens.length > 0;

    if (hasPrices && line.isPureContinuation) {
      // Orphaned price column: never make a wine out of a price alone.
      const pending = this.pending;
      if (pending === null) return emitted;
      this.fillSlots(pending, line);
      if (pending.slotsFilled >= 2) emitted.push(this.flush(pending));
      return emitted;
    }

    if (!hasPrices) {
      if (this.currentGroup === null) {
        this.currentGroup = groupName(line.text);
        return emitted;
      }

      if (line.isHeaderLike) {
        if (this.switchGroupOnHeader && isShortUppercaseLabel(line.text) && !hasColumnLabel(line.text)) {
          if (this.pending) emitted.push(this.flush(this.pending));
          this.currentGroup = groupName(line.text);
        }
        return emitted;
      }

      // Two name rows in a row never merge: the first one goes out without prices.
      if (this.pending) emitted.push(this.flush(this.pending));
      this.startPending(line);
      return emitted;
    }

    emitted.push(this.singleLineWine(line));
    return emitted;
  }

  /** Flushes whatever is still pending at the end of the menu. */
  end(): WineDraft[] {
    return this.pending ? [this.flush(this.pending)] : [];
  }

  private startPending(line: ClassifiedLine): void {
    const draft = newDraft(line.text, this.currentGroup);
    draft.name = cleanWineName(line.text);
    draft.vintage = line.vintage;
    this.pending = { draft, slotsFilled: 0, glassUnavailable: false };
  }

  private fillSlots(pending: PendingWine, line: ClassifiedLine): void {
    const { price } = pending.draft;
    const values = line.priceTokens;

    if (pending.slotsFilled === 1 && pending.glassUnavailable && values.length === 1 && values[0] !== null) {
      // "n/a" then a lone number: the number is the bottle price.
      price.bottle = values[0];
      pending.slotsFilled = 2;
    } else {
      for (const value of values) {
        if (pending.slotsFilled === 0) {
          price.glass = value;
          pending.glassUnavailable = value === null;
          pending.slotsFilled = 1;
        } else if (pending.slotsFilled === 1) {
          price.bottle = value;
          pending.slotsFilled = 2;
        } else {
          break;
        }
      }
    }

    if (line.currency && !price.currency) price.currency = line.currency;
    if (line.vintage !== null && pending.draft.vintage === null) pending.draft.vintage = line.vintage;
  }

  private flush(pending: PendingWine): WineDraft {
    this.pending = null;
    return pending.draft;
  }

  private singleLineWine(line: ClassifiedLine): WineDraft {
    const draft = newDraft(line.text, this.currentGroup);
    draft.name = line.name;
    draft.vintage = line.vintage;
    draft.price = {
      currency: line.currency,
      glass: line.priceTokens[0] ?? null,
      bottle: line.priceTokens[1] ?? null,
    };
    return draft;
  }
}

export function assignIds(drafts: WineDraft[]): Wine[] {
  return drafts.map((draft, i) => ({ id: String(i + 1), ...draft }));
}

export function parseMenuRows(rows: Iterable<string>, options: MenuParserOptions = {}): Wine[] {
  const machine = new MenuStateMachine(options);
  const drafts: WineDraft[] = [];
  for (const row of rows) {
    drafts.push(...machine.push(row));
  }
  drafts.push(...machine.end());
  return assignIds(drafts);
}

export function parseWinesFromText(rawText: string, options: MenuParserOptions = {}): Wine[] {
  return parseMenuRows(splitTextLines(rawText), options);
}

export function parseWinesFromFragments(fragments: OcrFragment[], options: MenuParserOptions = {}): Wine[] {
  return parseMenuRows(buildRows(fragments), options);
}
