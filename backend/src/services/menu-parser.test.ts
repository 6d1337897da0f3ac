import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { MenuStateMachine, parseMenuRows, parseWinesFromFragments, parseWinesFromText } from './menu-parser.js';

const summary = (rows: string[], switchGroupOnHeader = false) =>
  parseMenuRows(rows, { switchGroupOnHeader }).map(w => ({
    id: w.id,
    group: w.group,
    name: w.name,
    vintage: w.vintage,
    glass: w.price.glass,
    bottle: w.price.bottle,
  }));

describe('parseMenuRows', () => {
  it('reads a self-contained row before any header', () => {
    const [wine] = parseMenuRows(['Chablis 2019 12 45']);
    expect(wine).toEqual({
      id: '1',
      rawText: 'Chablis 2019 12 45',
      group: null,
      name: 'Chablis',
      producer: null,
      region: null,
      grape: null,
      vintage: 2019,
      description: null,
      price: { currency: null, glass: 12, bottle: 45 },
    });
  });

  it('fills a pending wine from separate price rows', () => {
    expect(summary(['RED WINE', 'Pinot Noir', 'n/a', '64'])).toEqual([
      { id: '1', group: 'RED WINE', name: 'Pinot Noir', vintage: null, glass: null, bottle: 64 },
    ]);
  });

  it('ignores column labels under a group', () => {
    expect(summary(['WHITE WINE', 'Glass Bottle 175ml', 'Chardonnay 10 38'])).toEqual([
      { id: '1', group: 'WHITE WINE', name: 'Chardonnay', vintage: null, glass: 10, bottle: 38 },
    ]);
  });

  it('drops price rows with nothing to attach to', () => {
    expect(parseMenuRows(['64'])).toEqual([]);
  });

  it('starts a pending wine from a name with a serving size', () => {
    const machine = new MenuStateMachine();
    machine.push('WHITE WINE');
    expect(machine.push('Riesling 175ml')).toEqual([]);
    expect(machine.hasPendingWine).toBe(true);
    expect(machine.end()[0]).toMatchObject({ name: 'Riesling 175ml', group: 'WHITE WINE' });
  });

  it('fills glass then bottle from two continuation rows', () => {
    expect(summary(['RED WINE', 'Merlot', '12', '45'])).toEqual([
      { id: '1', group: 'RED WINE', name: 'Merlot', vintage: null, glass: 12, bottle: 45 },
    ]);
  });

  it('flushes a name without prices when the next name arrives', () => {
    expect(summary(['RED WINE', 'Pinot Noir', 'Merlot', '12 45'])).toEqual([
      { id: '1', group: 'RED WINE', name: 'Pinot Noir', vintage: null, glass: null, bottle: null },
      { id: '2', group: 'RED WINE', name: 'Merlot', vintage: null, glass: 12, bottle: 45 },
    ]);
  });

  it('flushes a half-filled wine at the end', () => {
    expect(summary(['RED WINE', 'Pinot Noir', '12'])).toEqual([
      { id: '1', group: 'RED WINE', name: 'Pinot Noir', vintage: null, glass: 12, bottle: null },
    ]);
  });

  it('emits self-contained rows without touching the pending wine', () => {
    expect(summary(['RED WINE', 'Pinot Noir', 'Chablis 12 45', '9 36'])).toEqual([
      { id: '1', group: 'RED WINE', name: 'Chablis', vintage: null, glass: 12, bottle: 45 },
      { id: '2', group: 'RED WINE', name: 'Pinot Noir', vintage: null, glass: 9, bottle: 36 },
    ]);
  });

  it('takes vintage and currency from continuation rows', () => {
    const [barolo, malbec] = parseMenuRows(['RED WINE', 'Barolo', '2016 | 18 | 72', 'Malbec', '$11 $42']);
    expect(barolo).toMatchObject({ name: 'Barolo', vintage: 2016, price: { currency: null, glass: 18, bottle: 72 } });
    expect(malbec.price).toEqual({ currency: '$', glass: 11, bottle: 42 });
  });

  it('strips a trailing colon from the group', () => {
    expect(summary(['Sparkling:', 'Cava 8 30'])[0].group).toBe('Sparkling');
  });

  it('keeps the first group unless switching is enabled', () => {
    const rows = ['RED WINE', 'Merlot 9 36', 'WHITE WINE', 'Chablis 12 45'];
    expect(summary(rows).map(w => w.group)).toEqual(['RED WINE', 'RED WINE']);
    expect(summary(rows, true).map(w => w.group)).toEqual(['RED WINE', 'WHITE WINE']);
  });

  it('flushes the pending wine when switching groups', () => {
    expect(summary(['RED WINE', 'Merlot', '9', 'WHITE WINE', 'Chablis 12 45'], true)).toEqual([
      { id: '1', group: 'RED WINE', name: 'Merlot', vintage: null, glass: 9, bottle: null },
      { id: '2', group: 'WHITE WINE', name: 'Chablis', vintage: null, glass: 12, bottle: 45 },
    ]);
  });

  it('tracks the current group as headers switch it', () => {
    const machine = new MenuStateMachine({ switchGroupOnHeader: true });
    expect(machine.group).toBeNull();

    machine.push('RED WINE');
    machine.push('Merlot');
    machine.push('9');
    expect(machine.group).toBe('RED WINE');

    expect(machine.push('WHITE WINE')).toMatchObject([{ name: 'Merlot', group: 'RED WINE' }]);
    expect(machine.group).toBe('WHITE WINE');

    machine.push('Glass Bottle');
    expect(machine.group).toBe('WHITE WINE');
  });

  it('keeps the first group as current when switching is off', () => {
    const machine = new MenuStateMachine();
    machine.push('RED WINE');
    machine.push('WHITE WINE');
    expect(machine.group).toBe('RED WINE');
  });

  it('never turns header-only rows into wines', () => {
    const header = fc.constantFrom('Glass Bottle', 'GLASS | BOTTLE', '125ml 175ml', 'Btg Btl', 'Glass 175ml Bottle');
    fc.assert(
      fc.property(fc.array(header, { minLength: 1, maxLength: 5 }), headers => {
        expect(parseMenuRows(['RED WINE', ...headers])).toEqual([]);
      }),
    );
  });

  it('numbers wines 1..N in emission order', () => {
    const row = fc.constantFrom(
      'RED WINE', 'Pinot Noir', 'Chablis 2019 12 45', 'n/a', '64', '12 45', 'Glass Bottle', 'Merlot', 'Rioja 2015 $38', '',
    );
    fc.assert(
      fc.property(fc.array(row, { maxLength: 30 }), rows => {
        const ids = parseMenuRows(rows).map(w => w.id);
        expect(ids).toEqual(ids.map((_, i) => String(i + 1)));
      }),
    );
  });
});

describe('parseWinesFromText', () => {
  it('cleans leaders before parsing', () => {
    const wines = parseWinesFromText('RED WINE\nCôtes du Rhône ........ 9 | 34\n');
    expect(wines).toHaveLength(1);
    expect(wines[0]).toMatchObject({ name: 'Côtes du Rhône', price: { glass: 9, bottle: 34 } });
  });

  it('drops leaders in front of an unavailable marker', () => {
    const wines = parseWinesFromText('RED WINE\nChablis ... - 45');
    expect(wines).toHaveLength(1);
    expect(wines[0]).toMatchObject({ name: 'Chablis', price: { glass: null, bottle: 45 } });
  });

  it('returns nothing for empty input', () => {
    expect(parseWinesFromText('')).toEqual([]);
  });
});

describe('parseWinesFromFragments', () => {
  it('parses rows rebuilt from geometry', () => {
    const wines = parseWinesFromFragments([
      { text: '45', bbox: [400, 52, 420, 70] },
      { text: 'RED WINE', bbox: [0, 0, 120, 20] },
      { text: 'Chablis 2019', bbox: [0, 50, 140, 70] },
      { text: '12', bbox: [300, 51, 320, 69] },
    ]);
    expect(wines).toHaveLength(1);
    expect(wines[0]).toMatchObject({ group: 'RED WINE', name: 'Chablis', vintage: 2019, price: { glass: 12, bottle: 45 } });
  });
});
