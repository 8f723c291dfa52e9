import { describe, expect, it } from 'vitest';
import type { ReceiptExtraction, ReceiptItem, VoiceExtraction } from '../../../types';
import {
  amountScore,
  itemSimilarity,
  matchItems,
  minutesBetween,
  normalizeReceiptItems,
  pricesMatch,
  receiptFromRecognition,
  scoreCandidate,
  scoreCandidates,
  selectCandidates,
} from '../receiptMatcher';

const T = new Date(2024, 4, 15, 12, 0);
const minutes = (n: number) => new Date(T.getTime() + n * 60_000);

const line = (name: string, total: number): ReceiptItem => ({ name, unitPrice: total, quantity: 1, total });

const receipt = (id: string, overrides: Partial<ReceiptExtraction> = {}): ReceiptExtraction => ({
  id,
  userId: 'user-1',
  shopName: 'Korzinka',
  total: 60500,
  items: [line('хлеб', 4500), line('молоко', 12000), line('сыр', 30000), line('яйца', 9000), line('вода', 5000)],
  timestamp: T,
  ...overrides,
});

const voice = (overrides: Partial<VoiceExtraction> = {}): VoiceExtraction => ({
  id: 'voice-1',
  userId: 'user-1',
  text: 'купил хлеб молоко сыр всего 60500',
  language: 'ru',
  items: [
    { name: 'хлеб', price: 0, quantity: 1 },
    { name: 'молоко', price: 0, quantity: 1 },
    { name: 'сыр', price: 0, quantity: 1 },
  ],
  spokenTotal: 60500,
  timestamp: T,
  ...overrides,
});

describe('amountScore', () => {
  it('is symmetric and stays in [0, 1]', () => {
    expect(amountScore(100, 80)).toBeCloseTo(0.8, 10);
    expect(amountScore(80, 100)).toBe(amountScore(100, 80));
    expect(amountScore(60500, 60500)).toBe(1);
    expect(amountScore(1, 1_000_000)).toBeGreaterThanOrEqual(0);
  });

  it('is zero when either total is missing or not positive', () => {
    expect(amountScore(0, 100)).toBe(0);
    expect(amountScore(-5, 10)).toBe(0);
    expect(amountScore(Number.NaN, 10)).toBe(0);
  });
});

describe('itemSimilarity', () => {
  it('ignores case and punctuation', () => {
    expect(itemSimilarity('Хлеб!', 'хлеб')).toBe(1);
  });

  it('mixes edit distance with shared words', () => {
    // ratio 1 - 1/11, no shared words
    expect(itemSimilarity('развлечение', 'развлечения')).toBeCloseTo(0.6 * (10 / 11), 10);
    expect(itemSimilarity('', 'хлеб')).toBe(0);
  });
});

describe('pricesMatch', () => {
  it('tolerates ten percent and unknown prices', () => {
    expect(pricesMatch(10000, 10500)).toBe(true);
    expect(pricesMatch(10000, 12000)).toBe(false);
    expect(pricesMatch(0, 5000)).toBe(true);
  });
});

describe('matchItems', () => {
  it('lets two voice items share one receipt line', () => {
    const bread = line('хлеб', 4500);
    const result = matchItems(
      [
        { name: 'хлеб', price: 4500, quantity: 1 },
        { name: 'Хлеб', price: 9000, quantity: 2 },
      ],
      [bread, line('молоко', 12000)],
    );
    expect(result.pairs).toHaveLength(2);
    expect(result.pairs.map(p => p.receiptItem)).toEqual([bread, bread]);
    expect(result.pairs.map(p => p.priceMatch)).toEqual([true, false]);
    expect(result.confidence).toBe(1);
  });

  it('averages over every voice item, matched or not', () => {
    const result = matchItems(
      [
        { name: 'хлеб', price: 0, quantity: 1 },
        { name: 'бензин', price: 0, quantity: 1 },
      ],
      [line('хлеб', 4500)],
    );
    expect(result.pairs).toHaveLength(1);
    expect(result.confidence).toBe(0.5);
  });

  it('is empty when either side has no items', () => {
    expect(matchItems([], [line('хлеб', 1)])).toEqual({ pairs: [], confidence: 0 });
  });
});

describe('selectCandidates', () => {
  it('keeps same-user receipts inside the inclusive window on both sides', () => {
    const receipts = [
      receipt('early', { timestamp: minutes(-3) }),
      receipt('late', { timestamp: minutes(3) }),
      receipt('edge', { timestamp: minutes(5) }),
      receipt('outside', { timestamp: minutes(6) }),
      receipt('other-user', { userId: 'user-2' }),
      receipt('no-time', { timestamp: null }),
    ];
    expect(selectCandidates(voice(), receipts).map(r => r.id)).toEqual(['early', 'late', 'edge']);
  });

  it('measures the distance in minutes', () => {
    expect(minutesBetween(minutes(-3), T)).toBe(3);
    expect(minutesBetween(null, T)).toBeNull();
  });
});

describe('scoreCandidate', () => {
  it('matches a receipt when the spoken total and some items agree', () => {
    const result = scoreCandidate(voice(), receipt('r1'));
    expect(result.amountScore).toBe(1);
    expect(result.itemConfidence).toBe(1);
    expect(result.confidence).toBeCloseTo(1, 10);
    expect(result.confidence).toBeGreaterThanOrEqual(0.7);
    expect(result.amountMatch).toBe(true);
    expect(result.found).toBe(true);
    expect(result.shouldNotify).toBe(true);
    expect(result.status).toBe('completed');
    expect(result.pairs.map(p => p.receiptItem.name)).toEqual(['хлеб', 'молоко', 'сыр']);
    expect(result.timeDifferenceMinutes).toBe(0);
  });

  it('weights a near total against the items', () => {
    const result = scoreCandidate(voice({ spokenTotal: 55000 }), receipt('r1'));
    expect(result.amountScore).toBeCloseTo(1 - 5500 / 60500, 10);
    expect(result.confidence).toBeCloseTo(0.6 * (1 - 5500 / 60500) + 0.4, 10);
    expect(result.amountMatch).toBe(true);
  });

  it('blends an exact total with a partial item match', () => {
    const result = scoreCandidate(
      voice({
        items: [
          { name: 'хлеб', price: 0, quantity: 1 },
          { name: 'молоко', price: 0, quantity: 1 },
          { name: 'сыр', price: 0, quantity: 1 },
          { name: 'бензин', price: 0, quantity: 1 },
          { name: 'шампунь', price: 0, quantity: 1 },
        ],
      }),
      receipt('r1'),
    );
    expect(result.amountScore).toBe(1);
    expect(result.itemConfidence).toBeCloseTo(0.6, 10);
    expect(result.confidence).toBeCloseTo(0.6 * 1 + 0.4 * 0.6, 10);
    expect(result.pairs.map(p => p.receiptItem.name)).toEqual(['хлеб', 'молоко', 'сыр']);
    expect(result.found).toBe(true);
    expect(result.shouldNotify).toBe(true);
  });

  it('relies on the items alone without a spoken total', () => {
    const result = scoreCandidate(
      voice({ spokenTotal: null, items: [{ name: 'хлеб', price: 0, quantity: 1 }, { name: 'бензин', price: 0, quantity: 1 }] }),
      receipt('r1'),
    );
    expect(result.amountScore).toBe(0);
    expect(result.confidence).toBe(0.5);
    expect(result.found).toBe(false);
    expect(result.shouldNotify).toBe(false);
  });

  it('fails without a score when the data is indeterminate', () => {
    const untimed = scoreCandidate(voice({ timestamp: null }), receipt('r1'));
    expect(untimed).toMatchObject({ status: 'failed', error: 'missing timestamp', confidence: 0, found: false });

    const empty = scoreCandidate(voice({ items: [], spokenTotal: null }), receipt('r1', { items: [] }));
    expect(empty).toMatchObject({ status: 'failed', error: 'nothing to compare', confidence: 0, timeDifferenceMinutes: 0 });
  });
});

describe('scoreCandidates', () => {
  it('scores every candidate in the window, best first', () => {
    const results = scoreCandidates(voice(), [
      receipt('cheap', { total: 10000, items: [line('бензин', 10000)], timestamp: minutes(1) }),
      receipt('best', { timestamp: minutes(-2) }),
      receipt('far', { timestamp: minutes(30) }),
    ]);
    expect(results.map(r => r.receiptId)).toEqual(['best', 'cheap']);
    expect(results[1].found).toBe(false);
  });
});

describe('normalizeReceiptItems', () => {
  it('clamps negative money and empty quantities', () => {
    expect(normalizeReceiptItems([{ name: ' хлеб ', unitPrice: -1, quantity: 0, total: -5 }])).toEqual([
      { name: 'хлеб', unitPrice: 0, quantity: 1, total: 0 },
    ]);
  });
});

describe('receiptFromRecognition', () => {
  it('takes the shop from the first raw line and sums missing totals', () => {
    const items: ReceiptItem[] = [
      { name: ' хлеб ', unitPrice: 4500, quantity: 1, total: 4500 },
      { name: 'молоко', unitPrice: 6000, quantity: 2, total: 12000 },
    ];
    expect(receiptFromRecognition({ ok: true, rawText: '\n  Korzinka  \nхлеб 4500', items }, T)).toEqual({
      shopName: 'Korzinka',
      total: 16500,
      items: [
        { name: 'хлеб', unitPrice: 4500, quantity: 1, total: 4500 },
        { name: 'молоко', unitPrice: 6000, quantity: 2, total: 12000 },
      ],
      timestamp: T,
    });
  });

  it('keeps a recognized shop and total', () => {
    expect(receiptFromRecognition({ ok: true, rawText: 'MAKRO', shopName: 'Makro Chilonzor', total: 60500 }, null)).toEqual({
      shopName: 'Makro Chilonzor',
      total: 60500,
      items: [],
      timestamp: null,
    });
  });

  it('yields nothing for a failed recognition', () => {
    expect(receiptFromRecognition({ ok: false, reason: 'blurry' }, T)).toBeNull();
  });
});
