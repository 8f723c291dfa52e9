import { describe, expect, it } from 'vitest';
import { extractVoicePurchase } from '../voiceItems';

const T = new Date(2024, 4, 15, 12, 0);

describe('extractVoicePurchase', () => {
  it('reads listed items and the announced total', () => {
    const purchase = extractVoicePurchase('купил хлеб за 4500, молоко 12000 и сыр. Всего 60500', 'ru', T);
    expect(purchase.spokenTotal).toBe(60500);
    expect(purchase.items).toEqual([
      { name: 'хлеб', price: 4500, quantity: 1 },
      { name: 'молоко', price: 12000, quantity: 1 },
      { name: 'сыр', price: 0, quantity: 1 },
    ]);
    expect(purchase.timestamp).toBe(T);
    expect(purchase.language).toBe('ru');
  });

  it('takes an amount spoken before the payment verb', () => {
    const purchase = extractVoicePurchase("jami 60500 so'm to'ladim", 'uz', T);
    expect(purchase.spokenTotal).toBe(60500);
    expect(purchase.items).toEqual([]);
  });

  it('reads quantities and drops purchase verbs', () => {
    const purchase = extractVoicePurchase('bought 2 pcs milk 24000 and bread', 'en', T);
    expect(purchase.spokenTotal).toBeNull();
    expect(purchase.items).toEqual([
      { name: 'milk', price: 24000, quantity: 2 },
      { name: 'bread', price: 0, quantity: 1 },
    ]);
  });

  it('counts items with a small numeral word instead of pricing them', () => {
    expect(extractVoicePurchase('купил два хлеба и молоко', 'ru', T).items).toEqual([
      { name: 'хлеба', price: 0, quantity: 2 },
      { name: 'молоко', price: 0, quantity: 1 },
    ]);
    expect(extractVoicePurchase('молоко пять тысяч', 'ru', T).items).toEqual([
      { name: 'молоко', price: 5000, quantity: 1 },
    ]);
  });

  it('keeps the original text', () => {
    expect(extractVoicePurchase('Всего 100', 'ru', T)).toEqual({
      text: 'Всего 100',
      language: 'ru',
      items: [],
      spokenTotal: 100,
      timestamp: T,
    });
  });
});
