import { describe, expect, it } from 'vitest';
import { bindCurrency, extractAmount, extractAmounts, parseAmountText } from '../amountExtractor';
import { normalizeText } from '../textNormalizer';

const uzs = { baseCurrency: 'UZS' as const };

describe('extractAmount', () => {
  it('reads a dollar amount with grouping and decimals', () => {
    expect(extractAmount(normalizeText('1,500.00 dollars', 'en'), uzs)).toEqual({
      amount: 1500,
      currency: 'USD',
      family: 'currency',
      start: 0,
      end: 16,
    });
  });

  it('reads space-grouped sums', () => {
    const amount = extractAmount(normalizeText('10 000 сум'), uzs);
    expect(amount?.amount).toBe(10000);
    expect(amount?.currency).toBe('UZS');
  });

  it('reads symbol-prefixed amounts', () => {
    const amount = extractAmount(normalizeText('$20', 'en'), uzs);
    expect(amount?.amount).toBe(20);
    expect(amount?.currency).toBe('USD');
  });

  it('prefers word numerals and binds their currency', () => {
    const amount = extractAmount('пять тысяч рублей', uzs);
    expect(amount).toMatchObject({ amount: 5000, currency: 'RUB', family: 'words' });
  });

  it('reads spoken numbers when the text has no digits', () => {
    expect(extractAmount('купил хлеб за две тысячи', uzs)).toMatchObject({ amount: 2000, currency: 'UZS', family: 'words' });
  });

  it('ignores a lone small numeral next to a digit amount', () => {
    expect(extractAmount('one coffee for 5000', uzs)).toMatchObject({ amount: 5000, family: 'bare' });
  });

  it('falls back to the base currency for bare numbers', () => {
    expect(extractAmount('кофе 3 500', { baseCurrency: 'USD' })).toMatchObject({ amount: 3500, currency: 'USD' });
  });

  it('finds nothing in text without numbers', () => {
    expect(extractAmount('покажи баланс', uzs)).toBeNull();
    expect(extractAmounts('', uzs)).toEqual([]);
  });
});

describe('parseAmountText', () => {
  it('parses captured fragments', () => {
    expect(parseAmountText('5000')).toBe(5000);
    expect(parseAmountText('10 000')).toBe(10000);
    expect(parseAmountText('две тысячи пятьсот')).toBe(2500);
    expect(parseAmountText('20 thousand')).toBe(20000);
  });

  it('rejects zero and non-numbers', () => {
    expect(parseAmountText('0')).toBeNull();
    expect(parseAmountText('abc')).toBeNull();
    expect(parseAmountText('')).toBeNull();
  });
});

describe('bindCurrency', () => {
  it('looks right after the amount, then right before it', () => {
    expect(bindCurrency('20 евро', 0, 2, 'UZS')).toBe('EUR');
    expect(bindCurrency('€ 20', 2, 4, 'UZS')).toBe('EUR');
    expect(bindCurrency('20 за кофе', 0, 2, 'RUB')).toBe('RUB');
  });
});
