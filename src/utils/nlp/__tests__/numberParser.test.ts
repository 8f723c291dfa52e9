import { describe, expect, it } from 'vitest';
import { isMagnitudeWord, isNumeralWord, parseNumberWords, parseNumericLiteral } from '../numberParser';

describe('parseNumberWords', () => {
  it('reads English numerals', () => {
    expect(parseNumberWords(['two', 'thousand', 'five', 'hundred'])).toBe(2500);
    expect(parseNumberWords(['one', 'thousand'])).toBe(1000);
    expect(parseNumberWords(['one', 'hundred', 'and', 'twenty'])).toBe(120);
  });

  it('reads a lone magnitude word as its magnitude', () => {
    expect(parseNumberWords(['thousand'])).toBe(1000);
    expect(parseNumberWords(['тысяча'])).toBe(1000);
    expect(parseNumberWords(['million'])).toBe(1000000);
  });

  it('reads Russian and Uzbek numerals', () => {
    expect(parseNumberWords(['пять', 'тысяч', 'триста'])).toBe(5300);
    expect(parseNumberWords(['ikki', 'yuz', 'ming'])).toBe(200000);
  });

  it('reads accusative forms', () => {
    expect(parseNumberWords(['тысячу'])).toBe(1000);
    expect(parseNumberWords(['одну', 'тысячу'])).toBe(1000);
    expect(parseNumberWords(['две', 'тысячи', 'одну'])).toBe(2001);
  });

  it('mixes digits with magnitude words', () => {
    expect(parseNumberWords(['20', 'тысяч'])).toBe(20000);
    expect(parseNumberWords(['1.5', 'million'])).toBe(1500000);
  });

  it('rejects runs without numeral words or with foreign tokens', () => {
    expect(parseNumberWords(['5000'])).toBeNull();
    expect(parseNumberWords(['five', 'apples'])).toBeNull();
  });
});

describe('parseNumericLiteral', () => {
  it('handles locale separators', () => {
    expect(parseNumericLiteral('1,500.00')).toBe(1500);
    expect(parseNumericLiteral('1.500.000')).toBe(1500000);
    expect(parseNumericLiteral('1.500,25')).toBe(1500.25);
    expect(parseNumericLiteral('12,5')).toBe(12.5);
    expect(parseNumericLiteral('1,500')).toBe(1500);
    expect(parseNumericLiteral('10 000')).toBe(10000);
  });

  it('rejects malformed literals', () => {
    expect(parseNumericLiteral('1 50')).toBeNull();
    expect(parseNumericLiteral('1,50,0')).toBeNull();
    expect(parseNumericLiteral('abc')).toBeNull();
    expect(parseNumericLiteral('')).toBeNull();
  });
});

describe('numeral lookups', () => {
  it('knows numerals and magnitudes', () => {
    expect(isNumeralWord('пять')).toBe(true);
    expect(isNumeralWord('хлеб')).toBe(false);
    expect(isMagnitudeWord('ming')).toBe(true);
    expect(isMagnitudeWord('hundred')).toBe(true);
    expect(isMagnitudeWord('five')).toBe(false);
  });
});
