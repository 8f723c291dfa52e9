import { describe, expect, it } from 'vitest';
import { sharedTokenFraction, similarityRatio } from '../fuzzy';

describe('similarityRatio', () => {
  it('is one minus the normalized edit distance', () => {
    expect(similarityRatio('kitten', 'sitting')).toBeCloseTo(4 / 7, 10);
    expect(similarityRatio('хлеб', 'хлеб')).toBe(1);
    expect(similarityRatio('', '')).toBe(1);
    expect(similarityRatio('abc', '')).toBe(0);
  });

  it('is symmetric', () => {
    expect(similarityRatio('молоко', 'молочко')).toBe(similarityRatio('молочко', 'молоко'));
  });
});

describe('sharedTokenFraction', () => {
  it('divides shared words by the larger word set', () => {
    expect(sharedTokenFraction('молоко хлеб', 'хлеб сыр')).toBe(0.5);
    expect(sharedTokenFraction('молоко 1л', 'молоко')).toBe(0.5);
    expect(sharedTokenFraction('', 'хлеб')).toBe(0);
  });
});
