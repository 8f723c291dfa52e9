import { describe, expect, it } from 'vitest';
import { INTENTS } from '../../../types';
import { clamp01, scoreConfidence, specificityBonus } from '../confidence';

describe('scoreConfidence', () => {
  it('adds base, coverage, groups and specificity', () => {
    expect(scoreConfidence({ family: 'core', coverage: 1, filledGroups: 2, intent: 'add_expense', amountBound: true })).toBeCloseTo(1, 10);
    expect(scoreConfidence({ family: 'core', coverage: 0.5, filledGroups: 0, intent: 'show_balance', amountBound: false })).toBeCloseTo(0.75, 10);
    expect(scoreConfidence({ family: 'extended', coverage: 0, filledGroups: 1, intent: 'change_currency', amountBound: false })).toBeCloseTo(0.9, 10);
  });

  it('caps the group bonus at three groups', () => {
    const three = scoreConfidence({ family: 'core', coverage: 0, filledGroups: 3, intent: 'show_stats', amountBound: false });
    const ten = scoreConfidence({ family: 'core', coverage: 0, filledGroups: 10, intent: 'show_stats', amountBound: false });
    expect(three).toBeCloseTo(0.85, 10);
    expect(ten).toBe(three);
  });

  it('stays within [0, 1] for any input', () => {
    const values = [-5, -1, 0, 0.3, 1, 2, 50, Number.NaN, Number.POSITIVE_INFINITY, Number.NEGATIVE_INFINITY];
    for (const intent of INTENTS) {
      for (const coverage of values) {
        for (const filledGroups of values) {
          for (const amountBound of [true, false]) {
            for (const family of ['core', 'extended'] as const) {
              const score = scoreConfidence({ family, coverage, filledGroups, intent, amountBound });
              expect(score).toBeGreaterThanOrEqual(0);
              expect(score).toBeLessThanOrEqual(1);
            }
          }
        }
      }
    }
  });
});

describe('specificityBonus', () => {
  it('rewards a bound amount over a specific intent', () => {
    expect(specificityBonus('create_goal', true)).toBe(0.1);
    expect(specificityBonus('create_reminder', false)).toBe(0.05);
    expect(specificityBonus('show_balance', false)).toBe(0);
  });
});

describe('clamp01', () => {
  it('clamps and zeroes non-finite values', () => {
    expect(clamp01(1.4)).toBe(1);
    expect(clamp01(-0.2)).toBe(0);
    expect(clamp01(Number.NaN)).toBe(0);
    expect(clamp01(0.42)).toBe(0.42);
  });
});
