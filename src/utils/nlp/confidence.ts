import type { Intent, IntentFamily } from '../../types';

export interface ConfidenceInput {
  family: IntentFamily;
  // matched length / text length
  coverage: number;
  filledGroups: number;
  intent: Intent;
  amountBound: boolean;
}

const BASE: Record<IntentFamily, number> = { core: 0.7, extended: 0.8 };

// Intents whose match alone says a lot about what the user wants
const SPECIFIC_INTENTS: ReadonlySet<Intent> = new Set<Intent>(['change_currency', 'create_reminder', 'time_based_analytics']);

function finiteOrZero(value: number): number {
  return Number.isFinite(value) ? value : 0;
}

export function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

export function specificityBonus(intent: Intent, amountBound: boolean): number {
  if (amountBound) return 0.1;
  return SPECIFIC_INTENTS.has(intent) ? 0.05 : 0;
}

export function scoreConfidence(input: ConfidenceInput): number {
  const coverage = clamp01(finiteOrZero(input.coverage));
  const groups = Math.max(0, finiteOrZero(input.filledGroups));
  const score = BASE[input.family]
    + coverage * 0.1
    + Math.min(groups * 0.05, 0.15)
    + specificityBonus(input.intent, input.amountBound);
  return clamp01(score);
}
