import type { Intent } from '../types';

interface Snapshot {
  ts: number;
  intentHits: number;
  intentMisses: number;
  incompleteSlots: number;
  recognitionFailures: number;
  executorFailures: number;
  categoryStrategies: Record<string, number>;
  matchesScored: number;
  matchesFound: number;
  autoNotify: number;
  matchFailures: number;
  errors: number;
  hitRate?: number | null;
  foundRate?: number | null;
}

const byIntent: Partial<Record<Intent, number>> = {};
const categoryStrategies: Record<string, number> = {};

const metrics = {
  intentHits: 0,
  intentMisses: 0,
  incompleteSlots: 0,
  recognitionFailures: 0,
  executorFailures: 0,
  byIntent,
  categoryStrategies,
  matchesScored: 0,
  matchesFound: 0,
  autoNotify: 0,
  matchFailures: 0,
  errors: 0,
  lastSnapshot: [] as Snapshot[],
};

export function mIntentHit(intent: Intent) {
  metrics.intentHits++;
  metrics.byIntent[intent] = (metrics.byIntent[intent] ?? 0) + 1;
}
export function mIntentMiss() { metrics.intentMisses++; }
export function mIncompleteSlots() { metrics.incompleteSlots++; }
export function mRecognitionFailure() { metrics.recognitionFailures++; }
export function mExecutorFailure() { metrics.executorFailures++; }
export function mCategoryStrategy(strategy: string) {
  metrics.categoryStrategies[strategy] = (metrics.categoryStrategies[strategy] ?? 0) + 1;
}
export function mMatchScored(found: boolean, notify: boolean) {
  metrics.matchesScored++;
  if (found) metrics.matchesFound++;
  if (notify) metrics.autoNotify++;
}
export function mMatchFailure() { metrics.matchFailures++; }
export function mError() { metrics.errors++; }

function derived() {
  const classified = metrics.intentHits + metrics.intentMisses + metrics.incompleteSlots;
  return {
    hitRate: classified > 0 ? metrics.intentHits / classified : null,
    foundRate: metrics.matchesScored > 0 ? metrics.matchesFound / metrics.matchesScored : null,
    classified,
  };
}

export function snapshotMetrics() {
  const d = derived();
  const snap: Snapshot = {
    ts: Date.now(),
    intentHits: metrics.intentHits,
    intentMisses: metrics.intentMisses,
    incompleteSlots: metrics.incompleteSlots,
    recognitionFailures: metrics.recognitionFailures,
    executorFailures: metrics.executorFailures,
    categoryStrategies: { ...metrics.categoryStrategies },
    matchesScored: metrics.matchesScored,
    matchesFound: metrics.matchesFound,
    autoNotify: metrics.autoNotify,
    matchFailures: metrics.matchFailures,
    errors: metrics.errors,
    hitRate: d.hitRate,
    foundRate: d.foundRate,
  };
  metrics.lastSnapshot.push(snap);
  if (metrics.lastSnapshot.length > 50) metrics.lastSnapshot.shift();
  return snap;
}

export function getMetrics() {
  return {
    ...metrics,
    byIntent: { ...metrics.byIntent },
    categoryStrategies: { ...metrics.categoryStrategies },
    derived: derived(),
  };
}

export function resetMetrics() {
  metrics.intentHits = 0;
  metrics.intentMisses = 0;
  metrics.incompleteSlots = 0;
  metrics.recognitionFailures = 0;
  metrics.executorFailures = 0;
  metrics.byIntent = {};
  metrics.categoryStrategies = {};
  metrics.matchesScored = 0;
  metrics.matchesFound = 0;
  metrics.autoNotify = 0;
  metrics.matchFailures = 0;
  metrics.errors = 0;
  metrics.lastSnapshot = [];
}
