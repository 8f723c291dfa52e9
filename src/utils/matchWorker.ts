import type { AssistantStore, VoiceExtraction } from '../types';
import { mError } from './assistantMetrics';
import { DEFAULT_WINDOW_MINUTES, ScoredMatch, scoreCandidates } from './nlp/receiptMatcher';

export interface MatchConfig {
  batchSize?: number;
  maxAttempts?: number;
  windowMinutes?: number;
  staleAfterMs?: number;
}

export interface MatchTickDeps {
  store: Pick<AssistantStore, 'receipts' | 'voiceNotes' | 'matches'>;
  now?: () => Date;
  // called for every match above the notification threshold
  onNotify?: (voice: VoiceExtraction, match: ScoredMatch) => void;
}

export interface MatchTickReport {
  reclaimed: number;
  processed: number;
  matched: number;
  failed: number;
}

const DEFAULTS: Required<MatchConfig> = {
  batchSize: 20,
  maxAttempts: 3,
  windowMinutes: DEFAULT_WINDOW_MINUTES,
  staleAfterMs: 5 * 60 * 1000,
};

const MINUTE_MS = 60_000;

let running = false;

/** Scores one voice note against every receipt in its window and stores each result. */
export async function matchVoiceNote(
  deps: MatchTickDeps,
  voice: VoiceExtraction,
  windowMinutes = DEFAULT_WINDOW_MINUTES,
): Promise<ScoredMatch[]> {
  const { store } = deps;
  if (!voice.timestamp) return [];
  const from = new Date(voice.timestamp.getTime() - windowMinutes * MINUTE_MS);
  const to = new Date(voice.timestamp.getTime() + windowMinutes * MINUTE_MS);
  const receipts = await store.receipts.findInWindow(voice.userId, from, to);

  for (const receipt of receipts) await store.matches.begin(voice.id, receipt.id);
  const results = scoreCandidates(voice, receipts, windowMinutes);
  for (const result of results) {
    await store.matches.finish(result);
    if (result.shouldNotify) deps.onNotify?.(voice, result);
  }
  return results;
}

/** One polling pass: reclaim stale claims, claim a batch, score it. Overlapping calls return null. */
export async function runMatchTick(deps: MatchTickDeps, cfg: MatchConfig = {}): Promise<MatchTickReport | null> {
  if (running) return null;
  running = true;
  try {
    const opts = { ...DEFAULTS, ...cfg };
    const now = deps.now?.() ?? new Date();
    const { voiceNotes } = deps.store;

    const reclaimed = await voiceNotes.reclaimStale(new Date(now.getTime() - opts.staleAfterMs));
    const batch = await voiceNotes.claimPending(opts.batchSize, opts.maxAttempts, now);
    const report: MatchTickReport = { reclaimed, processed: 0, matched: 0, failed: 0 };

    for (const voice of batch) {
      try {
        const results = await matchVoiceNote(deps, voice, opts.windowMinutes);
        await voiceNotes.markDone(voice.id);
        report.processed++;
        if (results.some(r => r.found)) report.matched++;
      } catch (e) {
        mError();
        report.failed++;
        console.warn(`[MATCH] voice ${voice.id} failed:`, e instanceof Error ? e.message : e);
        await voiceNotes.markRetry(voice.id, opts.maxAttempts);
      }
    }
    return report;
  } finally {
    running = false;
  }
}
