import type { ItemPair, MatchResult, ReceiptExtraction, ReceiptItem, ReceiptRecognitionResult, VoiceExtraction, VoiceItem } from '../../types';
import { mMatchFailure, mMatchScored } from '../assistantMetrics';
import { clamp01 } from './confidence';
import { sharedTokenFraction, similarityRatio } from './fuzzy';
import { normalizeText } from './textNormalizer';

export const DEFAULT_WINDOW_MINUTES = 5;
export const FOUND_THRESHOLD = 0.5;
export const NOTIFY_THRESHOLD = 0.7;
export const AMOUNT_MATCH_THRESHOLD = 0.8;
const ITEM_THRESHOLD = 0.6;
const PRICE_TOLERANCE = 0.1;
const AMOUNT_WEIGHT = 0.6;
const ITEMS_WEIGHT = 0.4;
const MINUTE_MS = 60_000;

export interface ScoredMatch extends MatchResult {
  found: boolean;
  shouldNotify: boolean;
}

/** Absolute minute distance, or null when either side has no timestamp. */
export function minutesBetween(a: Date | null, b: Date | null): number | null {
  if (!a || !b) return null;
  return Math.abs(a.getTime() - b.getTime()) / MINUTE_MS;
}

/** Same-user receipts whose timestamp lies within the inclusive window around the voice note. */
export function selectCandidates(voice: VoiceExtraction, receipts: readonly ReceiptExtraction[], windowMinutes = DEFAULT_WINDOW_MINUTES): ReceiptExtraction[] {
  return receipts.filter(r => {
    if (r.userId !== voice.userId) return false;
    const diff = minutesBetween(voice.timestamp, r.timestamp);
    return diff !== null && diff <= windowMinutes;
  });
}

export function amountScore(voiceTotal: number, receiptTotal: number): number {
  if (!(voiceTotal > 0) || !(receiptTotal > 0)) return 0;
  return Math.max(0, 1 - Math.abs(voiceTotal - receiptTotal) / Math.max(voiceTotal, receiptTotal));
}

export function itemSimilarity(a: string, b: string): number {
  const left = normalizeText(a);
  const right = normalizeText(b);
  if (!left || !right) return 0;
  return clamp01(0.6 * similarityRatio(left, right) + 0.4 * sharedTokenFraction(left, right));
}

export function pricesMatch(voicePrice: number, receiptPrice: number): boolean {
  if (voicePrice === 0 || receiptPrice === 0) return true;
  return Math.abs(voicePrice - receiptPrice) / Math.max(voicePrice, receiptPrice) <= PRICE_TOLERANCE;
}

/**
 * Greedy assignment: each voice item takes its most similar receipt item above the
 * threshold. Receipt items are not consumed, so two voice items may share one.
 */
export function matchItems(voiceItems: readonly VoiceItem[], receiptItems: readonly ReceiptItem[]): { pairs: ItemPair[]; confidence: number } {
  if (!voiceItems.length || !receiptItems.length) return { pairs: [], confidence: 0 };
  const pairs: ItemPair[] = [];
  for (const voiceItem of voiceItems) {
    let best: { item: ReceiptItem; similarity: number } | null = null;
    for (const receiptItem of receiptItems) {
      const similarity = itemSimilarity(voiceItem.name, receiptItem.name);
      if (similarity > ITEM_THRESHOLD && (!best || similarity > best.similarity)) best = { item: receiptItem, similarity };
    }
    if (best) {
      pairs.push({
        voiceItem,
        receiptItem: best.item,
        similarity: best.similarity,
        priceMatch: pricesMatch(voiceItem.price, best.item.total),
      });
    }
  }
  const confidence = pairs.reduce((sum, p) => sum + p.similarity, 0) / voiceItems.length;
  return { pairs, confidence: clamp01(confidence) };
}

function failed(voice: VoiceExtraction, receipt: ReceiptExtraction, error: string): ScoredMatch {
  return {
    voiceId: voice.id,
    receiptId: receipt.id,
    confidence: 0,
    amountScore: 0,
    itemConfidence: 0,
    amountMatch: false,
    pairs: [],
    timeDifferenceMinutes: minutesBetween(voice.timestamp, receipt.timestamp),
    status: 'failed',
    error,
    found: false,
    shouldNotify: false,
  };
}

/** Scores one voice-receipt pair. Indeterminate data yields a failed result, never a throw. */
export function scoreCandidate(voice: VoiceExtraction, receipt: ReceiptExtraction): ScoredMatch {
  const timeDifferenceMinutes = minutesBetween(voice.timestamp, receipt.timestamp);
  if (timeDifferenceMinutes === null) return failed(voice, receipt, 'missing timestamp');
  if (!voice.items.length && !receipt.items.length && voice.spokenTotal === null) {
    return failed(voice, receipt, 'nothing to compare');
  }

  const items = matchItems(voice.items, receipt.items);
  const amount = voice.spokenTotal !== null ? amountScore(voice.spokenTotal, receipt.total) : 0;
  const confidence = clamp01(voice.spokenTotal !== null
    ? AMOUNT_WEIGHT * amount + ITEMS_WEIGHT * items.confidence
    : items.confidence);

  return {
    voiceId: voice.id,
    receiptId: receipt.id,
    confidence,
    amountScore: amount,
    itemConfidence: items.confidence,
    amountMatch: amount > AMOUNT_MATCH_THRESHOLD,
    pairs: items.pairs,
    timeDifferenceMinutes,
    status: 'completed',
    found: confidence > FOUND_THRESHOLD,
    shouldNotify: confidence > NOTIFY_THRESHOLD,
  };
}

/**
 * Scores every in-window receipt independently, best first. A fault while
 * scoring one receipt fails that receipt only.
 */
export function scoreCandidates(voice: VoiceExtraction, receipts: readonly ReceiptExtraction[], windowMinutes = DEFAULT_WINDOW_MINUTES): ScoredMatch[] {
  const results = selectCandidates(voice, receipts, windowMinutes).map(receipt => {
    try {
      const result = scoreCandidate(voice, receipt);
      if (result.status === 'failed') mMatchFailure();
      else mMatchScored(result.found, result.shouldNotify);
      return result;
    } catch (e) {
      mMatchFailure();
      console.error(`[MATCH] scoring voice ${voice.id} against receipt ${receipt.id} failed:`, e);
      return failed(voice, receipt, e instanceof Error ? e.message : String(e));
    }
  });
  return results.sort((a, b) => b.confidence - a.confidence);
}

/** Receipt line totals are never negative. */
export function normalizeReceiptItems(items: readonly ReceiptItem[]): ReceiptItem[] {
  return items.map(item => {
    const quantity = item.quantity > 0 ? item.quantity : 1;
    const unitPrice = Math.max(0, item.unitPrice);
    const total = Math.max(0, item.total);
    return { name: item.name.trim(), unitPrice, quantity, total };
  });
}

export type RecognizedReceipt = Pick<ReceiptExtraction, 'shopName' | 'total' | 'items' | 'timestamp'>;

/**
 * Turns an OCR result into a storable receipt. Without a recognized shop name
 * the first non-empty line of the raw text is used; without a total the item
 * totals are summed. A failed recognition yields null.
 */
export function receiptFromRecognition(result: ReceiptRecognitionResult, timestamp: Date | null): RecognizedReceipt | null {
  if (!result.ok) return null;
  const items = normalizeReceiptItems(result.items ?? []);
  const firstLine = result.rawText.split('\n').map(line => line.trim()).find(Boolean) ?? '';
  const shopName = result.shopName?.trim() || firstLine;
  const total = result.total !== undefined && result.total >= 0
    ? result.total
    : items.reduce((sum, item) => sum + item.total, 0);
  return { shopName, total, items, timestamp };
}
