import type { CurrencyCode, Language, VoiceItem } from '../../types';
import { escapeRegExp } from '../currency';
import { extractAmounts, hasBoundCurrency } from './amountExtractor';
import { isMagnitudeWord, numeralWords } from './numberParser';
import { normalizeText, tokenize } from './textNormalizer';

export interface VoicePurchase {
  text: string;
  language: Language;
  items: VoiceItem[];
  spokenTotal: number | null;
  timestamp: Date;
}

const TOTAL_WORDS = ['всего', 'итого', 'потратил', 'потратила', 'потратили', 'заплатил', 'заплатила', 'jami', 'toʻladim', 'total', 'paid'];
const TOTAL_RE = new RegExp(String.raw`(?:^|\s)(${TOTAL_WORDS.join('|')})(?:\s+(?:на|за|for|on))?(?=\s|$)`, 'u');

// Purchase verbs, fillers and price prepositions dropped from item names
const FILLER = new Set([
  'купил', 'купила', 'купили', 'взял', 'взяла', 'взяли', 'ещё', 'еще', 'тоже', 'плюс', 'за', 'по', 'на', 'и', 'сум', 'сумов',
  'oldim', 'sotib', 'yana', 'ham', 'va', 'uchun', 'soʻm', 'som', 'toʻladim',
  'bought', 'got', 'also', 'plus', 'for', 'at', 'and', 'a', 'an', 'the', 'some',
]);

const QUANTITY_RE = /(?:^|\s)(?:(\d+)\s*(?:шт|штук|штуки|dona|ta|pcs|pieces)|x\s*(\d+)|(\d+)\s*x)(?=\s|$)/u;
const MIN_NAME_LENGTH = 3;

// List separators: commas and semicolons outside numbers, and connectors not followed by a numeral
function splitList(text: string): string[] {
  const numerals = numeralWords().map(escapeRegExp).join('|');
  const separator = new RegExp(String.raw`(?<!\d),|,(?!\d)|;|\n|\s+(?:и|va|and)\s+(?!(?:${numerals})(?:\s|$))`, 'iu');
  return text.split(separator).map(part => part.trim()).filter(Boolean);
}

function cut(text: string, start: number, end: number): string {
  return `${text.slice(0, start)} ${text.slice(end)}`.replace(/\s+/g, ' ').trim();
}

function takeTotal(part: string, baseCurrency: CurrencyCode): { rest: string; total: number | null } {
  const trigger = TOTAL_RE.exec(part);
  if (!trigger) return { rest: part, total: null };
  const triggerStart = trigger.index + trigger[0].indexOf(trigger[1]);
  const triggerEnd = trigger.index + trigger[0].length;

  const after = part.slice(triggerEnd);
  const offset = after.length - after.trimStart().length;
  const next = extractAmounts(after, { baseCurrency }).find(c => c.start === offset);
  if (next) return { rest: cut(part, triggerStart, triggerEnd + next.end), total: next.amount };

  // "jami 60500 soʻm toʻladim": the amount may come before the verb
  const before = part.slice(0, triggerStart).trimEnd();
  const prev = extractAmounts(before, { baseCurrency }).find(c => c.end === before.length);
  if (prev) return { rest: cut(part, prev.start, triggerEnd), total: prev.amount };
  return { rest: cut(part, triggerStart, triggerEnd), total: null };
}

function parseItem(part: string, baseCurrency: CurrencyCode): VoiceItem | null {
  let text = part;
  let quantity = 1;
  const q = QUANTITY_RE.exec(text);
  if (q) {
    quantity = Number(q[1] ?? q[2] ?? q[3]);
    text = cut(text, q.index, q.index + q[0].length);
  }

  let price = 0;
  const amount = extractAmounts(text, { baseCurrency })[0];
  if (amount) {
    // "два хлеба": a numeral word with no magnitude and no currency counts items
    const counted = amount.family === 'words'
      && !hasBoundCurrency(text, amount.start, amount.end)
      && !tokenize(text.slice(amount.start, amount.end)).some(isMagnitudeWord);
    if (!counted) price = amount.amount;
    else if (!q) quantity = amount.amount;
    text = cut(text, amount.start, amount.end);
  }

  const name = tokenize(text).filter(t => !FILLER.has(t)).join(' ');
  if (name.length < MIN_NAME_LENGTH) return null;
  return { name, price, quantity: quantity > 0 ? quantity : 1 };
}

/**
 * Reads a spoken purchase description: the announced total ("всего 60500",
 * "jami 60500 soʻm") and the listed items with optional prices and quantities.
 */
export function extractVoicePurchase(text: string, language: Language, timestamp: Date, baseCurrency: CurrencyCode = 'UZS'): VoicePurchase {
  let spokenTotal: number | null = null;
  const items: VoiceItem[] = [];

  for (const raw of splitList(text)) {
    const { rest, total } = takeTotal(normalizeText(raw, language), baseCurrency);
    if (total !== null && spokenTotal === null) spokenTotal = total;
    const item = parseItem(rest, baseCurrency);
    if (item) items.push(item);
  }
  return { text, language, items, spokenTotal, timestamp };
}
