import { CURRENCIES, CurrencyCode } from '../../types';
import {
  currencyForToken,
  currencySymbols,
  currencySymbolsPattern,
  currencyWords,
  currencyWordsPattern,
  escapeRegExp,
  roundMoney,
} from '../currency';
import { isMagnitudeWord, isNumeralWord, parseNumberWords, parseNumericLiteral } from './numberParser';

export type AmountFamily = 'words' | 'currency' | 'bare';

export interface AmountCandidate {
  amount: number;
  currency: CurrencyCode;
  family: AmountFamily;
  start: number;
  end: number;
}

export interface AmountOptions {
  baseCurrency: CurrencyCode;
}

export const NUMBER_LITERAL = String.raw`\d{1,3}(?:[ ,]\d{3})+(?:[.,]\d{1,2})?|\d{1,3}(?:\.\d{3}){2,}(?:,\d{1,2})?|\d+(?:[.,]\d{1,2})?`;

const LITERAL_RE = new RegExp(String.raw`(?<![\d.,])(?:${NUMBER_LITERAL})(?![\d])`, 'gu');
const CONNECTORS = new Set(['и', 'va', 'and']);
const WORD_END = String.raw`(?![\p{L}\d])`;

interface Token {
  text: string;
  start: number;
  end: number;
}

interface CurrencyFamily {
  currency: CurrencyCode;
  prefixed: RegExp | null;
  suffixed: RegExp;
}

// One regex family per currency: symbol-prefixed and word-suffixed amounts
const CURRENCY_FAMILIES: readonly CurrencyFamily[] = CURRENCIES.map(currency => {
  const symbols = currencySymbols(currency).map(escapeRegExp).join('|');
  const words = [...currencyWords(currency), ...currencySymbols(currency)]
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp)
    .join('|');
  return {
    currency,
    prefixed: symbols ? new RegExp(String.raw`(?:${symbols})\s*(${NUMBER_LITERAL})(?![\d])`, 'gu') : null,
    suffixed: new RegExp(String.raw`(?<![\d.,])(${NUMBER_LITERAL})\s*(?:${words})${WORD_END}`, 'gu'),
  };
});

const TRAILING_CURRENCY_RE = new RegExp(String.raw`^\s*(${currencyWordsPattern()}|${currencySymbolsPattern()})${WORD_END}`, 'u');
const LEADING_SYMBOL_RE = new RegExp(String.raw`(${currencySymbolsPattern()})\s*$`, 'u');

function positive(value: number | null): number | null {
  if (value === null || !Number.isFinite(value) || value <= 0) return null;
  return roundMoney(value);
}

function tokensWithOffsets(text: string): Token[] {
  const out: Token[] = [];
  for (const m of text.matchAll(/\S+/g)) {
    const start = m.index ?? 0;
    out.push({ text: m[0], start, end: start + m[0].length });
  }
  return out;
}

// "10 000" arrives as two tokens; glue three-digit groups back onto their number
function mergeDigitGroups(tokens: Token[]): Token[] {
  const out: Token[] = [];
  for (const token of tokens) {
    const prev = out[out.length - 1];
    if (prev && /^\d{3}(?:[.,]\d{1,2})?$/.test(token.text) && /^\d{1,3}(?: \d{3})*$/.test(prev.text)) {
      out[out.length - 1] = { text: `${prev.text} ${token.text}`, start: prev.start, end: token.end };
    } else {
      out.push(token);
    }
  }
  return out;
}

function isNumberToken(text: string): boolean {
  return isNumeralWord(text) || parseNumericLiteral(text) !== null;
}

/**
 * Binds the currency of an amount found at [start, end): a currency word or symbol
 * right after it, a symbol right before it, else the base currency.
 */
export function bindCurrency(text: string, start: number, end: number, baseCurrency: CurrencyCode): CurrencyCode {
  const after = TRAILING_CURRENCY_RE.exec(text.slice(end));
  if (after) return currencyForToken(after[1]) ?? baseCurrency;
  const before = LEADING_SYMBOL_RE.exec(text.slice(0, start));
  if (before) return currencyForToken(before[1]) ?? baseCurrency;
  return baseCurrency;
}

/** Whether [start, end) carries its own currency: a word or symbol right after it, or a symbol right before it. */
export function hasBoundCurrency(text: string, start: number, end: number): boolean {
  return TRAILING_CURRENCY_RE.test(text.slice(end)) || LEADING_SYMBOL_RE.test(text.slice(0, start));
}

/** Parses a captured amount fragment: digits, digits with a magnitude word, or numeral words. */
export function parseAmountText(fragment: string): number | null {
  const tokens = mergeDigitGroups(tokensWithOffsets(fragment.trim())).map(t => t.text);
  if (!tokens.length) return null;
  if (tokens.some(isNumeralWord)) return positive(parseNumberWords(tokens));
  if (tokens.length !== 1) return null;
  return positive(parseNumericLiteral(tokens[0]));
}

function wordNumeralCandidates(text: string, options: AmountOptions): AmountCandidate[] {
  const tokens = mergeDigitGroups(tokensWithOffsets(text));
  const textHasDigits = /\d/.test(text);
  const out: AmountCandidate[] = [];
  let i = 0;
  while (i < tokens.length) {
    if (!isNumberToken(tokens[i].text)) { i++; continue; }
    let j = i;
    while (j + 1 < tokens.length && (isNumberToken(tokens[j + 1].text) || (CONNECTORS.has(tokens[j + 1].text) && j + 2 < tokens.length && isNumeralWord(tokens[j + 2].text)))) j++;
    const run = tokens.slice(i, j + 1);
    i = j + 1;

    const words = run.map(t => t.text);
    if (!words.some(isNumeralWord)) continue;
    const start = run[0].start;
    const end = run[run.length - 1].end;
    const hasMagnitude = words.some(isMagnitudeWord);
    const currency = bindCurrency(text, start, end, options.baseCurrency);
    const currencyBound = hasBoundCurrency(text, start, end);
    // A lone "one" inside a description is not an amount
    if (!hasMagnitude && !currencyBound && textHasDigits) continue;
    const amount = positive(parseNumberWords(words));
    if (amount !== null) out.push({ amount, currency, family: 'words', start, end });
  }
  return out;
}

function currencyCandidates(text: string): AmountCandidate[] {
  const out: AmountCandidate[] = [];
  for (const family of CURRENCY_FAMILIES) {
    for (const re of [family.prefixed, family.suffixed]) {
      if (!re) continue;
      for (const m of text.matchAll(re)) {
        const amount = positive(parseNumericLiteral(m[1]));
        if (amount === null) continue;
        const start = m.index ?? 0;
        out.push({ amount, currency: family.currency, family: 'currency', start, end: start + m[0].length });
      }
    }
  }
  return out.sort((a, b) => a.start - b.start);
}

function bareCandidates(text: string, options: AmountOptions): AmountCandidate[] {
  const out: AmountCandidate[] = [];
  for (const m of text.matchAll(LITERAL_RE)) {
    const amount = positive(parseNumericLiteral(m[0]));
    if (amount === null) continue;
    const start = m.index ?? 0;
    out.push({ amount, currency: options.baseCurrency, family: 'bare', start, end: start + m[0].length });
  }
  return out;
}

/**
 * All amounts found in normalized text, in family priority order:
 * word numerals, currency-marked literals, bare literals.
 */
export function extractAmounts(text: string, options: AmountOptions): AmountCandidate[] {
  if (!text.trim()) return [];
  return [
    ...wordNumeralCandidates(text, options),
    ...currencyCandidates(text),
    ...bareCandidates(text, options),
  ];
}

export function extractAmount(text: string, options: AmountOptions): AmountCandidate | null {
  return extractAmounts(text, options)[0] ?? null;
}
