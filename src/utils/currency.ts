import currencies from '../data/currencies.json';
import { CURRENCIES, CurrencyCode, RateProvider } from '../types';

interface CurrencyEntry {
  symbols: string[];
  words: string[];
  // Units of UZS per one unit of the currency
  fallbackRate: number;
}

const TABLE: Record<CurrencyCode, CurrencyEntry> = currencies;

const BY_TOKEN: ReadonlyMap<string, CurrencyCode> = (() => {
  const map = new Map<string, CurrencyCode>();
  for (const code of CURRENCIES) {
    for (const word of TABLE[code].words) map.set(word, code);
    for (const symbol of TABLE[code].symbols) map.set(symbol, code);
  }
  return map;
})();

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function currencyForToken(token: string): CurrencyCode | null {
  return BY_TOKEN.get(token.toLowerCase()) ?? null;
}

/** Finds a currency named anywhere in a free phrase ("на доллары", "dollarga"). */
export function currencyInPhrase(phrase: string): CurrencyCode | null {
  const lower = phrase.toLowerCase();
  for (const token of lower.split(/\s+/)) {
    const exact = currencyForToken(token);
    if (exact) return exact;
  }
  for (const code of CURRENCIES) {
    if (TABLE[code].symbols.some(s => lower.includes(s))) return code;
    // stems cover inflected forms: "доллары", "рублях", "dollarga"
    if (TABLE[code].words.some(w => w.length >= 3 && lower.split(/\s+/).some(t => t.startsWith(w.slice(0, 4))))) return code;
  }
  return null;
}

export function currencyWordsPattern(): string {
  return CURRENCIES.flatMap(code => TABLE[code].words)
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp)
    .join('|');
}

export function currencySymbolsPattern(): string {
  return CURRENCIES.flatMap(code => TABLE[code].symbols).map(escapeRegExp).join('|');
}

export function currencyWords(code: CurrencyCode): readonly string[] {
  return TABLE[code].words;
}

export function currencySymbols(code: CurrencyCode): readonly string[] {
  return TABLE[code].symbols;
}

export function roundMoney(value: number): number {
  return Math.round(value * 100) / 100;
}

export class FixedRateProvider implements RateProvider {
  async convert(amount: number, from: CurrencyCode, to: CurrencyCode): Promise<number | null> {
    if (from === to) return amount;
    return roundMoney((amount * TABLE[from].fallbackRate) / TABLE[to].fallbackRate);
  }
}

const fixedRates = new FixedRateProvider();

/**
 * Converts through the live provider and falls back to the fixed table when the
 * provider has no rate or fails.
 */
export async function convertWithFallback(provider: RateProvider, amount: number, from: CurrencyCode, to: CurrencyCode): Promise<number> {
  if (from === to) return amount;
  try {
    const live = await provider.convert(amount, from, to);
    if (live !== null && Number.isFinite(live)) return roundMoney(live);
  } catch (e) {
    console.warn('[CURRENCY] live rate failed, using fixed table:', e instanceof Error ? e.message : e);
  }
  const fixed = await fixedRates.convert(amount, from, to);
  return fixed ?? amount;
}
