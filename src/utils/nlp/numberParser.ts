import numberWords from '../../data/numberWords.json';
import type { Language } from '../../types';

type NumeralKind = 'value' | 'hundred' | 'magnitude';

interface NumeralEntry {
  value: number;
  kind: NumeralKind;
}

interface NumeralTable {
  values: Record<string, number>;
  hundred: string[];
  magnitudes: Record<string, number>;
}

const TABLES: Record<Language, NumeralTable> = numberWords;

// Words that may sit inside a spoken number without contributing to it
const CONNECTORS = new Set(['и', 'va', 'and']);

function buildNumerals(): ReadonlyMap<string, NumeralEntry> {
  const map = new Map<string, NumeralEntry>();
  for (const table of Object.values(TABLES)) {
    for (const [word, value] of Object.entries(table.values)) map.set(word, { value, kind: 'value' });
    for (const word of table.hundred) map.set(word, { value: 100, kind: 'hundred' });
    for (const [word, value] of Object.entries(table.magnitudes)) map.set(word, { value, kind: 'magnitude' });
  }
  return map;
}

const NUMERALS = buildNumerals();

export function isNumeralWord(token: string): boolean {
  return NUMERALS.has(token);
}

export function isMagnitudeWord(token: string): boolean {
  const entry = NUMERALS.get(token);
  return entry !== undefined && entry.kind !== 'value';
}

/** Every numeral word known in any supported language, longest first. */
export function numeralWords(): string[] {
  return [...NUMERALS.keys()].sort((a, b) => b.length - a.length);
}

/**
 * Parses a numeric literal written with locale separators.
 * A comma followed by exactly three digits groups thousands, one or two digits after a
 * comma are decimals. A dot is decimal unless it repeats over three-digit groups.
 */
export function parseNumericLiteral(raw: string): number | null {
  let s = raw.trim();
  if (!s) return null;
  if (/\s/.test(s)) {
    if (!/^\d{1,3}(?:\s\d{3})+(?:[.,]\d{1,2})?$/.test(s)) return null;
    s = s.replace(/\s/g, '');
  }
  if (!/^\d+(?:[.,]\d+)*$/.test(s)) return null;

  const hasComma = s.includes(',');
  const hasDot = s.includes('.');

  if (hasComma && hasDot) {
    const decimalSep = s.lastIndexOf(',') > s.lastIndexOf('.') ? ',' : '.';
    const groupSep = decimalSep === ',' ? '.' : ',';
    const cut = s.lastIndexOf(decimalSep);
    const intPart = s.slice(0, cut);
    const fraction = s.slice(cut + 1);
    if (!/^\d{1,2}$/.test(fraction)) return null;
    const groups = intPart.split(groupSep);
    if (!validGroups(groups)) return null;
    return Number(`${groups.join('')}.${fraction}`);
  }

  if (hasComma) {
    const groups = s.split(',');
    if (groups.length === 2 && groups[1].length <= 2) return Number(`${groups[0]}.${groups[1]}`);
    return validGroups(groups) ? Number(groups.join('')) : null;
  }

  if (hasDot) {
    const groups = s.split('.');
    if (groups.length === 2) return Number(s);
    return validGroups(groups) ? Number(groups.join('')) : null;
  }

  return Number(s);
}

function validGroups(groups: string[]): boolean {
  if (groups.length === 1) return /^\d+$/.test(groups[0]);
  return /^\d{1,3}$/.test(groups[0]) && groups.slice(1).every(g => /^\d{3}$/.test(g));
}

/**
 * Parses a run of numeral tokens ("two thousand five hundred", "5 тысяч", "ikki yuz").
 * Digit tokens count as values. Returns null when the run holds no numeral word
 * or contains something that is not part of a number.
 */
export function parseNumberWords(tokens: string[]): number | null {
  let total = 0;
  let acc = 0;
  let sawWord = false;

  for (const token of tokens) {
    if (CONNECTORS.has(token)) continue;
    const entry = NUMERALS.get(token);
    if (entry) {
      sawWord = true;
      if (entry.kind === 'value') {
        acc += entry.value;
      } else if (entry.kind === 'hundred') {
        acc = (acc || 1) * entry.value;
      } else {
        total += (acc || 1) * entry.value;
        acc = 0;
      }
      continue;
    }
    const literal = parseNumericLiteral(token);
    if (literal === null) return null;
    acc += literal;
  }

  return sawWord ? total + acc : null;
}
