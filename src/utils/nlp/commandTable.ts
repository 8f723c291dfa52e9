import commandPatterns from '../../data/commandPatterns.json';
import { Intent, IntentFamily, isIntent, isSlotName, Language, LANGUAGES, SlotName } from '../../types';
import { currencySymbolsPattern, currencyWordsPattern } from '../currency';
import { NUMBER_LITERAL } from './amountExtractor';
import { numeralWords } from './numberParser';

export interface CompiledPattern {
  // source as written in the table, before placeholder expansion
  source: string;
  regex: RegExp;
  slots: readonly SlotName[];
  language: Language;
}

export interface CompiledIntent {
  intent: Intent;
  family: IntentFamily;
  patterns: Readonly<Record<Language, readonly CompiledPattern[]>>;
}

export interface CommandTable {
  readonly intents: readonly CompiledIntent[];
}

interface RawPattern {
  re: string;
  slots: string[];
}

export interface RawCommandTable {
  placeholders: Record<string, string>;
  intents: { intent: string; family: string; patterns: Record<string, RawPattern[]> }[];
}

const WORD_END = String.raw`(?![\p{L}\d])`;

/** Amount capture: a numeric literal or a run of numeral words. Named when `group` is given. */
export function amountFragment(group?: string): string {
  const words = numeralWords().join('|');
  const token = String.raw`(?:(?:${NUMBER_LITERAL})(?![\d])|(?:${words})${WORD_END})`;
  const next = String.raw`(?:\s+(?:(?:и|and|va)\s+)?(?:(?:${words})${WORD_END}))`;
  const open = group ? `(?<${group}>` : '(';
  return String.raw`(?:[${currencySymbolsPattern().replace(/\|/g, '')}]\s*)?${open}${token}${next}*)`;
}

export function currencyFragment(): string {
  return String.raw`(?:\s*(?:${currencyWordsPattern()}|${currencySymbolsPattern()})${WORD_END})?`;
}

function countGroups(regex: RegExp): number {
  // an empty alternative makes the regex match '' and report every group
  const empty = new RegExp(`${regex.source}|`, 'u').exec('');
  return empty ? empty.length - 1 : 0;
}

function isFamily(value: string): value is IntentFamily {
  return value === 'core' || value === 'extended';
}

/**
 * Compiles the ordered intent table once. Placeholders {AMOUNT}, {CUR} and the
 * table's own named fragments ({PERIOD}) are expanded before compilation.
 * Throws on malformed tables: that is a deployment error, not a user error.
 */
export function compileCommandTable(raw: RawCommandTable = commandPatterns): CommandTable {
  const fragments = new Map<string, string>([
    ['AMOUNT', amountFragment()],
    ['CUR', currencyFragment()],
  ]);
  for (const [name, fragment] of Object.entries(raw.placeholders)) fragments.set(name, fragment);

  const expand = (source: string) =>
    source.replace(/\{([A-Z]+)\}/g, (whole, name: string) => {
      const fragment = fragments.get(name);
      if (fragment === undefined) throw new Error(`Unknown placeholder ${whole} in command pattern "${source}"`);
      return fragment;
    });

  const seen = new Set<Intent>();
  const intents = raw.intents.map((entry): CompiledIntent => {
    const { intent, family } = entry;
    if (!isIntent(intent)) throw new Error(`Unknown intent "${intent}" in command table`);
    if (!isFamily(family)) throw new Error(`Unknown family "${family}" for intent ${intent}`);
    if (seen.has(intent)) throw new Error(`Intent ${intent} declared twice`);
    seen.add(intent);

    const patterns: Record<Language, CompiledPattern[]> = { ru: [], uz: [], en: [] };
    for (const language of LANGUAGES) {
      for (const p of entry.patterns[language] ?? []) {
        const slots = p.slots.map(slot => {
          if (!isSlotName(slot)) throw new Error(`Unknown slot "${slot}" in pattern "${p.re}"`);
          return slot;
        });
        const regex = new RegExp(expand(p.re), 'diu');
        const groups = countGroups(regex);
        if (groups !== slots.length) {
          throw new Error(`Pattern "${p.re}" has ${groups} groups but maps ${slots.length} slots`);
        }
        patterns[language].push({ source: p.re, regex, slots, language });
      }
    }
    return { intent, family, patterns };
  });

  return Object.freeze({ intents: Object.freeze(intents) });
}
