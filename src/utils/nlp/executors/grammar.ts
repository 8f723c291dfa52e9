import commandPatterns from '../../../data/commandPatterns.json';
import type { CurrencyCode, Language, Money, Utterance } from '../../../types';
import { bindCurrency, parseAmountText } from '../amountExtractor';
import { amountFragment, currencyFragment } from '../commandTable';
import { languageOrder } from '../intentClassifier';
import { normalizeText } from '../textNormalizer';

/** Named groups of one executor rule, read against the normalized utterance. */
export class GrammarMatch {
  constructor(
    private readonly match: RegExpExecArray,
    private readonly source: string,
    private readonly baseCurrency: CurrencyCode,
  ) {}

  text(name: string): string | undefined {
    const value = this.match.groups?.[name]?.trim();
    return value ? value : undefined;
  }

  money(name = 'amount'): Money | undefined {
    const value = this.text(name);
    const span = this.match.indices?.groups?.[name];
    if (value === undefined || !span) return undefined;
    const amount = parseAmountText(value);
    if (amount === null) return undefined;
    return { amount, currency: bindCurrency(this.source, span[0], span[1], this.baseCurrency) };
  }
}

type Reader<T> = (match: GrammarMatch) => T | null;

export interface GrammarRule<T> {
  pattern: RegExp;
  read: Reader<T>;
}

export type Grammar<T> = Readonly<Record<Language, readonly GrammarRule<T>[]>>;

const FRAGMENTS = new Map<string, string>([
  ['AMOUNT', amountFragment('amount')],
  ['CUR', currencyFragment()],
  ['PERIOD', commandPatterns.placeholders.PERIOD],
]);

function compile(source: string): RegExp {
  const expanded = source.replace(/\{([A-Z]+)\}/g, (whole, name: string) => {
    const fragment = FRAGMENTS.get(name);
    if (fragment === undefined) throw new Error(`Unknown placeholder ${whole} in executor rule "${source}"`);
    return fragment;
  });
  return new RegExp(expanded, 'du');
}

/**
 * Compiles an executor grammar. Rules are `[pattern, reader]` pairs; patterns take
 * named groups and the {AMOUNT} (group `amount`), {CUR} and {PERIOD} fragments.
 */
export function grammar<T>(rules: Record<Language, [string, Reader<T>][]>): Grammar<T> {
  const compiled = (list: [string, Reader<T>][]) => list.map(([source, read]) => ({ pattern: compile(source), read }));
  return { ru: compiled(rules.ru), uz: compiled(rules.uz), en: compiled(rules.en) };
}

/**
 * Runs a grammar over the raw utterance: declared language first, rules in order.
 * The first rule whose reader accepts the match wins.
 */
export function parseGrammar<T>(rules: Grammar<T>, utterance: Utterance, baseCurrency: CurrencyCode): T | null {
  const text = normalizeText(utterance.text, utterance.language);
  if (!text) return null;
  for (const language of languageOrder(utterance.language)) {
    for (const rule of rules[language]) {
      const match = rule.pattern.exec(text);
      if (!match) continue;
      const value = rule.read(new GrammarMatch(match, text, baseCurrency));
      if (value !== null) return value;
    }
  }
  return null;
}
