import {
  ClassificationOutcome,
  CurrencyCode,
  Intent,
  IntentFamily,
  Language,
  LANGUAGES,
  Money,
  ParsedCommand,
  SlotName,
  Utterance,
} from '../../types';
import commandHelp from '../../data/commandHelp.json';
import { bindCurrency, parseAmountText } from './amountExtractor';
import { CommandTable, CompiledIntent, CompiledPattern } from './commandTable';
import { scoreConfidence } from './confidence';
import { normalizeText } from './textNormalizer';

interface RawSlot {
  text: string;
  start: number;
  end: number;
}

export interface ClassifyOptions {
  baseCurrency: CurrencyCode;
}

export interface CommandDescription {
  intent: Intent;
  family: IntentFamily;
  description: string;
  example: string;
}

const HELP: Record<Intent, Record<Language, { description: string; example: string }>> = commandHelp;

/** Declared language first, then the rest in their fixed order. */
export function languageOrder(language: Language): Language[] {
  return [language, ...LANGUAGES.filter(l => l !== language)];
}

class SlotReader {
  constructor(
    private readonly raw: ReadonlyMap<SlotName, RawSlot>,
    private readonly source: string,
    private readonly baseCurrency: CurrencyCode,
  ) {}

  text(name: SlotName): string | undefined {
    return this.raw.get(name)?.text;
  }

  money(name: SlotName): Money | undefined {
    const slot = this.raw.get(name);
    if (!slot) return undefined;
    const amount = parseAmountText(slot.text);
    if (amount === null) return undefined;
    return { amount, currency: bindCurrency(this.source, slot.start, slot.end, this.baseCurrency) };
  }

  get filled(): number {
    return this.raw.size;
  }
}

interface CommandMeta {
  confidence: number;
  family: IntentFamily;
  matchedPattern: string;
  utterance: Utterance;
}

type Built = { ok: true; command: ParsedCommand } | { ok: false; missing: SlotName[] };

function missing(...checks: [SlotName, unknown][]): SlotName[] {
  return checks.filter(([, value]) => value === undefined).map(([name]) => name);
}

// Binds captured text to the typed slot record of each intent
function buildCommand(intent: Intent, s: SlotReader, meta: CommandMeta): Built {
  switch (intent) {
    case 'create_goal': {
      const goalName = s.text('goalName');
      const amount = s.money('amount');
      if (goalName === undefined || amount === undefined) return { ok: false, missing: missing(['goalName', goalName], ['amount', amount]) };
      return { ok: true, command: { ...meta, intent, slots: { goalName, amount, deadline: s.text('deadline') } } };
    }
    case 'manage_goals':
      return { ok: true, command: { ...meta, intent, slots: { goalName: s.text('goalName'), amount: s.money('amount') } } };
    case 'create_source': {
      const sourceName = s.text('sourceName');
      if (sourceName === undefined) return { ok: false, missing: ['sourceName'] };
      return { ok: true, command: { ...meta, intent, slots: { sourceName } } };
    }
    case 'manage_sources':
      return { ok: true, command: { ...meta, intent, slots: { sourceName: s.text('sourceName'), newName: s.text('newName') } } };
    case 'add_income': {
      const sourceName = s.text('sourceName');
      const amount = s.money('amount');
      if (sourceName === undefined || amount === undefined) return { ok: false, missing: missing(['sourceName', sourceName], ['amount', amount]) };
      return { ok: true, command: { ...meta, intent, slots: { sourceName, amount } } };
    }
    case 'change_currency': {
      const currency = s.text('currency');
      if (currency === undefined) return { ok: false, missing: ['currency'] };
      return { ok: true, command: { ...meta, intent, slots: { currency } } };
    }
    case 'change_language': {
      const language = s.text('language');
      if (language === undefined) return { ok: false, missing: ['language'] };
      return { ok: true, command: { ...meta, intent, slots: { language } } };
    }
    case 'manage_notifications':
      return { ok: true, command: { ...meta, intent, slots: { topic: s.text('topic'), toggle: s.text('toggle') } } };
    case 'create_reminder': {
      const title = s.text('title');
      if (title === undefined) return { ok: false, missing: ['title'] };
      return { ok: true, command: { ...meta, intent, slots: { title, when: s.text('when') } } };
    }
    case 'manage_reminders':
      return { ok: true, command: { ...meta, intent, slots: { title: s.text('title'), when: s.text('when') } } };
    case 'time_based_analytics': {
      const period = s.text('period');
      if (period === undefined) return { ok: false, missing: ['period'] };
      return { ok: true, command: { ...meta, intent, slots: { period, category: s.text('category') } } };
    }
    case 'category_analytics':
      return { ok: true, command: { ...meta, intent, slots: { category: s.text('category') } } };
    case 'comparison_analytics':
      return { ok: true, command: { ...meta, intent, slots: { left: s.text('left'), right: s.text('right') } } };
    case 'create_debt': {
      const person = s.text('person');
      const amount = s.money('amount');
      if (person === undefined || amount === undefined) return { ok: false, missing: missing(['person', person], ['amount', amount]) };
      return { ok: true, command: { ...meta, intent, slots: { person, amount, due: s.text('due') } } };
    }
    case 'manage_debts':
      return { ok: true, command: { ...meta, intent, slots: { person: s.text('person'), amount: s.money('amount') } } };
    case 'create_category': {
      const categoryName = s.text('categoryName');
      if (categoryName === undefined) return { ok: false, missing: ['categoryName'] };
      return { ok: true, command: { ...meta, intent, slots: { categoryName } } };
    }
    case 'add_expense': {
      const description = s.text('description');
      const amount = s.money('amount');
      if (description === undefined || amount === undefined) return { ok: false, missing: missing(['description', description], ['amount', amount]) };
      return { ok: true, command: { ...meta, intent, slots: { description, amount } } };
    }
    case 'show_balance':
      return { ok: true, command: { ...meta, intent, slots: {} } };
    case 'delete_category': {
      const categoryName = s.text('categoryName');
      if (categoryName === undefined) return { ok: false, missing: ['categoryName'] };
      return { ok: true, command: { ...meta, intent, slots: { categoryName } } };
    }
    case 'manage_debt':
      return { ok: true, command: { ...meta, intent, slots: { person: s.text('person'), amount: s.money('amount') } } };
    case 'show_stats':
      return { ok: true, command: { ...meta, intent, slots: {} } };
  }
}

/**
 * Ordered first-match classifier over the compiled command table.
 * Intents are tried in table order; within an intent the declared language's
 * patterns go first. The first pattern that matches decides the outcome.
 */
export class IntentClassifier {
  constructor(private readonly table: CommandTable) {}

  classify(utterance: Utterance, options: ClassifyOptions): ClassificationOutcome {
    const text = normalizeText(utterance.text, utterance.language);
    if (!text) return { kind: 'no_intent' };

    for (const entry of this.table.intents) {
      for (const language of languageOrder(utterance.language)) {
        for (const pattern of entry.patterns[language]) {
          const match = pattern.regex.exec(text);
          if (match) return this.bind(entry, pattern, match, text, utterance, options);
        }
      }
    }
    return { kind: 'no_intent' };
  }

  /** Supported commands in table order, described in the given language. */
  describeCommands(language: Language): CommandDescription[] {
    return this.table.intents.map(({ intent, family }) => ({ intent, family, ...HELP[intent][language] }));
  }

  private bind(
    entry: CompiledIntent,
    pattern: CompiledPattern,
    match: RegExpExecArray,
    text: string,
    utterance: Utterance,
    options: ClassifyOptions,
  ): ClassificationOutcome {
    const raw = new Map<SlotName, RawSlot>();
    pattern.slots.forEach((slot, i) => {
      const value = match[i + 1];
      const span = match.indices?.[i + 1];
      if (value === undefined || !span) return;
      const trimmed = value.trim();
      if (!trimmed) return;
      raw.set(slot, { text: trimmed, start: span[0], end: span[1] });
    });

    const reader = new SlotReader(raw, text, options.baseCurrency);
    const amountBound = reader.money('amount') !== undefined;
    const confidence = scoreConfidence({
      family: entry.family,
      coverage: match[0].length / text.length,
      filledGroups: reader.filled,
      intent: entry.intent,
      amountBound,
    });

    const built = buildCommand(entry.intent, reader, {
      confidence,
      family: entry.family,
      matchedPattern: pattern.source,
      utterance,
    });
    if (!built.ok) {
      return { kind: 'incomplete', intent: entry.intent, missing: built.missing, matchedPattern: pattern.source };
    }
    return { kind: 'matched', command: built.command };
  }
}
