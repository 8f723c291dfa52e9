import { describe, expect, it } from 'vitest';
import type { Language, Utterance } from '../../../types';
import { compileCommandTable } from '../commandTable';
import { IntentClassifier, languageOrder } from '../intentClassifier';

const classifier = new IntentClassifier(compileCommandTable());
const options = { baseCurrency: 'UZS' as const };

const say = (text: string, language: Language = 'ru'): Utterance => ({
  text,
  language,
  timestamp: new Date(2024, 4, 15, 12, 0),
  modality: 'text',
});

describe('languageOrder', () => {
  it('puts the declared language first', () => {
    expect(languageOrder('ru')).toEqual(['ru', 'uz', 'en']);
    expect(languageOrder('uz')).toEqual(['uz', 'ru', 'en']);
    expect(languageOrder('en')).toEqual(['en', 'ru', 'uz']);
  });
});

describe('IntentClassifier', () => {
  it('reads an expense with amount, currency and description', () => {
    const outcome = classifier.classify(say('потратил 5000 сум на хлеб'), options);
    expect(outcome.kind).toBe('matched');
    if (outcome.kind !== 'matched') return;
    expect(outcome.command.intent).toBe('add_expense');
    expect(outcome.command.family).toBe('core');
    expect(outcome.command.slots).toEqual({ description: 'хлеб', amount: { amount: 5000, currency: 'UZS' } });
    expect(outcome.command.confidence).toBeCloseTo(1, 10);
  });

  it('returns the same outcome for the same input', () => {
    const first = classifier.classify(say('потратил 5000 сум на хлеб'), options);
    const second = classifier.classify(say('потратил 5000 сум на хлеб'), options);
    expect(second).toEqual(first);
  });

  it('binds a spoken currency to the amount', () => {
    const outcome = classifier.classify(say('spent 20 dollars on coffee', 'en'), options);
    expect(outcome.kind === 'matched' && outcome.command.slots).toEqual({
      description: 'coffee',
      amount: { amount: 20, currency: 'USD' },
    });
  });

  it('reads uzbek with either apostrophe', () => {
    const outcome = classifier.classify(say("non uchun 5000 so'm sarfladim", 'uz'), options);
    expect(outcome.kind).toBe('matched');
    if (outcome.kind !== 'matched') return;
    expect(outcome.command.intent).toBe('add_expense');
    expect(outcome.command.slots).toEqual({ description: 'non', amount: { amount: 5000, currency: 'UZS' } });
  });

  it('falls back to other languages when the declared one has no match', () => {
    const outcome = classifier.classify(say('show my balance', 'ru'), options);
    expect(outcome.kind === 'matched' && outcome.command.intent).toBe('show_balance');
  });

  it('tries extended intents before core ones', () => {
    const outcome = classifier.classify(say('сколько потратил на кофе за эту неделю'), options);
    expect(outcome.kind).toBe('matched');
    if (outcome.kind !== 'matched') return;
    expect(outcome.command.intent).toBe('time_based_analytics');
    expect(outcome.command.family).toBe('extended');
    expect(outcome.command.slots).toEqual({ period: 'эту неделю', category: 'кофе' });
  });

  it('reads a goal with a word-scaled amount', () => {
    const outcome = classifier.classify(say('хочу накопить 2 миллиона на отпуск'), options);
    expect(outcome.kind).toBe('matched');
    if (outcome.kind !== 'matched') return;
    expect(outcome.command.intent).toBe('create_goal');
    expect(outcome.command.slots).toEqual({ goalName: 'отпуск', amount: { amount: 2_000_000, currency: 'UZS' } });
    expect(outcome.command.confidence).toBe(1);
  });

  it('reads accusative numeral words as amounts', () => {
    const thousand = classifier.classify(say('потратил тысячу сум на продукты'), options);
    expect(thousand.kind === 'matched' && thousand.command.intent).toBe('add_expense');
    expect(thousand.kind === 'matched' && thousand.command.slots).toEqual({
      description: 'продукты',
      amount: { amount: 1000, currency: 'UZS' },
    });

    const oneThousand = classifier.classify(say('потратил одну тысячу на хлеб'), options);
    expect(oneThousand.kind === 'matched' && oneThousand.command.intent).toBe('add_expense');
    expect(oneThousand.kind === 'matched' && oneThousand.command.slots).toEqual({
      description: 'хлеб',
      amount: { amount: 1000, currency: 'UZS' },
    });
  });

  it('reads a reminder that names the time before the task', () => {
    const outcome = classifier.classify(say('напомни завтра в 10:00 оплатить интернет'), options);
    expect(outcome.kind).toBe('matched');
    if (outcome.kind !== 'matched') return;
    expect(outcome.command.intent).toBe('create_reminder');
    expect(outcome.command.slots).toEqual({ title: 'оплатить интернет', when: 'завтра в 10:00' });
  });

  it('accepts a pronoun before the verb in period questions', () => {
    const outcome = classifier.classify(say('сколько я потратил за прошлый месяц'), options);
    expect(outcome.kind).toBe('matched');
    if (outcome.kind !== 'matched') return;
    expect(outcome.command.intent).toBe('time_based_analytics');
    expect(outcome.command.slots).toEqual({ period: 'прошлый месяц' });
  });

  it('scores a slotless command by coverage alone', () => {
    const outcome = classifier.classify(say('покажи баланс'), options);
    expect(outcome.kind).toBe('matched');
    if (outcome.kind !== 'matched') return;
    expect(outcome.command.intent).toBe('show_balance');
    expect(outcome.command.confidence).toBeCloseTo(0.8, 10);
    expect(outcome.command.matchedPattern).toBe('покажи\\s+(?:мой\\s+)?баланс');
  });

  it('reports missing slots when the pattern matched but a value is unusable', () => {
    const outcome = classifier.classify(say('потратил 0 на хлеб'), options);
    expect(outcome).toEqual({
      kind: 'incomplete',
      intent: 'add_expense',
      missing: ['amount'],
      matchedPattern: 'потратил[аи]?\\s+{AMOUNT}{CUR}\\s+на\\s+(.+)',
    });
  });

  it('returns no_intent for unrelated or empty text', () => {
    expect(classifier.classify(say('какая сегодня погода'), options)).toEqual({ kind: 'no_intent' });
    expect(classifier.classify(say('   '), options)).toEqual({ kind: 'no_intent' });
  });

  it('keeps the utterance on the parsed command', () => {
    const utterance = say('мой баланс');
    const outcome = classifier.classify(utterance, options);
    expect(outcome.kind === 'matched' && outcome.command.utterance).toBe(utterance);
  });

  it('describes every command in table order', () => {
    const commands = classifier.describeCommands('en');
    expect(commands).toHaveLength(21);
    expect(commands[0]).toEqual({
      intent: 'create_goal',
      family: 'extended',
      description: 'Create a savings goal',
      example: 'save 5000000 for a laptop by 31.12',
    });
    expect(commands[commands.length - 1].intent).toBe('show_stats');
  });
});

describe('compileCommandTable', () => {
  const table = (re: string, slots: string[]) => ({
    placeholders: {},
    intents: [{ intent: 'show_balance', family: 'core', patterns: { ru: [{ re, slots }] } }],
  });

  it('rejects a pattern whose groups do not match its slots', () => {
    expect(() => compileCommandTable(table('баланс\\s+(.+)', []))).toThrow('has 1 groups but maps 0 slots');
  });

  it('rejects unknown placeholders and slots', () => {
    expect(() => compileCommandTable(table('баланс {NOPE}', []))).toThrow('Unknown placeholder {NOPE}');
    expect(() => compileCommandTable(table('баланс (.+)', ['nope']))).toThrow('Unknown slot "nope"');
  });
});
