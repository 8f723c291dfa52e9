import { beforeEach, describe, expect, it } from 'vitest';
import type { CommandOf, ExecutionContext, Intent, IntentSlots, Language } from '../../../../types';
import { FixedRateProvider } from '../../../currency';
import { createMemoryStore, MemoryStore } from '../../../__tests__/memoryStore';
import { loadCategoryDictionary } from '../../categoryMatcher';
import { DebtExecutor } from '../debtExecutor';
import { GoalExecutor } from '../goalExecutor';
import { ReminderExecutor } from '../reminderExecutor';
import { SettingsExecutor } from '../settingsExecutor';
import { SourceExecutor } from '../sourceExecutor';
import type { ExecutorDeps } from '../shared';

const NOW = new Date(2024, 4, 15, 12, 0);
const context: ExecutionContext = { userId: 'user-1', language: 'ru', baseCurrency: 'UZS', now: () => NOW };

// Slots deliberately disagree with the text: executors must read the text
function command<K extends Intent>(intent: K, slots: IntentSlots[K], text: string, language: Language = 'ru'): CommandOf<K> {
  return {
    intent,
    slots,
    confidence: 1,
    family: 'extended',
    matchedPattern: '',
    utterance: { text, language, timestamp: NOW, modality: 'text' },
  };
}

const money = (amount: number) => ({ amount, currency: 'UZS' as const });

describe('domain executors', () => {
  let store: MemoryStore;
  let deps: ExecutorDeps;

  beforeEach(() => {
    store = createMemoryStore();
    deps = { store, rates: new FixedRateProvider(), dictionary: loadCategoryDictionary() };
  });

  it('creates a goal from the utterance, not the slots', async () => {
    const result = await new GoalExecutor(deps).execute(
      command('create_goal', { goalName: 'машина', amount: money(999) }, 'создай цель накопить 100 на отпуск'),
      context,
    );
    expect(result).toMatchObject({ success: true, message: 'Цель «Отпуск» на 100 UZS создана.' });
    expect(store.rows.goals).toHaveLength(1);
    expect(store.rows.goals[0]).toMatchObject({ name: 'Отпуск', targetAmount: 100, currency: 'UZS' });
  });

  it('picks the goal action from the utterance', async () => {
    const goals = new GoalExecutor(deps);
    await goals.execute(command('create_goal', { goalName: 'отпуск', amount: money(1000) }, 'хочу накопить 1000 на отпуск'), context);
    const result = await goals.execute(
      command('manage_goals', { goalName: 'машина', amount: money(500) }, 'удали цель отпуск'),
      context,
    );
    expect(result).toMatchObject({ success: true, message: 'Цель «Отпуск» удалена.' });
    expect(store.rows.goals[0].status).toBe('deleted');
    expect(store.rows.goals[0].currentAmount).toBe(0);
  });

  it('reads the lending direction and person from the utterance', async () => {
    const result = await new DebtExecutor(deps).execute(
      command('create_debt', { person: 'бахтиёр', amount: money(1) }, 'взял в долг у ахмеда 50000'),
      context,
    );
    expect(result).toMatchObject({ success: true, message: 'Вы должны Ахмеда 50 000 UZS.' });
    expect(store.rows.debts[0]).toMatchObject({ person: 'Ахмеда', direction: 'i_owe', amount: 50000 });
  });

  it('reads a reminder with the time spoken first', async () => {
    const result = await new ReminderExecutor(deps).execute(
      command('create_reminder', { title: 'завтра' }, 'напомни завтра в 10:00 оплатить интернет'),
      context,
    );
    expect(result).toMatchObject({ success: true, message: 'Напоминание «Оплатить интернет» установлено на 2024-05-16 10:00.' });
    expect(store.rows.reminders[0].title).toBe('Оплатить интернет');
    expect(store.rows.reminders[0].remindAt).toEqual(new Date(2024, 4, 16, 10, 0));
  });

  it('records income against the source named in the utterance', async () => {
    const result = await new SourceExecutor(deps).execute(
      command('add_income', { sourceName: 'подарок', amount: money(1) }, 'получил 300000 от работы'),
      context,
    );
    expect(result).toMatchObject({ success: true, message: 'Доход 300 000 UZS от «Работы» записан.' });
    expect(store.rows.sources.map(s => s.name)).toEqual(['Работы']);
  });

  it('reads the currency from the utterance', async () => {
    const result = await new SettingsExecutor(deps).execute(
      command('change_currency', { currency: 'рубли' }, 'смени валюту на доллары'),
      context,
    );
    expect(result).toMatchObject({ success: true, message: 'Основная валюта изменена на USD.' });
    expect((await store.settings.get('user-1')).currency).toBe('USD');
  });

  it('fails a command whose text its own grammar cannot read', async () => {
    const result = await new GoalExecutor(deps).execute(
      command('manage_goals', { goalName: 'отпуск' }, 'какая сегодня погода'),
      context,
    );
    expect(result).toEqual({
      success: false,
      error: 'Не удалось разобрать детали команды. Попробуйте сформулировать иначе.',
      data: { intent: 'manage_goals' },
    });
    expect(store.rows.goals).toEqual([]);
  });
});
