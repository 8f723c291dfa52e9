import type {
  AssistantStore,
  CategoryRecord,
  CurrencyCode,
  DebtRecord,
  GoalRecord,
  IncomeSourceRecord,
  MatchResult,
  ReceiptExtraction,
  ReminderRecord,
  TransactionRecord,
  UserSettings,
  VoiceExtraction,
} from '../../types';
import { normalizeText } from '../nlp/textNormalizer';

type VoiceStatus = 'pending' | 'processing' | 'done' | 'failed';

interface VoiceRow {
  note: VoiceExtraction;
  status: VoiceStatus;
  attempts: number;
  lockedAt?: Date;
  createdAt: Date;
}

/** In-process stand-in for the Mongo adapters, with its rows open for assertions. */
export interface MemoryStore extends AssistantStore {
  rows: {
    categories: CategoryRecord[];
    transactions: TransactionRecord[];
    goals: GoalRecord[];
    sources: IncomeSourceRecord[];
    settings: Map<string, UserSettings>;
    reminders: ReminderRecord[];
    debts: DebtRecord[];
    receipts: ReceiptExtraction[];
    voiceNotes: VoiceRow[];
    matches: MatchResult[];
  };
}

export function createMemoryStore(defaultCurrency: CurrencyCode = 'UZS'): MemoryStore {
  let seq = 0;
  const nextId = () => `id${++seq}`;
  const rows: MemoryStore['rows'] = {
    categories: [],
    transactions: [],
    goals: [],
    sources: [],
    settings: new Map(),
    reminders: [],
    debts: [],
    receipts: [],
    voiceNotes: [],
    matches: [],
  };
  const key = (name: string) => normalizeText(name);
  const owned = <T extends { id: string; userId: string }>(list: T[], userId: string, id: string) =>
    list.find(r => r.id === id && r.userId === userId);

  const defaults = (userId: string): UserSettings => ({
    userId,
    currency: defaultCurrency,
    language: 'ru',
    notifications: { reminders: true, goals: true, debts: true, budget: true, reports: true },
  });

  return {
    rows,
    categories: {
      async listByUser(userId) {
        return rows.categories.filter(c => c.userId === userId);
      },
      async create(userId, name, keywords = []) {
        if (rows.categories.some(c => c.userId === userId && key(c.name) === key(name))) return null;
        const record: CategoryRecord = { id: nextId(), userId, name: name.trim(), keywords, createdAt: new Date() };
        rows.categories.push(record);
        return record;
      },
      async findOrCreate(userId, name, keywords = []) {
        const existing = rows.categories.find(c => c.userId === userId && key(c.name) === key(name));
        if (existing) return { category: existing, created: false };
        const record: CategoryRecord = { id: nextId(), userId, name: name.trim(), keywords, createdAt: new Date() };
        rows.categories.push(record);
        return { category: record, created: true };
      },
      async rename(userId, id, name) {
        const record = owned(rows.categories, userId, id);
        if (!record) return false;
        if (rows.categories.some(c => c !== record && c.userId === userId && key(c.name) === key(name))) return false;
        record.name = name.trim();
        return true;
      },
      async remove(userId, id) {
        const before = rows.categories.length;
        rows.categories = rows.categories.filter(c => !(c.id === id && c.userId === userId));
        return rows.categories.length < before;
      },
    },
    transactions: {
      async create(input) {
        const record: TransactionRecord = { ...input, id: nextId() };
        rows.transactions.push(record);
        return record;
      },
      async list(userId, query = {}) {
        return rows.transactions
          .filter(t => t.userId === userId)
          .filter(t => !query.type || t.type === query.type)
          .filter(t => !query.categoryId || t.categoryId === query.categoryId)
          .filter(t => !query.from || t.createdAt >= query.from)
          .filter(t => !query.to || t.createdAt < query.to)
          .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
      },
      async countByCategory(userId, categoryId) {
        return rows.transactions.filter(t => t.userId === userId && t.categoryId === categoryId).length;
      },
    },
    goals: {
      async listActive(userId) {
        return rows.goals.filter(g => g.userId === userId && g.status === 'active');
      },
      async create(input) {
        const record: GoalRecord = { ...input, id: nextId(), currentAmount: 0, status: 'active' };
        rows.goals.push(record);
        return record;
      },
      async addAmount(userId, id, amount) {
        const goal = owned(rows.goals, userId, id);
        if (!goal || goal.status !== 'active') return null;
        goal.currentAmount += amount;
        return { ...goal };
      },
      async setStatus(userId, id, status) {
        const goal = owned(rows.goals, userId, id);
        if (!goal) return false;
        goal.status = status;
        return true;
      },
    },
    sources: {
      async listActive(userId) {
        return rows.sources.filter(s => s.userId === userId && s.active);
      },
      async create(userId, name) {
        if (rows.sources.some(s => s.userId === userId && s.active && key(s.name) === key(name))) return null;
        const record: IncomeSourceRecord = { id: nextId(), userId, name: name.trim(), active: true, createdAt: new Date() };
        rows.sources.push(record);
        return record;
      },
      async rename(userId, id, name) {
        const source = owned(rows.sources, userId, id);
        if (!source) return false;
        source.name = name.trim();
        return true;
      },
      async deactivate(userId, id) {
        const source = owned(rows.sources, userId, id);
        if (!source) return false;
        source.active = false;
        return true;
      },
    },
    settings: {
      async get(userId) {
        return rows.settings.get(userId) ?? defaults(userId);
      },
      async update(userId, patch) {
        const current = rows.settings.get(userId) ?? defaults(userId);
        const next: UserSettings = {
          ...current,
          currency: patch.currency ?? current.currency,
          language: patch.language ?? current.language,
          notifications: { ...current.notifications, ...patch.notifications },
        };
        rows.settings.set(userId, next);
        return next;
      },
    },
    reminders: {
      async listActive(userId) {
        return rows.reminders
          .filter(r => r.userId === userId && r.status === 'active')
          .sort((a, b) => a.remindAt.getTime() - b.remindAt.getTime());
      },
      async create(input) {
        const record: ReminderRecord = { ...input, id: nextId(), status: 'active' };
        rows.reminders.push(record);
        return record;
      },
      async reschedule(userId, id, remindAt) {
        const reminder = owned(rows.reminders, userId, id);
        if (!reminder) return false;
        reminder.remindAt = remindAt;
        return true;
      },
      async complete(userId, id) {
        const reminder = owned(rows.reminders, userId, id);
        if (!reminder) return false;
        reminder.status = 'completed';
        return true;
      },
      async remove(userId, id) {
        const before = rows.reminders.length;
        rows.reminders = rows.reminders.filter(r => !(r.id === id && r.userId === userId));
        return rows.reminders.length < before;
      },
    },
    debts: {
      async listOpen(userId, direction) {
        return rows.debts.filter(d => d.userId === userId && d.status === 'open' && (!direction || d.direction === direction));
      },
      async create(input) {
        const record: DebtRecord = { ...input, id: nextId(), remaining: input.amount, status: 'open' };
        rows.debts.push(record);
        return record;
      },
      async applyPayment(userId, id, amount) {
        const debt = owned(rows.debts, userId, id);
        if (!debt || debt.status !== 'open') return null;
        debt.remaining = Math.max(0, debt.remaining - amount);
        if (debt.remaining <= 0) debt.status = 'closed';
        return { ...debt };
      },
      async close(userId, id) {
        const debt = owned(rows.debts, userId, id);
        if (!debt) return false;
        debt.status = 'closed';
        debt.remaining = 0;
        return true;
      },
    },
    receipts: {
      async create(input) {
        const record: ReceiptExtraction = { ...input, id: nextId() };
        rows.receipts.push(record);
        return record;
      },
      async findInWindow(userId, from, to) {
        return rows.receipts.filter(r => r.userId === userId && r.timestamp !== null && r.timestamp >= from && r.timestamp <= to);
      },
    },
    voiceNotes: {
      async create(input) {
        const note: VoiceExtraction = { ...input, id: nextId() };
        rows.voiceNotes.push({ note, status: 'pending', attempts: 0, createdAt: new Date() });
        return note;
      },
      async get(userId, id) {
        return rows.voiceNotes.find(r => r.note.id === id && r.note.userId === userId)?.note ?? null;
      },
      async reclaimStale(lockedBefore) {
        let count = 0;
        for (const row of rows.voiceNotes) {
          if (row.status === 'processing' && row.lockedAt && row.lockedAt < lockedBefore) {
            row.status = 'pending';
            row.lockedAt = undefined;
            count++;
          }
        }
        return count;
      },
      async claimPending(limit, maxAttempts, now) {
        const batch = rows.voiceNotes.filter(r => r.status === 'pending' && r.attempts < maxAttempts).slice(0, limit);
        for (const row of batch) {
          row.status = 'processing';
          row.lockedAt = now;
        }
        return batch.map(r => r.note);
      },
      async markDone(id) {
        const row = rows.voiceNotes.find(r => r.note.id === id);
        if (!row) return;
        row.status = 'done';
        row.attempts++;
        row.lockedAt = undefined;
      },
      async markRetry(id, maxAttempts) {
        const row = rows.voiceNotes.find(r => r.note.id === id);
        if (!row) return;
        row.attempts++;
        row.status = row.attempts >= maxAttempts ? 'failed' : 'pending';
        row.lockedAt = undefined;
      },
      async countByStatus() {
        const count = (status: VoiceStatus) => rows.voiceNotes.filter(r => r.status === status).length;
        return { pending: count('pending'), processing: count('processing'), done: count('done'), failed: count('failed') };
      },
    },
    matches: {
      async begin(voiceId, receiptId) {
        if (rows.matches.some(m => m.voiceId === voiceId && m.receiptId === receiptId)) return;
        rows.matches.push({
          voiceId,
          receiptId,
          confidence: 0,
          amountScore: 0,
          itemConfidence: 0,
          amountMatch: false,
          pairs: [],
          timeDifferenceMinutes: null,
          status: 'processing',
        });
      },
      async finish(result) {
        const stored: MatchResult = {
          voiceId: result.voiceId,
          receiptId: result.receiptId,
          confidence: result.confidence,
          amountScore: result.amountScore,
          itemConfidence: result.itemConfidence,
          amountMatch: result.amountMatch,
          pairs: result.pairs,
          timeDifferenceMinutes: result.timeDifferenceMinutes,
          status: result.status,
          error: result.error,
        };
        const index = rows.matches.findIndex(m => m.voiceId === result.voiceId && m.receiptId === result.receiptId);
        if (index >= 0) rows.matches[index] = stored;
        else rows.matches.push(stored);
      },
      async listForVoice(voiceId) {
        return rows.matches.filter(m => m.voiceId === voiceId).sort((a, b) => b.confidence - a.confidence);
      },
    },
  };
}
