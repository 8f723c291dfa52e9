import type {
  CurrencyCode,
  Language,
  MatchResult,
  ReceiptExtraction,
  ReceiptItem,
  VoiceExtraction,
  VoiceItem,
} from './assistant';

export interface CategoryRecord {
  id: string;
  userId: string;
  name: string;
  keywords: string[];
  createdAt: Date;
}

export interface CategoryStore {
  listByUser(userId: string): Promise<CategoryRecord[]>;
  // null when a category with the same name already exists
  create(userId: string, name: string, keywords?: string[]): Promise<CategoryRecord | null>;
  // Idempotent: concurrent callers with the same name get the same record
  findOrCreate(userId: string, name: string, keywords?: string[]): Promise<{ category: CategoryRecord; created: boolean }>;
  rename(userId: string, id: string, name: string): Promise<boolean>;
  remove(userId: string, id: string): Promise<boolean>;
}

export type TransactionType = 'expense' | 'income';

export interface TransactionRecord {
  id: string;
  userId: string;
  type: TransactionType;
  amount: number;
  originalAmount: number;
  originalCurrency: CurrencyCode;
  categoryId: string | null;
  sourceId: string | null;
  description: string;
  createdAt: Date;
}

export type NewTransaction = Omit<TransactionRecord, 'id'>;

export interface TransactionQuery {
  type?: TransactionType;
  from?: Date;
  to?: Date;
  categoryId?: string;
}

export interface TransactionStore {
  create(input: NewTransaction): Promise<TransactionRecord>;
  list(userId: string, query?: TransactionQuery): Promise<TransactionRecord[]>;
  countByCategory(userId: string, categoryId: string): Promise<number>;
}

export type GoalStatus = 'active' | 'completed' | 'deleted';

export interface GoalRecord {
  id: string;
  userId: string;
  name: string;
  targetAmount: number;
  currentAmount: number;
  currency: CurrencyCode;
  deadline: Date | null;
  status: GoalStatus;
  createdAt: Date;
}

export interface GoalStore {
  listActive(userId: string): Promise<GoalRecord[]>;
  create(input: Omit<GoalRecord, 'id' | 'currentAmount' | 'status'>): Promise<GoalRecord>;
  addAmount(userId: string, id: string, amount: number): Promise<GoalRecord | null>;
  setStatus(userId: string, id: string, status: GoalStatus): Promise<boolean>;
}

export interface IncomeSourceRecord {
  id: string;
  userId: string;
  name: string;
  active: boolean;
  createdAt: Date;
}

export interface SourceStore {
  listActive(userId: string): Promise<IncomeSourceRecord[]>;
  create(userId: string, name: string): Promise<IncomeSourceRecord | null>;
  rename(userId: string, id: string, name: string): Promise<boolean>;
  deactivate(userId: string, id: string): Promise<boolean>;
}

export type NotificationTopic = 'reminders' | 'goals' | 'debts' | 'budget' | 'reports';

export const NOTIFICATION_TOPICS: readonly NotificationTopic[] = ['reminders', 'goals', 'debts', 'budget', 'reports'];

export interface UserSettings {
  userId: string;
  currency: CurrencyCode;
  language: Language;
  notifications: Record<NotificationTopic, boolean>;
}

export type SettingsPatch = Partial<Pick<UserSettings, 'currency' | 'language'>> & {
  notifications?: Partial<Record<NotificationTopic, boolean>>;
};

export interface SettingsStore {
  get(userId: string): Promise<UserSettings>;
  update(userId: string, patch: SettingsPatch): Promise<UserSettings>;
}

export type ReminderStatus = 'active' | 'completed';

export interface ReminderRecord {
  id: string;
  userId: string;
  title: string;
  remindAt: Date;
  status: ReminderStatus;
  createdAt: Date;
}

export interface ReminderStore {
  listActive(userId: string): Promise<ReminderRecord[]>;
  create(input: Omit<ReminderRecord, 'id' | 'status'>): Promise<ReminderRecord>;
  reschedule(userId: string, id: string, remindAt: Date): Promise<boolean>;
  complete(userId: string, id: string): Promise<boolean>;
  remove(userId: string, id: string): Promise<boolean>;
}

export type DebtDirection = 'owed_to_me' | 'i_owe';

export interface DebtRecord {
  id: string;
  userId: string;
  person: string;
  direction: DebtDirection;
  amount: number;
  remaining: number;
  currency: CurrencyCode;
  dueDate: Date | null;
  status: 'open' | 'closed';
  createdAt: Date;
}

export interface DebtStore {
  listOpen(userId: string, direction?: DebtDirection): Promise<DebtRecord[]>;
  create(input: Omit<DebtRecord, 'id' | 'remaining' | 'status'>): Promise<DebtRecord>;
  // Reduces the remaining amount; closes the debt when it reaches zero
  applyPayment(userId: string, id: string, amount: number): Promise<DebtRecord | null>;
  close(userId: string, id: string): Promise<boolean>;
}

export interface NewReceipt {
  userId: string;
  shopName: string;
  total: number;
  items: ReceiptItem[];
  timestamp: Date;
}

export interface ReceiptStore {
  create(input: NewReceipt): Promise<ReceiptExtraction>;
  findInWindow(userId: string, from: Date, to: Date): Promise<ReceiptExtraction[]>;
}

export interface NewVoiceNote {
  userId: string;
  text: string;
  language: Language;
  items: VoiceItem[];
  spokenTotal: number | null;
  timestamp: Date;
}

export interface VoiceNoteStore {
  create(input: NewVoiceNote): Promise<VoiceExtraction>;
  get(userId: string, id: string): Promise<VoiceExtraction | null>;
  reclaimStale(lockedBefore: Date): Promise<number>;
  // Claims up to `limit` pending notes and marks them as processing
  claimPending(limit: number, maxAttempts: number, now: Date): Promise<VoiceExtraction[]>;
  markDone(id: string): Promise<void>;
  // Back to pending, or failed once the note has used up its attempts
  markRetry(id: string, maxAttempts: number): Promise<void>;
  countByStatus(): Promise<Record<'pending' | 'processing' | 'done' | 'failed', number>>;
}

export interface MatchStore {
  // Creates the (voice, receipt) entry in `processing` state if it does not exist yet
  begin(voiceId: string, receiptId: string): Promise<void>;
  finish(result: MatchResult): Promise<void>;
  listForVoice(voiceId: string): Promise<MatchResult[]>;
}

export interface AssistantStore {
  categories: CategoryStore;
  transactions: TransactionStore;
  goals: GoalStore;
  sources: SourceStore;
  settings: SettingsStore;
  reminders: ReminderStore;
  debts: DebtStore;
  receipts: ReceiptStore;
  voiceNotes: VoiceNoteStore;
  matches: MatchStore;
}
