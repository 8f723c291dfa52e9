export type Language = 'ru' | 'uz' | 'en';

export const LANGUAGES: readonly Language[] = ['ru', 'uz', 'en'];

export function isLanguage(value: unknown): value is Language {
  return value === 'ru' || value === 'uz' || value === 'en';
}

export type CurrencyCode = 'UZS' | 'USD' | 'EUR' | 'RUB';

export const CURRENCIES: readonly CurrencyCode[] = ['UZS', 'USD', 'EUR', 'RUB'];

export function isCurrencyCode(value: unknown): value is CurrencyCode {
  return value === 'UZS' || value === 'USD' || value === 'EUR' || value === 'RUB';
}

export type Modality = 'voice' | 'text' | 'receipt';

export interface Utterance {
  readonly text: string;
  readonly language: Language;
  readonly timestamp: Date;
  readonly modality: Modality;
}

export interface Money {
  amount: number;
  currency: CurrencyCode;
}

export type IntentFamily = 'core' | 'extended';

// Typed slot record for every intent the classifier can produce.
export interface IntentSlots {
  create_goal: { goalName: string; amount: Money; deadline?: string };
  manage_goals: { goalName?: string; amount?: Money };
  create_source: { sourceName: string };
  manage_sources: { sourceName?: string; newName?: string };
  add_income: { sourceName: string; amount: Money };
  change_currency: { currency: string };
  change_language: { language: string };
  manage_notifications: { topic?: string; toggle?: string };
  create_reminder: { title: string; when?: string };
  manage_reminders: { title?: string; when?: string };
  time_based_analytics: { period: string; category?: string };
  category_analytics: { category?: string };
  comparison_analytics: { left?: string; right?: string };
  create_debt: { person: string; amount: Money; due?: string };
  manage_debts: { person?: string; amount?: Money };
  create_category: { categoryName: string };
  add_expense: { description: string; amount: Money };
  show_balance: Record<string, never>;
  delete_category: { categoryName: string };
  manage_debt: { person?: string; amount?: Money };
  show_stats: Record<string, never>;
}

export type Intent = keyof IntentSlots;

export const INTENTS: readonly Intent[] = [
  'create_goal', 'manage_goals', 'create_source', 'manage_sources', 'add_income',
  'change_currency', 'change_language', 'manage_notifications',
  'create_reminder', 'manage_reminders',
  'time_based_analytics', 'category_analytics', 'comparison_analytics',
  'create_debt', 'manage_debts',
  'create_category', 'add_expense', 'show_balance', 'delete_category', 'manage_debt', 'show_stats',
];

export function isIntent(value: unknown): value is Intent {
  return typeof value === 'string' && (INTENTS as readonly string[]).includes(value);
}

export type SlotName =
  | 'goalName' | 'amount' | 'deadline' | 'sourceName' | 'newName' | 'currency' | 'language'
  | 'topic' | 'toggle' | 'title' | 'when' | 'period' | 'category' | 'left' | 'right'
  | 'person' | 'due' | 'categoryName' | 'description';

export const SLOT_NAMES: readonly SlotName[] = [
  'goalName', 'amount', 'deadline', 'sourceName', 'newName', 'currency', 'language',
  'topic', 'toggle', 'title', 'when', 'period', 'category', 'left', 'right',
  'person', 'due', 'categoryName', 'description',
];

export function isSlotName(value: unknown): value is SlotName {
  return typeof value === 'string' && (SLOT_NAMES as readonly string[]).includes(value);
}

interface CommandBase {
  confidence: number;
  family: IntentFamily;
  matchedPattern: string;
  utterance: Utterance;
}

export type CommandOf<K extends Intent> = CommandBase & { intent: K; slots: IntentSlots[K] };

export type ParsedCommand = { [K in Intent]: CommandOf<K> }[Intent];

export type ClassificationOutcome =
  | { kind: 'matched'; command: ParsedCommand }
  | { kind: 'incomplete'; intent: Intent; missing: SlotName[]; matchedPattern: string }
  | { kind: 'no_intent' };

export type ExecutionResult =
  | { success: true; message: string; data?: Record<string, unknown> }
  | { success: false; error: string; data?: Record<string, unknown> };

export type AssistantOutcome =
  | { kind: 'recognition_failed'; message: string }
  | { kind: 'no_intent'; message: string }
  | { kind: 'incomplete'; intent: Intent; missing: SlotName[]; message: string }
  | { kind: 'executed'; command: ParsedCommand; result: ExecutionResult };

export interface ExecutionContext {
  userId: string;
  language: Language;
  baseCurrency: CurrencyCode;
  now: () => Date;
}

// Black-box recognizers; implementations live outside this service.
export type TranscriptionResult =
  | { ok: true; text: string; language: Language; confidence: number }
  | { ok: false; reason: string };

export interface SpeechRecognizer {
  transcribe(audio: Buffer, languageHint?: Language): Promise<TranscriptionResult>;
}

export type ReceiptRecognitionResult =
  | { ok: true; rawText: string; shopName?: string; total?: number; items?: ReceiptItem[] }
  | { ok: false; reason: string };

export interface ReceiptRecognizer {
  recognize(image: Buffer): Promise<ReceiptRecognitionResult>;
}

export interface RateProvider {
  // null when no live rate is available
  convert(amount: number, from: CurrencyCode, to: CurrencyCode): Promise<number | null>;
}

export interface ReceiptItem {
  name: string;
  unitPrice: number;
  quantity: number;
  total: number;
}

export interface ReceiptExtraction {
  id: string;
  userId: string;
  shopName: string;
  total: number;
  items: ReceiptItem[];
  timestamp: Date | null;
}

export interface VoiceItem {
  name: string;
  price: number;
  quantity: number;
}

export interface VoiceExtraction {
  id: string;
  userId: string;
  text: string;
  language: Language;
  items: VoiceItem[];
  spokenTotal: number | null;
  timestamp: Date | null;
}

export interface ItemPair {
  voiceItem: VoiceItem;
  receiptItem: ReceiptItem;
  similarity: number;
  priceMatch: boolean;
}

export type MatchStatus = 'processing' | 'completed' | 'failed';

export interface MatchResult {
  voiceId: string;
  receiptId: string;
  confidence: number;
  amountScore: number;
  itemConfidence: number;
  amountMatch: boolean;
  pairs: ItemPair[];
  timeDifferenceMinutes: number | null;
  status: MatchStatus;
  error?: string;
}
