import type {
  AssistantStore,
  ExecutionContext,
  ExecutionResult,
  Intent,
  Language,
  ParsedCommand,
  RateProvider,
} from '../../../types';
import type { CategoryDictionary } from '../categoryMatcher';
import { similarityRatio } from '../fuzzy';
import { formatMessage, MessageKey } from '../messages';
import { normalizeText } from '../textNormalizer';

export interface ExecutorDeps {
  store: AssistantStore;
  rates: RateProvider;
  dictionary: CategoryDictionary;
}

export interface CommandExecutor {
  readonly intents: readonly Intent[];
  execute(command: ParsedCommand, context: ExecutionContext): Promise<ExecutionResult>;
}

type Params = Record<string, string | number>;

export function ok(language: Language, key: MessageKey, params?: Params, data?: Record<string, unknown>): ExecutionResult {
  return { success: true, message: formatMessage(language, key, params), data };
}

export function fail(language: Language, key: MessageKey, params?: Params, data?: Record<string, unknown>): ExecutionResult {
  return { success: false, error: formatMessage(language, key, params), data };
}

const NAME_SIMILARITY = 0.6;

/**
 * Finds a record by a spoken name: same normalized name, then containment either
 * way, then the closest name above the similarity floor.
 */
export function findByName<T>(items: readonly T[], nameOf: (item: T) => string, query: string): T | null {
  const target = normalizeText(query);
  if (!target) return null;
  const named = items.map(item => ({ item, name: normalizeText(nameOf(item)) }));

  const exact = named.find(n => n.name === target);
  if (exact) return exact.item;
  const partial = named.find(n => n.name && (n.name.includes(target) || target.includes(n.name)));
  if (partial) return partial.item;

  let best: { item: T; ratio: number } | null = null;
  for (const n of named) {
    const ratio = similarityRatio(n.name, target);
    if (!best || ratio > best.ratio) best = { item: n.item, ratio };
  }
  return best && best.ratio > NAME_SIMILARITY ? best.item : null;
}
