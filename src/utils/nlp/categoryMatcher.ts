import categoryKeywords from '../../data/categoryKeywords.json';
import shopCategories from '../../data/shopCategories.json';
import { CategoryRecord, CategoryStore, Language, LANGUAGES, ReceiptItem } from '../../types';
import { mCategoryStrategy } from '../assistantMetrics';
import { similarityRatio } from './fuzzy';
import { normalizeText, tokenize } from './textNormalizer';

export type MatchStrategy = 'exact' | 'shop' | 'keywords' | 'fuzzy' | 'auto_created';

export interface CategoryMatch {
  category: CategoryRecord;
  confidence: number;
  strategy: MatchStrategy;
}

export interface KeywordCategory {
  key: string;
  names: Readonly<Record<Language, string>>;
  // every language's keywords, normalized
  keywords: readonly string[];
}

export interface CategoryDictionary {
  categories: readonly KeywordCategory[];
  fallback: { key: string; names: Readonly<Record<Language, string>> };
  shops: ReadonlyMap<string, readonly string[]>;
}

// Request-scoped: one per handled utterance or receipt
export type CategoryCache = Map<string, CategoryRecord>;

export function createCategoryCache(): CategoryCache {
  return new Map();
}

const KEYWORD_THRESHOLD = 0.6;
const FUZZY_THRESHOLD = 0.5;
const AUTO_CONFIDENCE = 0.3;
const MIN_PARTIAL_LENGTH = 3;

interface RawDictionary {
  categories: { key: string; names: Record<Language, string>; keywords: Record<Language, string[]> }[];
  fallback: { key: string; names: Record<Language, string> };
}

export function loadCategoryDictionary(raw: RawDictionary = categoryKeywords, shops: Record<string, string[]> = shopCategories): CategoryDictionary {
  const categories = raw.categories.map(c => ({
    key: c.key,
    names: c.names,
    keywords: [...new Set(LANGUAGES.flatMap(lang => c.keywords[lang].map(k => normalizeText(k))))],
  }));
  const shopMap = new Map<string, readonly string[]>();
  for (const [key, names] of Object.entries(shops)) shopMap.set(key, names.map(n => normalizeText(n)));
  return { categories, fallback: raw.fallback, shops: shopMap };
}

function tokenMatches(token: string, keyword: string): boolean {
  if (token === keyword) return true;
  if (token.length < MIN_PARTIAL_LENGTH || keyword.length < MIN_PARTIAL_LENGTH) return false;
  return token.includes(keyword) || keyword.includes(token);
}

export function keywordScore(tokens: string[], category: KeywordCategory): number {
  if (!tokens.length) return 0;
  let matches = 0;
  for (const token of tokens) {
    if (category.keywords.some(k => tokenMatches(token, k))) matches++;
  }
  return matches / tokens.length;
}

function findUserCategory(names: readonly string[], userCategories: CategoryRecord[]): CategoryRecord | null {
  const targets = names.map(n => normalizeText(n));
  for (const category of userCategories) {
    const own = normalizeText(category.name);
    if (!own) continue;
    if (targets.some(t => t === own || t.includes(own) || own.includes(t))) return category;
  }
  return null;
}

/**
 * Resolves free text (an expense description or a receipt line) to one of the
 * user's categories. Strategies run in a fixed order and the first confident one wins:
 * word overlap with a category name, shop table, keyword dictionary, fuzzy name
 * similarity, then auto-provisioning.
 */
export class CategoryMatcher {
  constructor(
    private readonly dictionary: CategoryDictionary,
    private readonly store: CategoryStore,
    private readonly cache: CategoryCache = createCategoryCache(),
  ) {}

  async match(userId: string, itemName: string, options: { shopName?: string; language?: Language } = {}): Promise<CategoryMatch | null> {
    const language = options.language ?? 'ru';
    const text = normalizeText(itemName, language);
    if (!text) return null;
    const tokens = tokenize(text);
    const userCategories = await this.store.listByUser(userId);

    const exact = this.matchExact(tokens, userCategories);
    if (exact) return this.hit({ category: exact, confidence: 1, strategy: 'exact' });

    if (options.shopName) {
      const byShop = this.matchShop(options.shopName, userCategories);
      if (byShop) return this.hit({ category: byShop, confidence: 0.8, strategy: 'shop' });
    }

    const scored = this.dictionary.categories
      .map(category => ({ category, score: keywordScore(tokens, category) }))
      .filter(s => s.score > 0);

    let bestOwned: { record: CategoryRecord; score: number } | null = null;
    for (const s of scored) {
      if (bestOwned && s.score <= bestOwned.score) continue;
      const record = findUserCategory([...Object.values(s.category.names), s.category.key], userCategories);
      if (record) bestOwned = { record, score: s.score };
    }
    if (bestOwned && bestOwned.score > KEYWORD_THRESHOLD) {
      return this.hit({ category: bestOwned.record, confidence: bestOwned.score, strategy: 'keywords' });
    }

    let bestFuzzy: { record: CategoryRecord; ratio: number } | null = null;
    for (const category of userCategories) {
      const ratio = similarityRatio(text, normalizeText(category.name));
      if (!bestFuzzy || ratio > bestFuzzy.ratio) bestFuzzy = { record: category, ratio };
    }
    if (bestFuzzy && bestFuzzy.ratio > FUZZY_THRESHOLD) {
      return this.hit({ category: bestFuzzy.record, confidence: bestFuzzy.ratio, strategy: 'fuzzy' });
    }

    let target = this.dictionary.fallback.names;
    let bestScore = 0;
    for (const s of scored) {
      if (s.score > bestScore) {
        bestScore = s.score;
        target = s.category.names;
      }
    }
    const provisioned = await this.getOrCreate(userId, target, language, userCategories);
    return this.hit({ category: provisioned, confidence: AUTO_CONFIDENCE, strategy: 'auto_created' });
  }

  async analyzeReceiptCategories(userId: string, items: ReceiptItem[], shopName?: string, language: Language = 'ru') {
    const categories: Record<string, { items: number; amount: number; confidenceAvg: number; percentage: number }> = {};
    const scores: Record<string, number[]> = {};
    const unmatchedItems: ReceiptItem[] = [];
    let totalAmount = 0;

    for (const item of items) {
      const match = await this.match(userId, item.name, { shopName, language });
      totalAmount += item.total;
      if (!match) {
        unmatchedItems.push(item);
        continue;
      }
      const name = match.category.name;
      const stats = categories[name] ?? { items: 0, amount: 0, confidenceAvg: 0, percentage: 0 };
      stats.items += 1;
      stats.amount += item.total;
      categories[name] = stats;
      (scores[name] ??= []).push(match.confidence);
    }

    for (const [name, stats] of Object.entries(categories)) {
      const list = scores[name] ?? [];
      stats.confidenceAvg = list.length ? list.reduce((a, b) => a + b, 0) / list.length : 0;
      stats.percentage = totalAmount > 0 ? (stats.amount / totalAmount) * 100 : 0;
    }

    const matchedItems = items.length - unmatchedItems.length;
    return {
      categories,
      totalAmount,
      matchedItems,
      unmatchedItems,
      matchingRate: items.length ? matchedItems / items.length : 0,
    };
  }

  /** Dictionary categories the user does not have yet, named in their language. */
  async suggestCategories(userId: string, language: Language, limit = 10): Promise<string[]> {
    const userCategories = await this.store.listByUser(userId);
    const suggested: string[] = [];
    for (const category of this.dictionary.categories) {
      if (suggested.length >= limit) break;
      if (!findUserCategory(Object.values(category.names), userCategories)) suggested.push(category.names[language]);
    }
    return suggested;
  }

  keywordsFor(key: string): string[] {
    const category = this.dictionary.categories.find(c => c.key === key);
    return category ? [...category.keywords].sort() : [];
  }

  private matchExact(tokens: string[], userCategories: CategoryRecord[]): CategoryRecord | null {
    const words = new Set(tokens);
    for (const category of userCategories) {
      // short connector words ("и", "va") inside names do not count
      if (tokenize(normalizeText(category.name)).some(w => w.length >= MIN_PARTIAL_LENGTH && words.has(w))) return category;
    }
    return null;
  }

  private matchShop(shopName: string, userCategories: CategoryRecord[]): CategoryRecord | null {
    const shop = normalizeText(shopName);
    for (const [key, shops] of this.dictionary.shops) {
      if (!shops.some(s => shop.includes(s))) continue;
      const dictionaryCategory = this.dictionary.categories.find(c => c.key === key);
      if (!dictionaryCategory) continue;
      const record = findUserCategory([...Object.values(dictionaryCategory.names), key], userCategories);
      if (record) return record;
    }
    return null;
  }

  private async getOrCreate(userId: string, names: Readonly<Record<Language, string>>, language: Language, userCategories: CategoryRecord[]): Promise<CategoryRecord> {
    const name = names[language];
    const cacheKey = `${userId}_${name}`;
    const cached = this.cache.get(cacheKey);
    if (cached) return cached;

    const existing = findUserCategory(Object.values(names), userCategories);
    if (existing) {
      this.cache.set(cacheKey, existing);
      return existing;
    }
    const { category, created } = await this.store.findOrCreate(userId, name);
    if (created) console.log(`[CATEGORY] auto-created "${name}" for user ${userId}`);
    this.cache.set(cacheKey, category);
    return category;
  }

  private hit(result: CategoryMatch): CategoryMatch {
    mCategoryStrategy(result.strategy);
    return result;
  }
}
