import { beforeEach, describe, expect, it } from 'vitest';
import { createMemoryStore, MemoryStore } from '../../__tests__/memoryStore';
import { CategoryMatcher, keywordScore, loadCategoryDictionary } from '../categoryMatcher';

const dictionary = loadCategoryDictionary(
  {
    categories: [
      {
        key: 'groceries',
        names: { ru: 'Продукты', uz: 'Oziq-ovqat', en: 'Groceries' },
        keywords: { ru: ['хлеб', 'молоко', 'сыр'], uz: ['non', 'sut'], en: ['bread', 'milk'] },
      },
      {
        key: 'drinks',
        names: { ru: 'Напитки', uz: 'Ichimliklar', en: 'Drinks' },
        keywords: { ru: ['кофе', 'чай'], uz: ['choy'], en: ['coffee', 'tea'] },
      },
    ],
    fallback: { key: 'other', names: { ru: 'Прочее', uz: 'Boshqa', en: 'Other' } },
  },
  { groceries: ['korzinka'] },
);

const USER = 'user-1';

describe('CategoryMatcher', () => {
  let store: MemoryStore;
  let matcher: CategoryMatcher;

  beforeEach(() => {
    store = createMemoryStore();
    matcher = new CategoryMatcher(dictionary, store.categories);
  });

  it('prefers a category whose name appears in the text', async () => {
    await store.categories.create(USER, 'Продукты');
    const bread = await store.categories.create(USER, 'Хлеб');
    const match = await matcher.match(USER, 'хлеб', { shopName: 'Korzinka' });
    expect(match).toEqual({ category: bread, confidence: 1, strategy: 'exact' });
  });

  it('uses the shop table when the name says nothing', async () => {
    const groceries = await store.categories.create(USER, 'Продукты');
    const match = await matcher.match(USER, 'сникерс', { shopName: 'Korzinka Chilonzor' });
    expect(match).toEqual({ category: groceries, confidence: 0.8, strategy: 'shop' });
  });

  it('accepts a keyword match on a category the user owns', async () => {
    const groceries = await store.categories.create(USER, 'Продукты');
    const match = await matcher.match(USER, 'хлеб молоко');
    expect(match).toEqual({ category: groceries, confidence: 1, strategy: 'keywords' });
  });

  it('falls back to fuzzy name similarity', async () => {
    const fun = await store.categories.create(USER, 'Развлечения');
    const match = await matcher.match(USER, 'развлечение');
    expect(match?.strategy).toBe('fuzzy');
    expect(match?.category).toEqual(fun);
    expect(match?.confidence).toBeCloseTo(10 / 11, 10);
  });

  it('reuses an owned category when the keyword score is too weak', async () => {
    const groceries = await store.categories.create(USER, 'Продукты');
    const match = await matcher.match(USER, 'хлеб и вода');
    expect(match).toEqual({ category: groceries, confidence: 0.3, strategy: 'auto_created' });
    expect(store.rows.categories).toHaveLength(1);
  });

  it('creates the dictionary category in the user language', async () => {
    const ru = await matcher.match(USER, 'хлеб');
    expect(ru?.strategy).toBe('auto_created');
    expect(ru?.confidence).toBe(0.3);
    expect(ru?.category.name).toBe('Продукты');

    const uz = await matcher.match('user-2', 'choy', { language: 'uz' });
    expect(uz?.category.name).toBe('Ichimliklar');
  });

  it('creates the fallback category once for unknown items', async () => {
    const first = await matcher.match(USER, 'xyz');
    const second = await matcher.match(USER, 'qwe');
    expect(first?.category.name).toBe('Прочее');
    expect(second?.category.id).toBe(first?.category.id);
    expect(store.rows.categories.map(c => c.name)).toEqual(['Прочее']);
  });

  it('returns null for empty text', async () => {
    expect(await matcher.match(USER, ' !? ')).toBeNull();
  });

  it('summarizes a receipt by category', async () => {
    await store.categories.create(USER, 'Продукты');
    await store.categories.create(USER, 'Напитки');
    const summary = await matcher.analyzeReceiptCategories(USER, [
      { name: 'хлеб', unitPrice: 3000, quantity: 1, total: 3000 },
      { name: 'кофе', unitPrice: 2000, quantity: 1, total: 2000 },
    ]);
    expect(summary).toEqual({
      categories: {
        Продукты: { items: 1, amount: 3000, confidenceAvg: 1, percentage: 60 },
        Напитки: { items: 1, amount: 2000, confidenceAvg: 1, percentage: 40 },
      },
      totalAmount: 5000,
      matchedItems: 2,
      unmatchedItems: [],
      matchingRate: 1,
    });
  });

  it('suggests dictionary categories the user lacks', async () => {
    await store.categories.create(USER, 'Продукты');
    expect(await matcher.suggestCategories(USER, 'ru')).toEqual(['Напитки']);
    expect(await matcher.suggestCategories(USER, 'en')).toEqual(['Drinks']);
    expect(await matcher.suggestCategories('user-2', 'uz', 1)).toEqual(['Oziq-ovqat']);
  });

  it('lists the keywords of a dictionary category', () => {
    expect(matcher.keywordsFor('groceries')).toEqual(['bread', 'milk', 'non', 'sut', 'молоко', 'сыр', 'хлеб']);
    expect(matcher.keywordsFor('unknown')).toEqual([]);
  });
});

describe('keywordScore', () => {
  const [groceries] = dictionary.categories;

  it('is the share of tokens that hit a keyword', () => {
    expect(keywordScore(['хлеб', 'и', 'вода'], groceries)).toBeCloseTo(1 / 3, 10);
    expect(keywordScore(['хлеба'], groceries)).toBe(1);
    expect(keywordScore([], groceries)).toBe(0);
  });
});
