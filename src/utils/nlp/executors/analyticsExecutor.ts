import type {
  CategoryRecord,
  ExecutionContext,
  ExecutionResult,
  Intent,
  Language,
  ParsedCommand,
  TransactionQuery,
} from '../../../types';
import { monthPeriod, parsePeriod, Period } from '../dates';
import { capitalize, formatDate, formatMessage, formatMoney } from '../messages';
import { grammar, GrammarMatch, parseGrammar } from './grammar';
import { CommandExecutor, ExecutorDeps, fail, findByName, ok } from './shared';
import { sumAmounts, totalsByCategory } from './transactionExecutor';

interface PeriodRequest {
  period: string;
  category?: string;
}

// `qualified` marks "топ категорий по X", where X may be a measure rather than a category
type CategoryRequest = { action: 'top' } | { action: 'category'; name: string; qualified: boolean };

type ComparisonRequest = { action: 'compare'; left: string; right: string } | { action: 'trend'; category?: string };

function byPeriod(m: GrammarMatch): PeriodRequest | null {
  const period = m.text('period');
  return period ? { period, category: m.text('category') } : null;
}

function byCategory(m: GrammarMatch): CategoryRequest | null {
  const name = m.text('category');
  return name ? { action: 'category', name, qualified: false } : null;
}

function topCategories(m: GrammarMatch): CategoryRequest {
  const name = m.text('category');
  return name ? { action: 'category', name, qualified: true } : { action: 'top' };
}

function compareTwo(m: GrammarMatch): ComparisonRequest | null {
  const left = m.text('left');
  const right = m.text('right');
  return left && right ? { action: 'compare', left, right } : null;
}

const trend = (m: GrammarMatch): ComparisonRequest => ({ action: 'trend', category: m.text('category') });

const TIME_BASED = grammar<PeriodRequest>({
  ru: [
    [String.raw`сколько\s+(?:я\s+)?потратил[аи]?\s+(?:на\s+(?<category>.+?)\s+)?за\s+(?<period>.+)$`, byPeriod],
    [String.raw`(?:расходы|траты)\s+(?:(?:на|по)\s+(?<category>.+?)\s+)?(?:за|в)\s+(?<period>.+)$`, byPeriod],
    [String.raw`(?:доходы|статистика|отч[её]т|анализ\s+расходов)\s+за\s+(?<period>.+)$`, byPeriod],
  ],
  uz: [
    [String.raw`(?<period>.+?)\s+davridagi\s+xarajatlarni\s+koʻrsat`, byPeriod],
    [String.raw`(?<period>{PERIOD})\s+uchun\s+qancha\s+sarfladim`, byPeriod],
    [String.raw`(?<period>{PERIOD})\s+(?:statistikasi|hisoboti)`, byPeriod],
  ],
  en: [
    [String.raw`how\s+much\s+(?:did\s+i\s+spend|i\s+spent|have\s+i\s+spent)\s+(?:on\s+(?<category>.+?)\s+)?(?:in|for|during|over)\s+(?<period>.+)$`, byPeriod],
    [String.raw`(?:expenses|report|analytics)\s+for\s+(?<period>.+)$`, byPeriod],
  ],
});

const CATEGORY = grammar<CategoryRequest>({
  ru: [
    [String.raw`топ\s+категорий(?:\s+по\s+(?<category>.+))?$`, topCategories],
    [String.raw`самые\s+затратные\s+категории`, topCategories],
    [String.raw`(?:статистика|анализ)\s+(?:по\s+)?категории\s+(?<category>.+)$`, byCategory],
    [String.raw`расходы\s+по\s+(?:категории\s+)?(?<category>.+)$`, byCategory],
    [String.raw`сколько\s+(?:я\s+)?трачу\s+на\s+(?<category>.+)$`, byCategory],
  ],
  uz: [
    [String.raw`eng\s+koʻp\s+sarflanadigan\s+kategoriyalar`, topCategories],
    [String.raw`(?<category>.+?)\s+kategoriya\s+statistikasi`, byCategory],
    [String.raw`(?<category>.+?)ga\s+qancha\s+sarflayapman`, byCategory],
  ],
  en: [
    [String.raw`(?:top|most\s+expensive)\s+categories`, topCategories],
    [String.raw`category\s+statistics\s+(?:for\s+)?(?<category>.+)$`, byCategory],
    [String.raw`expenses\s+(?:for|on)\s+(?<category>.+)$`, byCategory],
    [String.raw`how\s+much\s+(?:do\s+i\s+spend|am\s+i\s+spending)\s+on\s+(?<category>.+)$`, byCategory],
  ],
});

const COMPARISON = grammar<ComparisonRequest>({
  ru: [
    [String.raw`сравни(?:ть)?\s+(?:расходы\s+)?(?:за\s+)?(?<left>.+?)\s+(?:и|с)\s+(?:за\s+)?(?<right>.+)$`, compareTwo],
    [String.raw`сравнение\s+(?:расходов\s+)?(?:за\s+)?(?<left>.+?)\s+(?:и|с)\s+(?:за\s+)?(?<right>.+)$`, compareTwo],
    [String.raw`что\s+дороже\s+(?<left>.+?)\s+или\s+(?<right>.+)$`, compareTwo],
    [String.raw`динамика\s+расходов(?:\s+(?:на|по)\s+(?<category>.+))?$`, trend],
    [String.raw`тренд\s+(?:по\s+)?(?<category>.+)$`, trend],
  ],
  uz: [
    [String.raw`(?<left>.+?)\s+va\s+(?<right>.+?)\s+xarajatlarini?\s+solishtir`, compareTwo],
    [String.raw`xarajatlar\s+dinamikasi`, trend],
  ],
  en: [
    [String.raw`compare\s+(?:expenses\s+)?(?:for\s+)?(?<left>.+?)\s+(?:and|with|to)\s+(?:for\s+)?(?<right>.+)$`, compareTwo],
    [String.raw`what(?:ʻs|s|\s+is)\s+more\s+expensive\s+(?<left>.+?)\s+or\s+(?<right>.+)$`, compareTwo],
    [String.raw`(?:expense|spending)\s+trend(?:\s+(?:for|on)\s+(?<category>.+))?$`, trend],
  ],
});

const TOP_CATEGORIES = 5;
const TREND_MONTHS = 3;
const DAY_MS = 86_400_000;

export function periodLabel(language: Language, period: Period): string {
  if (period.key === 'days') {
    return formatMessage(language, 'period_days', { days: Math.round((period.to.getTime() - period.from.getTime()) / DAY_MS) });
  }
  return formatMessage(language, `period_${period.key}`);
}

/** Spending reports over periods and categories, and comparisons between them. */
export class AnalyticsExecutor implements CommandExecutor {
  readonly intents: readonly Intent[] = ['time_based_analytics', 'category_analytics', 'comparison_analytics'];

  constructor(private readonly deps: ExecutorDeps) {}

  async execute(command: ParsedCommand, context: ExecutionContext): Promise<ExecutionResult> {
    switch (command.intent) {
      case 'time_based_analytics':
        return this.byPeriod(command, context);
      case 'category_analytics':
        return this.byCategory(command, context);
      case 'comparison_analytics':
        return this.compare(command, context);
      default:
        throw new Error(`AnalyticsExecutor cannot handle ${command.intent}`);
    }
  }

  private async expenses(userId: string, query: Omit<TransactionQuery, 'type'>) {
    return this.deps.store.transactions.list(userId, { ...query, type: 'expense' });
  }

  private async topLine(userId: string, totals: { categoryId: string | null; total: number }[], categories?: CategoryRecord[]) {
    const own = categories ?? await this.deps.store.categories.listByUser(userId);
    const names = new Map(own.map(c => [c.id, c.name]));
    return totals
      .slice(0, TOP_CATEGORIES)
      .map(t => ({ name: (t.categoryId && names.get(t.categoryId)) || '—', total: t.total }));
  }

  private async byPeriod(command: ParsedCommand, context: ExecutionContext): Promise<ExecutionResult> {
    const lang = context.language;
    const request = parseGrammar(TIME_BASED, command.utterance, context.baseCurrency);
    if (!request) return fail(lang, 'command_unparsed', {}, { intent: command.intent });
    const period = parsePeriod(request.period, context.now());
    if (!period) return fail(lang, 'unknown_period', { value: request.period });
    const label = periodLabel(lang, period);

    if (request.category !== undefined) {
      const categories = await this.deps.store.categories.listByUser(context.userId);
      const category = findByName(categories, c => c.name, request.category);
      if (!category) return fail(lang, 'category_not_found', { name: capitalize(request.category) });
      const list = await this.expenses(context.userId, { from: period.from, to: period.to, categoryId: category.id });
      const total = sumAmounts(list);
      return ok(lang, 'period_category_expenses', {
        category: category.name,
        period: label,
        total: formatMoney(total, context.baseCurrency),
      }, { total, count: list.length, categoryId: category.id, from: period.from.toISOString(), to: period.to.toISOString() });
    }

    const list = await this.expenses(context.userId, { from: period.from, to: period.to });
    if (!list.length) return ok(lang, 'analytics_empty', { period: label }, { total: 0 });
    const total = sumAmounts(list);
    const top = await this.topLine(context.userId, totalsByCategory(list));
    return ok(lang, 'period_expenses', {
      period: label,
      total: formatMoney(total, context.baseCurrency),
      top: top.map(t => `${t.name} ${formatMoney(t.total, context.baseCurrency)}`).join(', '),
    }, { total, top, from: period.from.toISOString(), to: period.to.toISOString() });
  }

  private async byCategory(command: ParsedCommand, context: ExecutionContext): Promise<ExecutionResult> {
    const lang = context.language;
    const request = parseGrammar(CATEGORY, command.utterance, context.baseCurrency);
    if (!request) return fail(lang, 'command_unparsed', {}, { intent: command.intent });
    const month = monthPeriod(context.now());
    const categories = await this.deps.store.categories.listByUser(context.userId);
    const category = request.action === 'category' ? findByName(categories, c => c.name, request.name) : null;

    if (category) {
      const list = await this.expenses(context.userId, { from: month.from, to: month.to, categoryId: category.id });
      const total = sumAmounts(list);
      return ok(lang, 'category_stats', {
        category: category.name,
        total: formatMoney(total, context.baseCurrency),
        count: list.length,
      }, { total, count: list.length, categoryId: category.id });
    }
    if (request.action === 'category' && !(request.qualified && /^(?:расход|трат|сумм)/u.test(request.name))) {
      return fail(lang, 'category_not_found', { name: capitalize(request.name) });
    }

    const list = await this.expenses(context.userId, { from: month.from, to: month.to });
    if (!list.length) return ok(lang, 'analytics_empty', { period: periodLabel(lang, month) }, { total: 0 });
    const top = await this.topLine(context.userId, totalsByCategory(list), categories);
    return ok(lang, 'top_categories', {
      top: top.map(t => `${t.name} ${formatMoney(t.total, context.baseCurrency)}`).join(', '),
    }, { top });
  }

  private async compare(command: ParsedCommand, context: ExecutionContext): Promise<ExecutionResult> {
    const lang = context.language;
    const request = parseGrammar(COMPARISON, command.utterance, context.baseCurrency);
    if (!request) return fail(lang, 'command_unparsed', {}, { intent: command.intent });
    const now = context.now();

    if (request.action === 'compare') {
      const { left, right } = request;
      const leftPeriod = parsePeriod(left, now);
      const rightPeriod = parsePeriod(right, now);
      if (leftPeriod && rightPeriod) {
        const leftTotal = sumAmounts(await this.expenses(context.userId, { from: leftPeriod.from, to: leftPeriod.to }));
        const rightTotal = sumAmounts(await this.expenses(context.userId, { from: rightPeriod.from, to: rightPeriod.to }));
        return this.comparison(lang, context, periodLabel(lang, leftPeriod), leftTotal, periodLabel(lang, rightPeriod), rightTotal);
      }

      const categories = await this.deps.store.categories.listByUser(context.userId);
      const a = findByName(categories, c => c.name, left);
      if (!a) return fail(lang, 'category_not_found', { name: capitalize(left) });
      const b = findByName(categories, c => c.name, right);
      if (!b) return fail(lang, 'category_not_found', { name: capitalize(right) });
      const month = monthPeriod(now);
      const leftTotal = sumAmounts(await this.expenses(context.userId, { from: month.from, to: month.to, categoryId: a.id }));
      const rightTotal = sumAmounts(await this.expenses(context.userId, { from: month.from, to: month.to, categoryId: b.id }));
      return this.comparison(lang, context, a.name, leftTotal, b.name, rightTotal);
    }

    // Trend over recent months, optionally for one category
    let categoryId: string | undefined;
    if (request.category !== undefined) {
      const categories = await this.deps.store.categories.listByUser(context.userId);
      const category = findByName(categories, c => c.name, request.category);
      if (!category) return fail(lang, 'category_not_found', { name: capitalize(request.category) });
      categoryId = category.id;
    }
    const months: { month: string; total: number }[] = [];
    for (let back = TREND_MONTHS - 1; back >= 0; back--) {
      const period = monthPeriod(now, back);
      const total = sumAmounts(await this.expenses(context.userId, { from: period.from, to: period.to, categoryId }));
      months.push({ month: formatDate(period.from).slice(0, 7), total });
    }
    return ok(lang, 'trend', {
      list: months.map(m => `${m.month} ${formatMoney(m.total, context.baseCurrency)}`).join(', '),
    }, { months });
  }

  private comparison(lang: Language, context: ExecutionContext, left: string, leftTotal: number, right: string, rightTotal: number): ExecutionResult {
    return ok(lang, 'comparison', {
      left,
      leftTotal: formatMoney(leftTotal, context.baseCurrency),
      right,
      rightTotal: formatMoney(rightTotal, context.baseCurrency),
      diff: formatMoney(Math.abs(leftTotal - rightTotal), context.baseCurrency),
    }, { leftTotal, rightTotal, difference: leftTotal - rightTotal });
  }
}
