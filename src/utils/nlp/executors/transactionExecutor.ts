import type {
  CommandOf,
  ExecutionContext,
  ExecutionResult,
  Intent,
  ParsedCommand,
  TransactionRecord,
} from '../../../types';
import { convertWithFallback } from '../../currency';
import { CategoryMatcher, createCategoryCache } from '../categoryMatcher';
import { monthPeriod } from '../dates';
import { capitalize, formatMoney } from '../messages';
import { CommandExecutor, ExecutorDeps, fail, findByName, ok } from './shared';
import { recordDebt, describeOpenDebts } from './debtExecutor';

const TOP_CATEGORIES = 3;

export function sumAmounts(transactions: readonly TransactionRecord[]): number {
  return transactions.reduce((total, tx) => total + tx.amount, 0);
}

/** Totals per category id, largest first. Uncategorized spend is keyed by null. */
export function totalsByCategory(transactions: readonly TransactionRecord[]): { categoryId: string | null; total: number }[] {
  const totals = new Map<string | null, number>();
  for (const tx of transactions) totals.set(tx.categoryId, (totals.get(tx.categoryId) ?? 0) + tx.amount);
  return [...totals.entries()]
    .map(([categoryId, total]) => ({ categoryId, total }))
    .sort((a, b) => b.total - a.total);
}

/** Core intents: categories, expenses, balance, legacy debt listing, monthly stats. */
export class TransactionExecutor implements CommandExecutor {
  readonly intents: readonly Intent[] = ['create_category', 'add_expense', 'show_balance', 'delete_category', 'manage_debt', 'show_stats'];

  constructor(private readonly deps: ExecutorDeps) {}

  async execute(command: ParsedCommand, context: ExecutionContext): Promise<ExecutionResult> {
    switch (command.intent) {
      case 'create_category':
        return this.createCategory(command, context);
      case 'add_expense':
        return this.addExpense(command, context);
      case 'show_balance':
        return this.showBalance(context);
      case 'delete_category':
        return this.deleteCategory(command, context);
      case 'manage_debt':
        return this.manageDebt(command, context);
      case 'show_stats':
        return this.showStats(context);
      default:
        throw new Error(`TransactionExecutor cannot handle ${command.intent}`);
    }
  }

  private async createCategory(command: CommandOf<'create_category'>, context: ExecutionContext): Promise<ExecutionResult> {
    const name = capitalize(command.slots.categoryName);
    const created = await this.deps.store.categories.create(context.userId, name);
    if (!created) return fail(context.language, 'category_exists', { name });
    return ok(context.language, 'category_created', { name: created.name }, { categoryId: created.id });
  }

  private async addExpense(command: CommandOf<'add_expense'>, context: ExecutionContext): Promise<ExecutionResult> {
    const { description, amount } = command.slots;
    if (amount.amount <= 0) return fail(context.language, 'bad_amount');

    const matcher = new CategoryMatcher(this.deps.dictionary, this.deps.store.categories, createCategoryCache());
    const match = await matcher.match(context.userId, description, { language: context.language });
    const converted = await convertWithFallback(this.deps.rates, amount.amount, amount.currency, context.baseCurrency);

    const tx = await this.deps.store.transactions.create({
      userId: context.userId,
      type: 'expense',
      amount: converted,
      originalAmount: amount.amount,
      originalCurrency: amount.currency,
      categoryId: match?.category.id ?? null,
      sourceId: null,
      description,
      createdAt: context.now(),
    });

    const category = match?.category.name ?? '';
    const data = {
      transactionId: tx.id,
      amount: converted,
      currency: context.baseCurrency,
      originalAmount: amount.amount,
      originalCurrency: amount.currency,
      category,
      categoryStrategy: match?.strategy ?? null,
      categoryConfidence: match?.confidence ?? 0,
    };
    if (amount.currency !== context.baseCurrency) {
      return ok(context.language, 'expense_added_converted', {
        amount: formatMoney(converted, context.baseCurrency),
        original: formatMoney(amount.amount, amount.currency),
        category,
      }, data);
    }
    return ok(context.language, 'expense_added', { amount: formatMoney(converted, context.baseCurrency), category }, data);
  }

  private async showBalance(context: ExecutionContext): Promise<ExecutionResult> {
    const all = await this.deps.store.transactions.list(context.userId);
    const income = sumAmounts(all.filter(tx => tx.type === 'income'));
    const expense = sumAmounts(all.filter(tx => tx.type === 'expense'));
    const balance = income - expense;
    return ok(context.language, 'balance', {
      balance: formatMoney(balance, context.baseCurrency),
      income: formatMoney(income, context.baseCurrency),
      expense: formatMoney(expense, context.baseCurrency),
    }, { balance, income, expense, currency: context.baseCurrency });
  }

  private async deleteCategory(command: CommandOf<'delete_category'>, context: ExecutionContext): Promise<ExecutionResult> {
    const categories = await this.deps.store.categories.listByUser(context.userId);
    const category = findByName(categories, c => c.name, command.slots.categoryName);
    if (!category) return fail(context.language, 'category_not_found', { name: command.slots.categoryName });

    const count = await this.deps.store.transactions.countByCategory(context.userId, category.id);
    await this.deps.store.categories.remove(context.userId, category.id);
    if (count > 0) return ok(context.language, 'category_deleted_with_transactions', { name: category.name, count }, { categoryId: category.id });
    return ok(context.language, 'category_deleted', { name: category.name }, { categoryId: category.id });
  }

  // Older command set: a bare "show debts", or "debt <person> <amount>" owed to the user
  private async manageDebt(command: CommandOf<'manage_debt'>, context: ExecutionContext): Promise<ExecutionResult> {
    const { person, amount } = command.slots;
    if (person !== undefined && amount !== undefined) {
      return recordDebt(this.deps, context, { person, amount, direction: 'owed_to_me', due: null });
    }
    return describeOpenDebts(this.deps, context);
  }

  private async showStats(context: ExecutionContext): Promise<ExecutionResult> {
    const period = monthPeriod(context.now());
    const expenses = await this.deps.store.transactions.list(context.userId, { type: 'expense', from: period.from, to: period.to });
    if (!expenses.length) return ok(context.language, 'stats_empty', {}, { total: 0 });

    const categories = await this.deps.store.categories.listByUser(context.userId);
    const names = new Map(categories.map(c => [c.id, c.name]));
    const top = totalsByCategory(expenses).slice(0, TOP_CATEGORIES).map(t => ({
      name: (t.categoryId && names.get(t.categoryId)) || '—',
      total: t.total,
    }));
    const total = sumAmounts(expenses);
    return ok(context.language, 'stats', {
      total: formatMoney(total, context.baseCurrency),
      top: top.map(t => `${t.name} ${formatMoney(t.total, context.baseCurrency)}`).join(', '),
    }, { total, top });
  }
}
