import type {
  DebtDirection,
  DebtRecord,
  ExecutionContext,
  ExecutionResult,
  Intent,
  Money,
  ParsedCommand,
} from '../../../types';
import { parseWhen } from '../dates';
import { capitalize, formatDate, formatMessage, formatMoney } from '../messages';
import { grammar, GrammarMatch, parseGrammar } from './grammar';
import { CommandExecutor, ExecutorDeps, fail, findByName, ok } from './shared';

interface NewDebt {
  person: string;
  amount: Money;
  direction: DebtDirection;
  due?: string;
}

type DebtRequest =
  | { action: 'list'; only?: DebtDirection }
  | { action: 'overdue' }
  | { action: 'repay'; person: string; amount: Money }
  | { action: 'close'; person: string };

function newDebt(direction: DebtDirection) {
  return (m: GrammarMatch): NewDebt | null => {
    const person = m.text('person');
    const amount = m.money();
    return person && amount ? { person, amount, direction, due: m.text('due') } : null;
  };
}

const lent = newDebt('owed_to_me');
const borrowed = newDebt('i_owe');

function listDebts(only?: DebtDirection) {
  return (): DebtRequest => ({ action: 'list', only });
}

const overdue = (): DebtRequest => ({ action: 'overdue' });

function repay(m: GrammarMatch): DebtRequest | null {
  const person = m.text('person');
  const amount = m.money();
  return person && amount ? { action: 'repay', person, amount } : null;
}

function settle(m: GrammarMatch): DebtRequest | null {
  const person = m.text('person');
  return person ? { action: 'close', person } : null;
}

const CREATE = grammar<NewDebt>({
  ru: [
    [String.raw`(?:дал[аи]?|одолжил[аи]?)\s+в\s+долг\s+(?<person>.+?)\s+{AMOUNT}{CUR}(?:\s+до\s+(?<due>.+))?$`, lent],
    [String.raw`(?:дал[аи]?|одолжил[аи]?)\s+{AMOUNT}{CUR}\s+в\s+долг\s+(?<person>.+?)(?:\s+до\s+(?<due>.+))?$`, lent],
    [String.raw`(?:взял[аи]?\s+в\s+долг|занял[аи]?)\s+у\s+(?<person>.+?)\s+{AMOUNT}{CUR}(?:\s+до\s+(?<due>.+))?$`, borrowed],
    [String.raw`(?:взял[аи]?|занял[аи]?)\s+{AMOUNT}{CUR}\s+(?:в\s+долг\s+)?у\s+(?<person>.+?)(?:\s+до\s+(?<due>.+))?$`, borrowed],
    [String.raw`(?:одолжил[аи]?|добавь\s+долг)\s+(?<person>.+?)\s+{AMOUNT}{CUR}(?:\s+до\s+(?<due>.+))?$`, lent],
  ],
  uz: [
    [String.raw`(?<person>.+?)ga\s+{AMOUNT}{CUR}\s+qarz\s+berdim`, lent],
    [String.raw`(?<person>.+?)dan\s+{AMOUNT}{CUR}\s+qarz\s+oldim`, borrowed],
    [String.raw`^qarz\s+(?<person>.+?)\s+{AMOUNT}{CUR}`, lent],
  ],
  en: [
    [String.raw`lent\s+{AMOUNT}{CUR}\s+to\s+(?<person>.+?)(?:\s+until\s+(?<due>.+))?$`, lent],
    [String.raw`lent\s+(?<person>.+?)\s+{AMOUNT}{CUR}(?:\s+until\s+(?<due>.+))?$`, lent],
    [String.raw`borrowed\s+{AMOUNT}{CUR}\s+from\s+(?<person>.+?)(?:\s+until\s+(?<due>.+))?$`, borrowed],
    [String.raw`add\s+debt\s+(?<person>.+?)\s+{AMOUNT}{CUR}`, lent],
  ],
});

const MANAGE = grammar<DebtRequest>({
  ru: [
    [String.raw`(?:верни|вернул[аи]?)\s+долг\s+(?<person>.+?)\s+(?:частично\s+)?{AMOUNT}{CUR}$`, repay],
    [String.raw`(?<person>.+?)\s+вернул[аи]?\s+(?:мне\s+)?(?:долг\s+)?{AMOUNT}{CUR}$`, repay],
    [String.raw`(?:вернул[аи]?|закрой)\s+долг\s+(?:(?:с|у)\s+)?(?<person>.+)$`, settle],
    [String.raw`долг\s+(?<person>.+?)\s+погашен`, settle],
    [String.raw`просроченные\s+долги`, overdue],
    [String.raw`(?:^|покажи\s+)(?:кто|что)\s+(?:мне\s+)?должен`, listDebts('owed_to_me')],
    [String.raw`кому\s+(?:я\s+)?должен`, listDebts('i_owe')],
    [String.raw`мои\s+долги`, listDebts()],
  ],
  uz: [
    [String.raw`(?<person>.+?)ga\s+qarzni\s+(?:qisman\s+)?{AMOUNT}{CUR}\s+qaytardim`, repay],
    [String.raw`(?<person>.+?)\s+bilan\s+qarzni\s+yop`, settle],
    [String.raw`muddati\s+oʻtgan\s+qarzlar`, overdue],
    [String.raw`kim\s+menga\s+qarzdor`, listDebts('owed_to_me')],
    [String.raw`kimga\s+qarzman`, listDebts('i_owe')],
    [String.raw`mening\s+qarzlarim`, listDebts()],
  ],
  en: [
    [String.raw`(?:partially\s+)?(?:paid\s+back|returned)\s+(?<person>.+?)\s+{AMOUNT}{CUR}$`, repay],
    [String.raw`(?<person>.+?)\s+(?:paid\s+me\s+back|returned\s+me)\s+{AMOUNT}{CUR}$`, repay],
    [String.raw`close\s+debt\s+(?:with|to)\s+(?<person>.+)$`, settle],
    [String.raw`overdue\s+debts`, overdue],
    [String.raw`who\s+owes\s+me`, listDebts('owed_to_me')],
    [String.raw`who\s+(?:do\s+)?i\s+owe`, listDebts('i_owe')],
    [String.raw`my\s+debts`, listDebts()],
  ],
});

function describe(debts: readonly DebtRecord[]): string {
  return debts
    .map(d => `${d.person} ${formatMoney(d.remaining, d.currency)}${d.dueDate ? ` (${formatDate(d.dueDate)})` : ''}`)
    .join(', ');
}

export async function recordDebt(
  deps: ExecutorDeps,
  context: ExecutionContext,
  input: { person: string; amount: Money; direction: DebtDirection; due: Date | null },
): Promise<ExecutionResult> {
  if (input.amount.amount <= 0) return fail(context.language, 'bad_amount');
  const person = capitalize(input.person);
  const debt = await deps.store.debts.create({
    userId: context.userId,
    person,
    direction: input.direction,
    amount: input.amount.amount,
    currency: input.amount.currency,
    dueDate: input.due,
    createdAt: context.now(),
  });
  const key = input.direction === 'owed_to_me' ? 'debt_created_owed_to_me' : 'debt_created_i_owe';
  return ok(context.language, key, { person, amount: formatMoney(debt.amount, debt.currency) }, { debtId: debt.id, direction: debt.direction });
}

/** Lists open debts in both directions, one sentence per direction. */
export async function describeOpenDebts(deps: ExecutorDeps, context: ExecutionContext, only?: DebtDirection): Promise<ExecutionResult> {
  const open = await deps.store.debts.listOpen(context.userId, only);
  if (!open.length) return ok(context.language, 'debts_empty', {}, { debts: [] });

  const parts: string[] = [];
  const toMe = open.filter(d => d.direction === 'owed_to_me');
  const fromMe = open.filter(d => d.direction === 'i_owe');
  if (toMe.length) parts.push(formatMessage(context.language, 'debts_owed_to_me', { list: describe(toMe) }));
  if (fromMe.length) parts.push(formatMessage(context.language, 'debts_i_owe', { list: describe(fromMe) }));
  return { success: true, message: parts.join(' '), data: { debts: open } };
}

/** Debts: create in either direction, list, overdue, repay partially, close. */
export class DebtExecutor implements CommandExecutor {
  readonly intents: readonly Intent[] = ['create_debt', 'manage_debts'];

  constructor(private readonly deps: ExecutorDeps) {}

  async execute(command: ParsedCommand, context: ExecutionContext): Promise<ExecutionResult> {
    switch (command.intent) {
      case 'create_debt':
        return this.create(command, context);
      case 'manage_debts':
        return this.manage(command, context);
      default:
        throw new Error(`DebtExecutor cannot handle ${command.intent}`);
    }
  }

  private async create(command: ParsedCommand, context: ExecutionContext): Promise<ExecutionResult> {
    const request = parseGrammar(CREATE, command.utterance, context.baseCurrency);
    if (!request) return fail(context.language, 'command_unparsed', {}, { intent: command.intent });
    const { person, amount, direction, due } = request;
    let dueDate: Date | null = null;
    if (due !== undefined) {
      dueDate = parseWhen(due, context.now());
      if (!dueDate) return fail(context.language, 'bad_date', { value: due });
    }
    return recordDebt(this.deps, context, { person, amount, direction, due: dueDate });
  }

  private async manage(command: ParsedCommand, context: ExecutionContext): Promise<ExecutionResult> {
    const request = parseGrammar(MANAGE, command.utterance, context.baseCurrency);
    if (!request) return fail(context.language, 'command_unparsed', {}, { intent: command.intent });

    if (request.action === 'repay' || request.action === 'close') {
      const open = await this.deps.store.debts.listOpen(context.userId);
      const debt = findByName(open, d => d.person, request.person);
      if (!debt) return fail(context.language, 'debt_not_found', { person: capitalize(request.person) });

      if (request.action === 'repay') {
        const { amount } = request;
        if (amount.amount <= 0) return fail(context.language, 'bad_amount');
        const updated = await this.deps.store.debts.applyPayment(context.userId, debt.id, amount.amount);
        if (!updated) return fail(context.language, 'debt_not_found', { person: debt.person });
        if (updated.status === 'closed') return ok(context.language, 'debt_closed', { person: debt.person }, { debtId: debt.id, remaining: 0 });
        return ok(context.language, 'debt_repaid', {
          amount: formatMoney(amount.amount, debt.currency),
          person: debt.person,
          remaining: formatMoney(updated.remaining, debt.currency),
        }, { debtId: debt.id, remaining: updated.remaining, direction: debt.direction });
      }

      await this.deps.store.debts.close(context.userId, debt.id);
      return ok(context.language, 'debt_closed', { person: debt.person }, { debtId: debt.id });
    }

    if (request.action === 'overdue') {
      const now = context.now().getTime();
      const overdue = (await this.deps.store.debts.listOpen(context.userId)).filter(d => d.dueDate !== null && d.dueDate.getTime() < now);
      if (!overdue.length) return ok(context.language, 'debts_overdue_empty', {}, { debts: [] });
      return ok(context.language, 'debts_overdue', { list: describe(overdue) }, { debts: overdue });
    }
    return describeOpenDebts(this.deps, context, request.only);
  }
}
