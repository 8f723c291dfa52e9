import type { ExecutionContext, ExecutionResult, GoalRecord, Intent, Money, ParsedCommand } from '../../../types';
import { convertWithFallback, roundMoney } from '../../currency';
import { parseWhen } from '../dates';
import { capitalize, formatDate, formatMoney } from '../messages';
import { grammar, GrammarMatch, parseGrammar } from './grammar';
import { CommandExecutor, ExecutorDeps, fail, findByName, ok } from './shared';

interface NewGoal {
  name: string;
  target: Money;
  deadline?: string;
}

type GoalRequest =
  | { action: 'list' }
  | { action: 'top_up'; name: string; amount: Money }
  | { action: 'delete'; name: string }
  | { action: 'progress'; name: string };

function newGoal(m: GrammarMatch): NewGoal | null {
  const name = m.text('name');
  const target = m.money();
  return name && target ? { name, target, deadline: m.text('deadline') } : null;
}

const listGoals = (): GoalRequest => ({ action: 'list' });

function topUp(m: GrammarMatch): GoalRequest | null {
  const name = m.text('name');
  const amount = m.money();
  return name && amount ? { action: 'top_up', name, amount } : null;
}

function named(action: 'delete' | 'progress') {
  return (m: GrammarMatch): GoalRequest | null => {
    const name = m.text('name');
    return name ? { action, name } : null;
  };
}

const CREATE = grammar<NewGoal>({
  ru: [
    [String.raw`(?:создай|поставь)\s+цель\s+(?:накопить|собрать)\s+{AMOUNT}{CUR}\s+на\s+(?<name>.+?)(?:\s+до\s+(?<deadline>.+))?$`, newGoal],
    [String.raw`(?:новая|создай|поставь)\s+цель\s+(?<name>.+?)\s+{AMOUNT}{CUR}(?:\s+до\s+(?<deadline>.+))?$`, newGoal],
    [String.raw`(?:хочу\s+)?(?:накопить|собрать)\s+{AMOUNT}{CUR}\s+на\s+(?<name>.+?)(?:\s+(?:к|до)\s+(?<deadline>.+))?$`, newGoal],
  ],
  uz: [
    [String.raw`(?<name>.+?)\s+uchun\s+{AMOUNT}{CUR}\s+maqsad\s+qoʻy`, newGoal],
    [String.raw`maqsad\s+yarat\s+(?<name>.+?)\s+{AMOUNT}{CUR}`, newGoal],
    [String.raw`{AMOUNT}{CUR}\s+(?<name>.+?)\s+uchun\s+(?:jamgʻarish|yigʻish)`, newGoal],
  ],
  en: [
    [String.raw`create\s+goal\s+(?:to\s+save|for)\s+{AMOUNT}{CUR}\s+(?:for|to)\s+(?<name>.+?)(?:\s+by\s+(?<deadline>.+))?$`, newGoal],
    [String.raw`(?:set|create|new)\s+goal\s+(?<name>.+?)\s+{AMOUNT}{CUR}(?:\s+by\s+(?<deadline>.+))?$`, newGoal],
    [String.raw`save\s+{AMOUNT}{CUR}\s+for\s+(?<name>.+?)(?:\s+by\s+(?<deadline>.+))?$`, newGoal],
  ],
});

const MANAGE = grammar<GoalRequest>({
  ru: [
    [String.raw`(?:добавь|положи)\s+{AMOUNT}{CUR}\s+(?:к|в)\s+цели?\s+(?<name>.+)$`, topUp],
    [String.raw`пополни\s+цель\s+(?<name>.+?)\s+на\s+{AMOUNT}{CUR}$`, topUp],
    [String.raw`(?:удали|закрой)\s+цель\s+(?<name>.+)$`, named('delete')],
    [String.raw`(?:сколько\s+осталось\s+до|прогресс)\s+цели\s+(?<name>.+)$`, named('progress')],
    [String.raw`(?:покажи\s+(?:мои\s+)?|^мои\s+)цели`, listGoals],
  ],
  uz: [
    [String.raw`(?<name>.+?)\s+maqsadiga\s+{AMOUNT}{CUR}\s+qoʻsh`, topUp],
    [String.raw`(?<name>.+?)\s+maqsadni\s+oʻchir`, named('delete')],
    [String.raw`(?<name>.+?)\s+maqsad\s+jarayoni`, named('progress')],
    [String.raw`maqsadlarimni\s+koʻrsat`, listGoals],
  ],
  en: [
    [String.raw`add\s+{AMOUNT}{CUR}\s+to\s+(?:the\s+|my\s+)?goal\s+(?<name>.+)$`, topUp],
    [String.raw`(?:delete|close)\s+(?:the\s+)?goal\s+(?<name>.+)$`, named('delete')],
    [String.raw`goal\s+progress\s+(?:for\s+)?(?<name>.+)$`, named('progress')],
    [String.raw`show\s+(?:my\s+)?goals|^my\s+goals$`, listGoals],
  ],
});

export function goalProgress(goal: GoalRecord): { percent: number; remaining: number } {
  const percent = goal.targetAmount > 0 ? Math.min(100, Math.round((goal.currentAmount / goal.targetAmount) * 100)) : 0;
  return { percent, remaining: roundMoney(Math.max(0, goal.targetAmount - goal.currentAmount)) };
}

/** Savings goals: create, list, top up, delete, progress. */
export class GoalExecutor implements CommandExecutor {
  readonly intents: readonly Intent[] = ['create_goal', 'manage_goals'];

  constructor(private readonly deps: ExecutorDeps) {}

  async execute(command: ParsedCommand, context: ExecutionContext): Promise<ExecutionResult> {
    switch (command.intent) {
      case 'create_goal':
        return this.create(command, context);
      case 'manage_goals':
        return this.manage(command, context);
      default:
        throw new Error(`GoalExecutor cannot handle ${command.intent}`);
    }
  }

  private async create(command: ParsedCommand, context: ExecutionContext): Promise<ExecutionResult> {
    const parsed = parseGrammar(CREATE, command.utterance, context.baseCurrency);
    if (!parsed) return fail(context.language, 'command_unparsed', {}, { intent: command.intent });
    const { target: amount, deadline } = parsed;
    if (amount.amount <= 0) return fail(context.language, 'bad_amount');
    let deadlineDate: Date | null = null;
    if (deadline !== undefined) {
      deadlineDate = parseWhen(deadline, context.now());
      if (!deadlineDate) return fail(context.language, 'bad_date', { value: deadline });
    }

    const name = capitalize(parsed.name);
    const goal = await this.deps.store.goals.create({
      userId: context.userId,
      name,
      targetAmount: amount.amount,
      currency: amount.currency,
      deadline: deadlineDate,
      createdAt: context.now(),
    });
    const target = formatMoney(goal.targetAmount, goal.currency);
    if (deadlineDate) {
      return ok(context.language, 'goal_created_deadline', { name, amount: target, deadline: formatDate(deadlineDate) }, { goalId: goal.id });
    }
    return ok(context.language, 'goal_created', { name, amount: target }, { goalId: goal.id });
  }

  private async manage(command: ParsedCommand, context: ExecutionContext): Promise<ExecutionResult> {
    const request = parseGrammar(MANAGE, command.utterance, context.baseCurrency);
    if (!request) return fail(context.language, 'command_unparsed', {}, { intent: command.intent });
    const goals = await this.deps.store.goals.listActive(context.userId);

    if (request.action === 'list') {
      if (!goals.length) return ok(context.language, 'goals_empty', {}, { goals: [] });
      const list = goals
        .map(g => `${g.name} ${formatMoney(g.currentAmount, g.currency)} / ${formatMoney(g.targetAmount, g.currency)} (${goalProgress(g).percent}%)`)
        .join(', ');
      return ok(context.language, 'goals_list', { list }, { goals });
    }

    const goal = findByName(goals, g => g.name, request.name);
    if (!goal) return fail(context.language, 'goal_not_found', { name: capitalize(request.name) });

    if (request.action === 'top_up') {
      const { amount } = request;
      if (amount.amount <= 0) return fail(context.language, 'bad_amount');
      const contribution = await convertWithFallback(this.deps.rates, amount.amount, amount.currency, goal.currency);
      const updated = await this.deps.store.goals.addAmount(context.userId, goal.id, contribution);
      if (!updated) return fail(context.language, 'goal_not_found', { name: goal.name });
      const params = {
        name: goal.name,
        amount: formatMoney(contribution, goal.currency),
        current: formatMoney(updated.currentAmount, goal.currency),
        target: formatMoney(updated.targetAmount, goal.currency),
      };
      if (updated.currentAmount >= updated.targetAmount) {
        await this.deps.store.goals.setStatus(context.userId, goal.id, 'completed');
        return ok(context.language, 'goal_reached', params, { goalId: goal.id, completed: true });
      }
      return ok(context.language, 'goal_topped_up', params, { goalId: goal.id, ...goalProgress(updated) });
    }

    if (request.action === 'delete') {
      await this.deps.store.goals.setStatus(context.userId, goal.id, 'deleted');
      return ok(context.language, 'goal_deleted', { name: goal.name }, { goalId: goal.id });
    }
    const progress = goalProgress(goal);
    return ok(context.language, 'goal_progress', {
      name: goal.name,
      percent: progress.percent,
      remaining: formatMoney(progress.remaining, goal.currency),
    }, { goalId: goal.id, ...progress });
  }
}
