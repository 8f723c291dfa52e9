import type { ExecutionContext, ExecutionResult, Intent, Money, ParsedCommand } from '../../../types';
import { convertWithFallback } from '../../currency';
import { capitalize, formatMoney } from '../messages';
import { grammar, GrammarMatch, parseGrammar } from './grammar';
import { CommandExecutor, ExecutorDeps, fail, findByName, ok } from './shared';

type SourceRequest =
  | { action: 'list' }
  | { action: 'delete'; name: string }
  | { action: 'rename'; name: string; newName: string };

interface Income {
  source: string;
  amount: Money;
}

function namedSource(m: GrammarMatch): string | null {
  return m.text('name') ?? null;
}

const listSources = (): SourceRequest => ({ action: 'list' });

function deleteSource(m: GrammarMatch): SourceRequest | null {
  const name = m.text('name');
  return name ? { action: 'delete', name } : null;
}

function renameSource(m: GrammarMatch): SourceRequest | null {
  const name = m.text('name');
  const newName = m.text('newName');
  return name && newName ? { action: 'rename', name, newName } : null;
}

function income(m: GrammarMatch): Income | null {
  const source = m.text('source');
  const amount = m.money();
  return source && amount ? { source, amount } : null;
}

const CREATE = grammar<string>({
  ru: [
    [String.raw`(?:создай|добавь)\s+(?:новый\s+)?источник\s+(?:дохода\s+)?(?<name>.+)$`, namedSource],
    [String.raw`новый\s+источник\s+(?:дохода\s+)?(?<name>.+)$`, namedSource],
    [String.raw`источник\s+(?<name>.+?)\s+создай$`, namedSource],
  ],
  uz: [
    [String.raw`(?<name>.+?)\s+manba\s+yarat`, namedSource],
    [String.raw`yangi\s+(?:daromad\s+)?manba(?:si)?\s+(?<name>.+)$`, namedSource],
    [String.raw`^daromad\s+manbasi\s+(?<name>.+)$`, namedSource],
  ],
  en: [
    [String.raw`(?:create|add)\s+(?:an?\s+)?(?:new\s+)?(?:income\s+)?source\s+(?<name>.+)$`, namedSource],
    [String.raw`new\s+(?:income\s+)?source\s+(?<name>.+)$`, namedSource],
  ],
});

const MANAGE = grammar<SourceRequest>({
  ru: [
    [String.raw`переименуй\s+источник\s+(?<name>.+?)\s+в\s+(?<newName>.+)$`, renameSource],
    [String.raw`(?:удали|убери)\s+источник\s+(?<name>.+)$`, deleteSource],
    [String.raw`покажи\s+(?:мои\s+)?источники|^источники\s+доходов?$`, listSources],
  ],
  uz: [
    [String.raw`(?<name>.+?)\s+manbani\s+oʻchir`, deleteSource],
    [String.raw`manbalarni\s+koʻrsat|^daromad\s+manbalari$`, listSources],
  ],
  en: [
    [String.raw`rename\s+(?:income\s+)?source\s+(?<name>.+?)\s+to\s+(?<newName>.+)$`, renameSource],
    [String.raw`(?:delete|remove)\s+(?:income\s+)?source\s+(?<name>.+)$`, deleteSource],
    [String.raw`show\s+(?:my\s+)?(?:income\s+)?sources|^income\s+sources$`, listSources],
  ],
});

const ADD_INCOME = grammar<Income>({
  ru: [
    [String.raw`(?:добавь\s+доход|получил[аи]?|пришл[оаи])\s+{AMOUNT}{CUR}\s+(?:с|от|из)\s+(?<source>.+)$`, income],
    [String.raw`^доход\s+{AMOUNT}{CUR}\s+(?:(?:с|от)\s+)?(?<source>.+)$`, income],
  ],
  uz: [
    [String.raw`(?<source>.+?)dan\s+{AMOUNT}{CUR}\s+daromad\s+qoʻsh`, income],
    [String.raw`{AMOUNT}{CUR}\s+(?<source>.+?)dan\s+oldim`, income],
    [String.raw`^daromad\s+{AMOUNT}{CUR}\s+(?<source>.+)$`, income],
  ],
  en: [
    [String.raw`(?:add\s+income|received|got\s+paid)\s+{AMOUNT}{CUR}\s+(?:from|by)\s+(?<source>.+)$`, income],
    [String.raw`^income\s+{AMOUNT}{CUR}\s+(?:from\s+)?(?<source>.+)$`, income],
  ],
});

/** Income sources and income records. */
export class SourceExecutor implements CommandExecutor {
  readonly intents: readonly Intent[] = ['create_source', 'manage_sources', 'add_income'];

  constructor(private readonly deps: ExecutorDeps) {}

  async execute(command: ParsedCommand, context: ExecutionContext): Promise<ExecutionResult> {
    switch (command.intent) {
      case 'create_source':
        return this.create(command, context);
      case 'manage_sources':
        return this.manage(command, context);
      case 'add_income':
        return this.addIncome(command, context);
      default:
        throw new Error(`SourceExecutor cannot handle ${command.intent}`);
    }
  }

  private async create(command: ParsedCommand, context: ExecutionContext): Promise<ExecutionResult> {
    const parsed = parseGrammar(CREATE, command.utterance, context.baseCurrency);
    if (!parsed) return fail(context.language, 'command_unparsed', {}, { intent: command.intent });
    const name = capitalize(parsed);
    const created = await this.deps.store.sources.create(context.userId, name);
    if (!created) return fail(context.language, 'source_exists', { name });
    return ok(context.language, 'source_created', { name }, { sourceId: created.id });
  }

  private async manage(command: ParsedCommand, context: ExecutionContext): Promise<ExecutionResult> {
    const request = parseGrammar(MANAGE, command.utterance, context.baseCurrency);
    if (!request) return fail(context.language, 'command_unparsed', {}, { intent: command.intent });
    const sources = await this.deps.store.sources.listActive(context.userId);

    if (request.action === 'list') {
      if (!sources.length) return ok(context.language, 'sources_empty', {}, { sources: [] });
      return ok(context.language, 'sources_list', { list: sources.map(s => s.name).join(', ') }, { sources });
    }

    const source = findByName(sources, s => s.name, request.name);
    if (!source) return fail(context.language, 'source_not_found', { name: capitalize(request.name) });

    if (request.action === 'rename') {
      const renamed = capitalize(request.newName);
      await this.deps.store.sources.rename(context.userId, source.id, renamed);
      return ok(context.language, 'source_renamed', { name: source.name, newName: renamed }, { sourceId: source.id });
    }
    await this.deps.store.sources.deactivate(context.userId, source.id);
    return ok(context.language, 'source_deleted', { name: source.name }, { sourceId: source.id });
  }

  // unknown sources are created on the fly
  private async addIncome(command: ParsedCommand, context: ExecutionContext): Promise<ExecutionResult> {
    const parsed = parseGrammar(ADD_INCOME, command.utterance, context.baseCurrency);
    if (!parsed) return fail(context.language, 'command_unparsed', {}, { intent: command.intent });
    const { source: sourceName, amount } = parsed;
    if (amount.amount <= 0) return fail(context.language, 'bad_amount');

    const sources = await this.deps.store.sources.listActive(context.userId);
    let source = findByName(sources, s => s.name, sourceName);
    if (!source) {
      source = await this.deps.store.sources.create(context.userId, capitalize(sourceName));
      if (!source) return fail(context.language, 'source_exists', { name: capitalize(sourceName) });
    }

    const converted = await convertWithFallback(this.deps.rates, amount.amount, amount.currency, context.baseCurrency);
    const tx = await this.deps.store.transactions.create({
      userId: context.userId,
      type: 'income',
      amount: converted,
      originalAmount: amount.amount,
      originalCurrency: amount.currency,
      categoryId: null,
      sourceId: source.id,
      description: source.name,
      createdAt: context.now(),
    });

    const data = { transactionId: tx.id, sourceId: source.id, amount: converted, currency: context.baseCurrency };
    if (amount.currency !== context.baseCurrency) {
      return ok(context.language, 'income_added_converted', {
        amount: formatMoney(converted, context.baseCurrency),
        original: formatMoney(amount.amount, amount.currency),
        source: source.name,
      }, data);
    }
    return ok(context.language, 'income_added', { amount: formatMoney(converted, context.baseCurrency), source: source.name }, data);
  }
}
