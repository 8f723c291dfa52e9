import type { ExecutionContext, ExecutionResult, Intent, ParsedCommand } from '../../../types';
import { parseWhen } from '../dates';
import { capitalize, formatDateTime } from '../messages';
import { grammar, GrammarMatch, parseGrammar } from './grammar';
import { CommandExecutor, ExecutorDeps, fail, findByName, ok } from './shared';

interface NewReminder {
  title: string;
  when?: string;
}

type ReminderRequest =
  | { action: 'list' }
  | { action: 'postpone'; title: string; when: string }
  | { action: 'complete' | 'delete'; title: string };

// Time phrases that may open a reminder ("напомни завтра в 10:00 ...")
const RU_TIME = String.raw`(?:завтра|сегодня|послезавтра)(?:\s+в\s+\d{1,2}(?::\d{2})?)?|через\s+(?:\S+\s+)?(?:минут\S*|час\S*|день|дн\S*|недел\S*)|в\s+\d{1,2}(?::\d{2})?`;
const UZ_TIME = String.raw`(?:ertaga|bugun|indinga)(?:\s+soat\s+\d{1,2}(?::\d{2})?)?|soat\s+\d{1,2}(?::\d{2})?|\S+\s+(?:daqiqa|soat|kun|hafta)dan\s+keyin`;
const EN_TIME = String.raw`(?:tomorrow|today|tonight)(?:\s+at\s+\d{1,2}(?::\d{2})?(?:\s+(?:am|pm))?)?|in\s+(?:\S+\s+)?(?:minutes?|mins?|hours?|days?|weeks?)|at\s+\d{1,2}(?::\d{2})?(?:\s+(?:am|pm))?`;

function newReminder(m: GrammarMatch): NewReminder | null {
  const title = m.text('title');
  return title ? { title, when: m.text('when') } : null;
}

const listReminders = (): ReminderRequest => ({ action: 'list' });

function postpone(m: GrammarMatch): ReminderRequest | null {
  const title = m.text('title');
  const when = m.text('when');
  return title && when ? { action: 'postpone', title, when } : null;
}

function titled(action: 'complete' | 'delete') {
  return (m: GrammarMatch): ReminderRequest | null => {
    const title = m.text('title');
    return title ? { action, title } : null;
  };
}

const CREATE = grammar<NewReminder>({
  ru: [
    [String.raw`(?:напомни(?:\s+мне)?|(?:создай|поставь|добавь)\s+напоминание)\s+(?<when>${RU_TIME})\s+(?<title>.+)$`, newReminder],
    [String.raw`(?:создай|поставь|добавь)\s+напоминание\s+(?<title>.+?)\s+(?<when>(?:на|в|через|завтра|сегодня|послезавтра)(?:\s+.+)?)$`, newReminder],
    [String.raw`напомни(?:\s+мне)?\s+(?<title>.+?)\s+(?<when>(?:через|в|на|завтра|сегодня|послезавтра)(?:\s+.+)?)$`, newReminder],
    [String.raw`не\s+забыть\s+(?<title>.+?)\s+(?<when>(?:на|в|через|завтра|сегодня)(?:\s+.+)?)$`, newReminder],
    [String.raw`(?:добавь|создай)\s+напоминание\s+(?<title>.+)$`, newReminder],
  ],
  uz: [
    [String.raw`^(?<when>${UZ_TIME})\s+(?<title>.+?)\s+(?:haqida\s+eslatma\s+qoʻy|ni\s+eslatib\s+tur)$`, newReminder],
    [String.raw`(?<title>.+?)\s+haqida\s+(?<when>.+?)\s+eslatma\s+qoʻy`, newReminder],
    [String.raw`(?<title>.+?)\s+ni\s+(?<when>.+?)\s+eslatib\s+tur`, newReminder],
    [String.raw`eslatma\s+yarat\s+(?<title>.+)$`, newReminder],
  ],
  en: [
    [String.raw`(?:remind\s+me|create\s+reminder)\s+(?<when>${EN_TIME})\s+(?:to\s+)?(?<title>.+)$`, newReminder],
    [String.raw`create\s+reminder\s+(?<title>.+?)\s+(?<when>(?:for|on|at|in|tomorrow|today)(?:\s+.+)?)$`, newReminder],
    [String.raw`remind\s+me\s+(?:to\s+)?(?<title>.+?)\s+(?<when>(?:in|on|at|tomorrow|today)(?:\s+.+)?)$`, newReminder],
    [String.raw`set\s+reminder\s+(?<title>.+)$`, newReminder],
  ],
});

const MANAGE = grammar<ReminderRequest>({
  ru: [
    [String.raw`(?:отложи|перенеси)\s+напоминание\s+(?<title>.+?)\s+(?<when>(?:на|до)\s+.+)$`, postpone],
    [String.raw`удали\s+напоминание\s+(?<title>.+)$`, titled('delete')],
    [String.raw`(?:выполнено|выполнил[аи]?)\s+напоминание\s+(?<title>.+)$`, titled('complete')],
    [String.raw`покажи\s+(?:мои\s+)?напоминания|^(?:активные|мои)\s+напоминания`, listReminders],
  ],
  uz: [
    [String.raw`(?<title>.+?)\s+eslatmani\s+oʻchir`, titled('delete')],
    [String.raw`(?<title>.+?)\s+eslatmasi\s+bajarildi`, titled('complete')],
    [String.raw`eslatmalarimni\s+koʻrsat|^faol\s+eslatmalar`, listReminders],
  ],
  en: [
    [String.raw`postpone\s+reminder\s+(?<title>.+?)\s+(?<when>(?:to|by|for|until)\s+.+)$`, postpone],
    [String.raw`(?:delete|remove)\s+reminder\s+(?<title>.+)$`, titled('delete')],
    [String.raw`(?:complete|done|finished)\s+reminder\s+(?<title>.+)$`, titled('complete')],
    [String.raw`show\s+(?:my\s+)?reminders|^active\s+reminders`, listReminders],
  ],
});

// Reminders without a time fire the next morning
function defaultTime(now: Date): Date {
  return new Date(now.getFullYear(), now.getMonth(), now.getDate() + 1, 9, 0);
}

/** Reminders: create, list, delete, postpone, complete. */
export class ReminderExecutor implements CommandExecutor {
  readonly intents: readonly Intent[] = ['create_reminder', 'manage_reminders'];

  constructor(private readonly deps: ExecutorDeps) {}

  async execute(command: ParsedCommand, context: ExecutionContext): Promise<ExecutionResult> {
    switch (command.intent) {
      case 'create_reminder':
        return this.create(command, context);
      case 'manage_reminders':
        return this.manage(command, context);
      default:
        throw new Error(`ReminderExecutor cannot handle ${command.intent}`);
    }
  }

  private async create(command: ParsedCommand, context: ExecutionContext): Promise<ExecutionResult> {
    const request = parseGrammar(CREATE, command.utterance, context.baseCurrency);
    if (!request) return fail(context.language, 'command_unparsed', {}, { intent: command.intent });
    const { title, when } = request;
    const now = context.now();
    let remindAt = defaultTime(now);
    if (when !== undefined) {
      const parsed = parseWhen(when, now);
      if (!parsed) return fail(context.language, 'bad_date', { value: when });
      remindAt = parsed;
    }
    const reminder = await this.deps.store.reminders.create({
      userId: context.userId,
      title: capitalize(title),
      remindAt,
      createdAt: now,
    });
    return ok(context.language, 'reminder_created', { title: reminder.title, when: formatDateTime(remindAt) }, {
      reminderId: reminder.id,
      remindAt: remindAt.toISOString(),
    });
  }

  private async manage(command: ParsedCommand, context: ExecutionContext): Promise<ExecutionResult> {
    const request = parseGrammar(MANAGE, command.utterance, context.baseCurrency);
    if (!request) return fail(context.language, 'command_unparsed', {}, { intent: command.intent });
    const reminders = await this.deps.store.reminders.listActive(context.userId);

    if (request.action === 'list') {
      if (!reminders.length) return ok(context.language, 'reminders_empty', {}, { reminders: [] });
      const list = reminders.map(r => `${r.title} (${formatDateTime(r.remindAt)})`).join(', ');
      return ok(context.language, 'reminders_list', { list }, { reminders });
    }

    const reminder = findByName(reminders, r => r.title, request.title);
    if (!reminder) return fail(context.language, 'reminder_not_found', { title: capitalize(request.title) });

    if (request.action === 'postpone') {
      const { when } = request;
      const remindAt = parseWhen(when, context.now());
      if (!remindAt) return fail(context.language, 'bad_date', { value: when });
      await this.deps.store.reminders.reschedule(context.userId, reminder.id, remindAt);
      return ok(context.language, 'reminder_postponed', { title: reminder.title, when: formatDateTime(remindAt) }, {
        reminderId: reminder.id,
        remindAt: remindAt.toISOString(),
      });
    }

    if (request.action === 'complete') {
      await this.deps.store.reminders.complete(context.userId, reminder.id);
      return ok(context.language, 'reminder_completed', { title: reminder.title }, { reminderId: reminder.id });
    }
    await this.deps.store.reminders.remove(context.userId, reminder.id);
    return ok(context.language, 'reminder_deleted', { title: reminder.title }, { reminderId: reminder.id });
  }
}
