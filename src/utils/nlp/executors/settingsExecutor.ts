import {
  ExecutionContext,
  ExecutionResult,
  Intent,
  Language,
  NOTIFICATION_TOPICS,
  NotificationTopic,
  ParsedCommand,
} from '../../../types';
import { currencyInPhrase } from '../../currency';
import { formatMessage } from '../messages';
import { normalizeText, tokenize } from '../textNormalizer';
import { grammar, GrammarMatch, parseGrammar } from './grammar';
import { CommandExecutor, ExecutorDeps, fail, ok } from './shared';

// Stems of language names as users say them in any of the three languages
const LANGUAGE_STEMS: [string, Language][] = [
  ['рус', 'ru'], ['rus', 'ru'],
  ['узб', 'uz'], ['oʻzb', 'uz'], ['ozb', 'uz'], ['uzb', 'uz'],
  ['англ', 'en'], ['ingl', 'en'], ['engl', 'en'],
];

const TOPIC_STEMS: [string, NotificationTopic][] = [
  ['напомин', 'reminders'], ['eslatm', 'reminders'], ['remind', 'reminders'],
  ['цел', 'goals'], ['maqsad', 'goals'], ['goal', 'goals'],
  ['долг', 'debts'], ['qarz', 'debts'], ['debt', 'debts'],
  ['бюджет', 'budget'], ['budjet', 'budget'], ['budget', 'budget'],
  ['отч', 'reports'], ['hisobot', 'reports'], ['report', 'reports'],
];

const ALL_TOPICS = /(?:^|\s)(?:все|всех|всё|barcha|hammasi|all|everything)(?:\s|$)/u;
const TURN_OFF = /^(?:отключ|выключ|oʻchir|disable|off)/u;

type NotificationRequest = { action: 'status' } | { action: 'toggle'; topic: string; enabled: boolean };

const phrase = (group: string) => (m: GrammarMatch): string | null => m.text(group) ?? null;

const showStatus = (): NotificationRequest => ({ action: 'status' });

function toggleTopic(m: GrammarMatch): NotificationRequest | null {
  const topic = m.text('topic');
  const toggle = m.text('toggle');
  return topic && toggle ? { action: 'toggle', topic, enabled: !TURN_OFF.test(toggle) } : null;
}

const CURRENCY = grammar<string>({
  ru: [
    [String.raw`(?:смени|поменяй|измени|установи|поставь)\s+(?:основную\s+)?валюту\s+(?:на\s+)?(?<currency>.+)$`, phrase('currency')],
    [String.raw`^валюта\s+(?<currency>.+)$`, phrase('currency')],
  ],
  uz: [
    [String.raw`valyutani\s+(?<currency>.+?)ga\s+oʻzgartir`, phrase('currency')],
    [String.raw`(?<currency>.+?)\s+valyuta\s+qoʻy`, phrase('currency')],
    [String.raw`^valyuta\s+(?<currency>.+)$`, phrase('currency')],
  ],
  en: [
    [String.raw`(?:change|set|switch)\s+(?:the\s+)?(?:base\s+)?currency\s+(?:to\s+)?(?<currency>.+)$`, phrase('currency')],
    [String.raw`^currency\s+(?<currency>.+)$`, phrase('currency')],
  ],
});

const LANGUAGE = grammar<string>({
  ru: [
    [String.raw`(?:поменяй|смени|измени|установи)\s+язык\s+на\s+(?<language>.+)$`, phrase('language')],
    [String.raw`переключи(?:сь)?\s+на\s+(?<language>.+?)(?:\s+язык)?$`, phrase('language')],
    [String.raw`^язык\s+(?<language>.+)$`, phrase('language')],
  ],
  uz: [
    [String.raw`tilni\s+(?<language>.+?)ga\s+oʻzgartir`, phrase('language')],
    [String.raw`(?<language>.+?)\s+tilga\s+oʻt`, phrase('language')],
    [String.raw`^til\s+(?<language>.+)$`, phrase('language')],
  ],
  en: [
    [String.raw`(?:change|switch|set)\s+(?:the\s+)?language\s+to\s+(?<language>.+)$`, phrase('language')],
    [String.raw`^switch\s+to\s+(?<language>.+)$`, phrase('language')],
    [String.raw`^language\s+(?<language>.+)$`, phrase('language')],
  ],
});

const NOTIFICATIONS = grammar<NotificationRequest>({
  ru: [
    [String.raw`(?<toggle>включи(?:ть)?|отключи(?:ть)?|выключи(?:ть)?)\s+(?:уведомления|напоминания|оповещения)\s+(?:о|об|про)\s+(?<topic>.+)$`, toggleTopic],
    [String.raw`(?:уведомления|напоминания)\s+(?<topic>.+?)\s+(?<toggle>включи|отключи|выключи)$`, toggleTopic],
    [String.raw`настрой\s+уведомления|(?:покажи\s+)?настройки\s+уведомлений`, showStatus],
  ],
  uz: [
    [String.raw`(?<topic>.+?)\s+haqida\s+bildirishnomalarni\s+(?<toggle>yoq|oʻchir)`, toggleTopic],
    [String.raw`bildirishnomalar\s+sozlamalari`, showStatus],
  ],
  en: [
    [String.raw`(?<toggle>enable|disable)\s+notifications?\s+(?:for|about)\s+(?<topic>.+)$`, toggleTopic],
    [String.raw`turn\s+(?<toggle>on|off)\s+(?<topic>.+?)\s+notifications?$`, toggleTopic],
    [String.raw`notification\s+settings`, showStatus],
  ],
});

export function resolveLanguage(phrase: string): Language | null {
  for (const token of tokenize(normalizeText(phrase))) {
    if (token === 'ru' || token === 'uz' || token === 'en') return token;
    const hit = LANGUAGE_STEMS.find(([stem]) => token.startsWith(stem));
    if (hit) return hit[1];
  }
  return null;
}

export function resolveTopics(phrase: string): NotificationTopic[] {
  const text = normalizeText(phrase);
  if (ALL_TOPICS.test(text)) return [...NOTIFICATION_TOPICS];
  const found = new Set<NotificationTopic>();
  for (const token of tokenize(text)) {
    const hit = TOPIC_STEMS.find(([stem]) => token.startsWith(stem));
    if (hit) found.add(hit[1]);
  }
  return [...found];
}

/** Base currency, interface language and notification switches. */
export class SettingsExecutor implements CommandExecutor {
  readonly intents: readonly Intent[] = ['change_currency', 'change_language', 'manage_notifications'];

  constructor(private readonly deps: ExecutorDeps) {}

  async execute(command: ParsedCommand, context: ExecutionContext): Promise<ExecutionResult> {
    switch (command.intent) {
      case 'change_currency':
        return this.changeCurrency(command, context);
      case 'change_language':
        return this.changeLanguage(command, context);
      case 'manage_notifications':
        return this.manageNotifications(command, context);
      default:
        throw new Error(`SettingsExecutor cannot handle ${command.intent}`);
    }
  }

  private async changeCurrency(command: ParsedCommand, context: ExecutionContext): Promise<ExecutionResult> {
    const requested = parseGrammar(CURRENCY, command.utterance, context.baseCurrency);
    if (!requested) return fail(context.language, 'command_unparsed', {}, { intent: command.intent });
    const currency = currencyInPhrase(requested);
    if (!currency) return fail(context.language, 'unknown_currency', { value: requested });
    await this.deps.store.settings.update(context.userId, { currency });
    return ok(context.language, 'currency_changed', { currency }, { currency });
  }

  // Confirms in the newly selected language
  private async changeLanguage(command: ParsedCommand, context: ExecutionContext): Promise<ExecutionResult> {
    const requested = parseGrammar(LANGUAGE, command.utterance, context.baseCurrency);
    if (!requested) return fail(context.language, 'command_unparsed', {}, { intent: command.intent });
    const language = resolveLanguage(requested);
    if (!language) return fail(context.language, 'unknown_language', { value: requested });
    await this.deps.store.settings.update(context.userId, { language });
    return ok(language, 'language_changed', {}, { language });
  }

  private async manageNotifications(command: ParsedCommand, context: ExecutionContext): Promise<ExecutionResult> {
    const lang = context.language;
    const request = parseGrammar(NOTIFICATIONS, command.utterance, context.baseCurrency);
    if (!request) return fail(lang, 'command_unparsed', {}, { intent: command.intent });

    if (request.action === 'status') {
      const settings = await this.deps.store.settings.get(context.userId);
      const list = NOTIFICATION_TOPICS
        .map(t => `${formatMessage(lang, `topic_${t}`)}: ${formatMessage(lang, settings.notifications[t] ? 'state_on' : 'state_off')}`)
        .join(', ');
      return ok(lang, 'notifications_status', { list }, { notifications: settings.notifications });
    }

    const { topic, enabled } = request;
    const topics = resolveTopics(topic);
    if (!topics.length) return fail(lang, 'unknown_topic', { value: topic });
    const notifications: Partial<Record<NotificationTopic, boolean>> = {};
    for (const t of topics) notifications[t] = enabled;
    const settings = await this.deps.store.settings.update(context.userId, { notifications });

    const label = topics.length === NOTIFICATION_TOPICS.length
      ? formatMessage(lang, 'topic_all')
      : topics.map(t => formatMessage(lang, `topic_${t}`)).join(', ');
    return ok(lang, enabled ? 'notification_on' : 'notification_off', { topic: label }, { notifications: settings.notifications });
  }
}
