import messages from '../../data/messages.json';
import type { CurrencyCode, Language } from '../../types';
import { roundMoney } from '../currency';

export type MessageKey = keyof typeof messages.en;

// Every language must carry every key; the compiler checks ru and uz against en
const CATALOG: Record<Language, Record<MessageKey, string>> = messages;

type Params = Record<string, string | number>;

export function formatMessage(language: Language, key: MessageKey, params: Params = {}): string {
  return CATALOG[language][key].replace(/\{(\w+)\}/g, (whole, name: string) => {
    const value = params[name];
    return value === undefined ? whole : String(value);
  });
}

/** "12500.5" → "12 500.5" */
export function formatAmount(amount: number): string {
  const [int, frac] = roundMoney(amount).toString().split('.');
  const grouped = int.replace(/\B(?=(\d{3})+(?!\d))/g, ' ');
  return frac ? `${grouped}.${frac}` : grouped;
}

export function formatMoney(amount: number, currency: CurrencyCode): string {
  return `${formatAmount(amount)} ${currency}`;
}

/** YYYY-MM-DD HH:MM in local time */
export function formatDateTime(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

export function formatDate(date: Date): string {
  return formatDateTime(date).slice(0, 10);
}

export function capitalize(value: string): string {
  return value ? value.charAt(0).toUpperCase() + value.slice(1) : value;
}
