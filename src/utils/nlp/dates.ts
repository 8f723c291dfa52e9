import { parseNumberWords } from './numberParser';
import { tokenize } from './textNormalizer';

export interface Period {
  from: Date;
  // exclusive
  to: Date;
  key: PeriodKey;
}

export type PeriodKey = 'today' | 'yesterday' | 'this_week' | 'last_week' | 'this_month' | 'last_month' | 'this_year' | 'last_year' | 'days';

const DEFAULT_HOUR = 9;

const TOMORROW = /(?:^|\s)(?:завтра|ertaga|tomorrow)(?:\s|$)/u;
const DAY_AFTER = /(?:^|\s)(?:послезавтра|indinga|day\s+after\s+tomorrow)(?:\s|$)/u;
const TODAY = /(?:^|\s)(?:сегодня|bugun|today|tonight)(?:\s|$)/u;
const CLOCK = /(?:^|\s)(\d{1,2}):(\d{2})(?:\s|$)/u;
const HOUR_ONLY = /(?:^|\s)(?:в|at|soat)\s+(\d{1,2})(?:\s+(?:часов|часа|час|утра|вечера|pm|am))?(?:\s|$)/u;
const DATE = /(?:^|\s)(\d{1,2})\.(\d{1,2})(?:\.(\d{2,4}))?(?:\s|$)/u;
const IN_N = /(?:^|\s)(?:через|на|in|for)\s+(.+?)\s+(минут[уы]?|мин|час(?:а|ов)?|день|дня|дней|недел[юиь]|minutes?|mins?|hours?|days?|weeks?)(?:\s|$)/u;
const N_LATER = /(\S+)\s+(daqiqa|soat|kun|hafta)dan\s+keyin/u;
const IN_UNIT_ONLY = /(?:^|\s)(?:через|на|in|for)\s+(?:an?\s+)?(минуту|час|день|неделю|minute|hour|day|week)(?:\s|$)/u;
const EVENING = /(?:вечера|pm|kechqurun)/u;

const UNIT_MS: [RegExp, number][] = [
  [/^(?:минут|мин|minute|min|daqiqa)/u, 60_000],
  [/^(?:час|hour|soat)/u, 3_600_000],
  [/^(?:ден|дн|day|kun)/u, 86_400_000],
  [/^(?:недел|week|hafta)/u, 7 * 86_400_000],
];

function unitMs(unit: string): number | null {
  for (const [re, ms] of UNIT_MS) if (re.test(unit)) return ms;
  return null;
}

function count(phrase: string): number | null {
  const trimmed = phrase.trim();
  if (/^\d+$/.test(trimmed)) return Number(trimmed);
  return parseNumberWords(tokenize(trimmed));
}

function startOfDay(date: Date): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate());
}

function addDays(date: Date, days: number): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate() + days, date.getHours(), date.getMinutes());
}

function atTime(day: Date, hours: number, minutes: number): Date | null {
  if (hours > 23 || minutes > 59) return null;
  return new Date(day.getFullYear(), day.getMonth(), day.getDate(), hours, minutes);
}

function clockOf(text: string): { hours: number; minutes: number } | null {
  const clock = CLOCK.exec(text);
  if (clock) return { hours: Number(clock[1]), minutes: Number(clock[2]) };
  const hour = HOUR_ONLY.exec(text);
  if (hour) {
    let hours = Number(hour[1]);
    if (EVENING.test(text) && hours < 12) hours += 12;
    return { hours, minutes: 0 };
  }
  return null;
}

/**
 * Parses a relative or absolute moment ("завтра в 18:30", "in 2 hours",
 * "3 soatdan keyin", "31.12") against `now`. Returns null when nothing in the
 * phrase reads as a time.
 */
export function parseWhen(phrase: string, now: Date): Date | null {
  const text = phrase.toLowerCase().trim();
  if (!text) return null;

  const relative = IN_N.exec(text) ?? N_LATER.exec(text);
  if (relative) {
    const n = count(relative[1]);
    const ms = unitMs(relative[2]);
    if (n !== null && ms !== null) return new Date(now.getTime() + n * ms);
  }
  const single = IN_UNIT_ONLY.exec(text);
  if (single) {
    const ms = unitMs(single[1]);
    if (ms !== null) return new Date(now.getTime() + ms);
  }

  const clock = clockOf(text);
  let day: Date | null = null;
  if (DAY_AFTER.test(text)) day = addDays(startOfDay(now), 2);
  else if (TOMORROW.test(text)) day = addDays(startOfDay(now), 1);
  else if (TODAY.test(text)) day = startOfDay(now);

  const date = DATE.exec(text);
  if (!day && date) {
    const dd = Number(date[1]);
    const mm = Number(date[2]);
    if (mm < 1 || mm > 12 || dd < 1 || dd > 31) return null;
    let year = date[3] ? Number(date[3]) : now.getFullYear();
    if (year < 100) year += 2000;
    day = new Date(year, mm - 1, dd);
    // a bare day and month already behind us means next year
    if (!date[3] && day.getTime() < startOfDay(now).getTime()) day = new Date(year + 1, mm - 1, dd);
    // 31.02 and 29.02 outside a leap year roll into the next month
    if (day.getDate() !== dd) return null;
  }

  if (day) return atTime(day, clock?.hours ?? DEFAULT_HOUR, clock?.minutes ?? 0);
  if (clock) {
    const today = atTime(startOfDay(now), clock.hours, clock.minutes);
    if (!today) return null;
    return today.getTime() > now.getTime() ? today : addDays(today, 1);
  }
  return null;
}

const PERIODS: [RegExp, PeriodKey][] = [
  [/(?:^|\s)(?:сегодня|bugun|today)(?:\s|$)/u, 'today'],
  [/(?:^|\s)(?:вчера|kecha|yesterday)(?:\s|$)/u, 'yesterday'],
  [/(?:прошл\S*|oʻtgan|last|past)\s+(?:неделю|неделе|недел\S*|hafta|week)/u, 'last_week'],
  [/(?:прошл\S*|oʻtgan|last|past)\s+(?:месяц\S*|oy|month)/u, 'last_month'],
  [/(?:прошл\S*|oʻtgan|last|past)\s+(?:год\S*|yil|year)/u, 'last_year'],
  [/(?:^|\s)(?:неделю|неделе|недел\S*|hafta|week)(?:\s|$)/u, 'this_week'],
  [/(?:^|\s)(?:месяц\S*|oy|month)(?:\s|$)/u, 'this_month'],
  [/(?:^|\s)(?:год\S*|yil|year)(?:\s|$)/u, 'this_year'],
];

const LAST_DAYS = /(\d+)\s+(?:дн(?:ей|я)|день|kun|days?)/u;

/** Reads an analytics period ("за прошлый месяц", "last 7 days", "bu hafta") into a date range. */
export function parsePeriod(phrase: string, now: Date): Period | null {
  const text = phrase.toLowerCase().trim();
  if (!text) return null;
  const today = startOfDay(now);

  const days = LAST_DAYS.exec(text);
  if (days) {
    const n = Number(days[1]);
    if (n <= 0) return null;
    return { from: addDays(today, -(n - 1)), to: addDays(today, 1), key: 'days' };
  }

  const entry = PERIODS.find(([re]) => re.test(text));
  if (!entry) return null;
  const key = entry[1];
  const monday = addDays(today, -((today.getDay() + 6) % 7));
  switch (key) {
    case 'today':
      return { from: today, to: addDays(today, 1), key };
    case 'yesterday':
      return { from: addDays(today, -1), to: today, key };
    case 'this_week':
      return { from: monday, to: addDays(monday, 7), key };
    case 'last_week':
      return { from: addDays(monday, -7), to: monday, key };
    case 'this_month':
      return { from: new Date(now.getFullYear(), now.getMonth(), 1), to: new Date(now.getFullYear(), now.getMonth() + 1, 1), key };
    case 'last_month':
      return { from: new Date(now.getFullYear(), now.getMonth() - 1, 1), to: new Date(now.getFullYear(), now.getMonth(), 1), key };
    case 'this_year':
      return { from: new Date(now.getFullYear(), 0, 1), to: new Date(now.getFullYear() + 1, 0, 1), key };
    case 'last_year':
      return { from: new Date(now.getFullYear() - 1, 0, 1), to: new Date(now.getFullYear(), 0, 1), key };
    case 'days':
      return null;
  }
}

export function monthPeriod(now: Date, monthsBack = 0): Period {
  return {
    from: new Date(now.getFullYear(), now.getMonth() - monthsBack, 1),
    to: new Date(now.getFullYear(), now.getMonth() - monthsBack + 1, 1),
    key: monthsBack === 0 ? 'this_month' : 'last_month',
  };
}
