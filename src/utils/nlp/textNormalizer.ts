import type { Language } from '../../types';

const APOSTROPHE_RE = /['’‘`ʼ]/g;
const UZ_APOSTROPHE = 'ʻ';
// Everything but letters, digits, whitespace, currency symbols and numeric or time separators
const PUNCT_RE = /[^\p{L}\p{N}\s$€₽.,:]/gu;
const LOOSE_SEPARATOR_RE = /(?<!\d)[.,:]|[.,:](?!\d)/g;
const DIGIT_LETTER_RE = /(\d)(?=\p{L})/gu;
const SYMBOL_RE = /([$€₽])/g;

const THOUSAND_WORD: Record<Language, string> = { ru: 'тысяч', uz: 'ming', en: 'thousand' };

// Expanded wherever they stand as a separate word
const WORD_ABBREVIATIONS = new Map<string, string>([
  ['тыс', 'тысяч'],
  ['млн', 'миллион'],
  ['млрд', 'миллиард'],
  ['руб', 'рублей'],
  ['сўм', 'сум'],
  ['mln', 'million'],
  ['mlrd', 'milliard'],
  ['bn', 'billion'],
  ['mn', 'million'],
]);

// Expanded only right after a number: "5 к", "20k", "300 р"
const NUMERIC_SUFFIXES = new Map<string, (language: Language) => string>([
  ['к', () => 'тысяч'],
  ['т', () => 'тысяч'],
  ['k', (language) => THOUSAND_WORD[language]],
  ['р', () => 'рублей'],
]);

const UZ_CYRILLIC_RE = /[ўқғҳ]/;
const CYRILLIC_RE = /[а-яё]/;
const UZ_LATIN_MARKERS = ['ʻ', 'qarz', 'maqsad', 'uchun', 'ming', 'soʻm', 'xarajat', 'sarfladim', 'qoʻsh', 'koʻrsat', 'eslatma', 'daromad', 'kategoriya'];

export function normalizeText(text: string, language: Language = 'ru'): string {
  if (!text) return '';
  const cleaned = text
    .toLowerCase()
    .replace(APOSTROPHE_RE, UZ_APOSTROPHE)
    .replace(PUNCT_RE, ' ')
    .replace(LOOSE_SEPARATOR_RE, ' ')
    .replace(DIGIT_LETTER_RE, '$1 ')
    .replace(SYMBOL_RE, ' $1 ');

  const tokens = cleaned.split(/\s+/).filter(Boolean);
  const out: string[] = [];
  for (const token of tokens) {
    const prev = out[out.length - 1];
    const suffix = NUMERIC_SUFFIXES.get(token);
    if (suffix && prev !== undefined && /\d$/.test(prev)) {
      out.push(suffix(language));
      continue;
    }
    out.push(WORD_ABBREVIATIONS.get(token) ?? token);
  }
  return out.join(' ');
}

export function tokenize(text: string): string[] {
  return text.split(/\s+/).filter(Boolean);
}

export function detectLanguage(text: string): Language {
  const lower = text.toLowerCase();
  if (UZ_CYRILLIC_RE.test(lower)) return 'uz';
  if (CYRILLIC_RE.test(lower)) return 'ru';
  const normalized = lower.replace(APOSTROPHE_RE, UZ_APOSTROPHE);
  if (UZ_LATIN_MARKERS.some(marker => normalized.includes(marker))) return 'uz';
  return 'en';
}
