import dayjs from 'dayjs';
import customParseFormat from 'dayjs/plugin/customParseFormat.js';
import 'dayjs/locale/es.js';
import * as chrono from 'chrono-node';

dayjs.extend(customParseFormat);

const MIN_YEAR = 2020;
const MAX_YEARS_AHEAD = 2;

// Portals render an unset date as the Unix epoch in local time
const UNSET_DATE_SENTINELS = [/1969/, /\b1970-01-01\b/, /\b01[/-]01[/-]1970\b/];

export interface DateTemplate {
  format: string;
  locale: 'en' | 'es';
}

export const DATE_TEMPLATES: readonly DateTemplate[] = [
  { format: 'YYYY-MM-DD', locale: 'en' },
  { format: 'YYYY-MM-DD HH:mm:ss', locale: 'en' },
  { format: 'DD/MM/YYYY', locale: 'en' },
  { format: 'D/M/YYYY', locale: 'en' },
  { format: 'DD-MM-YYYY', locale: 'en' },
  { format: 'DD/MM/YYYY HH:mm', locale: 'en' },
  { format: 'MMMM D, YYYY', locale: 'en' },
  { format: 'D MMMM YYYY', locale: 'en' },
  { format: 'D [de] MMMM [de] YYYY', locale: 'es' },
];

type NumericOrder = 'ymd' | 'dmy';

const NUMERIC_PATTERNS: Array<{ regex: RegExp; order: NumericOrder }> = [
  { regex: /(\d{4})-(\d{1,2})-(\d{1,2})/g, order: 'ymd' },
  { regex: /(\d{1,2})\/(\d{1,2})\/(\d{4})/g, order: 'dmy' },
  { regex: /(\d{1,2})-(\d{1,2})-(\d{4})/g, order: 'dmy' },
  { regex: /(\d{1,2})\/(\d{1,2})\/(\d{2})(?!\d)/g, order: 'dmy' },
  { regex: /(\d{1,2})-(\d{1,2})-(\d{2})(?!\d)/g, order: 'dmy' },
];

// chrono reads these month first; the numeric patterns own them
const NUMERIC_DATE_TEXT = /\d{1,2}[/-]\d{1,2}[/-]\d{2,4}/;

const NATURAL_LANGUAGE_PARSERS = [chrono.en, chrono.es];

function isInRange(year: number, now: Date): boolean {
  return year >= MIN_YEAR && year <= now.getFullYear() + MAX_YEARS_AHEAD;
}

/** Local midnight for a calendar day, or null when the day does not exist. */
export function calendarDate(year: number, month: number, day: number): Date | null {
  const date = new Date(year, month - 1, day);
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    return null;
  }
  return date;
}

export function expandTwoDigitYear(year: number): number {
  if (year >= 100) return year;
  return year >= 50 ? 1900 + year : 2000 + year;
}

function fromTemplates(text: string, now: Date): Date | null {
  for (const template of DATE_TEMPLATES) {
    const input = template.locale === 'es' ? text.toLowerCase() : text;
    const parsed = dayjs(input, template.format, template.locale, true);
    if (!parsed.isValid()) continue;

    const date = calendarDate(parsed.year(), parsed.month() + 1, parsed.date());
    if (date && isInRange(date.getFullYear(), now)) return date;
  }
  return null;
}

function fromNumericPatterns(text: string, now: Date): Date | null {
  for (const { regex, order } of NUMERIC_PATTERNS) {
    for (const match of text.matchAll(regex)) {
      const [, a, b, c] = match;
      const date =
        order === 'ymd'
          ? calendarDate(Number(a), Number(b), Number(c))
          : calendarDate(expandTwoDigitYear(Number(c)), Number(b), Number(a));

      if (date && isInRange(date.getFullYear(), now)) return date;
    }
  }
  return null;
}

function fromNaturalLanguage(text: string, now: Date): Date | null {
  for (const parser of NATURAL_LANGUAGE_PARSERS) {
    for (const result of parser.parse(text, now)) {
      const { start } = result;
      if (NUMERIC_DATE_TEXT.test(result.text)) continue;
      if (!start.isCertain('day') || !start.isCertain('month') || !start.isCertain('year')) {
        continue;
      }
      const year = start.get('year');
      const month = start.get('month');
      const day = start.get('day');
      if (year === null || month === null || day === null) continue;
      // Relative phrases ("tomorrow", "next friday") resolve against now; the year must be written out
      if (!result.text.includes(String(year))) continue;

      const date = calendarDate(year, month, day);
      if (date && isInRange(year, now)) return date;
    }
  }
  return null;
}

/**
 * Parse a due date out of freeform portal text into a local-midnight Date.
 * Tries strict templates, then numeric substrings, then natural language.
 * Returns null for unset sentinels and for years outside 2020..now+2.
 */
export function normalizeDate(text: string | null | undefined, now: Date = new Date()): Date | null {
  const cleaned = (text ?? '').replace(/\s+/g, ' ').trim();
  if (!cleaned) return null;

  if (UNSET_DATE_SENTINELS.some((pattern) => pattern.test(cleaned))) {
    return null;
  }

  return (
    fromTemplates(cleaned, now) ??
    fromNumericPatterns(cleaned, now) ??
    fromNaturalLanguage(cleaned, now)
  );
}

export function formatIsoDate(date: Date): string {
  return dayjs(date).format('YYYY-MM-DD');
}

function compilePattern(pattern: string | RegExp): RegExp | null {
  if (pattern instanceof RegExp) return pattern;
  try {
    return new RegExp(pattern, 'i');
  } catch {
    return null;
  }
}

/**
 * Run caller-supplied patterns against a text blob in order and return the
 * first capture group (or the whole match) of the first pattern that hits.
 */
export function extractDateFromText(
  text: string,
  patterns: ReadonlyArray<string | RegExp>
): string | null {
  for (const pattern of patterns) {
    const regex = compilePattern(pattern);
    if (!regex) continue;

    const match = text.match(regex);
    if (match) {
      return (match[1] ?? match[0]).trim();
    }
  }
  return null;
}
