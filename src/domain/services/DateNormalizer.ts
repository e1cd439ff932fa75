import dayjs from 'dayjs';
import { StatementPeriod } from '../entities/Statement.js';

export interface DateContext {
  period?: StatementPeriod;
  /** ISO date standing in for the period end when the statement period is unknown. */
  referenceDate: string;
}

interface DateParts {
  year?: number;
  month: number;
  day: number;
}

const MONTH_NAMES = [
  ['jan', 'january'],
  ['feb', 'february'],
  ['mar', 'march'],
  ['apr', 'april'],
  ['may'],
  ['jun', 'june'],
  ['jul', 'july'],
  ['aug', 'august'],
  ['sep', 'sept', 'september'],
  ['oct', 'october'],
  ['nov', 'november'],
  ['dec', 'december'],
];

const MONTHS = new Map(MONTH_NAMES.flatMap((names, index) => names.map((name) => [name, index + 1] as const)));

// Whole month words only: "MARKET 5" or "DECATUR 30" are not dates.
const MONTH_WORD =
  'Jan(?:uary)?|Feb(?:ruary)?|Mar(?:ch)?|Apr(?:il)?|May|June?|July?|Aug(?:ust)?|Sep(?:t(?:ember)?)?|Oct(?:ober)?|Nov(?:ember)?|Dec(?:ember)?';

const isoDate = /^(\d{4})-(\d{1,2})-(\d{1,2})$/;
const numericDate = /^(\d{1,2})[\/\-](\d{1,2})(?:[\/\-](\d{4}|\d{2}))?$/;
const monthFirstDate = /^([A-Za-z]{3,9})\.?\s+(\d{1,2})(?:,?\s+(\d{4}))?$/;
const dayFirstDate = /^(\d{1,2})\s+([A-Za-z]{3,9})\.?(?:,?\s+(\d{4}))?$/;

/** Date token sources usable inside larger line patterns. */
export const DATE_TOKEN =
  '(?:\\d{4}-\\d{1,2}-\\d{1,2}|\\d{1,2}[\\/\\-]\\d{1,2}(?:[\\/\\-](?:\\d{4}|\\d{2}))?' +
  `|(?:${MONTH_WORD})\\.?\\s+\\d{1,2}\\b(?:,?\\s+\\d{4})?)`;

export const monthFromName = (name: string): number | undefined => MONTHS.get(name.toLowerCase());

const expandYear = (raw: string | undefined): number | undefined => {
  if (!raw) return undefined;
  const year = Number(raw);
  return raw.length === 2 ? 2000 + year : year;
};

const splitDate = (raw: string): DateParts | null => {
  const iso = raw.match(isoDate);
  if (iso) {
    return { year: Number(iso[1]), month: Number(iso[2]), day: Number(iso[3]) };
  }

  // US statements: MM/DD[/YY[YY]]
  const numeric = raw.match(numericDate);
  if (numeric) {
    return { year: expandYear(numeric[3]), month: Number(numeric[1]), day: Number(numeric[2]) };
  }

  const monthFirst = raw.match(monthFirstDate);
  if (monthFirst) {
    const month = monthFromName(monthFirst[1]);
    return month ? { year: expandYear(monthFirst[3]), month, day: Number(monthFirst[2]) } : null;
  }

  const dayFirst = raw.match(dayFirstDate);
  if (dayFirst) {
    const month = monthFromName(dayFirst[2]);
    return month ? { year: expandYear(dayFirst[3]), month, day: Number(dayFirst[1]) } : null;
  }

  return null;
};

export const toIsoDate = (year: number, month: number, day: number): string | null => {
  if (month < 1 || month > 12 || day < 1) return null;

  const monthStart = `${year}-${String(month).padStart(2, '0')}-01`;
  if (day > dayjs(monthStart).daysInMonth()) return null;

  return `${year}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
};

/**
 * Picks a year for a date printed without one. The year of the period end (or of the
 * reference date) is used unless that lands after the anchor, in which case the date
 * belongs to the previous year, e.g. a 12/28 line on a statement ending 01/15.
 */
export const inferYear = (month: number, day: number, context: DateContext): number => {
  const anchor = dayjs(context.period?.end ?? context.referenceDate);
  const candidate = toIsoDate(anchor.year(), month, day);

  if (!candidate || dayjs(candidate).isAfter(anchor, 'day')) {
    return anchor.year() - 1;
  }

  return anchor.year();
};

export const normalizeDate = (raw: string, context: DateContext): string | null => {
  const parts = splitDate(raw.trim().replace(/\s+/g, ' '));
  if (!parts) return null;

  const year = parts.year ?? inferYear(parts.month, parts.day, context);
  return toIsoDate(year, parts.month, parts.day);
};

export const isWithinPeriod = (isoDateValue: string, period?: StatementPeriod): boolean => {
  if (!period) return true;
  return isoDateValue >= period.start && isoDateValue <= period.end;
};
