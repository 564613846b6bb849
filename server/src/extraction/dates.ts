import baseLogger, { type Logger } from '../lib/logger.js';

export interface ParsedDate {
  date: Date | null;
  /** 0 when nothing parsed; otherwise fixed by the format that matched. */
  confidence: number;
  original: string;
}

export interface DateOptions {
  allowFuture?: boolean;
  /** Defaults to the current UTC day. */
  today?: Date;
  logger?: Logger;
}

export const CURRENT_POSITION_INDICATORS = [
  'present',
  'current',
  'now',
  'to date',
  'today',
  'ongoing',
  'to present',
  'currently',
] as const;

const MONTHS = [
  'january', 'february', 'march', 'april', 'may', 'june',
  'july', 'august', 'september', 'october', 'november', 'december',
];

const MS_PER_DAY = 86_400_000;

export function startOfUtcDay(value: Date): Date {
  return new Date(Date.UTC(value.getUTCFullYear(), value.getUTCMonth(), value.getUTCDate()));
}

export function formatIsoDate(value: Date): string {
  return value.toISOString().slice(0, 10);
}

export function daysBetween(from: Date, to: Date): number {
  return Math.round((to.getTime() - from.getTime()) / MS_PER_DAY);
}

/** Builds a UTC date, or null when the parts do not name a real calendar day. */
export function calendarDate(year: number, month: number, day: number): Date | null {
  if (month < 1 || month > 12 || day < 1 || day > 31) return null;
  const date = new Date(Date.UTC(year, month - 1, day));
  date.setUTCFullYear(year);
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date;
}

function monthFromName(name: string): number | null {
  const lower = name.toLowerCase();
  const full = MONTHS.indexOf(lower);
  if (full >= 0) return full + 1;
  const abbreviated = MONTHS.findIndex((month) => month.slice(0, 3) === lower);
  return abbreviated >= 0 ? abbreviated + 1 : null;
}

interface DateFormat {
  name: string;
  pattern: RegExp;
  confidence: number;
  build: (match: RegExpExecArray) => Date | null;
}

// Most specific first; a format whose parts are not a real date falls through.
const DATE_FORMATS: readonly DateFormat[] = [
  {
    name: 'YYYY-MM-DD',
    pattern: /^(\d{4})-(\d{2})-(\d{2})$/,
    confidence: 1.0,
    build: (m) => calendarDate(Number(m[1]), Number(m[2]), Number(m[3])),
  },
  {
    name: 'M/D/YYYY',
    pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/,
    confidence: 0.9,
    build: (m) => calendarDate(Number(m[3]), Number(m[1]), Number(m[2])),
  },
  {
    name: 'Month YYYY',
    pattern: /^([A-Za-z]{3,9})\s+(\d{4})$/,
    confidence: 0.7,
    build: (m) => {
      const month = monthFromName(m[1]);
      return month === null ? null : calendarDate(Number(m[2]), month, 1);
    },
  },
  {
    name: 'YYYY-MM',
    pattern: /^(\d{4})-(\d{2})$/,
    confidence: 0.7,
    build: (m) => calendarDate(Number(m[1]), Number(m[2]), 1),
  },
  {
    name: 'M/YYYY',
    pattern: /^(\d{1,2})\/(\d{4})$/,
    confidence: 0.7,
    build: (m) => calendarDate(Number(m[2]), Number(m[1]), 1),
  },
  {
    name: 'YYYY',
    pattern: /^(\d{4})$/,
    confidence: 0.5,
    build: (m) => calendarDate(Number(m[1]), 1, 1),
  },
];

export function isCurrentIndicator(text: string): boolean {
  const lower = text.trim().toLowerCase();
  return CURRENT_POSITION_INDICATORS.some((indicator) => indicator === lower);
}

/**
 * Parses a resume date with a confidence score. Current-position words and
 * the unknown marker parse to no date with confidence 0.
 */
export function parseResumeDate(text: string | null | undefined, options: DateOptions = {}): ParsedDate {
  const original = text ?? '';
  const none: ParsedDate = { date: null, confidence: 0, original };
  const cleaned = original.trim();
  if (!cleaned || cleaned.toUpperCase() === 'NULL' || isCurrentIndicator(cleaned)) {
    return none;
  }

  const log = options.logger ?? baseLogger;
  const today = startOfUtcDay(options.today ?? new Date());

  for (const format of DATE_FORMATS) {
    const match = format.pattern.exec(cleaned);
    if (!match) continue;
    const date = format.build(match);
    if (!date) {
      log.debug({ text: cleaned, format: format.name }, 'Date parts out of range for format');
      continue;
    }
    if (!options.allowFuture && date.getTime() > today.getTime()) {
      log.warn({ text: cleaned, today: formatIsoDate(today) }, 'Rejected future date');
      return none;
    }
    return { date, confidence: format.confidence, original: cleaned };
  }

  log.warn({ text: cleaned }, 'Could not parse date');
  return none;
}

/**
 * True when the end of a position is blank, unknown, worded as ongoing, or
 * a date that has not arrived yet.
 */
export function isCurrentPosition(endText: string | null | undefined, options: DateOptions = {}): boolean {
  if (!endText || !endText.trim()) return true;
  const lower = endText.toLowerCase();
  if (lower.trim() === 'null') return true;
  if (CURRENT_POSITION_INDICATORS.some((indicator) => lower.includes(indicator))) return true;

  const today = startOfUtcDay(options.today ?? new Date());
  const parsed = parseResumeDate(endText, { ...options, allowFuture: true });
  return parsed.date !== null && parsed.date.getTime() > today.getTime();
}

export interface TenureResult {
  tenureYears: number;
  confidence: number;
  isCurrent: boolean;
  startText: string;
  endText: string;
  startDate: Date | null;
  /** The end as parsed, before a current position is resolved to today. */
  endDate: Date | null;
}

export const CURRENT_END_CONFIDENCE = 0.8;

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function calculateTenure(
  startText: string | null | undefined,
  endText: string | null | undefined,
  options: Omit<DateOptions, 'allowFuture'> = {},
): TenureResult {
  const start = parseResumeDate(startText, options);
  const isCurrent = isCurrentPosition(endText, options);
  const end = parseResumeDate(endText, { ...options, allowFuture: true });

  const result: TenureResult = {
    tenureYears: 0,
    confidence: 0,
    isCurrent,
    startText: startText ?? '',
    endText: endText ?? '',
    startDate: start.date,
    endDate: end.date,
  };

  if (!start.date) return result;

  let endDate = end.date;
  let endConfidence = end.confidence;
  if (isCurrent) {
    endDate = startOfUtcDay(options.today ?? new Date());
    endConfidence = CURRENT_END_CONFIDENCE;
  }

  if (endDate && endDate.getTime() >= start.date.getTime()) {
    result.tenureYears = roundTo(daysBetween(start.date, endDate) / 365.25, 2);
    result.confidence = (start.confidence + endConfidence) / 2;
  } else {
    result.confidence = start.confidence * 0.5;
  }
  return result;
}
