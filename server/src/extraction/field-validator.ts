import baseLogger, { type Logger } from '../lib/logger.js';
import { calendarDate, formatIsoDate, isCurrentIndicator, parseResumeDate } from './dates.js';
import { ALL_FIELDS, DATE_FIELDS, SKILL_FIELDS, type FieldName, type ParsedFieldSet } from './fields.js';

export type ValidationAction =
  | 'date-rewritten'
  | 'date-unknown'
  | 'profile-normalized'
  | 'profile-rejected'
  | 'phone-cleared'
  | 'truncated';

export interface ValidationIssue {
  field: FieldName;
  action: ValidationAction;
  from: string;
  to: string | null;
}

export interface ValidationResult {
  fields: ParsedFieldSet;
  issues: ValidationIssue[];
}

export interface ValidateOptions {
  today?: Date;
  logger?: Logger;
}

export const DEFAULT_MAX_LENGTH = 255;
const LONG_TEXT = 8000;

const MAX_LENGTHS = new Map<FieldName, number>([
  ['firstName', 100],
  ['middleName', 100],
  ['lastName', 100],
  ['city', 100],
  ['state', 50],
  ['phone1', 50],
  ['phone2', 50],
  ['lengthInUs', 50],
  ['yearsOfExperience', 50],
  ['avgTenure', 50],
  ['certifications', LONG_TEXT],
  ['projectTypes', LONG_TEXT],
  ['specialty', LONG_TEXT],
  ['summary', LONG_TEXT],
  ['top10Skills', LONG_TEXT],
  ...SKILL_FIELDS.map((field) => [field, 100] as const),
]);

export function maxLengthFor(field: FieldName): number {
  return MAX_LENGTHS.get(field) ?? DEFAULT_MAX_LENGTH;
}

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Coerces a date answer to `YYYY-MM-DD`: exact when already ISO, otherwise
 * the normalizer's best effort, then dates embedded in longer text. Null when
 * nothing usable remains, including current-position words.
 */
export function normalizeDateValue(value: string, today?: Date, logger?: Logger): string | null {
  const iso = ISO_DATE.exec(value);
  if (iso && calendarDate(Number(iso[1]), Number(iso[2]), Number(iso[3]))) return value;

  const parsed = parseResumeDate(value, { allowFuture: true, today, logger });
  if (parsed.date) return formatIsoDate(parsed.date);

  const full = /(\d{4})[/-](\d{1,2})[/-](\d{1,2})/.exec(value);
  const fullDate = full ? calendarDate(Number(full[1]), Number(full[2]), Number(full[3])) : null;
  if (fullDate) return formatIsoDate(fullDate);

  const yearMonth = /(\d{4})[/-](\d{1,2})/.exec(value);
  const monthDate = yearMonth ? calendarDate(Number(yearMonth[1]), Number(yearMonth[2]), 1) : null;
  if (monthDate) return formatIsoDate(monthDate);

  const year = /(\d{4})/.exec(value);
  const yearDate = year ? calendarDate(Number(year[1]), 1, 1) : null;
  return yearDate ? formatIsoDate(yearDate) : null;
}

const GENERIC_PROFILE_IDS = new Set(['user', 'profile', 'linkedin', 'my', 'page', 'me']);
const GENERIC_PROFILE_URLS = [
  /^https?:\/\/(?:www\.)?linkedin\.com\/?$/i,
  /^https?:\/\/(?:www\.)?linkedin\.com\/(?:in|pub|profile|company)\/?$/i,
  /^linkedin(?:\.com)?$/i,
];
const OTHER_PROFILE_FORMS = [
  /^https?:\/\/(?:www\.)?linkedin\.com\/pub\/([\w.%/-]+)$/i,
  /^https?:\/\/(?:www\.)?linkedin\.com\/profile\/([\w.%-]+)$/i,
  /^https?:\/\/(?:www\.)?linkedin\.com\/company\/([\w.%-]+)\/?$/i,
];

function isSpecificProfileId(id: string): boolean {
  return id.length >= 4 && !GENERIC_PROFILE_IDS.has(id.toLowerCase());
}

/**
 * Returns a canonical profile URL for a specific member, or null for generic
 * links, placeholder handles and anything that is not a profile reference.
 */
export function normalizeProfileUrl(value: string): string | null {
  const url = value.trim();
  if (!url || GENERIC_PROFILE_URLS.some((pattern) => pattern.test(url))) return null;

  const member = /linkedin\.com\/in\/([\w.%-]+)/i.exec(url);
  if (member) {
    return isSpecificProfileId(member[1]) ? `https://www.linkedin.com/in/${member[1]}` : null;
  }

  for (const pattern of OTHER_PROFILE_FORMS) {
    const match = pattern.exec(url);
    if (match) return isSpecificProfileId(match[1].replace(/\/+$/, '')) ? url : null;
  }

  // Bare handle
  if (/^[\w.%-]+$/.test(url) && !url.toLowerCase().startsWith('http')) {
    return isSpecificProfileId(url) ? `https://www.linkedin.com/in/${url}` : null;
  }
  return null;
}

/** Digits only when the value looks like a phone number, else the trimmed text. */
export function normalizePhone(value: string): string {
  const digits = value.replace(/\D/g, '');
  return digits.length >= 7 && digits.length <= 15 ? digits : value.trim();
}

/**
 * Sanitizes a parsed field set before persistence. Returns a new set; the
 * input is left untouched.
 */
export function validateFields(source: ParsedFieldSet, options: ValidateOptions = {}): ValidationResult {
  const log = options.logger ?? baseLogger;
  const fields = source.clone();
  const issues: ValidationIssue[] = [];
  const record = (field: FieldName, action: ValidationAction, from: string, to: string | null) => {
    issues.push({ field, action, from, to });
    fields.set(field, to);
  };

  for (const field of DATE_FIELDS) {
    const value = fields.get(field);
    if (value === null) continue;
    const normalized = normalizeDateValue(value, options.today, log);
    if (normalized === value) continue;
    if (normalized === null) {
      if (isCurrentIndicator(value)) log.debug({ field, value }, 'Current-position end date stored as unknown');
      else log.warn({ field, value }, 'Unparseable date set to unknown');
      record(field, 'date-unknown', value, null);
    } else {
      log.debug({ field, value, normalized }, 'Date rewritten to YYYY-MM-DD');
      record(field, 'date-rewritten', value, normalized);
    }
  }

  const profile = fields.get('linkedin');
  if (profile !== null) {
    const normalized = normalizeProfileUrl(profile);
    if (normalized === null) {
      log.warn({ value: profile }, 'Generic or invalid profile URL set to unknown');
      record('linkedin', 'profile-rejected', profile, null);
    } else if (normalized !== profile) {
      record('linkedin', 'profile-normalized', profile, normalized);
    }
  }

  const phone1 = fields.get('phone1');
  const phone2 = fields.get('phone2');
  if (phone1 !== null && phone2 !== null && normalizePhone(phone1) === normalizePhone(phone2)) {
    log.debug({ phone1, phone2 }, 'Duplicate secondary phone cleared');
    record('phone2', 'phone-cleared', phone2, null);
  }

  for (const field of ALL_FIELDS) {
    const value = fields.get(field);
    const limit = maxLengthFor(field);
    if (value !== null && value.length > limit) {
      log.warn({ field, length: value.length, limit }, 'Truncating field to column limit');
      record(field, 'truncated', value, value.slice(0, limit));
    }
  }

  return { fields, issues };
}
