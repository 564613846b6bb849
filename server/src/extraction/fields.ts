/**
 * Canonical extracted-field names. Every layer (parser, validator, store)
 * keys candidate attributes by these names.
 */

export const JOB_SLOTS = [1, 2, 3, 4, 5, 6, 7] as const;
export type JobSlot = (typeof JOB_SLOTS)[number];
export const JOB_ATTRIBUTES = ['Company', 'StartDate', 'EndDate', 'Location'] as const;
export type JobAttribute = (typeof JOB_ATTRIBUTES)[number];
export type JobFieldName = `job${JobSlot}${JobAttribute}`;

const RANK_5 = [1, 2, 3, 4, 5] as const;
const RANK_10 = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10] as const;
export type SoftwareAppField = `softwareApp${(typeof RANK_5)[number]}`;
export type HardwareField = `hardware${(typeof RANK_5)[number]}`;
export type SkillField = `skill${(typeof RANK_10)[number]}`;

export const PERSONAL_FIELDS = [
  'firstName',
  'middleName',
  'lastName',
  'phone1',
  'phone2',
  'email',
  'email2',
  'linkedin',
  'address',
  'city',
  'state',
  'bachelors',
  'masters',
  'certifications',
] as const;

export const CAREER_FIELDS = [
  'primaryTitle',
  'secondaryTitle',
  'tertiaryTitle',
  'primaryIndustry',
  'secondaryIndustry',
  'top10Skills',
] as const;

export const TECHNICAL_FIELDS = [
  'primarySoftwareLanguage',
  'secondarySoftwareLanguage',
  'tertiarySoftwareLanguage',
  'primaryCategory',
  'secondaryCategory',
  'projectTypes',
  'specialty',
  'summary',
  'lengthInUs',
  'yearsOfExperience',
  'avgTenure',
] as const;

export type FieldName =
  | (typeof PERSONAL_FIELDS)[number]
  | (typeof CAREER_FIELDS)[number]
  | (typeof TECHNICAL_FIELDS)[number]
  | JobFieldName
  | SoftwareAppField
  | HardwareField
  | SkillField;

export function jobField(slot: JobSlot, attribute: JobAttribute): JobFieldName {
  return `job${slot}${attribute}`;
}

export const JOB_FIELDS: readonly JobFieldName[] = JOB_SLOTS.flatMap((slot) =>
  JOB_ATTRIBUTES.map((attribute) => jobField(slot, attribute)),
);
export const SOFTWARE_APP_FIELDS: readonly SoftwareAppField[] = RANK_5.map((n) => `softwareApp${n}` as const);
export const HARDWARE_FIELDS: readonly HardwareField[] = RANK_5.map((n) => `hardware${n}` as const);
export const SKILL_FIELDS: readonly SkillField[] = RANK_10.map((n) => `skill${n}` as const);

export const ALL_FIELDS: readonly FieldName[] = [
  ...PERSONAL_FIELDS,
  ...JOB_FIELDS,
  ...CAREER_FIELDS,
  ...TECHNICAL_FIELDS,
  ...SOFTWARE_APP_FIELDS,
  ...HARDWARE_FIELDS,
  ...SKILL_FIELDS,
];

const FIELD_SET: ReadonlySet<string> = new Set(ALL_FIELDS);

export function isFieldName(value: string): value is FieldName {
  return FIELD_SET.has(value);
}

/** Date-valued fields: the start and end of every job slot. */
export const DATE_FIELDS: readonly JobFieldName[] = JOB_SLOTS.flatMap((slot) => [
  jobField(slot, 'StartDate'),
  jobField(slot, 'EndDate'),
]);

/** Maps a field to its store column: `job1StartDate` → `job1_start_date`. */
export function toColumnName(field: FieldName): string {
  return field
    .replace(/([a-z])([A-Z])/g, '$1_$2')
    .replace(/([0-9])([A-Za-z])/g, '$1_$2')
    .toLowerCase();
}

/**
 * Value of one extracted field. `null` is the unknown marker; it is never
 * collapsed into an empty string before validation.
 */
export type FieldValue = string | null;

/** Normalizes a raw answer: blank or any casing of "NULL" becomes unknown. */
export function normalizeValue(raw: string | null | undefined): FieldValue {
  if (raw == null) return null;
  const trimmed = raw.trim();
  if (!trimmed || trimmed.toUpperCase() === 'NULL') return null;
  return trimmed;
}

/**
 * Field name → value map where every field not explicitly known reads as
 * unknown. Values are normalized on the way in, so the string "NULL" never
 * survives past the parser.
 */
export class ParsedFieldSet {
  private readonly values = new Map<FieldName, string>();

  static from(entries: Partial<Record<FieldName, string | null>>): ParsedFieldSet {
    const set = new ParsedFieldSet();
    for (const name of ALL_FIELDS) {
      set.set(name, entries[name] ?? null);
    }
    return set;
  }

  get(name: FieldName): FieldValue {
    return this.values.get(name) ?? null;
  }

  isKnown(name: FieldName): boolean {
    return this.values.has(name);
  }

  set(name: FieldName, value: FieldValue): void {
    const normalized = normalizeValue(value);
    if (normalized === null) this.values.delete(name);
    else this.values.set(name, normalized);
  }

  /** Assigns only when the field is still unknown. Returns whether it assigned. */
  fill(name: FieldName, value: FieldValue): boolean {
    if (this.isKnown(name)) return false;
    const normalized = normalizeValue(value);
    if (normalized === null) return false;
    this.values.set(name, normalized);
    return true;
  }

  get knownCount(): number {
    return this.values.size;
  }

  clone(): ParsedFieldSet {
    const copy = new ParsedFieldSet();
    for (const [name, value] of this.values) copy.values.set(name, value);
    return copy;
  }

  /** Every field in canonical order, unknowns included as null. */
  toRecord(): Partial<Record<FieldName, FieldValue>> {
    const record: Partial<Record<FieldName, FieldValue>> = {};
    for (const name of ALL_FIELDS) record[name] = this.get(name);
    return record;
  }

  /** Known fields only, in canonical order. */
  knownEntries(): Array<[FieldName, string]> {
    const entries: Array<[FieldName, string]> = [];
    for (const name of ALL_FIELDS) {
      const value = this.values.get(name);
      if (value !== undefined) entries.push([name, value]);
    }
    return entries;
  }
}
