import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { dataPath } from '../lib/data-path.js';
import {
  CAREER_FIELDS,
  HARDWARE_FIELDS,
  JOB_FIELDS,
  PERSONAL_FIELDS,
  SKILL_FIELDS,
  SOFTWARE_APP_FIELDS,
  TECHNICAL_FIELDS,
  isFieldName,
  type FieldName,
} from './fields.js';

const FieldNameSchema = z.custom<FieldName>(
  (value) => typeof value === 'string' && isFieldName(value),
  { message: 'unknown field name' },
);

const PhrasingFileSchema = z.object({
  fields: z.array(z.object({
    field: FieldNameSchema,
    question: z.string().min(1),
    aliases: z.array(z.string().min(1)).default([]),
  })),
  rankedGroups: z.array(z.object({
    group: z.string().min(1),
    fieldPrefix: z.string().min(1),
    ranks: z.array(z.string().min(1)).min(1),
    members: z.array(z.object({
      suffix: z.string(),
      question: z.string().min(1),
      aliases: z.array(z.string().min(1)).default([]),
    })).min(1),
  })),
  keyFields: z.array(FieldNameSchema),
});

export type PhrasingFile = z.infer<typeof PhrasingFileSchema>;

/** One way of asking for a field; the first phrasing doubles as the prompt question. */
export interface FieldExtractor {
  field: FieldName;
  question: string;
  patterns: RegExp[];
}

export interface FieldGroup {
  name: string;
  fields: readonly FieldName[];
}

export interface PromptSection {
  title: string;
  fields: readonly FieldName[];
}

export interface PhrasingCatalog {
  /** Ordered extractor chain, one entry per field. */
  extractors: FieldExtractor[];
  /** Normalized label → field, covering every phrasing and the canonical names. */
  labels: ReadonlyMap<string, FieldName>;
  /** Multi-valued groups reported in parse diagnostics. */
  groups: FieldGroup[];
  keyFields: readonly FieldName[];
  questionFor(field: FieldName): string | undefined;
}

export const PROMPT_SECTIONS: readonly PromptSection[] = [
  { title: 'PERSONAL INFORMATION', fields: PERSONAL_FIELDS },
  { title: 'WORK HISTORY', fields: JOB_FIELDS },
  { title: 'CAREER PROFILE', fields: CAREER_FIELDS },
  {
    title: 'TECHNICAL PROFILE',
    fields: [...TECHNICAL_FIELDS.slice(0, 3), ...SOFTWARE_APP_FIELDS, ...HARDWARE_FIELDS, ...TECHNICAL_FIELDS.slice(3)],
  },
];

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Strips a trailing "(YYYY-MM-DD)"-style hint and question mark. */
function phrasingCore(phrase: string): string {
  return phrase
    .replace(/\s*\([^)]*\)\s*$/, '')
    .replace(/\?\s*$/, '')
    .trim();
}

/** Lowercase alphanumerics only; parenthetical hints dropped. */
export function normalizeLabel(label: string): string {
  return label
    .replace(/\([^)]*\)/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]/g, '');
}

/**
 * Matches `phrase: value` on its own line, tolerating list numbering, bullets,
 * markdown bold, a parenthetical format hint and a trailing question mark.
 */
export function buildPhrasingPattern(phrase: string): RegExp {
  const body = escapeRegExp(phrasingCore(phrase)).replace(/\s+/g, '[ \\t]+');
  return new RegExp(
    `^[ \\t]*(?:\\d+[.)][ \\t]*)?(?:[-*•][ \\t]*)?(?:\\*\\*)?${body}(?:[ \\t]*\\([^)\\n]*\\))?\\??(?:\\*\\*)?[ \\t]*:[ \\t]*(?:\\*\\*)?[ \\t]*(.*?)[ \\t]*$`,
    'gim',
  );
}

function expand(template: string, rank: string, n: number): string {
  return template.replace(/\{rank\}/g, rank).replace(/\{n\}/g, String(n));
}

export function buildCatalog(file: PhrasingFile): PhrasingCatalog {
  const phrasings = new Map<FieldName, string[]>();
  const groups: FieldGroup[] = [];

  const add = (field: FieldName, phrases: string[]) => {
    const existing = phrasings.get(field) ?? [];
    phrasings.set(field, [...existing, ...phrases]);
  };

  for (const entry of file.fields) {
    add(entry.field, [entry.question, ...entry.aliases]);
  }

  for (const group of file.rankedGroups) {
    const counted: FieldName[] = [];
    group.ranks.forEach((rank, index) => {
      const n = index + 1;
      for (const member of group.members) {
        const name = `${group.fieldPrefix}${n}${member.suffix}`;
        if (!isFieldName(name)) {
          throw new Error(`Phrasing group "${group.group}" expands to unknown field "${name}"`);
        }
        add(name, [member.question, ...member.aliases].map((t) => expand(t, rank, n)));
        if (member === group.members[0]) counted.push(name);
      }
    });
    groups.push({ name: group.group, fields: counted });
  }
  groups.push({ name: 'skills', fields: SKILL_FIELDS });

  const extractors: FieldExtractor[] = [];
  const labels = new Map<string, FieldName>();
  const questions = new Map<FieldName, string>();

  for (const [field, phrases] of phrasings) {
    questions.set(field, phrases[0]);
    extractors.push({ field, question: phrases[0], patterns: phrases.map(buildPhrasingPattern) });
    for (const phrase of phrases) {
      const label = normalizeLabel(phrase);
      if (!labels.has(label)) labels.set(label, field);
    }
  }
  for (const field of phrasings.keys()) {
    const canonical = normalizeLabel(field);
    if (!labels.has(canonical)) labels.set(canonical, field);
  }

  return {
    extractors,
    labels,
    groups,
    keyFields: file.keyFields,
    questionFor: (field) => questions.get(field),
  };
}

let cachedCatalog: PhrasingCatalog | null = null;

export function loadPhrasingCatalog(filePath = dataPath('field-phrasings.json')): PhrasingCatalog {
  const raw: unknown = JSON.parse(readFileSync(filePath, 'utf8'));
  return buildCatalog(PhrasingFileSchema.parse(raw));
}

/** Process-wide catalog, loaded on first use and read-only afterwards. */
export function getPhrasingCatalog(): PhrasingCatalog {
  if (!cachedCatalog) cachedCatalog = loadPhrasingCatalog();
  return cachedCatalog;
}
