import baseLogger, { type Logger } from '../lib/logger.js';
import { repairJSON } from '../lib/json-repair.js';
import { ParsedFieldSet, SKILL_FIELDS, normalizeValue, type FieldName } from './fields.js';
import { getPhrasingCatalog, normalizeLabel, type PhrasingCatalog } from './phrasings.js';

export interface GroupCount {
  group: string;
  found: number;
  expected: number;
}

export interface ParseDiagnostics {
  directMatches: number;
  lineMatches: number;
  jsonMatches: number;
  /** ALL-CAPS section markers seen in the response, in order. */
  sections: string[];
  groups: GroupCount[];
  missingKeyFields: FieldName[];
}

export interface ParseResult {
  fields: ParsedFieldSet;
  diagnostics: ParseDiagnostics;
}

export interface ParseOptions {
  catalog?: PhrasingCatalog;
  logger?: Logger;
}

const SECTION_MARKER = /^[A-Z0-9][A-Z0-9 &/()'_-]*:$/;
const KEY_DECORATION = /^[-*•\s]*(?:\d+[.)])?[-*•\s]*|\*\*/g;

/** Pass 1: ordered phrasing chain per field, first acceptable answer wins. */
function applyDirectPatterns(text: string, fields: ParsedFieldSet, catalog: PhrasingCatalog): number {
  let assigned = 0;
  for (const extractor of catalog.extractors) {
    if (fields.isKnown(extractor.field)) continue;
    search: for (const pattern of extractor.patterns) {
      for (const match of text.matchAll(pattern)) {
        if (fields.fill(extractor.field, match[1] ?? null)) {
          assigned += 1;
          break search;
        }
      }
    }
  }
  return assigned;
}

/** Pass 2: `key: value` lines mapped through the label table. */
function applyStructuredLines(
  text: string,
  fields: ParsedFieldSet,
  catalog: PhrasingCatalog,
  sections: string[],
): number {
  let assigned = 0;
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) continue;
    if (SECTION_MARKER.test(line)) {
      sections.push(line.slice(0, -1).trim());
      continue;
    }
    const colon = line.indexOf(':');
    if (colon <= 0) continue;
    const key = line.slice(0, colon).replace(KEY_DECORATION, '').trim();
    // JSON member lines are left to the JSON pass
    if (/^["'{[]/.test(key)) continue;
    const value = line.slice(colon + 1).replace(/\*\*/g, '').trim();
    const field = catalog.labels.get(normalizeLabel(key));
    if (field && fields.fill(field, value)) assigned += 1;
  }
  return assigned;
}

function scalarToString(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return null;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Pass 3: JSON object answers, possibly nested by section. */
function applyJsonObject(text: string, fields: ParsedFieldSet, catalog: PhrasingCatalog): number {
  if (!text.includes('{')) return 0;
  const parsed = repairJSON(text);
  if (!isPlainObject(parsed)) return 0;

  let assigned = 0;
  const visit = (node: Record<string, unknown>, depth: number) => {
    for (const [key, value] of Object.entries(node)) {
      if (isPlainObject(value)) {
        if (depth < 4) visit(value, depth + 1);
        continue;
      }
      const field = catalog.labels.get(normalizeLabel(key));
      if (!field) continue;
      const answer = Array.isArray(value)
        ? value.map(scalarToString).filter((v): v is string => v !== null).join(', ')
        : scalarToString(value);
      if (fields.fill(field, answer)) assigned += 1;
    }
  };
  visit(parsed, 0);
  return assigned;
}

export function splitSkills(skills: string): string[] {
  return skills
    .split(/,\s*/)
    .map((skill) => normalizeValue(skill))
    .filter((skill): skill is string => skill !== null);
}

/**
 * Spreads the top-skills answer over skill1..skill10. Without one, the
 * primary and secondary software languages stand in.
 */
export function distributeSkills(fields: ParsedFieldSet): void {
  const top = fields.get('top10Skills');
  const skills = top
    ? splitSkills(top)
    : [fields.get('primarySoftwareLanguage'), fields.get('secondarySoftwareLanguage')]
        .filter((skill): skill is string => skill !== null);
  SKILL_FIELDS.forEach((field, index) => {
    const skill = skills[index];
    if (skill !== undefined) fields.fill(field, skill);
  });
}

/**
 * Parses one model answer into a field set: direct phrasings first, then
 * structured lines, then a JSON object. A field set by an earlier pass is
 * never overwritten by a later one.
 */
export function parseResponse(text: string, options: ParseOptions = {}): ParseResult {
  const catalog = options.catalog ?? getPhrasingCatalog();
  const log = options.logger ?? baseLogger;
  const fields = new ParsedFieldSet();
  const sections: string[] = [];

  const directMatches = applyDirectPatterns(text, fields, catalog);
  const lineMatches = applyStructuredLines(text, fields, catalog, sections);
  const jsonMatches = applyJsonObject(text, fields, catalog);
  distributeSkills(fields);

  const groups = catalog.groups.map((group) => ({
    group: group.name,
    found: group.fields.filter((field) => fields.isKnown(field)).length,
    expected: group.fields.length,
  }));
  const missingKeyFields = catalog.keyFields.filter((field) => !fields.isKnown(field));

  const diagnostics: ParseDiagnostics = {
    directMatches,
    lineMatches,
    jsonMatches,
    sections,
    groups,
    missingKeyFields,
  };

  if (fields.knownCount === 0) {
    log.warn({ length: text.length, snippet: text.slice(0, 200) }, 'No fields extracted from response');
  } else if (missingKeyFields.length > 0) {
    log.warn({ missingKeyFields, extracted: fields.knownCount }, 'Response is missing key fields');
  }

  return { fields, diagnostics };
}
