import { describe, it, expect } from 'vitest';
import { SKILL_FIELDS } from '../extraction/fields.js';
import {
  buildCatalog,
  buildPhrasingPattern,
  getPhrasingCatalog,
  normalizeLabel,
  type PhrasingFile,
} from '../extraction/phrasings.js';

function firstAnswer(phrase: string, text: string): string | undefined {
  return buildPhrasingPattern(phrase).exec(text)?.[1];
}

const jobsGroup = (ranks: string[]): PhrasingFile['rankedGroups'][number] => ({
  group: 'jobs',
  fieldPrefix: 'job',
  ranks,
  members: [{ suffix: 'Company', question: '{rank} Company Worked for', aliases: ['Company {n}'] }],
});

describe('normalizeLabel', () => {
  it('drops hints, markup and punctuation', () => {
    expect(normalizeLabel('**Their Email (primary)**')).toBe('theiremail');
    expect(normalizeLabel("Bachelor's Degree")).toBe('bachelorsdegree');
  });
});

describe('buildPhrasingPattern', () => {
  it('tolerates bullets, bold and a format hint', () => {
    expect(firstAnswer('Most Recent Start Date (YYYY-MM-DD)', ' - **Most Recent Start Date (YYYY-MM-DD)**: 2020-01-01'))
      .toBe('2020-01-01');
  });

  it('tolerates list numbering before the phrase', () => {
    expect(firstAnswer('Their First Name', '1. Their First Name: John')).toBe('John');
    expect(firstAnswer('Their Email', '12) - **Their Email**: john@example.com')).toBe('john@example.com');
    expect(firstAnswer('Their First Name', '1.5 Their First Name: John')).toBeUndefined();
  });

  it('matches questions that end in a question mark', () => {
    expect(firstAnswer('What software do they talk about using the most?', 'What software do they talk about using the most?: Excel'))
      .toBe('Excel');
  });

  it('only matches at the start of a line', () => {
    expect(firstAnswer('First Name', 'Their First Name: Jane')).toBeUndefined();
    expect(firstAnswer('First Name', 'Intro\nfirst name:  Jane  ')).toBe('Jane');
  });
});

describe('buildCatalog', () => {
  const catalog = buildCatalog({
    fields: [{ field: 'firstName', question: 'Their First Name', aliases: ['First Name'] }],
    rankedGroups: [jobsGroup(['Most Recent', 'Second Most Recent'])],
    keyFields: ['firstName'],
  });

  it('expands ranked groups into numbered fields', () => {
    expect(catalog.extractors.map((extractor) => extractor.field)).toEqual(['firstName', 'job1Company', 'job2Company']);
    expect(catalog.questionFor('job2Company')).toBe('Second Most Recent Company Worked for');
    expect(catalog.labels.get('company2')).toBe('job2Company');
    expect(catalog.labels.get('firstname')).toBe('firstName');
  });

  it('reports the group fields and skills for diagnostics', () => {
    expect(catalog.groups).toEqual([
      { name: 'jobs', fields: ['job1Company', 'job2Company'] },
      { name: 'skills', fields: SKILL_FIELDS },
    ]);
  });

  it('rejects a group that expands past the known fields', () => {
    const ranks = ['1st', '2nd', '3rd', '4th', '5th', '6th', '7th', '8th'];
    expect(() => buildCatalog({ fields: [], rankedGroups: [jobsGroup(ranks)], keyFields: [] }))
      .toThrow('Phrasing group "jobs" expands to unknown field "job8Company"');
  });
});

describe('bundled catalog', () => {
  it('asks for every job slot', () => {
    expect(getPhrasingCatalog().questionFor('job7Location')).toBe('Seventh Most Recent Job Location');
  });

  it('maps older labels to their fields', () => {
    const { labels } = getPhrasingCatalog();
    expect(labels.get(normalizeLabel('Phone Number 1'))).toBe('phone1');
    expect(labels.get(normalizeLabel('Phone Number 2'))).toBe('phone2');
    expect(labels.get(normalizeLabel('Email 1'))).toBe('email');
    expect(labels.get(normalizeLabel('Best job title fitting their primary experience'))).toBe('primaryTitle');
    expect(labels.get(normalizeLabel('Based on their skills, put them in a subsidiary technical category'))).toBe('secondaryCategory');
    expect(labels.get(normalizeLabel('Secondary technical category'))).toBe('secondaryCategory');
  });
});
