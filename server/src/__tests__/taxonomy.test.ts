import { describe, it, expect } from 'vitest';
import {
  TaxonomyMatcher,
  loadTaxonomy,
  selectCategories,
  splitResumeRegions,
  type TaxonomyCategory,
} from '../extraction/taxonomy.js';
import { silentLogger } from './helpers/context.js';

const categories: TaxonomyCategory[] = [
  { name: 'Data', jobTitles: ['Data Engineer'], skills: ['SQL', 'C#'] },
  { name: 'Delivery', jobTitles: ['Project Manager'], skills: ['Jira'] },
  { name: 'Platform', jobTitles: ['Go Developer'], skills: ['Go', '.NET'] },
];

describe('selectCategories', () => {
  const scores = [
    { name: 'A', score: 100 },
    { name: 'B', score: 85 },
    { name: 'C', score: 40 },
  ];

  it('keeps the top category and any within 20% of it', () => {
    expect(selectCategories(scores, 3)).toEqual(['A', 'B']);
  });

  it('respects the category cap', () => {
    expect(selectCategories(scores, 1)).toEqual(['A']);
  });

  it('includes a category exactly at the threshold', () => {
    expect(selectCategories([{ name: 'A', score: 50 }, { name: 'B', score: 40 }], 2)).toEqual(['A', 'B']);
  });

  it('selects nothing without a positive score', () => {
    expect(selectCategories([], 2)).toEqual([]);
    expect(selectCategories([{ name: 'A', score: 0 }], 2)).toEqual([]);
  });
});

describe('splitResumeRegions', () => {
  it('finds the work section and its first job paragraph', () => {
    const resume = [
      'Jane Doe',
      'Data Engineer',
      '',
      'Professional Experience',
      'Data Engineer at Acme',
      'Built pipelines',
      '',
      'Analyst at Beta',
      'Reports',
      '',
      'Education',
      'BS Computer Science',
    ].join('\n');

    const regions = splitResumeRegions(resume);
    expect(regions.workHistory).toBe(
      'professional experience\ndata engineer at acme\nbuilt pipelines\n\nanalyst at beta\nreports',
    );
    expect(regions.mostRecentJob).toBe('data engineer at acme\nbuilt pipelines');
    expect(regions.header).toBe(
      'jane doe data engineer  professional experience data engineer at acme built pipelines  analyst at beta reports ',
    );
  });

  it('leaves the work regions empty without a work heading', () => {
    const regions = splitResumeRegions('Jane Doe\nSkills: SQL');
    expect(regions.workHistory).toBe('');
    expect(regions.mostRecentJob).toBe('');
  });
});

describe('TaxonomyMatcher', () => {
  const matcher = new TaxonomyMatcher(categories, silentLogger);

  it('weights header titles and skill terms', () => {
    // Title once in the header: 10. SQL twice: 2 × 1.1. C# once: 1.1.
    const scores = matcher.score('Jane Doe\nData Engineer\nSQL, C#, SQL');
    expect(scores).toHaveLength(1);
    expect(scores[0].name).toBe('Data');
    expect(scores[0].score).toBeCloseTo(13.3, 10);
  });

  it('matches whole terms only', () => {
    expect(matcher.score('PostgreSQL admin who likes Google and Jiraffe')).toEqual([]);
  });

  it('matches terms that start with a symbol', () => {
    const scores = matcher.score('Experience with .NET services');
    expect(scores).toEqual([{ name: 'Platform', score: 1.1 }]);
  });

  it('adds the work-history bonus for skills used on the job', () => {
    const resume = ['A', 'B', 'C', 'D', 'E', 'F', 'G', 'H', 'I', 'J', 'Work Experience', 'Acme', 'Tracked work in Jira'].join('\n');
    // Jira: 1 × 1.1 + 1 × 2
    const scores = matcher.score(resume);
    expect(scores.map((score) => score.name)).toEqual(['Delivery']);
    expect(scores[0].score).toBeCloseTo(3.1, 10);
  });

  it('returns the selected names and their prompt block', () => {
    const match = matcher.match('Data Engineer\nJira', 2);
    // Data: 10 (header title). Delivery: 1.1, below the 20% margin.
    expect(match.selected).toEqual(['Data']);
    expect(match.context).toBe(
      'SKILLS TAXONOMY REFERENCE:\n\n'
      + '## Data\n'
      + 'Relevant job titles: Data Engineer\n'
      + 'Skills in this category: SQL, C#\n\n',
    );
  });

  it('returns an empty context when nothing matches', () => {
    expect(matcher.match('Gardener', 2)).toEqual({ scores: [], selected: [], context: '' });
  });

  it('lists at most ten titles and twenty skills per category', () => {
    const wide = new TaxonomyMatcher([{
      name: 'Wide',
      jobTitles: Array.from({ length: 12 }, (_, i) => `Title ${i + 1}`),
      skills: Array.from({ length: 21 }, (_, i) => `Skill ${i + 1}`),
    }], silentLogger);

    const context = wide.formatContext(['Wide']);
    expect(context).toContain(
      'Relevant job titles: Title 1, Title 2, Title 3, Title 4, Title 5, Title 6, Title 7, Title 8, Title 9, Title 10, and 2 more\n',
    );
    expect(context).toContain('Skill 19, Skill 20, and 1 more\n');
  });
});

describe('loadTaxonomy', () => {
  it('loads the bundled categories', () => {
    const loaded = loadTaxonomy();
    expect(loaded.map((category) => category.name)).toContain('Software Engineering');
    expect(loaded.every((category) => category.jobTitles.length > 0 && category.skills.length > 0)).toBe(true);
  });
});
