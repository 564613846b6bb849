import { readFileSync } from 'node:fs';
import { z } from 'zod';
import baseLogger, { type Logger } from '../lib/logger.js';
import { dataPath } from '../lib/data-path.js';

const TaxonomyFileSchema = z.object({
  categories: z.array(z.object({
    name: z.string().min(1),
    jobTitles: z.array(z.string().min(1)),
    skills: z.array(z.string().min(1)),
  })),
});

export interface TaxonomyCategory {
  name: string;
  jobTitles: readonly string[];
  skills: readonly string[];
}

export interface CategoryScore {
  name: string;
  score: number;
}

export interface TaxonomyMatch {
  /** Every category with a positive score, highest first. */
  scores: CategoryScore[];
  selected: string[];
  /** Prompt block describing the selected categories; empty when nothing matched. */
  context: string;
}

export const HEADER_LINE_COUNT = 10;
export const WEIGHTS = {
  header: 10,
  mostRecentJob: 8,
  workHistory: 5,
  elsewhere: 2,
  workHistorySkillBonus: 2,
} as const;
const MAX_CONTEXT_TITLES = 10;
const MAX_CONTEXT_SKILLS = 20;
const SELECTION_MARGIN = 0.2;

const WORK_HEADING = /(work experience|employment|professional experience)/i;
const NEXT_SECTION = /\n\s*\n[ \t]*(education|skills|technical skills|certifications|projects|summary|awards|publications|references|languages|volunteer)\b[^\n]*\n/i;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Whole-term match that also works for terms starting or ending in symbols (C#, .NET). */
function termPattern(term: string): RegExp {
  return new RegExp(`(?<![a-z0-9_])${escapeRegExp(term.toLowerCase())}(?![a-z0-9_])`, 'g');
}

function countMatches(pattern: RegExp, text: string): number {
  if (!text) return 0;
  return [...text.matchAll(pattern)].length;
}

export interface ResumeRegions {
  full: string;
  header: string;
  workHistory: string;
  mostRecentJob: string;
}

/** Lowercased scoring regions of a resume. */
export function splitResumeRegions(resumeText: string): ResumeRegions {
  const full = resumeText.toLowerCase();
  const header = full.split('\n').slice(0, HEADER_LINE_COUNT).join(' ');

  let workHistory = '';
  let mostRecentJob = '';
  const heading = WORK_HEADING.exec(resumeText);
  if (heading) {
    const fromHeading = resumeText.slice(heading.index);
    const next = NEXT_SECTION.exec(fromHeading);
    workHistory = (next ? fromHeading.slice(0, next.index) : fromHeading).toLowerCase();

    // Paragraph after the heading line is taken as the most recent job
    const afterHeadingLine = workHistory.slice(workHistory.indexOf('\n') + 1 || workHistory.length);
    const paragraphs = afterHeadingLine.split(/\n\s*\n+/).map((p) => p.trim()).filter(Boolean);
    mostRecentJob = paragraphs[0] ?? '';
  }

  return { full, header, workHistory, mostRecentJob };
}

export class TaxonomyMatcher {
  private readonly titleIndex: Array<{ category: string; pattern: RegExp }>;
  private readonly skillIndex: Array<{ category: string; pattern: RegExp; wordCount: number }>;
  private readonly byName: Map<string, TaxonomyCategory>;

  constructor(readonly categories: readonly TaxonomyCategory[], private readonly logger: Logger = baseLogger) {
    this.byName = new Map(categories.map((c) => [c.name, c]));
    this.titleIndex = categories.flatMap((c) =>
      c.jobTitles.map((title) => ({ category: c.name, pattern: termPattern(title) })),
    );
    this.skillIndex = categories.flatMap((c) =>
      c.skills.map((skill) => ({
        category: c.name,
        pattern: termPattern(skill),
        wordCount: skill.trim().split(/\s+/).length,
      })),
    );
  }

  /** Scores every category against the resume, highest first, positive scores only. */
  score(resumeText: string): CategoryScore[] {
    const regions = splitResumeRegions(resumeText);
    const totals = new Map<string, number>();
    const add = (category: string, points: number) => {
      if (points > 0) totals.set(category, (totals.get(category) ?? 0) + points);
    };

    for (const { category, pattern } of this.titleIndex) {
      const header = countMatches(pattern, regions.header);
      const mostRecent = countMatches(pattern, regions.mostRecentJob);
      const work = countMatches(pattern, regions.workHistory);
      const full = countMatches(pattern, regions.full);
      const elsewhere = Math.max(0, full - header - work);
      add(
        category,
        header * WEIGHTS.header
          + mostRecent * WEIGHTS.mostRecentJob
          + work * WEIGHTS.workHistory
          + elsewhere * WEIGHTS.elsewhere,
      );
    }

    for (const { category, pattern, wordCount } of this.skillIndex) {
      const full = countMatches(pattern, regions.full);
      if (full === 0) continue;
      const work = countMatches(pattern, regions.workHistory);
      add(category, full * (1 + 0.1 * wordCount) + work * WEIGHTS.workHistorySkillBonus);
    }

    return [...totals.entries()]
      .map(([name, score]) => ({ name, score }))
      .sort((a, b) => b.score - a.score);
  }

  match(resumeText: string, maxCategories: number, context: Record<string, unknown> = {}): TaxonomyMatch {
    const scores = this.score(resumeText);
    const selected = selectCategories(scores, maxCategories);
    if (selected.length > 0) {
      this.logger.debug({ ...context, selected, top: scores.slice(0, 5) }, 'Taxonomy categories selected');
    } else {
      this.logger.debug(context, 'No taxonomy categories detected');
    }
    return { scores, selected, context: this.formatContext(selected) };
  }

  formatContext(selected: readonly string[]): string {
    if (selected.length === 0) return '';
    let text = 'SKILLS TAXONOMY REFERENCE:\n\n';
    for (const name of selected) {
      const category = this.byName.get(name);
      if (!category) continue;
      text += `## ${name}\n`;
      if (category.jobTitles.length > 0) {
        text += `Relevant job titles: ${category.jobTitles.slice(0, MAX_CONTEXT_TITLES).join(', ')}`;
        if (category.jobTitles.length > MAX_CONTEXT_TITLES) {
          text += `, and ${category.jobTitles.length - MAX_CONTEXT_TITLES} more`;
        }
        text += '\n';
      }
      if (category.skills.length > 0) {
        text += `Skills in this category: ${category.skills.slice(0, MAX_CONTEXT_SKILLS).join(', ')}`;
        if (category.skills.length > MAX_CONTEXT_SKILLS) {
          text += `, and ${category.skills.length - MAX_CONTEXT_SKILLS} more`;
        }
        text += '\n';
      }
      text += '\n';
    }
    return text;
  }
}

/**
 * Keeps the top category plus any other within 20% of its score, up to
 * `maxCategories`. Expects scores sorted highest first.
 */
export function selectCategories(scores: readonly CategoryScore[], maxCategories: number): string[] {
  if (scores.length === 0 || maxCategories < 1 || scores[0].score <= 0) return [];
  const top = scores[0].score;
  const threshold = top - SELECTION_MARGIN * top;
  const selected = [scores[0].name];
  for (const candidate of scores.slice(1)) {
    if (selected.length >= maxCategories) break;
    if (candidate.score >= threshold) selected.push(candidate.name);
  }
  return selected;
}

export function loadTaxonomy(filePath = dataPath('taxonomy.json')): TaxonomyCategory[] {
  const raw: unknown = JSON.parse(readFileSync(filePath, 'utf8'));
  return TaxonomyFileSchema.parse(raw).categories;
}

let cachedMatcher: TaxonomyMatcher | null = null;

/** Process-wide matcher, built on first use and read-only afterwards. */
export function getTaxonomyMatcher(filePath?: string): TaxonomyMatcher {
  if (!cachedMatcher) {
    const categories = loadTaxonomy(filePath);
    baseLogger.info({ categories: categories.length }, 'Loaded skills taxonomy');
    cachedMatcher = new TaxonomyMatcher(categories);
  }
  return cachedMatcher;
}
