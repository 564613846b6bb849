import { readFileSync } from 'node:fs';
import { z } from 'zod';
import baseLogger, { type Logger } from '../lib/logger.js';
import { dataPath } from '../lib/data-path.js';
import { calculateTenure, roundTo } from './dates.js';
import { JOB_SLOTS, jobField, type FieldName, type ParsedFieldSet } from './fields.js';

export interface JobEntry {
  company: string | null;
  startDate: string | null;
  endDate: string | null;
  location: string | null;
}

export interface JobMetric {
  company: string;
  location: string | null;
  tenureYears: number;
  confidence: number;
  isCurrent: boolean;
  startDate: Date | null;
  endDate: Date | null;
}

export interface ExperienceMetrics {
  perJob: JobMetric[];
  totalExperience: number;
  avgTenure: number;
  usExperience: number;
  overallConfidence: number;
}

const UsTokenFileSchema = z.object({
  stateCodes: z.array(z.string().regex(/^[A-Z]{2}$/)),
  countryTokens: z.array(z.string().min(1)),
  looseMarkers: z.array(z.string().min(1)),
});

export interface UsLocationMatcher {
  /** `, XX` state code or a country token. */
  isUsLocation(location: string): boolean;
  /** Looser check used only when no job counted as US work. */
  hasUsMarker(location: string): boolean;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function createUsLocationMatcher(tokens: z.infer<typeof UsTokenFileSchema>): UsLocationMatcher {
  const statePattern = new RegExp(`,\\s*(?:${tokens.stateCodes.join('|')})\\b`);
  const countryPattern = new RegExp(
    `(?<![A-Z])(?:${tokens.countryTokens.map(escapeRegExp).join('|')})(?![A-Z])`,
  );
  const looseMarkers = tokens.looseMarkers;
  return {
    isUsLocation(location) {
      const upper = location.toUpperCase();
      return statePattern.test(upper) || countryPattern.test(upper);
    },
    hasUsMarker(location) {
      const upper = location.toUpperCase();
      return looseMarkers.some((marker) => upper.includes(marker));
    },
  };
}

let cachedMatcher: UsLocationMatcher | null = null;

export function getUsLocationMatcher(): UsLocationMatcher {
  if (!cachedMatcher) {
    const raw: unknown = JSON.parse(readFileSync(dataPath('us-location-tokens.json'), 'utf8'));
    cachedMatcher = createUsLocationMatcher(UsTokenFileSchema.parse(raw));
  }
  return cachedMatcher;
}

export interface ExperienceOptions {
  today?: Date;
  logger?: Logger;
  usMatcher?: UsLocationMatcher;
}

export function calculateExperienceMetrics(jobs: JobEntry[], options: ExperienceOptions = {}): ExperienceMetrics {
  const metrics: ExperienceMetrics = {
    perJob: [],
    totalExperience: 0,
    avgTenure: 0,
    usExperience: 0,
    overallConfidence: 0,
  };
  if (jobs.length === 0) return metrics;

  const usMatcher = options.usMatcher ?? getUsLocationMatcher();
  let totalTenure = 0;
  let usTenure = 0;
  let totalConfidence = 0;
  let validJobs = 0;
  let usJobs = 0;

  for (const job of jobs) {
    if (!job.company || job.company.toUpperCase() === 'NULL') continue;

    const tenure = calculateTenure(job.startDate, job.endDate, { today: options.today, logger: options.logger });
    metrics.perJob.push({
      company: job.company,
      location: job.location,
      tenureYears: tenure.tenureYears,
      confidence: tenure.confidence,
      isCurrent: tenure.isCurrent,
      startDate: tenure.startDate,
      endDate: tenure.endDate,
    });

    if (tenure.tenureYears <= 0 || tenure.confidence <= 0) continue;
    totalTenure += tenure.tenureYears;
    totalConfidence += tenure.confidence;
    validJobs += 1;

    if (job.location && usMatcher.isUsLocation(job.location)) {
      usTenure += tenure.tenureYears;
      usJobs += 1;
    }
  }

  if (validJobs > 0) {
    metrics.totalExperience = roundTo(totalTenure, 1);
    metrics.avgTenure = roundTo(totalTenure / validJobs, 1);
    metrics.overallConfidence = totalConfidence / validJobs;
  }
  if (usJobs > 0) {
    metrics.usExperience = roundTo(usTenure, 1);
  }
  return metrics;
}

/** Work-history slots that name a company, most recent first. */
export function jobsFromFields(fields: ParsedFieldSet): JobEntry[] {
  const jobs: JobEntry[] = [];
  for (const slot of JOB_SLOTS) {
    const company = fields.get(jobField(slot, 'Company'));
    if (!company) continue;
    jobs.push({
      company,
      startDate: fields.get(jobField(slot, 'StartDate')),
      endDate: fields.get(jobField(slot, 'EndDate')),
      location: fields.get(jobField(slot, 'Location')),
    });
  }
  return jobs;
}

export interface ExperienceMergeResult {
  fields: ParsedFieldSet;
  metrics: ExperienceMetrics;
  /** Fields the merge filled because the model left them unknown. */
  filled: FieldName[];
}

const formatYears = (value: number) => value.toFixed(1);

/**
 * Fills years of experience, average tenure and US tenure from the work
 * history. A value the model supplied is always kept.
 */
export function mergeExperienceMetrics(source: ParsedFieldSet, options: ExperienceOptions = {}): ExperienceMergeResult {
  const log = options.logger ?? baseLogger;
  const usMatcher = options.usMatcher ?? getUsLocationMatcher();
  const fields = source.clone();
  const jobs = jobsFromFields(fields);
  const metrics = calculateExperienceMetrics(jobs, { ...options, usMatcher });
  const filled: FieldName[] = [];

  const fill = (field: FieldName, value: string, reason: string) => {
    if (fields.fill(field, value)) {
      filled.push(field);
      log.debug({ field, value, reason, confidence: metrics.overallConfidence }, 'Filled experience field');
    }
  };

  const current = metrics.perJob.filter((job) => job.isCurrent).map((job) => job.company);
  if (current.length > 0) {
    log.debug({ companies: current }, 'Current positions detected');
  }

  if (!fields.isKnown('yearsOfExperience')) {
    if (metrics.totalExperience > 0) {
      fill('yearsOfExperience', formatYears(metrics.totalExperience), 'computed');
    } else if (jobs.length > 0) {
      fill('yearsOfExperience', String(jobs.length), 'job count');
    }
  }

  if (!fields.isKnown('avgTenure') && metrics.avgTenure > 0) {
    fill('avgTenure', formatYears(metrics.avgTenure), 'computed');
  }

  if (!fields.isKnown('lengthInUs')) {
    if (metrics.usExperience > 0) {
      fill('lengthInUs', formatYears(metrics.usExperience), 'computed');
    } else if (
      metrics.totalExperience > 0
      && jobs.some((job) => job.location !== null && usMatcher.hasUsMarker(job.location))
    ) {
      fill('lengthInUs', formatYears(metrics.totalExperience), 'US marker in location');
    }
  }

  return { fields, metrics, filled };
}
