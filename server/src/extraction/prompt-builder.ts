import { getPhrasingCatalog, PROMPT_SECTIONS, type PhrasingCatalog } from './phrasings.js';

export const MAX_RESUME_CHARS = 60_000;
export const TRUNCATION_MARKER = '\n\n[... resume truncated ...]\n\n';

export interface ExtractionPrompt {
  system: string;
  user: string;
}

const SYSTEM_PROMPT = `You are an expert technical recruiter who reads resumes and records structured facts about the candidate.

Rules:
- Answer every question on its own line, copying the question text exactly, followed by a colon and your answer.
- Use only information stated in or directly implied by the resume. Never invent employers, dates or contact details.
- Write NULL when the resume does not contain the answer.
- Dates use YYYY-MM-DD when the full date is known, YYYY-MM when only month and year are known, and YYYY when only the year is known. Use Present as the end date of a current position.
- Numerical questions take a number only.
- List work history from most recent to oldest.`;

/** Keeps the head and tail of an over-long resume around a visible marker. */
export function truncateMiddle(text: string, maxChars = MAX_RESUME_CHARS): string {
  if (text.length <= maxChars) return text;
  const budget = Math.max(0, maxChars - TRUNCATION_MARKER.length);
  const head = Math.ceil(budget / 2);
  const tail = budget - head;
  return text.slice(0, head) + TRUNCATION_MARKER + (tail > 0 ? text.slice(text.length - tail) : '');
}

export function buildQuestionList(catalog: PhrasingCatalog = getPhrasingCatalog()): string {
  const blocks: string[] = [];
  for (const section of PROMPT_SECTIONS) {
    const lines = section.fields
      .map((field) => catalog.questionFor(field))
      .filter((question): question is string => question !== undefined)
      .map((question) => `- ${question}:`);
    if (lines.length > 0) blocks.push(`${section.title}:\n${lines.join('\n')}`);
  }
  return blocks.join('\n\n');
}

/**
 * Builds the instruction pair for one resume. The taxonomy block is included
 * only when non-empty.
 */
export function buildExtractionPrompt(
  resumeText: string,
  taxonomyContext = '',
  catalog: PhrasingCatalog = getPhrasingCatalog(),
): ExtractionPrompt {
  const parts = [
    'Answer the following questions about the candidate whose resume appears at the end.',
    buildQuestionList(catalog),
  ];
  if (taxonomyContext.trim()) {
    parts.push(
      'Use this reference to choose titles, categories and skills that match the candidate\'s field:',
      taxonomyContext.trim(),
    );
  }
  parts.push(`RESUME:\n${truncateMiddle(resumeText.trim())}`);
  return { system: SYSTEM_PROMPT, user: parts.join('\n\n') };
}
