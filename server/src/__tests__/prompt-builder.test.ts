import { describe, it, expect } from 'vitest';
import {
  MAX_RESUME_CHARS,
  TRUNCATION_MARKER,
  buildExtractionPrompt,
  buildQuestionList,
  truncateMiddle,
} from '../extraction/prompt-builder.js';

describe('truncateMiddle', () => {
  it('leaves short text alone', () => {
    expect(truncateMiddle('short resume')).toBe('short resume');
  });

  it('keeps the head and tail around the marker', () => {
    const text = 'x'.repeat(10) + 'y'.repeat(10);
    expect(truncateMiddle(text, TRUNCATION_MARKER.length + 4)).toBe(`xx${TRUNCATION_MARKER}yy`);
  });

  it('caps resumes at the default limit', () => {
    expect(truncateMiddle('z'.repeat(MAX_RESUME_CHARS + 500))).toHaveLength(MAX_RESUME_CHARS);
  });
});

describe('buildQuestionList', () => {
  const list = buildQuestionList();

  it('opens with the personal section', () => {
    expect(list.startsWith('PERSONAL INFORMATION:\n- Their First Name:\n- Their Middle Name:\n')).toBe(true);
  });

  it('asks for each job slot in rank order', () => {
    expect(list).toContain(
      'WORK HISTORY:\n'
      + '- Most Recent Company Worked for:\n'
      + '- Most Recent Start Date (YYYY-MM-DD):\n'
      + '- Most Recent End Date (YYYY-MM-DD):\n'
      + '- Most Recent Job Location:\n'
      + '- Second Most Recent Company Worked for:',
    );
    expect(list).toContain('- Seventh Most Recent Job Location:\n\nCAREER PROFILE:');
  });

  it('expands the ranked software and hardware questions', () => {
    expect(list).toContain('- What software do they talk about using the most?:');
    expect(list).toContain('- What physical hardware do they talk about using the fifth most?:');
  });
});

describe('buildExtractionPrompt', () => {
  it('ends with the trimmed resume and omits an empty taxonomy block', () => {
    const prompt = buildExtractionPrompt('  Jane Doe\nData Engineer  ');
    expect(prompt.system).toContain('Write NULL when the resume does not contain the answer.');
    expect(prompt.user.endsWith('\n\nRESUME:\nJane Doe\nData Engineer')).toBe(true);
    expect(prompt.user).not.toContain('Use this reference');
  });

  it('places the taxonomy block before the resume', () => {
    const prompt = buildExtractionPrompt('Jane Doe', '  ## Data\n');
    expect(prompt.user.endsWith(
      'Use this reference to choose titles, categories and skills that match the candidate\'s field:'
      + '\n\n## Data\n\nRESUME:\nJane Doe',
    )).toBe(true);
  });
});
