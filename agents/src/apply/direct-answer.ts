/**
 * Direct answers: question keywords mapped to resume facts.
 * Checked in order and the first matching rule wins, so "Full name and email"
 * resolves to the name.
 */

import type { ResumeDocument } from '../profile/resume-parser/schema.js';

export const DIRECT_ANSWER_SKILL_COUNT = 5;

interface DirectRule {
  keywords: readonly string[];
  /** undefined lets the next rule try */
  answer: (resume: ResumeDocument) => string | undefined;
}

const DIRECT_RULES: readonly DirectRule[] = [
  { keywords: ['name', 'full name'], answer: (r) => r.personalInfo.name ?? '' },
  { keywords: ['email'], answer: (r) => r.personalInfo.email ?? '' },
  { keywords: ['phone'], answer: (r) => r.personalInfo.phone ?? '' },
  { keywords: ['linkedin'], answer: (r) => r.personalInfo.linkedin ?? '' },
  { keywords: ['github'], answer: (r) => r.personalInfo.github ?? '' },
  {
    keywords: ['university', 'school'],
    answer: (r) => (r.education.length > 0 ? (r.education[0].institution ?? '') : undefined),
  },
  {
    keywords: ['degree'],
    answer: (r) => (r.education.length > 0 ? (r.education[0].degree ?? '') : undefined),
  },
  {
    keywords: ['company', 'employer'],
    answer: (r) => (r.workExperience.length > 0 ? (r.workExperience[0].company ?? '') : undefined),
  },
  {
    keywords: ['position', 'title'],
    answer: (r) => (r.workExperience.length > 0 ? (r.workExperience[0].position ?? '') : undefined),
  },
  {
    keywords: ['skill'],
    answer: (r) => r.skills.slice(0, DIRECT_ANSWER_SKILL_COUNT).join(', '),
  },
];

/**
 * Resume fact for a question, or undefined when no rule applies.
 * A matched rule may still return '' when the resume lacks that fact.
 */
export function getDirectAnswer(question: string, resume: ResumeDocument): string | undefined {
  const lower = question.toLowerCase();

  for (const rule of DIRECT_RULES) {
    if (!rule.keywords.some((keyword) => lower.includes(keyword))) continue;
    const answer = rule.answer(resume);
    if (answer !== undefined) return answer;
  }

  return undefined;
}
