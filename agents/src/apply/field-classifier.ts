/**
 * Field classification: answer directly from the resume, generate prose, or
 * fall back to a type-based default.
 */

import type { ResumeDocument } from '../profile/resume-parser/schema.js';
import { getDirectAnswer } from './direct-answer.js';
import type { FieldClassification } from './types.js';

export const ABSTRACT_KEYWORDS = [
  'why',
  'describe',
  'explain',
  'tell us',
  'what motivates',
  'your greatest',
  'how would you',
  'what interests you',
  'your goals',
  'your passion',
  'cover letter',
  'personal statement',
  'objective',
  'summary',
] as const;

const LONG_QUESTION_LENGTH = 50;

/**
 * True when a question needs generated prose rather than a lookup.
 */
export function isAbstractQuestion(question: string, fieldType = 'text'): boolean {
  if (fieldType === 'textarea' || question.length > LONG_QUESTION_LENGTH) {
    return true;
  }

  const lower = question.toLowerCase();
  return ABSTRACT_KEYWORDS.some((keyword) => lower.includes(keyword));
}

export function classifyField(
  question: string,
  fieldType: string,
  resume: ResumeDocument,
): FieldClassification {
  const direct = getDirectAnswer(question, resume);
  if (direct) return { kind: 'direct', value: direct };

  if (isAbstractQuestion(question, fieldType)) return { kind: 'abstract' };

  return { kind: 'default' };
}
