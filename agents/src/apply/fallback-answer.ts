/**
 * Canned answers used when generation is unavailable, and type-based defaults
 * for fields nothing else resolves.
 */

import type { ResumeDocument } from '../profile/resume-parser/schema.js';
import type { FormField } from './types.js';

type FallbackBucket = 'why' | 'strength' | 'experience' | 'motivation' | 'goal';

// Checked in declaration order; the first keyword found in the question wins.
const FALLBACK_TEMPLATES: Record<FallbackBucket, (skills: readonly string[]) => string> = {
  why: (skills) =>
    `Based on my background in ${skills.slice(0, 3).join(', ')}, I am excited about this opportunity to contribute my skills and experience.`,
  strength: (skills) =>
    `My key strengths include ${skills.slice(0, 5).join(', ')}, which I have developed through my professional experience.`,
  experience: (skills) =>
    `I have experience in ${skills.slice(0, 3).join(', ')} and have worked in roles that involved diverse responsibilities.`,
  motivation: () =>
    'I am motivated by challenging opportunities that allow me to apply my skills and contribute to meaningful projects.',
  goal: () =>
    'My career goal is to continue growing professionally while making meaningful contributions to innovative projects.',
};

const FALLBACK_ORDER: readonly FallbackBucket[] = ['why', 'strength', 'experience', 'motivation', 'goal'];

export const GENERIC_FALLBACK_ANSWER =
  'I believe my background and experience make me a strong candidate for this position, and I am excited about the opportunity to contribute to your team.';

export function getFallbackAnswer(question: string, resume: ResumeDocument): string {
  const lower = question.toLowerCase();
  const bucket = FALLBACK_ORDER.find((keyword) => lower.includes(keyword));
  return bucket ? FALLBACK_TEMPLATES[bucket](resume.skills) : GENERIC_FALLBACK_ANSWER;
}

/**
 * Default value from the field's input type or name; '' means skip.
 */
export function getDefaultValue(field: Pick<FormField, 'type' | 'name'>, resume: ResumeDocument): string {
  const fieldType = field.type.toLowerCase();
  const { personalInfo } = resume;

  if (fieldType === 'email') return personalInfo.email ?? '';
  if (fieldType === 'tel') return personalInfo.phone ?? '';
  if (field.name.toLowerCase().includes('name')) return personalInfo.name ?? '';

  return '';
}
