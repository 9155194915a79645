/**
 * Section trigger keywords. Matching is a lowercase substring test, so order
 * and exact spelling define behavior.
 */

export const EDUCATION_KEYWORDS = [
  'education',
  'academic',
  'university',
  'college',
  'school',
  'degree',
  'bachelor',
  'master',
  'phd',
  'doctorate',
] as const;

export const EXPERIENCE_KEYWORDS = [
  'experience',
  'work',
  'employment',
  'career',
  'professional',
  'job',
  'position',
  'role',
] as const;

export const SKILLS_KEYWORDS = [
  'skills',
  'technical',
  'technologies',
  'programming',
  'languages',
  'tools',
  'frameworks',
] as const;

/** Contact lines live in the header; they never end a section. */
export const CONTACT_KEYWORDS = ['contact', 'phone', 'email', 'address', 'linkedin', 'github'] as const;

export const PROJECT_KEYWORDS = ['project'] as const;

export type ResumeSection = 'education' | 'experience' | 'skills' | 'projects';

export interface SectionRule {
  triggers: readonly string[];
  boundaries: readonly string[];
}

export const SECTION_RULES: Record<ResumeSection, SectionRule> = {
  education: {
    triggers: EDUCATION_KEYWORDS,
    boundaries: [...EXPERIENCE_KEYWORDS, ...SKILLS_KEYWORDS],
  },
  experience: {
    triggers: EXPERIENCE_KEYWORDS,
    boundaries: [...EDUCATION_KEYWORDS, ...SKILLS_KEYWORDS],
  },
  skills: {
    triggers: SKILLS_KEYWORDS,
    boundaries: [...EDUCATION_KEYWORDS, ...EXPERIENCE_KEYWORDS],
  },
  projects: {
    triggers: PROJECT_KEYWORDS,
    boundaries: [...EDUCATION_KEYWORDS, ...EXPERIENCE_KEYWORDS, ...SKILLS_KEYWORDS],
  },
};

export function containsKeyword(line: string, keywords: readonly string[]): boolean {
  const lower = line.toLowerCase();
  return keywords.some((keyword) => lower.includes(keyword));
}
