/**
 * Raw text to ResumeDocument. Pure and deterministic: the same text always
 * yields a structurally identical document.
 */

import type { ResumeDocument } from './schema.js';
import { extractPersonalInfo } from './parse-basic.js';
import { splitResumeSections } from './section-splitter.js';
import {
  extractEducation,
  extractProjects,
  extractSkills,
  extractWorkExperience,
} from './section-extractors.js';

export function parseResumeText(text: string): ResumeDocument {
  const sections = splitResumeSections(text);

  return {
    personalInfo: extractPersonalInfo(text),
    education: extractEducation(sections.education),
    workExperience: extractWorkExperience(sections.experience),
    skills: extractSkills(sections.skills),
    projects: extractProjects(sections.projects),
    rawText: text,
  };
}
