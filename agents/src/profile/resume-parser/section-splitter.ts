/**
 * Section Splitter - keyword-boundary scanning of resume lines.
 *
 * Each section is found by its own full pass over the text, so two sections
 * may disagree on where a shared boundary lies.
 */

import { SECTION_RULES, containsKeyword, type ResumeSection, type SectionRule } from './keywords.js';

export type SectionLines = Record<ResumeSection, string[]>;

/**
 * Collect the non-blank lines that follow a trigger line, up to the first line
 * containing a boundary keyword. The trigger line itself is consumed as the header.
 */
export function extractSectionLines(lines: readonly string[], rule: SectionRule): string[] {
  const captured: string[] = [];
  let inSection = false;

  for (const rawLine of lines) {
    const line = rawLine.trim();

    if (!inSection) {
      if (containsKeyword(line, rule.triggers)) inSection = true;
      continue;
    }

    if (containsKeyword(line, rule.boundaries)) break;
    if (line) captured.push(line);
  }

  return captured;
}

export function splitResumeSections(text: string): SectionLines {
  const lines = text.split('\n');

  return {
    education: extractSectionLines(lines, SECTION_RULES.education),
    experience: extractSectionLines(lines, SECTION_RULES.experience),
    skills: extractSectionLines(lines, SECTION_RULES.skills),
    projects: extractSectionLines(lines, SECTION_RULES.projects),
  };
}
