/**
 * Section Extractors - field rules applied to the lines captured for one section.
 *
 * Education and experience fold every matching line into a single entry, so a
 * resume yields at most one of each; later lines overwrite earlier ones.
 */

import type { EducationEntry, ExperienceEntry, ProjectEntry } from './schema.js';

const DEGREE_PATTERNS = [
  /(bachelor|master|phd|doctorate|bs|ms|ba|ma|mba|degree)/i,
  /(b\.s\.|m\.s\.|b\.a\.|m\.a\.|ph\.d\.)/i,
];

const INSTITUTION_MARKERS = ['university', 'college', 'institute'];

const YEAR_PATTERN = /\b(19|20)\d{2}\b/;

const POSITION_KEYWORDS = ['engineer', 'developer', 'manager', 'analyst', 'specialist', 'coordinator'];

const COMPANY_SUFFIXES = ['inc', 'corp', 'llc', 'ltd'];

const DURATION_PATTERN = /\b(19|20)\d{2}\s*-\s*(19|20)\d{2}|\b(19|20)\d{2}\s*-\s*present/i;

const SKILL_DELIMITERS = /[,;|•·\n]/;

function includesAny(line: string, words: readonly string[]): boolean {
  const lower = line.toLowerCase();
  return words.some((word) => lower.includes(word));
}

export function extractEducation(lines: readonly string[]): EducationEntry[] {
  const current: EducationEntry = {};

  for (const line of lines) {
    if (DEGREE_PATTERNS.some((pattern) => pattern.test(line))) {
      current.degree = line;
    }

    if (includesAny(line, INSTITUTION_MARKERS)) {
      current.institution = line;
    }

    const year = line.match(YEAR_PATTERN);
    if (year) {
      current.year = year[0];
    }
  }

  return Object.keys(current).length > 0 ? [current] : [];
}

export function extractWorkExperience(lines: readonly string[]): ExperienceEntry[] {
  const current: ExperienceEntry = {};

  for (const line of lines) {
    if (includesAny(line, POSITION_KEYWORDS)) {
      current.position = line;
    }

    if (includesAny(line, COMPANY_SUFFIXES)) {
      current.company = line;
    }

    const duration = line.match(DURATION_PATTERN);
    if (duration) {
      current.duration = duration[0];
    }
  }

  return Object.keys(current).length > 0 ? [current] : [];
}

/**
 * Split skill lines on common delimiters. Order is kept and duplicates are not removed.
 */
export function extractSkills(lines: readonly string[]): string[] {
  const skills: string[] = [];

  for (const line of lines) {
    for (const item of line.split(SKILL_DELIMITERS)) {
      const skill = item.trim();
      if (skill.length > 1) skills.push(skill);
    }
  }

  return skills;
}

/**
 * Pair lines as name then description. A trailing name without a description is dropped.
 */
export function extractProjects(lines: readonly string[]): ProjectEntry[] {
  const projects: ProjectEntry[] = [];
  let pendingName: string | undefined;

  for (const line of lines) {
    if (!line) continue;

    if (pendingName === undefined) {
      pendingName = line;
    } else {
      projects.push({ name: pendingName, description: line });
      pendingName = undefined;
    }
  }

  return projects;
}
