/**
 * Personal info extraction using regex patterns over the whole resume text.
 */

import type { PersonalInfo } from './schema.js';

const NAME_SCAN_LINES = 5;

/**
 * Extract the candidate name from the first few non-empty lines.
 */
export function extractName(text: string): string | undefined {
  const lines = text
    .split('\n')
    .map((l) => l.trim())
    .filter((l) => l.length > 0)
    .slice(0, NAME_SCAN_LINES);

  return lines.find(
    (line) =>
      line.length > 2 &&
      line.split(/\s+/).length <= 4 &&
      !/\d/.test(line) &&
      !line.includes('@') &&
      !line.toLowerCase().includes('phone'),
  );
}

/**
 * Extract the first email address.
 */
export function extractEmail(text: string): string | undefined {
  const match = text.match(/\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/);
  return match?.[0];
}

// Tried in order; the first pattern with any match wins.
const PHONE_PATTERNS = [/\b\d{3}-\d{3}-\d{4}\b/, /\(\d{3}\)\s*\d{3}-\d{4}\b/, /\b\d{10}\b/];

/**
 * Extract the first phone number.
 * Handles formats: XXX-XXX-XXXX, (XXX) XXX-XXXX, XXXXXXXXXX
 */
export function extractPhone(text: string): string | undefined {
  for (const pattern of PHONE_PATTERNS) {
    const match = text.match(pattern);
    if (match) return match[0];
  }
  return undefined;
}

export function extractLinkedIn(text: string): string | undefined {
  return text.match(/linkedin\.com\/in\/[\w-]+/i)?.[0];
}

export function extractGitHub(text: string): string | undefined {
  return text.match(/github\.com\/[\w-]+/i)?.[0];
}

/**
 * Extract all personal info; keys with no match are omitted.
 */
export function extractPersonalInfo(text: string): PersonalInfo {
  const found: PersonalInfo = {
    name: extractName(text),
    email: extractEmail(text),
    phone: extractPhone(text),
    linkedin: extractLinkedIn(text),
    github: extractGitHub(text),
  };

  const info: PersonalInfo = {};
  for (const key of ['name', 'email', 'phone', 'linkedin', 'github'] as const) {
    const value = found[key];
    if (value !== undefined) info[key] = value;
  }
  return info;
}
