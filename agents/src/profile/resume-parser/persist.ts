/**
 * JSON snapshot of a parsed resume, written for traceability.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { ResumeSnapshotSchema, type ResumeDocument, type ResumeSnapshot } from './schema.js';

export function toSnapshot(resume: ResumeDocument): ResumeSnapshot {
  return {
    personal_info: resume.personalInfo,
    education: resume.education,
    work_experience: resume.workExperience,
    skills: resume.skills,
    projects: resume.projects,
    raw_text: resume.rawText,
  };
}

export function fromSnapshot(snapshot: ResumeSnapshot): ResumeDocument {
  return {
    personalInfo: snapshot.personal_info,
    education: snapshot.education,
    workExperience: snapshot.work_experience,
    skills: snapshot.skills,
    projects: snapshot.projects,
    rawText: snapshot.raw_text,
  };
}

export async function saveParsedResume(
  resume: ResumeDocument,
  outputFile = 'parsed_resume.json',
): Promise<string> {
  const absolutePath = path.resolve(outputFile);
  await fs.mkdir(path.dirname(absolutePath), { recursive: true });
  await fs.writeFile(absolutePath, JSON.stringify(toSnapshot(resume), null, 2), 'utf-8');
  return absolutePath;
}

/**
 * Read a snapshot back. Throws when the file is missing or does not match the schema.
 */
export async function loadParsedResume(inputFile: string): Promise<ResumeDocument> {
  const content = await fs.readFile(path.resolve(inputFile), 'utf-8');
  const parsed: unknown = JSON.parse(content);
  return fromSnapshot(ResumeSnapshotSchema.parse(parsed));
}
