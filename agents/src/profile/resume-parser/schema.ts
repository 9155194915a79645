/**
 * Zod schemas for the parsed resume document and its persisted snapshot.
 */

import { z } from 'zod';

export const PersonalInfoSchema = z.object({
  name: z.string().optional(),
  email: z.string().optional(),
  phone: z.string().optional(),
  linkedin: z.string().optional(),
  github: z.string().optional(),
});

export type PersonalInfo = z.infer<typeof PersonalInfoSchema>;

export const EducationEntrySchema = z.object({
  degree: z.string().optional(),
  institution: z.string().optional(),
  year: z.string().optional(),
});

export type EducationEntry = z.infer<typeof EducationEntrySchema>;

export const ExperienceEntrySchema = z.object({
  position: z.string().optional(),
  company: z.string().optional(),
  duration: z.string().optional(),
});

export type ExperienceEntry = z.infer<typeof ExperienceEntrySchema>;

export const ProjectEntrySchema = z.object({
  name: z.string(),
  description: z.string(),
});

export type ProjectEntry = z.infer<typeof ProjectEntrySchema>;

export const ResumeDocumentSchema = z.object({
  personalInfo: PersonalInfoSchema,
  education: z.array(EducationEntrySchema),
  workExperience: z.array(ExperienceEntrySchema),
  skills: z.array(z.string()),
  projects: z.array(ProjectEntrySchema),
  rawText: z.string(),
});

export type ResumeDocument = Readonly<z.infer<typeof ResumeDocumentSchema>>;

/**
 * On-disk shape written next to the run (snake_case keys).
 */
export const ResumeSnapshotSchema = z.object({
  personal_info: PersonalInfoSchema,
  education: z.array(EducationEntrySchema).default([]),
  work_experience: z.array(ExperienceEntrySchema).default([]),
  skills: z.array(z.string()).default([]),
  projects: z.array(ProjectEntrySchema).default([]),
  raw_text: z.string().default(''),
});

export type ResumeSnapshot = z.infer<typeof ResumeSnapshotSchema>;

export const ResumeParserInputSchema = z.object({
  filePath: z.string().min(1),
  /** When set, the snapshot is written here after parsing */
  outputFile: z.string().min(1).optional(),
});

export type ResumeParserInput = z.infer<typeof ResumeParserInputSchema>;
