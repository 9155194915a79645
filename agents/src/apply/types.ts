/**
 * Types for the apply flow: detected form fields, per-field resolutions and
 * the collaborators the fill loop talks to.
 */

import { z } from 'zod';
import type { ResumeDocument } from '../profile/resume-parser/schema.js';

export const FormFieldSchema = z.object({
  /** HTML input type, or the tag name for textarea/select */
  type: z.string().default('text'),
  label: z.string().default(''),
  placeholder: z.string().default(''),
  name: z.string().default(''),
  id: z.string().default(''),
  value: z.string().default(''),
  required: z.boolean().default(false),
  visible: z.boolean().default(true),
  selector: z.string().min(1),
});

export type FormField = z.infer<typeof FormFieldSchema>;
export type FormFieldInput = z.input<typeof FormFieldSchema>;

export type FieldClassification =
  | { kind: 'direct'; value: string }
  | { kind: 'abstract' }
  | { kind: 'default' };

export type ResolutionSource = 'direct' | 'generated' | 'default';

export interface FieldResolution {
  source: ResolutionSource;
  question: string;
  /** Empty string means "skip this field" */
  value: string;
}

export type FieldOutcomeStatus = 'filled' | 'hidden' | 'no-value' | 'fill-failed' | 'error';

export interface FieldOutcome {
  selector: string;
  status: FieldOutcomeStatus;
  question?: string;
  source?: ResolutionSource;
}

export interface FillResults {
  totalFields: number;
  filledFields: number;
  errors: string[];
  success: boolean;
  outcomes: FieldOutcome[];
}

/** Supplies the fields detected inside the selected form area. */
export interface FormFieldSource {
  getFormFields(): Promise<FormField[]>;
}

/** Writes one value into the page; false when the field could not be filled. */
export interface FieldFiller {
  fillField(selector: string, value: string, fieldType: string): Promise<boolean>;
}

/** Produces prose for open-ended questions. Implementations must not throw. */
export interface AnswerSource {
  generateAnswer(question: string, resume: ResumeDocument, context?: string): Promise<string>;
}
