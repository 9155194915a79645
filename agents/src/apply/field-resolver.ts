import type { ResumeDocument } from '../profile/resume-parser/schema.js';
import { classifyField } from './field-classifier.js';
import { extractQuestion } from './field-question.js';
import { getDefaultValue } from './fallback-answer.js';
import type { AnswerSource, FieldResolution, FormField } from './types.js';

/**
 * Value for one field: direct resume fact, then generated prose for abstract
 * questions, then the type-based default.
 */
export async function resolveFieldValue(
  field: FormField,
  resume: ResumeDocument,
  answers: AnswerSource,
): Promise<FieldResolution> {
  const question = extractQuestion(field);
  const classification = classifyField(question, field.type, resume);

  switch (classification.kind) {
    case 'direct':
      return { source: 'direct', question, value: classification.value };
    case 'abstract':
      return { source: 'generated', question, value: await answers.generateAnswer(question, resume) };
    case 'default':
      return { source: 'default', question, value: getDefaultValue(field, resume) };
  }
}
