/**
 * Form fill loop - resolves and fills every detected field in detection order.
 *
 * A failure on one field is recorded in the results and the loop moves on;
 * only a failure to collect the fields marks the whole run unsuccessful.
 */

import type { ResumeDocument } from '../profile/resume-parser/schema.js';
import { createLogger } from '../shared/logger.js';
import { resolveFieldValue } from './field-resolver.js';
import type { AnswerSource, FieldFiller, FillResults, FormFieldSource } from './types.js';

const log = createLogger('FormFill');

export interface FormFillDeps {
  filler: FieldFiller;
  answers: AnswerSource;
  onProgress?: (message: string) => void | Promise<void>;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export async function autoFillForm(
  source: FormFieldSource,
  resume: ResumeDocument,
  deps: FormFillDeps,
): Promise<FillResults> {
  const results: FillResults = {
    totalFields: 0,
    filledFields: 0,
    errors: [],
    success: true,
    outcomes: [],
  };

  const report = async (message: string): Promise<void> => {
    log.debug(message);
    if (deps.onProgress) await deps.onProgress(message);
  };

  try {
    await report('Analyzing form fields...');

    const fields = await source.getFormFields();
    results.totalFields = fields.length;
    log.info(`Found ${fields.length} form elements`);

    await report(`Found ${fields.length} fields. Starting auto-fill...`);

    for (const field of fields) {
      try {
        log.debug('Processing element', field);

        if (!field.visible) {
          results.outcomes.push({ selector: field.selector, status: 'hidden' });
          continue;
        }

        const resolution = await resolveFieldValue(field, resume, deps.answers);
        const outcome = {
          selector: field.selector,
          question: resolution.question,
          source: resolution.source,
        };

        if (!resolution.value) {
          log.warn(`Cannot find value for ${field.selector}`);
          results.outcomes.push({ ...outcome, status: 'no-value' });
          continue;
        }

        const filled = await deps.filler.fillField(field.selector, resolution.value, field.type);
        if (filled) {
          results.filledFields += 1;
          results.outcomes.push({ ...outcome, status: 'filled' });
          await report(`Filled ${results.filledFields}/${results.totalFields} fields`);
        } else {
          results.errors.push(`Failed to fill ${field.selector}`);
          results.outcomes.push({ ...outcome, status: 'fill-failed' });
        }
      } catch (error) {
        const message = `Error processing element ${field.selector}: ${errorMessage(error)}`;
        results.errors.push(message);
        results.outcomes.push({ selector: field.selector, status: 'error' });
        log.error(message);
      }
    }

    await report(`Completed! Filled ${results.filledFields}/${results.totalFields} fields`);
  } catch (error) {
    results.success = false;
    results.errors.push(`Form filling failed: ${errorMessage(error)}`);
    log.error(`Auto-fill form error: ${errorMessage(error)}`);
  }

  return results;
}

export interface FormAreaSession {
  /** Fills the fields inside one form area */
  fillArea: (areaSelector: string) => Promise<FillResults>;
  /** Next area selector to fill; blank ends the session */
  nextArea: () => Promise<string>;
}

/**
 * Fill form areas one after another, starting with `firstArea`, until
 * `nextArea` answers blank. The page stays open while `nextArea` waits.
 */
export async function fillFormAreas(
  firstArea: string,
  session: FormAreaSession,
): Promise<Array<{ areaSelector: string; results: FillResults }>> {
  const filled: Array<{ areaSelector: string; results: FillResults }> = [];
  let areaSelector = firstArea.trim();

  while (areaSelector) {
    log.info(`Filling form area ${areaSelector}`);
    filled.push({ areaSelector, results: await session.fillArea(areaSelector) });
    areaSelector = (await session.nextArea()).trim();
  }

  return filled;
}

export interface FillSummary {
  successRate: number;
  lines: string[];
}

export function summarizeFillResults(results: FillResults): FillSummary {
  const successRate =
    results.totalFields > 0 ? (results.filledFields / results.totalFields) * 100 : 0;

  const lines = [
    '=== AUTO-FILL RESULTS ===',
    `Total fields found: ${results.totalFields}`,
    `Fields successfully filled: ${results.filledFields}`,
  ];

  if (results.errors.length > 0) {
    lines.push(`Errors encountered: ${results.errors.length}`);
    lines.push(...results.errors.map((e) => `  - ${e}`));
  }

  lines.push(`Success rate: ${successRate.toFixed(1)}%`);
  lines.push(results.success ? 'Auto-fill completed successfully!' : 'Auto-fill completed with errors');

  return { successRate, lines };
}
