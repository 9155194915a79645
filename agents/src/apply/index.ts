/**
 * Apply - form field resolution and filling
 *
 * - field-classifier / direct-answer / fallback-answer: per-field value policy
 * - answer-generator: LLM answers for open-ended questions
 * - form-fill: the fill loop and its results summary
 * - playwright-form: browser-side collaborators
 */

export * from './types.js';
export * from './field-question.js';
export * from './field-classifier.js';
export * from './direct-answer.js';
export * from './fallback-answer.js';
export * from './answer-generator.js';
export * from './field-resolver.js';
export * from './form-fill.js';
export * from './playwright-form.js';
