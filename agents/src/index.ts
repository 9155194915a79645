/**
 * @jobfill/agents - resume parsing and form filling
 *
 * - profile/  : Resume parsing into a ResumeDocument
 * - apply/    : Field classification, value resolution and the fill loop
 * - shared/   : Agent base class, logger, configuration
 */

export * from './shared/index.js';
export * from './profile/index.js';
export * from './apply/index.js';
