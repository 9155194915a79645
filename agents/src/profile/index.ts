/**
 * Profile-related agents.
 *
 * Agents in this module:
 * - ResumeParserAgent: Extracts a structured resume from PDF/DOCX
 */

export * from './resume-parser/index.js';
