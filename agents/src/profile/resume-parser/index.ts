/**
 * Resume Parser Agent
 *
 * Turns a resume file into a ResumeDocument:
 * - Text extraction (pdf-parse / mammoth)
 * - Personal info via regex over the whole text
 * - Education, experience, skills, projects via keyword-bounded sections
 *
 * Code-only: no LLM involvement.
 */

import { BaseAgent } from '../../shared/base-agent.js';
import type { AgentConfig, AgentContext } from '../../shared/types.js';
import {
  ResumeParserInputSchema,
  ResumeDocumentSchema,
  type ResumeParserInput,
  type ResumeDocument,
} from './schema.js';
import { extractText } from './extract-text.js';
import { parseResumeText } from './parse-sections.js';
import { saveParsedResume } from './persist.js';

/**
 * Parse a resume file. Throws on unsupported formats and reader failures.
 */
export async function parseResumeFile(filePath: string): Promise<ResumeDocument> {
  const extracted = await extractText(filePath);
  return parseResumeText(extracted.text);
}

export class ResumeParserAgent extends BaseAgent<ResumeParserInput, ResumeDocument> {
  config: AgentConfig = {
    name: 'ResumeParserAgent',
    description: 'Extracts structured resume data from PDF/Word files with keyword heuristics',
    version: '1.0.0',
  };

  inputSchema = ResumeParserInputSchema;
  outputSchema = ResumeDocumentSchema;

  protected async run(input: ResumeParserInput, _context: AgentContext): Promise<ResumeDocument> {
    const { filePath, outputFile } = input;

    this.info('Extracting text from resume file', { filePath });
    const extracted = await extractText(filePath);
    this.debug(`Extracted ${extracted.numPages} page(s), ${extracted.text.length} chars`);

    const resume = parseResumeText(extracted.text);

    this.info(`Parsed resume for: ${resume.personalInfo.name ?? 'Unknown'}`);
    this.info(`Email: ${resume.personalInfo.email ?? 'Not found'}`);
    this.info(
      `Found ${resume.workExperience.length} work experience(s), ` +
        `${resume.education.length} education entr${resume.education.length === 1 ? 'y' : 'ies'}, ` +
        `${resume.skills.length} skill(s), ${resume.projects.length} project(s)`,
    );

    if (outputFile) {
      const written = await saveParsedResume(resume, outputFile);
      this.info(`Parsed resume data saved to ${written}`);
    }

    return resume;
  }
}

export const resumeParserAgent = new ResumeParserAgent();

export * from './schema.js';
export * from './keywords.js';
export { extractText, findResumeFile, SUPPORTED_RESUME_EXTENSIONS } from './extract-text.js';
export { extractPersonalInfo } from './parse-basic.js';
export { splitResumeSections, extractSectionLines, type SectionLines } from './section-splitter.js';
export {
  extractEducation,
  extractWorkExperience,
  extractSkills,
  extractProjects,
} from './section-extractors.js';
export { parseResumeText } from './parse-sections.js';
export { saveParsedResume, loadParsedResume, toSnapshot, fromSnapshot } from './persist.js';
