/**
 * Answer Generator - LLM answers for open-ended application questions.
 *
 * Never throws: a failed or empty completion is replaced by a canned fallback.
 */

import { complete, createPromptTemplate, executeTemplate } from '@jobfill/llm';
import type { ResumeDocument } from '../profile/resume-parser/schema.js';
import { LlmConfigSchema, type LlmConfig } from '../shared/config.js';
import { createLogger } from '../shared/logger.js';
import { getFallbackAnswer } from './fallback-answer.js';
import type { AnswerSource } from './types.js';

const log = createLogger('AnswerGenerator');

const PROMPT_SKILL_LIMIT = 10;
const PROMPT_PROJECT_LIMIT = 3;

const ANSWER_TEMPLATE = createPromptTemplate(
  `Based on the following resume information, provide a professional and tailored answer to the question below.

CANDIDATE INFORMATION:
{candidate}

EDUCATION:
{education}

WORK EXPERIENCE:
{experience}

SKILLS:
{skills}
{projects}{context}
QUESTION TO ANSWER:
{question}

INSTRUCTIONS:
1. Provide a professional, concise answer (150-300 words)
2. Use specific examples from the candidate's experience when relevant
3. Maintain a positive and confident tone
4. Focus on how the candidate's background relates to the question
5. Do not make up information not present in the resume`,
  {
    system:
      "You are a professional resume assistant helping to fill job application forms. Provide concise, professional answers based on the candidate's resume data.",
  },
);

const na = (value: string | undefined): string => value ?? 'N/A';

export function buildAnswerPrompt(
  question: string,
  resume: ResumeDocument,
  context?: string,
): { prompt: string; system?: string } {
  const { personalInfo } = resume;

  const projects = resume.projects.slice(0, PROMPT_PROJECT_LIMIT);

  return executeTemplate(ANSWER_TEMPLATE, {
    candidate: `Name: ${na(personalInfo.name)}\nEmail: ${na(personalInfo.email)}`,
    education: resume.education
      .map((e) => `- ${na(e.degree)} from ${na(e.institution)} (${na(e.year)})`)
      .join('\n'),
    experience: resume.workExperience
      .map((e) => `- ${na(e.position)} at ${na(e.company)} (${na(e.duration)})`)
      .join('\n'),
    skills: resume.skills.slice(0, PROMPT_SKILL_LIMIT).join(', '),
    projects:
      projects.length > 0
        ? `\nPROJECTS:\n${projects.map((p) => `- ${p.name}: ${p.description}`).join('\n')}\n`
        : '',
    context: context ? `\nADDITIONAL CONTEXT:\n${context}\n` : '',
    question,
  });
}

export class AnswerGenerator implements AnswerSource {
  private readonly config: LlmConfig;

  constructor(config: Partial<LlmConfig> = {}) {
    this.config = LlmConfigSchema.parse(config);
  }

  async generateAnswer(question: string, resume: ResumeDocument, context?: string): Promise<string> {
    const { prompt, system } = buildAnswerPrompt(question, resume, context);

    try {
      const response = await complete(prompt, 'GENERAL', {
        model: this.config.model,
        baseUrl: this.config.baseUrl,
        temperature: this.config.temperature,
        maxTokens: this.config.maxTokens,
        timeout: this.config.timeout,
        system,
      });

      const answer = response.trim();
      if (answer) {
        log.info(`Generated answer for question: ${question.slice(0, 50)}...`);
        return answer;
      }

      log.warn(`Empty completion for question: ${question.slice(0, 50)}...`);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.error(`Error generating AI answer: ${message}`);
    }

    return getFallbackAnswer(question, resume);
  }
}
