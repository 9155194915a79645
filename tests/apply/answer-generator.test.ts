import { describe, it, expect, vi, beforeEach } from 'vitest';
import { complete } from '@jobfill/llm';
import { AnswerGenerator, buildAnswerPrompt } from '../../agents/src/apply/answer-generator.js';
import { GENERIC_FALLBACK_ANSWER } from '../../agents/src/apply/fallback-answer.js';
import { makeResume } from '../fixtures/resume.js';

vi.mock('@jobfill/llm', async (importOriginal) => ({
  ...(await importOriginal<typeof import('@jobfill/llm')>()),
  complete: vi.fn(),
}));

const mockComplete = vi.mocked(complete);

describe('buildAnswerPrompt', () => {
  it('lists resume facts and the question', () => {
    const { prompt, system } = buildAnswerPrompt('Why us?', makeResume(), 'Remote role');

    expect(system).toContain('professional resume assistant');
    expect(prompt).toContain('Name: Jane Doe\nEmail: jane@example.com');
    expect(prompt).toContain('EDUCATION:\n- B.S. Computer Science from State University (2019)');
    expect(prompt).toContain('WORK EXPERIENCE:\n- Software Engineer at Acme Inc (2019 - Present)');
    expect(prompt).toContain('SKILLS:\nPython, TypeScript, Go, C++, Docker, Kubernetes\n');
    expect(prompt).toContain('PROJECTS:\n- Form Bot: Fills application forms\n');
    expect(prompt).toContain('ADDITIONAL CONTEXT:\nRemote role\n');
    expect(prompt).toContain('QUESTION TO ANSWER:\nWhy us?');
  });

  it('writes N/A for missing facts and omits empty optional blocks', () => {
    const resume = makeResume({
      personalInfo: {},
      education: [{ institution: 'State University' }],
      projects: [],
    });
    const { prompt } = buildAnswerPrompt('Why us?', resume);

    expect(prompt).toContain('Name: N/A\nEmail: N/A');
    expect(prompt).toContain('- N/A from State University (N/A)');
    expect(prompt).not.toContain('PROJECTS:');
    expect(prompt).not.toContain('ADDITIONAL CONTEXT:');
  });

  it('keeps braces in resume text as written', () => {
    const { prompt } = buildAnswerPrompt('Why us?', makeResume({ skills: ['Templating {question}'] }));

    expect(prompt).toContain('SKILLS:\nTemplating {question}\n');
    expect(prompt).toContain('QUESTION TO ANSWER:\nWhy us?');
  });

  it('caps skills at ten', () => {
    const skills = Array.from({ length: 12 }, (_, i) => `skill${i + 1}`);
    const { prompt } = buildAnswerPrompt('Why us?', makeResume({ skills }));

    expect(prompt).toContain(`SKILLS:\n${skills.slice(0, 10).join(', ')}\n`);
    expect(prompt).not.toContain('skill11');
  });
});

describe('AnswerGenerator', () => {
  beforeEach(() => {
    mockComplete.mockReset();
  });

  it('returns the trimmed completion', async () => {
    mockComplete.mockResolvedValue('  I enjoy building tools.\n');
    const generator = new AnswerGenerator({ model: 'test-model', temperature: 0.2 });

    const answer = await generator.generateAnswer('Why us?', makeResume());

    expect(answer).toBe('I enjoy building tools.');
    expect(mockComplete).toHaveBeenCalledTimes(1);
    const [prompt, modelType, options] = mockComplete.mock.calls[0];
    expect(prompt).toContain('QUESTION TO ANSWER:\nWhy us?');
    expect(modelType).toBe('GENERAL');
    expect(options).toMatchObject({
      model: 'test-model',
      temperature: 0.2,
      maxTokens: 500,
      timeout: 30000,
    });
    expect(options?.system).toContain('professional resume assistant');
  });

  it('falls back when the model call fails', async () => {
    mockComplete.mockRejectedValue(new Error('connection refused'));
    const generator = new AnswerGenerator();

    const answer = await generator.generateAnswer('Why do you want this job?', makeResume());

    expect(answer).toBe(
      'Based on my background in Python, TypeScript, Go, I am excited about this opportunity to contribute my skills and experience.',
    );
  });

  it('falls back when the model returns only whitespace', async () => {
    mockComplete.mockResolvedValue('   \n ');
    const generator = new AnswerGenerator();

    expect(await generator.generateAnswer('Tell us about yourself', makeResume())).toBe(
      GENERIC_FALLBACK_ANSWER,
    );
  });

  it('rejects invalid settings at construction', () => {
    expect(() => new AnswerGenerator({ temperature: 5 })).toThrow();
  });
});
