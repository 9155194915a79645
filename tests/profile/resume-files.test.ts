import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import {
  ResumeParserAgent,
  extractText,
  findResumeFile,
  loadParsedResume,
  parseResumeText,
  saveParsedResume,
} from '../../agents/src/profile/resume-parser/index.js';
import { SAMPLE_RESUME_TEXT, makeResume } from '../fixtures/resume.js';

let workDir: string;

beforeEach(async () => {
  workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'jobfill-resume-'));
});

afterEach(async () => {
  await fs.rm(workDir, { recursive: true, force: true });
});

describe('extractText', () => {
  it('reads plain text files as-is', async () => {
    const file = path.join(workDir, 'resume.txt');
    await fs.writeFile(file, SAMPLE_RESUME_TEXT, 'utf-8');

    await expect(extractText(file)).resolves.toEqual({ text: SAMPLE_RESUME_TEXT, numPages: 1 });
  });

  it('rejects unsupported extensions', async () => {
    await expect(extractText(path.join(workDir, 'resume.rtf'))).rejects.toThrow(
      'Unsupported file format: .rtf',
    );
    await expect(extractText(path.join(workDir, 'resume'))).rejects.toThrow(
      'Unsupported file format: (none)',
    );
  });

  it('rejects missing files', async () => {
    const missing = path.join(workDir, 'missing.pdf');
    await expect(extractText(missing)).rejects.toThrow(`Resume file not found: ${missing}`);
  });
});

describe('findResumeFile', () => {
  it('returns the first supported file by name', async () => {
    await fs.writeFile(path.join(workDir, 'notes.txt'), '');
    await fs.writeFile(path.join(workDir, 'b.pdf'), '');
    await fs.writeFile(path.join(workDir, 'a.DOCX'), '');

    expect(await findResumeFile(workDir)).toBe(path.join(workDir, 'a.DOCX'));
  });

  it('returns null without a supported file', async () => {
    await fs.writeFile(path.join(workDir, 'notes.txt'), '');
    expect(await findResumeFile(workDir)).toBeNull();
  });

  it('returns null for a missing directory', async () => {
    expect(await findResumeFile(path.join(workDir, 'nope'))).toBeNull();
  });
});

describe('parsed resume snapshot', () => {
  it('writes snake_case keys and reads them back', async () => {
    const resume = makeResume({ rawText: 'raw' });
    const written = await saveParsedResume(resume, path.join(workDir, 'out', 'parsed.json'));

    expect(written).toBe(path.join(workDir, 'out', 'parsed.json'));
    const onDisk: Record<string, unknown> = JSON.parse(await fs.readFile(written, 'utf-8'));
    expect(Object.keys(onDisk)).toEqual([
      'personal_info',
      'education',
      'work_experience',
      'skills',
      'projects',
      'raw_text',
    ]);

    expect(await loadParsedResume(written)).toEqual(resume);
  });

  it('rejects a snapshot with the wrong shape', async () => {
    const file = path.join(workDir, 'bad.json');
    await fs.writeFile(file, JSON.stringify({ personal_info: 'nobody' }), 'utf-8');

    await expect(loadParsedResume(file)).rejects.toThrow();
  });
});

describe('ResumeParserAgent', () => {
  it('parses a resume file and saves the snapshot', async () => {
    const file = path.join(workDir, 'resume.txt');
    const outputFile = path.join(workDir, 'parsed_resume.json');
    await fs.writeFile(file, SAMPLE_RESUME_TEXT, 'utf-8');
    const agent = new ResumeParserAgent();

    const result = await agent.execute({ filePath: file, outputFile });

    expect(result.success).toBe(true);
    expect(result.data).toEqual(parseResumeText(SAMPLE_RESUME_TEXT));
    expect(await loadParsedResume(outputFile)).toEqual(result.data);
    expect(agent.getLogs().map((l) => l.message)).toContain('Parsed resume for: Jane Doe');
  });

  it('reports unsupported files as a failed result', async () => {
    const agent = new ResumeParserAgent();

    const result = await agent.execute({ filePath: path.join(workDir, 'resume.rtf') });

    expect(result.success).toBe(false);
    expect(result.error).toBe('Unsupported file format: .rtf');
  });

  it('rejects an empty file path', async () => {
    const result = await new ResumeParserAgent().execute({ filePath: '' });
    expect(result.success).toBe(false);
  });
});
