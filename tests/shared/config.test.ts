import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { OLLAMA_BASE_URL, OllamaModels } from '@jobfill/llm';
import { loadAutofillConfig } from '../../agents/src/shared/config.js';

let workDir: string;

const writeYaml = (content: string): string => {
  const file = path.join(workDir, 'config.yaml');
  fs.writeFileSync(file, content, 'utf-8');
  return file;
};

beforeEach(() => {
  workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'jobfill-config-'));
});

afterEach(() => {
  fs.rmSync(workDir, { recursive: true, force: true });
});

describe('loadAutofillConfig', () => {
  it('returns defaults when the file is missing', () => {
    const config = loadAutofillConfig({ configPath: path.join(workDir, 'none.yaml'), env: {} });

    expect(config).toEqual({
      llm: {
        baseUrl: OLLAMA_BASE_URL,
        model: OllamaModels.GENERAL,
        temperature: 0.7,
        maxTokens: 500,
        timeout: 30000,
      },
      browser: { browserType: 'chromium', headless: false, viewport: { width: 1280, height: 720 } },
      automation: { typingDelay: 100, actionDelay: 1000 },
      resumeParsing: { outputFile: 'parsed_resume.json', resumeDir: 'resumes' },
      logging: { level: 'info' },
    });
  });

  it('treats an empty file as defaults', () => {
    const config = loadAutofillConfig({ configPath: writeYaml(''), env: {} });
    expect(config.automation).toEqual({ typingDelay: 100, actionDelay: 1000 });
  });

  it('merges file values over defaults', () => {
    const file = writeYaml('browser:\n  headless: true\n  browserType: firefox\nautomation:\n  typingDelay: 0\n');

    const config = loadAutofillConfig({ configPath: file, env: {} });

    expect(config.browser).toEqual({
      browserType: 'firefox',
      headless: true,
      viewport: { width: 1280, height: 720 },
    });
    expect(config.automation).toEqual({ typingDelay: 0, actionDelay: 1000 });
  });

  it('lets the environment override the file', () => {
    const file = writeYaml('browser:\n  headless: true\nlogging:\n  level: debug\n');

    const config = loadAutofillConfig({
      configPath: file,
      env: { HEADLESS: 'false', LOG_LEVEL: 'WARNING', OLLAMA_MODEL_GENERAL: 'llama3.1:8b' },
    });

    expect(config.browser.headless).toBe(false);
    expect(config.logging.level).toBe('warn');
    expect(config.llm.model).toBe('llama3.1:8b');
  });

  it('ignores an unknown LOG_LEVEL', () => {
    const config = loadAutofillConfig({ configPath: writeYaml('logging:\n  level: error\n'), env: { LOG_LEVEL: 'loud' } });
    expect(config.logging.level).toBe('error');
  });

  it('rejects invalid values from the file', () => {
    const file = writeYaml('automation:\n  typingDelay: -5\n');
    expect(() => loadAutofillConfig({ configPath: file, env: {} })).toThrow();
  });

  it('rejects invalid values from the environment', () => {
    expect(() =>
      loadAutofillConfig({ configPath: path.join(workDir, 'none.yaml'), env: { OLLAMA_BASE_URL: 'not a url' } }),
    ).toThrow();
  });
});
