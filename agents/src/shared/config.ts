/**
 * Runtime configuration: optional YAML file, environment overrides, zod validation.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { OLLAMA_BASE_URL, OllamaModels } from '@jobfill/llm';
import { parseLogLevel } from './logger.js';

export const BrowserTypeSchema = z.enum(['chromium', 'firefox', 'webkit']);
export type BrowserType = z.infer<typeof BrowserTypeSchema>;

export const LlmConfigSchema = z.object({
  baseUrl: z.string().url().default(OLLAMA_BASE_URL),
  model: z.string().min(1).default(OllamaModels.GENERAL),
  temperature: z.number().min(0).max(2).default(0.7),
  maxTokens: z.number().int().positive().default(500),
  timeout: z.number().int().positive().default(30000),
});

export type LlmConfig = z.infer<typeof LlmConfigSchema>;

export const BrowserConfigSchema = z.object({
  browserType: BrowserTypeSchema.default('chromium'),
  headless: z.boolean().default(false),
  viewport: z
    .object({
      width: z.number().int().positive(),
      height: z.number().int().positive(),
    })
    .default({ width: 1280, height: 720 }),
});

export type BrowserConfig = z.infer<typeof BrowserConfigSchema>;

export const AutomationConfigSchema = z.object({
  /** Per-keystroke delay in ms */
  typingDelay: z.number().int().min(0).default(100),
  /** Pause before each field action in ms */
  actionDelay: z.number().int().min(0).default(1000),
});

export type AutomationConfig = z.infer<typeof AutomationConfigSchema>;

export const AutofillConfigSchema = z.object({
  llm: LlmConfigSchema.default({}),
  browser: BrowserConfigSchema.default({}),
  automation: AutomationConfigSchema.default({}),
  resumeParsing: z
    .object({
      outputFile: z.string().min(1).default('parsed_resume.json'),
      resumeDir: z.string().min(1).default('resumes'),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    })
    .default({}),
});

export type AutofillConfig = z.infer<typeof AutofillConfigSchema>;

export interface LoadConfigOptions {
  /** YAML file; a missing file yields the defaults */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

function readConfigFile(configPath: string | undefined): unknown {
  if (!configPath) return {};
  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) return {};

  const content = fs.readFileSync(absolutePath, 'utf-8');
  const parsed: unknown = parseYaml(content);
  return parsed ?? {};
}

function parseBooleanFlag(value: string): boolean {
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

export function loadAutofillConfig(options: LoadConfigOptions = {}): AutofillConfig {
  const env = options.env ?? process.env;
  const config = AutofillConfigSchema.parse(readConfigFile(options.configPath));

  if (env.OLLAMA_BASE_URL) config.llm.baseUrl = env.OLLAMA_BASE_URL;
  if (env.OLLAMA_MODEL_GENERAL) config.llm.model = env.OLLAMA_MODEL_GENERAL;
  if (env.HEADLESS) config.browser.headless = parseBooleanFlag(env.HEADLESS);

  const level = parseLogLevel(env.LOG_LEVEL);
  if (level) config.logging.level = level;

  // Re-validate so bad environment values fail the same way as bad file values
  return AutofillConfigSchema.parse(config);
}
