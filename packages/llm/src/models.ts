/**
 * Ollama model configuration loaded from environment variables.
 * Answers are generated locally via Ollama - no external API costs.
 */

export const OllamaModels = {
  /** General purpose model for free-text application answers */
  GENERAL: process.env.OLLAMA_MODEL_GENERAL ?? 'qwen2.5:14b-instruct-q4_K_M',
} as const;

export type OllamaModelType = keyof typeof OllamaModels;

export const OLLAMA_BASE_URL = process.env.OLLAMA_BASE_URL ?? 'http://localhost:11434';

export interface ModelConfig {
  model: string;
  baseUrl?: string;
  temperature?: number;
  maxTokens?: number;
  timeout?: number;
}

export const defaultModelConfigs: Record<OllamaModelType, ModelConfig> = {
  GENERAL: {
    model: OllamaModels.GENERAL,
    temperature: 0.7,
    maxTokens: 500,
    timeout: 30000,
  },
};
