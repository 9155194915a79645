/**
 * Ollama HTTP client for local LLM inference.
 */

import {
  OLLAMA_BASE_URL,
  type ModelConfig,
  defaultModelConfigs,
  type OllamaModelType,
} from './models.js';

export interface OllamaChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface OllamaChatRequest {
  model: string;
  messages: OllamaChatMessage[];
  stream?: boolean;
  options?: {
    temperature?: number;
    num_predict?: number;
  };
}

export interface OllamaChatResponse {
  model: string;
  created_at: string;
  message: OllamaChatMessage;
  done: boolean;
}

export class OllamaClient {
  private baseUrl: string;
  private defaultTimeout: number;

  constructor(baseUrl: string = OLLAMA_BASE_URL, defaultTimeout: number = 30000) {
    this.baseUrl = baseUrl.replace(/\/$/, '');
    this.defaultTimeout = defaultTimeout;
  }

  /**
   * Chat completion using the /api/chat endpoint.
   */
  async chat(request: OllamaChatRequest, timeout?: number): Promise<OllamaChatResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout ?? this.defaultTimeout);

    try {
      const response = await fetch(`${this.baseUrl}/api/chat`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ ...request, stream: false }),
        signal: controller.signal,
      });

      if (!response.ok) {
        const error = await response.text();
        throw new Error(`Ollama chat failed: ${response.status} - ${error}`);
      }

      return (await response.json()) as OllamaChatResponse;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Check if Ollama is running and a model is available.
   */
  async isAvailable(model?: string): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/api/tags`);
      if (!response.ok) return false;

      if (model) {
        const data = (await response.json()) as { models: Array<{ name: string }> };
        return data.models.some((m) => m.name === model || m.name.startsWith(model));
      }

      return true;
    } catch {
      return false;
    }
  }
}

/**
 * High-level completion function with model type selection.
 */
export async function complete(
  prompt: string,
  modelType: OllamaModelType = 'GENERAL',
  options?: Partial<ModelConfig> & { system?: string },
): Promise<string> {
  const config = { ...defaultModelConfigs[modelType], ...options };
  const client = new OllamaClient(config.baseUrl ?? OLLAMA_BASE_URL);

  const messages: OllamaChatMessage[] = [];

  if (options?.system) {
    messages.push({ role: 'system', content: options.system });
  }

  messages.push({ role: 'user', content: prompt });

  const response = await client.chat(
    {
      model: config.model,
      messages,
      options: {
        temperature: config.temperature,
        num_predict: config.maxTokens,
      },
    },
    config.timeout,
  );

  return response.message.content;
}
