/**
 * @jobfill/llm - Ollama client wrapper for local LLM inference
 */

export {
  OllamaModels,
  OLLAMA_BASE_URL,
  type OllamaModelType,
  type ModelConfig,
  defaultModelConfigs,
} from './models.js';

export {
  OllamaClient,
  complete,
  type OllamaChatMessage,
  type OllamaChatRequest,
  type OllamaChatResponse,
} from './client.js';

export {
  buildPrompt,
  createPromptTemplate,
  executeTemplate,
  type PromptTemplate,
} from './prompts.js';
