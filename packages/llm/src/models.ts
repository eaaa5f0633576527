/**
 * Ollama model configuration loaded from environment variables.
 * Models run locally via Ollama.
 */

export const OllamaModels = {
  /** Short numeric judgements (success-probability advisor) */
  FAST: process.env.OLLAMA_MODEL_FAST ?? 'llama3.1:8b-instruct-q4_K_M',
} as const;

export type OllamaModelType = keyof typeof OllamaModels;

export const OLLAMA_BASE_URL = process.env.OLLAMA_BASE_URL ?? 'http://localhost:11434';

export interface ModelConfig {
  model: string;
  temperature?: number;
  topP?: number;
  maxTokens?: number;
  timeout?: number;
}

export const defaultModelConfigs: Record<OllamaModelType, ModelConfig> = {
  FAST: {
    model: OllamaModels.FAST,
    temperature: 0.3,
    maxTokens: 50,
    timeout: 10000,
  },
};
