// Shared LLM interface for content generation

import { createOpenAI } from '@ai-sdk/openai';
import { createAnthropic } from '@ai-sdk/anthropic';
import { APICallError, generateText } from 'ai';
import {
  createAuthError,
  createConfigurationError,
  createPermanentError,
  createTransientError,
  PipelineError
} from './errors.js';

export type LLMProvider = 'openai' | 'anthropic';

export interface LLMConfig {
  provider: LLMProvider;
  model: string;
  apiKey?: string;
  maxTokens?: number;
  temperature?: number;
}

export interface CompletionOptions {
  systemPrompt: string;
  abortSignal?: AbortSignal;
}

// Anything that turns a prompt into text; the generation gateway depends on this only
export interface TextGenerator {
  complete(prompt: string, options: CompletionOptions): Promise<string>;
}

export class LLMClient implements TextGenerator {
  private config: LLMConfig;

  constructor(config: LLMConfig) {
    this.config = config;
  }

  private getModel(apiKey: string) {
    if (this.config.provider === 'anthropic') {
      return createAnthropic({ apiKey })(this.config.model);
    }
    return createOpenAI({ apiKey })(this.config.model);
  }

  async complete(prompt: string, options: CompletionOptions): Promise<string> {
    const apiKey = this.config.apiKey;
    if (!apiKey) {
      const setting = this.config.provider === 'anthropic' ? 'ANTHROPIC_API_KEY' : 'OPENAI_API_KEY';
      throw createConfigurationError(setting, 'content generation');
    }

    try {
      const result = await generateText({
        model: this.getModel(apiKey),
        system: options.systemPrompt,
        prompt,
        maxOutputTokens: this.config.maxTokens,
        temperature: this.config.temperature,
        abortSignal: options.abortSignal,
        // Retries are owned by the generation gateway
        maxRetries: 0
      });
      return result.text;
    } catch (error) {
      throw toPipelineError(error);
    }
  }
}

const SERVICE = 'Content generator';

export const toPipelineError = (error: unknown): PipelineError => {
  if (error instanceof PipelineError) {
    return error;
  }
  if (APICallError.isInstance(error)) {
    const status = error.statusCode;
    if (status === 401 || status === 403) {
      return createAuthError(SERVICE);
    }
    if (error.isRetryable || status === undefined || status === 429 || status >= 500) {
      return createTransientError(SERVICE, status, error.message);
    }
    return createPermanentError(SERVICE, status, error.message);
  }
  const message = error instanceof Error ? error.message : String(error);
  return createTransientError(SERVICE, undefined, message);
};

export const createLLMClient = (config: LLMConfig): LLMClient => new LLMClient(config);
