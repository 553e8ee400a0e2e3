// Generation gateway: ideas and post drafts from the text generator

import { z } from 'zod';
import {
  createGenerationUnavailableError,
  createTransientError,
  isPipelineError,
  isRetryable,
  withRetry,
  withTimeout
} from '../shared/errors.js';
import { TextGenerator } from '../shared/llm.js';
import { createLogger } from '../shared/logger.js';
import { Channel, Client, Idea } from '../shared/types.js';
import { buildDraftPrompt, buildIdeaPrompt, IDEA_SYSTEM_PROMPT, POST_SYSTEM_PROMPT } from './prompts.js';

const log = createLogger('Generation');

const SERVICE = 'Content generator';

export interface GeneratedIdea {
  headline: string;
  summary: string;
}

export interface GeneratedPost {
  body: string;
  hashtags: string[];
}

export interface GenerationGatewayOptions {
  timeoutMs?: number;
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
}

const ideasSchema = z.object({
  ideas: z.array(
    z.object({
      headline: z.string().trim().min(1),
      summary: z.string().trim().default('')
    })
  )
});

const postSchema = z.object({
  body: z.string().trim().min(1),
  hashtags: z
    .union([
      z.array(z.string()),
      z.string().transform(tags => tags.split(/[\s,]+/).filter(Boolean))
    ])
    .default([])
});

// Models sometimes wrap JSON in prose or code fences
const extractJson = (text: string): unknown => {
  const match = text.match(/\{[\s\S]*\}/);
  if (!match) return undefined;
  try {
    return JSON.parse(match[0]);
  } catch {
    return undefined;
  }
};

export class GenerationGateway {
  private timeoutMs: number;
  private maxAttempts: number;
  private initialDelayMs: number;
  private maxDelayMs: number;

  constructor(private generator: TextGenerator, options: GenerationGatewayOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 15000;
    this.maxAttempts = options.maxAttempts ?? 3;
    this.initialDelayMs = options.initialDelayMs ?? 1000;
    this.maxDelayMs = options.maxDelayMs ?? 10000;
  }

  // Up to `count` ideas; fewer are accepted, extras dropped
  async generateIdeas(client: Client, count: number): Promise<GeneratedIdea[]> {
    if (count <= 0) return [];

    const result = await this.generate(
      'generateIdeas',
      buildIdeaPrompt(client, count),
      IDEA_SYSTEM_PROMPT,
      ideasSchema
    );
    return result.ideas.slice(0, count);
  }

  async draftPost(client: Client, idea: Idea, channel: Channel): Promise<GeneratedPost> {
    return this.generate(
      'draftPost',
      buildDraftPrompt(client, idea, channel),
      POST_SYSTEM_PROMPT,
      postSchema
    );
  }

  private async generate<T>(
    operation: string,
    prompt: string,
    systemPrompt: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T> {
    try {
      return await withRetry(
        async () => {
          const text = await withTimeout(
            signal => this.generator.complete(prompt, { systemPrompt, abortSignal: signal }),
            this.timeoutMs,
            SERVICE
          );
          const parsed = schema.safeParse(extractJson(text));
          if (!parsed.success) {
            throw createTransientError(SERVICE, undefined, `unparseable ${operation} output`);
          }
          return parsed.data;
        },
        {
          maxAttempts: this.maxAttempts,
          initialDelayMs: this.initialDelayMs,
          maxDelayMs: this.maxDelayMs,
          onRetry: (error, attempt, delayMs) =>
            log.warn(`${operation} attempt ${attempt} failed, retrying in ${delayMs}ms:`, error instanceof Error ? error.message : error)
        }
      );
    } catch (error) {
      // Transient failures that outlasted the retry budget
      if (isRetryable(error) || !isPipelineError(error)) {
        const message = error instanceof Error ? error.message : String(error);
        log.error(`${operation} unavailable after ${this.maxAttempts} attempts: ${message}`);
        throw createGenerationUnavailableError(message);
      }
      throw error;
    }
  }
}
