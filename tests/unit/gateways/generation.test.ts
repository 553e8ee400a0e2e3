// Unit tests for the generation gateway

import { describe, it, expect, vi } from 'vitest';
import { GenerationGateway } from '../../../src/gateways/generation.js';
import { buildDraftPrompt, buildIdeaPrompt } from '../../../src/gateways/prompts.js';
import { createAuthError, ErrorCategory, isPipelineError } from '../../../src/shared/errors.js';
import { CompletionOptions, TextGenerator } from '../../../src/shared/llm.js';
import { Client, Idea } from '../../../src/shared/types.js';
import { ideasJson } from '../../helpers.js';

const client: Client = {
  id: 'client-1',
  name: 'Sunrise Bakery',
  handle: 'U-SUNRISE',
  status: 'active',
  channels: ['facebook', 'instagram'],
  cadencePerWeek: 4,
  brandVoice: 'Warm and local',
  instructions: 'Mention the weekend market',
  approvalMode: 'manual',
  pageIds: {},
  createdAt: '2026-01-01T00:00:00.000Z',
  updatedAt: '2026-01-01T00:00:00.000Z'
};

const idea: Idea = {
  id: 'idea-1',
  clientId: 'client-1',
  headline: 'Croissant week',
  summary: 'Seven days, seven fillings',
  origin: 'curated',
  state: 'new',
  createdAt: '2026-01-01T00:00:00.000Z',
  updatedAt: '2026-01-01T00:00:00.000Z'
};

const generatorReturning = (...outputs: Array<string | Error>) => {
  const complete = vi.fn<(prompt: string, options: CompletionOptions) => Promise<string>>();
  for (const output of outputs) {
    if (output instanceof Error) {
      complete.mockRejectedValueOnce(output);
    } else {
      complete.mockResolvedValueOnce(output);
    }
  }
  const generator: TextGenerator = { complete };
  return { generator, complete };
};

const gateway = (generator: TextGenerator, timeoutMs = 1000) =>
  new GenerationGateway(generator, { timeoutMs, maxAttempts: 3, initialDelayMs: 1 });

describe('GenerationGateway', () => {
  describe('generateIdeas', () => {
    it('truncates to the requested count', async () => {
      const { generator } = generatorReturning(ideasJson(5));

      const ideas = await gateway(generator).generateIdeas(client, 2);

      expect(ideas).toEqual([
        { headline: 'Idea 1', summary: 'Summary 1' },
        { headline: 'Idea 2', summary: 'Summary 2' }
      ]);
    });

    it('accepts fewer ideas than requested', async () => {
      const { generator } = generatorReturning(ideasJson(1));

      expect(await gateway(generator).generateIdeas(client, 4)).toHaveLength(1);
    });

    it('skips the model for a zero count', async () => {
      const { generator, complete } = generatorReturning();

      expect(await gateway(generator).generateIdeas(client, 0)).toEqual([]);
      expect(complete).not.toHaveBeenCalled();
    });

    it('finds JSON wrapped in prose or code fences', async () => {
      const { generator } = generatorReturning('Here you go:\n```json\n' + ideasJson(1) + '\n```');

      expect(await gateway(generator).generateIdeas(client, 1)).toEqual([{ headline: 'Idea 1', summary: 'Summary 1' }]);
    });

    it('retries unparseable output', async () => {
      const { generator, complete } = generatorReturning('I cannot help with that', ideasJson(2));

      const ideas = await gateway(generator).generateIdeas(client, 2);

      expect(ideas).toHaveLength(2);
      expect(complete).toHaveBeenCalledTimes(2);
    });

    it('reports generation unavailable after the retry budget', async () => {
      const { generator, complete } = generatorReturning('nope', 'nope', 'nope');

      const error = await gateway(generator).generateIdeas(client, 2).catch((caught: unknown) => caught);

      expect(isPipelineError(error, ErrorCategory.GENERATION_UNAVAILABLE)).toBe(true);
      expect(error).toHaveProperty('message', 'Generation unavailable: Content generator error: unparseable generateIdeas output');
      expect(complete).toHaveBeenCalledTimes(3);
    });

    it('times out slow calls and retries them', async () => {
      const complete = vi.fn((): Promise<string> => new Promise(() => undefined));
      const generator: TextGenerator = { complete };

      const error = await gateway(generator, 10).generateIdeas(client, 1).catch((caught: unknown) => caught);

      expect(isPipelineError(error, ErrorCategory.GENERATION_UNAVAILABLE)).toBe(true);
      expect(complete).toHaveBeenCalledTimes(3);
    });

    it('does not retry permanent failures', async () => {
      const { generator, complete } = generatorReturning(createAuthError('Content generator'));

      const error = await gateway(generator).generateIdeas(client, 1).catch((caught: unknown) => caught);

      expect(isPipelineError(error, ErrorCategory.PERMANENT_UPSTREAM)).toBe(true);
      expect(complete).toHaveBeenCalledTimes(1);
    });

    it('treats unexpected errors as generation unavailable', async () => {
      const { generator, complete } = generatorReturning(new Error('socket hang up'));

      const error = await gateway(generator).generateIdeas(client, 1).catch((caught: unknown) => caught);

      expect(error).toHaveProperty('message', 'Generation unavailable: socket hang up');
      expect(complete).toHaveBeenCalledTimes(1);
    });
  });

  describe('draftPost', () => {
    it('returns the body and hashtags', async () => {
      const { generator, complete } = generatorReturning(JSON.stringify({ body: 'Fresh today', hashtags: ['#bakery'] }));

      const post = await gateway(generator).draftPost(client, idea, 'instagram');

      expect(post).toEqual({ body: 'Fresh today', hashtags: ['#bakery'] });
      expect(complete.mock.calls[0][0]).toBe(buildDraftPrompt(client, idea, 'instagram'));
    });

    it('splits hashtags given as a string', async () => {
      const { generator } = generatorReturning(JSON.stringify({ body: 'Fresh today', hashtags: '#bread, #local' }));

      expect((await gateway(generator).draftPost(client, idea, 'facebook')).hashtags).toEqual(['#bread', '#local']);
    });
  });
});

describe('prompts', () => {
  it('describes the client and the requested count', () => {
    const prompt = buildIdeaPrompt(client, 5);

    expect(prompt).toContain('Client: Sunrise Bakery');
    expect(prompt).toContain('Brand voice: Warm and local');
    expect(prompt).toContain('Channels: facebook, instagram');
    expect(prompt).toContain('Posting cadence: 4 posts per week');
    expect(prompt).toContain('Propose exactly 5 post ideas for this client.');
  });
});
