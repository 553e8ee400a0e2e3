// Unit tests for configuration loading

import { describe, it, expect } from 'vitest';
import { loadConfig, requireSetting } from '../../../src/config.js';
import { ErrorCategory, isPipelineError } from '../../../src/shared/errors.js';

describe('loadConfig', () => {
  it('applies defaults when nothing is set', () => {
    const config = loadConfig({});

    expect(config.environment).toBe('development');
    expect(config.http.port).toBe(3000);
    expect(config.llm.provider).toBe('openai');
    expect(config.llm.model).toBe('gpt-4o');
    expect(config.llm.apiKey).toBeUndefined();
    expect(config.generation).toEqual({ timeoutMs: 15000, maxAttempts: 3 });
    expect(config.database.requestsPerSecond).toBe(5);
    expect(config.publishing.maxAttempts).toBe(3);
    expect(config.scheduler).toEqual({ concurrency: 2, syncTimeoutMs: 120000, completionWebhookUrl: undefined, runRetentionMinutes: 60 });
    expect(config.pipeline).toEqual({ defaultNumIdeas: 20, defaultNumPosts: 3, maxClients: undefined });
    expect(config.session).toEqual({ expirationMinutes: 15, displayLimit: 3 });
    expect(config.logging.level).toBe('info');
  });

  it('reads the key for the selected provider', () => {
    const config = loadConfig({
      LLM_PROVIDER: 'anthropic',
      ANTHROPIC_API_KEY: 'test-anthropic-key',
      OPENAI_API_KEY: 'test-openai-key'
    });

    expect(config.llm.provider).toBe('anthropic');
    expect(config.llm.apiKey).toBe('test-anthropic-key');
    expect(config.llm.model).toBe('claude-sonnet-4-5');
  });

  it('parses numeric options and the client cap', () => {
    const config = loadConfig({ WORKER_CONCURRENCY: '4', MAX_CLIENTS: '10', DEFAULT_NUM_POSTS: '5' });

    expect(config.scheduler.concurrency).toBe(4);
    expect(config.pipeline.maxClients).toBe(10);
    expect(config.pipeline.defaultNumPosts).toBe(5);
  });

  it('forces debug logging when verbose', () => {
    expect(loadConfig({ VERBOSE: 'true', LOG_LEVEL: 'warn' }).logging.level).toBe('debug');
    expect(loadConfig({ LOG_LEVEL: 'WARN' }).logging.level).toBe('warn');
  });

  it('rejects malformed values', () => {
    expect(() => loadConfig({ WORKER_CONCURRENCY: 'many' })).toThrow('WORKER_CONCURRENCY must be a non-negative number');
    expect(() => loadConfig({ APP_ENV: 'qa' })).toThrow('APP_ENV must be development, staging or production');
    expect(() => loadConfig({ LLM_PROVIDER: 'other' })).toThrow('LLM_PROVIDER must be');
  });
});

describe('requireSetting', () => {
  it('returns the value when present', () => {
    expect(requireSetting('test-secret', 'SLACK_SIGNING_SECRET')).toBe('test-secret');
  });

  it('throws a configuration error when missing', () => {
    try {
      requireSetting(undefined, 'FACEBOOK_ACCESS_TOKEN', 'publishing');
      expect.unreachable();
    } catch (error) {
      expect(isPipelineError(error, ErrorCategory.CONFIGURATION_MISSING)).toBe(true);
    }
  });
});
