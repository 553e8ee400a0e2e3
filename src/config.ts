// Application configuration

import { LogLevel } from '@slack/bolt';
import { LLMConfig, LLMProvider } from './shared/llm.js';
import { createConfigurationError, createValidationError } from './shared/errors.js';
import { isLogLevel, LogLevel as AppLogLevel } from './shared/logger.js';

export type AppEnvironment = 'development' | 'staging' | 'production';

export interface Config {
  environment: AppEnvironment;

  slack: {
    botToken?: string;
    appToken?: string;
    signingSecret?: string;
    logLevel?: LogLevel;
  };

  http: {
    port: number;
  };

  llm: LLMConfig;

  generation: {
    timeoutMs: number;
    maxAttempts: number;
  };

  database: {
    path: string;
    requestsPerSecond: number;
    maxAttempts: number;
  };

  publishing: {
    facebookAccessToken?: string;
    instagramAccessToken?: string;
    linkedinAccessToken?: string;
    timeoutMs: number;
    maxAttempts: number;
    initialBackoffMs: number;
  };

  scheduler: {
    concurrency: number;
    syncTimeoutMs: number;
    completionWebhookUrl?: string;
    runRetentionMinutes: number;
  };

  pipeline: {
    defaultNumIdeas: number;
    defaultNumPosts: number;
    maxClients?: number;
  };

  session: {
    expirationMinutes: number;
    displayLimit: number;
  };

  logging: {
    level: AppLogLevel;
  };
}

type Env = Record<string, string | undefined>;

export const loadConfig = (env: Env = process.env): Config => {
  const provider = parseProvider(env.LLM_PROVIDER);

  return {
    environment: parseEnvironment(env.APP_ENV),

    slack: {
      botToken: env.SLACK_BOT_TOKEN,
      appToken: env.SLACK_APP_TOKEN,
      signingSecret: env.SLACK_SIGNING_SECRET,
      logLevel: parseSlackLogLevel(env.SLACK_LOG_LEVEL)
    },

    http: {
      port: parseNumber(env.HTTP_PORT, 3000, 'HTTP_PORT')
    },

    llm: {
      provider,
      model: env.LLM_MODEL || (provider === 'anthropic' ? 'claude-sonnet-4-5' : 'gpt-4o'),
      apiKey: provider === 'anthropic' ? env.ANTHROPIC_API_KEY : env.OPENAI_API_KEY,
      maxTokens: parseNumber(env.LLM_MAX_TOKENS, 4096, 'LLM_MAX_TOKENS'),
      temperature: parseFloat(env.LLM_TEMPERATURE || '0.7')
    },

    generation: {
      timeoutMs: parseNumber(env.GENERATION_TIMEOUT_MS, 15000, 'GENERATION_TIMEOUT_MS'),
      maxAttempts: parseNumber(env.GENERATION_MAX_ATTEMPTS, 3, 'GENERATION_MAX_ATTEMPTS')
    },

    database: {
      path: env.DATABASE_PATH || './data/db/main.sqlite',
      requestsPerSecond: parseNumber(env.RECORDS_REQUESTS_PER_SECOND, 5, 'RECORDS_REQUESTS_PER_SECOND'),
      maxAttempts: parseNumber(env.RECORDS_MAX_ATTEMPTS, 3, 'RECORDS_MAX_ATTEMPTS')
    },

    publishing: {
      facebookAccessToken: env.FACEBOOK_ACCESS_TOKEN,
      instagramAccessToken: env.INSTAGRAM_ACCESS_TOKEN,
      linkedinAccessToken: env.LINKEDIN_ACCESS_TOKEN,
      timeoutMs: parseNumber(env.PUBLISH_TIMEOUT_MS, 15000, 'PUBLISH_TIMEOUT_MS'),
      maxAttempts: parseNumber(env.PUBLISH_MAX_ATTEMPTS, 3, 'PUBLISH_MAX_ATTEMPTS'),
      initialBackoffMs: parseNumber(env.PUBLISH_INITIAL_BACKOFF_MS, 1000, 'PUBLISH_INITIAL_BACKOFF_MS')
    },

    scheduler: {
      concurrency: parseNumber(env.WORKER_CONCURRENCY, 2, 'WORKER_CONCURRENCY'),
      syncTimeoutMs: parseNumber(env.SYNC_RUN_TIMEOUT_MS, 120000, 'SYNC_RUN_TIMEOUT_MS'),
      completionWebhookUrl: env.COMPLETION_WEBHOOK_URL || undefined,
      runRetentionMinutes: parseNumber(env.RUN_RETENTION_MINUTES, 60, 'RUN_RETENTION_MINUTES')
    },

    pipeline: {
      defaultNumIdeas: parseNumber(env.DEFAULT_NUM_IDEAS, 20, 'DEFAULT_NUM_IDEAS'),
      defaultNumPosts: parseNumber(env.DEFAULT_NUM_POSTS, 3, 'DEFAULT_NUM_POSTS'),
      maxClients: env.MAX_CLIENTS ? parseNumber(env.MAX_CLIENTS, 0, 'MAX_CLIENTS') : undefined
    },

    session: {
      expirationMinutes: parseNumber(env.SESSION_EXPIRATION_MINUTES, 15, 'SESSION_EXPIRATION_MINUTES'),
      displayLimit: parseNumber(env.SESSION_DISPLAY_LIMIT, 3, 'SESSION_DISPLAY_LIMIT')
    },

    logging: {
      level: parseAppLogLevel(env.LOG_LEVEL, env.VERBOSE)
    }
  };
};

// Throws when a credential needed by the operation about to start is absent
export const requireSetting = (value: string | undefined, name: string, purpose?: string): string => {
  if (!value) {
    throw createConfigurationError(name, purpose);
  }
  return value;
};

const parseNumber = (raw: string | undefined, fallback: number, name: string): number => {
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw createValidationError(`${name} must be a non-negative number, got "${raw}"`);
  }
  return value;
};

const parseProvider = (raw?: string): LLMProvider => {
  if (!raw) return 'openai';
  if (raw === 'openai' || raw === 'anthropic') return raw;
  throw createValidationError(`LLM_PROVIDER must be "openai" or "anthropic", got "${raw}"`);
};

const parseEnvironment = (raw?: string): AppEnvironment => {
  if (!raw) return 'development';
  if (raw === 'development' || raw === 'staging' || raw === 'production') return raw;
  throw createValidationError(`APP_ENV must be development, staging or production, got "${raw}"`);
};

const parseAppLogLevel = (raw?: string, verbose?: string): AppLogLevel => {
  if (verbose === 'true') return 'debug';
  if (!raw) return 'info';
  const level = raw.toLowerCase();
  return isLogLevel(level) ? level : 'info';
};

const parseSlackLogLevel = (level?: string): LogLevel | undefined => {
  if (!level) return undefined;

  const levels: Record<string, LogLevel> = {
    'error': LogLevel.ERROR,
    'warn': LogLevel.WARN,
    'info': LogLevel.INFO,
    'debug': LogLevel.DEBUG
  };

  return levels[level.toLowerCase()];
};

export default loadConfig;
