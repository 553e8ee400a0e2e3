// Shared fixtures for tests: in-memory store, fake generator and publishers

import Database from 'better-sqlite3';
import { vi } from 'vitest';
import { Config, loadConfig } from '../src/config.js';
import { ClientInput } from '../src/db/clients.js';
import { createMemoryDatabase } from '../src/db/index.js';
import { GenerationGateway } from '../src/gateways/generation.js';
import { IDEA_SYSTEM_PROMPT } from '../src/gateways/prompts.js';
import { Publisher, PublisherRegistry, PublishResult } from '../src/gateways/publishing/index.js';
import { RecordGateway } from '../src/gateways/records.js';
import { Notifier } from '../src/orchestrator/index.js';
import { PipelineEngine } from '../src/pipeline/engine.js';
import { MarketingService } from '../src/service.js';
import { CompletionOptions, TextGenerator } from '../src/shared/llm.js';
import { Channel, Client, Post } from '../src/shared/types.js';

export const testConfig = (env: Record<string, string> = {}): Config =>
  loadConfig({
    OPENAI_API_KEY: 'test-key',
    RECORDS_REQUESTS_PER_SECOND: '0',
    PUBLISH_INITIAL_BACKOFF_MS: '1',
    ...env
  });

export const ideasJson = (count: number, prefix = 'Idea'): string =>
  JSON.stringify({
    ideas: Array.from({ length: count }, (_, index) => ({
      headline: `${prefix} ${index + 1}`,
      summary: `Summary ${index + 1}`
    }))
  });

export const postJson = (body = 'Fresh sourdough every morning', hashtags: string[] = ['#bakery']): string =>
  JSON.stringify({ body, hashtags });

export interface FakeGeneratorOptions {
  ideas?: number;
  body?: string;
  hashtags?: string[];
}

// Answers idea prompts with `ideas` items and draft prompts with one post
export const createFakeGenerator = (options: FakeGeneratorOptions = {}) => {
  const complete = vi.fn(async (_prompt: string, request: CompletionOptions): Promise<string> =>
    request.systemPrompt === IDEA_SYSTEM_PROMPT
      ? ideasJson(options.ideas ?? 3)
      : postJson(options.body, options.hashtags)
  );
  const generator: TextGenerator = { complete };
  return { generator, complete };
};

export const createFakePublisher = (
  channel: Channel,
  impl?: (post: Post, client: Client) => Promise<PublishResult>
) => {
  const publish = vi.fn(impl ?? (async (post: Post): Promise<PublishResult> => ({ platformPostId: `${channel}-${post.id}` })));
  const publisher: Publisher = { channel, publish };
  return { publisher, publish };
};

export const clientInput = (overrides: Partial<ClientInput> = {}): ClientInput => ({
  name: 'Sunrise Bakery',
  handle: 'U-SUNRISE',
  channels: ['facebook'],
  pageIds: { facebook: 'page-1' },
  brandVoice: 'Warm and local',
  ...overrides
});

export interface TestPipeline {
  db: Database.Database;
  records: RecordGateway;
  engine: PipelineEngine;
  complete: ReturnType<typeof createFakeGenerator>['complete'];
  publish: ReturnType<typeof createFakePublisher>['publish'];
}

export const createTestPipeline = (
  options: { generator?: TextGenerator; publishers?: Publisher[]; ideas?: number } = {}
): TestPipeline => {
  const db = createMemoryDatabase();
  const records = new RecordGateway(db, { requestsPerSecond: 0, initialDelayMs: 1 });
  const fake = createFakeGenerator({ ideas: options.ideas });
  const facebook = createFakePublisher('facebook');
  const generation = new GenerationGateway(options.generator ?? fake.generator, {
    timeoutMs: 1000,
    initialDelayMs: 1
  });
  const engine = new PipelineEngine(
    records,
    generation,
    new PublisherRegistry(options.publishers ?? [facebook.publisher]),
    { publishRetry: { initialDelayMs: 1 } }
  );
  return { db, records, engine, complete: fake.complete, publish: facebook.publish };
};

// Seeds `count` new ideas and drafts them into pending posts
export const seedPendingPosts = async (records: RecordGateway, clientId: string, count: number): Promise<Post[]> => {
  const posts: Post[] = [];
  for (let index = 1; index <= count; index++) {
    const idea = await records.createIdea(clientId, {
      headline: `Seeded idea ${index}`,
      summary: `Seeded summary ${index}`,
      origin: 'curated'
    });
    const post = await records.createPostFromIdea(clientId, {
      ideaId: idea.id,
      body: `Seeded post ${index}`,
      channel: 'facebook'
    });
    if (!post) throw new Error(`Could not seed post ${index}`);
    posts.push(post);
  }
  return posts;
};

export interface TestServiceOptions {
  env?: Record<string, string>;
  generator?: TextGenerator;
  publishers?: Publisher[];
  notifier?: Notifier;
  now?: () => Date;
}

// Service wired to an in-memory store, a fake generator and a fake Facebook publisher
export const createTestService = (options: TestServiceOptions = {}) => {
  const db = createMemoryDatabase();
  const fake = createFakeGenerator();
  const facebook = createFakePublisher('facebook');
  const service = new MarketingService(testConfig(options.env), db, {
    generator: options.generator ?? fake.generator,
    publishers: new PublisherRegistry(options.publishers ?? [facebook.publisher]),
    notifier: options.notifier,
    now: options.now
  });
  return { db, service, complete: fake.complete, publish: facebook.publish };
};
