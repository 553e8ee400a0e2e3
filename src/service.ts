// Marketing service - the capabilities the CLI, Slack app and HTTP routes call

import Database from 'better-sqlite3';
import { Config, requireSetting } from './config.js';
import { GenerationGateway } from './gateways/generation.js';
import { createPublisherRegistry, PublisherRegistry } from './gateways/publishing/index.js';
import { RecordGateway } from './gateways/records.js';
import { ClientInput } from './db/clients.js';
import { ChatOrchestrator, ChatReply, Notifier } from './orchestrator/index.js';
import { SessionManager } from './orchestrator/session.js';
import {
  ApproveAndPublishResult,
  PipelineEngine,
  PostActionResult,
  SubmitIdeaResult,
  workflowRequest
} from './pipeline/engine.js';
import { TaskScheduler } from './scheduler/index.js';
import { createLLMClient, TextGenerator } from './shared/llm.js';
import { createLogger } from './shared/logger.js';
import {
  BatchReport,
  Channel,
  Client,
  PipelineRun,
  Post,
  RunMode,
  StageName,
  StageRequest
} from './shared/types.js';

const log = createLogger('Service');

// One client, or every active client up to an optional cap
export type Target = { clientId: string } | { all: true; maxClients?: number };

export interface TriggerOptions {
  mode?: RunMode;
  timeoutMs?: number;
}

export type TriggerResult =
  | { kind: 'run'; run: PipelineRun }
  | { kind: 'queued'; runId: string }
  | { kind: 'batch'; batch: BatchReport };

export interface HealthReport {
  status: 'ok' | 'degraded';
  environment: Config['environment'];
  uptimeSeconds: number;
  database: boolean;
  generationConfigured: boolean;
  publishingChannels: Channel[];
  scheduler: { queued: number; running: number; tracked: number };
}

export interface ServiceDependencies {
  generator?: TextGenerator;
  publishers?: PublisherRegistry;
  notifier?: Notifier;
  now?: () => Date;
}

const STAGES_NEEDING_GENERATION: readonly StageName[] = ['curate', 'draft'];

export class MarketingService {
  readonly records: RecordGateway;
  readonly engine: PipelineEngine;
  readonly scheduler: TaskScheduler;
  readonly chat: ChatOrchestrator;
  private publishers: PublisherRegistry;
  private sessions: SessionManager;
  private generationConfigured: boolean;
  private startedAt = Date.now();

  constructor(
    private config: Config,
    db: Database.Database,
    deps: ServiceDependencies = {}
  ) {
    this.records = new RecordGateway(db, {
      requestsPerSecond: config.database.requestsPerSecond,
      maxAttempts: config.database.maxAttempts
    });

    const generation = new GenerationGateway(deps.generator ?? createLLMClient(config.llm), {
      timeoutMs: config.generation.timeoutMs,
      maxAttempts: config.generation.maxAttempts
    });

    this.publishers = deps.publishers ?? createPublisherRegistry(config.publishing);

    this.engine = new PipelineEngine(this.records, generation, this.publishers, {
      defaultNumIdeas: config.pipeline.defaultNumIdeas,
      defaultNumPosts: config.pipeline.defaultNumPosts,
      publishRetry: {
        maxAttempts: config.publishing.maxAttempts,
        initialDelayMs: config.publishing.initialBackoffMs
      }
    });

    this.scheduler = new TaskScheduler(this.engine, this.records, {
      concurrency: config.scheduler.concurrency,
      syncTimeoutMs: config.scheduler.syncTimeoutMs,
      completionWebhookUrl: config.scheduler.completionWebhookUrl,
      retentionMs: config.scheduler.runRetentionMinutes * 60 * 1000
    });

    this.sessions = new SessionManager(db, { expirationMinutes: config.session.expirationMinutes }, deps.now);
    this.chat = new ChatOrchestrator(this.records, this.engine, this.scheduler, this.sessions, {
      displayLimit: config.session.displayLimit,
      notifier: deps.notifier
    });

    this.generationConfigured = deps.generator !== undefined || Boolean(config.llm.apiKey);
  }

  // ===== PIPELINE TRIGGERS =====

  curate(target: Target, numIdeas?: number, options: TriggerOptions = {}): Promise<TriggerResult> {
    return this.trigger(target, { stages: ['curate'], numIdeas: numIdeas ?? this.config.pipeline.defaultNumIdeas }, options);
  }

  draft(target: Target, numPosts?: number, options: TriggerOptions = {}): Promise<TriggerResult> {
    return this.trigger(target, { stages: ['draft'], numPosts: numPosts ?? this.config.pipeline.defaultNumPosts }, options);
  }

  publish(clientId: string, options: TriggerOptions = {}): Promise<TriggerResult> {
    return this.trigger({ clientId }, { stages: ['publish'] }, options);
  }

  fullWorkflow(target: Target, numIdeas?: number, numPosts?: number, options: TriggerOptions = {}): Promise<TriggerResult> {
    return this.trigger(
      target,
      workflowRequest(
        numIdeas ?? this.config.pipeline.defaultNumIdeas,
        numPosts ?? this.config.pipeline.defaultNumPosts
      ),
      options
    );
  }

  private async trigger(target: Target, request: StageRequest, options: TriggerOptions): Promise<TriggerResult> {
    // A run that would need an unconfigured credential never starts
    if (request.stages.some(stage => STAGES_NEEDING_GENERATION.includes(stage)) && !this.generationConfigured) {
      const setting = this.config.llm.provider === 'anthropic' ? 'ANTHROPIC_API_KEY' : 'OPENAI_API_KEY';
      requireSetting(this.config.llm.apiKey, setting, 'content generation');
    }

    const mode = options.mode ?? 'sync';

    if ('all' in target) {
      const batch = await this.scheduler.enqueueAll(request, {
        maxClients: target.maxClients ?? this.config.pipeline.maxClients
      });
      log.info(`Triggered ${request.stages.join(' -> ')} for ${Object.keys(batch.clients).length} client(s)`);
      return { kind: 'batch', batch: mode === 'sync' ? await this.scheduler.waitForBatch(batch.id) : batch };
    }

    if (mode === 'async') {
      return { kind: 'queued', runId: this.scheduler.enqueue(target.clientId, request) };
    }
    return { kind: 'run', run: await this.scheduler.runNow(target.clientId, request, { timeoutMs: options.timeoutMs }) };
  }

  // ===== CLIENT INPUT =====

  // Stores the idea and queues a draft for it
  async submitIdea(
    clientId: string,
    input: { text: string; imageUrl?: string; channel?: Channel }
  ): Promise<SubmitIdeaResult & { runId?: string }> {
    const result = await this.engine.submitIdea(clientId, input);
    if (!result.ok || !this.generationConfigured) return result;

    const runId = this.scheduler.enqueue(clientId, { stages: ['draft'], numPosts: 1, ideaIds: [result.idea.id] });
    return { ...result, runId };
  }

  handleChatMessage(handle: string, text: string, options: { imageUrl?: string } = {}): Promise<ChatReply> {
    return this.chat.handle(handle, text, options);
  }

  setNotifier(notifier: Notifier): void {
    this.chat.setNotifier(notifier);
  }

  cleanupSessions(): number {
    return this.sessions.cleanupExpired();
  }

  pruneRuns(): { runs: number; batches: number } {
    return this.scheduler.prune();
  }

  // ===== APPROVAL =====

  approvePost(clientId: string, postId: string): Promise<ApproveAndPublishResult> {
    return this.engine.approveAndPublish(clientId, postId);
  }

  rejectPost(clientId: string, postId: string, feedback?: string): Promise<PostActionResult> {
    return this.engine.rejectPost(clientId, postId, feedback);
  }

  listPendingPosts(clientId: string, limit: number = this.config.session.displayLimit): Promise<Post[]> {
    return this.engine.listPendingPosts(clientId, limit);
  }

  // ===== CLIENTS =====

  upsertClient(input: ClientInput): Promise<Client> {
    return this.records.upsertClient(input);
  }

  listClients(): Promise<Client[]> {
    return this.records.listClients();
  }

  // ===== STATUS =====

  runStatus(runId: string): PipelineRun | null {
    return this.scheduler.getRun(runId);
  }

  batchStatus(batchId: string): BatchReport | null {
    return this.scheduler.getBatch(batchId);
  }

  async health(): Promise<HealthReport> {
    let database = false;
    try {
      database = await this.records.ping();
    } catch (error) {
      log.warn('Database health check failed:', error instanceof Error ? error.message : error);
    }

    return {
      status: database ? 'ok' : 'degraded',
      environment: this.config.environment,
      uptimeSeconds: Math.round((Date.now() - this.startedAt) / 1000),
      database,
      generationConfigured: this.generationConfigured,
      publishingChannels: this.publishers.channels(),
      scheduler: this.scheduler.stats()
    };
  }

  // Waits for queued runs and pending chat follow-ups
  async shutdown(): Promise<void> {
    await this.scheduler.drain();
    await this.chat.idle();
  }
}
