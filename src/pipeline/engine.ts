// Pipeline engine: curate -> draft -> approve_check -> publish for one client

import { randomUUID } from 'node:crypto';
import { GeneratedIdea, GenerationGateway } from '../gateways/generation.js';
import { composePostBody } from '../gateways/publishing/format.js';
import { Publisher, PublisherRegistry } from '../gateways/publishing/index.js';
import { RecordGateway } from '../gateways/records.js';
import {
  describeError,
  ErrorCategory,
  isPipelineError,
  withRetry
} from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { ContentHistory } from './history.js';
import {
  Channel,
  CHANNELS,
  Client,
  Idea,
  PipelineRun,
  Post,
  RunMode,
  StageName,
  StageOutcome,
  StageRequest,
  StageStatus
} from '../shared/types.js';

const log = createLogger('Pipeline');

export const WORKFLOW_STAGES: readonly StageName[] = ['curate', 'draft', 'approve_check', 'publish'];

// Diagnostics reported on non-fatal outcomes
export const Diagnostics = {
  CLIENT_NOT_FOUND: 'ClientNotFound',
  CLIENT_INACTIVE: 'ClientInactive',
  NO_ELIGIBLE_IDEAS: 'NoEligibleIdeas',
  NO_APPROVED_POSTS: 'NoApprovedPosts',
  NO_PENDING_POSTS: 'NoPendingPosts',
  GENERATION_UNAVAILABLE: 'GenerationUnavailable'
} as const;

export interface PublishRetryPolicy {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
}

export interface PipelineEngineOptions {
  defaultNumIdeas?: number;
  defaultNumPosts?: number;
  publishRetry?: Partial<PublishRetryPolicy>;
}

export interface RunControl {
  runId?: string;
  batchId?: string;
  mode?: RunMode;
  isCancelled?: () => boolean;
  onProgress?: (run: PipelineRun) => void;
}

export type PostActionFailure = 'not_found' | 'not_eligible' | 'inactive';

export type PostActionResult =
  | { ok: true; post: Post }
  | { ok: false; reason: PostActionFailure; message: string };

export type ApproveAndPublishResult =
  | { ok: true; post: Post; publish: StageOutcome }
  | { ok: false; reason: PostActionFailure; message: string };

export type SubmitIdeaResult =
  | { ok: true; idea: Idea }
  | { ok: false; reason: 'inactive' | 'not_found' | 'invalid' | 'duplicate'; message: string };

export interface SubmitIdeaInput {
  text: string;
  imageUrl?: string;
  channel?: Channel;
}

type ClientCheck =
  | { client: Client; diagnostic?: undefined }
  | { client: null; diagnostic: string };

type DeliveryResult = 'published' | 'failed' | 'blocked' | 'skipped';

const HEADLINE_LENGTH = 50;

export class PipelineEngine {
  private defaultNumIdeas: number;
  private defaultNumPosts: number;
  private publishRetry: PublishRetryPolicy;
  // Posts being delivered by this process
  private claims = new Set<string>();
  // Ideas being drafted by this process
  private draftingIdeas = new Set<string>();

  constructor(
    private records: RecordGateway,
    private generation: GenerationGateway,
    private publishers: PublisherRegistry,
    options: PipelineEngineOptions = {}
  ) {
    this.defaultNumIdeas = options.defaultNumIdeas ?? 20;
    this.defaultNumPosts = options.defaultNumPosts ?? 3;
    this.publishRetry = {
      maxAttempts: options.publishRetry?.maxAttempts ?? 3,
      initialDelayMs: options.publishRetry?.initialDelayMs ?? 1000,
      maxDelayMs: options.publishRetry?.maxDelayMs ?? 10000
    };
  }

  // ===== STAGES =====

  async curate(clientId: string, count: number = this.defaultNumIdeas): Promise<StageOutcome> {
    const startedAt = new Date().toISOString();
    const check = await this.activeClient(clientId);
    if (!check.client) {
      return this.outcome('curate', 'skipped', startedAt, { requested: count, diagnostic: check.diagnostic });
    }
    const client = check.client;

    let generated: GeneratedIdea[];
    try {
      generated = await this.generation.generateIdeas(client, count);
    } catch (error) {
      log.error(`Curation failed for ${client.name}:`, describeError(error));
      return this.failure('curate', startedAt, error, { requested: count });
    }

    // Ideas already on file, as ideas or as posts, are not stored again
    const history = await this.loadHistory(client.id);
    const created: string[] = [];
    let duplicates = 0;
    let lastError: unknown;
    for (const idea of generated) {
      if (history.has(idea.headline, idea.summary)) {
        duplicates++;
        continue;
      }
      history.remember(idea.headline, idea.summary);
      try {
        const saved = await this.records.createIdea(client.id, {
          headline: idea.headline,
          summary: idea.summary,
          origin: 'curated'
        });
        created.push(saved.id);
      } catch (error) {
        lastError = error;
        log.warn(`Could not save idea "${idea.headline}":`, describeError(error));
      }
    }

    log.info(`Curated ${created.length}/${count} ideas for ${client.name}${duplicates > 0 ? ` (${duplicates} duplicates)` : ''}`);

    if (created.length === 0 && lastError !== undefined) {
      return this.failure('curate', startedAt, lastError, { requested: count });
    }

    const status: StageStatus = created.length === 0 ? 'empty' : created.length < count ? 'partial' : 'success';
    return this.outcome('curate', status, startedAt, {
      requested: count,
      itemIds: created,
      diagnostic: created.length < count
        ? `Generated ${created.length} of ${count} ideas${duplicates > 0 ? `, skipped ${duplicates} duplicate(s)` : ''}`
        : undefined
    });
  }

  async draft(
    clientId: string,
    count: number = this.defaultNumPosts,
    options: { ideaIds?: string[] } = {}
  ): Promise<StageOutcome> {
    const startedAt = new Date().toISOString();
    const check = await this.activeClient(clientId);
    if (!check.client) {
      return this.outcome('draft', 'skipped', startedAt, { requested: count, diagnostic: check.diagnostic });
    }
    const client = check.client;

    // Oldest new ideas first; ideas drafting elsewhere in this process are left alone
    const candidates = await this.records.listIdeas(client.id, { state: 'new', ids: options.ideaIds });
    const selected = candidates.filter(idea => !this.draftingIdeas.has(idea.id)).slice(0, count);

    if (selected.length === 0) {
      return this.outcome('draft', 'empty', startedAt, {
        requested: count,
        diagnostic: Diagnostics.NO_ELIGIBLE_IDEAS
      });
    }

    const drafted: string[] = [];
    let failures = 0;
    let lastError: unknown;

    for (const idea of selected) {
      this.draftingIdeas.add(idea.id);
      try {
        const post = await this.draftIdea(client, idea);
        if (post) drafted.push(post.id);
      } catch (error) {
        failures++;
        lastError = error;
        log.warn(`Drafting idea ${idea.id} failed:`, describeError(error));
      } finally {
        this.draftingIdeas.delete(idea.id);
      }
    }

    log.info(`Drafted ${drafted.length}/${selected.length} posts for ${client.name}`);

    if (drafted.length === 0 && failures > 0) {
      return this.failure('draft', startedAt, lastError, { requested: count });
    }

    const status: StageStatus = failures > 0 ? 'partial' : drafted.length === 0 ? 'empty' : 'success';
    return this.outcome('draft', status, startedAt, {
      requested: count,
      itemIds: drafted,
      diagnostic: failures > 0 ? `${failures} idea(s) could not be drafted: ${describeError(lastError)}` : undefined,
      errorCategory: failures > 0 ? categoryOf(lastError) : undefined
    });
  }

  async approveCheck(clientId: string): Promise<StageOutcome> {
    const startedAt = new Date().toISOString();
    const check = await this.activeClient(clientId);
    if (!check.client) {
      return this.outcome('approve_check', 'skipped', startedAt, { diagnostic: check.diagnostic });
    }
    const client = check.client;

    const pending = await this.records.listPosts(client.id, { status: 'pending' });
    if (pending.length === 0) {
      return this.outcome('approve_check', 'empty', startedAt, { diagnostic: Diagnostics.NO_PENDING_POSTS });
    }

    if (client.approvalMode !== 'auto') {
      return this.outcome('approve_check', 'success', startedAt, {
        diagnostic: `${pending.length} post(s) awaiting approval`
      });
    }

    const approved: string[] = [];
    for (const post of pending) {
      const updated = await this.records.transitionPost(post.id, 'pending', 'approved');
      if (updated) approved.push(updated.id);
    }

    log.info(`Auto-approved ${approved.length} posts for ${client.name}`);
    return this.outcome('approve_check', 'success', startedAt, { itemIds: approved });
  }

  async publish(clientId: string, options: { postIds?: string[] } = {}): Promise<StageOutcome> {
    const startedAt = new Date().toISOString();
    const check = await this.activeClient(clientId);
    if (!check.client) {
      return this.outcome('publish', 'skipped', startedAt, { diagnostic: check.diagnostic });
    }
    const client = check.client;

    const approved = await this.records.listPosts(client.id, { status: 'approved', ids: options.postIds });
    if (approved.length === 0) {
      return this.outcome('publish', 'empty', startedAt, { diagnostic: Diagnostics.NO_APPROVED_POSTS });
    }

    const published: string[] = [];
    const problems: string[] = [];
    let failed = 0;
    let lastError: unknown;

    for (const post of approved) {
      const { result, error } = await this.deliver(client, post);
      if (result === 'published') {
        published.push(post.id);
      } else if (result === 'failed' || result === 'blocked') {
        failed++;
        lastError = error;
        problems.push(`${post.id}: ${describeError(error)}`);
      }
    }

    log.info(`Published ${published.length}/${approved.length} posts for ${client.name}`);

    const status: StageStatus =
      failed === 0 ? (published.length > 0 ? 'success' : 'empty')
        : published.length > 0 ? 'partial' : 'failed';

    return this.outcome('publish', status, startedAt, {
      requested: approved.length,
      itemIds: published,
      diagnostic: problems.length > 0 ? problems.join('; ') : undefined,
      errorCategory: failed > 0 ? categoryOf(lastError) : undefined
    });
  }

  // ===== POST ACTIONS =====

  async approvePost(clientId: string, postId: string): Promise<PostActionResult> {
    return this.transitionOwnedPost(clientId, postId, 'approved');
  }

  async rejectPost(clientId: string, postId: string, feedback?: string): Promise<PostActionResult> {
    return this.transitionOwnedPost(clientId, postId, 'rejected', feedback);
  }

  async approveAndPublish(clientId: string, postId: string): Promise<ApproveAndPublishResult> {
    const approval = await this.approvePost(clientId, postId);
    if (!approval.ok) return approval;

    const outcome = await this.publish(clientId, { postIds: [postId] });
    const post = (await this.records.getPost(postId)) ?? approval.post;
    return { ok: true, post, publish: outcome };
  }

  async submitIdea(clientId: string, input: SubmitIdeaInput): Promise<SubmitIdeaResult> {
    const check = await this.activeClient(clientId);
    if (!check.client) {
      return {
        ok: false,
        reason: check.diagnostic === Diagnostics.CLIENT_NOT_FOUND ? 'not_found' : 'inactive',
        message: check.diagnostic
      };
    }

    const text = input.text.trim();
    if (!text) {
      return { ok: false, reason: 'invalid', message: 'Idea text is empty' };
    }

    // A new image makes it a new idea even when the words repeat
    const history = input.imageUrl ? null : await this.loadHistory(check.client.id);
    if (history?.has(text)) {
      return { ok: false, reason: 'duplicate', message: 'That idea is already on file' };
    }

    const idea = await this.records.createIdea(check.client.id, {
      headline: text.slice(0, HEADLINE_LENGTH),
      summary: text,
      origin: 'client-submitted',
      imageUrl: input.imageUrl,
      channel: input.channel,
      sourceDetail: 'Client Input'
    });

    log.info(`Client ${check.client.name} submitted idea ${idea.id}`);
    return { ok: true, idea };
  }

  async listPendingPosts(clientId: string, limit: number): Promise<Post[]> {
    const check = await this.activeClient(clientId);
    if (!check.client) return [];
    return this.records.listPosts(check.client.id, { status: 'pending', limit });
  }

  // ===== RUNS =====

  async runStages(clientId: string, request: StageRequest, control: RunControl = {}): Promise<PipelineRun> {
    const now = new Date().toISOString();
    const run: PipelineRun = {
      id: control.runId ?? randomUUID(),
      clientId,
      batchId: control.batchId,
      stages: [...request.stages],
      currentStage: null,
      outcomes: [],
      status: 'running',
      mode: control.mode ?? 'sync',
      params: request,
      createdAt: now,
      startedAt: now
    };
    const emit = () => control.onProgress?.({ ...run, outcomes: [...run.outcomes] });
    emit();

    const bestEffort = new Set<StageName>(request.bestEffort ?? ['approve_check']);

    for (const stage of request.stages) {
      // Cancellation only stops stages that have not started
      if (control.isCancelled?.()) {
        run.status = 'cancelled';
        break;
      }

      run.currentStage = stage;
      emit();

      const outcome = await this.executeStage(clientId, stage, request);
      run.outcomes.push(outcome);

      if (outcome.status === 'failed' && !bestEffort.has(stage)) {
        run.status = 'failed';
        break;
      }
    }

    if (run.status === 'running') {
      run.status = 'succeeded';
    }
    run.currentStage = null;
    run.finishedAt = new Date().toISOString();
    emit();

    log.info(`Run ${run.id} for client ${clientId} finished: ${run.status}`);
    return { ...run, outcomes: [...run.outcomes] };
  }

  async fullWorkflow(
    clientId: string,
    numIdeas: number = this.defaultNumIdeas,
    numPosts: number = this.defaultNumPosts,
    control: RunControl = {}
  ): Promise<PipelineRun> {
    return this.runStages(clientId, workflowRequest(numIdeas, numPosts), control);
  }

  // Stage failures are returned as outcomes, never thrown
  private async executeStage(clientId: string, stage: StageName, request: StageRequest): Promise<StageOutcome> {
    const startedAt = new Date().toISOString();
    try {
      switch (stage) {
        case 'curate':
          return await this.curate(clientId, request.numIdeas ?? this.defaultNumIdeas);
        case 'draft':
          return await this.draft(clientId, request.numPosts ?? this.defaultNumPosts, { ideaIds: request.ideaIds });
        case 'approve_check':
          return await this.approveCheck(clientId);
        case 'publish':
          return await this.publish(clientId, { postIds: request.postIds });
      }
    } catch (error) {
      log.error(`Stage ${stage} crashed for client ${clientId}:`, describeError(error));
      return this.failure(stage, startedAt, error);
    }
  }

  // ===== INTERNALS =====

  private async loadHistory(clientId: string): Promise<ContentHistory> {
    const [ideas, posts] = await Promise.all([this.records.listIdeas(clientId), this.records.listPosts(clientId)]);
    return new ContentHistory(ideas, posts);
  }

  private async activeClient(clientId: string): Promise<ClientCheck> {
    const client = await this.records.getClient(clientId);
    if (!client) return { client: null, diagnostic: Diagnostics.CLIENT_NOT_FOUND };
    if (client.status !== 'active') return { client: null, diagnostic: Diagnostics.CLIENT_INACTIVE };
    return { client };
  }

  private async draftIdea(client: Client, idea: Idea): Promise<Post | null> {
    const channel = idea.channel ?? client.channels[0] ?? CHANNELS[0];
    const generated = await this.generation.draftPost(client, idea, channel);

    // The idea may have been taken by another writer while generating
    const post = await this.records.createPostFromIdea(client.id, {
      ideaId: idea.id,
      body: composePostBody(generated.body, generated.hashtags),
      channel,
      mediaUrl: idea.imageUrl
    });

    if (!post) {
      log.warn(`Idea ${idea.id} was drafted concurrently, discarding duplicate draft`);
    }
    return post;
  }

  private async deliver(client: Client, post: Post): Promise<{ result: DeliveryResult; error?: unknown }> {
    if (this.claims.has(post.id)) {
      return { result: 'skipped' };
    }
    this.claims.add(post.id);

    try {
      // Re-read right before delivery; only approved posts go out
      const current = await this.records.getPost(post.id);
      if (!current || current.status !== 'approved' || current.clientId !== client.id) {
        return { result: 'skipped' };
      }

      let publisher: Publisher;
      try {
        publisher = this.publishers.forChannel(current.channel);
      } catch (error) {
        // Left approved so a later run can deliver once credentials exist
        log.warn(`No publisher for ${current.channel}:`, describeError(error));
        return { result: 'blocked', error };
      }

      let attempts = current.attempts;
      try {
        const delivered = await withRetry(
          () => {
            attempts++;
            return publisher.publish(current, client);
          },
          {
            ...this.publishRetry,
            onRetry: (error, attempt, delayMs) =>
              log.warn(`Publishing post ${current.id} attempt ${attempt} failed, retrying in ${delayMs}ms:`, describeError(error))
          }
        );

        await this.records.transitionPost(current.id, 'approved', 'published', {
          platformPostId: delivered.platformPostId,
          publishedAt: new Date().toISOString(),
          attempts,
          error: null
        });
        return { result: 'published' };
      } catch (error) {
        log.error(`Publishing post ${current.id} to ${current.channel} failed:`, describeError(error));
        await this.records.transitionPost(current.id, 'approved', 'failed', {
          error: describeError(error),
          attempts
        });
        return { result: 'failed', error };
      }
    } finally {
      this.claims.delete(post.id);
    }
  }

  private async transitionOwnedPost(
    clientId: string,
    postId: string,
    to: 'approved' | 'rejected',
    feedback?: string
  ): Promise<PostActionResult> {
    const check = await this.activeClient(clientId);
    if (!check.client) {
      return { ok: false, reason: 'inactive', message: check.diagnostic };
    }

    const post = await this.records.getPost(postId);
    if (!post || post.clientId !== clientId) {
      return { ok: false, reason: 'not_found', message: `Post ${postId} not found` };
    }
    if (post.status !== 'pending') {
      return { ok: false, reason: 'not_eligible', message: `Post is already ${post.status}` };
    }

    const updated = await this.records.transitionPost(postId, 'pending', to, feedback !== undefined ? { feedback } : {});
    if (!updated) {
      const latest = await this.records.getPost(postId);
      return { ok: false, reason: 'not_eligible', message: `Post is already ${latest?.status ?? 'gone'}` };
    }

    log.info(`Post ${postId} ${to} for client ${clientId}`);
    return { ok: true, post: updated };
  }

  private outcome(
    stage: StageName,
    status: StageStatus,
    startedAt: string,
    details: {
      requested?: number;
      itemIds?: string[];
      diagnostic?: string;
      errorCategory?: string;
    } = {}
  ): StageOutcome {
    const itemIds = details.itemIds ?? [];
    return {
      stage,
      status,
      requested: details.requested,
      affected: itemIds.length,
      itemIds,
      diagnostic: details.diagnostic,
      errorCategory: details.errorCategory,
      startedAt,
      finishedAt: new Date().toISOString()
    };
  }

  private failure(stage: StageName, startedAt: string, error: unknown, details: { requested?: number } = {}): StageOutcome {
    const category = categoryOf(error);
    const diagnostic = category === ErrorCategory.GENERATION_UNAVAILABLE
      ? `${Diagnostics.GENERATION_UNAVAILABLE}: ${describeError(error)}`
      : describeError(error);
    return this.outcome(stage, 'failed', startedAt, { ...details, diagnostic, errorCategory: category });
  }
}

const categoryOf = (error: unknown): ErrorCategory =>
  isPipelineError(error) ? error.category : ErrorCategory.UNKNOWN;

export const workflowRequest = (numIdeas?: number, numPosts?: number): StageRequest => ({
  stages: [...WORKFLOW_STAGES],
  numIdeas,
  numPosts,
  bestEffort: ['approve_check']
});
