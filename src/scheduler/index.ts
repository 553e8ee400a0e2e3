// Task scheduler: synchronous runs, a bounded worker pool for queued runs, batch fan-out

import { randomUUID } from 'node:crypto';
import { RecordGateway } from '../gateways/records.js';
import { PipelineEngine } from '../pipeline/engine.js';
import { describeError, ErrorCategory, isPipelineError, withTimeout } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { BatchReport, PipelineRun, RunMode, RunStatus, StageRequest } from '../shared/types.js';

const log = createLogger('Scheduler');

const TERMINAL_RUN_STATUSES: readonly RunStatus[] = ['succeeded', 'failed', 'cancelled'];

export const isTerminal = (run: PipelineRun): boolean => TERMINAL_RUN_STATUSES.includes(run.status);

export const BatchSkipReasons = {
  INACTIVE: 'ClientInactive',
  NOT_FOUND: 'ClientNotFound',
  MAX_CLIENTS: 'MaxClientsReached'
} as const;

export interface SchedulerOptions {
  concurrency?: number;
  syncTimeoutMs?: number;
  completionWebhookUrl?: string;
  webhookTimeoutMs?: number;
  retentionMs?: number; // how long finished runs and settled batches stay queryable
}

export interface EnqueueAllOptions {
  maxClients?: number;
  clientIds?: string[];
}

type RunListener = (run: PipelineRun) => void;

interface QueuedRun {
  runId: string;
  clientId: string;
  request: StageRequest;
  batchId?: string;
}

interface BatchRecord {
  id: string;
  request: StageRequest;
  createdAt: string;
  runIds: Map<string, string>; // clientId -> runId
  skipped: Array<{ clientId: string; reason: string }>;
}

export class TaskScheduler {
  private concurrency: number;
  private syncTimeoutMs: number;
  private completionWebhookUrl?: string;
  private webhookTimeoutMs: number;
  private retentionMs: number;

  private runs = new Map<string, PipelineRun>();
  private batches = new Map<string, BatchRecord>();
  private queue: QueuedRun[] = [];
  private active = 0;
  private cancelled = new Set<string>();
  // Runs settled by finish(); progress snapshots never land here
  private finished = new Set<string>();
  private inFlight = new Set<Promise<void>>();
  private waiters = new Map<string, Array<(run: PipelineRun) => void>>();
  private listeners: RunListener[] = [];

  constructor(
    private engine: PipelineEngine,
    private records: RecordGateway,
    options: SchedulerOptions = {}
  ) {
    this.concurrency = Math.max(1, options.concurrency ?? 2);
    this.syncTimeoutMs = options.syncTimeoutMs ?? 120000;
    this.completionWebhookUrl = options.completionWebhookUrl;
    this.webhookTimeoutMs = options.webhookTimeoutMs ?? 20000;
    this.retentionMs = options.retentionMs ?? 60 * 60 * 1000;
  }

  // ===== SUBMISSION =====

  // Caller waits; on timeout the latest snapshot (still running) comes back
  async runNow(clientId: string, request: StageRequest, options: { timeoutMs?: number } = {}): Promise<PipelineRun> {
    const runId = this.createRun(clientId, request, 'sync');
    const completion = this.waitForRun(runId);
    this.track(this.execute({ runId, clientId, request }, 'sync'));

    const timeoutMs = options.timeoutMs ?? this.syncTimeoutMs;
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<null>(resolve => {
      timer = setTimeout(() => resolve(null), timeoutMs);
    });

    try {
      const finished = await Promise.race([completion, timedOut]);
      if (finished) return finished;
      log.warn(`Run ${runId} still running after ${timeoutMs}ms, returning snapshot`);
      return this.snapshot(runId);
    } finally {
      clearTimeout(timer);
    }
  }

  enqueue(clientId: string, request: StageRequest, batchId?: string): string {
    const runId = this.createRun(clientId, request, 'async', batchId);
    this.queue.push({ runId, clientId, request, batchId });
    log.debug(`Queued run ${runId} for client ${clientId}`);
    this.pump();
    return runId;
  }

  // One independent run per active client, capped at maxClients
  async enqueueAll(request: StageRequest, options: EnqueueAllOptions = {}): Promise<BatchReport> {
    const batch: BatchRecord = {
      id: randomUUID(),
      request,
      createdAt: new Date().toISOString(),
      runIds: new Map(),
      skipped: []
    };

    const candidates = options.clientIds
      ? await Promise.all(options.clientIds.map(async id => ({ id, client: await this.records.getClient(id) })))
      : (await this.records.listClients()).map(client => ({ id: client.id, client }));

    for (const { id, client } of candidates) {
      if (!client) {
        batch.skipped.push({ clientId: id, reason: BatchSkipReasons.NOT_FOUND });
      } else if (client.status !== 'active') {
        batch.skipped.push({ clientId: id, reason: BatchSkipReasons.INACTIVE });
      } else if (options.maxClients !== undefined && batch.runIds.size >= options.maxClients) {
        batch.skipped.push({ clientId: id, reason: BatchSkipReasons.MAX_CLIENTS });
      } else if (!batch.runIds.has(id)) {
        batch.runIds.set(id, '');
      }
    }

    this.batches.set(batch.id, batch);
    for (const clientId of batch.runIds.keys()) {
      batch.runIds.set(clientId, this.enqueue(clientId, request, batch.id));
    }

    log.info(`Batch ${batch.id}: ${batch.runIds.size} client(s) queued, ${batch.skipped.length} skipped`);
    return this.batchReport(batch);
  }

  // ===== STATUS =====

  getRun(runId: string): PipelineRun | null {
    return this.runs.has(runId) ? this.snapshot(runId) : null;
  }

  getBatch(batchId: string): BatchReport | null {
    const batch = this.batches.get(batchId);
    return batch ? this.batchReport(batch) : null;
  }

  waitForRun(runId: string): Promise<PipelineRun> {
    const run = this.runs.get(runId);
    if (!run) {
      return Promise.reject(new Error(`Unknown run ${runId}`));
    }
    if (this.finished.has(runId)) {
      return Promise.resolve(this.snapshot(runId));
    }
    return new Promise(resolve => {
      const pending = this.waiters.get(runId) ?? [];
      pending.push(resolve);
      this.waiters.set(runId, pending);
    });
  }

  async waitForBatch(batchId: string): Promise<BatchReport> {
    const batch = this.batches.get(batchId);
    if (!batch) {
      throw new Error(`Unknown batch ${batchId}`);
    }
    await Promise.all([...batch.runIds.values()].map(runId => this.waitForRun(runId)));
    return this.batchReport(batch);
  }

  onRunFinished(listener: RunListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter(existing => existing !== listener);
    };
  }

  // Queued runs never start; running runs stop before their next stage
  cancel(runId: string): boolean {
    const run = this.runs.get(runId);
    if (!run || this.finished.has(runId)) return false;

    const index = this.queue.findIndex(job => job.runId === runId);
    if (index >= 0) {
      this.queue.splice(index, 1);
      this.finish({ ...run, status: 'cancelled', finishedAt: new Date().toISOString() });
      return true;
    }

    this.cancelled.add(runId);
    return true;
  }

  // Resolves once nothing is queued or running
  async drain(): Promise<void> {
    while (this.inFlight.size > 0 || this.queue.length > 0) {
      if (this.inFlight.size === 0) this.pump();
      await Promise.allSettled([...this.inFlight]);
    }
  }

  stats(): { queued: number; running: number; tracked: number } {
    return { queued: this.queue.length, running: this.active, tracked: this.runs.size };
  }

  // Forgets finished runs and settled batches older than the retention window
  prune(now: number = Date.now()): { runs: number; batches: number } {
    const cutoff = now - this.retentionMs;
    const finishedBefore = (runId: string): boolean => {
      const finishedAt = this.runs.get(runId)?.finishedAt;
      return this.finished.has(runId) && finishedAt !== undefined && Date.parse(finishedAt) <= cutoff;
    };

    let batches = 0;
    for (const [batchId, batch] of this.batches) {
      if ([...batch.runIds.values()].every(finishedBefore)) {
        this.batches.delete(batchId);
        batches++;
      }
    }

    // Runs of a batch that is still reported stay with it
    let runs = 0;
    for (const [runId, run] of this.runs) {
      if (!finishedBefore(runId)) continue;
      if (run.batchId !== undefined && this.batches.has(run.batchId)) continue;
      this.runs.delete(runId);
      this.finished.delete(runId);
      runs++;
    }

    if (runs > 0 || batches > 0) {
      log.debug(`Pruned ${runs} run(s) and ${batches} batch(es)`);
    }
    return { runs, batches };
  }

  // ===== WORKERS =====

  private pump(): void {
    while (this.active < this.concurrency && this.queue.length > 0) {
      const job = this.queue.shift();
      if (!job) break;
      this.active++;
      this.track(
        this.execute(job, 'async').finally(() => {
          this.active--;
          this.pump();
        })
      );
    }
  }

  // Never rejects; anything thrown becomes a failed stage outcome
  private async execute(job: QueuedRun, mode: RunMode): Promise<void> {
    try {
      const run = await this.engine.runStages(job.clientId, job.request, {
        runId: job.runId,
        batchId: job.batchId,
        mode,
        isCancelled: () => this.cancelled.has(job.runId),
        onProgress: progress => this.update(progress)
      });
      this.finish(run);
    } catch (error) {
      log.error(`Run ${job.runId} for client ${job.clientId} crashed:`, describeError(error));
      const last = this.runs.get(job.runId);
      const now = new Date().toISOString();
      const stage = last?.currentStage ?? job.request.stages[0] ?? 'curate';
      this.finish({
        ...(last ?? this.newRun(job.runId, job.clientId, job.request, mode, job.batchId)),
        status: 'failed',
        currentStage: null,
        outcomes: [
          ...(last?.outcomes ?? []),
          {
            stage,
            status: 'failed',
            affected: 0,
            itemIds: [],
            diagnostic: describeError(error),
            errorCategory: isPipelineError(error) ? error.category : ErrorCategory.UNKNOWN,
            startedAt: last?.startedAt ?? now,
            finishedAt: now
          }
        ],
        finishedAt: now
      });
    } finally {
      this.cancelled.delete(job.runId);
    }
  }

  private track(task: Promise<void>): void {
    this.inFlight.add(task);
    void task.finally(() => this.inFlight.delete(task));
  }

  // ===== RUN RECORDS =====

  private newRun(runId: string, clientId: string, request: StageRequest, mode: RunMode, batchId?: string): PipelineRun {
    return {
      id: runId,
      clientId,
      batchId,
      stages: [...request.stages],
      currentStage: null,
      outcomes: [],
      status: 'queued',
      mode,
      params: request,
      createdAt: new Date().toISOString()
    };
  }

  private createRun(clientId: string, request: StageRequest, mode: RunMode, batchId?: string): string {
    const run = this.newRun(randomUUID(), clientId, request, mode, batchId);
    this.runs.set(run.id, run);
    return run.id;
  }

  // Progress snapshots stay running until finish() settles the run
  private update(run: PipelineRun): void {
    if (this.finished.has(run.id)) return;
    const existing = this.runs.get(run.id);
    this.runs.set(run.id, {
      ...existing,
      ...run,
      status: isTerminal(run) ? 'running' : run.status,
      finishedAt: isTerminal(run) ? undefined : run.finishedAt,
      createdAt: existing?.createdAt ?? run.createdAt
    });
  }

  private finish(run: PipelineRun): void {
    if (this.finished.has(run.id)) return;
    const existing = this.runs.get(run.id);
    this.finished.add(run.id);

    this.runs.set(run.id, { ...run, createdAt: existing?.createdAt ?? run.createdAt });
    const final = this.snapshot(run.id);

    for (const resolve of this.waiters.get(run.id) ?? []) {
      resolve(this.snapshot(run.id));
    }
    this.waiters.delete(run.id);

    for (const listener of this.listeners) {
      try {
        listener(this.snapshot(run.id));
      } catch (error) {
        log.warn(`Run listener failed for ${run.id}:`, describeError(error));
      }
    }

    if (this.completionWebhookUrl) {
      this.track(this.notifyWebhook(this.completionWebhookUrl, final));
    }
  }

  private async notifyWebhook(url: string, run: PipelineRun): Promise<void> {
    try {
      const response = await withTimeout(
        signal => fetch(url, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({ event: 'run.finished', run }),
          signal
        }),
        this.webhookTimeoutMs,
        'Completion webhook'
      );
      if (!response.ok) {
        log.warn(`Completion webhook returned ${response.status} for run ${run.id}`);
      }
    } catch (error) {
      log.warn(`Completion webhook failed for run ${run.id}:`, describeError(error));
    }
  }

  private snapshot(runId: string): PipelineRun {
    const run = this.runs.get(runId);
    if (!run) {
      throw new Error(`Unknown run ${runId}`);
    }
    return structuredClone(run);
  }

  private batchReport(batch: BatchRecord): BatchReport {
    const clients: BatchReport['clients'] = {};
    for (const [clientId, runId] of batch.runIds) {
      const run = this.runs.get(runId);
      clients[clientId] = {
        runId,
        status: run?.status ?? 'queued',
        outcomes: run ? structuredClone(run.outcomes) : []
      };
    }
    return {
      id: batch.id,
      request: batch.request,
      createdAt: batch.createdAt,
      clients,
      skipped: [...batch.skipped]
    };
  }
}
