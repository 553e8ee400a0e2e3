// Unit tests for the task scheduler

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { IDEA_SYSTEM_PROMPT } from '../../../src/gateways/prompts.js';
import { workflowRequest } from '../../../src/pipeline/engine.js';
import { BatchSkipReasons, TaskScheduler } from '../../../src/scheduler/index.js';
import { CompletionOptions, TextGenerator } from '../../../src/shared/llm.js';
import { PipelineRun, StageRequest } from '../../../src/shared/types.js';
import { clientInput, createTestPipeline, ideasJson, postJson, TestPipeline } from '../../helpers.js';

// Mock fetch for the completion webhook
const mockFetch = vi.fn<typeof fetch>();
global.fetch = mockFetch;

const CURATE: StageRequest = { stages: ['curate'], numIdeas: 2 };

// Generator that holds every call until released
const createGatedGenerator = () => {
  let open: () => void = () => undefined;
  const gate = new Promise<void>(resolve => {
    open = resolve;
  });
  const generator: TextGenerator = {
    complete: vi.fn(async (_prompt: string, options: CompletionOptions): Promise<string> => {
      await gate;
      return options.systemPrompt === IDEA_SYSTEM_PROMPT ? ideasJson(2) : postJson();
    })
  };
  return { generator, release: () => open() };
};

describe('TaskScheduler', () => {
  let pipeline: TestPipeline;
  let scheduler: TaskScheduler;
  let clientId: string;

  beforeEach(async () => {
    mockFetch.mockReset();
    pipeline = createTestPipeline();
    scheduler = new TaskScheduler(pipeline.engine, pipeline.records);
    clientId = (await pipeline.records.upsertClient(clientInput())).id;
  });

  describe('runNow', () => {
    it('returns the finished run', async () => {
      const run = await scheduler.runNow(clientId, workflowRequest(3, 2));

      expect(run.status).toBe('succeeded');
      expect(run.mode).toBe('sync');
      expect(run.outcomes.map(outcome => outcome.stage)).toEqual(['curate', 'draft', 'approve_check', 'publish']);
      expect(scheduler.getRun(run.id)).toEqual(run);
    });

    it('settles as soon as the last stage is done', async () => {
      const finished: PipelineRun[] = [];
      scheduler.onRunFinished(run => finished.push(run));

      const startedAt = Date.now();
      const run = await scheduler.runNow(clientId, { stages: ['publish'] }, { timeoutMs: 5000 });

      expect(Date.now() - startedAt).toBeLessThan(1000);
      expect(run.status).toBe('succeeded');
      expect(run.finishedAt).toEqual(expect.any(String));
      expect(finished.map(entry => entry.id)).toEqual([run.id]);
    });

    it('returns a running snapshot on timeout and keeps going', async () => {
      const { generator, release } = createGatedGenerator();
      pipeline = createTestPipeline({ generator });
      scheduler = new TaskScheduler(pipeline.engine, pipeline.records);
      clientId = (await pipeline.records.upsertClient(clientInput())).id;

      const snapshot = await scheduler.runNow(clientId, CURATE, { timeoutMs: 10 });

      expect(snapshot.status).toBe('running');
      expect(snapshot.currentStage).toBe('curate');

      release();
      const finished = await scheduler.waitForRun(snapshot.id);
      expect(finished.status).toBe('succeeded');
      expect(finished.outcomes[0].affected).toBe(2);
    });
  });

  describe('enqueue', () => {
    it('runs queued work in the background', async () => {
      const finished: PipelineRun[] = [];
      scheduler.onRunFinished(run => finished.push(run));

      const runId = scheduler.enqueue(clientId, CURATE);
      const run = await scheduler.waitForRun(runId);

      expect(run).toMatchObject({ id: runId, mode: 'async', status: 'succeeded' });
      expect(finished.map(entry => entry.id)).toEqual([runId]);
    });

    it('cancels a queued run before it starts', async () => {
      const { generator, release } = createGatedGenerator();
      pipeline = createTestPipeline({ generator });
      scheduler = new TaskScheduler(pipeline.engine, pipeline.records, { concurrency: 1 });
      clientId = (await pipeline.records.upsertClient(clientInput())).id;

      const first = scheduler.enqueue(clientId, CURATE);
      const second = scheduler.enqueue(clientId, CURATE);

      expect(scheduler.cancel(second)).toBe(true);
      expect(scheduler.getRun(second)?.status).toBe('cancelled');

      release();
      await scheduler.drain();

      expect(scheduler.getRun(first)?.status).toBe('succeeded');
      expect(scheduler.getRun(second)).toMatchObject({ status: 'cancelled', outcomes: [] });
      expect(scheduler.cancel(second)).toBe(false);
    });

    it('stops a running run before its next stage', async () => {
      const { generator, release } = createGatedGenerator();
      pipeline = createTestPipeline({ generator });
      scheduler = new TaskScheduler(pipeline.engine, pipeline.records);
      clientId = (await pipeline.records.upsertClient(clientInput())).id;

      const runId = scheduler.enqueue(clientId, { stages: ['curate', 'draft'], numIdeas: 2, numPosts: 1 });
      expect(scheduler.cancel(runId)).toBe(true);
      release();

      const run = await scheduler.waitForRun(runId);
      expect(run.status).toBe('cancelled');
      expect(run.outcomes.map(outcome => outcome.stage)).toEqual(['curate']);
      expect(await pipeline.records.countPosts(clientId)).toBe(0);
    });
  });

  describe('enqueueAll', () => {
    it('isolates failures and skips inactive clients', async () => {
      const generator: TextGenerator = {
        complete: vi.fn(async (prompt: string): Promise<string> => {
          if (prompt.includes('Client: Failing Florist')) throw new Error('model offline');
          return ideasJson(2);
        })
      };
      pipeline = createTestPipeline({ generator });
      scheduler = new TaskScheduler(pipeline.engine, pipeline.records);
      const { records } = pipeline;
      const c1 = await records.upsertClient(clientInput({ handle: 'U-C1', name: 'Failing Florist' }));
      const c2 = await records.upsertClient(clientInput({ handle: 'U-C2', name: 'Closed Cafe' }));
      const c3 = await records.upsertClient(clientInput({ handle: 'U-C3', name: 'Corner Deli' }));
      await records.setClientStatus(c2.id, 'inactive');

      const queued = await scheduler.enqueueAll(CURATE);
      expect(queued.skipped).toEqual([{ clientId: c2.id, reason: BatchSkipReasons.INACTIVE }]);
      expect(Object.keys(queued.clients)).toEqual([c1.id, c3.id]);

      const report = await scheduler.waitForBatch(queued.id);

      expect(report.clients[c1.id].status).toBe('failed');
      expect(report.clients[c1.id].outcomes[0].errorCategory).toBe('generation_unavailable');
      expect(report.clients[c3.id].status).toBe('succeeded');
      expect(report.clients[c3.id].outcomes[0]).toMatchObject({ stage: 'curate', status: 'success', affected: 2 });
      expect(await records.countIdeas(c3.id)).toBe(2);
      expect(scheduler.getBatch(queued.id)).toEqual(report);
    });

    it('caps the number of clients', async () => {
      await pipeline.records.upsertClient(clientInput({ handle: 'U-2', name: 'Second' }));
      const third = await pipeline.records.upsertClient(clientInput({ handle: 'U-3', name: 'Third' }));

      const report = await scheduler.enqueueAll(CURATE, { maxClients: 2 });

      expect(Object.keys(report.clients)).toHaveLength(2);
      expect(report.skipped).toEqual([{ clientId: third.id, reason: BatchSkipReasons.MAX_CLIENTS }]);
      await scheduler.drain();
    });

    it('reports unknown client ids', async () => {
      const report = await scheduler.enqueueAll(CURATE, { clientIds: [clientId, 'missing'] });

      expect(Object.keys(report.clients)).toEqual([clientId]);
      expect(report.skipped).toEqual([{ clientId: 'missing', reason: BatchSkipReasons.NOT_FOUND }]);
      await scheduler.drain();
    });
  });

  describe('completion webhook', () => {
    it('posts every finished run', async () => {
      mockFetch.mockResolvedValue(new Response(null, { status: 204 }));
      scheduler = new TaskScheduler(pipeline.engine, pipeline.records, {
        completionWebhookUrl: 'https://hooks.example.com/runs'
      });

      const run = await scheduler.runNow(clientId, CURATE);
      await scheduler.drain();

      expect(mockFetch).toHaveBeenCalledTimes(1);
      const [url, init] = mockFetch.mock.calls[0];
      expect(url).toBe('https://hooks.example.com/runs');
      expect(JSON.parse(String(init?.body))).toMatchObject({ event: 'run.finished', run: { id: run.id, status: 'succeeded' } });
    });

    it('does not affect the run when delivery fails', async () => {
      mockFetch.mockRejectedValue(new TypeError('fetch failed'));
      scheduler = new TaskScheduler(pipeline.engine, pipeline.records, {
        completionWebhookUrl: 'https://hooks.example.com/runs'
      });

      const run = await scheduler.runNow(clientId, CURATE);
      await scheduler.drain();

      expect(scheduler.getRun(run.id)?.status).toBe('succeeded');
    });
  });

  describe('prune', () => {
    it('forgets finished runs past the retention window', async () => {
      scheduler = new TaskScheduler(pipeline.engine, pipeline.records, { retentionMs: 60000 });
      const run = await scheduler.runNow(clientId, CURATE);

      expect(scheduler.prune()).toEqual({ runs: 0, batches: 0 });
      expect(scheduler.getRun(run.id)?.status).toBe('succeeded');

      expect(scheduler.prune(Date.now() + 60001)).toEqual({ runs: 1, batches: 0 });
      expect(scheduler.getRun(run.id)).toBeNull();
      expect(scheduler.stats().tracked).toBe(0);
    });

    it('keeps unfinished runs and the runs of a live batch', async () => {
      const { generator, release } = createGatedGenerator();
      pipeline = createTestPipeline({ generator });
      scheduler = new TaskScheduler(pipeline.engine, pipeline.records, { concurrency: 1, retentionMs: 0 });
      clientId = (await pipeline.records.upsertClient(clientInput())).id;
      const other = await pipeline.records.upsertClient(clientInput({ handle: 'U-2', name: 'Second' }));

      const batch = await scheduler.enqueueAll(CURATE);
      const later = Date.now() + 1000;

      expect(scheduler.prune(later)).toEqual({ runs: 0, batches: 0 });

      release();
      await scheduler.waitForBatch(batch.id);

      expect(scheduler.prune(Date.now() + 1000)).toEqual({ runs: 2, batches: 1 });
      expect(scheduler.getBatch(batch.id)).toBeNull();
      expect(scheduler.getRun(batch.clients[other.id].runId)).toBeNull();
    });
  });

  it('knows nothing about unknown runs', async () => {
    expect(scheduler.getRun('missing')).toBeNull();
    expect(scheduler.getBatch('missing')).toBeNull();
    await expect(scheduler.waitForRun('missing')).rejects.toThrow('Unknown run missing');
  });
});
