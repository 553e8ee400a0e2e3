// HTTP routes served beside the Slack app

import { CustomRoute } from '@slack/bolt';
import { IncomingMessage, ServerResponse } from 'node:http';
import { z } from 'zod';
import { MarketingService, Target, TriggerResult } from '../service.js';
import {
  createValidationError,
  describeError,
  ErrorCategory,
  isPipelineError
} from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('Routes');

const MAX_BODY_BYTES = 1024 * 1024;

export interface RouteRequest {
  query: URLSearchParams;
  body: unknown;
}

export interface RouteResult {
  status: number;
  body: unknown;
}

export interface ApiRoute {
  method: 'GET' | 'POST';
  path: string;
  handle: (request: RouteRequest) => Promise<RouteResult>;
}

const workflowSchema = z
  .object({
    stage: z.enum(['curate', 'draft', 'publish', 'workflow']).default('workflow'),
    clientId: z.string().min(1).optional(),
    all: z.boolean().optional(),
    numIdeas: z.number().int().min(0).optional(),
    numPosts: z.number().int().min(0).optional(),
    maxClients: z.number().int().min(1).optional(),
    mode: z.enum(['sync', 'async']).default('sync'),
    timeoutMs: z.number().int().positive().optional()
  })
  .refine(body => body.clientId !== undefined || body.all === true, {
    message: 'clientId or all is required'
  });

const clientInputSchema = z.object({
  clientId: z.string().min(1),
  text: z.string().default(''),
  imageUrl: z.string().url().optional(),
  channel: z.enum(['facebook', 'instagram', 'linkedin']).optional()
});

const messageSchema = z.object({
  handle: z.string().min(1),
  text: z.string().default(''),
  imageUrl: z.string().url().optional()
});

export const parseBody = <T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> => {
  const result = schema.safeParse(body);
  if (!result.success) {
    const issues = result.error.issues.map(issue =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw createValidationError(issues.join('; '));
  }
  return result.data;
};

export const statusForError = (error: unknown): number => {
  if (!isPipelineError(error)) return 500;
  switch (error.category) {
    case ErrorCategory.VALIDATION:
      return 400;
    case ErrorCategory.NOT_FOUND:
      return 404;
    case ErrorCategory.NOT_ELIGIBLE:
      return 409;
    case ErrorCategory.CONFIGURATION_MISSING:
      return 503;
    case ErrorCategory.UNKNOWN:
      return 500;
    default:
      return 502;
  }
};

const triggerStatus = (result: TriggerResult): number => {
  if (result.kind === 'queued') return 202;
  if (result.kind === 'batch') {
    const pending = Object.values(result.batch.clients).some(
      entry => entry.status === 'queued' || entry.status === 'running'
    );
    return pending ? 202 : 200;
  }
  return result.run.status === 'running' ? 202 : 200;
};

const SUBMIT_FAILURE_STATUS = { not_found: 404, inactive: 409, invalid: 400, duplicate: 409 } as const;

export const createApiRoutes = (service: MarketingService): ApiRoute[] => [
  {
    method: 'GET',
    path: '/health',
    handle: async () => {
      const report = await service.health();
      return { status: report.status === 'ok' ? 200 : 503, body: report };
    }
  },
  {
    method: 'GET',
    path: '/runs',
    handle: async ({ query }) => {
      const id = query.get('id');
      if (!id) throw createValidationError('Query parameter id is required');

      const run = service.runStatus(id);
      if (run) return { status: 200, body: { run } };
      const batch = service.batchStatus(id);
      if (batch) return { status: 200, body: { batch } };
      return { status: 404, body: { error: `No run or batch with id ${id}` } };
    }
  },
  {
    method: 'POST',
    path: '/api/workflow',
    handle: async ({ body }) => {
      const request = parseBody(workflowSchema, body);
      const target: Target = request.all
        ? { all: true, maxClients: request.maxClients }
        : { clientId: request.clientId ?? '' };
      const options = { mode: request.mode, timeoutMs: request.timeoutMs };

      const trigger = (): Promise<TriggerResult> => {
        switch (request.stage) {
          case 'curate':
            return service.curate(target, request.numIdeas, options);
          case 'draft':
            return service.draft(target, request.numPosts, options);
          case 'publish':
            if (!('clientId' in target)) {
              throw createValidationError('publish runs for a single clientId');
            }
            return service.publish(target.clientId, options);
          case 'workflow':
            return service.fullWorkflow(target, request.numIdeas, request.numPosts, options);
        }
      };

      const result = await trigger();
      return { status: triggerStatus(result), body: result };
    }
  },
  {
    method: 'POST',
    path: '/api/client-input',
    handle: async ({ body }) => {
      const input = parseBody(clientInputSchema, body);
      const result = await service.submitIdea(input.clientId, {
        text: input.text,
        imageUrl: input.imageUrl,
        channel: input.channel
      });
      if (!result.ok) {
        return { status: SUBMIT_FAILURE_STATUS[result.reason], body: { error: result.message, reason: result.reason } };
      }
      return { status: 202, body: { idea: result.idea, runId: result.runId } };
    }
  },
  {
    method: 'POST',
    path: '/api/messages',
    handle: async ({ body }) => {
      const input = parseBody(messageSchema, body);
      const reply = await service.handleChatMessage(input.handle, input.text, { imageUrl: input.imageUrl });
      return { status: 200, body: { reply: reply.message, command: reply.command } };
    }
  }
];

// Runs a route and turns thrown errors into a JSON error response
export const dispatch = async (route: ApiRoute, request: RouteRequest): Promise<RouteResult> => {
  try {
    return await route.handle(request);
  } catch (error) {
    const status = statusForError(error);
    if (status >= 500) {
      log.error(`${route.method} ${route.path} failed:`, describeError(error));
    }
    const message = isPipelineError(error) ? error.message : 'Internal error';
    return { status, body: { error: message } };
  }
};

const readJsonBody = async (req: IncomingMessage): Promise<unknown> => {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.length;
    if (size > MAX_BODY_BYTES) {
      throw createValidationError('Request body is too large');
    }
    chunks.push(buffer);
  }

  const raw = Buffer.concat(chunks).toString('utf8').trim();
  if (!raw) return {};
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch {
    throw createValidationError('Request body must be JSON');
  }
};

const sendJson = (res: ServerResponse, result: RouteResult): void => {
  res.writeHead(result.status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(result.body));
};

const serve = async (route: ApiRoute, req: IncomingMessage, res: ServerResponse): Promise<void> => {
  const url = new URL(req.url ?? route.path, 'http://localhost');
  let body: unknown = {};
  if (route.method === 'POST') {
    try {
      body = await readJsonBody(req);
    } catch (error) {
      sendJson(res, { status: statusForError(error), body: { error: describeError(error) } });
      return;
    }
  }
  sendJson(res, await dispatch(route, { query: url.searchParams, body }));
};

// Bolt custom routes; the receiver owns the HTTP server
export const toCustomRoutes = (routes: ApiRoute[]): CustomRoute[] =>
  routes.map(route => ({
    path: route.path,
    method: [route.method],
    handler: (req, res) => {
      serve(route, req, res).catch((error: unknown) => {
        log.error(`${route.method} ${route.path} could not respond:`, describeError(error));
        if (!res.headersSent) {
          sendJson(res, { status: 500, body: { error: 'Internal error' } });
        }
      });
    }
  }));
