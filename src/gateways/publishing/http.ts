// JSON over HTTP for platform adapters

import { z } from 'zod';
import { classifyHttpStatus, createPermanentError, createTransientError, PipelineError, withTimeout } from '../../shared/errors.js';

export interface JsonRequest {
  method: 'GET' | 'POST';
  url: string;
  headers?: Record<string, string>;
  form?: Record<string, string>;
  json?: unknown;
}

const errorBodySchema = z
  .object({
    error: z.object({ message: z.string() }).partial().optional(),
    message: z.string().optional()
  })
  .passthrough();

const describeFailure = (raw: string): string => {
  try {
    const parsed = errorBodySchema.safeParse(JSON.parse(raw));
    if (parsed.success) {
      return parsed.data.error?.message ?? parsed.data.message ?? raw;
    }
  } catch {
    // Not JSON; fall through to the raw body
  }
  return raw.slice(0, 500);
};

// One request, no retries; failures are classified for the caller's retry policy
export const requestJson = async <T>(
  service: string,
  request: JsonRequest,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  timeoutMs: number
): Promise<T> => {
  const headers: Record<string, string> = { ...request.headers };
  let body: string | undefined;

  if (request.form) {
    headers['Content-Type'] = 'application/x-www-form-urlencoded';
    body = new URLSearchParams(request.form).toString();
  } else if (request.json !== undefined) {
    headers['Content-Type'] = 'application/json';
    body = JSON.stringify(request.json);
  }

  const response = await withTimeout(
    async signal => {
      try {
        return await fetch(request.url, { method: request.method, headers, body, signal });
      } catch (error) {
        if (error instanceof PipelineError) throw error;
        throw createTransientError(service, undefined, error instanceof Error ? error.message : String(error));
      }
    },
    timeoutMs,
    service
  );

  const text = await response.text();

  if (!response.ok) {
    throw classifyHttpStatus(service, response.status, describeFailure(text), response.headers.get('Retry-After'));
  }

  let payload: unknown;
  try {
    payload = text ? JSON.parse(text) : {};
  } catch {
    throw createPermanentError(service, response.status, 'response was not JSON');
  }

  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    throw createPermanentError(service, response.status, describeFailure(text));
  }
  return parsed.data;
};
