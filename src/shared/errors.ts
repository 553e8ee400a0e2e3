// Error taxonomy and retry helpers shared by every gateway

export enum ErrorCategory {
  TRANSIENT_UPSTREAM = 'transient_upstream',
  PERMANENT_UPSTREAM = 'permanent_upstream',
  NOT_FOUND = 'not_found',
  NOT_ELIGIBLE = 'not_eligible',
  CONFIGURATION_MISSING = 'configuration_missing',
  GENERATION_UNAVAILABLE = 'generation_unavailable',
  VALIDATION = 'validation',
  UNKNOWN = 'unknown'
}

export interface PipelineErrorShape {
  category: ErrorCategory;
  message: string;
  userMessage: string;
  retryable: boolean;
  details?: Record<string, unknown>;
}

export class PipelineError extends Error implements PipelineErrorShape {
  category: ErrorCategory;
  userMessage: string;
  retryable: boolean;
  details?: Record<string, unknown>;

  constructor(error: PipelineErrorShape) {
    super(error.message);
    this.name = 'PipelineError';
    this.category = error.category;
    this.userMessage = error.userMessage;
    this.retryable = error.retryable;
    this.details = error.details;
  }
}

export const isPipelineError = (error: unknown, category?: ErrorCategory): error is PipelineError =>
  error instanceof PipelineError && (category === undefined || error.category === category);

// Error factory functions
export const createTransientError = (service: string, statusCode?: number, details?: string): PipelineError => {
  return new PipelineError({
    category: ErrorCategory.TRANSIENT_UPSTREAM,
    message: `${service} error${statusCode ? ` (${statusCode})` : ''}: ${details || 'Unknown error'}`,
    userMessage: `Couldn't reach ${service} — try again in a minute?`,
    retryable: true,
    details: { service, statusCode, details }
  });
};

export const createRateLimitError = (service: string, retryAfterSeconds?: number): PipelineError => {
  const retryText = retryAfterSeconds ? `in ${retryAfterSeconds}s` : 'shortly';
  return new PipelineError({
    category: ErrorCategory.TRANSIENT_UPSTREAM,
    message: `${service} rate limited`,
    userMessage: `${service} is rate limiting — I'll retry ${retryText}`,
    retryable: true,
    details: { service, statusCode: 429, retryAfterSeconds }
  });
};

export const createTimeoutError = (service: string, timeoutMs: number): PipelineError => {
  return new PipelineError({
    category: ErrorCategory.TRANSIENT_UPSTREAM,
    message: `${service} timed out after ${timeoutMs}ms`,
    userMessage: `${service} is taking too long — try again shortly.`,
    retryable: true,
    details: { service, timeoutMs }
  });
};

export const createPermanentError = (service: string, statusCode?: number, details?: string): PipelineError => {
  return new PipelineError({
    category: ErrorCategory.PERMANENT_UPSTREAM,
    message: `${service} rejected the request${statusCode ? ` (${statusCode})` : ''}: ${details || 'Unknown error'}`,
    userMessage: `${service} rejected that request.`,
    retryable: false,
    details: { service, statusCode, details }
  });
};

export const createAuthError = (service: string): PipelineError => {
  return new PipelineError({
    category: ErrorCategory.PERMANENT_UPSTREAM,
    message: `${service} authentication failed`,
    userMessage: `My ${service} connection broke — credentials need updating`,
    retryable: false,
    details: { service, auth: true }
  });
};

export const createNotFoundError = (entityType: string, query: string): PipelineError => {
  return new PipelineError({
    category: ErrorCategory.NOT_FOUND,
    message: `${entityType} not found: ${query}`,
    userMessage: `I couldn't find a ${entityType} matching "${query}".`,
    retryable: false,
    details: { entityType, query }
  });
};

export const createNotEligibleError = (entityType: string, id: string, reason: string): PipelineError => {
  return new PipelineError({
    category: ErrorCategory.NOT_ELIGIBLE,
    message: `${entityType} ${id} is not eligible: ${reason}`,
    userMessage: `That ${entityType} can't be used right now (${reason}).`,
    retryable: false,
    details: { entityType, id, reason }
  });
};

export const createConfigurationError = (setting: string, purpose?: string): PipelineError => {
  return new PipelineError({
    category: ErrorCategory.CONFIGURATION_MISSING,
    message: `Required setting ${setting} is not configured${purpose ? ` (needed for ${purpose})` : ''}`,
    userMessage: `That feature isn't set up yet — ${setting} is missing.`,
    retryable: false,
    details: { setting, purpose }
  });
};

export const createGenerationUnavailableError = (details?: string): PipelineError => {
  return new PipelineError({
    category: ErrorCategory.GENERATION_UNAVAILABLE,
    message: `Generation unavailable: ${details || 'Unknown'}`,
    userMessage: "I'm having trouble writing right now — try again?",
    retryable: false,
    details: { details }
  });
};

export const createValidationError = (message: string): PipelineError => {
  return new PipelineError({
    category: ErrorCategory.VALIDATION,
    message: `Validation error: ${message}`,
    userMessage: message,
    retryable: false
  });
};

// Map an HTTP status from an upstream service onto the taxonomy
export const classifyHttpStatus = (
  service: string,
  status: number,
  details?: string,
  retryAfter?: string | null
): PipelineError => {
  if (status === 429) {
    const seconds = retryAfter ? parseInt(retryAfter, 10) : NaN;
    return createRateLimitError(service, Number.isNaN(seconds) ? undefined : seconds);
  }
  if (status === 401 || status === 403) {
    return createAuthError(service);
  }
  if (status === 408 || status >= 500) {
    return createTransientError(service, status, details);
  }
  return createPermanentError(service, status, details);
};

// Error handler for user-facing messages
export const getUserFriendlyError = (error: unknown): string => {
  if (error instanceof PipelineError) {
    return error.userMessage;
  }

  if (error instanceof Error) {
    if (error.message.includes('ECONNREFUSED') || error.message.includes('ETIMEDOUT')) {
      return "Couldn't connect to the service — try again in a minute?";
    }
    if (error.message.includes('401') || error.message.includes('Unauthorized')) {
      return 'Authentication failed — credentials may need updating.';
    }
    if (error.message.includes('429') || error.message.includes('Too Many Requests')) {
      return 'Too many requests — please wait a moment.';
    }
  }

  return 'Something went wrong — please try again.';
};

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export interface RetryOptions {
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export const isRetryable = (error: unknown): boolean =>
  error instanceof PipelineError && error.retryable;

// A rate-limited upstream tells us how long to wait
const retryAfterMs = (error: unknown): number => {
  const seconds = error instanceof PipelineError ? error.details?.retryAfterSeconds : undefined;
  return typeof seconds === 'number' && seconds > 0 ? Math.round(seconds * 1000) : 0;
};

// Retry helper with exponential backoff; Retry-After is a floor on the wait
export const withRetry = async <T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> => {
  const {
    maxAttempts = 3,
    initialDelayMs = 1000,
    maxDelayMs = 10000,
    shouldRetry = isRetryable,
    onRetry
  } = options;

  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      if (attempt === maxAttempts || !shouldRetry(error)) {
        throw error;
      }

      const backoff = Math.min(initialDelayMs * Math.pow(2, attempt - 1), maxDelayMs);
      const delay = Math.max(backoff, retryAfterMs(error));
      onRetry?.(error, attempt, delay);
      await new Promise(resolve => setTimeout(resolve, delay));
    }
  }

  throw lastError;
};

// Bound a call by a timeout; the signal lets the callee abort its own work
export const withTimeout = async <T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  service: string
): Promise<T> => {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(createTimeoutError(service, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
};
