// Sliding-window rate limiter for record store access

import { createLogger } from './logger.js';

const log = createLogger('RateLimiter');

export interface RateLimiterConfig {
  requestsPerWindow: number; // 0 disables limiting
  windowMs?: number;         // default: 1000
}

export class RateLimiter {
  private requestsPerWindow: number;
  private windowMs: number;
  private requestTimestamps: number[] = [];

  constructor(config: RateLimiterConfig) {
    this.requestsPerWindow = config.requestsPerWindow;
    this.windowMs = config.windowMs ?? 1000;
  }

  // Call before each request; resolves once a slot in the window is free
  async wait(): Promise<void> {
    if (this.requestsPerWindow <= 0) return;

    for (;;) {
      const now = Date.now();
      this.prune(now);

      if (this.requestTimestamps.length < this.requestsPerWindow) {
        this.requestTimestamps.push(now);
        return;
      }

      const waitTime = this.windowMs - (now - this.requestTimestamps[0]) + 1;
      log.debug(`Rate limit reached, waiting ${waitTime}ms`);
      await new Promise(resolve => setTimeout(resolve, waitTime));
    }
  }

  getRequestCount(): number {
    this.prune(Date.now());
    return this.requestTimestamps.length;
  }

  reset(): void {
    this.requestTimestamps = [];
  }

  private prune(now: number): void {
    this.requestTimestamps = this.requestTimestamps.filter(timestamp => now - timestamp < this.windowMs);
  }
}
