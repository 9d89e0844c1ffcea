import type { ResponseHeaders } from "@octokit/types";

import type { Sleep } from "./types";

export const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

interface RateLimiterOptions {
  threshold?: number;
  sleep?: Sleep;
  now?: () => number;
}

/**
 * Tracks the primary quota reported in `x-ratelimit-*` headers and pauses
 * before a request once the remaining quota drops under the threshold.
 */
export class RateLimiter {
  private remaining = 5000;
  private resetAt: Date;
  private readonly threshold: number;
  private readonly sleep: Sleep;
  private readonly now: () => number;

  constructor({ threshold = 100, sleep = defaultSleep, now = Date.now }: RateLimiterOptions = {}) {
    this.threshold = threshold;
    this.sleep = sleep;
    this.now = now;
    this.resetAt = new Date(now() + 60_000);
  }

  get remainingQuota(): number {
    return this.remaining;
  }

  async checkAndWait(target?: string) {
    const now = this.now();
    const resetMs = this.resetAt.getTime();
    if (this.remaining > this.threshold || resetMs <= now) {
      return;
    }
    const waitMs = resetMs - now + 1000;
    const before = target ? ` before ${target}` : "";
    console.log(
      `⏸️  Quota at ${this.remaining}/${this.threshold}${before}; resuming in ${Math.ceil(waitMs / 1000)}s (${this.resetAt.toISOString()})`
    );
    await this.sleep(waitMs);
  }

  updateFromHeaders(headers: ResponseHeaders) {
    const remaining = parseHeaderNumber(headers["x-ratelimit-remaining"]);
    if (remaining !== null) {
      this.remaining = remaining;
    }
    const reset = parseHeaderNumber(headers["x-ratelimit-reset"]);
    if (reset !== null) {
      this.resetAt = new Date(reset * 1000);
    }
  }
}

export function parseHeaderNumber(value: string | number | string[] | undefined): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "string") {
    const parsed = Number.parseInt(value, 10);
    return Number.isNaN(parsed) ? null : parsed;
  }
  return null;
}
