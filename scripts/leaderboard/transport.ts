import { RequestError } from "@octokit/request-error";
import type { RequestParameters } from "@octokit/types";
import { z } from "zod";

import { PermissionDeniedError } from "./errors";
import { RateLimiter, defaultSleep, parseHeaderNumber } from "./rate-limiter";
import type { RequestClient, Sleep, TransportResponse } from "./types";

export const INITIAL_BACKOFF_SECONDS = 1;
export const MAX_BACKOFF_SECONDS = 60;

export type ResponseClass = "passthrough" | "throttled" | "forbidden";

interface TransportOptions {
  sleep?: Sleep;
  rateLimiter?: RateLimiter;
  maxBackoffSeconds?: number;
}

const errorBodySchema = z.object({ message: z.string() });

export function extractErrorMessage(data: unknown): string {
  const parsed = errorBodySchema.safeParse(data);
  return parsed.success ? parsed.data.message : "";
}

export function classifyResponse(response: TransportResponse): ResponseClass {
  if (response.status === 429) {
    return "throttled";
  }
  if (response.status !== 403) {
    return "passthrough";
  }
  // covers both "API rate limit exceeded" and "You have exceeded a secondary rate limit"
  if (extractErrorMessage(response.data).toLowerCase().includes("rate limit")) {
    return "throttled";
  }
  if (parseHeaderNumber(response.headers["x-ratelimit-remaining"]) === 0) {
    return "throttled";
  }
  return "forbidden";
}

export function describeRoute(route: string, params: RequestParameters): string {
  return route.replace(/\{(\w+)\}/g, (placeholder, key: string) => {
    const value = params[key];
    return typeof value === "string" || typeof value === "number" ? String(value) : placeholder;
  });
}

/**
 * Wraps every GitHub call. Throttled responses are retried after the server's
 * `retry-after` hint or an exponential backoff (1s doubling up to the cap);
 * a 403 without a rate-limit marker throws `PermissionDeniedError`; every
 * other response, including 404 and 5xx, is handed back untouched.
 */
export class RateLimitedTransport {
  private readonly sleep: Sleep;
  private readonly rateLimiter: RateLimiter;
  private readonly maxBackoffSeconds: number;

  constructor(private readonly client: RequestClient, options: TransportOptions = {}) {
    this.sleep = options.sleep ?? defaultSleep;
    this.rateLimiter = options.rateLimiter ?? new RateLimiter({ sleep: this.sleep });
    this.maxBackoffSeconds = options.maxBackoffSeconds ?? MAX_BACKOFF_SECONDS;
  }

  async request(route: string, params: RequestParameters = {}): Promise<TransportResponse> {
    let backoffSeconds = INITIAL_BACKOFF_SECONDS;
    const target = describeRoute(route, params);

    while (true) {
      await this.rateLimiter.checkAndWait(target);
      const response = await this.send(route, params);
      this.rateLimiter.updateFromHeaders(response.headers);

      const kind = classifyResponse(response);
      if (kind === "passthrough") {
        return response;
      }
      if (kind === "forbidden") {
        throw new PermissionDeniedError(target, extractErrorMessage(response.data), response.status);
      }

      const retryAfter = parseHeaderNumber(response.headers["retry-after"]);
      // a zero hint would retry in a tight loop
      const waitSeconds = retryAfter !== null && retryAfter > 0 ? retryAfter : backoffSeconds;
      console.warn(`⏸️  Throttled (${response.status}) on ${target}, sleeping ${waitSeconds}s`);
      await this.sleep(waitSeconds * 1000);
      backoffSeconds = Math.min(backoffSeconds * 2, this.maxBackoffSeconds);
    }
  }

  private async send(route: string, params: RequestParameters): Promise<TransportResponse> {
    try {
      return await this.client.request(route, params);
    } catch (error) {
      // Octokit rejects every status >= 400; callers want those as plain responses
      if (error instanceof RequestError && error.response) {
        return {
          status: error.status,
          data: error.response.data,
          headers: error.response.headers,
        };
      }
      throw error;
    }
  }
}
