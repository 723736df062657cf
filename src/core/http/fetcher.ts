/**
 * HTTP page fetching with browser-like headers, retries and pacing
 */

import { HTTP_CONSTANTS, USER_AGENTS } from "../constants/index";
import type { FetchLike, PacingConfig } from "../types/config";
import { RetryError, sleep, withRetry } from "../utils/retry";
import { Logger } from "../utils/logger";

export class HttpStatusError extends Error {
  constructor(
    public readonly status: number,
    public readonly url: string,
    public readonly retryAfterMs?: number,
  ) {
    super(`HTTP ${status} for ${url}`);
    this.name = "HttpStatusError";
  }
}

/** 403 or a captcha page: the site is pushing back on automation */
export class BlockedError extends Error {
  constructor(public readonly url: string) {
    super(`Blocked by anti-bot protection at ${url}`);
    this.name = "BlockedError";
  }
}

export class RequestTimeoutError extends Error {
  constructor(public readonly url: string, timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms for ${url}`);
    this.name = "RequestTimeoutError";
  }
}

/** Unwraps RetryError so callers can inspect the last attempt's error */
export function rootError(error: unknown): unknown {
  return error instanceof RetryError ? error.originalError : error;
}

export const isTimeout = (error: unknown): boolean =>
  rootError(error) instanceof RequestTimeoutError;

export function isRetryable(error: Error): boolean {
  if (error instanceof BlockedError) return true;
  if (error instanceof RequestTimeoutError) return true;
  if (error instanceof HttpStatusError) {
    return error.status === 429 || error.status >= 500;
  }
  // undici reports network failures as TypeError("fetch failed")
  return error instanceof TypeError;
}

function parseRetryAfter(value: string | null): number | undefined {
  if (!value) return undefined;
  const seconds = Number(value);
  return Number.isFinite(seconds) && seconds > 0 ? seconds * 1000 : undefined;
}

export interface PageFetcherOptions extends PacingConfig {
  fetchImpl?: FetchLike;
  userAgents?: readonly string[];
  referer?: string;
  random?: () => number;
}

export class PageFetcher {
  private readonly fetchImpl: FetchLike;
  private readonly userAgents: readonly string[];
  private readonly random: () => number;

  constructor(private readonly options: PageFetcherOptions) {
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.userAgents = options.userAgents ?? USER_AGENTS;
    this.random = options.random ?? Math.random;
  }

  /** Headers for one attempt, with a randomly picked user agent */
  headers(): Record<string, string> {
    const ua =
      this.userAgents[Math.floor(this.random() * this.userAgents.length)] ??
      USER_AGENTS[0];
    const headers: Record<string, string> = {
      "user-agent": ua,
      accept: HTTP_CONSTANTS.ACCEPT_HEADER,
      "accept-language": HTTP_CONSTANTS.ACCEPT_LANGUAGE,
      "cache-control": "no-cache",
      pragma: "no-cache",
    };
    if (this.options.referer) headers.referer = this.options.referer;
    return headers;
  }

  /**
   * Single request bounded by the configured timeout and the caller's signal
   * @throws HttpStatusError, BlockedError or RequestTimeoutError
   */
  async fetchOnce(url: string, signal?: AbortSignal): Promise<string> {
    const { timeoutMs } = this.options;
    const controller = new AbortController();
    const onAbort = () => controller.abort(signal?.reason);
    signal?.addEventListener("abort", onAbort, { once: true });
    const timer = setTimeout(
      () => controller.abort(new RequestTimeoutError(url, timeoutMs)),
      timeoutMs,
    );

    try {
      const res = await this.fetchImpl(url, {
        redirect: "follow",
        headers: this.headers(),
        signal: controller.signal,
      });
      const body = await res.text();
      if (res.status === 403 || /captcha/i.test(body)) {
        throw new BlockedError(url);
      }
      if (!res.ok) {
        throw new HttpStatusError(
          res.status,
          url,
          parseRetryAfter(res.headers.get("retry-after")),
        );
      }
      return body;
    } catch (e) {
      // fetch rejects with the abort reason when the controller fires
      if (controller.signal.aborted && !signal?.aborted) {
        throw new RequestTimeoutError(url, timeoutMs);
      }
      throw e;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }
  }

  /**
   * Fetches a page with retries, then waits a random politeness delay
   * @throws RetryError once retries are exhausted
   */
  async fetchText(url: string, signal?: AbortSignal): Promise<string> {
    const { retries, retryBaseMs, blockedBackoffMs } = this.options;

    const body = await withRetry(
      async (attempt) => {
        Logger.debug(`GET ${url}`, { url, attempt: attempt + 1 });
        return this.fetchOnce(url, signal);
      },
      {
        maxRetries: Math.max(0, retries - 1),
        baseDelayMs: retryBaseMs,
        maxDelayMs: HTTP_CONSTANTS.MAX_BACKOFF_MS,
        retryCondition: isRetryable,
        delayHint: (err) => {
          if (err instanceof BlockedError) return blockedBackoffMs;
          if (err instanceof HttpStatusError && err.status === 429) {
            return err.retryAfterMs ?? blockedBackoffMs;
          }
          return undefined;
        },
        jitterMs: retryBaseMs > 0 ? 250 : 0,
        signal,
      },
    );

    await this.pause(signal);
    return body;
  }

  private async pause(signal?: AbortSignal): Promise<void> {
    const { minDelayMs, maxDelayMs } = this.options;
    const span = Math.max(0, maxDelayMs - minDelayMs);
    await sleep(minDelayMs + Math.floor(this.random() * span), signal);
  }
}
