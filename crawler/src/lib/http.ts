import { setTimeout as sleep } from "node:timers/promises";
import { Logger } from "./logger";
import { RequestScheduler } from "./scheduler";

export interface FetchRuntimeConfig {
  timeoutMs: number;
  userAgent: string;
  fetchImpl?: typeof fetch;
}

export interface FetchRequest {
  headers?: Record<string, string>;
  timeoutMs?: number;
}

export type FetchOutcome =
  | { kind: "ok"; url: string; status: number; body: string; attempts: number }
  | { kind: "transient"; url: string; status?: number; error: string; attempts: number }
  | { kind: "fatal"; url: string; status?: number; error: string; attempts: number };

export type FetchFailure = Exclude<FetchOutcome, { kind: "ok" }>;

export interface FetchClient {
  fetch(url: string, request?: FetchRequest): Promise<FetchOutcome>;
}

export interface RetryPolicy {
  retryTimes: number;
  retryHttpCodes: readonly number[];
  backoffMs: number;
  maxBackoffMs: number;
}

export interface TimedResponse {
  status: number;
  ok: boolean;
  body: string;
}

/** The timeout covers the whole exchange: headers and body. A body that stalls is aborted too. */
export async function fetchWithTimeout(
  url: string,
  init: RequestInit,
  runtime: FetchRuntimeConfig
): Promise<TimedResponse> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), runtime.timeoutMs);
  const headers = new Headers(init.headers);
  if (!headers.has("user-agent")) {
    headers.set("user-agent", runtime.userAgent);
  }

  try {
    const response = await (runtime.fetchImpl ?? fetch)(url, {
      ...init,
      headers,
      signal: controller.signal
    });
    const body = await response.text();
    return { status: response.status, ok: response.ok, body };
  } finally {
    clearTimeout(timeout);
  }
}

export function backoffDelay(attempt: number, policy: Pick<RetryPolicy, "backoffMs" | "maxBackoffMs">): number {
  return Math.min(policy.maxBackoffMs, policy.backoffMs * 2 ** Math.max(0, attempt - 1));
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.name === "AbortError" ? "request timed out" : error.message;
  }
  return String(error);
}

/**
 * Transport with retry on a status allowlist, network errors and timeouts. Every attempt goes
 * through the shared scheduler, and each retry re-enters it one priority step below the last so
 * fresh requests overtake it.
 */
export class HttpFetchClient implements FetchClient {
  constructor(
    private readonly runtime: FetchRuntimeConfig,
    private readonly policy: RetryPolicy,
    private readonly scheduler: RequestScheduler,
    private readonly logger: Logger
  ) {}

  async fetch(url: string, request: FetchRequest = {}): Promise<FetchOutcome> {
    const maxAttempts = this.policy.retryTimes + 1;
    let last: FetchOutcome | null = null;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      const outcome = await this.scheduler.schedule(() => this.attempt(url, request, attempt), 1 - attempt);
      if (outcome.kind !== "transient") {
        return outcome;
      }

      last = outcome;
      if (attempt < maxAttempts) {
        const waitMs = backoffDelay(attempt, this.policy);
        this.logger.debug("fetch_retry_scheduled", {
          url,
          attempt,
          status: outcome.status,
          error: outcome.error,
          wait_ms: waitMs
        });
        await sleep(waitMs);
      }
    }

    this.logger.warn("fetch_retries_exhausted", { url, attempts: maxAttempts, error: last?.error });
    return last ?? { kind: "transient", url, error: "no attempt made", attempts: 0 };
  }

  private async attempt(url: string, request: FetchRequest, attempt: number): Promise<FetchOutcome> {
    const started = Date.now();
    try {
      const { status, ok, body } = await fetchWithTimeout(
        url,
        { method: "GET", headers: request.headers },
        { ...this.runtime, timeoutMs: request.timeoutMs ?? this.runtime.timeoutMs }
      );
      this.scheduler.throttle.observe(Date.now() - started, status);

      if (ok) {
        return { kind: "ok", url, status, body, attempts: attempt };
      }
      const error = `HTTP ${status}`;
      if (this.policy.retryHttpCodes.includes(status)) {
        return { kind: "transient", url, status, error, attempts: attempt };
      }
      return { kind: "fatal", url, status, error, attempts: attempt };
    } catch (error) {
      return { kind: "transient", url, error: describeError(error), attempts: attempt };
    }
  }
}
