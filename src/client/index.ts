import { z } from "zod";
import { ConnectionFailureError, RateLimitExceededError, UpstreamError } from "../errors.js";
import type {
  ApiResponse,
  ClientOptions,
  QueryParams,
  RequestMethod,
  RequestOptions,
  ResponseType,
  RetryPolicy,
  RetryReason,
} from "./types.js";

export type {
  ApiResponse,
  BackoffStrategy,
  ClientOptions,
  Page,
  QueryParams,
  QueryValue,
  RequestMethod,
  RequestOptions,
  ResponseType,
  RetryEvent,
  RetryPolicy,
  RetryReason,
} from "./types.js";

const BASE_URL = "https://api.apidance.pro";
const DEFAULT_TIMEOUT_MS = 10_000;
const LOCAL_RATE_LIMITED = "local_rate_limited";
const RATE_LIMIT_ERROR_CODE = 88;

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = {
  maxAttempts: 3,
  maxConnectionAttempts: 2,
  backoff: "exponential",
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
};

const errorBodySchema = z.object({
  data: z.unknown().optional(),
  error: z.string().optional().catch(undefined),
  message: z.string().optional().catch(undefined),
  detail: z.string().optional().catch(undefined),
  errors: z
    .array(
      z
        .object({
          code: z.number().optional().catch(undefined),
          message: z.string().optional().catch(undefined),
        })
        .catch({})
    )
    .optional()
    .catch(undefined),
});

type ErrorBody = z.infer<typeof errorBodySchema>;

type Outcome =
  | { kind: "success"; data: unknown; status: number }
  | { kind: "rate-limit"; message: string; waitMs?: number }
  | { kind: "transient"; error: unknown; message: string };

/** Bookkeeping for one logical request; discarded when it settles */
interface RequestAttempt {
  endpoint: string;
  params?: QueryParams;
  rateLimitAttempts: number;
  connectionAttempts: number;
  lastError?: RetryReason;
}

export function resolveRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  return {
    maxAttempts: Math.max(1, overrides.maxAttempts ?? DEFAULT_RETRY_POLICY.maxAttempts),
    maxConnectionAttempts: Math.max(1, overrides.maxConnectionAttempts ?? DEFAULT_RETRY_POLICY.maxConnectionAttempts),
    backoff: overrides.backoff ?? DEFAULT_RETRY_POLICY.backoff,
    baseDelayMs: Math.max(0, overrides.baseDelayMs ?? DEFAULT_RETRY_POLICY.baseDelayMs),
    maxDelayMs: Math.max(0, overrides.maxDelayMs ?? DEFAULT_RETRY_POLICY.maxDelayMs),
  };
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isRateLimitBody(body: ErrorBody): boolean {
  if (body.error && /rate limit/i.test(body.error)) return true;
  return (body.errors ?? []).some(
    (entry) => entry.code === RATE_LIMIT_ERROR_CODE || /rate limit/i.test(entry.message ?? "")
  );
}

function errorMessage(body: ErrorBody): string | undefined {
  const fromErrors = (body.errors ?? [])
    .map((entry) => entry.message)
    .filter((message): message is string => Boolean(message))
    .join("; ");
  return body.error ?? body.message ?? body.detail ?? (fromErrors || undefined);
}

// ─── Request Executor ───

export class RequestExecutor {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly retry: RetryPolicy;
  private readonly options: ClientOptions;

  constructor(apiKey: string, options: ClientOptions = {}) {
    this.apiKey = apiKey;
    this.baseUrl = (options.baseUrl ?? BASE_URL).replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.retry = resolveRetryPolicy(options.retry);
    this.options = options;
  }

  get retryPolicy(): Readonly<RetryPolicy> {
    return this.retry;
  }

  buildUrl(endpoint: string, params?: QueryParams): string {
    const url = new URL(`${this.baseUrl}/${endpoint.replace(/^\//, "")}`);
    if (params) {
      for (const [key, value] of Object.entries(params)) {
        if (value === undefined) continue;
        url.searchParams.set(key, typeof value === "object" ? JSON.stringify(value) : String(value));
      }
    }
    return url.toString();
  }

  /** Send a request, retrying rate limits and transient failures per the retry policy */
  async request(method: RequestMethod, endpoint: string, options: RequestOptions = {}): Promise<ApiResponse> {
    const url = this.buildUrl(endpoint, options.params);
    const headers: Record<string, string> = {
      apikey: this.apiKey,
      "Content-Type": "application/json",
    };
    if (options.authToken) {
      headers.AuthToken = options.authToken;
    }
    const body = options.body === undefined ? undefined : JSON.stringify(options.body);
    const responseType = options.responseType ?? "json";

    const attempt: RequestAttempt = {
      endpoint,
      params: options.params,
      rateLimitAttempts: 0,
      connectionAttempts: 0,
    };

    while (true) {
      const outcome = await this.send(url, method, headers, body, responseType);

      if (outcome.kind === "success") {
        return {
          data: outcome.data,
          status: outcome.status,
          retries: attempt.rateLimitAttempts + attempt.connectionAttempts,
        };
      }

      if (outcome.kind === "rate-limit") {
        attempt.rateLimitAttempts += 1;
        attempt.lastError = "rate-limit";
        if (attempt.rateLimitAttempts >= this.retry.maxAttempts) {
          throw new RateLimitExceededError(endpoint, attempt.rateLimitAttempts + attempt.connectionAttempts);
        }
        await this.backoff(attempt, outcome.message, outcome.waitMs);
        continue;
      }

      attempt.connectionAttempts += 1;
      attempt.lastError = "connection";
      if (attempt.connectionAttempts >= this.retry.maxConnectionAttempts) {
        throw new ConnectionFailureError(
          endpoint,
          attempt.rateLimitAttempts + attempt.connectionAttempts,
          outcome.error
        );
      }
      await this.backoff(attempt, outcome.message);
    }
  }

  private async send(
    url: string,
    method: RequestMethod,
    headers: Record<string, string>,
    body: string | undefined,
    responseType: ResponseType
  ): Promise<Outcome> {
    let res: Response;
    let text: string;
    try {
      res = await fetch(url, {
        method,
        headers,
        body,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      text = await res.text();
    } catch (error) {
      return { kind: "transient", error, message: describe(error) };
    }

    return this.classify(res, text, responseType);
  }

  /** Sort a response into success, retryable signal, or upstream failure */
  private classify(res: Response, text: string, responseType: ResponseType): Outcome {
    if (res.status === 429 || text.trim() === LOCAL_RATE_LIMITED) {
      return {
        kind: "rate-limit",
        message: res.status === 429 ? "HTTP 429" : LOCAL_RATE_LIMITED,
        waitMs: this.getRateLimitWaitMs(res.headers),
      };
    }

    if (res.status >= 500) {
      const message = `HTTP ${res.status}: ${text.slice(0, 200) || res.statusText}`;
      return { kind: "transient", error: new Error(message), message };
    }

    if (responseType === "text") {
      if (!res.ok) {
        throw new UpstreamError(res.status, text.slice(0, 200) || res.statusText);
      }
      return { kind: "success", data: text, status: res.status };
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch {
      throw new UpstreamError(res.status, text.slice(0, 200) || res.statusText || "Empty response body");
    }

    const parsed = errorBodySchema.safeParse(data);
    if (!parsed.success) {
      if (!res.ok) {
        throw new UpstreamError(res.status, text.slice(0, 200));
      }
      return { kind: "success", data, status: res.status };
    }

    const errorBody = parsed.data;
    const hasData = errorBody.data !== undefined && errorBody.data !== null;
    if (!hasData && isRateLimitBody(errorBody)) {
      return { kind: "rate-limit", message: errorMessage(errorBody) ?? "Rate limit exceeded" };
    }
    if (!res.ok) {
      throw new UpstreamError(res.status, errorMessage(errorBody) ?? (text.slice(0, 200) || res.statusText));
    }
    if (errorBody.error) {
      throw new UpstreamError(res.status, errorBody.error);
    }
    if (errorBody.errors && errorBody.errors.length > 0 && !hasData) {
      throw new UpstreamError(res.status, errorMessage(errorBody) ?? "Unknown upstream error");
    }

    return { kind: "success", data, status: res.status };
  }

  private async backoff(attempt: RequestAttempt, detail: string, hintMs?: number): Promise<void> {
    const reason = attempt.lastError ?? "connection";
    const failed = reason === "rate-limit" ? attempt.rateLimitAttempts : attempt.connectionAttempts;
    const maxAttempts = reason === "rate-limit" ? this.retry.maxAttempts : this.retry.maxConnectionAttempts;
    const delayMs = hintMs === undefined ? this.getBackoffMs(failed) : Math.min(hintMs, this.retry.maxDelayMs);
    const waitSeconds = (delayMs / 1000).toFixed(1);
    const label = reason === "rate-limit" ? "Rate limited by Apidance" : "Request to Apidance failed";

    this.options.onRetry?.({
      reason,
      endpoint: attempt.endpoint,
      attempt: failed,
      maxAttempts,
      delayMs,
      message: `${label} (${detail}). Waiting ${waitSeconds}s before retry ${failed}/${maxAttempts - 1}.`,
    });
    await this.sleep(delayMs);
  }

  private getBackoffMs(failedAttempts: number): number {
    const { backoff, baseDelayMs, maxDelayMs } = this.retry;
    const delay = backoff === "fixed" ? baseDelayMs : baseDelayMs * 2 ** (failedAttempts - 1);
    return Math.min(delay, maxDelayMs);
  }

  private getRateLimitWaitMs(headers: Headers): number | undefined {
    const retryAfter = headers.get("retry-after");
    if (retryAfter) {
      const seconds = Number(retryAfter);
      if (Number.isFinite(seconds) && seconds >= 0) {
        return seconds * 1000;
      }
    }

    const resetHeader = headers.get("x-rate-limit-reset");
    if (!resetHeader) {
      return undefined;
    }
    const parsed = Number.parseInt(resetHeader, 10);
    if (Number.isNaN(parsed)) {
      return undefined;
    }

    const nowMs = Date.now();
    const resetMs = parsed > 1_000_000_000_000 ? parsed : parsed * 1000;
    return Math.max(resetMs - nowMs, 0);
  }

  private async sleep(ms: number): Promise<void> {
    if (ms <= 0) return;
    await new Promise<void>((resolve) => {
      setTimeout(resolve, ms);
    });
  }
}

export { BASE_URL };
