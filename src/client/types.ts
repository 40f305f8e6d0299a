// ─── Shared Types ───

export type RequestMethod = "GET" | "POST";

export type QueryValue = string | number | boolean | undefined;

/** Query parameters; a `variables` object is sent JSON-encoded */
export interface QueryParams {
  variables?: Record<string, unknown>;
  [key: string]: QueryValue | Record<string, unknown>;
}

export type BackoffStrategy = "fixed" | "exponential";

export interface RetryPolicy {
  /** Total calls allowed while the upstream keeps signalling a rate limit */
  maxAttempts: number;
  /** Total calls allowed while the network or the upstream host keeps failing */
  maxConnectionAttempts: number;
  backoff: BackoffStrategy;
  baseDelayMs: number;
  maxDelayMs: number;
}

export type RetryReason = "rate-limit" | "connection";

export interface RetryEvent {
  reason: RetryReason;
  endpoint: string;
  /** The attempt that just failed, 1-based */
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  message: string;
}

export interface ClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  retry?: Partial<RetryPolicy>;
  onRetry?: (event: RetryEvent) => void;
}

export type ResponseType = "json" | "text";

export interface RequestOptions {
  params?: QueryParams;
  body?: unknown;
  authToken?: string;
  responseType?: ResponseType;
}

export interface ApiResponse {
  data: unknown;
  status: number;
  /** Retries spent before this response; 0 when the first call succeeded */
  retries: number;
}

export interface Page<T> {
  data: T[];
  nextCursor?: string;
}
