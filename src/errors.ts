// ─── Error Taxonomy ───

export type ApidanceErrorKind =
  | "rate-limit-exceeded"
  | "connection-failure"
  | "upstream"
  | "mapping"
  | "configuration";

/** Base class for every failure the SDK surfaces */
export class ApidanceError extends Error {
  readonly kind: ApidanceErrorKind;

  constructor(kind: ApidanceErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

/** Rate-limit retries were exhausted */
export class RateLimitExceededError extends ApidanceError {
  readonly endpoint: string;
  readonly attempts: number;

  constructor(endpoint: string, attempts: number) {
    super("rate-limit-exceeded", `Rate limit still in effect for ${endpoint} after ${attempts} attempts`);
    this.endpoint = endpoint;
    this.attempts = attempts;
  }
}

/** Network failure, timeout or 5xx that outlived the connection retry budget */
export class ConnectionFailureError extends ApidanceError {
  readonly endpoint: string;
  readonly attempts: number;

  constructor(endpoint: string, attempts: number, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super("connection-failure", `Could not reach ${endpoint} after ${attempts} attempts: ${detail}`, { cause });
    this.endpoint = endpoint;
    this.attempts = attempts;
  }
}

export type UpstreamErrorReason =
  | "authentication"
  | "insufficient-credits"
  | "premium-required"
  | "invalid-input"
  | "unknown";

/** Well-formed error reported by the proxy or the platform behind it. Never retried. */
export class UpstreamError extends ApidanceError {
  readonly status: number;
  readonly upstreamMessage: string;
  readonly reason: UpstreamErrorReason;

  constructor(status: number, upstreamMessage: string) {
    super("upstream", `Apidance error ${status}: ${upstreamMessage}`);
    this.status = status;
    this.upstreamMessage = upstreamMessage;
    this.reason = classifyUpstreamError(status, upstreamMessage);
  }
}

export function classifyUpstreamError(status: number, message: string): UpstreamErrorReason {
  const text = message.toLowerCase();
  if (status === 401 || status === 403 || /\bauth(entication|orization)?\b|unauthori[sz]ed|forbidden/.test(text)) {
    return "authentication";
  }
  if (status === 402 || /credit|balance/.test(text)) {
    return "insufficient-credits";
  }
  if (/premium/.test(text)) {
    return "premium-required";
  }
  if (status === 400 || status === 404 || /invalid|not found/.test(text)) {
    return "invalid-input";
  }
  return "unknown";
}

export type RecordKind = "tweet" | "user";

/** A successful response lacked a field every record of its kind must carry */
export class MappingError extends ApidanceError {
  readonly recordKind: RecordKind;
  readonly path: string;

  constructor(recordKind: RecordKind, path: string, detail: string) {
    super("mapping", `Cannot map ${recordKind} at ${path || "<root>"}: ${detail}`);
    this.recordKind = recordKind;
    this.path = path;
  }
}

/** A credential the operation needs is not configured */
export class ConfigurationError extends ApidanceError {
  readonly variable: string;

  constructor(variable: string, message: string) {
    super("configuration", message);
    this.variable = variable;
  }
}
