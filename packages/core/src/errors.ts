/**
 * Error taxonomy shared by every outbound call.
 *
 * The resilience layer only ever looks at the {@link ErrorKind} returned by
 * {@link classifyError}; concrete classes exist so call sites can raise a
 * precise failure without encoding retry policy themselves.
 */

export type ErrorKind = "transient" | "throttle" | "fatal" | "validation";

export interface ErrorClassification {
  kind: ErrorKind;
  /** Only set for `throttle`: how long the remote side asked us to wait. */
  retryAfterMs?: number;
}

export const DEFAULT_THROTTLE_WAIT_MS = 1_000;

export class AppError extends Error {
  public readonly code: string;
  public readonly context: Record<string, unknown> | undefined;

  public constructor(message: string, code = "APP_ERROR", context?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.context = context;
  }

  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

/** Timeouts, disconnects, 5xx. Retried under the standard policy. */
export class TransientError extends AppError {
  public constructor(message: string, context?: Record<string, unknown>) {
    super(message, "TRANSIENT_ERROR", context);
  }
}

/** Server-signalled rate limit carrying the wait it requires. */
export class ThrottleError extends AppError {
  public readonly retryAfterMs: number;

  public constructor(message: string, retryAfterMs: number, context?: Record<string, unknown>) {
    super(message, "THROTTLE_ERROR", { retryAfterMs, ...context });
    this.retryAfterMs = retryAfterMs;
  }
}

export class AuthorizationError extends AppError {
  public constructor(message = "Not authorized", context?: Record<string, unknown>) {
    super(message, "AUTHORIZATION_ERROR", context);
  }
}

export class ValidationError extends AppError {
  public constructor(message: string, context?: Record<string, unknown>) {
    super(message, "VALIDATION_ERROR", context);
  }
}

/**
 * Non-2xx response. `body` is kept for diagnostics only and is never parsed.
 */
export class HttpError extends AppError {
  public readonly status: number;
  public readonly body: string;
  public readonly retryAfterMs: number | undefined;

  public constructor(service: string, status: number, body: string, retryAfterMs?: number) {
    super(`${service} request failed (${status}): ${body.slice(0, 300)}`, "HTTP_ERROR", { service, status });
    this.status = status;
    this.body = body;
    this.retryAfterMs = retryAfterMs;
  }
}

export class ExecutionError extends AppError {
  public constructor(message: string, context?: Record<string, unknown>) {
    super(message, "EXECUTION_ERROR", context);
  }
}

const TRANSIENT_SOCKET_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "ETIMEDOUT",
  "EAI_AGAIN",
  "EPIPE",
  "ENOTFOUND",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_SOCKET",
]);

const TRANSIENT_MESSAGE_HINTS = ["timeout", "timed out", "blockhash", "expired", "socket hang up", "network"];

/**
 * Parses a `Retry-After` header value (delta seconds or an HTTP date).
 */
export function parseRetryAfter(value: string | null | undefined, now = Date.now()): number | undefined {
  if (!value) {
    return undefined;
  }
  const trimmed = value.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.round(Number(trimmed) * 1000);
  }
  const at = Date.parse(trimmed);
  if (Number.isNaN(at)) {
    return undefined;
  }
  return Math.max(0, at - now);
}

function errorCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null || !("code" in error)) {
    return undefined;
  }
  const code = error.code;
  return typeof code === "string" ? code : undefined;
}

function classifyStatus(status: number, retryAfterMs: number | undefined): ErrorClassification {
  if (status === 429) {
    return { kind: "throttle", retryAfterMs: retryAfterMs ?? DEFAULT_THROTTLE_WAIT_MS };
  }
  if (status === 401 || status === 403) {
    return { kind: "fatal" };
  }
  if (status === 408 || status >= 500) {
    return { kind: "transient" };
  }
  if (status >= 400) {
    return { kind: "validation" };
  }
  return { kind: "fatal" };
}

export function classifyError(error: unknown): ErrorClassification {
  if (error instanceof ThrottleError) {
    return { kind: "throttle", retryAfterMs: error.retryAfterMs };
  }
  if (error instanceof TransientError) {
    return { kind: "transient" };
  }
  if (error instanceof AuthorizationError) {
    return { kind: "fatal" };
  }
  if (error instanceof ValidationError) {
    return { kind: "validation" };
  }
  if (error instanceof HttpError) {
    return classifyStatus(error.status, error.retryAfterMs);
  }
  if (!(error instanceof Error)) {
    return { kind: "fatal" };
  }

  if (error.name === "AbortError" || error.name === "TimeoutError") {
    return { kind: "transient" };
  }

  const code = errorCode(error) ?? errorCode(error.cause);
  if (code && TRANSIENT_SOCKET_CODES.has(code)) {
    return { kind: "transient" };
  }

  // undici reports connection failures as a bare TypeError
  if (error instanceof TypeError && error.message === "fetch failed") {
    return { kind: "transient" };
  }

  const lower = error.message.toLowerCase();
  const floodWait = /flood wait (?:of )?(\d+)/.exec(lower);
  if (floodWait?.[1]) {
    return { kind: "throttle", retryAfterMs: Number(floodWait[1]) * 1000 };
  }
  if (lower.includes("too many requests") || lower.includes("rate limit")) {
    return { kind: "throttle", retryAfterMs: DEFAULT_THROTTLE_WAIT_MS };
  }
  if (TRANSIENT_MESSAGE_HINTS.some((hint) => lower.includes(hint))) {
    return { kind: "transient" };
  }
  return { kind: "fatal" };
}

export function isRetryable(error: unknown): boolean {
  const { kind } = classifyError(error);
  return kind === "transient" || kind === "throttle";
}

/**
 * Short, user-facing reason. Stacks, bodies and context stay in the logs.
 */
export function describeError(error: unknown): string {
  const { kind } = classifyError(error);
  switch (kind) {
    case "throttle":
      return "the remote service is rate limiting requests";
    case "transient":
      return "the remote service could not be reached";
    case "validation":
      return "the request was rejected as invalid";
    case "fatal":
      if (error instanceof AuthorizationError || (error instanceof HttpError && (error.status === 401 || error.status === 403))) {
        return "the request was not authorized";
      }
      return "an unexpected error occurred";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
