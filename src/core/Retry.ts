import pRetry, { type Options as PRetryOptions } from "p-retry";
import type { ErrorKind } from "../types/ToolResult.js";

/**
 * Retry configuration.
 */
export interface RetryOptions {
  /** Maximum number of retries after the first attempt (default: 2) */
  maxRetries?: number;
  /** Delay before the first retry in ms; doubles on each retry (default: 1000) */
  baseDelayMs?: number;
  /** Maximum delay in ms (default: 10000) */
  maxDelayMs?: number;
  /** Randomize delays (default: false, which keeps the schedule exact) */
  jitter?: boolean;
  /** Error filter: return true to retry, false to abort */
  shouldRetry?: (error: Error) => boolean;
  /** Callback before each retry, with the nominal delay that follows */
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
  /** Stops further attempts when aborted */
  signal?: AbortSignal;
}

/**
 * Errors that should NOT be retried (deterministic failures).
 */
const NON_RETRYABLE_ERRORS = new Set<string>([
  "CALLBACK_REJECTED",
  "CONFIG_ERROR",
  "INPUT_SCHEMA_INVALID",
  "INVALID_ARTIFACT_PATH",
  "ATTACHMENT_INVALID",
  "BUDGET_EXCEEDED",
  "INVALID_REQUEST",
  "DEADLINE_EXCEEDED",
]);

export type TaggedError = Error & { kind: ErrorKind; details?: unknown };

/**
 * Read the `kind` tag of an error, if it has one.
 */
export function errorKind(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "kind" in error) {
    return typeof error.kind === "string" ? error.kind : undefined;
  }
  return undefined;
}

/**
 * Determine if an error is retryable.
 */
export function isRetryable(error: unknown): boolean {
  const kind = errorKind(error);
  return !(kind && NON_RETRYABLE_ERRORS.has(kind));
}

/**
 * Nominal exponential delay before retry number `attempt` (1-based).
 */
export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
}

/**
 * Execute a function with retry logic using exponential backoff.
 * The function receives the 1-based attempt number.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const {
    maxRetries = 2,
    baseDelayMs = 1000,
    maxDelayMs = 10_000,
    jitter = false,
    shouldRetry,
    onRetry,
    signal,
  } = options;

  if (maxRetries <= 0) {
    return fn(1);
  }

  const pRetryOptions: PRetryOptions = {
    retries: maxRetries,
    minTimeout: baseDelayMs,
    maxTimeout: maxDelayMs,
    randomize: jitter,
    factor: 2,
    signal,
    onFailedAttempt: (error) => {
      if (shouldRetry && !shouldRetry(error)) {
        throw error;
      }

      if (!isRetryable(error)) {
        throw error;
      }

      if (error.retriesLeft > 0) {
        onRetry?.(
          error,
          error.attemptNumber,
          backoffDelay(error.attemptNumber, baseDelayMs, maxDelayMs),
        );
      }
    },
  };

  return pRetry(fn, pRetryOptions);
}

/**
 * Create a tagged error with a kind field for retry classification.
 */
export function createTaggedError(
  kind: ErrorKind,
  message: string,
  details?: unknown,
): TaggedError {
  const error: TaggedError = Object.assign(new Error(message), { kind, details });
  return error;
}

/**
 * Human-readable message of any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
