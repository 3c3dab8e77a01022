import { fetchText } from "../core/http.js";
import { createTaggedError, errorKind, errorMessage, withRetry } from "../core/Retry.js";
import type { EventLog } from "../observability/EventLog.js";
import { createLogger, type Logger } from "../observability/Logger.js";
import type { Metrics } from "../observability/Metrics.js";
import type { JobOutcome } from "../types/JobOutcome.js";
import type { TaskRequest } from "../types/TaskRequest.js";

/**
 * JSON body POSTed to the callback address.
 */
export interface CallbackPayload {
  email: string;
  task: string;
  round: number;
  nonce: string;
  success: boolean;
  repo_url: string;
  commit_sha: string;
  pages_url: string;
  artifacts: string[];
  error?: string;
}

export interface DeliveryResult {
  delivered: boolean;
  attempts: number;
  /** Last HTTP status seen, if any response arrived */
  status?: number;
  error?: string;
}

export interface ResultReporterConfig {
  /** Total attempts including the first (default: 5) */
  maxAttempts?: number;
  /** First retry delay; doubles each retry (default: 1000) */
  baseDelayMs?: number;
  /** Delay cap (default: 16000) */
  maxDelayMs?: number;
  /** Per attempt (default: 30000) */
  attemptTimeoutMs?: number;
  logger?: Logger;
  events?: EventLog;
  metrics?: Metrics;
}

export interface DeliveryContext {
  jobId: string;
  slug: string;
}

export function buildCallbackPayload(request: TaskRequest, outcome: JobOutcome): CallbackPayload {
  return {
    email: request.email,
    task: request.task,
    round: request.round,
    nonce: request.nonce ?? "",
    success: outcome.success,
    repo_url: outcome.repoUrl ?? "",
    commit_sha: outcome.commitSha ?? "",
    pages_url: outcome.pagesUrl ?? "",
    artifacts: outcome.artifacts,
    ...(outcome.success ? {} : { error: outcome.error ?? "unknown error" }),
  };
}

/** Statuses worth another attempt besides 5xx. */
const RETRYABLE_STATUSES = new Set([408, 429]);

export function isRetryableStatus(status: number): boolean {
  return status >= 500 || RETRYABLE_STATUSES.has(status);
}

/**
 * Delivers a job outcome to its callback address, retrying transient failures
 * with exponential backoff. Never throws.
 */
export class ResultReporter {
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly attemptTimeoutMs: number;
  private readonly logger: Logger;

  constructor(private readonly config: ResultReporterConfig = {}) {
    this.maxAttempts = config.maxAttempts ?? 5;
    this.baseDelayMs = config.baseDelayMs ?? 1000;
    this.maxDelayMs = config.maxDelayMs ?? 16_000;
    this.attemptTimeoutMs = config.attemptTimeoutMs ?? 30_000;
    this.logger = config.logger ?? createLogger({ prefix: "reporter" });
  }

  async deliver(
    callbackUrl: string,
    payload: CallbackPayload,
    context: DeliveryContext,
  ): Promise<DeliveryResult> {
    const log = this.logger.child({ jobId: context.jobId, url: callbackUrl });
    const result = await this.attemptDelivery(callbackUrl, payload, context, log);
    this.config.metrics?.recordDelivery(result.delivered, result.attempts);

    if (result.delivered) {
      log.info("delivery.ok", { attempts: result.attempts, status: result.status });
    } else {
      log.error("delivery.failed", { ...result, payload });
    }
    return result;
  }

  private async attemptDelivery(
    callbackUrl: string,
    payload: CallbackPayload,
    context: DeliveryContext,
    log: Logger,
  ): Promise<DeliveryResult> {
    let url: URL;
    try {
      url = new URL(callbackUrl);
    } catch {
      return { delivered: false, attempts: 0, error: `Malformed callback address "${callbackUrl}"` };
    }
    if (url.protocol !== "http:" && url.protocol !== "https:") {
      return { delivered: false, attempts: 0, error: `Unsupported callback protocol "${url.protocol}"` };
    }

    let attempts = 0;
    let lastStatus: number | undefined;
    const body = JSON.stringify(payload);

    try {
      const status = await withRetry(
        async (attempt) => {
          attempts = attempt;
          log.debug("delivery.attempt", { attempt, maxAttempts: this.maxAttempts });
          // The body is read inside the attempt timeout so a stalled stream cannot hold the attempt open
          const response = await fetchText(
            url,
            { method: "POST", headers: { "Content-Type": "application/json" }, body },
            { timeoutMs: this.attemptTimeoutMs },
          );
          lastStatus = response.status;
          if (response.ok) return response.status;
          if (isRetryableStatus(response.status)) {
            throw createTaggedError("DELIVERY_FAILURE", `Callback returned ${response.status}`, {
              status: response.status,
            });
          }
          throw createTaggedError("CALLBACK_REJECTED", `Callback rejected the result with ${response.status}`, {
            status: response.status,
          });
        },
        {
          maxRetries: this.maxAttempts - 1,
          baseDelayMs: this.baseDelayMs,
          maxDelayMs: this.maxDelayMs,
          onRetry: (error, attempt, delayMs) => {
            log.warn("delivery.retry", { attempt, delayMs, error: error.message });
            this.config.events?.append({
              type: "DELIVERY_RETRY",
              timestamp: new Date().toISOString(),
              jobId: context.jobId,
              slug: context.slug,
              attempt,
              delayMs,
              reason: error.message,
            });
          },
        },
      );
      return { delivered: true, attempts, status };
    } catch (err) {
      const kind = errorKind(err);
      return {
        delivered: false,
        attempts,
        status: lastStatus,
        error: kind === "CALLBACK_REJECTED" ? errorMessage(err) : `Gave up after ${attempts} attempt(s): ${errorMessage(err)}`,
      };
    }
  }
}
