import { createTaggedError, errorMessage } from "./Retry.js";

export interface FetchLimits {
  timeoutMs: number;
  /** Caller's cancellation, e.g. the job deadline */
  signal?: AbortSignal;
}

/**
 * Status and body text of a response read under the request's timeout.
 */
export interface TextResponse {
  status: number;
  ok: boolean;
  text: string;
}

/**
 * fetch with a per-request timeout and an optional outer abort signal.
 *
 * Failures are tagged: the outer signal firing gives DEADLINE_EXCEEDED, the
 * timeout or a transport error gives UPSTREAM_ERROR (`details.timeout` marks
 * the former). HTTP error statuses are returned, not thrown.
 */
export async function fetchWithTimeout(
  url: string | URL,
  init: RequestInit,
  limits: FetchLimits,
): Promise<Response> {
  return timedFetch(url, init, limits, async (response) => response);
}

/**
 * Like fetchWithTimeout, but the body is read before the timer stops.
 */
export async function fetchText(url: string | URL, init: RequestInit, limits: FetchLimits): Promise<TextResponse> {
  return timedFetch(url, init, limits, async (response) => ({
    status: response.status,
    ok: response.ok,
    text: await response.text(),
  }));
}

async function timedFetch<T>(
  url: string | URL,
  init: RequestInit,
  limits: FetchLimits,
  read: (response: Response) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), limits.timeoutMs);
  const onAbort = () => controller.abort();
  limits.signal?.addEventListener("abort", onAbort, { once: true });
  if (limits.signal?.aborted) controller.abort();

  try {
    const response = await fetch(url, { ...init, signal: controller.signal });
    return await untilAborted(read(response), controller.signal);
  } catch (err) {
    if (limits.signal?.aborted) {
      throw createTaggedError("DEADLINE_EXCEEDED", `Request to ${String(url)} aborted`);
    }
    if (controller.signal.aborted) {
      throw createTaggedError("UPSTREAM_ERROR", `Request to ${String(url)} timed out after ${limits.timeoutMs}ms`, {
        timeout: true,
      });
    }
    throw createTaggedError("UPSTREAM_ERROR", `Request to ${String(url)} failed: ${errorMessage(err)}`, {
      timeout: false,
    });
  } finally {
    clearTimeout(timer);
    limits.signal?.removeEventListener("abort", onAbort);
  }
}

/**
 * Settle with `work`, or reject as soon as `signal` aborts. A body stream
 * does not always observe the request signal.
 */
function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new Error("aborted"));
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener("abort", onAbort, { once: true });
    void work.then(resolve, reject).finally(() => signal.removeEventListener("abort", onAbort));
  });
}

/**
 * Response body as JSON, or undefined when it is empty or not JSON.
 */
export async function readJsonBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (!text) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
