import type { JobState } from "./JobOutcome.js";
import type { ToolError } from "./ToolResult.js";

/**
 * Event types emitted by the job manager, supervisor and agent loop.
 */
export type JobEventType =
  | "JOB_SUBMITTED"
  | "STATE_CHANGED"
  | "TOOL_CALLED"
  | "TOOL_RESULT"
  | "TOOL_DENIED"
  | "DELIVERY_RETRY"
  | "JOB_FINISHED";

/**
 * Base event structure for all job events.
 */
export interface JobEvent {
  type: JobEventType;
  timestamp: string; // ISO 8601
  jobId: string;
  slug: string;
}

export interface JobSubmittedEvent extends JobEvent {
  type: "JOB_SUBMITTED";
  round: number;
}

export interface StateChangedEvent extends JobEvent {
  type: "STATE_CHANGED";
  from: JobState;
  to: JobState;
}

export interface ToolCalledEvent extends JobEvent {
  type: "TOOL_CALLED";
  toolName: string;
  argsSummary: string;
}

export interface ToolResultEvent extends JobEvent {
  type: "TOOL_RESULT";
  toolName: string;
  ok: boolean;
  durationMs: number;
  error?: ToolError;
}

/**
 * Emitted when a tool call is refused because its budget is spent.
 */
export interface ToolDeniedEvent extends JobEvent {
  type: "TOOL_DENIED";
  toolName: string;
  reason: string;
}

export interface DeliveryRetryEvent extends JobEvent {
  type: "DELIVERY_RETRY";
  attempt: number;
  delayMs: number;
  reason: string;
}

export interface JobFinishedEvent extends JobEvent {
  type: "JOB_FINISHED";
  success: boolean;
  delivered: boolean;
  durationMs: number;
}

export type AnyJobEvent =
  | JobSubmittedEvent
  | StateChangedEvent
  | ToolCalledEvent
  | ToolResultEvent
  | ToolDeniedEvent
  | DeliveryRetryEvent
  | JobFinishedEvent;
