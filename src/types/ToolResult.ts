/**
 * Error kinds used across the job pipeline.
 * Every tagged error carries one of these in its `kind` field.
 */
export type ErrorKind =
  | "SETUP_ERROR"
  | "EXECUTION_TIMEOUT"
  | "GENERATION_ERROR"
  | "PUBLISHING_ERROR"
  | "DELIVERY_FAILURE"
  | "CALLBACK_REJECTED"
  | "DEADLINE_EXCEEDED"
  | "CONFIG_ERROR"
  | "INVALID_ARTIFACT_PATH"
  | "ATTACHMENT_INVALID"
  | "BUDGET_EXCEEDED"
  | "INPUT_SCHEMA_INVALID"
  | "INVALID_REQUEST"
  | "UPSTREAM_ERROR"
  | "TOOL_NOT_FOUND";

/**
 * Error information in a tool result.
 */
export interface ToolError {
  kind?: ErrorKind;
  message: string;
  details?: unknown;
}

/**
 * Structured result of an agent tool call.
 * Tools never throw into the agent loop; failures travel back as data.
 */
export interface ToolResult {
  ok: boolean;
  result?: unknown;
  error?: ToolError;
}
