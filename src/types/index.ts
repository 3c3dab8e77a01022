export type {
  AttachmentInput,
  TaskSubmission,
  TaskRequest,
} from "./TaskRequest.js";

export type {
  GeneratedArtifact,
  ExistingArtifact,
} from "./Artifact.js";

export type {
  PublicEndpoints,
  JobOutcome,
  JobState,
} from "./JobOutcome.js";

export type {
  ErrorKind,
  ToolError,
  ToolResult,
} from "./ToolResult.js";

export type {
  JobEventType,
  JobEvent,
  JobSubmittedEvent,
  StateChangedEvent,
  ToolCalledEvent,
  ToolResultEvent,
  ToolDeniedEvent,
  DeliveryRetryEvent,
  JobFinishedEvent,
  AnyJobEvent,
} from "./Events.js";
