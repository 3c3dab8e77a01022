// === Types ===
export type {
  AttachmentInput,
  TaskSubmission,
  TaskRequest,
  GeneratedArtifact,
  ExistingArtifact,
  PublicEndpoints,
  JobOutcome,
  JobState,
  ErrorKind,
  ToolError,
  ToolResult,
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
} from "./types/index.js";
export { slugifyTaskName, toTaskRequest } from "./types/TaskRequest.js";

// === Core ===
export { ToolCallBudget, DEFAULT_TOOL_CALL_LIMITS } from "./core/Budget.js";
export type { BudgetedTool, ToolCallLimits, BudgetUsage } from "./core/Budget.js";
export { SchemaValidator, SchemaValidationError } from "./core/SchemaValidator.js";
export type { ValidationResult } from "./core/SchemaValidator.js";
export {
  withRetry,
  createTaggedError,
  errorKind,
  errorMessage,
  isRetryable,
  backoffDelay,
} from "./core/Retry.js";
export type { RetryOptions, TaggedError } from "./core/Retry.js";
export { normalizeArtifactPath } from "./security/paths.js";

// === Sandbox ===
export { SandboxExecutor } from "./sandbox/SandboxExecutor.js";
export type {
  SandboxConfig,
  SandboxRequest,
  SandboxResult,
  SandboxStatus,
  SkippedAttachment,
  ProducedFile,
} from "./sandbox/SandboxExecutor.js";
export type { SandboxLanguage, RuntimeCommands } from "./sandbox/runtimes.js";
export { decodeAttachment } from "./sandbox/attachments.js";
export type { DecodedAttachment } from "./sandbox/attachments.js";

// === Agent ===
export { SiteAgent } from "./llm/SiteAgent.js";
export type {
  SiteAgentDeps,
  SiteAgentOptions,
  GenerationInput,
  GenerationResult,
  CodeRunner,
} from "./llm/SiteAgent.js";
export { OpenAICompatibleClient, createOpenAICompatibleClient } from "./llm/OpenAICompatibleClient.js";
export type {
  ChatClient,
  ChatMessage,
  ChatOptions,
  ChatWithToolsResult,
  OpenAICompatibleClientConfig,
  OpenAIToolDefinition,
} from "./llm/OpenAICompatibleClient.js";
export { AGENT_TOOLS, WEB_SEARCH_TOOL, RUN_CODE_TOOL } from "./llm/tools.js";
export { DuckDuckGoSearchProvider, parseInstantAnswer } from "./search/WebSearch.js";
export type { SearchProvider, SearchResponse, SearchHit } from "./search/WebSearch.js";

// === Jobs ===
export { JobSupervisor, fallbackOutcome } from "./jobs/JobSupervisor.js";
export type {
  JobSupervisorDeps,
  JobSupervisorOptions,
  SupervisedRun,
  SiteGenerator,
  OutcomeReporter,
} from "./jobs/JobSupervisor.js";
export { JobManager, InMemoryJobStore } from "./jobs/JobManager.js";
export type { Job, JobStatus, JobStore, JobManagerOptions, Acknowledgment } from "./jobs/JobManager.js";
export { JobStateMachine } from "./jobs/JobStateMachine.js";
export { Workspace } from "./jobs/Workspace.js";

// === Publishing & reporting ===
export { GitHubPublisher } from "./publish/GitHubPublisher.js";
export type { GitHubPublisherConfig } from "./publish/GitHubPublisher.js";
export type { Publisher, RepositoryHandle, UploadResult } from "./publish/Publisher.js";
export { ResultReporter, buildCallbackPayload } from "./report/ResultReporter.js";
export type { CallbackPayload, DeliveryResult, ResultReporterConfig } from "./report/ResultReporter.js";

// === Server & config ===
export { createApp } from "./server/createApp.js";
export type { IntakeAppOptions, TaskIntake } from "./server/createApp.js";
export { loadAppConfig, resolveAppConfig } from "./config/AppConfig.js";
export type { AppConfig } from "./config/AppConfig.js";

// === Observability ===
export { createLogger } from "./observability/Logger.js";
export type { Logger, LogLevel } from "./observability/Logger.js";
export { EventLog } from "./observability/EventLog.js";
export { Metrics } from "./observability/Metrics.js";
export type { CounterValue, DurationValue, MetricsSnapshot } from "./observability/Metrics.js";
