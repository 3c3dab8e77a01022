/**
 * Site agent: LLM + two budgeted tools, tool-call loop until a final JSON answer.
 * Use: new SiteAgent({ llm, sandbox, search }).run({ jobId, request, budget, existing }).
 */

import type { ValidateFunction } from "ajv";
import { ToolCallBudget } from "../core/Budget.js";
import { isRecord } from "../core/http.js";
import { createTaggedError, errorKind, errorMessage } from "../core/Retry.js";
import { SchemaValidator, formatErrors } from "../core/SchemaValidator.js";
import { createLogger, summarizeForLog, type Logger } from "../observability/Logger.js";
import type { EventLog } from "../observability/EventLog.js";
import type { Metrics } from "../observability/Metrics.js";
import {
  decodeAttachment,
  isImageAttachment,
  isTextAttachment,
  toDataUri,
} from "../sandbox/attachments.js";
import type { ProducedFile, SandboxRequest, SandboxResult } from "../sandbox/SandboxExecutor.js";
import { normalizeArtifactPath } from "../security/paths.js";
import type { SearchProvider } from "../search/WebSearch.js";
import type { ExistingArtifact, GeneratedArtifact } from "../types/Artifact.js";
import type { TaskRequest } from "../types/TaskRequest.js";
import type { ToolResult } from "../types/ToolResult.js";
import type {
  ChatClient,
  ChatMessage,
  ContentPart,
  OpenAIToolDefinition,
  ToolCall,
} from "./OpenAICompatibleClient.js";
import { buildSystemPrompt, buildTaskPrompt, type PromptAttachments } from "./prompts.js";
import {
  AGENT_TOOLS,
  FINAL_ANSWER_SCHEMA,
  toToolDefinition,
  type AgentToolSpec,
  type FinalAnswer,
  type RunCodeArgs,
  type WebSearchArgs,
} from "./tools.js";

/**
 * The part of the sandbox the agent needs.
 */
export interface CodeRunner {
  execute(request: SandboxRequest): Promise<SandboxResult>;
}

export interface SiteAgentDeps {
  llm: ChatClient;
  sandbox: CodeRunner;
  search: SearchProvider;
  validator?: SchemaValidator;
  logger?: Logger;
  events?: EventLog;
  metrics?: Metrics;
}

export interface SiteAgentOptions {
  /** Max model turns (default: 12) */
  maxSteps?: number;
  /** Per model call (default: 120000) */
  llmTimeoutMs?: number;
}

export interface GenerationInput {
  jobId: string;
  request: TaskRequest;
  budget: ToolCallBudget;
  /** Files present from prior rounds; empty on round 1 */
  existing?: ExistingArtifact[];
  signal?: AbortSignal;
}

export interface GenerationResult {
  artifacts: GeneratedArtifact[];
  steps: number;
}

const MAX_TOOL_OUTPUT_CHARS = 8_000;

export class SiteAgent {
  private readonly validator: SchemaValidator;
  private readonly logger: Logger;
  private readonly maxSteps: number;
  private readonly llmTimeoutMs: number;
  private readonly argValidators = new Map<string, ValidateFunction<unknown>>();
  private readonly validateAnswer: ValidateFunction<FinalAnswer>;

  constructor(
    private readonly deps: SiteAgentDeps,
    options: SiteAgentOptions = {},
  ) {
    this.validator = deps.validator ?? new SchemaValidator();
    this.logger = deps.logger ?? createLogger({ prefix: "agent" });
    this.maxSteps = options.maxSteps ?? 12;
    this.llmTimeoutMs = options.llmTimeoutMs ?? 120_000;
    for (const tool of AGENT_TOOLS) {
      this.argValidators.set(tool.name, this.validator.compile<unknown>(tool.inputSchema));
    }
    this.validateAnswer = this.validator.compile<FinalAnswer>(FINAL_ANSWER_SCHEMA);
  }

  async run(input: GenerationInput): Promise<GenerationResult> {
    const { request, budget } = input;
    const log = this.logger.child({ jobId: input.jobId, slug: request.slug });
    const run = new AgentRun(input);

    const prepared = this.prepareAttachments(request);
    const taskPrompt = buildTaskPrompt(request, prepared.prompt, input.existing ?? []);
    const userContent: string | ContentPart[] =
      prepared.imageParts.length > 0
        ? [{ type: "text", text: taskPrompt }, ...prepared.imageParts]
        : taskPrompt;

    const messages: ChatMessage[] = [
      { role: "system", content: buildSystemPrompt(limitsOf(budget)) },
      { role: "user", content: userContent },
    ];

    let steps = 0;
    while (steps < this.maxSteps) {
      throwIfAborted(input.signal);

      const tools = this.availableTools(budget);
      const { message } = await this.deps.llm.chatWithTools(messages, tools, {
        timeoutMs: this.llmTimeoutMs,
        signal: input.signal,
      });
      steps++;
      messages.push(message);

      if (message.tool_calls?.length) {
        for (const tc of message.tool_calls) {
          const result = await this.invokeTool(tc, run, log);
          messages.push({
            role: "tool",
            content: `Observation: ${JSON.stringify(result)}`,
            tool_call_id: tc.id,
          });
        }
        continue;
      }

      const outcome = this.readFinalAnswer(message.content ?? "", run);
      if (outcome.ok) {
        log.info("agent.done", { steps, artifacts: outcome.artifacts.map((a) => a.path), budget: budget.snapshot() });
        return { artifacts: outcome.artifacts, steps };
      }

      log.debug("agent.answer_rejected", { steps, reason: outcome.reason });
      messages.push({
        role: "user",
        content: `Your answer was not accepted: ${outcome.reason}. Reply with the JSON object only.`,
      });
    }

    throw createTaggedError(
      "GENERATION_ERROR",
      `No usable site files after ${steps} model turn(s)`,
      { steps, budget: budget.snapshot() },
    );
  }

  /**
   * Tools the model may still call. Spent tools are withheld; a call to one
   * anyway is refused in invokeTool.
   */
  private availableTools(budget: ToolCallBudget): OpenAIToolDefinition[] {
    return AGENT_TOOLS.filter((t) => !budget.isExhausted(t.budget)).map(toToolDefinition);
  }

  private async invokeTool(tc: ToolCall, run: AgentRun, log: Logger): Promise<ToolResult> {
    const { jobId, request, budget } = run.input;
    const spec = AGENT_TOOLS.find((t) => t.name === tc.function.name);
    if (!spec) {
      return { ok: false, error: { kind: "TOOL_NOT_FOUND", message: `Unknown tool "${tc.function.name}"` } };
    }

    const args = this.parseArgs(spec, tc.function.arguments);
    if (!args.ok) {
      return { ok: false, error: { kind: "INPUT_SCHEMA_INVALID", message: args.message } };
    }

    if (!budget.tryConsume(spec.budget)) {
      const reason = `${spec.name} call limit reached; continue with the information you have`;
      log.info("agent.tool_denied", { tool: spec.name });
      this.deps.metrics?.recordToolDenied(spec.name);
      this.deps.events?.append({
        type: "TOOL_DENIED",
        timestamp: new Date().toISOString(),
        jobId,
        slug: request.slug,
        toolName: spec.name,
        reason,
      });
      return { ok: false, error: { kind: "BUDGET_EXCEEDED", message: reason } };
    }

    this.deps.events?.append({
      type: "TOOL_CALLED",
      timestamp: new Date().toISOString(),
      jobId,
      slug: request.slug,
      toolName: spec.name,
      argsSummary: summarizeForLog(args.value),
    });

    const startTime = Date.now();
    let result: ToolResult;
    try {
      result = spec.name === "web_search"
        ? await this.webSearch(args.value, run)
        : await this.runCode(args.value, run);
    } catch (err) {
      if (run.input.signal?.aborted) throw err;
      result = {
        ok: false,
        error: { kind: "UPSTREAM_ERROR", message: errorMessage(err), details: { cause: errorKind(err) } },
      };
    }
    const durationMs = Date.now() - startTime;

    log.info("agent.tool_result", { tool: spec.name, ok: result.ok, durationMs });
    this.deps.metrics?.recordToolCall(spec.name, result.ok, durationMs);
    this.deps.events?.append({
      type: "TOOL_RESULT",
      timestamp: new Date().toISOString(),
      jobId,
      slug: request.slug,
      toolName: spec.name,
      ok: result.ok,
      durationMs,
      error: result.error,
    });
    return result;
  }

  private parseArgs(
    spec: AgentToolSpec,
    json: string,
  ): { ok: true; value: Record<string, unknown> } | { ok: false; message: string } {
    let parsed: unknown;
    try {
      parsed = json.trim() ? JSON.parse(json) : {};
    } catch {
      return { ok: false, message: `Arguments for ${spec.name} are not valid JSON` };
    }
    const validate = this.argValidators.get(spec.name);
    if (!validate) {
      return { ok: false, message: `No schema for ${spec.name}` };
    }
    const result = this.validator.validate(validate, parsed);
    if (!result.valid || !isRecord(result.data)) {
      return { ok: false, message: `Invalid arguments for ${spec.name}: ${formatErrors(result.errors ?? [])}` };
    }
    return { ok: true, value: result.data };
  }

  private async webSearch(args: Record<string, unknown>, run: AgentRun): Promise<ToolResult> {
    const { query } = readSearchArgs(args);
    const response = await this.deps.search.search(query, { signal: run.input.signal });
    return { ok: true, result: response };
  }

  private async runCode(args: Record<string, unknown>, run: AgentRun): Promise<ToolResult> {
    const { code, language, dependencies } = readRunCodeArgs(args);
    const sandboxResult = await this.deps.sandbox.execute({
      code,
      language,
      dependencies,
      attachments: run.input.request.attachments,
      signal: run.input.signal,
    });
    throwIfAborted(run.input.signal);

    for (const file of sandboxResult.files) {
      run.produced.set(file.path, file);
    }

    return {
      ok: sandboxResult.status === "ok",
      result: {
        status: sandboxResult.status,
        exitCode: sandboxResult.exitCode,
        stdout: clip(sandboxResult.stdout),
        stderr: clip(sandboxResult.stderr),
        files: sandboxResult.files.map((f) => ({
          path: f.path,
          bytes: f.bytes,
          publishable: f.content !== undefined,
        })),
        ...(sandboxResult.skippedAttachments ? { skippedAttachments: sandboxResult.skippedAttachments } : {}),
      },
      error: sandboxResult.error,
    };
  }

  private prepareAttachments(request: TaskRequest): {
    prompt: PromptAttachments;
    imageParts: ContentPart[];
  } {
    const prompt: PromptAttachments = { images: [], texts: [], all: [], invalid: [] };
    const imageParts: ContentPart[] = [];

    for (const attachment of request.attachments) {
      prompt.all.push(attachment.name);
      try {
        const decoded = decodeAttachment(attachment);
        if (isImageAttachment(decoded)) {
          prompt.images.push(decoded.name);
          imageParts.push({ type: "image_url", image_url: { url: toDataUri(decoded) } });
        } else if (isTextAttachment(decoded)) {
          prompt.texts.push({ name: decoded.name, text: decoded.data.toString("utf-8") });
        }
      } catch (err) {
        prompt.invalid.push({ name: attachment.name, reason: errorMessage(err) });
      }
    }
    return { prompt, imageParts };
  }

  private readFinalAnswer(
    content: string,
    run: AgentRun,
  ): { ok: true; artifacts: GeneratedArtifact[] } | { ok: false; reason: string } {
    const json = extractJsonObject(content);
    if (json === undefined) {
      return { ok: false, reason: "no JSON object found" };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(json);
    } catch (err) {
      return { ok: false, reason: `invalid JSON (${errorMessage(err)})` };
    }

    const result = this.validator.validate(this.validateAnswer, parsed);
    if (!result.valid || !result.data) {
      return { ok: false, reason: formatErrors(result.errors ?? []) };
    }

    const byPath = new Map<string, GeneratedArtifact>();
    try {
      for (const file of result.data.files) {
        const path = normalizeArtifactPath(file.path);
        byPath.set(path, { path, content: file.content, message: file.message || `Add ${path}` });
      }
      for (const output of result.data.sandboxOutputs) {
        const source = run.produced.get(output.source);
        if (!source) {
          return { ok: false, reason: `sandbox output "${output.source}" was not produced by run_code` };
        }
        if (source.content === undefined) {
          return { ok: false, reason: `sandbox output "${output.source}" is too large to publish` };
        }
        const path = normalizeArtifactPath(output.path ?? output.source);
        byPath.set(path, { path, content: source.content, message: output.message || `Add ${path}` });
      }
    } catch (err) {
      return { ok: false, reason: errorMessage(err) };
    }

    if (byPath.size === 0) {
      return { ok: false, reason: "the answer contains no files" };
    }
    return { ok: true, artifacts: [...byPath.values()] };
  }
}

/**
 * Mutable state of one agent run.
 */
class AgentRun {
  /** Files produced by run_code, latest run wins per path */
  readonly produced = new Map<string, ProducedFile>();

  constructor(readonly input: GenerationInput) {}
}

function limitsOf(budget: ToolCallBudget) {
  const snapshot = budget.snapshot();
  return { search: snapshot.search.remaining, exec: snapshot.exec.remaining };
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw createTaggedError("DEADLINE_EXCEEDED", "Generation aborted");
  }
}

function readSearchArgs(args: Record<string, unknown>): WebSearchArgs {
  return { query: typeof args.query === "string" ? args.query : "" };
}

function readRunCodeArgs(args: Record<string, unknown>): RunCodeArgs {
  return {
    code: typeof args.code === "string" ? args.code : "",
    language: args.language === "node" ? "node" : "python",
    dependencies: Array.isArray(args.dependencies)
      ? args.dependencies.filter((d): d is string => typeof d === "string")
      : [],
  };
}

function clip(text: string): string {
  return text.length > MAX_TOOL_OUTPUT_CHARS
    ? `${text.slice(0, MAX_TOOL_OUTPUT_CHARS)}\n[... ${text.length - MAX_TOOL_OUTPUT_CHARS} more characters]`
    : text;
}

/**
 * Pull the JSON object out of a model reply, tolerating code fences and
 * surrounding prose.
 */
export function extractJsonObject(content: string): string | undefined {
  const fenced = content.match(/```(?:json)?\s*([\s\S]*?)```/i);
  const candidate = fenced?.[1] ?? content;
  const start = candidate.indexOf("{");
  const end = candidate.lastIndexOf("}");
  if (start === -1 || end <= start) return undefined;
  return candidate.slice(start, end + 1);
}
