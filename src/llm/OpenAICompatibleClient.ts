/**
 * Minimal client for OpenAI-compatible chat completions API.
 * Use createOpenAICompatibleClient(baseUrl, model, apiKey?) and then .chatWithTools(messages, tools).
 */

import { isRecord } from "../core/http.js";
import { createTaggedError } from "../core/Retry.js";

export type ContentPart =
  | { type: "text"; text: string }
  | { type: "image_url"; image_url: { url: string } };

export interface ToolCall {
  id: string;
  type: "function";
  function: { name: string; arguments: string };
}

export interface SystemMessage {
  role: "system";
  content: string;
}

export interface UserMessage {
  role: "user";
  /** Plain text, or text and image parts for vision-capable models */
  content: string | ContentPart[];
}

export interface AssistantMessage {
  role: "assistant";
  content: string | null;
  tool_calls?: ToolCall[];
}

export interface ToolMessage {
  role: "tool";
  content: string;
  tool_call_id: string;
}

export type ChatMessage = SystemMessage | UserMessage | AssistantMessage | ToolMessage;

export interface ChatOptions {
  /** Request timeout in milliseconds. Default 120000. */
  timeoutMs?: number;
  /** Aborts the request, e.g. when the job deadline passes */
  signal?: AbortSignal;
}

export interface OpenAIToolDefinition {
  type: "function";
  function: {
    name: string;
    description?: string;
    parameters?: object;
  };
}

export interface ChatWithToolsResult {
  message: AssistantMessage;
  raw: unknown;
}

/**
 * The part of the client the agent loop depends on; tests substitute it.
 */
export interface ChatClient {
  readonly model: string;
  chatWithTools(
    messages: ChatMessage[],
    tools: OpenAIToolDefinition[],
    options?: ChatOptions,
  ): Promise<ChatWithToolsResult>;
}

export interface OpenAICompatibleClientConfig {
  baseUrl: string;
  model: string;
  apiKey?: string;
}

const DEFAULT_TIMEOUT_MS = 120_000;

export function createOpenAICompatibleClient(
  baseUrl: string,
  model: string,
  apiKey?: string,
): OpenAICompatibleClient {
  return new OpenAICompatibleClient({ baseUrl, model, apiKey });
}

export class OpenAICompatibleClient implements ChatClient {
  readonly model: string;
  private readonly baseUrl: string;
  private readonly apiKey?: string;

  constructor(config: OpenAICompatibleClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, "");
    this.model = config.model;
    this.apiKey = config.apiKey;
  }

  async chatWithTools(
    messages: ChatMessage[],
    tools: OpenAIToolDefinition[],
    options?: ChatOptions,
  ): Promise<ChatWithToolsResult> {
    const raw = await this.request(
      {
        model: this.model,
        messages: messages.map((m) => this.serializeMessage(m)),
        ...(tools.length > 0 ? { tools } : {}),
      },
      options,
    );
    return { message: parseAssistantMessage(raw), raw };
  }

  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
    };
    if (this.apiKey) headers["Authorization"] = `Bearer ${this.apiKey}`;
    return headers;
  }

  private serializeMessage(m: ChatMessage): object {
    switch (m.role) {
      case "tool":
        return { role: "tool", content: m.content, tool_call_id: m.tool_call_id };
      case "assistant":
        return m.tool_calls?.length
          ? { role: "assistant", content: m.content, tool_calls: m.tool_calls }
          : { role: "assistant", content: m.content ?? "" };
      default:
        return { role: m.role, content: m.content };
    }
  }

  private async request(body: object, options: ChatOptions = {}): Promise<unknown> {
    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    const url = `${this.baseUrl}/chat/completions`;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    const onAbort = () => controller.abort();
    options.signal?.addEventListener("abort", onAbort, { once: true });

    let response: Response;
    try {
      response = await fetch(url, {
        method: "POST",
        headers: this.buildHeaders(),
        body: JSON.stringify(body),
        signal: controller.signal,
      });
    } catch (err) {
      if (err instanceof Error && err.name === "AbortError") {
        throw options.signal?.aborted
          ? createTaggedError("DEADLINE_EXCEEDED", "LLM request aborted")
          : createTaggedError("UPSTREAM_ERROR", `LLM request timed out after ${timeoutMs}ms`);
      }
      throw err;
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener("abort", onAbort);
    }

    const raw: unknown = await response.json();
    if (!response.ok) {
      const errBody = isRecord(raw) && "error" in raw ? raw.error : raw;
      throw createTaggedError(
        "UPSTREAM_ERROR",
        `LLM API error ${response.status}: ${JSON.stringify(errBody)}`,
        { status: response.status },
      );
    }
    return raw;
  }
}

function parseToolCall(value: unknown): ToolCall | undefined {
  if (!isRecord(value) || typeof value.id !== "string" || !isRecord(value.function)) {
    return undefined;
  }
  const { name, arguments: args } = value.function;
  if (typeof name !== "string") return undefined;
  return {
    id: value.id,
    type: "function",
    function: { name, arguments: typeof args === "string" ? args : "" },
  };
}

/**
 * Read `choices[0].message` from a completion response.
 */
export function parseAssistantMessage(raw: unknown): AssistantMessage {
  const choices = isRecord(raw) && Array.isArray(raw.choices) ? raw.choices : [];
  const first: unknown = choices[0];
  const msg = isRecord(first) && isRecord(first.message) ? first.message : {};
  const content = typeof msg.content === "string" ? msg.content : null;
  const toolCalls = Array.isArray(msg.tool_calls)
    ? msg.tool_calls.map(parseToolCall).filter((tc): tc is ToolCall => tc !== undefined)
    : [];
  return toolCalls.length > 0
    ? { role: "assistant", content, tool_calls: toolCalls }
    : { role: "assistant", content };
}
