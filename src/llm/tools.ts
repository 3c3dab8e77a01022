import type { BudgetedTool } from "../core/Budget.js";
import type { SandboxLanguage } from "../sandbox/runtimes.js";
import type { OpenAIToolDefinition } from "./OpenAICompatibleClient.js";

export type AgentToolName = "web_search" | "run_code";

export interface WebSearchArgs {
  query: string;
}

export interface RunCodeArgs {
  code: string;
  language: SandboxLanguage;
  dependencies: string[];
}

/**
 * Tool exposed to the model, with the budget counter it draws from.
 */
export interface AgentToolSpec {
  name: AgentToolName;
  budget: BudgetedTool;
  description: string;
  inputSchema: object;
}

export const WEB_SEARCH_TOOL: AgentToolSpec = {
  name: "web_search",
  budget: "search",
  description:
    "Look something up on the web. Read-only. Returns a short summary and a few result links.",
  inputSchema: {
    type: "object",
    properties: {
      query: { type: "string", minLength: 1, maxLength: 500 },
    },
    required: ["query"],
    additionalProperties: false,
  },
};

export const RUN_CODE_TOOL: AgentToolSpec = {
  name: "run_code",
  budget: "exec",
  description:
    "Run a script in a fresh temporary directory that contains every task attachment under its own name. " +
    "Returns status, exit code, stdout, stderr and the files the script created. " +
    "Files created by the script can be published with `sandboxOutputs` in the final answer.",
  inputSchema: {
    type: "object",
    properties: {
      code: { type: "string", minLength: 1 },
      language: { type: "string", enum: ["python", "node"], default: "python" },
      dependencies: {
        type: "array",
        items: { type: "string", minLength: 1, maxLength: 200 },
        maxItems: 20,
        default: [],
      },
    },
    required: ["code"],
    additionalProperties: false,
  },
};

export const AGENT_TOOLS: readonly AgentToolSpec[] = [WEB_SEARCH_TOOL, RUN_CODE_TOOL];

export function toToolDefinition(spec: AgentToolSpec): OpenAIToolDefinition {
  return {
    type: "function",
    function: { name: spec.name, description: spec.description, parameters: spec.inputSchema },
  };
}

export interface FinalAnswerFile {
  path: string;
  content: string;
  message?: string;
}

export interface FinalAnswerSandboxOutput {
  /** Path of a file produced by an earlier run_code call */
  source: string;
  /** Repository path to publish it under; defaults to `source` */
  path?: string;
  message?: string;
}

export interface FinalAnswer {
  files: FinalAnswerFile[];
  sandboxOutputs: FinalAnswerSandboxOutput[];
}

export const FINAL_ANSWER_SCHEMA = {
  type: "object",
  properties: {
    files: {
      type: "array",
      items: {
        type: "object",
        properties: {
          path: { type: "string", minLength: 1 },
          content: { type: "string" },
          message: { type: "string" },
        },
        required: ["path", "content"],
        additionalProperties: false,
      },
      default: [],
    },
    sandboxOutputs: {
      type: "array",
      items: {
        type: "object",
        properties: {
          source: { type: "string", minLength: 1 },
          path: { type: "string", minLength: 1 },
          message: { type: "string" },
        },
        required: ["source"],
        additionalProperties: false,
      },
      default: [],
    },
  },
  required: [],
  additionalProperties: false,
};
