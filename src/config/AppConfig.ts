import fs from "node:fs/promises";
import path from "node:path";
import yaml from "js-yaml";
import { createTaggedError, errorMessage } from "../core/Retry.js";
import { SchemaValidator, SchemaValidationError } from "../core/SchemaValidator.js";
import { isRecord } from "../core/http.js";
import { parseLogLevel, type LogLevel } from "../observability/Logger.js";

/** Config file looked up in the working directory when no path is given. */
export const DEFAULT_CONFIG_FILE = "pages-agent.yaml";

export interface AppConfig {
  server: { host: string; port: number };
  llm: { model: string; baseUrl: string; apiKey?: string; timeoutMs: number; maxSteps: number };
  github: { token: string; apiBaseUrl: string; timeoutMs: number };
  intake: { secret: string };
  jobs: { workRoot: string; deadlineMs: number; maxConcurrent: number; maxQueued: number };
  tools: { searchLimit: number; execLimit: number };
  sandbox: {
    timeoutMs: number;
    installTimeoutMs: number;
    maxOutputBytes: number;
    maxFileBytes: number;
    pythonCommand: string;
    nodeCommand?: string;
  };
  reporter: { maxAttempts: number; baseDelayMs: number; maxDelayMs: number; attemptTimeoutMs: number };
  search: { endpoint: string; timeoutMs: number };
  logging: { level?: LogLevel };
}

export interface AppConfigLoadResult {
  /** Undefined when no file was read */
  configPath?: string;
  config: AppConfig;
}

export interface LoadAppConfigOptions {
  /** Explicit path; must exist */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

const positiveInt = (def: number) => ({ type: "integer", minimum: 1, default: def });

const APP_CONFIG_SCHEMA = {
  type: "object",
  properties: {
    server: {
      type: "object",
      properties: {
        host: { type: "string", default: "0.0.0.0" },
        port: { type: "integer", minimum: 0, maximum: 65535, default: 8000 },
      },
      default: {},
    },
    llm: {
      type: "object",
      properties: {
        model: { type: "string", default: "" },
        baseUrl: { type: "string", format: "uri", default: "https://api.openai.com/v1" },
        apiKey: { type: "string" },
        timeoutMs: positiveInt(120_000),
        maxSteps: positiveInt(12),
      },
      default: {},
    },
    github: {
      type: "object",
      properties: {
        token: { type: "string", default: "" },
        apiBaseUrl: { type: "string", format: "uri", default: "https://api.github.com" },
        timeoutMs: positiveInt(30_000),
      },
      default: {},
    },
    intake: {
      type: "object",
      properties: { secret: { type: "string", default: "" } },
      default: {},
    },
    jobs: {
      type: "object",
      properties: {
        workRoot: { type: "string", minLength: 1, default: "work" },
        deadlineMs: positiveInt(540_000),
        maxConcurrent: positiveInt(4),
        maxQueued: { type: "integer", minimum: 0, default: 100 },
      },
      default: {},
    },
    tools: {
      type: "object",
      properties: {
        searchLimit: { type: "integer", minimum: 0, default: 1 },
        execLimit: { type: "integer", minimum: 0, default: 4 },
      },
      default: {},
    },
    sandbox: {
      type: "object",
      properties: {
        timeoutMs: positiveInt(10_000),
        installTimeoutMs: positiveInt(120_000),
        maxOutputBytes: positiveInt(64 * 1024),
        maxFileBytes: positiveInt(5 * 1024 * 1024),
        pythonCommand: { type: "string", minLength: 1, default: "python3" },
        nodeCommand: { type: "string", minLength: 1 },
      },
      default: {},
    },
    reporter: {
      type: "object",
      properties: {
        maxAttempts: positiveInt(5),
        baseDelayMs: positiveInt(1000),
        maxDelayMs: positiveInt(16_000),
        attemptTimeoutMs: positiveInt(30_000),
      },
      default: {},
    },
    search: {
      type: "object",
      properties: {
        endpoint: { type: "string", format: "uri", default: "https://api.duckduckgo.com/" },
        timeoutMs: positiveInt(15_000),
      },
      default: {},
    },
    logging: {
      type: "object",
      properties: {
        level: { type: "string", enum: ["silent", "error", "warn", "info", "debug", "trace"] },
      },
      default: {},
    },
  },
  additionalProperties: false,
};

/**
 * Environment variables and the config keys they override.
 */
const ENV_OVERRIDES: Array<[env: string, section: string, key: string]> = [
  ["AIMODEL_NAME", "llm", "model"],
  ["LLM_BASE_URL", "llm", "baseUrl"],
  ["LLM_API_KEY", "llm", "apiKey"],
  ["GITHUB_ACCESS_TOKEN", "github", "token"],
  ["GFORM_SECRET", "intake", "secret"],
  ["PORT", "server", "port"],
  ["HOST", "server", "host"],
  ["WORK_ROOT", "jobs", "workRoot"],
];

/** Settings the service cannot start without, with the variable that sets each. */
const REQUIRED: Array<[label: string, read: (c: AppConfig) => string]> = [
  ["AIMODEL_NAME (llm.model)", (c) => c.llm.model],
  ["GITHUB_ACCESS_TOKEN (github.token)", (c) => c.github.token],
  ["GFORM_SECRET (intake.secret)", (c) => c.intake.secret],
];

const validator = new SchemaValidator();
const validateAppConfig = validator.compile<AppConfig>(APP_CONFIG_SCHEMA);

/**
 * Overlay environment variables on a raw config object.
 */
export function applyEnvOverrides(raw: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...raw };
  for (const [name, section, key] of ENV_OVERRIDES) {
    const value = env[name];
    if (value === undefined || value === "") continue;
    const current = merged[section];
    merged[section] = { ...(isRecord(current) ? current : {}), [key]: value };
  }
  const level = parseLogLevel(env.PAGES_AGENT_LOG_LEVEL);
  if (level) {
    const current = merged.logging;
    merged.logging = { ...(isRecord(current) ? current : {}), level };
  }
  return merged;
}

/**
 * Validate a raw config (file contents plus env overrides) and apply defaults.
 * Throws CONFIG_ERROR on schema errors or missing required settings.
 */
export function resolveAppConfig(raw: unknown, env: NodeJS.ProcessEnv = {}, baseDir = process.cwd()): AppConfig {
  if (raw !== undefined && raw !== null && !isRecord(raw)) {
    throw createTaggedError("CONFIG_ERROR", "Config must be a YAML mapping");
  }
  const merged = applyEnvOverrides(isRecord(raw) ? raw : {}, env);

  let config: AppConfig;
  try {
    config = validator.validateOrThrow(validateAppConfig, merged, "Invalid configuration");
  } catch (err) {
    if (err instanceof SchemaValidationError) {
      throw createTaggedError("CONFIG_ERROR", err.message, { errors: err.errors });
    }
    throw err;
  }

  const missing = REQUIRED.filter(([, read]) => !read(config).trim()).map(([label]) => label);
  if (missing.length > 0) {
    throw createTaggedError("CONFIG_ERROR", `Missing required settings: ${missing.join(", ")}`, { missing });
  }

  config.jobs.workRoot = path.resolve(baseDir, config.jobs.workRoot);
  return config;
}

/**
 * Load `pages-agent.yaml` (or the given file), overlay the environment and
 * validate. A missing default file is not an error; a missing explicit one is.
 */
export async function loadAppConfig(options: LoadAppConfigOptions = {}): Promise<AppConfigLoadResult> {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const explicit = options.configPath !== undefined;
  const resolvedPath = path.resolve(cwd, options.configPath ?? DEFAULT_CONFIG_FILE);

  let text: string | undefined;
  try {
    text = await fs.readFile(resolvedPath, "utf-8");
  } catch (err) {
    if (explicit || !isNotFound(err)) {
      throw createTaggedError("CONFIG_ERROR", `Cannot read config ${resolvedPath}: ${errorMessage(err)}`);
    }
  }

  if (text === undefined) {
    return { config: resolveAppConfig({}, env, cwd) };
  }

  let raw: unknown;
  try {
    raw = yaml.load(text);
  } catch (err) {
    throw createTaggedError("CONFIG_ERROR", `Invalid YAML in ${resolvedPath}: ${errorMessage(err)}`);
  }
  return { configPath: resolvedPath, config: resolveAppConfig(raw, env, path.dirname(resolvedPath)) };
}

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}
