export type LogLevel = "silent" | "error" | "warn" | "info" | "debug" | "trace";

export interface LoggerOptions {
  level?: LogLevel;
  prefix?: string;
  /** Fields added to every line, e.g. { jobId } */
  bindings?: Record<string, unknown>;
}

export interface ResolvedLoggerOptions {
  level: LogLevel;
  prefix: string;
  bindings: Record<string, unknown>;
}

export interface Logger {
  options: ResolvedLoggerOptions;
  isEnabled(level: LogLevel): boolean;
  /** Logger with the same level and extra bound fields */
  child(bindings: Record<string, unknown>): Logger;
  error(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  trace(message: string, meta?: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5,
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const resolved = resolveLoggerOptions(options);
  const isEnabled = (level: LogLevel) =>
    level !== "silent" && LEVEL_ORDER[level] <= LEVEL_ORDER[resolved.level];

  const log = (level: LogLevel, message: string, meta?: Record<string, unknown>) => {
    if (!isEnabled(level)) return;

    const prefix = `[${resolved.prefix}]`;
    const levelTag = `[${level.toUpperCase()}]`;
    const fields = { ...resolved.bindings, ...meta };
    const metaText = Object.keys(fields).length > 0 ? ` ${sanitizeForLog(fields, 2000)}` : "";
    const line = `${new Date().toISOString()} ${prefix} ${levelTag} ${message}${metaText}`;

    switch (level) {
      case "error":
        console.error(line);
        break;
      case "warn":
        console.warn(line);
        break;
      case "info":
        console.info(line);
        break;
      default:
        console.log(line);
        break;
    }
  };

  return {
    options: resolved,
    isEnabled,
    child: (bindings) =>
      createLogger({
        level: resolved.level,
        prefix: resolved.prefix,
        bindings: { ...resolved.bindings, ...bindings },
      }),
    error: (message, meta) => log("error", message, meta),
    warn: (message, meta) => log("warn", message, meta),
    info: (message, meta) => log("info", message, meta),
    debug: (message, meta) => log("debug", message, meta),
    trace: (message, meta) => log("trace", message, meta),
  };
}

export function resolveLoggerOptions(options: LoggerOptions = {}): ResolvedLoggerOptions {
  return {
    level: options.level ?? parseEnvLogLevel() ?? "info",
    prefix: options.prefix ?? "pages-agent",
    bindings: options.bindings ?? {},
  };
}

export function sanitizeForLog(value: unknown, maxLen = 500): string {
  const str = safeStringify(value, maxLen);
  return str.replace(
    /"(password|token|secret|key|auth|apiKey)":\s*"[^"]*"/gi,
    "\"$1\":\"[REDACTED]\"",
  );
}

export function summarizeForLog(value: unknown, maxLen = 200): string {
  if (value === null) return "null";
  if (value === undefined) return "undefined";
  if (typeof value === "string") {
    return value.length > maxLen ? `${value.slice(0, maxLen)}...` : value;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  if (Array.isArray(value)) {
    return `Array(${value.length})`;
  }
  if (typeof value === "object") {
    const keys = Object.keys(value);
    const shown = keys.slice(0, 5).join(", ");
    return `Object(keys: ${shown}${keys.length > 5 ? ", ..." : ""})`;
  }
  return String(value);
}

function safeStringify(value: unknown, maxLen: number): string {
  try {
    const json = JSON.stringify(value, (_key, v: unknown) =>
      v instanceof Error ? { name: v.name, message: v.message, stack: v.stack } : v,
    );
    if (!json) return String(value);
    return json.length > maxLen ? `${json.slice(0, maxLen)}...` : json;
  } catch {
    const fallback = String(value);
    return fallback.length > maxLen ? `${fallback.slice(0, maxLen)}...` : fallback;
  }
}

export function parseLogLevel(raw: string | undefined): LogLevel | undefined {
  if (!raw) return undefined;
  const value = raw.trim().toLowerCase();
  if (!value || value === "0" || value === "false" || value === "off") {
    return "silent";
  }
  if (value.includes("trace")) return "trace";
  if (value.includes("debug") || value === "1" || value === "true" || value === "yes") {
    return "debug";
  }
  if (value.includes("info")) return "info";
  if (value.includes("warn")) return "warn";
  if (value.includes("error")) return "error";
  if (value.includes("silent")) return "silent";
  return "debug";
}

function parseEnvLogLevel(): LogLevel | undefined {
  return parseLogLevel(process.env.PAGES_AGENT_LOG_LEVEL ?? process.env.DEBUG);
}
