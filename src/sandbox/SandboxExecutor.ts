import { mkdtemp, rm, writeFile, readdir, lstat, readFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join, relative, sep } from "node:path";
import { errorMessage } from "../core/Retry.js";
import { createLogger, type Logger } from "../observability/Logger.js";
import type { ToolError } from "../types/ToolResult.js";
import type { AttachmentInput } from "../types/TaskRequest.js";
import { decodeAttachment } from "./attachments.js";
import { runProcess, type ProcessResult } from "./runProcess.js";
import {
  createRuntime,
  DEFAULT_RUNTIME_COMMANDS,
  type RuntimeCommands,
  type SandboxLanguage,
  type SandboxRuntime,
} from "./runtimes.js";

/**
 * One script execution request.
 */
export interface SandboxRequest {
  code: string;
  language?: SandboxLanguage;
  /** Package specs, e.g. ["matplotlib==3.8.0"] or ["lodash@4"] */
  dependencies?: string[];
  attachments?: AttachmentInput[];
  /** Overrides the executor's default run timeout, never raising it */
  timeoutMs?: number;
  signal?: AbortSignal;
}

export type SandboxStatus = "ok" | "error" | "timeout" | "setup_error";

/**
 * A file that appeared in the sandbox during the run.
 */
export interface ProducedFile {
  /** Posix path relative to the sandbox root */
  path: string;
  bytes: number;
  /** Omitted when the file exceeds maxFileBytes */
  content?: Buffer;
}

/**
 * An attachment left out of the sandbox directory.
 */
export interface SkippedAttachment {
  name: string;
  reason: string;
}

export interface SandboxResult {
  status: SandboxStatus;
  exitCode: number | null;
  stdout: string;
  stderr: string;
  durationMs: number;
  files: ProducedFile[];
  /** Present when some attachments could not be written */
  skippedAttachments?: SkippedAttachment[];
  error?: ToolError;
}

export interface SandboxConfig {
  /** Per-run timeout (default: 10000) */
  timeoutMs?: number;
  /** Dependency installation timeout (default: 120000) */
  installTimeoutMs?: number;
  /** Cap per output stream (default: 64 KiB) */
  maxOutputBytes?: number;
  /** Produced files above this size are listed without content (default: 5 MiB) */
  maxFileBytes?: number;
  /** Parent of the per-run directories (default: os.tmpdir()) */
  tmpRoot?: string;
  runtimes?: Partial<Record<SandboxLanguage, RuntimeCommands>>;
  logger?: Logger;
}

const DIR_PREFIX = "pages-agent-sandbox-";

/**
 * Runs generated scripts in throwaway directories.
 *
 * Every call gets its own directory, created with mkdtemp and removed once the
 * produced files have been read into memory. Dependency problems come back as
 * `setup_error`, never as a thrown error. Attachments that cannot be decoded
 * are left out and listed in `skippedAttachments`; the script still runs.
 */
export class SandboxExecutor {
  private readonly timeoutMs: number;
  private readonly installTimeoutMs: number;
  private readonly maxOutputBytes: number;
  private readonly maxFileBytes: number;
  private readonly tmpRoot: string;
  private readonly runtimes: Record<SandboxLanguage, SandboxRuntime>;
  private readonly logger: Logger;

  constructor(config: SandboxConfig = {}) {
    this.timeoutMs = config.timeoutMs ?? 10_000;
    this.installTimeoutMs = config.installTimeoutMs ?? 120_000;
    this.maxOutputBytes = config.maxOutputBytes ?? 64 * 1024;
    this.maxFileBytes = config.maxFileBytes ?? 5 * 1024 * 1024;
    this.tmpRoot = config.tmpRoot ?? tmpdir();
    this.runtimes = {
      python: createRuntime("python", { ...DEFAULT_RUNTIME_COMMANDS.python, ...config.runtimes?.python }),
      node: createRuntime("node", { ...DEFAULT_RUNTIME_COMMANDS.node, ...config.runtimes?.node }),
    };
    this.logger = config.logger ?? createLogger({ prefix: "sandbox" });
  }

  async execute(request: SandboxRequest): Promise<SandboxResult> {
    const runtime = this.runtimes[request.language ?? "python"];
    const startTime = Date.now();
    const dir = await mkdtemp(join(this.tmpRoot, DIR_PREFIX));
    this.logger.debug("sandbox.start", { dir, language: runtime.language });

    try {
      const skipped = await this.writeInputs(dir, runtime, request);
      const withSkipped = (result: SandboxResult): SandboxResult =>
        skipped.length > 0 ? { ...result, skippedAttachments: skipped } : result;

      const setupFailure = await this.installDependencies(dir, runtime, request);
      if (setupFailure) {
        return withSkipped(this.setupError(setupFailure.message, setupFailure.stderr, startTime));
      }

      const initial = new Set(await this.listFiles(dir, runtime));
      const timeoutMs = Math.min(request.timeoutMs ?? this.timeoutMs, this.timeoutMs);
      const run = await runProcess(runtime.run(dir), {
        cwd: dir,
        env: this.environment(dir, runtime),
        timeoutMs,
        maxOutputBytes: this.maxOutputBytes,
        signal: request.signal,
      });

      const files = await this.collectProduced(dir, runtime, initial);
      return withSkipped(this.toResult(run, files, timeoutMs, startTime));
    } finally {
      await rm(dir, { recursive: true, force: true }).catch((err: unknown) => {
        this.logger.warn("sandbox.cleanup_failed", { dir, error: errorMessage(err) });
      });
    }
  }

  /**
   * Write the decodable attachments and the script. Returns the attachments
   * that were left out.
   */
  private async writeInputs(
    dir: string,
    runtime: SandboxRuntime,
    request: SandboxRequest,
  ): Promise<SkippedAttachment[]> {
    const skipped: SkippedAttachment[] = [];
    for (const attachment of request.attachments ?? []) {
      if (attachment.name === runtime.scriptName) {
        skipped.push({ name: attachment.name, reason: "name is reserved for the script" });
        continue;
      }
      try {
        const decoded = decodeAttachment(attachment);
        await writeFile(join(dir, decoded.name), decoded.data);
      } catch (err) {
        skipped.push({ name: attachment.name, reason: errorMessage(err) });
      }
    }
    if (skipped.length > 0) {
      this.logger.debug("sandbox.attachments_skipped", { skipped });
    }

    await writeFile(join(dir, runtime.scriptName), request.code, "utf-8");
    return skipped;
  }

  /**
   * Install declared dependencies. Returns a description of the failure, or
   * undefined when ready.
   */
  private async installDependencies(
    dir: string,
    runtime: SandboxRuntime,
    request: SandboxRequest,
  ): Promise<{ message: string; stderr: string } | undefined> {
    const dependencies = (request.dependencies ?? []).map((d) => d.trim()).filter(Boolean);
    if (dependencies.length === 0) return undefined;

    const invalid = dependencies.filter((d) => !runtime.isValidDependency(d));
    if (invalid.length > 0) {
      return { message: `dependency setup failed: invalid package name(s): ${invalid.join(", ")}`, stderr: "" };
    }

    const install = await runProcess(runtime.install(dir, dependencies), {
      cwd: dir,
      env: this.environment(dir, runtime),
      timeoutMs: this.installTimeoutMs,
      maxOutputBytes: this.maxOutputBytes,
      signal: request.signal,
    });
    if (install.spawnError) {
      return { message: `dependency setup failed: ${install.spawnError}`, stderr: install.stderr };
    }
    if (install.timedOut) {
      return { message: `dependency setup failed: installation timed out after ${this.installTimeoutMs}ms`, stderr: install.stderr };
    }
    if (install.exitCode !== 0) {
      return { message: `dependency setup failed: installer exited with code ${install.exitCode}`, stderr: install.stderr };
    }
    return undefined;
  }

  private environment(dir: string, runtime: SandboxRuntime): Record<string, string> {
    return {
      PATH: process.env.PATH ?? "/usr/local/bin:/usr/bin:/bin",
      HOME: dir,
      LANG: "C.UTF-8",
      ...runtime.env(dir),
    };
  }

  /**
   * Regular files under `dir`, skipping environment directories and symlinks.
   */
  private async listFiles(dir: string, runtime: SandboxRuntime): Promise<string[]> {
    const skip = new Set(runtime.environmentDirs);
    const out: string[] = [];

    const walk = async (current: string): Promise<void> => {
      const entries = await readdir(current, { withFileTypes: true });
      for (const entry of entries) {
        const full = join(current, entry.name);
        if (entry.isSymbolicLink()) continue;
        if (entry.isDirectory()) {
          if (current === dir && skip.has(entry.name)) continue;
          await walk(full);
        } else if (entry.isFile()) {
          out.push(relative(dir, full).split(sep).join("/"));
        }
      }
    };

    await walk(dir);
    return out.sort();
  }

  private async collectProduced(
    dir: string,
    runtime: SandboxRuntime,
    initial: Set<string>,
  ): Promise<ProducedFile[]> {
    const produced: ProducedFile[] = [];
    for (const path of await this.listFiles(dir, runtime)) {
      if (initial.has(path)) continue;
      const full = join(dir, path);
      const { size } = await lstat(full);
      produced.push(
        size > this.maxFileBytes
          ? { path, bytes: size }
          : { path, bytes: size, content: await readFile(full) },
      );
    }
    return produced;
  }

  private toResult(
    run: ProcessResult,
    files: ProducedFile[],
    timeoutMs: number,
    startTime: number,
  ): SandboxResult {
    const base = {
      exitCode: run.exitCode,
      stdout: run.stdout,
      stderr: run.stderr,
      durationMs: Date.now() - startTime,
      files,
    };

    if (run.spawnError) {
      return {
        ...base,
        status: "setup_error",
        error: { kind: "SETUP_ERROR", message: `could not start interpreter: ${run.spawnError}` },
      };
    }
    if (run.timedOut) {
      return {
        ...base,
        status: "timeout",
        error: { kind: "EXECUTION_TIMEOUT", message: `script exceeded ${timeoutMs}ms and was killed` },
      };
    }
    if (run.aborted) {
      return {
        ...base,
        status: "error",
        error: { kind: "DEADLINE_EXCEEDED", message: "execution aborted" },
      };
    }
    if (run.exitCode !== 0) {
      return { ...base, status: "error" };
    }
    return { ...base, status: "ok" };
  }

  private setupError(message: string, stderr: string, startTime: number): SandboxResult {
    this.logger.debug("sandbox.setup_error", { message });
    return {
      status: "setup_error",
      exitCode: null,
      stdout: "",
      stderr,
      durationMs: Date.now() - startTime,
      files: [],
      error: { kind: "SETUP_ERROR", message },
    };
  }
}
