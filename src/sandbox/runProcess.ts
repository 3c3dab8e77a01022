import { spawn } from "node:child_process";
import type { CommandLine } from "./runtimes.js";

export interface RunProcessOptions {
  cwd: string;
  env: Record<string, string>;
  timeoutMs: number;
  /** Cap per stream; the rest is dropped and marked */
  maxOutputBytes: number;
  signal?: AbortSignal;
}

export interface ProcessResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  aborted: boolean;
  /** Set when the process could not be started at all */
  spawnError?: string;
  durationMs: number;
}

/**
 * Bounded output buffer for one stream.
 */
class OutputBuffer {
  private readonly chunks: Buffer[] = [];
  private kept = 0;
  private dropped = 0;

  constructor(private readonly limit: number) {}

  push(chunk: Buffer): void {
    const room = this.limit - this.kept;
    if (room <= 0) {
      this.dropped += chunk.length;
      return;
    }
    const slice = chunk.length > room ? chunk.subarray(0, room) : chunk;
    this.chunks.push(slice);
    this.kept += slice.length;
    this.dropped += chunk.length - slice.length;
  }

  toString(): string {
    const text = Buffer.concat(this.chunks).toString("utf-8");
    return this.dropped > 0 ? `${text}\n[output truncated: ${this.dropped} bytes omitted]` : text;
  }
}

/**
 * Run a command to completion, killing its process group on timeout or abort.
 * Never rejects; failures to start are reported in `spawnError`.
 */
export function runProcess(cmd: CommandLine, options: RunProcessOptions): Promise<ProcessResult> {
  const startTime = Date.now();
  const stdout = new OutputBuffer(options.maxOutputBytes);
  const stderr = new OutputBuffer(options.maxOutputBytes);

  return new Promise<ProcessResult>((resolve) => {
    let timedOut = false;
    let aborted = false;
    let settled = false;

    const child = spawn(cmd.command, cmd.args, {
      cwd: options.cwd,
      env: options.env,
      stdio: ["ignore", "pipe", "pipe"],
      detached: process.platform !== "win32",
    });

    const kill = () => {
      if (child.pid === undefined || child.exitCode !== null) return;
      try {
        if (process.platform !== "win32") {
          process.kill(-child.pid, "SIGKILL");
        } else {
          child.kill("SIGKILL");
        }
      } catch {
        // Group already gone; fall back to the direct child
        child.kill("SIGKILL");
      }
    };

    const timer = setTimeout(() => {
      timedOut = true;
      kill();
    }, options.timeoutMs);

    const onAbort = () => {
      aborted = true;
      kill();
    };
    options.signal?.addEventListener("abort", onAbort, { once: true });
    if (options.signal?.aborted) onAbort();

    const finish = (exitCode: number | null, spawnError?: string) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      options.signal?.removeEventListener("abort", onAbort);
      resolve({
        exitCode,
        stdout: stdout.toString(),
        stderr: stderr.toString(),
        timedOut,
        aborted,
        spawnError,
        durationMs: Date.now() - startTime,
      });
    };

    child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));
    child.on("error", (err) => finish(null, err.message));
    child.on("close", (code) => finish(code));
  });
}
