import { lstat, mkdir, readdir, readFile, rm, stat, writeFile } from "node:fs/promises";
import { dirname, join, relative, resolve, sep } from "node:path";
import { createTaggedError } from "../core/Retry.js";
import { normalizeArtifactPath } from "../security/paths.js";
import type { ExistingArtifact, GeneratedArtifact } from "../types/Artifact.js";

export interface WorkspaceOptions {
  /** Text files above this size are listed without content (default: 256 KiB) */
  maxTextBytes?: number;
}

/**
 * Working namespace of one task slug: `<workRoot>/<slug>`.
 *
 * Holds the files currently believed to be published. Round 1 starts it
 * empty; later rounds keep what is there and overwrite by path.
 */
export class Workspace {
  readonly dir: string;
  private readonly maxTextBytes: number;

  constructor(workRoot: string, slug: string, options: WorkspaceOptions = {}) {
    this.dir = resolve(workRoot, slug);
    this.maxTextBytes = options.maxTextBytes ?? 256 * 1024;
  }

  /**
   * Create the directory. `fresh` wipes anything left from earlier runs.
   */
  async prepare(fresh: boolean): Promise<void> {
    if (fresh) {
      await rm(this.dir, { recursive: true, force: true });
    }
    await mkdir(this.dir, { recursive: true });
  }

  /**
   * Files present in the namespace, sorted by path. `.git` is skipped.
   */
  async listExisting(): Promise<ExistingArtifact[]> {
    const out: ExistingArtifact[] = [];

    const walk = async (current: string): Promise<void> => {
      let entries;
      try {
        entries = await readdir(current, { withFileTypes: true });
      } catch (err) {
        if (isNotFound(err)) return;
        throw err;
      }
      for (const entry of entries) {
        const full = join(current, entry.name);
        if (entry.isDirectory()) {
          if (entry.name === ".git") continue;
          await walk(full);
        } else if (entry.isFile()) {
          const path = relative(this.dir, full).split(sep).join("/");
          const { size } = await stat(full);
          out.push({ path, bytes: size, text: await this.readText(full, size) });
        }
      }
    };

    await walk(this.dir);
    return out.sort((a, b) => a.path.localeCompare(b.path));
  }

  /**
   * Write artifacts, replacing files with the same path.
   * Returns the repository paths written.
   */
  async writeArtifacts(artifacts: GeneratedArtifact[]): Promise<string[]> {
    const written: string[] = [];
    for (const artifact of artifacts) {
      const path = normalizeArtifactPath(artifact.path);
      const target = await this.targetFor(path);
      await mkdir(dirname(target), { recursive: true });
      await writeFile(target, artifact.content);
      written.push(path);
    }
    return written;
  }

  /**
   * Absolute file for a normalized path. Existing symlinks along the way
   * are refused so a write cannot land outside the namespace.
   */
  private async targetFor(path: string): Promise<string> {
    const segments = path.split("/");
    const target = resolve(this.dir, ...segments);
    if (!target.startsWith(this.dir + sep)) {
      throw createTaggedError("INVALID_ARTIFACT_PATH", `Invalid artifact path "${path}": outside ${this.dir}`, {
        inputPath: path,
      });
    }

    let current = this.dir;
    for (const segment of segments) {
      current = join(current, segment);
      let isLink: boolean;
      try {
        isLink = (await lstat(current)).isSymbolicLink();
      } catch (err) {
        if (isNotFound(err)) break;
        throw err;
      }
      if (isLink) {
        throw createTaggedError("INVALID_ARTIFACT_PATH", `Invalid artifact path "${path}": "${segment}" is a symbolic link`, {
          inputPath: path,
        });
      }
    }
    return target;
  }

  private async readText(full: string, size: number): Promise<string | undefined> {
    if (size > this.maxTextBytes) return undefined;
    const bytes = await readFile(full);
    // NUL bytes mean binary
    if (bytes.includes(0)) return undefined;
    return bytes.toString("utf-8");
  }
}

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}
