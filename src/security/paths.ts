import { posix } from "node:path";
import { createTaggedError } from "../core/Retry.js";

/**
 * Check an artifact path and return it in canonical posix form.
 * Rejects absolute paths, traversal above the root, backslashes and
 * anything under `.git/`.
 */
export function normalizeArtifactPath(inputPath: string): string {
  const trimmed = inputPath.trim();
  const fail = (reason: string) =>
    createTaggedError("INVALID_ARTIFACT_PATH", `Invalid artifact path "${inputPath}": ${reason}`, {
      inputPath,
    });

  if (!trimmed) throw fail("empty path");
  if (trimmed.includes("\\")) throw fail("backslashes are not allowed");
  if (trimmed.includes("\0")) throw fail("NUL bytes are not allowed");
  if (posix.isAbsolute(trimmed) || /^[A-Za-z]:/.test(trimmed)) throw fail("absolute paths are not allowed");

  const normalized = posix.normalize(trimmed).replace(/^(\.\/)+/, "");
  if (normalized === "." || normalized === "" || normalized.endsWith("/")) {
    throw fail("path must name a file");
  }
  if (normalized === ".." || normalized.startsWith("../")) {
    throw fail("path escapes the repository root");
  }
  if (normalized.split("/").includes(".git")) {
    throw fail("paths inside .git are not allowed");
  }
  return normalized;
}
