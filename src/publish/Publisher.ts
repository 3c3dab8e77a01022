import { readdir, readFile } from "node:fs/promises";
import { join, relative, sep } from "node:path";
import type { PublicEndpoints } from "../types/JobOutcome.js";

/**
 * A remote repository a site is published to.
 */
export interface RepositoryHandle {
  owner: string;
  name: string;
  htmlUrl: string;
  defaultBranch: string;
}

export interface UploadResult {
  path: string;
  action: "created" | "updated";
  /** Commit created by the upload, when the remote reports one */
  commitSha?: string;
}

export interface PublishCallOptions {
  signal?: AbortSignal;
}

/**
 * Remote repository and static hosting operations.
 * Every method may fail with a PUBLISHING_ERROR-tagged error.
 */
export interface Publisher {
  createRepository(name: string, options?: PublishCallOptions): Promise<RepositoryHandle>;
  /** Undefined when no repository of that name exists */
  getRepository(name: string, options?: PublishCallOptions): Promise<RepositoryHandle | undefined>;
  uploadFile(
    repo: RepositoryHandle,
    path: string,
    content: string | Buffer,
    message: string,
    options?: PublishCallOptions,
  ): Promise<UploadResult>;
  /** Upload every file under `localPath`, keeping relative paths */
  uploadDirectory(repo: RepositoryHandle, localPath: string, options?: PublishCallOptions): Promise<UploadResult[]>;
  enableStaticHosting(repo: RepositoryHandle, branch: string, options?: PublishCallOptions): Promise<void>;
  getPublicEndpoints(repo: RepositoryHandle, options?: PublishCallOptions): Promise<PublicEndpoints>;
}

/**
 * Files under `root` as repository paths, `.git` excluded.
 */
export async function listUploadableFiles(root: string): Promise<string[]> {
  const out: string[] = [];
  const walk = async (current: string): Promise<void> => {
    for (const entry of await readdir(current, { withFileTypes: true })) {
      const full = join(current, entry.name);
      if (entry.isDirectory()) {
        if (entry.name !== ".git") await walk(full);
      } else if (entry.isFile()) {
        out.push(relative(root, full).split(sep).join("/"));
      }
    }
  };
  await walk(root);
  return out.sort();
}

/**
 * uploadDirectory in terms of uploadFile, one commit per file.
 */
export async function uploadDirectoryFiles(
  publisher: Pick<Publisher, "uploadFile">,
  repo: RepositoryHandle,
  localPath: string,
  options?: PublishCallOptions,
): Promise<UploadResult[]> {
  const results: UploadResult[] = [];
  for (const path of await listUploadableFiles(localPath)) {
    const content = await readFile(join(localPath, ...path.split("/")));
    results.push(await publisher.uploadFile(repo, path, content, `Upload ${path}`, options));
  }
  return results;
}
