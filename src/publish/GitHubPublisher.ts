import { fetchWithTimeout, isRecord, readJsonBody } from "../core/http.js";
import { createTaggedError, errorKind, errorMessage } from "../core/Retry.js";
import { createLogger, type Logger } from "../observability/Logger.js";
import type { PublicEndpoints } from "../types/JobOutcome.js";
import {
  uploadDirectoryFiles,
  type PublishCallOptions,
  type Publisher,
  type RepositoryHandle,
  type UploadResult,
} from "./Publisher.js";

export interface GitHubPublisherConfig {
  token: string;
  /** Default: https://api.github.com */
  apiBaseUrl?: string;
  /** Per request (default: 30000) */
  timeoutMs?: number;
  /** Description set on new repositories */
  description?: string;
  logger?: Logger;
}

interface ApiResponse {
  status: number;
  body: unknown;
}

const API_VERSION = "2022-11-28";

/**
 * Publisher over the GitHub REST API, acting as the token's user.
 */
export class GitHubPublisher implements Publisher {
  private readonly token: string;
  private readonly apiBaseUrl: string;
  private readonly timeoutMs: number;
  private readonly description: string;
  private readonly logger: Logger;
  private login?: Promise<string>;

  constructor(config: GitHubPublisherConfig) {
    this.token = config.token;
    this.apiBaseUrl = (config.apiBaseUrl ?? "https://api.github.com").replace(/\/$/, "");
    this.timeoutMs = config.timeoutMs ?? 30_000;
    this.description = config.description ?? "Static site published by pages-agent";
    this.logger = config.logger ?? createLogger({ prefix: "github" });
  }

  async getRepository(name: string, options?: PublishCallOptions): Promise<RepositoryHandle | undefined> {
    const owner = await this.owner(options);
    const res = await this.call("GET", `/repos/${owner}/${encodeURIComponent(name)}`, undefined, options, [200, 404]);
    return res.status === 404 ? undefined : toHandle(res.body, owner, name);
  }

  async createRepository(name: string, options?: PublishCallOptions): Promise<RepositoryHandle> {
    const owner = await this.owner(options);
    const res = await this.call(
      "POST",
      "/user/repos",
      { name, description: this.description, private: false, auto_init: true },
      options,
      [201, 422],
    );
    if (res.status === 201) {
      this.logger.info("github.repo_created", { repo: name });
      return toHandle(res.body, owner, name);
    }

    // 422: name already taken on this account
    const existing = await this.getRepository(name, options);
    if (!existing) {
      throw createTaggedError("PUBLISHING_ERROR", `Could not create repository "${name}": ${describe(res.body)}`, {
        status: res.status,
      });
    }
    this.logger.info("github.repo_exists", { repo: name });
    return existing;
  }

  async uploadFile(
    repo: RepositoryHandle,
    path: string,
    content: string | Buffer,
    message: string,
    options?: PublishCallOptions,
  ): Promise<UploadResult> {
    const contentsPath = `/repos/${repo.owner}/${encodeURIComponent(repo.name)}/contents/${encodePath(path)}`;
    const branch = repo.defaultBranch;

    const current = await this.call(
      "GET",
      `${contentsPath}?ref=${encodeURIComponent(branch)}`,
      undefined,
      options,
      [200, 404],
    );
    const sha = current.status === 200 && isRecord(current.body) && typeof current.body.sha === "string"
      ? current.body.sha
      : undefined;

    const encoded = (typeof content === "string" ? Buffer.from(content, "utf-8") : content).toString("base64");
    const res = await this.call(
      "PUT",
      contentsPath,
      { message, content: encoded, branch, ...(sha ? { sha } : {}) },
      options,
      [200, 201],
    );

    const commit = isRecord(res.body) && isRecord(res.body.commit) ? res.body.commit : undefined;
    const action = sha ? "updated" : "created";
    this.logger.debug("github.file_uploaded", { repo: repo.name, path, action });
    return {
      path,
      action,
      commitSha: commit && typeof commit.sha === "string" ? commit.sha : undefined,
    };
  }

  async uploadDirectory(
    repo: RepositoryHandle,
    localPath: string,
    options?: PublishCallOptions,
  ): Promise<UploadResult[]> {
    return uploadDirectoryFiles(this, repo, localPath, options);
  }

  async enableStaticHosting(repo: RepositoryHandle, branch: string, options?: PublishCallOptions): Promise<void> {
    const res = await this.call(
      "POST",
      `/repos/${repo.owner}/${encodeURIComponent(repo.name)}/pages`,
      { source: { branch, path: "/" } },
      options,
      [201, 409],
    );
    this.logger.info(res.status === 201 ? "github.pages_enabled" : "github.pages_already_enabled", {
      repo: repo.name,
    });
  }

  async getPublicEndpoints(repo: RepositoryHandle, options?: PublishCallOptions): Promise<PublicEndpoints> {
    const base = `/repos/${repo.owner}/${encodeURIComponent(repo.name)}`;
    const commit = await this.call(
      "GET",
      `${base}/commits/${encodeURIComponent(repo.defaultBranch)}`,
      undefined,
      options,
      [200],
    );
    const commitSha = isRecord(commit.body) && typeof commit.body.sha === "string" ? commit.body.sha : "";

    const pages = await this.call("GET", `${base}/pages`, undefined, options, [200, 404]);
    const pagesUrl = pages.status === 200 && isRecord(pages.body) && typeof pages.body.html_url === "string"
      ? pages.body.html_url
      : `https://${repo.owner}.github.io/${repo.name}/`;

    return { repoUrl: repo.htmlUrl, pagesUrl, commitSha };
  }

  private owner(options?: PublishCallOptions): Promise<string> {
    if (!this.login) {
      const pending = this.call("GET", "/user", undefined, options, [200]).then((res) => {
        if (isRecord(res.body) && typeof res.body.login === "string") return res.body.login;
        throw createTaggedError("PUBLISHING_ERROR", "GitHub /user response has no login");
      });
      // Forget failures so the next call asks again
      void pending.catch(() => {
        this.login = undefined;
      });
      this.login = pending;
    }
    return this.login;
  }

  /**
   * One API request. Statuses outside `expected` become PUBLISHING_ERROR.
   */
  private async call(
    method: string,
    path: string,
    body: object | undefined,
    options: PublishCallOptions | undefined,
    expected: number[],
  ): Promise<ApiResponse> {
    let response: Response;
    try {
      response = await fetchWithTimeout(
        `${this.apiBaseUrl}${path}`,
        {
          method,
          headers: {
            Authorization: `Bearer ${this.token}`,
            Accept: "application/vnd.github+json",
            "X-GitHub-Api-Version": API_VERSION,
            ...(body ? { "Content-Type": "application/json" } : {}),
          },
          body: body ? JSON.stringify(body) : undefined,
        },
        { timeoutMs: this.timeoutMs, signal: options?.signal },
      );
    } catch (err) {
      if (errorKind(err) === "DEADLINE_EXCEEDED") throw err;
      throw createTaggedError("PUBLISHING_ERROR", `GitHub ${method} ${path} failed: ${errorMessage(err)}`);
    }

    const parsed = await readJsonBody(response);
    if (!expected.includes(response.status)) {
      this.logger.warn("github.request_failed", { method, path, status: response.status });
      throw createTaggedError(
        "PUBLISHING_ERROR",
        `GitHub ${method} ${path} returned ${response.status}: ${describe(parsed)}`,
        { status: response.status },
      );
    }
    return { status: response.status, body: parsed };
  }
}

function toHandle(body: unknown, owner: string, name: string): RepositoryHandle {
  const record = isRecord(body) ? body : {};
  return {
    owner,
    name: typeof record.name === "string" ? record.name : name,
    htmlUrl: typeof record.html_url === "string" ? record.html_url : `https://github.com/${owner}/${name}`,
    defaultBranch: typeof record.default_branch === "string" ? record.default_branch : "main",
  };
}

function encodePath(path: string): string {
  return path.split("/").map(encodeURIComponent).join("/");
}

function describe(body: unknown): string {
  if (isRecord(body) && typeof body.message === "string") return body.message;
  return body === undefined ? "(empty body)" : JSON.stringify(body);
}
