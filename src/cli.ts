#!/usr/bin/env node
/**
 * CLI for pages-agent.
 * Usage: pages-agent <command> [options]
 * Commands: serve | publish | help
 */

import fs from "node:fs/promises";
import type { Server } from "node:http";
import { fileURLToPath } from "node:url";
import { loadAppConfig, DEFAULT_CONFIG_FILE, type AppConfig } from "./config/AppConfig.js";
import { errorMessage } from "./core/Retry.js";
import { JobManager } from "./jobs/JobManager.js";
import { JobSupervisor } from "./jobs/JobSupervisor.js";
import { Workspace } from "./jobs/Workspace.js";
import { OpenAICompatibleClient } from "./llm/OpenAICompatibleClient.js";
import { SiteAgent } from "./llm/SiteAgent.js";
import { EventLog } from "./observability/EventLog.js";
import { createLogger, type Logger } from "./observability/Logger.js";
import { Metrics } from "./observability/Metrics.js";
import { GitHubPublisher } from "./publish/GitHubPublisher.js";
import { ResultReporter } from "./report/ResultReporter.js";
import { SandboxExecutor } from "./sandbox/SandboxExecutor.js";
import { DuckDuckGoSearchProvider } from "./search/WebSearch.js";
import { createApp } from "./server/createApp.js";
import { slugifyTaskName } from "./types/TaskRequest.js";

interface CliArgs {
  command: "serve" | "publish" | "help";
  configPath?: string;
  slug?: string;
  help: boolean;
}

function parseArgv(argv: string[]): CliArgs {
  const args = argv.slice(2);
  let command: CliArgs["command"] = "help";
  let configPath: string | undefined;
  let slug: string | undefined;
  let help = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--help" || arg === "-h") {
      help = true;
    } else if (arg === "--config" || arg === "-c") {
      configPath = args[++i] ?? "";
    } else if (arg === "--slug" || arg === "-s") {
      slug = args[++i] ?? "";
    } else if (arg && !arg.startsWith("-")) {
      if (arg === "serve" || arg === "publish" || arg === "help") {
        command = arg;
      }
    }
  }

  return { command, configPath, slug, help };
}

function printHelp(): void {
  const bin = "pages-agent";
  process.stdout.write(`
Usage: ${bin} <command> [options]

Commands:
  serve     Start the task intake server.
  publish   Upload an existing working directory and enable Pages for it.

Options:
  --config, -c <path>   Config file path (default: ./${DEFAULT_CONFIG_FILE}, optional).
  --slug, -s <slug>     For 'publish': the task slug to republish.
  --help, -h            Show this help.

Environment:
  AIMODEL_NAME, LLM_BASE_URL, LLM_API_KEY, GITHUB_ACCESS_TOKEN, GFORM_SECRET,
  PORT, HOST, WORK_ROOT, PAGES_AGENT_LOG_LEVEL

Examples:
  ${bin} serve
  ${bin} serve -c ./${DEFAULT_CONFIG_FILE}
  ${bin} publish --slug my-site
`);
}

function createPublisher(config: AppConfig, logger: Logger): GitHubPublisher {
  return new GitHubPublisher({
    token: config.github.token,
    apiBaseUrl: config.github.apiBaseUrl,
    timeoutMs: config.github.timeoutMs,
    logger: logger.child({ component: "github" }),
  });
}

/**
 * Wire every service from config.
 */
export function createServices(config: AppConfig) {
  const logger = createLogger({ level: config.logging.level });
  const events = new EventLog();
  const metrics = new Metrics();

  const sandbox = new SandboxExecutor({
    timeoutMs: config.sandbox.timeoutMs,
    installTimeoutMs: config.sandbox.installTimeoutMs,
    maxOutputBytes: config.sandbox.maxOutputBytes,
    maxFileBytes: config.sandbox.maxFileBytes,
    runtimes: {
      python: { command: config.sandbox.pythonCommand, installCommand: config.sandbox.pythonCommand },
      ...(config.sandbox.nodeCommand ? { node: { command: config.sandbox.nodeCommand, installCommand: "npm" } } : {}),
    },
    logger: logger.child({ component: "sandbox" }),
  });

  const agent = new SiteAgent(
    {
      llm: new OpenAICompatibleClient({
        baseUrl: config.llm.baseUrl,
        model: config.llm.model,
        apiKey: config.llm.apiKey,
      }),
      sandbox,
      search: new DuckDuckGoSearchProvider({
        endpoint: config.search.endpoint,
        timeoutMs: config.search.timeoutMs,
      }),
      logger: logger.child({ component: "agent" }),
      events,
      metrics,
    },
    { maxSteps: config.llm.maxSteps, llmTimeoutMs: config.llm.timeoutMs },
  );

  const reporter = new ResultReporter({
    ...config.reporter,
    logger: logger.child({ component: "reporter" }),
    events,
    metrics,
  });

  const supervisor = new JobSupervisor(
    {
      generator: agent,
      publisher: createPublisher(config, logger),
      reporter,
      logger: logger.child({ component: "supervisor" }),
      events,
      metrics,
    },
    {
      workRoot: config.jobs.workRoot,
      deadlineMs: config.jobs.deadlineMs,
      toolLimits: { search: config.tools.searchLimit, exec: config.tools.execLimit },
    },
  );

  const manager = new JobManager(supervisor, reporter, {
    maxConcurrent: config.jobs.maxConcurrent,
    maxQueued: config.jobs.maxQueued,
    logger: logger.child({ component: "jobs" }),
    events,
  });

  const app = createApp({
    intake: manager,
    secret: config.intake.secret,
    model: config.llm.model,
    logger: logger.child({ component: "server" }),
    events,
    metrics,
  });

  return { logger, events, metrics, manager, app };
}

async function cmdServe(config: AppConfig): Promise<number> {
  const { logger, manager, app } = createServices(config);
  const { host, port } = config.server;

  const server = await new Promise<Server>((resolve, reject) => {
    const s = app.listen(port, host, () => resolve(s));
    s.once("error", reject);
  });
  logger.info("server.listening", { host, port, model: config.llm.model, workRoot: config.jobs.workRoot });

  return new Promise<number>((resolve) => {
    const shutdown = (signal: string) => {
      logger.info("server.shutdown", { signal });
      manager.dispose();
      server.close(() => resolve(0));
    };
    process.once("SIGINT", () => shutdown("SIGINT"));
    process.once("SIGTERM", () => shutdown("SIGTERM"));
  });
}

async function cmdPublish(config: AppConfig, slugArg: string | undefined): Promise<number> {
  const slug = slugifyTaskName(slugArg ?? "");
  if (!slug) {
    process.stderr.write("Error: publish needs --slug <slug>\n");
    return 1;
  }

  const workspace = new Workspace(config.jobs.workRoot, slug);
  try {
    await fs.access(workspace.dir);
  } catch {
    process.stderr.write(`Error: no working directory for "${slug}" at ${workspace.dir}\n`);
    return 1;
  }

  const logger = createLogger({ level: config.logging.level });
  const publisher = createPublisher(config, logger);
  const repo = (await publisher.getRepository(slug)) ?? (await publisher.createRepository(slug));
  const uploads = await publisher.uploadDirectory(repo, workspace.dir);
  await publisher.enableStaticHosting(repo, repo.defaultBranch);
  const endpoints = await publisher.getPublicEndpoints(repo);

  process.stdout.write(`Uploaded ${uploads.length} file(s) to ${repo.owner}/${repo.name}.\n`);
  process.stdout.write(`Repository: ${endpoints.repoUrl}\n`);
  process.stdout.write(`Pages:      ${endpoints.pagesUrl}\n`);
  process.stdout.write(`Commit:     ${endpoints.commitSha}\n`);
  return 0;
}

async function main(argv: string[] = process.argv): Promise<number> {
  const { command, configPath, slug, help } = parseArgv(argv);

  if (help || command === "help") {
    printHelp();
    return 0;
  }

  let config: AppConfig;
  try {
    ({ config } = await loadAppConfig({ configPath }));
  } catch (err) {
    process.stderr.write(`Error: ${errorMessage(err)}\n`);
    return 1;
  }

  switch (command) {
    case "serve":
      return cmdServe(config);
    case "publish":
      return cmdPublish(config, slug);
    default:
      printHelp();
      return 1;
  }
}

/** Run CLI with the given argv (same shape as process.argv). Exported for tests. */
export async function run(argv: string[]): Promise<number> {
  return main(argv);
}

const isMain =
  typeof process !== "undefined" &&
  process.argv[1] !== undefined &&
  process.argv[1] === fileURLToPath(import.meta.url);

if (isMain) {
  main()
    .then((code) => process.exit(code))
    .catch((err: unknown) => {
      process.stderr.write(`${errorMessage(err)}\n`);
      process.exit(1);
    });
}
