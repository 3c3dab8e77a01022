import pTimeout from "p-timeout";
import { ToolCallBudget, type ToolCallLimits } from "../core/Budget.js";
import { createTaggedError, errorMessage } from "../core/Retry.js";
import type { GenerationInput, GenerationResult } from "../llm/SiteAgent.js";
import type { EventLog } from "../observability/EventLog.js";
import { createLogger, type Logger } from "../observability/Logger.js";
import type { Metrics } from "../observability/Metrics.js";
import type { Publisher, RepositoryHandle } from "../publish/Publisher.js";
import {
  buildCallbackPayload,
  type CallbackPayload,
  type DeliveryContext,
  type DeliveryResult,
} from "../report/ResultReporter.js";
import type { JobOutcome, JobState, PublicEndpoints } from "../types/JobOutcome.js";
import type { TaskRequest } from "../types/TaskRequest.js";
import { JobStateMachine } from "./JobStateMachine.js";
import { Workspace } from "./Workspace.js";

/** Produces artifacts for a task; implemented by SiteAgent. */
export interface SiteGenerator {
  run(input: GenerationInput): Promise<GenerationResult>;
}

/** Delivers outcomes; implemented by ResultReporter. */
export interface OutcomeReporter {
  deliver(callbackUrl: string, payload: CallbackPayload, context: DeliveryContext): Promise<DeliveryResult>;
}

export interface JobSupervisorDeps {
  generator: SiteGenerator;
  publisher: Publisher;
  reporter: OutcomeReporter;
  logger?: Logger;
  events?: EventLog;
  metrics?: Metrics;
}

export interface JobSupervisorOptions {
  /** Parent of the per-slug working namespaces */
  workRoot: string;
  /** Overall deadline from job start (default: 9 minutes) */
  deadlineMs?: number;
  toolLimits?: Partial<ToolCallLimits>;
}

export interface RunHooks {
  onState?: (state: JobState) => void;
  /** Called once with the terminal outcome, before delivery starts */
  onOutcome?: (outcome: JobOutcome) => void;
}

export interface SupervisedRun {
  jobId: string;
  outcome: JobOutcome;
  delivery: DeliveryResult;
  finalState: JobState;
  durationMs: number;
}

/**
 * What the pipeline has committed so far; read by the fallback path.
 */
export interface JobProgress {
  repo?: RepositoryHandle;
  endpoints?: PublicEndpoints;
  uploaded: string[];
}

const DEFAULT_DEADLINE_MS = 9 * 60 * 1000;

/**
 * Drives one task to exactly one outcome and one delivery attempt sequence.
 *
 * Stages run in order under a single deadline. Any failure or the deadline
 * firing switches to the fallback outcome; the timeout never escapes.
 */
export class JobSupervisor {
  private readonly logger: Logger;
  private readonly deadlineMs: number;

  constructor(
    private readonly deps: JobSupervisorDeps,
    private readonly options: JobSupervisorOptions,
  ) {
    this.logger = deps.logger ?? createLogger({ prefix: "supervisor" });
    this.deadlineMs = options.deadlineMs ?? DEFAULT_DEADLINE_MS;
  }

  async run(jobId: string, request: TaskRequest, hooks: RunHooks = {}): Promise<SupervisedRun> {
    const startTime = Date.now();
    const log = this.logger.child({ jobId, slug: request.slug, round: request.round });
    const machine = new JobStateMachine((from, to) => {
      log.info("job.state", { from, to });
      this.deps.events?.append({
        type: "STATE_CHANGED",
        timestamp: new Date().toISOString(),
        jobId,
        slug: request.slug,
        from,
        to,
      });
      hooks.onState?.(to);
    });

    const controller = new AbortController();
    const progress: JobProgress = { uploaded: [] };
    const deadlineError = createTaggedError(
      "DEADLINE_EXCEEDED",
      `Job exceeded its ${Math.round(this.deadlineMs / 1000)}s deadline`,
    );

    let outcome: JobOutcome;
    try {
      outcome = await pTimeout(this.pipeline(jobId, request, machine, controller.signal, progress, log), {
        milliseconds: this.deadlineMs,
        message: deadlineError,
      });
    } catch (err) {
      controller.abort();
      const timedOut = err === deadlineError;
      if (timedOut) {
        log.error("job.timed_out", { state: machine.state, deadlineMs: this.deadlineMs });
      } else {
        log.error("job.failed", { state: machine.state, error: err });
      }
      machine.transition(timedOut ? "TimedOut" : "Failed");
      outcome = fallbackOutcome(progress, errorMessage(err));
    }

    machine.transition("Reporting");
    hooks.onOutcome?.(outcome);
    const delivery = await this.deps.reporter.deliver(
      request.callbackUrl,
      buildCallbackPayload(request, outcome),
      { jobId, slug: request.slug },
    );
    machine.transition("Done");

    const durationMs = Date.now() - startTime;
    this.deps.metrics?.recordJob(outcome.success, durationMs);
    this.deps.events?.append({
      type: "JOB_FINISHED",
      timestamp: new Date().toISOString(),
      jobId,
      slug: request.slug,
      success: outcome.success,
      delivered: delivery.delivered,
      durationMs,
    });
    log.info("job.done", { success: outcome.success, delivered: delivery.delivered, durationMs });

    return { jobId, outcome, delivery, finalState: machine.state, durationMs };
  }

  private async pipeline(
    jobId: string,
    request: TaskRequest,
    machine: JobStateMachine,
    signal: AbortSignal,
    progress: JobProgress,
    log: Logger,
  ): Promise<JobOutcome> {
    // Once the deadline fired the run is abandoned; stop before the next stage
    const advance = (to: JobState) => {
      if (signal.aborted) throw createTaggedError("DEADLINE_EXCEEDED", "Job abandoned");
      machine.transition(to);
    };
    const isUpdate = request.round > 1;

    const workspace = new Workspace(this.options.workRoot, request.slug);
    await workspace.prepare(!isUpdate);
    advance("DirectoryPrepared");

    const { publisher } = this.deps;
    const repo = (isUpdate ? await publisher.getRepository(request.slug, { signal }) : undefined)
      ?? await publisher.createRepository(request.slug, { signal });
    progress.repo = repo;
    advance("RepositoryCreated");

    advance("Generating");
    const existing = isUpdate ? await workspace.listExisting() : [];
    const { artifacts } = await this.deps.generator.run({
      jobId,
      request,
      budget: new ToolCallBudget(this.options.toolLimits),
      existing,
      signal,
    });
    log.info("job.generated", { artifacts: artifacts.map((a) => a.path), existing: existing.length });

    // The workspace mirrors the repository: a file lands on disk only once its upload succeeded
    advance("Publishing");
    for (const artifact of artifacts) {
      if (signal.aborted) throw createTaggedError("DEADLINE_EXCEEDED", "Job abandoned");
      await publisher.uploadFile(repo, artifact.path, artifact.content, artifact.message, { signal });
      progress.uploaded.push(artifact.path);
      await workspace.writeArtifacts([artifact]);
    }

    // Pages serves the branch the uploads were committed to
    await publisher.enableStaticHosting(repo, repo.defaultBranch, { signal });
    advance("PagesEnabled");

    const endpoints = await publisher.getPublicEndpoints(repo, { signal });
    progress.endpoints = endpoints;

    return {
      success: true,
      artifacts: [...progress.uploaded],
      repoUrl: endpoints.repoUrl,
      pagesUrl: endpoints.pagesUrl,
      commitSha: endpoints.commitSha,
    };
  }
}

/**
 * Failure outcome carrying whatever URLs are already known.
 */
export function fallbackOutcome(progress: JobProgress, error: string): JobOutcome {
  return {
    success: false,
    artifacts: [...progress.uploaded],
    repoUrl: progress.endpoints?.repoUrl ?? progress.repo?.htmlUrl,
    pagesUrl: progress.endpoints?.pagesUrl,
    commitSha: progress.endpoints?.commitSha,
    error,
  };
}
