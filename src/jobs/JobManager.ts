import { v4 as uuidv4 } from "uuid";
import { bulkhead, BulkheadRejectedError, type BulkheadPolicy } from "cockatiel";
import { errorMessage } from "../core/Retry.js";
import type { EventLog } from "../observability/EventLog.js";
import { createLogger, type Logger } from "../observability/Logger.js";
import { buildCallbackPayload } from "../report/ResultReporter.js";
import type { JobOutcome, JobState } from "../types/JobOutcome.js";
import type { TaskRequest } from "../types/TaskRequest.js";
import type { OutcomeReporter, RunHooks, SupervisedRun } from "./JobSupervisor.js";

/**
 * Coarse job status, as reported by the health endpoint.
 */
export type JobStatus = "queued" | "running" | "done";

/**
 * A job record, kept in memory only.
 */
export interface Job {
  jobId: string;
  slug: string;
  round: number;
  status: JobStatus;
  state: JobState;
  createdAt: number; // epoch ms
  updatedAt: number;
  outcome?: JobOutcome;
  delivered?: boolean;
}

/**
 * Job store interface for pluggable backends.
 */
export interface JobStore {
  set(jobId: string, job: Job): Promise<void>;
  get(jobId: string): Promise<Job | undefined>;
  list(filter?: { slug?: string; status?: JobStatus }): Promise<Job[]>;
  delete(jobId: string): Promise<void>;
}

/**
 * In-memory job store (default).
 */
export class InMemoryJobStore implements JobStore {
  private readonly jobs = new Map<string, Job>();

  async set(jobId: string, job: Job): Promise<void> {
    this.jobs.set(jobId, job);
  }

  async get(jobId: string): Promise<Job | undefined> {
    return this.jobs.get(jobId);
  }

  async list(filter?: { slug?: string; status?: JobStatus }): Promise<Job[]> {
    let results = [...this.jobs.values()];
    if (filter?.slug) {
      results = results.filter((j) => j.slug === filter.slug);
    }
    if (filter?.status) {
      results = results.filter((j) => j.status === filter.status);
    }
    return results;
  }

  async delete(jobId: string): Promise<void> {
    this.jobs.delete(jobId);
  }

  get size(): number {
    return this.jobs.size;
  }
}

/** Runs one job; implemented by JobSupervisor. */
export interface JobRunner {
  run(jobId: string, request: TaskRequest, hooks?: RunHooks): Promise<SupervisedRun>;
}

export interface JobManagerOptions {
  /** Jobs running at once (default: 4) */
  maxConcurrent?: number;
  /** Jobs waiting for a slot (default: 100) */
  maxQueued?: number;
  /** Finished jobs are forgotten after this long (default: 1 hour) */
  ttlMs?: number;
  store?: JobStore;
  logger?: Logger;
  events?: EventLog;
}

export interface Acknowledgment {
  jobId: string;
  /** False when the pool was full; the failure is reported through the callback */
  scheduled: boolean;
}

/**
 * Accepts tasks and runs them on a bounded worker pool.
 *
 * submitTask returns as soon as the job is recorded. Execution happens in the
 * background on a cockatiel bulkhead; a job the bulkhead turns away still
 * gets a failure outcome delivered to its callback.
 */
export class JobManager {
  private readonly store: JobStore;
  private readonly pool: BulkheadPolicy;
  private readonly inFlight = new Set<Promise<void>>();
  private readonly ttlMs: number;
  private readonly logger: Logger;
  private cleanupTimer?: ReturnType<typeof setInterval>;
  private writes: Promise<void> = Promise.resolve();

  constructor(
    private readonly runner: JobRunner,
    private readonly reporter: OutcomeReporter,
    private readonly options: JobManagerOptions = {},
  ) {
    this.store = options.store ?? new InMemoryJobStore();
    this.pool = bulkhead(options.maxConcurrent ?? 4, options.maxQueued ?? 100);
    this.ttlMs = options.ttlMs ?? 3600_000;
    this.logger = options.logger ?? createLogger({ prefix: "jobs" });
    this.startCleanup();
  }

  /**
   * Record the task and schedule it. Does not wait for the job.
   */
  async submitTask(request: TaskRequest): Promise<Acknowledgment> {
    const now = Date.now();
    const job: Job = {
      jobId: uuidv4(),
      slug: request.slug,
      round: request.round,
      status: "queued",
      state: "Received",
      createdAt: now,
      updatedAt: now,
    };
    await this.store.set(job.jobId, job);
    this.options.events?.append({
      type: "JOB_SUBMITTED",
      timestamp: new Date(now).toISOString(),
      jobId: job.jobId,
      slug: job.slug,
      round: job.round,
    });

    const scheduled = this.pool.queueSlots > 0 || this.pool.executionSlots > 0;
    const task = this.pool
      .execute(() => this.execute(job.jobId, request))
      .catch((err: unknown) => this.handleUnscheduled(job.jobId, request, err));
    this.inFlight.add(task);
    void task.finally(() => this.inFlight.delete(task));

    this.logger.info("job.submitted", { jobId: job.jobId, slug: job.slug, round: job.round, scheduled });
    return { jobId: job.jobId, scheduled };
  }

  async getJob(jobId: string): Promise<Job | undefined> {
    return this.store.get(jobId);
  }

  async list(filter?: { slug?: string; status?: JobStatus }): Promise<Job[]> {
    return this.store.list(filter);
  }

  async counts(): Promise<Record<JobStatus, number>> {
    const all = await this.store.list();
    const counts: Record<JobStatus, number> = { queued: 0, running: 0, done: 0 };
    for (const job of all) counts[job.status]++;
    return counts;
  }

  /**
   * Resolve once every submitted job has finished, including delivery.
   */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  /**
   * Stop cleanup timer.
   */
  dispose(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = undefined;
    }
  }

  private async execute(jobId: string, request: TaskRequest): Promise<void> {
    await this.patch(jobId, { status: "running" });

    const run = await this.runner.run(jobId, request, {
      onState: (state) => {
        void this.patch(jobId, { state });
      },
      onOutcome: (outcome) => {
        void this.patch(jobId, { outcome });
      },
    });

    await this.patch(jobId, {
      status: "done",
      state: run.finalState,
      outcome: run.outcome,
      delivered: run.delivery.delivered,
    });
  }

  private async handleUnscheduled(jobId: string, request: TaskRequest, err: unknown): Promise<void> {
    if (!(err instanceof BulkheadRejectedError)) {
      // The supervisor reports its own failures; reaching here is a bug
      this.logger.error("job.crashed", { jobId, error: err });
      const crashed = await this.patch(jobId, { status: "done", state: "Done" });
      this.finished(crashed, false);
      return;
    }

    const outcome: JobOutcome = {
      success: false,
      artifacts: [],
      error: "Server is at capacity; the task was not run",
    };
    this.logger.warn("job.rejected", { jobId, slug: request.slug, error: errorMessage(err) });
    const delivery = await this.reporter.deliver(
      request.callbackUrl,
      buildCallbackPayload(request, outcome),
      { jobId, slug: request.slug },
    );
    const done = await this.patch(jobId, {
      status: "done",
      state: "Done",
      outcome,
      delivered: delivery.delivered,
    });
    this.finished(done, delivery.delivered);
  }

  /** JOB_FINISHED for jobs the supervisor never ran. */
  private finished(job: Job | undefined, delivered: boolean): void {
    if (!job) return;
    this.options.events?.append({
      type: "JOB_FINISHED",
      timestamp: new Date().toISOString(),
      jobId: job.jobId,
      slug: job.slug,
      success: false,
      delivered,
      durationMs: job.updatedAt - job.createdAt,
    });
  }

  /**
   * Read-modify-write of one record. Writes are chained so hook updates
   * fired back to back apply in order.
   */
  private patch(jobId: string, changes: Partial<Job>): Promise<Job | undefined> {
    const next = this.writes.then(() => this.applyPatch(jobId, changes));
    this.writes = next.then(() => undefined);
    return next;
  }

  private async applyPatch(jobId: string, changes: Partial<Job>): Promise<Job | undefined> {
    try {
      const job = await this.store.get(jobId);
      if (!job) return undefined;
      const updated: Job = { ...job, ...changes, updatedAt: Date.now() };
      await this.store.set(jobId, updated);
      return updated;
    } catch (err) {
      this.logger.error("job.store_failed", { jobId, error: err });
      return undefined;
    }
  }

  private startCleanup(): void {
    const interval = Math.max(this.ttlMs / 2, 60_000);
    this.cleanupTimer = setInterval(() => void this.cleanup(), interval);
    if (typeof this.cleanupTimer === "object" && "unref" in this.cleanupTimer) {
      this.cleanupTimer.unref();
    }
  }

  private async cleanup(): Promise<void> {
    const now = Date.now();
    const all = await this.store.list({ status: "done" });
    for (const job of all) {
      if (now - job.updatedAt > this.ttlMs) {
        await this.store.delete(job.jobId);
      }
    }
  }
}
