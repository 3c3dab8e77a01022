import { describe, it, expect, afterEach } from "vitest";
import { JobManager, type JobRunner } from "../../src/jobs/JobManager.js";
import type { OutcomeReporter, RunHooks, SupervisedRun } from "../../src/jobs/JobSupervisor.js";
import { EventLog } from "../../src/observability/EventLog.js";
import type { CallbackPayload, DeliveryResult } from "../../src/report/ResultReporter.js";
import type { TaskRequest } from "../../src/types/TaskRequest.js";
import { silentLogger, taskRequest } from "../fixtures/index.js";

/**
 * Runner whose jobs all wait until `open()` is called.
 */
class GatedRunner implements JobRunner {
  readonly started: string[] = [];
  /** Settles when the first job starts running */
  readonly firstStart: Promise<void>;
  private release: () => void = () => {};
  private notifyStart: () => void = () => {};
  private readonly gate: Promise<void>;

  constructor() {
    this.gate = new Promise<void>((resolve) => {
      this.release = resolve;
    });
    this.firstStart = new Promise<void>((resolve) => {
      this.notifyStart = resolve;
    });
  }

  open(): void {
    this.release();
  }

  async run(jobId: string, request: TaskRequest, hooks: RunHooks = {}): Promise<SupervisedRun> {
    this.started.push(request.slug);
    this.notifyStart();
    hooks.onState?.("DirectoryPrepared");
    await this.gate;
    const outcome = { success: true, artifacts: ["index.html"] };
    hooks.onState?.("Reporting");
    hooks.onOutcome?.(outcome);
    return { jobId, outcome, delivery: { delivered: true, attempts: 1, status: 200 }, finalState: "Done", durationMs: 5 };
  }
}

class RecordingReporter implements OutcomeReporter {
  readonly payloads: CallbackPayload[] = [];

  async deliver(_url: string, payload: CallbackPayload): Promise<DeliveryResult> {
    this.payloads.push(payload);
    return { delivered: true, attempts: 1, status: 200 };
  }
}

const OTHER = taskRequest({ task: "Other", slug: "Other" });

describe("JobManager", () => {
  let manager: JobManager | undefined;

  afterEach(() => {
    manager?.dispose();
    manager = undefined;
  });

  it("acknowledges before the job runs and records its progress", async () => {
    const runner = new GatedRunner();
    manager = new JobManager(runner, new RecordingReporter(), { logger: silentLogger });

    const ack = await manager.submitTask(taskRequest());

    expect(ack.scheduled).toBe(true);
    await runner.firstStart;
    expect(await manager.getJob(ack.jobId)).toMatchObject({
      jobId: ack.jobId,
      slug: "Demo",
      round: 1,
      status: "running",
    });
    expect(await manager.counts()).toEqual({ queued: 0, running: 1, done: 0 });

    runner.open();
    await manager.drain();

    expect(await manager.getJob(ack.jobId)).toMatchObject({
      status: "done",
      state: "Done",
      delivered: true,
      outcome: { success: true, artifacts: ["index.html"] },
    });
    expect(await manager.counts()).toEqual({ queued: 0, running: 0, done: 1 });
  });

  it("queues jobs beyond the concurrency limit", async () => {
    const runner = new GatedRunner();
    manager = new JobManager(runner, new RecordingReporter(), {
      logger: silentLogger,
      maxConcurrent: 1,
      maxQueued: 1,
    });

    const first = await manager.submitTask(taskRequest());
    const second = await manager.submitTask(OTHER);

    expect(second.scheduled).toBe(true);
    expect((await manager.getJob(second.jobId))?.status).toBe("queued");

    runner.open();
    await manager.drain();

    expect(runner.started).toEqual(["Demo", "Other"]);
    expect((await manager.getJob(first.jobId))?.status).toBe("done");
    expect((await manager.getJob(second.jobId))?.status).toBe("done");
  });

  it("reports a failure for a job the full pool turns away", async () => {
    const runner = new GatedRunner();
    const reporter = new RecordingReporter();
    const events = new EventLog();
    manager = new JobManager(runner, reporter, { logger: silentLogger, events, maxConcurrent: 1, maxQueued: 0 });

    const first = await manager.submitTask(taskRequest());
    const second = await manager.submitTask(OTHER);
    runner.open();
    await manager.drain();

    expect(first.scheduled).toBe(true);
    expect(second.scheduled).toBe(false);
    expect(runner.started).toEqual(["Demo"]);
    expect(reporter.payloads).toEqual([
      {
        email: "student@example.com",
        task: "Other",
        round: 1,
        nonce: "nonce-1",
        success: false,
        repo_url: "",
        commit_sha: "",
        pages_url: "",
        artifacts: [],
        error: "Server is at capacity; the task was not run",
      },
    ]);
    expect(await manager.getJob(second.jobId)).toMatchObject({
      status: "done",
      state: "Done",
      delivered: true,
      outcome: { success: false },
    });
    expect(events.query({ type: "JOB_FINISHED" }).map((e) => e.event)).toMatchObject([
      { jobId: second.jobId, slug: "Other", success: false, delivered: true },
    ]);
  });

  it("logs submissions to the event log", async () => {
    const events = new EventLog();
    const runner = new GatedRunner();
    manager = new JobManager(runner, new RecordingReporter(), { logger: silentLogger, events });

    const ack = await manager.submitTask(taskRequest({ round: 2 }));
    runner.open();
    await manager.drain();

    expect(events.query({ type: "JOB_SUBMITTED" }).map((e) => e.event)).toMatchObject([
      { jobId: ack.jobId, slug: "Demo", round: 2 },
    ]);
  });

  it("lists jobs by slug", async () => {
    const runner = new GatedRunner();
    manager = new JobManager(runner, new RecordingReporter(), { logger: silentLogger });

    await manager.submitTask(taskRequest());
    await manager.submitTask(OTHER);
    runner.open();
    await manager.drain();

    expect((await manager.list({ slug: "Other" })).map((j) => j.slug)).toEqual(["Other"]);
  });
});
