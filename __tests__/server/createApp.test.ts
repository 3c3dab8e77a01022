import { describe, it, expect } from "vitest";
import request from "supertest";
import { createApp, type TaskIntake } from "../../src/server/createApp.js";
import type { Acknowledgment, Job, JobStatus } from "../../src/jobs/JobManager.js";
import { EventLog } from "../../src/observability/EventLog.js";
import { Metrics } from "../../src/observability/Metrics.js";
import type { AnyJobEvent } from "../../src/types/Events.js";
import type { TaskRequest } from "../../src/types/TaskRequest.js";
import { silentLogger } from "../fixtures/index.js";

class FakeIntake implements TaskIntake {
  readonly submitted: TaskRequest[] = [];
  fail = false;

  async submitTask(task: TaskRequest): Promise<Acknowledgment> {
    if (this.fail) throw new Error("store unavailable");
    this.submitted.push(task);
    return { jobId: `job-${this.submitted.length}`, scheduled: true };
  }

  readonly jobs = new Map<string, Job>();
  /** Called after each job lookup */
  onLookup?: () => void;

  async counts(): Promise<Record<JobStatus, number>> {
    return { queued: 0, running: 1, done: 2 };
  }

  async getJob(jobId: string): Promise<Job | undefined> {
    const job = this.jobs.get(jobId);
    this.onLookup?.();
    return job;
  }
}

const JOB: Job = {
  jobId: "job-1",
  slug: "Demo",
  round: 1,
  status: "done",
  state: "Done",
  createdAt: 1000,
  updatedAt: 2000,
  outcome: { success: true, artifacts: ["index.html"] },
  delivered: true,
};

const SUBMITTED: AnyJobEvent = {
  type: "JOB_SUBMITTED",
  timestamp: "2026-01-01T00:00:00.000Z",
  jobId: "job-1",
  slug: "Demo",
  round: 1,
};
const STATE: AnyJobEvent = {
  type: "STATE_CHANGED",
  timestamp: "2026-01-01T00:00:01.000Z",
  jobId: "job-1",
  slug: "Demo",
  from: "Received",
  to: "DirectoryPrepared",
};
const UNRELATED: AnyJobEvent = {
  type: "JOB_SUBMITTED",
  timestamp: "2026-01-01T00:00:02.000Z",
  jobId: "job-2",
  slug: "Other",
  round: 1,
};
const FINISHED: AnyJobEvent = {
  type: "JOB_FINISHED",
  timestamp: "2026-01-01T00:00:03.000Z",
  jobId: "job-1",
  slug: "Demo",
  success: true,
  delivered: true,
  durationMs: 1000,
};

function sse(seq: number, event: AnyJobEvent): string {
  return `id: ${seq}\nevent: ${event.type}\ndata: ${JSON.stringify(event)}\n\n`;
}

const BODY = {
  email: "student@example.com",
  secret: "test-secret",
  task: "Demo Site",
  round: 1,
  evaluation_url: "https://callback.example.com/notify",
  brief: "A page that says hello.",
  checks: "Page has an h1",
};

function setup(bodyLimit?: string) {
  const intake = new FakeIntake();
  const app = createApp({ intake, secret: "test-secret", model: "test-model", bodyLimit, logger: silentLogger });
  return { intake, app };
}

describe("createApp", () => {
  describe("POST /task", () => {
    it("accepts a valid submission and hands over a normalized request", async () => {
      const { app, intake } = setup();

      const res = await request(app).post("/task").send(BODY);

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        status: "accepted",
        message: "Task is being processed",
        email: "student@example.com",
        round: 1,
        task: "Demo Site",
        evaluation_url: "https://callback.example.com/notify",
        jobId: "job-1",
      });
      expect(intake.submitted).toEqual([
        {
          email: "student@example.com",
          task: "Demo Site",
          slug: "Demo-Site",
          round: 1,
          callbackUrl: "https://callback.example.com/notify",
          brief: "A page that says hello.",
          checks: ["Page has an h1"],
          attachments: [],
        },
      ]);
      expect(intake.submitted[0]).not.toHaveProperty("secret");
    });

    it("coerces a numeric round given as a string", async () => {
      const { app, intake } = setup();

      const res = await request(app).post("/task").send({ ...BODY, round: "2" });

      expect(res.status).toBe(200);
      expect(res.body.round).toBe(2);
      expect(intake.submitted[0]?.round).toBe(2);
    });

    it("rejects a body missing required fields", async () => {
      const { app, intake } = setup();
      const { evaluation_url: _omitted, ...rest } = BODY;

      const res = await request(app).post("/task").send(rest);

      expect(res.status).toBe(400);
      expect(res.body).toEqual({
        detail: "Invalid request",
        errors: ["/ must have required property 'evaluation_url'"],
      });
      expect(intake.submitted).toEqual([]);
    });

    it("rejects a round below 1", async () => {
      const { app } = setup();

      const res = await request(app).post("/task").send({ ...BODY, round: 0 });

      expect(res.status).toBe(400);
      expect(res.body.errors).toEqual(["/round must be >= 1"]);
    });

    it("rejects a wrong secret", async () => {
      const { app, intake } = setup();

      const res = await request(app).post("/task").send({ ...BODY, secret: "wrong-secret" });

      expect(res.status).toBe(403);
      expect(res.body).toEqual({ detail: "Invalid secret" });
      expect(intake.submitted).toEqual([]);
    });

    it("rejects a task name with nothing usable for a slug", async () => {
      const { app } = setup();

      const res = await request(app).post("/task").send({ ...BODY, task: "!!!" });

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ detail: "Invalid request", errors: ["/task has no usable characters"] });
    });

    it("answers malformed JSON with 400", async () => {
      const { app } = setup();

      const res = await request(app).post("/task").set("Content-Type", "application/json").send('{"email":');

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ detail: "Malformed JSON body" });
    });

    it("answers an oversized body with 413", async () => {
      const { app } = setup("1kb");

      const res = await request(app).post("/task").send({ ...BODY, brief: "x".repeat(4096) });

      expect(res.status).toBe(413);
      expect(res.body).toEqual({ detail: "Request body too large" });
    });

    it("answers 500 when the job cannot be recorded", async () => {
      const { app, intake } = setup();
      intake.fail = true;

      const res = await request(app).post("/task").send(BODY);

      expect(res.status).toBe(500);
      expect(res.body).toEqual({ detail: "Internal server error" });
    });
  });

  it("GET /health reports job counts", async () => {
    const { app } = setup();

    const res = await request(app).get("/health");

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: "ok", jobs: { queued: 0, running: 1, done: 2 } });
  });

  it("GET /health adds the metrics snapshot when metrics are wired", async () => {
    const metrics = new Metrics();
    metrics.recordDelivery(true, 2);
    const app = createApp({ intake: new FakeIntake(), secret: "test-secret", model: "m", metrics, logger: silentLogger });

    const res = await request(app).get("/health");

    expect(res.body).toEqual({
      status: "ok",
      jobs: { queued: 0, running: 1, done: 2 },
      metrics: {
        counters: [
          { name: "deliveries_total", labels: { delivered: "true" }, value: 1 },
          { name: "delivery_attempts_total", labels: {}, value: 2 },
        ],
        durations: [],
      },
    });
  });

  describe("GET /jobs/:id", () => {
    function jobsSetup() {
      const intake = new FakeIntake();
      intake.jobs.set(JOB.jobId, JOB);
      const events = new EventLog();
      events.append(SUBMITTED);
      events.append(UNRELATED);
      events.append(STATE);
      const app = createApp({ intake, secret: "test-secret", model: "m", events, logger: silentLogger });
      return { app, intake, events };
    }

    it("returns the job with its own events", async () => {
      const { app } = jobsSetup();

      const res = await request(app).get("/jobs/job-1").set("Authorization", "Bearer test-secret");

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ ...JOB, events: [SUBMITTED, STATE] });
    });

    it("requires the secret as a bearer token", async () => {
      const { app } = jobsSetup();

      const missing = await request(app).get("/jobs/job-1");
      const wrong = await request(app).get("/jobs/job-1").set("Authorization", "Bearer wrong-secret");

      expect(missing.status).toBe(403);
      expect(wrong.status).toBe(403);
      expect(wrong.body).toEqual({ detail: "Invalid secret" });
    });

    it("answers an unknown job with 404", async () => {
      const { app } = jobsSetup();

      const res = await request(app).get("/jobs/job-9").set("Authorization", "Bearer test-secret");

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ detail: "Unknown job" });
    });

    it("replays the events of a finished job as a closed stream", async () => {
      const { app } = jobsSetup();

      const res = await request(app).get("/jobs/job-1/events").set("Authorization", "Bearer test-secret");

      expect(res.status).toBe(200);
      expect(res.headers["content-type"]).toBe("text/event-stream; charset=utf-8");
      expect(res.text).toBe(sse(1, SUBMITTED) + sse(3, STATE));
    });

    it("streams a running job's events until it finishes", async () => {
      const { app, intake, events } = jobsSetup();
      intake.jobs.set(JOB.jobId, { ...JOB, status: "running", state: "Generating" });
      intake.onLookup = () => {
        setTimeout(() => {
          events.append(UNRELATED);
          events.append(FINISHED);
        }, 10);
      };

      const res = await request(app).get("/jobs/job-1/events").set("Authorization", "Bearer test-secret");

      expect(res.text).toBe(sse(1, SUBMITTED) + sse(3, STATE) + sse(5, FINISHED));
    });
  });

  it("GET / names the model, escaped", async () => {
    const intake = new FakeIntake();
    const app = createApp({ intake, secret: "test-secret", model: "<gpt>", logger: silentLogger });

    const res = await request(app).get("/");

    expect(res.status).toBe(200);
    expect(res.headers["content-type"]).toBe("text/html; charset=utf-8");
    expect(res.text).toContain("<p>Model: <code>&lt;gpt&gt;</code></p>");
  });

  it("answers unknown routes with 404", async () => {
    const { app } = setup();

    const res = await request(app).get("/nope");

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ detail: "Not found" });
  });
});
