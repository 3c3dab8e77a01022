import { timingSafeEqual } from "node:crypto";
import express, { type NextFunction, type Request, type Response } from "express";
import type { Acknowledgment, Job, JobStatus } from "../jobs/JobManager.js";
import type { EventLog, LogEntry } from "../observability/EventLog.js";
import { createLogger, type Logger } from "../observability/Logger.js";
import type { Metrics } from "../observability/Metrics.js";
import { toTaskRequest, type TaskRequest } from "../types/TaskRequest.js";
import { checkSubmission } from "./taskSchema.js";

/** What the intake needs from the job manager. */
export interface TaskIntake {
  submitTask(request: TaskRequest): Promise<Acknowledgment>;
  counts(): Promise<Record<JobStatus, number>>;
  getJob(jobId: string): Promise<Job | undefined>;
}

export interface IntakeAppOptions {
  intake: TaskIntake;
  /** Shared secret every submission must carry */
  secret: string;
  /** Shown on the landing page */
  model: string;
  /** Body size limit passed to express.json (default: "20mb") */
  bodyLimit?: string;
  logger?: Logger;
  /** Source of GET /jobs/:id events and the event stream */
  events?: EventLog;
  /** Snapshot included in GET /health */
  metrics?: Metrics;
}

/**
 * Express app serving the intake API.
 */
export function createApp(options: IntakeAppOptions): express.Express {
  const logger = options.logger ?? createLogger({ prefix: "server" });
  const app = express();

  app.use(express.json({ limit: options.bodyLimit ?? "20mb" }));

  app.get("/", (_req, res) => {
    res.type("html").send(landingPage(options.model));
  });

  app.get("/health", async (_req, res, next) => {
    try {
      const jobs = await options.intake.counts();
      res.json({ status: "ok", jobs, ...(options.metrics ? { metrics: options.metrics.snapshot() } : {}) });
    } catch (err) {
      next(err);
    }
  });

  // Job inspection takes the intake secret as a bearer token
  const requireSecret = (req: Request, res: Response, next: NextFunction): void => {
    const header = req.get("authorization") ?? "";
    const given = header.startsWith("Bearer ") ? header.slice("Bearer ".length) : "";
    if (!secretMatches(given, options.secret)) {
      res.status(403).json({ detail: "Invalid secret" });
      return;
    }
    next();
  };

  app.get("/jobs/:id", requireSecret, async (req, res, next) => {
    try {
      const job = await options.intake.getJob(req.params.id);
      if (!job) {
        res.status(404).json({ detail: "Unknown job" });
        return;
      }
      const events = options.events?.query({ jobId: job.jobId }).map((entry) => entry.event) ?? [];
      res.json({ ...job, events });
    } catch (err) {
      next(err);
    }
  });

  app.get("/jobs/:id/events", requireSecret, async (req, res, next) => {
    try {
      const job = await options.intake.getJob(req.params.id);
      if (!job) {
        res.status(404).json({ detail: "Unknown job" });
        return;
      }
      streamJobEvents(job, options.events, req, res);
    } catch (err) {
      next(err);
    }
  });

  app.post("/task", async (req, res, next) => {
    try {
      const check = checkSubmission(req.body);
      if (!check.ok) {
        logger.warn("task.invalid", { errors: check.errors });
        res.status(400).json({ detail: "Invalid request", errors: check.errors });
        return;
      }
      const { submission } = check;

      if (!secretMatches(submission.secret, options.secret)) {
        logger.warn("task.forbidden", { email: submission.email, task: submission.task });
        res.status(403).json({ detail: "Invalid secret" });
        return;
      }

      const request = toTaskRequest(submission);
      if (!request.slug) {
        res.status(400).json({ detail: "Invalid request", errors: ["/task has no usable characters"] });
        return;
      }

      const ack = await options.intake.submitTask(request);
      logger.info("task.accepted", { jobId: ack.jobId, slug: request.slug, round: request.round });
      res.json({
        status: "accepted",
        message: "Task is being processed",
        email: submission.email,
        round: submission.round,
        task: submission.task,
        evaluation_url: submission.evaluation_url,
        jobId: ack.jobId,
      });
    } catch (err) {
      next(err);
    }
  });

  app.use(errorHandler(logger));

  app.use((_req, res) => {
    res.status(404).json({ detail: "Not found" });
  });

  return app;
}

function errorHandler(logger: Logger) {
  return (err: unknown, _req: Request, res: Response, _next: NextFunction): void => {
    // Raised by express.json: malformed JSON (400) or an oversized body (413)
    const status = typeof err === "object" && err !== null && "status" in err && typeof err.status === "number"
      ? err.status
      : 500;
    if (status >= 400 && status < 500) {
      res.status(status).json({ detail: status === 413 ? "Request body too large" : "Malformed JSON body" });
      return;
    }
    logger.error("request.failed", { error: err });
    res.status(500).json({ detail: "Internal server error" });
  };
}

/**
 * Server-sent events for one job: everything logged so far, then live
 * entries until JOB_FINISHED. A job that is already done ends the stream
 * after the replay.
 */
function streamJobEvents(job: Job, events: EventLog | undefined, req: Request, res: Response): void {
  res.status(200).set({ "Content-Type": "text/event-stream", "Cache-Control": "no-cache" });
  res.flushHeaders();

  const send = (entry: LogEntry) => {
    res.write(`id: ${entry.seq}\nevent: ${entry.event.type}\ndata: ${JSON.stringify(entry.event)}\n\n`);
  };

  const past = events?.query({ jobId: job.jobId }) ?? [];
  past.forEach(send);
  if (!events || job.status === "done" || past.some((entry) => entry.event.type === "JOB_FINISHED")) {
    res.end();
    return;
  }

  const unsubscribe = events.on((entry) => {
    if (entry.event.jobId !== job.jobId) return;
    send(entry);
    if (entry.event.type === "JOB_FINISHED") {
      unsubscribe();
      res.end();
    }
  });
  req.on("close", unsubscribe);
}

function secretMatches(given: string, expected: string): boolean {
  const a = Buffer.from(given, "utf-8");
  const b = Buffer.from(expected, "utf-8");
  return a.length === b.length && timingSafeEqual(a, b);
}

function landingPage(model: string): string {
  return `<!doctype html>
<html>
<head><meta charset="utf-8"><title>pages-agent</title></head>
<body>
<h1>pages-agent</h1>
<p>Builds static sites from task briefs and publishes them to GitHub Pages.</p>
<p>Model: <code>${escapeHtml(model)}</code></p>
<ul>
<li><code>POST /task</code> submit a task</li>
<li><code>GET /health</code> service status</li>
<li><code>GET /jobs/:id</code> job status and events</li>
<li><code>GET /jobs/:id/events</code> live job events</li>
</ul>
</body>
</html>
`;
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}
