/**
 * Attachment as it arrives on the wire: a file name and a data URI.
 */
export interface AttachmentInput {
  /** File name, e.g. "sample.png" */
  name: string;
  /** Data URI, e.g. "data:image/png;base64,iVBOR..." */
  url: string;
}

/**
 * Body of `POST /task` as submitted by the caller.
 */
export interface TaskSubmission {
  email: string;
  secret: string;
  task: string;
  round: number;
  evaluation_url: string;
  nonce?: string;
  brief?: string;
  checks?: string[] | string;
  attachments?: AttachmentInput[];
}

/**
 * Validated, normalized task handed to the job manager.
 * The shared secret is dropped at intake and never travels further.
 */
export interface TaskRequest {
  email: string;
  /** Job name as submitted */
  task: string;
  /** Namespace key: working directory and repository name */
  slug: string;
  /** 1 = creation, >1 = update of an existing site */
  round: number;
  callbackUrl: string;
  nonce?: string;
  brief: string;
  checks: string[];
  attachments: AttachmentInput[];
}

/**
 * Derive the namespace slug from a task name.
 * Returns an empty string when nothing usable remains.
 */
export function slugifyTaskName(task: string): string {
  return task
    .trim()
    .replace(/[^A-Za-z0-9._-]+/g, "-")
    .replace(/^[-.]+|[-.]+$/g, "")
    .slice(0, 100);
}

/**
 * Normalize a validated submission into a TaskRequest.
 */
export function toTaskRequest(submission: TaskSubmission): TaskRequest {
  const checks = submission.checks === undefined
    ? []
    : Array.isArray(submission.checks)
      ? submission.checks
      : [submission.checks];

  return {
    email: submission.email,
    task: submission.task,
    slug: slugifyTaskName(submission.task),
    round: submission.round,
    callbackUrl: submission.evaluation_url,
    nonce: submission.nonce,
    brief: submission.brief ?? "",
    checks: checks.filter((c) => c.trim().length > 0),
    attachments: submission.attachments ?? [],
  };
}
