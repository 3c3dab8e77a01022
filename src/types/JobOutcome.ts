/**
 * Public locations of a published site.
 */
export interface PublicEndpoints {
  repoUrl: string;
  pagesUrl: string;
  commitSha: string;
}

/**
 * Terminal result of one job. Produced exactly once, either by the normal
 * completion path or by the fallback path.
 */
export interface JobOutcome {
  success: boolean;
  /** Repository paths of the artifacts uploaded by this job */
  artifacts: string[];
  repoUrl?: string;
  pagesUrl?: string;
  commitSha?: string;
  /** Present when success is false */
  error?: string;
}

/**
 * Lifecycle states of a job.
 */
export type JobState =
  | "Received"
  | "DirectoryPrepared"
  | "RepositoryCreated"
  | "Generating"
  | "Publishing"
  | "PagesEnabled"
  | "TimedOut"
  | "Failed"
  | "Reporting"
  | "Done";
