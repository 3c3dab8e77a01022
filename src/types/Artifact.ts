/**
 * A file the agent produced for publishing.
 */
export interface GeneratedArtifact {
  /** Repository-relative path, e.g. "index.html" or "assets/chart.png" */
  path: string;
  /** Text for authored files, bytes for files copied out of the sandbox */
  content: string | Buffer;
  /** Human-readable change description, used as the commit message */
  message: string;
}

/**
 * A file already present in a job's working namespace from a prior round.
 */
export interface ExistingArtifact {
  path: string;
  bytes: number;
  /** UTF-8 text, omitted for binary or oversized files */
  text?: string;
}
