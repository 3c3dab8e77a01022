import type { JobState } from "../types/JobOutcome.js";

/**
 * Allowed transitions. TimedOut and Failed are reachable from every state
 * before Reporting.
 */
const TRANSITIONS: Record<JobState, readonly JobState[]> = {
  Received: ["DirectoryPrepared", "TimedOut", "Failed"],
  DirectoryPrepared: ["RepositoryCreated", "TimedOut", "Failed"],
  RepositoryCreated: ["Generating", "TimedOut", "Failed"],
  Generating: ["Publishing", "TimedOut", "Failed"],
  Publishing: ["PagesEnabled", "TimedOut", "Failed"],
  PagesEnabled: ["Reporting", "TimedOut", "Failed"],
  TimedOut: ["Reporting"],
  Failed: ["Reporting"],
  Reporting: ["Done"],
  Done: [],
};

export type StateListener = (from: JobState, to: JobState) => void;

/**
 * State of one job. Illegal transitions throw.
 */
export class JobStateMachine {
  private current: JobState = "Received";

  constructor(private readonly onTransition?: StateListener) {}

  get state(): JobState {
    return this.current;
  }

  canTransition(to: JobState): boolean {
    return TRANSITIONS[this.current].includes(to);
  }

  transition(to: JobState): void {
    if (!this.canTransition(to)) {
      throw new Error(`Illegal job state transition ${this.current} -> ${to}`);
    }
    const from = this.current;
    this.current = to;
    this.onTransition?.(from, to);
  }
}
