import { EventEmitter } from "eventemitter3";
import type { AnyJobEvent, JobEventType } from "../types/Events.js";

/**
 * Event log entry with sequence number.
 */
export interface LogEntry {
  seq: number;
  event: AnyJobEvent;
}

export type EventListener = (entry: LogEntry) => void;

/**
 * Append-only event log for job lifecycle and tool events.
 * Keeps the most recent entries in memory; the intake server replays them
 * per job and streams new ones to subscribers.
 */
export class EventLog {
  private readonly entries: LogEntry[] = [];
  private seq = 0;
  private readonly maxEntries: number;
  private readonly emitter = new EventEmitter();

  constructor(options: { maxEntries?: number } = {}) {
    this.maxEntries = options.maxEntries ?? 10_000;
  }

  append(event: AnyJobEvent): LogEntry {
    const entry: LogEntry = { seq: ++this.seq, event };

    this.entries.push(entry);
    if (this.entries.length > this.maxEntries) {
      this.entries.shift();
    }

    this.emitter.emit("event", entry);

    return entry;
  }

  /**
   * Subscribe to all events. Returns an unsubscribe function.
   */
  on(listener: EventListener): () => void {
    this.emitter.on("event", listener);
    return () => this.emitter.off("event", listener);
  }

  query(filter: {
    type?: JobEventType;
    jobId?: string;
    since?: number; // seq number
    limit?: number;
  }): LogEntry[] {
    let results = this.entries;

    const since = filter.since;
    if (since !== undefined) {
      results = results.filter((e) => e.seq > since);
    }
    if (filter.type) {
      results = results.filter((e) => e.event.type === filter.type);
    }
    if (filter.jobId) {
      results = results.filter((e) => e.event.jobId === filter.jobId);
    }
    if (filter.limit) {
      results = results.slice(-filter.limit);
    }

    return results;
  }
}
