/**
 * Simple counter metric.
 */
export interface CounterValue {
  name: string;
  labels: Record<string, string>;
  value: number;
}

export interface DurationValue {
  name: string;
  labels: Record<string, string>;
  count: number;
  sum: number;
}

/** Everything recorded so far, as served by the health endpoint. */
export interface MetricsSnapshot {
  counters: CounterValue[];
  durations: DurationValue[];
}

/**
 * Lightweight metrics collector: counters and duration sums with labels.
 */
export class Metrics {
  private readonly counters = new Map<string, number>();
  private readonly durations = new Map<string, { count: number; sum: number }>();

  increment(name: string, labels: Record<string, string> = {}, value = 1): void {
    const key = this.makeKey(name, labels);
    this.counters.set(key, (this.counters.get(key) ?? 0) + value);
  }

  observe(name: string, labels: Record<string, string>, value: number): void {
    const key = this.makeKey(name, labels);
    const current = this.durations.get(key) ?? { count: 0, sum: 0 };
    this.durations.set(key, { count: current.count + 1, sum: current.sum + value });
  }

  getCounter(name: string, labels: Record<string, string> = {}): number {
    return this.counters.get(this.makeKey(name, labels)) ?? 0;
  }

  snapshot(): MetricsSnapshot {
    const counters: CounterValue[] = [];
    for (const [key, value] of this.counters) {
      counters.push({ ...this.parseKey(key), value });
    }
    const durations: DurationValue[] = [];
    for (const [key, { count, sum }] of this.durations) {
      durations.push({ ...this.parseKey(key), count, sum });
    }
    return { counters, durations };
  }

  recordToolCall(toolName: string, ok: boolean, durationMs: number): void {
    this.increment("tool_calls_total", { toolName, ok: String(ok) });
    this.observe("tool_latency_ms", { toolName }, durationMs);
  }

  recordToolDenied(toolName: string): void {
    this.increment("tool_denied_total", { toolName });
  }

  recordJob(success: boolean, durationMs: number): void {
    this.increment("jobs_total", { success: String(success) });
    this.observe("job_duration_ms", {}, durationMs);
  }

  recordDelivery(delivered: boolean, attempts: number): void {
    this.increment("deliveries_total", { delivered: String(delivered) });
    this.increment("delivery_attempts_total", {}, attempts);
  }

  private makeKey(name: string, labels: Record<string, string>): string {
    const sortedLabels = Object.entries(labels)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${k}=${v}`)
      .join(",");
    return `${name}{${sortedLabels}}`;
  }

  private parseKey(key: string): { name: string; labels: Record<string, string> } {
    const match = key.match(/^(.+?)\{(.*)\}$/);
    if (!match || match[1] === undefined) return { name: key, labels: {} };
    const labels: Record<string, string> = {};
    if (match[2]) {
      for (const part of match[2].split(",")) {
        const [k, v] = part.split("=");
        if (k && v !== undefined) labels[k] = v;
      }
    }
    return { name: match[1], labels };
  }
}
