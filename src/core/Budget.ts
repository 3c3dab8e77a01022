/**
 * Tools whose calls are capped per job.
 */
export type BudgetedTool = "search" | "exec";

/**
 * Per-job caps for budgeted tools.
 */
export interface ToolCallLimits {
  /** Max external-lookup calls (default: 1) */
  search: number;
  /** Max sandbox executions (default: 4) */
  exec: number;
}

export const DEFAULT_TOOL_CALL_LIMITS: ToolCallLimits = {
  search: 1,
  exec: 4,
};

export interface BudgetUsage {
  used: number;
  remaining: number;
}

/**
 * Tool call budget owned by a single agent run.
 *
 * Counters only go down. A refused call does not change anything, so the
 * caller can report the refusal back to the model and keep going.
 */
export class ToolCallBudget {
  private readonly limits: ToolCallLimits;
  private readonly used: Record<BudgetedTool, number> = { search: 0, exec: 0 };

  constructor(limits: Partial<ToolCallLimits> = {}) {
    this.limits = { ...DEFAULT_TOOL_CALL_LIMITS, ...limits };
  }

  /**
   * Take one unit for a tool. Returns false when the cap is reached.
   */
  tryConsume(tool: BudgetedTool): boolean {
    if (this.remaining(tool) <= 0) return false;
    this.used[tool]++;
    return true;
  }

  remaining(tool: BudgetedTool): number {
    return Math.max(0, this.limits[tool] - this.used[tool]);
  }

  isExhausted(tool: BudgetedTool): boolean {
    return this.remaining(tool) === 0;
  }

  snapshot(): Record<BudgetedTool, BudgetUsage> {
    return {
      search: { used: this.used.search, remaining: this.remaining("search") },
      exec: { used: this.used.exec, remaining: this.remaining("exec") },
    };
  }
}
