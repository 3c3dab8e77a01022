import { describe, it, expect } from "vitest";
import { JobStateMachine } from "../../src/jobs/JobStateMachine.js";
import type { JobState } from "../../src/types/JobOutcome.js";

const HAPPY_PATH: JobState[] = [
  "DirectoryPrepared",
  "RepositoryCreated",
  "Generating",
  "Publishing",
  "PagesEnabled",
  "Reporting",
  "Done",
];

describe("JobStateMachine", () => {
  it("walks the normal path and notifies each step", () => {
    const seen: string[] = [];
    const machine = new JobStateMachine((from, to) => seen.push(`${from}->${to}`));
    for (const state of HAPPY_PATH) machine.transition(state);
    expect(machine.state).toBe("Done");
    expect(seen[0]).toBe("Received->DirectoryPrepared");
    expect(seen).toHaveLength(7);
  });

  it.each(["Received", "DirectoryPrepared", "RepositoryCreated", "Generating", "Publishing", "PagesEnabled"] as const)(
    "allows TimedOut and Failed from %s",
    (state) => {
      const machine = new JobStateMachine();
      for (const step of HAPPY_PATH.slice(0, HAPPY_PATH.indexOf(state) + 1)) machine.transition(step);
      expect(machine.canTransition("TimedOut")).toBe(true);
      expect(machine.canTransition("Failed")).toBe(true);
    },
  );

  it("routes failure states through Reporting", () => {
    const machine = new JobStateMachine();
    machine.transition("Failed");
    expect(machine.canTransition("Done")).toBe(false);
    machine.transition("Reporting");
    machine.transition("Done");
    expect(machine.state).toBe("Done");
  });

  it("throws on illegal transitions", () => {
    const machine = new JobStateMachine();
    expect(() => machine.transition("Publishing")).toThrow("Illegal job state transition Received -> Publishing");
    machine.transition("TimedOut");
    expect(() => machine.transition("Failed")).toThrow("Illegal job state transition TimedOut -> Failed");
  });

  it("has no way out of Done", () => {
    const machine = new JobStateMachine();
    machine.transition("Failed");
    machine.transition("Reporting");
    machine.transition("Done");
    expect(() => machine.transition("Failed")).toThrow();
  });
});
