import { describe, expect, it } from "vitest";

import { aggregateResults } from "../src/aggregate.js";
import { formatComparisonReport, formatGradeCounts } from "../src/report.js";
import type { TaskOutcome } from "../src/types.js";
import { makeOutcome } from "./fakes.js";

const labels = { A: "lean", B: "verbose" } as const;

function render(outcomes: readonly TaskOutcome[]): string[] {
  return formatComparisonReport(aggregateResults(outcomes, labels)).split("\n");
}

function cellsOf(lines: readonly string[], first: string): string[] {
  const row = lines.find((line) => line.split(" | ")[0]?.trim() === first);
  if (!row) {
    throw new Error(`no row starting with ${first}`);
  }
  return row.split(" | ").map((cell) => cell.trim());
}

describe("formatGradeCounts", () => {
  it("lists non-zero counts in grade order", () => {
    expect(formatGradeCounts({ A: 2, B: 0, C: 1, D: 0, F: 0 })).toBe("A:2, C:1");
    expect(formatGradeCounts({ A: 0, B: 0, C: 0, D: 0, F: 0 })).toBe("");
  });
});

describe("formatComparisonReport", () => {
  const graded = render([
    makeOutcome({
      taskId: "t1",
      slot: "A",
      inputTokens: 100,
      outputTokens: 50,
      latencyMs: 1200,
      grade: "A",
    }),
    makeOutcome({
      taskId: "t1",
      slot: "B",
      inputTokens: 110,
      outputTokens: 30,
      latencyMs: 900,
      grade: "B",
    }),
    makeOutcome({
      taskId: "t2",
      slot: "A",
      inputTokens: 600,
      outputTokens: 400,
      latencyMs: 1801,
      grade: "A",
    }),
    makeOutcome({ taskId: "t2", slot: "B", success: false, error: "timeout", latencyMs: 30000 }),
  ]);

  it("shows totals and grades when answers were graded", () => {
    expect(graded[1]).toBe("TOKEN EFFICIENCY COMPARISON: lean vs verbose");
    expect(cellsOf(graded, "Task")).toEqual([
      "Task",
      "lean tokens",
      "lean grade",
      "verbose tokens",
      "verbose grade",
      "Winner",
      "Savings",
    ]);
    expect(cellsOf(graded, "t1")).toEqual(["t1", "150", "A", "140", "B", "verbose", "-7%"]);
    expect(cellsOf(graded, "t2")).toEqual(["t2", "1,000", "A", "ERR", "-", "N/A", "N/A"]);
    expect(cellsOf(graded, "TOTAL")).toEqual(["TOTAL", "150", "A", "140", "B", "verbose", "-6.7%"]);
  });

  it("aligns every row to the header width", () => {
    const headerLength = graded[3]?.length ?? 0;
    expect(graded[0]).toBe("=".repeat(headerLength));
    expect(cellsOf(graded, "t1").length).toBe(7);
    for (const first of ["t1", "t2", "TOTAL"]) {
      const row = graded.find((line) => line.startsWith(`${first} `));
      expect(row?.length).toBe(headerLength);
    }
  });

  it("ends with the summary and grade distribution", () => {
    expect(graded.slice(-9)).toEqual([
      "Summary: lean wins 0 tasks, verbose wins 1 tasks, 0 tied",
      "Total tokens: lean=150, verbose=140",
      "Succeeded: lean=2/2, verbose=1/2",
      "Avg latency: lean=1,501 ms, verbose=900 ms",
      "verbose uses 6.7% fewer tokens overall",
      "",
      "Grade distribution:",
      "  lean: A:2 (average A)",
      "  verbose: B:1 (average B)",
    ]);
  });

  it("splits input and output tokens when nothing was graded", () => {
    const lines = render([
      makeOutcome({ taskId: "t1", slot: "A", inputTokens: 80, outputTokens: 20 }),
      makeOutcome({ taskId: "t1", slot: "B", inputTokens: 50, outputTokens: 10 }),
      makeOutcome({ taskId: "t2", slot: "A", inputTokens: 30, outputTokens: 10 }),
      makeOutcome({ taskId: "t2", slot: "B", inputTokens: 70, outputTokens: 10 }),
    ]);
    expect(cellsOf(lines, "Task").slice(1, 5)).toEqual([
      "lean input",
      "lean output",
      "verbose input",
      "verbose output",
    ]);
    expect(cellsOf(lines, "t1")).toEqual(["t1", "80", "20", "50", "10", "verbose", "-40%"]);
    expect(cellsOf(lines, "t2")).toEqual(["t2", "30", "10", "70", "10", "lean", "-50%"]);
    expect(cellsOf(lines, "TOTAL")).toEqual(["TOTAL", "110", "30", "120", "20", "tie", "0.0%"]);
    expect(lines.slice(-5)).toEqual([
      "Summary: lean wins 1 tasks, verbose wins 1 tasks, 0 tied",
      "Total tokens: lean=140, verbose=140",
      "Succeeded: lean=2/2, verbose=2/2",
      "Avg latency: lean=10 ms, verbose=10 ms",
      "Both approaches use the same number of tokens overall",
    ]);
  });

  it("shows a tied task as 0% and grading failures in the distribution", () => {
    const lines = render([
      makeOutcome({ taskId: "t1", slot: "A", inputTokens: 10, outputTokens: 10, grade: "?" }),
      makeOutcome({ taskId: "t1", slot: "B", inputTokens: 15, outputTokens: 5, grade: "C" }),
    ]);
    expect(cellsOf(lines, "t1")).toEqual(["t1", "20", "?", "20", "C", "tie", "0%"]);
    expect(lines.slice(-2)).toEqual(["  lean: none [1 grading failed]", "  verbose: C:1 (average C)"]);
  });

  it("explains when no task can be compared", () => {
    const lines = render([
      makeOutcome({ taskId: "t1", slot: "A", inputTokens: 10, outputTokens: 10 }),
      makeOutcome({ taskId: "t1", slot: "B", success: false, error: "boom" }),
    ]);
    expect(lines.some((line) => line.startsWith("TOTAL"))).toBe(false);
    expect(lines.slice(-3)).toEqual([
      "Succeeded: lean=1/1, verbose=0/1",
      "Avg latency: lean=10 ms, verbose=-",
      "No task succeeded under both approaches; savings not computed.",
    ]);
  });
});
