import { describe, expect, it } from "vitest";

import { SetupError } from "../src/errors.js";
import {
  createBenchmarkRun,
  normalizeSlots,
  prepareRun,
  runBenchmark,
  type BenchmarkContext,
  type ExecutionMode,
} from "../src/orchestrator.js";
import type { BenchmarkTelemetryEvent } from "../src/telemetry.js";
import type { TaskOutcome } from "../src/types.js";
import { createFakeServices, makeSuite, taskAt, testConfig, textResponse } from "./fakes.js";

const suite = makeSuite();

function summarize(outcomes: readonly TaskOutcome[]): string[] {
  return outcomes.map(
    (outcome) =>
      `${outcome.taskId}/${outcome.slot}:${outcome.success ? outcome.totalTokens : "ERR"}:${outcome.grade ?? "-"}`,
  );
}

describe("normalizeSlots", () => {
  it("keeps A before B and drops duplicates", () => {
    expect(normalizeSlots(["B", "A", "B"])).toEqual(["A", "B"]);
    expect(normalizeSlots(["B"])).toEqual(["B"]);
  });
});

describe("prepareRun", () => {
  it("uploads each needed artifact once and provisions the shared container", async () => {
    const { services, calls } = createFakeServices();
    const resources = await prepareRun(
      { config: testConfig, services },
      { suite, tasks: suite.tasks, slots: ["A", "B"] },
    );
    expect(calls.uploads.map((artifact) => artifact.id)).toEqual(["data", "tool"]);
    expect(calls.provisions).toEqual([
      {
        displayName: "lean-box",
        artifacts: [
          { artifactId: "data", fileId: "file-data", fileName: "data.csv" },
          { artifactId: "tool", fileId: "file-tool", fileName: "tool-linux" },
        ],
      },
    ]);
    expect(resources.A.sharedContainerId).toBe("cntr-lean-box");
    expect(resources.B).toEqual({
      artifacts: [{ artifactId: "data", fileId: "file-data", fileName: "data.csv" }],
    });
  });

  it("skips the shared container when its approach is not selected", async () => {
    const { services, calls } = createFakeServices();
    await prepareRun({ config: testConfig, services }, { suite, tasks: suite.tasks, slots: ["B"] });
    expect(calls.uploads.map((artifact) => artifact.id)).toEqual(["data"]);
    expect(calls.provisions).toEqual([]);
  });
});

describe("runBenchmark", () => {
  it("runs every task under both approaches in catalog order and grades each answer", async () => {
    const { services, calls } = createFakeServices();
    const outcomes = await runBenchmark(
      { config: testConfig, services },
      { suite, tasks: suite.tasks, slots: ["A", "B"], mode: { type: "sequential" }, grading: true },
    );
    expect(summarize(outcomes)).toEqual(["t1/A:120:A", "t1/B:120:A", "t2/A:120:A", "t2/B:120:A"]);
    expect(calls.completions.map((request) => request.prompt)).toEqual([
      "Count rows.",
      "Count rows.",
      "Sum A.",
      "Sum B.",
    ]);
    expect(calls.completions[0]?.capabilities).toEqual([
      { type: "code_execution", container: { kind: "shared", containerId: "cntr-lean-box" } },
    ]);
    expect(calls.completions[1]?.capabilities).toEqual([
      { type: "code_execution", container: { kind: "ephemeral" } },
    ]);
    expect(calls.gradings.map((grading) => grading.model)).toEqual([
      "test-grader",
      "test-grader",
      "test-grader",
      "test-grader",
    ]);
  });

  it("produces the same outcomes sequentially and concurrently", async () => {
    const complete = async (request: { readonly prompt: string; readonly instructions: string }) =>
      textResponse("ok", request.prompt.length * 10, request.instructions.length);
    const run = async (mode: ExecutionMode): Promise<string[]> => {
      const { services } = createFakeServices({ complete });
      const outcomes = await runBenchmark(
        { config: testConfig, services },
        { suite, tasks: suite.tasks, slots: ["A", "B"], mode, grading: false },
      );
      return summarize(outcomes);
    };
    const sequential = await run({ type: "sequential" });
    expect(sequential).toEqual(["t1/A:119:-", "t1/B:118:-", "t2/A:69:-", "t2/B:68:-"]);
    expect(await run({ type: "concurrent" })).toEqual(sequential);
    expect(await run({ type: "concurrent", maxConcurrency: 1 })).toEqual(sequential);
  });

  it("records failures and grading errors without rejecting", async () => {
    const { services, calls } = createFakeServices({
      complete: async (request) => {
        if (request.prompt === "Sum B.") {
          throw new Error("rate limited");
        }
        return textResponse("answer", 100, 50);
      },
      grade: async (input) => {
        if (input.includes("PROMPT: Sum A.")) {
          throw new Error("grader down");
        }
        return { grade: "C", reason: "Partly right." };
      },
    });
    const outcomes = await runBenchmark(
      { config: testConfig, services },
      { suite, tasks: suite.tasks, slots: ["A", "B"], mode: { type: "concurrent" }, grading: true },
    );
    expect(summarize(outcomes)).toEqual(["t1/A:150:C", "t1/B:150:C", "t2/A:150:?", "t2/B:ERR:-"]);
    expect(outcomes[2]).toMatchObject({
      inputTokens: 100,
      outputTokens: 50,
      gradeReasoning: "Grading error: grader down",
    });
    expect(outcomes[3]?.error).toBe("rate limited");
    expect(calls.gradings).toHaveLength(3);
  });

  it("skips grading when disabled and runs only the selected approach", async () => {
    const { services, calls } = createFakeServices();
    const outcomes = await runBenchmark(
      { config: testConfig, services },
      { suite, tasks: suite.tasks, slots: ["B"], mode: { type: "sequential" }, grading: false },
    );
    expect(summarize(outcomes)).toEqual(["t1/B:120:-", "t2/B:120:-"]);
    expect(calls.gradings).toEqual([]);
  });

  it("fails before any task when setup fails", async () => {
    const { services, calls } = createFakeServices({
      provision: async () => {
        throw new Error("quota exceeded");
      },
    });
    const events: BenchmarkTelemetryEvent[] = [];
    const context: BenchmarkContext = {
      config: testConfig,
      services,
      telemetry: { emit: (event) => void events.push(event) },
    };
    const result = runBenchmark(context, {
      suite,
      tasks: suite.tasks,
      slots: ["A", "B"],
      mode: { type: "concurrent" },
      grading: true,
    });
    await expect(result).rejects.toBeInstanceOf(SetupError);
    await expect(result).rejects.toMatchObject({
      step: "capability-provisioning",
      message: 'Failed to provision shared container "lean-box": quota exceeded',
    });
    expect(calls.completions).toEqual([]);
    expect(events.map((event) => event.type)).toEqual([
      "benchmark.setup.started",
      "benchmark.artifact.uploaded",
      "benchmark.artifact.uploaded",
    ]);
  });

  it("reports upload failures as setup errors", async () => {
    const { services } = createFakeServices({
      upload: async () => {
        throw new Error("file too large");
      },
    });
    await expect(
      runBenchmark(
        { config: testConfig, services },
        { suite, tasks: suite.tasks, slots: ["B"], mode: { type: "sequential" }, grading: false },
      ),
    ).rejects.toMatchObject({ name: "SetupError", step: "artifact-upload" });
  });

  it("emits progress events in order", async () => {
    const { services } = createFakeServices();
    const events: BenchmarkTelemetryEvent[] = [];
    await runBenchmark(
      { config: testConfig, services, telemetry: { emit: (event) => void events.push(event) } },
      { suite, tasks: suite.tasks, slots: ["B"], mode: { type: "sequential" }, grading: false },
    );
    expect(events.map((event) => event.type)).toEqual([
      "benchmark.setup.started",
      "benchmark.artifact.uploaded",
      "benchmark.setup.completed",
      "benchmark.run.started",
      "benchmark.task.started",
      "benchmark.outcome",
      "benchmark.task.started",
      "benchmark.outcome",
      "benchmark.run.completed",
    ]);
    expect(events.at(-1)).toMatchObject({ outcomeCount: 2, failedCount: 0 });
  });

  it("rejects with the abort reason when cancelled", async () => {
    const controller = new AbortController();
    const reason = new Error("user cancelled");
    const { services } = createFakeServices({
      complete: async () => {
        controller.abort(reason);
        return textResponse("late", 1, 1);
      },
    });
    await expect(
      runBenchmark(
        { config: testConfig, services },
        {
          suite,
          tasks: suite.tasks,
          slots: ["A", "B"],
          mode: { type: "sequential" },
          grading: false,
          signal: controller.signal,
        },
      ),
    ).rejects.toBe(reason);
  });

  it("rejects instead of keeping the failed outcome of the call that was aborted", async () => {
    const controller = new AbortController();
    const reason = new Error("user cancelled");
    const { services } = createFakeServices({
      complete: async () => {
        controller.abort(reason);
        throw reason;
      },
    });
    await expect(
      runBenchmark(
        { config: testConfig, services },
        {
          suite,
          tasks: [taskAt(suite, 0)],
          slots: ["B"],
          mode: { type: "sequential" },
          grading: false,
          signal: controller.signal,
        },
      ),
    ).rejects.toBe(reason);
  });

  it("rejects when the abort lands during grading", async () => {
    const controller = new AbortController();
    const reason = new Error("user cancelled");
    const { services } = createFakeServices({
      grade: async () => {
        controller.abort(reason);
        throw reason;
      },
    });
    await expect(
      runBenchmark(
        { config: testConfig, services },
        {
          suite,
          tasks: [taskAt(suite, 0)],
          slots: ["A"],
          mode: { type: "concurrent" },
          grading: true,
          signal: controller.signal,
        },
      ),
    ).rejects.toBe(reason);
  });
});

describe("createBenchmarkRun", () => {
  it("captures the sample file and approach labels", () => {
    const run = createBenchmarkRun({
      timestamp: "20260102_030405",
      model: "test-model",
      suite,
      outcomes: [],
    });
    expect(run).toEqual({
      timestamp: "20260102_030405",
      model: "test-model",
      sampleFile: suite.sampleArtifact.path,
      labels: { A: "lean", B: "verbose" },
      outcomes: [],
    });
  });
});
