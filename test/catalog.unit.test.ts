import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { describe, expect, it } from "vitest";

import {
  approachArtifactIds,
  assertArtifactsExist,
  loadSuite,
  parseSuite,
  requiredArtifactIds,
  selectTasks,
} from "../src/catalog.js";
import { ConfigurationError } from "../src/errors.js";
import { makeSuite, rawSuite } from "./fakes.js";

function parseIssues(raw: unknown): readonly string[] {
  try {
    parseSuite(raw, { baseDir: "/suite", sourcePath: "/suite/suite.json" });
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return error.issues;
    }
    throw error;
  }
  throw new Error("expected parseSuite to fail");
}

describe("parseSuite", () => {
  it("resolves artifact paths and per-slot prompts", () => {
    const suite = makeSuite();
    expect(suite.subject).toBe("a test task");
    expect(suite.sampleArtifact).toEqual({
      id: "data",
      path: path.resolve("/suite", "data.csv"),
      fileName: "data.csv",
    });
    expect(suite.artifacts.get("tool")?.fileName).toBe("tool-linux");
    expect(suite.tasks.map((task) => task.prompts)).toEqual([
      { A: "Count rows.", B: "Count rows." },
      { A: "Sum A.", B: "Sum B." },
    ]);
    expect(suite.tasks[0]?.expectedAnswer).toBe("4");
    expect(suite.tasks[1]?.expectedAnswer).toBeUndefined();
    expect(suite.approaches.A.sharedContainer).toEqual({ name: "lean-box" });
  });

  it("collects every reference problem into one error", () => {
    const raw = rawSuite();
    raw.sampleArtifact = "missing";
    raw.tasks = [
      { id: "t1", name: "One", prompt: "p", artifacts: ["ghost"] },
      { id: "t1", name: "Again", prompts: { A: "only A" } },
    ];
    expect(parseIssues(raw)).toEqual([
      'tasks.0: unknown artifact "ghost"',
      'tasks.1: duplicate task id "t1"',
      "tasks.1: task \"t1\" has no prompt for approach B",
      'sampleArtifact: unknown artifact "missing"',
    ]);
  });

  it("rejects identical approach labels", () => {
    const raw = rawSuite();
    raw.approaches = {
      A: { label: "same", instructions: "a" },
      B: { label: "same", instructions: "b" },
    };
    expect(parseIssues(raw)).toEqual(['approaches: labels must differ (both are "same")']);
  });

  it("reports schema violations with their path", () => {
    const raw = rawSuite();
    raw.tasks = [];
    const issues = parseIssues(raw);
    expect(issues).toHaveLength(1);
    expect(issues[0]?.startsWith("tasks: ")).toBe(true);
  });
});

describe("selectTasks", () => {
  const suite = makeSuite();

  it("returns core tasks by default and appends extended ones on request", () => {
    expect(selectTasks(suite).map((task) => task.id)).toEqual(["t1", "t2"]);
    expect(selectTasks(suite, { includeExtended: true }).map((task) => task.id)).toEqual([
      "t1",
      "t2",
      "x1",
    ]);
  });

  it("keeps catalog order for explicit ids, including extended ones", () => {
    expect(selectTasks(suite, { taskIds: ["x1", "t1"] }).map((task) => task.id)).toEqual([
      "t1",
      "x1",
    ]);
  });

  it("rejects unknown ids", () => {
    expect(() => selectTasks(suite, { taskIds: ["t1", "nope"] })).toThrow("Unknown task id: nope");
  });
});

describe("artifact requirements", () => {
  const suite = makeSuite();

  it("unions approach and task artifacts for the selected slots", () => {
    expect(approachArtifactIds(suite, "B", suite.tasks)).toEqual(["data"]);
    expect(requiredArtifactIds(suite, suite.tasks, ["B"])).toEqual(["data"]);
    expect(requiredArtifactIds(suite, suite.tasks, ["A", "B"])).toEqual(["data", "tool"]);
  });

  it("lists every missing file", async () => {
    await expect(assertArtifactsExist(suite, ["data", "tool"])).rejects.toMatchObject({
      name: "ConfigurationError",
      issues: [
        `data: ${path.resolve("/suite", "data.csv")}`,
        `tool: ${path.resolve("/suite", "bin/tool")}`,
      ],
    });
  });
});

describe("loadSuite", () => {
  it("reads a suite file relative to its directory", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "token-duel-suite-"));
    const suitePath = path.join(dir, "suite.json");
    fs.writeFileSync(suitePath, JSON.stringify(rawSuite()), "utf8");
    fs.writeFileSync(path.join(dir, "data.csv"), "a,b\n1,2\n", "utf8");

    const suite = await loadSuite(suitePath);
    expect(suite.sourcePath).toBe(suitePath);
    expect(suite.sampleArtifact.path).toBe(path.join(dir, "data.csv"));
    await expect(assertArtifactsExist(suite, ["data"])).resolves.toBeUndefined();
  });

  it("reports a missing suite file", async () => {
    const missing = path.join(os.tmpdir(), "token-duel-missing", "suite.json");
    await expect(loadSuite(missing)).rejects.toThrow(`Suite file not found: ${missing}`);
  });

  it("reports invalid JSON", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "token-duel-suite-"));
    const suitePath = path.join(dir, "suite.json");
    fs.writeFileSync(suitePath, "{ not json", "utf8");
    await expect(loadSuite(suitePath)).rejects.toBeInstanceOf(ConfigurationError);
  });
});
