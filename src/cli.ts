#!/usr/bin/env node
import path from "node:path";
import { fileURLToPath } from "node:url";
import { parseArgs } from "node:util";

import { aggregateResults } from "./aggregate.js";
import {
  assertArtifactsExist,
  loadSuite,
  requiredArtifactIds,
  selectTasks,
  type BenchmarkSuite,
} from "./catalog.js";
import { resolveBenchmarkConfig, resolveOpenAiSettings } from "./config.js";
import { createConsoleTelemetrySink } from "./consoleSink.js";
import { ConfigurationError, toErrorMessage } from "./errors.js";
import { createOpenAiBenchmarkServices } from "./openai/services.js";
import type { ExecutionMode } from "./orchestrator.js";
import { runAndRecord } from "./recording.js";
import { formatComparisonReport } from "./report.js";
import { readRunRecord } from "./store.js";
import { APPROACH_SLOTS, isApproachSlot, type ApproachSlot } from "./types.js";
import { defaultEnvFiles, loadEnvFiles } from "./utils/env.js";

const DEFAULT_SUITE_PATH = fileURLToPath(new URL("../suites/sales-csv.json", import.meta.url));
const DEFAULT_RESULTS_DIR = "results";

function printUsage(): void {
  console.log(`
Token efficiency benchmark: runs every task under two approaches, compares
token usage, and optionally grades each answer.

Usage:
  token-duel [options]

Options:
  --suite <path>          Suite file (default: bundled suites/sales-csv.json)
  --task <ids>            Comma-separated task ids (default: all core tasks)
  --approach <A|B|label>  Run only one approach
  --sequential            Run tasks one at a time (default: concurrent)
  --concurrency <n>       Max tasks in flight when concurrent (default: all)
  --no-grade              Skip grading
  --extended              Include the extended task set
  --model <id>            Model for the approaches (env: TOKEN_DUEL_MODEL)
  --grader-model <id>     Model for grading (env: TOKEN_DUEL_GRADER_MODEL)
  --reasoning <level>     minimal, low, medium, high
  --output <path>         Record path (default: <results-dir>/benchmark_<timestamp>.json)
  --results-dir <dir>     Directory for records (default: ${DEFAULT_RESULTS_DIR})
  --report <path>         Print the comparison for a saved record and exit
  --help                  Show this help
`);
}

function parsePositiveInt(raw: string, optionName: string): number {
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ConfigurationError(`Invalid ${optionName}: ${raw}`);
  }
  return parsed;
}

function parseCsvList(raw: string | undefined): readonly string[] {
  if (!raw) {
    return [];
  }
  return [
    ...new Set(
      raw
        .split(",")
        .map((entry) => entry.trim())
        .filter(Boolean),
    ),
  ];
}

/** Accepts a slot letter or an approach label. */
function parseApproach(raw: string | undefined, suite: BenchmarkSuite): readonly ApproachSlot[] {
  if (raw === undefined) {
    return APPROACH_SLOTS;
  }
  const value = raw.trim();
  if (isApproachSlot(value)) {
    return [value];
  }
  const match = APPROACH_SLOTS.find((slot) => suite.approaches[slot].label === value);
  if (!match) {
    const labels = APPROACH_SLOTS.map((slot) => suite.approaches[slot].label).join(", ");
    throw new ConfigurationError(`Unknown approach: ${raw} (expected A, B, ${labels})`);
  }
  return [match];
}

async function printSavedReport(recordPath: string): Promise<void> {
  const run = await readRunRecord(recordPath);
  console.log(formatComparisonReport(aggregateResults(run.outcomes, run.labels)));
}

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      suite: { type: "string" },
      task: { type: "string" },
      approach: { type: "string" },
      sequential: { type: "boolean", default: false },
      concurrency: { type: "string" },
      "no-grade": { type: "boolean", default: false },
      extended: { type: "boolean", default: false },
      model: { type: "string" },
      "grader-model": { type: "string" },
      reasoning: { type: "string" },
      output: { type: "string" },
      "results-dir": { type: "string", default: DEFAULT_RESULTS_DIR },
      report: { type: "string" },
      help: { type: "boolean", default: false },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printUsage();
    return;
  }
  if (values.report) {
    await printSavedReport(path.resolve(values.report));
    return;
  }

  const suitePath = path.resolve(values.suite ?? DEFAULT_SUITE_PATH);
  loadEnvFiles(defaultEnvFiles({ cwd: process.cwd(), suiteDir: path.dirname(suitePath) }));

  const suite = await loadSuite(suitePath);
  const tasks = selectTasks(suite, {
    taskIds: parseCsvList(values.task),
    includeExtended: values.extended,
  });
  const slots = parseApproach(values.approach, suite);
  await assertArtifactsExist(suite, requiredArtifactIds(suite, tasks, slots));

  const config = resolveBenchmarkConfig({
    ...(values.model ? { model: values.model } : {}),
    ...(values["grader-model"] ? { graderModel: values["grader-model"] } : {}),
    ...(values.reasoning ? { reasoningEffort: values.reasoning } : {}),
  });
  const services = createOpenAiBenchmarkServices(resolveOpenAiSettings());

  const mode: ExecutionMode = values.sequential
    ? { type: "sequential" }
    : {
        type: "concurrent",
        ...(values.concurrency
          ? { maxConcurrency: parsePositiveInt(values.concurrency, "--concurrency") }
          : {}),
      };

  const { run, outputPath } = await runAndRecord(
    { config, services, telemetry: createConsoleTelemetrySink() },
    { suite, tasks, slots, mode, grading: !values["no-grade"] },
    {
      ...(values.output ? { outputPath: path.resolve(values.output) } : {}),
      resultsDir: path.resolve(values["results-dir"] ?? DEFAULT_RESULTS_DIR),
    },
  );
  if (slots.length === APPROACH_SLOTS.length) {
    console.log(`\n${formatComparisonReport(aggregateResults(run.outcomes, run.labels))}`);
  }
  console.log(`\nResults saved to: ${outputPath}`);
}

void main().catch((error: unknown) => {
  console.error(toErrorMessage(error));
  if (error instanceof ConfigurationError) {
    for (const issue of error.issues) {
      console.error(`  - ${issue}`);
    }
  }
  process.exitCode = 1;
});
