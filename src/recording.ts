import {
  createBenchmarkRun,
  runBenchmark,
  type BenchmarkContext,
  type RunBenchmarkOptions,
} from "./orchestrator.js";
import { defaultRecordPath, formatRunTimestamp, writeRunRecord } from "./store.js";
import type { BenchmarkRun } from "./types.js";

export type RecordTarget = {
  /** Explicit record path; otherwise a timestamped file under `resultsDir`. */
  readonly outputPath?: string;
  readonly resultsDir: string;
  readonly startedAt?: Date;
};

export type RecordedRun = {
  readonly run: BenchmarkRun;
  readonly outputPath: string;
};

/**
 * Runs the benchmark and persists its record. A setup or configuration
 * failure rejects before anything is written; failed task calls are kept in
 * the record as unsuccessful outcomes.
 */
export async function runAndRecord(
  context: BenchmarkContext,
  options: RunBenchmarkOptions,
  target: RecordTarget,
): Promise<RecordedRun> {
  const startedAt = target.startedAt ?? new Date();
  const outcomes = await runBenchmark(context, options);
  const run = createBenchmarkRun({
    timestamp: formatRunTimestamp(startedAt),
    model: context.config.model,
    suite: options.suite,
    outcomes,
  });
  const outputPath = target.outputPath ?? defaultRecordPath(target.resultsDir, run.timestamp);
  await writeRunRecord(outputPath, run);
  return { run, outputPath };
}
