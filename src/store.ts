import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";

import { z } from "zod";

import { ConfigurationError, toErrorMessage } from "./errors.js";
import {
  GRADING_FAILED,
  LETTER_GRADES,
  type ApproachLabels,
  type ApproachSlot,
  type BenchmarkRun,
  type TaskOutcome,
} from "./types.js";

const TokenCountSchema = z.number().int().nonnegative();

const OutcomeRecordSchema = z.object({
  task_id: z.string(),
  task_name: z.string(),
  approach: z.string(),
  success: z.boolean(),
  input_tokens: TokenCountSchema,
  output_tokens: TokenCountSchema,
  total_tokens: TokenCountSchema,
  latency_ms: TokenCountSchema,
  error: z.string().nullish(),
  response_text: z.string().nullish(),
  grade: z.enum([...LETTER_GRADES, GRADING_FAILED]).nullish(),
  grade_reasoning: z.string().nullish(),
});

const RunRecordSchema = z.object({
  timestamp: z.string(),
  model: z.string(),
  sample_file: z.string(),
  approaches: z.object({ A: z.string(), B: z.string() }).optional(),
  results: z.array(OutcomeRecordSchema),
});

export type OutcomeRecord = z.infer<typeof OutcomeRecordSchema>;
export type RunRecord = z.infer<typeof RunRecordSchema>;

export function toOutcomeRecord(outcome: TaskOutcome): OutcomeRecord {
  return {
    task_id: outcome.taskId,
    task_name: outcome.taskName,
    approach: outcome.approach,
    success: outcome.success,
    input_tokens: outcome.inputTokens,
    output_tokens: outcome.outputTokens,
    total_tokens: outcome.totalTokens,
    latency_ms: outcome.latencyMs,
    ...(outcome.error !== undefined ? { error: outcome.error } : {}),
    ...(outcome.responseText !== undefined ? { response_text: outcome.responseText } : {}),
    ...(outcome.grade !== undefined ? { grade: outcome.grade } : {}),
    ...(outcome.gradeReasoning !== undefined ? { grade_reasoning: outcome.gradeReasoning } : {}),
  };
}

/**
 * The persisted shape: snake_case fields, optional outcome fields present only
 * when set. `approaches` maps slots to labels so a saved run can be compared
 * again later.
 */
export function toRunRecord(run: BenchmarkRun): RunRecord {
  return {
    timestamp: run.timestamp,
    model: run.model,
    sample_file: run.sampleFile,
    approaches: { A: run.labels.A, B: run.labels.B },
    results: run.outcomes.map(toOutcomeRecord),
  };
}

/**
 * Without an `approaches` map, labels are assigned in order of first
 * appearance, which matches the A-before-B order runs are written in.
 */
function resolveLabels(record: RunRecord): ApproachLabels {
  if (record.approaches) {
    return record.approaches;
  }
  const seen = [...new Set(record.results.map((result) => result.approach))];
  return { A: seen[0] ?? "A", B: seen[1] ?? "B" };
}

function slotForLabel(result: OutcomeRecord, labels: ApproachLabels): ApproachSlot {
  if (result.approach === labels.A) {
    return "A";
  }
  if (result.approach === labels.B) {
    return "B";
  }
  throw new ConfigurationError(
    `Unknown approach "${result.approach}" for task ${result.task_id} (expected ${labels.A} or ${labels.B})`,
  );
}

function fromOutcomeRecord(result: OutcomeRecord, labels: ApproachLabels): TaskOutcome {
  const slot = slotForLabel(result, labels);
  return {
    taskId: result.task_id,
    taskName: result.task_name,
    slot,
    approach: result.approach,
    success: result.success,
    inputTokens: result.input_tokens,
    outputTokens: result.output_tokens,
    totalTokens: result.total_tokens,
    latencyMs: result.latency_ms,
    ...(result.error != null ? { error: result.error } : {}),
    ...(result.response_text != null ? { responseText: result.response_text } : {}),
    ...(result.grade != null ? { grade: result.grade } : {}),
    ...(result.grade_reasoning != null ? { gradeReasoning: result.grade_reasoning } : {}),
  };
}

export function fromRunRecord(record: RunRecord): BenchmarkRun {
  const labels = resolveLabels(record);
  return {
    timestamp: record.timestamp,
    model: record.model,
    sampleFile: record.sample_file,
    labels,
    outcomes: record.results.map((result) => fromOutcomeRecord(result, labels)),
  };
}

export async function writeRunRecord(filePath: string, run: BenchmarkRun): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, `${JSON.stringify(toRunRecord(run), null, 2)}\n`, "utf8");
}

export async function readRunRecord(filePath: string): Promise<BenchmarkRun> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(filePath, "utf8"));
  } catch (error) {
    throw new ConfigurationError(`Cannot read run record ${filePath}: ${toErrorMessage(error)}`);
  }
  const parsed = RunRecordSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid run record ${filePath}`,
      parsed.error.issues.map((issue) => `${issue.path.map(String).join(".")}: ${issue.message}`),
    );
  }
  return fromRunRecord(parsed.data);
}

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

/** `YYYYMMDD_HHMMSS` in local time. */
export function formatRunTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}`;
  const time = `${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`;
  return `${day}_${time}`;
}

export function defaultRecordPath(resultsDir: string, timestamp: string): string {
  return path.join(resultsDir, `benchmark_${timestamp}.json`);
}
