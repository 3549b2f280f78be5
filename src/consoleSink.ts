import { formatInt } from "./report.js";
import type { BenchmarkTelemetryEvent, BenchmarkTelemetrySink } from "./telemetry.js";
import { GRADING_FAILED, type TaskOutcome } from "./types.js";

export type LogLevel = "INFO" | "WARN";

type LogLine = { readonly level: LogLevel; readonly message: string };

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

/** `HH:MM:SS` in local time. */
export function formatClock(date: Date): string {
  return `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
}

function formatSeconds(durationMs: number): string {
  return `${(durationMs / 1000).toFixed(1)}s`;
}

function describeOutcome(outcome: TaskOutcome): LogLine {
  const prefix = `[${outcome.taskName}] ${outcome.approach}`;
  if (!outcome.success) {
    return { level: "WARN", message: `${prefix}: FAILED ${outcome.error ?? "unknown error"}` };
  }
  const tokens = `${formatInt(outcome.inputTokens)} in / ${formatInt(outcome.outputTokens)} out (OK)`;
  if (outcome.grade === GRADING_FAILED) {
    return {
      level: "WARN",
      message: `${prefix}: ${tokens} [?] ${outcome.gradeReasoning ?? ""}`.trimEnd(),
    };
  }
  const grade = outcome.grade ? ` [${outcome.grade}]` : "";
  return { level: "INFO", message: `${prefix}: ${tokens}${grade}` };
}

export function describeEvent(event: BenchmarkTelemetryEvent): LogLine {
  switch (event.type) {
    case "benchmark.setup.started":
      return {
        level: "INFO",
        message: `Setup: ${event.artifactCount} artifact(s), ${event.sharedContainerCount} shared container(s)`,
      };
    case "benchmark.artifact.uploaded":
      return { level: "INFO", message: `Uploaded ${event.artifactId}: ${event.fileId}` };
    case "benchmark.capability.provisioned":
      return {
        level: "INFO",
        message: `${event.reused ? "Reusing" : "Created"} container "${event.displayName}" for ${event.slot}: ${event.containerId}`,
      };
    case "benchmark.setup.completed":
      return { level: "INFO", message: `Setup finished in ${formatSeconds(event.durationMs)}` };
    case "benchmark.run.started":
      return {
        level: "INFO",
        message: `Running ${event.taskCount} task(s) on ${event.slots.join("+")} (${event.mode}${event.grading ? "" : ", no grading"})`,
      };
    case "benchmark.task.started":
      return { level: "INFO", message: `[${event.index}/${event.total}] ${event.taskName}` };
    case "benchmark.outcome":
      return describeOutcome(event.outcome);
    case "benchmark.run.completed":
      return {
        level: event.failedCount > 0 ? "WARN" : "INFO",
        message: `Completed ${event.outcomeCount} outcome(s) in ${formatSeconds(event.durationMs)}, ${event.failedCount} failed`,
      };
  }
}

export function formatLogLine(event: BenchmarkTelemetryEvent): string {
  const { level, message } = describeEvent(event);
  return `${formatClock(new Date(event.timestamp))} [${level}] ${message}`;
}

export function createConsoleTelemetrySink(
  write: (line: string) => void = (line) => console.log(line),
): BenchmarkTelemetrySink {
  return {
    emit: (event) => {
      write(formatLogLine(event));
    },
  };
}
