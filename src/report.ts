import type { ComparisonSummary, TaskComparison, Winner } from "./aggregate.js";
import {
  LETTER_GRADES,
  type ApproachLabels,
  type ApproachSlot,
  type LetterGrade,
  type TaskOutcome,
} from "./types.js";

const TASK_COLUMN_WIDTH = 24;
const MIN_VALUE_COLUMN_WIDTH = 10;

type Column = {
  readonly header: string;
  readonly width: number;
  readonly align: "left" | "right";
};

export function formatInt(value: number): string {
  return value.toLocaleString("en-US");
}

export function formatGradeCounts(counts: Readonly<Record<LetterGrade, number>>): string {
  return LETTER_GRADES.filter((grade) => counts[grade] > 0)
    .map((grade) => `${grade}:${counts[grade]}`)
    .join(", ");
}

function winnerLabel(winner: Winner, labels: ApproachLabels): string {
  return winner === "tie" ? "tie" : labels[winner];
}

function formatTaskSavings(task: TaskComparison): string {
  if (!task.comparable || task.winner === undefined || task.savingsPercent === undefined) {
    return "N/A";
  }
  return task.winner === "tie" ? "0%" : `-${task.savingsPercent}%`;
}

function buildColumns(labels: ApproachLabels, graded: boolean): Column[] {
  const headers = graded
    ? [`${labels.A} tokens`, `${labels.A} grade`, `${labels.B} tokens`, `${labels.B} grade`]
    : [`${labels.A} input`, `${labels.A} output`, `${labels.B} input`, `${labels.B} output`];
  return [
    { header: "Task", width: TASK_COLUMN_WIDTH, align: "left" },
    ...[...headers, "Winner", "Savings"].map(
      (header): Column => ({
        header,
        width: Math.max(MIN_VALUE_COLUMN_WIDTH, header.length),
        align: "right",
      }),
    ),
  ];
}

function renderRow(columns: readonly Column[], cells: readonly string[]): string {
  return columns
    .map((column, index) => {
      const cell = cells[index] ?? "";
      return column.align === "left" ? cell.padEnd(column.width) : cell.padStart(column.width);
    })
    .join(" | ");
}

function tokenCell(outcome: TaskOutcome | undefined, pick: (outcome: TaskOutcome) => number): string {
  if (!outcome) {
    return "-";
  }
  return outcome.success ? formatInt(pick(outcome)) : "ERR";
}

function taskCells(task: TaskComparison, labels: ApproachLabels, graded: boolean): string[] {
  const a = task.outcomes.A;
  const b = task.outcomes.B;
  const winner = task.comparable && task.winner ? winnerLabel(task.winner, labels) : "N/A";
  const tail = [winner, formatTaskSavings(task)];
  if (graded) {
    return [
      task.taskName,
      tokenCell(a, (outcome) => outcome.totalTokens),
      a?.grade ?? "-",
      tokenCell(b, (outcome) => outcome.totalTokens),
      b?.grade ?? "-",
      ...tail,
    ];
  }
  return [
    task.taskName,
    tokenCell(a, (outcome) => outcome.inputTokens),
    tokenCell(a, (outcome) => outcome.outputTokens),
    tokenCell(b, (outcome) => outcome.inputTokens),
    tokenCell(b, (outcome) => outcome.outputTokens),
    ...tail,
  ];
}

function totalCells(summary: ComparisonSummary, graded: boolean): string[] | undefined {
  const overall = summary.overall;
  if (!overall) {
    return undefined;
  }
  const { A: a, B: b } = summary.approaches;
  const savings = overall.winner === "tie" ? "0.0%" : `-${overall.savingsPercent.toFixed(1)}%`;
  const tail = [winnerLabel(overall.winner, summary.labels), savings];
  if (graded) {
    return [
      "TOTAL",
      formatInt(a.totalTokens),
      a.averageGrade ?? "-",
      formatInt(b.totalTokens),
      b.averageGrade ?? "-",
      ...tail,
    ];
  }
  return [
    "TOTAL",
    formatInt(a.inputTokens),
    formatInt(a.outputTokens),
    formatInt(b.inputTokens),
    formatInt(b.outputTokens),
    ...tail,
  ];
}

function formatLatency(latencyMs: number | undefined): string {
  return latencyMs === undefined ? "-" : `${formatInt(Math.round(latencyMs))} ms`;
}

function gradeLine(summary: ComparisonSummary, slot: ApproachSlot): string {
  const approach = summary.approaches[slot];
  const counts = formatGradeCounts(approach.gradeCounts) || "none";
  const average = approach.averageGrade ? ` (average ${approach.averageGrade})` : "";
  const failures =
    approach.gradingFailures > 0 ? ` [${approach.gradingFailures} grading failed]` : "";
  return `  ${approach.label}: ${counts}${average}${failures}`;
}

/**
 * Renders the comparison as a fixed-width text table followed by a short
 * summary. Graded runs show total tokens and grades per approach; ungraded
 * runs show the input/output split instead.
 */
export function formatComparisonReport(summary: ComparisonSummary): string {
  const labels = summary.labels;
  const graded = summary.hasGrades;
  const columns = buildColumns(labels, graded);
  const header = renderRow(
    columns,
    columns.map((column) => column.header),
  );
  const heavyRule = "=".repeat(header.length);
  const lightRule = "-".repeat(header.length);

  const lines = [
    heavyRule,
    `TOKEN EFFICIENCY COMPARISON: ${labels.A} vs ${labels.B}`,
    heavyRule,
    header,
    lightRule,
    ...summary.tasks.map((task) => renderRow(columns, taskCells(task, labels, graded))),
    lightRule,
  ];
  const totals = totalCells(summary, graded);
  if (totals) {
    lines.push(renderRow(columns, totals));
  }
  lines.push(heavyRule, "");

  const { A: a, B: b } = summary.approaches;
  lines.push(
    `Summary: ${a.label} wins ${a.wins} tasks, ${b.label} wins ${b.wins} tasks, ${summary.ties} tied`,
    `Total tokens: ${a.label}=${formatInt(a.totalTokens)}, ${b.label}=${formatInt(b.totalTokens)}`,
    `Succeeded: ${a.label}=${a.successCount}/${a.taskCount}, ${b.label}=${b.successCount}/${b.taskCount}`,
    `Avg latency: ${a.label}=${formatLatency(a.averageLatencyMs)}, ${b.label}=${formatLatency(b.averageLatencyMs)}`,
  );
  const overall = summary.overall;
  if (!overall) {
    lines.push("No task succeeded under both approaches; savings not computed.");
  } else if (overall.winner === "tie") {
    lines.push("Both approaches use the same number of tokens overall");
  } else {
    lines.push(
      `${labels[overall.winner]} uses ${overall.savingsPercent.toFixed(1)}% fewer tokens overall`,
    );
  }

  if (graded) {
    lines.push("", "Grade distribution:", gradeLine(summary, "A"), gradeLine(summary, "B"));
  }
  return lines.join("\n");
}
