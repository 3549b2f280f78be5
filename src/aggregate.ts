import {
  isLetterGrade,
  type ApproachLabels,
  type ApproachSlot,
  type Grade,
  type LetterGrade,
  type TaskOutcome,
} from "./types.js";

export type Winner = ApproachSlot | "tie";

export type TotalsComparison = {
  readonly winner: Winner;
  /** Unrounded (loser - winner) / loser * 100; 0 for a tie. */
  readonly savingsPercent: number;
};

export type TaskComparison = {
  readonly taskId: string;
  readonly taskName: string;
  readonly outcomes: Readonly<Partial<Record<ApproachSlot, TaskOutcome>>>;
  readonly comparable: boolean;
  readonly winner?: Winner;
  /** Rounded to a whole percent. */
  readonly savingsPercent?: number;
};

export type ApproachSummary = {
  readonly slot: ApproachSlot;
  readonly label: string;
  /** Token sums over comparable tasks only. */
  readonly inputTokens: number;
  readonly outputTokens: number;
  readonly totalTokens: number;
  readonly wins: number;
  /** Outcomes recorded for this approach, failed ones included. */
  readonly taskCount: number;
  readonly successCount: number;
  /** Mean latency of the successful outcomes. */
  readonly averageLatencyMs?: number;
  readonly gradeCounts: Readonly<Record<LetterGrade, number>>;
  readonly gradingFailures: number;
  readonly meanGradeScore?: number;
  readonly averageGrade?: LetterGrade;
};

export type OverallComparison = TotalsComparison & {
  readonly comparableTaskCount: number;
};

export type ComparisonSummary = {
  readonly labels: ApproachLabels;
  readonly tasks: readonly TaskComparison[];
  readonly approaches: Readonly<Record<ApproachSlot, ApproachSummary>>;
  readonly ties: number;
  readonly hasGrades: boolean;
  /** Absent when no task has successful outcomes for both approaches. */
  readonly overall?: OverallComparison;
};

const GRADE_SCORES: Readonly<Record<LetterGrade, number>> = { A: 4, B: 3, C: 2, D: 1, F: 0 };

export function gradeScore(grade: LetterGrade): number {
  return GRADE_SCORES[grade];
}

export function bucketGradeScore(mean: number): LetterGrade {
  if (mean >= 3.5) {
    return "A";
  }
  if (mean >= 2.5) {
    return "B";
  }
  if (mean >= 1.5) {
    return "C";
  }
  if (mean >= 0.5) {
    return "D";
  }
  return "F";
}

/** Mean and bucketed letter of the letter grades; the `"?"` sentinel is skipped. */
export function averageGrade(
  grades: readonly Grade[],
): { readonly mean: number; readonly grade: LetterGrade } | undefined {
  const scores = grades.filter(isLetterGrade).map(gradeScore);
  if (scores.length === 0) {
    return undefined;
  }
  const mean = scores.reduce((sum, score) => sum + score, 0) / scores.length;
  return { mean, grade: bucketGradeScore(mean) };
}

/** The approach with strictly fewer tokens wins; equal totals tie at 0%. */
export function compareTotals(totalA: number, totalB: number): TotalsComparison {
  if (totalA < totalB) {
    return { winner: "A", savingsPercent: ((totalB - totalA) / totalB) * 100 };
  }
  if (totalB < totalA) {
    return { winner: "B", savingsPercent: ((totalA - totalB) / totalA) * 100 };
  }
  return { winner: "tie", savingsPercent: 0 };
}

export function roundToOneDecimal(value: number): number {
  return Math.round(value * 10) / 10;
}

function emptyGradeCounts(): Record<LetterGrade, number> {
  return { A: 0, B: 0, C: 0, D: 0, F: 0 };
}

function groupByTask(outcomes: readonly TaskOutcome[]): TaskComparison[] {
  const groups = new Map<
    string,
    { taskName: string; outcomes: Partial<Record<ApproachSlot, TaskOutcome>> }
  >();
  for (const outcome of outcomes) {
    let group = groups.get(outcome.taskId);
    if (!group) {
      group = { taskName: outcome.taskName, outcomes: {} };
      groups.set(outcome.taskId, group);
    }
    group.outcomes[outcome.slot] ??= outcome;
  }

  return [...groups.entries()].map(([taskId, group]) => {
    const a = group.outcomes.A;
    const b = group.outcomes.B;
    if (!a?.success || !b?.success) {
      return { taskId, taskName: group.taskName, outcomes: group.outcomes, comparable: false };
    }
    const comparison = compareTotals(a.totalTokens, b.totalTokens);
    return {
      taskId,
      taskName: group.taskName,
      outcomes: group.outcomes,
      comparable: true,
      winner: comparison.winner,
      savingsPercent: Math.round(comparison.savingsPercent),
    };
  });
}

/**
 * Pairs outcomes by task and reduces them to per-task winners, token totals,
 * run-level savings and grade averages. Tasks missing an approach or with a
 * failed approach are listed but left out of every token total.
 */
export function aggregateResults(
  outcomes: readonly TaskOutcome[],
  labels: ApproachLabels,
): ComparisonSummary {
  const tasks = groupByTask(outcomes);
  const comparableTasks = tasks.filter((task) => task.comparable);

  const summarize = (slot: ApproachSlot): ApproachSummary => {
    let inputTokens = 0;
    let outputTokens = 0;
    for (const task of comparableTasks) {
      inputTokens += task.outcomes[slot]?.inputTokens ?? 0;
      outputTokens += task.outcomes[slot]?.outputTokens ?? 0;
    }
    const own = outcomes.filter((outcome) => outcome.slot === slot);
    const succeeded = own.filter((outcome) => outcome.success);
    const grades = own.flatMap((outcome) => (outcome.grade ? [outcome.grade] : []));
    const gradeCounts = emptyGradeCounts();
    for (const grade of grades) {
      if (isLetterGrade(grade)) {
        gradeCounts[grade] += 1;
      }
    }
    const average = averageGrade(grades);
    return {
      slot,
      label: labels[slot],
      inputTokens,
      outputTokens,
      totalTokens: inputTokens + outputTokens,
      wins: comparableTasks.filter((task) => task.winner === slot).length,
      taskCount: own.length,
      successCount: succeeded.length,
      ...(succeeded.length > 0
        ? {
            averageLatencyMs:
              succeeded.reduce((sum, outcome) => sum + outcome.latencyMs, 0) / succeeded.length,
          }
        : {}),
      gradeCounts,
      gradingFailures: grades.filter((grade) => !isLetterGrade(grade)).length,
      ...(average ? { meanGradeScore: average.mean, averageGrade: average.grade } : {}),
    };
  };

  const approaches = { A: summarize("A"), B: summarize("B") };
  const hasGrades = outcomes.some((outcome) => outcome.grade !== undefined);
  const ties = comparableTasks.filter((task) => task.winner === "tie").length;

  if (comparableTasks.length === 0) {
    return { labels, tasks, approaches, ties, hasGrades };
  }
  const overall = compareTotals(approaches.A.totalTokens, approaches.B.totalTokens);
  return {
    labels,
    tasks,
    approaches,
    ties,
    hasGrades,
    overall: {
      winner: overall.winner,
      savingsPercent: roundToOneDecimal(overall.savingsPercent),
      comparableTaskCount: comparableTasks.length,
    },
  };
}
