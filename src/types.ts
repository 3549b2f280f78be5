export const APPROACH_SLOTS = ["A", "B"] as const;

export type ApproachSlot = (typeof APPROACH_SLOTS)[number];

export const LETTER_GRADES = ["A", "B", "C", "D", "F"] as const;

export type LetterGrade = (typeof LETTER_GRADES)[number];

/**
 * `"?"` marks an outcome whose grading call failed. It is not a score and is
 * excluded from grade averages.
 */
export const GRADING_FAILED = "?";

export type Grade = LetterGrade | typeof GRADING_FAILED;

export function isLetterGrade(value: string): value is LetterGrade {
  return (LETTER_GRADES as readonly string[]).includes(value);
}

export function isApproachSlot(value: string): value is ApproachSlot {
  return (APPROACH_SLOTS as readonly string[]).includes(value);
}

export type TaskDefinition = {
  readonly id: string;
  readonly name: string;
  readonly description?: string;
  readonly prompts: Readonly<Record<ApproachSlot, string>>;
  /** Reference answer shown to the grader. Never sent to the approaches. */
  readonly expectedAnswer?: string;
  readonly artifacts: readonly string[];
};

export type SharedContainerDefinition = {
  /** Display name used to find an existing container before creating one. */
  readonly name: string;
};

export type ApproachDefinition = {
  readonly label: string;
  readonly instructions: string;
  readonly artifacts: readonly string[];
  readonly sharedContainer?: SharedContainerDefinition;
};

export type ArtifactDefinition = {
  readonly id: string;
  /** Absolute path once the suite is loaded. */
  readonly path: string;
  readonly fileName: string;
};

export type ArtifactHandle = {
  readonly artifactId: string;
  readonly fileId: string;
  readonly fileName: string;
};

export type TaskOutcome = {
  readonly taskId: string;
  readonly taskName: string;
  readonly slot: ApproachSlot;
  readonly approach: string;
  readonly success: boolean;
  readonly inputTokens: number;
  readonly outputTokens: number;
  readonly totalTokens: number;
  readonly latencyMs: number;
  readonly error?: string;
  readonly responseText?: string;
  readonly grade?: Grade;
  readonly gradeReasoning?: string;
};

export type ApproachLabels = Readonly<Record<ApproachSlot, string>>;

export type BenchmarkRun = {
  readonly timestamp: string;
  readonly model: string;
  readonly sampleFile: string;
  readonly labels: ApproachLabels;
  readonly outcomes: readonly TaskOutcome[];
};
