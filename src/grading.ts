import { z } from "zod";

import { toErrorMessage } from "./errors.js";
import type { ReasoningEffort, StructuredOutputClient } from "./services.js";
import {
  GRADING_FAILED,
  LETTER_GRADES,
  type ApproachSlot,
  type Grade,
  type TaskDefinition,
  type TaskOutcome,
} from "./types.js";

export const GradeSchema = z
  .object({
    grade: z.enum(LETTER_GRADES),
    reason: z.string(),
  })
  .strict();

export type GradeVerdict = {
  readonly grade: Grade;
  readonly reason: string;
};

export const GRADING_CRITERIA = [
  "- A: Fully correct",
  "- B: Mostly correct, minor omissions",
  "- C: Partially correct, some key facts wrong/missing",
  "- D: Mostly incorrect but shows some understanding",
  "- F: Completely wrong or non-responsive",
].join("\n");

const MISSING_EXPECTED_ANSWER = "No expected answer provided";

export type GradingPromptInput = {
  readonly subject: string;
  readonly taskName: string;
  readonly prompt: string;
  readonly expectedAnswer?: string;
  readonly responseText: string;
};

export function buildGradingPrompt(input: GradingPromptInput): string {
  return [
    `You are grading an AI's response to ${input.subject}.`,
    "",
    `TASK: ${input.taskName}`,
    `PROMPT: ${input.prompt}`,
    "",
    "EXPECTED ANSWER (ground truth):",
    input.expectedAnswer ?? MISSING_EXPECTED_ANSWER,
    "",
    "AI'S ACTUAL RESPONSE:",
    input.responseText,
    "",
    "Grade the response on correctness:",
    GRADING_CRITERIA,
    "",
    "Reply with the letter grade and a one or two sentence reason.",
  ].join("\n");
}

export type GradeResponseParams = {
  readonly client: StructuredOutputClient;
  readonly model: string;
  readonly maxOutputTokens: number;
  readonly reasoningEffort?: ReasoningEffort;
  readonly subject: string;
  readonly task: TaskDefinition;
  readonly slot: ApproachSlot;
  readonly responseText: string;
  readonly signal?: AbortSignal;
};

/**
 * Grades one response with a single structured call. Any failure yields the
 * `"?"` sentinel with the failure reason; this function never rejects.
 */
export async function gradeResponse(params: GradeResponseParams): Promise<GradeVerdict> {
  try {
    const verdict = await params.client.generate(
      {
        model: params.model,
        input: buildGradingPrompt({
          subject: params.subject,
          taskName: params.task.name,
          prompt: params.task.prompts[params.slot],
          ...(params.task.expectedAnswer !== undefined
            ? { expectedAnswer: params.task.expectedAnswer }
            : {}),
          responseText: params.responseText,
        }),
        schema: GradeSchema,
        schemaName: "grade_result",
        maxOutputTokens: params.maxOutputTokens,
        ...(params.reasoningEffort ? { reasoningEffort: params.reasoningEffort } : {}),
      },
      params.signal ? { signal: params.signal } : undefined,
    );
    return { grade: verdict.grade, reason: verdict.reason };
  } catch (error) {
    return { grade: GRADING_FAILED, reason: `Grading error: ${toErrorMessage(error)}` };
  }
}

export function isGradable(outcome: TaskOutcome): boolean {
  return outcome.success && typeof outcome.responseText === "string" && outcome.responseText !== "";
}

/** Returns a copy of `outcome` with only the grade fields set. */
export function applyGrade(outcome: TaskOutcome, verdict: GradeVerdict): TaskOutcome {
  return { ...outcome, grade: verdict.grade, gradeReasoning: verdict.reason };
}
