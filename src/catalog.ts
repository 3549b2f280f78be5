import { access, readFile } from "node:fs/promises";
import path from "node:path";

import { z } from "zod";

import { ConfigurationError, toErrorMessage } from "./errors.js";
import {
  APPROACH_SLOTS,
  type ApproachDefinition,
  type ApproachSlot,
  type ArtifactDefinition,
  type TaskDefinition,
} from "./types.js";

const DEFAULT_GRADING_SUBJECT = "a benchmark task";

const ArtifactSchema = z
  .object({
    id: z.string().trim().min(1),
    path: z.string().trim().min(1),
    fileName: z.string().trim().min(1).optional(),
  })
  .strict();

const ApproachSchema = z
  .object({
    label: z.string().trim().min(1),
    instructions: z.string().min(1),
    artifacts: z.array(z.string().trim().min(1)).default([]),
    sharedContainer: z
      .object({ name: z.string().trim().min(1) })
      .strict()
      .optional(),
  })
  .strict();

const TaskSchema = z
  .object({
    id: z.string().trim().min(1),
    name: z.string().trim().min(1),
    description: z.string().optional(),
    prompt: z.string().min(1).optional(),
    prompts: z
      .object({
        A: z.string().min(1).optional(),
        B: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    expectedAnswer: z.string().min(1).optional(),
    artifacts: z.array(z.string().trim().min(1)).default([]),
  })
  .strict();

const SuiteSchema = z
  .object({
    name: z.string().trim().min(1),
    subject: z.string().trim().min(1).optional(),
    sampleArtifact: z.string().trim().min(1),
    artifacts: z.array(ArtifactSchema).min(1),
    approaches: z.object({ A: ApproachSchema, B: ApproachSchema }).strict(),
    tasks: z.array(TaskSchema).min(1),
    extendedTasks: z.array(TaskSchema).default([]),
  })
  .strict();

type TaskInput = z.infer<typeof TaskSchema>;

export type BenchmarkSuite = {
  readonly name: string;
  /** Phrase completing "You are grading an AI's response to ...". */
  readonly subject: string;
  readonly sourcePath: string;
  readonly sampleArtifact: ArtifactDefinition;
  readonly artifacts: ReadonlyMap<string, ArtifactDefinition>;
  readonly approaches: Readonly<Record<ApproachSlot, ApproachDefinition>>;
  readonly tasks: readonly TaskDefinition[];
  readonly extendedTasks: readonly TaskDefinition[];
};

export type TaskSelection = {
  readonly taskIds?: readonly string[];
  readonly includeExtended?: boolean;
};

function formatIssuePath(pathSegments: readonly PropertyKey[]): string {
  if (pathSegments.length === 0) {
    return "(root)";
  }
  return pathSegments.map((segment) => String(segment)).join(".");
}

function toTaskDefinition(input: TaskInput, where: string, issues: string[]): TaskDefinition {
  const prompts: Partial<Record<ApproachSlot, string>> = {};
  for (const slot of APPROACH_SLOTS) {
    const prompt = input.prompts?.[slot] ?? input.prompt;
    if (prompt === undefined) {
      issues.push(`${where}: task "${input.id}" has no prompt for approach ${slot}`);
      continue;
    }
    prompts[slot] = prompt;
  }
  return {
    id: input.id,
    name: input.name,
    ...(input.description !== undefined ? { description: input.description } : {}),
    prompts: { A: prompts.A ?? "", B: prompts.B ?? "" },
    ...(input.expectedAnswer !== undefined ? { expectedAnswer: input.expectedAnswer } : {}),
    artifacts: input.artifacts,
  };
}

/**
 * Validates a parsed suite document. Relative artifact paths resolve against
 * `baseDir`. Every shape or reference problem is collected into a single
 * `ConfigurationError`.
 */
export function parseSuite(
  raw: unknown,
  options: { readonly baseDir: string; readonly sourcePath: string },
): BenchmarkSuite {
  const parsed = SuiteSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${formatIssuePath(issue.path)}: ${issue.message}`,
    );
    throw new ConfigurationError(`Invalid suite file ${options.sourcePath}`, issues);
  }
  const input = parsed.data;
  const issues: string[] = [];

  const artifacts = new Map<string, ArtifactDefinition>();
  for (const artifact of input.artifacts) {
    if (artifacts.has(artifact.id)) {
      issues.push(`artifacts: duplicate artifact id "${artifact.id}"`);
      continue;
    }
    const resolvedPath = path.resolve(options.baseDir, artifact.path);
    artifacts.set(artifact.id, {
      id: artifact.id,
      path: resolvedPath,
      fileName: artifact.fileName ?? path.basename(resolvedPath),
    });
  }

  const checkArtifactRefs = (refs: readonly string[], where: string): void => {
    for (const ref of refs) {
      if (!artifacts.has(ref)) {
        issues.push(`${where}: unknown artifact "${ref}"`);
      }
    }
  };

  for (const slot of APPROACH_SLOTS) {
    checkArtifactRefs(input.approaches[slot].artifacts, `approaches.${slot}`);
  }
  if (input.approaches.A.label === input.approaches.B.label) {
    issues.push(`approaches: labels must differ (both are "${input.approaches.A.label}")`);
  }

  const seenTaskIds = new Set<string>();
  const convertTasks = (tasks: readonly TaskInput[], key: string): TaskDefinition[] =>
    tasks.map((task, index) => {
      const where = `${key}.${index}`;
      if (seenTaskIds.has(task.id)) {
        issues.push(`${where}: duplicate task id "${task.id}"`);
      }
      seenTaskIds.add(task.id);
      checkArtifactRefs(task.artifacts, where);
      return toTaskDefinition(task, where, issues);
    });
  const tasks = convertTasks(input.tasks, "tasks");
  const extendedTasks = convertTasks(input.extendedTasks, "extendedTasks");

  const sampleArtifact = artifacts.get(input.sampleArtifact);
  if (!sampleArtifact) {
    issues.push(`sampleArtifact: unknown artifact "${input.sampleArtifact}"`);
  }

  if (issues.length > 0 || !sampleArtifact) {
    throw new ConfigurationError(`Invalid suite file ${options.sourcePath}`, issues);
  }

  return {
    name: input.name,
    subject: input.subject ?? DEFAULT_GRADING_SUBJECT,
    sourcePath: options.sourcePath,
    sampleArtifact,
    artifacts,
    approaches: input.approaches,
    tasks,
    extendedTasks,
  };
}

export async function loadSuite(suitePath: string): Promise<BenchmarkSuite> {
  const sourcePath = path.resolve(suitePath);
  let content: string;
  try {
    content = await readFile(sourcePath, "utf8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException)?.code === "ENOENT") {
      throw new ConfigurationError(`Suite file not found: ${sourcePath}`);
    }
    throw error;
  }
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(
      `Suite file ${sourcePath} is not valid JSON: ${toErrorMessage(error)}`,
    );
  }
  return parseSuite(raw, { baseDir: path.dirname(sourcePath), sourcePath });
}

/**
 * Returns the selected tasks in catalog order. Explicit ids may name extended
 * tasks without `includeExtended`.
 */
export function selectTasks(
  suite: BenchmarkSuite,
  selection: TaskSelection = {},
): readonly TaskDefinition[] {
  if (!selection.taskIds || selection.taskIds.length === 0) {
    return selection.includeExtended ? [...suite.tasks, ...suite.extendedTasks] : suite.tasks;
  }
  const pool = [...suite.tasks, ...suite.extendedTasks];
  const known = new Set(pool.map((task) => task.id));
  const unknown = selection.taskIds.filter((id) => !known.has(id));
  if (unknown.length > 0) {
    throw new ConfigurationError(`Unknown task id: ${unknown.join(", ")}`);
  }
  const requested = new Set(selection.taskIds);
  return pool.filter((task) => requested.has(task.id));
}

/** Artifact ids one approach needs for the given tasks, approach-level first. */
export function approachArtifactIds(
  suite: BenchmarkSuite,
  slot: ApproachSlot,
  tasks: readonly TaskDefinition[],
): readonly string[] {
  const ids = new Set<string>(suite.approaches[slot].artifacts);
  for (const task of tasks) {
    for (const id of task.artifacts) {
      ids.add(id);
    }
  }
  return [...ids];
}

export function requiredArtifactIds(
  suite: BenchmarkSuite,
  tasks: readonly TaskDefinition[],
  slots: readonly ApproachSlot[],
): readonly string[] {
  const ids = new Set<string>();
  for (const slot of slots) {
    for (const id of approachArtifactIds(suite, slot, tasks)) {
      ids.add(id);
    }
  }
  return [...ids];
}

export function resolveArtifact(suite: BenchmarkSuite, artifactId: string): ArtifactDefinition {
  const artifact = suite.artifacts.get(artifactId);
  if (!artifact) {
    throw new ConfigurationError(`Unknown artifact "${artifactId}" in suite ${suite.name}`);
  }
  return artifact;
}

export async function assertArtifactsExist(
  suite: BenchmarkSuite,
  artifactIds: readonly string[],
): Promise<void> {
  const missing: string[] = [];
  for (const id of artifactIds) {
    const artifact = resolveArtifact(suite, id);
    try {
      await access(artifact.path);
    } catch {
      missing.push(`${id}: ${artifact.path}`);
    }
  }
  if (missing.length > 0) {
    throw new ConfigurationError("Required input files are missing", missing);
  }
}
