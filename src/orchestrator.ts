import {
  approachArtifactIds,
  requiredArtifactIds,
  resolveArtifact,
  type BenchmarkSuite,
} from "./catalog.js";
import type { BenchmarkConfig } from "./config.js";
import { SetupError, toErrorMessage } from "./errors.js";
import { applyGrade, gradeResponse, isGradable } from "./grading.js";
import { runApproach, type ApproachResources } from "./runner.js";
import type { BenchmarkServices } from "./services.js";
import {
  createTelemetrySession,
  type BenchmarkTelemetrySession,
  type BenchmarkTelemetrySink,
} from "./telemetry.js";
import {
  APPROACH_SLOTS,
  type ApproachSlot,
  type ArtifactHandle,
  type BenchmarkRun,
  type TaskDefinition,
  type TaskOutcome,
} from "./types.js";
import { runTaskScope } from "./utils/taskScope.js";

/**
 * Everything a run needs, built once by the caller. Nothing in the core reads
 * process-wide state.
 */
export type BenchmarkContext = {
  readonly config: BenchmarkConfig;
  readonly services: BenchmarkServices;
  readonly telemetry?: BenchmarkTelemetrySink;
};

export type ExecutionMode =
  | { readonly type: "sequential" }
  | { readonly type: "concurrent"; readonly maxConcurrency?: number };

export type RunPlan = {
  readonly suite: BenchmarkSuite;
  readonly tasks: readonly TaskDefinition[];
  readonly slots: readonly ApproachSlot[];
};

export type RunBenchmarkOptions = RunPlan & {
  readonly mode: ExecutionMode;
  readonly grading: boolean;
  readonly signal?: AbortSignal;
};

export type RunResources = Readonly<Record<ApproachSlot, ApproachResources>>;

/** Keeps A before B and drops duplicates. */
export function normalizeSlots(slots: readonly ApproachSlot[]): readonly ApproachSlot[] {
  return APPROACH_SLOTS.filter((slot) => slots.includes(slot));
}

async function prepareRunWithSession(
  context: BenchmarkContext,
  plan: RunPlan,
  telemetry: BenchmarkTelemetrySession,
): Promise<RunResources> {
  const startedAt = Date.now();
  const slots = normalizeSlots(plan.slots);
  const artifactIds = requiredArtifactIds(plan.suite, plan.tasks, slots);
  const containerSlots = slots.filter((slot) => plan.suite.approaches[slot].sharedContainer);
  telemetry.emit({
    type: "benchmark.setup.started",
    artifactCount: artifactIds.length,
    sharedContainerCount: containerSlots.length,
  });

  const handles = new Map<string, ArtifactHandle>();
  for (const artifactId of artifactIds) {
    const artifact = resolveArtifact(plan.suite, artifactId);
    try {
      const handle = await context.services.artifacts.upload(artifact);
      handles.set(artifactId, handle);
      telemetry.emit({
        type: "benchmark.artifact.uploaded",
        artifactId,
        fileId: handle.fileId,
      });
    } catch (error) {
      throw new SetupError(
        `Failed to upload artifact "${artifactId}" (${artifact.path}): ${toErrorMessage(error)}`,
        "artifact-upload",
        { cause: error },
      );
    }
  }

  const resourcesFor = async (slot: ApproachSlot): Promise<ApproachResources> => {
    const artifacts = approachArtifactIds(plan.suite, slot, plan.tasks).flatMap((id) => {
      const handle = handles.get(id);
      return handle ? [handle] : [];
    });
    const sharedContainer = plan.suite.approaches[slot].sharedContainer;
    if (!slots.includes(slot) || !sharedContainer) {
      return { artifacts };
    }
    try {
      const provisioned = await context.services.capabilities.provisionSharedContainer({
        displayName: sharedContainer.name,
        artifacts,
      });
      telemetry.emit({
        type: "benchmark.capability.provisioned",
        slot,
        displayName: sharedContainer.name,
        containerId: provisioned.containerId,
        reused: provisioned.reused,
      });
      return { artifacts, sharedContainerId: provisioned.containerId };
    } catch (error) {
      throw new SetupError(
        `Failed to provision shared container "${sharedContainer.name}": ${toErrorMessage(error)}`,
        "capability-provisioning",
        { cause: error },
      );
    }
  };

  const resources = { A: await resourcesFor("A"), B: await resourcesFor("B") };
  telemetry.emit({
    type: "benchmark.setup.completed",
    durationMs: Math.max(0, Date.now() - startedAt),
  });
  return resources;
}

/**
 * Uploads the artifacts the selected approaches and tasks need and provisions
 * shared containers. Any failure is a `SetupError`.
 */
export async function prepareRun(context: BenchmarkContext, plan: RunPlan): Promise<RunResources> {
  const telemetry = createTelemetrySession(context.telemetry);
  try {
    return await prepareRunWithSession(context, plan, telemetry);
  } finally {
    await telemetry.flush();
  }
}

type TaskUnitParams = {
  readonly context: BenchmarkContext;
  readonly options: RunBenchmarkOptions;
  readonly slots: readonly ApproachSlot[];
  readonly resources: RunResources;
  readonly telemetry: BenchmarkTelemetrySession;
  readonly task: TaskDefinition;
  readonly signal?: AbortSignal;
};

/** One task, its approaches in slot order, each graded right after it runs. */
async function runTaskUnit(params: TaskUnitParams): Promise<TaskOutcome[]> {
  const { context, options, task, signal } = params;
  const { config, services } = context;
  const outcomes: TaskOutcome[] = [];
  for (const slot of params.slots) {
    signal?.throwIfAborted();
    let outcome = await runApproach({
      client: services.completion,
      model: config.model,
      maxOutputTokens: config.maxOutputTokens,
      ...(config.reasoningEffort ? { reasoningEffort: config.reasoningEffort } : {}),
      task,
      slot,
      approach: options.suite.approaches[slot],
      resources: params.resources[slot],
      ...(signal ? { signal } : {}),
    });
    // A call cut short by the abort comes back as a failed outcome; drop it.
    signal?.throwIfAborted();
    if (options.grading && isGradable(outcome)) {
      const verdict = await gradeResponse({
        client: services.grader,
        model: config.graderModel,
        maxOutputTokens: config.graderMaxOutputTokens,
        subject: options.suite.subject,
        task,
        slot,
        responseText: outcome.responseText ?? "",
        ...(signal ? { signal } : {}),
      });
      signal?.throwIfAborted();
      outcome = applyGrade(outcome, verdict);
    }
    params.telemetry.emit({ type: "benchmark.outcome", outcome });
    outcomes.push(outcome);
  }
  return outcomes;
}

/**
 * Runs the selected tasks through the selected approaches and returns every
 * outcome in catalog order, approach A before B within a task.
 *
 * Setup runs first; a `SetupError` there rejects before any task starts.
 * Per-call failures never reject: they are recorded as failed outcomes or
 * `"?"` grades. Aborting `options.signal` rejects with the abort reason and
 * discards in-flight work.
 */
export async function runBenchmark(
  context: BenchmarkContext,
  options: RunBenchmarkOptions,
): Promise<readonly TaskOutcome[]> {
  const telemetry = createTelemetrySession(context.telemetry);
  try {
    const slots = normalizeSlots(options.slots);
    const resources = await prepareRunWithSession(context, options, telemetry);
    const startedAt = Date.now();
    telemetry.emit({
      type: "benchmark.run.started",
      taskCount: options.tasks.length,
      slots,
      mode: options.mode.type,
      grading: options.grading,
    });

    const unitParams = { context, options, slots, resources, telemetry };
    let outcomes: TaskOutcome[];
    if (options.mode.type === "sequential") {
      outcomes = [];
      for (const [index, task] of options.tasks.entries()) {
        options.signal?.throwIfAborted();
        telemetry.emit({
          type: "benchmark.task.started",
          taskId: task.id,
          taskName: task.name,
          index: index + 1,
          total: options.tasks.length,
        });
        outcomes.push(
          ...(await runTaskUnit({
            ...unitParams,
            task,
            ...(options.signal ? { signal: options.signal } : {}),
          })),
        );
      }
      options.signal?.throwIfAborted();
    } else {
      const perTask = await runTaskScope(
        options.tasks.map((task) => (signal: AbortSignal) => runTaskUnit({ ...unitParams, task, signal })),
        {
          ...(options.mode.maxConcurrency !== undefined
            ? { maxConcurrency: options.mode.maxConcurrency }
            : {}),
          ...(options.signal ? { signal: options.signal } : {}),
        },
      );
      outcomes = perTask.flat();
    }

    telemetry.emit({
      type: "benchmark.run.completed",
      durationMs: Math.max(0, Date.now() - startedAt),
      outcomeCount: outcomes.length,
      failedCount: outcomes.filter((outcome) => !outcome.success).length,
    });
    return outcomes;
  } finally {
    await telemetry.flush();
  }
}

export function createBenchmarkRun(params: {
  readonly timestamp: string;
  readonly model: string;
  readonly suite: BenchmarkSuite;
  readonly outcomes: readonly TaskOutcome[];
}): BenchmarkRun {
  return {
    timestamp: params.timestamp,
    model: params.model,
    sampleFile: params.suite.sampleArtifact.path,
    labels: {
      A: params.suite.approaches.A.label,
      B: params.suite.approaches.B.label,
    },
    outcomes: params.outcomes,
  };
}
