import type { ApproachSlot, TaskOutcome } from "./types.js";

type BenchmarkTelemetryBaseEvent = {
  readonly timestamp: string;
};

export type BenchmarkSetupStartedEvent = BenchmarkTelemetryBaseEvent & {
  readonly type: "benchmark.setup.started";
  readonly artifactCount: number;
  readonly sharedContainerCount: number;
};

export type BenchmarkArtifactUploadedEvent = BenchmarkTelemetryBaseEvent & {
  readonly type: "benchmark.artifact.uploaded";
  readonly artifactId: string;
  readonly fileId: string;
};

export type BenchmarkCapabilityProvisionedEvent = BenchmarkTelemetryBaseEvent & {
  readonly type: "benchmark.capability.provisioned";
  readonly slot: ApproachSlot;
  readonly displayName: string;
  readonly containerId: string;
  readonly reused: boolean;
};

export type BenchmarkSetupCompletedEvent = BenchmarkTelemetryBaseEvent & {
  readonly type: "benchmark.setup.completed";
  readonly durationMs: number;
};

export type BenchmarkRunStartedEvent = BenchmarkTelemetryBaseEvent & {
  readonly type: "benchmark.run.started";
  readonly taskCount: number;
  readonly slots: readonly ApproachSlot[];
  readonly mode: "sequential" | "concurrent";
  readonly grading: boolean;
};

export type BenchmarkTaskStartedEvent = BenchmarkTelemetryBaseEvent & {
  readonly type: "benchmark.task.started";
  readonly taskId: string;
  readonly taskName: string;
  readonly index: number;
  readonly total: number;
};

export type BenchmarkOutcomeEvent = BenchmarkTelemetryBaseEvent & {
  readonly type: "benchmark.outcome";
  readonly outcome: TaskOutcome;
};

export type BenchmarkRunCompletedEvent = BenchmarkTelemetryBaseEvent & {
  readonly type: "benchmark.run.completed";
  readonly durationMs: number;
  readonly outcomeCount: number;
  readonly failedCount: number;
};

export type BenchmarkTelemetryEvent =
  | BenchmarkSetupStartedEvent
  | BenchmarkArtifactUploadedEvent
  | BenchmarkCapabilityProvisionedEvent
  | BenchmarkSetupCompletedEvent
  | BenchmarkRunStartedEvent
  | BenchmarkTaskStartedEvent
  | BenchmarkOutcomeEvent
  | BenchmarkRunCompletedEvent;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

export type BenchmarkTelemetryPayload = DistributiveOmit<
  BenchmarkTelemetryEvent,
  keyof BenchmarkTelemetryBaseEvent
>;

export type BenchmarkTelemetrySink = {
  readonly emit: (event: BenchmarkTelemetryEvent) => void | Promise<void>;
  readonly flush?: () => void | Promise<void>;
};

export type BenchmarkTelemetrySession = {
  readonly emit: (event: BenchmarkTelemetryPayload) => void;
  readonly flush: () => Promise<void>;
};

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === "object" || typeof value === "function") &&
    value !== null &&
    "then" in value &&
    typeof value.then === "function"
  );
}

/**
 * Wraps a sink so that neither a throwing `emit` nor a rejected async emission
 * reaches the benchmark. Without a sink every emission is a no-op.
 */
export function createTelemetrySession(
  sink: BenchmarkTelemetrySink | undefined,
): BenchmarkTelemetrySession {
  const pending = new Set<Promise<void>>();

  const emit = (payload: BenchmarkTelemetryPayload): void => {
    if (!sink) {
      return;
    }
    const event = { ...payload, timestamp: new Date().toISOString() } as BenchmarkTelemetryEvent;
    try {
      const output = sink.emit(event);
      if (isPromiseLike(output)) {
        const task = Promise.resolve(output)
          .then(() => undefined)
          .catch(() => undefined);
        pending.add(task);
        void task.finally(() => {
          pending.delete(task);
        });
      }
    } catch {
      // Telemetry failures must never break a benchmark run.
    }
  };

  const flush = async (): Promise<void> => {
    while (pending.size > 0) {
      await Promise.allSettled([...pending]);
    }
    if (typeof sink?.flush === "function") {
      try {
        await sink.flush();
      } catch {
        // Telemetry failures must never break a benchmark run.
      }
    }
  };

  return { emit, flush };
}
