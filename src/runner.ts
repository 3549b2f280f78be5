import { toErrorMessage } from "./errors.js";
import type {
  CapabilityDeclaration,
  CompletionClient,
  CompletionRequest,
  ContentFragment,
  ReasoningEffort,
} from "./services.js";
import type {
  ApproachDefinition,
  ApproachSlot,
  ArtifactHandle,
  TaskDefinition,
  TaskOutcome,
} from "./types.js";

/** What setup produced for one approach. */
export type ApproachResources = {
  readonly artifacts: readonly ArtifactHandle[];
  /** Present when the approach declares a shared container. */
  readonly sharedContainerId?: string;
};

export type RunApproachParams = {
  readonly client: CompletionClient;
  readonly model: string;
  readonly maxOutputTokens: number;
  readonly reasoningEffort?: ReasoningEffort;
  readonly task: TaskDefinition;
  readonly slot: ApproachSlot;
  readonly approach: ApproachDefinition;
  readonly resources: ApproachResources;
  readonly signal?: AbortSignal;
};

export function collectResponseText(content: readonly ContentFragment[]): string {
  let text = "";
  for (const fragment of content) {
    if (fragment.kind === "text") {
      text += fragment.text;
    }
  }
  return text;
}

function toTokenCount(value: number): number {
  return Number.isFinite(value) && value > 0 ? Math.floor(value) : 0;
}

export function buildCompletionRequest(params: RunApproachParams): CompletionRequest {
  const capability: CapabilityDeclaration = {
    type: "code_execution",
    container: params.resources.sharedContainerId
      ? { kind: "shared", containerId: params.resources.sharedContainerId }
      : { kind: "ephemeral" },
  };
  return {
    model: params.model,
    instructions: params.approach.instructions,
    prompt: params.task.prompts[params.slot],
    capabilities: [capability],
    artifacts: params.resources.artifacts,
    maxOutputTokens: params.maxOutputTokens,
    ...(params.reasoningEffort ? { reasoningEffort: params.reasoningEffort } : {}),
  };
}

/**
 * Runs one task under one approach with a single completion call. A failed
 * call becomes an outcome with `success: false`; this function never rejects.
 */
export async function runApproach(params: RunApproachParams): Promise<TaskOutcome> {
  const startedAt = Date.now();
  const base = {
    taskId: params.task.id,
    taskName: params.task.name,
    slot: params.slot,
    approach: params.approach.label,
  };

  try {
    const response = await params.client.complete(
      buildCompletionRequest(params),
      params.signal ? { signal: params.signal } : undefined,
    );
    const latencyMs = Math.max(0, Date.now() - startedAt);
    const inputTokens = toTokenCount(response.usage.inputTokens);
    const outputTokens = toTokenCount(response.usage.outputTokens);
    const responseText = collectResponseText(response.content);
    return {
      ...base,
      success: true,
      inputTokens,
      outputTokens,
      totalTokens: inputTokens + outputTokens,
      latencyMs,
      ...(responseText ? { responseText } : {}),
    };
  } catch (error) {
    return {
      ...base,
      success: false,
      inputTokens: 0,
      outputTokens: 0,
      totalTokens: 0,
      latencyMs: Math.max(0, Date.now() - startedAt),
      error: toErrorMessage(error),
    };
  }
}
