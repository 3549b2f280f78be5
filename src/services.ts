import type { z } from "zod";

import type { ArtifactDefinition, ArtifactHandle } from "./types.js";

export type ReasoningEffort = "minimal" | "low" | "medium" | "high";

export type CodeExecutionCapability = {
  readonly type: "code_execution";
  /**
   * `shared`: a container provisioned during setup that already holds the
   * artifacts. `ephemeral`: a fresh container per call seeded with the
   * request's artifacts.
   */
  readonly container:
    | { readonly kind: "shared"; readonly containerId: string }
    | { readonly kind: "ephemeral" };
};

export type CapabilityDeclaration = CodeExecutionCapability;

export type CompletionRequest = {
  readonly model: string;
  readonly instructions: string;
  readonly prompt: string;
  readonly capabilities: readonly CapabilityDeclaration[];
  readonly artifacts: readonly ArtifactHandle[];
  readonly maxOutputTokens: number;
  readonly reasoningEffort?: ReasoningEffort;
};

export type ContentFragment =
  | { readonly kind: "text"; readonly text: string }
  | { readonly kind: "other"; readonly type: string };

export type CompletionUsage = {
  readonly inputTokens: number;
  readonly outputTokens: number;
};

export type CompletionResponse = {
  readonly content: readonly ContentFragment[];
  readonly usage: CompletionUsage;
  readonly stopReason: string;
};

export type CallOptions = {
  readonly signal?: AbortSignal;
};

export type CompletionClient = {
  readonly complete: (
    request: CompletionRequest,
    options?: CallOptions,
  ) => Promise<CompletionResponse>;
};

export type StructuredOutputRequest<T> = {
  readonly model: string;
  readonly input: string;
  readonly schema: z.ZodType<T>;
  readonly schemaName: string;
  readonly maxOutputTokens: number;
  readonly reasoningEffort?: ReasoningEffort;
};

export type StructuredOutputClient = {
  readonly generate: <T>(request: StructuredOutputRequest<T>, options?: CallOptions) => Promise<T>;
};

export type ArtifactUploader = {
  readonly upload: (artifact: ArtifactDefinition) => Promise<ArtifactHandle>;
};

export type SharedContainerRequest = {
  readonly displayName: string;
  readonly artifacts: readonly ArtifactHandle[];
};

export type ProvisionedContainer = {
  readonly containerId: string;
  readonly reused: boolean;
};

export type CapabilityProvisioner = {
  readonly provisionSharedContainer: (
    request: SharedContainerRequest,
  ) => Promise<ProvisionedContainer>;
};

export type BenchmarkServices = {
  readonly completion: CompletionClient;
  readonly grader: StructuredOutputClient;
  readonly artifacts: ArtifactUploader;
  readonly capabilities: CapabilityProvisioner;
};
