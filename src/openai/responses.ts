import type OpenAI from "openai";
import type {
  ResponseCreateParamsNonStreaming,
  Tool,
} from "openai/resources/responses/responses";

import type {
  CallOptions,
  CompletionClient,
  CompletionRequest,
  CompletionResponse,
  ContentFragment,
} from "../services.js";
import type { ArtifactHandle } from "../types.js";
import { isPlainRecord } from "../utils/json.js";

/** Where the code interpreter mounts attached files. */
export const CONTAINER_FILE_ROOT = "/mnt/data";

export type ResponseLike = {
  readonly output: ReadonlyArray<{ readonly type: string; readonly content?: unknown }>;
  readonly usage?: {
    readonly input_tokens: number;
    readonly output_tokens: number;
  } | null;
  readonly status?: string | null;
  readonly incomplete_details?: { readonly reason?: string | null } | null;
};

export function formatPromptWithFiles(prompt: string, artifacts: readonly ArtifactHandle[]): string {
  if (artifacts.length === 0) {
    return prompt;
  }
  const listing = artifacts.map((artifact) => `- ${CONTAINER_FILE_ROOT}/${artifact.fileName}`);
  return [prompt, "", "Available files:", ...listing].join("\n");
}

function toTools(request: CompletionRequest): Tool[] {
  return request.capabilities.map((capability): Tool => {
    const container = capability.container;
    if (container.kind === "shared") {
      return { type: "code_interpreter", container: container.containerId };
    }
    return {
      type: "code_interpreter",
      container: { type: "auto", file_ids: request.artifacts.map((artifact) => artifact.fileId) },
    };
  });
}

export function buildResponsesRequest(request: CompletionRequest): ResponseCreateParamsNonStreaming {
  return {
    model: request.model,
    instructions: request.instructions,
    input: formatPromptWithFiles(request.prompt, request.artifacts),
    tools: toTools(request),
    max_output_tokens: request.maxOutputTokens,
    ...(request.reasoningEffort ? { reasoning: { effort: request.reasoningEffort } } : {}),
  };
}

function toContentFragments(item: ResponseLike["output"][number]): ContentFragment[] {
  if (item.type !== "message" || !Array.isArray(item.content)) {
    return [{ kind: "other", type: item.type }];
  }
  return item.content.map((part: unknown): ContentFragment => {
    if (!isPlainRecord(part)) {
      return { kind: "other", type: "unknown" };
    }
    if (part.type === "output_text" && typeof part.text === "string") {
      return { kind: "text", text: part.text };
    }
    return { kind: "other", type: typeof part.type === "string" ? part.type : "unknown" };
  });
}

function toTokenCount(value: number | undefined): number {
  return value !== undefined && Number.isFinite(value) ? Math.max(0, Math.floor(value)) : 0;
}

export function resolveStopReason(response: ResponseLike): string {
  if (response.status === "incomplete") {
    return response.incomplete_details?.reason ?? "incomplete";
  }
  return response.status ?? "completed";
}

export function toCompletionResponse(response: ResponseLike): CompletionResponse {
  return {
    content: response.output.flatMap(toContentFragments),
    usage: {
      inputTokens: toTokenCount(response.usage?.input_tokens),
      outputTokens: toTokenCount(response.usage?.output_tokens),
    },
    stopReason: resolveStopReason(response),
  };
}

export function createOpenAiCompletionClient(client: OpenAI): CompletionClient {
  return {
    complete: async (request: CompletionRequest, options?: CallOptions) => {
      const response = await client.responses.create(
        buildResponsesRequest(request),
        options?.signal ? { signal: options.signal } : undefined,
      );
      return toCompletionResponse(response);
    },
  };
}
