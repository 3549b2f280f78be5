import type OpenAI from "openai";
import type { z } from "zod";

import { StructuredOutputError, toErrorMessage } from "../errors.js";
import type { CallOptions, StructuredOutputClient, StructuredOutputRequest } from "../services.js";
import { parseModelJson } from "../utils/json.js";
import { resolveStopReason } from "./responses.js";
import { buildJsonSchemaFormat } from "./schema.js";

export function parseStructuredOutput<T>(rawText: string, schema: z.ZodType<T>): T {
  if (rawText.trim() === "") {
    throw new StructuredOutputError("Model returned no text output", rawText);
  }
  let payload: unknown;
  try {
    payload = parseModelJson(rawText);
  } catch (error) {
    throw new StructuredOutputError(
      `Model output is not valid JSON: ${toErrorMessage(error)}`,
      rawText,
      { cause: error },
    );
  }
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.map(String).join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new StructuredOutputError(`Model output does not match schema: ${issues}`, rawText, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

export function createOpenAiStructuredClient(client: OpenAI): StructuredOutputClient {
  const generate = async <T>(
    request: StructuredOutputRequest<T>,
    options?: CallOptions,
  ): Promise<T> => {
    const response = await client.responses.create(
      {
        model: request.model,
        input: request.input,
        text: { format: buildJsonSchemaFormat(request.schema, request.schemaName) },
        max_output_tokens: request.maxOutputTokens,
        ...(request.reasoningEffort ? { reasoning: { effort: request.reasoningEffort } } : {}),
      },
      options?.signal ? { signal: options.signal } : undefined,
    );
    if (response.status === "incomplete") {
      throw new StructuredOutputError(
        `Structured response incomplete: ${resolveStopReason(response)}`,
        response.output_text,
      );
    }
    return parseStructuredOutput(response.output_text, request.schema);
  };
  return { generate };
}
