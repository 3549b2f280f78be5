import { zodToJsonSchema } from "@alcyone-labs/zod-to-json-schema";
import type { z } from "zod";

import { isPlainRecord, type JsonObject } from "../utils/json.js";

export type JsonSchemaTextFormat = {
  readonly type: "json_schema";
  readonly name: string;
  readonly strict: true;
  readonly schema: JsonObject;
};

/**
 * Strict structured outputs need every property listed in `required` and
 * `additionalProperties: false` on every object.
 */
export function normalizeStrictSchema(schema: JsonObject): JsonObject {
  if (typeof schema.$ref === "string") {
    return { $ref: schema.$ref };
  }
  const output: JsonObject = {};
  for (const [key, value] of Object.entries(schema)) {
    switch (key) {
      case "properties":
      case "required":
      case "additionalProperties":
        break;
      case "items":
        if (isPlainRecord(value)) {
          output.items = normalizeStrictSchema(value);
        }
        break;
      case "anyOf":
      case "oneOf":
        if (Array.isArray(value)) {
          output.anyOf = value.filter(isPlainRecord).map(normalizeStrictSchema);
        }
        break;
      case "$defs":
      case "definitions":
        if (isPlainRecord(value)) {
          const defs: JsonObject = {};
          for (const [defKey, defValue] of Object.entries(value)) {
            if (isPlainRecord(defValue)) {
              defs[defKey] = normalizeStrictSchema(defValue);
            }
          }
          output[key] = defs;
        }
        break;
      default:
        output[key] = value;
    }
  }

  const properties = schema.properties;
  if (isPlainRecord(properties)) {
    const normalized: JsonObject = {};
    for (const [key, value] of Object.entries(properties)) {
      normalized[key] = isPlainRecord(value) ? normalizeStrictSchema(value) : value;
    }
    output.properties = normalized;
    output.required = Object.keys(properties);
    output.additionalProperties = false;
  } else if (schema.type === "object") {
    output.additionalProperties = false;
    output.required = [];
  }
  return output;
}

/** Inlines a root `$ref` into `definitions` or `$defs`, which strict mode rejects. */
export function resolveSchemaRoot(schema: JsonObject): JsonObject {
  if (typeof schema.$ref !== "string") {
    return schema;
  }
  const match = /^#\/(definitions|[$]defs)\/(.+)$/u.exec(schema.$ref);
  const section = match?.[1];
  const key = match?.[2];
  if (!section || !key) {
    return schema;
  }
  const defs = schema[section];
  if (!isPlainRecord(defs)) {
    return schema;
  }
  const resolved = defs[key];
  return isPlainRecord(resolved) ? { ...resolved } : schema;
}

export function buildJsonSchemaFormat(schema: z.ZodType, name: string): JsonSchemaTextFormat {
  const raw: unknown = zodToJsonSchema(schema, { name, target: "openAi" });
  if (!isPlainRecord(raw)) {
    throw new Error(`Schema "${name}" did not convert to a JSON object schema.`);
  }
  const root = resolveSchemaRoot(raw);
  if (root.type !== "object") {
    throw new Error("Structured outputs require a JSON object schema at the root.");
  }
  return { type: "json_schema", name, strict: true, schema: normalizeStrictSchema(root) };
}
