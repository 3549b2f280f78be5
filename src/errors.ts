export class ConfigurationError extends Error {
  constructor(
    message: string,
    readonly issues: readonly string[] = [],
  ) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export type SetupStep = "artifact-upload" | "capability-provisioning";

export class SetupError extends Error {
  constructor(
    message: string,
    readonly step: SetupStep,
    options?: { readonly cause?: unknown },
  ) {
    super(message, options);
    this.name = "SetupError";
  }
}

export class StructuredOutputError extends Error {
  constructor(
    message: string,
    readonly rawText: string,
    options?: { readonly cause?: unknown },
  ) {
    super(message, options);
    this.name = "StructuredOutputError";
  }
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error && error.message) {
    return error.message;
  }
  if (error instanceof Error && error.name) {
    return error.name;
  }
  if (typeof error === "string" && error.length > 0) {
    return error;
  }
  return "Unknown error";
}
