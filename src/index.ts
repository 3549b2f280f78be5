export {
  aggregateResults,
  averageGrade,
  bucketGradeScore,
  compareTotals,
  gradeScore,
} from "./aggregate.js";
export type {
  ApproachSummary,
  ComparisonSummary,
  OverallComparison,
  TaskComparison,
  TotalsComparison,
  Winner,
} from "./aggregate.js";

export {
  approachArtifactIds,
  assertArtifactsExist,
  loadSuite,
  parseSuite,
  requiredArtifactIds,
  resolveArtifact,
  selectTasks,
} from "./catalog.js";
export type { BenchmarkSuite, TaskSelection } from "./catalog.js";

export {
  DEFAULT_GRADER_MODEL,
  DEFAULT_MODEL,
  resolveBenchmarkConfig,
  resolveOpenAiSettings,
} from "./config.js";
export type { BenchmarkConfig, BenchmarkConfigOverrides, OpenAiSettings } from "./config.js";

export { createConsoleTelemetrySink, formatLogLine } from "./consoleSink.js";

export {
  ConfigurationError,
  SetupError,
  StructuredOutputError,
  toErrorMessage,
} from "./errors.js";
export type { SetupStep } from "./errors.js";

export {
  applyGrade,
  buildGradingPrompt,
  GradeSchema,
  gradeResponse,
  isGradable,
} from "./grading.js";
export type { GradeVerdict } from "./grading.js";

export { createOpenAiClient } from "./openai/client.js";
export { createOpenAiArtifactUploader, createOpenAiContainerProvisioner } from "./openai/files.js";
export {
  buildResponsesRequest,
  createOpenAiCompletionClient,
  toCompletionResponse,
} from "./openai/responses.js";
export { buildJsonSchemaFormat } from "./openai/schema.js";
export { createOpenAiBenchmarkServices } from "./openai/services.js";
export { createOpenAiStructuredClient, parseStructuredOutput } from "./openai/structured.js";

export {
  createBenchmarkRun,
  normalizeSlots,
  prepareRun,
  runBenchmark,
} from "./orchestrator.js";
export type {
  BenchmarkContext,
  ExecutionMode,
  RunBenchmarkOptions,
  RunPlan,
  RunResources,
} from "./orchestrator.js";

export { runAndRecord } from "./recording.js";
export type { RecordedRun, RecordTarget } from "./recording.js";

export { formatComparisonReport, formatGradeCounts } from "./report.js";

export { buildCompletionRequest, collectResponseText, runApproach } from "./runner.js";
export type { ApproachResources, RunApproachParams } from "./runner.js";

export type {
  ArtifactUploader,
  BenchmarkServices,
  CallOptions,
  CapabilityDeclaration,
  CapabilityProvisioner,
  CodeExecutionCapability,
  CompletionClient,
  CompletionRequest,
  CompletionResponse,
  CompletionUsage,
  ContentFragment,
  ProvisionedContainer,
  ReasoningEffort,
  SharedContainerRequest,
  StructuredOutputClient,
  StructuredOutputRequest,
} from "./services.js";

export {
  defaultRecordPath,
  formatRunTimestamp,
  fromRunRecord,
  readRunRecord,
  toRunRecord,
  writeRunRecord,
} from "./store.js";
export type { OutcomeRecord, RunRecord } from "./store.js";

export { createTelemetrySession } from "./telemetry.js";
export type {
  BenchmarkTelemetryEvent,
  BenchmarkTelemetryPayload,
  BenchmarkTelemetrySession,
  BenchmarkTelemetrySink,
} from "./telemetry.js";

export {
  APPROACH_SLOTS,
  GRADING_FAILED,
  isApproachSlot,
  isLetterGrade,
  LETTER_GRADES,
} from "./types.js";
export type {
  ApproachDefinition,
  ApproachLabels,
  ApproachSlot,
  ArtifactDefinition,
  ArtifactHandle,
  BenchmarkRun,
  Grade,
  LetterGrade,
  SharedContainerDefinition,
  TaskDefinition,
  TaskOutcome,
} from "./types.js";

export { defaultEnvFiles, loadEnvFiles, parseEnvContent } from "./utils/env.js";
export { runTaskScope } from "./utils/taskScope.js";
