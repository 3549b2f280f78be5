import type { OpenAiSettings } from "../config.js";
import type { BenchmarkServices } from "../services.js";
import { createOpenAiClient } from "./client.js";
import { createOpenAiArtifactUploader, createOpenAiContainerProvisioner } from "./files.js";
import { createOpenAiCompletionClient } from "./responses.js";
import { createOpenAiStructuredClient } from "./structured.js";

export function createOpenAiBenchmarkServices(settings: OpenAiSettings): BenchmarkServices {
  const client = createOpenAiClient(settings);
  return {
    completion: createOpenAiCompletionClient(client),
    grader: createOpenAiStructuredClient(client),
    artifacts: createOpenAiArtifactUploader(client),
    capabilities: createOpenAiContainerProvisioner(client),
  };
}
