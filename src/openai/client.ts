import OpenAI from "openai";
import { Agent } from "undici";

import type { OpenAiSettings } from "../config.js";

/**
 * Long code-interpreter turns can keep a response open for minutes, so both the
 * SDK timeout and the socket timeouts follow `settings.timeoutMs`.
 */
export function createOpenAiClient(settings: OpenAiSettings): OpenAI {
  const dispatcher = new Agent({
    bodyTimeout: settings.timeoutMs,
    headersTimeout: settings.timeoutMs,
  });
  return new OpenAI({
    apiKey: settings.apiKey,
    ...(settings.baseUrl ? { baseURL: settings.baseUrl } : {}),
    timeout: settings.timeoutMs,
    maxRetries: 0,
    fetchOptions: { dispatcher },
  });
}
