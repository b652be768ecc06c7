import type { AppConfig } from "../../src/lib/config";
import type { GenerationBackend } from "../../src/lib/generation/types";
import { createOllamaBackend } from "../ollama-client";
import { createOpenAIBackend } from "../openai-client";

export const createBackend = (config: AppConfig): GenerationBackend =>
  config.backend === "openai"
    ? createOpenAIBackend({ apiKey: config.openaiApiKey })
    : createOllamaBackend({ command: config.ollamaCommand });
