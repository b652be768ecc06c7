import { z } from "zod";
import { ConfigError } from "./errors";

const optionalText = z
  .string()
  .optional()
  .transform((value) => value?.trim() || undefined);

const configSchema = z.object({
  LLM_BACKEND: z.enum(["ollama", "openai"]).default("ollama"),
  LLM_MODEL: z.string().trim().min(1).default("gemma:2b"),
  LLM_TIMEOUT_SECONDS: z.coerce.number().int().positive().max(3600).default(120),
  OLLAMA_COMMAND: z.string().trim().min(1).default("ollama"),
  OPENAI_API_KEY: optionalText,
  PORT: z.coerce.number().int().min(1).max(65535).default(8787)
});

export type AppConfig = {
  backend: "ollama" | "openai";
  model: string;
  timeoutSeconds: number;
  ollamaCommand: string;
  openaiApiKey?: string;
  port: number;
};

const emptyToUndefined = (env: NodeJS.ProcessEnv): Record<string, string | undefined> =>
  Object.fromEntries(
    Object.entries(env).map(([key, value]) => [key, value === "" ? undefined : value])
  );

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = configSchema.safeParse(emptyToUndefined(env));
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError("Invalid configuration", details);
  }
  const data = parsed.data;
  return {
    backend: data.LLM_BACKEND,
    model: data.LLM_MODEL,
    timeoutSeconds: data.LLM_TIMEOUT_SECONDS,
    ollamaCommand: data.OLLAMA_COMMAND,
    openaiApiKey: data.OPENAI_API_KEY,
    port: data.PORT
  };
};
