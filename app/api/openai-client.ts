import OpenAI from "openai";
import { resolveOutput, timeoutMessage } from "../src/lib/generation/generateText";
import type {
  GenerationBackend,
  GenerationRequest,
  GenerationResult
} from "../src/lib/generation/types";

export type ChatCompletionCall = (
  request: { model: string; prompt: string },
  signal: AbortSignal
) => Promise<string | null>;

type OpenAIBackendOptions = {
  apiKey?: string;
  complete?: ChatCompletionCall;
};

const SYSTEM_PROMPT = "You review tabular datasets and report data quality findings as plain markdown.";

const sdkCompletion =
  (client: OpenAI): ChatCompletionCall =>
  async ({ model, prompt }, signal) => {
    const completion = await client.chat.completions.create(
      {
        model,
        temperature: 0,
        messages: [
          { role: "system", content: SYSTEM_PROMPT },
          { role: "user", content: prompt }
        ]
      },
      { signal }
    );
    return completion.choices[0]?.message?.content ?? null;
  };

const ensureCompletion = (options: OpenAIBackendOptions): ChatCompletionCall | null => {
  if (options.complete) {
    return options.complete;
  }
  if (!options.apiKey || options.apiKey.trim() === "") {
    return null;
  }
  return sdkCompletion(new OpenAI({ apiKey: options.apiKey }));
};

const describeError = (error: unknown): string => {
  if (error instanceof OpenAI.APIError) {
    return `OpenAI request failed (status ${error.status ?? "unknown"}). Details: ${error.message || "No error details"}`;
  }
  const message = error instanceof Error ? error.message : "";
  return `OpenAI request failed. Details: ${message || "No error details"}`;
};

/**
 * Chat-completion backend. The call is aborted when the timeout fires and
 * the caller gets the timeout result without waiting for the SDK to settle.
 */
export const createOpenAIBackend = (options: OpenAIBackendOptions = {}): GenerationBackend => ({
  name: "openai",
  generate: async ({ prompt, model, timeoutSeconds }: GenerationRequest): Promise<GenerationResult> => {
    const complete = ensureCompletion(options);
    if (!complete) {
      return {
        ok: false,
        failure: {
          kind: "unavailable",
          message: "Missing OPENAI_API_KEY. Set it in the environment to use the OpenAI backend."
        }
      };
    }

    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<GenerationResult>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        resolve({
          ok: false,
          failure: {
            kind: "timeout",
            message: timeoutMessage(timeoutSeconds, `Check that model '${model}' is available to this API key.`)
          }
        });
      }, timeoutSeconds * 1000);
    });

    const call = complete({ model, prompt }, controller.signal).then(
      (content): GenerationResult => ({ ok: true, text: resolveOutput(content ?? "") }),
      (error: unknown): GenerationResult => ({
        ok: false,
        failure: { kind: "failed", message: describeError(error) }
      })
    );

    try {
      return await Promise.race([call, timedOut]);
    } finally {
      clearTimeout(timer);
    }
  }
});
