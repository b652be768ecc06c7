import { errorMessage } from "../errors";
import type { GenerationBackend, GenerationFailure, GenerationRequest } from "./types";

export const NO_RESPONSE = "No response from model.";

export const formatFailure = (failure: GenerationFailure): string => `ERROR: ${failure.message}`;

/**
 * Picks the text to show for a completed call: the trimmed output, else the
 * trimmed diagnostics, else a fixed placeholder.
 */
export const resolveOutput = (output: string, diagnostics = ""): string =>
  output.trim() || diagnostics.trim() || NO_RESPONSE;

export const timeoutMessage = (timeoutSeconds: number, hint: string): string =>
  `LLM call timed out after ${timeoutSeconds}s. ${hint}`;

/**
 * Calls the backend once and always resolves to a non-empty string; every
 * failure is folded into an `ERROR: ...` line.
 */
export const generateText = async (
  backend: GenerationBackend,
  request: GenerationRequest
): Promise<string> => {
  try {
    const result = await backend.generate(request);
    if (!result.ok) {
      console.error(`[generation] ${result.failure.kind}`, {
        backend: backend.name,
        model: request.model,
        message: result.failure.message
      });
      return formatFailure(result.failure);
    }
    return result.text.trim() || NO_RESPONSE;
  } catch (error) {
    console.error("[generation] backend threw", { backend: backend.name, message: errorMessage(error) });
    return formatFailure({ kind: "failed", message: `generation failed: ${errorMessage(error)}` });
  }
};
