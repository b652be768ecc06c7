export type GenerationRequest = {
  prompt: string;
  model: string;
  timeoutSeconds: number;
};

export type GenerationFailureKind = "unavailable" | "timeout" | "failed";

export type GenerationFailure = {
  kind: GenerationFailureKind;
  message: string;
};

export type GenerationResult =
  | { ok: true; text: string }
  | { ok: false; failure: GenerationFailure };

/** Any text-generation service: a local model runner, a hosted API or a test double. */
export type GenerationBackend = {
  name: string;
  generate: (request: GenerationRequest) => Promise<GenerationResult>;
};
