import { EventEmitter } from "node:events";
import { PassThrough } from "node:stream";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createOllamaBackend } from "../../api/ollama-client";
import { createOpenAIBackend, type ChatCompletionCall } from "../../api/openai-client";
import { generateText, resolveOutput } from "../lib/generation/generateText";
import type { GenerationBackend, GenerationResult } from "../lib/generation/types";

class FakeProcess extends EventEmitter {
  stdin = new PassThrough();
  stdout = new PassThrough();
  stderr = new PassThrough();
  killedWith: NodeJS.Signals | number | undefined;

  kill(signal?: NodeJS.Signals | number): boolean {
    this.killedWith = signal;
    return true;
  }

  exit(code: number | null, stdout = "", stderr = "") {
    this.stdout.end(stdout);
    this.stderr.end(stderr);
    setImmediate(() => this.emit("close", code, null));
  }
}

const request = { prompt: "hello", model: "gemma:2b", timeoutSeconds: 5 };

const staticBackend = (result: GenerationResult): GenerationBackend => ({
  name: "static",
  generate: async () => result
});

beforeEach(() => {
  vi.spyOn(console, "error").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.useRealTimers();
  vi.restoreAllMocks();
});

describe("generateText", () => {
  it("returns the trimmed text of a successful call", async () => {
    await expect(generateText(staticBackend({ ok: true, text: "  advice \n" }), request)).resolves.toBe(
      "advice"
    );
  });

  it("never returns an empty string", async () => {
    await expect(generateText(staticBackend({ ok: true, text: "   " }), request)).resolves.toBe(
      "No response from model."
    );
  });

  it("turns failures into an error line", async () => {
    const backend = staticBackend({ ok: false, failure: { kind: "timeout", message: "too slow" } });

    await expect(generateText(backend, request)).resolves.toBe("ERROR: too slow");
  });

  it("does not let a throwing backend escape", async () => {
    const backend: GenerationBackend = {
      name: "broken",
      generate: async () => {
        throw new Error("boom");
      }
    };

    await expect(generateText(backend, request)).resolves.toBe("ERROR: generation failed: boom");
  });

  it("falls back to diagnostics when the output is empty", () => {
    expect(resolveOutput("", " pulling manifest ")).toBe("pulling manifest");
    expect(resolveOutput(" ", "")).toBe("No response from model.");
  });
});

describe("createOllamaBackend", () => {
  const setup = () => {
    const fake = new FakeProcess();
    const spawnProcess = vi.fn(() => fake);
    const backend = createOllamaBackend({ spawnProcess });
    return { fake, spawnProcess, backend };
  };

  it("runs the model with the prompt on stdin", async () => {
    const { fake, spawnProcess, backend } = setup();
    const written: Buffer[] = [];
    fake.stdin.on("data", (chunk: Buffer) => written.push(chunk));

    const pending = backend.generate(request);
    fake.exit(0, " Findings \n");

    await expect(pending).resolves.toEqual({ ok: true, text: "Findings" });
    expect(spawnProcess).toHaveBeenCalledWith("ollama", ["run", "gemma:2b"]);
    expect(Buffer.concat(written).toString("utf8")).toBe("hello");
  });

  it("uses stderr when stdout is empty", async () => {
    const { fake, backend } = setup();

    const pending = backend.generate(request);
    fake.exit(0, "", "pulling manifest\n");

    await expect(pending).resolves.toEqual({ ok: true, text: "pulling manifest" });
  });

  it("reports a non-zero exit with the captured diagnostics", async () => {
    const { fake, backend } = setup();

    const pending = backend.generate(request);
    fake.exit(1, "", "model not found");

    await expect(pending).resolves.toEqual({
      ok: false,
      failure: { kind: "failed", message: "ollama run failed (code 1). Details: model not found" }
    });
  });

  it("marks a failed exit without diagnostics", async () => {
    const { fake, backend } = setup();

    const pending = backend.generate(request);
    fake.exit(2);

    await expect(generateText({ name: "ollama", generate: () => pending }, request)).resolves.toBe(
      "ERROR: ollama run failed (code 2). Details: No error details"
    );
  });

  it("explains how to install a missing binary", async () => {
    const { fake, backend } = setup();

    const pending = backend.generate(request);
    fake.emit("error", Object.assign(new Error("spawn ollama ENOENT"), { code: "ENOENT" }));

    await expect(pending).resolves.toEqual({
      ok: false,
      failure: {
        kind: "unavailable",
        message: "'ollama' CLI not found. Install from https://ollama.com and ensure it is on PATH."
      }
    });
  });

  it("kills the process and resolves when the timeout fires", async () => {
    vi.useFakeTimers();
    const { fake, backend } = setup();

    const pending = backend.generate({ ...request, timeoutSeconds: 2 });
    await vi.advanceTimersByTimeAsync(2000);

    await expect(pending).resolves.toEqual({
      ok: false,
      failure: {
        kind: "timeout",
        message:
          "LLM call timed out after 2s. Consider pulling the model first with 'ollama pull gemma:2b'."
      }
    });
    expect(fake.killedWith).toBe("SIGKILL");
  });

  it("handles a command that is not installed", async () => {
    const backend = createOllamaBackend({ command: "tabular-quality-missing-binary" });

    const text = await generateText(backend, request);

    expect(text).toBe(
      "ERROR: 'tabular-quality-missing-binary' CLI not found. Install from https://ollama.com and ensure it is on PATH."
    );
  });
});

describe("createOpenAIBackend", () => {
  const openaiRequest = { prompt: "hello", model: "gpt-4o-mini", timeoutSeconds: 1 };

  it("is unavailable without an API key", async () => {
    await expect(createOpenAIBackend().generate(openaiRequest)).resolves.toEqual({
      ok: false,
      failure: {
        kind: "unavailable",
        message: "Missing OPENAI_API_KEY. Set it in the environment to use the OpenAI backend."
      }
    });
  });

  it("returns the completion text", async () => {
    const complete = vi.fn<ChatCompletionCall>(async () => " advice ");

    const result = await createOpenAIBackend({ complete }).generate(openaiRequest);

    expect(result).toEqual({ ok: true, text: "advice" });
    expect(complete).toHaveBeenCalledWith({ model: "gpt-4o-mini", prompt: "hello" }, expect.any(AbortSignal));
  });

  it("substitutes a placeholder for empty content", async () => {
    const result = await createOpenAIBackend({ complete: async () => null }).generate(openaiRequest);

    expect(result).toEqual({ ok: true, text: "No response from model." });
  });

  it("reports request errors", async () => {
    const complete: ChatCompletionCall = async () => {
      throw new Error("rate limited");
    };

    await expect(createOpenAIBackend({ complete }).generate(openaiRequest)).resolves.toEqual({
      ok: false,
      failure: { kind: "failed", message: "OpenAI request failed. Details: rate limited" }
    });
  });

  it("aborts the request when the timeout fires", async () => {
    vi.useFakeTimers();
    const seen: { signal?: AbortSignal } = {};
    const complete: ChatCompletionCall = (_, signal) => {
      seen.signal = signal;
      return new Promise((_resolve, reject) => {
        signal.addEventListener("abort", () => reject(new Error("aborted")));
      });
    };

    const pending = createOpenAIBackend({ complete }).generate(openaiRequest);
    await vi.advanceTimersByTimeAsync(1000);

    await expect(pending).resolves.toEqual({
      ok: false,
      failure: {
        kind: "timeout",
        message: "LLM call timed out after 1s. Check that model 'gpt-4o-mini' is available to this API key."
      }
    });
    expect(seen.signal?.aborted).toBe(true);
  });
});
