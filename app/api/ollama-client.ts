import { spawn } from "node:child_process";
import type { EventEmitter } from "node:events";
import type { Readable, Writable } from "node:stream";
import { resolveOutput, timeoutMessage } from "../src/lib/generation/generateText";
import type {
  GenerationBackend,
  GenerationRequest,
  GenerationResult
} from "../src/lib/generation/types";

export type ProcessHandle = EventEmitter & {
  stdin: Writable;
  stdout: Readable;
  stderr: Readable;
  kill: (signal?: NodeJS.Signals | number) => boolean;
};

export type SpawnProcess = (command: string, args: string[]) => ProcessHandle;

type OllamaOptions = {
  command?: string;
  spawnProcess?: SpawnProcess;
};

const defaultSpawn: SpawnProcess = (command, args) => spawn(command, args, { stdio: "pipe" });

const isMissingBinary = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

const toText = (chunks: Buffer[]): string => Buffer.concat(chunks).toString("utf8");

const toBuffer = (chunk: Buffer | string): Buffer =>
  typeof chunk === "string" ? Buffer.from(chunk) : chunk;

const notFound = (command: string): GenerationResult => ({
  ok: false,
  failure: {
    kind: "unavailable",
    message: `'${command}' CLI not found. Install from https://ollama.com and ensure it is on PATH.`
  }
});

/**
 * Runs `<command> run <model>` with the prompt on stdin. The timeout kills
 * the process and resolves at once; output produced before that is dropped.
 */
export const createOllamaBackend = ({
  command = "ollama",
  spawnProcess = defaultSpawn
}: OllamaOptions = {}): GenerationBackend => ({
  name: "ollama",
  generate: ({ prompt, model, timeoutSeconds }: GenerationRequest) =>
    new Promise<GenerationResult>((resolve) => {
      let settled = false;
      let timer: NodeJS.Timeout | undefined;
      const finish = (result: GenerationResult) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        resolve(result);
      };

      let child: ProcessHandle;
      try {
        child = spawnProcess(command, ["run", model]);
      } catch (error) {
        finish(
          isMissingBinary(error)
            ? notFound(command)
            : {
                ok: false,
                failure: {
                  kind: "failed",
                  message: `${command} run failed to start. Details: ${error instanceof Error ? error.message : String(error)}`
                }
              }
        );
        return;
      }

      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      child.stdout.on("data", (chunk: Buffer | string) => stdout.push(toBuffer(chunk)));
      child.stderr.on("data", (chunk: Buffer | string) => stderr.push(toBuffer(chunk)));

      child.once("error", (error: Error) => {
        if (isMissingBinary(error)) {
          finish(notFound(command));
          return;
        }
        finish({
          ok: false,
          failure: { kind: "failed", message: `${command} run failed to start. Details: ${error.message}` }
        });
      });

      child.once("close", (code: number | null, signal: NodeJS.Signals | null) => {
        const errorText = toText(stderr).trim();
        if (code !== 0) {
          finish({
            ok: false,
            failure: {
              kind: "failed",
              message: `${command} run failed (code ${code ?? signal ?? "unknown"}). Details: ${errorText || "No error details"}`
            }
          });
          return;
        }
        finish({ ok: true, text: resolveOutput(toText(stdout), errorText) });
      });

      timer = setTimeout(() => {
        child.kill("SIGKILL");
        finish({
          ok: false,
          failure: {
            kind: "timeout",
            message: timeoutMessage(
              timeoutSeconds,
              `Consider pulling the model first with '${command} pull ${model}'.`
            )
          }
        });
      }, timeoutSeconds * 1000);

      // A process that exits before reading stdin surfaces as EPIPE here; the
      // close handler reports the exit status.
      child.stdin.on("error", (error: Error) => {
        console.warn("[ollama] stdin write failed", { model, message: error.message });
      });
      child.stdin.end(prompt, "utf8");
    })
});
