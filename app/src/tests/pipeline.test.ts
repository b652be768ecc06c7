import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { datasetFromRecords } from "../lib/import/buildDataset";
import { NOTHING_TO_CLEAN, runCleaning } from "../lib/pipeline/runCleaning";
import { runAnalysis } from "../lib/pipeline/runAnalysis";
import type { GenerationBackend, GenerationRequest, GenerationResult } from "../lib/generation/types";
import type { AnalysisEvent } from "../types/analysis";

const CSV = "id,name,amount\n1, Alice ,$10.00\n1, Alice ,$10.00\n";

const collect = async (events: AsyncIterable<AnalysisEvent>): Promise<AnalysisEvent[]> => {
  const collected: AnalysisEvent[] = [];
  for await (const event of events) {
    collected.push(event);
  }
  return collected;
};

const steppingClock = (stepMs: number) => {
  let now = 0;
  return () => {
    now += stepMs;
    return now;
  };
};

const createBackend = (result: GenerationResult) => {
  const generate = vi.fn(async (_request: GenerationRequest): Promise<GenerationResult> => result);
  const backend: GenerationBackend = { name: "fake", generate };
  return { backend, generate };
};

let directory = "";

beforeEach(async () => {
  directory = await mkdtemp(join(tmpdir(), "pipeline-test-"));
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(directory, { recursive: true, force: true });
});

describe("runAnalysis", () => {
  it("reports each stage and merges baseline and generated findings", async () => {
    const { backend, generate } = createBackend({ ok: true, text: "Looks fine" });

    const events = await collect(
      runAnalysis(
        { name: "sales.csv", data: CSV },
        { backend, model: "gemma:2b", timeoutSeconds: 30, now: steppingClock(1500) }
      )
    );

    expect(events.map((event) => event.stage)).toEqual([
      "reading",
      "checking",
      "profiling",
      "generating",
      "done"
    ]);
    const last = events[events.length - 1];
    expect(last.stage).toBe("done");
    if (last.stage === "done") {
      expect(last.sourceName).toBe("sales.csv");
      expect(last.dataset.rowCount).toBe(2);
      expect(last.result).toEqual({
        baseline: "Baseline checks detected: Duplicate rows found",
        suggestions: "Looks fine",
        elapsedSeconds: 1.5,
        summary:
          "--- Baseline ---\n\nBaseline checks detected: Duplicate rows found\n\n" +
          "--- LLM Suggestions ---\n\nLooks fine\n\n_Time taken: 1.5s_"
      });
    }

    expect(generate).toHaveBeenCalledTimes(1);
    const [request] = generate.mock.calls[0];
    expect(request.model).toBe("gemma:2b");
    expect(request.timeoutSeconds).toBe(30);
    expect(request.prompt).toContain("Rows: 2, Columns: 3");
  });

  it("stops before profiling when the file cannot be read", async () => {
    const { backend, generate } = createBackend({ ok: true, text: "unused" });

    const events = await collect(
      runAnalysis({ name: "empty.csv", data: "" }, { backend, model: "gemma:2b", timeoutSeconds: 30 })
    );

    expect(events).toEqual([
      { stage: "reading", message: "Reading CSV…" },
      { stage: "failed", message: "Error reading file: CSV appears to be empty. Please upload a CSV." }
    ]);
    expect(generate).not.toHaveBeenCalled();
  });

  it("ends the error sentence before the upload hint", async () => {
    const path = join(directory, "missing.csv");
    const { backend } = createBackend({ ok: true, text: "unused" });

    const events = await collect(runAnalysis(path, { backend, model: "gemma:2b", timeoutSeconds: 30 }));

    expect(events[1]).toEqual({
      stage: "failed",
      message: `Error reading file: ENOENT: no such file or directory, open '${path}'. Please upload a CSV.`
    });
  });

  it("still completes when the generation service is unavailable", async () => {
    const { backend } = createBackend({
      ok: false,
      failure: { kind: "unavailable", message: "'ollama' CLI not found. Install from https://ollama.com and ensure it is on PATH." }
    });

    const events = await collect(
      runAnalysis({ name: "sales.csv", data: CSV }, { backend, model: "gemma:2b", timeoutSeconds: 30 })
    );
    const last = events[events.length - 1];

    expect(last.stage).toBe("done");
    if (last.stage === "done") {
      expect(last.result.baseline).toBe("Baseline checks detected: Duplicate rows found");
      expect(last.result.suggestions).toBe(
        "ERROR: 'ollama' CLI not found. Install from https://ollama.com and ensure it is on PATH."
      );
    }
  });

  it("reads a dataset from a file path", async () => {
    const path = join(directory, "orders.csv");
    await writeFile(path, "id,total\n1,2.5\n2,\n", "utf8");
    const { backend } = createBackend({ ok: true, text: "ok" });

    const events = await collect(runAnalysis(path, { backend, model: "gemma:2b", timeoutSeconds: 30 }));
    const last = events[events.length - 1];

    expect(last.stage).toBe("done");
    if (last.stage === "done") {
      expect(last.sourceName).toBe("orders.csv");
      expect(last.result.baseline).toBe("Baseline checks detected: Missing values found");
    }
  });
});

describe("runCleaning", () => {
  it("answers nothing to clean without a dataset", async () => {
    await expect(runCleaning(null)).resolves.toEqual({ artifactPath: null, message: NOTHING_TO_CLEAN });
  });

  it("writes the cleaned dataset next to a name derived from the source", async () => {
    const dataset = datasetFromRecords([
      { id: 1, name: " Alice ", amount: "$10.00" },
      { id: 1, name: " Alice ", amount: "$10.00" }
    ]);

    const outcome = await runCleaning(dataset, "sales.csv", directory);

    expect(outcome).toMatchObject({ rowCount: 1, removedRows: 1 });
    expect(outcome.artifactPath).toMatch(/sales_[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}_cleaned\.csv$/);
    await expect(readFile(outcome.artifactPath ?? "", "utf8")).resolves.toBe(
      "id,name,amount\n1,Alice,10.0\n"
    );
    expect(dataset.rowCount).toBe(2);
  });
});
