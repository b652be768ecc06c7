import { checkBaseline, renderBaseline } from "../baseline/checkBaseline";
import { errorMessage } from "../errors";
import { generateText } from "../generation/generateText";
import { parseUpload, readUpload, type ParsedUpload } from "../import/parseFile";
import { buildAnalysisPrompt } from "../prompt/buildPrompt";
import { profileDataset } from "../profile/profileDataset";
import { sampleDataset } from "../sample/sampleDataset";
import type { Upload } from "../import/types";
import type { GenerationBackend } from "../generation/types";
import type { AnalysisEvent, AnalysisResult } from "../../types/analysis";
import type { Dataset } from "../../types/dataset";

export type AnalysisOptions = {
  backend: GenerationBackend;
  model: string;
  timeoutSeconds: number;
  /** Millisecond clock used for the elapsed time. */
  now?: () => number;
};

const defaultClock = (): number => performance.now();

const asSentence = (message: string): string => (/[.!?]$/.test(message) ? message : `${message}.`);

export const renderAnalysisSummary = (
  baseline: string,
  suggestions: string,
  elapsedSeconds: number
): string =>
  `--- Baseline ---\n\n${baseline}\n\n--- LLM Suggestions ---\n\n${suggestions}\n\n` +
  `_Time taken: ${elapsedSeconds.toFixed(1)}s_`;

/**
 * Analysis of an already parsed dataset. Yields a checkpoint before each
 * stage so callers can show progress while the generation call blocks.
 */
export async function* analyzeDataset(
  dataset: Dataset,
  sourceName: string,
  options: AnalysisOptions,
  startedAt?: number
): AsyncGenerator<AnalysisEvent> {
  const now = options.now ?? defaultClock;
  const start = startedAt ?? now();

  yield { stage: "checking", message: "Running baseline checks…" };
  const baseline = renderBaseline(checkBaseline(dataset));

  yield { stage: "profiling", message: "Profiling dataset…" };
  const prompt = buildAnalysisPrompt({
    profile: profileDataset(dataset),
    sample: sampleDataset(dataset)
  });

  yield { stage: "generating", message: "Querying LLM…" };
  const suggestions = await generateText(options.backend, {
    prompt,
    model: options.model,
    timeoutSeconds: options.timeoutSeconds
  });

  const elapsedSeconds = (now() - start) / 1000;
  const result: AnalysisResult = {
    baseline,
    suggestions,
    elapsedSeconds,
    summary: renderAnalysisSummary(baseline, suggestions, elapsedSeconds)
  };
  yield { stage: "done", message: "Analysis complete.", result, dataset, sourceName };
}

/**
 * Reads the upload (or the file at a path), then runs the analysis stages.
 * Unreadable input stops the run before profiling.
 */
export async function* runAnalysis(
  source: Upload | string,
  options: AnalysisOptions
): AsyncGenerator<AnalysisEvent> {
  const now = options.now ?? defaultClock;
  const start = now();

  yield { stage: "reading", message: "Reading CSV…" };
  let parsed: ParsedUpload;
  try {
    const upload = typeof source === "string" ? await readUpload(source) : source;
    parsed = parseUpload(upload);
  } catch (error) {
    yield {
      stage: "failed",
      message: `Error reading file: ${asSentence(errorMessage(error))} Please upload a CSV.`
    };
    return;
  }

  yield* analyzeDataset(parsed.dataset, parsed.sourceName, options, start);
}
