import type { ColumnType, Dataset } from "./dataset";

export type DistinctCount = number | "unknown";

export type NumericRange = {
  min: number;
  max: number;
};

export type ColumnDigest = {
  name: string;
  type: ColumnType;
  nonNullCount: number;
  nullCount: number;
  distinctCount: DistinctCount;
  examples: string[];
  range?: NumericRange;
};

export type DatasetProfile = {
  rowCount: number;
  columnCount: number;
  columns: ColumnDigest[];
};

export type BaselineIssue = "Missing values found" | "Duplicate rows found";

export type BaselineReport = {
  hasMissingValues: boolean;
  hasDuplicateRows: boolean;
  issues: BaselineIssue[];
};

export type AnalysisResult = {
  baseline: string;
  suggestions: string;
  elapsedSeconds: number;
  summary: string;
};

export type AnalysisStage = "reading" | "checking" | "profiling" | "generating";

export type AnalysisEvent =
  | { stage: AnalysisStage; message: string }
  | { stage: "failed"; message: string }
  | {
      stage: "done";
      message: string;
      result: AnalysisResult;
      dataset: Dataset;
      sourceName: string;
    };

export type CleaningOutcome =
  | { artifactPath: string; rowCount: number; removedRows: number }
  | { artifactPath: null; message: string };
