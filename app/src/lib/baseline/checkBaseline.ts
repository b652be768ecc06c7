import { rowAt, rowKey } from "../dataset/cells";
import type { BaselineIssue, BaselineReport } from "../../types/analysis";
import type { Dataset } from "../../types/dataset";

export const hasMissingValues = (dataset: Dataset): boolean =>
  dataset.columns.some((column) => column.values.some((value) => value === null));

export const hasDuplicateRows = (dataset: Dataset): boolean => {
  const seen = new Set<string>();
  for (let rowIndex = 0; rowIndex < dataset.rowCount; rowIndex += 1) {
    const key = rowKey(rowAt(dataset, rowIndex));
    if (seen.has(key)) {
      return true;
    }
    seen.add(key);
  }
  return false;
};

export const checkBaseline = (dataset: Dataset): BaselineReport => {
  const missing = hasMissingValues(dataset);
  const duplicates = hasDuplicateRows(dataset);
  const issues: BaselineIssue[] = [];
  if (missing) {
    issues.push("Missing values found");
  }
  if (duplicates) {
    issues.push("Duplicate rows found");
  }
  return { hasMissingValues: missing, hasDuplicateRows: duplicates, issues };
};

export const renderBaseline = (report: BaselineReport): string =>
  `Baseline checks detected: ${report.issues.length > 0 ? report.issues.join(", ") : "No major issues"}`;
