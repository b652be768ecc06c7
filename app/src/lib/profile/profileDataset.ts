import { distinctValueKey, formatValue } from "../dataset/cells";
import type { Column, Dataset } from "../../types/dataset";
import type {
  ColumnDigest,
  DatasetProfile,
  DistinctCount,
  NumericRange
} from "../../types/analysis";

const MAX_EXAMPLES = 3;

const countDistinct = (column: Column): DistinctCount => {
  try {
    const keys = new Set<string>();
    column.values.forEach((value) => {
      if (value !== null) {
        keys.add(distinctValueKey(value));
      }
    });
    return keys.size;
  } catch {
    return "unknown";
  }
};

const computeRange = (column: Column): NumericRange | undefined => {
  if (column.type !== "integer" && column.type !== "float") {
    return undefined;
  }
  try {
    let min = Number.POSITIVE_INFINITY;
    let max = Number.NEGATIVE_INFINITY;
    column.values.forEach((value) => {
      if (value === null) {
        return;
      }
      min = Math.min(min, value);
      max = Math.max(max, value);
    });
    return Number.isFinite(min) && Number.isFinite(max) ? { min, max } : undefined;
  } catch {
    return undefined;
  }
};

const collectExamples = (column: Column): string[] => {
  const examples: string[] = [];
  for (const value of column.values) {
    if (examples.length >= MAX_EXAMPLES) {
      break;
    }
    if (value !== null) {
      examples.push(formatValue(column.type, value));
    }
  }
  return examples;
};

export const digestColumn = (column: Column): ColumnDigest => {
  const nullCount = column.values.filter((value) => value === null).length;
  const range = computeRange(column);
  return {
    name: column.name,
    type: column.type,
    nonNullCount: column.values.length - nullCount,
    nullCount,
    distinctCount: countDistinct(column),
    examples: collectExamples(column),
    ...(range ? { range } : {})
  };
};

export const profileDataset = (dataset: Dataset): DatasetProfile => ({
  rowCount: dataset.rowCount,
  columnCount: dataset.columns.length,
  columns: dataset.columns.map(digestColumn)
});

const formatRange = (digest: ColumnDigest): string => {
  if (!digest.range) {
    return "";
  }
  const { min, max } = digest.range;
  return `, min=${formatValue(digest.type, min)}, max=${formatValue(digest.type, max)}`;
};

export const renderColumnDigest = (digest: ColumnDigest): string => {
  const examples = digest.examples.length > 0 ? digest.examples.join(", ") : "(none)";
  return (
    `- ${digest.name} | dtype=${digest.type}, non_null=${digest.nonNullCount}, ` +
    `nulls=${digest.nullCount}, unique=${digest.distinctCount}${formatRange(digest)}; ` +
    `examples: ${examples}`
  );
};

export const renderProfile = (profile: DatasetProfile): string =>
  [
    `Rows: ${profile.rowCount}, Columns: ${profile.columnCount}`,
    ...profile.columns.map(renderColumnDigest)
  ].join("\n");
