import { rowAt, rowKey, selectRows } from "../dataset/cells";
import { errorMessage } from "../errors";
import { inferDateFormat, parseDateWithFormat, parseNumericText } from "./coerce";
import type { Column, Dataset, TextColumn } from "../../types/dataset";

type ColumnRewrite = (column: Column) => Column | null;

/**
 * Applies `rewrite` to one column. A rewrite that declines (null) or throws
 * leaves the original column in place.
 */
const rewriteColumn = (column: Column, step: string, rewrite: ColumnRewrite): Column => {
  try {
    return rewrite(column) ?? column;
  } catch (error) {
    console.warn("[clean] column left unchanged", {
      step,
      column: column.name,
      message: errorMessage(error)
    });
    return column;
  }
};

const trimText: ColumnRewrite = (column) => {
  if (column.type !== "text") {
    return null;
  }
  return {
    ...column,
    values: column.values.map((value) => {
      const trimmed = value === null ? "" : value.trim();
      return trimmed === "" ? null : trimmed;
    })
  };
};

const coerceNumeric: ColumnRewrite = (column) => {
  if (column.type !== "text") {
    return null;
  }
  const values: (number | null)[] = [];
  let integral = true;
  for (const value of column.values) {
    if (value === null) {
      values.push(null);
      continue;
    }
    const parsed = parseNumericText(value);
    if (!parsed) {
      return null;
    }
    integral = integral && parsed.integral;
    values.push(parsed.value);
  }
  const hasValues = values.some((value) => value !== null);
  return integral && hasValues
    ? { name: column.name, type: "integer", values }
    : { name: column.name, type: "float", values };
};

const coerceDateTime = (column: TextColumn): Column | null => {
  const first = column.values.find((value): value is string => value !== null);
  if (first === undefined) {
    return null;
  }
  const format = inferDateFormat(first);
  if (!format) {
    return null;
  }
  const values: (Date | null)[] = [];
  for (const value of column.values) {
    if (value === null) {
      values.push(null);
      continue;
    }
    const parsed = parseDateWithFormat(value, format);
    if (!parsed) {
      return null;
    }
    values.push(parsed);
  }
  return { name: column.name, type: "datetime", values };
};

const coerceDateTimeColumn: ColumnRewrite = (column) =>
  column.type === "text" ? coerceDateTime(column) : null;

export const dropDuplicateRows = (dataset: Dataset): Dataset => {
  const seen = new Set<string>();
  const kept: number[] = [];
  for (let rowIndex = 0; rowIndex < dataset.rowCount; rowIndex += 1) {
    const key = rowKey(rowAt(dataset, rowIndex));
    if (!seen.has(key)) {
      seen.add(key);
      kept.push(rowIndex);
    }
  }
  return selectRows(dataset, kept);
};

const CLEANING_STEPS: ReadonlyArray<[string, ColumnRewrite]> = [
  ["trim", trimText],
  ["numeric", coerceNumeric],
  ["datetime", coerceDateTimeColumn]
];

/**
 * Deterministic cleaning pass: trim text, coerce whole columns to numbers,
 * then to date/times, then drop repeated rows. Returns a new dataset; the
 * input is left untouched.
 */
export const cleanDataset = (dataset: Dataset): Dataset => {
  const columns = CLEANING_STEPS.reduce<Column[]>(
    (current, [step, rewrite]) => current.map((column) => rewriteColumn(column, step, rewrite)),
    dataset.columns
  );
  return dropDuplicateRows({ columns, rowCount: dataset.rowCount });
};
