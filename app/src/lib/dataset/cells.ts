import type { CellValue, Column, ColumnType, Dataset, Row } from "../../types/dataset";

const pad = (value: number, width = 2): string => value.toString().padStart(width, "0");

export const formatDateTime = (value: Date): string => {
  const date = `${value.getUTCFullYear()}-${pad(value.getUTCMonth() + 1)}-${pad(value.getUTCDate())}`;
  const hasTime =
    value.getUTCHours() !== 0 ||
    value.getUTCMinutes() !== 0 ||
    value.getUTCSeconds() !== 0 ||
    value.getUTCMilliseconds() !== 0;
  if (!hasTime) {
    return date;
  }
  return `${date} ${pad(value.getUTCHours())}:${pad(value.getUTCMinutes())}:${pad(value.getUTCSeconds())}`;
};

/**
 * String form of a non-null cell. Floats keep a decimal part (`10.0`) so an
 * integral float never reads like an integer column.
 */
export const formatValue = (type: ColumnType, value: Exclude<CellValue, null>): string => {
  if (value instanceof Date) {
    return formatDateTime(value);
  }
  if (typeof value === "boolean") {
    return value ? "True" : "False";
  }
  if (typeof value === "number") {
    if (type === "float" && Number.isInteger(value)) {
      return value.toFixed(1);
    }
    return value.toString();
  }
  return value;
};

export const formatCell = (type: ColumnType, value: CellValue, nullLabel = ""): string =>
  value === null ? nullLabel : formatValue(type, value);

export const cellAt = (column: Column, rowIndex: number): CellValue =>
  column.values[rowIndex] ?? null;

export const rowAt = (dataset: Dataset, rowIndex: number): Row =>
  dataset.columns.map((column) => cellAt(column, rowIndex));

const cellKey = (value: CellValue): string => {
  if (value === null) {
    return "n";
  }
  if (value instanceof Date) {
    return `d:${value.getTime()}`;
  }
  return `${typeof value}:${String(value)}`;
};

/** Equality key for a whole row; two rows are duplicates when their keys match. */
export const rowKey = (row: Row): string => JSON.stringify(row.map(cellKey));

export const distinctValueKey = cellKey;

export const selectRows = (dataset: Dataset, rowIndices: number[]): Dataset => ({
  rowCount: rowIndices.length,
  columns: dataset.columns.map((column) => {
    switch (column.type) {
      case "integer":
      case "float":
        return { ...column, values: rowIndices.map((index) => column.values[index] ?? null) };
      case "text":
        return { ...column, values: rowIndices.map((index) => column.values[index] ?? null) };
      case "boolean":
        return { ...column, values: rowIndices.map((index) => column.values[index] ?? null) };
      case "datetime":
        return { ...column, values: rowIndices.map((index) => column.values[index] ?? null) };
    }
  })
});
