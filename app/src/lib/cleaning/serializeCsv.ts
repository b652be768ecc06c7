import { formatCell } from "../dataset/cells";
import type { Dataset } from "../../types/dataset";

const needsQuoting = /[",\r\n]/;

export const escapeCsvField = (field: string): string =>
  needsQuoting.test(field) ? `"${field.replace(/"/g, '""')}"` : field;

export const serializeCsvRows = (headers: string[], rows: string[][]): string =>
  [headers, ...rows].map((fields) => fields.map(escapeCsvField).join(",")).join("\n") + "\n";

export const serializeCsv = (dataset: Dataset): string => {
  const rows: string[][] = [];
  for (let rowIndex = 0; rowIndex < dataset.rowCount; rowIndex += 1) {
    rows.push(dataset.columns.map((column) => formatCell(column.type, column.values[rowIndex] ?? null)));
  }
  return serializeCsvRows(
    dataset.columns.map((column) => column.name),
    rows
  );
};
