import type { Column, Dataset } from "../../types/dataset";
import type { RawCell, RawTable } from "./types";

const numericPattern = /^[-+]?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?$/;
const integerPattern = /^[-+]?\d+$/;

const naTokens = new Set(["", "NA", "N/A", "n/a", "NaN", "nan", "null", "NULL", "None", "#N/A", "<NA>"]);
const trueTokens = new Set(["true", "True", "TRUE"]);
const falseTokens = new Set(["false", "False", "FALSE"]);

const isMissing = (value: RawCell): value is null | string =>
  value === null ||
  (typeof value === "string" && naTokens.has(value)) ||
  (typeof value === "number" && Number.isNaN(value));

const toInteger = (value: RawCell): number | null => {
  if (typeof value === "number") {
    return Number.isSafeInteger(value) ? value : null;
  }
  if (typeof value === "string" && integerPattern.test(value)) {
    const parsed = Number(value);
    return Number.isSafeInteger(parsed) ? parsed : null;
  }
  return null;
};

const toFloat = (value: RawCell): number | null => {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "string" && numericPattern.test(value)) {
    const parsed = Number(value);
    if (integerPattern.test(value) && !Number.isSafeInteger(parsed)) {
      return null;
    }
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
};

const toBoolean = (value: RawCell): boolean | null => {
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value === "string") {
    if (trueTokens.has(value)) {
      return true;
    }
    if (falseTokens.has(value)) {
      return false;
    }
  }
  return null;
};

const toText = (value: RawCell): string => {
  if (typeof value === "boolean") {
    return value ? "True" : "False";
  }
  return String(value);
};

/** Converts every non-missing cell or gives up on the whole column. */
const convertAll = <T>(cells: RawCell[], convert: (value: RawCell) => T | null): (T | null)[] | null => {
  const converted: (T | null)[] = [];
  for (const cell of cells) {
    if (isMissing(cell)) {
      converted.push(null);
      continue;
    }
    const value = convert(cell);
    if (value === null) {
      return null;
    }
    converted.push(value);
  }
  return converted;
};

export const inferColumn = (name: string, cells: RawCell[]): Column => {
  const integers = convertAll(cells, toInteger);
  if (integers && integers.some((value) => value !== null)) {
    return { name, type: "integer", values: integers };
  }

  const floats = convertAll(cells, toFloat);
  if (floats) {
    return { name, type: "float", values: floats };
  }

  const booleans = convertAll(cells, toBoolean);
  if (booleans) {
    return { name, type: "boolean", values: booleans };
  }

  return {
    name,
    type: "text",
    values: cells.map((cell) => (isMissing(cell) ? null : toText(cell)))
  };
};

export const buildDataset = (table: RawTable): Dataset => ({
  rowCount: table.rows.length,
  columns: table.headers.map((header, columnIndex) =>
    inferColumn(
      header,
      table.rows.map((row) => row[columnIndex] ?? null)
    )
  )
});

export type DatasetRecord = Record<string, RawCell | undefined>;

/**
 * Builds a dataset from plain records. The header is the key order of the
 * first record followed by keys that only appear later.
 */
export const datasetFromRecords = (records: DatasetRecord[]): Dataset => {
  const headers: string[] = [];
  records.forEach((record) => {
    Object.keys(record).forEach((key) => {
      if (!headers.includes(key)) {
        headers.push(key);
      }
    });
  });

  return buildDataset({
    headers,
    rows: records.map((record) => headers.map((header) => record[header] ?? null))
  });
};
