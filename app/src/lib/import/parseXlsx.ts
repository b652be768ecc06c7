import * as XLSX from "xlsx";
import { buildHeaders } from "./parseCsv";
import type { RawCell, RawTable } from "./types";

const normalizeCell = (value: unknown): RawCell => {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return String(value);
};

const headerLabel = (value: unknown): string => {
  const label = normalizeCell(value);
  return label === null ? "" : String(label);
};

export const parseXlsxBuffer = (buffer: ArrayBuffer | Uint8Array): RawTable[] => {
  const workbook = XLSX.read(buffer, { type: "array" });
  return workbook.SheetNames.map((sheetName) => {
    const sheet = workbook.Sheets[sheetName];
    const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
      header: 1,
      blankrows: false
    });

    const rawHeaders = rows[0] ?? [];
    const headers = buildHeaders(rawHeaders.map(headerLabel));
    const dataRows = rows.slice(1).map((row) => headers.map((_, index) => normalizeCell(row[index])));

    return {
      sheetName,
      headers,
      rows: dataRows
    };
  });
};
