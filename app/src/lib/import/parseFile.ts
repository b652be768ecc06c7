import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import { DatasetParseError } from "../errors";
import { buildDataset } from "./buildDataset";
import { parseCsvText } from "./parseCsv";
import { parseXlsxBuffer } from "./parseXlsx";
import type { RawTable, Upload } from "./types";
import type { Dataset } from "../../types/dataset";

export type ParsedUpload = {
  dataset: Dataset;
  sourceName: string;
  fileType: "csv" | "xlsx";
  sheetNames: string[];
};

const fileExtension = (name: string): string =>
  name.split(".").pop()?.toLowerCase() ?? "";

const decodeText = (data: Uint8Array | string): string =>
  typeof data === "string" ? data : new TextDecoder("utf-8").decode(data);

const toBytes = (data: Uint8Array | string): Uint8Array =>
  typeof data === "string" ? new TextEncoder().encode(data) : data;

export const parseUpload = (upload: Upload): ParsedUpload => {
  const sourceName = basename(upload.name);
  const extension = fileExtension(sourceName);

  if (extension === "csv" || extension === "txt") {
    const table = parseCsvText(decodeText(upload.data));
    return { dataset: buildDataset(table), sourceName, fileType: "csv", sheetNames: [] };
  }

  if (extension === "xlsx") {
    let tables: RawTable[];
    try {
      tables = parseXlsxBuffer(toBytes(upload.data));
    } catch (error) {
      throw new DatasetParseError(
        "Could not read the XLSX workbook.",
        error instanceof Error ? error.message : undefined
      );
    }
    const [firstTable] = tables;
    if (!firstTable) {
      throw new DatasetParseError("No sheets detected in the XLSX file.");
    }
    return {
      dataset: buildDataset(firstTable),
      sourceName,
      fileType: "xlsx",
      sheetNames: tables.map((table) => table.sheetName ?? "Sheet")
    };
  }

  throw new DatasetParseError("Unsupported file type. Please upload a .csv or .xlsx file.");
};

export const readUpload = async (path: string): Promise<Upload> => ({
  name: path,
  data: await readFile(path)
});

export const parseFile = async (path: string): Promise<ParsedUpload> =>
  parseUpload(await readUpload(path));
