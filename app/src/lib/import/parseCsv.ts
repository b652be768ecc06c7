import { DatasetParseError } from "../errors";
import type { RawCell, RawTable } from "./types";

const sanitizeText = (text: string): string =>
  text.replace(/^\uFEFF/, "").replace(/\r\n/g, "\n").replace(/\r/g, "\n");

const detectDelimiter = (headerLine: string): string => {
  const commaCount = (headerLine.match(/,/g) ?? []).length;
  const semicolonCount = (headerLine.match(/;/g) ?? []).length;
  return semicolonCount > commaCount ? ";" : ",";
};

type ParsedRecord = {
  line: number;
  fields: string[];
};

/**
 * Splits the whole document into records. Quoted fields may contain the
 * delimiter, doubled quotes and newlines.
 */
const parseRecords = (text: string, delimiter: string): ParsedRecord[] => {
  const records: ParsedRecord[] = [];
  let fields: string[] = [];
  let current = "";
  let inQuotes = false;
  let line = 1;
  let recordLine = 1;

  const pushRecord = () => {
    fields.push(current);
    const blank = fields.length === 1 && fields[0].trim() === "";
    if (!blank) {
      records.push({ line: recordLine, fields });
    }
    fields = [];
    current = "";
  };

  for (let index = 0; index < text.length; index += 1) {
    const char = text[index];
    if (char === '"') {
      const nextChar = text[index + 1];
      if (inQuotes && nextChar === '"') {
        current += '"';
        index += 1;
      } else {
        inQuotes = !inQuotes;
      }
      continue;
    }

    if (char === "\n") {
      line += 1;
      if (inQuotes) {
        current += char;
        continue;
      }
      pushRecord();
      recordLine = line;
      continue;
    }

    if (char === delimiter && !inQuotes) {
      fields.push(current);
      current = "";
      continue;
    }

    current += char;
  }

  if (inQuotes) {
    throw new DatasetParseError(`Unterminated quoted field starting on line ${recordLine}.`);
  }
  if (current !== "" || fields.length > 0) {
    pushRecord();
  }
  return records;
};

export const buildHeaders = (rawHeaders: string[]): string[] => {
  const seen = new Map<string, number>();
  return rawHeaders.map((header, index) => {
    const trimmed = header.trim();
    const base = trimmed ? trimmed : `Column ${index + 1}`;
    const count = seen.get(base) ?? 0;
    seen.set(base, count + 1);
    return count === 0 ? base : `${base}.${count}`;
  });
};

export const parseCsvText = (text: string): RawTable => {
  const sanitized = sanitizeText(text);
  const firstLine = sanitized.split("\n").find((line) => line.trim().length > 0);
  if (firstLine === undefined) {
    throw new DatasetParseError("CSV appears to be empty.");
  }

  const delimiter = detectDelimiter(firstLine);
  const [headerRecord, ...dataRecords] = parseRecords(sanitized, delimiter);
  if (!headerRecord) {
    throw new DatasetParseError("CSV appears to be empty.");
  }
  const headers = buildHeaders(headerRecord.fields);
  const rows = dataRecords.map((record): RawCell[] => {
    if (record.fields.length > headers.length) {
      throw new DatasetParseError(
        `Expected ${headers.length} fields in line ${record.line}, saw ${record.fields.length}.`
      );
    }
    return headers.map((_, index) => record.fields[index] ?? null);
  });

  return {
    headers,
    rows
  };
};
