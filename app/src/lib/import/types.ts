export type RawCell = string | number | boolean | null;

export type RawTable = {
  sheetName?: string;
  headers: string[];
  rows: RawCell[][];
};

export type Upload = {
  name: string;
  data: Uint8Array | string;
};
