import { formatCell } from "../dataset/cells";
import type { Dataset } from "../../types/dataset";

const NULL_LABEL = "NaN";
const COLUMN_GAP = "  ";

/** Plain-text grid with right-aligned cells, one line per row. */
export const renderTable = (dataset: Dataset): string => {
  const headers = dataset.columns.map((column) => column.name);
  if (dataset.rowCount === 0) {
    return `(no rows) Columns: ${headers.join(", ")}`;
  }

  const cells = dataset.columns.map((column) =>
    column.values.map((value) => formatCell(column.type, value, NULL_LABEL))
  );
  const widths = headers.map((header, columnIndex) =>
    Math.max(header.length, ...cells[columnIndex].map((cell) => cell.length))
  );

  const renderLine = (values: string[]): string =>
    values.map((value, columnIndex) => value.padStart(widths[columnIndex])).join(COLUMN_GAP);

  const lines = [renderLine(headers)];
  for (let rowIndex = 0; rowIndex < dataset.rowCount; rowIndex += 1) {
    lines.push(renderLine(cells.map((columnCells) => columnCells[rowIndex] ?? NULL_LABEL)));
  }
  return lines.join("\n");
};
