import { describe, expect, it } from "vitest";
import { hasDuplicateRows } from "../lib/baseline/checkBaseline";
import { buildDataset, datasetFromRecords } from "../lib/import/buildDataset";
import { parseCsvText } from "../lib/import/parseCsv";
import { formatValue, rowAt, rowKey } from "../lib/dataset/cells";

describe("buildDataset", () => {
  it("infers one type per column", () => {
    const dataset = buildDataset(
      parseCsvText("id,price,flag,label,empty\n1,2.5,true,x,\n2,3,False,,\n")
    );

    expect(dataset.rowCount).toBe(2);
    expect(dataset.columns).toEqual([
      { name: "id", type: "integer", values: [1, 2] },
      { name: "price", type: "float", values: [2.5, 3] },
      { name: "flag", type: "boolean", values: [true, false] },
      { name: "label", type: "text", values: ["x", null] },
      { name: "empty", type: "float", values: [null, null] }
    ]);
  });

  it("treats common missing-value markers as null", () => {
    const dataset = buildDataset(parseCsvText("score\n10\nNA\nnull\nN/A\n12\n"));

    expect(dataset.columns[0]).toEqual({
      name: "score",
      type: "integer",
      values: [10, null, null, null, 12]
    });
  });

  it("keeps raw strings when a column is not uniformly numeric", () => {
    const dataset = buildDataset(parseCsvText("code\n 7\n8\nabc\n"));

    expect(dataset.columns[0]).toEqual({ name: "code", type: "text", values: [" 7", "8", "abc"] });
  });

  it("keeps integers beyond the exact range as text so distinct ids stay distinct", () => {
    const dataset = buildDataset(
      parseCsvText("id,v\n12345678901234567890,a\n12345678901234567891,a\n")
    );

    expect(dataset.columns[0]).toEqual({
      name: "id",
      type: "text",
      values: ["12345678901234567890", "12345678901234567891"]
    });
    expect(hasDuplicateRows(dataset)).toBe(false);
  });

  it("builds columns from records in first-seen key order", () => {
    const dataset = datasetFromRecords([
      { id: 1, name: " Alice " },
      { id: 2, amount: "$10.00" }
    ]);

    expect(dataset.columns).toEqual([
      { name: "id", type: "integer", values: [1, 2] },
      { name: "name", type: "text", values: [" Alice ", null] },
      { name: "amount", type: "text", values: [null, "$10.00"] }
    ]);
  });
});

describe("cells", () => {
  it("formats values by column type", () => {
    expect(formatValue("float", 10)).toBe("10.0");
    expect(formatValue("float", 2.25)).toBe("2.25");
    expect(formatValue("integer", 10)).toBe("10");
    expect(formatValue("boolean", false)).toBe("False");
    expect(formatValue("datetime", new Date(Date.UTC(2024, 2, 17)))).toBe("2024-03-17");
    expect(formatValue("datetime", new Date(Date.UTC(2024, 2, 17, 8, 5, 9)))).toBe(
      "2024-03-17 08:05:09"
    );
  });

  it("distinguishes a number from its string form in row keys", () => {
    expect(rowKey([1, "a"])).not.toBe(rowKey(["1", "a"]));
    expect(rowKey([null, "a"])).toBe(rowKey([null, "a"]));
  });

  it("reads a row across columns", () => {
    const dataset = datasetFromRecords([{ a: 1, b: "x" }, { a: 2, b: null }]);

    expect(rowAt(dataset, 1)).toEqual([2, null]);
  });
});
