import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { parseArgs } from "node:util";
import { z } from "zod";
import { buildDataset } from "../src/lib/import/buildDataset";
import { parseCsvText } from "../src/lib/import/parseCsv";
import { renderTable } from "../src/lib/prompt/renderTable";
import { selectRows } from "../src/lib/dataset/cells";
import { renderNoisyCsv } from "../src/lib/synthetic/noisyDataset";

const argsSchema = z.object({
  rows: z.coerce.number().int().positive().default(20_000),
  seed: z.coerce.number().int().default(42),
  out: z.string().min(1).default("data/noisy_20k.csv")
});

const main = async () => {
  const { values } = parseArgs({
    options: {
      rows: { type: "string" },
      seed: { type: "string" },
      out: { type: "string" }
    }
  });
  const args = argsSchema.parse(values);

  const csv = renderNoisyCsv(args.rows, args.seed);
  await mkdir(dirname(args.out), { recursive: true });
  await writeFile(args.out, csv, "utf8");

  const dataset = buildDataset(parseCsvText(csv));
  const preview = selectRows(dataset, [0, 1, 2].filter((index) => index < dataset.rowCount));
  console.info(`Wrote ${dataset.rowCount.toLocaleString("en-US")} rows to ${args.out}`);
  console.info(`Columns: ${dataset.columns.map((column) => column.name).join(", ")}`);
  console.info(`Sample:\n${renderTable(preview)}`);
};

main().catch((error: unknown) => {
  console.error("[generate-noisy-dataset] fail", error);
  process.exitCode = 1;
});
