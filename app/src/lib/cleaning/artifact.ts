import { randomUUID } from "node:crypto";
import { writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { basename, extname, join } from "node:path";
import { serializeCsv } from "./serializeCsv";
import type { Dataset } from "../../types/dataset";

export const DEFAULT_ARTIFACT_BASE = "cleaned";
export const ARTIFACT_SUFFIX = "_cleaned.csv";

export const artifactBaseName = (sourceName?: string | null): string => {
  const name = sourceName ? basename(sourceName.trim()) : "";
  const base = name.slice(0, name.length - extname(name).length);
  return base || DEFAULT_ARTIFACT_BASE;
};

export const artifactFileName = (sourceName?: string | null, unique: string = randomUUID()): string =>
  `${artifactBaseName(sourceName)}_${unique}${ARTIFACT_SUFFIX}`;

/**
 * Writes the dataset as CSV into the OS temp directory and returns the path,
 * or null when there is no dataset. Names are unique per call and the file
 * is created exclusively.
 */
export const writeCleanedArtifact = async (
  dataset: Dataset | null,
  sourceName?: string | null,
  directory: string = tmpdir()
): Promise<string | null> => {
  if (!dataset) {
    return null;
  }
  const path = join(directory, artifactFileName(sourceName));
  await writeFile(path, serializeCsv(dataset), { encoding: "utf8", flag: "wx" });
  return path;
};
