import { writeCleanedArtifact } from "../cleaning/artifact";
import { cleanDataset } from "../cleaning/cleanDataset";
import type { CleaningOutcome } from "../../types/analysis";
import type { Dataset } from "../../types/dataset";

export const NOTHING_TO_CLEAN = "Nothing to clean: analyze a dataset first.";

/**
 * Cleans the dataset the caller analyzed last and writes it as a CSV
 * artifact. The dataset is passed in explicitly; nothing is remembered
 * between calls.
 */
export const runCleaning = async (
  dataset: Dataset | null,
  sourceName?: string | null,
  directory?: string
): Promise<CleaningOutcome> => {
  if (!dataset) {
    return { artifactPath: null, message: NOTHING_TO_CLEAN };
  }
  const cleaned = cleanDataset(dataset);
  const artifactPath = await writeCleanedArtifact(cleaned, sourceName, directory);
  if (!artifactPath) {
    return { artifactPath: null, message: NOTHING_TO_CLEAN };
  }
  return {
    artifactPath,
    rowCount: cleaned.rowCount,
    removedRows: dataset.rowCount - cleaned.rowCount
  };
};
