import { selectRows } from "../dataset/cells";
import { createRandom } from "./random";
import type { Dataset } from "../../types/dataset";

export const SAMPLE_SIZE = 50;
export const SAMPLE_SEED = 0;

/**
 * Picks `min(sampleSize, populationSize)` distinct indices with a partial
 * Fisher-Yates shuffle. Pure in its arguments: the same inputs always give
 * the same indices, in the same order.
 */
export const sampleIndices = (populationSize: number, sampleSize: number, seed: number): number[] => {
  const count = Math.max(0, Math.min(Math.floor(sampleSize), Math.floor(populationSize)));
  const random = createRandom(seed);
  const pool = Array.from({ length: Math.max(0, Math.floor(populationSize)) }, (_, index) => index);
  for (let index = 0; index < count; index += 1) {
    const swapIndex = index + Math.floor(random() * (pool.length - index));
    [pool[index], pool[swapIndex]] = [pool[swapIndex], pool[index]];
  }
  return pool.slice(0, count);
};

export const sampleDataset = (
  dataset: Dataset,
  sampleSize: number = SAMPLE_SIZE,
  seed: number = SAMPLE_SEED
): Dataset => selectRows(dataset, sampleIndices(dataset.rowCount, sampleSize, seed));
