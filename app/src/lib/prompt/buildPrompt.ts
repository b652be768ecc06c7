import { renderProfile } from "../profile/profileDataset";
import { renderTable } from "./renderTable";
import { SAMPLE_SIZE } from "../sample/sampleDataset";
import type { DatasetProfile } from "../../types/analysis";
import type { Dataset } from "../../types/dataset";

const PREAMBLE = "You are a helpful data cleaning assistant for tabular CSV data.";

const OUTPUT_CONTRACT = [
  "Write your answer in exactly these three markdown sections with short bullet points:",
  "**1) Possible data quality issues:**",
  "- For each bullet, name the exact column and quote 1-2 example cell values from the sample.",
  "- Use the format: ColumnName: Issue → Action (keep one line per item).",
  "**2) Cleaning steps:**",
  "- Be concrete: specify target formats (e.g., YYYY-MM-DD), units (e.g., USD), and exact type casts (e.g., to int/float/category/datetime). No code.",
  "**3) Additional notes:**",
  '- Keep it practical; avoid vague words like "verify", "unexpected formats", or "might". If uncertain, say what to check and how.'
].join("\n");

const RULES = [
  "Rules:",
  "- Do not invent columns or values.",
  "- Do not include any code blocks.",
  "- Keep it concise and practical."
].join("\n");

export type PromptInput = {
  profile: DatasetProfile;
  sample: Dataset;
};

/**
 * The full request payload. Only the profile and the sample reach the
 * model, so the prompt size is bounded by the column count and the sample
 * size rather than by the row count.
 */
export const buildAnalysisPrompt = ({ profile, sample }: PromptInput): string =>
  [
    PREAMBLE,
    "",
    "Dataset summary (entire file):",
    renderProfile(profile),
    "",
    `Random sample of rows (up to ${SAMPLE_SIZE}):`,
    renderTable(sample),
    "",
    OUTPUT_CONTRACT,
    "",
    RULES
  ].join("\n");
