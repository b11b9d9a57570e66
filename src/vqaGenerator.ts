import path from "path";
import type { GenerateOptions, GenerateResult } from "./types";
import { loadAllRecords } from "./loader";
import { assembleDataset, datasetToObject, writeDataset } from "./datasetAssembler";
import { validateVqaDataset } from "./validator";
import { DatasetValidationError } from "./errors";

export const GENERATOR_VERSION = "1.0.0";
export const DEFAULT_PATTERN = "**/merged_objdet_metadata_*.json";
export const DEFAULT_OUTPUT = "vqa_dataset.json";

/**
 * Merge every metadata shard under `rootDir` and write the VQA dataset.
 * Throws NoMetadataFilesError before anything is written when no shard matches.
 */
export function generateVqaDataset(opts: GenerateOptions = {}): GenerateResult {
  const rootDir = path.resolve(opts.rootDir ?? process.cwd());
  const pattern = opts.pattern ?? DEFAULT_PATTERN;
  const outputPath = path.resolve(rootDir, opts.outputPath ?? DEFAULT_OUTPUT);
  const validate = opts.validate ?? true;
  const dryRun = opts.dryRun ?? false;

  const { records, files, failedFiles } = loadAllRecords(rootDir, pattern);
  const { dataset, skipped } = assembleDataset(records);

  if (validate) {
    const { valid, errors } = validateVqaDataset(datasetToObject(dataset));
    if (!valid) throw new DatasetValidationError(errors ?? []);
  }

  if (!dryRun) writeDataset(dataset, outputPath);

  return {
    outputPath,
    entryCount: dataset.size,
    fileCount: files.length,
    failedFiles,
    skippedRecords: skipped,
    dataset,
    meta: {
      generatorVersion: GENERATOR_VERSION,
      rootDir,
      pattern,
      validated: validate,
      written: !dryRun,
    },
  };
}

export function formatSummary(result: GenerateResult): string {
  return `Wrote ${path.basename(result.outputPath)} with ${result.entryCount} entries from ${result.fileCount} metadata files.`;
}

export default generateVqaDataset;
