import fs from "fs";
import path from "path";
import { stringify } from "lossless-json";
import type { AssembleResult, Dataset, DatasetKey, MetadataRecord, OutputEntry } from "./types";
import { buildQaPairs, toolList } from "./qaBuilder";

/** Lossless numbers stringify to their source text, so `2.0` stays `2.0`. */
export const datasetKey = (caseId: unknown, index: unknown): DatasetKey =>
  `${String(caseId)}_id${String(index)}`;

export const videoPath = (key: DatasetKey) => `${key}.mp4`;

/**
 * Records need both `case_id` and `index`. Only absence or null counts as
 * missing: an index of 0 or "" is a valid segment.
 */
export function hasIdentity(record: unknown): record is MetadataRecord {
  if (typeof record !== "object" || record === null || Array.isArray(record)) return false;
  if (!("case_id" in record) || !("index" in record)) return false;
  return record.case_id != null && record.index != null;
}

export function buildEntry(key: DatasetKey, record: MetadataRecord): OutputEntry {
  return {
    video_path: videoPath(key),
    detected_objects: toolList(record),
    qa_pairs: buildQaPairs(record),
  };
}

/** One entry per key, in first-seen key order; a later record with the same key replaces the value. */
export function assembleDataset(records: readonly unknown[]): AssembleResult {
  const dataset: Dataset = new Map();
  let skipped = 0;
  for (const record of records) {
    if (!hasIdentity(record)) {
      skipped++;
      continue;
    }
    const key = datasetKey(record.case_id, record.index);
    dataset.set(key, buildEntry(key, record));
  }
  return { dataset, skipped };
}

export function datasetToObject(dataset: Dataset): Record<DatasetKey, OutputEntry> {
  return Object.fromEntries(dataset);
}

/** Indented JSON; non-ASCII characters are written as-is, lossless numbers as parsed. */
export function serializeDataset(dataset: Dataset): string {
  const text = stringify(datasetToObject(dataset), null, 2);
  if (text === undefined) throw new Error("Dataset could not be serialized");
  return text;
}

export function writeDataset(dataset: Dataset, outputPath: string) {
  const file = path.resolve(outputPath);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, serializeDataset(dataset), "utf8");
}
