#!/usr/bin/env node
import { formatSummary, generateVqaDataset } from "../vqaGenerator";

const args = process.argv.slice(2);
if (args.includes("--help") || args.includes("-h")) {
  console.log("Usage: generate-vqa [rootDir] [outputPath]");
  console.log("  rootDir     directory searched for merged_objdet_metadata_*.json (default: cwd)");
  console.log("  outputPath  dataset file, relative to rootDir (default: vqa_dataset.json)");
  process.exit(0);
}

const [rootDir, outputPath] = args;

try {
  const result = generateVqaDataset({ rootDir, outputPath });
  console.log(formatSummary(result));
} catch (err) {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
}
