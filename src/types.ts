/** One detection-metadata record as found in a shard. Fields are untrusted JSON. */
export type MetadataRecord = {
  case_id?: unknown;
  index?: unknown;
  tools?: unknown;
  groundtruth_taskname?: unknown;
};

export type DatasetKey = string;

export type QAPair = {
  question: string;
  answers: string[];
};

export type OutputEntry = {
  video_path: string;
  detected_objects: unknown[];
  qa_pairs: QAPair[];
};

/** Insertion-ordered; a repeated key keeps its first position and the last value. */
export type Dataset = Map<DatasetKey, OutputEntry>;

export type LoadResult = {
  records: unknown[];
  files: string[];
  failedFiles: string[];
};

export type AssembleResult = {
  dataset: Dataset;
  skipped: number;
};

export type GenerateOptions = {
  rootDir?: string;    // default process.cwd()
  pattern?: string;    // default "**/merged_objdet_metadata_*.json"
  outputPath?: string; // default "vqa_dataset.json", relative to rootDir
  validate?: boolean;  // default true
  dryRun?: boolean;    // default false
};

export type GenerateResult = {
  outputPath: string;
  entryCount: number;
  fileCount: number;
  failedFiles: string[];
  skippedRecords: number;
  dataset: Dataset;
  meta: {
    generatorVersion: string;
    rootDir: string;
    pattern: string;
    validated: boolean;
    written: boolean;
  };
};
