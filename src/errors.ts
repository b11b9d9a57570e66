/**
 * Errors raised by the VQA generator.
 */

export class NoMetadataFilesError extends Error {
  pattern: string;
  rootDir: string;

  constructor(pattern: string, rootDir: string) {
    super(`No files matching ${pattern} found under ${rootDir}. Place the metadata shards there.`);
    this.name = "NoMetadataFilesError";
    this.pattern = pattern;
    this.rootDir = rootDir;
  }
}

export class DatasetValidationError extends Error {
  errors: string[];

  constructor(errors: string[]) {
    super(`Generated dataset failed validation: ${errors.join("; ")}`);
    this.name = "DatasetValidationError";
    this.errors = errors;
  }
}
