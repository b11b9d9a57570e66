export * from "./types";
export { normalize, summarizeTools, wordCount } from "./utils";
export { buildQaPairs, usesEnergyDevice, groundTruthLabel, ENERGY_DEVICE_KEYWORDS } from "./qaBuilder";
export { discoverMetadataFiles, loadAllRecords } from "./loader";
export { assembleDataset, datasetKey, serializeDataset, writeDataset } from "./datasetAssembler";
export { validateVqaDataset } from "./validator";
export { NoMetadataFilesError, DatasetValidationError } from "./errors";
export { generateVqaDataset, formatSummary } from "./vqaGenerator";
