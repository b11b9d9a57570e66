import Ajv from "ajv";
import { VqaDatasetSchema } from "./schema";

const ajv = new Ajv({ allErrors: true, strict: true });
const validateFn = ajv.compile(VqaDatasetSchema);

/** Shape check of the serialized dataset object (not of input records). */
export function validateVqaDataset(
  o: unknown
): { valid: boolean; errors?: string[] } {
  const valid = validateFn(o);
  if (valid) return { valid: true };
  return {
    valid: false,
    errors: (validateFn.errors || []).map((e) => `${e.instancePath} ${e.message}`),
  };
}
