import { describe, it, expect } from "vitest";
import { validateVqaDataset } from "../src/validator";
import { assembleDataset, datasetToObject } from "../src/datasetAssembler";

describe("validateVqaDataset", () => {
  it("accepts generated datasets", () => {
    const { dataset } = assembleDataset([
      { case_id: "c", index: 1, tools: ["needle_driver"], groundtruth_taskname: "suturing" },
      { case_id: "c", index: 2 },
    ]);
    expect(validateVqaDataset(datasetToObject(dataset))).toEqual({ valid: true });
  });

  it("rejects a pair with the wrong number of answers", () => {
    const result = validateVqaDataset({
      c_id1: {
        video_path: "c_id1.mp4",
        detected_objects: [],
        qa_pairs: [
          { question: "q1", answers: ["a", "b", "c", "d", "e"] },
          { question: "q2", answers: ["a", "b", "c", "d", "e"] },
          { question: "q3", answers: ["a", "b", "c", "d"] },
        ],
      },
    });
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(["/c_id1/qa_pairs/2/answers must NOT have fewer than 5 items"]);
  });

  it("rejects extra fields", () => {
    const result = validateVqaDataset({
      c_id1: { video_path: "c_id1.mp4", detected_objects: [], qa_pairs: [], extra: true },
    });
    expect(result.valid).toBe(false);
  });
});
