const nonEmpty = { type: "string", minLength: 1 } as const;

export const VqaDatasetSchema = {
  type: "object",
  additionalProperties: {
    type: "object",
    properties: {
      video_path: { type: "string", pattern: "\\.mp4$" },
      detected_objects: { type: "array" },
      qa_pairs: {
        type: "array",
        minItems: 3,
        maxItems: 3,
        items: {
          type: "object",
          properties: {
            question: nonEmpty,
            answers: { type: "array", minItems: 5, maxItems: 5, items: nonEmpty },
          },
          required: ["question", "answers"],
          additionalProperties: false,
        },
      },
    },
    required: ["video_path", "detected_objects", "qa_pairs"],
    additionalProperties: false,
  },
} as const;
