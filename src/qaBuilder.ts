import type { MetadataRecord, QAPair } from "./types";
import { normalize, summarizeTools, wordCount } from "./utils";
import {
  ENERGY_NO_ANSWERS,
  ENERGY_YES_ANSWERS,
  MAX_QUESTION_WORDS,
  NO_TOOL_ANSWERS,
  OBJECTIVE_ANSWERS,
  QUESTIONS,
  VISIBLE_TOOL_ANSWERS,
} from "./templates";

/** Raw-name substrings that mark an electrosurgical (energy) instrument. */
export const ENERGY_DEVICE_KEYWORDS = [
  "monopolar",
  "bipolar",
  "vessel_sealer",
  "permanent_cautery_hook_spatula",
  "force_bipolar",
] as const;

export const DEFAULT_GROUNDTRUTH = "the labeled task";

/** Copy of the record's `tools` array as found; anything that is not an array yields []. */
export function toolList(record: MetadataRecord): unknown[] {
  const tools: unknown = record.tools;
  return Array.isArray(tools) ? [...tools] : [];
}

/** Tool names for text and keyword matching; non-string items count as "". */
export const toolNames = (tools: readonly unknown[]): string[] =>
  tools.map((t) => (typeof t === "string" ? t : ""));

export function groundTruthLabel(taskname: unknown): string {
  const raw = typeof taskname === "string" ? taskname : "";
  return normalize(raw).trim() || DEFAULT_GROUNDTRUTH;
}

/** Case-sensitive substring match against the raw (un-normalized) names. */
export function usesEnergyDevice(tools: readonly string[]): boolean {
  return tools.some((t) => ENERGY_DEVICE_KEYWORDS.some((k) => t.includes(k)));
}

function visibilityPair(tools: readonly string[], groundtruth: string): QAPair {
  if (tools.length === 0) {
    return { question: QUESTIONS.noTools, answers: [...NO_TOOL_ANSWERS] };
  }

  let question = QUESTIONS.visibility(groundtruth);
  if (wordCount(question) > MAX_QUESTION_WORDS) question = QUESTIONS.visibilityFallback;

  const listed = summarizeTools(tools);
  return { question, answers: VISIBLE_TOOL_ANSWERS.map((tpl) => tpl(listed)) };
}

/**
 * Three QA pairs in fixed order: instrument visibility, energy-device use,
 * training objective. Each carries five answers.
 */
export function buildQaPairs(record: MetadataRecord): QAPair[] {
  const tools = toolNames(toolList(record));
  const groundtruth = groundTruthLabel(record.groundtruth_taskname);

  return [
    visibilityPair(tools, groundtruth),
    {
      question: QUESTIONS.energy,
      answers: [...(usesEnergyDevice(tools) ? ENERGY_YES_ANSWERS : ENERGY_NO_ANSWERS)],
    },
    {
      question: QUESTIONS.objective,
      answers: OBJECTIVE_ANSWERS.map((tpl) => tpl(groundtruth)),
    },
  ];
}
