/**
 * Question strings and five-way answer variant tables.
 * Index 0 of every table is the primary phrasing.
 */

export const ANSWERS_PER_QUESTION = 5;
export const MAX_QUESTION_WORDS = 20;

export const QUESTIONS = {
  visibility: (groundtruth: string) =>
    `Which instruments are visible in this clip while performing ${groundtruth}?`,
  visibilityFallback: "Which instruments are visible in this surgical training video segment?",
  noTools: "Are any robotic instruments listed for this segment in the detected objects?",
  energy: "Is an energy device such as monopolar scissors or bipolar forceps being used here?",
  objective: "According to the ground truth label, what training objective is being practiced?",
} as const;

type Template = (value: string) => string;

export const VISIBLE_TOOL_ANSWERS: readonly Template[] = [
  (tools) => `Includes ${tools}.`,
  (tools) => `Visible: ${tools}.`,
  (tools) => `Present: ${tools}.`,
  (tools) => `Tools include ${tools}.`,
  (tools) => `Seen here: ${tools}.`,
];

export const NO_TOOL_ANSWERS: readonly string[] = [
  "No, no instruments listed.",
  "No tools are detected.",
  "None listed in objects.",
  "No, instruments not provided.",
  "No detected instruments.",
];

export const ENERGY_YES_ANSWERS: readonly string[] = [
  "Yes, energy device in use.",
  "Yes, monopolar/bipolar used.",
  "Affirmative, energy is used.",
  "Yes, energy instruments present.",
  "Yes, energy applied here.",
];

export const ENERGY_NO_ANSWERS: readonly string[] = [
  "No, no energy device used.",
  "Negative, no energy here.",
  "No energy instruments present.",
  "No, energy not applied.",
  "No, none used here.",
];

export const OBJECTIVE_ANSWERS: readonly Template[] = [
  (gt) => `${gt}.`,
  (gt) => `${gt} task.`,
  (gt) => `Training focus: ${gt}.`,
  (gt) => `${gt} is practiced.`,
  (gt) => `Objective: ${gt}.`,
];
