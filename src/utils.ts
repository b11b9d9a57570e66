import { createHash } from "crypto";

/** Human-readable label: underscores become spaces, nothing else changes. */
export const normalize = (s?: string | null) => (s ?? "").replace(/_/g, " ");

export const wordCount = (s: string) => {
  const t = s.trim();
  return t.length ? t.split(/\s+/).length : 0;
};

export const hash = (s: string) => createHash("sha256").update(s).digest("hex");
export const lex = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

export const MAX_LISTED_TOOLS = 3;

/**
 * Up to three distinct, normalized tool names joined as an English list:
 * "a", "a and b", "a, b, and c". Empty list gives "".
 */
export function summarizeTools(tools: readonly string[]): string {
  const clean: string[] = [];
  const seen = new Set<string>();
  for (const t of tools) {
    const name = normalize(t).trim();
    if (name && !seen.has(name)) {
      seen.add(name);
      clean.push(name);
    }
    if (clean.length >= MAX_LISTED_TOOLS) break;
  }

  switch (clean.length) {
    case 0:
      return "";
    case 1:
      return clean[0];
    case 2:
      return `${clean[0]} and ${clean[1]}`;
    default:
      return `${clean[0]}, ${clean[1]}, and ${clean[2]}`;
  }
}
