export const tokenize = (input: string): string[] =>
  input
    .toLowerCase()
    .split(/[^a-z0-9]+/g)
    .map((t) => t.trim())
    .filter(Boolean);

export function countWords(text: string): number {
  return text.trim().split(/\s+/).filter(Boolean).length;
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Case-insensitive whole-word (or whole-phrase) match. */
export function containsWord(text: string, word: string): boolean {
  return new RegExp(`\\b${escapeRegExp(word.trim())}\\b`, "i").test(text);
}

const BULLET_PREFIX = /^\s*(?:[-*•]|\d+[.)])\s*/;

/**
 * Splits an answer into list items: one per non-empty line when the answer
 * spans several lines, otherwise one per comma- or semicolon-separated part.
 */
export function extractListItems(text: string): string[] {
  const lines = text
    .split(/\r?\n/)
    .map((line) => line.replace(BULLET_PREFIX, "").trim())
    .filter(Boolean);
  if (lines.length > 1) return lines;
  return (lines[0] ?? "")
    .split(/[,;]/)
    .map((part) => part.trim())
    .filter(Boolean);
}

const NEGATION_PATTERN =
  /\b(?:no|not|without|exclude|excluding|skip|skipping|don't|dont|won't|wont|never|avoid)\s+([a-z0-9][\w-]*)/gi;

/**
 * Things the answer rules out: phrases introduced by a negation cue, or the
 * items of a list of two or more, whichever yields more.
 */
export function extractExclusions(text: string): string[] {
  const negated = [...text.matchAll(NEGATION_PATTERN)].map((match) => match[0].trim());
  const items = extractListItems(text);
  return items.length >= 2 && items.length > negated.length ? items : negated;
}

/** Collapses an LLM answer such as `"Tech."` or `**tech**` to a bare id candidate. */
export function normalizeNodeAnswer(raw: string): string {
  const firstLine = raw.trim().split(/\r?\n/)[0] ?? "";
  return firstLine
    .replace(/^[\s"'`*_]+|[\s"'`*_.,!:;]+$/g, "")
    .trim();
}

export function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}
