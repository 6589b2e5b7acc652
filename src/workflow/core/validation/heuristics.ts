import type { JudgeHeuristic } from "../../schema/graphDslTypes.js";
import { clamp01, containsWord, countWords, tokenize } from "../helpers/text.js";

export const POSITIVE_INDICATORS = [
  "yes", "ok", "okay", "good", "great", "approve", "approved", "confirm",
  "agree", "looks good", "sounds good", "perfect",
];

export const NEGATIVE_INDICATORS = ["no", "not", "change", "modify", "different", "wrong"];

/** Longer answers with more distinct words score higher; saturates at 1. */
export function specificityScore(input: string): number {
  const words = countWords(input);
  const unique = new Set(tokenize(input)).size;
  return clamp01((words * unique) / 100);
}

export function approvalScore(input: string): number {
  const positive = POSITIVE_INDICATORS.filter((word) => containsWord(input, word)).length;
  const negative = NEGATIVE_INDICATORS.filter((word) => containsWord(input, word)).length;
  if (negative > positive) return 0.3;
  if (positive > 0) return 0.9;
  return 0.5;
}

export function heuristicScore(kind: JudgeHeuristic, input: string): number {
  return kind === "approval" ? approvalScore(input) : specificityScore(input);
}

const NUMBER_PATTERN = /-?(?:\d+(?:\.\d+)?|\.\d+)/;

/**
 * Reads a judge reply. Accepts a number or the first number in a string;
 * anything outside [0, 1] or unparseable is null.
 */
export function parseJudgeScore(raw: number | string): number | null {
  let value: number;
  if (typeof raw === "number") {
    value = raw;
  } else {
    const match = raw.trim().match(NUMBER_PATTERN);
    if (!match) return null;
    value = Number.parseFloat(match[0]);
  }
  if (!Number.isFinite(value) || value < 0 || value > 1) return null;
  return value;
}
