import type {
  ClarityRule,
  JudgeScoreRule,
  MinExtractedItemsRule,
  MinWordCountRule,
  RequiredCategorySetRule,
  RequiredEntitySetRule,
} from "../../schema/graphDslTypes.js";
import { clamp01, containsWord, countWords, extractExclusions, extractListItems } from "../helpers/text.js";
import { ownValue } from "../helpers/records.js";

export type DeterministicRule = Exclude<ClarityRule, JudgeScoreRule>;

export type RuleOutcome = {
  passed: boolean;
  score: number;
  feedback: string;
};

export const DEFAULT_CATEGORY_KEYWORDS: Record<string, string[]> = {
  frontend: ["react", "vue", "angular", "svelte", "frontend", "client", "ui", "html", "css", "javascript"],
  backend: ["node", "python", "java", "backend", "server", "api", "express", "django", "flask"],
  database: ["mysql", "postgres", "postgresql", "mongodb", "database", "db", "sql", "nosql", "redis", "sqlite"],
};

export function isJudgeRule(rule: ClarityRule): rule is JudgeScoreRule {
  return rule.kind === "judge-score";
}

function minWordCount(rule: MinWordCountRule, input: string): RuleOutcome {
  const words = countWords(input);
  if (words >= rule.min) return { passed: true, score: 1, feedback: "" };
  return {
    passed: false,
    score: clamp01(words / rule.min),
    feedback: rule.message ?? `Please add a bit more detail (at least ${rule.min} words).`,
  };
}

function requiredEntitySet(rule: RequiredEntitySetRule, input: string): RuleOutcome {
  const haystack = input.toLowerCase();
  const missing = rule.entities.filter((entity) => !haystack.includes(entity.toLowerCase()));
  if (!missing.length) return { passed: true, score: 1, feedback: "" };
  return {
    passed: false,
    score: clamp01((rule.entities.length - missing.length) / rule.entities.length),
    feedback: rule.message ?? `Please mention: ${missing.join(", ")}.`,
  };
}

function requiredCategorySet(rule: RequiredCategorySetRule, input: string): RuleOutcome {
  const missing = rule.categories.filter((category) => {
    const keywords = ownValue(rule.keywords, category) ?? ownValue(DEFAULT_CATEGORY_KEYWORDS, category.toLowerCase()) ?? [category];
    return !keywords.some((keyword) => containsWord(input, keyword));
  });
  if (!missing.length) return { passed: true, score: 1, feedback: "" };
  return {
    passed: false,
    score: clamp01((rule.categories.length - missing.length) / rule.categories.length),
    feedback: rule.message ?? `Please cover: ${missing.join(", ")}.`,
  };
}

function minExtractedItems(rule: MinExtractedItemsRule, input: string): RuleOutcome {
  const items = rule.extractor === "exclusions" ? extractExclusions(input) : extractListItems(input);
  if (items.length >= rule.min) return { passed: true, score: 1, feedback: "" };
  const noun = rule.extractor === "exclusions" ? "thing to leave out" : "item";
  return {
    passed: false,
    score: clamp01(items.length / rule.min),
    feedback: rule.message ?? `Please list at least ${rule.min} ${noun}${rule.min === 1 ? "" : "s"}.`,
  };
}

/** Local, side-effect-free evaluation. Same rule and input always give the same outcome. */
export function evaluateDeterministicRule(rule: DeterministicRule, input: string): RuleOutcome {
  switch (rule.kind) {
    case "min-word-count":
      return minWordCount(rule, input);
    case "required-entity-set":
      return requiredEntitySet(rule, input);
    case "required-category-set":
      return requiredCategorySet(rule, input);
    case "min-extracted-items":
      return minExtractedItems(rule, input);
  }
}
