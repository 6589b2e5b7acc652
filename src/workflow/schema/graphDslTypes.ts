import * as z from "zod";

// ── Clarity rules ───────────────────────────────────────────────────

const ruleMessage = z.string().min(1).optional();

export const MinWordCountRuleSchema = z.object({
  kind: z.literal("min-word-count"),
  min: z.number().int().min(1),
  message: ruleMessage,
});

export const RequiredEntitySetRuleSchema = z.object({
  kind: z.literal("required-entity-set"),
  entities: z.array(z.string().min(1)).min(1),
  message: ruleMessage,
});

export const RequiredCategorySetRuleSchema = z.object({
  kind: z.literal("required-category-set"),
  categories: z.array(z.string().min(1)).min(1),
  /** Per-category keyword overrides; categories without an entry use the built-in table. */
  keywords: z.record(z.string(), z.array(z.string().min(1))).default({}),
  message: ruleMessage,
});

export const ItemExtractorSchema = z.enum(["list", "exclusions"]);

export const MinExtractedItemsRuleSchema = z.object({
  kind: z.literal("min-extracted-items"),
  min: z.number().int().min(1),
  extractor: ItemExtractorSchema.default("list"),
  message: ruleMessage,
});

export const JudgeHeuristicSchema = z.enum(["specificity", "approval"]);

export const JudgeScoreRuleSchema = z.object({
  kind: z.literal("judge-score"),
  threshold: z.number().min(0).max(1),
  judgePromptTemplate: z.string().min(1),
  heuristic: JudgeHeuristicSchema.default("specificity"),
  message: ruleMessage,
});

export const ClarityRuleSchema = z.discriminatedUnion("kind", [
  MinWordCountRuleSchema,
  RequiredEntitySetRuleSchema,
  RequiredCategorySetRuleSchema,
  MinExtractedItemsRuleSchema,
  JudgeScoreRuleSchema,
]);

// ── Nodes ───────────────────────────────────────────────────────────

export const TransitionsSchema = z.object({
  default: z.string().min(1).optional(),
  /** Either "dynamic" or the id of a locally registered resolver. */
  conditional: z.string().min(1).optional(),
});

export const NodeSpecSchema = z.object({
  id: z.string().min(1),
  label: z.string().min(1),
  purpose: z.string().default(""),
  prompt: z.string().min(1).optional(),
  start: z.boolean().default(false),
  terminal: z.boolean().default(false),
  clarityRules: z.array(ClarityRuleSchema).default([]),
  transitions: TransitionsSchema.default({}),
  optional: z.boolean().default(false),
  retryAllowed: z.boolean().default(true),
  skippable: z.boolean().default(false),
  rephrase: z.boolean().default(false),
  maxRetries: z.number().int().min(0).optional(),
  threshold: z.number().min(0).max(1).optional(),
  parallelNodes: z.array(z.string().min(1)).default([]),
  searchHint: z.string().min(1).optional(),
  contextKey: z.string().min(1).optional(),
});

// ── Graph ───────────────────────────────────────────────────────────

export const GraphHeaderSchema = z.object({
  graphId: z.string().min(1),
  version: z.string().min(1),
  description: z.string().default(""),
  maxRetries: z.number().int().min(0).default(3),
  allowBacktrack: z.boolean().default(true),
});

export const GraphDslSchema = z.object({
  graph: GraphHeaderSchema,
  nodes: z.array(NodeSpecSchema).min(1),
});

export type MinWordCountRule = z.infer<typeof MinWordCountRuleSchema>;
export type RequiredEntitySetRule = z.infer<typeof RequiredEntitySetRuleSchema>;
export type RequiredCategorySetRule = z.infer<typeof RequiredCategorySetRuleSchema>;
export type MinExtractedItemsRule = z.infer<typeof MinExtractedItemsRuleSchema>;
export type JudgeScoreRule = z.infer<typeof JudgeScoreRuleSchema>;
export type ClarityRule = z.infer<typeof ClarityRuleSchema>;
export type ItemExtractor = z.infer<typeof ItemExtractorSchema>;
export type JudgeHeuristic = z.infer<typeof JudgeHeuristicSchema>;
export type Transitions = z.infer<typeof TransitionsSchema>;
export type NodeSpec = z.infer<typeof NodeSpecSchema>;
export type NodeSpecInput = z.input<typeof NodeSpecSchema>;
export type GraphHeader = z.infer<typeof GraphHeaderSchema>;
export type GraphDsl = z.infer<typeof GraphDslSchema>;
