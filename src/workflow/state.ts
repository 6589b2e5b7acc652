import * as z from "zod";
import { ClarityRuleSchema } from "./schema/graphDslTypes.js";

export const ValidationResultSchema = z.object({
  passed: z.boolean(),
  score: z.number().min(0).max(1),
  feedback: z.string(),
  failedRule: ClarityRuleSchema.nullable(),
  /** Set when a judge rule was scored by the local heuristic instead of the Judge capability. */
  degraded: z.boolean().default(false),
});

export const TurnOutcomeSchema = z.enum(["advanced", "retry", "skipped-incomplete", "skipped", "completed"]);

export const HistoryEntrySchema = z.object({
  node: z.string().min(1),
  input: z.string(),
  /** Null for an explicit skip, which is not validated. */
  validation: ValidationResultSchema.nullable(),
  outcome: TurnOutcomeSchema,
  nextNode: z.string().min(1),
  revisit: z.boolean().default(false),
  timestamp: z.number().int().min(0),
});

export const ContextSourceSchema = z.enum(["caller", "answer", "search"]);

const ContextOriginSchema = z.object({
  source: ContextSourceSchema,
  nodeId: z.string().nullable(),
  turn: z.number().int().min(0),
  updatedAt: z.number().int().min(0),
});

export const ContextProvenanceSchema = ContextOriginSchema.extend({
  /** The value this write replaced, if any. Only the latest overwrite is kept. */
  previous: ContextOriginSchema.extend({ value: z.unknown() }).nullable().default(null),
});

export const ContextEntrySchema = z.object({
  value: z.unknown(),
  provenance: ContextProvenanceSchema,
});

export const SessionStatusSchema = z.enum(["not_started", "active", "complete"]);

export const SessionStateSchema = z.object({
  sessionId: z.string().min(1),
  graphId: z.string().min(1),
  status: SessionStatusSchema.default("not_started"),
  currentNode: z.string().nullable().default(null),
  completedNodes: z.array(z.string()).default([]),
  history: z.array(HistoryEntrySchema).default([]),
  accumulatedContext: z.record(z.string(), ContextEntrySchema).default({}),
  retryCounts: z.record(z.string(), z.number().int().min(0)).default({}),
  createdAt: z.number().int().min(0),
  updatedAt: z.number().int().min(0),
});

export type ValidationResult = z.infer<typeof ValidationResultSchema>;
export type TurnOutcome = z.infer<typeof TurnOutcomeSchema>;
export type HistoryEntry = z.infer<typeof HistoryEntrySchema>;
export type ContextSource = z.infer<typeof ContextSourceSchema>;
export type ContextProvenance = z.infer<typeof ContextProvenanceSchema>;
export type ContextEntry = z.infer<typeof ContextEntrySchema>;
export type AccumulatedContext = Record<string, ContextEntry>;
export type SessionStatus = z.infer<typeof SessionStatusSchema>;
export type SessionState = z.infer<typeof SessionStateSchema>;

export function createSessionState(sessionId: string, graphId: string, now: number): SessionState {
  return {
    sessionId,
    graphId,
    status: "not_started",
    currentNode: null,
    completedNodes: [],
    history: [],
    accumulatedContext: {},
    retryCounts: {},
    createdAt: now,
    updatedAt: now,
  };
}
