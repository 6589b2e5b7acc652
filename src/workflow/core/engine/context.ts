import type { AccumulatedContext, ContextEntry, ContextSource } from "../../state.js";
import { ownValue } from "../helpers/records.js";

export type ContextWrite = {
  source: ContextSource;
  nodeId: string | null;
  turn: number;
  at: number;
};

/**
 * Last writer wins. Each overwritten key keeps a record of the value it
 * replaced and where that value came from.
 */
export function mergeContext(
  current: AccumulatedContext,
  delta: Record<string, unknown>,
  write: ContextWrite
): AccumulatedContext {
  const next: AccumulatedContext = { ...current };
  for (const [key, value] of Object.entries(delta)) {
    if (value === undefined || key === "__proto__") continue;
    const existing = ownValue(current, key);
    const entry: ContextEntry = {
      value,
      provenance: {
        source: write.source,
        nodeId: write.nodeId,
        turn: write.turn,
        updatedAt: write.at,
        previous: existing
          ? {
              source: existing.provenance.source,
              nodeId: existing.provenance.nodeId,
              turn: existing.provenance.turn,
              updatedAt: existing.provenance.updatedAt,
              value: existing.value,
            }
          : null,
      },
    };
    next[key] = entry;
  }
  return next;
}

/** Plain key/value view, as handed to templates, resolvers and capabilities. */
export function contextValues(context: AccumulatedContext): Record<string, unknown> {
  const values: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(context)) values[key] = entry.value;
  return values;
}
