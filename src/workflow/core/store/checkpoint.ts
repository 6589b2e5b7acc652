import { StorageError, describeError } from "../../errors.js";
import { SessionStateSchema } from "../../state.js";
import type { SessionState } from "../../state.js";

/**
 * Canonical JSON for a session. Parsing through the schema fixes key order,
 * so deserialize followed by serialize reproduces the input byte for byte.
 */
export function serializeCheckpoint(state: SessionState): string {
  return JSON.stringify(SessionStateSchema.parse(state), null, 2);
}

export function deserializeCheckpoint(text: string, sessionId = "(unknown)"): SessionState {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new StorageError(sessionId, "decode", `checkpoint is not valid JSON: ${describeError(error)}`, { cause: error });
  }
  const parsed = SessionStateSchema.safeParse(raw);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first?.path.join(".") || "(root)";
    throw new StorageError(sessionId, "decode", `checkpoint failed validation at ${where}: ${first?.message ?? "unknown"}`);
  }
  return parsed.data;
}
