import type { SessionState } from "../../state.js";
import { deserializeCheckpoint, serializeCheckpoint } from "./checkpoint.js";

/**
 * Keyed persistence for session checkpoints. `save` is an upsert; `load`
 * resolves to null for an unknown session; `delete` of an unknown session is
 * a no-op.
 */
export interface SessionStore {
  save(sessionId: string, state: SessionState): Promise<void>;
  load(sessionId: string): Promise<SessionState | null>;
  delete(sessionId: string): Promise<void>;
}

/**
 * Process-local store. Checkpoints are kept serialized so a loaded session
 * never aliases the object the engine is mutating.
 */
export class InMemorySessionStore implements SessionStore {
  private readonly checkpoints = new Map<string, string>();

  async save(sessionId: string, state: SessionState): Promise<void> {
    this.checkpoints.set(sessionId, serializeCheckpoint(state));
  }

  async load(sessionId: string): Promise<SessionState | null> {
    const text = this.checkpoints.get(sessionId);
    return text === undefined ? null : deserializeCheckpoint(text, sessionId);
  }

  async delete(sessionId: string): Promise<void> {
    this.checkpoints.delete(sessionId);
  }

  size(): number {
    return this.checkpoints.size;
  }
}
