import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import * as z from "zod";
import { StorageError } from "../../errors.js";
import type { SessionState } from "../../state.js";
import { deserializeCheckpoint, serializeCheckpoint } from "./checkpoint.js";
import type { SessionStore } from "./sessionStore.js";

export const DEFAULT_SESSION_TABLE = "workflow_sessions";

let client: SupabaseClient | undefined;

/**
 * Shared Supabase client factory. Reads SUPABASE_URL and
 * SUPABASE_SERVICE_ROLE_KEY (or SUPABASE_ANON_KEY).
 */
export function getSupabaseClient(): SupabaseClient {
  if (client) return client;
  const url = process.env.SUPABASE_URL;
  const key = process.env.SUPABASE_SERVICE_ROLE_KEY || process.env.SUPABASE_ANON_KEY;
  if (!url || !key) {
    throw new Error("SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY (or SUPABASE_ANON_KEY) are required.");
  }
  client = createClient(url, key);
  return client;
}

const CheckpointRowSchema = z.object({ checkpoint: z.string() });

/**
 * Sessions in a Postgres table through Supabase:
 *
 *   create table workflow_sessions (
 *     session_id text primary key,
 *     graph_id   text not null,
 *     checkpoint text not null,
 *     updated_at timestamptz not null
 *   );
 */
export class SupabaseSessionStore implements SessionStore {
  constructor(
    private readonly client: SupabaseClient = getSupabaseClient(),
    private readonly table: string = DEFAULT_SESSION_TABLE
  ) {}

  async save(sessionId: string, state: SessionState): Promise<void> {
    const { error } = await this.client.from(this.table).upsert(
      {
        session_id: sessionId,
        graph_id: state.graphId,
        checkpoint: serializeCheckpoint(state),
        updated_at: new Date(state.updatedAt).toISOString(),
      },
      { onConflict: "session_id" }
    );
    if (error) throw new StorageError(sessionId, "save", error.message, { cause: error });
  }

  async load(sessionId: string): Promise<SessionState | null> {
    const { data, error } = await this.client
      .from(this.table)
      .select("checkpoint")
      .eq("session_id", sessionId)
      .maybeSingle();
    if (error) throw new StorageError(sessionId, "load", error.message, { cause: error });
    if (data === null) return null;
    const row = CheckpointRowSchema.safeParse(data);
    if (!row.success) throw new StorageError(sessionId, "decode", "row has no checkpoint column");
    return deserializeCheckpoint(row.data.checkpoint, sessionId);
  }

  async delete(sessionId: string): Promise<void> {
    const { error } = await this.client.from(this.table).delete().eq("session_id", sessionId);
    if (error) throw new StorageError(sessionId, "delete", error.message, { cause: error });
  }
}
