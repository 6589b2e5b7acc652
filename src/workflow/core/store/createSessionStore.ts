import { FileSessionStore } from "./fileSessionStore.js";
import { InMemorySessionStore } from "./sessionStore.js";
import type { SessionStore } from "./sessionStore.js";
import { DEFAULT_SESSION_TABLE, SupabaseSessionStore } from "./supabaseSessionStore.js";

export type SessionStoreKind = "memory" | "file" | "supabase";

export type SessionStoreOptions = {
  kind: SessionStoreKind;
  directory?: string;
  table?: string;
};

export function createSessionStore(options: SessionStoreOptions): SessionStore {
  switch (options.kind) {
    case "memory":
      return new InMemorySessionStore();
    case "file":
      return new FileSessionStore(options.directory ?? ".sessions");
    case "supabase":
      return new SupabaseSessionStore(undefined, options.table ?? DEFAULT_SESSION_TABLE);
  }
}
