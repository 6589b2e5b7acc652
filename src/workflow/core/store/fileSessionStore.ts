import { mkdir, readFile, rename, unlink, writeFile } from "node:fs/promises";
import path from "node:path";
import { StorageError, describeError } from "../../errors.js";
import type { SessionState } from "../../state.js";
import { deserializeCheckpoint, serializeCheckpoint } from "./checkpoint.js";
import type { SessionStore } from "./sessionStore.js";

// fs errors come from another realm under Jest, so no instanceof check.
function isMissing(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}

/**
 * One JSON checkpoint per session under `directory`. Writes go to a temp
 * file that is renamed into place, so a reader never sees a partial file.
 */
export class FileSessionStore implements SessionStore {
  constructor(private readonly directory: string) {}

  pathFor(sessionId: string): string {
    return path.join(this.directory, `${encodeURIComponent(sessionId)}.json`);
  }

  async save(sessionId: string, state: SessionState): Promise<void> {
    const target = this.pathFor(sessionId);
    const temp = `${target}.${process.pid}.${Date.now()}.tmp`;
    try {
      await mkdir(this.directory, { recursive: true });
      await writeFile(temp, serializeCheckpoint(state), "utf-8");
      await rename(temp, target);
    } catch (error) {
      await unlink(temp).catch(() => undefined);
      throw new StorageError(sessionId, "save", describeError(error), { cause: error });
    }
  }

  async load(sessionId: string): Promise<SessionState | null> {
    let text: string;
    try {
      text = await readFile(this.pathFor(sessionId), "utf-8");
    } catch (error) {
      if (isMissing(error)) return null;
      throw new StorageError(sessionId, "load", describeError(error), { cause: error });
    }
    return deserializeCheckpoint(text, sessionId);
  }

  async delete(sessionId: string): Promise<void> {
    try {
      await unlink(this.pathFor(sessionId));
    } catch (error) {
      if (isMissing(error)) return;
      throw new StorageError(sessionId, "delete", describeError(error), { cause: error });
    }
  }
}
