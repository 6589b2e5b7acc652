import { SessionBusyError } from "../../errors.js";

/**
 * Per-session FIFO. Turns for one session run one at a time in arrival
 * order; different sessions never wait on each other. A session whose queue
 * is full rejects new work with SessionBusyError.
 */
export class SessionLock {
  private readonly tails = new Map<string, Promise<void>>();
  private readonly pending = new Map<string, number>();

  constructor(private readonly maxQueued = 16) {}

  async run<T>(sessionId: string, task: () => Promise<T>): Promise<T> {
    const queued = this.pending.get(sessionId) ?? 0;
    if (queued >= this.maxQueued) throw new SessionBusyError(sessionId, queued);
    this.pending.set(sessionId, queued + 1);

    const previous = this.tails.get(sessionId) ?? Promise.resolve();
    const result = previous.then(task);
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(sessionId, tail);

    try {
      return await result;
    } finally {
      const left = (this.pending.get(sessionId) ?? 1) - 1;
      if (left > 0) {
        this.pending.set(sessionId, left);
      } else {
        this.pending.delete(sessionId);
        this.tails.delete(sessionId);
      }
    }
  }

  queued(sessionId: string): number {
    return this.pending.get(sessionId) ?? 0;
  }
}
