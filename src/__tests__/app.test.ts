import type { Server } from "node:http";
import { createApp, toHttpStatus } from "../app.js";
import {
  CapabilityUnavailableError,
  ConfigError,
  NavigationError,
  NotFoundError,
  OperationTimeoutError,
  SessionBusyError,
  SessionCompleteError,
  StorageError,
  ValidationExhaustedError,
} from "../workflow/errors.js";
import { createLogger } from "../workflow/logger.js";
import type { LogEntry } from "../workflow/logger.js";
import { WorkflowEngine } from "../workflow/core/engine/workflowEngine.js";
import { InMemorySessionStore } from "../workflow/core/store/sessionStore.js";
import { loadTestGraph, steppingClock } from "../workflow/__tests__/fixtures.js";

type FetchResponse = Awaited<ReturnType<typeof fetch>>;

async function readBody(res: FetchResponse): Promise<Record<string, unknown>> {
  const data: unknown = await res.json();
  if (typeof data !== "object" || data === null || Array.isArray(data)) throw new Error("Expected a JSON object body");
  return Object.fromEntries(Object.entries(data));
}

describe("toHttpStatus", () => {
  it.each([
    [new NotFoundError("session", "s1"), 404],
    [new ValidationExhaustedError("tech", 2, { passed: false, score: 0, feedback: "more", failedRule: null, degraded: false }), 422],
    [new SessionCompleteError("s1"), 409],
    [new SessionBusyError("s1", 16), 409],
    [new NavigationError("no"), 409],
    [new CapabilityUnavailableError("judge", "down"), 503],
    [new OperationTimeoutError("Store load", 10), 504],
    [new StorageError("s1", "save", "disk full"), 500],
    [new ConfigError("bad graph"), 500],
    [new Error("plain"), 500],
  ])("maps %p to %i", (error, status) => {
    expect(toHttpStatus(error)).toBe(status);
  });
});

describe("HTTP routes", () => {
  let server: Server;
  let baseUrl: string;
  let entries: LogEntry[];

  beforeEach(async () => {
    entries = [];
    const engine = new WorkflowEngine({ graph: loadTestGraph(), store: new InMemorySessionStore(), now: steppingClock() });
    const logger = createLogger("server", { level: "debug", sink: (entry) => entries.push(entry) });
    server = createApp(engine, logger).listen(0);
    await new Promise<void>((resolve) => server.once("listening", () => resolve()));
    const address = server.address();
    if (!address || typeof address === "string") throw new Error("Server has no TCP address");
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
  });

  function post(pathname: string, body: unknown) {
    return fetch(`${baseUrl}${pathname}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: typeof body === "string" ? body : JSON.stringify(body),
    });
  }

  it("starts a session at the start node", async () => {
    const res = await post("/sessions/s1/start", {});

    expect(res.status).toBe(200);
    expect(await readBody(res)).toMatchObject({ response: "What are we building?", node: "start", unpersisted: false });
  });

  it("advances a chat turn and fills the next prompt", async () => {
    const res = await post("/chat", { sessionId: "s1", message: "a task tracker for small teams" });

    expect(res.status).toBe(200);
    expect(await readBody(res)).toMatchObject({
      response: "Which platform is a task tracker for small teams for?",
      outcome: "advanced",
      nextNode: "clarify",
      parallelNodes: ["exclude"],
    });
  });

  it("answers 422 once a node has no retries left", async () => {
    for (let turn = 0; turn < 3; turn++) {
      const retry = await post("/chat", { sessionId: "s2", message: "app" });
      expect(retry.status).toBe(200);
      expect((await readBody(retry)).outcome).toBe("retry");
    }

    const res = await post("/chat", { sessionId: "s2", message: "app" });

    expect(res.status).toBe(422);
    expect(await readBody(res)).toMatchObject({
      code: "validation_exhausted",
      feedback: "Please add a bit more detail (at least 3 words).",
    });
  });

  it("answers 404 for an unknown session", async () => {
    const res = await fetch(`${baseUrl}/sessions/ghost/progress`);

    expect(res.status).toBe(404);
    expect((await readBody(res)).code).toBe("not_found");
  });

  it("answers 400 for a malformed JSON body without logging a failure", async () => {
    const res = await post("/chat", "{bad");

    expect(res.status).toBe(400);
    expect(typeof (await readBody(res)).error).toBe("string");
    expect(entries.filter((entry) => entry.event === "request_failed")).toEqual([]);
  });

  it("answers 400 when a required field is missing", async () => {
    const res = await post("/chat", { message: "hello" });

    expect(res.status).toBe(400);
    expect(await readBody(res)).toEqual({ error: "sessionId: Required" });
  });

  it("accepts context keys named after Object.prototype members", async () => {
    const res = await post("/chat", { sessionId: "s3", message: "a task tracker for small teams", context: { constructor: "acme" } });

    expect(res.status).toBe(200);
    expect((await readBody(res)).nextNode).toBe("clarify");
  });
});
