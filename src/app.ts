import express, { type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import * as z from "zod";
import { COMPLETE } from "./workflow/schema/graphDefinition.js";
import type { WorkflowEngine, TurnResult } from "./workflow/core/engine/workflowEngine.js";
import { ValidationExhaustedError, WorkflowError, describeError } from "./workflow/errors.js";
import type { WorkflowErrorCode } from "./workflow/errors.js";
import type { Logger } from "./workflow/logger.js";

const ChatRequestSchema = z.object({
  sessionId: z.string().min(1),
  message: z.string(),
  context: z.record(z.string(), z.unknown()).optional(),
  restartFromHere: z.boolean().optional(),
});

const BacktrackRequestSchema = z.object({
  nodeId: z.string().min(1),
  restart: z.boolean().optional(),
});

const ResetRequestSchema = z.object({
  hard: z.boolean().optional(),
});

const STATUS_BY_CODE: Record<WorkflowErrorCode, number> = {
  config_error: 500,
  not_found: 404,
  validation_exhausted: 422,
  capability_unavailable: 503,
  storage_error: 500,
  session_complete: 409,
  session_busy: 409,
  navigation_rejected: 409,
  timeout: 504,
};

export function toHttpStatus(error: unknown): number {
  return error instanceof WorkflowError ? STATUS_BY_CODE[error.code] : 500;
}

class BadRequestError extends Error {}

/** Client errors raised by middleware, such as express.json() on a malformed body. */
function clientErrorStatus(error: unknown): number | null {
  if (typeof error !== "object" || error === null || !("status" in error)) return null;
  const { status } = error;
  return typeof status === "number" && status >= 400 && status < 500 ? status : null;
}

function parseBody<T>(schema: z.ZodType<T>, body: unknown): T {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new BadRequestError(`${issue?.path.join(".") || "body"}: ${issue?.message ?? "invalid"}`);
  }
  return parsed.data;
}

function toTurnResponse(result: TurnResult) {
  return {
    response: result.nextNode === COMPLETE ? "All done. Thanks!" : result.prompt,
    outcome: result.outcome,
    validation: result.validation,
    nextNode: result.nextNode === COMPLETE ? COMPLETE : result.nextNode.id,
    parallelNodes: result.parallelNodes.map((node) => node.id),
    searchResults: result.searchResults,
    flowProgress: result.progress,
    unpersisted: result.unpersisted,
    warnings: result.warnings,
  };
}

type Handler = (req: Request, res: Response) => Promise<unknown>;

/** Express 4 does not await handlers; route rejections into the error middleware. */
const route =
  (handler: Handler) =>
  (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };

export function createApp(engine: WorkflowEngine, logger: Logger) {
  const app = express();

  app.use(cors());
  app.use(express.json());

  app.post(
    "/sessions/:id/start",
    route(async (req, res) => {
      const view = await engine.startSession(req.params.id);
      res.json({
        response: view.prompt,
        node: view.node?.id ?? null,
        flowProgress: view.progress,
        unpersisted: view.unpersisted,
        warnings: view.warnings,
      });
    })
  );

  app.post(
    "/chat",
    route(async (req, res) => {
      const body = parseBody(ChatRequestSchema, req.body);
      const result = await engine.submit(body.sessionId, body.message, {
        contextDelta: body.context,
        restartFromHere: body.restartFromHere,
      });
      res.json(toTurnResponse(result));
    })
  );

  app.post(
    "/sessions/:id/skip",
    route(async (req, res) => {
      res.json(toTurnResponse(await engine.skip(req.params.id)));
    })
  );

  app.post(
    "/sessions/:id/backtrack",
    route(async (req, res) => {
      const body = parseBody(BacktrackRequestSchema, req.body);
      const view = await engine.backtrack(req.params.id, body.nodeId, { restart: body.restart });
      res.json({ response: view.prompt, node: view.node?.id ?? null, flowProgress: view.progress, unpersisted: view.unpersisted });
    })
  );

  app.get(
    "/sessions/:id/history",
    route(async (req, res) => {
      res.json({ history: await engine.getHistory(req.params.id) });
    })
  );

  app.get(
    "/sessions/:id/progress",
    route(async (req, res) => {
      res.json(await engine.getProgress(req.params.id));
    })
  );

  app.post(
    "/sessions/:id/reset",
    route(async (req, res) => {
      const body = parseBody(ResetRequestSchema, req.body);
      const outcome = await engine.reset(req.params.id, body.hard ?? false);
      res.json({ status: outcome.state.status, unpersisted: outcome.unpersisted });
    })
  );

  app.delete(
    "/sessions/:id",
    route(async (req, res) => {
      await engine.deleteSession(req.params.id);
      res.status(204).end();
    })
  );

  app.get("/test", (_req: Request, res: Response) => {
    res.json({ status: "Server is running", graphId: engine.graph.graphId, version: engine.graph.version });
  });

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof BadRequestError) {
      res.status(400).json({ error: error.message });
      return;
    }
    const clientStatus = clientErrorStatus(error);
    if (clientStatus !== null) {
      res.status(clientStatus).json({ error: describeError(error) });
      return;
    }
    const status = toHttpStatus(error);
    if (status >= 500) {
      logger.error("request_failed", { method: req.method, path: req.path, error: describeError(error) });
    }
    res.status(status).json({
      error: describeError(error),
      code: error instanceof WorkflowError ? error.code : "internal_error",
      feedback: error instanceof ValidationExhaustedError ? error.validation.feedback : undefined,
    });
  });

  return app;
}
