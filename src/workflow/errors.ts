import type { ValidationResult } from "./state.js";

export type WorkflowErrorCode =
  | "config_error"
  | "not_found"
  | "validation_exhausted"
  | "capability_unavailable"
  | "storage_error"
  | "session_complete"
  | "session_busy"
  | "navigation_rejected"
  | "timeout";

/**
 * Base class for every error the workflow engine raises on purpose.
 * `code` is stable and safe to branch on; `message` is for humans.
 */
export class WorkflowError extends Error {
  public readonly code: WorkflowErrorCode;
  public readonly details: string | undefined;

  constructor(message: string, code: WorkflowErrorCode, options?: { details?: string; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "WorkflowError";
    this.code = code;
    this.details = options?.details;
  }
}

/** Graph source violates a structural invariant. Fatal at load time. */
export class ConfigError extends WorkflowError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], options?: { cause?: unknown }) {
    super(message, "config_error", { details: issues.join("; ") || undefined, cause: options?.cause });
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export type NotFoundKind = "node" | "session";

export class NotFoundError extends WorkflowError {
  public readonly kind: NotFoundKind;
  public readonly id: string;

  constructor(kind: NotFoundKind, id: string) {
    super(`Unknown ${kind} "${id}".`, "not_found");
    this.name = "NotFoundError";
    this.kind = kind;
    this.id = id;
  }
}

/**
 * Raised when a node refuses another retry and cannot be skipped.
 * The session keeps its pre-turn position; the caller should re-prompt.
 */
export class ValidationExhaustedError extends WorkflowError {
  public readonly nodeId: string;
  public readonly attempts: number;
  public readonly validation: ValidationResult;

  constructor(nodeId: string, attempts: number, validation: ValidationResult) {
    super(
      `Node "${nodeId}" did not pass validation after ${attempts} attempt(s) and cannot be skipped.`,
      "validation_exhausted",
      { details: validation.feedback }
    );
    this.name = "ValidationExhaustedError";
    this.nodeId = nodeId;
    this.attempts = attempts;
    this.validation = validation;
  }
}

export type CapabilityName = "judge" | "generate" | "dynamicResolve" | "search" | "resolver";

/** Never reaches the caller: every call site converts it into a fallback. */
export class CapabilityUnavailableError extends WorkflowError {
  public readonly capability: CapabilityName;

  constructor(capability: CapabilityName, reason: string, options?: { cause?: unknown }) {
    super(`Capability "${capability}" unavailable: ${reason}`, "capability_unavailable", { cause: options?.cause });
    this.name = "CapabilityUnavailableError";
    this.capability = capability;
  }
}

export type StorageOperation = "save" | "load" | "delete" | "decode";

export class StorageError extends WorkflowError {
  public readonly sessionId: string;
  public readonly operation: StorageOperation;

  constructor(sessionId: string, operation: StorageOperation, reason: string, options?: { cause?: unknown }) {
    super(`Failed to ${operation} session "${sessionId}": ${reason}`, "storage_error", { cause: options?.cause });
    this.name = "StorageError";
    this.sessionId = sessionId;
    this.operation = operation;
  }
}

export class SessionCompleteError extends WorkflowError {
  public readonly sessionId: string;

  constructor(sessionId: string) {
    super(`Session "${sessionId}" is already complete. Reset it to start over.`, "session_complete");
    this.name = "SessionCompleteError";
    this.sessionId = sessionId;
  }
}

export class SessionBusyError extends WorkflowError {
  public readonly sessionId: string;

  constructor(sessionId: string, queued: number) {
    super(`Session "${sessionId}" already has ${queued} turn(s) queued.`, "session_busy");
    this.name = "SessionBusyError";
    this.sessionId = sessionId;
  }
}

/** Explicit skip or backtrack request that the graph or session does not allow. */
export class NavigationError extends WorkflowError {
  constructor(message: string) {
    super(message, "navigation_rejected");
    this.name = "NavigationError";
  }
}

export class OperationTimeoutError extends WorkflowError {
  public readonly label: string;
  public readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms.`, "timeout");
    this.name = "OperationTimeoutError";
    this.label = label;
    this.timeoutMs = timeoutMs;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "object" && error !== null && "message" in error && typeof error.message === "string") {
    return error.message;
  }
  return String(error);
}
