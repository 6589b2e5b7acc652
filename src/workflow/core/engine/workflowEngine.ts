import {
  NavigationError,
  NotFoundError,
  SessionCompleteError,
  StorageError,
  describeError,
} from "../../errors.js";
import type { StorageOperation } from "../../errors.js";
import { noopLogger } from "../../logger.js";
import type { Logger } from "../../logger.js";
import { COMPLETE, GraphHolder } from "../../schema/graphDefinition.js";
import type { GraphDefinition, NextNodeId } from "../../schema/graphDefinition.js";
import type { NodeSpec } from "../../schema/graphDslTypes.js";
import { createDefaultResolverRegistry } from "../../schema/resolverRegistry.js";
import type { ResolverRegistry } from "../../schema/resolverRegistry.js";
import { createSessionState } from "../../state.js";
import type { HistoryEntry, SessionState, TurnOutcome, ValidationResult } from "../../state.js";
import { withRetry, withTimeout } from "../helpers/async.js";
import { buildTemplateVars, interpolate } from "../helpers/template.js";
import { TransitionResolver } from "../routing/transitionResolver.js";
import { callCapability } from "../services/capabilities.js";
import type { Capabilities, SearchResult } from "../services/capabilities.js";
import type { SessionStore } from "../store/sessionStore.js";
import { ClarityValidator } from "../validation/clarityValidator.js";
import { applyTurn } from "./applyTurn.js";
import { contextValues } from "./context.js";
import { computeProgress } from "./progress.js";
import type { ProgressState } from "./progress.js";
import { SessionLock } from "./sessionLock.js";
import { buildTurnGraph } from "./turnGraph.js";
import type { TurnGraph } from "./turnGraph.js";

export type WorkflowEngineOptions = {
  graph: GraphDefinition | GraphHolder;
  store: SessionStore;
  capabilities?: Capabilities;
  resolvers?: ResolverRegistry;
  logger?: Logger;
  capabilityTimeoutMs?: number;
  storeTimeoutMs?: number;
  /** Total save attempts before a turn is returned as unpersisted. */
  storeRetries?: number;
  storeRetryDelayMs?: number;
  maxQueuedTurns?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
};

export type SubmitOptions = {
  contextDelta?: Record<string, unknown>;
  restartFromHere?: boolean;
};

export type PersistOutcome = {
  state: SessionState;
  unpersisted: boolean;
  warnings: string[];
};

export type SessionView = PersistOutcome & {
  node: NodeSpec | null;
  prompt: string | null;
  progress: ProgressState;
};

export type TurnResult = {
  validation: ValidationResult | null;
  outcome: TurnOutcome;
  nextNode: NodeSpec | typeof COMPLETE;
  prompt: string | null;
  parallelNodes: NodeSpec[];
  searchResults: SearchResult[];
  progress: ProgressState;
  unpersisted: boolean;
  warnings: string[];
  state: SessionState;
};

/**
 * Drives sessions through a workflow graph. All mutable state lives in the
 * SessionStore; the engine itself holds only the graph reference, the
 * per-session lock and its collaborators.
 */
export class WorkflowEngine {
  readonly graphs: GraphHolder;
  readonly resolvers: ResolverRegistry;
  private readonly store: SessionStore;
  private readonly capabilities: Capabilities;
  private readonly logger: Logger;
  private readonly lock: SessionLock;
  private readonly turnGraph: TurnGraph;
  private readonly capabilityTimeoutMs: number;
  private readonly storeTimeoutMs: number;
  private readonly storeRetries: number;
  private readonly storeRetryDelayMs: number;
  private readonly now: () => number;
  private readonly sleep: ((ms: number) => Promise<void>) | undefined;
  private readonly pendingWrites = new Map<string, Promise<void>>();

  constructor(options: WorkflowEngineOptions) {
    this.graphs = options.graph instanceof GraphHolder ? options.graph : new GraphHolder(options.graph);
    this.store = options.store;
    this.capabilities = options.capabilities ?? {};
    this.logger = options.logger ?? noopLogger;
    this.capabilityTimeoutMs = options.capabilityTimeoutMs ?? 10_000;
    this.storeTimeoutMs = options.storeTimeoutMs ?? 5_000;
    this.storeRetries = options.storeRetries ?? 3;
    this.storeRetryDelayMs = options.storeRetryDelayMs ?? 100;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep;
    this.lock = new SessionLock(options.maxQueuedTurns);
    this.resolvers = options.resolvers ?? createDefaultResolverRegistry();

    const validator = new ClarityValidator({
      judge: this.capabilities.judge,
      timeoutMs: this.capabilityTimeoutMs,
      logger: this.logger.child("validator"),
    });
    const resolver = new TransitionResolver({
      resolvers: this.resolvers,
      dynamicResolve: this.capabilities.dynamicResolve,
      timeoutMs: this.capabilityTimeoutMs,
      logger: this.logger.child("resolver"),
    });
    this.turnGraph = buildTurnGraph({
      validator,
      resolver,
      search: this.capabilities.search,
      timeoutMs: this.capabilityTimeoutMs,
      logger: this.logger.child("turn"),
    });
  }

  get graph(): GraphDefinition {
    return this.graphs.get();
  }

  /** Creates the session at the start node, or returns where an existing one stands. */
  async startSession(sessionId: string): Promise<SessionView> {
    return this.withSession(sessionId, async (graph) => {
      const existing = await this.load(sessionId);
      if (existing && existing.status !== "not_started") {
        return this.view(graph, { state: existing, unpersisted: false, warnings: [] });
      }
      const at = this.clock(existing);
      const state = this.activate(existing ?? createSessionState(sessionId, graph.graphId, at), graph, at);
      this.logger.info("session_started", { sessionId, graphId: graph.graphId, node: graph.startNode.id });
      return this.view(graph, await this.persist(state));
    });
  }

  /**
   * Runs one answer through validate, resolve and apply. Throws
   * ValidationExhaustedError (state untouched) when the node refuses another
   * retry and cannot be skipped, and SessionCompleteError once the session is done.
   */
  async submit(sessionId: string, input: string, options: SubmitOptions = {}): Promise<TurnResult> {
    return this.withSession(sessionId, async (graph) => {
      const loaded = await this.load(sessionId);
      if (loaded?.status === "complete") throw new SessionCompleteError(sessionId);
      const at = this.clock(loaded);
      const session =
        !loaded || loaded.status === "not_started"
          ? this.activate(loaded ?? createSessionState(sessionId, graph.graphId, at), graph, at)
          : loaded;
      const node = graph.lookup(this.requireCurrent(session));

      const out = await this.turnGraph.invoke({
        graph,
        node,
        session,
        input,
        contextDelta: options.contextDelta ?? {},
        restartFromHere: options.restartFromHere ?? false,
        at,
      });
      if (out.exhausted) throw out.exhausted;
      if (!out.session || !out.resolution) throw new Error(`Turn for session "${sessionId}" produced no state.`);

      this.logger.info("turn_recorded", {
        sessionId,
        node: node.id,
        outcome: out.resolution.outcome,
        nextNode: out.resolution.nextNode,
        via: out.resolution.via,
        score: out.validation?.score,
      });

      const persisted = await this.persist(out.session);
      return this.turnResult(graph, persisted, out.resolution.outcome, out.resolution.nextNode, {
        validation: out.validation,
        searchResults: out.searchResults,
        warnings: out.warnings,
      });
    });
  }

  /** Explicit skip of the current node; only nodes flagged optional allow it. */
  async skip(sessionId: string): Promise<TurnResult> {
    return this.withSession(sessionId, async (graph) => {
      const session = await this.requireActive(sessionId);
      const node = graph.lookup(this.requireCurrent(session));
      if (!node.optional) throw new NavigationError(`Node "${node.id}" is not optional and cannot be skipped.`);

      const nextNode = node.terminal ? COMPLETE : node.transitions.default ?? COMPLETE;
      const at = this.clock(session);
      const next = applyTurn(session, { node, input: "", validation: null, outcome: "skipped", nextNode, at });
      this.logger.info("node_skipped", { sessionId, node: node.id, nextNode });
      return this.turnResult(graph, await this.persist(next), "skipped", nextNode, {
        validation: null,
        searchResults: [],
        warnings: [],
      });
    });
  }

  /**
   * Moves the session back to a node it already visited. With `restart` the
   * history from the last visit of that node onward is dropped.
   */
  async backtrack(sessionId: string, nodeId: string, options: { restart?: boolean } = {}): Promise<SessionView> {
    return this.withSession(sessionId, async (graph) => {
      if (!graph.allowBacktrack) throw new NavigationError(`Graph "${graph.graphId}" does not allow backtracking.`);
      const session = await this.requireSession(sessionId);
      const target = graph.lookup(nodeId).id;
      const cut = session.completedNodes.lastIndexOf(target);
      if (cut < 0) throw new NavigationError(`Session "${sessionId}" has not visited node "${target}".`);

      const retryCounts = { ...session.retryCounts };
      delete retryCounts[target];
      const next: SessionState = {
        ...session,
        status: "active",
        currentNode: target,
        retryCounts,
        history: options.restart ? session.history.slice(0, cut) : session.history,
        completedNodes: options.restart ? session.completedNodes.slice(0, cut) : session.completedNodes,
        updatedAt: this.clock(session),
      };
      this.logger.info("session_backtracked", { sessionId, node: target, restart: Boolean(options.restart) });
      return this.view(graph, await this.persist(next));
    });
  }

  async getSession(sessionId: string): Promise<SessionState> {
    return this.requireSession(sessionId);
  }

  async getHistory(sessionId: string): Promise<HistoryEntry[]> {
    return (await this.requireSession(sessionId)).history;
  }

  async getProgress(sessionId: string): Promise<ProgressState> {
    return computeProgress(this.graph, await this.requireSession(sessionId));
  }

  /** Soft reset keeps accumulated context; hard reset clears it too. */
  async reset(sessionId: string, hard = false): Promise<PersistOutcome> {
    return this.withSession(sessionId, async (graph) => {
      const session = await this.requireSession(sessionId);
      const next: SessionState = {
        ...session,
        graphId: graph.graphId,
        status: "not_started",
        currentNode: null,
        completedNodes: [],
        history: [],
        retryCounts: {},
        accumulatedContext: hard ? {} : session.accumulatedContext,
        updatedAt: this.clock(session),
      };
      this.logger.info("session_reset", { sessionId, hard });
      return this.persist(next);
    });
  }

  async deleteSession(sessionId: string): Promise<void> {
    await this.withSession(sessionId, async () => {
      await this.storeCall(sessionId, "delete", () => this.store.delete(sessionId));
      this.logger.info("session_deleted", { sessionId });
    });
  }

  /** Caller-driven re-save after a turn came back unpersisted. */
  async saveCheckpoint(state: SessionState): Promise<PersistOutcome> {
    return this.withSession(state.sessionId, async () => this.persist(state));
  }

  // ── internals ──

  private async withSession<T>(sessionId: string, task: (graph: GraphDefinition) => Promise<T>): Promise<T> {
    const queued = this.lock.queued(sessionId);
    if (queued > 0) this.logger.debug("session_lock_wait", { sessionId, queued });
    return this.lock.run(sessionId, () => task(this.graphs.get()));
  }

  private clock(session: SessionState | null): number {
    const now = this.now();
    if (!session) return now;
    const last = session.history.at(-1)?.timestamp ?? 0;
    return Math.max(now, session.updatedAt, last);
  }

  private activate(session: SessionState, graph: GraphDefinition, at: number): SessionState {
    return { ...session, graphId: graph.graphId, status: "active", currentNode: graph.startNode.id, updatedAt: at };
  }

  private requireCurrent(session: SessionState): string {
    if (!session.currentNode) throw new NavigationError(`Session "${session.sessionId}" has no current node.`);
    return session.currentNode;
  }

  private async requireSession(sessionId: string): Promise<SessionState> {
    const session = await this.load(sessionId);
    if (!session) throw new NotFoundError("session", sessionId);
    return session;
  }

  private async requireActive(sessionId: string): Promise<SessionState> {
    const session = await this.requireSession(sessionId);
    if (session.status === "complete") throw new SessionCompleteError(sessionId);
    if (session.status === "not_started") throw new NavigationError(`Session "${sessionId}" has not started.`);
    return session;
  }

  private async load(sessionId: string): Promise<SessionState | null> {
    return this.storeCall(sessionId, "load", () => this.store.load(sessionId));
  }

  private async storeCall<T>(sessionId: string, operation: StorageOperation, call: () => Promise<T>): Promise<T> {
    const once = async (): Promise<T> => {
      await this.awaitPendingWrite(sessionId, operation);
      const result = call();
      if (operation !== "load") this.trackWrite(sessionId, result);
      return withTimeout(() => result, this.storeTimeoutMs, `Store ${operation}`);
    };
    try {
      return await withRetry(once, {
        attempts: this.storeRetries,
        baseDelayMs: this.storeRetryDelayMs,
        sleep: this.sleep,
        onRetry: ({ attempt, totalAttempts, delayMs, error }) =>
          this.logger.warn("store_retry", { sessionId, operation, attempt, totalAttempts, delayMs, error: describeError(error) }),
      });
    } catch (error) {
      if (error instanceof StorageError) throw error;
      throw new StorageError(sessionId, operation, describeError(error), { cause: error });
    }
  }

  /**
   * A write that timed out keeps running in the store. Until it settles, no
   * other call for that session reaches the store, so it can neither land on
   * top of a newer checkpoint nor be missed by a load.
   */
  private async awaitPendingWrite(sessionId: string, operation: StorageOperation): Promise<void> {
    const pending = this.pendingWrites.get(sessionId);
    if (!pending) return;
    this.logger.debug("store_write_pending", { sessionId, operation });
    await withTimeout(() => pending, this.storeTimeoutMs, `Store ${operation} behind an earlier write`);
  }

  private trackWrite(sessionId: string, write: Promise<unknown>): void {
    const release = (): void => {
      if (this.pendingWrites.get(sessionId) === settled) this.pendingWrites.delete(sessionId);
    };
    // Failures reach the caller through `write`; this copy only marks completion.
    const settled: Promise<void> = write.then(release, release);
    this.pendingWrites.set(sessionId, settled);
  }

  private async persist(state: SessionState): Promise<PersistOutcome> {
    try {
      await this.storeCall(state.sessionId, "save", () => this.store.save(state.sessionId, state));
      return { state, unpersisted: false, warnings: [] };
    } catch (error) {
      this.logger.error("store_save_failed", { sessionId: state.sessionId, error: describeError(error) });
      return { state, unpersisted: true, warnings: [`Session could not be saved: ${describeError(error)}`] };
    }
  }

  private async renderPrompt(graph: GraphDefinition, node: NodeSpec, session: SessionState): Promise<string> {
    const vars = buildTemplateVars(contextValues(session.accumulatedContext), { node: node.label });
    const base = interpolate(node.prompt ?? (node.purpose || node.label), vars);
    const generate = this.capabilities.generate;
    if (!node.rephrase || !generate) return base;

    const known = Object.entries(vars)
      .filter(([key]) => key !== "node" && !key.startsWith("search."))
      .map(([key, value]) => `${key}: ${value}`)
      .join("\n");
    const request = [`Question: ${base}`, `Step: ${node.label} (${graph.graphId})`, known ? `Known so far:\n${known}` : ""]
      .filter(Boolean)
      .join("\n\n");
    try {
      const text = (await callCapability("generate", () => generate(request), this.capabilityTimeoutMs)).trim();
      return text || base;
    } catch (error) {
      this.logger.warn("rephrase_fallback", { node: node.id, error: describeError(error) });
      return base;
    }
  }

  private async view(graph: GraphDefinition, outcome: PersistOutcome): Promise<SessionView> {
    const { state } = outcome;
    const node = state.status === "active" && state.currentNode ? graph.lookup(state.currentNode) : null;
    return {
      ...outcome,
      node,
      prompt: node ? await this.renderPrompt(graph, node, state) : null,
      progress: computeProgress(graph, state),
    };
  }

  private async turnResult(
    graph: GraphDefinition,
    persisted: PersistOutcome,
    outcome: TurnOutcome,
    nextNodeId: NextNodeId,
    extra: { validation: ValidationResult | null; searchResults: SearchResult[]; warnings: string[] }
  ): Promise<TurnResult> {
    const { state } = persisted;
    const nextNode = nextNodeId === COMPLETE ? COMPLETE : graph.lookup(nextNodeId);
    return {
      validation: extra.validation,
      outcome,
      nextNode,
      prompt: nextNode === COMPLETE ? null : await this.renderPrompt(graph, nextNode, state),
      parallelNodes: nextNode === COMPLETE ? [] : graph.parallelNodesOf(nextNode.id),
      searchResults: extra.searchResults,
      progress: computeProgress(graph, state),
      unpersisted: persisted.unpersisted,
      warnings: [...extra.warnings, ...persisted.warnings],
      state,
    };
  }
}
