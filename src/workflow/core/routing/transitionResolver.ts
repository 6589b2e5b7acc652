import { ValidationExhaustedError, describeError } from "../../errors.js";
import { noopLogger } from "../../logger.js";
import type { Logger } from "../../logger.js";
import { COMPLETE } from "../../schema/graphDefinition.js";
import type { GraphDefinition, NextNodeId } from "../../schema/graphDefinition.js";
import type { NodeSpec } from "../../schema/graphDslTypes.js";
import { DYNAMIC_RESOLVER_REF } from "../../schema/resolverRegistry.js";
import type { ResolverRegistry } from "../../schema/resolverRegistry.js";
import type { SessionState, TurnOutcome, ValidationResult } from "../../state.js";
import { contextValues } from "../engine/context.js";
import { normalizeNodeAnswer } from "../helpers/text.js";
import { callCapability } from "../services/capabilities.js";
import type { DynamicResolveCapability } from "../services/capabilities.js";
import { ownValue } from "../helpers/records.js";

export type ResolutionVia = "retry" | "default" | "conditional" | "skip" | "terminal";

export type Resolution = {
  outcome: Exclude<TurnOutcome, "skipped">;
  nextNode: NextNodeId;
  via: ResolutionVia;
  /** Why a conditional answer was discarded, when it was. */
  fallbackReason?: string;
};

export type TransitionResolverOptions = {
  resolvers: ResolverRegistry;
  dynamicResolve?: DynamicResolveCapability;
  timeoutMs?: number;
  logger?: Logger;
};

export type ResolveRequest = {
  graph: GraphDefinition;
  input: string;
};

/**
 * Decides where a validated turn goes next.
 *
 * - failed, retries left: stay on the node
 * - failed, no retries, skippable: move on, marked incomplete
 * - failed otherwise: ValidationExhaustedError
 * - passed terminal: COMPLETE
 * - passed: conditional answer if it names a usable node, else default
 */
export class TransitionResolver {
  private readonly resolvers: ResolverRegistry;
  private readonly dynamicResolve: DynamicResolveCapability | undefined;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: TransitionResolverOptions) {
    this.resolvers = options.resolvers;
    this.dynamicResolve = options.dynamicResolve;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.logger = options.logger ?? noopLogger;
  }

  async resolve(
    node: NodeSpec,
    session: SessionState,
    validation: ValidationResult,
    request: ResolveRequest
  ): Promise<Resolution> {
    const { graph } = request;

    if (!validation.passed) {
      const attempts = ownValue(session.retryCounts, node.id) ?? 0;
      if (node.retryAllowed && attempts < graph.maxRetriesFor(node)) {
        return { outcome: "retry", nextNode: node.id, via: "retry" };
      }
      if (node.skippable) {
        return { outcome: "skipped-incomplete", nextNode: this.defaultTarget(node), via: "skip" };
      }
      throw new ValidationExhaustedError(node.id, attempts + 1, validation);
    }

    if (node.terminal) {
      return { outcome: "completed", nextNode: COMPLETE, via: "terminal" };
    }

    const fallbackTarget = this.defaultTarget(node);
    const ref = node.transitions.conditional;
    if (!ref) return { outcome: "advanced", nextNode: fallbackTarget, via: "default" };

    const answer = await this.askConditional(ref, node, session, validation, request);
    const candidate = answer ? graph.matchId(answer) : null;
    const rejection = this.rejectCandidate(answer, candidate, node, session, graph);
    if (rejection || !candidate) {
      const reason = rejection ?? "no answer";
      this.logger.info("conditional_fallback", { node: node.id, ref, reason, target: fallbackTarget });
      return { outcome: "advanced", nextNode: fallbackTarget, via: "default", fallbackReason: reason };
    }
    return { outcome: "advanced", nextNode: candidate, via: "conditional" };
  }

  /** Target for any move off `node` that is not a conditional pick. */
  defaultTarget(node: NodeSpec): NextNodeId {
    if (node.terminal) return COMPLETE;
    return node.transitions.default ?? COMPLETE;
  }

  private async askConditional(
    ref: string,
    node: NodeSpec,
    session: SessionState,
    validation: ValidationResult,
    request: ResolveRequest
  ): Promise<string | null> {
    const { graph, input } = request;
    try {
      if (ref === DYNAMIC_RESOLVER_REF) {
        const dynamicResolve = this.dynamicResolve;
        if (!dynamicResolve) return null;
        const candidates = graph.nodeIds
          .filter((id) => id !== node.id)
          .map((id) => {
            const candidate = graph.lookup(id);
            return { id, label: candidate.label, purpose: candidate.purpose };
          });
        const raw = await callCapability(
          "dynamicResolve",
          () => dynamicResolve({ nodeId: node.id, input, context: contextValues(session.accumulatedContext), candidates }),
          this.timeoutMs
        );
        return normalizeNodeAnswer(raw);
      }
      const local = this.resolvers.resolve(ref);
      const raw = await callCapability(
        "resolver",
        async () => local({ graph, node, session, validation, input }),
        this.timeoutMs
      );
      return raw === null ? null : normalizeNodeAnswer(raw);
    } catch (error) {
      this.logger.warn("conditional_error", { node: node.id, ref, error: describeError(error) });
      return null;
    }
  }

  private rejectCandidate(
    answer: string | null,
    candidate: string | null,
    node: NodeSpec,
    session: SessionState,
    graph: GraphDefinition
  ): string | null {
    if (!answer) return "no answer";
    if (!candidate) return `unknown node "${answer}"`;
    if (candidate === node.id) return "self transition";
    if (!graph.allowBacktrack && session.completedNodes.includes(candidate)) {
      return `backtrack to "${candidate}" not allowed`;
    }
    return null;
  }
}
