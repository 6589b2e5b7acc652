import { Annotation, END, START, StateGraph } from "@langchain/langgraph";
import { ValidationExhaustedError, describeError } from "../../errors.js";
import type { Logger } from "../../logger.js";
import { COMPLETE } from "../../schema/graphDefinition.js";
import type { GraphDefinition } from "../../schema/graphDefinition.js";
import type { NodeSpec } from "../../schema/graphDslTypes.js";
import type { SessionState, ValidationResult } from "../../state.js";
import { buildTemplateVars, interpolate } from "../helpers/template.js";
import type { Resolution, TransitionResolver } from "../routing/transitionResolver.js";
import { callCapability } from "../services/capabilities.js";
import type { SearchCapability, SearchResult } from "../services/capabilities.js";
import type { ClarityValidator } from "../validation/clarityValidator.js";
import { applyTurn } from "./applyTurn.js";
import { contextValues, mergeContext } from "./context.js";

const lastValue = <T>(initial: () => T) =>
  Annotation<T>({
    reducer: (_, right) => right,
    default: initial,
  });

export const TurnStateAnnotation = Annotation.Root({
  // ── Turn inputs ──
  graph: lastValue<GraphDefinition | null>(() => null),
  node: lastValue<NodeSpec | null>(() => null),
  session: lastValue<SessionState | null>(() => null),
  input: lastValue<string>(() => ""),
  contextDelta: lastValue<Record<string, unknown>>(() => ({})),
  restartFromHere: lastValue<boolean>(() => false),
  at: lastValue<number>(() => 0),

  // ── Stage outputs ──
  validation: lastValue<ValidationResult | null>(() => null),
  resolution: lastValue<Resolution | null>(() => null),
  exhausted: lastValue<ValidationExhaustedError | null>(() => null),
  searchResults: lastValue<SearchResult[]>(() => []),
  warnings: Annotation<string[]>({
    reducer: (left, right) => left.concat(right),
    default: () => [],
  }),
});

export type TurnState = typeof TurnStateAnnotation.State;
export type TurnUpdate = typeof TurnStateAnnotation.Update;

export type TurnGraphDeps = {
  validator: ClarityValidator;
  resolver: TransitionResolver;
  search?: SearchCapability;
  timeoutMs: number;
  logger: Logger;
};

function requireInputs(state: TurnState): { graph: GraphDefinition; node: NodeSpec; session: SessionState } {
  const { graph, node, session } = state;
  if (!graph || !node || !session) throw new Error("Turn graph invoked without graph, node or session.");
  return { graph, node, session };
}

function searchTarget(state: TurnState): NodeSpec | null {
  const { resolution, graph } = state;
  if (!graph || !resolution || resolution.outcome === "retry" || resolution.nextNode === COMPLETE) return null;
  const next = graph.lookup(resolution.nextNode);
  return next.searchHint ? next : null;
}

/**
 * One submitted answer, as a LangGraph pipeline:
 * validate -> resolve -> apply -> (search when the next node asks for it).
 * An exhausted node ends the run after resolve with the session untouched.
 */
export function buildTurnGraph(deps: TurnGraphDeps) {
  const { validator, resolver, search, timeoutMs, logger } = deps;

  const validate = async (state: TurnState): Promise<TurnUpdate> => {
    const { node, session } = requireInputs(state);
    const validation = await validator.validate(node, state.input, {
      ...contextValues(session.accumulatedContext),
      ...state.contextDelta,
    });
    const warnings = validation.degraded ? [`Clarity for "${node.id}" was scored locally; the judge was unavailable.`] : [];
    return { validation, warnings };
  };

  const resolve = async (state: TurnState): Promise<TurnUpdate> => {
    const { graph, node, session } = requireInputs(state);
    if (!state.validation) throw new Error("Resolve ran before validate.");
    try {
      const resolution = await resolver.resolve(node, session, state.validation, { graph, input: state.input });
      return { resolution };
    } catch (error) {
      if (error instanceof ValidationExhaustedError) return { exhausted: error };
      throw error;
    }
  };

  const apply = async (state: TurnState): Promise<TurnUpdate> => {
    const { node, session } = requireInputs(state);
    if (!state.resolution) throw new Error("Apply ran before resolve.");
    const next = applyTurn(session, {
      node,
      input: state.input,
      validation: state.validation,
      outcome: state.resolution.outcome,
      nextNode: state.resolution.nextNode,
      at: state.at,
      contextDelta: state.contextDelta,
      restartFromHere: state.restartFromHere,
    });
    return { session: next };
  };

  const runSearch = async (state: TurnState): Promise<TurnUpdate> => {
    const { session } = requireInputs(state);
    const target = searchTarget(state);
    if (!target?.searchHint || !search) return {};

    const query = interpolate(target.searchHint, buildTemplateVars(contextValues(session.accumulatedContext)));
    if (/\{\{\w+\}\}/.test(query)) {
      return { warnings: [`Search for "${target.id}" skipped: "${query}" still has unfilled placeholders.`] };
    }
    try {
      const results = await callCapability("search", () => search(query), timeoutMs);
      const accumulatedContext = mergeContext(
        session.accumulatedContext,
        { [`search.${target.id}`]: { query, results } },
        { source: "search", nodeId: target.id, turn: session.history.length - 1, at: state.at }
      );
      return { searchResults: results, session: { ...session, accumulatedContext } };
    } catch (error) {
      logger.warn("search_failed", { node: target.id, query, error: describeError(error) });
      return { warnings: [`Search for "${target.id}" unavailable.`] };
    }
  };

  return new StateGraph(TurnStateAnnotation)
    .addNode("validate", validate)
    .addNode("resolve", resolve)
    .addNode("apply", apply)
    .addNode("search", runSearch)
    .addEdge(START, "validate")
    .addEdge("validate", "resolve")
    .addConditionalEdges("resolve", (state: TurnState) => (state.exhausted ? END : "apply"), ["apply", END])
    .addConditionalEdges("apply", (state: TurnState) => (search && searchTarget(state) ? "search" : END), ["search", END])
    .addEdge("search", END)
    .compile();
}

export type TurnGraph = ReturnType<typeof buildTurnGraph>;
