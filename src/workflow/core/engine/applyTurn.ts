import { COMPLETE } from "../../schema/graphDefinition.js";
import type { NextNodeId } from "../../schema/graphDefinition.js";
import type { NodeSpec } from "../../schema/graphDslTypes.js";
import type { HistoryEntry, SessionState, TurnOutcome, ValidationResult } from "../../state.js";
import { mergeContext } from "./context.js";
import { ownValue } from "../helpers/records.js";

export type TurnRecord = {
  node: NodeSpec;
  input: string;
  validation: ValidationResult | null;
  outcome: TurnOutcome;
  nextNode: NextNodeId;
  at: number;
  contextDelta?: Record<string, unknown>;
  /** Drop history from the last earlier visit of `nextNode` before recording. */
  restartFromHere?: boolean;
};

/**
 * Pure state transition for one recorded turn. Appends exactly one entry to
 * both `history` and `completedNodes`, so the two stay the same length.
 */
export function applyTurn(session: SessionState, turn: TurnRecord): SessionState {
  const { node, nextNode, outcome } = turn;
  let history = [...session.history];
  let completedNodes = [...session.completedNodes];

  const leaving = outcome !== "retry";
  const revisit = leaving && nextNode !== COMPLETE && completedNodes.includes(nextNode);
  if (revisit && turn.restartFromHere) {
    const cut = completedNodes.lastIndexOf(nextNode);
    history = history.slice(0, cut);
    completedNodes = completedNodes.slice(0, cut);
  }

  const entry: HistoryEntry = {
    node: node.id,
    input: turn.input,
    validation: turn.validation,
    outcome,
    nextNode,
    revisit,
    timestamp: turn.at,
  };
  history.push(entry);
  completedNodes.push(node.id);
  const turnIndex = history.length - 1;

  const retryCounts = { ...session.retryCounts };
  if (outcome === "retry") {
    retryCounts[node.id] = (ownValue(retryCounts, node.id) ?? 0) + 1;
  } else {
    delete retryCounts[node.id];
  }

  let accumulatedContext = session.accumulatedContext;
  if (turn.contextDelta && Object.keys(turn.contextDelta).length > 0) {
    accumulatedContext = mergeContext(accumulatedContext, turn.contextDelta, {
      source: "caller",
      nodeId: node.id,
      turn: turnIndex,
      at: turn.at,
    });
  }
  if (node.contextKey && turn.validation?.passed) {
    accumulatedContext = mergeContext(accumulatedContext, { [node.contextKey]: turn.input.trim() }, {
      source: "answer",
      nodeId: node.id,
      turn: turnIndex,
      at: turn.at,
    });
  }

  const complete = nextNode === COMPLETE;
  return {
    ...session,
    status: complete ? "complete" : "active",
    currentNode: complete ? node.id : nextNode,
    history,
    completedNodes,
    retryCounts,
    accumulatedContext,
    updatedAt: turn.at,
  };
}
