import type { GraphDefinition } from "../../schema/graphDefinition.js";
import type { SessionState, SessionStatus, TurnOutcome } from "../../state.js";

export type StepStatus = "completed" | "skipped" | "in_progress" | "upcoming";

export type ProgressStep = {
  id: string;
  label: string;
  status: StepStatus;
};

export type ProgressState = {
  graphId: string;
  status: SessionStatus;
  currentNode: string | null;
  steps: ProgressStep[];
  completed: number;
  total: number;
  percentage: number;
};

const SKIP_OUTCOMES: readonly TurnOutcome[] = ["skipped", "skipped-incomplete"];

/**
 * Per-node status along the default path, plus any node the session reached
 * off that path. A node counts as done once it was left, whether answered or
 * skipped; its latest history entry decides which.
 */
export function computeProgress(graph: GraphDefinition, state: SessionState): ProgressState {
  const ids = [...graph.defaultPath()];
  for (const id of [...state.completedNodes, state.currentNode]) {
    if (id && graph.has(id) && !ids.includes(id)) ids.push(id);
  }

  const lastOutcome = new Map<string, TurnOutcome>();
  for (const entry of state.history) {
    if (entry.outcome !== "retry") lastOutcome.set(entry.node, entry.outcome);
  }

  const steps = ids.map((id): ProgressStep => {
    const label = graph.lookup(id).label;
    const outcome = lastOutcome.get(id);
    if (state.status !== "complete" && id === state.currentNode) return { id, label, status: "in_progress" };
    if (outcome && SKIP_OUTCOMES.includes(outcome)) return { id, label, status: "skipped" };
    if (outcome) return { id, label, status: "completed" };
    return { id, label, status: "upcoming" };
  });

  const completed = steps.filter((step) => step.status === "completed" || step.status === "skipped").length;
  const total = steps.length;
  const percentage = state.status === "complete" ? 100 : total ? Math.round((completed / total) * 100) : 0;

  return { graphId: graph.graphId, status: state.status, currentNode: state.currentNode, steps, completed, total, percentage };
}
