import { NotFoundError } from "../errors.js";
import type { GraphDsl, GraphHeader, NodeSpec } from "./graphDslTypes.js";

/** Sentinel next-node value once the terminal node has been passed. */
export const COMPLETE = "COMPLETE";
export type NextNodeId = string;

export const RESERVED_NODE_IDS: readonly string[] = [COMPLETE, "NOT_STARTED"];

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/**
 * Immutable, validated workflow graph. Build it through the graph loader:
 * the constructor trusts that the DSL has already passed topology checks.
 */
export class GraphDefinition {
  readonly graphId: string;
  readonly version: string;
  readonly description: string;
  readonly maxRetries: number;
  readonly allowBacktrack: boolean;
  readonly startNode: NodeSpec;
  readonly terminalNode: NodeSpec;
  readonly nodeIds: readonly string[];

  private readonly header: GraphHeader;
  private readonly nodes: ReadonlyMap<string, NodeSpec>;
  private readonly path: readonly string[];

  constructor(dsl: GraphDsl) {
    const frozen = deepFreeze(structuredClone(dsl));
    this.header = frozen.graph;
    this.graphId = frozen.graph.graphId;
    this.version = frozen.graph.version;
    this.description = frozen.graph.description;
    this.maxRetries = frozen.graph.maxRetries;
    this.allowBacktrack = frozen.graph.allowBacktrack;
    this.nodes = new Map(frozen.nodes.map((node) => [node.id, node]));
    this.nodeIds = Object.freeze(frozen.nodes.map((node) => node.id));

    const start = frozen.nodes.find((node) => node.start);
    const terminal = frozen.nodes.find((node) => node.terminal);
    if (!start || !terminal) {
      throw new Error("GraphDefinition requires exactly one start node and one terminal node.");
    }
    this.startNode = start;
    this.terminalNode = terminal;
    this.path = Object.freeze(this.walkDefaultPath());
    Object.freeze(this);
  }

  has(id: string): boolean {
    return this.nodes.has(id);
  }

  /** Exact id, else the single id equal to `candidate` ignoring case. */
  matchId(candidate: string): string | null {
    if (this.nodes.has(candidate)) return candidate;
    const lowered = candidate.toLowerCase();
    const matches = this.nodeIds.filter((id) => id.toLowerCase() === lowered);
    return matches.length === 1 ? (matches[0] ?? null) : null;
  }

  lookup(id: string): NodeSpec {
    const node = this.nodes.get(id);
    if (!node) throw new NotFoundError("node", id);
    return node;
  }

  /** Retry ceiling for a node: its own override, else the graph default. */
  maxRetriesFor(node: NodeSpec): number {
    return node.maxRetries ?? this.maxRetries;
  }

  parallelNodesOf(id: string): NodeSpec[] {
    return this.lookup(id).parallelNodes.map((parallelId) => this.lookup(parallelId));
  }

  /** Node ids visited by following default transitions from the start node. */
  defaultPath(): readonly string[] {
    return this.path;
  }

  /** Structural snapshot; two loads of the same source produce equal values. */
  toJSON(): GraphDsl {
    return {
      graph: structuredClone(this.header),
      nodes: this.nodeIds.map((id) => structuredClone(this.lookup(id))),
    };
  }

  private walkDefaultPath(): string[] {
    const path: string[] = [];
    const seen = new Set<string>();
    let cursor: NodeSpec | undefined = this.startNode;
    while (cursor && !seen.has(cursor.id)) {
      path.push(cursor.id);
      seen.add(cursor.id);
      if (cursor.terminal) break;
      const next: string | undefined = cursor.transitions.default;
      cursor = next ? this.nodes.get(next) : undefined;
    }
    return path;
  }
}

/**
 * Swappable reference to the active graph. Each turn reads the graph once,
 * so a reload never changes the graph under an in-flight turn.
 */
export class GraphHolder {
  private current: GraphDefinition;

  constructor(initial: GraphDefinition) {
    this.current = initial;
  }

  get(): GraphDefinition {
    return this.current;
  }

  /** Replaces the active graph and returns the previous one. */
  swap(next: GraphDefinition): GraphDefinition {
    const previous = this.current;
    this.current = next;
    return previous;
  }
}
