import type { GraphDefinition } from "./graphDefinition.js";
import type { NodeSpec } from "./graphDslTypes.js";
import type { SessionState, ValidationResult } from "../state.js";

/** Conditional ref that delegates to the DynamicResolve capability. */
export const DYNAMIC_RESOLVER_REF = "dynamic";

export type ConditionalResolverContext = {
  graph: GraphDefinition;
  node: NodeSpec;
  session: SessionState;
  validation: ValidationResult;
  input: string;
};

/** Returns a candidate node id, or null to fall back to the default transition. */
export type ConditionalResolver = (
  context: ConditionalResolverContext
) => string | null | Promise<string | null>;

/**
 * Named local resolvers a graph can reference from `transitions.conditional`.
 * One registry per engine; populated at startup, read during turns.
 */
export class ResolverRegistry {
  private readonly resolvers = new Map<string, ConditionalResolver>();

  register(ref: string, fn: ConditionalResolver): this {
    if (ref === DYNAMIC_RESOLVER_REF) {
      throw new Error(`"${DYNAMIC_RESOLVER_REF}" is reserved for the DynamicResolve capability.`);
    }
    this.resolvers.set(ref, fn);
    return this;
  }

  has(ref: string): boolean {
    return ref === DYNAMIC_RESOLVER_REF || this.resolvers.has(ref);
  }

  resolve(ref: string): ConditionalResolver {
    const fn = this.resolvers.get(ref);
    if (!fn) throw new Error(`Resolver not registered: "${ref}". Call register() first.`);
    return fn;
  }

  ids(): string[] {
    return [DYNAMIC_RESOLVER_REF, ...this.resolvers.keys()];
  }
}

/**
 * Picks the first node on the default path that the session has not visited
 * yet, excluding the node being answered.
 */
export const nextUnvisitedResolver: ConditionalResolver = ({ graph, node, session }) => {
  const visited = new Set(session.completedNodes);
  for (const id of graph.defaultPath()) {
    if (id !== node.id && !visited.has(id)) return id;
  }
  return null;
};

export function createDefaultResolverRegistry(): ResolverRegistry {
  return new ResolverRegistry().register("next-unvisited", nextUnvisitedResolver);
}
