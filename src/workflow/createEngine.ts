import type { ResolvedAppConfig } from "../config/appConfig.js";
import { WorkflowEngine } from "./core/engine/workflowEngine.js";
import { createOpenAiCapabilities } from "./core/services/ai/openaiCapabilities.js";
import type { Capabilities } from "./core/services/capabilities.js";
import { createFirecrawlSearch } from "./core/services/search/internetSearch.js";
import { createSessionStore } from "./core/store/createSessionStore.js";
import type { SessionStore } from "./core/store/sessionStore.js";
import { createLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import { loadGraphDefinition } from "./schema/graphLoader.js";
import { createDefaultResolverRegistry } from "./schema/resolverRegistry.js";
import type { ResolverRegistry } from "./schema/resolverRegistry.js";

export type EngineOverrides = {
  capabilities?: Capabilities;
  store?: SessionStore;
  resolvers?: ResolverRegistry;
  logger?: Logger;
};

/** Capabilities whose API keys are present in the environment. */
export function createDefaultCapabilities(): Capabilities {
  return { ...createOpenAiCapabilities(), search: createFirecrawlSearch() };
}

/**
 * Wires a WorkflowEngine from resolved app config: loads and validates the
 * graph (ConfigError on any problem), picks the session store and attaches
 * whichever capabilities are configured.
 */
export function createEngine(config: ResolvedAppConfig, overrides: EngineOverrides = {}): WorkflowEngine {
  const logger = overrides.logger ?? createLogger("workflow");
  const resolvers = overrides.resolvers ?? createDefaultResolverRegistry();
  const graph = loadGraphDefinition(config.flowPath, { resolvers });
  const capabilities = overrides.capabilities ?? createDefaultCapabilities();
  const store =
    overrides.store ??
    createSessionStore({ kind: config.sessionStore, directory: config.sessionDir, table: config.sessionTable });

  logger.info("engine_ready", {
    graphId: graph.graphId,
    version: graph.version,
    nodes: graph.nodeIds.length,
    store: config.sessionStore,
    capabilities: Object.entries(capabilities)
      .filter(([, fn]) => fn !== undefined)
      .map(([name]) => name),
  });

  return new WorkflowEngine({
    graph,
    store,
    capabilities,
    resolvers,
    logger,
    capabilityTimeoutMs: config.capabilityTimeoutMs,
    storeTimeoutMs: config.storeTimeoutMs,
    storeRetries: config.storeRetries,
  });
}

/**
 * Re-reads the graph file and swaps it into a running engine. A graph that
 * fails validation throws and leaves the running graph in place.
 */
export function reloadGraph(engine: WorkflowEngine, flowPath: string): void {
  engine.graphs.swap(loadGraphDefinition(flowPath, { resolvers: engine.resolvers }));
}
