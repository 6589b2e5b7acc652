import { ChatOpenAI } from "@langchain/openai";

export type ModelConfig = {
  model: string;
  temperature: number;
  maxRetries: number;
};

export type ModelAlias = "judge" | "router" | "writer";

const defaultConfigs: Record<ModelAlias, ModelConfig> = {
  judge:  { model: "gpt-4o-mini", temperature: 0,   maxRetries: 1 },
  router: { model: "gpt-4o-mini", temperature: 0,   maxRetries: 1 },
  writer: { model: "gpt-4o-mini", temperature: 0.4, maxRetries: 1 },
};

const overrides: Partial<Record<string, ModelConfig>> = {};
const cache = new Map<string, ChatOpenAI>();

/**
 * Register a custom model configuration for a given alias.
 * Calling this clears any cached instance so the next `getModel()` picks up the change.
 */
export function setModelConfig(alias: string, config: ModelConfig): void {
  overrides[alias] = config;
  cache.delete(alias);
}

function isModelAlias(alias: string): alias is ModelAlias {
  return alias === "judge" || alias === "router" || alias === "writer";
}

/**
 * Return a cached ChatOpenAI instance for the given alias.
 * Looks up the alias in overrides first, then the built-in aliases.
 *
 * @param alias   - Logical name ("judge", "router", "writer" or a registered override).
 * @param config  - Optional one-off config; does NOT get cached.
 */
export function getModel(alias: string, config?: ModelConfig): ChatOpenAI {
  if (!process.env.OPENAI_API_KEY) {
    throw new Error(`OPENAI_API_KEY is required to create model "${alias}".`);
  }

  if (config) {
    return new ChatOpenAI({
      model: config.model,
      temperature: config.temperature,
      maxRetries: config.maxRetries,
    });
  }

  const cached = cache.get(alias);
  if (cached) return cached;

  const resolved = overrides[alias] ?? (isModelAlias(alias) ? defaultConfigs[alias] : undefined);
  if (!resolved) {
    throw new Error(`No model configuration found for alias "${alias}". Call setModelConfig() first or pass an explicit config.`);
  }

  const model = new ChatOpenAI({
    model: process.env.OPENAI_MODEL?.trim() || resolved.model,
    temperature: resolved.temperature,
    maxRetries: resolved.maxRetries,
  });
  cache.set(alias, model);
  return model;
}

/**
 * Clear all cached model instances and overrides. Useful for tests.
 */
export function clearModelCache(): void {
  cache.clear();
  for (const key of Object.keys(overrides)) delete overrides[key];
}
