import { CapabilityUnavailableError, describeError } from "../../errors.js";
import type { CapabilityName } from "../../errors.js";
import { withTimeout } from "../helpers/async.js";

/** Scores a filled judge prompt. Numbers and numeric strings in [0, 1] are accepted. */
export type JudgeCapability = (prompt: string) => Promise<number | string>;

/** Produces free text, used to rephrase node prompts. */
export type GenerateCapability = (prompt: string) => Promise<string>;

export type ResolveCandidate = { id: string; label: string; purpose: string };

export type DynamicResolveRequest = {
  nodeId: string;
  input: string;
  context: Record<string, unknown>;
  candidates: ResolveCandidate[];
};

/** Answers with the id of the next node. The answer is checked against the graph. */
export type DynamicResolveCapability = (request: DynamicResolveRequest) => Promise<string>;

export type SearchResult = {
  title: string;
  url: string;
  snippet: string;
  score: number;
};

export type SearchCapability = (query: string) => Promise<SearchResult[]>;

/** Every capability is optional; the engine falls back to local behavior without it. */
export type Capabilities = {
  judge?: JudgeCapability;
  generate?: GenerateCapability;
  dynamicResolve?: DynamicResolveCapability;
  search?: SearchCapability;
};

/**
 * Invokes an external capability under a deadline. Any failure, including a
 * timeout, surfaces as CapabilityUnavailableError so callers have one thing
 * to catch before falling back.
 */
export async function callCapability<T>(
  name: CapabilityName,
  operation: () => Promise<T>,
  timeoutMs: number
): Promise<T> {
  try {
    return await withTimeout(operation, timeoutMs, `Capability "${name}"`);
  } catch (error) {
    if (error instanceof CapabilityUnavailableError) throw error;
    throw new CapabilityUnavailableError(name, describeError(error), { cause: error });
  }
}
