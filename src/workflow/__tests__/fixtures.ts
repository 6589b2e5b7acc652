import path from "node:path";
import type { GraphDefinition } from "../schema/graphDefinition.js";
import { parseGraphDefinitionFromText } from "../schema/graphLoader.js";
import type { ResolverRegistry } from "../schema/resolverRegistry.js";

export const PROJECT_ROOT = path.resolve(__dirname, "../../..");
export const CLARIFIER_FLOW_PATH = path.join(PROJECT_ROOT, "graphs", "project-clarifier.flow.yaml");

/** Deterministic rules only, so every pass or fail is decided locally. */
export const TEST_FLOW_YAML = `
graph:
  graphId: test-flow
  version: "1"
  maxRetries: 3
  allowBacktrack: true
nodes:
  - id: start
    start: true
    label: Start
    prompt: What are we building?
    contextKey: project_idea
    clarityRules:
      - kind: min-word-count
        min: 3
    transitions:
      default: clarify
  - id: clarify
    label: Clarify
    prompt: "Which platform is {{project_idea}} for?"
    parallelNodes: [exclude]
    clarityRules:
      - kind: required-entity-set
        entities: [platform]
    transitions:
      default: exclude
  - id: exclude
    label: Exclude
    optional: true
    skippable: true
    maxRetries: 1
    clarityRules:
      - kind: min-extracted-items
        min: 1
        extractor: exclusions
    transitions:
      default: tech
  - id: tech
    label: Tech
    maxRetries: 1
    searchHint: "{{project_idea}} stack"
    clarityRules:
      - kind: required-category-set
        categories: [frontend, backend, database]
    transitions:
      default: review
  - id: review
    terminal: true
    label: Review
    retryAllowed: false
    clarityRules:
      - kind: min-word-count
        min: 1
`;

export function loadTestGraph(resolvers?: ResolverRegistry): GraphDefinition {
  return parseGraphDefinitionFromText(TEST_FLOW_YAML, { resolvers });
}

/** Rebuilds the test graph with one node's YAML block replaced. */
export function withNodeOverride(nodeId: string, replacement: string): string {
  const blocks = TEST_FLOW_YAML.split(/\n(?=  - id: )/);
  return blocks.map((block) => (block.startsWith(`  - id: ${nodeId}\n`) ? replacement.replace(/\n+$/, "") : block)).join("\n");
}

/** Clock that advances 10ms per reading. */
export function steppingClock(start = 1_000): () => number {
  let now = start;
  return () => {
    now += 10;
    return now;
  };
}

export const TECH_ANSWER = "React frontend, Node backend, Postgres database";
