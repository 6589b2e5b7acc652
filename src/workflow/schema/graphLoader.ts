import { readFileSync } from "node:fs";
import { parse as parseYaml } from "yaml";
import type { ZodError } from "zod";
import { ConfigError, describeError } from "../errors.js";
import { GraphDefinition, RESERVED_NODE_IDS } from "./graphDefinition.js";
import { GraphDslSchema } from "./graphDslTypes.js";
import type { GraphDsl } from "./graphDslTypes.js";
import { createDefaultResolverRegistry } from "./resolverRegistry.js";
import type { ResolverRegistry } from "./resolverRegistry.js";

export type GraphLoadOptions = {
  /** Registry used to check `transitions.conditional` refs. Defaults to the built-in resolvers. */
  resolvers?: ResolverRegistry;
};

function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length ? issue.path.join(".") : "(root)";
    return `${where}: ${issue.message}`;
  });
}

/**
 * Validates a raw object (already parsed from YAML or JSON) against the
 * graph DSL schema. Defaults are applied; unknown keys are dropped.
 */
export function parseGraphDsl(raw: unknown): GraphDsl {
  const parsed = GraphDslSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = formatZodIssues(parsed.error);
    throw new ConfigError(`Graph definition is invalid: ${issues[0] ?? "unknown issue"}`, issues);
  }
  return parsed.data;
}

/**
 * Collects every structural problem in the DSL: ids, start/terminal marks,
 * transition targets, parallel targets and conditional refs.
 */
export function findGraphIssues(dsl: GraphDsl, resolvers: ResolverRegistry): string[] {
  const issues: string[] = [];
  const ids = new Set<string>();

  for (const node of dsl.nodes) {
    if (ids.has(node.id)) issues.push(`Duplicate node id "${node.id}".`);
    ids.add(node.id);
    if (RESERVED_NODE_IDS.includes(node.id)) issues.push(`Node id "${node.id}" is reserved.`);
  }

  const starts = dsl.nodes.filter((node) => node.start);
  const terminals = dsl.nodes.filter((node) => node.terminal);
  if (starts.length === 0) issues.push("No node is marked start.");
  if (starts.length > 1) issues.push(`More than one start node: ${starts.map((n) => n.id).join(", ")}.`);
  if (terminals.length === 0) issues.push("No node is marked terminal.");
  if (terminals.length > 1) issues.push(`More than one terminal node: ${terminals.map((n) => n.id).join(", ")}.`);

  for (const node of dsl.nodes) {
    const { default: defaultTarget, conditional } = node.transitions;
    if (node.terminal) {
      if (defaultTarget || conditional) issues.push(`Terminal node "${node.id}" must not declare transitions.`);
    } else if (!defaultTarget) {
      issues.push(`Node "${node.id}" has no default transition.`);
    } else if (!ids.has(defaultTarget)) {
      issues.push(`Node "${node.id}" default transition targets unknown node "${defaultTarget}".`);
    }

    if (conditional && !resolvers.has(conditional)) {
      issues.push(`Node "${node.id}" references unregistered conditional resolver "${conditional}".`);
    }

    for (const parallelId of node.parallelNodes) {
      if (!ids.has(parallelId)) issues.push(`Node "${node.id}" lists unknown parallel node "${parallelId}".`);
    }
  }

  return issues;
}

export function buildGraphDefinition(dsl: GraphDsl, options: GraphLoadOptions = {}): GraphDefinition {
  const issues = findGraphIssues(dsl, options.resolvers ?? createDefaultResolverRegistry());
  if (issues.length > 0) {
    throw new ConfigError(`Graph "${dsl.graph.graphId}" is invalid: ${issues[0]}`, issues);
  }
  return new GraphDefinition(dsl);
}

/**
 * Parses YAML text (not a file path) into a validated GraphDefinition.
 * Useful for tests and hot reload from non-file sources.
 */
export function parseGraphDefinitionFromText(yamlText: string, options: GraphLoadOptions = {}): GraphDefinition {
  let raw: unknown;
  try {
    raw = parseYaml(yamlText);
  } catch (error) {
    throw new ConfigError(`Graph source is not valid YAML: ${describeError(error)}`, [], { cause: error });
  }
  return buildGraphDefinition(parseGraphDsl(raw), options);
}

/** Reads, validates and freezes a YAML graph file. */
export function loadGraphDefinition(filePath: string, options: GraphLoadOptions = {}): GraphDefinition {
  let text: string;
  try {
    text = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ConfigError(`Cannot read graph file "${filePath}": ${describeError(error)}`, [], { cause: error });
  }
  return parseGraphDefinitionFromText(text, options);
}
