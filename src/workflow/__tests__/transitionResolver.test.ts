import { jest } from "@jest/globals";
import { ValidationExhaustedError } from "../errors.js";
import { COMPLETE } from "../schema/graphDefinition.js";
import type { GraphDefinition } from "../schema/graphDefinition.js";
import { parseGraphDefinitionFromText } from "../schema/graphLoader.js";
import { ResolverRegistry, createDefaultResolverRegistry } from "../schema/resolverRegistry.js";
import { createSessionState } from "../state.js";
import type { SessionState, ValidationResult } from "../state.js";
import type { DynamicResolveCapability } from "../core/services/capabilities.js";
import { TransitionResolver } from "../core/routing/transitionResolver.js";
import { TEST_FLOW_YAML, loadTestGraph } from "./fixtures.js";

const passed: ValidationResult = { passed: true, score: 1, feedback: "ok", failedRule: null, degraded: false };
const failed: ValidationResult = { passed: false, score: 0.2, feedback: "more please", failedRule: null, degraded: false };

function session(overrides: Partial<SessionState> = {}): SessionState {
  return { ...createSessionState("s1", "test-flow", 1_000), status: "active", ...overrides };
}

function conditionalGraph(ref: string, resolvers: ResolverRegistry, allowBacktrack = true): GraphDefinition {
  const yamlText = TEST_FLOW_YAML.replace("      default: exclude\n", `      default: exclude\n      conditional: ${ref}\n`).replace(
    "allowBacktrack: true",
    `allowBacktrack: ${allowBacktrack}`
  );
  return parseGraphDefinitionFromText(yamlText, { resolvers });
}

describe("TransitionResolver", () => {
  const resolvers = createDefaultResolverRegistry();

  it("retries a failed node while retries remain", async () => {
    const graph = loadTestGraph();
    const resolver = new TransitionResolver({ resolvers });

    const resolution = await resolver.resolve(graph.lookup("start"), session({ retryCounts: { start: 2 } }), failed, {
      graph,
      input: "app",
    });
    expect(resolution).toEqual({ outcome: "retry", nextNode: "start", via: "retry" });
  });

  it("moves a skippable node on once retries run out", async () => {
    const graph = loadTestGraph();
    const resolver = new TransitionResolver({ resolvers });

    const resolution = await resolver.resolve(graph.lookup("exclude"), session({ retryCounts: { exclude: 1 } }), failed, {
      graph,
      input: "maybe",
    });
    expect(resolution).toEqual({ outcome: "skipped-incomplete", nextNode: "tech", via: "skip" });
  });

  it("throws ValidationExhaustedError when a node can neither retry nor skip", async () => {
    const graph = loadTestGraph();
    const resolver = new TransitionResolver({ resolvers });
    const pending = resolver.resolve(graph.lookup("tech"), session({ retryCounts: { tech: 1 } }), failed, {
      graph,
      input: "vague",
    });

    await expect(pending).rejects.toBeInstanceOf(ValidationExhaustedError);
    await expect(pending).rejects.toMatchObject({ nodeId: "tech", attempts: 2, details: "more please" });
  });

  it("exhausts immediately when retries are not allowed", async () => {
    const graph = loadTestGraph();
    const resolver = new TransitionResolver({ resolvers });
    await expect(
      resolver.resolve(graph.lookup("review"), session(), failed, { graph, input: "meh" })
    ).rejects.toMatchObject({ nodeId: "review", attempts: 1 });
  });

  it("completes when the terminal node passes", async () => {
    const graph = loadTestGraph();
    const resolution = await new TransitionResolver({ resolvers }).resolve(graph.lookup("review"), session(), passed, {
      graph,
      input: "ship it",
    });
    expect(resolution).toEqual({ outcome: "completed", nextNode: COMPLETE, via: "terminal" });
  });

  it("follows the default transition when there is no conditional", async () => {
    const graph = loadTestGraph();
    const resolution = await new TransitionResolver({ resolvers }).resolve(graph.lookup("start"), session(), passed, {
      graph,
      input: "a task tracker",
    });
    expect(resolution).toEqual({ outcome: "advanced", nextNode: "clarify", via: "default" });
  });

  describe("dynamic conditional", () => {
    it("takes a normalised answer that names a node", async () => {
      const graph = conditionalGraph("dynamic", resolvers);
      const dynamicResolve = jest.fn<DynamicResolveCapability>().mockResolvedValue(" Tech.\n");
      const resolver = new TransitionResolver({ resolvers, dynamicResolve });

      const resolution = await resolver.resolve(graph.lookup("clarify"), session({ completedNodes: ["start"] }), passed, {
        graph,
        input: "a web platform",
      });

      expect(resolution).toEqual({ outcome: "advanced", nextNode: "tech", via: "conditional" });
      const request = dynamicResolve.mock.calls[0]?.[0];
      expect(request?.nodeId).toBe("clarify");
      expect(request?.input).toBe("a web platform");
      expect(request?.candidates.map((candidate) => candidate.id)).toEqual(["start", "exclude", "tech", "review"]);
    });

    it.each([
      ["an unknown node", "payments", 'unknown node "payments"'],
      ["the current node", "clarify", "self transition"],
      ["an empty answer", "  ", "no answer"],
    ])("falls back to the default for %s", async (_label, answer, reason) => {
      const graph = conditionalGraph("dynamic", resolvers);
      const resolver = new TransitionResolver({
        resolvers,
        dynamicResolve: jest.fn<DynamicResolveCapability>().mockResolvedValue(answer),
      });

      const resolution = await resolver.resolve(graph.lookup("clarify"), session(), passed, { graph, input: "x" });
      expect(resolution).toEqual({ outcome: "advanced", nextNode: "exclude", via: "default", fallbackReason: reason });
    });

    it("falls back when the capability fails, hangs or is missing", async () => {
      const graph = conditionalGraph("dynamic", resolvers);
      const clarify = graph.lookup("clarify");
      const failing = new TransitionResolver({
        resolvers,
        dynamicResolve: jest.fn<DynamicResolveCapability>().mockRejectedValue(new Error("boom")),
      });
      const hanging = new TransitionResolver({ resolvers, dynamicResolve: () => new Promise(() => undefined), timeoutMs: 20 });
      const missing = new TransitionResolver({ resolvers });

      for (const resolver of [failing, hanging, missing]) {
        const resolution = await resolver.resolve(clarify, session(), passed, { graph, input: "x" });
        expect(resolution.nextNode).toBe("exclude");
        expect(resolution.fallbackReason).toBe("no answer");
      }
    });

    it("rejects a visited node when the graph disallows backtracking", async () => {
      const graph = conditionalGraph("dynamic", resolvers, false);
      const resolver = new TransitionResolver({
        resolvers,
        dynamicResolve: jest.fn<DynamicResolveCapability>().mockResolvedValue("start"),
      });

      const resolution = await resolver.resolve(graph.lookup("clarify"), session({ completedNodes: ["start"] }), passed, {
        graph,
        input: "x",
      });
      expect(resolution.nextNode).toBe("exclude");
      expect(resolution.fallbackReason).toBe('backtrack to "start" not allowed');
    });

    it("only ever yields a graph node or COMPLETE", async () => {
      const graph = conditionalGraph("dynamic", resolvers);
      const answers = ["tech", "TECH", "nonsense", "", "COMPLETE", "review\nbecause", "`start`", "clarify"];
      for (const answer of answers) {
        const resolver = new TransitionResolver({
          resolvers,
          dynamicResolve: jest.fn<DynamicResolveCapability>().mockResolvedValue(answer),
        });
        const { nextNode } = await resolver.resolve(graph.lookup("clarify"), session(), passed, { graph, input: "x" });
        expect(nextNode === COMPLETE || graph.has(nextNode)).toBe(true);
      }
    });
  });

  describe("local conditional", () => {
    it("calls the registered resolver with the turn context", async () => {
      const pick = jest.fn(() => "review");
      const registry = createDefaultResolverRegistry().register("jump", pick);
      const graph = conditionalGraph("jump", registry);

      const resolution = await new TransitionResolver({ resolvers: registry }).resolve(
        graph.lookup("clarify"),
        session(),
        passed,
        { graph, input: "skip ahead" }
      );
      expect(resolution).toEqual({ outcome: "advanced", nextNode: "review", via: "conditional" });
      expect(pick).toHaveBeenCalledTimes(1);
    });

    it("falls back when the resolver returns null or throws", async () => {
      const registry = createDefaultResolverRegistry()
        .register("nothing", () => null)
        .register("broken", () => {
          throw new Error("bad resolver");
        });

      for (const ref of ["nothing", "broken"]) {
        const graph = conditionalGraph(ref, registry);
        const resolution = await new TransitionResolver({ resolvers: registry }).resolve(
          graph.lookup("clarify"),
          session(),
          passed,
          { graph, input: "x" }
        );
        expect(resolution).toEqual({ outcome: "advanced", nextNode: "exclude", via: "default", fallbackReason: "no answer" });
      }
    });

    it("next-unvisited picks the first unvisited node on the default path", async () => {
      const graph = conditionalGraph("next-unvisited", resolvers);
      const resolution = await new TransitionResolver({ resolvers }).resolve(
        graph.lookup("clarify"),
        session({ completedNodes: ["start", "exclude"] }),
        passed,
        { graph, input: "x" }
      );
      expect(resolution).toEqual({ outcome: "advanced", nextNode: "tech", via: "conditional" });
    });
  });
});
