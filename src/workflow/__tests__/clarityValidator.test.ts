import { jest } from "@jest/globals";
import { NodeSpecSchema } from "../schema/graphDslTypes.js";
import type { NodeSpecInput } from "../schema/graphDslTypes.js";
import type { JudgeCapability } from "../core/services/capabilities.js";
import { ClarityValidator, PASS_FEEDBACK } from "../core/validation/clarityValidator.js";

function node(overrides: Partial<NodeSpecInput>) {
  return NodeSpecSchema.parse({ id: "n1", label: "Project idea", ...overrides });
}

const specificityJudge = (threshold: number) => ({
  kind: "judge-score" as const,
  threshold,
  judgePromptTemplate: "Rate '{{response}}' for {{node}} ({{project_idea}}).",
});

describe("ClarityValidator", () => {
  it("passes a node without rules", async () => {
    const result = await new ClarityValidator().validate(node({}), "anything");
    expect(result).toEqual({ passed: true, score: 1, feedback: PASS_FEEDBACK, failedRule: null, degraded: false });
  });

  it("fails short answers on min-word-count with a partial score", async () => {
    const nodeSpec = node({ clarityRules: [{ kind: "min-word-count", min: 3 }] });
    const result = await new ClarityValidator().validate(nodeSpec, "app");

    expect(result.passed).toBe(false);
    expect(result.score).toBeCloseTo(1 / 3);
    expect(result.feedback).toBe("Please add a bit more detail (at least 3 words).");
    expect(result.failedRule?.kind).toBe("min-word-count");
  });

  it("lists missing entities in the feedback", async () => {
    const nodeSpec = node({ clarityRules: [{ kind: "required-entity-set", entities: ["platform", "features"] }] });
    const result = await new ClarityValidator().validate(nodeSpec, "A web platform");

    expect(result.passed).toBe(false);
    expect(result.score).toBe(0.5);
    expect(result.feedback).toBe("Please mention: features.");
  });

  it("recognises categories through the keyword table", async () => {
    const nodeSpec = node({
      clarityRules: [{ kind: "required-category-set", categories: ["frontend", "backend", "database"] }],
    });
    const validator = new ClarityValidator();

    expect((await validator.validate(nodeSpec, "React frontend, Node backend, Postgres database")).passed).toBe(true);
    const partial = await validator.validate(nodeSpec, "Vue with a Django API");
    expect(partial.passed).toBe(false);
    expect(partial.feedback).toBe("Please cover: database.");
  });

  it("honours per-rule keyword overrides and custom messages", async () => {
    const nodeSpec = node({
      clarityRules: [
        {
          kind: "required-category-set",
          categories: ["hosting"],
          keywords: { hosting: ["vercel", "fly.io"] },
          message: "Where will it run?",
        },
      ],
    });
    const validator = new ClarityValidator();

    expect((await validator.validate(nodeSpec, "Deploy on Fly.io")).passed).toBe(true);
    expect((await validator.validate(nodeSpec, "Somewhere cheap")).feedback).toBe("Where will it run?");
  });

  it("falls back to the category name when it matches an Object.prototype member", async () => {
    const nodeSpec = node({ clarityRules: [{ kind: "required-category-set", categories: ["constructor"] }] });
    const validator = new ClarityValidator();

    expect((await validator.validate(nodeSpec, "a drag and drop page constructor")).passed).toBe(true);
    expect((await validator.validate(nodeSpec, "a page builder")).feedback).toBe("Please cover: constructor.");
  });

  it("counts extracted list items and exclusions", async () => {
    const listNode = node({ clarityRules: [{ kind: "min-extracted-items", min: 2 }] });
    const exclusionNode = node({ clarityRules: [{ kind: "min-extracted-items", min: 1, extractor: "exclusions" }] });
    const validator = new ClarityValidator();

    expect((await validator.validate(listNode, "- login\n- search")).passed).toBe(true);
    expect((await validator.validate(listNode, "login")).feedback).toBe("Please list at least 2 items.");
    expect((await validator.validate(exclusionNode, "no payments")).passed).toBe(true);
    expect((await validator.validate(exclusionNode, "maybe later")).feedback).toBe(
      "Please list at least 1 thing to leave out."
    );
  });

  it("does not call the judge when a deterministic rule fails", async () => {
    const judge = jest.fn<JudgeCapability>().mockResolvedValue("0.9");
    const nodeSpec = node({ clarityRules: [{ kind: "min-word-count", min: 3 }, specificityJudge(0.6)] });

    const result = await new ClarityValidator({ judge }).validate(nodeSpec, "app");

    expect(result.passed).toBe(false);
    expect(judge).not.toHaveBeenCalled();
  });

  it("uses the judge score and fills the prompt template", async () => {
    const judge = jest.fn<JudgeCapability>().mockResolvedValue("Score: 0.85");
    const nodeSpec = node({ clarityRules: [specificityJudge(0.7)] });

    const result = await new ClarityValidator({ judge }).validate(nodeSpec, "a task tracker", { project_idea: "tracker" });

    expect(judge).toHaveBeenCalledWith("Rate 'a task tracker' for Project idea (tracker).");
    expect(result).toEqual({ passed: true, score: 0.85, feedback: PASS_FEEDBACK, failedRule: null, degraded: false });
  });

  it("fails when the judge score is under the rule threshold", async () => {
    const judge = jest.fn<JudgeCapability>().mockResolvedValue(0.4);
    const nodeSpec = node({ clarityRules: [specificityJudge(0.7)] });

    const result = await new ClarityValidator({ judge }).validate(nodeSpec, "stuff");

    expect(result.passed).toBe(false);
    expect(result.score).toBe(0.4);
    expect(result.feedback).toBe("Could you be more specific?");
    expect(result.failedRule?.kind).toBe("judge-score");
  });

  it("applies the node threshold to the lowest judge score", async () => {
    const judge = jest.fn<JudgeCapability>().mockResolvedValue(0.75);
    const nodeSpec = node({ threshold: 0.8, clarityRules: [specificityJudge(0.7)] });

    const result = await new ClarityValidator({ judge }).validate(nodeSpec, "fine");
    expect(result.passed).toBe(false);
    expect(result.score).toBe(0.75);
  });

  it("aggregates several judge rules to the lowest score", async () => {
    const judge = jest.fn<JudgeCapability>().mockResolvedValueOnce(0.9).mockResolvedValueOnce(0.65);
    const nodeSpec = node({ clarityRules: [specificityJudge(0.5), specificityJudge(0.6)] });

    const result = await new ClarityValidator({ judge }).validate(nodeSpec, "fine");
    expect(result.passed).toBe(true);
    expect(result.score).toBe(0.65);
  });

  it("falls back to the heuristic when the judge throws", async () => {
    const judge = jest.fn<JudgeCapability>().mockRejectedValue(new Error("rate limited"));
    const nodeSpec = node({ clarityRules: [specificityJudge(0.6)] });

    const result = await new ClarityValidator({ judge }).validate(nodeSpec, "a task tracker for small teams");

    expect(result.degraded).toBe(true);
    expect(result.score).toBeCloseTo(0.36);
    expect(result.passed).toBe(false);
  });

  it("falls back when the judge reply is unparseable", async () => {
    const judge = jest.fn<JudgeCapability>().mockResolvedValue("high");
    const nodeSpec = node({ clarityRules: [{ ...specificityJudge(0.8), heuristic: "approval" }] });

    const result = await new ClarityValidator({ judge }).validate(nodeSpec, "yes, looks good");

    expect(result).toEqual({ passed: true, score: 0.9, feedback: PASS_FEEDBACK, failedRule: null, degraded: true });
  });

  it("falls back when the judge does not answer in time", async () => {
    const judge: JudgeCapability = () => new Promise(() => undefined);
    const nodeSpec = node({ clarityRules: [{ ...specificityJudge(0.5), heuristic: "approval" }] });

    const result = await new ClarityValidator({ judge, timeoutMs: 20 }).validate(nodeSpec, "no, change it");

    expect(result.degraded).toBe(true);
    expect(result.score).toBe(0.3);
    expect(result.feedback).toBe("Let me know what you'd like to change, or confirm if this looks right.");
  });

  it("scores locally when no judge is configured", async () => {
    const nodeSpec = node({ clarityRules: [specificityJudge(0.6)] });
    const result = await new ClarityValidator().validate(
      nodeSpec,
      "A collaborative task tracker for small remote teams with kanban boards"
    );
    expect(result).toEqual({ passed: true, score: 1, feedback: PASS_FEEDBACK, failedRule: null, degraded: true });
  });
});
