import { describeError } from "../../errors.js";
import { noopLogger } from "../../logger.js";
import type { Logger } from "../../logger.js";
import type { ClarityRule, JudgeScoreRule, NodeSpec } from "../../schema/graphDslTypes.js";
import type { ValidationResult } from "../../state.js";
import { buildTemplateVars, interpolate } from "../helpers/template.js";
import { callCapability } from "../services/capabilities.js";
import type { JudgeCapability } from "../services/capabilities.js";
import { heuristicScore, parseJudgeScore } from "./heuristics.js";
import { evaluateDeterministicRule, isJudgeRule } from "./rules.js";

export const PASS_FEEDBACK = "Thanks, that's clear.";

const DEFAULT_JUDGE_FEEDBACK: Record<JudgeScoreRule["heuristic"], string> = {
  specificity: "Could you be more specific?",
  approval: "Let me know what you'd like to change, or confirm if this looks right.",
};

export type ClarityValidatorOptions = {
  judge?: JudgeCapability;
  timeoutMs?: number;
  logger?: Logger;
};

type JudgedRule = { rule: JudgeScoreRule; score: number; degraded: boolean };

/**
 * Scores a user answer against a node's clarity rules.
 *
 * Deterministic rules run first and short-circuit on the first failure, so
 * no Judge call is made for an answer that is already rejected. Judge rules
 * then score the answer; if the Judge is absent, errors, times out or replies
 * with something unparseable, the rule's local heuristic is used instead and
 * the result is flagged `degraded`. The aggregate score is the lowest judge
 * score, or 1 when the node has no judge rules.
 */
export class ClarityValidator {
  private readonly judge: JudgeCapability | undefined;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: ClarityValidatorOptions = {}) {
    this.judge = options.judge;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.logger = options.logger ?? noopLogger;
  }

  async validate(node: NodeSpec, input: string, context: Record<string, unknown> = {}): Promise<ValidationResult> {
    const judgeRules: JudgeScoreRule[] = [];
    for (const rule of node.clarityRules) {
      if (isJudgeRule(rule)) {
        judgeRules.push(rule);
        continue;
      }
      const outcome = evaluateDeterministicRule(rule, input);
      if (!outcome.passed) {
        return { passed: false, score: outcome.score, feedback: outcome.feedback, failedRule: rule, degraded: false };
      }
    }

    if (!judgeRules.length) {
      return { passed: true, score: 1, feedback: PASS_FEEDBACK, failedRule: null, degraded: false };
    }

    const vars = buildTemplateVars(context, { response: input, node: node.label });
    const judged: JudgedRule[] = [];
    for (const rule of judgeRules) {
      judged.push(await this.scoreJudgeRule(node, rule, input, vars));
    }

    const degraded = judged.some((entry) => entry.degraded);
    const lowest = judged.reduce((min, entry) => (entry.score < min.score ? entry : min));
    const failing = judged.find((entry) => entry.score < entry.rule.threshold);
    const nodeThreshold = node.threshold ?? 0;

    if (failing || lowest.score < nodeThreshold) {
      const culprit = failing ?? lowest;
      const failedRule: ClarityRule = culprit.rule;
      const feedback = culprit.rule.message ?? DEFAULT_JUDGE_FEEDBACK[culprit.rule.heuristic];
      return { passed: false, score: lowest.score, feedback, failedRule, degraded };
    }
    return { passed: true, score: lowest.score, feedback: PASS_FEEDBACK, failedRule: null, degraded };
  }

  private async scoreJudgeRule(
    node: NodeSpec,
    rule: JudgeScoreRule,
    input: string,
    vars: Record<string, string>
  ): Promise<JudgedRule> {
    const fallback = (reason: string): JudgedRule => {
      this.logger.warn("judge_fallback", { node: node.id, heuristic: rule.heuristic, reason });
      return { rule, score: heuristicScore(rule.heuristic, input), degraded: true };
    };

    const judge = this.judge;
    if (!judge) return fallback("judge capability not configured");

    const prompt = interpolate(rule.judgePromptTemplate, vars);
    try {
      const raw = await callCapability("judge", () => judge(prompt), this.timeoutMs);
      const score = parseJudgeScore(raw);
      if (score === null) return fallback(`unparseable judge reply: ${String(raw).slice(0, 80)}`);
      return { rule, score, degraded: false };
    } catch (error) {
      return fallback(describeError(error));
    }
  }
}
