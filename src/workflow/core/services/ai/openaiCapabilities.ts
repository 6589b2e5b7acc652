import type { Capabilities, DynamicResolveRequest } from "../capabilities.js";
import { invokeChatModel } from "./invoke.js";
import type { ChatModelLike } from "./invoke.js";
import { getModel } from "./modelFactory.js";

const JUDGE_SYSTEM_PROMPT = [
  "You grade how clear and specific a user's answer is for a project-planning interview.",
  "Return only a number between 0 and 1. No words, no explanation.",
].join("\n");

const ROUTER_SYSTEM_PROMPT = [
  "You route a planning conversation to its next step.",
  "Pick exactly one id from the list of available steps.",
  "Return only the id.",
].join("\n");

const WRITER_SYSTEM_PROMPT = [
  "You rephrase interview questions so they read naturally in context.",
  "Keep the meaning. Ask one question. Return only the question.",
].join("\n");

export function buildDynamicResolvePrompt(request: DynamicResolveRequest): string {
  const context = Object.entries(request.context)
    .map(([key, value]) => `- ${key}: ${typeof value === "string" ? value : JSON.stringify(value)}`)
    .join("\n");
  const candidates = request.candidates
    .map((candidate) => `- ${candidate.id}: ${candidate.label}${candidate.purpose ? ` (${candidate.purpose})` : ""}`)
    .join("\n");
  return [
    `Current step: ${request.nodeId}`,
    `Latest answer: ${request.input}`,
    "",
    "What we know so far:",
    context || "- nothing yet",
    "",
    "Available steps:",
    candidates,
    "",
    "Which step should come next?",
  ].join("\n");
}

export type OpenAiCapabilityModels = {
  judge?: ChatModelLike;
  router?: ChatModelLike;
  writer?: ChatModelLike;
};

/**
 * Judge, Generate and DynamicResolve backed by chat models. Without explicit
 * models and without OPENAI_API_KEY nothing is returned, which leaves the
 * engine on its local fallbacks.
 */
export function createOpenAiCapabilities(models: OpenAiCapabilityModels = {}): Pick<Capabilities, "judge" | "generate" | "dynamicResolve"> {
  const hasKey = Boolean(process.env.OPENAI_API_KEY);
  const judgeModel = models.judge ?? (hasKey ? getModel("judge") : undefined);
  const routerModel = models.router ?? (hasKey ? getModel("router") : undefined);
  const writerModel = models.writer ?? (hasKey ? getModel("writer") : undefined);

  const capabilities: Pick<Capabilities, "judge" | "generate" | "dynamicResolve"> = {};
  if (judgeModel) {
    capabilities.judge = (prompt) => invokeChatModel(judgeModel, JUDGE_SYSTEM_PROMPT, prompt, { runName: "judgeClarity" });
  }
  if (routerModel) {
    capabilities.dynamicResolve = (request) =>
      invokeChatModel(routerModel, ROUTER_SYSTEM_PROMPT, buildDynamicResolvePrompt(request), { runName: "resolveNextNode" });
  }
  if (writerModel) {
    capabilities.generate = (prompt) => invokeChatModel(writerModel, WRITER_SYSTEM_PROMPT, prompt, { runName: "rephrasePrompt" });
  }
  return capabilities;
}
