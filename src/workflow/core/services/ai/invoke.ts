import { HumanMessage, SystemMessage } from "@langchain/core/messages";
import type { BaseMessage } from "@langchain/core/messages";

/** The slice of a LangChain chat model the capabilities use. ChatOpenAI satisfies it. */
export interface ChatModelLike {
  invoke(messages: BaseMessage[], options?: { runName?: string }): Promise<{ content: unknown }>;
}

export function contentToText(content: unknown): string {
  if (typeof content === "string") return content;
  if (Array.isArray(content)) {
    return content
      .map((part) => {
        if (typeof part === "string") return part;
        if (part && typeof part === "object" && "text" in part && typeof part.text === "string") return part.text;
        return "";
      })
      .join("");
  }
  return "";
}

/** Invokes the model and returns trimmed text. Errors propagate to the caller. */
export async function invokeChatModel(
  model: ChatModelLike,
  system: string,
  user: string,
  options: { runName: string }
): Promise<string> {
  const resp = await model.invoke([new SystemMessage(system), new HumanMessage(user)], { runName: options.runName });
  return contentToText(resp.content).trim();
}
