import { jest } from "@jest/globals";

declare global {
  // eslint-disable-next-line no-var
  var __chatOpenAIMockContent: string | undefined;
}

process.env.LOG_LEVEL ??= "silent";

jest.mock("@langchain/openai", () => ({
  ChatOpenAI: class {
    constructor(public readonly fields: Record<string, unknown> = {}) {}
    async invoke() {
      return { content: globalThis.__chatOpenAIMockContent ?? "" };
    }
  },
}));
