import { AIMessage, HumanMessage, SystemMessage, type BaseMessage } from "@langchain/core/messages";
import type { ChatTurn } from "../../../state.js";
import { getModel, type ModelAlias } from "../../config/model-factory.js";

export type GenerationRequest = {
  messages: ChatTurn[];
  // Shows up as the run name in LangSmith traces.
  runName: string;
  modelAlias: ModelAlias;
};

/**
 * Boundary to the text-generation service: role-tagged turns in, one text blob out.
 * No schema is enforced here; callers parse and validate the reply.
 */
export interface GenerationClient {
  generate(request: GenerationRequest): Promise<string>;
}

// The slice of a LangChain chat model this client relies on.
export type ChatModelLike = {
  invoke(messages: BaseMessage[], options?: { runName?: string }): Promise<{ content: unknown }>;
};

export type ChatModelResolver = (alias: ModelAlias) => ChatModelLike;

export function toLangChainMessage(turn: ChatTurn): BaseMessage {
  switch (turn.role) {
    case "system":
      return new SystemMessage(turn.content);
    case "assistant":
      return new AIMessage(turn.content);
    default:
      return new HumanMessage(turn.content);
  }
}

export function messageContentToText(content: unknown): string {
  if (typeof content === "string") return content;
  if (Array.isArray(content)) {
    const parts: unknown[] = content;
    return parts
      .map((part) => {
        if (typeof part === "string") return part;
        if (typeof part === "object" && part !== null && "text" in part && typeof part.text === "string") return part.text;
        return "";
      })
      .join("");
  }
  return "";
}

export class ChatModelGenerationClient implements GenerationClient {
  constructor(private readonly resolveModel: ChatModelResolver = getModel) {}

  async generate(request: GenerationRequest): Promise<string> {
    const model = this.resolveModel(request.modelAlias);
    const response = await model.invoke(request.messages.map(toLangChainMessage), { runName: request.runName });
    return messageContentToText(response.content).trim();
  }
}
