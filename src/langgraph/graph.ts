import path from "node:path";
import { EmailStateSchema, type EmailState } from "./state.js";
import { systemClock, type Clock } from "./core/helpers/state.js";
import { ChatModelGenerationClient, type GenerationClient } from "./core/services/ai/generation-client.js";
import { HandlerRegistry } from "./schema/handler-registry.js";
import { registerEmailHandlers } from "./schema/email-handlers.js";
import { loadAndCompileGraph } from "./schema/graph-loader.js";
import type { CompiledEmailGraph } from "./schema/graph-compiler.js";

export type { EmailState } from "./state.js";
export { EmailStateSchema } from "./state.js";
export { createInitialState } from "./core/helpers/state.js";
export type { CompiledEmailGraph } from "./schema/graph-compiler.js";

export const DEFAULT_FLOW_PATH = path.resolve(__dirname, "../../graphs/email-assistant.flow.yaml");

export type BuildGraphOptions = {
  client?: GenerationClient;
  clock?: Clock;
  flowPath?: string;
};

export function buildGraphFromSchema(yamlPath: string, registry: HandlerRegistry): CompiledEmailGraph {
  return loadAndCompileGraph(yamlPath, registry);
}

export function buildEmailGraph(options: BuildGraphOptions = {}): CompiledEmailGraph {
  const registry = new HandlerRegistry();
  registerEmailHandlers(registry, {
    client: options.client ?? new ChatModelGenerationClient(),
    clock: options.clock ?? systemClock,
  });
  return buildGraphFromSchema(options.flowPath ?? DEFAULT_FLOW_PATH, registry);
}

/**
 * Run one request through the graph. The graph sees a parsed copy of `state` whose
 * messages are just the new user turn, with the task and trace cleared; the caller's
 * object is never touched.
 */
export async function runTurn(graphApp: CompiledEmailGraph, state: EmailState, userText: string): Promise<EmailState> {
  const nextState: EmailState = EmailStateSchema.parse({
    ...state,
    current_task: "",
    messages: [{ role: "user", content: userText }],
    reason_trace: [],
  });

  const result = await graphApp.invoke(nextState);
  return EmailStateSchema.parse(result);
}
