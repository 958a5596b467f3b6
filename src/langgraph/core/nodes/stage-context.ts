import type { EmailState, EmailStateUpdate } from "../../state.js";
import type { ModelAlias } from "../config/model-factory.js";
import type { Clock } from "../helpers/state.js";
import { interpolate } from "../helpers/template.js";
import type { GenerationClient } from "../services/ai/generation-client.js";
import { generateWithGuardrail, type StageOutcome } from "../services/ai/guardrail.js";

export type PromptPair = { system: string; user: string };

// Per-node settings resolved from the flow definition.
export type StageBinding = {
  nodeId: string;
  prompt: PromptPair;
  modelAlias: ModelAlias;
  strings: Record<string, string>;
};

export type StageDeps = {
  client: GenerationClient;
  clock: Clock;
};

export type StageContext = StageDeps & { binding: StageBinding };

export type NodeHandler = (state: EmailState) => Promise<EmailStateUpdate>;

export function plainText(raw: string): string {
  return raw.trim();
}

/**
 * Render the node's prompt pair with `vars` and run one guarded generation call.
 */
export function generateForStage<T>(
  ctx: StageContext,
  vars: Record<string, string>,
  parse: (raw: string) => T | null
): Promise<StageOutcome<T>> {
  const { binding } = ctx;
  return generateWithGuardrail({
    client: ctx.client,
    request: {
      runName: binding.nodeId,
      modelAlias: binding.modelAlias,
      messages: [
        { role: "system", content: interpolate(binding.prompt.system, vars) },
        { role: "user", content: interpolate(binding.prompt.user, vars) },
      ],
    },
    parse,
  });
}
