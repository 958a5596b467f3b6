import type { EmailState, EmailStateUpdate } from "../../state.js";
import { lastMessageContent } from "../helpers/state.js";
import { toPromptJson } from "../helpers/template.js";
import { outcomeLabel } from "../services/ai/guardrail.js";
import { generateForStage, plainText, type StageContext } from "./stage-context.js";

export async function emailSummarizer(state: EmailState, ctx: StageContext): Promise<EmailStateUpdate> {
  const outcome = await generateForStage(
    ctx,
    {
      request: lastMessageContent(state),
      threads: toPromptJson(state.email_threads),
    },
    plainText
  );

  const reason_trace = [...state.reason_trace, outcomeLabel(ctx.binding.nodeId, outcome)];
  if (outcome.status === "skipped") return { reason_trace };
  return { memory: { ...state.memory, summary: outcome.value }, reason_trace };
}
