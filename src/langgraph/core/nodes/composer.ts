import type { EmailState, EmailStateUpdate } from "../../state.js";
import { createDraftId, lastMessageContent, nowIso } from "../helpers/state.js";
import { toPromptJson } from "../helpers/template.js";
import { outcomeLabel } from "../services/ai/guardrail.js";
import { generateForStage, plainText, type StageContext } from "./stage-context.js";

// Drafts an email for the request. The draft is stored only; the conversation is not touched.
export async function emailComposer(state: EmailState, ctx: StageContext): Promise<EmailStateUpdate> {
  const outcome = await generateForStage(
    ctx,
    {
      request: lastMessageContent(state),
      context: toPromptJson(state.context),
      contacts: toPromptJson(state.contacts),
    },
    plainText
  );

  const reason_trace = [...state.reason_trace, outcomeLabel(ctx.binding.nodeId, outcome)];
  if (outcome.status === "skipped") return { reason_trace };

  return {
    drafts: {
      ...state.drafts,
      [createDraftId()]: {
        kind: "composed",
        content: outcome.value,
        context: state.context,
        created_at: nowIso(ctx.clock),
      },
    },
    reason_trace,
  };
}
