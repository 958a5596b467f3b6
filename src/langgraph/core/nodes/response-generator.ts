import type { EmailState, EmailStateUpdate } from "../../state.js";
import { DEFAULT_PRIORITY } from "../../state.js";
import { createDraftId, lastMessageContent, nowIso, ownEntry } from "../helpers/state.js";
import { toPromptJson } from "../helpers/template.js";
import { outcomeLabel } from "../services/ai/guardrail.js";
import { generateForStage, plainText, type StageContext } from "./stage-context.js";

export const DEFAULT_RESPONSE_FALLBACK =
  "I could not put together a reply just now. Please try again in a moment.";

export function analysisThreadId(state: EmailState): string | null {
  const threadId = state.memory.analysis?.thread_id;
  return typeof threadId === "string" && threadId ? threadId : null;
}

/**
 * Terminal stage. Always appends an assistant message; the reply is also kept as a
 * draft unless the configured fallback had to stand in for it.
 */
export async function responseGenerator(state: EmailState, ctx: StageContext): Promise<EmailStateUpdate> {
  const analysis = state.memory.analysis ?? null;
  const threadId = analysisThreadId(state);

  const outcome = await generateForStage(
    ctx,
    {
      request: lastMessageContent(state, "user"),
      context: toPromptJson(state.context),
      analysis: toPromptJson(analysis),
      summary: state.memory.summary ?? "",
      stats: toPromptJson(threadId ? ownEntry(state.email_stats, threadId) : undefined),
      follow_ups: toPromptJson(threadId ? ownEntry(state.follow_ups, threadId) : undefined),
      priority: (threadId ? ownEntry(state.priorities, threadId) : undefined) ?? DEFAULT_PRIORITY,
      templates: toPromptJson(state.response_templates),
    },
    plainText
  );

  const reason_trace = [...state.reason_trace, outcomeLabel(ctx.binding.nodeId, outcome)];
  const messages = (content: string) => [...state.messages, { role: "assistant" as const, content }];

  if (outcome.status === "skipped") {
    const fallback = ctx.binding.strings.responseFallback || DEFAULT_RESPONSE_FALLBACK;
    return { messages: messages(fallback), reason_trace };
  }

  return {
    messages: messages(outcome.value),
    drafts: {
      ...state.drafts,
      [createDraftId()]: {
        kind: "response",
        content: outcome.value,
        context: state.context,
        analysis,
        thread_id: threadId,
        created_at: nowIso(ctx.clock),
        status: "draft",
      },
    },
    reason_trace,
  };
}
