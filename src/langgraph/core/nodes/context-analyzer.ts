import type { EmailState, EmailStateUpdate } from "../../state.js";
import { nowIso, ownEntry } from "../helpers/state.js";
import { normalizeFollowUpRecord, parseContextUpdate, validatePriorityMap } from "../helpers/parsing.js";
import { toPromptJson } from "../helpers/template.js";
import { createEmailStats, unionTopics, withSentiment } from "../services/email-stats.js";
import { outcomeLabel } from "../services/ai/guardrail.js";
import { generateForStage, type StageContext } from "./stage-context.js";

/**
 * Entry stage: asks the model what the conversation so far means for topics, deadlines,
 * follow-ups and priorities, then folds the reply into the session.
 */
export async function contextAnalyzer(state: EmailState, ctx: StageContext): Promise<EmailStateUpdate> {
  const stage = ctx.binding.nodeId;
  const outcome = await generateForStage(
    ctx,
    {
      context: toPromptJson(state.context),
      threads: toPromptJson(state.email_threads),
      contacts: toPromptJson(state.contacts),
      recent_messages: toPromptJson(state.messages.slice(-3)),
    },
    parseContextUpdate
  );

  const trace = [outcomeLabel(stage, outcome)];
  if (outcome.status === "skipped") {
    return { reason_trace: [...state.reason_trace, ...trace] };
  }

  const { fields, reply } = outcome.value;
  const now = nowIso(ctx.clock);
  const update: EmailStateUpdate = {
    context: { ...state.context, ...fields },
  };

  if (reply.follow_ups) {
    const incoming = Object.entries(reply.follow_ups).map(
      ([threadId, raw]) => [threadId, normalizeFollowUpRecord(threadId, raw, now)] as const
    );
    update.follow_ups = { ...state.follow_ups, ...Object.fromEntries(incoming) };
  }

  if (reply.priorities) {
    const { accepted, rejected } = validatePriorityMap(reply.priorities);
    update.priorities = { ...state.priorities, ...accepted };
    trace.push(...rejected.map((threadId) => `${stage}:invalid_priority:${threadId}`));
  }

  const threadId = reply.thread_id;
  if (threadId) {
    const current = ownEntry(state.email_stats, threadId) ?? createEmailStats(now);
    const stats = withSentiment(
      {
        ...current,
        interaction_count: current.interaction_count + 1,
        last_interaction: now,
        topics: unionTopics(current.topics, reply.topics ?? []),
      },
      reply.sentiment,
      now
    );
    update.email_stats = { ...state.email_stats, [threadId]: stats };
  }

  return { ...update, reason_trace: [...state.reason_trace, ...trace] };
}
