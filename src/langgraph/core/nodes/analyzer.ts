import type { AnalysisRecord, EmailState, EmailStateUpdate } from "../../state.js";
import { lastMessageContent, nowIso, ownEntry } from "../helpers/state.js";
import {
  normalizeFollowUpItems,
  normalizePriority,
  parseAnalysisReply,
  stringEntries,
} from "../helpers/parsing.js";
import { toPromptJson } from "../helpers/template.js";
import { createEmailStats, unionTopics, withPriority, withSentiment } from "../services/email-stats.js";
import { outcomeLabel } from "../services/ai/guardrail.js";
import { generateForStage, type StageContext } from "./stage-context.js";

/**
 * Multi-dimension analysis of the request and its thread. The richest state update in
 * the graph: with a thread id in the reply it touches stats, follow-ups, priorities and
 * response templates in one pass.
 */
export async function emailAnalyzer(state: EmailState, ctx: StageContext): Promise<EmailStateUpdate> {
  const stage = ctx.binding.nodeId;
  const outcome = await generateForStage(
    ctx,
    {
      request: lastMessageContent(state),
      context: toPromptJson(state.context),
      threads: toPromptJson(state.email_threads),
      contacts: toPromptJson(state.contacts),
      stats: toPromptJson(state.email_stats),
    },
    parseAnalysisReply
  );

  const trace = [outcomeLabel(stage, outcome)];
  if (outcome.status === "skipped") {
    return { reason_trace: [...state.reason_trace, ...trace] };
  }

  const { fields, reply } = outcome.value;
  const now = nowIso(ctx.clock);

  // Priorities from generated text are checked here; a bad value never reaches state.
  const priority = reply.priority === undefined ? null : normalizePriority(reply.priority);
  const analysis: AnalysisRecord = { ...fields };
  if (reply.priority !== undefined) {
    if (priority) analysis.priority = priority;
    else {
      delete analysis.priority;
      trace.push(reply.thread_id ? `${stage}:invalid_priority:${reply.thread_id}` : `${stage}:invalid_priority`);
    }
  }

  const update: EmailStateUpdate = {
    memory: { ...state.memory, analysis },
  };

  const threadId = reply.thread_id;
  if (threadId) {
    let stats = ownEntry(state.email_stats, threadId) ?? createEmailStats(now);
    stats = {
      ...stats,
      topics: unionTopics(stats.topics, reply.topics ?? []),
      action_items: [...stats.action_items, ...(reply.action_items ?? [])],
      deadlines: [...stats.deadlines, ...(reply.deadlines ?? [])],
    };
    stats = withSentiment(stats, reply.sentiment, now);
    if (priority) stats = withPriority(stats, priority, now);
    update.email_stats = { ...state.email_stats, [threadId]: stats };

    if (reply.follow_ups !== undefined) {
      update.follow_ups = {
        ...state.follow_ups,
        [threadId]: {
          items: normalizeFollowUpItems(threadId, reply.follow_ups),
          created_at: now,
          status: "pending",
        },
      };
    }

    if (priority) {
      update.priorities = { ...state.priorities, [threadId]: priority };
    }

    if (reply.suggested_templates) {
      update.response_templates = { ...state.response_templates, ...stringEntries(reply.suggested_templates) };
    }
  }

  return { ...update, reason_trace: [...state.reason_trace, ...trace] };
}
