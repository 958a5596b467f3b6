import {
  DEFAULT_PRIORITY,
  PRIORITY_LEVELS,
  PrioritySchema,
  type ContactRecord,
  type DraftRecord,
  type EmailState,
  type EmailStats,
  type FollowUpItem,
  type FollowUpRecord,
  type Priority,
  type ThreadRecord,
} from "../../state.js";
import { InvalidArgumentError } from "../errors/index.js";
import { ownEntry } from "../helpers/state.js";
import { withPriority } from "./email-stats.js";

export const PRIORITY_RANK: Record<Priority, number> = { urgent: 0, high: 1, medium: 2, low: 3 };

export const ANALYTICS_WINDOWS = { day: 1, week: 7, month: 30 } as const;
export type AnalyticsTimeframe = keyof typeof ANALYTICS_WINDOWS;

const DAY_MS = 24 * 60 * 60 * 1000;

export type PendingFollowUp = {
  thread_id: string;
  items: FollowUpItem[];
  created_at: string;
  priority: Priority;
};

export type NotFound = { error: string };

export type EmailSummary = {
  thread: ThreadRecord;
  stats: EmailStats | null;
  follow_ups: FollowUpRecord | null;
  priority: Priority;
  drafts: Record<string, DraftRecord>;
};

export type ContactThread = {
  thread_id: string;
  stats: EmailStats | null;
  last_interaction: string | null;
  priority: Priority;
};

export type PriorityDistribution = Record<Priority, number>;

export type ContactHistory = {
  contact: ContactRecord;
  threads: ContactThread[];
  interaction_summary: {
    total_threads: number;
    pending_follow_ups: number;
    priority_distribution: PriorityDistribution;
  };
};

export type EmailAnalytics = {
  timeframe: AnalyticsTimeframe;
  cutoff: string;
  total_threads: number;
  priority_distribution: PriorityDistribution;
  pending_follow_ups: number;
  completed_follow_ups: number;
  topics: string[];
  sentiment_summary: string[];
};

function priorityOf(state: EmailState, threadId: string): Priority {
  return ownEntry(state.priorities, threadId) ?? DEFAULT_PRIORITY;
}

function emptyDistribution(): PriorityDistribution {
  return { urgent: 0, high: 0, medium: 0, low: 0 };
}

function toMillis(timestamp: string): number {
  const ms = Date.parse(timestamp);
  return Number.isNaN(ms) ? 0 : ms;
}

export function isAnalyticsTimeframe(value: string): value is AnalyticsTimeframe {
  return Object.hasOwn(ANALYTICS_WINDOWS, value);
}

/**
 * Pending follow-ups, most urgent first. Ties on priority fall back to creation time,
 * oldest first.
 */
export function listPendingFollowUps(state: EmailState): PendingFollowUp[] {
  const pending: PendingFollowUp[] = [];
  for (const [threadId, record] of Object.entries(state.follow_ups)) {
    if (record.status !== "pending") continue;
    pending.push({
      thread_id: threadId,
      items: record.items,
      created_at: record.created_at,
      priority: priorityOf(state, threadId),
    });
  }
  return pending.sort(
    (a, b) => PRIORITY_RANK[a.priority] - PRIORITY_RANK[b.priority] || toMillis(a.created_at) - toMillis(b.created_at)
  );
}

export function summarizeThread(state: EmailState, threadId: string): EmailSummary | NotFound {
  const thread = ownEntry(state.email_threads, threadId);
  if (!thread) return { error: "Thread not found" };

  const drafts: Record<string, DraftRecord> = {};
  for (const [draftId, draft] of Object.entries(state.drafts)) {
    if (draft.kind === "response" && draft.thread_id === threadId) drafts[draftId] = draft;
  }

  return {
    thread,
    stats: ownEntry(state.email_stats, threadId) ?? null,
    follow_ups: ownEntry(state.follow_ups, threadId) ?? null,
    priority: priorityOf(state, threadId),
    drafts,
  };
}

export function contactHistory(state: EmailState, contactId: string): ContactHistory | NotFound {
  const contact = ownEntry(state.contacts, contactId);
  if (!contact) return { error: "Contact not found" };

  const threads: ContactThread[] = [];
  for (const [threadId, thread] of Object.entries(state.email_threads)) {
    if (!thread.participants.includes(contactId)) continue;
    const stats = ownEntry(state.email_stats, threadId) ?? null;
    threads.push({
      thread_id: threadId,
      stats,
      last_interaction: thread.last_interaction ?? stats?.last_interaction ?? null,
      priority: priorityOf(state, threadId),
    });
  }

  const distribution = emptyDistribution();
  for (const thread of threads) distribution[thread.priority] += 1;

  return {
    contact,
    threads,
    interaction_summary: {
      total_threads: threads.length,
      pending_follow_ups: threads.filter(
        (t) => ownEntry(state.follow_ups, t.thread_id)?.status === "pending"
      ).length,
      priority_distribution: distribution,
    },
  };
}

/**
 * Aggregate the threads active within the window. A thread counts when its stats were
 * touched at or after the cutoff; only sentiments recorded since the cutoff are listed.
 */
export function computeAnalytics(state: EmailState, timeframe: string, now: Date): EmailAnalytics {
  if (!isAnalyticsTimeframe(timeframe)) {
    throw new InvalidArgumentError(
      `Invalid timeframe "${timeframe}". Expected one of: ${Object.keys(ANALYTICS_WINDOWS).join(", ")}`
    );
  }

  const cutoffMs = now.getTime() - ANALYTICS_WINDOWS[timeframe] * DAY_MS;
  const analytics: EmailAnalytics = {
    timeframe,
    cutoff: new Date(cutoffMs).toISOString(),
    total_threads: 0,
    priority_distribution: emptyDistribution(),
    pending_follow_ups: 0,
    completed_follow_ups: 0,
    topics: [],
    sentiment_summary: [],
  };

  const topics = new Set<string>();
  for (const [threadId, stats] of Object.entries(state.email_stats)) {
    if (toMillis(stats.last_interaction) < cutoffMs) continue;

    analytics.total_threads += 1;
    analytics.priority_distribution[priorityOf(state, threadId)] += 1;
    stats.topics.forEach((topic) => topics.add(topic));

    const followUp = ownEntry(state.follow_ups, threadId);
    if (followUp?.status === "pending") analytics.pending_follow_ups += 1;
    else if (followUp) analytics.completed_follow_ups += 1;

    for (const entry of stats.sentiment_history) {
      if (toMillis(entry.timestamp) >= cutoffMs) analytics.sentiment_summary.push(entry.sentiment);
    }
  }

  analytics.topics = [...topics].sort();
  return analytics;
}

/**
 * Mark a whole follow-up record, or one item of it, as completed. Unknown threads and
 * item ids leave the state as it was. Completing the last open item closes the record.
 */
export function completeFollowUp(
  state: EmailState,
  threadId: string,
  followUpId: string | undefined,
  now: string
): Pick<EmailState, "follow_ups"> {
  const record = ownEntry(state.follow_ups, threadId);
  if (!record) return { follow_ups: state.follow_ups };

  if (followUpId === undefined) {
    return {
      follow_ups: { ...state.follow_ups, [threadId]: { ...record, status: "completed", completed_at: now } },
    };
  }

  if (!record.items.some((item) => item.id === followUpId)) return { follow_ups: state.follow_ups };

  const items = record.items.map((item): FollowUpItem =>
    item.id === followUpId ? { ...item, status: "completed", completed_at: now } : item
  );
  const allDone = items.every((item) => item.status === "completed");
  const next: FollowUpRecord = allDone ? { ...record, items, status: "completed", completed_at: now } : { ...record, items };
  return { follow_ups: { ...state.follow_ups, [threadId]: next } };
}

// Explicit updates are strict: no trimming or case folding, unlike generated text.
export function parsePriority(value: unknown): Priority {
  const result = PrioritySchema.safeParse(value);
  if (!result.success) {
    throw new InvalidArgumentError(
      `Invalid priority ${JSON.stringify(value)}. Expected one of: ${PRIORITY_LEVELS.join(", ")}`
    );
  }
  return result.data;
}

export function applyPriorityUpdate(
  state: EmailState,
  threadId: string,
  priority: Priority,
  now: string
): Pick<EmailState, "priorities" | "email_stats"> {
  const stats = ownEntry(state.email_stats, threadId);
  return {
    priorities: { ...state.priorities, [threadId]: priority },
    email_stats: stats ? { ...state.email_stats, [threadId]: withPriority(stats, priority, now) } : state.email_stats,
  };
}
