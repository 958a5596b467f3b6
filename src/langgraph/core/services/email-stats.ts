import type { EmailStats, Priority } from "../../state.js";

export function createEmailStats(now: string): EmailStats {
  return {
    interaction_count: 0,
    last_interaction: now,
    topics: [],
    sentiment_history: [],
    priority_history: [],
    action_items: [],
    deadlines: [],
  };
}

// Union in first-seen order; existing topics are never dropped.
export function unionTopics(existing: string[], incoming: string[]): string[] {
  const merged = Array.from(new Set(existing));
  const seen = new Set(merged);
  for (const topic of incoming) {
    if (!seen.has(topic)) {
      seen.add(topic);
      merged.push(topic);
    }
  }
  return merged;
}

export function withSentiment(stats: EmailStats, sentiment: string | undefined, now: string): EmailStats {
  if (sentiment === undefined) return stats;
  return { ...stats, sentiment_history: [...stats.sentiment_history, { timestamp: now, sentiment }] };
}

export function withPriority(stats: EmailStats, priority: Priority, now: string): EmailStats {
  return { ...stats, priority_history: [...stats.priority_history, { timestamp: now, priority }] };
}
