import * as z from "zod";
import type { FollowUpItem, FollowUpRecord, Priority } from "../../state.js";
import { PrioritySchema } from "../../state.js";

// Models often wrap JSON in a fenced block; take the fenced body when present.
export function extractJsonText(raw: string): string {
  const fenced = raw.match(/```(?:json)?\s*([\s\S]*?)```/i);
  return (fenced ? fenced[1] : raw).trim();
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse generated text as a JSON object. Arrays, scalars and invalid JSON all yield null.
 */
export function parseJsonObject(raw: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(extractJsonText(raw));
    return isPlainObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

const StringListSchema = z.union([z.array(z.unknown()), z.string()]).transform((value) =>
  (Array.isArray(value) ? value : [value])
    .filter((entry): entry is string => typeof entry === "string")
    .map((entry) => entry.trim())
    .filter(Boolean)
);

const SentimentSchema = z.union([z.string().min(1), z.number()]).transform(String);

// Fields that fail validation are dropped rather than failing the whole reply.
export const ContextUpdateSchema = z
  .object({
    thread_id: z.string().min(1).optional().catch(undefined),
    topics: StringListSchema.optional().catch(undefined),
    sentiment: SentimentSchema.optional().catch(undefined),
    follow_ups: z.record(z.unknown()).optional().catch(undefined),
    priorities: z.record(z.unknown()).optional().catch(undefined),
  })
  .passthrough();

export const AnalysisReplySchema = z
  .object({
    thread_id: z.string().min(1).optional().catch(undefined),
    topics: StringListSchema.optional().catch(undefined),
    sentiment: SentimentSchema.optional().catch(undefined),
    priority: z.unknown().optional(),
    action_items: z.array(z.unknown()).optional().catch(undefined),
    deadlines: z.array(z.unknown()).optional().catch(undefined),
    follow_ups: z.unknown().optional(),
    suggested_templates: z.record(z.unknown()).optional().catch(undefined),
  })
  .passthrough();

export type ContextUpdate = z.infer<typeof ContextUpdateSchema>;
export type AnalysisReply = z.infer<typeof AnalysisReplySchema>;

export type ParsedReply<T> = { fields: Record<string, unknown>; reply: T };

export function parseContextUpdate(raw: string): ParsedReply<ContextUpdate> | null {
  const fields = parseJsonObject(raw);
  if (!fields) return null;
  return { fields, reply: ContextUpdateSchema.parse(fields) };
}

export function parseAnalysisReply(raw: string): ParsedReply<AnalysisReply> | null {
  const fields = parseJsonObject(raw);
  if (!fields) return null;
  return { fields, reply: AnalysisReplySchema.parse(fields) };
}

/**
 * Accepts a priority embedded in generated text. Case and surrounding whitespace are
 * forgiven; anything outside the four levels is rejected.
 */
export function normalizePriority(value: unknown): Priority | null {
  if (typeof value !== "string") return null;
  const result = PrioritySchema.safeParse(value.trim().toLowerCase());
  return result.success ? result.data : null;
}

export function validatePriorityMap(raw: Record<string, unknown>): {
  accepted: Record<string, Priority>;
  rejected: string[];
} {
  const accepted: Record<string, Priority> = {};
  const rejected: string[] = [];
  for (const [threadId, value] of Object.entries(raw)) {
    const priority = normalizePriority(value);
    if (priority) accepted[threadId] = priority;
    else rejected.push(threadId);
  }
  return { accepted, rejected };
}

const DESCRIPTION_KEYS = ["description", "task", "item", "text", "title", "action"];

function describeItem(entry: Record<string, unknown>): string {
  for (const key of DESCRIPTION_KEYS) {
    const value = entry[key];
    if (typeof value === "string" && value.trim()) return value.trim();
  }
  return JSON.stringify(entry);
}

/**
 * Normalize generated follow-up items. Items without an id get `<threadId>-<position>`
 * so they can be completed individually later.
 */
export function normalizeFollowUpItems(threadId: string, raw: unknown): FollowUpItem[] {
  if (raw === undefined || raw === null) return [];
  const entries: unknown[] = Array.isArray(raw) ? raw : [raw];
  const items: FollowUpItem[] = [];
  entries.forEach((entry, index) => {
    const fallbackId = `${threadId}-${index + 1}`;
    if (typeof entry === "string") {
      if (entry.trim()) items.push({ id: fallbackId, description: entry.trim(), status: "pending" });
      return;
    }
    if (isPlainObject(entry)) {
      const id = typeof entry.id === "string" || typeof entry.id === "number" ? String(entry.id) : fallbackId;
      items.push({
        id,
        description: describeItem(entry),
        status: entry.status === "completed" ? "completed" : "pending",
      });
    }
  });
  return items;
}

// A follow-up value from context analysis: either a full record or just its items.
export function normalizeFollowUpRecord(threadId: string, raw: unknown, now: string): FollowUpRecord {
  if (isPlainObject(raw) && "items" in raw) {
    return {
      items: normalizeFollowUpItems(threadId, raw.items),
      created_at: typeof raw.created_at === "string" ? raw.created_at : now,
      status: raw.status === "completed" ? "completed" : "pending",
    };
  }
  return { items: normalizeFollowUpItems(threadId, raw), created_at: now, status: "pending" };
}

export function stringEntries(raw: Record<string, unknown>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === "string") result[key] = value;
  }
  return result;
}
