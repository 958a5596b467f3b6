import * as z from "zod";
import { Annotation } from "@langchain/langgraph";

// Thread priority levels, most urgent first.
export const PRIORITY_LEVELS = ["urgent", "high", "medium", "low"] as const;
export const PrioritySchema = z.enum(PRIORITY_LEVELS);
export type Priority = z.infer<typeof PrioritySchema>;

export const DEFAULT_PRIORITY: Priority = "medium";

// Canonical task labels the router may select.
export const TASK_LABELS = ["compose_email", "analyze_email", "summarize_email", "generate_response"] as const;
export type TaskLabel = (typeof TASK_LABELS)[number];

export const ChatTurnSchema = z.object({
  role: z.enum(["user", "assistant", "system"]),
  content: z.string(),
});

const ThreadMessageSchema = z.object({
  from: z.string().optional(),
  to: z.array(z.string()).optional(),
  content: z.string(),
  timestamp: z.string().optional(),
});

export const ThreadRecordSchema = z.object({
  subject: z.string().default(""),
  messages: z.array(ThreadMessageSchema).default([]),
  participants: z.array(z.string()).default([]),
  last_interaction: z.string().nullable().default(null),
});

export const ContactRecordSchema = z.object({
  name: z.string(),
  role: z.string().nullable().default(null),
  email: z.string().nullable().default(null),
  previous_interactions: z.array(z.string()).default([]),
});

const FollowUpStatusSchema = z.enum(["pending", "completed"]);

export const FollowUpItemSchema = z.object({
  id: z.string(),
  description: z.string(),
  status: FollowUpStatusSchema.default("pending"),
  completed_at: z.string().optional(),
});

export const FollowUpRecordSchema = z.object({
  items: z.array(FollowUpItemSchema).default([]),
  created_at: z.string(),
  status: FollowUpStatusSchema.default("pending"),
  completed_at: z.string().optional(),
});

export const EmailStatsSchema = z.object({
  interaction_count: z.number().int().min(0).default(0),
  last_interaction: z.string(),
  // Set semantics: only ever grows.
  topics: z.array(z.string()).default([]),
  sentiment_history: z.array(z.object({ timestamp: z.string(), sentiment: z.string() })).default([]),
  priority_history: z.array(z.object({ timestamp: z.string(), priority: PrioritySchema })).default([]),
  action_items: z.array(z.unknown()).default([]),
  deadlines: z.array(z.unknown()).default([]),
});

const AnalysisRecordSchema = z.record(z.unknown());

export const DraftRecordSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("composed"),
    content: z.string(),
    context: z.record(z.unknown()),
    created_at: z.string(),
  }),
  z.object({
    kind: z.literal("response"),
    content: z.string(),
    context: z.record(z.unknown()),
    analysis: AnalysisRecordSchema.nullable(),
    thread_id: z.string().nullable(),
    created_at: z.string(),
    status: z.literal("draft"),
  }),
]);

const MemorySchema = z.object({
  analysis: AnalysisRecordSchema.optional(),
  summary: z.string().optional(),
});

// Full session state threaded through every stage of the graph.
export const EmailStateSchema = z.object({
  messages: z.array(ChatTurnSchema).default([]),
  context: z.record(z.unknown()).default({}),
  current_task: z.string().default(""),
  memory: MemorySchema.default({}),
  email_threads: z.record(ThreadRecordSchema).default({}),
  contacts: z.record(ContactRecordSchema).default({}),
  drafts: z.record(DraftRecordSchema).default({}),
  tags: z.record(z.array(z.string())).default({}),
  follow_ups: z.record(FollowUpRecordSchema).default({}),
  priorities: z.record(PrioritySchema).default({}),
  response_templates: z.record(z.string()).default({}),
  email_stats: z.record(EmailStatsSchema).default({}),
  reason_trace: z.array(z.string()).default([]),
});

export type ChatTurn = z.infer<typeof ChatTurnSchema>;
export type ThreadRecord = z.infer<typeof ThreadRecordSchema>;
export type ContactRecord = z.infer<typeof ContactRecordSchema>;
export type FollowUpItem = z.infer<typeof FollowUpItemSchema>;
export type FollowUpRecord = z.infer<typeof FollowUpRecordSchema>;
export type EmailStats = z.infer<typeof EmailStatsSchema>;
export type AnalysisRecord = z.infer<typeof AnalysisRecordSchema>;
export type DraftRecord = z.infer<typeof DraftRecordSchema>;
export type EmailMemory = z.infer<typeof MemorySchema>;
export type EmailState = z.infer<typeof EmailStateSchema>;

// What a stage hands back to the graph; LangGraph applies it to the running state.
export type EmailStateUpdate = Partial<EmailState>;

/**
 * Channel with last-write-wins semantics. Each stage returns fresh copies of the
 * slices it touches, so replacing the whole slice is all the graph needs to do.
 */
function lastWrite<T>(initial: () => T) {
  return Annotation<T>({
    reducer: (left: T, right: T) => right ?? left,
    default: initial,
  });
}

export const EmailStateAnnotation = Annotation.Root({
  messages: lastWrite<EmailState["messages"]>(() => []),
  context: lastWrite<EmailState["context"]>(() => ({})),
  current_task: lastWrite<string>(() => ""),
  memory: lastWrite<EmailMemory>(() => ({})),
  email_threads: lastWrite<EmailState["email_threads"]>(() => ({})),
  contacts: lastWrite<EmailState["contacts"]>(() => ({})),
  drafts: lastWrite<EmailState["drafts"]>(() => ({})),
  tags: lastWrite<EmailState["tags"]>(() => ({})),
  follow_ups: lastWrite<EmailState["follow_ups"]>(() => ({})),
  priorities: lastWrite<EmailState["priorities"]>(() => ({})),
  response_templates: lastWrite<EmailState["response_templates"]>(() => ({})),
  email_stats: lastWrite<EmailState["email_stats"]>(() => ({})),
  reason_trace: lastWrite<string[]>(() => []),
});

export type EmailGraphState = typeof EmailStateAnnotation.State;
export type EmailGraphUpdate = typeof EmailStateAnnotation.Update;
