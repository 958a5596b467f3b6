import crypto from "node:crypto";
import type { EmailState } from "../../state.js";
import { EmailStateSchema } from "../../state.js";

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export function nowIso(clock: Clock): string {
  return clock().toISOString();
}

export function createDraftId(): string {
  return `draft_${crypto.randomUUID()}`;
}

// Assistant settings every new session starts from.
export const DEFAULT_CONTEXT: Record<string, unknown> = {
  preferences: {},
  history: [],
  email_settings: {
    signature: "",
    default_tone: "professional",
    priority_rules: {},
    follow_up_preferences: {
      default_timeline: "3 days",
      urgent_timeline: "24 hours",
      reminder_frequency: "daily",
    },
  },
};

export function createInitialState(params?: { context?: Record<string, unknown> }): EmailState {
  return EmailStateSchema.parse({
    context: { ...structuredClone(DEFAULT_CONTEXT), ...(params?.context ?? {}) },
  });
}

// Id-keyed records are plain objects: ids such as "constructor" must not resolve to
// inherited members.
export function ownEntry<T>(record: Record<string, T>, key: string): T | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}

export function lastMessageContent(state: EmailState, role?: EmailState["messages"][number]["role"]): string {
  for (let i = state.messages.length - 1; i >= 0; i--) {
    const m = state.messages[i];
    if (!role || m.role === role) return m.content;
  }
  return "";
}
