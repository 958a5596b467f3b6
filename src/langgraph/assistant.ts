import { EmailStateSchema, type EmailState } from "./state.js";
import { buildEmailGraph, runTurn, type CompiledEmailGraph } from "./graph.js";
import { createInitialState, nowIso, systemClock, type Clock } from "./core/helpers/state.js";
import { mergeEmailContext, parseEmailContext } from "./core/helpers/email-context.js";
import { AssistantBusyError, InvalidArgumentError } from "./core/errors/index.js";
import type { GenerationClient } from "./core/services/ai/generation-client.js";
import {
  applyPriorityUpdate,
  completeFollowUp,
  computeAnalytics,
  contactHistory,
  listPendingFollowUps,
  parsePriority,
  summarizeThread,
  type ContactHistory,
  type EmailAnalytics,
  type EmailSummary,
  type NotFound,
  type PendingFollowUp,
} from "./core/services/insights.js";

export type EmailAssistantOptions = {
  client?: GenerationClient;
  clock?: Clock;
  flowPath?: string;
  // Prebuilt graph, shared between assistants; client/clock/flowPath are then ignored.
  graph?: CompiledEmailGraph;
  initialContext?: Record<string, unknown>;
};

/**
 * Long-lived owner of one session's state. Each request runs the graph on a parsed
 * copy of the committed state and commits the result once the run completes.
 *
 * Requests are serialized: `handleRequest` and `runExclusive` share one queue. The
 * synchronous mutations refuse to run while a request is in flight.
 */
export class EmailAssistant {
  private state: EmailState;
  private readonly graph: CompiledEmailGraph;
  private readonly clock: Clock;
  private queue: Promise<void> = Promise.resolve();
  private running = false;

  constructor(options: EmailAssistantOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.graph =
      options.graph ??
      buildEmailGraph({ client: options.client, clock: this.clock, flowPath: options.flowPath });
    this.state = createInitialState({ context: options.initialContext });
  }

  get isBusy(): boolean {
    return this.running;
  }

  /**
   * Process one user request and return the assistant's reply. Email context is
   * validated before anything is queued; a bad context rejects without touching state.
   */
  async handleRequest(userInput: string, emailContext?: unknown): Promise<string> {
    if (!userInput.trim()) {
      throw new InvalidArgumentError("userInput must be a non-empty string.");
    }
    const context = emailContext === undefined ? null : parseEmailContext(emailContext);

    return this.enqueue(async () => {
      const working: EmailState = EmailStateSchema.parse({
        ...this.state,
        ...(context ? mergeEmailContext(this.state, context) : {}),
      });

      this.running = true;
      try {
        this.state = await runTurn(this.graph, working, userInput);
      } finally {
        this.running = false;
      }
      return this.state.messages.at(-1)?.content ?? "";
    });
  }

  /**
   * Queue `fn` behind any in-flight request. Mutations made inside `fn` are safe.
   */
  runExclusive<T>(fn: (assistant: EmailAssistant) => T | Promise<T>): Promise<T> {
    return this.enqueue(async () => fn(this));
  }

  getPendingFollowUps(): PendingFollowUp[] {
    return structuredClone(listPendingFollowUps(this.state));
  }

  getEmailSummary(threadId: string): EmailSummary | NotFound {
    return structuredClone(summarizeThread(this.state, threadId));
  }

  getContactHistory(contactId: string): ContactHistory | NotFound {
    return structuredClone(contactHistory(this.state, contactId));
  }

  getEmailAnalytics(timeframe: string = "week"): EmailAnalytics {
    return computeAnalytics(this.state, timeframe, this.clock());
  }

  markFollowUpComplete(threadId: string, followUpId?: string): void {
    this.assertIdle("markFollowUpComplete");
    this.state = { ...this.state, ...completeFollowUp(this.state, threadId, followUpId, nowIso(this.clock)) };
  }

  updateEmailPriority(threadId: string, priority: string): void {
    const level = parsePriority(priority);
    this.assertIdle("updateEmailPriority");
    this.state = { ...this.state, ...applyPriorityUpdate(this.state, threadId, level, nowIso(this.clock)) };
  }

  // Snapshot of the committed state.
  getState(): EmailState {
    return structuredClone(this.state);
  }

  private assertIdle(operation: string): void {
    if (this.running) throw new AssistantBusyError(operation);
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    // Keep the chain alive after a failure; the caller still sees the rejection through `run`.
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
