import type { EmailState, TaskLabel } from "../../state.js";

// Short labels a model tends to answer with, mapped to their canonical task.
export const TASK_SYNONYMS: Record<string, TaskLabel> = {
  compose: "compose_email",
  analyze: "analyze_email",
  summarize: "summarize_email",
  respond: "generate_response",
};

// Tasks with a dedicated stage; everything else goes straight to the response stage.
export const BRANCH_TASKS = ["compose_email", "analyze_email", "summarize_email"] as const;
export type BranchTask = (typeof BRANCH_TASKS)[number];
export type RouteDestination = BranchTask | "generate_response";

export function canonicalizeTask(raw: string): string {
  const label = raw.trim().toLowerCase();
  return Object.hasOwn(TASK_SYNONYMS, label) ? TASK_SYNONYMS[label] : label;
}

function isBranchTask(task: string): task is BranchTask {
  return BRANCH_TASKS.some((candidate) => candidate === task);
}

// Conditional edge out of route_request.
export function routeByTask(state: Pick<EmailState, "current_task">): RouteDestination {
  return isBranchTask(state.current_task) ? state.current_task : "generate_response";
}
