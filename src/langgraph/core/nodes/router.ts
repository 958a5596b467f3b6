import type { EmailState, EmailStateUpdate } from "../../state.js";
import { TASK_LABELS } from "../../state.js";
import { lastMessageContent } from "../helpers/state.js";
import { canonicalizeTask } from "../routing/routing-policy.js";
import { outcomeLabel } from "../services/ai/guardrail.js";
import { generateForStage, plainText, type StageContext } from "./stage-context.js";

// Classifies the latest message into one task label; routeByTask picks the branch.
export async function emailRouter(state: EmailState, ctx: StageContext): Promise<EmailStateUpdate> {
  const stage = ctx.binding.nodeId;
  const outcome = await generateForStage(
    ctx,
    {
      request: lastMessageContent(state),
      tasks: TASK_LABELS.join(", "),
    },
    plainText
  );

  // An unusable reply leaves the task empty, which the routing default sends to generate_response.
  const task = outcome.status === "applied" ? canonicalizeTask(outcome.value) : "";
  return {
    current_task: task,
    reason_trace: [...state.reason_trace, outcomeLabel(stage, outcome), `${stage}:task:${task || "none"}`],
  };
}
