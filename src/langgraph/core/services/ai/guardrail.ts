import type { GenerationClient, GenerationRequest } from "./generation-client.js";

export type SkipReason = "generation_error" | "empty_reply" | "parse_fail";

/**
 * Result of one guarded generation call. `applied` carries the parsed value; `skipped`
 * says why the stage left state alone. Both keep the raw reply for diagnostics.
 */
export type StageOutcome<T> =
  | { status: "applied"; value: T; raw: string }
  | { status: "skipped"; reason: SkipReason; raw: string; error?: string };

export type GuardedGenerationParams<T> = {
  client: GenerationClient;
  request: GenerationRequest;
  parse: (raw: string) => T | null;
};

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Invoke the generation client and parse its reply without letting a failure escape:
 * client errors, empty replies and unparseable text all become a `skipped` outcome.
 *
 * @returns The parsed value, or the reason the reply was not usable.
 */
export async function generateWithGuardrail<T>(params: GuardedGenerationParams<T>): Promise<StageOutcome<T>> {
  const { client, request, parse } = params;

  let raw: string;
  try {
    raw = await client.generate(request);
  } catch (error) {
    const message = errorMessage(error);
    console.error(`[${request.runName}] generation failed: ${message}`);
    return { status: "skipped", reason: "generation_error", raw: "", error: message };
  }

  if (!raw.trim()) {
    console.warn(`[${request.runName}] empty reply, skipping state update`);
    return { status: "skipped", reason: "empty_reply", raw };
  }

  let value: T | null;
  try {
    value = parse(raw);
  } catch (error) {
    console.warn(`[${request.runName}] failed to parse reply: ${errorMessage(error)}`);
    return { status: "skipped", reason: "parse_fail", raw, error: errorMessage(error) };
  }
  if (value === null) {
    console.warn(`[${request.runName}] reply is not in the expected shape, skipping state update`);
    return { status: "skipped", reason: "parse_fail", raw };
  }
  return { status: "applied", value, raw };
}

// Audit label written to reason_trace, e.g. "analyze_email:ok" or "analyze_email:parse_fail".
export function outcomeLabel(stage: string, outcome: StageOutcome<unknown>): string {
  return outcome.status === "applied" ? `${stage}:ok` : `${stage}:${outcome.reason}`;
}
