import * as z from "zod";
import { ContactRecordSchema, ThreadRecordSchema, type EmailState } from "../../state.js";
import { InvalidArgumentError } from "../errors/index.js";

// Threads, contacts and labels the caller knows about, supplied with a request.
export const EmailContextSchema = z.object({
  threads: z.record(ThreadRecordSchema).default({}),
  contacts: z.record(ContactRecordSchema).default({}),
  tags: z.record(z.array(z.string())).default({}),
});

export type EmailContext = z.infer<typeof EmailContextSchema>;

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}

export function parseEmailContext(raw: unknown): EmailContext {
  const result = EmailContextSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new InvalidArgumentError(`Invalid email context: ${describeIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Threads and contacts replace the entry stored under the same id; a thread's tags
 * replace its label set (deduplicated, first occurrence kept).
 */
export function mergeEmailContext(
  state: EmailState,
  context: EmailContext
): Pick<EmailState, "email_threads" | "contacts" | "tags"> {
  const tags = { ...state.tags };
  for (const [threadId, labels] of Object.entries(context.tags)) {
    tags[threadId] = [...new Set(labels)];
  }
  return {
    email_threads: { ...state.email_threads, ...context.threads },
    contacts: { ...state.contacts, ...context.contacts },
    tags,
  };
}
