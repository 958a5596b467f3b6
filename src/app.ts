import crypto from "node:crypto";
import express, { type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import * as z from "zod";
import type { EmailAssistant } from "./langgraph/assistant.js";
import { AssistantBusyError, InvalidArgumentError } from "./langgraph/core/errors/index.js";
import { parseEmailContext } from "./langgraph/core/helpers/email-context.js";

const AssistBodySchema = z.object({
  message: z.string().trim().min(1, "Please provide a message."),
  sessionId: z.string().min(1).optional(),
  emailContext: z.unknown().optional(),
});

const CompleteFollowUpBodySchema = z.object({
  followUpId: z.string().min(1).optional(),
});

const PriorityBodySchema = z.object({
  priority: z.string(),
});

export type CreateAppOptions = {
  createAssistant: () => EmailAssistant;
};

function firstIssue(error: z.ZodError): string {
  return error.issues[0]?.message ?? "Invalid request body.";
}

function isNotFound(result: object): result is { error: string } {
  return "error" in result && typeof result.error === "string";
}

/**
 * HTTP surface over one EmailAssistant per session. Sessions live in memory for the
 * lifetime of the process.
 */
export function createApp(options: CreateAppOptions) {
  const app = express();
  const sessions = new Map<string, EmailAssistant>();

  app.use(cors());
  app.use(express.json());

  function requireSession(sessionId: string, res: Response): EmailAssistant | null {
    const assistant = sessions.get(sessionId);
    if (!assistant) {
      res.status(404).json({ error: "Session not found" });
      return null;
    }
    return assistant;
  }

  app.post("/assist", async (req: Request, res: Response, next: NextFunction) => {
    const body = AssistBodySchema.safeParse(req.body ?? {});
    if (!body.success) {
      res.status(400).json({ error: firstIssue(body.error) });
      return;
    }
    try {
      // A rejected context must not leave an empty session behind.
      const emailContext = body.data.emailContext === undefined ? undefined : parseEmailContext(body.data.emailContext);
      const sessionId = body.data.sessionId ?? crypto.randomUUID();
      let assistant = sessions.get(sessionId);
      if (!assistant) {
        assistant = options.createAssistant();
        sessions.set(sessionId, assistant);
      }
      const response = await assistant.handleRequest(body.data.message, emailContext);
      res.json({ response, sessionId });
    } catch (error) {
      next(error);
    }
  });

  app.get("/sessions/:sessionId/follow-ups", (req: Request<{ sessionId: string }>, res: Response) => {
    const assistant = requireSession(req.params.sessionId, res);
    if (!assistant) return;
    res.json({ followUps: assistant.getPendingFollowUps() });
  });

  app.get("/sessions/:sessionId/threads/:threadId", (req: Request<{ sessionId: string; threadId: string }>, res: Response) => {
    const assistant = requireSession(req.params.sessionId, res);
    if (!assistant) return;
    const summary = assistant.getEmailSummary(req.params.threadId);
    res.status(isNotFound(summary) ? 404 : 200).json(summary);
  });

  app.get("/sessions/:sessionId/contacts/:contactId", (req: Request<{ sessionId: string; contactId: string }>, res: Response) => {
    const assistant = requireSession(req.params.sessionId, res);
    if (!assistant) return;
    const history = assistant.getContactHistory(req.params.contactId);
    res.status(isNotFound(history) ? 404 : 200).json(history);
  });

  app.post(
    "/sessions/:sessionId/threads/:threadId/follow-ups/complete",
    async (req: Request<{ sessionId: string; threadId: string }>, res: Response, next: NextFunction) => {
      const assistant = requireSession(req.params.sessionId, res);
      if (!assistant) return;
      const body = CompleteFollowUpBodySchema.safeParse(req.body ?? {});
      if (!body.success) {
        res.status(400).json({ error: firstIssue(body.error) });
        return;
      }
      try {
        await assistant.runExclusive((a) => a.markFollowUpComplete(req.params.threadId, body.data.followUpId));
        res.status(204).end();
      } catch (error) {
        next(error);
      }
    }
  );

  app.put(
    "/sessions/:sessionId/threads/:threadId/priority",
    async (req: Request<{ sessionId: string; threadId: string }>, res: Response, next: NextFunction) => {
      const assistant = requireSession(req.params.sessionId, res);
      if (!assistant) return;
      const body = PriorityBodySchema.safeParse(req.body ?? {});
      if (!body.success) {
        res.status(400).json({ error: firstIssue(body.error) });
        return;
      }
      try {
        await assistant.runExclusive((a) => a.updateEmailPriority(req.params.threadId, body.data.priority));
        res.status(204).end();
      } catch (error) {
        next(error);
      }
    }
  );

  app.get("/sessions/:sessionId/analytics", (req: Request<{ sessionId: string }>, res: Response, next: NextFunction) => {
    const assistant = requireSession(req.params.sessionId, res);
    if (!assistant) return;
    const timeframe = typeof req.query.timeframe === "string" ? req.query.timeframe : "week";
    try {
      res.json(assistant.getEmailAnalytics(timeframe));
    } catch (error) {
      next(error);
    }
  });

  app.get("/test", (_req: Request, res: Response) => {
    res.json({ status: "Server is running" });
  });

  // Express recognizes error middleware by its four parameters.
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof InvalidArgumentError) {
      res.status(400).json({ error: error.message });
      return;
    }
    if (error instanceof AssistantBusyError) {
      res.status(409).json({ error: error.message });
      return;
    }
    console.error("Request error:", error);
    res.status(500).json({ error: error instanceof Error ? error.message : "Error processing request" });
  });

  return app;
}
