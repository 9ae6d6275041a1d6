import cors from "cors";
import express from "express";
import type { Express, RequestHandler } from "express";
import { v4 as uuidv4 } from "uuid";
import type { AnswerResponse, AnswerResult } from "@healthdesk/shared";
import type { AgentFacade } from "./agentFacade.js";
import { AnswerRequestSchema, DoctorRecordSchema, firstIssue } from "./validation/schemas.js";

export function createApp(facade: AgentFacade): Express {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "1mb" }));

  app.use((req, res, next) => {
    const requestId = req.header("x-request-id") || uuidv4();
    res.setHeader("x-request-id", requestId);
    res.locals.requestId = requestId;
    next();
  });

  app.get("/api/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.get("/api/status", (_req, res) => {
    res.json({ state: facade.state, credentials: facade.credentialsStatus() });
  });

  app.get("/api/workflow", (_req, res) => {
    res.json({ description: facade.workflowDescription() });
  });

  app.get("/api/doctors", (_req, res) => {
    res.json({ doctors: facade.listDoctors() });
  });

  app.post("/api/doctors", (req, res) => {
    const parsed = DoctorRecordSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: firstIssue(parsed.error) });
    }
    return res.status(201).json({ doctor: facade.addDoctor(parsed.data) });
  });

  app.get("/api/examples", (_req, res) => {
    res.json({ examples: facade.exampleQuestions() });
  });

  const answerWith =
    (respond: (question: string) => Promise<AnswerResult>): RequestHandler =>
    async (req, res) => {
      const parsed = AnswerRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: firstIssue(parsed.error) });
      }

      const requestId = String(res.locals.requestId);
      const startedAt = Date.now();
      try {
        const result = await respond(parsed.data.question);
        const response: AnswerResponse = {
          ...result,
          metadata: {
            provider: facade.providerName,
            executionTimeMs: Date.now() - startedAt,
            requestId
          }
        };
        return res.json(response);
      } catch (error) {
        const message = error instanceof Error ? error.message : "Unknown error";
        return res.status(500).json({ error: message, requestId });
      }
    };

  app.post("/api/answer", answerWith((question) => facade.answer(question)));
  app.post("/api/answer/trace", answerWith((question) => facade.trace(question)));

  return app;
}
