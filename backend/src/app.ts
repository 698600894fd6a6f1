import cors from "cors";
import express from "express";
import { z, ZodError } from "zod";
import { config } from "./config.js";
import { RunInProgressError } from "./lib/errors.js";
import { logger } from "./lib/logger.js";
import type { TrackerStore } from "./lib/store.js";
import { getApplicationDetail, listApplications } from "./services/applicationService.js";
import type { SyncCoordinator } from "./services/syncService.js";
import { APPLICATION_STAGES } from "./types.js";

export interface AppDeps {
  store: TrackerStore;
  coordinator: SyncCoordinator;
  allowedOrigins?: readonly string[];
}

const asyncHandler =
  <T extends express.RequestHandler>(handler: T): express.RequestHandler =>
    async (req, res, next) => {
      try {
        await handler(req, res, next);
      } catch (error) {
        next(error);
      }
    };

const queryBoolean = z.enum(["true", "false"]).transform((value) => value === "true");

const runSchema = z.object({
  initial: z.boolean().optional(),
});

const applicationsQuerySchema = z.object({
  stage: z.enum(APPLICATION_STAGES).optional(),
  company: z.string().trim().min(1).optional(),
});

const skipsQuerySchema = z.object({
  permanent: queryBoolean.optional(),
});

const runsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(20),
});

export const createApp = (deps: AppDeps): express.Express => {
  const app = express();
  const allowedOrigins = new Set(deps.allowedOrigins ?? config.CORS_ORIGINS);

  app.use(
    cors({
      origin: (origin, callback) => {
        if (!origin || allowedOrigins.has(origin)) {
          callback(null, true);
          return;
        }

        callback(null, false);
      },
      credentials: false,
    }),
  );

  app.use(express.json({ limit: "1mb" }));

  app.get("/api/health", (_req, res) => {
    res.json({ ok: true, service: "inbox-application-tracker", syncRunning: deps.coordinator.isRunning });
  });

  app.post(
    "/api/sync/run",
    asyncHandler(async (req, res) => {
      const body = runSchema.parse(req.body ?? {});
      const summary = await deps.coordinator.run(body.initial ?? false);
      res.json(summary);
    }),
  );

  app.get("/api/applications", (req, res) => {
    const query = applicationsQuerySchema.parse(req.query);
    res.json(listApplications(deps.store, query));
  });

  app.get("/api/applications/:id", (req, res) => {
    const detail = getApplicationDetail(deps.store, String(req.params.id));
    if (!detail) {
      res.status(404).json({ error: "Application not found" });
      return;
    }
    res.json(detail);
  });

  app.get("/api/skips", (req, res) => {
    const query = skipsQuerySchema.parse(req.query);
    res.json(deps.store.listSkips(query.permanent === undefined ? {} : { permanent: query.permanent }));
  });

  app.delete("/api/skips/:messageId", (req, res) => {
    const messageId = String(req.params.messageId);
    if (!deps.store.deleteSkip(messageId)) {
      res.status(404).json({ error: "Skip entry not found" });
      return;
    }
    logger.info("Skip decision cleared", { messageId });
    res.status(204).end();
  });

  app.get("/api/runs", (req, res) => {
    const query = runsQuerySchema.parse(req.query);
    res.json(deps.store.listRunSummaries(query.limit));
  });

  app.use((error: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (error instanceof ZodError) {
      res.status(400).json({ error: "Invalid request", issues: error.issues.map((issue) => issue.message) });
      return;
    }
    if (error instanceof RunInProgressError) {
      res.status(409).json({ error: error.message });
      return;
    }
    logger.error("Unhandled API error", error);
    const message = error instanceof Error ? error.message : "Unexpected server error";
    res.status(500).json({ error: message });
  });

  return app;
};
