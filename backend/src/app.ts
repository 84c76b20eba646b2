import express from "express";
import type { Express, Request, Response } from "express";
import { errorHandler, notFoundHandler } from "./middleware/errorHandler.ts";
import { createApplicantsRouter } from "./routes/applicants.ts";
import { createDashboardRouter } from "./routes/dashboard.ts";
import { createSettingsRouter } from "./routes/settings.ts";
import { createTemplatesRouter } from "./routes/templates.ts";
import type { AppServices } from "./services/index.ts";

export interface AppOptions {
  uploadMaxBytes: number;
}

export function createApp(services: AppServices, options: AppOptions): Express {
  const app = express();

  app.use(express.json({ limit: "1mb" }));

  app.get("/health", (_req: Request, res: Response) => {
    res.status(200).json({ status: "ok" });
  });

  app.use("/api/applicants", createApplicantsRouter(services, { uploadMaxBytes: options.uploadMaxBytes }));
  app.use("/api/templates", createTemplatesRouter(services));
  app.use("/api/settings", createSettingsRouter(services));
  app.use("/api/dashboard", createDashboardRouter(services));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
