import { Router } from "express";
import { sendError } from "../middleware/errorHandler.ts";
import type { AppServices } from "../services/index.ts";

export function createDashboardRouter(services: AppServices): Router {
  const router = Router();

  router.get("/", async (_req, res) => {
    try {
      res.json(await services.dashboard.summary());
    } catch (error) {
      sendError(res, error, "Failed to build dashboard");
    }
  });

  return router;
}
