import { Router } from "express";
import { sendError } from "../middleware/errorHandler.ts";
import type { AppServices } from "../services/index.ts";

export function createSettingsRouter(services: AppServices): Router {
  const router = Router();

  router.get("/", async (_req, res) => {
    try {
      res.json(await services.settings.get());
    } catch (error) {
      sendError(res, error, "Failed to fetch settings");
    }
  });

  router.put("/", async (req, res) => {
    try {
      res.json(await services.settings.update(req.body ?? {}));
    } catch (error) {
      sendError(res, error, "Failed to save settings");
    }
  });

  return router;
}
