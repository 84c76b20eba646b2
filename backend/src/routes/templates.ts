import { Router } from "express";
import { sendError } from "../middleware/errorHandler.ts";
import type { AppServices } from "../services/index.ts";

export function createTemplatesRouter(services: AppServices): Router {
  const router = Router();
  const { templates } = services;

  router.get("/", async (_req, res) => {
    try {
      res.json(await templates.list());
    } catch (error) {
      sendError(res, error, "Failed to fetch templates");
    }
  });

  router.post("/", async (req, res) => {
    try {
      res.status(201).json(await templates.create(req.body ?? {}));
    } catch (error) {
      sendError(res, error, "Failed to create template");
    }
  });

  router.get("/:id", async (req, res) => {
    try {
      res.json(await templates.get(req.params.id));
    } catch (error) {
      sendError(res, error, "Failed to fetch template");
    }
  });

  router.put("/:id", async (req, res) => {
    try {
      res.json(await templates.update(req.params.id, req.body ?? {}));
    } catch (error) {
      sendError(res, error, "Failed to update template");
    }
  });

  router.delete("/:id", async (req, res) => {
    try {
      await templates.delete(req.params.id);
      res.json({ message: "Template deleted successfully" });
    } catch (error) {
      sendError(res, error, "Failed to delete template");
    }
  });

  return router;
}
