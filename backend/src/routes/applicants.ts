import { Router } from "express";
import multer from "multer";
import path from "path";
import { z } from "zod";
import { ValidationError, fromZodError } from "../errors.ts";
import { sendError } from "../middleware/errorHandler.ts";
import { parseCsv } from "../services/csvImport.ts";
import { composeEmail } from "../services/email.ts";
import type { AppServices } from "../services/index.ts";
import { buildOfferLetter } from "../services/offerLetter.ts";
import { applicantStatusSchema } from "../services/pipeline.ts";
import { collect } from "../utils/iterables.ts";

const CSV_MIME_TYPES = new Set(["text/csv", "application/csv", "application/vnd.ms-excel", "text/plain"]);

const listQuerySchema = z.object({
  status: applicantStatusSchema.optional(),
  search: z.string().trim().optional(),
  appliedFrom: z.coerce.date().optional(),
  appliedTo: z.coerce.date().optional(),
  interviewFrom: z.coerce.date().optional(),
  interviewTo: z.coerce.date().optional(),
  limit: z.coerce.number().int().positive().max(500).optional()
});

const statusBodySchema = z.object({ status: applicantStatusSchema });

const emailQuerySchema = z.object({
  templateId: z.string({ required_error: "templateId is required" }).min(1, "templateId is required")
});

export function createApplicantsRouter(services: AppServices, options: { uploadMaxBytes: number }): Router {
  const router = Router();
  const { store, settings, templates } = services;

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: options.uploadMaxBytes },
    fileFilter: (_req, file, cb) => {
      const ext = path.extname(file.originalname).toLowerCase();
      if (ext === ".csv" || CSV_MIME_TYPES.has(file.mimetype)) {
        cb(null, true);
      } else {
        cb(new ValidationError("Only CSV files can be imported"));
      }
    }
  });

  router.get("/", async (req, res) => {
    try {
      const parsed = listQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        throw fromZodError(parsed.error);
      }
      const applicants = await collect(store.listApplicants(parsed.data));
      res.json({ applicants, count: applicants.length });
    } catch (error) {
      sendError(res, error, "Failed to fetch applicants");
    }
  });

  router.post("/", async (req, res) => {
    try {
      const applicant = await store.createApplicant(req.body ?? {}, await settings.get());
      res.status(201).json(applicant);
    } catch (error) {
      sendError(res, error, "Failed to create applicant");
    }
  });

  router.post("/import", upload.single("file"), async (req, res) => {
    try {
      if (!req.file) {
        throw new ValidationError('A CSV file is required in the "file" field');
      }
      const rows = parseCsv(req.file.buffer);
      const report = await store.importApplicants(rows, await settings.get());
      res.json({
        imported: report.created.length,
        skipped: report.errors.length,
        applicants: report.created,
        errors: report.errors.map((rowError) => ({
          row: rowError.row,
          message: rowError.message,
          details: rowError.details ?? []
        }))
      });
    } catch (error) {
      sendError(res, error, "Failed to import CSV");
    }
  });

  router.get("/:id", async (req, res) => {
    try {
      res.json(await store.getApplicant(req.params.id));
    } catch (error) {
      sendError(res, error, "Failed to fetch applicant");
    }
  });

  router.delete("/:id", async (req, res) => {
    try {
      await store.deleteApplicant(req.params.id);
      res.json({ message: "Deleted" });
    } catch (error) {
      sendError(res, error, "Failed to delete applicant");
    }
  });

  router.patch("/:id/status", async (req, res) => {
    try {
      const parsed = statusBodySchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        throw fromZodError(parsed.error);
      }
      res.json(await store.updateStatus(req.params.id, parsed.data.status));
    } catch (error) {
      sendError(res, error, "Failed to update status");
    }
  });

  router.put("/:id/interview", async (req, res) => {
    try {
      res.json(await store.scheduleInterview(req.params.id, req.body?.date));
    } catch (error) {
      sendError(res, error, "Failed to schedule interview");
    }
  });

  router.get("/:id/history", async (req, res) => {
    try {
      res.json({ events: await store.history(req.params.id) });
    } catch (error) {
      sendError(res, error, "Failed to fetch history");
    }
  });

  router.get("/:id/email", async (req, res) => {
    try {
      const parsed = emailQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        throw fromZodError(parsed.error);
      }
      const applicant = await store.getApplicant(req.params.id);
      const template = await templates.get(parsed.data.templateId);
      res.json(composeEmail(applicant, template));
    } catch (error) {
      sendError(res, error, "Failed to compose email");
    }
  });

  router.get("/:id/offer-letter", async (req, res) => {
    try {
      const applicant = await store.getApplicant(req.params.id);
      const letter = buildOfferLetter(applicant, services.now());
      res.attachment(letter.fileName);
      res.type("application/pdf");
      res.send(letter.content);
    } catch (error) {
      sendError(res, error, "Failed to generate offer letter");
    }
  });

  return router;
}
