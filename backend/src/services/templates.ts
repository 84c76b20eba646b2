import { z } from "zod";
import { ConflictError, NotFoundError, ValidationError, fromZodError } from "../errors.ts";
import type { TemplateRepository } from "../repositories/types.ts";
import type { Applicant, EmailTemplate, EmailTemplateFields } from "../types.ts";
import { logInfo } from "../utils/logger.ts";

export const DEFAULT_TEMPLATES: readonly EmailTemplateFields[] = [
  {
    name: "Interview Invite",
    subject: "Interview Invitation – {job}",
    body: "Hi {name},\n\nWe would like to invite you to interview for the {job} position.\n\nBest regards,\nHR Team"
  },
  {
    name: "Offer Sent",
    subject: "Job Offer – {job}",
    body: "Dear {name},\n\nCongratulations! We are pleased to offer you the {job} position.\n\nHR Team"
  },
  {
    name: "Rejection",
    subject: "Application Update",
    body:
      "Dear {name},\n\nThank you for your interest in the {job} position.\n\n" +
      "We have decided to move forward with other candidates.\n\nBest wishes,\nHR Team"
  }
];

const templateSchema = z.object({
  name: z
    .string({ required_error: "Template name is required", invalid_type_error: "Template name must be text" })
    .trim()
    .min(1, "Template name is required"),
  subject: z.string().default(""),
  body: z.string().default("")
});

const templatePatchSchema = templateSchema.partial();

export type TemplateInput = z.input<typeof templateSchema>;
export type TemplatePatch = z.input<typeof templatePatchSchema>;

export type RenderedTemplate = { subject: string; body: string };

const PLACEHOLDER = /\{(name|job)\}/g;

/**
 * Substitutes every {name} and {job} in subject and body. A template that
 * asks for {job} cannot be rendered for an applicant without one.
 */
export function renderTemplate(
  template: Pick<EmailTemplate, "name" | "subject" | "body">,
  applicant: Pick<Applicant, "name" | "job">
): RenderedTemplate {
  const usesJob = `${template.subject}\n${template.body}`.includes("{job}");
  const job = applicant.job?.trim() ?? "";
  if (usesJob && !job) {
    throw new ValidationError(`Template "${template.name}" uses {job} but the applicant has no job`);
  }
  const fill = (text: string): string =>
    text.replace(PLACEHOLDER, (_match, key: string) => (key === "name" ? applicant.name : job));
  return { subject: fill(template.subject), body: fill(template.body) };
}

export class TemplateService {
  constructor(private readonly templates: TemplateRepository) {}

  async list(): Promise<EmailTemplate[]> {
    return this.templates.list();
  }

  async get(id: string): Promise<EmailTemplate> {
    const template = await this.templates.findById(id);
    if (!template) {
      throw new NotFoundError("Template", id);
    }
    return template;
  }

  async create(input: TemplateInput): Promise<EmailTemplate> {
    const parsed = templateSchema.safeParse(input);
    if (!parsed.success) {
      throw fromZodError(parsed.error);
    }
    await this.assertNameFree(parsed.data.name);
    return this.templates.insert(parsed.data);
  }

  async update(id: string, input: TemplatePatch): Promise<EmailTemplate> {
    const parsed = templatePatchSchema.safeParse(input);
    if (!parsed.success) {
      throw fromZodError(parsed.error);
    }
    await this.get(id);
    if (parsed.data.name !== undefined) {
      await this.assertNameFree(parsed.data.name, id);
    }
    const updated = await this.templates.update(id, parsed.data);
    if (!updated) {
      throw new NotFoundError("Template", id);
    }
    return updated;
  }

  async delete(id: string): Promise<void> {
    const removed = await this.templates.delete(id);
    if (!removed) {
      throw new NotFoundError("Template", id);
    }
  }

  /** Inserts the stock templates into an empty store; returns how many were added. */
  async seedDefaults(): Promise<number> {
    if ((await this.templates.count()) > 0) {
      return 0;
    }
    for (const template of DEFAULT_TEMPLATES) {
      await this.templates.insert({ ...template });
    }
    logInfo("templates_seeded", { count: DEFAULT_TEMPLATES.length });
    return DEFAULT_TEMPLATES.length;
  }

  private async assertNameFree(name: string, exceptId?: string): Promise<void> {
    const existing = await this.templates.findByName(name);
    if (existing && existing.id !== exceptId) {
      throw new ConflictError(`Template name "${name}" already exists`);
    }
  }
}
