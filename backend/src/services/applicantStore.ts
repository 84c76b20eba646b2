import { z } from "zod";
import {
  ImportRowError,
  InvalidTransitionError,
  NotFoundError,
  ValidationError,
  fromZodError,
  issuesToDetails
} from "../errors.ts";
import type { ApplicantEventRepository, ApplicantRepository } from "../repositories/types.ts";
import type {
  Applicant,
  ApplicantEvent,
  ApplicantFilter,
  ApplicantPatch,
  ApplicantSource,
  ApplicantStatus,
  CsvRecord,
  ImportReport,
  Settings
} from "../types.ts";
import { formatDay } from "../utils/dates.ts";
import { logInfo } from "../utils/logger.ts";
import { collectHeaders, mapRow, resolveColumns } from "./csvImport.ts";
import { checkTransition, isTerminalStatus } from "./pipeline.ts";

export interface ApplicantInput {
  name?: string;
  email?: string | null;
  phone?: string | null;
  job?: string | null;
  notes?: string | null;
  appliedDate?: string | Date | null;
}

function emptyToUndefined(val: unknown): unknown {
  if (val === null || val === undefined) return undefined;
  if (typeof val === "string" && val.trim() === "") return undefined;
  return val;
}

function toDate(val: unknown): unknown {
  const present = emptyToUndefined(val);
  if (present === undefined || present instanceof Date) return present;
  return new Date(String(present).trim());
}

const optionalText = z.preprocess(emptyToUndefined, z.string().trim().optional());

export const applicantInputSchema = z.object({
  name: z
    .string({ required_error: "Name is required", invalid_type_error: "Name must be text" })
    .trim()
    .min(1, "Name is required"),
  email: z.preprocess(
    emptyToUndefined,
    z.string().trim().toLowerCase().email("Invalid email format").optional()
  ),
  phone: optionalText,
  job: optionalText,
  notes: optionalText,
  appliedDate: z.preprocess(toDate, z.date({ invalid_type_error: "Invalid applied date" }).optional())
});

type ParsedApplicantInput = z.output<typeof applicantInputSchema>;

const interviewDateSchema = z.preprocess(
  toDate,
  z.date({ required_error: "Interview date is required", invalid_type_error: "Invalid interview date" })
);

export interface ApplicantStoreOptions {
  now?: () => Date;
}

const CREATION_EVENTS: Record<ApplicantSource, string> = {
  Manual: "Added manually",
  "CSV Import": "Imported from CSV"
};

/**
 * Owns applicant records and the status lifecycle. Settings are passed in
 * per call so creation never reads ambient state.
 */
export class ApplicantStore {
  private readonly applicants: ApplicantRepository;
  private readonly events: ApplicantEventRepository;
  private readonly now: () => Date;

  constructor(
    repos: { applicants: ApplicantRepository; events: ApplicantEventRepository },
    options: ApplicantStoreOptions = {}
  ) {
    this.applicants = repos.applicants;
    this.events = repos.events;
    this.now = options.now ?? (() => new Date());
  }

  async createApplicant(input: ApplicantInput, settings: Settings): Promise<Applicant> {
    const parsed = applicantInputSchema.safeParse(input);
    if (!parsed.success) {
      throw fromZodError(parsed.error);
    }
    return this.insert(parsed.data, settings, "Manual");
  }

  async importApplicants(rows: readonly CsvRecord[], settings: Settings): Promise<ImportReport> {
    const columns = resolveColumns(collectHeaders(rows.map((row) => row.cells)));
    const report: ImportReport = { created: [], errors: [] };

    for (const { rowNumber, cells } of rows) {
      const parsed = applicantInputSchema.safeParse(mapRow(cells, columns));
      if (!parsed.success) {
        const invalid = fromZodError(parsed.error);
        report.errors.push(new ImportRowError(rowNumber, invalid.message, issuesToDetails(parsed.error)));
        continue;
      }
      report.created.push(await this.insert(parsed.data, settings, "CSV Import"));
    }

    logInfo("applicants_imported", {
      rows: rows.length,
      imported: report.created.length,
      skipped: report.errors.length
    });
    return report;
  }

  async getApplicant(id: string): Promise<Applicant> {
    const applicant = await this.applicants.findById(id);
    if (!applicant) {
      throw new NotFoundError("Applicant", id);
    }
    return applicant;
  }

  async updateStatus(id: string, status: ApplicantStatus): Promise<Applicant> {
    const current = await this.getApplicant(id);
    const check = checkTransition(current.status, status);
    if (check.outcome === "unchanged") {
      return current;
    }
    if (check.outcome === "rejected") {
      throw new InvalidTransitionError(current.status, status, check.reason);
    }

    const at = this.now();
    const patch: ApplicantPatch = { status };
    if (status === "Hired") {
      patch.hiredDate = at;
    }
    const updated = await this.applicants.update(id, patch, { status: current.status });
    if (!updated) {
      throw await this.transitionLost(id, current.status, status);
    }
    await this.events.append(id, `Status → ${status}`, at);
    logInfo("applicant_status_changed", { applicantId: id, from: current.status, to: status });
    return updated;
  }

  /** Sets the interview date only; moving the applicant to Interview is a separate call. */
  async scheduleInterview(id: string, date: Date | string): Promise<Applicant> {
    const parsed = interviewDateSchema.safeParse(date);
    if (!parsed.success) {
      throw fromZodError(parsed.error);
    }
    const updated = await this.requireUpdate(id, { interviewDate: parsed.data });
    await this.events.append(id, `Interview: ${formatDay(parsed.data)}`, this.now());
    return updated;
  }

  async deleteApplicant(id: string): Promise<void> {
    const removed = await this.applicants.delete(id);
    if (!removed) {
      throw new NotFoundError("Applicant", id);
    }
    await this.events.deleteFor(id);
    logInfo("applicant_deleted", { applicantId: id });
  }

  /**
   * Lazy view over the matching applicants. Each iteration queries the
   * repository afresh, so the sequence can be walked more than once.
   */
  listApplicants(filter: ApplicantFilter = {}): AsyncIterable<Applicant> {
    const applicants = this.applicants;
    return {
      [Symbol.asyncIterator]: () => applicants.iterate(filter)[Symbol.asyncIterator]()
    };
  }

  async countApplicants(filter: ApplicantFilter = {}): Promise<number> {
    return this.applicants.count(filter);
  }

  async countByStatus(): Promise<Partial<Record<ApplicantStatus, number>>> {
    return this.applicants.countByStatus();
  }

  async history(id: string): Promise<ApplicantEvent[]> {
    await this.getApplicant(id);
    return this.events.listFor(id);
  }

  private async insert(fields: ParsedApplicantInput, settings: Settings, source: ApplicantSource): Promise<Applicant> {
    if (isTerminalStatus(settings.defaultStatus)) {
      throw new ValidationError(`Default status cannot be ${settings.defaultStatus}`);
    }
    const at = this.now();
    const applicant = await this.applicants.insert({
      name: fields.name,
      email: fields.email ?? null,
      phone: fields.phone ?? null,
      job: fields.job ?? null,
      notes: fields.notes ?? null,
      status: settings.defaultStatus,
      source,
      appliedDate: fields.appliedDate ?? at,
      interviewDate: null,
      hiredDate: null
    });
    await this.events.append(applicant.id, CREATION_EVENTS[source], at);
    logInfo("applicant_created", { applicantId: applicant.id, source, status: applicant.status });
    return applicant;
  }

  // The conditional write matched nothing: the applicant is gone or another update moved it first.
  private async transitionLost(id: string, seen: ApplicantStatus, requested: ApplicantStatus): Promise<Error> {
    const latest = await this.applicants.findById(id);
    if (!latest) {
      return new NotFoundError("Applicant", id);
    }
    const check = checkTransition(latest.status, requested);
    const reason =
      check.outcome === "rejected" ? check.reason : `Applicant moved from ${seen} to ${latest.status} during the update`;
    return new InvalidTransitionError(latest.status, requested, reason);
  }

  private async requireUpdate(id: string, patch: ApplicantPatch): Promise<Applicant> {
    const updated = await this.applicants.update(id, patch);
    if (!updated) {
      throw new NotFoundError("Applicant", id);
    }
    return updated;
  }
}
