import type { ApplicantStatus } from "./services/pipeline.ts";
import type { ImportRowError } from "./errors.ts";

export type { ApplicantStatus };

export type ApplicantSource = "Manual" | "CSV Import";

export interface Applicant {
  id: string;
  name: string;
  email: string | null;
  phone: string | null;
  job: string | null;
  notes: string | null;
  status: ApplicantStatus;
  source: ApplicantSource;
  appliedDate: Date;
  interviewDate: Date | null;
  hiredDate: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export type NewApplicant = Omit<Applicant, "id" | "createdAt" | "updatedAt">;

export type ApplicantPatch = Partial<Pick<Applicant, "status" | "interviewDate" | "hiredDate">>;

export interface ApplicantFilter {
  status?: ApplicantStatus;
  search?: string;
  appliedFrom?: Date;
  appliedTo?: Date;
  interviewFrom?: Date;
  interviewTo?: Date;
  sort?: "appliedDate" | "interviewDate";
  limit?: number;
}

export interface ApplicantEvent {
  id: string;
  applicantId: string;
  change: string;
  at: Date;
}

export interface EmailTemplate {
  id: string;
  name: string;
  subject: string;
  body: string;
}

export type EmailTemplateFields = Omit<EmailTemplate, "id">;

export interface Settings {
  defaultStatus: ApplicantStatus;
}

export type CsvRow = Record<string, string>;

/** A CSV data row with its position in the file: 1 is the first line after the header, blank lines included. */
export interface CsvRecord {
  rowNumber: number;
  cells: CsvRow;
}

export interface ImportReport {
  created: Applicant[];
  errors: ImportRowError[];
}

export interface DashboardSummary {
  total: number;
  byStatus: Record<ApplicantStatus, number>;
  upcomingInterviews: Array<Pick<Applicant, "id" | "name" | "job"> & { interviewDate: Date }>;
  recentlyAdded: Array<Pick<Applicant, "id" | "name" | "job" | "source" | "appliedDate">>;
}
