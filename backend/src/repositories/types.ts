import type {
  Applicant,
  ApplicantEvent,
  ApplicantFilter,
  ApplicantPatch,
  ApplicantStatus,
  EmailTemplate,
  EmailTemplateFields,
  NewApplicant,
  Settings
} from "../types.ts";

/**
 * Storage seam for applicants. Lookups by an id the store never issued
 * resolve to null (or false for delete) rather than throwing.
 */
export interface ApplicantRepository {
  insert(data: NewApplicant): Promise<Applicant>;
  findById(id: string): Promise<Applicant | null>;
  /** With `expected`, writes only while the stored status still matches it; otherwise resolves to null. */
  update(id: string, patch: ApplicantPatch, expected?: { status: ApplicantStatus }): Promise<Applicant | null>;
  delete(id: string): Promise<boolean>;
  /** Newest application first, unless `filter.sort` is "interviewDate" (soonest first). */
  iterate(filter: ApplicantFilter): AsyncIterable<Applicant>;
  count(filter?: ApplicantFilter): Promise<number>;
  countByStatus(): Promise<Partial<Record<ApplicantStatus, number>>>;
}

export interface ApplicantEventRepository {
  append(applicantId: string, change: string, at: Date): Promise<ApplicantEvent>;
  listFor(applicantId: string): Promise<ApplicantEvent[]>;
  deleteFor(applicantId: string): Promise<number>;
}

export interface TemplateRepository {
  list(): Promise<EmailTemplate[]>;
  findById(id: string): Promise<EmailTemplate | null>;
  findByName(name: string): Promise<EmailTemplate | null>;
  insert(fields: EmailTemplateFields): Promise<EmailTemplate>;
  update(id: string, fields: Partial<EmailTemplateFields>): Promise<EmailTemplate | null>;
  delete(id: string): Promise<boolean>;
  count(): Promise<number>;
}

export interface SettingsRepository {
  load(): Promise<Settings | null>;
  save(settings: Settings): Promise<Settings>;
}

export interface Repositories {
  applicants: ApplicantRepository;
  events: ApplicantEventRepository;
  templates: TemplateRepository;
  settings: SettingsRepository;
}
