import { z } from "zod";

export const APPLICANT_STATUSES = [
  "Applied",
  "Screening",
  "Interview",
  "Offer",
  "Hired",
  "Rejected"
] as const;

export type ApplicantStatus = (typeof APPLICANT_STATUSES)[number];

export const applicantStatusSchema = z.enum(APPLICANT_STATUSES, {
  errorMap: () => ({ message: `Status must be one of: ${APPLICANT_STATUSES.join(", ")}` })
});

const TERMINAL_STATUSES: ReadonlySet<ApplicantStatus> = new Set(["Hired", "Rejected"]);

// Open stages can be corrected in either direction; terminal stages have no exits.
const LEGAL_TRANSITIONS: Record<ApplicantStatus, readonly ApplicantStatus[]> = {
  Applied: ["Screening", "Interview", "Offer", "Hired", "Rejected"],
  Screening: ["Applied", "Interview", "Offer", "Hired", "Rejected"],
  Interview: ["Applied", "Screening", "Offer", "Hired", "Rejected"],
  Offer: ["Applied", "Screening", "Interview", "Hired", "Rejected"],
  Hired: [],
  Rejected: []
};

export type TransitionCheck =
  | { outcome: "unchanged" }
  | { outcome: "allowed" }
  | { outcome: "rejected"; reason: string };

export function isApplicantStatus(value: string): value is ApplicantStatus {
  return APPLICANT_STATUSES.some((status) => status === value);
}

export function isTerminalStatus(status: ApplicantStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

export function allowedTransitions(current: ApplicantStatus): readonly ApplicantStatus[] {
  return LEGAL_TRANSITIONS[current];
}

export function checkTransition(current: ApplicantStatus, next: ApplicantStatus): TransitionCheck {
  if (current === next) {
    return { outcome: "unchanged" };
  }
  if (isTerminalStatus(current)) {
    return { outcome: "rejected", reason: `Applicant is already ${current}` };
  }
  if (!LEGAL_TRANSITIONS[current].includes(next)) {
    return { outcome: "rejected", reason: `Cannot move applicant from ${current} to ${next}` };
  }
  return { outcome: "allowed" };
}
