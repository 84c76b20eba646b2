import { ValidationError } from "../errors.ts";
import type { Applicant, EmailTemplate } from "../types.ts";
import { renderTemplate } from "./templates.ts";

export interface ComposedEmail {
  to: string;
  subject: string;
  body: string;
  url: string;
}

/** Builds a mailto: link; sending is left to the user's mail client. */
export function composeEmail(
  applicant: Pick<Applicant, "name" | "job" | "email">,
  template: Pick<EmailTemplate, "name" | "subject" | "body">
): ComposedEmail {
  if (!applicant.email) {
    throw new ValidationError("Applicant has no email address");
  }
  const { subject, body } = renderTemplate(template, applicant);
  return {
    to: applicant.email,
    subject,
    body,
    url: `mailto:${applicant.email}?subject=${encodeURIComponent(subject)}&body=${encodeURIComponent(body)}`
  };
}
