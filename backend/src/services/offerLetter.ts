import { jsPDF } from "jspdf";
import { ValidationError } from "../errors.ts";
import type { Applicant } from "../types.ts";
import { formatDay } from "../utils/dates.ts";

export interface OfferLetter {
  fileName: string;
  content: Buffer;
}

const LEFT_MARGIN = 80;
const FIRST_LINE = 42;
const LINE_GAP = 40;

export function offerLetterFileName(name: string, issuedOn: Date): string {
  return `Offer_${name.trim().replace(/ /g, "_")}_${formatDay(issuedOn)}.pdf`;
}

export function buildOfferLetter(applicant: Pick<Applicant, "name" | "job">, issuedOn: Date): OfferLetter {
  const name = applicant.name.trim();
  const job = applicant.job?.trim() ?? "";
  if (!name || !job) {
    throw new ValidationError("Name and job title are required for an offer letter");
  }

  const doc = new jsPDF({ unit: "pt", format: "letter" });
  doc.setProperties({ title: `Offer of Employment - ${name}` });

  const lines = [
    "Offer of Employment",
    `Dear ${name},`,
    `We are pleased to offer you the ${job} position.`,
    "We look forward to working with you!",
    `Date: ${formatDay(issuedOn)}`
  ];
  lines.forEach((line, index) => {
    doc.setFontSize(index === 0 ? 18 : 12);
    doc.text(line, LEFT_MARGIN, FIRST_LINE + index * LINE_GAP);
  });

  return {
    fileName: offerLetterFileName(name, issuedOn),
    content: Buffer.from(doc.output("arraybuffer"))
  };
}
