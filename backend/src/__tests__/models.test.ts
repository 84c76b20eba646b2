import { describe, expect, it } from "vitest";
import { Applicant } from "../models/Applicant.ts";
import { EmailTemplate } from "../models/EmailTemplate.ts";
import { Settings } from "../models/Settings.ts";

describe("mongoose models", () => {
  it("accepts a complete applicant and normalizes the email", () => {
    const doc = new Applicant({
      name: "  Ada  ",
      email: " ADA@Example.com ",
      status: "Screening",
      appliedDate: new Date("2026-03-01T00:00:00.000Z")
    });

    expect(doc.validateSync()).toBeFalsy();
    expect(doc.name).toBe("Ada");
    expect(doc.email).toBe("ada@example.com");
    expect(doc.source).toBe("Manual");
    expect(doc.interviewDate).toBeNull();
  });

  it("rejects an applicant without a name or with an unknown status", () => {
    const error = new Applicant({ status: "Archived", appliedDate: new Date() }).validateSync();
    expect(Object.keys(error?.errors ?? {}).sort()).toEqual(["name", "status"]);
  });

  it("defaults template text and settings status", () => {
    const template = new EmailTemplate({ name: "Blank" });
    expect(template.validateSync()).toBeFalsy();
    expect([template.subject, template.body]).toEqual(["", ""]);

    expect(new Settings({ key: "general" }).defaultStatus).toBe("Applied");
  });
});
