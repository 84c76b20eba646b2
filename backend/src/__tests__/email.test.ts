import { describe, expect, it } from "vitest";
import { composeEmail } from "../services/email.ts";

const template = { name: "Interview Invite", subject: "Interview – {job}", body: "Hi {name},\nSee you soon & good luck" };

describe("composeEmail", () => {
  it("renders the template and builds an encoded mailto link", () => {
    const email = composeEmail({ name: "Ada", job: "Engineer", email: "ada@example.com" }, template);

    expect(email.to).toBe("ada@example.com");
    expect(email.subject).toBe("Interview – Engineer");
    expect(email.body).toBe("Hi Ada,\nSee you soon & good luck");
    expect(email.url).toBe(
      "mailto:ada@example.com?subject=Interview%20%E2%80%93%20Engineer&body=Hi%20Ada%2C%0ASee%20you%20soon%20%26%20good%20luck"
    );
  });

  it("requires an email address", () => {
    expect(() => composeEmail({ name: "Ada", job: "Engineer", email: null }, template)).toThrow(
      "Applicant has no email address"
    );
  });
});
