import { beforeEach, describe, expect, it } from "vitest";
import { ImportRowError, InvalidTransitionError, NotFoundError, ValidationError } from "../errors.ts";
import { ApplicantStore } from "../services/applicantStore.ts";
import { parseCsv } from "../services/csvImport.ts";
import type { CsvRecord, CsvRow, Settings } from "../types.ts";
import { collect } from "../utils/iterables.ts";
import { createMemoryRepositories, type MemoryRepositories } from "./helpers/memoryRepositories.ts";

const NOW = new Date("2026-03-10T09:30:00.000Z");
const SETTINGS: Settings = { defaultStatus: "Applied" };

function numbered(...rows: CsvRow[]): CsvRecord[] {
  return rows.map((cells, index) => ({ rowNumber: index + 1, cells }));
}

describe("ApplicantStore", () => {
  let repos: MemoryRepositories;
  let store: ApplicantStore;

  beforeEach(() => {
    repos = createMemoryRepositories();
    store = new ApplicantStore(repos, { now: () => NOW });
  });

  describe("createApplicant", () => {
    it("stores a trimmed record at the default status", async () => {
      const created = await store.createApplicant(
        { name: "  Ada Lovelace ", email: " ADA@Example.com ", job: "Engineer", phone: "" },
        SETTINGS
      );

      expect(created).toMatchObject({
        name: "Ada Lovelace",
        email: "ada@example.com",
        phone: null,
        job: "Engineer",
        notes: null,
        status: "Applied",
        source: "Manual",
        appliedDate: NOW,
        interviewDate: null,
        hiredDate: null
      });
      expect(await store.history(created.id)).toEqual([
        expect.objectContaining({ applicantId: created.id, change: "Added manually", at: NOW })
      ]);
    });

    it("uses the configured default status", async () => {
      const created = await store.createApplicant({ name: "Grace" }, { defaultStatus: "Screening" });
      expect(created.status).toBe("Screening");
    });

    it("keeps an explicit applied date", async () => {
      const created = await store.createApplicant({ name: "Grace", appliedDate: "2026-01-05" }, SETTINGS);
      expect(created.appliedDate.toISOString()).toBe("2026-01-05T00:00:00.000Z");
    });

    it("requires a name", async () => {
      await expect(store.createApplicant({ name: "   " }, SETTINGS)).rejects.toThrow(ValidationError);
      await expect(store.createApplicant({}, SETTINGS)).rejects.toThrow("Name is required");
      expect(repos.applicants.rows.size).toBe(0);
    });

    it("rejects a malformed email", async () => {
      await expect(store.createApplicant({ name: "Ada", email: "not-an-email" }, SETTINGS)).rejects.toThrow(
        "Invalid email format"
      );
    });

    it("refuses a terminal default status", async () => {
      await expect(store.createApplicant({ name: "Ada" }, { defaultStatus: "Hired" })).rejects.toThrow(
        "Default status cannot be Hired"
      );
    });
  });

  describe("updateStatus", () => {
    it("moves forward, records history and stamps the hire date", async () => {
      const { id } = await store.createApplicant({ name: "Ada", job: "Engineer" }, SETTINGS);

      await store.updateStatus(id, "Interview");
      const hired = await store.updateStatus(id, "Hired");

      expect(hired.status).toBe("Hired");
      expect(hired.hiredDate).toEqual(NOW);
      expect((await store.history(id)).map((event) => event.change)).toEqual([
        "Added manually",
        "Status → Interview",
        "Status → Hired"
      ]);
    });

    it("returns the applicant untouched when the status is unchanged", async () => {
      const { id } = await store.createApplicant({ name: "Ada" }, SETTINGS);
      const same = await store.updateStatus(id, "Applied");

      expect(same.status).toBe("Applied");
      expect(await store.history(id)).toHaveLength(1);
    });

    it("refuses to leave a terminal stage", async () => {
      const { id } = await store.createApplicant({ name: "Ada" }, SETTINGS);
      await store.updateStatus(id, "Rejected");

      const attempt = store.updateStatus(id, "Screening");
      await expect(attempt).rejects.toThrow(InvalidTransitionError);
      await expect(store.updateStatus(id, "Screening")).rejects.toThrow("Applicant is already Rejected");
      expect((await store.getApplicant(id)).status).toBe("Rejected");
    });

    it("throws NotFoundError for an unknown id", async () => {
      await expect(store.updateStatus("missing", "Offer")).rejects.toThrow(NotFoundError);
    });

    it("lets only one of two overlapping updates through when the first is terminal", async () => {
      const { id } = await store.createApplicant({ name: "Ada" }, SETTINGS);

      const [hired, screening] = await Promise.allSettled([
        store.updateStatus(id, "Hired"),
        store.updateStatus(id, "Screening")
      ]);

      expect(hired.status).toBe("fulfilled");
      expect(screening.status).toBe("rejected");
      if (screening.status === "rejected") {
        expect(screening.reason).toBeInstanceOf(InvalidTransitionError);
        expect(screening.reason.message).toBe("Applicant is already Hired");
      }
      expect((await store.getApplicant(id)).status).toBe("Hired");
      expect((await store.history(id)).map((event) => event.change)).toEqual(["Added manually", "Status → Hired"]);
    });

    it("refuses an update based on a status another update has already replaced", async () => {
      const { id } = await store.createApplicant({ name: "Ada" }, SETTINGS);

      const [offer, screening] = await Promise.allSettled([
        store.updateStatus(id, "Offer"),
        store.updateStatus(id, "Screening")
      ]);

      expect(offer.status).toBe("fulfilled");
      expect(screening.status).toBe("rejected");
      if (screening.status === "rejected") {
        expect(screening.reason).toBeInstanceOf(InvalidTransitionError);
        expect(screening.reason.message).toBe("Applicant moved from Applied to Offer during the update");
      }
      expect((await store.getApplicant(id)).status).toBe("Offer");
    });

    it("reports NotFoundError when the applicant is deleted mid-update", async () => {
      const { id } = await store.createApplicant({ name: "Ada" }, SETTINGS);

      const [update, removal] = await Promise.allSettled([store.updateStatus(id, "Offer"), store.deleteApplicant(id)]);

      expect(removal.status).toBe("fulfilled");
      expect(update.status).toBe("rejected");
      if (update.status === "rejected") {
        expect(update.reason).toBeInstanceOf(NotFoundError);
      }
    });
  });

  describe("scheduleInterview", () => {
    it("sets the date without changing the status", async () => {
      const { id } = await store.createApplicant({ name: "Ada" }, SETTINGS);
      const updated = await store.scheduleInterview(id, "2026-03-12T14:00:00.000Z");

      expect(updated.interviewDate?.toISOString()).toBe("2026-03-12T14:00:00.000Z");
      expect(updated.status).toBe("Applied");
      expect((await store.history(id)).at(-1)?.change).toBe("Interview: 2026-03-12");
    });

    it("rejects a missing or invalid date", async () => {
      const { id } = await store.createApplicant({ name: "Ada" }, SETTINGS);
      await expect(store.scheduleInterview(id, "")).rejects.toThrow("Interview date is required");
      await expect(store.scheduleInterview(id, "someday")).rejects.toThrow(ValidationError);
    });
  });

  describe("deleteApplicant", () => {
    it("removes the applicant and its history", async () => {
      const { id } = await store.createApplicant({ name: "Ada" }, SETTINGS);
      await store.deleteApplicant(id);

      await expect(store.getApplicant(id)).rejects.toThrow(NotFoundError);
      expect(repos.events.rows).toEqual([]);
    });

    it("leaves the store unchanged when the id is unknown", async () => {
      await store.createApplicant({ name: "Ada" }, SETTINGS);
      await expect(store.deleteApplicant("does-not-exist")).rejects.toThrow(NotFoundError);
      expect(await store.countApplicants()).toBe(1);
      expect(repos.events.rows).toHaveLength(1);
    });
  });

  describe("listApplicants", () => {
    beforeEach(async () => {
      await store.createApplicant({ name: "Ada", job: "Engineer", appliedDate: "2026-03-01" }, SETTINGS);
      await store.createApplicant({ name: "Grace", job: "Admiral", appliedDate: "2026-03-05" }, SETTINGS);
      await store.createApplicant({ name: "Linus", job: "Kernel Engineer", appliedDate: "2026-02-20" }, SETTINGS);
    });

    it("lists newest applications first", async () => {
      const names = (await collect(store.listApplicants())).map((applicant) => applicant.name);
      expect(names).toEqual(["Grace", "Ada", "Linus"]);
    });

    it("filters by status and by case-insensitive search", async () => {
      const [grace] = await collect(store.listApplicants({ search: "grace" }));
      expect(grace?.name).toBe("Grace");
      if (grace) await store.updateStatus(grace.id, "Offer");

      expect((await collect(store.listApplicants({ status: "Offer" }))).map((a) => a.name)).toEqual(["Grace"]);
      expect((await collect(store.listApplicants({ search: "engineer" }))).map((a) => a.name)).toEqual([
        "Ada",
        "Linus"
      ]);
    });

    it("filters by applied date range", async () => {
      const inMarch = await collect(store.listApplicants({ appliedFrom: new Date("2026-03-01T00:00:00.000Z") }));
      expect(inMarch.map((applicant) => applicant.name)).toEqual(["Grace", "Ada"]);
    });

    it("can be iterated more than once and queries lazily", async () => {
      const listing = store.listApplicants({ limit: 2 });
      expect(repos.applicants.iterations).toBe(0);

      const first = await collect(listing);
      const second = await collect(listing);

      expect(first.map((a) => a.name)).toEqual(["Grace", "Ada"]);
      expect(second).toEqual(first);
      expect(repos.applicants.iterations).toBe(2);
    });
  });

  describe("importApplicants", () => {
    it("creates valid rows and reports malformed ones by row number", async () => {
      const report = await store.importApplicants(
        numbered(
          { Name: "Ada", Email: "ada@example.com", "Job Title": "Engineer" },
          { Name: "", Email: "nobody@example.com", "Job Title": "Tester" },
          { Name: "Grace", Email: "grace-at-navy", "Job Title": "Admiral" },
          { Name: "Linus", Email: "", "Job Title": "Maintainer" }
        ),
        SETTINGS
      );

      expect(report.created.map((applicant) => applicant.name)).toEqual(["Ada", "Linus"]);
      expect(report.created.every((applicant) => applicant.source === "CSV Import")).toBe(true);
      expect(report.errors).toHaveLength(2);
      expect(report.errors[0]).toBeInstanceOf(ImportRowError);
      expect(report.errors.map((error) => [error.row, error.message])).toEqual([
        [2, "Row 2: Name is required"],
        [3, "Row 3: Invalid email format"]
      ]);
      expect(await store.countApplicants()).toBe(2);
    });

    it("routes a contact column by its content", async () => {
      const report = await store.importApplicants(
        numbered({ name: "Ada", contact: "ada@example.com" }, { name: "Grace", contact: "555-0100" }),
        SETTINGS
      );

      expect(report.created.map(({ email, phone }) => ({ email, phone }))).toEqual([
        { email: "ada@example.com", phone: null },
        { email: null, phone: "555-0100" }
      ]);
    });

    it("flags every row when there is no name column", async () => {
      const report = await store.importApplicants(
        numbered({ email: "a@example.com" }, { email: "b@example.com" }),
        SETTINGS
      );
      expect(report.created).toEqual([]);
      expect(report.errors.map((error) => error.message)).toEqual(["Row 1: Name is required", "Row 2: Name is required"]);
    });

    it("reports the file's row number when blank lines precede a bad row", async () => {
      const report = await store.importApplicants(
        parseCsv("name,email\nAda,ada@example.com\n\n,nobody@example.com\n"),
        SETTINGS
      );

      expect(report.created.map((applicant) => applicant.name)).toEqual(["Ada"]);
      expect(report.errors.map((error) => [error.row, error.message])).toEqual([[3, "Row 3: Name is required"]]);
    });

    it("records the import in each applicant's history", async () => {
      const { created } = await store.importApplicants(numbered({ Name: "Ada" }), SETTINGS);
      const [ada] = created;
      expect(ada).toBeDefined();
      if (ada) {
        expect((await store.history(ada.id)).map((event) => event.change)).toEqual(["Imported from CSV"]);
      }
    });
  });

  it("counts applicants by status", async () => {
    const first = await store.createApplicant({ name: "Ada" }, SETTINGS);
    await store.createApplicant({ name: "Grace" }, SETTINGS);
    await store.updateStatus(first.id, "Screening");

    expect(await store.countByStatus()).toEqual({ Applied: 1, Screening: 1 });
  });
});
