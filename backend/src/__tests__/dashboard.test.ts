import { beforeEach, describe, expect, it } from "vitest";
import { createServices, type AppServices } from "../services/index.ts";
import type { Settings } from "../types.ts";
import { createMemoryRepositories } from "./helpers/memoryRepositories.ts";

const NOW = new Date("2026-03-10T09:30:00.000Z");
const SETTINGS: Settings = { defaultStatus: "Applied" };

describe("DashboardService", () => {
  let services: AppServices;

  beforeEach(() => {
    services = createServices(createMemoryRepositories(), { now: () => NOW });
  });

  it("returns zeroed counts for an empty pipeline", async () => {
    expect(await services.dashboard.summary()).toEqual({
      total: 0,
      byStatus: { Applied: 0, Screening: 0, Interview: 0, Offer: 0, Hired: 0, Rejected: 0 },
      upcomingInterviews: [],
      recentlyAdded: []
    });
  });

  it("summarizes counts, the coming week's interviews and recent applicants", async () => {
    const { store } = services;
    const ada = await store.createApplicant({ name: "Ada", job: "Engineer", appliedDate: "2026-03-08" }, SETTINGS);
    const grace = await store.createApplicant({ name: "Grace", job: "Admiral", appliedDate: "2026-03-01" }, SETTINGS);
    const linus = await store.createApplicant({ name: "Linus", appliedDate: "2026-03-09" }, SETTINGS);
    const margaret = await store.createApplicant({ name: "Margaret", appliedDate: "2026-02-01" }, SETTINGS);

    await store.scheduleInterview(ada.id, "2026-03-12T10:00:00.000Z");
    await store.scheduleInterview(grace.id, "2026-03-17T16:00:00.000Z");
    await store.scheduleInterview(linus.id, "2026-03-20T10:00:00.000Z");
    await store.scheduleInterview(margaret.id, "2026-03-09T10:00:00.000Z");
    await store.updateStatus(ada.id, "Interview");
    await store.updateStatus(margaret.id, "Rejected");

    const summary = await services.dashboard.summary();

    expect(summary.total).toBe(4);
    expect(summary.byStatus).toEqual({ Applied: 2, Screening: 0, Interview: 1, Offer: 0, Hired: 0, Rejected: 1 });
    expect(summary.upcomingInterviews).toEqual([
      { id: ada.id, name: "Ada", job: "Engineer", interviewDate: new Date("2026-03-12T10:00:00.000Z") },
      { id: grace.id, name: "Grace", job: "Admiral", interviewDate: new Date("2026-03-17T16:00:00.000Z") }
    ]);
    expect(summary.recentlyAdded.map((applicant) => applicant.name)).toEqual(["Linus", "Ada"]);
    expect(summary.recentlyAdded[0]).toEqual({
      id: linus.id,
      name: "Linus",
      job: null,
      source: "Manual",
      appliedDate: new Date("2026-03-09T00:00:00.000Z")
    });
  });
});
