import type { ApplicantStatus, DashboardSummary } from "../types.ts";
import { addDays, endOfUtcDay, startOfUtcDay } from "../utils/dates.ts";
import type { ApplicantStore } from "./applicantStore.ts";
import { APPLICANT_STATUSES } from "./pipeline.ts";

const UPCOMING_DAYS = 7;
const RECENT_DAYS = 7;
const RECENT_LIMIT = 12;

export class DashboardService {
  constructor(
    private readonly store: ApplicantStore,
    private readonly now: () => Date = () => new Date()
  ) {}

  async summary(): Promise<DashboardSummary> {
    const today = startOfUtcDay(this.now());
    const [total, counts] = await Promise.all([this.store.countApplicants(), this.store.countByStatus()]);

    const byStatus: Record<ApplicantStatus, number> = {
      Applied: 0,
      Screening: 0,
      Interview: 0,
      Offer: 0,
      Hired: 0,
      Rejected: 0
    };
    for (const status of APPLICANT_STATUSES) {
      byStatus[status] = counts[status] ?? 0;
    }

    const upcomingInterviews: DashboardSummary["upcomingInterviews"] = [];
    const upcoming = this.store.listApplicants({
      interviewFrom: today,
      interviewTo: endOfUtcDay(addDays(today, UPCOMING_DAYS)),
      sort: "interviewDate"
    });
    for await (const applicant of upcoming) {
      if (applicant.interviewDate) {
        upcomingInterviews.push({
          id: applicant.id,
          name: applicant.name,
          job: applicant.job,
          interviewDate: applicant.interviewDate
        });
      }
    }

    const recentlyAdded: DashboardSummary["recentlyAdded"] = [];
    const recent = this.store.listApplicants({ appliedFrom: addDays(today, -RECENT_DAYS), limit: RECENT_LIMIT });
    for await (const applicant of recent) {
      recentlyAdded.push({
        id: applicant.id,
        name: applicant.name,
        job: applicant.job,
        source: applicant.source,
        appliedDate: applicant.appliedDate
      });
    }

    return { total, byStatus, upcomingInterviews, recentlyAdded };
  }
}
