import type { Repositories } from "../repositories/types.ts";
import { ApplicantStore } from "./applicantStore.ts";
import { DashboardService } from "./dashboard.ts";
import { SettingsService } from "./settings.ts";
import { TemplateService } from "./templates.ts";

export interface AppServices {
  store: ApplicantStore;
  templates: TemplateService;
  settings: SettingsService;
  dashboard: DashboardService;
  now: () => Date;
}

export function createServices(repos: Repositories, options: { now?: () => Date } = {}): AppServices {
  const now = options.now ?? (() => new Date());
  const store = new ApplicantStore(repos, { now });
  return {
    store,
    templates: new TemplateService(repos.templates),
    settings: new SettingsService(repos.settings),
    dashboard: new DashboardService(store, now),
    now
  };
}
