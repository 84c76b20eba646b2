import { MongoApplicantRepository } from "./applicants.repo.ts";
import { MongoApplicantEventRepository } from "./events.repo.ts";
import { MongoSettingsRepository } from "./settings.repo.ts";
import { MongoTemplateRepository } from "./templates.repo.ts";
import type { Repositories } from "./types.ts";

export function createMongoRepositories(): Repositories {
  return {
    applicants: new MongoApplicantRepository(),
    events: new MongoApplicantEventRepository(),
    templates: new MongoTemplateRepository(),
    settings: new MongoSettingsRepository()
  };
}

export type {
  ApplicantEventRepository,
  ApplicantRepository,
  Repositories,
  SettingsRepository,
  TemplateRepository
} from "./types.ts";
