import { z } from "zod";
import { fromZodError } from "../errors.ts";
import type { SettingsRepository } from "../repositories/types.ts";
import type { Settings } from "../types.ts";
import { logInfo } from "../utils/logger.ts";
import { applicantStatusSchema, isTerminalStatus } from "./pipeline.ts";

export const DEFAULT_SETTINGS: Readonly<Settings> = { defaultStatus: "Applied" };

const settingsSchema = z.object({
  defaultStatus: applicantStatusSchema.refine((status) => !isTerminalStatus(status), {
    message: "Default status must be an open pipeline stage"
  })
});

export class SettingsService {
  constructor(private readonly settings: SettingsRepository) {}

  async get(): Promise<Settings> {
    return (await this.settings.load()) ?? { ...DEFAULT_SETTINGS };
  }

  async update(input: unknown): Promise<Settings> {
    const parsed = settingsSchema.safeParse(input);
    if (!parsed.success) {
      throw fromZodError(parsed.error);
    }
    const saved = await this.settings.save(parsed.data);
    logInfo("settings_updated", { defaultStatus: saved.defaultStatus });
    return saved;
  }
}
