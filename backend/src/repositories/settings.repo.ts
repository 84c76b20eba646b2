import { SETTINGS_KEY, Settings as SettingsModel, type SettingsDocument } from "../models/Settings.ts";
import type { Settings } from "../types.ts";
import type { SettingsRepository } from "./types.ts";

export class MongoSettingsRepository implements SettingsRepository {
  async load(): Promise<Settings | null> {
    const doc = await SettingsModel.findOne({ key: SETTINGS_KEY }).lean<SettingsDocument>();
    return doc ? { defaultStatus: doc.defaultStatus } : null;
  }

  async save(settings: Settings): Promise<Settings> {
    const doc = await SettingsModel.findOneAndUpdate(
      { key: SETTINGS_KEY },
      { $set: { defaultStatus: settings.defaultStatus } },
      { new: true, upsert: true, runValidators: true }
    ).lean<SettingsDocument>();
    return doc ? { defaultStatus: doc.defaultStatus } : settings;
  }
}
