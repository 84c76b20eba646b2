import mongoose, { Schema } from "mongoose";
import { APPLICANT_STATUSES, type ApplicantStatus } from "../services/pipeline.ts";

export const SETTINGS_KEY = "general";

export interface SettingsDocument {
  key: string;
  defaultStatus: ApplicantStatus;
}

// One document per process-wide settings group; only "general" exists today.
const settingsSchema = new Schema<SettingsDocument>(
  {
    key: { type: String, required: true, unique: true },
    defaultStatus: { type: String, enum: [...APPLICANT_STATUSES], default: "Applied" }
  },
  { timestamps: true }
);

export const Settings = mongoose.model<SettingsDocument>("Settings", settingsSchema);
