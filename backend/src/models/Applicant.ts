import mongoose, { Schema, type Types } from "mongoose";
import { APPLICANT_STATUSES, type ApplicantStatus } from "../services/pipeline.ts";
import type { ApplicantSource } from "../types.ts";

export const APPLICANT_SOURCES: readonly ApplicantSource[] = ["Manual", "CSV Import"];

export interface ApplicantDocument {
  name: string;
  email?: string | null;
  phone?: string | null;
  job?: string | null;
  notes?: string | null;
  status: ApplicantStatus;
  source: ApplicantSource;
  appliedDate: Date;
  interviewDate?: Date | null;
  hiredDate?: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export type LeanApplicant = ApplicantDocument & { _id: Types.ObjectId };

const applicantSchema = new Schema<ApplicantDocument>(
  {
    name: { type: String, required: true, trim: true },
    email: { type: String, trim: true, lowercase: true, default: null },
    phone: { type: String, trim: true, default: null },
    job: { type: String, trim: true, default: null },
    notes: { type: String, default: null },
    status: { type: String, enum: [...APPLICANT_STATUSES], required: true },
    source: { type: String, enum: [...APPLICANT_SOURCES], default: "Manual" },
    appliedDate: { type: Date, required: true },
    interviewDate: { type: Date, default: null },
    hiredDate: { type: Date, default: null }
  },
  { timestamps: true }
);

applicantSchema.index({ status: 1 });
applicantSchema.index({ appliedDate: -1 });
applicantSchema.index({ interviewDate: 1 });

export const Applicant = mongoose.model<ApplicantDocument>("Applicant", applicantSchema);
