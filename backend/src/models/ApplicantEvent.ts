import mongoose, { Schema, type Types } from "mongoose";

export interface ApplicantEventDocument {
  applicantId: Types.ObjectId;
  change: string;
  at: Date;
}

export type LeanApplicantEvent = ApplicantEventDocument & { _id: Types.ObjectId };

const applicantEventSchema = new Schema<ApplicantEventDocument>({
  applicantId: { type: Schema.Types.ObjectId, ref: "Applicant", required: true, index: true },
  change: { type: String, required: true },
  at: { type: Date, required: true }
});

export const ApplicantEvent = mongoose.model<ApplicantEventDocument>("ApplicantEvent", applicantEventSchema);
