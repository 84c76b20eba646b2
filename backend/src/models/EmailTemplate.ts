import mongoose, { Schema, type Types } from "mongoose";

export interface EmailTemplateDocument {
  name: string;
  subject: string;
  body: string;
}

export type LeanEmailTemplate = EmailTemplateDocument & { _id: Types.ObjectId };

const emailTemplateSchema = new Schema<EmailTemplateDocument>(
  {
    name: { type: String, required: true, trim: true, unique: true },
    subject: { type: String, default: "" },
    body: { type: String, default: "" }
  },
  { timestamps: true }
);

export const EmailTemplate = mongoose.model<EmailTemplateDocument>("EmailTemplate", emailTemplateSchema);
