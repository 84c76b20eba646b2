import mongoose from "mongoose";
import { ConflictError } from "../errors.ts";
import { EmailTemplate as EmailTemplateModel, type LeanEmailTemplate } from "../models/EmailTemplate.ts";
import type { EmailTemplate, EmailTemplateFields } from "../types.ts";
import type { TemplateRepository } from "./types.ts";

function toTemplate(doc: LeanEmailTemplate): EmailTemplate {
  return {
    id: doc._id.toString(),
    name: doc.name,
    subject: doc.subject,
    body: doc.body
  };
}

function isDuplicateKeyError(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === 11000;
}

export class MongoTemplateRepository implements TemplateRepository {
  async list(): Promise<EmailTemplate[]> {
    const docs = await EmailTemplateModel.find().sort({ name: 1 }).lean<LeanEmailTemplate[]>();
    return docs.map(toTemplate);
  }

  async findById(id: string): Promise<EmailTemplate | null> {
    if (!mongoose.Types.ObjectId.isValid(id)) {
      return null;
    }
    const doc = await EmailTemplateModel.findById(id).lean<LeanEmailTemplate>();
    return doc ? toTemplate(doc) : null;
  }

  async findByName(name: string): Promise<EmailTemplate | null> {
    const doc = await EmailTemplateModel.findOne({ name }).lean<LeanEmailTemplate>();
    return doc ? toTemplate(doc) : null;
  }

  async insert(fields: EmailTemplateFields): Promise<EmailTemplate> {
    try {
      const created = await EmailTemplateModel.create(fields);
      return toTemplate(created);
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        throw new ConflictError(`Template name "${fields.name}" already exists`);
      }
      throw error;
    }
  }

  async update(id: string, fields: Partial<EmailTemplateFields>): Promise<EmailTemplate | null> {
    if (!mongoose.Types.ObjectId.isValid(id)) {
      return null;
    }
    try {
      const doc = await EmailTemplateModel.findByIdAndUpdate(id, { $set: fields }, { new: true, runValidators: true })
        .lean<LeanEmailTemplate>();
      return doc ? toTemplate(doc) : null;
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        throw new ConflictError(`Template name "${fields.name ?? ""}" already exists`);
      }
      throw error;
    }
  }

  async delete(id: string): Promise<boolean> {
    if (!mongoose.Types.ObjectId.isValid(id)) {
      return false;
    }
    const result = await EmailTemplateModel.deleteOne({ _id: new mongoose.Types.ObjectId(id) });
    return result.deletedCount > 0;
  }

  async count(): Promise<number> {
    return EmailTemplateModel.countDocuments();
  }
}
