import mongoose from "mongoose";
import { ApplicantEvent as ApplicantEventModel, type LeanApplicantEvent } from "../models/ApplicantEvent.ts";
import type { ApplicantEvent } from "../types.ts";
import type { ApplicantEventRepository } from "./types.ts";

function toEvent(doc: LeanApplicantEvent): ApplicantEvent {
  return {
    id: doc._id.toString(),
    applicantId: doc.applicantId.toString(),
    change: doc.change,
    at: doc.at
  };
}

export class MongoApplicantEventRepository implements ApplicantEventRepository {
  async append(applicantId: string, change: string, at: Date): Promise<ApplicantEvent> {
    const created = await ApplicantEventModel.create({
      applicantId: new mongoose.Types.ObjectId(applicantId),
      change,
      at
    });
    return toEvent(created);
  }

  async listFor(applicantId: string): Promise<ApplicantEvent[]> {
    if (!mongoose.Types.ObjectId.isValid(applicantId)) {
      return [];
    }
    const docs = await ApplicantEventModel.find({ applicantId: new mongoose.Types.ObjectId(applicantId) })
      .sort({ at: 1, _id: 1 })
      .lean<LeanApplicantEvent[]>();
    return docs.map(toEvent);
  }

  async deleteFor(applicantId: string): Promise<number> {
    if (!mongoose.Types.ObjectId.isValid(applicantId)) {
      return 0;
    }
    const result = await ApplicantEventModel.deleteMany({ applicantId: new mongoose.Types.ObjectId(applicantId) });
    return result.deletedCount;
  }
}
