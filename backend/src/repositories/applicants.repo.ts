import mongoose, { type FilterQuery, type SortOrder } from "mongoose";
import { Applicant as ApplicantModel, type ApplicantDocument, type LeanApplicant } from "../models/Applicant.ts";
import { isApplicantStatus } from "../services/pipeline.ts";
import type { Applicant, ApplicantFilter, ApplicantPatch, ApplicantStatus, NewApplicant } from "../types.ts";
import type { ApplicantRepository } from "./types.ts";

type DateRange = { $gte?: Date; $lte?: Date };

export function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function dateRange(from?: Date, to?: Date): DateRange | undefined {
  if (!from && !to) {
    return undefined;
  }
  const range: DateRange = {};
  if (from) range.$gte = from;
  if (to) range.$lte = to;
  return range;
}

export function buildApplicantQuery(filter: ApplicantFilter): FilterQuery<ApplicantDocument> {
  const query: FilterQuery<ApplicantDocument> = {};
  if (filter.status) {
    query.status = filter.status;
  }
  const applied = dateRange(filter.appliedFrom, filter.appliedTo);
  if (applied) {
    query.appliedDate = applied;
  }
  const interview = dateRange(filter.interviewFrom, filter.interviewTo);
  if (interview) {
    query.interviewDate = interview;
  }
  const search = filter.search?.trim();
  if (search) {
    const pattern = { $regex: escapeRegex(search), $options: "i" };
    query.$or = [{ name: pattern }, { email: pattern }, { job: pattern }];
  }
  return query;
}

function toApplicant(doc: LeanApplicant): Applicant {
  return {
    id: doc._id.toString(),
    name: doc.name,
    email: doc.email ?? null,
    phone: doc.phone ?? null,
    job: doc.job ?? null,
    notes: doc.notes ?? null,
    status: doc.status,
    source: doc.source,
    appliedDate: doc.appliedDate,
    interviewDate: doc.interviewDate ?? null,
    hiredDate: doc.hiredDate ?? null,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt
  };
}

export class MongoApplicantRepository implements ApplicantRepository {
  async insert(data: NewApplicant): Promise<Applicant> {
    const created = await ApplicantModel.create(data);
    return toApplicant(created);
  }

  async findById(id: string): Promise<Applicant | null> {
    if (!mongoose.Types.ObjectId.isValid(id)) {
      return null;
    }
    const doc = await ApplicantModel.findById(id).lean<LeanApplicant>();
    return doc ? toApplicant(doc) : null;
  }

  async update(id: string, patch: ApplicantPatch, expected?: { status: ApplicantStatus }): Promise<Applicant | null> {
    if (!mongoose.Types.ObjectId.isValid(id)) {
      return null;
    }
    const match: FilterQuery<ApplicantDocument> = { _id: new mongoose.Types.ObjectId(id) };
    if (expected) {
      match.status = expected.status;
    }
    const doc = await ApplicantModel.findOneAndUpdate(match, { $set: patch }, { new: true, runValidators: true })
      .lean<LeanApplicant>();
    return doc ? toApplicant(doc) : null;
  }

  async delete(id: string): Promise<boolean> {
    if (!mongoose.Types.ObjectId.isValid(id)) {
      return false;
    }
    const result = await ApplicantModel.deleteOne({ _id: new mongoose.Types.ObjectId(id) });
    return result.deletedCount > 0;
  }

  async *iterate(filter: ApplicantFilter): AsyncGenerator<Applicant> {
    const sort: Record<string, SortOrder> =
      filter.sort === "interviewDate" ? { interviewDate: 1, _id: 1 } : { appliedDate: -1, _id: -1 };
    const query = ApplicantModel.find(buildApplicantQuery(filter)).sort(sort);
    if (filter.limit) {
      query.limit(filter.limit);
    }
    for await (const doc of query.lean<LeanApplicant[]>().cursor()) {
      yield toApplicant(doc);
    }
  }

  async count(filter: ApplicantFilter = {}): Promise<number> {
    return ApplicantModel.countDocuments(buildApplicantQuery(filter));
  }

  async countByStatus(): Promise<Partial<Record<ApplicantStatus, number>>> {
    const groups = await ApplicantModel.aggregate<{ _id: string; count: number }>([
      { $group: { _id: "$status", count: { $sum: 1 } } }
    ]);
    const counts: Partial<Record<ApplicantStatus, number>> = {};
    for (const group of groups) {
      if (isApplicantStatus(group._id)) {
        counts[group._id] = group.count;
      }
    }
    return counts;
  }
}
