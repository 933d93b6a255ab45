// src/repositories/mongo/feedback.repository.ts
import { FilterQuery, Types } from "mongoose";
import type { FeedbackStatus } from "../../constants/feedbackStatus";
import FeedbackModel, { IFeedback } from "../../models/Feedback";
import type { Feedback, FeedbackFilter, FeedbackInput } from "../../types/domain";
import { withRetry } from "../../utils/retry";
import type { FeedbackRepository, Slice } from "../types";

function toFeedback(doc: IFeedback): Feedback {
  return {
    id: doc._id.toString(),
    name: doc.name,
    email: doc.email,
    subject: doc.subject,
    message: doc.message,
    rating: doc.rating ?? undefined,
    productId: doc.productId ?? undefined,
    orderId: doc.orderId ?? undefined,
    status: doc.status,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

const isId = (id: string) => Types.ObjectId.isValid(id) && /^[0-9a-f]{24}$/i.test(id);

export class MongoFeedbackRepository implements FeedbackRepository {
  async create(input: FeedbackInput): Promise<Feedback> {
    const doc = await withRetry("feedback.create", () => FeedbackModel.create(input), { idempotent: false });
    return toFeedback(doc.toObject());
  }

  async findById(id: string): Promise<Feedback | null> {
    if (!isId(id)) return null;
    const doc = await withRetry("feedback.findById", () => FeedbackModel.findById(id).lean<IFeedback>().exec());
    return doc ? toFeedback(doc) : null;
  }

  async list(filter: FeedbackFilter, skip: number, limit: number): Promise<Slice<Feedback>> {
    const query: FilterQuery<IFeedback> = {};
    if (filter.status) query.status = filter.status;
    if (filter.productId) query.productId = filter.productId;

    const [docs, total] = await withRetry("feedback.list", () =>
      Promise.all([
        FeedbackModel.find(query).sort({ createdAt: -1, _id: -1 }).skip(skip).limit(limit).lean<IFeedback[]>().exec(),
        FeedbackModel.countDocuments(query).exec(),
      ])
    );
    return { items: docs.map(toFeedback), total };
  }

  async setStatus(id: string, status: FeedbackStatus): Promise<Feedback | null> {
    if (!isId(id)) return null;
    const doc = await withRetry("feedback.setStatus", () =>
      FeedbackModel.findByIdAndUpdate(id, { $set: { status } }, { new: true, runValidators: true })
        .lean<IFeedback>()
        .exec()
    );
    return doc ? toFeedback(doc) : null;
  }

  async delete(id: string): Promise<boolean> {
    if (!isId(id)) return false;
    const res = await withRetry("feedback.delete", () => FeedbackModel.deleteOne({ _id: id }).exec());
    return res.deletedCount === 1;
  }
}
