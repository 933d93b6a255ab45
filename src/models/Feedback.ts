// src/models/Feedback.ts
import mongoose, { Schema, Types } from "mongoose";
import { FEEDBACK_STATUSES, FeedbackStatus } from "../constants/feedbackStatus";

export interface IFeedback {
  _id: Types.ObjectId;
  name: string;
  email: string;
  subject: string;
  message: string;
  rating?: number;
  productId?: string;
  orderId?: string;
  status: FeedbackStatus;
  createdAt: Date;
  updatedAt: Date;
}

const FeedbackSchema = new Schema<IFeedback>(
  {
    name: { type: String, required: true, trim: true },
    email: { type: String, required: true, trim: true, lowercase: true },
    subject: { type: String, required: true, trim: true },
    message: { type: String, required: true },
    rating: { type: Number, min: 1, max: 5 },
    productId: { type: String },
    orderId: { type: String },
    status: { type: String, enum: [...FEEDBACK_STATUSES], default: "pending" },
  },
  { timestamps: true, collection: "feedback" }
);

FeedbackSchema.index({ status: 1, createdAt: -1 });
FeedbackSchema.index({ productId: 1, createdAt: -1 });

export default mongoose.model<IFeedback>("Feedback", FeedbackSchema);
