// validators/feedback.ts
import { z } from "zod";
import { FEEDBACK_STATUSES } from "../constants/feedbackStatus";
import { idParams, objectId, paging } from "./common";

const text = (max: number) => z.string().trim().min(1).max(max);

export const submitFeedbackSchema = z.object({
  body: z.object({
    name: text(120),
    email: z.string().trim().toLowerCase().email(),
    subject: text(200),
    message: text(5000),
    rating: z.number().int().min(1).max(5).optional(),
    productId: objectId.optional(),
    orderId: objectId.optional(),
  }),
});

export const listFeedbackSchema = z.object({
  query: z.object({
    status: z.enum(FEEDBACK_STATUSES).optional(),
    productId: objectId.optional(),
    ...paging,
  }),
});

export const feedbackIdSchema = z.object({ params: idParams });

export const setFeedbackStatusSchema = z.object({
  params: idParams,
  body: z.object({ status: z.enum(FEEDBACK_STATUSES) }),
});
