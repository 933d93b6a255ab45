// src/controllers/feedback.controller.ts
import type { FeedbackService } from "../services/feedback.service";
import { validate } from "../middleware/validate";
import {
  feedbackIdSchema,
  listFeedbackSchema,
  setFeedbackStatusSchema,
  submitFeedbackSchema,
} from "../validators/feedback";

export function createFeedbackController(feedback: FeedbackService) {
  return {
    submit: validate(submitFeedbackSchema, async ({ body }, _req, res) => {
      const created = await feedback.submit(body);
      res.status(201).json({ id: created.id, message: "Feedback submitted", createdAt: created.createdAt });
    }),

    list: validate(listFeedbackSchema, async ({ query }, _req, res) => {
      const { page, pageSize, ...filter } = query;
      res.json(await feedback.list(filter, page, pageSize));
    }),

    get: validate(feedbackIdSchema, async ({ params }, _req, res) => {
      res.json(await feedback.get(params.id));
    }),

    setStatus: validate(setFeedbackStatusSchema, async ({ params, body }, _req, res) => {
      res.json(await feedback.setStatus(params.id, body.status));
    }),

    remove: validate(feedbackIdSchema, async ({ params }, _req, res) => {
      await feedback.delete(params.id);
      res.status(204).end();
    }),
  };
}
