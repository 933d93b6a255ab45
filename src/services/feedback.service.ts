// src/services/feedback.service.ts
import type { FeedbackStatus } from "../constants/feedbackStatus";
import { NotFoundError } from "../errors";
import type { FeedbackRepository } from "../repositories/types";
import type { Feedback, FeedbackFilter, FeedbackInput, Page } from "../types/domain";
import { logger } from "../utils/logger";
import { assertPaging, DEFAULT_PAGE_SIZE, toPage } from "./catalog.service";

/** Customer feedback and contact-form messages, triaged by admins. */
export class FeedbackService {
  constructor(private readonly feedback: FeedbackRepository) {}

  async submit(input: FeedbackInput): Promise<Feedback> {
    const created = await this.feedback.create(input);
    logger.info("feedback received", { feedbackId: created.id, productId: created.productId, rating: created.rating });
    return created;
  }

  async list(filter: FeedbackFilter, page = 1, pageSize = DEFAULT_PAGE_SIZE): Promise<Page<Feedback>> {
    assertPaging(page, pageSize);
    const { items, total } = await this.feedback.list(filter, (page - 1) * pageSize, pageSize);
    return toPage(items, total, page, pageSize);
  }

  async get(id: string): Promise<Feedback> {
    const found = await this.feedback.findById(id);
    if (!found) throw new NotFoundError("Feedback", id);
    return found;
  }

  async setStatus(id: string, status: FeedbackStatus): Promise<Feedback> {
    const updated = await this.feedback.setStatus(id, status);
    if (!updated) throw new NotFoundError("Feedback", id);
    return updated;
  }

  async delete(id: string): Promise<void> {
    if (!(await this.feedback.delete(id))) throw new NotFoundError("Feedback", id);
    logger.info("feedback deleted", { feedbackId: id });
  }
}
