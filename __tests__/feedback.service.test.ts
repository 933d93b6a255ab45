import { beforeEach, describe, expect, it } from "vitest";
import { NotFoundError, ValidationError } from "../src/errors";
import { MemoryFeedbackRepository } from "../src/repositories/memory";
import { FeedbackService } from "../src/services/feedback.service";
import type { FeedbackInput } from "../src/types/domain";

const PRODUCT = "64b0000000000000000000a1";
const MISSING_ID = "64b0000000000000000000ff";

function note(overrides: Partial<FeedbackInput> = {}): FeedbackInput {
  return {
    name: "Asha",
    email: "asha@example.com",
    subject: "Lovely tulsi",
    message: "The second steep was even better.",
    ...overrides,
  };
}

describe("FeedbackService", () => {
  let feedback: FeedbackService;

  beforeEach(() => {
    feedback = new FeedbackService(new MemoryFeedbackRepository());
  });

  it("stores new feedback as pending", async () => {
    const created = await feedback.submit(note({ rating: 5, productId: PRODUCT }));

    expect(created).toMatchObject({ name: "Asha", rating: 5, productId: PRODUCT, status: "pending" });
    expect(await feedback.get(created.id)).toEqual(created);
  });

  it("filters by status and product, newest first", async () => {
    const first = await feedback.submit(note({ productId: PRODUCT }));
    const second = await feedback.submit(note({ subject: "Late parcel" }));
    const third = await feedback.submit(note({ productId: PRODUCT }));
    await feedback.setStatus(second.id, "resolved");

    const forProduct = await feedback.list({ productId: PRODUCT });
    expect(forProduct.items.map((f) => f.id).sort()).toEqual([first.id, third.id].sort());
    expect(forProduct.total).toBe(2);

    const resolved = await feedback.list({ status: "resolved" });
    expect(resolved.items.map((f) => f.id)).toEqual([second.id]);
  });

  it("pages the list", async () => {
    for (let i = 0; i < 3; i++) await feedback.submit(note());

    const page = await feedback.list({}, 2, 2);
    expect(page).toMatchObject({ total: 3, page: 2, pageSize: 2, totalPages: 2 });
    expect(page.items).toHaveLength(1);
    await expect(feedback.list({}, 0)).rejects.toBeInstanceOf(ValidationError);
  });

  it("moves feedback between statuses", async () => {
    const created = await feedback.submit(note());

    expect((await feedback.setStatus(created.id, "in_progress")).status).toBe("in_progress");
    expect((await feedback.setStatus(created.id, "closed")).status).toBe("closed");
    await expect(feedback.setStatus(MISSING_ID, "closed")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("deletes feedback", async () => {
    const created = await feedback.submit(note());

    await feedback.delete(created.id);
    await expect(feedback.get(created.id)).rejects.toBeInstanceOf(NotFoundError);
    await expect(feedback.delete(created.id)).rejects.toBeInstanceOf(NotFoundError);
  });
});
