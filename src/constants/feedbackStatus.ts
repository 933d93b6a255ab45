// src/constants/feedbackStatus.ts
export const FEEDBACK_STATUSES = ["pending", "in_progress", "resolved", "closed"] as const;

export type FeedbackStatus = (typeof FEEDBACK_STATUSES)[number];
