// src/routes/feedback.routes.ts
import { Router } from "express";
import { createFeedbackController } from "../controllers/feedback.controller";
import type { Services } from "../container";
import { writeLimiter } from "../middleware/security";
import { verifyAdmin } from "../middleware/verifyAdmin";

export function feedbackRoutes({ auth, feedback }: Services, adminApiKey?: string): Router {
  const r = Router();
  const ctrl = createFeedbackController(feedback);

  /**
   * POST /feedback
   * body: { name, email, subject, message, rating?, productId?, orderId? }
   */
  r.post("/", writeLimiter, ctrl.submit);

  // triage is admin-only
  const admin = verifyAdmin(auth, adminApiKey);

  /**
   * GET /feedback
   * ?status=&productId=&page=&pageSize=
   */
  r.get("/", admin, ctrl.list);
  r.get("/:id", admin, ctrl.get);
  r.put("/:id/status", admin, ctrl.setStatus);
  r.delete("/:id", admin, ctrl.remove);

  return r;
}
