// src/routes/payments.routes.ts
import { Router } from "express";
import { createPaymentsController } from "../controllers/payments.controller";
import type { Services } from "../container";
import { authenticate } from "../middleware/auth";
import { writeLimiter } from "../middleware/security";

export function paymentsRoutes({ auth, payments }: Services): Router {
  const r = Router();
  const ctrl = createPaymentsController(payments);

  r.use(authenticate(auth));

  r.post("/razorpay/order", writeLimiter, ctrl.startPayment);
  r.post("/razorpay/verify", ctrl.verify);

  return r;
}

/** Called by the gateway, authenticated by body signature only. */
export function webhookRoutes({ payments }: Services): Router {
  const r = Router();
  r.post("/payment", createPaymentsController(payments).webhook);
  return r;
}
