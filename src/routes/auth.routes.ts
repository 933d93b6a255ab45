// src/routes/auth.routes.ts
import { Router } from "express";
import { createAuthController } from "../controllers/auth.controller";
import type { Services } from "../container";
import { authenticate } from "../middleware/auth";
import { otpLimiter } from "../middleware/security";

export function authRoutes({ auth }: Services): Router {
  const r = Router();
  const ctrl = createAuthController(auth);

  r.post("/otp/request", otpLimiter, ctrl.requestOtp);
  r.post("/otp/verify", otpLimiter, ctrl.verifyOtp);
  r.get("/me", authenticate(auth), ctrl.me);

  return r;
}
