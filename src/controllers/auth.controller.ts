// src/controllers/auth.controller.ts
import type { AuthService } from "../services/auth.service";
import { asyncRoute, validate } from "../middleware/validate";
import { requireUser } from "../middleware/auth";
import { requestOtpSchema, verifyOtpSchema } from "../validators/auth";

export function createAuthController(auth: AuthService) {
  return {
    requestOtp: validate(requestOtpSchema, async ({ body }, _req, res) => {
      const { expiresAt } = await auth.requestOtp(body.phone);
      res.status(202).json({ message: "OTP sent", expiresAt });
    }),

    verifyOtp: validate(verifyOtpSchema, async ({ body }, _req, res) => {
      const { token, user } = await auth.verifyOtp(body.phone, body.code);
      res.json({ token, user });
    }),

    me: asyncRoute(async (req, res) => {
      res.json(await auth.me(requireUser(req).id));
    }),
  };
}
