// validators/auth.ts
import { z } from "zod";

/** Indian mobile numbers, with or without the +91 prefix. */
const phone = z
  .string()
  .trim()
  .regex(/^(\+91)?[6-9]\d{9}$/, "must be a valid mobile number")
  .transform((p) => (p.startsWith("+91") ? p : `+91${p}`));

export const requestOtpSchema = z.object({
  body: z.object({ phone }),
});

export const verifyOtpSchema = z.object({
  body: z.object({ phone, code: z.string().regex(/^\d{6}$/, "must be 6 digits") }),
});
