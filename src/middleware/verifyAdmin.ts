// middleware/verifyAdmin.ts
import crypto from "crypto";
import type { RequestHandler } from "express";
import { UnauthorizedError } from "../errors";
import type { AuthService } from "../services/auth.service";
import { authenticate } from "./auth";
import { requireAdmin } from "./rbac";

export const ADMIN_KEY_ACTOR = "admin-api-key";

function sameKey(expected: string, received: string): boolean {
  const a = crypto.createHash("sha256").update(expected).digest();
  const b = crypto.createHash("sha256").update(received).digest();
  return crypto.timingSafeEqual(a, b);
}

/**
 * Admin access: `X-Admin-Key` matching the configured key, or a bearer
 * token whose user has the admin role.
 */
export const verifyAdmin = (auth: AuthService, adminApiKey?: string): RequestHandler => {
  const bearer = authenticate(auth);

  return (req, res, next) => {
    const key = req.get("x-admin-key");
    if (key === undefined) {
      bearer(req, res, (err?: unknown) => {
        if (err) {
          next(err);
          return;
        }
        requireAdmin(req, res, next);
      });
      return;
    }

    if (adminApiKey && sameKey(adminApiKey, key)) {
      req.user = { id: ADMIN_KEY_ACTOR, role: "admin" };
      next();
      return;
    }
    next(new UnauthorizedError("Invalid admin key"));
  };
};
