// src/middleware/auth.ts
import type { Request, RequestHandler } from "express";
import { UnauthorizedError } from "../errors";
import type { AuthService, AuthUser } from "../services/auth.service";

export function bearerToken(req: Request): string | undefined {
  const header = req.headers.authorization;
  if (!header?.startsWith("Bearer ")) return undefined;
  const token = header.slice("Bearer ".length).trim();
  return token || undefined;
}

/** Requires a valid bearer token and puts the caller on `req.user`. */
export const authenticate =
  (auth: AuthService): RequestHandler =>
  (req, _res, next) => {
    const token = bearerToken(req);
    if (!token) {
      next(new UnauthorizedError());
      return;
    }
    auth
      .authenticate(token)
      .then((user) => {
        req.user = user;
        next();
      })
      .catch(next);
  };

/** For handlers mounted behind `authenticate`. */
export function requireUser(req: Request): AuthUser {
  if (!req.user) throw new UnauthorizedError();
  return req.user;
}
