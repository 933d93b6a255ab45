// src/middleware/rbac.ts
import type { RequestHandler } from "express";
import { ForbiddenError, UnauthorizedError } from "../errors";
import type { UserRole } from "../types/domain";

export const requireRole =
  (requiredRole: UserRole | UserRole[]): RequestHandler =>
  (req, _res, next) => {
    if (!req.user) {
      next(new UnauthorizedError());
      return;
    }
    // admin passes every role check
    const roles = Array.isArray(requiredRole) ? requiredRole : [requiredRole];
    if (req.user.role === "admin" || roles.includes(req.user.role)) {
      next();
      return;
    }
    next(new ForbiddenError());
  };

export const requireAdmin = requireRole("admin");
