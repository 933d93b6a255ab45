// middleware/validate.ts
import type { NextFunction, Request, RequestHandler, Response } from "express";
import type { z, ZodTypeAny } from "zod";
import { ValidationError } from "../errors";

/**
 * Parses `{ body, query, params }` with one zod object schema and hands the
 * typed result to the handler. Failures and thrown errors go to `next`.
 */
export const validate =
  <S extends ZodTypeAny>(
    schema: S,
    handler: (input: z.infer<S>, req: Request, res: Response) => Promise<void>
  ): RequestHandler =>
  (req, res, next) => {
    const r = schema.safeParse({ body: req.body, query: req.query, params: req.params });
    if (!r.success) {
      const errors = r.error.issues.map((i) => ({ path: i.path.join("."), message: i.message }));
      next(new ValidationError("Invalid request", errors));
      return;
    }
    handler(r.data, req, res).catch(next);
  };

export const asyncRoute =
  (handler: (req: Request, res: Response, next: NextFunction) => Promise<void>): RequestHandler =>
  (req, res, next) => {
    handler(req, res, next).catch(next);
  };
