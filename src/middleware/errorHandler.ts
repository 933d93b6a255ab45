// src/middleware/errorHandler.ts
import type { ErrorRequestHandler, RequestHandler } from "express";
import mongoose from "mongoose";
import { ErrorDetail, isAppError } from "../errors";
import { errorMeta, logger } from "../utils/logger";

interface ErrorBody {
  message: string;
  code: string;
  details?: unknown;
}

/** body-parser marks its own failures with `type` and `status`. */
function isBodyParseError(err: unknown): err is SyntaxError & { status: number; type: string } {
  return err instanceof SyntaxError && "type" in err && err.type === "entity.parse.failed";
}

export const notFoundHandler: RequestHandler = (_req, res) => {
  res.status(404).json({ message: "Route not found", code: "NOT_FOUND" });
};

export const errorHandler: ErrorRequestHandler = (err, req, res, next) => {
  if (res.headersSent) {
    next(err);
    return;
  }

  let status = 500;
  let body: ErrorBody = { message: "Internal server error", code: "INTERNAL_ERROR" };

  if (isAppError(err)) {
    status = err.status;
    body = { message: err.message, code: err.code };
    if (err.details !== undefined) body.details = err.details;
  } else if (isBodyParseError(err)) {
    status = 400;
    body = { message: "Malformed JSON body", code: "BAD_REQUEST" };
  } else if (err instanceof mongoose.Error.ValidationError) {
    // schema validators on writes that got past the request schemas
    status = 422;
    const details: ErrorDetail[] = Object.values(err.errors).map((e) => ({ path: e.path, message: e.message }));
    body = { message: "Invalid document", code: "VALIDATION_ERROR", details };
  } else if (err instanceof mongoose.Error.CastError) {
    status = 422;
    body = {
      message: `Invalid value for ${err.path}`,
      code: "VALIDATION_ERROR",
      details: [{ path: err.path, message: err.message }],
    };
  }

  if (status >= 500) {
    logger.error("request failed", { method: req.method, url: req.originalUrl, status, ...errorMeta(err) });
  } else {
    logger.debug("request rejected", { method: req.method, url: req.originalUrl, status, code: body.code });
  }

  res.status(status).json(body);
};
