import type { Express } from "express";
import helmet from "helmet";
import cors from "cors";
import rateLimit from "express-rate-limit";
import type { Config } from "../config";

function buildCors(origins: string[]): cors.CorsOptions {
  const allowAll = origins.includes("*");
  const allow = new Set(origins);

  return {
    origin(origin, cb) {
      if (!origin || allowAll) return cb(null, true); // curl, server-to-server
      if (allow.has(origin)) return cb(null, true);
      return cb(null, false);
    },
    credentials: !allowAll,
    methods: ["GET", "POST", "PUT", "PATCH", "DELETE", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization", "X-Requested-With", "X-Admin-Key"],
    maxAge: 3600,
  };
}

export function applySecurity(app: Express, config: Config): void {
  app.set("trust proxy", 1);
  app.disable("x-powered-by");

  // JSON API only
  app.use(
    helmet({
      contentSecurityPolicy: false,
      crossOriginResourcePolicy: { policy: "cross-origin" },
    })
  );

  const corsOptions = buildCors(config.cors.origins);
  app.use(cors(corsOptions));
  app.options("*", cors(corsOptions));

  if (config.env !== "test") {
    app.use(
      rateLimit({
        windowMs: 15 * 60 * 1000,
        limit: 600,
        standardHeaders: true,
        legacyHeaders: false,
        message: { message: "Too many requests, slow down.", code: "RATE_LIMITED" },
      })
    );
  }
}

export const otpLimiter = rateLimit({
  windowMs: 60 * 1000,
  limit: 5,
  standardHeaders: true,
  legacyHeaders: false,
  skip: () => process.env.NODE_ENV === "test",
  message: { message: "Too many OTP requests.", code: "RATE_LIMITED" },
});

export const writeLimiter = rateLimit({
  windowMs: 60 * 1000,
  limit: 60,
  standardHeaders: true,
  legacyHeaders: false,
  skip: () => process.env.NODE_ENV === "test",
  message: { message: "Write rate limit exceeded.", code: "RATE_LIMITED" },
});
