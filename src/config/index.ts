// src/config/index.ts
import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const bool = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  LOG_LEVEL: z.enum(["error", "warn", "info", "http", "verbose", "debug"]).default("info"),

  STORE_DRIVER: z.enum(["mongo", "memory"]).default("mongo"),
  MONGODB_URL: optionalString,
  MONGO_URI: optionalString,
  MONGODB_DB: z.string().min(1).default("teawebsite"),

  COMMERCE_ENABLED: bool.default("false"),
  CORS_ORIGINS: z.string().default("http://localhost:3000,http://localhost:3001"),

  JWT_SECRET: z.string().min(1).default("change-me"),
  JWT_TTL_SECONDS: z.coerce.number().int().positive().default(7 * 24 * 60 * 60),
  ADMIN_API_KEY: optionalString,
  OTP_TTL_SECONDS: z.coerce.number().int().positive().default(300),
  OTP_RESEND_SECONDS: z.coerce.number().int().min(0).default(60),

  AI_API_KEY: optionalString,
  AI_BASE_URL: z.string().url().default("https://api.openai.com/v1"),
  AI_MODEL: z.string().default("gpt-4o-mini"),
  AI_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),

  RAZORPAY_KEY_ID: optionalString,
  RAZORPAY_KEY_SECRET: optionalString,
  RAZORPAY_WEBHOOK_SECRET: optionalString,
  RAZORPAY_BASE_URL: z.string().url().default("https://api.razorpay.com/v1"),

  SHIPROCKET_TOKEN: optionalString,
  SHIPROCKET_BASE_URL: z.string().url().default("https://apiv2.shiprocket.in/v1/external"),

  FREE_SHIPPING_THRESHOLD: z.coerce.number().min(0).default(499),
  SHIPPING_FEE: z.coerce.number().min(0).default(49),
  TAX_RATE: z.coerce.number().min(0).max(1).default(0.05),
  CURRENCY: z.string().length(3).default("INR"),
});

export type Env = z.input<typeof EnvSchema>;

export interface Config {
  env: "development" | "production" | "test";
  port: number;
  logLevel: string;
  database: {
    driver: "mongo" | "memory";
    url: string;
    name: string;
  };
  features: {
    commerce: boolean;
  };
  cors: {
    origins: string[];
  };
  auth: {
    jwtSecret: string;
    jwtTtlSeconds: number;
    adminApiKey?: string;
    otpTtlSeconds: number;
    otpResendSeconds: number;
  };
  ai: {
    apiKey?: string;
    baseUrl: string;
    model: string;
    timeoutMs: number;
  };
  payments: {
    keyId?: string;
    keySecret?: string;
    webhookSecret?: string;
    baseUrl: string;
  };
  shipping: {
    token?: string;
    baseUrl: string;
  };
  pricing: {
    currency: string;
    freeShippingThreshold: number;
    shippingFee: number;
    taxRate: number;
  };
}

/**
 * Reads and validates the process environment. Called once at startup;
 * tests pass their own env object.
 */
export function loadConfig(source: Record<string, string | undefined> = process.env): Config {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${problems}`);
  }
  const env = parsed.data;

  if (env.NODE_ENV === "production" && env.JWT_SECRET === "change-me") {
    throw new Error("Invalid configuration: JWT_SECRET must be set in production");
  }

  const origins =
    env.NODE_ENV === "development"
      ? ["*"]
      : env.CORS_ORIGINS.split(",")
          .map((s) => s.trim())
          .filter(Boolean);

  return {
    env: env.NODE_ENV,
    port: env.PORT,
    logLevel: env.LOG_LEVEL,
    database: {
      driver: env.STORE_DRIVER,
      url: env.MONGODB_URL ?? env.MONGO_URI ?? "mongodb://localhost:27017",
      name: env.MONGODB_DB,
    },
    features: {
      commerce: env.COMMERCE_ENABLED,
    },
    cors: { origins },
    auth: {
      jwtSecret: env.JWT_SECRET,
      jwtTtlSeconds: env.JWT_TTL_SECONDS,
      adminApiKey: env.ADMIN_API_KEY,
      otpTtlSeconds: env.OTP_TTL_SECONDS,
      otpResendSeconds: env.OTP_RESEND_SECONDS,
    },
    ai: {
      apiKey: env.AI_API_KEY,
      baseUrl: env.AI_BASE_URL,
      model: env.AI_MODEL,
      timeoutMs: env.AI_TIMEOUT_MS,
    },
    payments: {
      keyId: env.RAZORPAY_KEY_ID,
      keySecret: env.RAZORPAY_KEY_SECRET,
      webhookSecret: env.RAZORPAY_WEBHOOK_SECRET,
      baseUrl: env.RAZORPAY_BASE_URL,
    },
    shipping: {
      token: env.SHIPROCKET_TOKEN,
      baseUrl: env.SHIPROCKET_BASE_URL,
    },
    pricing: {
      currency: env.CURRENCY,
      freeShippingThreshold: env.FREE_SHIPPING_THRESHOLD,
      shippingFee: env.SHIPPING_FEE,
      taxRate: env.TAX_RATE,
    },
  };
}
