// src/app.ts
import express, { Express, RequestHandler } from "express";
import type { Config } from "./config";
import type { Services } from "./container";
import { errorHandler, notFoundHandler } from "./middleware/errorHandler";
import { applySecurity } from "./middleware/security";
import { addressesRoutes } from "./routes/addresses.routes";
import { adminRoutes } from "./routes/admin/adminRoutes";
import { aiRoutes } from "./routes/ai.routes";
import { authRoutes } from "./routes/auth.routes";
import { cartRoutes } from "./routes/cart.routes";
import { feedbackRoutes } from "./routes/feedback.routes";
import { healthRoutes, StoreStatus } from "./routes/health.routes";
import { ordersRoutes } from "./routes/orders.routes";
import { paymentsRoutes, webhookRoutes } from "./routes/payments.routes";
import { productsRoutes } from "./routes/products.routes";
import { logger } from "./utils/logger";

export interface AppDeps {
  config: Config;
  services: Services;
  storeStatus?: () => StoreStatus;
}

const requestLogger: RequestHandler = (req, res, next) => {
  const started = process.hrtime.bigint();
  res.on("finish", () => {
    logger.http("request", {
      method: req.method,
      url: req.originalUrl,
      status: res.statusCode,
      ms: Number(process.hrtime.bigint() - started) / 1e6,
    });
  });
  next();
};

export function createApp({ config, services, storeStatus = () => "memory" }: AppDeps): Express {
  const app = express();

  applySecurity(app, config);
  app.use(requestLogger);
  app.use(
    express.json({
      limit: "1mb",
      verify: (req, _res, buf) => {
        // webhook signatures are computed over these bytes
        if (req.url?.startsWith("/webhooks/")) {
          Object.assign(req, { rawBody: Buffer.from(buf) });
        }
      },
    })
  );

  app.use("/", healthRoutes(storeStatus));
  app.use("/products", productsRoutes(services));
  app.use("/ai", aiRoutes(services));
  app.use("/feedback", feedbackRoutes(services, config.auth.adminApiKey));

  if (config.features.commerce) {
    app.use("/auth", authRoutes(services));
    app.use("/cart", cartRoutes(services));
    app.use("/orders", ordersRoutes(services));
    app.use("/addresses", addressesRoutes(services));
    app.use("/payments", paymentsRoutes(services));
    app.use("/webhooks", webhookRoutes(services));
    app.use("/admin", adminRoutes(services, config.auth.adminApiKey));
  } else {
    logger.info("commerce routes disabled", { flag: "COMMERCE_ENABLED" });
  }

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
