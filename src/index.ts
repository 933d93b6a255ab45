// src/index.ts
import mongoose from "mongoose";
import { createApp } from "./app";
import { syncIndexes } from "./bootstrap/indexes";
import { loadConfig } from "./config";
import { connectWithRetry, disconnect, mongoStatus } from "./config/database";
import { createServices } from "./container";
import { createMemoryRepositories } from "./repositories/memory";
import { createMongoRepositories } from "./repositories/mongo";
import type { StoreStatus } from "./routes/health.routes";
import { errorMeta, logger, setLogLevel } from "./utils/logger";

const startServer = async () => {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  logger.info("booting", { pid: process.pid, env: config.env, store: config.database.driver });

  let repos = createMemoryRepositories();
  let storeStatus: () => StoreStatus = () => "memory";

  if (config.database.driver === "mongo") {
    await connectWithRetry(config.database.url, config.database.name);

    if (config.env === "production") {
      mongoose.set("autoIndex", false);
    }
    try {
      const dropped = await syncIndexes();
      logger.info("indexes synced", { dropped });
    } catch (err) {
      logger.warn("index sync failed (continuing)", errorMeta(err));
    }

    repos = createMongoRepositories();
    storeStatus = mongoStatus;
  } else {
    logger.warn("using in-memory store; data is lost on restart");
  }

  const app = createApp({ config, services: createServices(repos, config), storeStatus });
  const server = app.listen(config.port, "0.0.0.0", () => {
    logger.info("server listening", { port: config.port, commerce: config.features.commerce });
  });

  const shutdown = (signal: string) => {
    logger.info("shutting down", { signal });
    server.close(() => {
      disconnect()
        .then(() => process.exit(0))
        .catch((err) => {
          logger.error("disconnect failed", errorMeta(err));
          process.exit(1);
        });
    });
  };
  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
};

startServer().catch((err) => {
  logger.error("startup failed", errorMeta(err));
  process.exit(1);
});
