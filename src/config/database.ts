// src/config/database.ts
import mongoose from "mongoose";
import type { StoreStatus } from "../routes/health.routes";
import { errorMeta, logger } from "../utils/logger";

export async function connectWithRetry(uri: string, dbName: string, maxAttempts = 10): Promise<void> {
  let attempt = 0;

  while (attempt < maxAttempts) {
    attempt++;
    try {
      await mongoose.connect(uri, {
        dbName,
        serverSelectionTimeoutMS: 30000,
        connectTimeoutMS: 30000,
      });
      logger.info("connected to MongoDB", { db: mongoose.connection.db?.databaseName ?? dbName, attempt });
      return;
    } catch (err) {
      logger.error("MongoDB connect attempt failed", { attempt, maxAttempts, ...errorMeta(err) });
      if (attempt >= maxAttempts) break;
      const backoff = Math.min(3000 * attempt, 30000);
      await new Promise((r) => setTimeout(r, backoff));
    }
  }
  throw new Error(`Could not connect to MongoDB after ${maxAttempts} attempts`);
}

export function mongoStatus(): StoreStatus {
  // 1 = connected
  return mongoose.connection.readyState === 1 ? "up" : "down";
}

export async function disconnect(): Promise<void> {
  await mongoose.disconnect();
}
