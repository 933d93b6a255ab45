// scripts/setup-indexes.ts
import mongoose from "mongoose";
import { syncIndexes } from "../src/bootstrap/indexes";
import { loadConfig } from "../src/config";
import { connectWithRetry } from "../src/config/database";
import { errorMeta, logger } from "../src/utils/logger";

(async () => {
  const config = loadConfig();
  await connectWithRetry(config.database.url, config.database.name, 3);
  const dropped = await syncIndexes();
  logger.info("indexes synced", { dropped });
  await mongoose.disconnect();
})().catch(async (err) => {
  logger.error("index setup failed", errorMeta(err));
  await mongoose.disconnect();
  process.exit(1);
});
