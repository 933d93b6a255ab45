// scripts/seed.ts
import fs from "fs";
import path from "path";
import mongoose from "mongoose";
import { z } from "zod";
import { loadConfig } from "../src/config";
import { connectWithRetry } from "../src/config/database";
import Product from "../src/models/Product";
import { slugify } from "../src/services/catalog.service";
import { errorMeta, logger } from "../src/utils/logger";
import { createProductSchema } from "../src/validators/products";

const SeedFile = z.array(createProductSchema.shape.body);

(async () => {
  const config = loadConfig();
  const file = path.join(__dirname, "data", "products.json");
  const products = SeedFile.parse(JSON.parse(fs.readFileSync(file, "utf8")));

  await connectWithRetry(config.database.url, config.database.name, 3);

  let inserted = 0;
  for (const p of products) {
    const slug = slugify(p.slug ?? p.name);
    const { stock, ...fields } = p;
    const res = await Product.updateOne(
      { slug },
      {
        $set: { ...fields, slug, currency: p.currency ?? config.pricing.currency },
        // re-seeding never resets stock that has been sold down
        $setOnInsert: { stock },
      },
      { upsert: true, runValidators: true }
    );
    inserted += res.upsertedCount;
  }

  logger.info("seed done", { products: products.length, inserted });
  await mongoose.disconnect();
})().catch(async (err) => {
  logger.error("seed failed", errorMeta(err));
  await mongoose.disconnect();
  process.exit(1);
});
