// src/repositories/mongo/index.ts
import type { Repositories } from "../types";
import { MongoCartRepository } from "./cart.repository";
import { MongoFeedbackRepository } from "./feedback.repository";
import { MongoOrderRepository } from "./order.repository";
import { MongoOtpRepository } from "./otp.repository";
import { MongoProductRepository } from "./product.repository";
import { MongoUserRepository } from "./user.repository";

export function createMongoRepositories(): Repositories {
  return {
    products: new MongoProductRepository(),
    carts: new MongoCartRepository(),
    orders: new MongoOrderRepository(),
    users: new MongoUserRepository(),
    otps: new MongoOtpRepository(),
    feedback: new MongoFeedbackRepository(),
  };
}
