// bootstrap/indexes.ts
import Cart from "../models/Cart";
import Feedback from "../models/Feedback";
import Order from "../models/Order";
import Otp from "../models/Otp";
import Product from "../models/Product";
import User from "../models/User";

/** Builds the indexes declared on each schema and drops ones no longer declared. */
export async function syncIndexes(): Promise<string[]> {
  const models = [Product, Cart, Order, User, Otp, Feedback];
  const dropped: string[] = [];

  for (const m of models) {
    dropped.push(...(await m.syncIndexes()).map((name) => `${m.collection.name}.${name}`));
  }
  return dropped;
}
