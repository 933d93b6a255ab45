// src/repositories/mongo/cart.repository.ts
import { Types } from "mongoose";
import CartModel, { ICart } from "../../models/Cart";
import { withRetry } from "../../utils/retry";
import type { Cart } from "../../types/domain";
import type { CartRepository } from "../types";
import { isDuplicateKey } from "./isDuplicateKey";

function toCart(doc: ICart): Cart {
  return {
    id: doc._id.toString(),
    ownerId: doc.owner.toString(),
    items: doc.items.map((i) => ({
      productId: i.product.toString(),
      quantity: i.quantity,
      addedAt: i.addedAt,
    })),
    updatedAt: doc.updatedAt,
  };
}

export class MongoCartRepository implements CartRepository {
  async findByOwner(ownerId: string): Promise<Cart | null> {
    const doc = await withRetry("carts.findByOwner", () =>
      CartModel.findOne({ owner: new Types.ObjectId(ownerId) }).lean<ICart>().exec()
    );
    return doc ? toCart(doc) : null;
  }

  async addItem(ownerId: string, productId: string, quantity: number): Promise<Cart> {
    const owner = new Types.ObjectId(ownerId);
    const product = new Types.ObjectId(productId);

    // Two passes: a concurrent add can create the line (or the cart)
    // between our $inc and our upsert.
    for (let pass = 0; pass < 2; pass++) {
      const merged = await withRetry(
        "carts.addItem.merge",
        () =>
          CartModel.findOneAndUpdate(
            { owner, "items.product": product },
            { $inc: { "items.$.quantity": quantity } },
            { new: true }
          )
            .lean<ICart>()
            .exec(),
        { idempotent: false }
      );
      if (merged) return toCart(merged);

      try {
        const pushed = await withRetry(
          "carts.addItem.push",
          () =>
            CartModel.findOneAndUpdate(
              { owner, "items.product": { $ne: product } },
              { $push: { items: { product, quantity, addedAt: new Date() } } },
              { new: true, upsert: true }
            )
              .lean<ICart>()
              .exec(),
          { idempotent: false }
        );
        if (pushed) return toCart(pushed);
      } catch (err) {
        if (!isDuplicateKey(err)) throw err;
      }
    }
    throw new Error(`Could not add product ${productId} to cart of ${ownerId}`);
  }

  async setQuantity(ownerId: string, productId: string, quantity: number): Promise<Cart | null> {
    const doc = await withRetry("carts.setQuantity", () =>
      CartModel.findOneAndUpdate(
        { owner: new Types.ObjectId(ownerId), "items.product": new Types.ObjectId(productId) },
        { $set: { "items.$.quantity": quantity } },
        { new: true }
      )
        .lean<ICart>()
        .exec()
    );
    return doc ? toCart(doc) : null;
  }

  async removeItem(ownerId: string, productId: string): Promise<Cart | null> {
    const doc = await withRetry("carts.removeItem", () =>
      CartModel.findOneAndUpdate(
        { owner: new Types.ObjectId(ownerId) },
        { $pull: { items: { product: new Types.ObjectId(productId) } } },
        { new: true }
      )
        .lean<ICart>()
        .exec()
    );
    return doc ? toCart(doc) : null;
  }

  async clear(ownerId: string): Promise<void> {
    await withRetry("carts.clear", () =>
      CartModel.updateOne({ owner: new Types.ObjectId(ownerId) }, { $set: { items: [] } }).exec()
    );
  }

  async take(ownerId: string): Promise<Cart | null> {
    // returns the document as it was before the items were emptied
    const doc = await withRetry(
      "carts.take",
      () =>
        CartModel.findOneAndUpdate(
          { owner: new Types.ObjectId(ownerId), "items.0": { $exists: true } },
          { $set: { items: [] } },
          { new: false }
        )
          .lean<ICart>()
          .exec(),
      { idempotent: false }
    );
    return doc ? toCart(doc) : null;
  }
}
