// src/services/checkout.service.ts
import { InsufficientStockError, NotFoundError, ValidationError } from "../errors";
import type { CartRepository, OrderRepository, ProductRepository, UserRepository } from "../repositories/types";
import type { CartLine, Order, OrderLine } from "../types/domain";
import { errorMeta, logger } from "../utils/logger";
import { computeTotals, lineTotal, PricingRules } from "../utils/money";
import { notifyQuietly, OrderNotifier } from "./integrations/notifier";

export interface CheckoutInput {
  addressId?: string;
  notes?: string;
}

interface Reservation {
  productId: string;
  quantity: number;
}

/**
 * Turns a cart into an order. The cart is emptied atomically up front and
 * only the lines it held are checked out. Stock is taken line by line with
 * the store's atomic decrement-if-sufficient; if any line cannot be taken,
 * or the order cannot be written, the stock taken so far and the claimed
 * lines are put back before the error propagates.
 */
export class CheckoutService {
  constructor(
    private readonly carts: CartRepository,
    private readonly products: ProductRepository,
    private readonly orders: OrderRepository,
    private readonly users: UserRepository,
    private readonly pricing: PricingRules & { currency: string },
    private readonly notifier: OrderNotifier
  ) {}

  async checkout(ownerId: string, input: CheckoutInput = {}): Promise<Order> {
    const shippingAddress = await this.resolveAddress(ownerId, input.addressId);

    // claim the lines first so a second checkout of the same cart finds it empty
    const cart = await this.carts.take(ownerId);
    if (!cart) {
      throw new ValidationError("Cart is empty");
    }

    const reserved: Reservation[] = [];
    let order: Order;
    try {
      const lines: OrderLine[] = [];
      for (const item of cart.items) {
        const product = await this.products.decrementStock(item.productId, item.quantity, { requireActive: true });
        if (!product) {
          throw await this.explainRejection(item.productId, item.quantity);
        }
        reserved.push({ productId: item.productId, quantity: item.quantity });

        // the price returned by the decrement is the price the buyer pays
        lines.push({
          productId: product.id,
          name: product.name,
          unitPrice: product.price,
          quantity: item.quantity,
          lineTotal: lineTotal(product.price, item.quantity),
        });
      }

      const totals = computeTotals(lines, this.pricing);
      order = await this.orders.create({
        ownerId,
        items: lines,
        currency: this.pricing.currency,
        ...totals,
        status: "pending",
        statusHistory: [{ status: "pending", at: new Date(), by: ownerId }],
        shippingAddress,
        notes: input.notes,
      });
    } catch (err) {
      await this.release(ownerId, reserved);
      await this.restoreCart(ownerId, cart.items);
      throw err;
    }

    logger.info("checkout completed", {
      orderId: order.id,
      ownerId,
      lines: order.items.length,
      total: order.total,
    });
    await notifyQuietly(this.notifier, "order_placed", order);
    return order;
  }

  private async resolveAddress(ownerId: string, addressId?: string): Promise<Order["shippingAddress"]> {
    const user = await this.users.findById(ownerId);
    const addresses = user?.addresses ?? [];
    const chosen = addressId ? addresses.find((a) => a.id === addressId) : addresses.find((a) => a.isDefault);

    if (addressId && !chosen) {
      throw new ValidationError("Unknown address", [{ path: "addressId", message: "not one of your addresses" }]);
    }
    if (!chosen) return undefined;

    return {
      line1: chosen.line1,
      line2: chosen.line2,
      city: chosen.city,
      state: chosen.state,
      pincode: chosen.pincode,
      country: chosen.country,
    };
  }

  private async explainRejection(productId: string, quantity: number): Promise<Error> {
    const product = await this.products.findById(productId);
    if (!product) return new NotFoundError("Product", productId);
    if (!product.active) {
      return new ValidationError("Product is not available", [{ path: "productId", message: `${productId} is inactive` }]);
    }
    return new InsufficientStockError(productId, quantity, product.stock);
  }

  private async release(ownerId: string, reserved: Reservation[]): Promise<void> {
    if (reserved.length === 0) return;
    logger.warn("checkout aborted, releasing reserved stock", { ownerId, lines: reserved.length });

    for (const r of reserved) {
      try {
        await this.products.incrementStock(r.productId, r.quantity);
      } catch (err) {
        // keep releasing the other lines; the first error still propagates
        logger.error("failed to release reserved stock", { ownerId, ...r, ...errorMeta(err) });
      }
    }
  }

  /** Merges the claimed lines back, keeping anything added to the cart meanwhile. */
  private async restoreCart(ownerId: string, items: CartLine[]): Promise<void> {
    for (const item of items) {
      try {
        await this.carts.addItem(ownerId, item.productId, item.quantity);
      } catch (err) {
        logger.error("failed to restore cart line", { ownerId, productId: item.productId, ...errorMeta(err) });
      }
    }
  }
}
