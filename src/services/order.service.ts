// src/services/order.service.ts
import { canTransition, OrderStatus, RESTOCK_FROM } from "../constants/orderStatus";
import { InvalidTransitionError, NotFoundError, ValidationError } from "../errors";
import type { OrderRepository, ProductRepository } from "../repositories/types";
import type { Order, OrderPatch, Page, PaymentRecord } from "../types/domain";
import { errorMeta, logger } from "../utils/logger";
import { toMinor } from "../utils/money";
import { assertPaging, DEFAULT_PAGE_SIZE, toPage } from "./catalog.service";
import { notifyQuietly, OrderNotifier } from "./integrations/notifier";
import type { ShippingProvider } from "./integrations/shiprocket";

export interface CapturedPayment {
  gatewayOrderId?: string;
  paymentId: string;
  /** minor units, when the gateway reports it */
  amount?: number;
}

export class OrderService {
  constructor(
    private readonly orders: OrderRepository,
    private readonly products: ProductRepository,
    private readonly shipping: ShippingProvider,
    private readonly notifier: OrderNotifier
  ) {}

  async listForOwner(ownerId: string, page = 1, pageSize = DEFAULT_PAGE_SIZE): Promise<Page<Order>> {
    assertPaging(page, pageSize);
    const { items, total } = await this.orders.list({ ownerId }, (page - 1) * pageSize, pageSize);
    return toPage(items, total, page, pageSize);
  }

  /** Another customer's order reads as missing. */
  async getForOwner(ownerId: string, id: string): Promise<Order> {
    const order = await this.orders.findById(id);
    if (!order || order.ownerId !== ownerId) throw new NotFoundError("Order", id);
    return order;
  }

  async list(status: OrderStatus | undefined, page = 1, pageSize = DEFAULT_PAGE_SIZE): Promise<Page<Order>> {
    assertPaging(page, pageSize);
    const { items, total } = await this.orders.list({ status }, (page - 1) * pageSize, pageSize);
    return toPage(items, total, page, pageSize);
  }

  async get(id: string): Promise<Order> {
    const order = await this.orders.findById(id);
    if (!order) throw new NotFoundError("Order", id);
    return order;
  }

  /**
   * Moves an order along the status graph with a compare-and-set on the
   * status it was read in, so two racing transitions cannot both apply.
   */
  async transition(
    id: string,
    to: OrderStatus,
    actor: string,
    options: { note?: string; patch?: OrderPatch } = {}
  ): Promise<Order> {
    const current = await this.get(id);
    if (!canTransition(current.status, to)) {
      throw new InvalidTransitionError(current.status, to);
    }

    const updated = await this.orders.transition(
      id,
      [current.status],
      { status: to, at: new Date(), by: actor, note: options.note },
      options.patch
    );
    if (!updated) {
      const latest = await this.orders.findById(id);
      throw new InvalidTransitionError(latest?.status ?? current.status, to);
    }

    logger.info("order status changed", { orderId: id, from: current.status, to, by: actor });

    if ((to === "cancelled" || to === "refunded") && RESTOCK_FROM.includes(current.status)) {
      await this.restock(updated);
    }
    return updated;
  }

  async cancel(ownerId: string, id: string): Promise<Order> {
    const order = await this.getForOwner(ownerId, id);
    if (order.status !== "pending") {
      throw new InvalidTransitionError(order.status, "cancelled");
    }
    return this.transition(id, "cancelled", ownerId, { note: "cancelled by customer" });
  }

  /** Idempotent: a capture reported twice leaves the order as it is. */
  async markPaid(orderId: string, payment: CapturedPayment, actor = "payment-gateway"): Promise<Order> {
    const order = await this.get(orderId);
    if (order.status !== "pending") {
      if (order.payment?.paymentId && order.status !== "cancelled") return order;
      throw new InvalidTransitionError(order.status, "paid");
    }
    if (payment.amount !== undefined && payment.amount !== toMinor(order.total)) {
      throw new ValidationError("Captured amount does not match order total", [
        { path: "amount", message: `expected ${toMinor(order.total)}, got ${payment.amount}` },
      ]);
    }

    const record: PaymentRecord = {
      ...order.payment,
      gateway: "razorpay",
      gatewayOrderId: payment.gatewayOrderId ?? order.payment?.gatewayOrderId,
      paymentId: payment.paymentId,
      amount: payment.amount ?? toMinor(order.total),
      capturedAt: new Date(),
    };

    try {
      return await this.transition(orderId, "paid", actor, { patch: { payment: record } });
    } catch (err) {
      // lost a race with a duplicate delivery of the same capture
      const latest = await this.orders.findById(orderId);
      if (latest?.status === "paid" && latest.payment?.paymentId === payment.paymentId) return latest;
      throw err;
    }
  }

  async markRefunded(orderId: string, refundId: string, actor = "payment-gateway"): Promise<Order> {
    const order = await this.get(orderId);
    if (order.status === "refunded") return order;
    return this.transition(orderId, "refunded", actor, {
      patch: { payment: { ...order.payment, gateway: "razorpay", refundId } },
    });
  }

  /** Books a shipment with the carrier and moves a paid order to fulfilled. */
  async fulfil(id: string, actor: string): Promise<Order> {
    const order = await this.get(id);
    if (!canTransition(order.status, "fulfilled")) {
      throw new InvalidTransitionError(order.status, "fulfilled");
    }
    if (!order.shippingAddress) {
      throw new ValidationError("Order has no shipping address");
    }
    const shipment = await this.shipping.createShipment(order);
    const fulfilled = await this.transition(id, "fulfilled", actor, { patch: { shipment } });
    await notifyQuietly(this.notifier, "order_shipped", fulfilled);
    return fulfilled;
  }

  async markDelivered(id: string, actor: string, note?: string): Promise<Order> {
    const delivered = await this.transition(id, "delivered", actor, { note });
    await notifyQuietly(this.notifier, "order_delivered", delivered);
    return delivered;
  }

  private async restock(order: Order): Promise<void> {
    for (const line of order.items) {
      try {
        await this.products.incrementStock(line.productId, line.quantity);
      } catch (err) {
        logger.error("failed to restock order line", {
          orderId: order.id,
          productId: line.productId,
          quantity: line.quantity,
          ...errorMeta(err),
        });
      }
    }
  }
}
