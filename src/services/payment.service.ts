// src/services/payment.service.ts
import { z } from "zod";
import { InvalidTransitionError, NotFoundError, UnauthorizedError, ValidationError } from "../errors";
import type { OrderRepository } from "../repositories/types";
import type { Order } from "../types/domain";
import { logger } from "../utils/logger";
import { toMinor } from "../utils/money";
import type { PaymentGateway } from "./integrations/razorpay";
import type { OrderService } from "./order.service";

export interface CheckoutPayment {
  orderId: string;
  gatewayOrderId: string;
  amount: number;
  currency: string;
  keyId?: string;
}

const PaymentEntity = z.object({
  id: z.string(),
  order_id: z.string().optional().nullable(),
  amount: z.number().int().optional(),
  notes: z.union([z.record(z.string(), z.unknown()), z.array(z.unknown())]).optional().nullable(),
});

const WebhookEvent = z.object({
  event: z.string(),
  payload: z
    .object({
      payment: z.object({ entity: PaymentEntity }).optional(),
      refund: z.object({ entity: z.object({ id: z.string(), payment_id: z.string().optional() }) }).optional(),
    })
    .default({}),
});

type PaymentEntity = z.infer<typeof PaymentEntity>;

export interface WebhookResult {
  event: string;
  handled: boolean;
  orderId?: string;
}

export class PaymentService {
  constructor(
    private readonly gateway: PaymentGateway,
    private readonly orders: OrderRepository,
    private readonly orderService: OrderService
  ) {}

  /** Opens a gateway order for one of the caller's pending orders. */
  async startPayment(ownerId: string, orderId: string): Promise<CheckoutPayment> {
    const order = await this.orderService.getForOwner(ownerId, orderId);
    if (order.status !== "pending") {
      throw new InvalidTransitionError(order.status, "paid");
    }

    const gatewayOrder = await this.gateway.createOrder({
      amount: toMinor(order.total),
      currency: order.currency,
      receipt: order.id,
      notes: { order_id: order.id },
    });
    await this.orders.setPayment(order.id, {
      ...order.payment,
      gateway: "razorpay",
      gatewayOrderId: gatewayOrder.id,
    });

    logger.info("payment started", { orderId: order.id, gatewayOrderId: gatewayOrder.id });
    return {
      orderId: order.id,
      gatewayOrderId: gatewayOrder.id,
      amount: gatewayOrder.amount,
      currency: gatewayOrder.currency,
      keyId: this.gateway.keyId,
    };
  }

  /** Client-side confirmation after checkout; the webhook may arrive later or first. */
  async verifyPayment(
    ownerId: string,
    input: { gatewayOrderId: string; paymentId: string; signature: string }
  ): Promise<Order> {
    if (!this.gateway.verifyPaymentSignature(input.gatewayOrderId, input.paymentId, input.signature)) {
      throw new ValidationError("Invalid payment signature", [{ path: "signature", message: "does not match" }]);
    }
    const order = await this.orders.findByGatewayOrderId(input.gatewayOrderId);
    if (!order || order.ownerId !== ownerId) {
      throw new NotFoundError("Order", input.gatewayOrderId);
    }
    return this.orderService.markPaid(order.id, {
      gatewayOrderId: input.gatewayOrderId,
      paymentId: input.paymentId,
    });
  }

  async handleWebhook(rawBody: Buffer | string, signature: string | undefined): Promise<WebhookResult> {
    if (!this.gateway.verifyWebhookSignature(rawBody, signature)) {
      throw new UnauthorizedError("Invalid webhook signature");
    }

    let json: unknown;
    try {
      json = JSON.parse(rawBody.toString());
    } catch {
      throw new ValidationError("Webhook body is not JSON");
    }
    const parsed = WebhookEvent.safeParse(json);
    if (!parsed.success) {
      throw new ValidationError(
        "Unrecognised webhook payload",
        parsed.error.issues.map((i) => ({ path: i.path.join("."), message: i.message }))
      );
    }
    const { event, payload } = parsed.data;
    logger.info("payment webhook received", { event });

    switch (event) {
      case "payment.captured": {
        const payment = payload.payment?.entity;
        if (!payment) throw new ValidationError("payment.captured without payment entity");
        const order = await this.orderFor(payment);
        if (!order) return { event, handled: false };
        try {
          await this.orderService.markPaid(order.id, {
            gatewayOrderId: payment.order_id ?? undefined,
            paymentId: payment.id,
            amount: payment.amount,
          });
        } catch (err) {
          // a cancelled order stays cancelled; the capture is settled with the gateway by hand
          if (!(err instanceof InvalidTransitionError)) throw err;
          logger.warn("payment captured for an order that cannot be paid", {
            orderId: order.id,
            paymentId: payment.id,
            status: err.from,
          });
          return { event, handled: false, orderId: order.id };
        }
        return { event, handled: true, orderId: order.id };
      }
      case "refund.processed": {
        const payment = payload.payment?.entity;
        const refund = payload.refund?.entity;
        if (!payment || !refund) throw new ValidationError("refund.processed without payment or refund entity");
        const order = await this.orderFor(payment);
        if (!order) return { event, handled: false };
        await this.orderService.markRefunded(order.id, refund.id);
        return { event, handled: true, orderId: order.id };
      }
      default:
        return { event, handled: false };
    }
  }

  private async orderFor(payment: PaymentEntity): Promise<Order | null> {
    const notes = payment.notes && !Array.isArray(payment.notes) ? payment.notes : {};
    const noted = typeof notes.order_id === "string" ? notes.order_id : undefined;

    const order =
      (noted ? await this.orders.findById(noted) : null) ??
      (payment.order_id ? await this.orders.findByGatewayOrderId(payment.order_id) : null);

    if (!order) {
      logger.warn("payment webhook for unknown order", { paymentId: payment.id, orderId: noted });
    }
    return order;
  }
}
