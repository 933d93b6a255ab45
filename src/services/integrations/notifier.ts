// src/services/integrations/notifier.ts
import type { Order } from "../../types/domain";
import { errorMeta, logger } from "../../utils/logger";

export type OrderEvent = "order_placed" | "order_shipped" | "order_delivered";

export interface OrderNotifier {
  notify(event: OrderEvent, order: Order): Promise<void>;
}

/** Writes order events to the log; WhatsApp/SMS templates plug in behind OrderNotifier. */
export class LogOrderNotifier implements OrderNotifier {
  async notify(event: OrderEvent, order: Order): Promise<void> {
    logger.info("order notification", {
      event,
      orderId: order.id,
      ownerId: order.ownerId,
      total: order.total,
      ...(order.shipment?.awb ? { awb: order.shipment.awb } : {}),
    });
  }
}

/** The order change has already been stored, so a failed notification is only logged. */
export async function notifyQuietly(notifier: OrderNotifier, event: OrderEvent, order: Order): Promise<void> {
  try {
    await notifier.notify(event, order);
  } catch (err) {
    logger.warn("order notification failed", { event, orderId: order.id, ...errorMeta(err) });
  }
}
