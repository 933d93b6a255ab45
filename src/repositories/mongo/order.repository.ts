// src/repositories/mongo/order.repository.ts
import { FilterQuery, Types } from "mongoose";
import OrderModel, { IOrder } from "../../models/Order";
import type { OrderStatus } from "../../constants/orderStatus";
import { withRetry } from "../../utils/retry";
import type {
  NewOrder,
  Order,
  OrderFilter,
  OrderPatch,
  PaymentRecord,
  StatusChange,
} from "../../types/domain";
import type { OrderRepository, Slice } from "../types";

function toOrder(doc: IOrder): Order {
  return {
    id: doc._id.toString(),
    ownerId: doc.owner.toString(),
    items: doc.items.map((i) => ({
      productId: i.product.toString(),
      name: i.name,
      unitPrice: i.unitPrice,
      quantity: i.quantity,
      lineTotal: i.lineTotal,
    })),
    currency: doc.currency,
    subtotal: doc.subtotal,
    shipping: doc.shipping,
    tax: doc.tax,
    total: doc.total,
    status: doc.status,
    statusHistory: doc.statusHistory.map((h) => ({
      status: h.status,
      at: h.at,
      by: h.by,
      note: h.note ?? undefined,
    })),
    shippingAddress: doc.shippingAddress?.line1
      ? {
          line1: doc.shippingAddress.line1,
          line2: doc.shippingAddress.line2 ?? undefined,
          city: doc.shippingAddress.city,
          state: doc.shippingAddress.state,
          pincode: doc.shippingAddress.pincode,
          country: doc.shippingAddress.country,
        }
      : undefined,
    payment: doc.payment?.gateway ? { ...doc.payment } : undefined,
    shipment: doc.shipment?.shipmentId ? { ...doc.shipment } : undefined,
    notes: doc.notes ?? undefined,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

const isId = (id: string) => Types.ObjectId.isValid(id) && /^[0-9a-f]{24}$/i.test(id);

export class MongoOrderRepository implements OrderRepository {
  async create(order: NewOrder): Promise<Order> {
    const { ownerId, items, ...rest } = order;
    const doc = await withRetry(
      "orders.create",
      () =>
        OrderModel.create({
          ...rest,
          owner: new Types.ObjectId(ownerId),
          items: items.map((i) => ({
            product: new Types.ObjectId(i.productId),
            name: i.name,
            unitPrice: i.unitPrice,
            quantity: i.quantity,
            lineTotal: i.lineTotal,
          })),
        }),
      { idempotent: false }
    );
    return toOrder(doc.toObject());
  }

  async findById(id: string): Promise<Order | null> {
    if (!isId(id)) return null;
    const doc = await withRetry("orders.findById", () =>
      OrderModel.findById(id).lean<IOrder>().exec()
    );
    return doc ? toOrder(doc) : null;
  }

  async findByGatewayOrderId(gatewayOrderId: string): Promise<Order | null> {
    const doc = await withRetry("orders.findByGatewayOrderId", () =>
      OrderModel.findOne({ "payment.gatewayOrderId": gatewayOrderId }).lean<IOrder>().exec()
    );
    return doc ? toOrder(doc) : null;
  }

  async list(filter: OrderFilter, skip: number, limit: number): Promise<Slice<Order>> {
    const query: FilterQuery<IOrder> = {};
    if (filter.ownerId) query.owner = new Types.ObjectId(filter.ownerId);
    if (filter.status) query.status = filter.status;

    const [docs, total] = await withRetry("orders.list", () =>
      Promise.all([
        OrderModel.find(query).sort({ createdAt: -1, _id: -1 }).skip(skip).limit(limit).lean<IOrder[]>().exec(),
        OrderModel.countDocuments(query).exec(),
      ])
    );
    return { items: docs.map(toOrder), total };
  }

  async transition(
    id: string,
    from: readonly OrderStatus[],
    change: StatusChange,
    patch?: OrderPatch
  ): Promise<Order | null> {
    if (!isId(id)) return null;
    const set: Record<string, unknown> = { status: change.status };
    if (patch?.payment) set.payment = patch.payment;
    if (patch?.shipment) set.shipment = patch.shipment;

    const doc = await withRetry(
      "orders.transition",
      () =>
        OrderModel.findOneAndUpdate(
          { _id: id, status: { $in: [...from] } },
          { $set: set, $push: { statusHistory: change } },
          { new: true }
        )
          .lean<IOrder>()
          .exec(),
      { idempotent: false }
    );
    return doc ? toOrder(doc) : null;
  }

  async setPayment(id: string, payment: PaymentRecord): Promise<Order | null> {
    if (!isId(id)) return null;
    const doc = await withRetry("orders.setPayment", () =>
      OrderModel.findByIdAndUpdate(id, { $set: { payment } }, { new: true }).lean<IOrder>().exec()
    );
    return doc ? toOrder(doc) : null;
  }
}
