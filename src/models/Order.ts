// src/models/Order.ts
import mongoose, { Schema, Types } from "mongoose";
import { ORDER_STATUSES, OrderStatus } from "../constants/orderStatus";

export interface IOrderItem {
  product: Types.ObjectId;
  name: string;
  unitPrice: number;
  quantity: number;
  lineTotal: number;
}

export interface IStatusChange {
  status: OrderStatus;
  at: Date;
  by: string;
  note?: string;
}

export interface IOrder {
  _id: Types.ObjectId;
  owner: Types.ObjectId;
  items: IOrderItem[];
  currency: string;
  subtotal: number;
  shipping: number;
  tax: number;
  total: number;
  status: OrderStatus;
  statusHistory: IStatusChange[];
  shippingAddress?: {
    line1: string;
    line2?: string;
    city: string;
    state: string;
    pincode: string;
    country: string;
  };
  payment?: {
    gateway: "razorpay";
    gatewayOrderId?: string;
    paymentId?: string;
    amount?: number;
    capturedAt?: Date;
    refundId?: string;
  };
  shipment?: {
    carrier: string;
    shipmentId: string;
    awb?: string;
    labelUrl?: string;
    createdAt: Date;
  };
  notes?: string;
  createdAt: Date;
  updatedAt: Date;
}

// price-at-purchase snapshot; never rewritten after checkout
const OrderItemSchema = new Schema<IOrderItem>(
  {
    product: { type: Schema.Types.ObjectId, ref: "Product", required: true, immutable: true },
    name: { type: String, required: true, immutable: true },
    unitPrice: { type: Number, required: true, min: 0, immutable: true },
    quantity: { type: Number, required: true, min: 1, immutable: true },
    lineTotal: { type: Number, required: true, min: 0, immutable: true },
  },
  { _id: false }
);

const StatusChangeSchema = new Schema<IStatusChange>(
  {
    status: { type: String, enum: [...ORDER_STATUSES], required: true },
    at: { type: Date, required: true },
    by: { type: String, required: true },
    note: { type: String },
  },
  { _id: false }
);

const OrderSchema = new Schema<IOrder>(
  {
    owner: { type: Schema.Types.ObjectId, ref: "User", required: true, index: true },
    items: { type: [OrderItemSchema], required: true, immutable: true },
    currency: { type: String, required: true, immutable: true },
    subtotal: { type: Number, required: true, immutable: true },
    shipping: { type: Number, required: true, immutable: true },
    tax: { type: Number, required: true, immutable: true },
    total: { type: Number, required: true, immutable: true },
    status: { type: String, enum: [...ORDER_STATUSES], default: "pending", index: true },
    statusHistory: { type: [StatusChangeSchema], default: [] },
    shippingAddress: {
      line1: String,
      line2: String,
      city: String,
      state: String,
      pincode: String,
      country: String,
    },
    payment: {
      gateway: { type: String, enum: ["razorpay"] },
      gatewayOrderId: { type: String, index: true, sparse: true },
      paymentId: String,
      amount: Number,
      capturedAt: Date,
      refundId: String,
    },
    shipment: {
      carrier: String,
      shipmentId: String,
      awb: String,
      labelUrl: String,
      createdAt: Date,
    },
    notes: { type: String },
  },
  { timestamps: true, collection: "orders" }
);

OrderSchema.index({ owner: 1, createdAt: -1 });

export default mongoose.model<IOrder>("Order", OrderSchema);
