// src/types/domain.ts
import type { FeedbackStatus } from "../constants/feedbackStatus";
import type { OrderStatus } from "../constants/orderStatus";

export type UserRole = "customer" | "admin";

export interface Product {
  id: string;
  slug: string;
  name: string;
  description: string;
  price: number;
  originalPrice?: number;
  currency: string;
  stock: number;
  category: string;
  images: string[];
  benefits: string[];
  active: boolean;
  rating: number;
  reviewCount: number;
  story?: string;
  ingredients?: string;
  brewTempC?: number;
  brewTimeMin?: number;
  createdAt: Date;
  updatedAt: Date;
}

export type ProductInput = Omit<Product, "id" | "createdAt" | "updatedAt">;
export type ProductPatch = Partial<ProductInput>;

export interface ProductFilter {
  category?: string;
  inStock?: boolean;
  minPrice?: number;
  maxPrice?: number;
  q?: string;
  includeInactive?: boolean;
}

export type ProductSort = "newest" | "price" | "-price" | "name";

export interface Page<T> {
  items: T[];
  total: number;
  page: number;
  pageSize: number;
  totalPages: number;
}

export interface CartLine {
  productId: string;
  quantity: number;
  addedAt: Date;
}

export interface Cart {
  id: string;
  ownerId: string;
  items: CartLine[];
  updatedAt: Date;
}

export interface Address {
  id: string;
  line1: string;
  line2?: string;
  city: string;
  state: string;
  pincode: string;
  country: string;
  isDefault: boolean;
}

export type AddressInput = Omit<Address, "id">;

export interface User {
  id: string;
  externalId: string;
  phone?: string;
  email?: string;
  firstName?: string;
  lastName?: string;
  role: UserRole;
  addresses: Address[];
  createdAt: Date;
}

export interface OrderLine {
  productId: string;
  name: string;
  unitPrice: number;
  quantity: number;
  lineTotal: number;
}

export interface StatusChange {
  status: OrderStatus;
  at: Date;
  by: string;
  note?: string;
}

export interface PaymentRecord {
  gateway: "razorpay";
  gatewayOrderId?: string;
  paymentId?: string;
  amount?: number;
  capturedAt?: Date;
  refundId?: string;
}

export interface ShipmentRecord {
  carrier: string;
  shipmentId: string;
  awb?: string;
  labelUrl?: string;
  createdAt: Date;
}

export interface Order {
  id: string;
  ownerId: string;
  items: OrderLine[];
  currency: string;
  subtotal: number;
  shipping: number;
  tax: number;
  total: number;
  status: OrderStatus;
  statusHistory: StatusChange[];
  shippingAddress?: Omit<Address, "id" | "isDefault">;
  payment?: PaymentRecord;
  shipment?: ShipmentRecord;
  notes?: string;
  createdAt: Date;
  updatedAt: Date;
}

export type NewOrder = Omit<Order, "id" | "createdAt" | "updatedAt">;

export interface OrderFilter {
  ownerId?: string;
  status?: OrderStatus;
}

/** Fields a status transition may set alongside the new status. */
export interface OrderPatch {
  payment?: PaymentRecord;
  shipment?: ShipmentRecord;
}

export interface OtpRecord {
  id: string;
  phone: string;
  codeHash: string;
  attempts: number;
  expiresAt: Date;
  createdAt: Date;
}

export interface Feedback {
  id: string;
  name: string;
  email: string;
  subject: string;
  message: string;
  /** 1 to 5 */
  rating?: number;
  productId?: string;
  orderId?: string;
  status: FeedbackStatus;
  createdAt: Date;
  updatedAt: Date;
}

export type FeedbackInput = Omit<Feedback, "id" | "status" | "createdAt" | "updatedAt">;

export interface FeedbackFilter {
  status?: FeedbackStatus;
  productId?: string;
}
