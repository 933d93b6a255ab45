// src/constants/orderStatus.ts
export const ORDER_STATUSES = [
  "pending",
  "paid",
  "fulfilled",
  "delivered",
  "cancelled",
  "refunded",
] as const;

export type OrderStatus = (typeof ORDER_STATUSES)[number];

// allowed transitions (graph)
export const ALLOWED_TRANSITIONS: Record<OrderStatus, readonly OrderStatus[]> = {
  pending: ["paid", "cancelled"],
  paid: ["fulfilled", "cancelled", "refunded"],
  fulfilled: ["delivered", "refunded"],
  delivered: ["refunded"],
  cancelled: [], // terminal
  refunded: [], // terminal
};

// leaving one of these for cancelled/refunded puts the goods back on the shelf
export const RESTOCK_FROM: readonly OrderStatus[] = ["pending", "paid"];

export function canTransition(from: OrderStatus, to: OrderStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}
