// src/repositories/types.ts
import type { FeedbackStatus } from "../constants/feedbackStatus";
import type { OrderStatus } from "../constants/orderStatus";
import type {
  Address,
  Cart,
  Feedback,
  FeedbackFilter,
  FeedbackInput,
  NewOrder,
  Order,
  OrderFilter,
  OrderPatch,
  OtpRecord,
  PaymentRecord,
  Product,
  ProductFilter,
  ProductInput,
  ProductPatch,
  ProductSort,
  StatusChange,
  User,
  UserRole,
} from "../types/domain";

export interface Slice<T> {
  items: T[];
  total: number;
}

export interface ProductRepository {
  create(input: ProductInput): Promise<Product>;
  findById(id: string): Promise<Product | null>;
  findBySlug(slug: string): Promise<Product | null>;
  findByIds(ids: string[]): Promise<Product[]>;
  list(filter: ProductFilter, sort: ProductSort, skip: number, limit: number): Promise<Slice<Product>>;
  update(id: string, patch: ProductPatch): Promise<Product | null>;
  delete(id: string): Promise<boolean>;
  /**
   * Atomic decrement-if-sufficient. Resolves null when the product is
   * missing, has fewer than `quantity` units, or (with `requireActive`) is
   * not active. Never read-modify-write.
   */
  decrementStock(id: string, quantity: number, options?: { requireActive?: boolean }): Promise<Product | null>;
  incrementStock(id: string, quantity: number): Promise<Product | null>;
}

export interface CartRepository {
  findByOwner(ownerId: string): Promise<Cart | null>;
  /** Adds `quantity` to the owner's line for the product, creating cart and line as needed. */
  addItem(ownerId: string, productId: string, quantity: number): Promise<Cart>;
  /** Resolves null when the cart has no line for the product. */
  setQuantity(ownerId: string, productId: string, quantity: number): Promise<Cart | null>;
  removeItem(ownerId: string, productId: string): Promise<Cart | null>;
  clear(ownerId: string): Promise<void>;
  /**
   * Atomically empties a non-empty cart and resolves the lines it held.
   * Of two concurrent calls only one sees the lines. Null when the cart is
   * missing or already empty.
   */
  take(ownerId: string): Promise<Cart | null>;
}

export interface OrderRepository {
  create(order: NewOrder): Promise<Order>;
  findById(id: string): Promise<Order | null>;
  findByGatewayOrderId(gatewayOrderId: string): Promise<Order | null>;
  list(filter: OrderFilter, skip: number, limit: number): Promise<Slice<Order>>;
  /**
   * Compare-and-set on status: moves the order to `change.status` only if
   * it is currently in one of `from`. Resolves null otherwise.
   */
  transition(id: string, from: readonly OrderStatus[], change: StatusChange, patch?: OrderPatch): Promise<Order | null>;
  setPayment(id: string, payment: PaymentRecord): Promise<Order | null>;
}

export interface UserRepository {
  findById(id: string): Promise<User | null>;
  findByExternalId(externalId: string): Promise<User | null>;
  findOrCreate(externalId: string, defaults: { phone?: string; role?: UserRole }): Promise<User>;
  setAddresses(userId: string, addresses: Address[]): Promise<User | null>;
}

export interface OtpRepository {
  findLatest(phone: string): Promise<OtpRecord | null>;
  /** Drops any earlier code for the phone and stores the new one. */
  replace(phone: string, codeHash: string, expiresAt: Date): Promise<OtpRecord>;
  incrementAttempts(id: string): Promise<void>;
  delete(id: string): Promise<void>;
}

export interface FeedbackRepository {
  create(input: FeedbackInput): Promise<Feedback>;
  findById(id: string): Promise<Feedback | null>;
  /** Newest first. */
  list(filter: FeedbackFilter, skip: number, limit: number): Promise<Slice<Feedback>>;
  setStatus(id: string, status: FeedbackStatus): Promise<Feedback | null>;
  delete(id: string): Promise<boolean>;
}

export interface Repositories {
  products: ProductRepository;
  carts: CartRepository;
  orders: OrderRepository;
  users: UserRepository;
  otps: OtpRepository;
  feedback: FeedbackRepository;
}
