// src/repositories/memory/index.ts
// In-process store behind the same repository interfaces as the Mongo
// adapter. Used by the test suite and by STORE_DRIVER=memory for local runs.
// Every method mutates synchronously between awaits, so each call is atomic
// the way a single-document Mongo update is.
import { Types } from "mongoose";
import type { FeedbackStatus } from "../../constants/feedbackStatus";
import type { OrderStatus } from "../../constants/orderStatus";
import { ValidationError } from "../../errors";
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
} from "../../types/domain";
import type {
  CartRepository,
  FeedbackRepository,
  OrderRepository,
  OtpRepository,
  ProductRepository,
  Repositories,
  Slice,
  UserRepository,
} from "../types";

const newId = () => new Types.ObjectId().toHexString();
const clone = <T>(value: T): T => structuredClone(value);

function compareProducts(sort: ProductSort): (a: Product, b: Product) => number {
  switch (sort) {
    case "price":
      return (a, b) => a.price - b.price || a.id.localeCompare(b.id);
    case "-price":
      return (a, b) => b.price - a.price || a.id.localeCompare(b.id);
    case "name":
      return (a, b) => a.name.localeCompare(b.name) || a.id.localeCompare(b.id);
    case "newest":
      return (a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id.localeCompare(a.id);
  }
}

function matches(p: Product, filter: ProductFilter): boolean {
  if (!filter.includeInactive && !p.active) return false;
  if (filter.category && p.category !== filter.category) return false;
  if (filter.inStock !== undefined && (p.stock > 0) !== filter.inStock) return false;
  if (filter.minPrice !== undefined && p.price < filter.minPrice) return false;
  if (filter.maxPrice !== undefined && p.price > filter.maxPrice) return false;
  if (filter.q && !p.name.toLowerCase().includes(filter.q.toLowerCase())) return false;
  return true;
}

export class MemoryProductRepository implements ProductRepository {
  private readonly rows = new Map<string, Product>();

  async create(input: ProductInput): Promise<Product> {
    const slug = input.slug.toLowerCase();
    if ([...this.rows.values()].some((p) => p.slug === slug)) {
      throw new ValidationError("Slug already in use", [{ path: "slug", message: `"${slug}" is taken` }]);
    }
    const now = new Date();
    const product: Product = { ...clone(input), slug, id: newId(), createdAt: now, updatedAt: now };
    this.rows.set(product.id, product);
    return clone(product);
  }

  async findById(id: string): Promise<Product | null> {
    const p = this.rows.get(id);
    return p ? clone(p) : null;
  }

  async findBySlug(slug: string): Promise<Product | null> {
    const p = [...this.rows.values()].find((r) => r.slug === slug.toLowerCase());
    return p ? clone(p) : null;
  }

  async findByIds(ids: string[]): Promise<Product[]> {
    return ids.flatMap((id) => {
      const p = this.rows.get(id);
      return p ? [clone(p)] : [];
    });
  }

  async list(filter: ProductFilter, sort: ProductSort, skip: number, limit: number): Promise<Slice<Product>> {
    const all = [...this.rows.values()].filter((p) => matches(p, filter)).sort(compareProducts(sort));
    return { items: all.slice(skip, skip + limit).map(clone), total: all.length };
  }

  async update(id: string, patch: ProductPatch): Promise<Product | null> {
    const current = this.rows.get(id);
    if (!current) return null;
    const slug = patch.slug?.toLowerCase();
    if (slug && [...this.rows.values()].some((p) => p.slug === slug && p.id !== id)) {
      throw new ValidationError("Slug already in use", [{ path: "slug", message: `"${slug}" is taken` }]);
    }
    const next: Product = { ...current, updatedAt: new Date() };
    for (const [key, value] of Object.entries(clone(patch))) {
      if (value !== undefined) Object.assign(next, { [key]: value });
    }
    if (slug) next.slug = slug;
    this.rows.set(id, next);
    return clone(next);
  }

  async delete(id: string): Promise<boolean> {
    return this.rows.delete(id);
  }

  async decrementStock(id: string, quantity: number, options?: { requireActive?: boolean }): Promise<Product | null> {
    const p = this.rows.get(id);
    if (!p || p.stock < quantity) return null;
    if (options?.requireActive && !p.active) return null;
    p.stock -= quantity;
    p.updatedAt = new Date();
    return clone(p);
  }

  async incrementStock(id: string, quantity: number): Promise<Product | null> {
    const p = this.rows.get(id);
    if (!p) return null;
    p.stock += quantity;
    p.updatedAt = new Date();
    return clone(p);
  }
}

export class MemoryCartRepository implements CartRepository {
  private readonly rows = new Map<string, Cart>();

  async findByOwner(ownerId: string): Promise<Cart | null> {
    const c = this.rows.get(ownerId);
    return c ? clone(c) : null;
  }

  async addItem(ownerId: string, productId: string, quantity: number): Promise<Cart> {
    let cart = this.rows.get(ownerId);
    if (!cart) {
      cart = { id: newId(), ownerId, items: [], updatedAt: new Date() };
      this.rows.set(ownerId, cart);
    }
    const line = cart.items.find((i) => i.productId === productId);
    if (line) line.quantity += quantity;
    else cart.items.push({ productId, quantity, addedAt: new Date() });
    cart.updatedAt = new Date();
    return clone(cart);
  }

  async setQuantity(ownerId: string, productId: string, quantity: number): Promise<Cart | null> {
    const cart = this.rows.get(ownerId);
    const line = cart?.items.find((i) => i.productId === productId);
    if (!cart || !line) return null;
    line.quantity = quantity;
    cart.updatedAt = new Date();
    return clone(cart);
  }

  async removeItem(ownerId: string, productId: string): Promise<Cart | null> {
    const cart = this.rows.get(ownerId);
    if (!cart) return null;
    cart.items = cart.items.filter((i) => i.productId !== productId);
    cart.updatedAt = new Date();
    return clone(cart);
  }

  async clear(ownerId: string): Promise<void> {
    const cart = this.rows.get(ownerId);
    if (cart) {
      cart.items = [];
      cart.updatedAt = new Date();
    }
  }

  async take(ownerId: string): Promise<Cart | null> {
    const cart = this.rows.get(ownerId);
    if (!cart || cart.items.length === 0) return null;
    const taken = clone(cart);
    cart.items = [];
    cart.updatedAt = new Date();
    return taken;
  }
}

export class MemoryOrderRepository implements OrderRepository {
  private readonly rows = new Map<string, Order>();

  async create(order: NewOrder): Promise<Order> {
    const now = new Date();
    const row: Order = { ...clone(order), id: newId(), createdAt: now, updatedAt: now };
    this.rows.set(row.id, row);
    return clone(row);
  }

  async findById(id: string): Promise<Order | null> {
    const o = this.rows.get(id);
    return o ? clone(o) : null;
  }

  async findByGatewayOrderId(gatewayOrderId: string): Promise<Order | null> {
    const o = [...this.rows.values()].find((r) => r.payment?.gatewayOrderId === gatewayOrderId);
    return o ? clone(o) : null;
  }

  async list(filter: OrderFilter, skip: number, limit: number): Promise<Slice<Order>> {
    const all = [...this.rows.values()]
      .filter((o) => (!filter.ownerId || o.ownerId === filter.ownerId) && (!filter.status || o.status === filter.status))
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id.localeCompare(a.id));
    return { items: all.slice(skip, skip + limit).map(clone), total: all.length };
  }

  async transition(
    id: string,
    from: readonly OrderStatus[],
    change: StatusChange,
    patch?: OrderPatch
  ): Promise<Order | null> {
    const o = this.rows.get(id);
    if (!o || !from.includes(o.status)) return null;
    o.status = change.status;
    o.statusHistory.push(clone(change));
    if (patch?.payment) o.payment = clone(patch.payment);
    if (patch?.shipment) o.shipment = clone(patch.shipment);
    o.updatedAt = new Date();
    return clone(o);
  }

  async setPayment(id: string, payment: PaymentRecord): Promise<Order | null> {
    const o = this.rows.get(id);
    if (!o) return null;
    o.payment = clone(payment);
    o.updatedAt = new Date();
    return clone(o);
  }
}

export class MemoryUserRepository implements UserRepository {
  private readonly rows = new Map<string, User>();

  async findById(id: string): Promise<User | null> {
    const u = this.rows.get(id);
    return u ? clone(u) : null;
  }

  async findByExternalId(externalId: string): Promise<User | null> {
    const u = [...this.rows.values()].find((r) => r.externalId === externalId);
    return u ? clone(u) : null;
  }

  async findOrCreate(externalId: string, defaults: { phone?: string; role?: UserRole }): Promise<User> {
    const existing = [...this.rows.values()].find((r) => r.externalId === externalId);
    if (existing) return clone(existing);
    const user: User = {
      id: newId(),
      externalId,
      phone: defaults.phone,
      role: defaults.role ?? "customer",
      addresses: [],
      createdAt: new Date(),
    };
    this.rows.set(user.id, user);
    return clone(user);
  }

  async setAddresses(userId: string, addresses: Address[]): Promise<User | null> {
    const u = this.rows.get(userId);
    if (!u) return null;
    u.addresses = clone(addresses);
    return clone(u);
  }
}

export class MemoryOtpRepository implements OtpRepository {
  private readonly rows = new Map<string, OtpRecord>();

  async findLatest(phone: string): Promise<OtpRecord | null> {
    const latest = [...this.rows.values()]
      .filter((r) => r.phone === phone)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())[0];
    return latest ? clone(latest) : null;
  }

  async replace(phone: string, codeHash: string, expiresAt: Date): Promise<OtpRecord> {
    for (const [id, r] of this.rows) {
      if (r.phone === phone) this.rows.delete(id);
    }
    const row: OtpRecord = { id: newId(), phone, codeHash, attempts: 0, expiresAt, createdAt: new Date() };
    this.rows.set(row.id, row);
    return clone(row);
  }

  async incrementAttempts(id: string): Promise<void> {
    const r = this.rows.get(id);
    if (r) r.attempts += 1;
  }

  async delete(id: string): Promise<void> {
    this.rows.delete(id);
  }
}

export class MemoryFeedbackRepository implements FeedbackRepository {
  private readonly rows = new Map<string, Feedback>();

  async create(input: FeedbackInput): Promise<Feedback> {
    const now = new Date();
    const row: Feedback = { ...clone(input), id: newId(), status: "pending", createdAt: now, updatedAt: now };
    this.rows.set(row.id, row);
    return clone(row);
  }

  async findById(id: string): Promise<Feedback | null> {
    const f = this.rows.get(id);
    return f ? clone(f) : null;
  }

  async list(filter: FeedbackFilter, skip: number, limit: number): Promise<Slice<Feedback>> {
    const all = [...this.rows.values()]
      .filter((f) => (!filter.status || f.status === filter.status) && (!filter.productId || f.productId === filter.productId))
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id.localeCompare(a.id));
    return { items: all.slice(skip, skip + limit).map(clone), total: all.length };
  }

  async setStatus(id: string, status: FeedbackStatus): Promise<Feedback | null> {
    const f = this.rows.get(id);
    if (!f) return null;
    f.status = status;
    f.updatedAt = new Date();
    return clone(f);
  }

  async delete(id: string): Promise<boolean> {
    return this.rows.delete(id);
  }
}

export function createMemoryRepositories(): Repositories {
  return {
    products: new MemoryProductRepository(),
    carts: new MemoryCartRepository(),
    orders: new MemoryOrderRepository(),
    users: new MemoryUserRepository(),
    otps: new MemoryOtpRepository(),
    feedback: new MemoryFeedbackRepository(),
  };
}
