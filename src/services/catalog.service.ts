// src/services/catalog.service.ts
import { InsufficientStockError, NotFoundError, ValidationError } from "../errors";
import type { ProductRepository } from "../repositories/types";
import type { Page, Product, ProductFilter, ProductInput, ProductPatch, ProductSort } from "../types/domain";
import { logger } from "../utils/logger";

export const MAX_PAGE_SIZE = 100;
export const DEFAULT_PAGE_SIZE = 20;

type Defaulted = "slug" | "description" | "currency" | "images" | "benefits" | "active" | "rating" | "reviewCount";

/** Product fields an admin must send; the rest fall back to defaults. */
export type NewProduct = Omit<ProductInput, Defaulted> & Partial<Pick<ProductInput, Defaulted>>;

export function slugify(name: string): string {
  return name
    .toLowerCase()
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

function requireSlug(source: string): string {
  const slug = slugify(source);
  if (!slug) {
    throw new ValidationError("Cannot derive a slug", [{ path: "slug", message: "name or slug must contain letters or digits" }]);
  }
  return slug;
}

const OBJECT_ID = /^[0-9a-f]{24}$/i;

export function assertPaging(page: number, pageSize: number): void {
  if (!Number.isInteger(page) || page < 1) {
    throw new ValidationError("Invalid page", [{ path: "page", message: "must be an integer >= 1" }]);
  }
  if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > MAX_PAGE_SIZE) {
    throw new ValidationError("Invalid pageSize", [
      { path: "pageSize", message: `must be an integer between 1 and ${MAX_PAGE_SIZE}` },
    ]);
  }
}

export function toPage<T>(items: T[], total: number, page: number, pageSize: number): Page<T> {
  return { items, total, page, pageSize, totalPages: Math.ceil(total / pageSize) };
}

/** An active product must have a positive price; stock is a non-negative integer. */
function assertSellable(p: Pick<Product, "price" | "active" | "stock">): void {
  if (p.active && !(p.price > 0)) {
    throw new ValidationError("Active products need a price above zero", [
      { path: "price", message: "must be greater than 0 when active" },
    ]);
  }
  if (!Number.isInteger(p.stock) || p.stock < 0) {
    throw new ValidationError("Stock must be a non-negative integer", [
      { path: "stock", message: "must be a non-negative integer" },
    ]);
  }
}

export class CatalogService {
  constructor(
    private readonly products: ProductRepository,
    private readonly defaultCurrency = "INR"
  ) {}

  async list(
    filter: ProductFilter,
    page = 1,
    pageSize = DEFAULT_PAGE_SIZE,
    sort: ProductSort = "newest"
  ): Promise<Page<Product>> {
    assertPaging(page, pageSize);
    const { items, total } = await this.products.list(filter, sort, (page - 1) * pageSize, pageSize);
    return toPage(items, total, page, pageSize);
  }

  /** Looks up by id when given a 24-hex id, otherwise by slug. */
  async get(idOrSlug: string, options: { includeInactive?: boolean } = {}): Promise<Product> {
    const product = OBJECT_ID.test(idOrSlug)
      ? (await this.products.findById(idOrSlug)) ?? (await this.products.findBySlug(idOrSlug))
      : await this.products.findBySlug(idOrSlug);

    if (!product || (!product.active && !options.includeInactive)) {
      throw new NotFoundError("Product", idOrSlug);
    }
    return product;
  }

  async listByCategory(category: string): Promise<Product[]> {
    const { items } = await this.products.list({ category }, "name", 0, MAX_PAGE_SIZE);
    return items;
  }

  async create(input: NewProduct): Promise<Product> {
    const slug = requireSlug(input.slug ?? input.name);
    const product: ProductInput = {
      ...input,
      slug,
      description: input.description ?? "",
      currency: input.currency ?? this.defaultCurrency,
      images: input.images ?? [],
      benefits: input.benefits ?? [],
      active: input.active ?? true,
      rating: input.rating ?? 0,
      reviewCount: input.reviewCount ?? 0,
    };
    assertSellable(product);

    const created = await this.products.create(product);
    logger.info("product created", { productId: created.id, slug: created.slug });
    return created;
  }

  async update(id: string, patch: ProductPatch): Promise<Product> {
    const current = await this.products.findById(id);
    if (!current) throw new NotFoundError("Product", id);

    const next: ProductPatch = patch.slug !== undefined ? { ...patch, slug: requireSlug(patch.slug) } : patch;
    assertSellable({ ...current, ...definedFields(next) });

    const updated = await this.products.update(id, next);
    if (!updated) throw new NotFoundError("Product", id);
    return updated;
  }

  async delete(id: string): Promise<void> {
    const removed = await this.products.delete(id);
    if (!removed) throw new NotFoundError("Product", id);
    logger.info("product deleted", { productId: id });
  }

  /**
   * Applies a signed stock delta. Decrements go through the store's
   * conditional update so concurrent adjustments can never drive stock
   * below zero.
   */
  async adjustStock(id: string, delta: number): Promise<Product> {
    if (!Number.isInteger(delta) || delta === 0) {
      throw new ValidationError("Invalid stock delta", [{ path: "delta", message: "must be a non-zero integer" }]);
    }

    if (delta > 0) {
      const updated = await this.products.incrementStock(id, delta);
      if (!updated) throw new NotFoundError("Product", id);
      return updated;
    }

    const updated = await this.products.decrementStock(id, -delta);
    if (updated) return updated;

    const existing = await this.products.findById(id);
    if (!existing) throw new NotFoundError("Product", id);
    throw new InsufficientStockError(id, -delta, existing.stock);
  }
}

function definedFields(patch: ProductPatch): ProductPatch {
  const out: ProductPatch = {};
  for (const [key, value] of Object.entries(patch)) {
    if (value !== undefined) Object.assign(out, { [key]: value });
  }
  return out;
}
