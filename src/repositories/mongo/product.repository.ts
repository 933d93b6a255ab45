// src/repositories/mongo/product.repository.ts
import { FilterQuery, SortOrder, Types } from "mongoose";
import ProductModel, { IProduct } from "../../models/Product";
import { ValidationError } from "../../errors";
import { withRetry } from "../../utils/retry";
import type { Product, ProductFilter, ProductInput, ProductPatch, ProductSort } from "../../types/domain";
import type { ProductRepository, Slice } from "../types";
import { escapeRegex, isDuplicateKey } from "./isDuplicateKey";

export function toProduct(doc: IProduct): Product {
  return {
    id: doc._id.toString(),
    slug: doc.slug,
    name: doc.name,
    description: doc.description ?? "",
    price: doc.price,
    originalPrice: doc.originalPrice ?? undefined,
    currency: doc.currency,
    stock: doc.stock,
    category: doc.category,
    images: doc.images ?? [],
    benefits: doc.benefits ?? [],
    active: doc.active,
    rating: doc.rating ?? 0,
    reviewCount: doc.reviewCount ?? 0,
    story: doc.story ?? undefined,
    ingredients: doc.ingredients ?? undefined,
    brewTempC: doc.brewTempC ?? undefined,
    brewTimeMin: doc.brewTimeMin ?? undefined,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

const SORTS: Record<ProductSort, Record<string, SortOrder>> = {
  newest: { createdAt: -1, _id: -1 },
  price: { price: 1, _id: 1 },
  "-price": { price: -1, _id: 1 },
  name: { name: 1, _id: 1 },
};

function buildQuery(filter: ProductFilter): FilterQuery<IProduct> {
  const query: FilterQuery<IProduct> = {};
  if (!filter.includeInactive) query.active = true;
  if (filter.category) query.category = filter.category;
  if (filter.inStock !== undefined) {
    query.stock = filter.inStock ? { $gt: 0 } : 0;
  }
  if (filter.minPrice !== undefined || filter.maxPrice !== undefined) {
    const price: { $gte?: number; $lte?: number } = {};
    if (filter.minPrice !== undefined) price.$gte = filter.minPrice;
    if (filter.maxPrice !== undefined) price.$lte = filter.maxPrice;
    query.price = price;
  }
  if (filter.q) {
    query.name = { $regex: escapeRegex(filter.q), $options: "i" };
  }
  return query;
}

function definedOnly(patch: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(patch).filter(([, v]) => v !== undefined));
}

const isId = (id: string) => Types.ObjectId.isValid(id) && /^[0-9a-f]{24}$/i.test(id);

export class MongoProductRepository implements ProductRepository {
  async create(input: ProductInput): Promise<Product> {
    try {
      const doc = await withRetry("products.create", () => ProductModel.create(input), {
        idempotent: false,
      });
      return toProduct(doc.toObject());
    } catch (err) {
      if (isDuplicateKey(err)) {
        throw new ValidationError("Slug already in use", [{ path: "slug", message: `"${input.slug}" is taken` }]);
      }
      throw err;
    }
  }

  async findById(id: string): Promise<Product | null> {
    if (!isId(id)) return null;
    const doc = await withRetry("products.findById", () =>
      ProductModel.findById(id).lean<IProduct>().exec()
    );
    return doc ? toProduct(doc) : null;
  }

  async findBySlug(slug: string): Promise<Product | null> {
    const doc = await withRetry("products.findBySlug", () =>
      ProductModel.findOne({ slug: slug.toLowerCase() }).lean<IProduct>().exec()
    );
    return doc ? toProduct(doc) : null;
  }

  async findByIds(ids: string[]): Promise<Product[]> {
    const valid = ids.filter(isId);
    if (valid.length === 0) return [];
    const docs = await withRetry("products.findByIds", () =>
      ProductModel.find({ _id: { $in: valid } }).lean<IProduct[]>().exec()
    );
    return docs.map(toProduct);
  }

  async list(filter: ProductFilter, sort: ProductSort, skip: number, limit: number): Promise<Slice<Product>> {
    const query = buildQuery(filter);
    const [docs, total] = await withRetry("products.list", () =>
      Promise.all([
        ProductModel.find(query).sort(SORTS[sort]).skip(skip).limit(limit).lean<IProduct[]>().exec(),
        ProductModel.countDocuments(query).exec(),
      ])
    );
    return { items: docs.map(toProduct), total };
  }

  async update(id: string, patch: ProductPatch): Promise<Product | null> {
    if (!isId(id)) return null;
    try {
      const doc = await withRetry("products.update", () =>
        ProductModel.findByIdAndUpdate(id, { $set: definedOnly(patch) }, { new: true, runValidators: true })
          .lean<IProduct>()
          .exec()
      );
      return doc ? toProduct(doc) : null;
    } catch (err) {
      if (isDuplicateKey(err)) {
        throw new ValidationError("Slug already in use", [{ path: "slug", message: `"${patch.slug}" is taken` }]);
      }
      throw err;
    }
  }

  async delete(id: string): Promise<boolean> {
    if (!isId(id)) return false;
    const res = await withRetry("products.delete", () => ProductModel.deleteOne({ _id: id }).exec());
    return res.deletedCount > 0;
  }

  async decrementStock(id: string, quantity: number, options?: { requireActive?: boolean }): Promise<Product | null> {
    if (!isId(id)) return null;
    const filter: FilterQuery<IProduct> = { _id: id, stock: { $gte: quantity } };
    if (options?.requireActive) filter.active = true;

    const doc = await withRetry(
      "products.decrementStock",
      () =>
        ProductModel.findOneAndUpdate(filter, { $inc: { stock: -quantity } }, { new: true })
          .lean<IProduct>()
          .exec(),
      { idempotent: false }
    );
    return doc ? toProduct(doc) : null;
  }

  async incrementStock(id: string, quantity: number): Promise<Product | null> {
    if (!isId(id)) return null;
    const doc = await withRetry(
      "products.incrementStock",
      () =>
        ProductModel.findByIdAndUpdate(id, { $inc: { stock: quantity } }, { new: true })
          .lean<IProduct>()
          .exec(),
      { idempotent: false }
    );
    return doc ? toProduct(doc) : null;
  }
}
