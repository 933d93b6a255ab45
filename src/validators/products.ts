// validators/products.ts
import { z } from "zod";
import { idParams, paging, queryBool } from "./common";

const productFields = {
  name: z.string().trim().min(1).max(200),
  slug: z.string().trim().min(1).max(200).optional(),
  description: z.string().max(5000).optional(),
  price: z.number().min(0),
  originalPrice: z.number().min(0).optional(),
  currency: z.string().length(3).toUpperCase().optional(),
  stock: z.number().int().min(0),
  category: z.string().trim().min(1).max(100),
  images: z.array(z.string().url()).max(20).optional(),
  benefits: z.array(z.string().max(200)).max(20).optional(),
  active: z.boolean().optional(),
  rating: z.number().min(0).max(5).optional(),
  reviewCount: z.number().int().min(0).optional(),
  story: z.string().max(5000).optional(),
  ingredients: z.string().max(2000).optional(),
  brewTempC: z.number().min(0).max(100).optional(),
  brewTimeMin: z.number().min(0).max(60).optional(),
};

export const listProductsSchema = z.object({
  query: z
    .object({
      category: z.string().trim().min(1).optional(),
      inStock: queryBool.optional(),
      minPrice: z.coerce.number().min(0).optional(),
      maxPrice: z.coerce.number().min(0).optional(),
      q: z.string().trim().min(1).max(100).optional(),
      sort: z.enum(["newest", "price", "-price", "name"]).default("newest"),
      ...paging,
    })
    .refine((q) => q.minPrice === undefined || q.maxPrice === undefined || q.minPrice <= q.maxPrice, {
      message: "minPrice must not exceed maxPrice",
      path: ["minPrice"],
    }),
});

export const adminListProductsSchema = z.object({
  query: z.object({
    category: z.string().trim().min(1).optional(),
    q: z.string().trim().min(1).max(100).optional(),
    includeInactive: queryBool.default("true"),
    sort: z.enum(["newest", "price", "-price", "name"]).default("newest"),
    ...paging,
  }),
});

export const productByCategorySchema = z.object({
  params: z.object({ category: z.string().trim().min(1).max(100) }),
});

export const productLookupSchema = z.object({
  params: z.object({ idOrSlug: z.string().trim().min(1).max(200) }),
});

export const createProductSchema = z.object({
  body: z.object(productFields).strict(),
});

export const updateProductSchema = z.object({
  params: idParams,
  body: z
    .object(productFields)
    .partial()
    .strict()
    .refine((b) => Object.keys(b).length > 0, { message: "nothing to update" }),
});

export const adjustStockSchema = z.object({
  params: idParams,
  body: z.object({
    delta: z
      .number()
      .int()
      .refine((d) => d !== 0, "must be a non-zero integer"),
  }),
});

export const productIdSchema = z.object({ params: idParams });
