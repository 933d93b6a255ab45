// src/controllers/products.controller.ts
import type { CatalogService } from "../services/catalog.service";
import { validate } from "../middleware/validate";
import { listProductsSchema, productByCategorySchema, productLookupSchema } from "../validators/products";

export function createProductsController(catalog: CatalogService) {
  return {
    /** GET /products?category=&inStock=&minPrice=&maxPrice=&q=&sort=&page=&pageSize= */
    list: validate(listProductsSchema, async ({ query }, _req, res) => {
      const { page, pageSize, sort, ...filter } = query;
      res.json(await catalog.list(filter, page, pageSize, sort));
    }),

    byCategory: validate(productByCategorySchema, async ({ params }, _req, res) => {
      const items = await catalog.listByCategory(params.category);
      res.json({ category: params.category, items });
    }),

    get: validate(productLookupSchema, async ({ params }, _req, res) => {
      res.json(await catalog.get(params.idOrSlug));
    }),
  };
}
