// src/controllers/admin/products.controller.ts
import type { CatalogService } from "../../services/catalog.service";
import { validate } from "../../middleware/validate";
import {
  adjustStockSchema,
  adminListProductsSchema,
  createProductSchema,
  productIdSchema,
  updateProductSchema,
} from "../../validators/products";

export function createAdminProductsController(catalog: CatalogService) {
  return {
    list: validate(adminListProductsSchema, async ({ query }, _req, res) => {
      const { page, pageSize, sort, ...filter } = query;
      res.json(await catalog.list(filter, page, pageSize, sort));
    }),

    get: validate(productIdSchema, async ({ params }, _req, res) => {
      res.json(await catalog.get(params.id, { includeInactive: true }));
    }),

    create: validate(createProductSchema, async ({ body }, _req, res) => {
      res.status(201).json(await catalog.create(body));
    }),

    update: validate(updateProductSchema, async ({ params, body }, _req, res) => {
      res.json(await catalog.update(params.id, body));
    }),

    remove: validate(productIdSchema, async ({ params }, _req, res) => {
      await catalog.delete(params.id);
      res.status(204).end();
    }),

    /** POST /admin/products/:id/stock { delta } */
    adjustStock: validate(adjustStockSchema, async ({ params, body }, _req, res) => {
      res.json(await catalog.adjustStock(params.id, body.delta));
    }),
  };
}
