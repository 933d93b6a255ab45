// src/routes/products.routes.ts
import { Router } from "express";
import { createProductsController } from "../controllers/products.controller";
import type { Services } from "../container";

export function productsRoutes({ catalog }: Services): Router {
  const r = Router();
  const ctrl = createProductsController(catalog);

  r.get("/", ctrl.list);
  r.get("/category/:category", ctrl.byCategory);
  r.get("/:idOrSlug", ctrl.get);

  return r;
}
