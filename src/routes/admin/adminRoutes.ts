// src/routes/admin/adminRoutes.ts
import { Router } from "express";
import { createAdminOrdersController } from "../../controllers/admin/orders.controller";
import { createAdminProductsController } from "../../controllers/admin/products.controller";
import type { Services } from "../../container";
import { verifyAdmin } from "../../middleware/verifyAdmin";

export function adminRoutes(services: Services, adminApiKey?: string): Router {
  const r = Router();
  const products = createAdminProductsController(services.catalog);
  const orders = createAdminOrdersController(services.orders);

  // every route here is admin-only
  r.use(verifyAdmin(services.auth, adminApiKey));

  /**
   * GET /admin/products
   * ?category=&q=&includeInactive=&sort=&page=&pageSize=
   */
  r.get("/products", products.list);
  r.post("/products", products.create);
  r.get("/products/:id", products.get);
  r.put("/products/:id", products.update);
  r.delete("/products/:id", products.remove);

  /**
   * POST /admin/products/:id/stock
   * body: { delta } (negative to take stock out)
   */
  r.post("/products/:id/stock", products.adjustStock);

  r.get("/orders", orders.list);
  r.get("/orders/:id", orders.get);

  /**
   * POST /admin/orders/:id/status
   * body: { status, note? }
   */
  r.post("/orders/:id/status", orders.setStatus);
  r.post("/orders/:id/fulfil", orders.fulfil);

  return r;
}
