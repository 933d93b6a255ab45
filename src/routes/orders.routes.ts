// src/routes/orders.routes.ts
import { Router } from "express";
import { createOrdersController } from "../controllers/orders.controller";
import type { Services } from "../container";
import { authenticate } from "../middleware/auth";

export function ordersRoutes({ auth, orders }: Services): Router {
  const r = Router();
  const ctrl = createOrdersController(orders);

  r.use(authenticate(auth));

  r.get("/", ctrl.list);
  r.get("/:id", ctrl.get);
  r.post("/:id/cancel", ctrl.cancel);

  return r;
}
