// src/routes/cart.routes.ts
import { Router } from "express";
import { createCartController } from "../controllers/cart.controller";
import type { Services } from "../container";
import { authenticate } from "../middleware/auth";
import { writeLimiter } from "../middleware/security";

export function cartRoutes({ auth, cart, checkout }: Services): Router {
  const r = Router();
  const ctrl = createCartController(cart, checkout);

  r.use(authenticate(auth));

  r.get("/", ctrl.get);
  r.delete("/", ctrl.clear);
  r.post("/items", ctrl.addItem);
  r.patch("/items/:productId", ctrl.setQuantity);
  r.delete("/items/:productId", ctrl.removeItem);
  r.post("/checkout", writeLimiter, ctrl.checkout);

  return r;
}
