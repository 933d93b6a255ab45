// src/routes/addresses.routes.ts
import { Router } from "express";
import { createAddressesController } from "../controllers/addresses.controller";
import type { Services } from "../container";
import { authenticate } from "../middleware/auth";

export function addressesRoutes({ auth, addresses }: Services): Router {
  const r = Router();
  const ctrl = createAddressesController(addresses);

  r.use(authenticate(auth));

  r.get("/", ctrl.list);
  r.post("/", ctrl.add);
  r.put("/:id", ctrl.update);
  r.delete("/:id", ctrl.remove);
  r.post("/:id/default", ctrl.setDefault);

  return r;
}
