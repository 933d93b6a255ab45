// src/controllers/orders.controller.ts
import type { OrderService } from "../services/order.service";
import { requireUser } from "../middleware/auth";
import { validate } from "../middleware/validate";
import { listOrdersSchema, orderIdSchema } from "../validators/commerce";

export function createOrdersController(orders: OrderService) {
  return {
    list: validate(listOrdersSchema, async ({ query }, req, res) => {
      res.json(await orders.listForOwner(requireUser(req).id, query.page, query.pageSize));
    }),

    get: validate(orderIdSchema, async ({ params }, req, res) => {
      res.json(await orders.getForOwner(requireUser(req).id, params.id));
    }),

    cancel: validate(orderIdSchema, async ({ params }, req, res) => {
      res.json(await orders.cancel(requireUser(req).id, params.id));
    }),
  };
}
