// src/controllers/admin/orders.controller.ts
import type { OrderService } from "../../services/order.service";
import { requireUser } from "../../middleware/auth";
import { validate } from "../../middleware/validate";
import { adminListOrdersSchema, orderIdSchema, setOrderStatusSchema } from "../../validators/commerce";

export function createAdminOrdersController(orders: OrderService) {
  return {
    list: validate(adminListOrdersSchema, async ({ query }, _req, res) => {
      res.json(await orders.list(query.status, query.page, query.pageSize));
    }),

    get: validate(orderIdSchema, async ({ params }, _req, res) => {
      res.json(await orders.get(params.id));
    }),

    /** POST /admin/orders/:id/status { status, note? } */
    setStatus: validate(setOrderStatusSchema, async ({ params, body }, req, res) => {
      const actor = requireUser(req).id;
      const order =
        body.status === "delivered"
          ? await orders.markDelivered(params.id, actor, body.note)
          : await orders.transition(params.id, body.status, actor, { note: body.note });
      res.json(order);
    }),

    fulfil: validate(orderIdSchema, async ({ params }, req, res) => {
      res.json(await orders.fulfil(params.id, requireUser(req).id));
    }),
  };
}
