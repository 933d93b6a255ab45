// src/controllers/addresses.controller.ts
import type { AddressService } from "../services/address.service";
import { requireUser } from "../middleware/auth";
import { asyncRoute, validate } from "../middleware/validate";
import { addAddressSchema, addressIdSchema, updateAddressSchema } from "../validators/commerce";

export function createAddressesController(addresses: AddressService) {
  return {
    list: asyncRoute(async (req, res) => {
      res.json({ items: await addresses.list(requireUser(req).id) });
    }),

    add: validate(addAddressSchema, async ({ body }, req, res) => {
      res.status(201).json(await addresses.add(requireUser(req).id, body));
    }),

    update: validate(updateAddressSchema, async ({ params, body }, req, res) => {
      res.json(await addresses.update(requireUser(req).id, params.id, body));
    }),

    remove: validate(addressIdSchema, async ({ params }, req, res) => {
      await addresses.remove(requireUser(req).id, params.id);
      res.status(204).end();
    }),

    setDefault: validate(addressIdSchema, async ({ params }, req, res) => {
      res.json(await addresses.setDefault(requireUser(req).id, params.id));
    }),
  };
}
