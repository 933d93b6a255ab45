// src/controllers/cart.controller.ts
import type { CartService } from "../services/cart.service";
import type { CheckoutService } from "../services/checkout.service";
import { requireUser } from "../middleware/auth";
import { asyncRoute, validate } from "../middleware/validate";
import { addCartItemSchema, cartItemSchema, checkoutSchema, setCartItemSchema } from "../validators/commerce";

export function createCartController(cart: CartService, checkout: CheckoutService) {
  return {
    get: asyncRoute(async (req, res) => {
      res.json(await cart.getCart(requireUser(req).id));
    }),

    addItem: validate(addCartItemSchema, async ({ body }, req, res) => {
      res.status(201).json(await cart.addItem(requireUser(req).id, body.productId, body.quantity));
    }),

    setQuantity: validate(setCartItemSchema, async ({ params, body }, req, res) => {
      res.json(await cart.setQuantity(requireUser(req).id, params.productId, body.quantity));
    }),

    removeItem: validate(cartItemSchema, async ({ params }, req, res) => {
      res.json(await cart.removeItem(requireUser(req).id, params.productId));
    }),

    clear: asyncRoute(async (req, res) => {
      res.json(await cart.clear(requireUser(req).id));
    }),

    checkout: validate(checkoutSchema, async ({ body }, req, res) => {
      const order = await checkout.checkout(requireUser(req).id, body);
      res.status(201).json(order);
    }),
  };
}
