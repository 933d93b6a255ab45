// validators/commerce.ts
import { z } from "zod";
import { ORDER_STATUSES } from "../constants/orderStatus";
import { idParams, objectId, paging } from "./common";

const quantity = z.number().int().min(1).max(100);

export const addCartItemSchema = z.object({
  body: z.object({ productId: objectId, quantity: quantity.default(1) }),
});

export const setCartItemSchema = z.object({
  params: z.object({ productId: objectId }),
  body: z.object({ quantity }),
});

export const cartItemSchema = z.object({
  params: z.object({ productId: objectId }),
});

export const checkoutSchema = z.object({
  body: z
    .object({
      addressId: objectId.optional(),
      notes: z.string().trim().max(500).optional(),
    })
    .default({}),
});

export const listOrdersSchema = z.object({
  query: z.object({ ...paging }),
});

export const adminListOrdersSchema = z.object({
  query: z.object({ status: z.enum(ORDER_STATUSES).optional(), ...paging }),
});

export const orderIdSchema = z.object({ params: idParams });

export const setOrderStatusSchema = z.object({
  params: idParams,
  body: z.object({
    status: z.enum(ORDER_STATUSES),
    note: z.string().trim().max(500).optional(),
  }),
});

const addressFields = {
  line1: z.string().trim().min(1).max(200),
  line2: z.string().trim().max(200).optional(),
  city: z.string().trim().min(1).max(100),
  state: z.string().trim().min(1).max(100),
  pincode: z.string().regex(/^\d{6}$/, "must be a 6-digit PIN code"),
  country: z.string().trim().min(1).max(100).optional(),
};

export const addAddressSchema = z.object({
  body: z.object({ ...addressFields, isDefault: z.boolean().optional() }).strict(),
});

export const updateAddressSchema = z.object({
  params: idParams,
  body: z
    .object(addressFields)
    .partial()
    .strict()
    .refine((b) => Object.keys(b).length > 0, { message: "nothing to update" }),
});

export const addressIdSchema = z.object({ params: idParams });

export const startPaymentSchema = z.object({
  body: z.object({ orderId: objectId }),
});

export const verifyPaymentSchema = z.object({
  body: z.object({
    razorpay_order_id: z.string().min(1),
    razorpay_payment_id: z.string().min(1),
    razorpay_signature: z.string().min(1),
  }),
});
