// src/controllers/payments.controller.ts
import type { PaymentService } from "../services/payment.service";
import { requireUser } from "../middleware/auth";
import { asyncRoute, validate } from "../middleware/validate";
import { startPaymentSchema, verifyPaymentSchema } from "../validators/commerce";

export function createPaymentsController(payments: PaymentService) {
  return {
    /** POST /payments/razorpay/order { orderId } */
    startPayment: validate(startPaymentSchema, async ({ body }, req, res) => {
      res.status(201).json(await payments.startPayment(requireUser(req).id, body.orderId));
    }),

    /** POST /payments/razorpay/verify, with the fields the checkout widget returns */
    verify: validate(verifyPaymentSchema, async ({ body }, req, res) => {
      const order = await payments.verifyPayment(requireUser(req).id, {
        gatewayOrderId: body.razorpay_order_id,
        paymentId: body.razorpay_payment_id,
        signature: body.razorpay_signature,
      });
      res.json(order);
    }),

    // signature covers the exact bytes received
    webhook: asyncRoute(async (req, res) => {
      const result = await payments.handleWebhook(req.rawBody ?? Buffer.alloc(0), req.get("x-razorpay-signature"));
      res.json({ received: true, ...result });
    }),
  };
}
