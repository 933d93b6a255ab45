import type { Server } from "http";
import axios, { AxiosInstance } from "axios";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createApp } from "../src/app";
import { DEFAULT_REPLY } from "../src/services/integrations/chat";
import { hmacHex } from "../src/services/integrations/razorpay";
import { createTestContext, TEST_ENV, teaInput, testConfig, TestContext } from "./helpers";

interface Running {
  ctx: TestContext;
  http: AxiosInstance;
  server: Server;
}

async function start(env: Record<string, string> = {}): Promise<Running> {
  const ctx = createTestContext({}, env);
  const app = createApp({ config: testConfig(env), services: ctx.services });
  const server = await new Promise<Server>((resolve) => {
    const s = app.listen(0, "127.0.0.1", () => resolve(s));
  });
  const address = server.address();
  if (!address || typeof address === "string") throw new Error("server is not listening on a port");
  const http = axios.create({ baseURL: `http://127.0.0.1:${address.port}`, validateStatus: () => true });
  return { ctx, http, server };
}

function stop(running: Running): Promise<void> {
  return new Promise((resolve, reject) => running.server.close((err) => (err ? reject(err) : resolve())));
}

async function signIn({ ctx, http }: Running, phone = "9812345678"): Promise<Record<string, string>> {
  await http.post("/auth/otp/request", { phone });
  const res = await http.post("/auth/otp/verify", { phone, code: ctx.otpSender.lastCode() });
  return { Authorization: `Bearer ${res.data.token}` };
}

const adminKey = { "X-Admin-Key": TEST_ENV.ADMIN_API_KEY };

describe("HTTP API", () => {
  let running: Running;

  afterEach(async () => {
    await stop(running);
  });

  describe("public routes", () => {
    beforeEach(async () => {
      running = await start({ COMMERCE_ENABLED: "false" });
    });

    it("reports health", async () => {
      const res = await running.http.get("/health");
      expect(res.status).toBe(200);
      expect(res.data).toMatchObject({ status: "ok", store: "memory" });
      expect((await running.http.get("/")).data).toEqual({ name: "tea-store-api", status: "running" });
    });

    it("pages products", async () => {
      for (let i = 1; i <= 25; i++) {
        await running.ctx.services.catalog.create(teaInput({ name: `Tea ${i}` }));
      }
      const res = await running.http.get("/products", { params: { page: 1, pageSize: 10 } });
      expect(res.status).toBe(200);
      expect(res.data.items).toHaveLength(10);
      expect(res.data).toMatchObject({ total: 25, page: 1, pageSize: 10, totalPages: 3 });
    });

    it("rejects bad query parameters with 422", async () => {
      const res = await running.http.get("/products", { params: { pageSize: 500 } });
      expect(res.status).toBe(422);
      expect(res.data.code).toBe("VALIDATION_ERROR");
      expect(res.data.details[0].path).toBe("query.pageSize");
    });

    it("finds products by slug and category", async () => {
      const tea = await running.ctx.services.catalog.create(teaInput({ name: "Tulsi Green", category: "herbal" }));

      const bySlug = await running.http.get("/products/tulsi-green");
      expect(bySlug.status).toBe(200);
      expect(bySlug.data.id).toBe(tea.id);

      const byCategory = await running.http.get("/products/category/herbal");
      expect(byCategory.data.items.map((p: { id: string }) => p.id)).toEqual([tea.id]);
    });

    it("maps a missing product to 404", async () => {
      const res = await running.http.get("/products/no-such-tea");
      expect(res.status).toBe(404);
      expect(res.data).toEqual({
        message: "Product no-such-tea not found",
        code: "NOT_FOUND",
        details: { entity: "Product", id: "no-such-tea" },
      });
    });

    it("answers chat with the canned reply when no model is configured", async () => {
      const res = await running.http.post("/ai/chat", { message: "Something floral?" });
      expect(res.status).toBe(200);
      expect(res.data).toEqual({ reply: DEFAULT_REPLY });

      expect((await running.http.post("/ai/chat", { message: "" })).status).toBe(422);
    });

    it("answers malformed JSON with 400", async () => {
      const res = await running.http.post("/ai/chat", '{"message":', {
        headers: { "Content-Type": "application/json" },
        transformRequest: [(d: unknown) => d],
      });
      expect(res.status).toBe(400);
      expect(res.data.code).toBe("BAD_REQUEST");
    });

    it("does not mount commerce routes while the flag is off", async () => {
      for (const path of ["/cart", "/orders", "/addresses", "/admin/products"]) {
        const res = await running.http.get(path);
        expect(res.status).toBe(404);
        expect(res.data).toEqual({ message: "Route not found", code: "NOT_FOUND" });
      }
      expect((await running.http.post("/auth/otp/request", { phone: "9812345678" })).status).toBe(404);
      expect((await running.http.post("/webhooks/payment", {})).status).toBe(404);
    });

    it("takes feedback from anyone and leaves triage to admins", async () => {
      const sent = await running.http.post("/feedback", {
        name: "Ravi",
        email: "Ravi@Example.com",
        subject: "Packaging",
        message: "The tin arrived dented.",
        rating: 3,
      });
      expect(sent.status).toBe(201);
      expect(sent.data.message).toBe("Feedback submitted");
      const id: string = sent.data.id;

      expect((await running.http.get("/feedback")).status).toBe(401);
      expect((await running.http.get("/feedback", { headers: { "X-Admin-Key": "wrong" } })).status).toBe(401);

      const listed = await running.http.get("/feedback", { headers: adminKey, params: { status: "pending" } });
      expect(listed.status).toBe(200);
      expect(listed.data.items).toHaveLength(1);
      expect(listed.data.items[0]).toMatchObject({ id, email: "ravi@example.com", rating: 3, status: "pending" });

      const updated = await running.http.put(`/feedback/${id}/status`, { status: "resolved" }, { headers: adminKey });
      expect(updated.data.status).toBe("resolved");
      expect((await running.http.put(`/feedback/${id}/status`, { status: "done" }, { headers: adminKey })).status).toBe(422);

      expect((await running.http.delete(`/feedback/${id}`, { headers: adminKey })).status).toBe(204);
      expect((await running.http.get(`/feedback/${id}`, { headers: adminKey })).status).toBe(404);
    });

    it("rejects feedback without a valid email", async () => {
      const res = await running.http.post("/feedback", { name: "Ravi", email: "nope", subject: "Hi", message: "Hello" });
      expect(res.status).toBe(422);
      expect(res.data.details[0].path).toBe("body.email");
    });
  });

  describe("commerce routes", () => {
    beforeEach(async () => {
      running = await start();
    });

    it("requires a bearer token", async () => {
      const res = await running.http.get("/cart");
      expect(res.status).toBe(401);
      expect(res.data.code).toBe("UNAUTHORIZED");
      expect((await running.http.get("/cart", { headers: { Authorization: "Bearer nope" } })).status).toBe(401);
    });

    it("signs in with an OTP", async () => {
      const requested = await running.http.post("/auth/otp/request", { phone: "9812345678" });
      expect(requested.status).toBe(202);
      expect(running.ctx.otpSender.sent[0].phone).toBe("+919812345678");

      const bad = await running.http.post("/auth/otp/verify", { phone: "9812345678", code: "12345" });
      expect(bad.status).toBe(422);

      const headers = await signIn(running);
      const me = await running.http.get("/auth/me", { headers });
      expect(me.status).toBe(200);
      expect(me.data).toMatchObject({ phone: "+919812345678", role: "customer" });
    });

    it("runs a cart through checkout and payment", async () => {
      const { services } = running.ctx;
      const tea = await services.catalog.create(teaInput({ price: 100, stock: 5 }));
      const headers = await signIn(running);

      expect((await running.http.post("/cart/items", { productId: tea.id, quantity: 1 }, { headers })).status).toBe(201);
      const merged = await running.http.post("/cart/items", { productId: tea.id, quantity: 2 }, { headers });
      expect(merged.data.items).toHaveLength(1);
      expect(merged.data.items[0].quantity).toBe(3);

      const address = await running.http.post(
        "/addresses",
        { line1: "7 Garden Rd", city: "Jorhat", state: "AS", pincode: "785001" },
        { headers }
      );
      expect(address.status).toBe(201);
      expect(address.data.isDefault).toBe(true);

      const checkout = await running.http.post("/cart/checkout", {}, { headers });
      expect(checkout.status).toBe(201);
      expect(checkout.data).toMatchObject({ status: "pending", subtotal: 300, shipping: 49, tax: 15, total: 364 });
      expect(checkout.data.shippingAddress.city).toBe("Jorhat");
      const orderId: string = checkout.data.id;

      const list = await running.http.get("/orders", { headers });
      expect(list.data.items.map((o: { id: string }) => o.id)).toEqual([orderId]);

      const pay = await running.http.post("/payments/razorpay/order", { orderId }, { headers });
      expect(pay.status).toBe(201);
      expect(pay.data).toMatchObject({ gatewayOrderId: "order_test_1", amount: 36400, keyId: "rzp_test_key" });

      const verified = await running.http.post(
        "/payments/razorpay/verify",
        {
          razorpay_order_id: "order_test_1",
          razorpay_payment_id: "pay_1",
          razorpay_signature: hmacHex(TEST_ENV.RAZORPAY_KEY_SECRET, "order_test_1|pay_1"),
        },
        { headers }
      );
      expect(verified.status).toBe(200);
      expect(verified.data.status).toBe("paid");

      const cancel = await running.http.post(`/orders/${orderId}/cancel`, {}, { headers });
      expect(cancel.status).toBe(409);
      expect(cancel.data.code).toBe("INVALID_TRANSITION");

      const fulfil = await running.http.post(`/admin/orders/${orderId}/fulfil`, {}, { headers: adminKey });
      expect(fulfil.status).toBe(200);
      expect(fulfil.data.status).toBe("fulfilled");
    });

    it("answers 409 when stock runs out at checkout and leaves other stock alone", async () => {
      const { services } = running.ctx;
      const a = await services.catalog.create(teaInput({ name: "A", stock: 5 }));
      const b = await services.catalog.create(teaInput({ name: "B", stock: 0 }));
      const headers = await signIn(running);
      await running.http.post("/cart/items", { productId: a.id, quantity: 2 }, { headers });
      await running.http.post("/cart/items", { productId: b.id, quantity: 1 }, { headers });

      const res = await running.http.post("/cart/checkout", {}, { headers });
      expect(res.status).toBe(409);
      expect(res.data).toMatchObject({ code: "INSUFFICIENT_STOCK", details: { productId: b.id, requested: 1, available: 0 } });
      expect((await services.catalog.get(a.id)).stock).toBe(5);
    });

    it("hides other customers' orders", async () => {
      const { services } = running.ctx;
      const tea = await services.catalog.create(teaInput());
      const alice = await signIn(running, "9811111111");
      const bob = await signIn(running, "9822222222");
      await running.http.post("/cart/items", { productId: tea.id }, { headers: alice });
      const order = await running.http.post("/cart/checkout", {}, { headers: alice });

      expect((await running.http.get(`/orders/${order.data.id}`, { headers: bob })).status).toBe(404);
      expect((await running.http.get(`/orders/${order.data.id}`, { headers: alice })).status).toBe(200);
    });

    describe("admin", () => {
      it("checks the admin key or role", async () => {
        expect((await running.http.get("/admin/products")).status).toBe(401);
        expect((await running.http.get("/admin/products", { headers: { "X-Admin-Key": "wrong" } })).status).toBe(401);

        const customer = await signIn(running);
        const res = await running.http.get("/admin/products", { headers: customer });
        expect(res.status).toBe(403);
        expect(res.data.code).toBe("FORBIDDEN");

        expect((await running.http.get("/admin/products", { headers: adminKey })).status).toBe(200);
      });

      it("manages products and stock", async () => {
        const created = await running.http.post(
          "/admin/products",
          { name: "Nilgiri Frost", price: 529, stock: 4, category: "black" },
          { headers: adminKey }
        );
        expect(created.status).toBe(201);
        expect(created.data.slug).toBe("nilgiri-frost");
        const id: string = created.data.id;

        const invalid = await running.http.post("/admin/products", { name: "No Price" }, { headers: adminKey });
        expect(invalid.status).toBe(422);

        const taken = await running.http.post(`/admin/products/${id}/stock`, { delta: -5 }, { headers: adminKey });
        expect(taken.status).toBe(409);
        const added = await running.http.post(`/admin/products/${id}/stock`, { delta: 6 }, { headers: adminKey });
        expect(added.data.stock).toBe(10);

        const hidden = await running.http.put(`/admin/products/${id}`, { active: false }, { headers: adminKey });
        expect(hidden.data.active).toBe(false);
        expect((await running.http.get(`/products/${id}`)).status).toBe(404);
        expect((await running.http.get(`/admin/products/${id}`, { headers: adminKey })).status).toBe(200);

        expect((await running.http.delete(`/admin/products/${id}`, { headers: adminKey })).status).toBe(204);
        expect((await running.http.get(`/admin/products/${id}`, { headers: adminKey })).status).toBe(404);
      });

      it("rejects transitions outside the order graph", async () => {
        const { services } = running.ctx;
        const tea = await services.catalog.create(teaInput());
        const headers = await signIn(running);
        await running.http.post("/cart/items", { productId: tea.id }, { headers });
        const order = await running.http.post("/cart/checkout", {}, { headers });

        const res = await running.http.post(
          `/admin/orders/${order.data.id}/status`,
          { status: "delivered" },
          { headers: adminKey }
        );
        expect(res.status).toBe(409);
        expect(res.data.message).toBe("Cannot move order from pending to delivered");

        const cancelled = await running.http.post(
          `/admin/orders/${order.data.id}/status`,
          { status: "cancelled", note: "customer called" },
          { headers: adminKey }
        );
        expect(cancelled.status).toBe(200);
        expect(cancelled.data.statusHistory[1]).toMatchObject({ status: "cancelled", by: "admin-api-key", note: "customer called" });
      });
    });

    describe("payment webhook", () => {
      it("verifies the signature over the raw body", async () => {
        const { services } = running.ctx;
        const tea = await services.catalog.create(teaInput({ price: 100 }));
        const headers = await signIn(running);
        await running.http.post("/cart/items", { productId: tea.id }, { headers });
        const order = await running.http.post("/cart/checkout", {}, { headers });

        // spacing is kept so the signature only matches the exact bytes
        const body = `{"event": "payment.captured", "payload": {"payment": {"entity": {"id": "pay_9", "notes": {"order_id": "${order.data.id}"}}}}}`;
        const post = (signature: string) =>
          running.http.post("/webhooks/payment", body, {
            headers: { "Content-Type": "application/json", "X-Razorpay-Signature": signature },
            transformRequest: [(d: unknown) => d],
          });

        const forged = await post(hmacHex(TEST_ENV.RAZORPAY_WEBHOOK_SECRET, JSON.stringify(JSON.parse(body))));
        expect(forged.status).toBe(401);

        const ok = await post(hmacHex(TEST_ENV.RAZORPAY_WEBHOOK_SECRET, body));
        expect(ok.status).toBe(200);
        expect(ok.data).toEqual({ received: true, event: "payment.captured", handled: true, orderId: order.data.id });
        expect((await services.orders.get(order.data.id)).status).toBe("paid");
      });
    });
  });
});
