import { loadConfig } from "../src/config";
import { createServices, Providers, Services } from "../src/container";
import { createMemoryRepositories } from "../src/repositories/memory";
import type { Repositories } from "../src/repositories/types";
import type { NewProduct } from "../src/services/catalog.service";
import type { OtpSender } from "../src/services/auth.service";
import type { OrderEvent, OrderNotifier } from "../src/services/integrations/notifier";
import { GatewayOrder, GatewayOrderRequest, RazorpayGateway } from "../src/services/integrations/razorpay";
import type { ShippingProvider } from "../src/services/integrations/shiprocket";
import type { Order, ShipmentRecord } from "../src/types/domain";

export const TEST_ENV = {
  NODE_ENV: "test",
  STORE_DRIVER: "memory",
  COMMERCE_ENABLED: "true",
  JWT_SECRET: "test-secret",
  ADMIN_API_KEY: "test-admin-key",
  OTP_RESEND_SECONDS: "0",
  RAZORPAY_KEY_ID: "rzp_test_key",
  RAZORPAY_KEY_SECRET: "test-key-secret",
  RAZORPAY_WEBHOOK_SECRET: "test-webhook-secret",
};

export const testConfig = (overrides: Record<string, string> = {}) => loadConfig({ ...TEST_ENV, ...overrides });

/** Real signature checks, canned order creation. */
export class FakeGateway extends RazorpayGateway {
  readonly created: GatewayOrderRequest[] = [];

  constructor() {
    super({
      keyId: TEST_ENV.RAZORPAY_KEY_ID,
      keySecret: TEST_ENV.RAZORPAY_KEY_SECRET,
      webhookSecret: TEST_ENV.RAZORPAY_WEBHOOK_SECRET,
      baseUrl: "http://127.0.0.1:9",
    });
  }

  async createOrder(req: GatewayOrderRequest): Promise<GatewayOrder> {
    this.created.push(req);
    return { id: `order_test_${this.created.length}`, amount: req.amount, currency: req.currency };
  }
}

export class FakeShipping implements ShippingProvider {
  readonly shipped: string[] = [];

  async createShipment(order: Order): Promise<ShipmentRecord> {
    this.shipped.push(order.id);
    return { carrier: "test-carrier", shipmentId: `ship-${order.id}`, awb: "AWB123", createdAt: new Date() };
  }
}

export class CapturingOtpSender implements OtpSender {
  readonly sent: Array<{ phone: string; code: string }> = [];

  async send(phone: string, code: string): Promise<void> {
    this.sent.push({ phone, code });
  }

  lastCode(): string {
    const last = this.sent[this.sent.length - 1];
    if (!last) throw new Error("no OTP sent");
    return last.code;
  }
}

export class CapturingNotifier implements OrderNotifier {
  readonly events: Array<{ event: OrderEvent; orderId: string }> = [];

  async notify(event: OrderEvent, order: Order): Promise<void> {
    this.events.push({ event, orderId: order.id });
  }
}

export interface TestContext {
  repos: Repositories;
  services: Services;
  gateway: FakeGateway;
  shipping: FakeShipping;
  otpSender: CapturingOtpSender;
  notifier: CapturingNotifier;
}

export function createTestContext(overrides: Partial<Providers> = {}, env: Record<string, string> = {}): TestContext {
  const repos = createMemoryRepositories();
  const gateway = new FakeGateway();
  const shipping = new FakeShipping();
  const otpSender = new CapturingOtpSender();
  const notifier = new CapturingNotifier();
  const services = createServices(repos, testConfig(env), {
    payments: gateway,
    shipping,
    otpSender,
    notifier,
    ...overrides,
  });
  return { repos, services, gateway, shipping, otpSender, notifier };
}

export function teaInput(overrides: Partial<NewProduct> = {}): NewProduct {
  return {
    name: "Assam Breakfast",
    price: 100,
    stock: 10,
    category: "black",
    ...overrides,
  };
}

export const OWNER = "64b000000000000000000001";
export const OTHER_OWNER = "64b000000000000000000002";
