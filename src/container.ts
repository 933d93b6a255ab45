// src/container.ts
import type { Config } from "./config";
import type { Repositories } from "./repositories/types";
import { AddressService } from "./services/address.service";
import { AuthService, LogOtpSender, OtpSender } from "./services/auth.service";
import { CartService } from "./services/cart.service";
import { CatalogService } from "./services/catalog.service";
import { ChatService } from "./services/chat.service";
import { CheckoutService } from "./services/checkout.service";
import { FeedbackService } from "./services/feedback.service";
import { CannedChatProvider, ChatProvider, OpenAiChatProvider } from "./services/integrations/chat";
import { LogOrderNotifier, OrderNotifier } from "./services/integrations/notifier";
import { PaymentGateway, RazorpayGateway } from "./services/integrations/razorpay";
import { ShippingProvider, ShiprocketProvider } from "./services/integrations/shiprocket";
import { OrderService } from "./services/order.service";
import { PaymentService } from "./services/payment.service";

export interface Providers {
  chat: ChatProvider;
  payments: PaymentGateway;
  shipping: ShippingProvider;
  otpSender: OtpSender;
  notifier: OrderNotifier;
}

export interface Services {
  catalog: CatalogService;
  cart: CartService;
  checkout: CheckoutService;
  orders: OrderService;
  payments: PaymentService;
  addresses: AddressService;
  auth: AuthService;
  chat: ChatService;
  feedback: FeedbackService;
}

export function createProviders(config: Config): Providers {
  return {
    chat: config.ai.apiKey
      ? new OpenAiChatProvider({
          apiKey: config.ai.apiKey,
          baseUrl: config.ai.baseUrl,
          model: config.ai.model,
          timeoutMs: config.ai.timeoutMs,
        })
      : new CannedChatProvider(),
    payments: new RazorpayGateway(config.payments),
    shipping: new ShiprocketProvider(config.shipping),
    otpSender: new LogOtpSender(config.env !== "production"),
    notifier: new LogOrderNotifier(),
  };
}

/** Wires services over one set of repositories. Tests pass fakes for any provider. */
export function createServices(
  repos: Repositories,
  config: Config,
  overrides: Partial<Providers> = {}
): Services {
  const providers = { ...createProviders(config), ...overrides };
  const { currency } = config.pricing;

  const orders = new OrderService(repos.orders, repos.products, providers.shipping, providers.notifier);
  return {
    catalog: new CatalogService(repos.products, currency),
    cart: new CartService(repos.carts, repos.products, currency),
    checkout: new CheckoutService(
      repos.carts,
      repos.products,
      repos.orders,
      repos.users,
      config.pricing,
      providers.notifier
    ),
    orders,
    payments: new PaymentService(providers.payments, repos.orders, orders),
    addresses: new AddressService(repos.users),
    auth: new AuthService(repos.users, repos.otps, providers.otpSender, config.auth),
    chat: new ChatService(providers.chat),
    feedback: new FeedbackService(repos.feedback),
  };
}
