// src/services/integrations/razorpay.ts
import axios, { AxiosInstance } from "axios";
import crypto from "crypto";
import { z } from "zod";
import { notConfigured, toUpstreamError } from "./upstream";

export interface GatewayOrderRequest {
  /** minor units (paise) */
  amount: number;
  currency: string;
  receipt: string;
  notes: Record<string, string>;
}

export interface GatewayOrder {
  id: string;
  amount: number;
  currency: string;
}

export interface PaymentGateway {
  readonly keyId?: string;
  createOrder(req: GatewayOrderRequest): Promise<GatewayOrder>;
  verifyPaymentSignature(gatewayOrderId: string, paymentId: string, signature: string): boolean;
  verifyWebhookSignature(rawBody: Buffer | string, signature: string | undefined): boolean;
}

const GatewayOrderSchema = z.object({
  id: z.string(),
  amount: z.number(),
  currency: z.string(),
});

export function hmacHex(secret: string, payload: Buffer | string): string {
  return crypto.createHmac("sha256", secret).update(payload).digest("hex");
}

export function safeEqualHex(expected: string, received: string | undefined): boolean {
  if (!received) return false;
  const a = Buffer.from(expected, "utf8");
  const b = Buffer.from(received, "utf8");
  return a.length === b.length && crypto.timingSafeEqual(a, b);
}

export interface RazorpayOptions {
  keyId?: string;
  keySecret?: string;
  webhookSecret?: string;
  baseUrl: string;
  timeoutMs?: number;
}

export class RazorpayGateway implements PaymentGateway {
  readonly keyId?: string;
  private readonly http?: AxiosInstance;

  constructor(private readonly options: RazorpayOptions) {
    this.keyId = options.keyId;
    if (options.keyId && options.keySecret) {
      this.http = axios.create({
        baseURL: options.baseUrl,
        auth: { username: options.keyId, password: options.keySecret },
        timeout: options.timeoutMs ?? 10000,
      });
    }
  }

  async createOrder(req: GatewayOrderRequest): Promise<GatewayOrder> {
    if (!this.http) throw notConfigured("razorpay");
    try {
      const { data } = await this.http.post<unknown>("/orders", {
        amount: req.amount,
        currency: req.currency,
        receipt: req.receipt,
        notes: req.notes,
        payment_capture: 1,
      });
      return GatewayOrderSchema.parse(data);
    } catch (err) {
      throw toUpstreamError("razorpay", err);
    }
  }

  verifyPaymentSignature(gatewayOrderId: string, paymentId: string, signature: string): boolean {
    if (!this.options.keySecret) return false;
    return safeEqualHex(hmacHex(this.options.keySecret, `${gatewayOrderId}|${paymentId}`), signature);
  }

  verifyWebhookSignature(rawBody: Buffer | string, signature: string | undefined): boolean {
    if (!this.options.webhookSecret) return false;
    return safeEqualHex(hmacHex(this.options.webhookSecret, rawBody), signature);
  }
}
