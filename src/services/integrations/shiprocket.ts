// src/services/integrations/shiprocket.ts
import axios, { AxiosInstance } from "axios";
import { z } from "zod";
import { ValidationError } from "../../errors";
import type { Order, ShipmentRecord } from "../../types/domain";
import { notConfigured, toUpstreamError } from "./upstream";

export interface ShippingProvider {
  createShipment(order: Order): Promise<ShipmentRecord>;
}

const CreatedSchema = z.object({
  shipment_id: z.union([z.number(), z.string()]),
  awb_code: z.string().optional().nullable(),
});

const LabelSchema = z.object({
  label_url: z.string().optional().nullable(),
});

export class ShiprocketProvider implements ShippingProvider {
  private readonly http?: AxiosInstance;

  constructor(options: { token?: string; baseUrl: string; timeoutMs?: number }) {
    if (options.token) {
      this.http = axios.create({
        baseURL: options.baseUrl,
        headers: { Authorization: `Bearer ${options.token}` },
        timeout: options.timeoutMs ?? 10000,
      });
    }
  }

  async createShipment(order: Order): Promise<ShipmentRecord> {
    if (!this.http) throw notConfigured("shiprocket");
    const address = order.shippingAddress;
    if (!address) throw new ValidationError("Order has no shipping address");

    try {
      const created = await this.http.post<unknown>("/orders/create/adhoc", {
        order_id: order.id,
        order_date: order.createdAt.toISOString().slice(0, 10),
        billing_address: address.line1,
        billing_address_2: address.line2 ?? "",
        billing_city: address.city,
        billing_state: address.state,
        billing_pincode: address.pincode,
        billing_country: address.country,
        shipping_is_billing: true,
        order_items: order.items.map((i) => ({
          name: i.name,
          sku: i.productId,
          units: i.quantity,
          selling_price: i.unitPrice,
        })),
        payment_method: "Prepaid",
        sub_total: order.subtotal,
      });
      const { shipment_id, awb_code } = CreatedSchema.parse(created.data);
      const shipmentId = String(shipment_id);

      const label = await this.http.post<unknown>("/courier/generate/label", {
        shipment_id: [shipmentId],
      });
      const { label_url } = LabelSchema.parse(label.data);

      return {
        carrier: "shiprocket",
        shipmentId,
        awb: awb_code ?? undefined,
        labelUrl: label_url ?? undefined,
        createdAt: new Date(),
      };
    } catch (err) {
      throw toUpstreamError("shiprocket", err);
    }
  }
}
