// src/utils/money.ts
// Amounts are stored in major units (rupees) and computed in minor units (paise).

export function toMinor(amount: number): number {
  return Math.round(amount * 100);
}

export function fromMinor(minor: number): number {
  return minor / 100;
}

export function lineTotal(unitPrice: number, quantity: number): number {
  return fromMinor(toMinor(unitPrice) * quantity);
}

export interface PricingRules {
  freeShippingThreshold: number;
  shippingFee: number;
  taxRate: number;
}

export interface Totals {
  subtotal: number;
  shipping: number;
  tax: number;
  total: number;
}

export function computeTotals(
  lines: ReadonlyArray<{ unitPrice: number; quantity: number }>,
  rules: PricingRules
): Totals {
  const subtotalMinor = lines.reduce(
    (sum, l) => sum + toMinor(l.unitPrice) * l.quantity,
    0
  );
  const shippingMinor =
    subtotalMinor >= toMinor(rules.freeShippingThreshold) ? 0 : toMinor(rules.shippingFee);
  const taxMinor = Math.round(subtotalMinor * rules.taxRate);

  return {
    subtotal: fromMinor(subtotalMinor),
    shipping: fromMinor(shippingMinor),
    tax: fromMinor(taxMinor),
    total: fromMinor(subtotalMinor + shippingMinor + taxMinor),
  };
}
