import { describe, expect, it } from "vitest";
import { computeTotals, fromMinor, lineTotal, toMinor } from "../src/utils/money";

const rules = { freeShippingThreshold: 499, shippingFee: 49, taxRate: 0.05 };

describe("money", () => {
  it("converts between rupees and paise", () => {
    expect(toMinor(19.99)).toBe(1999);
    expect(toMinor(0.1 + 0.2)).toBe(30);
    expect(fromMinor(1999)).toBe(19.99);
  });

  it("multiplies line totals in minor units", () => {
    expect(lineTotal(0.1, 3)).toBe(0.3);
    expect(lineTotal(349, 2)).toBe(698);
  });

  it("charges flat shipping below the threshold and rounds tax to the paisa", () => {
    const totals = computeTotals(
      [
        { unitPrice: 100, quantity: 2 },
        { unitPrice: 49.5, quantity: 1 },
      ],
      rules
    );
    expect(totals).toEqual({ subtotal: 249.5, shipping: 49, tax: 12.48, total: 310.98 });
  });

  it("ships free at exactly the threshold", () => {
    expect(computeTotals([{ unitPrice: 499, quantity: 1 }], rules)).toEqual({
      subtotal: 499,
      shipping: 0,
      tax: 24.95,
      total: 523.95,
    });
  });

  it("returns zeros plus shipping for an empty line list", () => {
    expect(computeTotals([], rules)).toEqual({ subtotal: 0, shipping: 49, tax: 0, total: 49 });
  });
});
