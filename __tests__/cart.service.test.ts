import { beforeEach, describe, expect, it } from "vitest";
import { NotFoundError, ValidationError } from "../src/errors";
import type { Services } from "../src/container";
import type { Repositories } from "../src/repositories/types";
import { createTestContext, OTHER_OWNER, OWNER, teaInput } from "./helpers";

describe("CartService", () => {
  let services: Services;
  let repos: Repositories;

  beforeEach(() => {
    ({ services, repos } = createTestContext());
  });

  it("returns an empty cart for a new owner", async () => {
    expect(await services.cart.getCart(OWNER)).toEqual({
      ownerId: OWNER,
      items: [],
      itemCount: 0,
      subtotal: 0,
      currency: "INR",
      updatedAt: undefined,
    });
  });

  it("merges the same product into one line", async () => {
    const tea = await services.catalog.create(teaInput({ price: 120 }));

    await services.cart.addItem(OWNER, tea.id, 1);
    const cart = await services.cart.addItem(OWNER, tea.id, 2);

    expect(cart.items).toHaveLength(1);
    expect(cart.items[0]).toMatchObject({ productId: tea.id, quantity: 3, unitPrice: 120, lineTotal: 360 });
    expect(cart.itemCount).toBe(3);
    expect(cart.subtotal).toBe(360);
  });

  it("keeps carts separate per owner", async () => {
    const tea = await services.catalog.create(teaInput());
    await services.cart.addItem(OWNER, tea.id, 1);

    expect((await services.cart.getCart(OTHER_OWNER)).items).toEqual([]);
  });

  it("prices lines from the current catalog", async () => {
    const tea = await services.catalog.create(teaInput({ price: 100 }));
    await services.cart.addItem(OWNER, tea.id, 2);
    await services.catalog.update(tea.id, { price: 80 });

    expect((await services.cart.getCart(OWNER)).subtotal).toBe(160);
  });

  it("flags lines whose product went away and leaves them out of the subtotal", async () => {
    const kept = await services.catalog.create(teaInput({ name: "Kept", price: 50 }));
    const retired = await services.catalog.create(teaInput({ name: "Retired", price: 70 }));
    await services.cart.addItem(OWNER, kept.id, 1);
    await services.cart.addItem(OWNER, retired.id, 1);
    await services.catalog.update(retired.id, { active: false });

    const cart = await services.cart.getCart(OWNER);
    expect(cart.items.find((i) => i.productId === retired.id)).toMatchObject({ available: false, lineTotal: 0 });
    expect(cart.subtotal).toBe(50);
    expect(cart.itemCount).toBe(1);
  });

  it("marks lines that exceed current stock", async () => {
    const tea = await services.catalog.create(teaInput({ stock: 2 }));
    const cart = await services.cart.addItem(OWNER, tea.id, 3);
    expect(cart.items[0].inStock).toBe(false);
  });

  it("rejects unknown or inactive products and bad quantities", async () => {
    const inactive = await services.catalog.create(teaInput({ active: false }));

    await expect(services.cart.addItem(OWNER, "64b0000000000000000000ff", 1)).rejects.toBeInstanceOf(NotFoundError);
    await expect(services.cart.addItem(OWNER, inactive.id, 1)).rejects.toBeInstanceOf(ValidationError);
    await expect(services.cart.addItem(OWNER, inactive.id, 0)).rejects.toThrow("Invalid quantity");
  });

  it("sets, removes and clears lines", async () => {
    const a = await services.catalog.create(teaInput({ name: "A" }));
    const b = await services.catalog.create(teaInput({ name: "B" }));
    await services.cart.addItem(OWNER, a.id, 1);
    await services.cart.addItem(OWNER, b.id, 1);

    expect((await services.cart.setQuantity(OWNER, a.id, 4)).items[0].quantity).toBe(4);
    expect((await services.cart.removeItem(OWNER, b.id)).items.map((i) => i.productId)).toEqual([a.id]);
    await expect(services.cart.removeItem(OWNER, b.id)).rejects.toBeInstanceOf(NotFoundError);
    await expect(services.cart.setQuantity(OWNER, b.id, 1)).rejects.toBeInstanceOf(NotFoundError);

    expect((await services.cart.clear(OWNER)).items).toEqual([]);
    expect((await repos.carts.findByOwner(OWNER))?.items).toEqual([]);
  });
});
