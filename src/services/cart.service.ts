// src/services/cart.service.ts
import { NotFoundError, ValidationError } from "../errors";
import type { CartRepository, ProductRepository } from "../repositories/types";
import type { Cart } from "../types/domain";
import { fromMinor, lineTotal, toMinor } from "../utils/money";

export interface CartViewLine {
  productId: string;
  quantity: number;
  name?: string;
  slug?: string;
  image?: string;
  unitPrice?: number;
  lineTotal: number;
  /** false when the product was removed or deactivated since it was added */
  available: boolean;
  /** current stock covers the line; checked again at checkout */
  inStock: boolean;
}

export interface CartView {
  ownerId: string;
  items: CartViewLine[];
  itemCount: number;
  subtotal: number;
  currency: string;
  updatedAt?: Date;
}

function assertQuantity(quantity: number): void {
  if (!Number.isInteger(quantity) || quantity < 1) {
    throw new ValidationError("Invalid quantity", [{ path: "quantity", message: "must be an integer >= 1" }]);
  }
}

export class CartService {
  constructor(
    private readonly carts: CartRepository,
    private readonly products: ProductRepository,
    private readonly currency = "INR"
  ) {}

  async getCart(ownerId: string): Promise<CartView> {
    const cart = await this.carts.findByOwner(ownerId);
    return this.present(ownerId, cart);
  }

  async addItem(ownerId: string, productId: string, quantity: number): Promise<CartView> {
    assertQuantity(quantity);
    const product = await this.products.findById(productId);
    if (!product) throw new NotFoundError("Product", productId);
    if (!product.active) {
      throw new ValidationError("Product is not available", [{ path: "productId", message: "product is inactive" }]);
    }

    const cart = await this.carts.addItem(ownerId, productId, quantity);
    return this.present(ownerId, cart);
  }

  async setQuantity(ownerId: string, productId: string, quantity: number): Promise<CartView> {
    assertQuantity(quantity);
    const cart = await this.carts.setQuantity(ownerId, productId, quantity);
    if (!cart) throw new NotFoundError("Cart item", productId);
    return this.present(ownerId, cart);
  }

  async removeItem(ownerId: string, productId: string): Promise<CartView> {
    const before = await this.carts.findByOwner(ownerId);
    if (!before || !before.items.some((i) => i.productId === productId)) {
      throw new NotFoundError("Cart item", productId);
    }
    const cart = await this.carts.removeItem(ownerId, productId);
    return this.present(ownerId, cart);
  }

  async clear(ownerId: string): Promise<CartView> {
    await this.carts.clear(ownerId);
    return this.present(ownerId, null);
  }

  // totals are derived from current catalog prices, never stored on the cart
  private async present(ownerId: string, cart: Cart | null): Promise<CartView> {
    if (!cart || cart.items.length === 0) {
      return { ownerId, items: [], itemCount: 0, subtotal: 0, currency: this.currency, updatedAt: cart?.updatedAt };
    }

    const products = await this.products.findByIds(cart.items.map((i) => i.productId));
    const byId = new Map(products.map((p) => [p.id, p]));

    let subtotalMinor = 0;
    let itemCount = 0;
    const items = cart.items.map((line): CartViewLine => {
      const product = byId.get(line.productId);
      if (!product || !product.active) {
        return { productId: line.productId, quantity: line.quantity, name: product?.name, lineTotal: 0, available: false, inStock: false };
      }
      const total = lineTotal(product.price, line.quantity);
      subtotalMinor += toMinor(total);
      itemCount += line.quantity;
      return {
        productId: line.productId,
        quantity: line.quantity,
        name: product.name,
        slug: product.slug,
        image: product.images[0],
        unitPrice: product.price,
        lineTotal: total,
        available: true,
        inStock: product.stock >= line.quantity,
      };
    });

    return {
      ownerId,
      items,
      itemCount,
      subtotal: fromMinor(subtotalMinor),
      currency: this.currency,
      updatedAt: cart.updatedAt,
    };
  }
}
