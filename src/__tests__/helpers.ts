import { buildSnapshot } from "../core/diff/snapshot";
import type { SubscriberStore } from "../core/database/subscribers";
import type { Product, Snapshot } from "../core/types";

export function makeProduct(overrides: Partial<Product> = {}): Product {
  return {
    id: "1001",
    title: "Home Shirt",
    handle: "home-shirt",
    priceMinor: 5000,
    originalPriceMinor: null,
    discountAmountMinor: null,
    discountPercent: null,
    sizeType: "Size",
    sizes: ["S", "M", "L"],
    description: "",
    ...overrides,
  };
}

/** Product with a compare-at price; derives the discount fields */
export function discounted(
  overrides: Partial<Product> & { priceMinor: number; originalPriceMinor: number },
): Product {
  const amount = overrides.originalPriceMinor - overrides.priceMinor;
  return makeProduct({
    ...overrides,
    discountAmountMinor: amount,
    discountPercent: (amount / overrides.originalPriceMinor) * 100,
  });
}

export function snapshotOf(
  products: Product[],
  takenAt = "2025-01-01T10:00:00.000Z",
): Snapshot {
  return buildSnapshot(products, takenAt).snapshot;
}

/** In-memory subscriber list */
export class FakeSubscribers implements SubscriberStore {
  private readonly ids: number[];

  constructor(ids: number[] = []) {
    this.ids = [...ids];
  }

  list() {
    return [...this.ids];
  }

  has(chatId: number) {
    return this.ids.includes(chatId);
  }

  add(chatId: number) {
    if (this.has(chatId)) return false;
    this.ids.push(chatId);
    return true;
  }

  remove(chatId: number) {
    const i = this.ids.indexOf(chatId);
    if (i < 0) return false;
    this.ids.splice(i, 1);
    return true;
  }
}
