/**
 * Snapshot construction
 */

import { classifyProduct } from "../sizes/classifier";
import type {
  Product,
  RejectedProduct,
  Snapshot,
  SnapshotEntry,
} from "../types";

export interface BuiltSnapshot {
  snapshot: Snapshot;
  rejected: RejectedProduct[];
}

/**
 * Classifies every product and freezes the result into a snapshot.
 * Products without an id, and repeats of an id already taken, are rejected
 * rather than failing the whole snapshot.
 */
export function buildSnapshot(
  products: readonly Product[],
  takenAt: string,
): BuiltSnapshot {
  const entries = new Map<string, SnapshotEntry>();
  const rejected: RejectedProduct[] = [];

  for (const product of products) {
    if (!product.id) {
      rejected.push({ id: null, reason: "missing id" });
      continue;
    }
    if (entries.has(product.id)) {
      rejected.push({ id: product.id, reason: "duplicate id" });
      continue;
    }
    entries.set(
      product.id,
      Object.freeze({ product, verdict: classifyProduct(product) }),
    );
  }

  return { snapshot: Object.freeze({ takenAt, entries }), rejected };
}

export function hasDiscount(product: Product): boolean {
  return product.discountAmountMinor != null && product.discountAmountMinor > 0;
}
