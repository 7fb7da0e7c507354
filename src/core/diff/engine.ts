/**
 * Snapshot diffing
 */

import type {
  DiffResult,
  Product,
  SequenceTransition,
  Snapshot,
} from "../types";
import { hasDiscount } from "./snapshot";

export const EMPTY_DIFF: DiffResult = Object.freeze({
  newProducts: Object.freeze([]),
  newDiscounts: Object.freeze([]),
  sequenceTransitions: Object.freeze([]),
});

export function isEmptyDiff(diff: DiffResult): boolean {
  return (
    diff.newProducts.length === 0 &&
    diff.newDiscounts.length === 0 &&
    diff.sequenceTransitions.length === 0
  );
}

/**
 * Compares two consecutive snapshots.
 *
 * Without a previous snapshot there is no baseline and the result is empty.
 * Removals and changes to an existing discount are not reported. Every list
 * follows the current snapshot's order.
 */
export function diffSnapshots(
  previous: Snapshot | null | undefined,
  current: Snapshot,
): DiffResult {
  if (!previous) return EMPTY_DIFF;

  const newProducts: Product[] = [];
  const newDiscounts: Product[] = [];
  const sequenceTransitions: SequenceTransition[] = [];

  for (const [id, entry] of current.entries) {
    if (!id || !entry.product.id) continue;

    const before = previous.entries.get(id);
    if (!before) {
      newProducts.push(entry.product);
      continue;
    }

    if (!hasDiscount(before.product) && hasDiscount(entry.product)) {
      newDiscounts.push(entry.product);
    }

    if (before.verdict.kind !== entry.verdict.kind) {
      sequenceTransitions.push(
        Object.freeze({
          product: entry.product,
          from: before.verdict,
          to: entry.verdict,
        }),
      );
    }
  }

  return Object.freeze({
    newProducts: Object.freeze(newProducts),
    newDiscounts: Object.freeze(newDiscounts),
    sequenceTransitions: Object.freeze(sequenceTransitions),
  });
}
