/**
 * Snapshot and diff types
 */

import type { Product } from "./product";
import type { SequenceVerdict } from "./sizes";

export interface SnapshotEntry {
  readonly product: Product;
  readonly verdict: SequenceVerdict;
}

/** Immutable point-in-time view of the catalog, keyed by product id in catalog order */
export interface Snapshot {
  readonly takenAt: string; // ISO
  readonly entries: ReadonlyMap<string, SnapshotEntry>;
}

export interface SequenceTransition {
  readonly product: Product;
  readonly from: SequenceVerdict;
  readonly to: SequenceVerdict;
}

export interface DiffResult {
  readonly newProducts: readonly Product[];
  readonly newDiscounts: readonly Product[];
  readonly sequenceTransitions: readonly SequenceTransition[];
}
