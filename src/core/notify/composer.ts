/**
 * Notification composition
 *
 * Renders a DiffResult as chat text. Pure: same diff in, same strings out.
 */

import { verdictLabel } from "../sizes/classifier";
import type { DiffResult, Product, SequenceTransition } from "../types";
import { packEntries } from "./chunk";
import { formatPercent, formatPrice } from "./format";

export interface ComposeOptions {
  currencySymbol?: string;
  /** Longest message the transport accepts; longer updates are split between entries */
  maxLength?: number;
  header?: string;
}

export const DEFAULT_MAX_MESSAGE_LENGTH = 3500;
export const DEFAULT_HEADER = "🔔 Catalog update";

function transitionStatus(t: SequenceTransition): string {
  if (t.to.kind === "sequential") return "✅ Fixed";
  if (t.to.kind === "non_sequential") return "❌ Broken";
  return "➖ No longer checked";
}

export function composeNotifications(
  diff: DiffResult,
  options: ComposeOptions = {},
): string[] {
  const {
    currencySymbol = "€",
    maxLength = DEFAULT_MAX_MESSAGE_LENGTH,
    header = DEFAULT_HEADER,
  } = options;
  const price = (minor: number) => formatPrice(minor, currencySymbol);

  // one entry per product so a split never separates a product's lines
  const sections: string[][] = [];

  if (diff.newProducts.length > 0) {
    sections.push([
      `🆕 New Products (${diff.newProducts.length})`,
      ...diff.newProducts.map((p) => `• ${p.title} - ${price(p.priceMinor)}`),
    ]);
  }

  if (diff.newDiscounts.length > 0) {
    sections.push([
      `💰 New Discounts (${diff.newDiscounts.length})`,
      ...diff.newDiscounts.map((p) => discountLine(p, price)),
    ]);
  }

  if (diff.sequenceTransitions.length > 0) {
    sections.push([
      `📐 Sequence Changes (${diff.sequenceTransitions.length})`,
      ...diff.sequenceTransitions.map(
        (t) =>
          `• ${t.product.title} - ${price(t.product.priceMinor)} - ${transitionStatus(t)} (${verdictLabel(t.from)} → ${verdictLabel(t.to)})`,
      ),
    ]);
  }

  if (sections.length === 0) return [];

  const entries = [header, ...sections.flatMap((section) => ["", ...section])];
  return packEntries(entries, maxLength);
}

function discountLine(p: Product, price: (minor: number) => string): string {
  const was =
    p.originalPriceMinor != null ? ` (was ${price(p.originalPriceMinor)})` : "";
  const pct = p.discountPercent != null ? ` - ${formatPercent(p.discountPercent)}` : "";
  return `• ${p.title}\n  ${price(p.priceMinor)}${was}${pct}`;
}
