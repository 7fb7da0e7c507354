/**
 * Size sequence classification
 */

import type { ParsedSize, Product, SequenceVerdict } from "../types";
import { comparisonKey, parseSizeToken } from "./parser";

/** Size-type labels that mean the product has no real variant axis */
export const NO_VARIANT_AXIS = new Set(["Default Title", "Default"]);

/** Titles of add-on products whose "sizes" are personalisation choices */
export const CUSTOMIZATION_KEYWORDS = [
  "Add Your Name/Number",
  "Add name/number",
  "Choose a player",
  "Choose a Patch",
] as const;

const scale = (p: ParsedSize) => (p.kind === "clothing" ? "letter" : "numeric");

/**
 * Decides whether an ordered size list reads smallest to largest.
 *
 * Clothing runs must also be contiguous: two neighbours whose ranks leave out
 * a defined size in between ("S, L") count as broken. Equal neighbours
 * ("XXL, 2XL") do not.
 */
export function classifySizes(
  sizeType: string,
  tokens: readonly string[],
): SequenceVerdict {
  if (NO_VARIANT_AXIS.has(sizeType)) {
    return { kind: "not_applicable", reason: "no_variant_axis" };
  }
  if (tokens.length <= 1) {
    return { kind: "not_applicable", reason: "too_few_sizes" };
  }

  const parsed = tokens.map(parseSizeToken);
  if (parsed.some((p) => p.kind === "unparseable")) {
    return { kind: "not_applicable", reason: "unparseable_token" };
  }

  for (let i = 1; i < parsed.length; i++) {
    const prev = parsed[i - 1];
    const next = parsed[i];

    if (scale(prev) !== scale(next)) {
      return { kind: "non_sequential", reason: "mixed_scales", index: i };
    }

    const prevKey = comparisonKey(prev) ?? 0;
    const nextKey = comparisonKey(next) ?? 0;
    if (nextKey < prevKey) {
      return { kind: "non_sequential", reason: "descending", index: i };
    }

    if (
      prev.kind === "clothing" &&
      next.kind === "clothing" &&
      next.rank - prev.upperRank > 1
    ) {
      return { kind: "non_sequential", reason: "skipped_rank", index: i };
    }
  }

  return { kind: "sequential" };
}

export function isCustomizationProduct(title: string): boolean {
  const t = title.toLowerCase();
  return CUSTOMIZATION_KEYWORDS.some((k) => t.includes(k.toLowerCase()));
}

/** Verdict for a whole product; customization add-ons are never judged */
export function classifyProduct(
  product: Pick<Product, "title" | "sizeType" | "sizes">,
): SequenceVerdict {
  if (isCustomizationProduct(product.title)) {
    return { kind: "not_applicable", reason: "customization" };
  }
  return classifySizes(product.sizeType, product.sizes);
}

export function verdictLabel(verdict: SequenceVerdict): string {
  switch (verdict.kind) {
    case "sequential":
      return "Sequential";
    case "non_sequential":
      return "Non-sequential";
    case "not_applicable":
      return "N/A";
  }
}
