/**
 * Catalog normalization: raw storefront products -> Product
 */

import * as cheerio from "cheerio";
import { CATALOG_CONSTANTS } from "../constants/index";
import type { CatalogProduct, Product, RejectedProduct } from "../types";
import {
  ValidationError,
  productIdOf,
  validateCatalogProduct,
} from "../validation/index";

/** "12.50" -> 1250 */
export function toMinor(price: string): number {
  return Math.round(parseFloat(price) * 100);
}

/** Strips markup and collapses whitespace */
export function cleanDescription(html: string | null | undefined): string {
  if (!html) return "";
  const $ = cheerio.load(html);
  $("script, style").remove();
  return $.root().text().replace(/\s+/g, " ").trim();
}

export function sizeTypeOf(product: CatalogProduct): string {
  const names: readonly string[] = CATALOG_CONSTANTS.SIZE_OPTION_NAMES;
  const option = (product.options ?? []).find((o) => names.includes(o.name));
  return option?.name ?? CATALOG_CONSTANTS.DEFAULT_SIZE_TYPE;
}

/**
 * Maps a validated catalog product. Pricing comes from the first variant;
 * a compare-at price of zero, or below the price, is dropped.
 */
export function toProduct(product: CatalogProduct): Product {
  const first = product.variants[0];
  const priceMinor = toMinor(first.price);
  const compareMinor = first.compare_at_price
    ? toMinor(first.compare_at_price)
    : 0;
  const originalPriceMinor =
    compareMinor > 0 && compareMinor >= priceMinor ? compareMinor : null;
  let discountAmountMinor: number | null = null;
  let discountPercent: number | null = null;
  if (originalPriceMinor !== null && originalPriceMinor > priceMinor) {
    discountAmountMinor = originalPriceMinor - priceMinor;
    discountPercent = (discountAmountMinor / originalPriceMinor) * 100;
  }

  return {
    id: String(product.id),
    title: product.title,
    handle: product.handle ?? null,
    priceMinor,
    originalPriceMinor,
    discountAmountMinor,
    discountPercent,
    sizeType: sizeTypeOf(product),
    sizes: product.variants
      .map((v) => v.title)
      .filter((t) => t !== CATALOG_CONSTANTS.DEFAULT_VARIANT_TITLE),
    description: cleanDescription(product.body_html),
  };
}

export interface NormalizedCatalog {
  products: Product[];
  rejected: RejectedProduct[];
}

/**
 * Validates and maps every raw product; malformed ones are collected in
 * `rejected` instead of aborting the batch.
 */
export function normalizeCatalog(raw: readonly unknown[]): NormalizedCatalog {
  const products: Product[] = [];
  const rejected: RejectedProduct[] = [];

  for (const item of raw) {
    try {
      products.push(toProduct(validateCatalogProduct(item)));
    } catch (e) {
      if (!(e instanceof ValidationError)) throw e;
      rejected.push({ id: e.productId ?? productIdOf(item), reason: e.message });
    }
  }

  return { products, rejected };
}
