/**
 * Product-related types
 */

/** One catalog entry after normalization. Prices are integer minor units (cents). */
export interface Product {
  id: string; // stable across snapshots, unique within one
  title: string;
  handle: string | null;
  priceMinor: number;
  originalPriceMinor: number | null; // compare-at price, null when the shop sets none
  discountAmountMinor: number | null;
  discountPercent: number | null; // unrounded, 0-100
  sizeType: string; // "Size", "Taglia", "option", "Default Title", ...
  sizes: string[]; // variant titles in catalog order
  description: string;
}

/** Raw variant as served by the storefront products.json endpoint */
export interface CatalogVariant {
  id?: number | string;
  title: string;
  price: string;
  compare_at_price?: string | null;
  available?: boolean;
}

/** Raw product option, e.g. { name: "Size", values: [...] } */
export interface CatalogOption {
  name: string;
  values?: string[];
}

/** Raw product as served by the storefront products.json endpoint */
export interface CatalogProduct {
  id: number | string;
  title: string;
  handle?: string;
  body_html?: string | null;
  options?: CatalogOption[];
  variants: CatalogVariant[];
}

/** A record excluded from a snapshot, reported back to the caller */
export interface RejectedProduct {
  id: string | null;
  reason: string;
}
