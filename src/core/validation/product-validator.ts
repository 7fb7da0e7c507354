/**
 * Catalog product validation utilities
 */

import type { CatalogOption, CatalogProduct, CatalogVariant } from "../types";

export class ValidationError extends Error {
  constructor(
    message: string,
    public field?: string,
    public productId: string | null = null,
  ) {
    super(message);
    this.name = "ValidationError";
  }
}

const isRecord = (v: unknown): v is Record<string, unknown> =>
  !!v && typeof v === "object" && !Array.isArray(v);

const isPrice = (v: unknown): v is string =>
  typeof v === "string" && /^\d+(\.\d+)?$/.test(v.trim());

/**
 * Reads the product id as a string, or null when it is missing or empty
 */
export function productIdOf(raw: unknown): string | null {
  if (!isRecord(raw)) return null;
  const id = raw.id;
  if (typeof id === "number" && Number.isFinite(id)) return String(id);
  if (typeof id === "string" && id.trim()) return id.trim();
  return null;
}

function validateVariant(
  v: unknown,
  index: number,
  productId: string,
): CatalogVariant {
  if (!isRecord(v)) {
    throw new ValidationError(
      `Variant ${index} must be an object`,
      "variants",
      productId,
    );
  }
  if (typeof v.title !== "string") {
    throw new ValidationError(
      `Variant ${index} title is required and must be a string`,
      "variants.title",
      productId,
    );
  }
  // storefronts serve prices as strings; tolerate plain numbers
  const price = typeof v.price === "number" ? v.price.toFixed(2) : v.price;
  if (!isPrice(price)) {
    throw new ValidationError(
      `Variant ${index} price must be a decimal string`,
      "variants.price",
      productId,
    );
  }
  const compareRaw =
    typeof v.compare_at_price === "number"
      ? v.compare_at_price.toFixed(2)
      : v.compare_at_price;
  const compare = isPrice(compareRaw) ? compareRaw : null;

  return {
    title: v.title,
    price,
    compare_at_price: compare,
    available: typeof v.available === "boolean" ? v.available : undefined,
  };
}

function validateOptions(raw: unknown): CatalogOption[] {
  if (!Array.isArray(raw)) return [];
  return raw.filter(isRecord).flatMap((o) =>
    typeof o.name === "string"
      ? [
          {
            name: o.name,
            values: Array.isArray(o.values)
              ? o.values.filter((x): x is string => typeof x === "string")
              : undefined,
          },
        ]
      : [],
  );
}

/**
 * Validates a raw catalog product
 * @param raw - One element of the products.json `products` array
 * @returns The validated product
 * @throws ValidationError if the product is unusable
 */
export function validateCatalogProduct(raw: unknown): CatalogProduct {
  if (!isRecord(raw)) {
    throw new ValidationError("Product must be an object");
  }

  const id = productIdOf(raw);
  if (!id) {
    throw new ValidationError(
      "Product id is required and must be a number or string",
      "id",
    );
  }

  if (typeof raw.title !== "string" || !raw.title.trim()) {
    throw new ValidationError(
      "Product title is required and must be a string",
      "title",
      id,
    );
  }

  if (!Array.isArray(raw.variants) || raw.variants.length === 0) {
    throw new ValidationError(
      "Product must have at least one variant",
      "variants",
      id,
    );
  }

  return {
    id,
    title: raw.title.trim(),
    handle: typeof raw.handle === "string" ? raw.handle : undefined,
    body_html: typeof raw.body_html === "string" ? raw.body_html : null,
    options: validateOptions(raw.options),
    variants: raw.variants.map((v, i) => validateVariant(v, i, id)),
  };
}
