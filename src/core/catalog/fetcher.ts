/**
 * Storefront catalog fetching (products.json pagination)
 */

import { AppConfig } from "../config/index";
import { FETCH_CONSTANTS } from "../constants/index";
import { Logger } from "../utils/logger";
import { HTTP_RETRY_OPTIONS, sleep, withRetry } from "../utils/retry";

export class HttpError extends Error {
  constructor(
    public status: number,
    public url: string,
  ) {
    super(`HTTP ${status} for ${url}`);
    this.name = "HttpError";
  }
}

export interface FetchCatalogOptions {
  pageLimit?: number;
  maxPages?: number;
  timeoutMs?: number;
  pageDelayMs?: number;
}

/**
 * Fetches JSON from a URL with a request timeout
 * @throws HttpError on a non-2xx response
 */
export async function fetchJsonOnce(
  url: string,
  timeoutMs: number,
): Promise<unknown> {
  const r = await fetch(url, {
    redirect: "follow",
    headers: {
      "user-agent": FETCH_CONSTANTS.USER_AGENT,
      accept: FETCH_CONSTANTS.ACCEPT_HEADER,
    },
    signal: AbortSignal.timeout(timeoutMs),
  });
  if (!r.ok) throw new HttpError(r.status, url);
  return r.json();
}

export function pageUrl(baseUrl: string, page: number, limit: number): string {
  const u = new URL(baseUrl);
  u.searchParams.set("page", String(page));
  u.searchParams.set("limit", String(limit));
  return u.toString();
}

function productsOf(body: unknown, url: string): unknown[] {
  if (body && typeof body === "object" && "products" in body) {
    const products = body.products;
    if (Array.isArray(products)) return products;
  }
  throw new Error(`Unexpected catalog payload from ${url}: no products array`);
}

/**
 * Fetches every page of the catalog. Stops at the first empty page or the
 * first page shorter than the limit.
 * @returns Raw product objects, unvalidated, in catalog order
 */
export async function fetchCatalog(
  baseUrl: string = AppConfig.CATALOG_URL,
  options: FetchCatalogOptions = {},
): Promise<unknown[]> {
  const {
    pageLimit = AppConfig.CATALOG_PAGE_LIMIT,
    maxPages = AppConfig.CATALOG_MAX_PAGES,
    timeoutMs = AppConfig.FETCH_TIMEOUT_MS,
    pageDelayMs = FETCH_CONSTANTS.PAGE_DELAY_MS,
  } = options;

  if (!baseUrl) throw new Error("Catalog URL is not configured (CATALOG_URL)");

  const all: unknown[] = [];
  for (let page = 1; page <= maxPages; page++) {
    const url = pageUrl(baseUrl, page, pageLimit);
    const body = await withRetry(() => fetchJsonOnce(url, timeoutMs), {
      ...HTTP_RETRY_OPTIONS,
      onRetry: (error, attempt, delayMs) =>
        Logger.warn(`Retrying catalog page ${page}`, {
          attempt,
          delayMs,
          error: error.message,
        }),
    });
    const products = productsOf(body, url);
    Logger.catalogPage(page, products.length);

    if (products.length === 0) break;
    all.push(...products);
    if (products.length < pageLimit) break;

    if (page === maxPages) {
      Logger.warn(`Stopped at page limit ${maxPages}; catalog may be truncated`);
      break;
    }
    if (pageDelayMs > 0) await sleep(pageDelayMs);
  }

  Logger.info(`Catalog fetched: ${all.length} products`, { count: all.length });
  return all;
}
