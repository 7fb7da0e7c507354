import pino from "pino";

// Set log level via env LOG_LEVEL (default: info)
const pretty =
  process.env.NODE_ENV !== "production" && process.env.NODE_ENV !== "test";

const logger = pino({
  level: process.env.LOG_LEVEL || "info",
  transport: pretty
    ? { target: "pino-pretty", options: { colorize: true } }
    : undefined,
});

export interface LogMeta {
  productId?: string | null;
  chatId?: number;
  duration?: number;
  count?: number;
  error?: string;
  [key: string]: unknown;
}

export class Logger {
  static info(message: string, meta?: LogMeta): void {
    logger.info(meta || {}, message);
  }
  static warn(message: string, meta?: LogMeta): void {
    logger.warn(meta || {}, message);
  }
  static error(message: string, error?: unknown, meta?: LogMeta): void {
    const err = error instanceof Error ? error : undefined;
    const errorMeta = {
      ...meta,
      error: err?.message ?? (error === undefined ? undefined : String(error)),
      stack: err?.stack,
    };
    logger.error(errorMeta, message);
  }
  static debug(message: string, meta?: LogMeta): void {
    logger.debug(meta || {}, message);
  }
  // Convenience methods for common logging patterns
  static productRejected(productId: string | null, reason: string): void {
    this.warn(`Product skipped: ${reason}`, { productId, reason });
  }
  static catalogPage(page: number, count: number): void {
    this.debug(`Catalog page ${page}: ${count} products`, { page, count });
  }
  static refreshComplete(
    products: number,
    changes: number,
    messages: number,
    duration: number,
  ): void {
    this.info(`Refresh complete`, { products, changes, messages, duration });
  }
  static deliveryFailed(chatId: number, error: unknown): void {
    this.error(`Notification delivery failed for chat ${chatId}`, error, {
      chatId,
    });
  }
}
