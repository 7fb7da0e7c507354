/**
 * Centralized application configuration
 */

import { envBool, envInt, envStr } from "./env";

export class AppConfig {
  // Catalog source
  static readonly CATALOG_URL = envStr("CATALOG_URL", "");
  static readonly CATALOG_PAGE_LIMIT = envInt("CATALOG_PAGE_LIMIT", 250, 1);
  static readonly CATALOG_MAX_PAGES = envInt("CATALOG_MAX_PAGES", 100, 1);
  static readonly FETCH_TIMEOUT_MS = envInt("FETCH_TIMEOUT_MS", 30000, 1);

  // Database configuration
  static readonly DB_PATH = envStr("DB_PATH", "state/catalog.sqlite");

  // Chat bot
  static readonly BOT_ENABLED = envBool("BOT_ENABLED", true);
  static readonly TELEGRAM_BOT_TOKEN = envStr("TELEGRAM_BOT_TOKEN", "");
  static readonly TELEGRAM_API_BASE = envStr(
    "TELEGRAM_API_BASE",
    "https://api.telegram.org",
  );
  static readonly TELEGRAM_POLL_TIMEOUT_S = envInt("TELEGRAM_POLL_TIMEOUT_S", 30, 0);

  // Notifications
  static readonly MESSAGE_MAX_LENGTH = envInt("MESSAGE_MAX_LENGTH", 3500, 1);
  static readonly CURRENCY_SYMBOL = envStr("CURRENCY_SYMBOL", "€");

  // Scheduling
  static readonly REFRESH_EVERY_MS = envInt("REFRESH_EVERY_MS", 3_600_000, 1000);
  static readonly REDIS_HOST = envStr("REDIS_HOST", "localhost");
  static readonly REDIS_PORT = envInt("REDIS_PORT", 6379, 1);
  static readonly REDIS_PASSWORD = process.env.REDIS_PASSWORD || undefined;
  static readonly HEALTH_PORT = envInt("HEALTH_PORT", 8080, 1);
}
