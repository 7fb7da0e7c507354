/**
 * Wires stores, transport and the refresh runner for the entry points
 */

import type { BotContext } from "../bot/commands";
import { TelegramClient } from "../bot/telegram";
import { fetchCatalog } from "../catalog/fetcher";
import { AppConfig } from "../config/index";
import { closeDb, openDb } from "../database/connection";
import { SqliteSnapshotStore } from "../database/snapshots";
import { SqliteSubscriberStore } from "../database/subscribers";
import type { DbHandles } from "../types";
import { createRefreshRunner } from "./refresh-service";
import type { RefreshRunner } from "./refresh-service";

export interface AppContext {
  handles: DbHandles;
  snapshots: SqliteSnapshotStore;
  subscribers: SqliteSubscriberStore;
  telegram: TelegramClient | null;
  runner: RefreshRunner;
  bot: BotContext;
  close(): void;
}

export interface AppContextOptions {
  dbPath?: string;
  catalogUrl?: string;
  /** Skip the chat transport, e.g. for CLI runs without a bot token */
  withoutTelegram?: boolean;
}

export function createAppContext(options: AppContextOptions = {}): AppContext {
  const handles = openDb(options.dbPath ?? AppConfig.DB_PATH);
  const snapshots = new SqliteSnapshotStore(handles.db);
  const subscribers = new SqliteSubscriberStore(handles.db);
  const telegram =
    options.withoutTelegram ||
    !AppConfig.BOT_ENABLED ||
    !AppConfig.TELEGRAM_BOT_TOKEN
      ? null
      : new TelegramClient(AppConfig.TELEGRAM_BOT_TOKEN);
  const catalogUrl = options.catalogUrl ?? AppConfig.CATALOG_URL;

  const runner = createRefreshRunner({
    fetchCatalog: () => fetchCatalog(catalogUrl),
    snapshots,
    subscribers,
    sender: telegram ?? undefined,
    compose: {
      currencySymbol: AppConfig.CURRENCY_SYMBOL,
      maxLength: AppConfig.MESSAGE_MAX_LENGTH,
    },
  });

  const bot: BotContext = {
    snapshots,
    subscribers,
    refresh: () => runner.run(),
    maxLength: AppConfig.MESSAGE_MAX_LENGTH,
    refreshEveryMs: AppConfig.REFRESH_EVERY_MS,
  };

  return {
    handles,
    snapshots,
    subscribers,
    telegram,
    runner,
    bot,
    close: () => closeDb(handles),
  };
}
