/**
 * Long-polling loop for incoming bot commands
 */

import { Logger } from "../utils/logger";
import { sleep } from "../utils/retry";
import { handleCommand } from "./commands";
import type { BotContext } from "./commands";
import type { TelegramClient, TelegramUpdate } from "./telegram";

export interface PollingOptions {
  timeoutS: number;
  errorBackoffMs?: number;
}

/**
 * Handles one update; failures are reported to the chat and logged, never
 * thrown, so one bad command cannot stop the loop.
 */
export async function processUpdate(
  update: TelegramUpdate,
  client: Pick<TelegramClient, "sendMessage">,
  ctx: BotContext,
): Promise<void> {
  const msg = update.message;
  if (!msg || !msg.text) return;
  const chatId = msg.chatId;
  const reply = (text: string) => client.sendMessage(chatId, text);

  try {
    await handleCommand(msg.text, chatId, ctx, reply);
  } catch (error) {
    Logger.error(`Command failed: ${msg.text}`, error, { chatId });
    try {
      await reply(
        `❌ Error: ${error instanceof Error ? error.message : String(error)}`,
      );
    } catch (replyError) {
      Logger.deliveryFailed(chatId, replyError);
    }
  }
}

/**
 * Polls until `signal` aborts. Updates are handled one at a time in arrival
 * order.
 */
export async function runPolling(
  client: TelegramClient,
  ctx: BotContext,
  signal: AbortSignal,
  options: PollingOptions,
): Promise<void> {
  const { timeoutS, errorBackoffMs = 5000 } = options;
  let offset = 0;
  Logger.info("Bot polling started");

  while (!signal.aborted) {
    let updates: TelegramUpdate[];
    try {
      updates = await client.getUpdates(offset, timeoutS, signal);
    } catch (error) {
      if (signal.aborted) break;
      Logger.error("Polling for updates failed", error);
      await sleep(errorBackoffMs);
      continue;
    }
    for (const update of updates) {
      offset = Math.max(offset, update.updateId + 1);
      await processUpdate(update, client, ctx);
    }
  }

  Logger.info("Bot polling stopped");
}
