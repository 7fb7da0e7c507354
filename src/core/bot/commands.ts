/**
 * Chat command handlers
 */

import type { SubscriberStore } from "../database/subscribers";
import type { SnapshotStore } from "../history/store";
import { isCustomizationProduct } from "../sizes/classifier";
import { splitMessage } from "../notify/chunk";
import type { RefreshSummary } from "../services/refresh-service";
import { formatStamp } from "../utils/date";

export interface BotContext {
  snapshots: SnapshotStore;
  subscribers: SubscriberStore;
  refresh: () => Promise<RefreshSummary>;
  maxLength: number;
  refreshEveryMs: number;
}

export type Reply = (text: string) => Promise<void>;

export type CommandHandler = (
  chatId: number,
  ctx: BotContext,
  reply: Reply,
) => Promise<void>;

const everyLabel = (ms: number) => {
  const minutes = Math.round(ms / 60000);
  if (minutes % 60 === 0) {
    const hours = minutes / 60;
    return hours === 1 ? "every hour" : `every ${hours} hours`;
  }
  return `every ${minutes} minutes`;
};

/** Sends a list as one or more messages, split on line breaks */
async function replyList(
  reply: Reply,
  heading: string,
  lines: string[],
  maxLength: number,
): Promise<void> {
  const text = [heading, "", ...lines].join("\n");
  for (const part of splitMessage(text, maxLength)) await reply(part);
}

const start: CommandHandler = async (_chatId, ctx, reply) => {
  await reply(
    [
      "🏟️ Catalog Watch Bot",
      "",
      "Available commands:",
      "/sizesequence - Show products with non-sequential sizes",
      "/sizetype - Show products with 'option' size type",
      "/refresh - Manually update data",
      "/subscribe - Get automatic notifications",
      "/unsubscribe - Stop notifications",
      "",
      `🔔 Auto-refresh: ${everyLabel(ctx.refreshEveryMs)}`,
      "📊 Notifications: New products, size changes, discounts",
    ].join("\n"),
  );
};

const help: CommandHandler = async (_chatId, ctx, reply) => {
  const latest = ctx.snapshots.latest();
  await reply(
    [
      "🏟️ Catalog Watch Bot - Help",
      "",
      "🔍 /sizesequence - products with non-sequential sizes",
      "📊 /sizetype - products with 'option' size type",
      "🔄 /refresh - update data from the shop",
      "🔔 /subscribe - automatic notifications",
      "🔕 /unsubscribe - stop notifications",
      "❓ /help - this message",
      "",
      latest
        ? `Products tracked: ${latest.entries.size} (updated ${formatStamp(latest.takenAt)} UTC)`
        : "No data yet. Use /refresh to fetch the catalog.",
    ].join("\n"),
  );
};

const sizeSequence: CommandHandler = async (_chatId, ctx, reply) => {
  const latest = ctx.snapshots.latest();
  if (!latest) {
    await reply("❌ No product data yet. Use /refresh first.");
    return;
  }
  const broken = Array.from(latest.entries.values()).filter(
    (e) =>
      e.verdict.kind === "non_sequential" &&
      !isCustomizationProduct(e.product.title),
  );
  if (broken.length === 0) {
    await reply("✅ All products have sequential sizes!");
    return;
  }
  await replyList(
    reply,
    `🔍 Non-Sequential Size Products (${broken.length} found)`,
    broken.map((e) => `• ${e.product.title} (${e.product.sizes.join(",")})`),
    ctx.maxLength,
  );
};

const sizeType: CommandHandler = async (_chatId, ctx, reply) => {
  const latest = ctx.snapshots.latest();
  if (!latest) {
    await reply("❌ No product data yet. Use /refresh first.");
    return;
  }
  const options = Array.from(latest.entries.values()).filter(
    (e) =>
      e.product.sizeType === "option" &&
      !isCustomizationProduct(e.product.title),
  );
  if (options.length === 0) {
    await reply("❌ No products found with 'option' size type.");
    return;
  }
  await replyList(
    reply,
    `📊 Products with 'option' Size Type (${options.length} found)`,
    options.map((e) => `• ${e.product.title}`),
    ctx.maxLength,
  );
};

const refresh: CommandHandler = async (chatId, ctx, reply) => {
  await reply("🔄 Refreshing data from the shop...");
  let summary: RefreshSummary;
  try {
    summary = await ctx.refresh();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    await reply(`❌ Error refreshing data:\n\n${message.slice(0, 500)}`);
    return;
  }

  await reply(
    `✅ Data refreshed successfully!\n\nTotal products: ${summary.productCount}`,
  );
  if (summary.firstRun) {
    await reply("📋 First snapshot stored; changes will be reported from the next refresh");
  } else if (summary.messages.length === 0) {
    await reply("📋 No changes since last update");
  } else if (!ctx.subscribers.has(chatId)) {
    // subscribers already got these through the regular fan-out
    await reply("📢 Changes detected:");
    for (const m of summary.messages) await reply(m);
  }
};

const subscribe: CommandHandler = async (chatId, ctx, reply) => {
  if (!ctx.subscribers.add(chatId)) {
    await reply("✅ You're already subscribed to notifications!");
    return;
  }
  await reply(
    [
      "🔔 Subscribed! You'll receive notifications for:",
      "",
      "🆕 New products",
      "📐 Size sequence changes",
      "💰 New discounts",
      "",
      `Auto-refresh: ${everyLabel(ctx.refreshEveryMs)}`,
      "Use /unsubscribe to stop notifications",
    ].join("\n"),
  );
};

const unsubscribe: CommandHandler = async (chatId, ctx, reply) => {
  if (ctx.subscribers.remove(chatId)) {
    await reply("❌ Unsubscribed from notifications");
  } else {
    await reply("You're not currently subscribed to notifications");
  }
};

export const COMMANDS: Readonly<Record<string, CommandHandler>> = {
  start,
  help,
  sizesequence: sizeSequence,
  sizetype: sizeType,
  refresh,
  subscribe,
  unsubscribe,
};

/** "/Refresh@SomeBot now" -> "refresh"; null for plain text */
export function parseCommand(text: string): string | null {
  const m = /^\/([A-Za-z0-9_]+)(?:@\w+)?(?:\s|$)/.exec(text.trim());
  return m ? m[1].toLowerCase() : null;
}

/**
 * Dispatches one incoming text message
 * @returns false when the text is not a command this bot knows
 */
export async function handleCommand(
  text: string,
  chatId: number,
  ctx: BotContext,
  reply: Reply,
): Promise<boolean> {
  const name = parseCommand(text);
  if (!name) return false;
  const handler = Object.prototype.hasOwnProperty.call(COMMANDS, name)
    ? COMMANDS[name]
    : undefined;
  if (!handler) {
    await reply("Unknown command. Use /help to see what I can do.");
    return false;
  }
  await handler(chatId, ctx, reply);
  return true;
}
