/**
 * Main Entry Point
 * Starts the refresh worker, upserts the recurring refresh and runs the bot
 * This is the primary way to run the application; it already includes the
 * worker, so do not also start `npm run worker` against the same database
 */

import "dotenv/config";
import {
  AppConfig,
  Logger,
  closeConnection,
  createAppContext,
  createRefreshQueue,
  createRefreshWorker,
  refreshProcessor,
  runPolling,
  scheduleRecurringRefresh,
  startHealthServer,
} from "./core/index";

async function main() {
  Logger.info("Starting catalog watch");

  const ctx = createAppContext();
  const queue = createRefreshQueue();
  await scheduleRecurringRefresh(queue, AppConfig.REFRESH_EVERY_MS);

  const worker = createRefreshWorker(
    refreshProcessor((dryRun) => ctx.runner.run({ dryRun })),
  );

  const stopBot = new AbortController();
  const polling = ctx.telegram
    ? runPolling(ctx.telegram, ctx.bot, stopBot.signal, {
        timeoutS: AppConfig.TELEGRAM_POLL_TIMEOUT_S,
      })
    : Promise.resolve();
  if (!ctx.telegram) {
    Logger.warn("TELEGRAM_BOT_TOKEN not set; bot commands and notifications disabled");
  }

  const server = startHealthServer(AppConfig.HEALTH_PORT);

  // Graceful shutdown
  const shutdown = async () => {
    Logger.info("Graceful shutdown initiated");
    setTimeout(() => {
      Logger.warn("Forced exit after 5s");
      process.exit(1);
    }, 5000).unref();
    stopBot.abort();
    await polling;
    await worker.close();
    await queue.close();
    await closeConnection();
    ctx.close();
    server.close(() => {
      Logger.info("Health server closed");
      process.exit(0);
    });
  };

  const onSignal = () => {
    shutdown().catch((e) => {
      Logger.error("Shutdown failed", e);
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  Logger.info("🚀 Application is ready and listening for jobs");
}

main().catch((e) => {
  Logger.error("Fatal error", e);
  process.exit(1);
});
