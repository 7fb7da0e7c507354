/**
 * BullMQ Worker Entry Point
 * Processes refresh jobs from the queue; no bot polling
 * Do not run next to `npm start`, which already runs a worker on the same database
 */

import "dotenv/config";
import {
  AppConfig,
  Logger,
  closeConnection,
  createAppContext,
  createRefreshWorker,
  refreshProcessor,
  startHealthServer,
} from "./core/index";

async function main() {
  Logger.info("Starting BullMQ worker for refresh jobs");

  const ctx = createAppContext();
  const worker = createRefreshWorker(
    refreshProcessor((dryRun) => ctx.runner.run({ dryRun })),
  );
  const server = startHealthServer(
    AppConfig.HEALTH_PORT + 1,
    "Worker health check",
  );

  // Graceful shutdown
  const shutdown = async () => {
    Logger.info("Graceful shutdown initiated");
    setTimeout(() => {
      Logger.warn("Forced exit after 5s");
      process.exit(1);
    }, 5000).unref();
    await worker.close();
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

  Logger.info("Worker is ready and listening for jobs");
}

main().catch((e) => {
  Logger.error("Fatal error", e);
  process.exit(1);
});
