/**
 * Scheduler Entry Point
 * Sets up the recurring catalog refresh job
 */

import "dotenv/config";
import {
  AppConfig,
  Logger,
  closeConnection,
  createRefreshQueue,
  getScheduledJobs,
  removeScheduledJob,
  scheduleOneTimeRefresh,
  scheduleRecurringRefresh,
} from "./core/index";

async function main() {
  const argv = process.argv.slice(2);

  if (argv.includes("--help") || argv.includes("-h")) {
    console.log(`
Scheduler - Configure the recurring refresh job

Usage:
  npm run scheduler                      # Refresh every REFRESH_EVERY_MS (default: 1 hour)
  npm run scheduler -- --every <ms>      # Custom interval in milliseconds
  npm run scheduler -- --now             # Also enqueue one refresh right away
  npm run scheduler -- --remove          # Remove the recurring job

Environment Variables:
  REDIS_HOST             Redis host (default: localhost)
  REDIS_PORT             Redis port (default: 6379)
  REDIS_PASSWORD         Redis password (optional)
  REFRESH_EVERY_MS       Interval between refreshes (default: 3600000)
`);
    process.exit(0);
  }

  const queue = createRefreshQueue();

  if (argv.includes("--remove")) {
    await removeScheduledJob(queue);
  } else {
    const everyIndex = argv.indexOf("--every");
    const everyArg = everyIndex >= 0 ? Number(argv[everyIndex + 1]) : NaN;
    const everyMs =
      Number.isFinite(everyArg) && everyArg > 0
        ? everyArg
        : AppConfig.REFRESH_EVERY_MS;

    Logger.info("Scheduling recurring refresh", { everyMs });
    await scheduleRecurringRefresh(queue, everyMs);

    if (argv.includes("--now")) {
      await scheduleOneTimeRefresh(queue, { trigger: "manual" });
    }
  }

  // Show current scheduled jobs
  const scheduled = await getScheduledJobs(queue);
  Logger.info(`Total scheduled jobs: ${scheduled.length}`);
  scheduled.forEach((scheduler) => {
    Logger.info(`  - ${scheduler.key}: ${scheduler.pattern || scheduler.every}ms`);
  });

  await queue.close();
  await closeConnection();
  Logger.info("Scheduler completed");
  process.exit(0);
}

main().catch((e) => {
  Logger.error("Fatal error", e);
  process.exit(1);
});
