#!/usr/bin/env node
import "dotenv/config";
import {
  AppConfig,
  Logger,
  createAppContext,
  verdictLabel,
} from "./core/index";

async function main() {
  const argv = process.argv.slice(2);

  const hasFlag = (flag: string) => argv.includes(flag);
  const getArg = (flag: string) => {
    const i = argv.lastIndexOf(flag);
    return i >= 0 ? argv[i + 1] : undefined;
  };

  if (hasFlag("--help")) {
    console.log(`Usage:
node dist/cli.js [--url <products.json url>] [--db <path>] [--dry-run] [--no-notify] [--list-broken]

CLI Mode - Bypass the queue and run one refresh directly

Options:
  --url          Catalog URL (default: CATALOG_URL)
  --db           SQLite path (default: DB_PATH)
  --dry-run      Diff and print messages; save nothing, send nothing
  --no-notify    Save the snapshot but do not message subscribers
  --list-broken  Print products whose sizes are out of order after the refresh

Examples:
  npm run cli -- --dry-run
  npm run cli -- --url https://shop.example.com/products.json --no-notify`);
    process.exit(0);
  }

  const dryRun = hasFlag("--dry-run");
  const ctx = createAppContext({
    dbPath: getArg("--db"),
    catalogUrl: getArg("--url") ?? AppConfig.CATALOG_URL,
    withoutTelegram: dryRun || hasFlag("--no-notify"),
  });

  try {
    const summary = await ctx.runner.run({ dryRun });

    Logger.info(`✅ Refresh completed`, {
      products: summary.productCount,
      rejected: summary.rejected.length,
      firstRun: summary.firstRun,
      delivered: summary.delivered,
      failed: summary.failed,
    });
    for (const message of summary.messages) console.log(`${message}\n`);

    if (hasFlag("--list-broken")) {
      for (const { product, verdict } of summary.snapshot.entries.values()) {
        if (verdict.kind !== "non_sequential") continue;
        console.log(
          `${verdictLabel(verdict)} [${verdict.reason}@${verdict.index}] ${product.title}: ${product.sizes.join(", ")}`,
        );
      }
    }
  } finally {
    ctx.close();
  }
}

main().catch((e) => {
  Logger.error("❌ Refresh failed", e);
  process.exit(1);
});
