/**
 * Refresh Service - one diff cycle from fetch to delivery
 * Used by the queue worker, the CLI and the bot's /refresh command
 */

import { normalizeCatalog } from "../catalog/normalize";
import type { SubscriberStore } from "../database/subscribers";
import { diffSnapshots, isEmptyDiff } from "../diff/engine";
import { buildSnapshot } from "../diff/snapshot";
import type { SnapshotStore } from "../history/store";
import { composeNotifications } from "../notify/composer";
import type { ComposeOptions } from "../notify/composer";
import type { DiffResult, RejectedProduct, Snapshot } from "../types";
import { formatDuration } from "../utils/date";
import { Logger } from "../utils/logger";
import type { MessageSender } from "./delivery";

export interface RefreshDeps {
  fetchCatalog: () => Promise<unknown[]>;
  snapshots: SnapshotStore;
  subscribers?: SubscriberStore;
  sender?: MessageSender;
  compose?: ComposeOptions;
  now?: () => Date;
}

export interface RefreshOptions {
  /** Compute and compose only: nothing is saved or sent */
  dryRun?: boolean;
}

export interface DeliveryReport {
  delivered: number;
  failed: number;
  removedSubscribers: number[];
}

export interface RefreshSummary extends DeliveryReport {
  takenAt: string;
  productCount: number;
  rejected: RejectedProduct[];
  firstRun: boolean;
  diff: DiffResult;
  messages: string[];
  snapshot: Snapshot;
}

/**
 * Sends every message to every subscriber, in order. A failing chat is
 * skipped for the rest of the batch; chats the transport reports as gone
 * are unsubscribed.
 */
export async function deliver(
  messages: readonly string[],
  subscribers: SubscriberStore,
  sender: MessageSender,
): Promise<DeliveryReport> {
  const report: DeliveryReport = {
    delivered: 0,
    failed: 0,
    removedSubscribers: [],
  };
  if (messages.length === 0) return report;

  const chats = subscribers.list();
  Logger.info(`Sending notifications to ${chats.length} subscribers`, {
    count: chats.length,
  });

  for (const chatId of chats) {
    try {
      for (const text of messages) {
        await sender.sendMessage(chatId, text);
      }
      report.delivered++;
    } catch (error) {
      report.failed++;
      Logger.deliveryFailed(chatId, error);
      if (sender.isRecipientGone?.(error)) {
        subscribers.remove(chatId);
        report.removedSubscribers.push(chatId);
        Logger.info(`Removed unreachable subscriber ${chatId}`, { chatId });
      }
    }
  }

  return report;
}

/**
 * Runs one refresh cycle. The new snapshot is saved before delivery so a
 * transport failure cannot cause the same changes to be announced twice.
 * A fetch failure propagates and leaves the stored baseline untouched.
 */
export async function runRefresh(
  deps: RefreshDeps,
  options: RefreshOptions = {},
): Promise<RefreshSummary> {
  const started = Date.now();
  const now = deps.now ?? (() => new Date());

  const raw = await deps.fetchCatalog();
  const normalized = normalizeCatalog(raw);
  const takenAt = now().toISOString();
  const { snapshot, rejected: duplicates } = buildSnapshot(
    normalized.products,
    takenAt,
  );
  const rejected = [...normalized.rejected, ...duplicates];
  for (const r of rejected) Logger.productRejected(r.id, r.reason);

  const previous = deps.snapshots.latest();
  const diff = diffSnapshots(previous, snapshot);
  const messages = composeNotifications(diff, deps.compose);

  let report: DeliveryReport = {
    delivered: 0,
    failed: 0,
    removedSubscribers: [],
  };

  if (options.dryRun) {
    Logger.info("Dry run: snapshot not saved, nothing sent");
  } else {
    deps.snapshots.save(snapshot);
    if (deps.subscribers && deps.sender) {
      report = await deliver(messages, deps.subscribers, deps.sender);
    }
  }

  if (!previous) {
    Logger.info("No previous snapshot; stored baseline without notifying");
  } else if (isEmptyDiff(diff)) {
    Logger.info("No changes detected");
  }

  const changes =
    diff.newProducts.length +
    diff.newDiscounts.length +
    diff.sequenceTransitions.length;
  const elapsed = Date.now() - started;
  Logger.refreshComplete(snapshot.entries.size, changes, messages.length, elapsed);
  Logger.debug(`Refresh took ${formatDuration(elapsed)}`);

  return {
    takenAt,
    productCount: snapshot.entries.size,
    rejected,
    firstRun: !previous,
    diff,
    messages,
    snapshot,
    ...report,
  };
}

export interface RefreshRunner {
  run(options?: RefreshOptions): Promise<RefreshSummary>;
  readonly running: boolean;
}

/**
 * Serializes refresh cycles. A trigger that arrives while a cycle with the
 * same dry-run setting is pending gets that cycle's result; any other
 * trigger is queued to start once the pending cycle has settled.
 */
export function createRefreshRunner(deps: RefreshDeps): RefreshRunner {
  let pending: { dryRun: boolean; result: Promise<RefreshSummary> } | null =
    null;

  return {
    run(options: RefreshOptions = {}) {
      const dryRun = options.dryRun ?? false;
      if (pending && pending.dryRun === dryRun) {
        Logger.info("Refresh already running; joining it", { dryRun });
        return pending.result;
      }

      let result: Promise<RefreshSummary>;
      if (pending) {
        Logger.info("Refresh already running; queued the next one", { dryRun });
        const settle = () => undefined;
        result = pending.result
          .then(settle, settle)
          .then(() => runRefresh(deps, options));
      } else {
        result = runRefresh(deps, options);
      }

      const entry = { dryRun, result };
      pending = entry;
      const clear = () => {
        if (pending === entry) pending = null;
      };
      void result.then(clear, clear);
      return result;
    },
    get running() {
      return pending !== null;
    },
  };
}
