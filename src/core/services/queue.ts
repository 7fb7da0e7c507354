/**
 * BullMQ Queue Configuration
 * Handles the recurring catalog refresh and manual one-off refreshes
 */

import { Job, Queue, Worker } from "bullmq";
import Redis from "ioredis";
import { AppConfig } from "../config/index";
import { QUEUE_CONSTANTS } from "../constants/index";
import { Logger } from "../utils/logger";
import type { RefreshSummary } from "./refresh-service";

export interface RefreshJobData {
  trigger: "schedule" | "manual";
  dryRun?: boolean;
}

export interface RefreshJobResult {
  productCount: number;
  rejected: number;
  messages: number;
  delivered: number;
  failed: number;
}

export type RefreshProcessor = (
  job: Job<RefreshJobData, RefreshJobResult>,
) => Promise<RefreshJobResult>;

let connection: Redis | null = null;

/**
 * Shared Redis connection, created on first use
 */
export function getConnection(): Redis {
  if (!connection) {
    connection = new Redis({
      host: AppConfig.REDIS_HOST,
      port: AppConfig.REDIS_PORT,
      password: AppConfig.REDIS_PASSWORD,
      maxRetriesPerRequest: null, // Required for BullMQ
    });
  }
  return connection;
}

export async function closeConnection(): Promise<void> {
  if (connection) {
    await connection.quit();
    connection = null;
  }
}

/**
 * Create a new refresh queue
 */
export function createRefreshQueue() {
  return new Queue<RefreshJobData, RefreshJobResult>(QUEUE_CONSTANTS.NAME, {
    connection: getConnection(),
  });
}

export function toJobResult(summary: RefreshSummary): RefreshJobResult {
  return {
    productCount: summary.productCount,
    rejected: summary.rejected.length,
    messages: summary.messages.length,
    delivered: summary.delivered,
    failed: summary.failed,
  };
}

/**
 * Builds the default processor around a refresh function
 */
export function refreshProcessor(
  refresh: (dryRun: boolean) => Promise<RefreshSummary>,
): RefreshProcessor {
  return async (job) => {
    Logger.info(`Processing job ${job.id}`, { trigger: job.data.trigger });
    try {
      const result = toJobResult(await refresh(job.data.dryRun ?? false));
      Logger.info(`Job ${job.id} completed`, { ...result });
      return result;
    } catch (error) {
      Logger.error(`Job ${job.id} failed`, error);
      throw error;
    }
  };
}

/**
 * Setup default event handlers for a worker
 */
export function setupWorkerEventHandlers(
  worker: Worker<RefreshJobData, RefreshJobResult>,
) {
  worker.on("completed", (job) => {
    Logger.info(`Job ${job.id} completed successfully`);
  });

  worker.on("failed", (job, err) => {
    Logger.error(`Job ${job?.id} failed: ${err.message}`);
  });

  worker.on("error", (err) => {
    Logger.error(`Worker error: ${err.message}`);
  });
}

/**
 * Create a worker to process refresh jobs, one at a time. This serializes
 * cycles within the process only: run a single worker process (either
 * `start` or `worker`) per database.
 */
export function createRefreshWorker(processor: RefreshProcessor, setupEvents = true) {
  const worker = new Worker<RefreshJobData, RefreshJobResult>(
    QUEUE_CONSTANTS.NAME,
    processor,
    {
      connection: getConnection(),
      concurrency: 1,
    },
  );

  if (setupEvents) {
    setupWorkerEventHandlers(worker);
  }

  return worker;
}

/**
 * Schedule the recurring refresh using upsertJobScheduler
 */
export async function scheduleRecurringRefresh(
  queue: Queue<RefreshJobData, RefreshJobResult>,
  everyMs: number = AppConfig.REFRESH_EVERY_MS,
) {
  await queue.upsertJobScheduler(
    QUEUE_CONSTANTS.SCHEDULER_ID,
    { every: everyMs },
    {
      name: QUEUE_CONSTANTS.JOB_NAME,
      data: { trigger: "schedule" },
      opts: {
        removeOnComplete: {
          age: 24 * 3600, // Keep completed jobs for 24 hours
          count: 200,
        },
        removeOnFail: {
          age: 7 * 24 * 3600, // Keep failed jobs for 7 days
        },
      },
    },
  );

  Logger.info(`Scheduled recurring refresh every ${everyMs}ms`, { everyMs });
}

/**
 * Schedule a one-time refresh job
 */
export async function scheduleOneTimeRefresh(
  queue: Queue<RefreshJobData, RefreshJobResult>,
  data: RefreshJobData = { trigger: "manual" },
) {
  const job = await queue.add(QUEUE_CONSTANTS.JOB_NAME, data, {
    attempts: 3,
    backoff: {
      type: "exponential",
      delay: 60000, // 1 minute
    },
  });

  Logger.info(`Scheduled one-time refresh job: ${job.id}`, { ...data });

  return job;
}

/**
 * Get all job schedulers on the queue
 */
export async function getScheduledJobs(
  queue: Queue<RefreshJobData, RefreshJobResult>,
) {
  return queue.getJobSchedulers();
}

/**
 * Remove a scheduled recurring job by scheduler ID
 */
export async function removeScheduledJob(
  queue: Queue<RefreshJobData, RefreshJobResult>,
  schedulerId: string = QUEUE_CONSTANTS.SCHEDULER_ID,
) {
  await queue.removeJobScheduler(schedulerId);
  Logger.info(`Removed scheduled job: ${schedulerId}`);
}
