import { Queue, Worker, Job } from 'bullmq';
import { getRedisConnection } from './redis.js';
import { config } from '../config/index.js';
import { DispatchRunner } from '../services/dispatch-runner.js';
import { DispatchSummary } from '../types/webhook.js';

const QUEUE_NAME = 'webhook-dispatch';

export interface DispatchJobData {
  limit: number;
  timeoutSeconds: number;
}

let dispatchQueue: Queue<DispatchJobData> | null = null;
let dispatchWorker: Worker<DispatchJobData, DispatchSummary> | null = null;
let schedulerInterval: NodeJS.Timeout | null = null;
let dispatchRunner: DispatchRunner | null = null;

function getDispatchRunner(): DispatchRunner {
  if (!dispatchRunner) {
    dispatchRunner = new DispatchRunner();
  }
  return dispatchRunner;
}

/**
 * Set the runner used by the worker (for testing)
 */
export function setDispatchRunner(runner: DispatchRunner | null): void {
  dispatchRunner = runner;
}

/**
 * Get or create the dispatch queue
 */
export function getDispatchQueue(): Queue<DispatchJobData> {
  if (!dispatchQueue) {
    const connection = getRedisConnection();
    dispatchQueue = new Queue<DispatchJobData>(QUEUE_NAME, {
      connection,
      defaultJobOptions: {
        removeOnComplete: 100,
        removeOnFail: 100,
      },
    });

    console.log('[DispatchScheduler] Queue initialized');
  }

  return dispatchQueue;
}

/**
 * Run one dispatch batch for a queued tick
 */
export async function processDispatchJob(
  job: Pick<Job<DispatchJobData>, 'id' | 'data'>
): Promise<DispatchSummary> {
  const { limit, timeoutSeconds } = job.data;
  return getDispatchRunner().runOnce(limit, timeoutSeconds, { runId: job.id });
}

/**
 * Start the dispatch worker
 */
export function startDispatchWorker(): Worker<DispatchJobData, DispatchSummary> {
  if (!dispatchWorker) {
    const connection = getRedisConnection();

    dispatchWorker = new Worker<DispatchJobData, DispatchSummary>(QUEUE_NAME, processDispatchJob, {
      connection,
      concurrency: 1, // One batch at a time per process
    });

    dispatchWorker.on('completed', (job, result) => {
      console.log(
        `[DispatchScheduler] Run ${job.id} completed: ${result.delivered} delivered, ` +
          `${result.failed} failed, ${result.skipped} skipped`
      );
    });

    dispatchWorker.on('failed', (job, error) => {
      console.error(`[DispatchScheduler] Run ${job?.id} failed:`, error.message);
    });

    dispatchWorker.on('error', (error) => {
      console.error('[DispatchScheduler] Worker error:', error);
    });

    console.log('[DispatchScheduler] Worker started');
  }

  return dispatchWorker;
}

/**
 * Queue one dispatch tick; the job ID carries the tick time so a tick is only queued once
 */
export async function enqueueDispatchRun(
  data: DispatchJobData = {
    limit: config.webhook.batchLimit,
    timeoutSeconds: config.webhook.timeoutSeconds,
  },
  tickAt: number = Date.now()
): Promise<string | undefined> {
  const queue = getDispatchQueue();
  const job = await queue.add('dispatch-webhooks', data, { jobId: `dispatch-${tickAt}` });
  return job.id;
}

function enqueueTick(): void {
  enqueueDispatchRun().catch((error: unknown) => {
    console.error('[DispatchScheduler] Failed to enqueue dispatch run:', error);
  });
}

/**
 * Schedule periodic dispatch runs
 */
export function startDispatchScheduler(intervalMs: number = config.scheduler.intervalMs): void {
  if (schedulerInterval) {
    return; // Already running
  }

  // Run immediately on startup
  enqueueTick();

  schedulerInterval = setInterval(enqueueTick, intervalMs);

  console.log(`[DispatchScheduler] Scheduler started (interval: ${intervalMs}ms)`);
}

/**
 * Stop the scheduler, worker and queue
 */
export async function stopDispatchScheduler(): Promise<void> {
  if (schedulerInterval) {
    clearInterval(schedulerInterval);
    schedulerInterval = null;
    console.log('[DispatchScheduler] Scheduler stopped');
  }

  if (dispatchWorker) {
    await dispatchWorker.close();
    dispatchWorker = null;
    console.log('[DispatchScheduler] Worker stopped');
  }

  if (dispatchQueue) {
    await dispatchQueue.close();
    dispatchQueue = null;
    console.log('[DispatchScheduler] Queue closed');
  }
}
