/**
 * services/ingestion.worker.ts — BullMQ scheduling for table refreshes
 *
 * Only used when ENABLE_QUEUE=true. The worker runs inside the API process
 * (the table lives in its memory) and delegates to IngestionService.
 *
 * Queue: 'dvf-ingestion'
 * Jobs:
 *   - refresh: reload the DVF file and publish a new table
 */
import { Queue, Worker, type Job } from 'bullmq';
import { env } from '../config/env.ts';
import { queueConnection } from '../config/redis.ts';
import { isAppError } from './errors.ts';
import type { IngestionService, IngestionTrigger } from './ingestion.ts';
import { childLogger } from '../shared/logger.ts';

const QUEUE_NAME = 'dvf-ingestion';
const log = childLogger({ module: 'ingestion-worker' });

export interface RefreshJobData {
  trigger: IngestionTrigger;
  requestedAt: string;
}

export interface RefreshJobResult {
  version: number | null;
  accepted: number;
  rejected: number;
  skipped: boolean;
}

// ── Queue ──

let _queue: Queue<RefreshJobData, RefreshJobResult> | null = null;

export function getIngestionQueue(): Queue<RefreshJobData, RefreshJobResult> {
  if (_queue) return _queue;
  _queue = new Queue<RefreshJobData, RefreshJobResult>(QUEUE_NAME, {
    connection: queueConnection(),
    defaultJobOptions: {
      removeOnComplete: { count: 50 },
      removeOnFail: { count: 20 },
      attempts: 3,
      backoff: { type: 'exponential', delay: 30_000 },
    },
  });
  return _queue;
}

/**
 * Schedule the recurring refresh via cron (replaces any earlier schedule).
 */
export async function scheduleIngestion(): Promise<void> {
  const queue = getIngestionQueue();
  const repeatable = await queue.getRepeatableJobs();
  for (const job of repeatable) {
    await queue.removeRepeatableByKey(job.key);
  }
  await queue.add('refresh', { trigger: 'schedule', requestedAt: new Date().toISOString() }, {
    repeat: { pattern: env.INGESTION_CRON },
  });
  log.info({ cron: env.INGESTION_CRON }, 'Ingestion scheduled');
}

// ── Worker ──

/**
 * Refresh processor. A refresh already running (e.g. a manual one) makes the
 * job a no-op instead of a failure.
 */
export function createRefreshProcessor(ingestion: IngestionService) {
  return async (job: Pick<Job<RefreshJobData, RefreshJobResult>, 'id' | 'data'>): Promise<RefreshJobResult> => {
    log.info({ jobId: job.id, trigger: job.data.trigger }, 'Refresh job started');
    try {
      const result = await ingestion.refresh(job.data.trigger);
      return { version: result.version, accepted: result.stats.accepted, rejected: result.stats.rejected, skipped: false };
    } catch (err) {
      if (isAppError(err) && err.code === 'REFRESH_IN_PROGRESS') {
        log.warn({ jobId: job.id }, 'Refresh already in progress, job skipped');
        return { version: null, accepted: 0, rejected: 0, skipped: true };
      }
      throw err;
    }
  };
}

/**
 * Start the BullMQ worker. Call once at server startup.
 */
export function startIngestionWorker(ingestion: IngestionService): Worker<RefreshJobData, RefreshJobResult> {
  const worker = new Worker<RefreshJobData, RefreshJobResult>(QUEUE_NAME, createRefreshProcessor(ingestion), {
    connection: queueConnection(),
    concurrency: 1,
  });

  worker.on('completed', (job) => {
    log.info({ jobId: job.id, result: job.returnvalue }, 'Refresh job completed');
  });

  worker.on('failed', (job, err) => {
    log.error({ jobId: job?.id, err }, 'Refresh job failed');
  });

  return worker;
}

export async function closeIngestionQueue(): Promise<void> {
  if (_queue) {
    await _queue.close();
    _queue = null;
  }
}
