// jobs/worker.ts
import { Job, Worker } from 'bullmq';
import logger from '../utils/logger';
import config from '../utils/config';
import { CONSTANTS } from '../utils/constants';
import { NewsletterJobData } from './queueManager';
import { JobResult, NewsletterJob } from './jobHandlers';

type JobProcessor = (job: NewsletterJob) => Promise<JobResult | null>;

let worker: Worker<NewsletterJobData, JobResult | null> | null = null;

export const startWorker = (processor: JobProcessor): boolean => {
    const connection = config.bullMQConnection;
    if (!connection) {
        logger.error('❌ Cannot start worker: Redis not configured.');
        return false;
    }
    if (worker) {
        logger.warn('⚠️ Worker already running.');
        return true;
    }

    const concurrency = config.worker.concurrency || 1;

    worker = new Worker<NewsletterJobData, JobResult | null>(CONSTANTS.QUEUE.NAME, processor, {
        connection,
        concurrency,
        // Three attempts with 5s/10s backoff and three provider calls each can take minutes
        lockDuration: 5 * 60 * 1000,
        maxStalledCount: 1,
    });

    worker.on('completed', (job: Job<NewsletterJobData>) => {
        logger.info(`✅ Job ${job.id} (${job.name}) completed.`);
    });

    worker.on('failed', (job: Job<NewsletterJobData> | undefined, err: Error) => {
        logger.error(`🔥 Job ${job?.id ?? 'unknown'} (${job?.name ?? 'unknown'}) failed: ${err.message}`);
    });

    worker.on('error', (err: Error) => {
        logger.error(`⚠️ Worker Connection Error: ${err.message}`);
    });

    logger.info(`✅ Worker started (queue: ${CONSTANTS.QUEUE.NAME}, concurrency: ${concurrency})`);
    return true;
};

export const shutdownWorker = async (): Promise<void> => {
    if (!worker) return;
    logger.info('🛑 Shutting down Worker...');
    await worker.close();
    worker = null;
    logger.info('✅ Worker shutdown complete.');
};
