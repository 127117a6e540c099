// jobs/queueManager.ts
import { JobsOptions, Queue } from 'bullmq';
import logger from '../utils/logger';
import config from '../utils/config';
import { CONSTANTS } from '../utils/constants';
import { describeError } from '../utils/pipelineErrors';

export interface NewsletterJobData {
    serverId?: string;
    channelContext?: string;
    reason?: string;
}

export interface QueueStats {
    waiting: number;
    active: number;
    completed: number;
    failed: number;
    status: 'active' | 'disabled' | 'error';
}

const QUEUE_NAME = CONSTANTS.QUEUE.NAME;

let queue: Queue<NewsletterJobData> | null = null;

const queueManager = {
    /**
     * Creates the newsletter queue. Without a Redis URL the queue stays
     * disabled and every add below is dropped with a debug log.
     */
    initialize: async (): Promise<void> => {
        if (queue) return;

        const connection = config.bullMQConnection;
        if (!connection) {
            logger.warn('⚠️ REDIS_URL not set or invalid. Background jobs will be disabled.');
            return;
        }

        queue = new Queue<NewsletterJobData>(QUEUE_NAME, {
            connection,
            defaultJobOptions: {
                removeOnComplete: 50,
                removeOnFail: 100,
                // Generation retries with its own backoff; the queue must not retry on top
                attempts: 1,
            }
        });

        queue.on('error', (err: Error) => {
            if (!err.message.includes('ECONNREFUSED')) {
                logger.error(`❌ Queue [${QUEUE_NAME}] Connection Error: ${err.message}`);
            }
        });

        logger.info(`✅ Job Queue Initialized: [${QUEUE_NAME}]`);
    },

    addJob: async (name: string, data: NewsletterJobData, opts: JobsOptions = {}): Promise<string | null> => {
        if (!queue) {
            logger.debug(`⚠️ Queue [${QUEUE_NAME}] not available. Job ${name} dropped.`);
            return null;
        }

        try {
            const job = await queue.add(name, data, opts);
            return job.id ?? null;
        } catch (err: unknown) {
            logger.error(`❌ Failed to add job ${name}: ${describeError(err)}`);
            return null;
        }
    },

    addBulk: async (jobs: { name: string; data: NewsletterJobData; opts?: JobsOptions }[]): Promise<number> => {
        if (!queue || jobs.length === 0) return 0;
        try {
            const added = await queue.addBulk(jobs);
            return added.length;
        } catch (err: unknown) {
            logger.error(`❌ Failed to add bulk jobs: ${describeError(err)}`);
            return 0;
        }
    },

    // Replaces any earlier repeatable job with the same name
    scheduleRepeatableJob: async (name: string, cronPattern: string, data: NewsletterJobData = {}): Promise<boolean> => {
        if (!queue) await queueManager.initialize();
        if (!queue) return false;

        try {
            const repeatable = await queue.getRepeatableJobs();
            for (const existing of repeatable.filter(j => j.name === name)) {
                await queue.removeRepeatableByKey(existing.key);
            }

            await queue.add(name, data, { repeat: { pattern: cronPattern } });
            logger.info(`⏰ Job Scheduled: ${name} (${cronPattern})`);
            return true;
        } catch (err: unknown) {
            logger.error(`❌ Failed to schedule job ${name}: ${describeError(err)}`);
            return false;
        }
    },

    getStats: async (): Promise<QueueStats> => {
        if (!queue) return { waiting: 0, active: 0, completed: 0, failed: 0, status: 'disabled' };
        try {
            const [waiting, active, completed, failed] = await Promise.all([
                queue.getWaitingCount(),
                queue.getActiveCount(),
                queue.getCompletedCount(),
                queue.getFailedCount()
            ]);
            return { waiting, active, completed, failed, status: 'active' };
        } catch (err: unknown) {
            logger.warn(`⚠️ Could not read queue stats: ${describeError(err)}`);
            return { waiting: 0, active: 0, completed: 0, failed: 0, status: 'error' };
        }
    },

    shutdown: async (): Promise<void> => {
        if (!queue) return;
        logger.info('🛑 Shutting down Job Queue...');
        await queue.close();
        queue = null;
        logger.info('✅ Job Queue closed.');
    }
};

export default queueManager;
