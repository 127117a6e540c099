// jobs/scheduler.ts
import logger from '../utils/logger';
import config from '../utils/config';
import { CONSTANTS } from '../utils/constants';
import queueManager from './queueManager';

const { JOBS } = CONSTANTS.QUEUE;

/**
 * Repeatable jobs live in Redis, so they fire once across every worker instance.
 * The dispatch job only fans out; per-server jobs do the generation.
 */
export const startScheduler = async (): Promise<void> => {
    logger.info('⏰ Initializing scheduler...');

    // 1. Fan out one generation job per active server
    await queueManager.scheduleRepeatableJob(JOBS.DISPATCH, config.schedule.newsletterCron, { reason: 'scheduled' });

    // 2. Fail records stuck mid-generation or mid-delivery
    await queueManager.scheduleRepeatableJob(JOBS.SWEEP, config.schedule.stuckSweepCron, { reason: 'scheduled' });
};
