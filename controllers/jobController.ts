// controllers/jobController.ts
import { Request, Response } from 'express';
import asyncHandler from '../utils/asyncHandler';
import logger from '../utils/logger';
import { CONSTANTS } from '../utils/constants';
import queueManager from '../jobs/queueManager';
import { NewsletterService } from '../services/newsletterService';

const { JOBS } = CONSTANTS.QUEUE;

type JobQueue = Pick<typeof queueManager, 'addJob' | 'getStats'>;

/**
 * Admin triggers. With the queue up, work is handed to the worker (202);
 * with no Redis the request runs it inline and answers with the result.
 */
export const createJobController = (newsletters: NewsletterService, queue: JobQueue = queueManager) => ({
    triggerGeneration: asyncHandler(async (req: Request, res: Response) => {
        const { serverId } = req.params;

        const jobId = await queue.addJob(JOBS.GENERATE, { serverId, reason: 'api' });
        if (jobId) {
            logger.info(`👉 Newsletter generation queued for ${serverId} (job ${jobId})`);
            return res.status(202).json({ status: 'queued', jobId });
        }

        const outcome = await newsletters.generateForServer(serverId);
        return res.status(200).json({
            status: outcome.status,
            newsletter: outcome.newsletter ?? null,
            reason: outcome.status === 'skipped' ? outcome.reason : undefined,
            error: outcome.status === 'failed' ? outcome.error.message : undefined,
        });
    }),

    triggerBreakingNews: asyncHandler(async (req: Request, res: Response) => {
        const { serverId } = req.params;
        const channelContext = typeof req.body?.channelContext === 'string' ? req.body.channelContext : undefined;

        const jobId = await queue.addJob(JOBS.BREAKING, { serverId, channelContext, reason: 'api' });
        if (jobId) {
            return res.status(202).json({ status: 'queued', jobId });
        }

        const { article, deliveredMessageId } = await newsletters.generateBreakingNews(serverId, channelContext);
        return res.status(200).json({ status: article.mode, text: article.text, deliveredMessageId: deliveredMessageId ?? null });
    }),

    getQueueStatus: asyncHandler(async (_req: Request, res: Response) => {
        res.json(await queue.getStats());
    }),
});
