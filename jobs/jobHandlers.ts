// jobs/jobHandlers.ts
import { Job } from 'bullmq';
import logger from '../utils/logger';
import { CONSTANTS } from '../utils/constants';
import { InsufficientContentError } from '../utils/pipelineErrors';
import { NewsletterService } from '../services/newsletterService';
import queueManager, { NewsletterJobData } from './queueManager';

const { JOBS } = CONSTANTS.QUEUE;

export interface JobHandlerDeps {
    newsletters: NewsletterService;
    enqueue?: typeof queueManager.addBulk;
    clock?: () => Date;
}

export type JobResult = Record<string, string | number | boolean | null>;

// The parts of a BullMQ job the handlers read
export type NewsletterJob = Pick<Job<NewsletterJobData>, 'id' | 'name' | 'data'>;

const requireServerId = (job: NewsletterJob): string => {
    if (!job.data.serverId) throw new Error(`Job ${job.id ?? job.name} has no serverId`);
    return job.data.serverId;
};

/**
 * Dedupes dispatches within one hour only. A finished job keeps its id in the
 * completed set, so a per-day id would block the retry of a failed newsletter
 * after its cooldown. Repeat runs on the same day are refused by the service.
 */
export const generateJobId = (serverId: string, now: Date): string =>
    `${JOBS.GENERATE}-${serverId}-${now.toISOString().slice(0, 13)}`;

export const createJobHandlers = (deps: JobHandlerDeps) => {
    const enqueue = deps.enqueue ?? queueManager.addBulk;
    const clock = deps.clock ?? (() => new Date());

    // Fan-out: one generation job per active server
    const handleDispatch = async (job: NewsletterJob): Promise<JobResult> => {
        const serverIds = await deps.newsletters.listDueServers();
        const now = clock();

        const added = await enqueue(serverIds.map(serverId => ({
            name: JOBS.GENERATE,
            data: { serverId, reason: job.data.reason ?? 'dispatch' },
            opts: { jobId: generateJobId(serverId, now) },
        })));

        logger.info(`📤 Job ${job.id}: dispatched ${added}/${serverIds.length} newsletter jobs`);
        return { status: 'dispatched', count: added };
    };

    const handleGenerate = async (job: NewsletterJob): Promise<JobResult> => {
        const serverId = requireServerId(job);
        try {
            const outcome = await deps.newsletters.generateForServer(serverId);
            return { status: outcome.status, serverId };
        } catch (e: unknown) {
            // Quiet days are normal; nothing to retry
            if (e instanceof InsufficientContentError) {
                logger.info(`📭 Job ${job.id}: ${e.message}`);
                return { status: 'insufficient_content', serverId };
            }
            throw e;
        }
    };

    const handleBreaking = async (job: NewsletterJob): Promise<JobResult> => {
        const serverId = requireServerId(job);
        const { article, deliveredMessageId } = await deps.newsletters.generateBreakingNews(serverId, job.data.channelContext);
        return { status: article.mode, serverId, deliveredMessageId: deliveredMessageId ?? null };
    };

    const handleSweep = async (): Promise<JobResult> => {
        const swept = await deps.newsletters.sweepStuckNewsletters();
        return { status: 'swept', count: swept };
    };

    return async (job: NewsletterJob): Promise<JobResult | null> => {
        switch (job.name) {
            case JOBS.DISPATCH:
                return handleDispatch(job);
            case JOBS.GENERATE:
                return handleGenerate(job);
            case JOBS.BREAKING:
                return handleBreaking(job);
            case JOBS.SWEEP:
                return handleSweep();
            default:
                logger.warn(`⚠️ Unknown Job Type: ${job.name}`);
                return null;
        }
    };
};
