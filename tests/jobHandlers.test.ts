import { describe, it, expect } from 'vitest';
import { createJobHandlers, generateJobId, NewsletterJob } from '../jobs/jobHandlers';
import { NewsletterJobData } from '../jobs/queueManager';
import { CONSTANTS } from '../utils/constants';
import { GenericProviderError } from '../utils/pipelineErrors';
import { chatterMessages, makeProfile, NOW } from './helpers/fakes';
import { harness, HarnessOptions, SUCCESS } from './helpers/serviceHarness';

const { JOBS } = CONSTANTS.QUEUE;

const job = (name: string, data: NewsletterJobData = {}): NewsletterJob => ({ id: 'job-1', name, data });

const setup = (options: HarnessOptions = {}) => {
    const h = harness(options);
    const queued: { name: string; data: NewsletterJobData; opts?: { jobId?: string } }[] = [];
    const handle = createJobHandlers({
        newsletters: h.service,
        enqueue: async jobs => {
            queued.push(...jobs);
            return jobs.length;
        },
        clock: h.clock,
    });
    return { ...h, handle, queued };
};

describe('job handlers', () => {
    it('fans out one generation job per due server, keyed by hour', async () => {
        const { handle, queued } = setup({ profiles: [makeProfile({ serverId: 'a' }), makeProfile({ serverId: 'b' })] });

        expect(await handle(job(JOBS.DISPATCH))).toEqual({ status: 'dispatched', count: 2 });
        expect(queued).toEqual([
            { name: JOBS.GENERATE, data: { serverId: 'a', reason: 'dispatch' }, opts: { jobId: 'generate-newsletter-a-2024-03-09T12' } },
            { name: JOBS.GENERATE, data: { serverId: 'b', reason: 'dispatch' }, opts: { jobId: 'generate-newsletter-b-2024-03-09T12' } },
        ]);
    });

    it('gives a later dispatch a new job id, so a failed newsletter is picked up again', async () => {
        const boom = () => new GenericProviderError('scripted', 'boom');
        const h = setup({ steps: [boom(), boom(), boom(), ...SUCCESS] });

        await h.handle(job(JOBS.DISPATCH));
        expect(await h.handle(job(JOBS.GENERATE, { serverId: 'server-1' }))).toEqual({ status: 'failed', serverId: 'server-1' });

        h.advance(3 * 60 * 60 * 1000);
        await h.handle(job(JOBS.DISPATCH));

        expect(h.queued.map(q => q.opts?.jobId)).toEqual([
            'generate-newsletter-server-1-2024-03-09T12',
            'generate-newsletter-server-1-2024-03-09T15',
        ]);
        expect(await h.handle(job(JOBS.GENERATE, { serverId: 'server-1' }))).toEqual({ status: 'generated', serverId: 'server-1' });
    });

    it('keeps the same job id within one hour', () => {
        const later = new Date(NOW.getTime() + 59 * 60 * 1000);
        expect(generateJobId('a', later)).toBe(generateJobId('a', NOW));
        expect(generateJobId('a', NOW)).not.toContain(':');
    });

    it('generates a newsletter', async () => {
        const { handle } = setup();
        expect(await handle(job(JOBS.GENERATE, { serverId: 'server-1' }))).toEqual({ status: 'generated', serverId: 'server-1' });
    });

    it('reports a quiet day instead of failing the job', async () => {
        const { handle } = setup({ messages: chatterMessages().slice(0, 2) });
        expect(await handle(job(JOBS.GENERATE, { serverId: 'server-1' }))).toEqual({
            status: 'insufficient_content',
            serverId: 'server-1',
        });
    });

    it('rejects a generation job without a server', async () => {
        const { handle } = setup();
        await expect(handle(job(JOBS.GENERATE))).rejects.toThrow('Job job-1 has no serverId');
    });

    it('writes breaking news', async () => {
        const { handle } = setup({ steps: ['🚨 BREAKING: Pizza war declared'] });
        expect(await handle(job(JOBS.BREAKING, { serverId: 'server-1', channelContext: 'food' }))).toEqual({
            status: 'full',
            serverId: 'server-1',
            deliveredMessageId: null,
        });
    });

    it('sweeps stuck newsletters', async () => {
        const { handle } = setup();
        expect(await handle(job(JOBS.SWEEP))).toEqual({ status: 'swept', count: 0 });
    });

    it('ignores unknown jobs', async () => {
        const { handle } = setup();
        expect(await handle(job('something-else'))).toBeNull();
    });
});
