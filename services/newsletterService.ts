// services/newsletterService.ts
import logger from '../utils/logger';
import AppError from '../utils/AppError';
import { CONSTANTS, ONE_HOUR } from '../utils/constants';
import { sleep as defaultSleep, toDateKey, truncate } from '../utils/helpers';
import { DeliveryError, InsufficientContentError, PipelineError, describeError, toPipelineError } from '../utils/pipelineErrors';
import { NewsletterPipeline } from './pipelineService';
import { ReporterService } from './reporterService';
import { renderNewsletter } from './newsletterRenderer';
import { isQualifyingMessage } from './messageFilterService';
import {
    backoffDelay,
    canStartGeneration,
    cancel,
    completeDelivery,
    createDailyNewsletter,
    markFailed,
    startDelivery,
    startGeneration,
} from './newsletterLifecycle';
import { IMessageFeed, INewsletterStore, IServerProfileStore } from './storage/IStores';
import { ITrendingProvider } from './trending/ITrendingProvider';
import { IFailureNotifier, INewsletterDelivery } from './delivery/INewsletterDelivery';
import { IComposedArticle, INewsletter, IServerContext, IServerProfile } from '../types';

const { MAX_ATTEMPTS, STUCK_AFTER_MS, ERROR_MESSAGE_CHARS } = CONSTANTS.LIFECYCLE;

export interface NewsletterServiceDeps {
    pipeline: NewsletterPipeline;
    reporter: ReporterService;
    messageFeed: IMessageFeed;
    profileStore: IServerProfileStore;
    newsletterStore: INewsletterStore;
    delivery: INewsletterDelivery;
    notifier: IFailureNotifier;
    trending?: ITrendingProvider;
    sleep?: (ms: number) => Promise<void>;
    clock?: () => Date;
    maxAttempts?: number;
}

export type GenerationOutcome =
    | { status: 'generated' | 'delivered'; newsletter: INewsletter }
    | { status: 'failed'; newsletter: INewsletter; error: PipelineError }
    | { status: 'skipped'; reason: string; newsletter?: INewsletter };

export interface BreakingNewsOutcome {
    article: IComposedArticle;
    deliveredMessageId?: string;
}

const attemptsLabel = (n: number): string => `${n} attempt${n === 1 ? '' : 's'}`;

export class NewsletterService {
    private readonly sleep: (ms: number) => Promise<void>;
    private readonly clock: () => Date;
    private readonly maxAttempts: number;

    constructor(private readonly deps: NewsletterServiceDeps) {
        this.sleep = deps.sleep ?? defaultSleep;
        this.clock = deps.clock ?? (() => new Date());
        this.maxAttempts = deps.maxAttempts ?? MAX_ATTEMPTS;
    }

    // --- 1. DAILY NEWSLETTER ---

    /**
     * Generates (and by default delivers) today's newsletter for one server.
     * InsufficientContentError is thrown before any provider call and nothing is stored.
     */
    async generateForServer(serverId: string, options: { deliver?: boolean } = {}): Promise<GenerationOutcome> {
        const profile = await this.requireProfile(serverId);

        if (profile.status !== 'active' || !profile.newsletterEnabled) {
            return { status: 'skipped', reason: `Newsletters are disabled for ${serverId}` };
        }

        const now = this.clock();
        const existing = await this.deps.newsletterStore.findByDate(serverId, toDateKey(now));

        if (existing && !canStartGeneration(existing, now)) {
            logger.info(`⏭️ Server ${serverId}: newsletter for ${existing.newsletterDate} is ${existing.status}, skipping`);
            return { status: 'skipped', reason: `Newsletter already ${existing.status}`, newsletter: existing };
        }

        const fresh = createDailyNewsletter({ serverId, now });
        const base: INewsletter = existing
            ? { ...existing, timePeriodStart: fresh.timePeriodStart, timePeriodEnd: fresh.timePeriodEnd }
            : fresh;

        const messages = await this.deps.messageFeed.getMessages(serverId, base.timePeriodStart, base.timePeriodEnd);
        const context = await this.buildContext(profile);

        let generated: INewsletter | null = null;
        let lastError: PipelineError | null = null;
        let failures = 0;

        for (let attemptNo = 1; attemptNo <= this.maxAttempts && !generated; attemptNo++) {
            try {
                generated = await this.deps.pipeline.run(base, messages, profile, context, this.clock());
            } catch (e: unknown) {
                if (e instanceof InsufficientContentError) throw e;

                lastError = toPipelineError(e);
                failures += 1;
                logger.warn(`🔁 Server ${serverId}: attempt ${attemptNo}/${this.maxAttempts} failed (${lastError.errorKind}): ${lastError.message}`);

                if (!lastError.retryable || attemptNo === this.maxAttempts) break;
                await this.sleep(backoffDelay(attemptNo));
            }
        }

        if (!generated) {
            const error = lastError ?? new PipelineError('Generation did not run', 'provider_error', true, 500);
            return this.recordFailure(base, profile, error, failures);
        }

        const saved = await this.deps.newsletterStore.save({ ...generated, retryCount: base.retryCount + failures });
        logger.info(`✅ Server ${serverId}: newsletter generated after ${attemptsLabel(failures + 1)}${saved.isFallbackDerived ? ' (fallback content)' : ''}`);

        if (options.deliver === false) return { status: 'generated', newsletter: saved };
        return this.deliverNewsletter(saved, profile);
    }

    private async recordFailure(base: INewsletter, profile: IServerProfile, error: PipelineError, failures: number): Promise<GenerationOutcome> {
        const now = this.clock();
        const message = truncate(`Failed after ${attemptsLabel(failures)}: ${error.message}`, ERROR_MESSAGE_CHARS);

        const failed = markFailed(startGeneration(base, profile.persona, now), message, true, now);
        const saved = await this.deps.newsletterStore.save({ ...failed, retryCount: base.retryCount + failures });

        logger.error(`❌ Server ${profile.serverId}: ${message}`);
        await this.deps.notifier.notify(
            {
                errorKind: error.errorKind,
                message: error.message,
                retryable: error.retryable,
                attempt: failures,
                serverId: profile.serverId,
                newsletterDate: saved.newsletterDate,
            },
            profile.newsletterWebhookUrl
        );

        return { status: 'failed', newsletter: saved, error };
    }

    // --- 2. DELIVERY ---

    /** Posts a GENERATED newsletter. Without a target channel it stays GENERATED. */
    async deliverNewsletter(newsletter: INewsletter, profile: IServerProfile): Promise<GenerationOutcome> {
        const channelId = profile.newsletterChannelId;
        if (!channelId) {
            logger.info(`📭 Server ${profile.serverId}: no newsletter channel, leaving it generated`);
            return { status: 'generated', newsletter };
        }

        const delivering = await this.deps.newsletterStore.save(startDelivery(newsletter, channelId));

        try {
            const messageId = await this.deps.delivery.deliver(channelId, renderNewsletter(delivering), profile.newsletterWebhookUrl);
            const delivered = await this.deps.newsletterStore.save(completeDelivery(delivering, messageId, this.clock()));
            return { status: 'delivered', newsletter: delivered };
        } catch (e: unknown) {
            const error = e instanceof PipelineError ? e : new DeliveryError(describeError(e));
            const failed = await this.deps.newsletterStore.save(markFailed(delivering, error.message, false, this.clock()));
            await this.deps.notifier.notify(
                {
                    errorKind: error.errorKind,
                    message: error.message,
                    retryable: error.retryable,
                    attempt: 1,
                    serverId: profile.serverId,
                    newsletterDate: failed.newsletterDate,
                },
                profile.newsletterWebhookUrl
            );
            return { status: 'failed', newsletter: failed, error };
        }
    }

    // --- 3. BREAKING NEWS ---

    async generateBreakingNews(serverId: string, channelContext?: string): Promise<BreakingNewsOutcome> {
        const profile = await this.requireProfile(serverId);
        if (!profile.breakingNewsEnabled) {
            throw new AppError(`Breaking news is disabled for ${serverId}`, 403, 'BREAKING_NEWS_DISABLED');
        }

        const now = this.clock();
        const since = new Date(now.getTime() - CONSTANTS.REPORTER.BREAKING.WINDOW_HOURS * ONE_HOUR);
        const messages = (await this.deps.messageFeed.getMessages(serverId, since, now))
            .filter(m => isQualifyingMessage(m, profile));

        const article = await this.deps.reporter.generateBreakingNews(messages, profile.persona, channelContext);

        if (!profile.newsletterChannelId) return { article };

        const deliveredMessageId = await this.deps.delivery.deliver(profile.newsletterChannelId, article.text, profile.newsletterWebhookUrl);
        return { article, deliveredMessageId };
    }

    // --- 4. MAINTENANCE ---

    /** Fails records stuck mid-phase so the cooldown logic can pick them up again. */
    async sweepStuckNewsletters(): Promise<number> {
        const now = this.clock();
        const stuck = await this.deps.newsletterStore.findStuck(new Date(now.getTime() - STUCK_AFTER_MS));
        let swept = 0;

        for (const newsletter of stuck) {
            const isGenerationPhase = newsletter.status === 'generating';
            try {
                await this.deps.newsletterStore.save(
                    markFailed(newsletter, `Stuck in ${newsletter.status} for more than ${STUCK_AFTER_MS / ONE_HOUR} hours`, isGenerationPhase, now)
                );
                swept += 1;
            } catch (e: unknown) {
                logger.error(`🧹 Could not sweep newsletter ${newsletter._id ?? newsletter.serverId}: ${describeError(e)}`);
            }
        }

        if (swept > 0) logger.info(`🧹 Marked ${swept} stuck newsletter(s) as failed`);
        return swept;
    }

    async cancelNewsletter(serverId: string, newsletterDate: string): Promise<INewsletter> {
        const newsletter = await this.getNewsletter(serverId, newsletterDate);
        return this.deps.newsletterStore.save(cancel(newsletter, this.clock()));
    }

    // --- 5. QUERIES ---

    async listNewsletters(serverId: string, limit: number = CONSTANTS.NEWSLETTER.RECENT_LIST_LIMIT): Promise<INewsletter[]> {
        return this.deps.newsletterStore.listByServer(serverId, limit);
    }

    async getNewsletter(serverId: string, newsletterDate: string): Promise<INewsletter> {
        const newsletter = await this.deps.newsletterStore.findByDate(serverId, newsletterDate);
        if (!newsletter) {
            throw new AppError(`No newsletter for ${serverId} on ${newsletterDate}`, 404, 'NEWSLETTER_NOT_FOUND');
        }
        return newsletter;
    }

    async listDueServers(): Promise<string[]> {
        const profiles = await this.deps.profileStore.listActiveProfiles();
        return profiles.map(p => p.serverId);
    }

    // --- HELPERS ---

    private async requireProfile(serverId: string): Promise<IServerProfile> {
        const profile = await this.deps.profileStore.getProfile(serverId);
        if (!profile) {
            throw new AppError(`Unknown server ${serverId}`, 404, 'SERVER_NOT_FOUND');
        }
        return profile;
    }

    async buildContext(profile: IServerProfile): Promise<IServerContext> {
        const context: IServerContext = {
            serverName: profile.serverName,
            persona: profile.persona,
            breakingNewsEnabled: profile.breakingNewsEnabled,
            trendingTopics: [],
        };

        if (!this.deps.trending) return context;

        try {
            context.trendingTopics = await this.deps.trending.getTrendingTopics(
                profile.serverId,
                CONSTANTS.TRENDING.LOOKBACK_HOURS,
                CONSTANTS.TRENDING.LIMIT
            );
        } catch (e: unknown) {
            logger.warn(`📈 Trending context unavailable for ${profile.serverId}: ${describeError(e)}`);
        }
        return context;
    }
}
