// services/newsletterLifecycle.ts
import { CONSTANTS, ONE_HOUR } from '../utils/constants';
import { formatDisplayDate, toDateKey } from '../utils/helpers';
import { InvalidTransitionError } from '../utils/pipelineErrors';
import { IFeaturedStory, INewsletter, NewsletterStatus, Persona } from '../types';

/*
 * PENDING -> GENERATING -> GENERATED -> DELIVERING -> DELIVERED
 * GENERATING | DELIVERING -> FAILED
 * FAILED -> GENERATING (after the retry cooldown)
 * any non-terminal -> CANCELLED
 *
 * Every transition returns a new record; the input is never mutated.
 */

const { RETRY_COOLDOWN_MS, BASE_BACKOFF_MS } = CONSTANTS.LIFECYCLE;

const TERMINAL: ReadonlySet<NewsletterStatus> = new Set<NewsletterStatus>(['delivered', 'cancelled']);

const assertStatus = (newsletter: INewsletter, allowed: NewsletterStatus[], action: string): void => {
    if (!allowed.includes(newsletter.status)) {
        throw new InvalidTransitionError(newsletter.status, action);
    }
};

const stamp = (message: string, now: Date): string => `[${now.toISOString()}] ${message}`;

export interface NewNewsletterInput {
    serverId: string;
    now: Date;
    windowHours?: number;
}

export const createDailyNewsletter = ({ serverId, now, windowHours = CONSTANTS.NEWSLETTER.WINDOW_HOURS }: NewNewsletterInput): INewsletter => ({
    serverId,
    newsletterDate: toDateKey(now),
    status: 'pending',
    title: `Daily Dispatch - ${formatDisplayDate(now)}`,
    introduction: '',
    conclusion: '',
    timePeriodStart: new Date(now.getTime() - windowHours * ONE_HOUR),
    timePeriodEnd: now,
    analyzedMessagesCount: 0,
    analyzedChannels: [],
    featuredStory: null,
    additionalStories: [],
    briefMentions: [],
    generationErrors: [],
    deliveryErrors: [],
    retryCount: 0,
    isFallbackDerived: false,
});

// --- RETRY POLICY ---

export const isRetryEligible = (newsletter: INewsletter, now: Date): boolean => {
    if (newsletter.status !== 'failed' || !newsletter.failedAt) return false;
    return now.getTime() - newsletter.failedAt.getTime() >= RETRY_COOLDOWN_MS;
};

/** May a new generation run for this date, given what is already stored? */
export const canStartGeneration = (existing: INewsletter | null, now: Date): boolean => {
    if (!existing || existing.status === 'cancelled') return true;
    if (existing.status === 'pending') return true;
    return isRetryEligible(existing, now);
};

/** 5s, 10s, 20s ... before attempt n + 1. */
export const backoffDelay = (attempt: number): number => BASE_BACKOFF_MS * 2 ** (attempt - 1);

// --- TRANSITIONS ---

export const startGeneration = (newsletter: INewsletter, persona: Persona, now: Date = new Date()): INewsletter => {
    if (newsletter.status === 'failed') {
        if (!isRetryEligible(newsletter, now)) throw new InvalidTransitionError('failed', 'restart (cooldown active)');
    } else {
        assertStatus(newsletter, ['pending'], 'start generation for');
    }

    return {
        ...newsletter,
        status: 'generating',
        personaUsed: persona,
        generationStartedAt: now,
        generationCompletedAt: undefined,
        failedAt: undefined,
        featuredStory: null,
        additionalStories: [],
        briefMentions: [],
        isFallbackDerived: false,
    };
};

/** The featured story may be set once per generation attempt. */
export const setFeaturedStory = (newsletter: INewsletter, story: IFeaturedStory): INewsletter => {
    assertStatus(newsletter, ['generating'], 'set the featured story of');
    if (newsletter.featuredStory) throw new InvalidTransitionError(newsletter.status, 'replace the featured story of');
    return { ...newsletter, featuredStory: story };
};

export const completeGeneration = (newsletter: INewsletter, now: Date = new Date()): INewsletter => {
    assertStatus(newsletter, ['generating'], 'complete generation for');
    if (!newsletter.featuredStory) throw new InvalidTransitionError(newsletter.status, 'complete without a featured story');
    return { ...newsletter, status: 'generated', generationCompletedAt: now };
};

export const startDelivery = (newsletter: INewsletter, channelId: string): INewsletter => {
    assertStatus(newsletter, ['generated'], 'deliver');
    return { ...newsletter, status: 'delivering', deliveryChannelId: channelId };
};

export const completeDelivery = (newsletter: INewsletter, deliveredMessageId: string, now: Date = new Date()): INewsletter => {
    assertStatus(newsletter, ['delivering'], 'complete delivery for');
    return { ...newsletter, status: 'delivered', deliveryMessageId: deliveredMessageId, deliveredAt: now };
};

export const markFailed = (newsletter: INewsletter, message: string, isGenerationPhase: boolean, now: Date = new Date()): INewsletter => {
    assertStatus(newsletter, ['generating', 'delivering'], 'fail');
    return {
        ...newsletter,
        status: 'failed',
        failedAt: now,
        generationErrors: isGenerationPhase ? [...newsletter.generationErrors, stamp(message, now)] : newsletter.generationErrors,
        deliveryErrors: isGenerationPhase ? newsletter.deliveryErrors : [...newsletter.deliveryErrors, stamp(message, now)],
    };
};

export const cancel = (newsletter: INewsletter, now: Date = new Date()): INewsletter => {
    if (TERMINAL.has(newsletter.status)) throw new InvalidTransitionError(newsletter.status, 'cancel');
    return { ...newsletter, status: 'cancelled', cancelledAt: now };
};
