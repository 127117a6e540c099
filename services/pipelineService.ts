// services/pipelineService.ts
import { randomUUID } from 'crypto';
import logger from '../utils/logger';
import { CONSTANTS } from '../utils/constants';
import { clamp01 } from '../utils/helpers';
import { getPersonaTemplate } from '../utils/personas';
import { filterAndRank, FilterProfile } from './messageFilterService';
import { NewsDeskService } from './newsDeskService';
import { EditorService } from './editorService';
import { ReporterService } from './reporterService';
import { completeGeneration, setFeaturedStory, startGeneration } from './newsletterLifecycle';
import {
    IComposedArticle,
    IFeaturedStory,
    IMessage,
    INewsletter,
    ISelectedStory,
    IServerContext,
    IServerProfile,
    IStoryBrief,
    IStoryCandidate,
} from '../types';

const NEWSLETTER = CONSTANTS.NEWSLETTER;

export type PipelineProfile = FilterProfile & Pick<IServerProfile, 'persona'>;

export interface PipelineDeps {
    newsDesk: NewsDeskService;
    editor: EditorService;
    reporter: ReporterService;
    filter?: typeof filterAndRank;
}

// --- 1. ASSEMBLY HELPERS ---

export const mostFrequentChannel = (messages: IMessage[]): string => {
    const counts = new Map<string, number>();
    for (const m of messages) counts.set(m.channelId, (counts.get(m.channelId) ?? 0) + 1);

    let best = '';
    let bestCount = 0;
    for (const [channelId, count] of counts) {
        if (count > bestCount) {
            best = channelId;
            bestCount = count;
        }
    }
    return best;
};

export const buildFeaturedStory = (
    story: ISelectedStory,
    article: IComposedArticle,
    messages: IMessage[],
    now: Date
): IFeaturedStory => {
    const related = new Set(story.relatedMessageIds);
    const sources = messages.filter(m => related.has(m.id));
    const users = [...new Set(sources.map(m => m.authorId))].slice(0, NEWSLETTER.MAX_INVOLVED_USERS);
    const averageEngagement = story.metrics.relatedMessageCount > 0
        ? story.metrics.totalEngagement / story.metrics.relatedMessageCount
        : 0;

    return {
        storyId: randomUUID(),
        headline: story.suggestedHeadline || story.headline,
        summary: story.summary,
        fullContent: article.text,
        sourceMessageIds: story.relatedMessageIds,
        primaryChannelId: mostFrequentChannel(sources.length > 0 ? sources : messages),
        involvedUsers: users,
        controversyScore: clamp01(story.metrics.averageControversy),
        engagementScore: clamp01(averageEngagement),
        relevanceScore: clamp01(story.storyScore),
        generatedBy: article.mode === 'full' && !story.isFallback ? 'full_pipeline' : 'fallback',
        generatedAt: now,
    };
};

const isSameStory = (candidate: IStoryCandidate, story: ISelectedStory): boolean =>
    candidate.headline === story.headline && candidate.summary === story.summary;

export const splitRemainingStories = (
    candidates: IStoryCandidate[],
    selected: ISelectedStory
): { additionalStories: IStoryBrief[]; briefMentions: string[] } => {
    const remaining = candidates.filter(c => !isSameStory(c, selected));
    const additionalStories = remaining
        .slice(0, NEWSLETTER.ADDITIONAL_STORIES)
        .map(c => ({ headline: c.headline, summary: c.summary, storyScore: c.storyScore }));
    const briefMentions = remaining
        .slice(NEWSLETTER.ADDITIONAL_STORIES)
        .map(c => `**${c.headline}**: ${c.summary.slice(0, NEWSLETTER.MENTION_SUMMARY_CHARS)}...`);
    return { additionalStories, briefMentions };
};

// --- 2. ORCHESTRATION ---

export class NewsletterPipeline {
    private readonly filter: typeof filterAndRank;

    constructor(private readonly deps: PipelineDeps) {
        this.filter = deps.filter ?? filterAndRank;
    }

    /**
     * One generation attempt. Returns a GENERATED copy of `base`; `base` is untouched.
     * Throws InsufficientContentError before any provider call when too few messages qualify.
     */
    async run(
        base: INewsletter,
        messages: IMessage[],
        profile: PipelineProfile,
        context: IServerContext = {},
        now: Date = new Date()
    ): Promise<INewsletter> {
        const ranked = this.filter(messages, profile, now);
        const persona = profile.persona;

        let record = startGeneration(base, persona, now);

        // 1. News desk
        const candidates = await this.deps.newsDesk.identifyStories(ranked, persona);

        // 2. Editor-in-chief
        const selected = await this.deps.editor.selectHeadlineStory(candidates, persona, context);

        // 3. Star reporter
        const article = await this.deps.reporter.writeArticle(selected, persona, ranked, context);

        const template = getPersonaTemplate(persona);
        const { additionalStories, briefMentions } = splitRemainingStories(candidates, selected);

        record = setFeaturedStory(record, buildFeaturedStory(selected, article, ranked, now));
        record = {
            ...record,
            introduction: template.newsletterIntro,
            conclusion: template.newsletterConclusion,
            analyzedMessagesCount: ranked.length,
            analyzedChannels: [...new Set(ranked.map(m => m.channelId))],
            additionalStories,
            briefMentions,
            isFallbackDerived:
                selected.isFallback || article.mode === 'fallback' || candidates.some(c => c.isFallback),
        };

        logger.info(
            `🗞️ Server ${base.serverId}: "${selected.suggestedHeadline}" via ${selected.selectionMethod}` +
            ` (${candidates.length} candidates, ${record.isFallbackDerived ? 'degraded' : 'full'})`
        );

        return completeGeneration(record, now);
    }
}
