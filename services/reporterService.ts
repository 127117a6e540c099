// services/reporterService.ts
import logger from '../utils/logger';
import { CONSTANTS } from '../utils/constants';
import { truncate } from '../utils/helpers';
import { engagementScore } from '../utils/scoring';
import { attempt } from '../utils/result';
import { PromptManager } from '../utils/promptManager';
import { getPersonaTemplate } from '../utils/personas';
import { ICompletionProvider } from './completion/ICompletionProvider';
import { IComposedArticle, IMessage, ISelectedStory, IServerContext, Persona } from '../types';

const REPORTER = CONSTANTS.REPORTER;

export const FOOTER_LINE = '*Dispatch Desk 🤖 | Stay informed, stay entertained*';
export const ARTICLE_FOOTER = `\n\n---\n${FOOTER_LINE}`;
export const TRUNCATION_NOTICE = '...\n\n*[Article truncated for length]*';

const hhmm = (date: Date): string => date.toISOString().slice(11, 16);

// --- 1. CONTEXT ---

export const anonymizeAuthor = (authorId: string): string => `User_${authorId.slice(-3) || 'anon'}`;

export const buildArticleContext = (story: ISelectedStory, messages: IMessage[], context?: IServerContext): string => {
    const parts: string[] = [];

    parts.push(`STORY SUMMARY:\n${story.summary}`);

    parts.push([
        'STORY METRICS:',
        `- Engagement Score: ${story.metrics.totalEngagement.toFixed(2)}`,
        `- Participants: ${story.metrics.uniqueParticipants} users`,
        `- Time Span: ${story.metrics.timeSpanHours.toFixed(1)} hours`,
        `- Controversy Level: ${story.metrics.averageControversy.toFixed(2)}/1.0`,
    ].join('\n'));

    const related = new Set(story.relatedMessageIds);
    const quotes = messages
        .filter(m => related.has(m.id))
        .sort((a, b) => engagementScore(b) - engagementScore(a))
        .slice(0, REPORTER.MAX_QUOTES);

    if (quotes.length > 0) {
        const lines = quotes.map((m, i) => [
            `Quote ${i + 1}: "${truncate(m.content, REPORTER.QUOTE_CHARS)}"`,
            `- Author: ${anonymizeAuthor(m.authorId)}`,
            `- Reactions: ${m.totalReactions}`,
            `- Replies: ${m.replyCount}`,
            `- Timestamp: ${hhmm(m.timestamp)}`,
        ].join('\n'));
        parts.push(`AVAILABLE QUOTES (anonymized):\n${lines.join('\n')}`);
    }

    if (context) {
        const lines: string[] = [];
        if (context.serverName) lines.push(`- Server: ${context.serverName}`);
        if (context.breakingNewsEnabled !== undefined) lines.push(`- Breaking news: ${context.breakingNewsEnabled ? 'on' : 'off'}`);
        if (context.trendingTopics && context.trendingTopics.length > 0) {
            lines.push(`- Trending: ${context.trendingTopics.map(t => t.representativeText).join('; ')}`);
        }
        if (lines.length > 0) parts.push(`SERVER CONTEXT:\n${lines.join('\n')}`);
    }

    return parts.join('\n\n');
};

// --- 2. POST-PROCESSING ---

const fillerFor = (persona: string): string =>
    `\n\nThis story continues to develop as community discussions evolve. The ${getPersonaTemplate(persona).label} will keep monitoring the situation!`;

/**
 * Normalizes model output into a publishable article:
 * heading present, at least MIN_ARTICLE_CHARS of body, one footer, at most MAX_ARTICLE_CHARS.
 * Running it on its own output returns the same text.
 */
export const postProcessArticle = (raw: string, persona: string): string => {
    let body = raw.trim();

    if (body.endsWith(ARTICLE_FOOTER)) {
        body = body.slice(0, -ARTICLE_FOOTER.length);
    } else if (body.endsWith(FOOTER_LINE)) {
        body = body.slice(0, -FOOTER_LINE.length).trimEnd().replace(/-{3,}$/, '').trimEnd();
    }

    if (!body.includes('#') && !body.includes('*')) {
        const [first, ...rest] = body.split('\n');
        body = [`## ${first.trim()}`, ...rest].join('\n');
    }

    if (body.length < REPORTER.MIN_ARTICLE_CHARS) {
        body += fillerFor(persona);
    }

    let article = body + ARTICLE_FOOTER;

    if (article.length > REPORTER.MAX_ARTICLE_CHARS) {
        article = body.slice(0, REPORTER.TRUNCATE_AT) + TRUNCATION_NOTICE + ARTICLE_FOOTER;
    }

    return article;
};

// --- 3. FALLBACKS ---

export const buildFallbackArticle = (story: Pick<ISelectedStory, 'suggestedHeadline' | 'headline' | 'summary'>, persona: string): string => {
    const template = getPersonaTemplate(persona);
    const headline = story.suggestedHeadline || story.headline || 'Community Update';
    return [
        `## ${headline}`,
        '',
        template.articleIntro,
        '',
        story.summary || 'The community has been busy today.',
        '',
        'Community engagement stays strong, with discussions and interactions happening across several channels. The details are still developing, but members are clearly active and engaged.',
        '',
        'Stay tuned for more updates as stories develop!',
    ].join('\n');
};

export const fallbackBulletin = (persona: string): string => getPersonaTemplate(persona).bulletin;

/** Most recent first; among equal timestamps, most engaging first. */
export const rankForBreakingNews = (messages: IMessage[]): IMessage[] =>
    [...messages]
        .sort((a, b) =>
            b.timestamp.getTime() - a.timestamp.getTime() || engagementScore(b) - engagementScore(a)
        )
        .slice(0, REPORTER.BREAKING.MESSAGE_LIMIT);

export const formatBreakingNewsData = (messages: IMessage[]): string =>
    messages
        .map((m, i) => [
            `Message ${i + 1} | ${hhmm(m.timestamp)}`,
            `Content: ${truncate(m.content, REPORTER.BREAKING.CONTENT_CHARS)}`,
            `Engagement: ${m.totalReactions} reactions, ${m.replyCount} replies`,
        ].join('\n'))
        .join('\n\n');

// --- 4. STAGE ---

export class ReporterService {
    constructor(
        private readonly provider: ICompletionProvider,
        private readonly prompts: PromptManager
    ) {}

    async writeArticle(story: ISelectedStory, persona: Persona, messages: IMessage[], context?: IServerContext): Promise<IComposedArticle> {
        const systemPrompt = await this.prompts.getSystemPrompt('STAR_REPORTER', persona);
        const label = getPersonaTemplate(persona).label;

        const completion = await attempt(() =>
            this.provider.complete({
                systemPrompt,
                messages: [{
                    role: 'user',
                    content: [
                        'Write the complete newsletter article for this editorial assignment:',
                        '',
                        'SELECTED STORY:',
                        `Headline: ${story.suggestedHeadline}`,
                        `Editorial Reasoning: ${story.editorialReasoning}`,
                        `Reporting Angle: ${story.reportingAngle}`,
                        '',
                        'STORY CONTEXT:',
                        buildArticleContext(story, messages, context),
                        '',
                        'WRITING REQUIREMENTS:',
                        `- Write as a ${label}`,
                        '- Include actual quotes from the messages, with usernames anonymized',
                        '- 200-400 words',
                        '- An engaging headline and conclusion',
                        '- Fitting emojis and formatting',
                        '',
                        'Write the complete newsletter article now:',
                    ].join('\n'),
                }],
                temperature: REPORTER.TEMPERATURE,
                maxTokens: REPORTER.MAX_TOKENS,
            })
        );

        if (!completion.ok) {
            logger.warn(`✍️ Article call failed (${completion.error.errorKind}), using the ${label} template`);
            return { text: postProcessArticle(buildFallbackArticle(story, persona), persona), persona, mode: 'fallback' };
        }

        const text = postProcessArticle(completion.value, persona);
        logger.info(`✍️ Article written for "${story.headline}" (${text.length} chars, ${label})`);
        return { text, persona, mode: 'full' };
    }

    async generateBreakingNews(messages: IMessage[], persona: Persona, channelContext?: string): Promise<IComposedArticle> {
        if (messages.length === 0) {
            return { text: fallbackBulletin(persona), persona, mode: 'fallback' };
        }

        const systemPrompt = await this.prompts.getSystemPrompt('BREAKING_NEWS', persona);
        const label = getPersonaTemplate(persona).label;

        const completion = await attempt(() =>
            this.provider.complete({
                systemPrompt,
                messages: [{
                    role: 'user',
                    content: [
                        'Analyze these recent messages and write a single-paragraph breaking news bulletin:',
                        '',
                        formatBreakingNewsData(rankForBreakingNews(messages)),
                        '',
                        `Context: ${channelContext || 'Recent channel activity'}`,
                        '',
                        `Write 2-3 sentences in the voice of a ${label}, starting with "🚨 BREAKING:". Write only the bulletin.`,
                    ].join('\n'),
                }],
                temperature: REPORTER.TEMPERATURE,
                maxTokens: REPORTER.BREAKING.MAX_TOKENS,
            })
        );

        if (!completion.ok) {
            logger.warn(`🚨 Breaking news call failed (${completion.error.errorKind}), using canned bulletin`);
            return { text: fallbackBulletin(persona), persona, mode: 'fallback' };
        }

        return { text: completion.value.trim(), persona, mode: 'full' };
    }
}
