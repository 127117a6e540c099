import { describe, it, expect } from 'vitest';
import {
    ARTICLE_FOOTER,
    FOOTER_LINE,
    TRUNCATION_NOTICE,
    ReporterService,
    anonymizeAuthor,
    buildArticleContext,
    buildFallbackArticle,
    fallbackBulletin,
    formatBreakingNewsData,
    postProcessArticle,
    rankForBreakingNews,
} from '../services/reporterService';
import { annotateSelection } from '../services/editorService';
import { GenericProviderError } from '../utils/pipelineErrors';
import { getPersonaTemplate } from '../utils/personas';
import { ISelectedStory } from '../types';
import { REPORTER_ARTICLE, ScriptedProvider, defaultPrompts, hoursAgo, makeMessage } from './helpers/fakes';

const story: ISelectedStory = annotateSelection(
    {
        headline: 'Board game night returns',
        summary: 'The monthly board game night is scheduled for Saturday',
        newsworthiness: 'Moderate interest',
        keyPlayers: 'Weekend organisers',
        storyScore: 0.6,
        relatedMessageIds: ['m1', 'm2'],
        metrics: { relatedMessageCount: 2, totalEngagement: 0.9, averageControversy: 0.15, uniqueParticipants: 2, timeSpanHours: 1.5 },
        isFallback: false,
    },
    { method: 'explicit_mention', rejectedCandidates: 1, headline: 'Dice Are Rolling Again', angle: 'Celebrate the return' }
);

describe('postProcessArticle', () => {
    const filler = (label: string) =>
        `\n\nThis story continues to develop as community discussions evolve. The ${label} will keep monitoring the situation!`;

    it('adds a heading, filler and footer to a 45-character response', () => {
        const raw = 'Someone finally fixed the broken music bot!!!';
        expect(raw).toHaveLength(45);

        const article = postProcessArticle(raw, 'sassy_reporter');

        expect(article).toBe(`## ${raw}${filler('sassy reporter')}${ARTICLE_FOOTER}`);
        expect(article.length).toBeGreaterThanOrEqual(100);
    });

    it('returns the same text when run on its own output', () => {
        for (const raw of ['tiny', REPORTER_ARTICLE, 'x'.repeat(5000)]) {
            const once = postProcessArticle(raw, 'gossip_columnist');
            expect(postProcessArticle(once, 'gossip_columnist')).toBe(once);
        }
    });

    it('keeps a well-formed article as is, plus one footer', () => {
        expect(postProcessArticle(REPORTER_ARTICLE, 'sassy_reporter')).toBe(REPORTER_ARTICLE + ARTICLE_FOOTER);
    });

    it('replaces a loosely attached footer with the canonical one', () => {
        const raw = `${REPORTER_ARTICLE}\n---\n${FOOTER_LINE}`;
        const article = postProcessArticle(raw, 'sassy_reporter');

        expect(article).toBe(REPORTER_ARTICLE + ARTICLE_FOOTER);
        expect(article.split(FOOTER_LINE)).toHaveLength(2);
    });

    it('truncates long output below the limit with a notice', () => {
        const article = postProcessArticle(`## Long\n${'a'.repeat(4000)}`, 'sassy_reporter');

        expect(article.length).toBeLessThanOrEqual(2000);
        expect(article.endsWith(TRUNCATION_NOTICE + ARTICLE_FOOTER)).toBe(true);
        expect(article.startsWith('## Long\naaa')).toBe(true);
    });

    it('uses the default label for an unknown persona', () => {
        const article = postProcessArticle('short', 'mystery_voice');
        expect(article).toBe(`## short${filler(getPersonaTemplate(undefined).label)}${ARTICLE_FOOTER}`);
    });
});

describe('article context', () => {
    it('anonymizes authors by their last three characters', () => {
        expect(anonymizeAuthor('author-123')).toBe('User_123');
        expect(anonymizeAuthor('')).toBe('User_anon');
    });

    it('quotes related messages, most engaging first', () => {
        const messages = [
            makeMessage('m1', { authorId: 'user-111', content: 'Bringing my new dice set', totalReactions: 2, timestamp: hoursAgo(2) }),
            makeMessage('m2', { authorId: 'user-222', content: 'Finally, game night is back', totalReactions: 30, replyCount: 4 }),
            makeMessage('other', { totalReactions: 50 }),
        ];

        const text = buildArticleContext(story, messages);

        expect(text).toContain('STORY SUMMARY:\nThe monthly board game night is scheduled for Saturday');
        expect(text).toContain('- Engagement Score: 0.90');
        expect(text).toContain('- Time Span: 1.5 hours');
        expect(text).toContain('Quote 1: "Finally, game night is back"\n- Author: User_222\n- Reactions: 30\n- Replies: 4\n- Timestamp: 11:00');
        expect(text).toContain('Quote 2: "Bringing my new dice set"\n- Author: User_111');
        expect(text).not.toContain('Quote 3');
    });

    it('adds server context when available', () => {
        const text = buildArticleContext(story, [], {
            serverName: 'Tabletop Club',
            breakingNewsEnabled: false,
            trendingTopics: [{ representativeText: 'dice drama', engagementScore: 12 }],
        });

        expect(text).toContain('SERVER CONTEXT:\n- Server: Tabletop Club\n- Breaking news: off\n- Trending: dice drama');
        expect(text).not.toContain('AVAILABLE QUOTES');
    });
});

describe('ReporterService.writeArticle', () => {
    it('post-processes the provider output', async () => {
        const provider = ScriptedProvider.sequence(REPORTER_ARTICLE);
        const article = await new ReporterService(provider, defaultPrompts()).writeArticle(story, 'sassy_reporter', []);

        expect(article).toEqual({ text: REPORTER_ARTICLE + ARTICLE_FOOTER, persona: 'sassy_reporter', mode: 'full' });
        expect(provider.requests[0].messages[0].content).toContain('Headline: Dice Are Rolling Again');
        expect(provider.requests[0].messages[0].content).toContain('Reporting Angle: Celebrate the return');
    });

    it('writes the persona template when the provider fails', async () => {
        const provider = ScriptedProvider.sequence(new GenericProviderError('scripted', 'boom'));
        const article = await new ReporterService(provider, defaultPrompts()).writeArticle(story, 'investigative_journalist', []);

        expect(article.mode).toBe('fallback');
        expect(article.text).toBe(postProcessArticle(buildFallbackArticle(story, 'investigative_journalist'), 'investigative_journalist'));
        expect(article.text.startsWith('## Dice Are Rolling Again\n\nFollowing an extensive investigation,')).toBe(true);
    });
});

describe('breaking news', () => {
    it('orders by recency, then engagement, keeping ten', () => {
        const messages = Array.from({ length: 12 }, (_, i) => makeMessage(`b${i}`, { timestamp: hoursAgo(i / 10) }));
        messages.push(makeMessage('tied-loud', { timestamp: hoursAgo(0), totalReactions: 40 }));

        const ranked = rankForBreakingNews(messages);

        expect(ranked).toHaveLength(10);
        expect(ranked.slice(0, 3).map(m => m.id)).toEqual(['tied-loud', 'b0', 'b1']);
    });

    it('formats each message as a numbered block', () => {
        const text = formatBreakingNewsData([
            makeMessage('x', { content: 'The server just hit ten thousand members', totalReactions: 7, replyCount: 2 }),
        ]);
        expect(text).toBe('Message 1 | 11:00\nContent: The server just hit ten thousand members\nEngagement: 7 reactions, 2 replies');
    });

    it('returns the canned bulletin without a call when there is nothing to report', async () => {
        const provider = ScriptedProvider.sequence();
        const bulletin = await new ReporterService(provider, defaultPrompts()).generateBreakingNews([], 'sassy_reporter');

        expect(bulletin).toEqual({ text: fallbackBulletin('sassy_reporter'), persona: 'sassy_reporter', mode: 'fallback' });
        expect(provider.requests).toHaveLength(0);
    });

    it('trims the provider bulletin and passes the channel context', async () => {
        const provider = ScriptedProvider.sequence('  🚨 BREAKING: Ten thousand members!  \n');
        const bulletin = await new ReporterService(provider, defaultPrompts())
            .generateBreakingNews([makeMessage('x')], 'sassy_reporter', 'Milestone watch');

        expect(bulletin.text).toBe('🚨 BREAKING: Ten thousand members!');
        expect(bulletin.mode).toBe('full');
        expect(provider.requests[0].messages[0].content).toContain('Context: Milestone watch');
    });

    it('falls back to the canned bulletin on provider failure', async () => {
        const provider = ScriptedProvider.sequence(new GenericProviderError('scripted', 'boom'));
        const bulletin = await new ReporterService(provider, defaultPrompts()).generateBreakingNews([makeMessage('x')], 'gossip_columnist');

        expect(bulletin.text).toBe(fallbackBulletin('gossip_columnist'));
        expect(bulletin.mode).toBe('fallback');
    });
});
