// services/editorService.ts
import logger from '../utils/logger';
import { CONSTANTS } from '../utils/constants';
import { clamp01, extractKeywords } from '../utils/helpers';
import { ResponseParsingError } from '../utils/pipelineErrors';
import { Result, attempt, err, ok } from '../utils/result';
import { PromptManager } from '../utils/promptManager';
import { getPersonaTemplate } from '../utils/personas';
import { ICompletionProvider } from './completion/ICompletionProvider';
import {
    EditorialPriority,
    ISelectedStory,
    IServerContext,
    IStoryCandidate,
    Persona,
    SelectionMethod,
} from '../types';

const EDITOR = CONSTANTS.EDITOR;

const DEFAULT_REASONING = 'Story selected by editorial review';
const DEFAULT_ANGLE = 'Standard reporting approach';

// --- 1. PRIORITY ---

export const calculatePriorityScore = (story: Pick<IStoryCandidate, 'storyScore' | 'metrics'>): number => {
    const { PRIORITY } = EDITOR;
    return (
        PRIORITY.STORY_WEIGHT * clamp01(story.storyScore) +
        PRIORITY.ENGAGEMENT_WEIGHT * clamp01(story.metrics.totalEngagement / PRIORITY.ENGAGEMENT_CAP) +
        PRIORITY.PARTICIPANT_WEIGHT * clamp01(story.metrics.uniqueParticipants / PRIORITY.PARTICIPANT_CAP)
    );
};

export const priorityFromScore = (score: number): EditorialPriority => {
    if (score >= EDITOR.PRIORITY.HIGH_THRESHOLD) return 'high';
    if (score >= EDITOR.PRIORITY.MEDIUM_THRESHOLD) return 'medium';
    return 'low';
};

// --- 2. SELECTION STRATEGIES ---
// Each returns the index of the chosen candidate, or null when it has no opinion.

/** (a) "story 2", "candidate 2" or the opening of a headline appears in the response. */
export const selectByExplicitMention = (response: string, candidates: IStoryCandidate[]): number | null => {
    const text = response.toLowerCase();
    for (let i = 0; i < candidates.length; i++) {
        const n = i + 1;
        if (new RegExp(`\\b(story|candidate)[ \\t]*[:#]?[ \\t]*${n}(?!\\d)`).test(text)) return i;
        const prefix = candidates[i].headline.toLowerCase().slice(0, EDITOR.HEADLINE_PREFIX_CHARS).trim();
        if (prefix && text.includes(prefix)) return i;
    }
    return null;
};

/** (b) Most headline and leading-summary words found in the response. Ties keep the earlier candidate. */
export const selectByKeywordOverlap = (response: string, candidates: IStoryCandidate[]): number | null => {
    const text = response.toLowerCase();
    let bestIndex: number | null = null;
    let bestCount = 0;

    for (let i = 0; i < candidates.length; i++) {
        const { headline, summary } = candidates[i];
        const leadingSummary = summary.split(/\s+/).slice(0, EDITOR.SUMMARY_KEYWORDS).join(' ');
        let count = 0;
        for (const word of extractKeywords(`${headline} ${leadingSummary}`)) {
            if (text.includes(word)) count += 1;
        }
        if (count > bestCount) {
            bestCount = count;
            bestIndex = i;
        }
    }

    return bestIndex;
};

/** (c) Highest storyScore; first one wins a tie. */
export const selectHighestScore = (candidates: IStoryCandidate[]): number =>
    candidates.reduce((best, c, i) => (c.storyScore > candidates[best].storyScore ? i : best), 0);

export const resolveSelection = (response: string, candidates: IStoryCandidate[]): { index: number; method: SelectionMethod } => {
    const explicit = selectByExplicitMention(response, candidates);
    if (explicit !== null) return { index: explicit, method: 'explicit_mention' };

    const overlap = selectByKeywordOverlap(response, candidates);
    if (overlap !== null) return { index: overlap, method: 'keyword_overlap' };

    return { index: selectHighestScore(candidates), method: 'highest_score' };
};

// --- 3. SECTION SCANNER ---

export interface EditorialSections {
    reasoning?: string;
    headline?: string;
    angle?: string;
}

type Section = 'selection' | 'reasoning' | 'headline' | 'angle';

interface SectionMarker {
    section: Section;
    inline: string;
}

const readMarker = (line: string): SectionMarker | null => {
    const bare = line.replace(/\*/g, '').trim();
    if (/^selected\b/i.test(bare) || /headline story/i.test(bare)) return { section: 'selection', inline: '' };

    const labelled = /^(reasoning|headline|angle)\s*:\s*(.*)$/i.exec(bare);
    if (labelled) {
        const label = labelled[1].toLowerCase();
        const section: Section = label === 'reasoning' ? 'reasoning' : label === 'headline' ? 'headline' : 'angle';
        return { section, inline: labelled[2].trim() };
    }

    if (/^reasoning\b/i.test(bare)) return { section: 'reasoning', inline: bare.replace(/^reasoning\b\s*/i, '') };
    return null;
};

/**
 * Reads labelled sections out of an editorial response. A section runs from its
 * marker line to the next blank line or marker; the first value seen for each label wins.
 */
export const parseEditorialSections = (response: string): EditorialSections => {
    const found: EditorialSections = {};
    let current: Section | null = null;
    let buffer: string[] = [];

    const close = () => {
        if (current && current !== 'selection' && buffer.length > 0 && !found[current]) {
            found[current] = buffer.join(' ');
        }
        current = null;
        buffer = [];
    };

    for (const rawLine of response.split('\n')) {
        const line = rawLine.trim();
        const marker = readMarker(line);

        if (marker) {
            close();
            current = marker.section;
            if (marker.inline) buffer.push(marker.inline);
        } else if (!line) {
            close();
        } else if (current) {
            buffer.push(line);
        }
    }
    close();

    return found;
};

// --- 4. ANNOTATION & FALLBACKS ---

export const annotateSelection = (
    candidate: IStoryCandidate,
    fields: {
        method: SelectionMethod;
        rejectedCandidates: number;
        reasoning?: string;
        headline?: string;
        angle?: string;
        review?: string;
        isFallback?: boolean;
    }
): ISelectedStory => ({
    ...candidate,
    suggestedHeadline: fields.headline || candidate.headline,
    reportingAngle: fields.angle || DEFAULT_ANGLE,
    editorialReasoning: fields.reasoning || DEFAULT_REASONING,
    editorialPriority: priorityFromScore(calculatePriorityScore(candidate)),
    rejectedCandidates: fields.rejectedCandidates,
    selectionMethod: fields.method,
    editorialReview: fields.review,
    isFallback: fields.isFallback ?? candidate.isFallback,
});

/** Story used when the news desk produced nothing at all. */
export const createEmptyFallbackStory = (): ISelectedStory =>
    annotateSelection(
        {
            headline: 'Community Activity Update',
            summary: 'Regular community discussions and interactions continue across the server.',
            newsworthiness: 'Baseline community activity',
            keyPlayers: 'Community members',
            storyScore: EDITOR.FALLBACK_STORY_SCORE,
            relatedMessageIds: [],
            metrics: { relatedMessageCount: 0, totalEngagement: 0, averageControversy: 0, uniqueParticipants: 0, timeSpanHours: 0 },
            isFallback: true,
        },
        {
            method: 'fallback',
            rejectedCandidates: 0,
            reasoning: 'Fallback story - no specific candidates available',
            angle: 'General community update',
            isFallback: true,
        }
    );

/** Err branch of the competitive selection: best-scoring candidate, flagged. */
export const fallbackSelection = (candidates: IStoryCandidate[], reason: string): ISelectedStory =>
    annotateSelection(candidates[selectHighestScore(candidates)], {
        method: 'fallback',
        rejectedCandidates: candidates.length - 1,
        reasoning: reason,
        isFallback: true,
    });

export const parseEditorialDecision = (response: string, candidates: IStoryCandidate[]): Result<ISelectedStory, ResponseParsingError> => {
    if (!response.trim()) return err(new ResponseParsingError('Editorial response was empty'));

    const { index, method } = resolveSelection(response, candidates);
    const sections = parseEditorialSections(response);
    return ok(
        annotateSelection(candidates[index], {
            method,
            rejectedCandidates: candidates.length - 1,
            reasoning: sections.reasoning,
            headline: sections.headline,
            angle: sections.angle,
            review: response,
        })
    );
};

export const formatCandidates = (candidates: IStoryCandidate[]): string =>
    candidates
        .map((c, i) =>
            [
                `**CANDIDATE ${i + 1}:**`,
                `Headline: ${c.headline}`,
                `Summary: ${c.summary}`,
                `Newsworthiness: ${c.newsworthiness || 'Not specified'}`,
                `Key Players: ${c.keyPlayers || 'Not specified'}`,
                '',
                'METRICS:',
                `- Story Score: ${c.storyScore.toFixed(2)}/1.0`,
                `- Related Messages: ${c.metrics.relatedMessageCount}`,
                `- Total Engagement: ${c.metrics.totalEngagement.toFixed(2)}`,
                `- Unique Participants: ${c.metrics.uniqueParticipants}`,
                `- Average Controversy: ${c.metrics.averageControversy.toFixed(2)}/1.0`,
                `- Time Span: ${c.metrics.timeSpanHours.toFixed(1)} hours`,
            ].join('\n')
        )
        .join('\n\n');

const describeContext = (context?: IServerContext): string => {
    if (!context) return '';
    const lines: string[] = [];
    if (context.serverName) lines.push(`Server: ${context.serverName}`);
    if (context.trendingTopics && context.trendingTopics.length > 0) {
        lines.push(`Trending right now: ${context.trendingTopics.map(t => t.representativeText).join('; ')}`);
    }
    return lines.length > 0 ? `\n\nSERVER CONTEXT:\n${lines.join('\n')}` : '';
};

// --- 5. STAGE ---

export class EditorService {
    constructor(
        private readonly provider: ICompletionProvider,
        private readonly prompts: PromptManager
    ) {}

    /** Always yields exactly one story; never throws for provider trouble. */
    async selectHeadlineStory(candidates: IStoryCandidate[], persona: Persona, context?: IServerContext): Promise<ISelectedStory> {
        if (candidates.length === 0) {
            logger.warn('🗞️ No candidates for the editor, running the fallback story');
            return createEmptyFallbackStory();
        }

        if (candidates.length === 1) {
            return this.reviewSingleStory(candidates[0], persona, context);
        }

        const systemPrompt = await this.prompts.getSystemPrompt('EDITOR_CHIEF', persona);
        const label = getPersonaTemplate(persona).label;

        const completion = await attempt(() =>
            this.provider.complete({
                systemPrompt,
                messages: [{
                    role: 'user',
                    content: [
                        "Review these story candidates and select the best one for today's newsletter headline.",
                        '',
                        'STORY CANDIDATES:',
                        formatCandidates(candidates),
                        '',
                        'Consider:',
                        "- Which story will most engage this server's community?",
                        '- Which has the best mix of entertainment value and relevance?',
                        '- Which will spark the most positive discussion?',
                        `- Which fits the ${label} voice best?`,
                        '',
                        'Select ONE story and explain your editorial decision.',
                    ].join('\n') + describeContext(context),
                }],
                temperature: EDITOR.TEMPERATURE,
                maxTokens: EDITOR.MAX_TOKENS,
            })
        );

        if (!completion.ok) {
            logger.warn(`🗞️ Editorial call failed (${completion.error.errorKind}), picking highest score`);
            return fallbackSelection(candidates, 'Automatic selection due to processing error');
        }

        const decision = parseEditorialDecision(completion.value, candidates);
        if (!decision.ok) {
            logger.warn(`🗞️ ${decision.error.message}, picking highest score`);
            return fallbackSelection(candidates, 'Automatic selection due to processing error');
        }

        logger.info(`🗞️ Editor selected "${decision.value.headline}" via ${decision.value.selectionMethod} (${decision.value.editorialPriority} priority)`);
        return decision.value;
    }

    private async reviewSingleStory(candidate: IStoryCandidate, persona: Persona, context?: IServerContext): Promise<ISelectedStory> {
        const systemPrompt = await this.prompts.getSystemPrompt('EDITOR_REVIEW', persona);

        const review = await attempt(() =>
            this.provider.complete({
                systemPrompt,
                messages: [{
                    role: 'user',
                    content: [
                        "Review this single story candidate for the newsletter. It is the only option, so focus on improving it.",
                        '',
                        'STORY:',
                        `Headline: ${candidate.headline}`,
                        `Summary: ${candidate.summary}`,
                        `Metrics: Score ${candidate.storyScore.toFixed(2)}, ${candidate.metrics.uniqueParticipants} participants`,
                    ].join('\n') + describeContext(context),
                }],
                temperature: EDITOR.TEMPERATURE,
                maxTokens: EDITOR.MAX_TOKENS,
            })
        );

        if (!review.ok) {
            logger.warn(`🗞️ Single story review failed (${review.error.errorKind})`);
            return annotateSelection(candidate, {
                method: 'single_review',
                rejectedCandidates: 0,
                reasoning: 'Review failed, proceeding with original',
                isFallback: true,
            });
        }

        const sections = parseEditorialSections(review.value);
        return annotateSelection(candidate, {
            method: 'single_review',
            rejectedCandidates: 0,
            reasoning: 'Single candidate review completed',
            headline: sections.headline,
            angle: sections.angle,
            review: review.value,
        });
    }
}
