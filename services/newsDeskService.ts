// services/newsDeskService.ts
import logger from '../utils/logger';
import { CONSTANTS } from '../utils/constants';
import { clamp01, extractKeywords, formatMinute, hoursBetween, truncate } from '../utils/helpers';
import { engagementScore } from '../utils/scoring';
import { ResponseParsingError } from '../utils/pipelineErrors';
import { Result, err, ok } from '../utils/result';
import { PromptManager } from '../utils/promptManager';
import { ICompletionProvider } from './completion/ICompletionProvider';
import { IMessage, IStoryCandidate, IStoryMetrics, Persona } from '../types';

const DESK = CONSTANTS.NEWS_DESK;

export interface ParsedStoryBlock {
    headline: string;
    summary: string;
    newsworthiness: string;
    keyPlayers: string;
}

// --- 1. EVIDENCE ---

const evidenceWeight = (m: IMessage): number =>
    m.totalReactions + m.replyCount + DESK.CONTROVERSY_RANK_FACTOR * clamp01(m.controversyScore);

export const selectEvidence = (messages: IMessage[], limit: number = DESK.EVIDENCE_LIMIT): IMessage[] =>
    [...messages].sort((a, b) => evidenceWeight(b) - evidenceWeight(a)).slice(0, limit);

const anonymize = (authorId: string): string => `User_${authorId.slice(-4) || 'unkn'}`;

export const buildEvidenceTable = (messages: IMessage[]): string =>
    messages
        .map((m, i) =>
            [
                `MSG_${i + 1} | ${formatMinute(m.timestamp)} | ${anonymize(m.authorId)}`,
                `Content: ${truncate(m.content, DESK.CONTENT_PREVIEW_CHARS)}`,
                `Engagement: ${m.totalReactions} reactions, ${m.replyCount} replies`,
                `Controversy: ${clamp01(m.controversyScore).toFixed(2)}/1.0 | Engagement: ${engagementScore(m).toFixed(2)}/1.0`,
                '---',
            ].join('\n')
        )
        .join('\n');

// --- 2. RESPONSE GRAMMAR ---
// response := preamble (STORY_DELIMITER block)*
// block    := line*, where a line is `Label: value` or ignored text

const STORY_DELIMITER = /\*\*STORY\b/i;
const LABEL_LINE = /^\**\s*(headline|newsworthiness|key players|summary)\s*\**\s*:\s*\**\s*(.*)$/i;

const FIELD_BY_LABEL: Record<string, keyof ParsedStoryBlock> = {
    'headline': 'headline',
    'newsworthiness': 'newsworthiness',
    'key players': 'keyPlayers',
    'summary': 'summary',
};

/** One delimited block; null unless both headline and summary are present. */
export const parseStoryBlock = (section: string): ParsedStoryBlock | null => {
    const block: ParsedStoryBlock = { headline: '', summary: '', newsworthiness: '', keyPlayers: '' };

    for (const rawLine of section.split('\n')) {
        const match = LABEL_LINE.exec(rawLine.trim());
        if (!match) continue;
        const field = FIELD_BY_LABEL[match[1].toLowerCase()];
        const value = match[2].replace(/\*+$/, '').trim();
        if (field && value && !block[field]) block[field] = value;
    }

    return block.headline && block.summary ? block : null;
};

export const parseStoriesResponse = (response: string): Result<ParsedStoryBlock[], ResponseParsingError> => {
    const blocks = response
        .split(STORY_DELIMITER)
        .slice(1)
        .map(parseStoryBlock)
        .filter((block): block is ParsedStoryBlock => block !== null);

    if (blocks.length === 0) {
        return err(new ResponseParsingError(`No complete story block in ${response.length} chars of response`));
    }
    return ok(blocks);
};

// --- 3. SCORING ---

export const keywordOverlapRatio = (storyKeywords: Set<string>, content: string): number => {
    if (storyKeywords.size === 0) return 0;
    const messageKeywords = extractKeywords(content);
    let shared = 0;
    for (const word of storyKeywords) {
        if (messageKeywords.has(word)) shared += 1;
    }
    return shared / storyKeywords.size;
};

export const findRelatedMessages = (block: Pick<ParsedStoryBlock, 'headline' | 'summary'>, messages: IMessage[]): IMessage[] => {
    const storyKeywords = extractKeywords(`${block.headline} ${block.summary}`);
    return messages
        .filter(m =>
            keywordOverlapRatio(storyKeywords, m.content) > DESK.OVERLAP_THRESHOLD ||
            engagementScore(m) > DESK.ENGAGEMENT_THRESHOLD
        )
        .sort((a, b) => engagementScore(b) - engagementScore(a))
        .slice(0, DESK.MAX_RELATED_MESSAGES);
};

export const newsworthinessBonus = (newsworthiness: string): number => {
    const text = newsworthiness.toLowerCase();
    if (['high', 'very', 'extremely'].some(w => text.includes(w))) return DESK.SCORE.HIGH_BONUS;
    if (['medium', 'moderate'].some(w => text.includes(w))) return DESK.SCORE.MEDIUM_BONUS;
    return DESK.SCORE.BASE_BONUS;
};

const average = (values: number[]): number =>
    values.length === 0 ? 0 : values.reduce((sum, v) => sum + v, 0) / values.length;

export const calculateStoryScore = (newsworthiness: string, related: IMessage[]): number => {
    let score = newsworthinessBonus(newsworthiness);
    if (related.length > 0) {
        const authors = new Set(related.map(m => m.authorId)).size;
        score += DESK.SCORE.ENGAGEMENT_WEIGHT * average(related.map(engagementScore));
        score += DESK.SCORE.CONTROVERSY_WEIGHT * average(related.map(m => clamp01(m.controversyScore)));
        score += DESK.SCORE.PARTICIPATION_WEIGHT * Math.min(authors / DESK.SCORE.PARTICIPATION_CAP, 1);
    }
    return clamp01(score);
};

export const computeMetrics = (related: IMessage[]): IStoryMetrics => {
    const times = related.map(m => m.timestamp.getTime());
    return {
        relatedMessageCount: related.length,
        totalEngagement: related.reduce((sum, m) => sum + engagementScore(m), 0),
        averageControversy: average(related.map(m => clamp01(m.controversyScore))),
        uniqueParticipants: new Set(related.map(m => m.authorId)).size,
        timeSpanHours: related.length < 2 ? 0 : hoursBetween(new Date(Math.min(...times)), new Date(Math.max(...times))),
    };
};

export const buildCandidate = (block: ParsedStoryBlock, messages: IMessage[], isFallback = false): IStoryCandidate => {
    const related = findRelatedMessages(block, messages);
    return {
        ...block,
        storyScore: calculateStoryScore(block.newsworthiness, related),
        relatedMessageIds: related.map(m => m.id),
        metrics: computeMetrics(related),
        isFallback,
    };
};

// --- 4. FALLBACK ---

/** Used when the response holds no usable block: one story about the most engaging message. */
export const buildFallbackCandidate = (messages: IMessage[]): IStoryCandidate => {
    const top = messages.reduce((best, m) => (engagementScore(m) > engagementScore(best) ? m : best), messages[0]);
    return buildCandidate(
        {
            headline: 'Community Discussion',
            summary: `Active discussion around recent messages with ${top.totalReactions} reactions`,
            newsworthiness: 'High engagement',
            keyPlayers: 'Multiple community members',
        },
        messages,
        true
    );
};

// --- 5. STAGE ---

export class NewsDeskService {
    constructor(
        private readonly provider: ICompletionProvider,
        private readonly prompts: PromptManager
    ) {}

    /**
     * Ranked messages in, scored candidates out (at most maxStories).
     * Provider failures propagate; unparseable responses fall back.
     */
    async identifyStories(messages: IMessage[], persona: Persona, maxStories: number = DESK.DEFAULT_MAX_STORIES): Promise<IStoryCandidate[]> {
        if (messages.length === 0) {
            logger.warn('📰 News desk received no messages');
            return [];
        }

        const evidence = selectEvidence(messages);
        const systemPrompt = await this.prompts.getSystemPrompt('NEWS_DESK', persona, { max_stories: String(maxStories) });

        const response = await this.provider.complete({
            systemPrompt,
            messages: [{
                role: 'user',
                content: `Analyze these ${evidence.length} messages from the last 24 hours and identify exactly ${maxStories} story candidates:\n\n${buildEvidenceTable(evidence)}`,
            }],
            temperature: DESK.TEMPERATURE,
            maxTokens: DESK.MAX_TOKENS,
        });

        const parsed = parseStoriesResponse(response);
        if (!parsed.ok) {
            logger.warn(`📰 ${parsed.error.message}, using fallback candidate`);
            return [buildFallbackCandidate(messages)];
        }

        const candidates = parsed.value.slice(0, maxStories).map(block => buildCandidate(block, messages));
        logger.info(`📰 News desk identified ${candidates.length} story candidates`);
        return candidates;
    }
}
