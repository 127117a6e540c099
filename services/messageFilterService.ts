// services/messageFilterService.ts
import logger from '../utils/logger';
import { CONSTANTS } from '../utils/constants';
import { InsufficientContentError } from '../utils/pipelineErrors';
import { relevanceScore } from '../utils/scoring';
import { IMessage, IServerProfile } from '../types';

export type FilterProfile = Pick<IServerProfile, 'serverId' | 'whitelistedChannels' | 'blacklistedWords' | 'maxMessagesAnalysis'>;

const { MIN_CONTENT_CHARS, MIN_MESSAGES, MAX_RANKED_MESSAGES, LINK_PREFIXES } = CONSTANTS.FILTER;

const isLinkOrMention = (token: string): boolean => LINK_PREFIXES.some(prefix => token.startsWith(prefix));

// "https://x.y <@123>" carries nothing worth reporting on.
export const isLinkOrMentionOnly = (content: string): boolean => {
    const tokens = content.split(/\s+/).filter(Boolean);
    return tokens.length <= 2 && tokens.every(isLinkOrMention);
};

export const isQualifyingMessage = (message: IMessage, profile: FilterProfile): boolean => {
    if (message.excludedFromAnalysis) return false;

    const content = message.content.trim();
    if (content.length < MIN_CONTENT_CHARS) return false;

    const lowered = content.toLowerCase();
    if (isLinkOrMentionOnly(lowered)) return false;

    if (profile.whitelistedChannels.length > 0 && !profile.whitelistedChannels.includes(message.channelId)) {
        return false;
    }

    return !profile.blacklistedWords.some(word => word && lowered.includes(word.toLowerCase()));
};

/**
 * Drops noise and disallowed messages, then orders the rest by relevance.
 * Sort is stable, so equal scores keep input order.
 */
export const filterAndRank = (messages: IMessage[], profile: FilterProfile, now: Date = new Date()): IMessage[] => {
    const qualifying = messages.filter(m => isQualifyingMessage(m, profile));
    const limit = Math.min(profile.maxMessagesAnalysis, MAX_RANKED_MESSAGES);

    const ranked = qualifying
        .map(message => ({ message, score: relevanceScore(message, now) }))
        .sort((a, b) => b.score - a.score)
        .slice(0, limit)
        .map(entry => entry.message);

    // Counted after the per-server cap: that is what the stages would see
    if (ranked.length < MIN_MESSAGES) {
        logger.info(`📭 Server ${profile.serverId}: ${ranked.length}/${messages.length} messages left for analysis, need ${MIN_MESSAGES}`);
        throw new InsufficientContentError(ranked.length, MIN_MESSAGES);
    }

    logger.debug(`🧹 Server ${profile.serverId}: kept ${ranked.length} of ${messages.length} messages`);
    return ranked;
};
