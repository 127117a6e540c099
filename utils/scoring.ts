// utils/scoring.ts
import { CONSTANTS } from './constants';
import { clamp01 } from './helpers';
import { IMessage } from '../types';

const { REACTION_CAP, REPLY_CAP, REACTION_WEIGHT, REPLY_WEIGHT } = CONSTANTS.ENGAGEMENT;

/** min(reactions/50, 1) * 0.6 + min(replies/20, 1) * 0.4 */
export const engagementScore = (message: Pick<IMessage, 'totalReactions' | 'replyCount'>): number => {
    const reactions = Math.min(Math.max(message.totalReactions, 0) / REACTION_CAP, 1);
    const replies = Math.min(Math.max(message.replyCount, 0) / REPLY_CAP, 1);
    return reactions * REACTION_WEIGHT + replies * REPLY_WEIGHT;
};

/** Linear decay to zero across the recency window. */
export const recencyScore = (timestamp: Date, now: Date): number => {
    const ageHours = (now.getTime() - timestamp.getTime()) / (60 * 60 * 1000);
    return clamp01(1 - ageHours / CONSTANTS.FILTER.RECENCY_WINDOW_HOURS);
};

export const relevanceScore = (message: IMessage, now: Date): number => {
    const { WEIGHTS } = CONSTANTS.FILTER;
    return (
        engagementScore(message) * WEIGHTS.ENGAGEMENT +
        clamp01(message.controversyScore) * WEIGHTS.CONTROVERSY +
        recencyScore(message.timestamp, now) * WEIGHTS.RECENCY
    );
};
