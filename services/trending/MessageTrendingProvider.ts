// services/trending/MessageTrendingProvider.ts
import Message from '../../models/messageModel';
import logger from '../../utils/logger';
import { CONSTANTS, ONE_HOUR } from '../../utils/constants';
import { truncate } from '../../utils/helpers';
import { describeError } from '../../utils/pipelineErrors';
import { ITrendingProvider } from './ITrendingProvider';
import { ITrendingTopic } from '../../types';

const { REACTION_CAP, REPLY_CAP, REACTION_WEIGHT, REPLY_WEIGHT } = CONSTANTS.ENGAGEMENT;

interface TrendingRow {
    content: string;
    engagement: number;
}

/**
 * Highest-engagement messages of the window, computed in the database.
 * Trending is optional context, so any failure yields [].
 */
export class MessageTrendingProvider implements ITrendingProvider {
    constructor(private readonly now: () => Date = () => new Date()) {}

    async getTrendingTopics(serverId: string, windowHours: number, limit: number): Promise<ITrendingTopic[]> {
        const since = new Date(this.now().getTime() - windowHours * ONE_HOUR);

        try {
            const rows = await Message.aggregate<TrendingRow>([
                { $match: { serverId, timestamp: { $gte: since }, excludedFromAnalysis: { $ne: true } } },
                {
                    $project: {
                        _id: 0,
                        content: 1,
                        engagement: {
                            $add: [
                                { $multiply: [REACTION_WEIGHT, { $min: [{ $divide: ['$totalReactions', REACTION_CAP] }, 1] }] },
                                { $multiply: [REPLY_WEIGHT, { $min: [{ $divide: ['$replyCount', REPLY_CAP] }, 1] }] }
                            ]
                        }
                    }
                },
                { $sort: { engagement: -1 } },
                { $limit: limit }
            ]);

            return rows.map(row => ({
                representativeText: truncate(row.content, CONSTANTS.TRENDING.PREVIEW_CHARS),
                engagementScore: row.engagement,
            }));
        } catch (error: unknown) {
            logger.warn(`📈 Trending lookup failed for ${serverId}: ${describeError(error)}`);
            return [];
        }
    }
}
