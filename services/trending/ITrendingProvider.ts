import { ITrendingTopic } from '../../types';

export interface ITrendingProvider {
    getTrendingTopics(serverId: string, windowHours: number, limit: number): Promise<ITrendingTopic[]>;
}
