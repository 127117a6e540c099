// services/storage/MongoMessageFeed.ts
import mongoose from 'mongoose';
import Message, { MessageRecord } from '../../models/messageModel';
import { CONSTANTS } from '../../utils/constants';
import { withPersistence } from './persistence';
import { IMessageFeed } from './IStores';
import { IMessage } from '../../types';

type MessageLean = MessageRecord & { _id: mongoose.Types.ObjectId };

export const toMessage = ({ messageId, serverId, channelId, authorId, content, timestamp, totalReactions, replyCount, controversyScore, excludedFromAnalysis }: MessageLean): IMessage => ({
    id: messageId,
    serverId,
    channelId,
    authorId,
    content,
    timestamp,
    totalReactions,
    replyCount,
    controversyScore,
    excludedFromAnalysis,
});

export class MongoMessageFeed implements IMessageFeed {
    constructor(private readonly limit: number = CONSTANTS.NEWSLETTER.FEED_LIMIT) {}

    async getMessages(serverId: string, since: Date, until: Date): Promise<IMessage[]> {
        return withPersistence(`Loading messages for ${serverId}`, async () => {
            const docs = await Message.find({
                serverId,
                timestamp: { $gte: since, $lte: until },
                excludedFromAnalysis: { $ne: true }
            })
                .sort({ timestamp: -1 })
                .limit(this.limit)
                .lean<MessageLean[]>();
            return docs.map(toMessage);
        });
    }
}
