// models/messageModel.ts
import mongoose, { Schema, Document, Model } from 'mongoose';
import { IMessage } from '../types';

// `id` belongs to mongoose documents, so the platform id is stored as messageId
export interface MessageRecord extends Omit<IMessage, 'id'> {
  messageId: string;
}

export interface MessageDocument extends MessageRecord, Document {
  createdAt: Date;
  updatedAt: Date;
}

const messageSchema = new Schema<MessageDocument>({
  messageId: { type: String, required: true, unique: true },
  serverId: { type: String, required: true },
  channelId: { type: String, required: true },
  authorId: { type: String, required: true },
  content: { type: String, default: '' },
  timestamp: { type: Date, required: true },

  // Engagement counters are updated by the ingestion side
  totalReactions: { type: Number, default: 0, min: 0 },
  replyCount: { type: Number, default: 0, min: 0 },
  controversyScore: { type: Number, default: 0, min: 0, max: 1 },

  excludedFromAnalysis: { type: Boolean, default: false }
}, {
  timestamps: true
});

// Window queries per server
messageSchema.index({ serverId: 1, timestamp: -1 });
messageSchema.index({ serverId: 1, excludedFromAnalysis: 1, timestamp: -1 });

const Message: Model<MessageDocument> = mongoose.model<MessageDocument>('Message', messageSchema);

export default Message;
