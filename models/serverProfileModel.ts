// models/serverProfileModel.ts
import mongoose, { Schema, Document, Model } from 'mongoose';
import { IServerProfile, PERSONAS } from '../types';

export interface ServerProfileDocument extends IServerProfile, Document {
  createdAt: Date;
  updatedAt: Date;
}

const serverProfileSchema = new Schema<ServerProfileDocument>({
  serverId: { type: String, required: true, unique: true, index: true },
  serverName: { type: String, required: true, trim: true },
  persona: {
    type: String,
    enum: [...PERSONAS],
    default: 'sassy_reporter'
  },

  // Content rules
  whitelistedChannels: { type: [String], default: [] }, // empty = every channel
  blacklistedWords: { type: [String], default: [] },
  maxMessagesAnalysis: { type: Number, default: 1000, min: 1 },

  // Features
  newsletterEnabled: { type: Boolean, default: true },
  newsletterChannelId: { type: String },
  newsletterWebhookUrl: { type: String },
  breakingNewsEnabled: { type: Boolean, default: false },

  status: {
    type: String,
    enum: ['active', 'paused', 'suspended'],
    default: 'active',
    index: true
  }
}, {
  timestamps: true
});

const ServerProfile: Model<ServerProfileDocument> = mongoose.model<ServerProfileDocument>('ServerProfile', serverProfileSchema);

export default ServerProfile;
