// models/newsletterModel.ts
import mongoose, { Schema, Document, Model } from 'mongoose';
import { IFeaturedStory, INewsletter, IStoryBrief, NEWSLETTER_STATUSES, PERSONAS } from '../types';

export type NewsletterRecord = Omit<INewsletter, '_id'>;

export interface NewsletterDocument extends NewsletterRecord, Document {
  createdAt: Date;
  updatedAt: Date;
}

const featuredStorySchema = new Schema<IFeaturedStory>({
  storyId: { type: String, required: true },
  headline: { type: String, required: true },
  summary: { type: String, default: '' },
  fullContent: { type: String, required: true },
  sourceMessageIds: { type: [String], default: [] },
  primaryChannelId: { type: String, default: '' },
  involvedUsers: { type: [String], default: [] },
  controversyScore: { type: Number, min: 0, max: 1, default: 0 },
  engagementScore: { type: Number, min: 0, max: 1, default: 0 },
  relevanceScore: { type: Number, min: 0, max: 1, default: 0 },
  generatedBy: { type: String, enum: ['full_pipeline', 'fallback'], required: true },
  generatedAt: { type: Date, default: Date.now }
}, { _id: false });

const storyBriefSchema = new Schema<IStoryBrief>({
  headline: { type: String, required: true },
  summary: { type: String, default: '' },
  storyScore: { type: Number, min: 0, max: 1, default: 0 }
}, { _id: false });

const newsletterSchema = new Schema<NewsletterDocument>({
  serverId: { type: String, required: true },
  newsletterDate: { type: String, required: true, match: /^\d{4}-\d{2}-\d{2}$/ },
  status: {
    type: String,
    enum: [...NEWSLETTER_STATUSES],
    default: 'pending',
    index: true
  },
  personaUsed: { type: String, enum: [...PERSONAS] },

  // Content
  title: { type: String, required: true },
  introduction: { type: String, default: '' },
  conclusion: { type: String, default: '' },
  featuredStory: { type: featuredStorySchema, default: null },
  additionalStories: {
    type: [storyBriefSchema],
    default: [],
    validate: {
      validator: (v: IStoryBrief[]) => v.length <= 3,
      message: 'At most 3 additional stories'
    }
  },
  briefMentions: { type: [String], default: [] },

  // Window
  timePeriodStart: { type: Date, required: true },
  timePeriodEnd: { type: Date, required: true },
  analyzedMessagesCount: { type: Number, default: 0 },
  analyzedChannels: { type: [String], default: [] },

  // Lifecycle
  generationStartedAt: Date,
  generationCompletedAt: Date,
  deliveryChannelId: String,
  deliveryMessageId: String,
  deliveredAt: Date,
  failedAt: Date,
  cancelledAt: Date,

  generationErrors: { type: [String], default: [] },
  deliveryErrors: { type: [String], default: [] },
  retryCount: { type: Number, default: 0 },
  isFallbackDerived: { type: Boolean, default: false }
}, {
  timestamps: true
});

// One live newsletter per server and date; cancelled ones free the slot
newsletterSchema.index(
  { serverId: 1, newsletterDate: 1 },
  {
    unique: true,
    partialFilterExpression: { status: { $in: NEWSLETTER_STATUSES.filter(s => s !== 'cancelled') } }
  }
);
newsletterSchema.index({ serverId: 1, createdAt: -1 });
newsletterSchema.index({ status: 1, updatedAt: 1 });

const Newsletter: Model<NewsletterDocument> = mongoose.model<NewsletterDocument>('Newsletter', newsletterSchema);

export default Newsletter;
