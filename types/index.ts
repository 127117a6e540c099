// types/index.ts

// --- 1. Personas ---
export const PERSONAS = [
  'sassy_reporter',
  'investigative_journalist',
  'gossip_columnist',
  'sports_commentator',
  'weather_anchor',
  'conspiracy_theorist',
] as const;

export type Persona = (typeof PERSONAS)[number];

export const isPersona = (value: string): value is Persona =>
  PERSONAS.some(persona => persona === value);

export interface IPersonaTemplate {
  label: string;
  voice: string;          // system-prompt fragment describing the voice
  articleIntro: string;   // opening line of a template article
  bulletin: string;       // canned breaking-news bulletin
  newsletterIntro: string;
  newsletterConclusion: string;
}

// --- 2. Chat Messages ---
export interface IMessage {
  id: string;
  channelId: string;
  serverId: string;
  authorId: string;
  content: string;
  timestamp: Date;
  totalReactions: number;
  replyCount: number;
  controversyScore: number; // 0..1
  excludedFromAnalysis?: boolean;
}

// --- 3. Server Profile ---
export type ServerStatus = 'active' | 'paused' | 'suspended';

export interface IServerProfile {
  serverId: string;
  serverName: string;
  persona: Persona;
  whitelistedChannels: string[];  // empty = every channel
  blacklistedWords: string[];
  maxMessagesAnalysis: number;
  newsletterEnabled: boolean;
  newsletterChannelId?: string;
  newsletterWebhookUrl?: string;
  breakingNewsEnabled: boolean;
  status: ServerStatus;
}

export interface ITrendingTopic {
  representativeText: string;
  engagementScore: number;
}

// Optional context handed to the editor and reporter prompts
export interface IServerContext {
  serverName?: string;
  persona?: Persona;
  trendingTopics?: ITrendingTopic[];
  breakingNewsEnabled?: boolean;
  channelContext?: string;
}

// --- 4. Pipeline Stage Outputs ---
export interface IStoryMetrics {
  relatedMessageCount: number;
  totalEngagement: number;
  averageControversy: number;
  uniqueParticipants: number;
  timeSpanHours: number;
}

export interface IStoryCandidate {
  headline: string;
  summary: string;
  newsworthiness: string;
  keyPlayers: string;
  storyScore: number;
  relatedMessageIds: string[];
  metrics: IStoryMetrics;
  isFallback: boolean;
}

export type EditorialPriority = 'high' | 'medium' | 'low';

export type SelectionMethod =
  | 'explicit_mention'
  | 'keyword_overlap'
  | 'highest_score'
  | 'single_review'
  | 'fallback';

export interface ISelectedStory extends IStoryCandidate {
  suggestedHeadline: string;
  reportingAngle: string;
  editorialReasoning: string;
  editorialPriority: EditorialPriority;
  rejectedCandidates: number;
  selectionMethod: SelectionMethod;
  editorialReview?: string;
}

export type ComposeMode = 'full' | 'fallback';

export interface IComposedArticle {
  text: string;
  persona: Persona;
  mode: ComposeMode;
}

// --- 5. Newsletter Record ---
export const NEWSLETTER_STATUSES = [
  'pending',
  'generating',
  'generated',
  'delivering',
  'delivered',
  'failed',
  'cancelled',
] as const;

export type NewsletterStatus = (typeof NEWSLETTER_STATUSES)[number];

export type GenerationSource = 'full_pipeline' | 'fallback';

export interface IFeaturedStory {
  storyId: string;
  headline: string;
  summary: string;
  fullContent: string;
  sourceMessageIds: string[];
  primaryChannelId: string;
  involvedUsers: string[];
  controversyScore: number;
  engagementScore: number;
  relevanceScore: number;
  generatedBy: GenerationSource;
  generatedAt: Date;
}

export interface IStoryBrief {
  headline: string;
  summary: string;
  storyScore: number;
}

export interface INewsletter {
  _id?: string;
  serverId: string;
  newsletterDate: string; // YYYY-MM-DD
  status: NewsletterStatus;
  personaUsed?: Persona;

  title: string;
  introduction: string;
  conclusion: string;

  timePeriodStart: Date;
  timePeriodEnd: Date;
  analyzedMessagesCount: number;
  analyzedChannels: string[];

  featuredStory: IFeaturedStory | null;
  additionalStories: IStoryBrief[];
  briefMentions: string[];

  generationStartedAt?: Date;
  generationCompletedAt?: Date;
  deliveryChannelId?: string;
  deliveryMessageId?: string;
  deliveredAt?: Date;
  failedAt?: Date;
  cancelledAt?: Date;

  generationErrors: string[];
  deliveryErrors: string[];
  retryCount: number;
  isFallbackDerived: boolean;

  createdAt?: Date;
  updatedAt?: Date;
}

// --- 6. Completion Requests ---
export type CompletionRole = 'system' | 'user' | 'assistant';

export interface ICompletionMessage {
  role: CompletionRole;
  content: string;
}

export interface ICompletionRequest {
  systemPrompt?: string;
  messages: ICompletionMessage[];
  temperature: number;
  maxTokens: number;
}

// --- 7. Failure Notifications ---
export interface IFailureNotice {
  errorKind: string;
  message: string;
  retryable: boolean;
  attempt: number;
  serverId: string;
  newsletterDate?: string;
}

// --- 8. Prompt Overrides ---
export const PROMPT_TYPES = [
  'NEWS_DESK',
  'EDITOR_CHIEF',
  'EDITOR_REVIEW',
  'STAR_REPORTER',
  'BREAKING_NEWS',
] as const;

export type PromptType = (typeof PROMPT_TYPES)[number];

export interface IAIPrompt {
  type: PromptType;
  text: string;
  version: number;
  active: boolean;
  description?: string;
}
