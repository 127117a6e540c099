// utils/constants.ts

export const ONE_MINUTE = 60 * 1000;
export const ONE_HOUR = 60 * ONE_MINUTE;

// --- CENTRAL CONFIGURATION ---
export const CONSTANTS = {
  // Message qualification and relevance ranking
  FILTER: {
    MIN_CONTENT_CHARS: 10,
    MIN_MESSAGES: 5,
    MAX_RANKED_MESSAGES: 500,
    RECENCY_WINDOW_HOURS: 24,
    LINK_PREFIXES: ['http', 'www', '<@', '<#'],
    WEIGHTS: {
      ENGAGEMENT: 0.4,
      CONTROVERSY: 0.3,
      RECENCY: 0.3,
    },
  },

  ENGAGEMENT: {
    REACTION_CAP: 50,
    REPLY_CAP: 20,
    REACTION_WEIGHT: 0.6,
    REPLY_WEIGHT: 0.4,
  },

  NEWS_DESK: {
    EVIDENCE_LIMIT: 50,
    CONTROVERSY_RANK_FACTOR: 10,
    DEFAULT_MAX_STORIES: 5,
    CONTENT_PREVIEW_CHARS: 200,
    MAX_RELATED_MESSAGES: 10,
    KEYWORD_MIN_LENGTH: 4,
    OVERLAP_THRESHOLD: 0.2,
    ENGAGEMENT_THRESHOLD: 0.5,
    SCORE: {
      HIGH_BONUS: 0.3,
      MEDIUM_BONUS: 0.2,
      BASE_BONUS: 0.1,
      ENGAGEMENT_WEIGHT: 0.3,
      CONTROVERSY_WEIGHT: 0.2,
      PARTICIPATION_WEIGHT: 0.2,
      PARTICIPATION_CAP: 10,
    },
    TEMPERATURE: 0.7,
    MAX_TOKENS: 2048,
  },

  EDITOR: {
    HEADLINE_PREFIX_CHARS: 20,
    SUMMARY_KEYWORDS: 10,
    FALLBACK_STORY_SCORE: 0.3,
    PRIORITY: {
      STORY_WEIGHT: 0.4,
      ENGAGEMENT_WEIGHT: 0.3,
      ENGAGEMENT_CAP: 5,
      PARTICIPANT_WEIGHT: 0.3,
      PARTICIPANT_CAP: 10,
      HIGH_THRESHOLD: 0.8,
      MEDIUM_THRESHOLD: 0.5,
    },
    TEMPERATURE: 0.6,
    MAX_TOKENS: 2048,
  },

  REPORTER: {
    MAX_QUOTES: 5,
    QUOTE_CHARS: 150,
    MIN_ARTICLE_CHARS: 100,
    MAX_ARTICLE_CHARS: 2000,
    TRUNCATE_AT: 1900,
    TEMPERATURE: 0.8,
    MAX_TOKENS: 1200,
    BREAKING: {
      MESSAGE_LIMIT: 10,
      CONTENT_CHARS: 100,
      WINDOW_HOURS: 2,
      MAX_TOKENS: 300,
    },
  },

  LIFECYCLE: {
    MAX_ATTEMPTS: 3,
    BASE_BACKOFF_MS: 5000,
    RETRY_COOLDOWN_MS: 2 * ONE_HOUR,
    STUCK_AFTER_MS: 2 * ONE_HOUR,
    NOTIFY_MESSAGE_CHARS: 200,
    ERROR_MESSAGE_CHARS: 500,
  },

  NEWSLETTER: {
    WINDOW_HOURS: 24,
    ADDITIONAL_STORIES: 3,
    MENTION_SUMMARY_CHARS: 100,
    MAX_INVOLVED_USERS: 20,
    RECENT_LIST_LIMIT: 30,
    FEED_LIMIT: 5000,
  },

  DELIVERY: {
    MAX_MESSAGE_CHARS: 2000,
  },

  TRENDING: {
    LOOKBACK_HOURS: 24,
    LIMIT: 5,
    PREVIEW_CHARS: 80,
  },

  PROVIDERS: {
    RATE_WINDOW_SECONDS: 60,
  },

  QUEUE: {
    NAME: 'newsletter-queue',
    JOBS: {
      DISPATCH: 'dispatch-newsletters',
      GENERATE: 'generate-newsletter',
      BREAKING: 'breaking-news',
      SWEEP: 'sweep-stuck-newsletters',
    },
  },

  REDIS_KEYS: {
    PROVIDER_REQUESTS: 'provider:requests:',
    PROMPT_PREFIX: 'PROMPT_',
  },

  CACHE: {
    TTL_PROMPT: 300,
  },
} as const;
