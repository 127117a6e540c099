// utils/config.ts
import dotenv from 'dotenv';
import { z } from 'zod';
import logger from './logger';
import { URL } from 'url';

dotenv.config();

const envSchema = z.object({
  PORT: z.string().transform(Number).default('3001'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Database & Cache
  MONGODB_URI: z.string().url().default('mongodb://127.0.0.1:27017/dispatch-desk'),
  MONGO_POOL_SIZE: z.string().transform(Number).default('10'),

  // Redis - Primary (Cache/Rate Counters)
  REDIS_URL: z.string().optional(),
  // Redis - Queue (Background Jobs) - falls back to REDIS_URL
  REDIS_QUEUE_URL: z.string().optional(),

  // Worker Configuration
  WORKER_CONCURRENCY: z.string().transform(Number).default('5'),

  // Admin API Rate Limiting
  RATE_LIMIT_WINDOW_MS: z.string().transform(Number).default('900000'),
  RATE_LIMIT_MAX_API: z.string().transform(Number).default('150'),

  // Security. Admin routes reject every request while unset.
  ADMIN_SECRET: z.string().min(32, 'Admin secret must be at least 32 chars long').optional(),
  CORS_ORIGINS: z.string().default(''),
  TRUST_PROXY_LVL: z.string().transform(Number).default('1'),

  // Completion Providers
  LLM_PROVIDER_ORDER: z.string().default('groq,gemini'),
  GROQ_BASE_URL: z.string().url().default('https://api.groq.com/openai/v1'),
  GROQ_MODEL: z.string().default('llama-3.3-70b-versatile'),
  GEMINI_BASE_URL: z.string().url().default('https://generativelanguage.googleapis.com/v1beta'),
  GEMINI_MODEL: z.string().default('gemini-2.5-flash'),
  AI_TIMEOUT_MS: z.string().transform(Number).default('60000'),
  PROVIDER_MAX_REQUESTS_PER_MINUTE: z.string().transform(Number).default('30'),

  // Scheduling
  NEWSLETTER_CRON: z.string().default('0 * * * *'),
  STUCK_SWEEP_CRON: z.string().default('*/30 * * * *'),
});

const parseConfig = () => {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    logger.error('❌ Invalid Environment Configuration:');
    result.error.issues.forEach((issue) => {
      logger.error(`   -> ${issue.path.join('.')}: ${issue.message}`);
    });
    process.exit(1);
  }
  return result.data;
};

const env = parseConfig();

const keyListSchema = z.array(z.string().min(1));

// Collects PREFIX_KEYS (JSON list), PREFIX_API_KEY and PREFIX_API_KEY_1..20
export const extractApiKeys = (prefix: string, source: NodeJS.ProcessEnv = process.env): string[] => {
  const keys: string[] = [];

  const jsonKeys = source[`${prefix}_KEYS`];
  if (jsonKeys) {
    try {
      const parsed = keyListSchema.safeParse(JSON.parse(jsonKeys));
      if (parsed.success) return parsed.data;
      logger.warn(`⚠️ ${prefix}_KEYS is not a list of strings, ignoring it.`);
    } catch (e: unknown) {
      logger.warn(`⚠️ ${prefix}_KEYS is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
    }
  }

  const defaultKey = source[`${prefix}_API_KEY`]?.trim();
  if (defaultKey) keys.push(defaultKey);

  for (let i = 1; i <= 20; i++) {
    const key = source[`${prefix}_API_KEY_${i}`]?.trim();
    if (key && !keys.includes(key)) {
      keys.push(key);
    }
  }
  return keys;
};

const getCorsOrigins = (): string[] => {
  const defaults = ['http://localhost:3000'];
  if (env.CORS_ORIGINS) {
    const extras = env.CORS_ORIGINS.split(',').map(s => s.trim()).filter(Boolean);
    defaults.push(...extras);
  }
  return Array.from(new Set(defaults));
};

interface RedisOptions {
  url: string;
  socket?: { tls: true; rejectUnauthorized: boolean };
}

// --- REDIS CONFIG (CACHE) ---
const getRedisConfig = (): RedisOptions | undefined => {
  if (!env.REDIS_URL) return undefined;
  const options: RedisOptions = { url: env.REDIS_URL };
  if (env.REDIS_URL.startsWith('rediss:')) {
    options.socket = { tls: true, rejectUnauthorized: false };
  }
  return options;
};

// --- BULLMQ CONFIG (QUEUE) ---
const getBullMQConfig = () => {
  const targetUrl = env.REDIS_QUEUE_URL || env.REDIS_URL;
  if (!targetUrl) return undefined;
  try {
    const parsed = new URL(targetUrl);
    return {
      host: parsed.hostname,
      port: Number(parsed.port || 6379),
      username: parsed.username || undefined,
      password: parsed.password || undefined,
      tls: targetUrl.startsWith('rediss:') ? { rejectUnauthorized: false } : undefined,
    };
  } catch (e: unknown) {
    logger.error(`❌ Failed to parse Redis URL for BullMQ: ${e instanceof Error ? e.message : String(e)}`);
    return undefined;
  }
};

const providerOrder = env.LLM_PROVIDER_ORDER.split(',')
  .map(s => s.trim().toLowerCase())
  .filter(Boolean);

const config = {
  port: env.PORT,
  env: env.NODE_ENV,
  isProduction: env.NODE_ENV === 'production',
  mongoUri: env.MONGODB_URI,
  mongoPoolSize: env.MONGO_POOL_SIZE,
  redisOptions: getRedisConfig(),
  bullMQConnection: getBullMQConfig(),
  adminSecret: env.ADMIN_SECRET,
  corsOrigins: getCorsOrigins(),
  trustProxyLevel: env.TRUST_PROXY_LVL,

  worker: {
    concurrency: env.WORKER_CONCURRENCY,
  },

  rateLimit: {
    windowMs: env.RATE_LIMIT_WINDOW_MS,
    maxApi: env.RATE_LIMIT_MAX_API,
  },

  ai: {
    providerOrder,
    timeoutMs: env.AI_TIMEOUT_MS,
    maxRequestsPerMinute: env.PROVIDER_MAX_REQUESTS_PER_MINUTE,
    groq: {
      baseUrl: env.GROQ_BASE_URL,
      model: env.GROQ_MODEL,
      keys: extractApiKeys('GROQ'),
    },
    gemini: {
      baseUrl: env.GEMINI_BASE_URL,
      model: env.GEMINI_MODEL,
      keys: extractApiKeys('GEMINI'),
    },
  },

  schedule: {
    newsletterCron: env.NEWSLETTER_CRON,
    stuckSweepCron: env.STUCK_SWEEP_CRON,
  },
};

logger.info('✅ Configuration Validated & Loaded');

export default config;
