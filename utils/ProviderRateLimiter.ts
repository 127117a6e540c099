// utils/ProviderRateLimiter.ts
import redisClient from './redisClient';
import logger from './logger';
import { CONSTANTS } from './constants';
import { QuotaExceededError } from './pipelineErrors';

export interface CounterStore {
    isReady(): boolean;
    incr(key: string): Promise<number | null>;
    expire(key: string, seconds: number): Promise<boolean>;
    // Seconds left, -1 when the key has no expiry, null when unknown
    ttl(key: string): Promise<number | null>;
}

interface LocalWindow {
    startedAt: number;
    count: number;
}

/**
 * Rolling request counter per completion provider.
 * Shared through Redis INCR/EXPIRE when Redis is up, per process otherwise.
 * Exceeding the window budget raises QuotaExceededError so the router moves on.
 */
export class ProviderRateLimiter {
    private readonly local = new Map<string, LocalWindow>();

    constructor(
        private readonly maxRequests: number,
        private readonly windowSeconds: number = CONSTANTS.PROVIDERS.RATE_WINDOW_SECONDS,
        private readonly store: CounterStore = redisClient,
        private readonly now: () => number = Date.now
    ) {}

    async acquire(provider: string): Promise<void> {
        const count = await this.increment(provider);
        if (count > this.maxRequests) {
            logger.warn(`⏳ ${provider} request budget spent (${count}/${this.maxRequests} in ${this.windowSeconds}s)`);
            throw new QuotaExceededError(provider, `Local request budget of ${this.maxRequests} per ${this.windowSeconds}s exceeded`);
        }
    }

    private async increment(provider: string): Promise<number> {
        if (this.store.isReady()) {
            const key = `${CONSTANTS.REDIS_KEYS.PROVIDER_REQUESTS}${provider}`;
            const shared = await this.store.incr(key);
            if (shared !== null && (await this.hasExpiry(key, shared))) return shared;
        }
        return this.incrementLocal(provider);
    }

    /**
     * A shared key without a TTL would never reset. The expiry is set on the first
     * request of a window and checked again once the budget is spent.
     */
    private async hasExpiry(key: string, count: number): Promise<boolean> {
        if (count === 1) return this.armExpiry(key);
        if (count <= this.maxRequests) return true;

        const ttl = await this.store.ttl(key);
        if (ttl !== null && ttl >= 0) return true;
        return this.armExpiry(key);
    }

    private async armExpiry(key: string): Promise<boolean> {
        const armed = await this.store.expire(key, this.windowSeconds);
        if (!armed) logger.warn(`⚠️ Could not set expiry on ${key}, counting in process`);
        return armed;
    }

    // Synchronous read-modify-write, so concurrent callers in one process never lose a count.
    private incrementLocal(provider: string): number {
        const now = this.now();
        const current = this.local.get(provider);
        if (!current || now - current.startedAt >= this.windowSeconds * 1000) {
            this.local.set(provider, { startedAt: now, count: 1 });
            return 1;
        }
        current.count += 1;
        return current.count;
    }
}
