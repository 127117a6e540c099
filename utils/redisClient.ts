// utils/redisClient.ts
import { createClient } from 'redis';
import logger from './logger';
import config from './config';

type RedisConnection = ReturnType<typeof createClient>;

let client: RedisConnection | null = null;
let connectionPromise: Promise<RedisConnection | null> | null = null;
let isHealthy = false;

const describe = (err: unknown): string => (err instanceof Error ? err.message : String(err));

/**
 * Initialize Redis Connection. Called by dbLoader.
 * Every operation below degrades to a no-op while the client is not ready,
 * so callers fall back to their in-process behaviour.
 */
export const initRedis = async (): Promise<RedisConnection | null> => {
    if (client && (client.isOpen || client.isReady)) {
        return client;
    }

    if (connectionPromise) {
        return connectionPromise;
    }

    connectionPromise = (async () => {
        if (!config.redisOptions) {
            logger.warn('⚠️ Redis URL not set. Prompt caching and shared rate counters will be disabled.');
            return null;
        }

        try {
            const newClient = createClient({
                url: config.redisOptions.url,
                socket: {
                    ...(config.redisOptions.socket || {}),
                    reconnectStrategy: (retries: number) => {
                        if (retries > 20) {
                            logger.error('❌ Redis: Max Retries Reached. Waiting 5s...');
                            return 5000;
                        }
                        return Math.min(retries * 100, 3000);
                    },
                    connectTimeout: 15000,
                    keepAlive: 15000,
                },
            });

            newClient.on('error', (err: Error) => {
                isHealthy = false;
                if (!err.message.includes('ECONNREFUSED') && !err.message.includes('Socket closed')) {
                    logger.warn(`Redis Client Warning: ${err.message}`);
                }
            });

            newClient.on('ready', () => {
                if (!isHealthy) logger.info('✅ Redis Client Ready & Connected');
                isHealthy = true;
            });

            newClient.on('end', () => {
                isHealthy = false;
                logger.warn('Redis Client Disconnected');
            });

            await newClient.connect();
            client = newClient;
            return client;
        } catch (err: unknown) {
            logger.error(`❌ Redis Initialization Failed: ${describe(err)}`);
            client = null;
            isHealthy = false;
            return null;
        } finally {
            connectionPromise = null;
        }
    })();

    return connectionPromise;
};

const redisClient = {
    // --- BASIC OPS ---

    get: async (key: string): Promise<string | null> => {
        if (!client || !isHealthy) return null;
        try {
            return await client.get(key);
        } catch (e: unknown) {
            logger.warn(`Redis Get Error: ${describe(e)}`);
            return null;
        }
    },

    set: async (key: string, value: string, ttlSeconds: number = 900): Promise<void> => {
        if (!client || !isHealthy) return;
        try {
            await client.set(key, value, { EX: ttlSeconds });
        } catch (e: unknown) {
            logger.warn(`Redis Set Error: ${describe(e)}`);
        }
    },

    incr: async (key: string): Promise<number | null> => {
        if (!client || !isHealthy) return null;
        try {
            return await client.incr(key);
        } catch (e: unknown) {
            logger.warn(`Redis Incr Error: ${describe(e)}`);
            return null;
        }
    },

    expire: async (key: string, seconds: number): Promise<boolean> => {
        if (!client || !isHealthy) return false;
        try {
            return await client.expire(key, seconds);
        } catch (e: unknown) {
            logger.warn(`Redis Expire Error: ${describe(e)}`);
            return false;
        }
    },

    ttl: async (key: string): Promise<number | null> => {
        if (!client || !isHealthy) return null;
        try {
            return await client.ttl(key);
        } catch (e: unknown) {
            logger.warn(`Redis TTL Error: ${describe(e)}`);
            return null;
        }
    },

    disconnect: async (): Promise<void> => {
        if (client) {
            try {
                if (client.isOpen) await client.quit();
                logger.info('✅ Redis Connection Closed');
            } catch (e: unknown) {
                logger.error(`Error closing Redis connection: ${describe(e)}`);
            } finally {
                client = null;
                isHealthy = false;
            }
        }
    },

    isReady: () => isHealthy,
};

export default redisClient;
