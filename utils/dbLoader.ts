// utils/dbLoader.ts
import mongoose from 'mongoose';
import config from './config';
import logger from './logger';
import { sleep } from './helpers';
import { describeError } from './pipelineErrors';
import { initRedis, default as redisClient } from './redisClient';

/**
 * Opens MongoDB (required) and Redis (optional) together.
 * Mongo is retried with exponential backoff; Redis failures only disable caching and shared counters.
 */
class DbLoader {
    private isConnected = false;
    private readonly MAX_RETRIES = 10;
    private readonly BASE_DELAY_MS = 1000;
    private readonly MAX_DELAY_MS = 30000;

    public async connect(): Promise<void> {
        if (this.isConnected) {
            logger.info('ℹ️ Database connections already active.');
            return;
        }

        logger.info('🚀 Initializing storage...');

        const redisPromise = initRedis().catch((err: unknown) => {
            logger.warn(`⚠️ Redis initialization failed: ${describeError(err)}. Running without prompt cache and shared rate counters.`);
            return null;
        });

        await Promise.all([this.connectMongo(), redisPromise]);

        this.isConnected = true;
        logger.info('✨ Storage ready');
    }

    private async connectMongo(): Promise<void> {
        mongoose.connection.removeAllListeners('error');
        mongoose.connection.removeAllListeners('disconnected');
        mongoose.connection.on('error', (err: Error) => logger.error(`🔥 MongoDB Error: ${err.message}`));
        mongoose.connection.on('disconnected', () => logger.warn('⚠️ MongoDB Disconnected'));

        for (let attempt = 1; attempt <= this.MAX_RETRIES; attempt++) {
            try {
                await mongoose.connect(config.mongoUri, {
                    maxPoolSize: config.mongoPoolSize,
                    minPoolSize: 2,
                    serverSelectionTimeoutMS: 5000,
                    socketTimeoutMS: 45000,
                });
                logger.info('✅ MongoDB Connected');
                return;
            } catch (err: unknown) {
                if (attempt === this.MAX_RETRIES) {
                    logger.error(`❌ Could not connect to MongoDB after ${this.MAX_RETRIES} attempts: ${describeError(err)}`);
                    throw err;
                }

                // 2s, 4s, 8s ... capped at 30s
                const delay = Math.min(this.BASE_DELAY_MS * 2 ** attempt, this.MAX_DELAY_MS);
                logger.error(`⚠️ MongoDB connection failed (attempt ${attempt}/${this.MAX_RETRIES}), retrying in ${delay / 1000}s: ${describeError(err)}`);
                await sleep(delay);
            }
        }
    }

    public async disconnect(): Promise<void> {
        if (!this.isConnected) return;

        logger.info('🛑 Closing storage connections...');
        await Promise.all([redisClient.disconnect(), mongoose.disconnect()]);
        this.isConnected = false;
        logger.info('✅ Storage closed.');
    }
}

export default new DbLoader();
