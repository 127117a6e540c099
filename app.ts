// app.ts
import express, { Request, Response, NextFunction } from 'express';
import mongoose from 'mongoose';
import cors from 'cors';
import helmet from 'helmet';

import config from './utils/config';
import logger from './utils/logger';
import redisClient from './utils/redisClient';
import { errorHandler } from './middleware/errorMiddleware';
import { apiLimiter } from './middleware/rateLimiters';
import { createApiRouter } from './routes/index';
import { NewsletterService } from './services/newsletterService';

export const createApp = (newsletters: NewsletterService) => {
    const app = express();

    // --- 1. Trust Proxy ---
    // Must be set BEFORE rate limiters or logging that relies on IPs
    app.set('trust proxy', config.trustProxyLevel);

    // --- 2. Request Logging ---
    app.use((req: Request, _res: Response, next: NextFunction) => {
        if (req.url !== '/health') {
            logger.http(`${req.method} ${req.url}`);
        }
        next();
    });

    // --- 3. Security Middleware ---
    app.disable('x-powered-by');
    app.use(helmet());
    app.use(cors({
        origin: config.corsOrigins,
        methods: ['GET', 'POST', 'OPTIONS'],
        allowedHeaders: ['Content-Type', 'Authorization', 'X-Admin-Key'],
    }));
    app.use(express.json({ limit: '50kb' }));

    // --- 4. System Routes ---
    app.get('/health', (_req: Request, res: Response) => {
        const mongoStatus = mongoose.connection.readyState === 1 ? 'UP' : 'DOWN';
        const redisStatus = redisClient.isReady() ? 'UP' : 'DOWN';

        // Redis is optional; only Mongo decides readiness
        res.status(mongoStatus === 'UP' ? 200 : 503).json({
            status: mongoStatus === 'UP' ? 'OK' : 'DEGRADED',
            mongo: mongoStatus,
            redis: redisStatus
        });
    });

    // --- 5. API ---
    app.use('/api/v1/', apiLimiter);
    app.use('/api/v1', createApiRouter(newsletters));

    // --- 6. Error Handling ---
    app.use(errorHandler);

    return app;
};
