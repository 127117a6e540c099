// middleware/rateLimiters.ts
import rateLimit from 'express-rate-limit';
import { Request, Response, NextFunction } from 'express';
import config from '../utils/config';
import logger from '../utils/logger';

// In-process window; the admin API is low traffic and usually served by one instance
export const apiLimiter = rateLimit({
  windowMs: config.rateLimit.windowMs,
  limit: config.rateLimit.maxApi,
  standardHeaders: true,
  legacyHeaders: false,
  message: {
    status: 'fail',
    message: 'Too many requests, please try again later.',
  },
  handler: (req: Request, res: Response, _next: NextFunction, options) => {
    logger.warn(`Rate Limit Exceeded: ${req.ip ?? 'unknown-ip'}`);
    res.status(options.statusCode).send(options.message);
  },
});
