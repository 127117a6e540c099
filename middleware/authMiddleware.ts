// middleware/authMiddleware.ts
import { Request, Response, NextFunction } from 'express';
import { timingSafeEqual } from 'crypto';
import logger from '../utils/logger';
import config from '../utils/config';
import AppError from '../utils/AppError';

const safeEqual = (a: string, b: string): boolean => {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  return left.length === right.length && timingSafeEqual(left, right);
};

export const readAdminKey = (adminHeader: string | undefined, authorization: string | undefined): string | undefined => {
  if (adminHeader) return adminHeader;
  return authorization?.startsWith('Bearer ') ? authorization.slice('Bearer '.length) : undefined;
};

// null when the key opens the admin routes
export const checkAdminKey = (key: string | undefined, secret: string | undefined): AppError | null => {
  if (!secret) return new AppError('Admin API disabled: ADMIN_SECRET is not configured', 503, 'ADMIN_DISABLED');
  if (!key || !safeEqual(key, secret)) return new AppError('Unauthorized: invalid admin key', 401, 'AUTH_INVALID_KEY');
  return null;
};

// --- Admin Secret Gate ---
// Every admin route requires X-Admin-Key (or a Bearer token) equal to ADMIN_SECRET.
// With no secret configured the routes are closed.
export const requireAdminSecret = (secret: string | undefined = config.adminSecret) =>
  (req: Request, res: Response, next: NextFunction): void => {
    const failure = checkAdminKey(readAdminKey(req.header('x-admin-key'), req.header('authorization')), secret);
    if (failure) {
      if (failure.statusCode === 401) {
        logger.warn(`🚫 Unauthorized admin request: ${req.method} ${req.originalUrl} [IP: ${req.ip}]`);
      }
      return next(failure);
    }

    next();
  };
