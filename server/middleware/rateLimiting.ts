import rateLimit from 'express-rate-limit';
import type { Request, Response } from 'express';
import { getSessionUser } from '../types/session';
import { logger } from '../core/logger';

const getClientKey = (req: Request): string => {
  const userId = getSessionUser(req)?.id;
  if (userId) {
    return `user:${userId}`;
  }
  return req.ip || 'unknown';
};

export const globalRateLimiter = rateLimit({
  windowMs: 60 * 1000,
  limit: 600,
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: getClientKey,
  validate: false,
  handler: (req: Request, res: Response) => {
    logger.warn(`[RateLimit] Global limit exceeded for ${getClientKey(req)} on ${req.path}`);
    res.status(429).json({ error: 'Too many requests. Please slow down.' });
  },
  skip: (req) => req.path === '/healthz' || !req.path.startsWith('/api/'),
});

// Booking requests and message posts; polling reads are not limited here
export const writeRateLimiter = rateLimit({
  windowMs: 60 * 1000,
  limit: 30,
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: getClientKey,
  validate: false,
  handler: (req: Request, res: Response) => {
    logger.warn(`[RateLimit] Write limit exceeded for ${getClientKey(req)} on ${req.path}`);
    res.status(429).json({ error: 'Too many requests. Please wait a moment.' });
  },
  skip: (req) => req.method !== 'POST',
});
