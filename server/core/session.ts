import session from 'express-session';
import connectPg from 'connect-pg-simple';
import type { RequestHandler } from 'express';
import { getConfig } from './config';
import { pool } from './db';
import { logger } from './logger';

const SESSION_TTL_MS = 30 * 24 * 60 * 60 * 1000;

/**
 * Reads the session the sign-in layer established. This service never writes
 * `req.session.user` itself.
 */
export function getSession(): RequestHandler {
  const config = getConfig();

  const cookie = {
    httpOnly: true,
    secure: config.isProduction,
    sameSite: 'lax' as const,
    maxAge: SESSION_TTL_MS,
  };

  if (!config.sessionSecret) {
    logger.warn('[Session] SESSION_SECRET is missing - using development fallback');
  }
  const secret = config.sessionSecret ?? `dev-only-fallback-secret-${Date.now()}`;

  if (!config.databaseUrl) {
    logger.info('[Session] Using MemoryStore');
    return session({ secret, resave: false, saveUninitialized: false, cookie });
  }

  const PgStore = connectPg(session);
  const store = new PgStore({
    pool,
    createTableIfMissing: true,
    ttl: SESSION_TTL_MS / 1000,
    tableName: 'sessions',
    errorLog: (err: Error) => {
      logger.error('[Session Store] Error', { error: err });
    },
  });

  logger.info('[Session] Using Postgres session store');
  return session({ secret, store, resave: false, saveUninitialized: false, cookie });
}
