import { Request, Response, NextFunction } from 'express';
import crypto from 'crypto';
import { getSessionUser } from '../types/session';
import { getErrorCode, getErrorDetail, getErrorProperty } from '../utils/errorUtils';

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

export function generateRequestId(): string {
  return crypto.randomBytes(8).toString('hex');
}

export function requestIdMiddleware(req: Request, res: Response, next: NextFunction) {
  req.requestId = generateRequestId();
  res.setHeader('X-Request-Id', req.requestId);
  next();
}

export interface LogContext {
  requestId?: string;
  method?: string;
  path?: string;
  userId?: number;
  params?: Record<string, unknown>;
  query?: Record<string, unknown>;
  duration?: number;
  statusCode?: number;
  error?: Error | string;
  stack?: string;
  extra?: Record<string, unknown>;
  bookingId?: number;
  resourceId?: number;
  threadId?: number;
  actorId?: number;
  dbErrorCode?: string;
  dbErrorDetail?: string;
  dbErrorConstraint?: string;
  [key: string]: unknown;
}

function formatTimestamp(): string {
  return new Date().toISOString();
}

const SENSITIVE_KEYS = ['password', 'token', 'secret', 'authorization', 'cookie', 'apikey', 'api_key'];

export function sanitize(obj: Record<string, unknown> | undefined): Record<string, unknown> | undefined {
  if (!obj) return undefined;
  const sanitized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (SENSITIVE_KEYS.some(sk => key.toLowerCase().includes(sk))) {
      sanitized[key] = '[REDACTED]';
    } else {
      sanitized[key] = value;
    }
  }
  return sanitized;
}

export const logger = {
  info(message: string, context?: LogContext) {
    const log = {
      level: 'INFO',
      timestamp: formatTimestamp(),
      message,
      ...context,
      params: sanitize(context?.params),
      query: sanitize(context?.query),
    };
    console.log(JSON.stringify(log));
  },

  warn(message: string, context?: LogContext) {
    const log = {
      level: 'WARN',
      timestamp: formatTimestamp(),
      message,
      ...context,
      params: sanitize(context?.params),
      query: sanitize(context?.query),
    };
    console.warn(JSON.stringify(log));
  },

  error(message: string, context?: LogContext) {
    const errorMsg = context?.error instanceof Error
      ? context.error.message
      : context?.error;
    const stack = context?.error instanceof Error
      ? context.error.stack
      : context?.stack;

    const log = {
      level: 'ERROR',
      timestamp: formatTimestamp(),
      message,
      ...context,
      error: errorMsg,
      stack,
      params: sanitize(context?.params),
      query: sanitize(context?.query),
    };
    console.error(JSON.stringify(log));
  },
};

export function logRequest(req: Request, res: Response, next: NextFunction) {
  const start = Date.now();

  res.on('finish', () => {
    const duration = Date.now() - start;
    const context = {
      requestId: req.requestId,
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      duration,
      userId: getSessionUser(req)?.id,
    };
    const message = `${req.method} ${req.path}`;

    if (res.statusCode >= 400) {
      logger.warn(message, context);
    } else {
      logger.info(message, context);
    }
  });

  next();
}

export interface ApiErrorResponse {
  error: string;
  code?: string;
  requestId?: string;
}

export function createErrorResponse(
  req: Request,
  message: string,
  code?: string
): ApiErrorResponse {
  return {
    error: message,
    code,
    requestId: req.requestId,
  };
}

export function logAndRespond(
  req: Request,
  res: Response,
  statusCode: number,
  message: string,
  error?: unknown,
  code?: string
) {
  const err = error instanceof Error ? error : new Error(String(error));
  const constraint = getErrorProperty(error, 'constraint');

  logger.error(`[API Error] ${message}`, {
    requestId: req.requestId,
    method: req.method,
    path: req.path,
    params: req.params,
    query: req.query,
    error: err,
    dbErrorCode: getErrorCode(error),
    dbErrorDetail: getErrorDetail(error),
    dbErrorConstraint: typeof constraint === 'string' ? constraint : undefined,
    userId: getSessionUser(req)?.id,
  });

  res.status(statusCode).json(createErrorResponse(req, message, code));
}
