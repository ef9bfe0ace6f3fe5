import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { UserRole } from '../../shared/constants/statuses';
import type { Principal } from '../../shared/models/users';
import { getSessionUser, toPrincipal } from '../types/session';
import { ConflictError, isDomainError } from './errors';
import { createErrorResponse, logAndRespond, logger } from './logger';

export const isAuthenticated: RequestHandler = (req, res, next) => {
  if (!getSessionUser(req)) {
    res.status(401).json({ message: 'Unauthorized' });
    return;
  }
  next();
};

export function requireRole(...roles: UserRole[]): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const user = getSessionUser(req);
    if (!user) {
      res.status(401).json({ message: 'Unauthorized' });
      return;
    }
    if (!roles.includes(user.role)) {
      res.status(403).json({ message: `Forbidden: ${roles.join(' or ')} access required` });
      return;
    }
    next();
  };
}

export const isStaffOrAdmin = requireRole('staff', 'admin');

/** Principal of a request that already passed isAuthenticated. */
export function requirePrincipal(req: Request): Principal {
  const user = getSessionUser(req);
  if (!user) {
    throw new Error('[Middleware] requirePrincipal called on an unauthenticated request');
  }
  return toPrincipal(user);
}

/**
 * Domain errors go back with their own status and code; anything else is
 * logged and answered with a generic 500.
 */
export function sendDomainError(req: Request, res: Response, error: unknown, fallbackMessage = 'Request failed'): void {
  if (!isDomainError(error)) {
    logAndRespond(req, res, 500, fallbackMessage, error);
    return;
  }

  logger.warn(`[API] ${error.name}: ${error.message}`, {
    requestId: req.requestId,
    method: req.method,
    path: req.path,
    userId: getSessionUser(req)?.id,
  });

  const body = createErrorResponse(req, error.message, error.code);
  if (error instanceof ConflictError && error.conflictingBookingIds.length > 0) {
    res.status(error.statusCode).json({ ...body, conflictingBookingIds: error.conflictingBookingIds });
    return;
  }
  res.status(error.statusCode).json(body);
}
