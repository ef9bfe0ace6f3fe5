import type { Express } from 'express';
import { writeRateLimiter } from '../middleware/rateLimiting';
import { createBookingRouter } from '../routes/bookings';
import { createThreadRouter } from '../routes/threads';
import type { ApprovalService } from '../core/bookingService';
import type { MessagingService } from '../core/messaging';

export interface RouteServices {
  approvals: ApprovalService;
  messaging: MessagingService;
}

export function registerRoutes(app: Express, services: RouteServices): void {
  app.use('/api/bookings', writeRateLimiter);
  app.use('/api/threads', writeRateLimiter);
  app.use(createBookingRouter(services.approvals));
  app.use(createThreadRouter(services.messaging));
}
