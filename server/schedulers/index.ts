import type { ApprovalService } from '../core/bookingService';
import type { AppConfig } from '../core/config';
import { logger } from '../core/logger';
import { schedulerTracker } from '../core/schedulerTracker';
import {
  AUTO_COMPLETE_TASK,
  startBookingAutoCompleteScheduler,
  stopBookingAutoCompleteScheduler
} from './bookingAutoCompleteScheduler';

export function initSchedulers(approvals: ApprovalService, config: AppConfig): void {
  if (config.systemAdminId === undefined) {
    schedulerTracker.registerScheduler(AUTO_COMPLETE_TASK, config.autoCompleteIntervalMs);
    schedulerTracker.recordSkipped(AUTO_COMPLETE_TASK);
    logger.warn('[Startup] SYSTEM_ADMIN_ID is not set - booking auto-complete scheduler disabled');
    return;
  }

  startBookingAutoCompleteScheduler({
    approvals,
    actor: { id: config.systemAdminId, role: 'admin' },
    intervalMs: config.autoCompleteIntervalMs,
  });
}

export function stopSchedulers(): void {
  stopBookingAutoCompleteScheduler();
}
