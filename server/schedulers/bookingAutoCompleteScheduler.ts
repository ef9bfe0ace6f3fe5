import type { Principal } from '../../shared/models/users';
import type { ApprovalService, AutoCompleteResult } from '../core/bookingService';
import { schedulerTracker, type SchedulerTracker } from '../core/schedulerTracker';
import { logger } from '../core/logger';
import { safeErrorDetail, toError } from '../utils/errorUtils';

export const AUTO_COMPLETE_TASK = 'Booking Auto-Complete';
const INITIAL_DELAY_MS = 120000;

export interface AutoCompleteOptions {
  approvals: ApprovalService;
  /** Administrator principal the completions are recorded under */
  actor: Principal;
  intervalMs: number;
  tracker?: SchedulerTracker;
}

export async function autoCompleteElapsedBookings(
  approvals: ApprovalService,
  actor: Principal,
  tracker: SchedulerTracker = schedulerTracker
): Promise<AutoCompleteResult | null> {
  const startedAt = Date.now();
  try {
    const result = await approvals.completeElapsedBookings(actor);
    if (result.completed.length === 0 && result.skipped.length === 0) {
      logger.info('[Booking Auto-Complete] No elapsed approved bookings found');
    } else {
      logger.info(`[Booking Auto-Complete] Completed ${result.completed.length} booking(s), skipped ${result.skipped.length}`, {
        extra: { completed: result.completed, skipped: result.skipped },
      });
    }
    tracker.recordRun(AUTO_COMPLETE_TASK, true, undefined, Date.now() - startedAt);
    return result;
  } catch (error: unknown) {
    logger.error('[Booking Auto-Complete] Error auto-completing bookings', { error: toError(error) });
    tracker.recordRun(AUTO_COMPLETE_TASK, false, safeErrorDetail(error), Date.now() - startedAt);
    return null;
  }
}

let intervalId: NodeJS.Timeout | null = null;
let initialRunId: NodeJS.Timeout | null = null;

export function startBookingAutoCompleteScheduler(options: AutoCompleteOptions): void {
  if (intervalId) {
    logger.info('[Booking Auto-Complete] Scheduler already running');
    return;
  }
  const tracker = options.tracker ?? schedulerTracker;
  const run = () => {
    autoCompleteElapsedBookings(options.approvals, options.actor, tracker).catch((err: unknown) => {
      logger.error('[Booking Auto-Complete] Uncaught error', { error: toError(err) });
    });
  };

  tracker.registerScheduler(AUTO_COMPLETE_TASK, options.intervalMs);
  logger.info(`[Startup] Booking auto-complete scheduler enabled (every ${Math.round(options.intervalMs / 60000)} min)`);

  intervalId = setInterval(run, options.intervalMs);
  initialRunId = setTimeout(run, Math.min(INITIAL_DELAY_MS, options.intervalMs));
}

export function stopBookingAutoCompleteScheduler(): void {
  if (initialRunId) {
    clearTimeout(initialRunId);
    initialRunId = null;
  }
  if (intervalId) {
    clearInterval(intervalId);
    intervalId = null;
    logger.info('[Booking Auto-Complete] Scheduler stopped');
  }
}
