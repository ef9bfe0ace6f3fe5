import { applyMigrations, setupEmailNormalization } from '../db-init';
import { PgAuditLogWriter, registerBookingAuditLog } from '../core/auditLog';
import type { BookingEventBus } from '../core/bookingEvents';
import { logger } from '../core/logger';
import { getErrorMessage, toError } from '../utils/errorUtils';

async function retryWithBackoff<T>(fn: () => Promise<T>, label: string, maxRetries = 3): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (err: unknown) {
      if (attempt >= maxRetries) throw err;
      const delay = Math.pow(2, attempt) * 1000;
      logger.info(`[Startup] ${label} failed (attempt ${attempt}/${maxRetries}), retrying in ${delay / 1000}s...`);
      await new Promise(resolve => setTimeout(resolve, delay));
    }
  }
}

export interface StartupHealth {
  database: 'ok' | 'failed' | 'pending';
  auditLog: 'ok' | 'pending';
  criticalFailures: string[];
  warnings: string[];
  startedAt: string;
  completedAt?: string;
}

const startupHealth: StartupHealth = {
  database: 'pending',
  auditLog: 'pending',
  criticalFailures: [],
  warnings: [],
  startedAt: new Date().toISOString(),
};

export function getStartupHealth(): StartupHealth {
  return { ...startupHealth };
}

let stopAuditLog: (() => void) | null = null;

export async function runStartupTasks(events: BookingEventBus): Promise<void> {
  logger.info('[Startup] Running database initialization...');

  try {
    await retryWithBackoff(applyMigrations, 'Migrations');
    startupHealth.database = 'ok';
  } catch (err: unknown) {
    logger.error('[Startup] Migrations failed', { error: toError(err) });
    startupHealth.database = 'failed';
    startupHealth.criticalFailures.push(`Migrations: ${getErrorMessage(err)}`);
  }

  try {
    await setupEmailNormalization();
  } catch (err: unknown) {
    logger.warn(`[Startup] Email normalization failed (non-critical): ${getErrorMessage(err)}`);
    startupHealth.warnings.push(`Email normalization: ${getErrorMessage(err)}`);
  }

  if (!stopAuditLog) {
    stopAuditLog = registerBookingAuditLog(new PgAuditLogWriter(), events);
  }
  startupHealth.auditLog = 'ok';

  startupHealth.completedAt = new Date().toISOString();
  logger.info('[Startup] Initialization complete', {
    extra: { criticalFailures: startupHealth.criticalFailures.length, warnings: startupHealth.warnings.length },
  });
}

export function stopStartupSubscriptions(): void {
  stopAuditLog?.();
  stopAuditLog = null;
}
