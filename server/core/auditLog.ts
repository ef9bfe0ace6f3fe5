import { db, type Executor } from '../db';
import { adminLogs } from '../../shared/schema';
import type { BookingTransitionAudit } from './bookingService/types';
import { bookingEvents, type BookingEventBus, type BookingEventType } from './bookingEvents';
import { logger } from './logger';

export interface AuditLogWriter {
  write(entry: AuditLogEntry): Promise<void>;
}

export interface AuditLogEntry {
  actorId: number;
  action: BookingEventType;
  targetTable: 'bookings';
  targetId: number;
  details: {
    resourceId: number;
    fromStatus: string | null;
    toStatus: string;
    notes: string | null;
    at: string;
  };
}

export function toAuditLogEntry(audit: BookingTransitionAudit, action: BookingEventType): AuditLogEntry {
  return {
    actorId: audit.actorId,
    action,
    targetTable: 'bookings',
    targetId: audit.bookingId,
    details: {
      resourceId: audit.resourceId,
      fromStatus: audit.fromStatus,
      toStatus: audit.toStatus,
      notes: audit.notes,
      at: audit.at.toISOString(),
    },
  };
}

export class PgAuditLogWriter implements AuditLogWriter {
  constructor(private readonly executor: Executor = db) {}

  async write(entry: AuditLogEntry): Promise<void> {
    await this.executor.insert(adminLogs).values({
      actorId: entry.actorId,
      action: entry.action,
      targetTable: entry.targetTable,
      targetId: entry.targetId,
      details: entry.details,
    });
  }
}

export function registerBookingAuditLog(
  writer: AuditLogWriter = new PgAuditLogWriter(),
  bus: BookingEventBus = bookingEvents
): () => void {
  logger.info('[AuditLog] Recording booking transitions to admin_logs');
  return bus.subscribe(async (audit, type) => {
    await writer.write(toAuditLogEntry(audit, type));
  });
}
