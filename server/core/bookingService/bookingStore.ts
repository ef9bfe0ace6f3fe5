import { and, asc, desc, eq, gt, inArray, lt, lte, ne } from 'drizzle-orm';
import { db, type Executor } from '../../db';
import { bookings, resources, type BookingRow } from '../../../shared/schema';
import { isBookingStatus, type BookingStatus } from '../../../shared/constants/statuses';
import { systemClock, type Clock } from '../clock';
import { InvalidTransitionError, NotFoundError, translateStorageError } from '../errors';
import { logger } from '../logger';
import { withTransactionRetry } from '../retry';
import { assertTransition } from './bookingStateMachine';
import { validateWindow } from './conflictDetection';
import type { Booking, TimeWindow } from './types';

/**
 * Persistence capability for bookings. The approval engine only talks to this
 * interface, so tests can hand it an in-memory implementation.
 */
export interface BookingStore {
  /**
   * Runs `work` against a store bound to one transaction. Check-then-insert
   * sequences must run inside it.
   */
  transaction<T>(work: (tx: BookingStore) => Promise<T>): Promise<T>;

  create(
    resourceId: number,
    requesterId: number,
    window: TimeWindow,
    initialStatus: BookingStatus,
    notes?: string | null
  ): Promise<Booking>;

  findById(bookingId: number): Promise<Booking | null>;

  findOverlapping(
    resourceId: number,
    window: TimeWindow,
    blockingStatuses: readonly BookingStatus[],
    excludeBookingId?: number
  ): Promise<Booking[]>;

  /** Compare-and-set on the current status; `notes` left undefined keeps the old notes. */
  transition(
    bookingId: number,
    newStatus: BookingStatus,
    actorId: number,
    notes?: string | null
  ): Promise<Booking>;

  listByRequester(requesterId: number): Promise<Booking[]>;
  listByResource(resourceId: number): Promise<Booking[]>;
  listPending(filter?: { ownerId?: number }): Promise<Booking[]>;
  listElapsed(status: BookingStatus, endedBy: Date, limit: number): Promise<Booking[]>;
}

export function toBooking(row: BookingRow): Booking {
  if (!isBookingStatus(row.status)) {
    throw new Error(`[BookingStore] Booking ${row.id} has unknown status "${row.status}"`);
  }
  return {
    id: row.id,
    resourceId: row.resourceId,
    requesterId: row.requesterId,
    start: row.startAt,
    end: row.endAt,
    status: row.status,
    approvalNotes: row.approvalNotes,
    reviewedBy: row.reviewedBy,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

export class PgBookingStore implements BookingStore {
  private constructor(
    private readonly executor: Executor,
    private readonly clock: Clock,
    private readonly inTransaction: boolean
  ) {}

  static create(database: Executor = db, clock: Clock = systemClock): PgBookingStore {
    return new PgBookingStore(database, clock, false);
  }

  async transaction<T>(work: (tx: BookingStore) => Promise<T>): Promise<T> {
    if (this.inTransaction) {
      return work(this);
    }
    try {
      return await withTransactionRetry(
        () => this.executor.transaction(
          async (tx) => work(new PgBookingStore(tx, this.clock, true)),
          { isolationLevel: 'serializable' }
        ),
        { label: 'Booking transaction' }
      );
    } catch (error: unknown) {
      throw translateStorageError(error);
    }
  }

  async create(
    resourceId: number,
    requesterId: number,
    window: TimeWindow,
    initialStatus: BookingStatus,
    notes: string | null = null
  ): Promise<Booking> {
    const { start, end } = validateWindow(window);
    const now = this.clock.now();
    try {
      const [row] = await this.executor.insert(bookings).values({
        resourceId,
        requesterId,
        startAt: start,
        endAt: end,
        status: initialStatus,
        approvalNotes: notes,
        createdAt: now,
        updatedAt: now,
      }).returning();
      return toBooking(row);
    } catch (error: unknown) {
      throw translateStorageError(error);
    }
  }

  async findById(bookingId: number): Promise<Booking | null> {
    const [row] = await this.executor.select().from(bookings).where(eq(bookings.id, bookingId));
    return row ? toBooking(row) : null;
  }

  async findOverlapping(
    resourceId: number,
    window: TimeWindow,
    blockingStatuses: readonly BookingStatus[],
    excludeBookingId?: number
  ): Promise<Booking[]> {
    if (blockingStatuses.length === 0) return [];
    const rows = await this.executor.select().from(bookings).where(and(
      eq(bookings.resourceId, resourceId),
      inArray(bookings.status, [...blockingStatuses]),
      lt(bookings.startAt, window.end),
      gt(bookings.endAt, window.start),
      excludeBookingId !== undefined ? ne(bookings.id, excludeBookingId) : undefined
    )).orderBy(asc(bookings.startAt), asc(bookings.id));
    return rows.map(toBooking);
  }

  async transition(
    bookingId: number,
    newStatus: BookingStatus,
    actorId: number,
    notes?: string | null
  ): Promise<Booking> {
    const current = await this.findById(bookingId);
    if (!current) {
      throw new NotFoundError('Booking', bookingId);
    }
    assertTransition(current.status, newStatus, bookingId);

    const [row] = await this.executor.update(bookings)
      .set({
        status: newStatus,
        approvalNotes: notes === undefined ? current.approvalNotes : notes,
        reviewedBy: actorId,
        updatedAt: this.clock.now(),
      })
      .where(and(eq(bookings.id, bookingId), eq(bookings.status, current.status)))
      .returning();

    if (!row) {
      const latest = await this.findById(bookingId);
      logger.warn('[BookingStore] Lost status race', {
        bookingId,
        actorId,
        extra: { expected: current.status, actual: latest?.status, requested: newStatus },
      });
      throw new InvalidTransitionError(
        `Booking ${bookingId} was changed to ${latest?.status ?? 'an unknown status'} by another request`
      );
    }
    return toBooking(row);
  }

  async listByRequester(requesterId: number): Promise<Booking[]> {
    const rows = await this.executor.select().from(bookings)
      .where(eq(bookings.requesterId, requesterId))
      .orderBy(desc(bookings.startAt), desc(bookings.id));
    return rows.map(toBooking);
  }

  async listByResource(resourceId: number): Promise<Booking[]> {
    const rows = await this.executor.select().from(bookings)
      .where(eq(bookings.resourceId, resourceId))
      .orderBy(desc(bookings.startAt), desc(bookings.id));
    return rows.map(toBooking);
  }

  async listPending(filter: { ownerId?: number } = {}): Promise<Booking[]> {
    const rows = await this.executor.select({ booking: bookings }).from(bookings)
      .innerJoin(resources, eq(resources.id, bookings.resourceId))
      .where(and(
        eq(bookings.status, 'pending'),
        filter.ownerId !== undefined ? eq(resources.ownerId, filter.ownerId) : undefined
      ))
      .orderBy(asc(bookings.createdAt), asc(bookings.id));
    return rows.map(row => toBooking(row.booking));
  }

  async listElapsed(status: BookingStatus, endedBy: Date, limit: number): Promise<Booking[]> {
    const rows = await this.executor.select().from(bookings)
      .where(and(eq(bookings.status, status), lte(bookings.endAt, endedBy)))
      .orderBy(asc(bookings.endAt), asc(bookings.id))
      .limit(limit);
    return rows.map(toBooking);
  }
}
