import { BLOCKING_BOOKING_STATUSES } from '../../../shared/constants/statuses';
import type { Principal } from '../../../shared/models/users';
import { systemClock, type Clock } from '../clock';
import { bookingEvents, type BookingEventPublisher } from '../bookingEvents';
import { ConflictError, ForbiddenError, InvalidTransitionError, NotFoundError, isDomainError } from '../errors';
import { logger } from '../logger';
import type { ResourceDirectory } from '../resourceService';
import { getErrorMessage } from '../../utils/errorUtils';
import { canBookResource, canPerformBookingAction, isAdmin } from './bookingAuth';
import { assertTransition, targetStatusFor } from './bookingStateMachine';
import type { BookingStore } from './bookingStore';
import { validateWindow } from './conflictDetection';
import type { Booking, BookingTransitionAction, BookingTransitionAudit, Resource } from './types';

export const AUTO_APPROVED_NOTE = 'Auto-approved';

export interface ApprovalServiceDeps {
  bookings: BookingStore;
  resources: ResourceDirectory;
  clock?: Clock;
  events?: BookingEventPublisher;
}

export interface BookingRequestInput {
  resourceId: number;
  start: Date;
  end: Date;
}

export interface BookingDecision {
  booking: Booking;
  audit: BookingTransitionAudit;
}

export interface AutoCompleteResult {
  completed: number[];
  skipped: number[];
}

/**
 * Owns the booking state machine: admission of new requests and every status
 * change after that. Stores, clock and event publisher are injected.
 */
export class ApprovalService {
  private readonly bookings: BookingStore;
  private readonly resources: ResourceDirectory;
  private readonly clock: Clock;
  private readonly events: BookingEventPublisher;

  constructor(deps: ApprovalServiceDeps) {
    this.bookings = deps.bookings;
    this.resources = deps.resources;
    this.clock = deps.clock ?? systemClock;
    this.events = deps.events ?? bookingEvents;
  }

  /**
   * Admission rule. The overlap query and the insert share one transaction,
   * so two overlapping requests cannot both be admitted.
   */
  async requestBooking(actor: Principal, input: BookingRequestInput): Promise<BookingDecision> {
    const window = validateWindow({ start: input.start, end: input.end });
    const resource = await this.resources.getResource(input.resourceId);
    if (!resource || resource.status === 'archived') {
      throw new NotFoundError('Resource', input.resourceId);
    }
    if (!canBookResource(actor, resource)) {
      throw new ForbiddenError('This resource is not open for booking yet');
    }

    const booking = await this.bookings.transaction(async (tx) => {
      const conflicts = await tx.findOverlapping(resource.id, window, BLOCKING_BOOKING_STATUSES);
      if (conflicts.length > 0) {
        throw new ConflictError(undefined, conflicts.map(c => c.id));
      }
      return resource.requiresApproval
        ? tx.create(resource.id, actor.id, window, 'pending', null)
        : tx.create(resource.id, actor.id, window, 'approved', AUTO_APPROVED_NOTE);
    });

    const audit: BookingTransitionAudit = {
      bookingId: booking.id,
      resourceId: booking.resourceId,
      actorId: actor.id,
      fromStatus: null,
      toStatus: booking.status,
      at: booking.createdAt,
      notes: booking.approvalNotes,
    };
    logger.info(`[ApprovalService] Booking ${booking.id} admitted as ${booking.status}`, {
      bookingId: booking.id,
      resourceId: resource.id,
      actorId: actor.id,
    });
    this.events.publish(audit);
    return { booking, audit };
  }

  approve(actor: Principal, bookingId: number, notes?: string | null): Promise<BookingDecision> {
    return this.transition(actor, bookingId, 'approve', notes);
  }

  reject(actor: Principal, bookingId: number, notes?: string | null): Promise<BookingDecision> {
    return this.transition(actor, bookingId, 'reject', notes);
  }

  cancel(actor: Principal, bookingId: number, notes?: string | null): Promise<BookingDecision> {
    return this.transition(actor, bookingId, 'cancel', notes);
  }

  complete(actor: Principal, bookingId: number, notes?: string | null): Promise<BookingDecision> {
    return this.transition(actor, bookingId, 'complete', notes);
  }

  async getBooking(actor: Principal, bookingId: number): Promise<Booking> {
    const { booking, resource } = await this.loadBooking(this.bookings, bookingId);
    if (!canPerformBookingAction(actor, { booking, resource }, 'view')) {
      throw new ForbiddenError();
    }
    return booking;
  }

  listMyBookings(actor: Principal): Promise<Booking[]> {
    return this.bookings.listByRequester(actor.id);
  }

  async listPendingApprovals(actor: Principal): Promise<Booking[]> {
    if (isAdmin(actor)) {
      return this.bookings.listPending();
    }
    if (actor.role === 'staff') {
      return this.bookings.listPending({ ownerId: actor.id });
    }
    throw new ForbiddenError('Only staff and administrators review bookings');
  }

  async listResourceBookings(actor: Principal, resourceId: number): Promise<Booking[]> {
    const resource = await this.resources.getResource(resourceId);
    if (!resource) {
      throw new NotFoundError('Resource', resourceId);
    }
    if (!isAdmin(actor) && resource.ownerId !== actor.id) {
      throw new ForbiddenError();
    }
    return this.bookings.listByResource(resourceId);
  }

  /**
   * Completes approved bookings whose window has ended, one transition each,
   * so every completion passes the same guards and produces an audit entry.
   */
  async completeElapsedBookings(actor: Principal, limit: number = 100): Promise<AutoCompleteResult> {
    const elapsed = await this.bookings.listElapsed('approved', this.clock.now(), limit);
    const result: AutoCompleteResult = { completed: [], skipped: [] };

    for (const booking of elapsed) {
      try {
        await this.complete(actor, booking.id);
        result.completed.push(booking.id);
      } catch (error: unknown) {
        if (!isDomainError(error)) throw error;
        // another request moved it first, or the actor lost access
        result.skipped.push(booking.id);
        logger.warn(`[ApprovalService] Skipped auto-complete of booking ${booking.id}`, {
          bookingId: booking.id,
          extra: { reason: getErrorMessage(error) },
        });
      }
    }
    return result;
  }

  private async transition(
    actor: Principal,
    bookingId: number,
    action: BookingTransitionAction,
    notes?: string | null
  ): Promise<BookingDecision> {
    const { before, after } = await this.bookings.transaction(async (tx) => {
      const { booking, resource } = await this.loadBooking(tx, bookingId);
      if (!canPerformBookingAction(actor, { booking, resource }, action)) {
        throw new ForbiddenError(`You are not allowed to ${action} this booking`);
      }
      const toStatus = targetStatusFor(action);
      assertTransition(booking.status, toStatus, booking.id);
      if (action === 'complete' && booking.end.getTime() > this.clock.now().getTime()) {
        throw new InvalidTransitionError(`Booking ${booking.id} cannot be completed before its window ends`);
      }
      const updated = await tx.transition(booking.id, toStatus, actor.id, notes);
      return { before: booking, after: updated };
    });

    const audit: BookingTransitionAudit = {
      bookingId: after.id,
      resourceId: after.resourceId,
      actorId: actor.id,
      fromStatus: before.status,
      toStatus: after.status,
      at: after.updatedAt,
      notes: after.approvalNotes,
    };
    logger.info(`[ApprovalService] Booking ${after.id} ${before.status} -> ${after.status}`, {
      bookingId: after.id,
      actorId: actor.id,
    });
    this.events.publish(audit);
    return { booking: after, audit };
  }

  private async loadBooking(store: BookingStore, bookingId: number): Promise<{ booking: Booking; resource: Resource }> {
    const booking = await store.findById(bookingId);
    if (!booking) {
      throw new NotFoundError('Booking', bookingId);
    }
    const resource = await this.resources.getResource(booking.resourceId);
    if (!resource) {
      throw new NotFoundError('Resource', booking.resourceId);
    }
    return { booking, resource };
  }
}
