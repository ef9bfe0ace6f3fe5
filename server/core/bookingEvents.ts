import { EventEmitter } from 'events';
import type { BookingStatus } from '../../shared/constants/statuses';
import type { BookingTransitionAudit } from './bookingService/types';
import { getErrorMessage } from '../utils/errorUtils';
import { logger } from './logger';

export type BookingEventType =
  | 'booking_created'
  | 'booking_approved'
  | 'booking_rejected'
  | 'booking_cancelled'
  | 'booking_completed';

const EVENT_FOR_STATUS: Record<BookingStatus, BookingEventType> = {
  pending: 'booking_created',
  approved: 'booking_approved',
  rejected: 'booking_rejected',
  cancelled: 'booking_cancelled',
  completed: 'booking_completed',
};

export function eventTypeFor(audit: BookingTransitionAudit): BookingEventType {
  // an auto-admitted booking is created straight into `approved`
  if (audit.fromStatus === null) return 'booking_created';
  return EVENT_FOR_STATUS[audit.toStatus];
}

export type BookingEventListener = (audit: BookingTransitionAudit, type: BookingEventType) => void | Promise<void>;

export interface BookingEventPublisher {
  publish(audit: BookingTransitionAudit): void;
}

const CHANNEL = 'booking-transition';

export class BookingEventBus implements BookingEventPublisher {
  private readonly emitter = new EventEmitter();

  publish(audit: BookingTransitionAudit): void {
    this.emitter.emit(CHANNEL, audit, eventTypeFor(audit));
  }

  /**
   * Listeners run after the transition has committed. A failing listener is
   * logged and never reaches the caller that made the transition.
   */
  subscribe(listener: BookingEventListener): () => void {
    const handler = (audit: BookingTransitionAudit, type: BookingEventType) => {
      Promise.resolve()
        .then(() => listener(audit, type))
        .catch((error: unknown) => {
          logger.error('[BookingEvents] Listener failed', {
            bookingId: audit.bookingId,
            extra: { type, errorMessage: getErrorMessage(error) },
          });
        });
    };
    this.emitter.on(CHANNEL, handler);
    return () => {
      this.emitter.off(CHANNEL, handler);
    };
  }

  listenerCount(): number {
    return this.emitter.listenerCount(CHANNEL);
  }
}

export const bookingEvents = new BookingEventBus();
