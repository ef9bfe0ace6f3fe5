import { InvalidTransitionError } from '../errors';
import type { BookingStatus } from '../../../shared/constants/statuses';
import type { BookingTransitionAction } from './types';

interface TransitionRule {
  from: readonly BookingStatus[];
  to: BookingStatus;
}

// rejected, cancelled and completed appear in no `from` list: they are absorbing
export const BOOKING_TRANSITIONS: Record<BookingTransitionAction, TransitionRule> = {
  approve: { from: ['pending'], to: 'approved' },
  reject: { from: ['pending'], to: 'rejected' },
  cancel: { from: ['pending', 'approved'], to: 'cancelled' },
  complete: { from: ['approved'], to: 'completed' },
};

export function targetStatusFor(action: BookingTransitionAction): BookingStatus {
  return BOOKING_TRANSITIONS[action].to;
}

export function isLegalTransition(from: BookingStatus, to: BookingStatus): boolean {
  return Object.values(BOOKING_TRANSITIONS).some(rule => rule.to === to && rule.from.includes(from));
}

export function assertTransition(from: BookingStatus, to: BookingStatus, bookingId?: number): void {
  if (!isLegalTransition(from, to)) {
    const subject = bookingId === undefined ? 'Booking' : `Booking ${bookingId}`;
    throw new InvalidTransitionError(`${subject} cannot move from ${from} to ${to}`);
  }
}
