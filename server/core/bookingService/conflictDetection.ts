import { InvalidWindowError } from '../errors';
import type { BookingStatus } from '../../../shared/constants/statuses';
import type { Booking, TimeWindow } from './types';
import type { BookingStore } from './bookingStore';

function isValidDate(value: Date): boolean {
  return value instanceof Date && !Number.isNaN(value.getTime());
}

export function validateWindow(window: TimeWindow): TimeWindow {
  if (!isValidDate(window.start) || !isValidDate(window.end)) {
    throw new InvalidWindowError('Booking start and end must be valid timestamps');
  }
  if (window.end.getTime() <= window.start.getTime()) {
    throw new InvalidWindowError();
  }
  return window;
}

/**
 * Half-open interval intersection: [a.start, a.end) and [b.start, b.end)
 * overlap iff a.start < b.end and b.start < a.end. Adjacent windows do not.
 */
export function windowsOverlap(a: TimeWindow, b: TimeWindow): boolean {
  return a.start.getTime() < b.end.getTime() && b.start.getTime() < a.end.getTime();
}

export function filterOverlapping(
  candidates: Iterable<Booking>,
  resourceId: number,
  window: TimeWindow,
  blockingStatuses: readonly BookingStatus[],
  excludeBookingId?: number
): Booking[] {
  const matches: Booking[] = [];
  for (const booking of candidates) {
    if (booking.resourceId !== resourceId) continue;
    if (booking.id === excludeBookingId) continue;
    if (!blockingStatuses.includes(booking.status)) continue;
    if (windowsOverlap(booking, window)) {
      matches.push(booking);
    }
  }
  return matches.sort((a, b) => a.start.getTime() - b.start.getTime() || a.id - b.id);
}

export interface AvailabilityResult {
  available: boolean;
  conflicts: Booking[];
}

export async function checkResourceAvailability(
  store: Pick<BookingStore, 'findOverlapping'>,
  resourceId: number,
  window: TimeWindow,
  blockingStatuses: readonly BookingStatus[],
  excludeBookingId?: number
): Promise<AvailabilityResult> {
  const conflicts = await store.findOverlapping(resourceId, validateWindow(window), blockingStatuses, excludeBookingId);
  return {
    available: conflicts.length === 0,
    conflicts,
  };
}
