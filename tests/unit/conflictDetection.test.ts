import { describe, it, expect } from 'vitest';
import {
  checkResourceAvailability,
  filterOverlapping,
  validateWindow,
  windowsOverlap
} from '../../server/core/bookingService/conflictDetection';
import type { Booking } from '../../server/core/bookingService/types';
import { BLOCKING_BOOKING_STATUSES } from '../../shared/constants/statuses';
import { InvalidWindowError } from '../../server/core/errors';

const t = (hhmm: string) => new Date(`2025-03-10T${hhmm}:00.000Z`);

function booking(overrides: Partial<Booking> & Pick<Booking, 'id'>): Booking {
  return {
    resourceId: 1,
    requesterId: 20,
    start: t('10:00'),
    end: t('11:00'),
    status: 'pending',
    approvalNotes: null,
    reviewedBy: null,
    createdAt: t('08:00'),
    updatedAt: t('08:00'),
    ...overrides,
  };
}

describe('Conflict Detection - windowsOverlap', () => {
  it('should detect a partial overlap', () => {
    expect(windowsOverlap({ start: t('10:00'), end: t('11:00') }, { start: t('10:30'), end: t('11:30') })).toBe(true);
  });

  it('should detect containment in both directions', () => {
    const outer = { start: t('09:00'), end: t('12:00') };
    const inner = { start: t('10:00'), end: t('11:00') };
    expect(windowsOverlap(outer, inner)).toBe(true);
    expect(windowsOverlap(inner, outer)).toBe(true);
  });

  it('should treat windows as half-open so adjacent ones do not overlap', () => {
    expect(windowsOverlap({ start: t('10:00'), end: t('11:00') }, { start: t('11:00'), end: t('12:00') })).toBe(false);
    expect(windowsOverlap({ start: t('11:00'), end: t('12:00') }, { start: t('10:00'), end: t('11:00') })).toBe(false);
  });

  it('should not flag disjoint windows', () => {
    expect(windowsOverlap({ start: t('08:00'), end: t('09:00') }, { start: t('10:00'), end: t('11:00') })).toBe(false);
  });
});

describe('Conflict Detection - validateWindow', () => {
  it('should return a valid window unchanged', () => {
    const window = { start: t('10:00'), end: t('10:01') };
    expect(validateWindow(window)).toBe(window);
  });

  it('should reject zero-length and inverted windows', () => {
    expect(() => validateWindow({ start: t('10:00'), end: t('10:00') })).toThrow(InvalidWindowError);
    expect(() => validateWindow({ start: t('11:00'), end: t('10:00') })).toThrow('Booking end time must be after its start time');
  });

  it('should reject unparseable dates', () => {
    expect(() => validateWindow({ start: new Date('nope'), end: t('10:00') })).toThrow(
      'Booking start and end must be valid timestamps'
    );
  });
});

describe('Conflict Detection - filterOverlapping', () => {
  const candidates = [
    booking({ id: 3, start: t('10:30'), end: t('11:30') }),
    booking({ id: 1, start: t('09:30'), end: t('10:15'), status: 'approved' }),
    booking({ id: 2, start: t('10:00'), end: t('11:00'), status: 'rejected' }),
    booking({ id: 4, start: t('10:00'), end: t('11:00'), resourceId: 2 }),
    booking({ id: 5, start: t('11:00'), end: t('12:00') }),
  ];

  it('should keep blocking overlaps on the same resource sorted by start', () => {
    const found = filterOverlapping(candidates, 1, { start: t('10:00'), end: t('11:00') }, BLOCKING_BOOKING_STATUSES);
    expect(found.map(b => b.id)).toEqual([1, 3]);
  });

  it('should skip the excluded booking', () => {
    const found = filterOverlapping(candidates, 1, { start: t('10:00'), end: t('11:00') }, BLOCKING_BOOKING_STATUSES, 1);
    expect(found.map(b => b.id)).toEqual([3]);
  });

  it('should match nothing when no status blocks', () => {
    expect(filterOverlapping(candidates, 1, { start: t('10:00'), end: t('11:00') }, [])).toEqual([]);
  });
});

describe('Conflict Detection - checkResourceAvailability', () => {
  it('should report conflicts from the store', async () => {
    const existing = booking({ id: 7 });
    const store = { findOverlapping: async () => [existing] };
    const result = await checkResourceAvailability(store, 1, { start: t('10:00'), end: t('11:00') }, BLOCKING_BOOKING_STATUSES);
    expect(result).toEqual({ available: false, conflicts: [existing] });
  });

  it('should validate the window before asking the store', async () => {
    const store = { findOverlapping: async () => [] };
    await expect(
      checkResourceAvailability(store, 1, { start: t('11:00'), end: t('10:00') }, BLOCKING_BOOKING_STATUSES)
    ).rejects.toBeInstanceOf(InvalidWindowError);
  });
});
