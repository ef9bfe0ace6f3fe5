import { describe, it, expect, vi, afterEach } from 'vitest';
import { BookingEventBus, eventTypeFor, type BookingEventType } from '../../server/core/bookingEvents';
import { registerBookingAuditLog, toAuditLogEntry, type AuditLogEntry } from '../../server/core/auditLog';
import type { BookingTransitionAudit } from '../../server/core/bookingService/types';

const flush = () => new Promise<void>(resolve => setImmediate(resolve));

const approval: BookingTransitionAudit = {
  bookingId: 7,
  resourceId: 3,
  actorId: 10,
  fromStatus: 'pending',
  toStatus: 'approved',
  at: new Date('2025-03-03T09:30:00.000Z'),
  notes: 'Enjoy the room',
};

describe('Booking Events', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should name events after the status reached', () => {
    expect(eventTypeFor(approval)).toBe('booking_approved');
    expect(eventTypeFor({ ...approval, fromStatus: 'approved', toStatus: 'completed' })).toBe('booking_completed');
    expect(eventTypeFor({ ...approval, fromStatus: 'pending', toStatus: 'cancelled' })).toBe('booking_cancelled');
  });

  it('should call a creation an event of its own even when auto-approved', () => {
    expect(eventTypeFor({ ...approval, fromStatus: null, toStatus: 'approved' })).toBe('booking_created');
    expect(eventTypeFor({ ...approval, fromStatus: null, toStatus: 'pending' })).toBe('booking_created');
  });

  it('should deliver audits to subscribers until they unsubscribe', async () => {
    const bus = new BookingEventBus();
    const received: Array<[number, BookingEventType]> = [];
    const unsubscribe = bus.subscribe((audit, type) => {
      received.push([audit.bookingId, type]);
    });

    bus.publish(approval);
    await flush();
    unsubscribe();
    bus.publish({ ...approval, bookingId: 8 });
    await flush();

    expect(received).toEqual([[7, 'booking_approved']]);
    expect(bus.listenerCount()).toBe(0);
  });

  it('should keep a failing listener away from the publisher and other listeners', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const bus = new BookingEventBus();
    const healthy = vi.fn();
    bus.subscribe(async () => {
      throw new Error('audit table unavailable');
    });
    bus.subscribe(healthy);

    expect(() => bus.publish(approval)).not.toThrow();
    await flush();

    expect(healthy).toHaveBeenCalledWith(approval, 'booking_approved');
    expect(errorSpy).toHaveBeenCalledTimes(1);
    const logged = JSON.parse(String(errorSpy.mock.calls[0][0]));
    expect(logged.message).toBe('[BookingEvents] Listener failed');
    expect(logged.bookingId).toBe(7);
    expect(logged.extra).toEqual({ type: 'booking_approved', errorMessage: 'audit table unavailable' });
  });
});

describe('Audit Log', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should map an audit onto an admin log entry', () => {
    expect(toAuditLogEntry(approval, 'booking_approved')).toEqual({
      actorId: 10,
      action: 'booking_approved',
      targetTable: 'bookings',
      targetId: 7,
      details: {
        resourceId: 3,
        fromStatus: 'pending',
        toStatus: 'approved',
        notes: 'Enjoy the room',
        at: '2025-03-03T09:30:00.000Z',
      },
    });
  });

  it('should write one entry per published audit', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const bus = new BookingEventBus();
    const written: AuditLogEntry[] = [];
    const stop = registerBookingAuditLog({ write: async entry => { written.push(entry); } }, bus);

    bus.publish({ ...approval, fromStatus: null, toStatus: 'pending', notes: null });
    bus.publish(approval);
    await flush();
    stop();

    expect(written.map(entry => entry.action)).toEqual(['booking_created', 'booking_approved']);
    expect(bus.listenerCount()).toBe(0);
  });
});
