import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ApprovalService } from '../../server/core/bookingService/approvalService';
import { SchedulerTracker } from '../../server/core/schedulerTracker';
import { AUTO_COMPLETE_TASK, autoCompleteElapsedBookings } from '../../server/schedulers/bookingAutoCompleteScheduler';
import type { Principal } from '../../shared/models/users';
import { TestClock, at } from '../support/clock';
import { MemoryBookingStore, MemoryResourceDirectory } from '../support/memoryStores';

const SYSTEM_ADMIN: Principal = { id: 1, role: 'admin' };

describe('autoCompleteElapsedBookings', () => {
  let clock: TestClock;
  let bookings: MemoryBookingStore;
  let approvals: ApprovalService;
  let tracker: SchedulerTracker;
  let roomId: number;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});

    clock = new TestClock('2025-03-10T12:00:00.000Z');
    const resources = new MemoryResourceDirectory();
    roomId = resources.add({ ownerId: 10 }).id;
    bookings = MemoryBookingStore.create(clock, resources);
    approvals = new ApprovalService({ bookings, resources, clock, events: { publish: () => {} } });
    tracker = new SchedulerTracker(() => clock.now());
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const book = (start: string, end: string, status: 'pending' | 'approved') =>
    bookings.create(roomId, 20, { start: at(`2025-03-10T${start}:00.000Z`), end: at(`2025-03-10T${end}:00.000Z`) }, status);

  it('should complete approved bookings that have ended and leave the rest', async () => {
    const finished = await book('09:00', '10:00', 'approved');
    const endsNow = await book('11:00', '12:00', 'approved');
    const running = await book('12:00', '13:00', 'approved');
    const neverApproved = await book('08:00', '09:00', 'pending');

    const result = await autoCompleteElapsedBookings(approvals, SYSTEM_ADMIN, tracker);

    expect(result).toEqual({ completed: [finished.id, endsNow.id], skipped: [] });
    const statusOf = async (id: number) => (await bookings.findById(id))?.status;
    expect(await statusOf(finished.id)).toBe('completed');
    expect(await statusOf(endsNow.id)).toBe('completed');
    expect(await statusOf(running.id)).toBe('approved');
    expect(await statusOf(neverApproved.id)).toBe('pending');
  });

  it('should record a successful run', async () => {
    tracker.registerScheduler(AUTO_COMPLETE_TASK, 600000);
    await autoCompleteElapsedBookings(approvals, SYSTEM_ADMIN, tracker);

    const [status] = tracker.getSchedulerStatuses();
    expect(status.taskName).toBe(AUTO_COMPLETE_TASK);
    expect(status.lastResult).toBe('success');
    expect(status.runCount).toBe(1);
    expect(status.lastRunAt).toEqual(at('2025-03-10T12:00:00.000Z'));
    expect(status.nextRunAt).toEqual(at('2025-03-10T12:10:00.000Z'));
  });

  it('should record a failed run without throwing', async () => {
    vi.spyOn(bookings, 'listElapsed').mockRejectedValue(new Error('connection lost to postgres://app:pw@db/rooms'));

    expect(await autoCompleteElapsedBookings(approvals, SYSTEM_ADMIN, tracker)).toBeNull();

    const [status] = tracker.getSchedulerStatuses();
    expect(status.lastResult).toBe('error');
    expect(status.lastError).toBe('connection lost to [REDACTED]');
  });

  it('should show a disabled job as skipped', () => {
    tracker.registerScheduler(AUTO_COMPLETE_TASK, 600000);
    tracker.recordSkipped(AUTO_COMPLETE_TASK);

    expect(tracker.getSchedulerStatuses()[0]).toMatchObject({ lastResult: 'disabled', isEnabled: false, runCount: 0 });
  });
});
