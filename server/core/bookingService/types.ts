import type { BookingStatus, ResourceStatus } from '../../../shared/constants/statuses';

export interface TimeWindow {
  start: Date;
  end: Date;
}

export interface Booking {
  id: number;
  resourceId: number;
  requesterId: number;
  start: Date;
  end: Date;
  status: BookingStatus;
  approvalNotes: string | null;
  reviewedBy: number | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface Resource {
  id: number;
  ownerId: number;
  title: string;
  requiresApproval: boolean;
  status: ResourceStatus;
}

export type BookingTransitionAction = 'approve' | 'reject' | 'cancel' | 'complete';
export type BookingAction = BookingTransitionAction | 'view';

/**
 * Everything an audit collaborator needs to record a status change.
 * `fromStatus` is null for the creation of a booking.
 */
export interface BookingTransitionAudit {
  bookingId: number;
  resourceId: number;
  actorId: number;
  fromStatus: BookingStatus | null;
  toStatus: BookingStatus;
  at: Date;
  notes: string | null;
}
