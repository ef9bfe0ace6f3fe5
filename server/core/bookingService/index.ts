/**
 * Booking service: admission, approval state machine and conflict detection.
 */
export {
  ApprovalService,
  AUTO_APPROVED_NOTE,
  type ApprovalServiceDeps,
  type BookingRequestInput,
  type BookingDecision,
  type AutoCompleteResult
} from './approvalService';

export {
  PgBookingStore,
  toBooking,
  type BookingStore
} from './bookingStore';

export {
  validateWindow,
  windowsOverlap,
  filterOverlapping,
  checkResourceAvailability,
  type AvailabilityResult
} from './conflictDetection';

export {
  BOOKING_TRANSITIONS,
  assertTransition,
  isLegalTransition,
  targetStatusFor
} from './bookingStateMachine';

export {
  canPerformBookingAction,
  canBookResource,
  isApprover,
  isAdmin
} from './bookingAuth';

export type {
  Booking,
  Resource,
  TimeWindow,
  BookingAction,
  BookingTransitionAction,
  BookingTransitionAudit
} from './types';
