export const BOOKING_STATUSES = [
  'pending',
  'approved',
  'rejected',
  'cancelled',
  'completed'
] as const;

export type BookingStatus = typeof BOOKING_STATUSES[number];

// Statuses that hold a slot on the resource calendar
export const BLOCKING_BOOKING_STATUSES: readonly BookingStatus[] = ['pending', 'approved'];

export const RESOURCE_STATUSES = [
  'draft',
  'published',
  'archived'
] as const;

export type ResourceStatus = typeof RESOURCE_STATUSES[number];

export const THREAD_CONTEXT_TYPES = [
  'resource',
  'booking',
  'general'
] as const;

export type ThreadContextType = typeof THREAD_CONTEXT_TYPES[number];

export const USER_ROLES = ['student', 'staff', 'admin'] as const;
export type UserRole = typeof USER_ROLES[number];

export function isBookingStatus(value: unknown): value is BookingStatus {
  return typeof value === 'string' && (BOOKING_STATUSES as readonly string[]).includes(value);
}

export function isThreadContextType(value: unknown): value is ThreadContextType {
  return typeof value === 'string' && (THREAD_CONTEXT_TYPES as readonly string[]).includes(value);
}
