import type { Principal } from '../../../shared/models/users';
import type { Booking, BookingAction, Resource } from './types';

/**
 * Booking authorization predicate. Every transition entry point goes through
 * canPerformBookingAction; nothing else inspects roles for bookings.
 */

export function isAdmin(actor: Principal): boolean {
  return actor.role === 'admin';
}

// Approver = the staff principal owning the resource, or an admin
export function isApprover(actor: Principal, resource: Pick<Resource, 'ownerId'>): boolean {
  return isAdmin(actor) || resource.ownerId === actor.id;
}

export function canPerformBookingAction(
  actor: Principal,
  target: { booking: Pick<Booking, 'requesterId'>; resource: Pick<Resource, 'ownerId'> },
  action: BookingAction
): boolean {
  const approver = isApprover(actor, target.resource);
  switch (action) {
    case 'approve':
    case 'reject':
    case 'complete':
      return approver;
    case 'cancel':
    case 'view':
      return approver || target.booking.requesterId === actor.id;
  }
}

export function canBookResource(actor: Principal, resource: Pick<Resource, 'ownerId' | 'status'>): boolean {
  if (resource.status === 'archived') return false;
  if (resource.status === 'draft') return isApprover(actor, resource);
  return true;
}
