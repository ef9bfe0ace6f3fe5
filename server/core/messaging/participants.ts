import type { Principal } from '../../../shared/models/users';
import type { BookingStore } from '../bookingService/bookingStore';
import type { ResourceDirectory } from '../resourceService';
import type { Thread } from './types';

/** The people a thread's context brings into the conversation. */
export interface ContextParties {
  resourceOwnerId: number | null;
  bookingRequesterId: number | null;
}

export const NO_CONTEXT_PARTIES: ContextParties = { resourceOwnerId: null, bookingRequesterId: null };

export async function resolveContextParties(
  thread: Pick<Thread, 'contextType' | 'contextId'>,
  resources: ResourceDirectory,
  bookings: Pick<BookingStore, 'findById'>
): Promise<ContextParties> {
  if (thread.contextId === null) return NO_CONTEXT_PARTIES;

  if (thread.contextType === 'resource') {
    const resource = await resources.getResource(thread.contextId);
    return { resourceOwnerId: resource?.ownerId ?? null, bookingRequesterId: null };
  }

  if (thread.contextType === 'booking') {
    const booking = await bookings.findById(thread.contextId);
    if (!booking) return NO_CONTEXT_PARTIES;
    const resource = await resources.getResource(booking.resourceId);
    return { resourceOwnerId: resource?.ownerId ?? null, bookingRequesterId: booking.requesterId };
  }

  return NO_CONTEXT_PARTIES;
}

/**
 * Participants: every prior sender and receiver, the thread creator, the
 * resource owner (resource and booking threads) and the booking requester.
 * Administrators are not listed; they pass isThreadParticipant by role.
 */
export function collectParticipants(
  thread: Pick<Thread, 'createdBy'>,
  messageParticipantIds: Iterable<number>,
  parties: ContextParties
): Set<number> {
  const participants = new Set<number>(messageParticipantIds);
  participants.add(thread.createdBy);
  if (parties.resourceOwnerId !== null) participants.add(parties.resourceOwnerId);
  if (parties.bookingRequesterId !== null) participants.add(parties.bookingRequesterId);
  return participants;
}

export function isThreadParticipant(actor: Principal, participants: ReadonlySet<number>): boolean {
  return actor.role === 'admin' || participants.has(actor.id);
}
