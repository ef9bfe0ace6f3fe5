import type { ThreadContextType } from '../../../shared/constants/statuses';
import type { Principal } from '../../../shared/models/users';
import type { BookingStore } from '../bookingService/bookingStore';
import { isApprover } from '../bookingService/bookingAuth';
import { ForbiddenError, NotFoundError, ValidationError } from '../errors';
import { logger } from '../logger';
import type { ResourceDirectory } from '../resourceService';
import type { MessagingStore } from './messagingStore';
import { compareThreadSummaries } from './ordering';
import {
  NO_CONTEXT_PARTIES,
  collectParticipants,
  isThreadParticipant,
  resolveContextParties,
  type ContextParties
} from './participants';
import type { Message, Thread } from './types';

export const DEFAULT_MESSAGE_MAX_LENGTH = 2000;

export interface MessagingServiceDeps {
  store: MessagingStore;
  resources: ResourceDirectory;
  bookings: Pick<BookingStore, 'findById'>;
  maxMessageLength?: number;
}

export interface StartThreadInput {
  contextType: ThreadContextType;
  contextId: number | null;
  receiverId: number;
  content: string;
}

export interface InboxEntry {
  thread: Thread;
  lastMessage: Message | null;
  messageCount: number;
  hasUnread: boolean;
}

export interface ThreadView {
  thread: Thread;
  messages: Message[];
  participantIds: number[];
}

export class MessagingService {
  private readonly store: MessagingStore;
  private readonly resources: ResourceDirectory;
  private readonly bookings: Pick<BookingStore, 'findById'>;
  private readonly maxMessageLength: number;

  constructor(deps: MessagingServiceDeps) {
    this.store = deps.store;
    this.resources = deps.resources;
    this.bookings = deps.bookings;
    this.maxMessageLength = deps.maxMessageLength ?? DEFAULT_MESSAGE_MAX_LENGTH;
  }

  async createThread(actor: Principal, contextType: ThreadContextType, contextId: number | null): Promise<Thread> {
    await this.authorizeContext(actor, contextType, contextId);
    const thread = await this.store.createThread({ contextType, contextId, createdBy: actor.id });
    logger.info(`[Messaging] Thread ${thread.id} created`, { threadId: thread.id, actorId: actor.id });
    return thread;
  }

  /** Opens a thread with its first message in one transaction. */
  async startThread(actor: Principal, input: StartThreadInput): Promise<{ thread: Thread; message: Message }> {
    const content = this.normalizeContent(input.content);
    if (input.receiverId === actor.id) {
      throw new ValidationError('You cannot start a thread with yourself');
    }
    const parties = await this.authorizeContext(actor, input.contextType, input.contextId);

    if (input.contextType === 'resource' && input.receiverId !== parties.resourceOwnerId) {
      throw new ForbiddenError('Resource conversations are held with the resource owner');
    }
    if (input.contextType === 'booking') {
      const allowed = new Set([parties.resourceOwnerId, parties.bookingRequesterId]);
      if (!allowed.has(input.receiverId)) {
        throw new ForbiddenError('Booking conversations are held between the requester and the resource owner');
      }
    }

    const result = await this.store.transaction(async (tx) => {
      const thread = await tx.createThread({
        contextType: input.contextType,
        contextId: input.contextId,
        createdBy: actor.id,
      });
      const message = await tx.appendMessage({
        threadId: thread.id,
        senderId: actor.id,
        receiverId: input.receiverId,
        content,
      });
      return { thread, message };
    });

    logger.info(`[Messaging] Thread ${result.thread.id} started`, { threadId: result.thread.id, actorId: actor.id });
    return result;
  }

  async postMessage(actor: Principal, threadId: number, receiverId: number, content: string): Promise<Message> {
    const normalized = this.normalizeContent(content);
    if (receiverId === actor.id) {
      throw new ValidationError('You cannot send a message to yourself');
    }
    await this.ensureAccess(actor, threadId);
    return this.store.appendMessage({ threadId, senderId: actor.id, receiverId, content: normalized });
  }

  /** Replies to the other party of the thread's latest message. */
  async reply(actor: Principal, threadId: number, content: string): Promise<Message> {
    const normalized = this.normalizeContent(content);
    await this.ensureAccess(actor, threadId);
    const last = await this.store.getLastMessage(threadId);
    if (!last) {
      throw new ValidationError('This thread has no messages to reply to');
    }
    const receiverId = last.senderId === actor.id ? last.receiverId : last.senderId;
    return this.store.appendMessage({ threadId, senderId: actor.id, receiverId, content: normalized });
  }

  async listMessagesSince(actor: Principal, threadId: number, cutoff: Date): Promise<Message[]> {
    if (Number.isNaN(cutoff.getTime())) {
      throw new ValidationError('Cutoff must be a valid timestamp');
    }
    await this.ensureAccess(actor, threadId);
    return this.store.listMessagesSince(threadId, cutoff);
  }

  async getThreadView(actor: Principal, threadId: number): Promise<ThreadView> {
    const { thread, participants } = await this.ensureAccess(actor, threadId);
    const messages = await this.store.listMessages(threadId);
    return {
      thread,
      messages,
      participantIds: [...participants].sort((a, b) => a - b),
    };
  }

  async listThreadsFor(actor: Principal): Promise<InboxEntry[]> {
    const summaries = await this.store.listThreadSummaries(
      actor.role === 'admin' ? {} : { participantId: actor.id }
    );
    return summaries.sort(compareThreadSummaries).map(summary => ({
      thread: summary.thread,
      lastMessage: summary.lastMessage,
      messageCount: summary.messageCount,
      hasUnread: summary.lastMessage !== null && summary.lastMessage.senderId !== actor.id,
    }));
  }

  private async ensureAccess(actor: Principal, threadId: number): Promise<{ thread: Thread; participants: Set<number> }> {
    const thread = await this.store.getThread(threadId);
    if (!thread) {
      throw new NotFoundError('Thread', threadId);
    }
    const [messageParticipantIds, parties] = await Promise.all([
      this.store.listMessageParticipantIds(threadId),
      resolveContextParties(thread, this.resources, this.bookings),
    ]);
    const participants = collectParticipants(thread, messageParticipantIds, parties);
    if (!isThreadParticipant(actor, participants)) {
      throw new ForbiddenError('You are not a participant in this thread');
    }
    return { thread, participants };
  }

  private async authorizeContext(
    actor: Principal,
    contextType: ThreadContextType,
    contextId: number | null
  ): Promise<ContextParties> {
    if (contextType === 'general') {
      if (contextId !== null) {
        throw new ValidationError('General threads do not take a context id');
      }
      if (actor.role !== 'admin') {
        throw new ForbiddenError('Only administrators can open general threads');
      }
      return NO_CONTEXT_PARTIES;
    }

    if (contextId === null) {
      throw new ValidationError(`A ${contextType} thread needs a context id`);
    }

    if (contextType === 'resource') {
      const resource = await this.resources.getResource(contextId);
      if (!resource) {
        throw new NotFoundError('Resource', contextId);
      }
      return { resourceOwnerId: resource.ownerId, bookingRequesterId: null };
    }

    const booking = await this.bookings.findById(contextId);
    if (!booking) {
      throw new NotFoundError('Booking', contextId);
    }
    const resource = await this.resources.getResource(booking.resourceId);
    if (!resource) {
      throw new NotFoundError('Resource', booking.resourceId);
    }
    if (booking.requesterId !== actor.id && !isApprover(actor, resource)) {
      throw new ForbiddenError('Only the requester and the resource owner can discuss this booking');
    }
    return { resourceOwnerId: resource.ownerId, bookingRequesterId: booking.requesterId };
  }

  private normalizeContent(content: string): string {
    const trimmed = content.trim();
    if (trimmed.length === 0) {
      throw new ValidationError('Message cannot be empty');
    }
    if (trimmed.length > this.maxMessageLength) {
      throw new ValidationError(`Message cannot be longer than ${this.maxMessageLength} characters`);
    }
    return trimmed;
  }
}
