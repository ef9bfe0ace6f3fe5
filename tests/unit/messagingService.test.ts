import { describe, it, expect, beforeEach } from 'vitest';
import { MessagingService } from '../../server/core/messaging/messagingService';
import { ForbiddenError, NotFoundError, ValidationError } from '../../server/core/errors';
import type { Principal } from '../../shared/models/users';
import { TestClock, at } from '../support/clock';
import { MemoryBookingStore, MemoryMessagingStore, MemoryResourceDirectory } from '../support/memoryStores';

const ADMIN: Principal = { id: 1, role: 'admin' };
const OWNER: Principal = { id: 10, role: 'staff' };
const OTHER_STAFF: Principal = { id: 11, role: 'staff' };
const STUDENT: Principal = { id: 20, role: 'student' };
const OTHER_STUDENT: Principal = { id: 21, role: 'student' };

describe('MessagingService', () => {
  let clock: TestClock;
  let store: MemoryMessagingStore;
  let service: MessagingService;
  let roomId: number;
  let bookingId: number;

  beforeEach(async () => {
    clock = new TestClock('2025-03-03T09:00:00.000Z');
    const resources = new MemoryResourceDirectory();
    roomId = resources.add({ ownerId: OWNER.id }).id;
    const bookings = MemoryBookingStore.create(clock, resources);
    bookingId = (await bookings.create(roomId, STUDENT.id, {
      start: at('2025-03-10T10:00:00.000Z'),
      end: at('2025-03-10T11:00:00.000Z'),
    }, 'pending')).id;
    store = MemoryMessagingStore.create(clock, {
      context: { resources, bookings },
      users: [ADMIN, OWNER, OTHER_STAFF, STUDENT, OTHER_STUDENT].map(user => user.id),
    });
    service = new MessagingService({ store, resources, bookings, maxMessageLength: 2000 });
  });

  const startWithOwner = (content = 'Is the projector in this room working?') =>
    service.startThread(STUDENT, { contextType: 'resource', contextId: roomId, receiverId: OWNER.id, content });

  describe('startThread', () => {
    it('should create the thread and its first message together', async () => {
      const { thread, message } = await startWithOwner('  Is the projector working?  ');

      expect(thread).toEqual({
        id: thread.id,
        contextType: 'resource',
        contextId: roomId,
        createdBy: STUDENT.id,
        createdAt: at('2025-03-03T09:00:00.000Z'),
      });
      expect(message.content).toBe('Is the projector working?');
      expect(message.senderId).toBe(STUDENT.id);
      expect(message.receiverId).toBe(OWNER.id);
      expect(store.threadCount).toBe(1);
    });

    it('should refuse a thread with yourself', async () => {
      await expect(service.startThread(OWNER, {
        contextType: 'resource', contextId: roomId, receiverId: OWNER.id, content: 'Note to self',
      })).rejects.toBeInstanceOf(ValidationError);
    });

    it('should route resource conversations to the owner only', async () => {
      await expect(service.startThread(STUDENT, {
        contextType: 'resource', contextId: roomId, receiverId: OTHER_STAFF.id, content: 'Hello',
      })).rejects.toBeInstanceOf(ForbiddenError);
      expect(store.threadCount).toBe(0);
    });

    it('should keep booking conversations between requester and owner', async () => {
      const fromOwner = await service.startThread(OWNER, {
        contextType: 'booking', contextId: bookingId, receiverId: STUDENT.id, content: 'Please confirm attendance',
      });
      expect(fromOwner.message.receiverId).toBe(STUDENT.id);

      await expect(service.startThread(OTHER_STUDENT, {
        contextType: 'booking', contextId: bookingId, receiverId: OWNER.id, content: 'Can I join?',
      })).rejects.toBeInstanceOf(ForbiddenError);
      await expect(service.startThread(STUDENT, {
        contextType: 'booking', contextId: bookingId, receiverId: OTHER_STUDENT.id, content: 'Join me',
      })).rejects.toBeInstanceOf(ForbiddenError);
    });

    it('should validate content before writing anything', async () => {
      await expect(startWithOwner('   ')).rejects.toThrow('Message cannot be empty');
      await expect(startWithOwner('x'.repeat(2001))).rejects.toThrow('Message cannot be longer than 2000 characters');
      expect(store.threadCount).toBe(0);
    });
  });

  describe('createThread', () => {
    it('should require a context id for resource and booking threads', async () => {
      await expect(service.createThread(STUDENT, 'resource', null)).rejects.toBeInstanceOf(ValidationError);
      await expect(service.createThread(STUDENT, 'booking', null)).rejects.toBeInstanceOf(ValidationError);
    });

    it('should reject a context id on general threads', async () => {
      await expect(service.createThread(ADMIN, 'general', 5)).rejects.toBeInstanceOf(ValidationError);
    });

    it('should keep general threads to administrators', async () => {
      await expect(service.createThread(STUDENT, 'general', null)).rejects.toBeInstanceOf(ForbiddenError);
      const thread = await service.createThread(ADMIN, 'general', null);
      expect(thread.contextId).toBeNull();
    });

    it('should require the context to exist', async () => {
      await expect(service.createThread(STUDENT, 'resource', 999)).rejects.toThrow('Resource 999 not found');
      await expect(service.createThread(STUDENT, 'booking', 999)).rejects.toThrow('Booking 999 not found');
    });

    it('should keep booking threads to the booking parties', async () => {
      await expect(service.createThread(OTHER_STUDENT, 'booking', bookingId)).rejects.toBeInstanceOf(ForbiddenError);
      const thread = await service.createThread(OWNER, 'booking', bookingId);
      expect(thread.createdBy).toBe(OWNER.id);
    });
  });

  describe('postMessage', () => {
    it('should accept posts from participants only', async () => {
      const { thread } = await startWithOwner();

      await expect(service.postMessage(OTHER_STUDENT, thread.id, OWNER.id, 'Me too')).rejects.toBeInstanceOf(ForbiddenError);
      const reply = await service.postMessage(OWNER, thread.id, STUDENT.id, 'Yes, it was fixed on Monday');
      expect(reply.senderId).toBe(OWNER.id);
    });

    it('should count the resource owner as a participant before any message', async () => {
      const thread = await service.createThread(STUDENT, 'resource', roomId);
      const message = await service.postMessage(OWNER, thread.id, STUDENT.id, 'How can I help?');
      expect(message.threadId).toBe(thread.id);
    });

    it('should count the booking requester as a participant of a thread the owner opened', async () => {
      const thread = await service.createThread(OWNER, 'booking', bookingId);
      const message = await service.postMessage(STUDENT, thread.id, OWNER.id, 'Thanks for the heads-up');
      expect(message.senderId).toBe(STUDENT.id);
    });

    it('should let an administrator post anywhere', async () => {
      const { thread } = await startWithOwner();
      const message = await service.postMessage(ADMIN, thread.id, STUDENT.id, 'Moderator note');
      expect(message.senderId).toBe(ADMIN.id);
    });

    it('should report a missing thread', async () => {
      await expect(service.postMessage(STUDENT, 404, OWNER.id, 'Hello?')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should refuse a message addressed to its sender', async () => {
      const { thread } = await startWithOwner();
      await expect(service.postMessage(STUDENT, thread.id, STUDENT.id, 'Note to self'))
        .rejects.toThrow('You cannot send a message to yourself');
      expect(store.messageCount).toBe(1);
    });

    it('should report an unknown receiver as not found', async () => {
      const { thread } = await startWithOwner();
      await expect(service.postMessage(STUDENT, thread.id, 999999, 'Hello?')).rejects.toThrow('User 999999 not found');
      expect(store.messageCount).toBe(1);
    });

    it('should accept content of exactly the maximum length', async () => {
      const { thread } = await startWithOwner();
      const message = await service.postMessage(OWNER, thread.id, STUDENT.id, 'y'.repeat(2000));
      expect(message.content).toHaveLength(2000);
    });
  });

  describe('reply', () => {
    it('should address the other party of the last message', async () => {
      const { thread } = await startWithOwner();

      const fromOwner = await service.reply(OWNER, thread.id, 'It works');
      expect(fromOwner.receiverId).toBe(STUDENT.id);

      const fromStudent = await service.reply(STUDENT, thread.id, 'Great, thanks');
      expect(fromStudent.receiverId).toBe(OWNER.id);
    });

    it('should refuse to reply in a thread without messages', async () => {
      const thread = await service.createThread(STUDENT, 'resource', roomId);
      await expect(service.reply(OWNER, thread.id, 'Hi')).rejects.toThrow('This thread has no messages to reply to');
    });
  });

  describe('listMessagesSince', () => {
    it('should return only messages after the cutoff, in order, on every call', async () => {
      const { thread, message: first } = await startWithOwner();
      clock.advance(1000);
      const second = await service.postMessage(OWNER, thread.id, STUDENT.id, 'Second');
      clock.advance(1000);
      const third = await service.postMessage(STUDENT, thread.id, OWNER.id, 'Third');

      const once = await service.listMessagesSince(STUDENT, thread.id, first.timestamp);
      const twice = await service.listMessagesSince(STUDENT, thread.id, first.timestamp);
      expect(once.map(m => m.id)).toEqual([second.id, third.id]);
      expect(twice).toEqual(once);

      expect(await service.listMessagesSince(STUDENT, thread.id, third.timestamp)).toEqual([]);
    });

    it('should give messages posted in the same millisecond distinct increasing timestamps', async () => {
      const { thread, message: first } = await startWithOwner();
      const second = await service.postMessage(OWNER, thread.id, STUDENT.id, 'Same instant');
      const third = await service.postMessage(OWNER, thread.id, STUDENT.id, 'Still the same instant');

      expect(first.timestamp).toEqual(at('2025-03-03T09:00:00.000Z'));
      expect(second.timestamp).toEqual(at('2025-03-03T09:00:00.001Z'));
      expect(third.timestamp).toEqual(at('2025-03-03T09:00:00.002Z'));
      expect((await service.listMessagesSince(OWNER, thread.id, first.timestamp)).map(m => m.id)).toEqual([second.id, third.id]);
    });

    it('should check participation', async () => {
      const { thread } = await startWithOwner();
      await expect(service.listMessagesSince(OTHER_STUDENT, thread.id, at('2025-01-01T00:00:00.000Z')))
        .rejects.toBeInstanceOf(ForbiddenError);
    });

    it('should reject an invalid cutoff', async () => {
      const { thread } = await startWithOwner();
      await expect(service.listMessagesSince(STUDENT, thread.id, new Date('garbage'))).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('listThreadsFor', () => {
    it('should order the inbox by latest message with empty threads last', async () => {
      const a = await startWithOwner();
      clock.advance(1000);
      const b = await service.startThread(STUDENT, {
        contextType: 'booking', contextId: bookingId, receiverId: OWNER.id, content: 'Can we start at 10:15?',
      });
      clock.advance(1000);
      const c = await service.createThread(STUDENT, 'resource', roomId);
      clock.advance(1000);
      await service.reply(OWNER, a.thread.id, 'Yes');

      const inbox = await service.listThreadsFor(STUDENT);
      expect(inbox.map(entry => entry.thread.id)).toEqual([a.thread.id, b.thread.id, c.id]);
      expect(inbox.map(entry => entry.messageCount)).toEqual([2, 1, 0]);
      expect(inbox.map(entry => entry.hasUnread)).toEqual([true, false, false]);
      expect(inbox[0].lastMessage?.timestamp).toEqual(at('2025-03-03T09:00:03.000Z'));
    });

    it('should hide threads the actor takes no part in', async () => {
      await startWithOwner();
      expect(await service.listThreadsFor(OTHER_STUDENT)).toEqual([]);
      expect(await service.listThreadsFor(OTHER_STAFF)).toEqual([]);
      expect(await service.listThreadsFor(OWNER)).toHaveLength(1);
    });

    it('should show context threads to the resource owner before any message', async () => {
      const resourceThread = await service.createThread(STUDENT, 'resource', roomId);
      const bookingThread = await service.createThread(STUDENT, 'booking', bookingId);

      const inbox = await service.listThreadsFor(OWNER);
      expect(inbox.map(entry => entry.thread.id).sort((a, b) => a - b)).toEqual([resourceThread.id, bookingThread.id]);
      expect(await service.listThreadsFor(OTHER_STAFF)).toEqual([]);
    });

    it('should show a booking thread the owner opened to the requester', async () => {
      const thread = await service.createThread(OWNER, 'booking', bookingId);
      expect((await service.listThreadsFor(STUDENT)).map(entry => entry.thread.id)).toEqual([thread.id]);
    });

    it('should show every thread to an administrator', async () => {
      await startWithOwner();
      await service.createThread(ADMIN, 'general', null);
      expect(await service.listThreadsFor(ADMIN)).toHaveLength(2);
    });

    it('should show a general thread to the student it was addressed to', async () => {
      const { thread } = await service.startThread(ADMIN, {
        contextType: 'general', contextId: null, receiverId: STUDENT.id, content: 'Library hours change next week',
      });
      const inbox = await service.listThreadsFor(STUDENT);
      expect(inbox.map(entry => entry.thread.id)).toEqual([thread.id]);
      expect(inbox[0].hasUnread).toBe(true);
    });
  });

  describe('getThreadView', () => {
    it('should return ordered messages and the sorted participant ids', async () => {
      const { thread } = await startWithOwner();
      await service.reply(OWNER, thread.id, 'Yes');

      const view = await service.getThreadView(STUDENT, thread.id);
      expect(view.messages.map(m => m.content)).toEqual(['Is the projector in this room working?', 'Yes']);
      expect(view.participantIds).toEqual([OWNER.id, STUDENT.id]);
    });
  });
});
