import { and, asc, desc, eq, gt, inArray, or, sql, type SQL } from 'drizzle-orm';
import { db, type Executor } from '../../db';
import { bookings, messages, resources, threads, type MessageRow, type ThreadRow } from '../../../shared/schema';
import { isThreadContextType } from '../../../shared/constants/statuses';
import { systemClock, type Clock } from '../clock';
import { NotFoundError, translateStorageError } from '../errors';
import { nextMessageTimestamp } from './ordering';
import type { Message, NewMessage, NewThread, Thread, ThreadSummary } from './types';

export interface ThreadSummaryFilter {
  /**
   * Keep only threads this user takes part in: as creator, sender or
   * receiver, owner of the resource in context, or requester or resource
   * owner of the booking in context.
   */
  participantId?: number;
}

export interface ThreadStore {
  createThread(input: NewThread): Promise<Thread>;
  getThread(threadId: number): Promise<Thread | null>;
  listThreadSummaries(filter?: ThreadSummaryFilter): Promise<ThreadSummary[]>;
}

export interface MessageStore {
  /** Fails with NotFoundError when the thread does not exist. */
  appendMessage(input: NewMessage): Promise<Message>;
  listMessages(threadId: number): Promise<Message[]>;
  /** Messages with timestamp strictly after `cutoff`, ascending by (timestamp, id). */
  listMessagesSince(threadId: number, cutoff: Date): Promise<Message[]>;
  getLastMessage(threadId: number): Promise<Message | null>;
  listMessageParticipantIds(threadId: number): Promise<number[]>;
}

export interface MessagingStore extends ThreadStore, MessageStore {
  transaction<T>(work: (tx: MessagingStore) => Promise<T>): Promise<T>;
}

export function toThread(row: ThreadRow): Thread {
  if (!isThreadContextType(row.contextType)) {
    throw new Error(`[MessagingStore] Thread ${row.id} has unknown context type "${row.contextType}"`);
  }
  return {
    id: row.id,
    contextType: row.contextType,
    contextId: row.contextId,
    createdBy: row.createdBy,
    createdAt: row.createdAt,
  };
}

export function toMessage(row: MessageRow): Message {
  return {
    id: row.id,
    threadId: row.threadId,
    senderId: row.senderId,
    receiverId: row.receiverId,
    content: row.content,
    timestamp: row.timestamp,
  };
}

export class PgMessagingStore implements MessagingStore {
  private constructor(
    private readonly executor: Executor,
    private readonly clock: Clock,
    private readonly inTransaction: boolean
  ) {}

  static create(database: Executor = db, clock: Clock = systemClock): PgMessagingStore {
    return new PgMessagingStore(database, clock, false);
  }

  async transaction<T>(work: (tx: MessagingStore) => Promise<T>): Promise<T> {
    if (this.inTransaction) {
      return work(this);
    }
    try {
      return await this.executor.transaction(async (tx) => work(new PgMessagingStore(tx, this.clock, true)));
    } catch (error: unknown) {
      throw translateStorageError(error);
    }
  }

  async createThread(input: NewThread): Promise<Thread> {
    try {
      const [row] = await this.executor.insert(threads).values({
        contextType: input.contextType,
        contextId: input.contextId,
        createdBy: input.createdBy,
        createdAt: this.clock.now(),
      }).returning();
      return toThread(row);
    } catch (error: unknown) {
      throw translateStorageError(error);
    }
  }

  async getThread(threadId: number): Promise<Thread | null> {
    const [row] = await this.executor.select().from(threads).where(eq(threads.id, threadId));
    return row ? toThread(row) : null;
  }

  async appendMessage(input: NewMessage): Promise<Message> {
    if (!this.inTransaction) {
      return this.transaction(tx => tx.appendMessage(input));
    }

    // the row lock serialises timestamp assignment per thread
    const [locked] = await this.executor.select({ id: threads.id }).from(threads)
      .where(eq(threads.id, input.threadId))
      .for('update');
    if (!locked) {
      throw new NotFoundError('Thread', input.threadId);
    }

    const last = await this.getLastMessage(input.threadId);
    const [row] = await this.executor.insert(messages).values({
      threadId: input.threadId,
      senderId: input.senderId,
      receiverId: input.receiverId,
      content: input.content,
      timestamp: nextMessageTimestamp(this.clock.now(), last?.timestamp ?? null),
    }).returning();
    return toMessage(row);
  }

  async listMessages(threadId: number): Promise<Message[]> {
    const rows = await this.executor.select().from(messages)
      .where(eq(messages.threadId, threadId))
      .orderBy(asc(messages.timestamp), asc(messages.id));
    return rows.map(toMessage);
  }

  async listMessagesSince(threadId: number, cutoff: Date): Promise<Message[]> {
    const rows = await this.executor.select().from(messages)
      .where(and(eq(messages.threadId, threadId), gt(messages.timestamp, cutoff)))
      .orderBy(asc(messages.timestamp), asc(messages.id));
    return rows.map(toMessage);
  }

  async getLastMessage(threadId: number): Promise<Message | null> {
    const [row] = await this.executor.select().from(messages)
      .where(eq(messages.threadId, threadId))
      .orderBy(desc(messages.timestamp), desc(messages.id))
      .limit(1);
    return row ? toMessage(row) : null;
  }

  async listMessageParticipantIds(threadId: number): Promise<number[]> {
    const rows = await this.executor.execute<{ user_id: number }>(sql`
      SELECT ${messages.senderId} AS user_id FROM ${messages} WHERE ${messages.threadId} = ${threadId}
      UNION
      SELECT ${messages.receiverId} AS user_id FROM ${messages} WHERE ${messages.threadId} = ${threadId}
    `);
    return rows.rows.map(row => Number(row.user_id));
  }

  async listThreadSummaries(filter: ThreadSummaryFilter = {}): Promise<ThreadSummary[]> {
    const where = filter.participantId === undefined ? undefined : participantCondition(filter.participantId);
    const aggregates = await this.executor.select({
      thread: threads,
      messageCount: sql<number>`count(${messages.id})::int`.mapWith(Number),
      senderIds: sql<number[]>`coalesce(array_agg(distinct ${messages.senderId}) filter (where ${messages.id} is not null), '{}')`,
      receiverIds: sql<number[]>`coalesce(array_agg(distinct ${messages.receiverId}) filter (where ${messages.id} is not null), '{}')`,
    })
      .from(threads)
      .leftJoin(messages, eq(messages.threadId, threads.id))
      .where(where)
      .groupBy(threads.id);

    const threadIds = aggregates.map(row => row.thread.id);
    const lastByThread = new Map<number, Message>();
    if (threadIds.length > 0) {
      const lastMessages = await this.executor.selectDistinctOn([messages.threadId]).from(messages)
        .where(where === undefined ? undefined : inArray(messages.threadId, threadIds))
        .orderBy(messages.threadId, desc(messages.timestamp), desc(messages.id));
      for (const row of lastMessages) {
        lastByThread.set(row.threadId, toMessage(row));
      }
    }

    return aggregates.map(row => ({
      thread: toThread(row.thread),
      lastMessage: lastByThread.get(row.thread.id) ?? null,
      messageCount: row.messageCount,
      messageParticipantIds: [...new Set([...row.senderIds, ...row.receiverIds].map(Number))],
    }));
  }
}

// Same rule as collectParticipants, evaluated per thread row
function participantCondition(userId: number): SQL | undefined {
  return or(
    eq(threads.createdBy, userId),
    sql`exists (
      select 1 from ${messages}
      where ${messages.threadId} = ${threads.id}
        and (${messages.senderId} = ${userId} or ${messages.receiverId} = ${userId})
    )`,
    sql`(${threads.contextType} = 'resource' and exists (
      select 1 from ${resources}
      where ${resources.id} = ${threads.contextId} and ${resources.ownerId} = ${userId}
    ))`,
    sql`(${threads.contextType} = 'booking' and exists (
      select 1 from ${bookings}
      join ${resources} on ${resources.id} = ${bookings.resourceId}
      where ${bookings.id} = ${threads.contextId}
        and (${bookings.requesterId} = ${userId} or ${resources.ownerId} = ${userId})
    ))`
  );
}
