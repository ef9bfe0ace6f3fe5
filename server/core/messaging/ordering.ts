import type { Message, ThreadSummary } from './types';

// Messages order by (timestamp, id); the id breaks ties at equal timestamps.
export function compareMessages(a: Pick<Message, 'timestamp' | 'id'>, b: Pick<Message, 'timestamp' | 'id'>): number {
  return a.timestamp.getTime() - b.timestamp.getTime() || a.id - b.id;
}

/**
 * Timestamps within a thread strictly increase. A "since" query with a strict
 * greater-than then never skips a message posted right after the cutoff.
 */
export function nextMessageTimestamp(now: Date, lastInThread: Date | null): Date {
  if (lastInThread && lastInThread.getTime() >= now.getTime()) {
    return new Date(lastInThread.getTime() + 1);
  }
  return now;
}

/**
 * Inbox order: most recent message first; threads without messages after all
 * threads that have them, newest thread first.
 */
export function compareThreadSummaries(a: ThreadSummary, b: ThreadSummary): number {
  if (a.lastMessage && b.lastMessage) {
    return compareMessages(b.lastMessage, a.lastMessage);
  }
  if (a.lastMessage) return -1;
  if (b.lastMessage) return 1;
  return b.thread.createdAt.getTime() - a.thread.createdAt.getTime() || b.thread.id - a.thread.id;
}
