import type { ThreadContextType } from '../../../shared/constants/statuses';

export interface Thread {
  id: number;
  contextType: ThreadContextType;
  contextId: number | null;
  createdBy: number;
  createdAt: Date;
}

export interface Message {
  id: number;
  threadId: number;
  senderId: number;
  receiverId: number;
  content: string;
  timestamp: Date;
}

export interface NewThread {
  contextType: ThreadContextType;
  contextId: number | null;
  createdBy: number;
}

export interface NewMessage {
  threadId: number;
  senderId: number;
  receiverId: number;
  content: string;
}

export interface ThreadSummary {
  thread: Thread;
  lastMessage: Message | null;
  messageCount: number;
  /** Distinct senders and receivers of the thread's messages */
  messageParticipantIds: number[];
}
