import { Router } from 'express';
import { z } from 'zod';
import { THREAD_CONTEXT_TYPES } from '../../shared/constants/statuses';
import type { PolledMessage } from '../../shared/models/messaging';
import type { InboxEntry, Message, MessagingService, Thread } from '../core/messaging';
import { isAuthenticated, requirePrincipal, sendDomainError } from '../core/middleware';
import { createErrorResponse } from '../core/logger';

const idParamSchema = z.coerce.number().int().positive();

const startThreadSchema = z.object({
  context_type: z.enum(THREAD_CONTEXT_TYPES),
  context_id: z.number().int().positive().nullable().default(null),
  receiver_id: z.number().int().positive(),
  content: z.string(),
});

const postMessageSchema = z.object({
  content: z.string(),
  receiver_id: z.number().int().positive().optional(),
});

const sinceQuerySchema = z.object({
  since: z.string().datetime({ offset: true }),
});

export function toPolledMessage(message: Message): PolledMessage {
  return {
    message_id: message.id,
    sender_id: message.senderId,
    receiver_id: message.receiverId,
    timestamp: message.timestamp.toISOString(),
    content: message.content,
  };
}

function formatThread(thread: Thread) {
  return {
    id: thread.id,
    context_type: thread.contextType,
    context_id: thread.contextId,
    created_by: thread.createdBy,
    created_at: thread.createdAt.toISOString(),
  };
}

function formatInboxEntry(entry: InboxEntry) {
  return {
    ...formatThread(entry.thread),
    last_message: entry.lastMessage ? toPolledMessage(entry.lastMessage) : null,
    message_count: entry.messageCount,
    has_unread: entry.hasUnread,
  };
}

export function createThreadRouter(messaging: MessagingService): Router {
  const router = Router();

  router.get('/api/threads', isAuthenticated, async (req, res) => {
    try {
      const inbox = await messaging.listThreadsFor(requirePrincipal(req));
      res.json(inbox.map(formatInboxEntry));
    } catch (error: unknown) {
      sendDomainError(req, res, error, 'Failed to load threads');
    }
  });

  router.post('/api/threads', isAuthenticated, async (req, res) => {
    const parsed = startThreadSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json(createErrorResponse(req, 'context_type, receiver_id and content are required', 'VALIDATION_ERROR'));
    }
    try {
      const { thread, message } = await messaging.startThread(requirePrincipal(req), {
        contextType: parsed.data.context_type,
        contextId: parsed.data.context_id,
        receiverId: parsed.data.receiver_id,
        content: parsed.data.content,
      });
      res.status(201).json({ thread: formatThread(thread), message: toPolledMessage(message) });
    } catch (error: unknown) {
      sendDomainError(req, res, error, 'Failed to start thread');
    }
  });

  router.get('/api/threads/:id', isAuthenticated, async (req, res) => {
    const id = idParamSchema.safeParse(req.params.id);
    if (!id.success) {
      return res.status(400).json(createErrorResponse(req, 'Invalid thread id', 'VALIDATION_ERROR'));
    }
    try {
      const view = await messaging.getThreadView(requirePrincipal(req), id.data);
      res.json({
        thread: formatThread(view.thread),
        messages: view.messages.map(toPolledMessage),
        participant_ids: view.participantIds,
      });
    } catch (error: unknown) {
      sendDomainError(req, res, error, 'Failed to load thread');
    }
  });

  router.get('/api/threads/:id/messages', isAuthenticated, async (req, res) => {
    const id = idParamSchema.safeParse(req.params.id);
    const query = sinceQuerySchema.safeParse(req.query);
    if (!id.success || !query.success) {
      return res.status(400).json(createErrorResponse(req, 'A thread id and an ISO-8601 since timestamp are required', 'VALIDATION_ERROR'));
    }
    try {
      const messages = await messaging.listMessagesSince(requirePrincipal(req), id.data, new Date(query.data.since));
      res.json(messages.map(toPolledMessage));
    } catch (error: unknown) {
      sendDomainError(req, res, error, 'Failed to load messages');
    }
  });

  // without receiver_id the message replies to the other party of the last message
  router.post('/api/threads/:id/messages', isAuthenticated, async (req, res) => {
    const id = idParamSchema.safeParse(req.params.id);
    const body = postMessageSchema.safeParse(req.body);
    if (!id.success || !body.success) {
      return res.status(400).json(createErrorResponse(req, 'content is required', 'VALIDATION_ERROR'));
    }
    try {
      const actor = requirePrincipal(req);
      const message = body.data.receiver_id === undefined
        ? await messaging.reply(actor, id.data, body.data.content)
        : await messaging.postMessage(actor, id.data, body.data.receiver_id, body.data.content);
      res.status(201).json(toPolledMessage(message));
    } catch (error: unknown) {
      sendDomainError(req, res, error, 'Failed to post message');
    }
  });

  return router;
}
