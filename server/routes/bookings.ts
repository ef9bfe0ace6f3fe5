import { Router } from 'express';
import { z } from 'zod';
import type { ApprovalService, Booking, BookingDecision } from '../core/bookingService';
import { isAuthenticated, isStaffOrAdmin, requirePrincipal, sendDomainError } from '../core/middleware';
import { createErrorResponse } from '../core/logger';

const idParamSchema = z.coerce.number().int().positive();

const bookingRequestSchema = z.object({
  resource_id: z.number().int().positive(),
  start: z.string().datetime({ offset: true }),
  end: z.string().datetime({ offset: true }),
});

const transitionBodySchema = z.object({
  notes: z.string().trim().max(2000).nullable().optional(),
}).default({});

export function formatBooking(booking: Booking) {
  return {
    id: booking.id,
    resource_id: booking.resourceId,
    requester_id: booking.requesterId,
    start: booking.start.toISOString(),
    end: booking.end.toISOString(),
    status: booking.status,
    approval_notes: booking.approvalNotes,
    reviewed_by: booking.reviewedBy,
    created_at: booking.createdAt.toISOString(),
    updated_at: booking.updatedAt.toISOString(),
  };
}

function formatDecision(decision: BookingDecision) {
  return {
    booking: formatBooking(decision.booking),
    audit: {
      booking_id: decision.audit.bookingId,
      actor_id: decision.audit.actorId,
      from_status: decision.audit.fromStatus,
      to_status: decision.audit.toStatus,
      at: decision.audit.at.toISOString(),
      notes: decision.audit.notes,
    },
  };
}

const TRANSITIONS = ['approve', 'reject', 'cancel', 'complete'] as const;

export function createBookingRouter(approvals: ApprovalService): Router {
  const router = Router();

  router.post('/api/bookings', isAuthenticated, async (req, res) => {
    const parsed = bookingRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json(createErrorResponse(req, 'resource_id, start and end are required', 'VALIDATION_ERROR'));
    }
    try {
      const decision = await approvals.requestBooking(requirePrincipal(req), {
        resourceId: parsed.data.resource_id,
        start: new Date(parsed.data.start),
        end: new Date(parsed.data.end),
      });
      res.status(201).json(formatDecision(decision));
    } catch (error: unknown) {
      sendDomainError(req, res, error, 'Failed to request booking');
    }
  });

  router.get('/api/bookings/mine', isAuthenticated, async (req, res) => {
    try {
      const bookings = await approvals.listMyBookings(requirePrincipal(req));
      res.json(bookings.map(formatBooking));
    } catch (error: unknown) {
      sendDomainError(req, res, error, 'Failed to load bookings');
    }
  });

  router.get('/api/bookings/pending', isStaffOrAdmin, async (req, res) => {
    try {
      const bookings = await approvals.listPendingApprovals(requirePrincipal(req));
      res.json(bookings.map(formatBooking));
    } catch (error: unknown) {
      sendDomainError(req, res, error, 'Failed to load pending approvals');
    }
  });

  router.get('/api/bookings/:id', isAuthenticated, async (req, res) => {
    const id = idParamSchema.safeParse(req.params.id);
    if (!id.success) {
      return res.status(400).json(createErrorResponse(req, 'Invalid booking id', 'VALIDATION_ERROR'));
    }
    try {
      const booking = await approvals.getBooking(requirePrincipal(req), id.data);
      res.json(formatBooking(booking));
    } catch (error: unknown) {
      sendDomainError(req, res, error, 'Failed to load booking');
    }
  });

  for (const action of TRANSITIONS) {
    router.post(`/api/bookings/:id/${action}`, isAuthenticated, async (req, res) => {
      const id = idParamSchema.safeParse(req.params.id);
      const body = transitionBodySchema.safeParse(req.body ?? {});
      if (!id.success || !body.success) {
        return res.status(400).json(createErrorResponse(req, 'Invalid booking id or notes', 'VALIDATION_ERROR'));
      }
      try {
        const decision = await approvals[action](requirePrincipal(req), id.data, body.data.notes);
        res.json(formatDecision(decision));
      } catch (error: unknown) {
        sendDomainError(req, res, error, `Failed to ${action} booking`);
      }
    });
  }

  router.get('/api/resources/:id/bookings', isStaffOrAdmin, async (req, res) => {
    const id = idParamSchema.safeParse(req.params.id);
    if (!id.success) {
      return res.status(400).json(createErrorResponse(req, 'Invalid resource id', 'VALIDATION_ERROR'));
    }
    try {
      const bookings = await approvals.listResourceBookings(requirePrincipal(req), id.data);
      res.json(bookings.map(formatBooking));
    } catch (error: unknown) {
      sendDomainError(req, res, error, 'Failed to load resource bookings');
    }
  });

  return router;
}
