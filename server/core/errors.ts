import { getErrorCode, getErrorDetail, getErrorProperty } from '../utils/errorUtils';

export type DomainErrorCode =
  | 'INVALID_WINDOW'
  | 'VALIDATION_ERROR'
  | 'CONFLICT'
  | 'INVALID_TRANSITION'
  | 'NOT_FOUND'
  | 'FORBIDDEN';

/**
 * Base class for failures the request layer can show to the caller.
 * None of them are fatal to the process.
 */
export abstract class DomainError extends Error {
  abstract readonly code: DomainErrorCode;
  abstract readonly statusCode: number;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidWindowError extends DomainError {
  readonly code = 'INVALID_WINDOW';
  readonly statusCode = 400;

  constructor(message = 'Booking end time must be after its start time') {
    super(message);
  }
}

export class ValidationError extends DomainError {
  readonly code = 'VALIDATION_ERROR';
  readonly statusCode = 400;
}

export class ConflictError extends DomainError {
  readonly code = 'CONFLICT';
  readonly statusCode = 409;

  constructor(
    message = 'This time conflicts with an existing booking',
    readonly conflictingBookingIds: number[] = []
  ) {
    super(message);
  }
}

export class InvalidTransitionError extends DomainError {
  readonly code = 'INVALID_TRANSITION';
  readonly statusCode = 409;
}

export class NotFoundError extends DomainError {
  readonly code = 'NOT_FOUND';
  readonly statusCode = 404;

  constructor(entity: string, id?: number) {
    super(id === undefined ? `${entity} not found` : `${entity} ${id} not found`);
  }
}

export class ForbiddenError extends DomainError {
  readonly code = 'FORBIDDEN';
  readonly statusCode = 403;

  constructor(message = 'You are not allowed to perform this action') {
    super(message);
  }
}

export function isDomainError(error: unknown): error is DomainError {
  return error instanceof DomainError;
}

const EXCLUSION_VIOLATION = '23P01';
const FOREIGN_KEY_VIOLATION = '23503';
const CHECK_VIOLATION = '23514';

// Default Postgres names for the foreign keys a caller can point at a missing row
const FOREIGN_KEY_ENTITIES: Record<string, string> = {
  bookings_resource_id_fkey: 'Resource',
  bookings_requester_id_fkey: 'User',
  threads_created_by_fkey: 'User',
  messages_thread_id_fkey: 'Thread',
  messages_sender_id_fkey: 'User',
  messages_receiver_id_fkey: 'User',
};

function missingKeyId(error: unknown): number | undefined {
  // detail reads: Key (receiver_id)=(42) is not present in table "users".
  const match = /\)=\((\d+)\)/.exec(getErrorDetail(error) ?? '');
  return match ? Number(match[1]) : undefined;
}

/**
 * Maps a Postgres constraint error onto the nearest domain error. Serialization
 * failures are not mapped: the transaction retry handles them. Anything
 * unrecognised is returned unchanged.
 */
export function translateStorageError(error: unknown): unknown {
  if (isDomainError(error)) return error;
  const code = getErrorCode(error);
  const constraint = getErrorProperty(error, 'constraint');
  if (code === EXCLUSION_VIOLATION) {
    return new ConflictError();
  }
  if (code === CHECK_VIOLATION && constraint === 'bookings_window_check') {
    return new InvalidWindowError();
  }
  if (code === FOREIGN_KEY_VIOLATION) {
    const entity = typeof constraint === 'string' ? FOREIGN_KEY_ENTITIES[constraint] : undefined;
    return new NotFoundError(entity ?? 'Referenced record', missingKeyId(error));
  }
  return error;
}
