import { getErrorCode } from '../utils/errorUtils';
import { logger } from './logger';

const SERIALIZATION_FAILURE = '40001';
const DEADLOCK_DETECTED = '40P01';

export function isTransactionRetryable(error: unknown): boolean {
  const code = getErrorCode(error);
  return code === SERIALIZATION_FAILURE || code === DEADLOCK_DETECTED;
}

export interface TransactionRetryOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  label?: string;
}

/**
 * Reruns a whole transaction after Postgres aborts it with a serialization
 * failure or a deadlock. Any other error, and the last failed attempt, is
 * rethrown unchanged.
 */
export async function withTransactionRetry<T>(
  run: () => Promise<T>,
  options: TransactionRetryOptions = {}
): Promise<T> {
  const { maxAttempts = 5, baseDelayMs = 10, label = 'Transaction' } = options;

  for (let attempt = 1; ; attempt++) {
    try {
      return await run();
    } catch (error: unknown) {
      if (!isTransactionRetryable(error) || attempt >= maxAttempts) throw error;
      // jitter keeps two retrying writers from colliding again in lockstep
      const delay = Math.round(baseDelayMs * Math.pow(2, attempt - 1) * (1 + Math.random()));
      logger.warn(`[Database] ${label} aborted with ${getErrorCode(error)} (attempt ${attempt}/${maxAttempts}), retrying in ${delay}ms`);
      await new Promise(resolve => setTimeout(resolve, delay));
    }
  }
}
