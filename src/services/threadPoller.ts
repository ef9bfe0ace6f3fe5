import { z } from 'zod';
import { polledMessageSchema, type PolledMessage } from '../../shared/models/messaging';
import { ThreadMessageView } from './threadMessageView';

export const DEFAULT_POLL_INTERVAL_MS = 6000;

export interface MessageTransport {
  fetchSince(threadId: number, since: string, signal?: AbortSignal): Promise<PolledMessage[]>;
}

export interface ThreadPollerOptions {
  threadId: number;
  transport: MessageTransport;
  view?: ThreadMessageView;
  intervalMs?: number;
  /** Cutoff used while the view is still empty */
  initialCutoff?: string | null;
  onMessages?: (added: PolledMessage[]) => void;
  onError?: (error: unknown) => void;
}

export type PollOutcome =
  | { status: 'skipped' }
  | { status: 'busy' }
  | { status: 'stopped' }
  | { status: 'ok'; added: PolledMessage[] }
  | { status: 'failed'; error: unknown };

export class PollRequestError extends Error {
  constructor(readonly status: number, message: string) {
    super(message);
    this.name = 'PollRequestError';
  }
}

/**
 * Fetches new messages for one thread on a fixed interval and merges them
 * into a ThreadMessageView. Failures are reported and retried on the next
 * tick; the loop only ends with stop().
 */
export class ThreadPoller {
  readonly view: ThreadMessageView;
  private readonly threadId: number;
  private readonly transport: MessageTransport;
  private readonly intervalMs: number;
  private readonly initialCutoff: string | null;
  private readonly onMessages?: (added: PolledMessage[]) => void;
  private readonly onError?: (error: unknown) => void;

  private intervalId: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<PollOutcome> | null = null;
  private controller: AbortController | null = null;

  constructor(options: ThreadPollerOptions) {
    this.threadId = options.threadId;
    this.transport = options.transport;
    this.view = options.view ?? new ThreadMessageView();
    this.intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.initialCutoff = options.initialCutoff ?? null;
    this.onMessages = options.onMessages;
    this.onError = options.onError;
  }

  get isRunning(): boolean {
    return this.intervalId !== null;
  }

  get isPolling(): boolean {
    return this.inFlight !== null;
  }

  get cutoff(): string | null {
    return this.view.lastTimestamp ?? this.initialCutoff;
  }

  start(): void {
    if (this.intervalId) return;
    // poll() settles every failure itself, so nothing is left unhandled here
    this.intervalId = setInterval(() => void this.poll(), this.intervalMs);
  }

  stop(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }
    this.controller?.abort();
    this.controller = null;
  }

  /** One poll; a call made while another is in flight is dropped. */
  poll(): Promise<PollOutcome> {
    if (this.inFlight) {
      return Promise.resolve({ status: 'busy' });
    }
    const since = this.cutoff;
    if (since === null) {
      return Promise.resolve({ status: 'skipped' });
    }

    const controller = new AbortController();
    this.controller = controller;
    this.inFlight = this.fetchAndMerge(since, controller.signal).finally(() => {
      this.inFlight = null;
      if (this.controller === controller) this.controller = null;
    });
    return this.inFlight;
  }

  private async fetchAndMerge(since: string, signal: AbortSignal): Promise<PollOutcome> {
    try {
      const batch = await this.transport.fetchSince(this.threadId, since, signal);
      if (signal.aborted) return { status: 'stopped' };
      const added = this.view.merge(batch);
      if (added.length > 0) this.onMessages?.(added);
      return { status: 'ok', added };
    } catch (error: unknown) {
      if (signal.aborted) return { status: 'stopped' };
      this.onError?.(error);
      return { status: 'failed', error };
    }
  }
}

const polledBatchSchema = z.array(polledMessageSchema);

export function createFetchTransport(baseUrl: string = '', fetchImpl: typeof fetch = fetch): MessageTransport {
  return {
    async fetchSince(threadId, since, signal) {
      const url = `${baseUrl}/api/threads/${threadId}/messages?since=${encodeURIComponent(since)}`;
      const res = await fetchImpl(url, {
        credentials: 'include',
        headers: { Accept: 'application/json' },
        signal,
      });
      if (!res.ok) {
        throw new PollRequestError(res.status, `Request failed (${res.status})`);
      }
      const parsed = polledBatchSchema.safeParse(await res.json());
      if (!parsed.success) {
        throw new PollRequestError(res.status, '[ThreadPoller] Unexpected message payload');
      }
      return parsed.data;
    },
  };
}
