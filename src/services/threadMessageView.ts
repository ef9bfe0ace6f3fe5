import type { PolledMessage } from '../../shared/models/messaging';

function compareByTimestamp(a: PolledMessage, b: PolledMessage): number {
  return Date.parse(a.timestamp) - Date.parse(b.timestamp) || a.message_id - b.message_id;
}

/**
 * Messages rendered for one thread, kept in (timestamp, id) order.
 * Merging is keyed by message id, so a message delivered twice shows once.
 */
export class ThreadMessageView {
  private readonly byId = new Map<number, PolledMessage>();
  private ordered: PolledMessage[] = [];

  constructor(initial: readonly PolledMessage[] = []) {
    this.merge(initial);
  }

  /** Returns only the messages that were not in the view yet. */
  merge(batch: readonly PolledMessage[]): PolledMessage[] {
    const added: PolledMessage[] = [];
    for (const message of batch) {
      if (this.byId.has(message.message_id)) continue;
      this.byId.set(message.message_id, message);
      added.push(message);
    }
    if (added.length > 0) {
      this.ordered = [...this.byId.values()].sort(compareByTimestamp);
    }
    return added;
  }

  get messages(): readonly PolledMessage[] {
    return this.ordered;
  }

  get size(): number {
    return this.ordered.length;
  }

  get lastTimestamp(): string | null {
    return this.ordered.length > 0 ? this.ordered[this.ordered.length - 1].timestamp : null;
  }
}
