import type { DeliveredMessage, DispatchMessage, DispatchQueue } from "./types.js";

type Entry = {
  messageId: string;
  message: DispatchMessage;
};

type PendingEntry = {
  consumerId: string;
  deliveredAt: number;
};

type Topic = {
  entries: Entry[];
  cursor: number;
  pending: Map<string, PendingEntry>;
};

/** In-process queue with consumer-group semantics. */
export class MemoryDispatchQueue implements DispatchQueue {
  private readonly topics = new Map<string, Topic>();
  private sequence = 0;

  constructor(private readonly clock: () => number = () => Date.now()) {}

  async publish(topic: string, message: DispatchMessage): Promise<string> {
    const state = this.topic(topic);
    this.sequence += 1;
    const messageId = `${this.clock()}-${this.sequence}`;
    state.entries.push({ messageId, message: { ...message } });
    return messageId;
  }

  async ensureTopic(topic: string): Promise<void> {
    this.topic(topic);
  }

  async consume(topic: string, consumerId: string, count: number): Promise<DeliveredMessage[]> {
    const state = this.topic(topic);
    const batch = state.entries.slice(state.cursor, state.cursor + count);
    state.cursor += batch.length;
    const now = this.clock();
    return batch.map((entry) => {
      state.pending.set(entry.messageId, { consumerId, deliveredAt: now });
      return { messageId: entry.messageId, ...entry.message };
    });
  }

  async ack(topic: string, messageId: string): Promise<void> {
    this.topic(topic).pending.delete(messageId);
  }

  async claimStale(
    topic: string,
    consumerId: string,
    minIdleMs: number,
    count: number
  ): Promise<DeliveredMessage[]> {
    const state = this.topic(topic);
    const now = this.clock();
    const claimed: DeliveredMessage[] = [];
    for (const entry of state.entries) {
      if (claimed.length >= count) break;
      const pending = state.pending.get(entry.messageId);
      if (!pending || now - pending.deliveredAt < minIdleMs) continue;
      state.pending.set(entry.messageId, { consumerId, deliveredAt: now });
      claimed.push({ messageId: entry.messageId, ...entry.message });
    }
    return claimed;
  }

  async close(): Promise<void> {
    this.topics.clear();
  }

  pendingCount(topic: string): number {
    return this.topic(topic).pending.size;
  }

  private topic(name: string): Topic {
    let state = this.topics.get(name);
    if (!state) {
      state = { entries: [], cursor: 0, pending: new Map() };
      this.topics.set(name, state);
    }
    return state;
  }
}
