export interface DispatchMessage {
  dispatchId: string;
  /** Serialized workflow graph as submitted. */
  payload: string;
  publishedAt: string;
}

export interface DeliveredMessage extends DispatchMessage {
  messageId: string;
}

/**
 * At-least-once work queue between the control plane and runners. Messages
 * within one topic are delivered in publish order; a delivered message stays
 * pending until acknowledged and can be reclaimed once it has been idle.
 */
export interface DispatchQueue {
  /** Resolves with the broker's message id once the message is durable; throws PublishError. */
  publish(topic: string, message: DispatchMessage): Promise<string>;
  ensureTopic(topic: string): Promise<void>;
  consume(topic: string, consumerId: string, count: number): Promise<DeliveredMessage[]>;
  ack(topic: string, messageId: string): Promise<void>;
  claimStale(
    topic: string,
    consumerId: string,
    minIdleMs: number,
    count: number
  ): Promise<DeliveredMessage[]>;
  close(): Promise<void>;
}
