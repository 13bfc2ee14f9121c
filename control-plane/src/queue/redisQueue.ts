import { PublishError, errorMessage } from "@workflow-dispatch/shared";
import { Redis } from "ioredis";
import type { DeliveredMessage, DispatchMessage, DispatchQueue } from "./types.js";

export const DISPATCH_GROUP = "dispatch_runners";

function parseFields(raw: unknown[]): Record<string, string> {
  const record: Record<string, string> = {};
  for (let i = 0; i + 1 < raw.length; i += 2) {
    const key = raw[i];
    const value = raw[i + 1];
    if (typeof key === "string" && typeof value === "string") {
      record[key] = value;
    }
  }
  return record;
}

/** Reads `[[id, [field, value, ...]], ...]` as returned by XREADGROUP and XAUTOCLAIM. */
export function parseStreamEntries(raw: unknown): DeliveredMessage[] {
  if (!Array.isArray(raw)) return [];
  return raw.flatMap((entry: unknown) => {
    if (!Array.isArray(entry) || typeof entry[0] !== "string" || !Array.isArray(entry[1])) {
      return [];
    }
    const fields = parseFields(entry[1]);
    if (!fields.dispatchId || fields.payload === undefined) return [];
    return [
      {
        messageId: entry[0],
        dispatchId: fields.dispatchId,
        payload: fields.payload,
        publishedAt: fields.publishedAt ?? ""
      }
    ];
  });
}

/** Redis Streams with one consumer group per topic. */
export class RedisDispatchQueue implements DispatchQueue {
  constructor(
    private readonly redis: Redis,
    private readonly blockMs = 2500
  ) {}

  static fromUrl(redisUrl: string): RedisDispatchQueue {
    return new RedisDispatchQueue(new Redis(redisUrl, { maxRetriesPerRequest: 2 }));
  }

  async publish(topic: string, message: DispatchMessage): Promise<string> {
    let messageId: string | null;
    try {
      messageId = await this.redis.xadd(
        streamKey(topic),
        "*",
        "dispatchId",
        message.dispatchId,
        "payload",
        message.payload,
        "publishedAt",
        message.publishedAt
      );
    } catch (error) {
      throw new PublishError(`Failed to publish dispatch ${message.dispatchId}: ${errorMessage(error)}`);
    }
    if (!messageId) {
      throw new PublishError(`Broker returned no message id for dispatch ${message.dispatchId}.`);
    }
    return messageId;
  }

  async ensureTopic(topic: string): Promise<void> {
    try {
      await this.redis.xgroup("CREATE", streamKey(topic), DISPATCH_GROUP, "0", "MKSTREAM");
    } catch (error) {
      if (!errorMessage(error).includes("BUSYGROUP")) {
        throw error;
      }
    }
  }

  async consume(topic: string, consumerId: string, count: number): Promise<DeliveredMessage[]> {
    const response = await this.redis.xreadgroup(
      "GROUP",
      DISPATCH_GROUP,
      consumerId,
      "COUNT",
      count,
      "BLOCK",
      this.blockMs,
      "STREAMS",
      streamKey(topic),
      ">"
    );
    if (!Array.isArray(response) || response.length === 0) return [];
    const stream: unknown = response[0];
    return Array.isArray(stream) ? parseStreamEntries(stream[1]) : [];
  }

  async ack(topic: string, messageId: string): Promise<void> {
    await this.redis.xack(streamKey(topic), DISPATCH_GROUP, messageId);
  }

  async claimStale(
    topic: string,
    consumerId: string,
    minIdleMs: number,
    count: number
  ): Promise<DeliveredMessage[]> {
    const response = await this.redis.xautoclaim(
      streamKey(topic),
      DISPATCH_GROUP,
      consumerId,
      minIdleMs,
      "0-0",
      "COUNT",
      count
    );
    return parseStreamEntries(response[1]);
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}

export function streamKey(topic: string): string {
  return `dispatch:${topic}`;
}
