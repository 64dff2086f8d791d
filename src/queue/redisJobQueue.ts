import { QueueUnavailableError, describeError } from "../errors";
import { logger } from "../logger";
import { JobDescriptor } from "../types/job";
import { Delivery, JobQueue, decodeDescriptor, encodeDescriptor } from "./jobQueue";
import { QueueClient } from "./redis";

/**
 * Reliable-queue pattern over two Redis lists: producers push onto
 * `<prefix>:pending`, consumers move entries to `<prefix>:processing` and
 * remove them from there once handled.
 */
export class RedisJobQueue implements JobQueue {
  readonly pendingKey: string;
  readonly processingKey: string;

  constructor(
    private readonly client: QueueClient,
    prefix: string,
  ) {
    this.pendingKey = `${prefix}:pending`;
    this.processingKey = `${prefix}:processing`;
  }

  async enqueue(descriptor: JobDescriptor): Promise<void> {
    try {
      await this.client.lpush(this.pendingKey, encodeDescriptor(descriptor));
    } catch (error) {
      throw new QueueUnavailableError(`Queue unavailable: ${describeError(error)}`, { cause: error });
    }
  }

  async dequeue(): Promise<Delivery | null> {
    for (;;) {
      const raw = await this.client.lmove(this.pendingKey, this.processingKey);
      if (raw === null) {
        return null;
      }
      const descriptor = decodeDescriptor(raw);
      if (descriptor) {
        return { descriptor, raw };
      }
      logger.warn({ raw }, "Dropping malformed queue entry");
      await this.client.lrem(this.processingKey, 1, raw);
    }
  }

  async ack(delivery: Delivery): Promise<void> {
    await this.client.lrem(this.processingKey, 1, delivery.raw);
  }

  async requeueInFlight(): Promise<number> {
    let moved = 0;
    while ((await this.client.lmove(this.processingKey, this.pendingKey)) !== null) {
      moved += 1;
    }
    return moved;
  }

  async close(): Promise<void> {
    await this.client.quit();
  }
}
