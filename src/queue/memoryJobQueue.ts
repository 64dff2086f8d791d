import { JobDescriptor } from "../types/job";
import { Delivery, JobQueue, decodeDescriptor, encodeDescriptor } from "./jobQueue";

export class MemoryJobQueue implements JobQueue {
  private pending: string[] = [];
  private inFlight: string[] = [];

  async enqueue(descriptor: JobDescriptor): Promise<void> {
    this.pending.push(encodeDescriptor(descriptor));
  }

  async dequeue(): Promise<Delivery | null> {
    let raw = this.pending.shift();
    while (raw !== undefined) {
      const descriptor = decodeDescriptor(raw);
      if (descriptor) {
        this.inFlight.push(raw);
        return { descriptor, raw };
      }
      raw = this.pending.shift();
    }
    return null;
  }

  async ack(delivery: Delivery): Promise<void> {
    const index = this.inFlight.indexOf(delivery.raw);
    if (index >= 0) {
      this.inFlight.splice(index, 1);
    }
  }

  async requeueInFlight(): Promise<number> {
    const moved = this.inFlight.length;
    this.pending.unshift(...this.inFlight);
    this.inFlight = [];
    return moved;
  }

  async close(): Promise<void> {
    this.pending = [];
    this.inFlight = [];
  }

  get size() {
    return { pending: this.pending.length, inFlight: this.inFlight.length };
  }
}
