import { z } from "zod";
import { JobDescriptor } from "../types/job";

export interface Delivery {
  descriptor: JobDescriptor;
  /** Serialized payload as stored by the queue; used to acknowledge it. */
  raw: string;
}

/**
 * At-least-once delivery channel between the gateway and workers. A delivery
 * stays in flight until acked; `requeueInFlight` hands unacked work back.
 */
export interface JobQueue {
  enqueue(descriptor: JobDescriptor): Promise<void>;
  dequeue(): Promise<Delivery | null>;
  ack(delivery: Delivery): Promise<void>;
  requeueInFlight(): Promise<number>;
  close(): Promise<void>;
}

const payloadSchema = z.object({
  jobId: z.string().min(1),
  enqueuedAt: z.string().optional(),
});

export function encodeDescriptor(descriptor: JobDescriptor, now = new Date()) {
  return JSON.stringify({ jobId: descriptor.jobId, enqueuedAt: now.toISOString() });
}

export function decodeDescriptor(raw: string): JobDescriptor | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  const result = payloadSchema.safeParse(parsed);
  return result.success ? { jobId: result.data.jobId } : null;
}
