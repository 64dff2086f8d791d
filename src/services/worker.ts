import { WorkerConfig } from "../config";
import { logger } from "../logger";
import { Delivery, JobQueue } from "../queue/jobQueue";
import { ProcessOutcome } from "../types/job";
import { JobOrchestrator } from "./orchestrator";

/**
 * Polls the queue and feeds deliveries to the orchestrator, at most
 * `maxConcurrent` at a time. A delivery is acked once `process` settles,
 * whatever the job's outcome; only store outages leave it in flight.
 */
export class Worker {
  private running = 0;
  private timer: NodeJS.Timeout | null = null;
  private ticking = false;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(
    private readonly queue: JobQueue,
    private readonly orchestrator: Pick<JobOrchestrator, "process">,
    private readonly options: Pick<WorkerConfig, "maxConcurrent" | "pollIntervalMs">,
  ) {}

  async start() {
    if (this.timer) {
      return;
    }
    const requeued = await this.queue.requeueInFlight();
    if (requeued) {
      logger.warn({ requeued }, "Requeued deliveries left in flight by a previous worker");
    }
    this.timer = setInterval(() => {
      void this.tick();
    }, this.options.pollIntervalMs);
    logger.info({ maxConcurrent: this.options.maxConcurrent }, "Worker started");
  }

  async stop() {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    await Promise.allSettled([...this.inFlight]);
  }

  get activeJobs() {
    return this.running;
  }

  /** Pulls deliveries until the queue is empty or the concurrency cap is hit. */
  async tick() {
    if (this.ticking) {
      return;
    }
    this.ticking = true;
    try {
      while (this.running < this.options.maxConcurrent) {
        const delivery = await this.queue.dequeue();
        if (!delivery) {
          return;
        }
        this.dispatch(delivery);
      }
    } catch (error) {
      logger.error({ error }, "Failed to dequeue job");
    } finally {
      this.ticking = false;
    }
  }

  /** Resolves once every job dispatched so far has been handled. */
  async drain() {
    while (this.inFlight.size) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  private dispatch(delivery: Delivery) {
    this.running += 1;
    const { jobId } = delivery.descriptor;
    const task = this.orchestrator
      .process(jobId)
      .then((outcome) => this.settle(delivery, outcome))
      .catch((error) => {
        logger.error({ error, jobId }, "Job handling failed");
      })
      .finally(() => {
        this.running -= 1;
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);
  }

  private async settle(delivery: Delivery, outcome: ProcessOutcome) {
    if (outcome.kind === "error") {
      logger.warn({ jobId: outcome.jobId, reason: outcome.message }, "Leaving delivery in flight");
      return;
    }
    await this.queue.ack(delivery);
  }
}
