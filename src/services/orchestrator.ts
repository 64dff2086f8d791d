import { WorkerConfig } from "../config";
import { describeError } from "../errors";
import { logger } from "../logger";
import { jobDurationHistogram, jobStatusCounter } from "../metrics";
import { JobStore } from "../repositories/jobRepository";
import { AnalysisJob, JobOutcome, ProcessOutcome } from "../types/job";
import { withTimeout } from "../utils/timeout";
import { DocumentPipeline } from "./documentAnalyzer";
import { FileRemover, fileExists, removeUpload } from "./uploadStorage";

/**
 * Drives a job from `pending` through `processing` to `completed` or
 * `failed`. The only writer of job rows after creation.
 *
 * `process` never rejects: analysis problems end up on the job row, and
 * problems reaching the store are reported as an `error` outcome so the
 * caller can leave the delivery unacknowledged.
 */
export class JobOrchestrator {
  constructor(
    private readonly store: JobStore,
    private readonly pipeline: DocumentPipeline,
    private readonly options: Pick<WorkerConfig, "analysisTimeoutMs">,
    private readonly removeFile: FileRemover = removeUpload,
  ) {}

  async process(jobId: string): Promise<ProcessOutcome> {
    let claimed: AnalysisJob | null;
    try {
      const job = await this.store.getJob(jobId);
      if (!job) {
        logger.warn({ jobId }, "Job not found");
        return { kind: "not_found", jobId };
      }
      if (job.status !== "pending") {
        logger.info({ jobId, status: job.status }, "Skipping job that is no longer pending");
        return { kind: "skipped", jobId, status: job.status };
      }
      claimed = await this.store.claimJob(jobId);
    } catch (error) {
      logger.error({ error, jobId }, "Failed to claim job");
      return { kind: "error", jobId, message: describeError(error) };
    }
    if (!claimed) {
      logger.info({ jobId }, "Job claimed by another worker");
      return { kind: "skipped", jobId, status: "processing" };
    }

    logger.info({ jobId }, "Starting job execution");
    const stopJobTimer = jobDurationHistogram.startTimer();
    try {
      const outcome = await this.execute(claimed);
      stopJobTimer({ status: outcome.status });
      return await this.finalize(claimed, outcome);
    } finally {
      await this.cleanup(claimed);
    }
  }

  /**
   * Fails a job that will never reach a worker, e.g. because it could not be
   * enqueued. Goes through the same claim and cleanup as `process`.
   */
  async abandon(jobId: string, reason: string): Promise<ProcessOutcome> {
    const claimed = await this.store.claimJob(jobId);
    if (!claimed) {
      return { kind: "skipped", jobId, status: "processing" };
    }
    try {
      return await this.finalize(claimed, { status: "failed", errorMessage: reason });
    } finally {
      await this.cleanup(claimed);
    }
  }

  private async cleanup(job: AnalysisJob) {
    try {
      await this.removeFile(job.file_path);
    } catch (error) {
      logger.warn({ error, jobId: job.id }, "Temporary file cleanup failed");
    }
  }

  private async execute(job: AnalysisJob): Promise<JobOutcome> {
    try {
      if (!(await fileExists(job.file_path))) {
        return { status: "failed", errorMessage: `File not found: ${job.file_path}` };
      }
      const resultText = await withTimeout(
        (signal) => this.pipeline.run(job.query, job.file_path, signal),
        this.options.analysisTimeoutMs,
      );
      if (!resultText.trim()) {
        return { status: "failed", errorMessage: "Analysis returned an empty report" };
      }
      return { status: "completed", resultText };
    } catch (error) {
      logger.warn({ error, jobId: job.id }, "Analysis failed");
      return { status: "failed", errorMessage: describeError(error) };
    }
  }

  private async finalize(job: AnalysisJob, outcome: JobOutcome): Promise<ProcessOutcome> {
    try {
      const saved = await this.store.finishJob(job.id, outcome);
      if (!saved) {
        logger.error({ jobId: job.id }, "Job left processing before it could be finalized");
      }
    } catch (error) {
      logger.error({ error, jobId: job.id, status: outcome.status }, "Failed to persist job outcome");
    }
    jobStatusCounter.labels(outcome.status).inc();
    if (outcome.status === "completed") {
      logger.info({ jobId: job.id }, "Job completed");
      return { kind: "completed", jobId: job.id };
    }
    logger.info({ jobId: job.id, error: outcome.errorMessage }, "Job failed");
    return { kind: "failed", jobId: job.id, errorMessage: outcome.errorMessage };
  }
}
