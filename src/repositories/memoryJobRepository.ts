import { AnalysisJob, CreateJobInput, JobOutcome } from "../types/job";
import { JobStore } from "./jobRepository";

/**
 * Single-process job store. Each method reads and writes the map without an
 * await in between, so the CAS transitions hold under concurrent callers.
 */
export class MemoryJobStore implements JobStore {
  private readonly jobs = new Map<string, AnalysisJob>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async createJob(input: CreateJobInput): Promise<AnalysisJob> {
    if (this.jobs.has(input.id)) {
      throw new Error(`Job ${input.id} already exists`);
    }
    const timestamp = this.now();
    const job: AnalysisJob = {
      id: input.id,
      status: "pending",
      file_path: input.filePath,
      original_filename: input.originalFilename,
      query: input.query,
      result_text: null,
      error_message: null,
      created_at: timestamp,
      updated_at: timestamp,
    };
    this.jobs.set(job.id, job);
    return { ...job };
  }

  async getJob(jobId: string): Promise<AnalysisJob | null> {
    const job = this.jobs.get(jobId);
    return job ? { ...job } : null;
  }

  async listRecentJobs(limit: number): Promise<AnalysisJob[]> {
    return [...this.jobs.values()]
      .sort((a, b) => b.created_at.getTime() - a.created_at.getTime())
      .slice(0, limit)
      .map((job) => ({ ...job }));
  }

  async claimJob(jobId: string): Promise<AnalysisJob | null> {
    const job = this.jobs.get(jobId);
    if (!job || job.status !== "pending") {
      return null;
    }
    job.status = "processing";
    job.updated_at = this.now();
    return { ...job };
  }

  async finishJob(jobId: string, outcome: JobOutcome): Promise<AnalysisJob | null> {
    const job = this.jobs.get(jobId);
    if (!job || job.status !== "processing") {
      return null;
    }
    job.status = outcome.status;
    job.result_text = outcome.status === "completed" ? outcome.resultText : null;
    job.error_message = outcome.status === "failed" ? outcome.errorMessage : null;
    job.updated_at = this.now();
    return { ...job };
  }
}
