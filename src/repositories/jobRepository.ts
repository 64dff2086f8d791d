import { AnalysisJob, CreateJobInput, JobOutcome } from "../types/job";

/** The slice of `pg.Pool` the store uses. */
export interface SqlClient {
  query(text: string, values: unknown[]): Promise<{ rows: AnalysisJob[] }>;
}

export interface JobStore {
  createJob(input: CreateJobInput): Promise<AnalysisJob>;
  getJob(jobId: string): Promise<AnalysisJob | null>;
  listRecentJobs(limit: number): Promise<AnalysisJob[]>;
  /**
   * Compare-and-set `pending -> processing`. Resolves to the claimed row, or
   * null when the job is missing or another invocation already moved it on.
   */
  claimJob(jobId: string): Promise<AnalysisJob | null>;
  /** Compare-and-set `processing -> completed | failed`. */
  finishJob(jobId: string, outcome: JobOutcome): Promise<AnalysisJob | null>;
}

export class PgJobStore implements JobStore {
  constructor(private readonly pool: SqlClient) {}

  async createJob(input: CreateJobInput): Promise<AnalysisJob> {
    const { rows } = await this.pool.query(
      `INSERT INTO analysis_jobs (id, status, file_path, original_filename, query)
       VALUES ($1, 'pending', $2, $3, $4)
       RETURNING *`,
      [input.id, input.filePath, input.originalFilename, input.query],
    );
    return rows[0];
  }

  async getJob(jobId: string): Promise<AnalysisJob | null> {
    const { rows } = await this.pool.query(
      "SELECT * FROM analysis_jobs WHERE id = $1",
      [jobId],
    );
    return rows[0] ?? null;
  }

  async listRecentJobs(limit: number): Promise<AnalysisJob[]> {
    const { rows } = await this.pool.query(
      `SELECT * FROM analysis_jobs
       ORDER BY created_at DESC
       LIMIT $1`,
      [limit],
    );
    return rows;
  }

  async claimJob(jobId: string): Promise<AnalysisJob | null> {
    const { rows } = await this.pool.query(
      `UPDATE analysis_jobs
          SET status = 'processing', updated_at = now()
        WHERE id = $1 AND status = 'pending'
        RETURNING *`,
      [jobId],
    );
    return rows[0] ?? null;
  }

  async finishJob(jobId: string, outcome: JobOutcome): Promise<AnalysisJob | null> {
    const resultText = outcome.status === "completed" ? outcome.resultText : null;
    const errorMessage = outcome.status === "failed" ? outcome.errorMessage : null;
    const { rows } = await this.pool.query(
      `UPDATE analysis_jobs
          SET status = $2, result_text = $3, error_message = $4, updated_at = now()
        WHERE id = $1 AND status = 'processing'
        RETURNING *`,
      [jobId, outcome.status, resultText, errorMessage],
    );
    return rows[0] ?? null;
  }
}
