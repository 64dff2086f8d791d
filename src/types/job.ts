export type JobStatus = "pending" | "processing" | "completed" | "failed";

export const DEFAULT_QUERY = "Analyze this financial document for investment insights";

export interface AnalysisJob {
  id: string;
  status: JobStatus;
  file_path: string;
  original_filename: string | null;
  query: string;
  result_text: string | null;
  error_message: string | null;
  created_at: Date;
  updated_at: Date;
}

export interface CreateJobInput {
  id: string;
  filePath: string;
  originalFilename: string | null;
  query: string;
}

/** What travels over the queue; the job row stays the source of truth. */
export interface JobDescriptor {
  jobId: string;
}

export type JobOutcome =
  | { status: "completed"; resultText: string }
  | { status: "failed"; errorMessage: string };

export type ProcessOutcome =
  | { kind: "not_found"; jobId: string }
  | { kind: "skipped"; jobId: string; status: JobStatus }
  | { kind: "completed"; jobId: string }
  | { kind: "failed"; jobId: string; errorMessage: string }
  | { kind: "error"; jobId: string; message: string };

export function normalizeQuery(query?: string | null) {
  const trimmed = (query ?? "").trim();
  return trimmed || DEFAULT_QUERY;
}
