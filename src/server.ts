import { randomUUID } from "node:crypto";
import { STATUS_CODES } from "node:http";
import Fastify, { FastifyInstance, FastifyRequest } from "fastify";
import multipart from "@fastify/multipart";
import sensible from "@fastify/sensible";
import { ZodError, z } from "zod";
import { AppConfig } from "./config";
import { describeError } from "./errors";
import { metricsRegistry, submissionsCounter } from "./metrics";
import { JobQueue } from "./queue/jobQueue";
import { JobStore } from "./repositories/jobRepository";
import { DocumentPipeline } from "./services/documentAnalyzer";
import { JobOrchestrator } from "./services/orchestrator";
import { isPdfFilename, removeUpload, saveUpload } from "./services/uploadStorage";
import { AnalysisJob, JobStatus, normalizeQuery } from "./types/job";
import { withTimeout } from "./utils/timeout";

export interface GatewayDeps {
  store: JobStore;
  queue: JobQueue;
  orchestrator: Pick<JobOrchestrator, "abandon">;
  pipeline: DocumentPipeline;
  uploads: AppConfig["uploads"];
  /** Bound on `POST /analyze/sync`; 0 disables it. */
  analysisTimeoutMs?: number;
  logLevel?: string;
  newId?: () => string;
}

interface Submission {
  file: { filename: string; content: Buffer } | null;
  query?: string;
}

export interface JobView {
  job_id: string;
  status: JobStatus;
  query: string;
  file_processed: string | null;
  created_at: string;
  updated_at: string;
  analysis?: string;
  error?: string;
}

const listQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).optional(),
});
const jobIdSchema = z.string().uuid();

export function serializeJob(job: AnalysisJob): JobView {
  const view: JobView = {
    job_id: job.id,
    status: job.status,
    query: job.query,
    file_processed: job.original_filename,
    created_at: job.created_at.toISOString(),
    updated_at: job.updated_at.toISOString(),
  };
  if (job.status === "completed" && job.result_text !== null) {
    view.analysis = job.result_text;
  }
  if (job.status === "failed" && job.error_message) {
    view.error = job.error_message;
  }
  return view;
}

async function readSubmission(request: FastifyRequest): Promise<Submission> {
  const submission: Submission = { file: null };
  if (!request.isMultipart()) {
    return submission;
  }
  for await (const part of request.parts()) {
    if (part.type === "file") {
      // drain every file part so the request completes
      const content = await part.toBuffer();
      if (part.fieldname === "file" && !submission.file) {
        submission.file = { filename: part.filename, content };
      }
    } else if (part.fieldname === "query" && typeof part.value === "string") {
      submission.query = part.value;
    }
  }
  return submission;
}

export async function buildServer(deps: GatewayDeps): Promise<FastifyInstance> {
  const newId = deps.newId ?? randomUUID;
  const app = Fastify({
    logger: {
      level: deps.logLevel ?? process.env.LOG_LEVEL ?? "info",
    },
  });
  await app.register(sensible);
  await app.register(multipart, {
    limits: { fileSize: deps.uploads.maxBytes, files: 1 },
    throwFileSizeLimit: true,
  });

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof ZodError) {
      reply.status(400).send({
        statusCode: 400,
        error: STATUS_CODES[400],
        message: error.issues.map((issue) => `${issue.path.join(".") || "request"}: ${issue.message}`).join("; "),
      });
      return;
    }
    const statusCode =
      typeof error.statusCode === "number" && error.statusCode >= 400 ? error.statusCode : 500;
    if (statusCode >= 500) {
      request.log.error({ err: error }, "Request failed");
    }
    reply.status(statusCode).send({
      statusCode,
      error: STATUS_CODES[statusCode] ?? "Error",
      message: error.message,
    });
  });

  async function acceptPdf(request: FastifyRequest, mode: "async" | "sync") {
    const submission = await readSubmission(request);
    if (!submission.file || !isPdfFilename(submission.file.filename)) {
      submissionsCounter.labels(mode, "rejected").inc();
      throw app.httpErrors.badRequest("A PDF file is required.");
    }
    const id = newId();
    let filePath: string;
    try {
      filePath = await saveUpload(deps.uploads.dir, id, submission.file.content);
    } catch (error) {
      throw app.httpErrors.internalServerError(`Failed to save file: ${describeError(error)}`);
    }
    return {
      id,
      filePath,
      filename: submission.file.filename,
      query: normalizeQuery(submission.query),
    };
  }

  app.get("/", async () => ({
    message: "Financial document analyzer API is running",
    docs: "POST /analyze, GET /analyze/:id, POST /analyze/sync",
  }));

  app.get("/healthz", async () => ({ status: "ok" }));
  app.get("/metrics", async (_, reply) => {
    reply.header("content-type", metricsRegistry.contentType);
    return metricsRegistry.metrics();
  });

  app.post("/analyze", async (request, reply) => {
    const upload = await acceptPdf(request, "async");

    let job: AnalysisJob;
    try {
      job = await deps.store.createJob({
        id: upload.id,
        filePath: upload.filePath,
        originalFilename: upload.filename,
        query: upload.query,
      });
    } catch (error) {
      await removeUpload(upload.filePath);
      throw error;
    }

    try {
      await deps.queue.enqueue({ jobId: job.id });
    } catch (error) {
      request.log.error({ error, jobId: job.id }, "Failed to enqueue job");
      try {
        await deps.orchestrator.abandon(job.id, `Failed to enqueue: ${describeError(error)}`);
      } catch (abandonError) {
        request.log.error({ error: abandonError, jobId: job.id }, "Failed to mark unqueued job as failed");
        await removeUpload(upload.filePath);
      }
      submissionsCounter.labels("async", "queue_unavailable").inc();
      throw app.httpErrors.serviceUnavailable("Queue unavailable; try /analyze/sync");
    }

    submissionsCounter.labels("async", "accepted").inc();
    reply.code(202);
    return {
      job_id: job.id,
      status: job.status,
      message: `Analysis queued. Poll GET /analyze/${job.id} for result.`,
    };
  });

  app.get("/analyze", async (request) => {
    const query = listQuerySchema.parse(request.query ?? {});
    const jobs = await deps.store.listRecentJobs(query.limit ?? 20);
    return {
      jobs: jobs.map((job) => ({
        job_id: job.id,
        status: job.status,
        file_processed: job.original_filename,
        created_at: job.created_at.toISOString(),
        updated_at: job.updated_at.toISOString(),
        has_analysis: job.status === "completed",
      })),
    };
  });

  app.get<{ Params: { id: string } }>("/analyze/:id", async (request) => {
    const id = jobIdSchema.safeParse(request.params.id);
    const job = id.success ? await deps.store.getJob(id.data) : null;
    if (!job) {
      throw app.httpErrors.notFound("Job not found");
    }
    return serializeJob(job);
  });

  app.post("/analyze/sync", async (request) => {
    const upload = await acceptPdf(request, "sync");
    try {
      const analysis = await withTimeout(
        (signal) => deps.pipeline.run(upload.query, upload.filePath, signal),
        deps.analysisTimeoutMs ?? 0,
      );
      submissionsCounter.labels("sync", "completed").inc();
      return {
        status: "success",
        query: upload.query,
        analysis,
        file_processed: upload.filename,
      };
    } catch (error) {
      submissionsCounter.labels("sync", "failed").inc();
      throw app.httpErrors.internalServerError(`Error processing document: ${describeError(error)}`);
    } finally {
      await removeUpload(upload.filePath);
    }
  });

  return app;
}
