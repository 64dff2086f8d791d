import { describe, expect, it } from "vitest";
import { MemoryJobStore } from "./memoryJobRepository";

function clock() {
  let tick = 0;
  return () => new Date(Date.UTC(2025, 0, 1, 0, 0, tick++));
}

const input = {
  id: "job-1",
  filePath: "/tmp/uploads/financial_document_job-1.pdf",
  originalFilename: "annual.pdf",
  query: "Summarize this report",
};

describe("MemoryJobStore", () => {
  it("creates pending jobs with no result or error", async () => {
    const store = new MemoryJobStore(clock());
    const job = await store.createJob(input);
    expect(job).toEqual({
      id: "job-1",
      status: "pending",
      file_path: input.filePath,
      original_filename: "annual.pdf",
      query: "Summarize this report",
      result_text: null,
      error_message: null,
      created_at: new Date("2025-01-01T00:00:00.000Z"),
      updated_at: new Date("2025-01-01T00:00:00.000Z"),
    });
  });

  it("never reuses an id", async () => {
    const store = new MemoryJobStore();
    await store.createJob(input);
    await expect(store.createJob(input)).rejects.toThrow("Job job-1 already exists");
  });

  it("claims a pending job exactly once and refreshes updated_at", async () => {
    const store = new MemoryJobStore(clock());
    await store.createJob(input);

    const claimed = await store.claimJob("job-1");
    expect(claimed?.status).toBe("processing");
    expect(claimed?.updated_at).toEqual(new Date("2025-01-01T00:00:01.000Z"));
    await expect(store.claimJob("job-1")).resolves.toBeNull();
    await expect(store.claimJob("nope")).resolves.toBeNull();
  });

  it("only finishes jobs that are processing", async () => {
    const store = new MemoryJobStore();
    await store.createJob(input);

    await expect(store.finishJob("job-1", { status: "completed", resultText: "ok" })).resolves.toBeNull();
    await store.claimJob("job-1");
    const finished = await store.finishJob("job-1", { status: "failed", errorMessage: "boom" });
    expect(finished).toMatchObject({ status: "failed", result_text: null, error_message: "boom" });
    await expect(store.finishJob("job-1", { status: "completed", resultText: "late" })).resolves.toBeNull();
    expect((await store.getJob("job-1"))?.status).toBe("failed");
  });

  it("lists recent jobs newest first", async () => {
    const store = new MemoryJobStore(clock());
    await store.createJob(input);
    await store.createJob({ ...input, id: "job-2" });
    await store.createJob({ ...input, id: "job-3" });

    const recent = await store.listRecentJobs(2);
    expect(recent.map((job) => job.id)).toEqual(["job-3", "job-2"]);
  });

  it("returns copies that do not alias stored rows", async () => {
    const store = new MemoryJobStore();
    const job = await store.createJob(input);
    job.status = "completed";
    expect((await store.getJob("job-1"))?.status).toBe("pending");
  });
});
