import { Counter, Histogram, Registry, collectDefaultMetrics } from "prom-client";

export const metricsRegistry = new Registry();
collectDefaultMetrics({ register: metricsRegistry });

export const jobStatusCounter = new Counter({
  name: "doc_analysis_jobs_total",
  help: "Analysis jobs processed, by outcome",
  labelNames: ["status"],
  registers: [metricsRegistry],
});

export const jobDurationHistogram = new Histogram({
  name: "doc_analysis_job_duration_seconds",
  help: "Time from claim to terminal state in seconds",
  buckets: [5, 15, 30, 60, 120, 300, 600],
  labelNames: ["status"],
  registers: [metricsRegistry],
});

export const engineLatencyHistogram = new Histogram({
  name: "doc_analysis_engine_latency_seconds",
  help: "Latency of analysis engine steps",
  buckets: [0.5, 1, 2, 5, 10, 20, 30, 60],
  labelNames: ["step"],
  registers: [metricsRegistry],
});

export const engineErrorsCounter = new Counter({
  name: "doc_analysis_engine_errors_total",
  help: "Analysis engine failures by step",
  labelNames: ["step"],
  registers: [metricsRegistry],
});

export const submissionsCounter = new Counter({
  name: "doc_analysis_submissions_total",
  help: "Gateway submissions by mode and result",
  labelNames: ["mode", "result"],
  registers: [metricsRegistry],
});

export function startEngineTimer(step: string) {
  return engineLatencyHistogram.startTimer({ step });
}

export function recordEngineError(step: string) {
  engineErrorsCounter.labels(step).inc();
}
