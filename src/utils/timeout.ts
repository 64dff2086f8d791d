import { AnalysisFailure } from "../errors";

/**
 * Runs `work` with a signal that is aborted once `ms` elapses. The returned
 * promise rejects with the timeout error at that point; `work` is expected to
 * stop at its next check of the signal. `ms <= 0` disables the bound.
 */
export async function withTimeout<T>(work: (signal: AbortSignal) => Promise<T>, ms: number): Promise<T> {
  const controller = new AbortController();
  if (!(ms > 0)) {
    return work(controller.signal);
  }
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new AnalysisFailure(`Analysis timed out after ${ms}ms`);
      reject(error);
      controller.abort(error);
    }, ms);
  });
  try {
    return await Promise.race([work(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
