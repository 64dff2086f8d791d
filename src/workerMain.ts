import { loadConfig } from "./config";
import { createServices } from "./container";
import { logger } from "./logger";
import { Worker } from "./services/worker";

async function start() {
  const config = loadConfig();
  const services = createServices(config);
  const worker = new Worker(services.queue, services.orchestrator, config.worker);
  await worker.start();

  const shutdown = async (signal: NodeJS.Signals) => {
    logger.info({ signal, activeJobs: worker.activeJobs }, "Stopping worker");
    await worker.stop();
    await services.close();
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err) => {
        logger.error({ err }, "Worker shutdown failed");
        process.exitCode = 1;
      });
    });
  }
}

start().catch((err) => {
  logger.error({ err }, "Failed to start worker");
  process.exit(1);
});
