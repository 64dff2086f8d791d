import { loadConfig } from "./config";
import { createServices } from "./container";
import { logger } from "./logger";
import { runMigrations } from "./migrate";
import { buildServer } from "./server";
import { Worker } from "./services/worker";

async function start() {
  const config = loadConfig();
  const services = createServices(config);
  await runMigrations(services.pool);

  const app = await buildServer({
    store: services.store,
    queue: services.queue,
    orchestrator: services.orchestrator,
    pipeline: services.pipeline,
    uploads: config.uploads,
    analysisTimeoutMs: config.worker.analysisTimeoutMs,
  });

  const worker = config.worker.embedded
    ? new Worker(services.queue, services.orchestrator, config.worker)
    : null;
  await worker?.start();

  app.addHook("onClose", async () => {
    await worker?.stop();
    await services.close();
  });
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      logger.info({ signal }, "Shutting down");
      app.close().catch((err) => {
        logger.error({ err }, "Shutdown failed");
        process.exitCode = 1;
      });
    });
  }

  return { app, port: config.port };
}

start()
  .then(({ app, port }) => {
    app.listen({ port, host: "0.0.0.0" }, (err, address) => {
      if (err) {
        app.log.error(err);
        process.exit(1);
      }
      app.log.info(`Server listening on ${address}`);
    });
  })
  .catch((err) => {
    logger.error({ err }, "Failed to start server");
    process.exit(1);
  });
