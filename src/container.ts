import { AppConfig } from "./config";
import { createPool } from "./db";
import { RedisJobQueue } from "./queue/redisJobQueue";
import { createRedisQueueClient } from "./queue/redis";
import { PgJobStore } from "./repositories/jobRepository";
import { LlmAnalysisEngine } from "./services/analysisEngine";
import { DocumentAnalyzer } from "./services/documentAnalyzer";
import { LlmClient } from "./services/llmClient";
import { JobOrchestrator } from "./services/orchestrator";

export function createServices(config: AppConfig) {
  const pool = createPool(config.database);
  const store = new PgJobStore(pool);
  const queue = new RedisJobQueue(createRedisQueueClient(config.queue.redisUrl), config.queue.prefix);
  const engine = new LlmAnalysisEngine(new LlmClient(config.llm), config.llm);
  const pipeline = new DocumentAnalyzer(engine);
  const orchestrator = new JobOrchestrator(store, pipeline, config.worker);

  return {
    pool,
    store,
    queue,
    pipeline,
    orchestrator,
    async close() {
      await queue.close();
      await pool.end();
    },
  };
}

export type Services = ReturnType<typeof createServices>;
