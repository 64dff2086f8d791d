import { Pool } from "pg";
import { AppConfig } from "./config";
import { logger } from "./logger";

export function createPool(database: AppConfig["database"]) {
  const pool = new Pool({
    host: database.host,
    port: database.port,
    user: database.user,
    password: database.password,
    database: database.database,
    max: 10,
  });
  pool.on("error", (err) => {
    logger.error({ err }, "Idle Postgres client error");
  });
  return pool;
}
