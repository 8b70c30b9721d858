import pg from "pg";
import type { FastifyBaseLogger } from "fastify";

export type Pool = pg.Pool;

export function createPool(databaseUrl: string, logger: FastifyBaseLogger): Pool {
  const pool = new pg.Pool({
    connectionString: databaseUrl,
    max: 10,
    connectionTimeoutMillis: 2_000
  });

  pool.on("error", (error: Error) => {
    logger.error({ err: error }, "Postgres pool error");
  });

  return pool;
}
