import { Pool } from "pg";
import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import { logger } from "../utils/logger";

export type Database = NodePgDatabase;

const isLocalDatabase = (url: string) =>
  url.includes("localhost") || url.includes("127.0.0.1");

// Local Postgres usually has no TLS, so sslmode & co. are stripped for it
const stripSslParams = (url: string) =>
  url
    .replace(/[?&]sslmode=[^&]*/gi, "")
    .replace(/[?&]ssl=[^&]*/gi, "")
    .replace(/[?&]channel_binding=[^&]*/gi, "");

/**
 * Opens a pg pool for `databaseUrl` and wraps it in drizzle.
 *
 * Remote databases get TLS without certificate verification; managed
 * providers often present certs Node's default store rejects.
 */
export const createDatabase = (databaseUrl: string) => {
  const isLocal = isLocalDatabase(databaseUrl);
  const connectionString = isLocal ? stripSslParams(databaseUrl) : databaseUrl;
  const ssl: false | { rejectUnauthorized: boolean } = isLocal
    ? false
    : { rejectUnauthorized: false };

  logger.debug(`SSL configuration: ${ssl === false ? "disabled" : "enabled"}`);

  const pool = new Pool({ connectionString, ssl });

  pool.on("error", (err) => {
    logger.error("Unexpected database pool error:", err);
  });

  const db: Database = drizzle(pool);

  return { db, pool };
};

export const checkDbConnection = async (pool: Pool) => {
  try {
    const result = await pool.query<{ current_database: string }>(
      "SELECT current_database()"
    );
    logger.info("Connected to DB:", result.rows[0]?.current_database);
  } catch (error) {
    const code =
      error instanceof Error && "code" in error ? String(error.code) : undefined;
    logger.error("Database connection error:", error instanceof Error ? error.message : error);
    if (code === "ECONNREFUSED") {
      logger.error("Tip: make sure PostgreSQL is running and DATABASE_URL points at it");
    } else if (code === "28P01") {
      logger.error("Tip: check the database username and password");
    } else if (code === "3D000") {
      logger.error("Tip: the database does not exist, create it first");
    }
    throw error;
  }
};
