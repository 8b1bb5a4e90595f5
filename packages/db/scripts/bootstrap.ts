import process from "node:process";
import { logger } from "@glossa/core";
import pg from "pg";
import { db } from "../src/client";
import { postgresConfig } from "../src/config";
import { loadSchema } from "./schema";
import { sortedSqlFiles } from "./schema-order";

async function schemaExists(config: pg.ClientConfig) {
  const pool = new pg.Pool(config);
  try {
    const res = await pool.query<{ exists: boolean }>(
      `SELECT EXISTS (
         SELECT 1
         FROM information_schema.tables
         WHERE table_schema = 'public'
           AND table_name = 'semantic_constant'
       ) AS exists;`,
    );
    return Boolean(res.rows[0]?.exists);
  }
  finally {
    await pool.end();
  }
}

/**
 * Creates the registry schema in an existing, empty database. Unlike
 * `reset`, this never drops anything.
 */
export async function bootstrapDatabase() {
  logger.info("Bootstrapping database...");

  await loadSchema(db, sortedSqlFiles);

  logger.info("Database bootstrapped successfully.");
}

if (import.meta.url === `file://${process.argv[1]}`) {
  try {
    if (await schemaExists(postgresConfig)) {
      logger.info("Schema already present, nothing to do.");
    }
    else {
      await bootstrapDatabase();
    }
  }
  finally {
    await db.close();
  }
}
