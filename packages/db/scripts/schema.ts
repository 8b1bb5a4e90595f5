import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { logger } from "@glossa/core";
import { sql } from "kysely";
import pg from "pg";
import type { DatabaseClient } from "../src/client";

const sqlDir = path.join(path.dirname(fileURLToPath(import.meta.url)), "..", "sql");

export async function resetDatabase(config: pg.ClientConfig) {
  const currentDatabase = config.database;
  if (!currentDatabase) throw new Error("No database specified in connection config");

  const pool = new pg.Pool({ ...config, database: "postgres" });
  const quoteIdent = (ident: string) => `"${ident.replace(/"/g, "\"\"")}"`;

  try {
    logger.info(`Resetting database "${currentDatabase}"...`);

    await pool.query(
      `
      SELECT pg_terminate_backend(pid)
      FROM pg_stat_activity
      WHERE datname = $1
        AND pid <> pg_backend_pid();
      `,
      [currentDatabase],
    );

    await pool.query(`DROP DATABASE IF EXISTS ${quoteIdent(currentDatabase)};`);
    await pool.query(`CREATE DATABASE ${quoteIdent(currentDatabase)};`);
  }
  finally {
    await pool.end();
  }
}

export async function loadSchema(db: DatabaseClient, files: readonly string[]) {
  logger.info(`Loading database schema...`);

  await db.kysely.transaction().execute(async (tx) => {
    for (const filename of files) {
      const content = await fs.promises.readFile(path.join(sqlDir, filename), "utf-8");
      await sql.raw(content).execute(tx);
      logger.info(`Loaded sql/${filename}`);
    }
  });
}
