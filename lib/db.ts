import { fileURLToPath } from "node:url";
import postgres from "postgres";

export type Sql = postgres.Sql;

const SCHEMA_PATH = fileURLToPath(new URL("../db/schema.sql", import.meta.url));

export function createSql(connectionString: string): Sql {
  // PgBouncer in transaction mode does not support named prepared statements,
  // so stay on the simple query protocol.
  return postgres(connectionString, {
    prepare: false,
    max: 5
  });
}

/** Creates the tables on first run; every statement is idempotent. */
export async function ensureSchema(sql: Sql) {
  await sql.file(SCHEMA_PATH);
}
