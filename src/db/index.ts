import { drizzle } from "drizzle-orm/node-postgres";
import pg from "pg";
import * as schema from "./schema.js";

const { Pool } = pg;

export function createDatabase(connectionString: string) {
  const pool = new Pool({ connectionString });
  const db = drizzle(pool, { schema });
  // pool is exported for raw vector queries
  return { pool, db };
}

export type Database = ReturnType<typeof createDatabase>["db"];
