import type { AppConfig } from "../config.js";
import { createDatabase } from "../db/index.js";
import { VECTOR_DIMENSIONS } from "../db/schema.js";
import { PostgresPageStore } from "./postgres.js";

export { MemoryPageStore } from "./memory.js";
export { PostgresPageStore } from "./postgres.js";
export type * from "./types.js";

export function openPostgresStore(config: AppConfig): PostgresPageStore {
  if (config.embedding.dimensions !== VECTOR_DIMENSIONS) {
    throw new Error(
      `EMBEDDING_DIMENSIONS is ${config.embedding.dimensions} but the vector columns hold ${VECTOR_DIMENSIONS}`
    );
  }
  const { db, pool } = createDatabase(config.databaseUrl);
  return new PostgresPageStore(db, pool, config.search.efSearch);
}
