import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";

/**
 * Builds both typed ORM and raw SQL clients over one connection; the ingestion run is strictly sequential.
 */
export const createDb = (connectionString: string) => {
  const sql = postgres(connectionString, { max: 1 });
  const db = drizzle(sql);
  return { db, sql };
};
