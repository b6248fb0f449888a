import { Pool } from "pg";
import { drizzle } from "drizzle-orm/node-postgres";
import * as schema from "@shared/schema";

export function createDatabase(databaseUrl: string | undefined, nodeEnv: string) {
  if (!databaseUrl) {
    throw new Error(
      "DATABASE_URL must be set. Did you forget to provision a database?",
    );
  }

  // connectionTimeoutMillis: give time for a private network / SSL handshake
  const pool = new Pool({
    connectionString: databaseUrl,
    ssl: nodeEnv !== "development" ? { rejectUnauthorized: false } : false,
    connectionTimeoutMillis: 15000,
  });

  return { pool, db: drizzle(pool, { schema }) };
}
