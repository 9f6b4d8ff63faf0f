import dotenv from "dotenv";
import { Pool } from "pg";
import { CACHE_TABLE_DDL } from "./routing/cacheBackends";

dotenv.config();

const connectionString = process.env.DATABASE_URL;

const pool = connectionString
  ? new Pool({ connectionString })
  : new Pool({
      host: process.env.PGHOST,
      port: process.env.PGPORT ? Number(process.env.PGPORT) : undefined,
      user: process.env.PGUSER,
      password: process.env.PGPASSWORD,
      database: process.env.PGDATABASE,
      ssl: process.env.PGSSLMODE === "require" ? { rejectUnauthorized: false } : undefined
    });

pool.on("error", (error: Error) => {
  console.error("Unexpected PostgreSQL error", error);
});

export async function initCacheTable(): Promise<void> {
  await pool.query(CACHE_TABLE_DDL);
}

export default pool;
