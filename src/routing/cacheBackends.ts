import type { QueryResultRow } from "pg";
import { z } from "zod";
import { PersistedCacheRow, PersistenceBackend } from "./types";

/** Keeps rows in a plain map; useful as a stand-in for a durable store. */
export class MemoryCacheBackend implements PersistenceBackend {
  private readonly rows = new Map<string, PersistedCacheRow>();

  async get(key: string): Promise<PersistedCacheRow | null> {
    const row = this.rows.get(key);
    return row ? { ...row } : null;
  }

  async set(row: PersistedCacheRow): Promise<void> {
    this.rows.set(row.key, { ...row });
  }

  async delete(key: string): Promise<void> {
    this.rows.delete(key);
  }

  async clear(): Promise<void> {
    this.rows.clear();
  }

  get size(): number {
    return this.rows.size;
  }
}

/** The slice of a pg Pool or Client the backends use. */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: QueryResultRow[] }>;
}

const CacheRowSchema = z.object({
  cache_key: z.string(),
  query_text: z.string(),
  tool_used: z.string(),
  value: z.string(),
  created_at: z.coerce.number(),
  ttl_seconds: z.coerce.number(),
  hit_count: z.coerce.number(),
  last_accessed: z.coerce.number()
});

export const CACHE_TABLE_DDL = `
  CREATE TABLE IF NOT EXISTS query_cache (
    cache_key TEXT PRIMARY KEY,
    query_text TEXT NOT NULL,
    tool_used TEXT NOT NULL,
    value TEXT NOT NULL,
    created_at BIGINT NOT NULL,
    ttl_seconds INTEGER NOT NULL,
    hit_count INTEGER NOT NULL DEFAULT 0,
    last_accessed BIGINT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_query_cache_tool ON query_cache (tool_used);
`;

export class PostgresCacheBackend implements PersistenceBackend {
  constructor(private readonly db: Queryable) {}

  async get(key: string): Promise<PersistedCacheRow | null> {
    const result = await this.db.query(
      `SELECT cache_key, query_text, tool_used, value, created_at, ttl_seconds, hit_count, last_accessed
       FROM query_cache WHERE cache_key = $1`,
      [key]
    );
    const row = result.rows[0];
    if (!row) {
      return null;
    }
    const parsed = CacheRowSchema.safeParse(row);
    if (!parsed.success) {
      throw new Error(`Malformed query_cache row for ${key}`);
    }
    return {
      key: parsed.data.cache_key,
      query: parsed.data.query_text,
      tool: parsed.data.tool_used,
      value: parsed.data.value,
      createdAt: parsed.data.created_at,
      ttlSeconds: parsed.data.ttl_seconds,
      hitCount: parsed.data.hit_count,
      lastAccessed: parsed.data.last_accessed
    };
  }

  async set(row: PersistedCacheRow): Promise<void> {
    await this.db.query(
      `INSERT INTO query_cache (cache_key, query_text, tool_used, value, created_at, ttl_seconds, hit_count, last_accessed)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
       ON CONFLICT (cache_key) DO UPDATE SET
         value = EXCLUDED.value,
         created_at = EXCLUDED.created_at,
         ttl_seconds = EXCLUDED.ttl_seconds,
         hit_count = EXCLUDED.hit_count,
         last_accessed = EXCLUDED.last_accessed`,
      [row.key, row.query, row.tool, row.value, row.createdAt, row.ttlSeconds, row.hitCount, row.lastAccessed]
    );
  }

  async delete(key: string): Promise<void> {
    await this.db.query("DELETE FROM query_cache WHERE cache_key = $1", [key]);
  }

  async clear(): Promise<void> {
    await this.db.query("DELETE FROM query_cache");
  }
}
