import { Pool } from "pg";

export interface PoolOptions {
  url: string;
  ssl: boolean;
}

export function createPool(options: PoolOptions): Pool {
  return new Pool({
    connectionString: options.url,
    // Hosted Postgres (Railway, Render) terminates TLS with its own certs
    ssl: options.ssl ? { rejectUnauthorized: false } : undefined,
  });
}
