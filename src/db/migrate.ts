import "dotenv/config";
import type { Pool } from "pg";
import { createPool } from "./pool";

export async function migrate(pool: Pool): Promise<void> {
  console.log("Starting database migration...\n");

  await pool.query(`
    CREATE TABLE IF NOT EXISTS favorite_recipes (
      id BIGSERIAL PRIMARY KEY,
      title TEXT NOT NULL,
      items_used JSONB NOT NULL DEFAULT '[]',
      tags JSONB NOT NULL DEFAULT '[]',
      calories INTEGER NOT NULL DEFAULT 0,
      macros JSONB NOT NULL,
      recipe JSONB NOT NULL,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);
  console.log("✅ favorite_recipes table ready");

  await pool.query(`
    CREATE INDEX IF NOT EXISTS idx_favorite_recipes_created
    ON favorite_recipes(created_at DESC, id DESC);
  `);
  // Containment queries for tag / cuisine filters
  await pool.query(`
    CREATE INDEX IF NOT EXISTS idx_favorite_recipes_tags
    ON favorite_recipes USING GIN (tags);
  `);
  console.log("✅ Indexes created");

  console.log("\n🎉 Migration completed successfully!");
}

if (require.main === module) {
  const url = process.env.DATABASE_URL;
  if (!url) {
    console.error("❌ DATABASE_URL missing — nothing to migrate");
    process.exit(1);
  }
  const pool = createPool({ url, ssl: process.env.DATABASE_SSL === "true" });
  migrate(pool)
    .then(() => pool.end())
    .catch((err) => {
      console.error("❌ Migration failed", err);
      process.exit(1);
    });
}
