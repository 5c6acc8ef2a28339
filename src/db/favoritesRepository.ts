// src/db/favoritesRepository.ts
// Persistence boundary for favorite recipes, plus the Postgres implementation.

import { z } from "zod";
import { recipeSchema } from "../services/recipeValidator";
import type { FavoriteDraft, FavoriteRecord, FavoritesFilter } from "../types/recipe";
import { errMessage } from "../utils/errors";

export interface FavoritesRepository {
  readonly kind: "postgres" | "memory";
  /** Inserts a new record atomically. Never overwrites. */
  insert(draft: FavoriteDraft, createdAt: Date): Promise<FavoriteRecord>;
  /** Most recent first. Filters are already lower-cased. */
  list(filter: FavoritesFilter): Promise<FavoriteRecord[]>;
  /** false when no record had this id */
  delete(id: number): Promise<boolean>;
}

/** The slice of a pg Pool the repository uses; a real Pool satisfies it */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
}

export interface SqlPool extends SqlClient {
  connect(): Promise<SqlClient & { release(): void }>;
}

const nonNegative = z.number().finite().nonnegative();

// Rows are re-validated on the way out so a hand-edited row cannot leak a
// malformed recipe to callers. BIGSERIAL ids arrive from pg as strings.
const favoriteRowSchema = z.object({
  id: z.union([z.number().int(), z.string().regex(/^\d+$/).transform(Number)]),
  title: z.string(),
  items_used: z.array(z.string()),
  tags: z.array(z.string()),
  calories: z.number().int(),
  macros: z.object({ protein_g: nonNegative, fat_g: nonNegative, carbs_g: nonNegative }),
  recipe: recipeSchema,
  created_at: z.coerce.date(),
});

export function rowToFavorite(row: unknown): FavoriteRecord {
  return favoriteRowSchema.parse(row);
}

export class PgFavoritesRepository implements FavoritesRepository {
  readonly kind = "postgres" as const;

  constructor(private readonly pool: SqlPool) {}

  async insert(draft: FavoriteDraft, createdAt: Date): Promise<FavoriteRecord> {
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      const result = await client.query(
        `
        INSERT INTO favorite_recipes (
          title, items_used, tags, calories, macros, recipe, created_at
        )
        VALUES ($1, $2, $3, $4, $5, $6, $7)
        RETURNING *
      `,
        [
          draft.title,
          JSON.stringify(draft.items_used),
          JSON.stringify(draft.tags),
          draft.calories,
          JSON.stringify(draft.macros),
          JSON.stringify(draft.recipe),
          createdAt,
        ]
      );
      await client.query("COMMIT");

      const row: unknown = result.rows[0];
      return rowToFavorite(row);
    } catch (err) {
      // A failed rollback is logged; the caller still sees the insert error
      await client.query("ROLLBACK").catch((rollbackErr: unknown) => {
        console.error("[favorites][pg] rollback failed", { msg: errMessage(rollbackErr) });
      });
      throw err;
    } finally {
      client.release();
    }
  }

  async list(filter: FavoritesFilter): Promise<FavoriteRecord[]> {
    const result = await this.pool.query(
      `
      SELECT * FROM favorite_recipes
      WHERE ($1::text IS NULL OR tags @> jsonb_build_array($1::text))
        AND ($2::text IS NULL OR tags @> jsonb_build_array($2::text))
      ORDER BY created_at DESC, id DESC
    `,
      [filter.tag ?? null, filter.cuisine ?? null]
    );

    return result.rows.map((row) => rowToFavorite(row));
  }

  async delete(id: number): Promise<boolean> {
    const result = await this.pool.query(
      `
      DELETE FROM favorite_recipes
      WHERE id = $1
      RETURNING id
    `,
      [id]
    );
    return (result.rowCount ?? 0) > 0;
  }
}
