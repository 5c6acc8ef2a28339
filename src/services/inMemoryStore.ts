import { rowToFavorite, type FavoritesRepository } from "../db/favoritesRepository";
import type { FavoriteDraft, FavoriteRecord, FavoritesFilter } from "../types/recipe";

/**
 * DEV/TEST favorites repository used when DATABASE_URL is not set.
 * Rows are kept as JSON text so reads go through the same deserialization
 * as Postgres rows. Restarts wipe memory.
 */
export class InMemoryFavoritesRepository implements FavoritesRepository {
  readonly kind = "memory" as const;

  private rows = new Map<number, string>();
  private nextId = 1;
  private writes: Promise<void> = Promise.resolve();

  // Writes run one at a time, in call order
  private serialize<T>(op: () => T): Promise<T> {
    const run = this.writes.then(op);
    // The queue only tracks completion; the caller still gets the rejection via `run`
    this.writes = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  insert(draft: FavoriteDraft, createdAt: Date): Promise<FavoriteRecord> {
    return this.serialize(() => {
      const id = this.nextId++;
      const json = JSON.stringify({ ...draft, id, created_at: createdAt.toISOString() });
      this.rows.set(id, json);
      return rowToFavorite(JSON.parse(json));
    });
  }

  async list(filter: FavoritesFilter): Promise<FavoriteRecord[]> {
    const records = Array.from(this.rows.values(), (json) => rowToFavorite(JSON.parse(json)));

    return records
      .filter((r) => !filter.tag || r.tags.includes(filter.tag))
      .filter((r) => !filter.cuisine || r.tags.includes(filter.cuisine))
      .sort((a, b) => b.created_at.getTime() - a.created_at.getTime() || b.id - a.id);
  }

  delete(id: number): Promise<boolean> {
    return this.serialize(() => this.rows.delete(id));
  }
}
