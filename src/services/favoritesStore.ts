// src/services/favoritesStore.ts

import type { FavoritesRepository } from "../db/favoritesRepository";
import type { FavoriteRecord, FavoritesFilter, Recipe } from "../types/recipe";
import { NotFoundError } from "../utils/errors";
import { validateRecipe } from "./recipeValidator";

function normalizeFilterValue(value: string | undefined): string | undefined {
  const v = value?.trim().toLowerCase();
  return v ? v : undefined;
}

/**
 * Immutable snapshots of recipes a user chose to keep.
 * There is no update: saving the same recipe twice creates two records.
 */
export class FavoritesStore {
  constructor(
    private readonly repo: FavoritesRepository,
    private readonly now: () => Date = () => new Date()
  ) {}

  async save(recipe: Recipe, itemsUsed: string[]): Promise<FavoriteRecord> {
    // Callers may hand back a recipe they edited; it goes through the same gate
    const validated = validateRecipe(recipe);
    const items = itemsUsed.map((i) => i.trim()).filter(Boolean);

    const record = await this.repo.insert(
      {
        title: validated.title,
        items_used: items,
        tags: validated.tags,
        calories: validated.calories_per_serving,
        macros: { ...validated.macros },
        recipe: validated,
      },
      this.now()
    );

    console.log("[favorites] saved", { id: record.id, title: record.title });
    return record;
  }

  list(filter: FavoritesFilter = {}): Promise<FavoriteRecord[]> {
    return this.repo.list({
      tag: normalizeFilterValue(filter.tag),
      cuisine: normalizeFilterValue(filter.cuisine),
    });
  }

  /**
   * Not idempotent: a second delete of the same id throws NotFoundError.
   */
  async delete(id: number): Promise<void> {
    const removed = await this.repo.delete(id);
    if (!removed) {
      throw new NotFoundError("Favorite", id);
    }
    console.log("[favorites] deleted", { id });
  }
}
