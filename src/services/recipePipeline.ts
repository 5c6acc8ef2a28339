// src/services/recipePipeline.ts
// Caller-facing entry points:
//   photo -> ImageIntake -> FoodRecognizer -> ConfidenceGate
//   items + preferences -> RecipeGenerator (-> RecipeValidator)
//   recipe -> FavoritesStore

import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import type {
  FavoriteRecord,
  FavoritesFilter,
  GenerationResult,
  Recipe,
  RecipePreferences,
  RecognitionOutcome,
} from "../types/recipe";
import { DIETARY_OPTIONS } from "../types/recipe";
import { RequestValidationError, errMessage } from "../utils/errors";
import type { CallOptions } from "./capabilities";
import { decide } from "./confidenceGate";
import type { FavoritesStore } from "./favoritesStore";
import type { FoodRecognizer } from "./foodRecognizer";
import type { ImageIntake } from "./imageIntake";
import type { RecipeGenerator } from "./recipeGenerator";

export const MIN_CALORIE_TARGET = 50;
export const MAX_CALORIE_TARGET = 5000;
export const MAX_ITEMS = 30;

const itemsSchema = z
  .array(z.string().trim().min(1, "item names must be non-empty").max(100))
  .min(1, "at least one item is required")
  .max(MAX_ITEMS, `at most ${MAX_ITEMS} items are allowed`);

const preferencesSchema = z
  .object({
    dietary: z.array(z.enum(DIETARY_OPTIONS)).default([]),
    cuisine_tags: z.array(z.string().trim().min(1).max(40)).default([]),
    calorie_target: z
      .number()
      .int("calorie_target must be an integer")
      .min(MIN_CALORIE_TARGET, `calorie_target must be at least ${MIN_CALORIE_TARGET}`)
      .max(MAX_CALORIE_TARGET, `calorie_target must be at most ${MAX_CALORIE_TARGET}`)
      .optional(),
  })
  .default({});

function issuesToDetails(error: z.ZodError, prefix: string): string[] {
  return error.issues.map((i) => `${[prefix, ...i.path].join(".")}: ${i.message}`);
}

function uniqueCaseInsensitive(values: string[]): string[] {
  const seen = new Set<string>();
  return values.filter((v) => {
    const key = v.toLowerCase();
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

export function parseItems(input: unknown): string[] {
  const parsed = itemsSchema.safeParse(input);
  if (!parsed.success) {
    throw new RequestValidationError(issuesToDetails(parsed.error, "items"));
  }
  return uniqueCaseInsensitive(parsed.data);
}

export function parsePreferences(input: unknown): RecipePreferences {
  const parsed = preferencesSchema.safeParse(input ?? undefined);
  if (!parsed.success) {
    throw new RequestValidationError(issuesToDetails(parsed.error, "preferences"));
  }
  const prefs: RecipePreferences = {
    dietary: Array.from(new Set(parsed.data.dietary)),
    cuisine_tags: uniqueCaseInsensitive(parsed.data.cuisine_tags),
  };
  if (parsed.data.calorie_target !== undefined) {
    prefs.calorie_target = parsed.data.calorie_target;
  }
  return prefs;
}

export interface RecipePipelineDeps {
  intake: ImageIntake;
  recognizer: FoodRecognizer;
  generator: RecipeGenerator;
  favorites: FavoritesStore;
  confidenceThreshold: number;
}

export class RecipePipeline {
  constructor(private readonly deps: RecipePipelineDeps) {}

  async recognize(bytes: Buffer, declaredMime?: string, options: CallOptions = {}): Promise<RecognitionOutcome> {
    const reqId = uuidv4();
    const t0 = Date.now();

    // Local checks first; nothing external runs for a bad upload
    const image = await this.deps.intake.validate(bytes, declaredMime);
    const recognition = await this.deps.recognizer.recognize(image, options);
    const decision = decide(recognition, this.deps.confidenceThreshold);

    console.log("[pipeline][recognize] done", {
      reqId,
      ms: Date.now() - t0,
      bytes: image.byteLength,
      format: image.format,
      itemCount: recognition.items.length,
      overallConfidence: Number(recognition.overall_confidence.toFixed(3)),
      accepted: decision.accepted,
    });

    if (decision.accepted) {
      return { status: "accepted", items: decision.items, recognition };
    }
    return {
      status: "rejected",
      code: decision.code,
      reason: decision.reason,
      notes: decision.notes,
      recognition,
    };
  }

  async generateRecipes(items: unknown, preferences: unknown, options: CallOptions = {}): Promise<GenerationResult> {
    const reqId = uuidv4();
    const t0 = Date.now();
    const cleanItems = parseItems(items);
    const prefs = parsePreferences(preferences);

    try {
      const result = await this.deps.generator.generate(cleanItems, prefs, options);
      console.log("[pipeline][recipes] ok", {
        reqId,
        ms: Date.now() - t0,
        attempts: result.attempts,
        count: result.count,
        shortfall: result.shortfall,
      });
      return result;
    } catch (err) {
      console.error("[pipeline][recipes] error", { reqId, msg: errMessage(err) });
      throw err;
    }
  }

  saveFavorite(recipe: Recipe, itemsUsed: string[]): Promise<FavoriteRecord> {
    return this.deps.favorites.save(recipe, itemsUsed);
  }

  listFavorites(filter: FavoritesFilter = {}): Promise<FavoriteRecord[]> {
    return this.deps.favorites.list(filter);
  }

  deleteFavorite(id: number): Promise<void> {
    return this.deps.favorites.delete(id);
  }
}
