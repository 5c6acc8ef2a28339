// src/types/recipe.ts
// Domain types shared by the recognition, generation and favorites services.
// Field names follow the JSON contract exchanged with the AI models.

// ==========================================================================
// Images & recognition
// ==========================================================================

export type ImageFormat = "jpeg" | "png" | "webp";

export interface ValidatedImage {
  bytes: Buffer; // unmodified upload
  byteLength: number;
  format: ImageFormat;
  mimeType: string;
  width?: number;
  height?: number;
}

export interface DetectedItem {
  readonly name: string;
  readonly confidence: number; // 0-1
}

export interface RecognitionResult {
  is_food: boolean;
  items: DetectedItem[];
  notes: string;
  overall_confidence: number; // mean of item confidences, 0 when no items
}

export type RejectionCode = "not_food" | "no_items" | "low_confidence";

export type GateDecision =
  | { accepted: true; items: string[] }
  | { accepted: false; code: RejectionCode; reason: string; notes: string };

export type RecognitionOutcome =
  | { status: "accepted"; items: string[]; recognition: RecognitionResult }
  | { status: "rejected"; code: RejectionCode; reason: string; notes: string; recognition: RecognitionResult };

// ==========================================================================
// Preferences & recipes
// ==========================================================================

export const DIETARY_OPTIONS = ["healthy", "vegetarian", "non-vegetarian"] as const;
export type DietaryPreference = (typeof DIETARY_OPTIONS)[number];

export interface RecipePreferences {
  dietary: DietaryPreference[]; // set semantics, no duplicates
  cuisine_tags: string[];
  calorie_target?: number; // kcal per serving, 50-5000
}

export interface RecipeIngredient {
  item: string;
  qty: string;
}

export interface Macros {
  protein_g: number;
  fat_g: number;
  carbs_g: number;
}

export interface Recipe {
  title: string;
  description: string;
  ingredients: RecipeIngredient[];
  steps: string[]; // 5-10 entries
  calories_per_serving: number;
  macros: Macros;
  why_healthy: string;
  tags: string[]; // lower-case, no duplicates
}

export interface GenerationResult {
  recipes: Recipe[];
  count: number;
  shortfall: boolean;
  attempts: 1 | 2;
}

// ==========================================================================
// Favorites
// ==========================================================================

export interface FavoriteRecord {
  id: number;
  title: string;
  items_used: string[];
  tags: string[];
  calories: number;
  macros: Macros;
  recipe: Recipe;
  created_at: Date;
}

export type FavoriteDraft = Omit<FavoriteRecord, "id" | "created_at">;

export interface FavoritesFilter {
  tag?: string;
  cuisine?: string;
}
