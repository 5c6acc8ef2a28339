// src/services/capabilities.ts
// Boundaries to the external AI models. Adapters return the raw model text;
// parsing and validation stay in the recognizer and generator.

import type { DietaryPreference, ValidatedImage } from "../types/recipe";

export interface CallOptions {
  signal?: AbortSignal;
}

export interface VisionCapability {
  /** false when no credential is configured; checked before any call */
  isConfigured(): boolean;
  detectFood(image: ValidatedImage, options?: CallOptions): Promise<string>;
}

export interface GenerationRequest {
  items: string[];
  dietary: DietaryPreference[];
  cuisine_tags: string[];
  calorie_target?: number;
  temperature: number;
  count: number;
  avoid_titles: string[];
}

export interface TextGenerationCapability {
  isConfigured(): boolean;
  generateRecipes(request: GenerationRequest, options?: CallOptions): Promise<string>;
}
