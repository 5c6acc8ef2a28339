// src/services/recipeGenerator.ts
// Recipe generation with a minimum-count guarantee.
//
// Two attempts at most:
//   attempt 1 (base temperature) -> validate + dedupe -> enough? done
//   attempt 2 (base + delta, capped) -> merge with attempt 1 -> done
// A shortfall after attempt 2 is reported, never thrown.

import type { GenerationResult, Recipe, RecipePreferences } from "../types/recipe";
import { CapabilityError, GenerationServiceError, NotConfiguredError, errMessage } from "../utils/errors";
import { isRecord, safeParseJson } from "../utils/json";
import { AbortedError, TimeoutError, withTimeout } from "../utils/timeout";
import type { CallOptions, GenerationRequest, TextGenerationCapability } from "./capabilities";
import { validateBatch } from "./recipeValidator";

export interface RecipeGeneratorOptions {
  timeoutMs: number;
  minRecipes: number;
  temperature: number;
  retryTemperatureDelta: number;
  maxTemperature: number;
}

type AttemptOutcome =
  | { ok: true; recipes: Recipe[] }
  | { ok: false; error: GenerationServiceError };

export function normalizeTitle(title: string): string {
  return title.trim().replace(/\s+/g, " ").toLowerCase();
}

/**
 * Keeps the first recipe for each normalized title, preserving order.
 */
export function dedupeByTitle(recipes: readonly Recipe[]): Recipe[] {
  const seen = new Set<string>();
  const out: Recipe[] = [];
  for (const recipe of recipes) {
    const key = normalizeTitle(recipe.title);
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(recipe);
  }
  return out;
}

/**
 * Pulls the candidate list out of a model answer: either a top-level array
 * or an object with a `recipes` array. Returns null when neither is present.
 */
export function extractCandidates(raw: string): unknown[] | null {
  const json = safeParseJson(raw);
  if (Array.isArray(json)) return json;
  if (isRecord(json) && Array.isArray(json.recipes)) return json.recipes;
  return null;
}

export function retryTemperature(options: Pick<RecipeGeneratorOptions, "temperature" | "retryTemperatureDelta" | "maxTemperature">): number {
  const raised = Math.min(options.temperature + options.retryTemperatureDelta, options.maxTemperature);
  return Math.round(raised * 100) / 100;
}

export class RecipeGenerator {
  constructor(
    private readonly llm: TextGenerationCapability,
    private readonly options: RecipeGeneratorOptions
  ) {}

  async generate(items: string[], prefs: RecipePreferences, options: CallOptions = {}): Promise<GenerationResult> {
    if (!this.llm.isConfigured()) {
      throw new NotConfiguredError("generation");
    }

    const { minRecipes } = this.options;

    const first = await this.attempt(1, this.buildRequest(items, prefs, this.options.temperature, []), options.signal);
    const firstRecipes = first.ok ? dedupeByTitle(first.recipes) : [];

    if (firstRecipes.length >= minRecipes) {
      return { recipes: firstRecipes, count: firstRecipes.length, shortfall: false, attempts: 1 };
    }

    if (options.signal?.aborted) {
      throw new GenerationServiceError("Recipe generation was cancelled.", { retryable: true, kind: "cancelled" });
    }

    const second = await this.attempt(
      2,
      this.buildRequest(items, prefs, retryTemperature(this.options), firstRecipes.map((r) => r.title)),
      options.signal
    );

    if (!first.ok && !second.ok) {
      throw new GenerationServiceError("Recipe generation failed. Please try again.", {
        retryable: first.error.retryable || second.error.retryable,
        kind: second.error.kind,
      });
    }

    const merged = dedupeByTitle([...firstRecipes, ...(second.ok ? second.recipes : [])]);
    return {
      recipes: merged,
      count: merged.length,
      shortfall: merged.length < minRecipes,
      attempts: 2,
    };
  }

  private buildRequest(
    items: string[],
    prefs: RecipePreferences,
    temperature: number,
    avoidTitles: string[]
  ): GenerationRequest {
    return {
      items,
      dietary: prefs.dietary,
      cuisine_tags: prefs.cuisine_tags,
      calorie_target: prefs.calorie_target,
      temperature,
      count: this.options.minRecipes,
      avoid_titles: avoidTitles,
    };
  }

  /**
   * One capability call plus validation. Transport and parse failures come
   * back as values so the state machine can decide; cancellation throws.
   */
  private async attempt(n: 1 | 2, request: GenerationRequest, signal?: AbortSignal): Promise<AttemptOutcome> {
    let raw: string;
    try {
      raw = await withTimeout(
        (callSignal) => this.llm.generateRecipes(request, { signal: callSignal }),
        this.options.timeoutMs,
        signal
      );
    } catch (err) {
      if (err instanceof AbortedError) {
        throw new GenerationServiceError("Recipe generation was cancelled.", { retryable: true, kind: "cancelled" });
      }
      console.warn("[recipes][generate] attempt failed", { attempt: n, msg: errMessage(err) });
      if (err instanceof TimeoutError) {
        return {
          ok: false,
          error: new GenerationServiceError("Recipe generation timed out. Please try again.", { retryable: true, kind: "timeout" }),
        };
      }
      return {
        ok: false,
        error: new GenerationServiceError("The recipe service is unavailable. Please try again.", {
          retryable: err instanceof CapabilityError ? err.retryable : false,
          kind: "transport",
        }),
      };
    }

    const candidates = extractCandidates(raw);
    if (!candidates) {
      console.warn("[recipes][generate] unparseable answer", { attempt: n, length: raw.length });
      return {
        ok: false,
        error: new GenerationServiceError("The recipe service returned an unreadable answer. Please try again.", {
          retryable: true,
          kind: "parse",
        }),
      };
    }

    const { recipes, violations } = validateBatch(candidates);
    if (violations.length > 0) {
      console.warn("[recipes][generate] dropped invalid recipes", {
        attempt: n,
        dropped: violations.length,
        fields: violations.map((v) => v.field),
      });
    }
    return { ok: true, recipes };
  }
}
