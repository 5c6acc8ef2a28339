// src/services/foodRecognizer.ts
// Wraps the single vision call and normalizes its answer into a RecognitionResult.

import { z } from "zod";
import type { DetectedItem, RecognitionResult, ValidatedImage } from "../types/recipe";
import { CapabilityError, NotConfiguredError, RecognitionServiceError, errMessage } from "../utils/errors";
import { isRecord, safeParseJson } from "../utils/json";
import { AbortedError, TimeoutError, withTimeout } from "../utils/timeout";
import type { CallOptions, VisionCapability } from "./capabilities";

// Missing fields default; present fields of the wrong type fail the parse
const visionPayloadSchema = z.object({
  is_food: z.boolean().default(false),
  items: z
    .array(
      z.object({
        name: z.string(),
        confidence: z.number().finite().min(0),
      })
    )
    .default([]),
  notes: z.string().default(""),
});

function normalizeConfidence(value: number): number {
  // Some answers come back on a 0-100 scale
  const scaled = value > 1 ? value / 100 : value;
  return Math.min(1, Math.max(0, scaled));
}

export function overallConfidence(items: readonly DetectedItem[]): number {
  if (items.length === 0) return 0;
  return items.reduce((sum, item) => sum + item.confidence, 0) / items.length;
}

/**
 * Turns raw vision text into a RecognitionResult.
 * Throws RecognitionServiceError(retryable) when the text is not the expected shape.
 */
export function parseRecognition(raw: string): RecognitionResult {
  const json = safeParseJson(raw);
  if (!isRecord(json)) {
    throw new RecognitionServiceError("The food recognition service returned an unreadable answer. Please try again.", true);
  }

  const parsed = visionPayloadSchema.safeParse(json);
  if (!parsed.success) {
    const field = parsed.error.issues[0]?.path.join(".") || "payload";
    console.warn("[recognizer] malformed vision payload", { field });
    throw new RecognitionServiceError("The food recognition service returned an unexpected answer. Please try again.", true);
  }

  const items: DetectedItem[] = parsed.data.items
    .map((item) => ({ name: item.name.trim(), confidence: normalizeConfidence(item.confidence) }))
    .filter((item) => item.name.length > 0)
    .map((item) => Object.freeze(item));

  return {
    is_food: parsed.data.is_food,
    items,
    notes: parsed.data.notes.trim(),
    overall_confidence: overallConfidence(items),
  };
}

function toRecognitionError(err: unknown): RecognitionServiceError {
  if (err instanceof TimeoutError) {
    return new RecognitionServiceError("Food recognition timed out. Please try again.", true, true);
  }
  if (err instanceof AbortedError) {
    return new RecognitionServiceError("Food recognition was cancelled.", true);
  }
  if (err instanceof CapabilityError) {
    return new RecognitionServiceError(
      err.retryable
        ? "The food recognition service is temporarily unavailable. Please try again."
        : "The food recognition service rejected the request.",
      err.retryable
    );
  }
  return new RecognitionServiceError(`Food recognition failed: ${errMessage(err)}`, false);
}

export interface FoodRecognizerOptions {
  timeoutMs: number;
}

export class FoodRecognizer {
  constructor(
    private readonly vision: VisionCapability,
    private readonly options: FoodRecognizerOptions
  ) {}

  /**
   * Exactly one vision call. Never retried here; retrying is a user decision.
   */
  async recognize(image: ValidatedImage, options: CallOptions = {}): Promise<RecognitionResult> {
    if (!this.vision.isConfigured()) {
      throw new NotConfiguredError("vision");
    }

    let raw: string;
    try {
      raw = await withTimeout(
        (signal) => this.vision.detectFood(image, { signal }),
        this.options.timeoutMs,
        options.signal
      );
    } catch (err) {
      console.error("[recognizer] vision call failed", { msg: errMessage(err) });
      throw toRecognitionError(err);
    }

    return parseRecognition(raw);
  }
}
