// src/services/confidenceGate.ts

import type { GateDecision, RecognitionResult, RejectionCode } from "../types/recipe";

export const DEFAULT_CONFIDENCE_THRESHOLD = 0.6;

// Fixed, user-facing. Model notes are passed along separately.
export const REJECTION_REASONS: Record<RejectionCode, string> = {
  not_food: "This doesn't look like food. Try a photo of your fridge, pantry or ingredients.",
  no_items: "We couldn't spot any ingredients. Try a closer, well-lit photo.",
  low_confidence: "We're not sure what's in this photo. Try a clearer shot with the items in view.",
};

function reject(code: RejectionCode, notes: string): GateDecision {
  return { accepted: false, code, reason: REJECTION_REASONS[code], notes };
}

/**
 * Pure accept/reject decision on a recognition result.
 */
export function decide(result: RecognitionResult, threshold: number = DEFAULT_CONFIDENCE_THRESHOLD): GateDecision {
  if (!result.is_food) return reject("not_food", result.notes);
  if (result.items.length === 0) return reject("no_items", result.notes);
  if (result.overall_confidence < threshold) return reject("low_confidence", result.notes);

  const seen = new Set<string>();
  const items: string[] = [];
  for (const item of result.items) {
    const key = item.name.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    items.push(item.name);
  }
  return { accepted: true, items };
}
