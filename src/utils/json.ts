// src/utils/json.ts

type ParseAttempt = { ok: true; value: unknown } | { ok: false };

function tryParse(text: string): ParseAttempt {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

const CLOSER = { "{": "}", "[": "]" } as const;

/**
 * Slice from the first opening bracket to the last matching closer.
 * Whichever of `{` or `[` comes first decides, so a wrapped array of
 * objects is kept whole.
 */
function outermostJson(text: string, opener: "{" | "["): string | undefined {
  const start = text.indexOf(opener);
  const end = text.lastIndexOf(CLOSER[opener]);
  return start !== -1 && end > start ? text.slice(start, end + 1) : undefined;
}

/**
 * Parses model output that should be JSON. Models sometimes wrap the payload
 * in prose or a ```json fence, so the outermost object or array is extracted
 * when the whole text does not parse. Returns undefined when nothing parses.
 */
export function safeParseJson(text: string): unknown {
  const trimmed = text.trim();
  if (!trimmed) return undefined;

  const whole = tryParse(trimmed);
  if (whole.ok) return whole.value;

  const brace = trimmed.indexOf("{");
  const bracket = trimmed.indexOf("[");
  const arrayFirst = bracket !== -1 && (brace === -1 || bracket < brace);
  const openers: Array<"{" | "["> = arrayFirst ? ["[", "{"] : ["{", "["];

  for (const opener of openers) {
    const candidate = outermostJson(trimmed, opener);
    if (candidate === undefined) continue;
    const extracted = tryParse(candidate);
    if (extracted.ok) return extracted.value;
  }
  return undefined;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
