// src/utils/errors.ts
// Error taxonomy for the recognition -> recipes -> favorites pipeline.
// Every error that reaches the HTTP layer extends AppError so the error
// handler can render a distinct, user-actionable response.

export type AppErrorCode =
  | "IMAGE_TOO_LARGE"
  | "UNSUPPORTED_FORMAT"
  | "NOT_CONFIGURED"
  | "RECOGNITION_FAILED"
  | "GENERATION_FAILED"
  | "SCHEMA_VIOLATION"
  | "NOT_FOUND"
  | "VALIDATION_ERROR"
  | "ORIGIN_NOT_ALLOWED";

export class AppError extends Error {
  public readonly code: AppErrorCode;
  public readonly statusCode: number;
  public readonly meta?: Record<string, unknown>;

  constructor(code: AppErrorCode, message: string, statusCode: number, meta?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
    this.meta = meta;
  }
}

export class ImageTooLargeError extends AppError {
  constructor(public readonly byteLength: number, public readonly maxBytes: number) {
    super(
      "IMAGE_TOO_LARGE",
      `Image is too large (${formatMb(byteLength)}). Please upload an image under ${formatMb(maxBytes)}.`,
      413,
      { byteLength, maxBytes }
    );
  }
}

export class UnsupportedFormatError extends AppError {
  constructor(public readonly detected: string | null) {
    super(
      "UNSUPPORTED_FORMAT",
      "Unsupported image format. Please upload a JPEG, PNG or WebP photo.",
      415,
      { detected }
    );
  }
}

export type CapabilityName = "vision" | "generation";

export class NotConfiguredError extends AppError {
  constructor(public readonly capability: CapabilityName) {
    super(
      "NOT_CONFIGURED",
      capability === "vision"
        ? "Food recognition is not configured. Add an API key to enable photo analysis."
        : "Recipe generation is not configured. Add an API key to enable recipe suggestions.",
      503,
      { capability }
    );
  }
}

export class RecognitionServiceError extends AppError {
  constructor(message: string, public readonly retryable: boolean, public readonly timedOut = false) {
    super("RECOGNITION_FAILED", message, timedOut ? 504 : 502, { retryable });
  }
}

export type GenerationFailureKind = "timeout" | "transport" | "parse" | "cancelled";

export class GenerationServiceError extends AppError {
  public readonly retryable: boolean;
  public readonly kind: GenerationFailureKind;

  constructor(message: string, options: { retryable: boolean; kind: GenerationFailureKind }) {
    super("GENERATION_FAILED", message, options.kind === "timeout" ? 504 : 502, {
      retryable: options.retryable,
      kind: options.kind,
    });
    this.retryable = options.retryable;
    this.kind = options.kind;
  }
}

export class SchemaViolationError extends AppError {
  constructor(public readonly field: string, detail: string) {
    super("SCHEMA_VIOLATION", `Invalid recipe field "${field}": ${detail}`, 422, { field });
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id: string | number) {
    super("NOT_FOUND", `${resource} ${id} not found`, 404, { id });
  }
}

export class OriginNotAllowedError extends AppError {
  constructor(public readonly origin: string) {
    super("ORIGIN_NOT_ALLOWED", `Origin ${origin} is not allowed`, 403, { origin });
  }
}

export class RequestValidationError extends AppError {
  constructor(public readonly details: string[]) {
    super("VALIDATION_ERROR", details.join(", ") || "Validation failed", 400, { type: "validation", details });
  }
}

/**
 * Raised by capability adapters when the upstream AI service fails.
 * Never surfaces to callers directly; the recognizer and generator wrap it.
 */
export class CapabilityError extends Error {
  constructor(message: string, public readonly retryable: boolean, public readonly status?: number) {
    super(message);
    this.name = "CapabilityError";
  }
}

export function errMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

function formatMb(bytes: number): string {
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}
