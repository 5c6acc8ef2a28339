// src/middleware/validateEnv.ts
import { z } from "zod";

const numberFromEnv = (fallback: number) => z.coerce.number().finite().default(fallback);

/**
 * Environment variable validation schema.
 * Validates all environment variables at startup.
 */
const envSchema = z.object({
  // Server
  PORT: numberFromEnv(3000).pipe(z.number().int().min(0).max(65535)),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),

  // Database (optional - favorites fall back to memory)
  DATABASE_URL: z.string().min(1).optional(),
  DATABASE_SSL: z
    .enum(["true", "false"])
    .default("false")
    .transform((v) => v === "true"),

  // OpenAI (optional - endpoints report "not configured" without it)
  OPENAI_API_KEY: z.string().min(1).optional(),
  OPENAI_MODEL: z.string().default("gpt-4.1-mini"),
  OPENAI_VISION_MODEL: z.string().default("gpt-4o-mini"),

  // Pipeline tuning
  MAX_IMAGE_BYTES: numberFromEnv(10 * 1024 * 1024).pipe(z.number().int().positive()),
  CONFIDENCE_THRESHOLD: numberFromEnv(0.6).pipe(z.number().min(0).max(1)),
  VISION_TIMEOUT_MS: numberFromEnv(30000).pipe(z.number().int().positive()),
  GENERATION_TIMEOUT_MS: numberFromEnv(45000).pipe(z.number().int().positive()),
  MIN_RECIPES: numberFromEnv(5).pipe(z.number().int().min(1).max(20)),
  RECIPE_TEMPERATURE: numberFromEnv(0.7).pipe(z.number().min(0).max(2)),
  RECIPE_RETRY_TEMPERATURE_DELTA: numberFromEnv(0.2).pipe(z.number().min(0).max(1)),
  RECIPE_MAX_TEMPERATURE: numberFromEnv(1.2).pipe(z.number().min(0).max(2)),

  // CORS
  ALLOWED_ORIGINS: z.string().optional(),

  // Proxy hops to trust for the client address (0 = use the socket address)
  TRUST_PROXY: numberFromEnv(0).pipe(z.number().int().min(0).max(10)),

  // Rate limiting
  RATE_LIMIT_WINDOW_MS: numberFromEnv(60000).pipe(z.number().int().positive()),
  RATE_LIMIT_MAX_REQUESTS: numberFromEnv(100).pipe(z.number().int().positive()),
  AI_RATE_LIMIT_MAX_REQUESTS: numberFromEnv(20).pipe(z.number().int().positive()),
});

export type Env = z.infer<typeof envSchema>;

export interface AppConfig {
  port: number;
  nodeEnv: Env["NODE_ENV"];
  database: { url?: string; ssl: boolean };
  openai: { apiKey?: string; model: string; visionModel: string };
  intake: { maxImageBytes: number };
  recognition: { timeoutMs: number; confidenceThreshold: number };
  generation: {
    timeoutMs: number;
    minRecipes: number;
    temperature: number;
    retryTemperatureDelta: number;
    maxTemperature: number;
  };
  http: {
    allowedOrigins?: string[];
    trustProxy: number;
    rateLimitWindowMs: number;
    rateLimitMaxRequests: number;
    aiRateLimitMaxRequests: number;
  };
}

let validatedEnv: Env | null = null;

/**
 * Parses an environment map without touching the cached process config.
 * Throws with one line per invalid variable.
 */
export function parseEnvironment(source: NodeJS.ProcessEnv): Env {
  // Empty strings in .env files mean "unset"
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined && value.trim() !== "") cleaned[key] = value.trim();
  }

  const result = envSchema.safeParse(cleaned);
  if (!result.success) {
    const lines = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid environment configuration:\n  - ${lines.join("\n  - ")}`);
  }
  return result.data;
}

/**
 * Validates process.env at startup.
 * Throws an error if variables are invalid; logs warnings for optional but
 * recommended ones.
 */
export function validateEnvironment(): Env {
  if (validatedEnv) return validatedEnv;

  try {
    validatedEnv = parseEnvironment(process.env);
  } catch (err) {
    console.error("Environment validation failed:");
    console.error(err instanceof Error ? err.message : err);
    throw err;
  }

  const warnings: string[] = [];

  if (!validatedEnv.OPENAI_API_KEY) {
    warnings.push("OPENAI_API_KEY is not set - recognition and recipe generation will report NOT_CONFIGURED");
  }

  if (!validatedEnv.DATABASE_URL) {
    warnings.push("DATABASE_URL is not set - favorites are kept in memory and lost on restart");
  }

  if (validatedEnv.RECIPE_MAX_TEMPERATURE < validatedEnv.RECIPE_TEMPERATURE) {
    warnings.push("RECIPE_MAX_TEMPERATURE is below RECIPE_TEMPERATURE - retries will lower the temperature");
  }

  if (warnings.length > 0) {
    console.warn("\nEnvironment warnings:");
    warnings.forEach((w) => console.warn(`  - ${w}`));
    console.warn("");
  }

  console.log("Environment validation passed");
  return validatedEnv;
}

export function toAppConfig(env: Env): AppConfig {
  return {
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    database: { url: env.DATABASE_URL, ssl: env.DATABASE_SSL },
    openai: {
      apiKey: env.OPENAI_API_KEY,
      model: env.OPENAI_MODEL,
      visionModel: env.OPENAI_VISION_MODEL,
    },
    intake: { maxImageBytes: env.MAX_IMAGE_BYTES },
    recognition: {
      timeoutMs: env.VISION_TIMEOUT_MS,
      confidenceThreshold: env.CONFIDENCE_THRESHOLD,
    },
    generation: {
      timeoutMs: env.GENERATION_TIMEOUT_MS,
      minRecipes: env.MIN_RECIPES,
      temperature: env.RECIPE_TEMPERATURE,
      retryTemperatureDelta: env.RECIPE_RETRY_TEMPERATURE_DELTA,
      maxTemperature: env.RECIPE_MAX_TEMPERATURE,
    },
    http: {
      allowedOrigins: env.ALLOWED_ORIGINS
        ? env.ALLOWED_ORIGINS.split(",").map((s) => s.trim()).filter(Boolean)
        : undefined,
      trustProxy: env.TRUST_PROXY,
      rateLimitWindowMs: env.RATE_LIMIT_WINDOW_MS,
      rateLimitMaxRequests: env.RATE_LIMIT_MAX_REQUESTS,
      aiRateLimitMaxRequests: env.AI_RATE_LIMIT_MAX_REQUESTS,
    },
  };
}
