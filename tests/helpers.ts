// tests/helpers.ts
// Shared fixtures and in-process fakes for the capability interfaces.

import sharp from "sharp";
import type {
  CallOptions,
  GenerationRequest,
  TextGenerationCapability,
  VisionCapability,
} from "../src/services/capabilities";
import { parseEnvironment, toAppConfig, type AppConfig } from "../src/middleware/validateEnv";
import type { Recipe, ValidatedImage } from "../src/types/recipe";

export function testConfig(overrides: Record<string, string> = {}): AppConfig {
  return toAppConfig(parseEnvironment({ NODE_ENV: "test", OPENAI_API_KEY: "test-key", ...overrides }));
}

export function makeRecipe(title: string, overrides: Partial<Recipe> = {}): Recipe {
  return {
    title,
    description: `${title} made with what is already in the fridge.`,
    ingredients: [
      { item: "egg", qty: "2 large" },
      { item: "spinach", qty: "1 cup" },
    ],
    steps: ["Wash the spinach", "Heat the pan", "Whisk the eggs", "Cook gently", "Season and serve"],
    calories_per_serving: 350,
    macros: { protein_g: 20, fat_g: 12, carbs_g: 30 },
    why_healthy: "Plenty of protein and greens.",
    tags: ["healthy", "mediterranean"],
    ...overrides,
  };
}

/** Model answer in the shape the generation prompt asks for */
export function recipesReply(recipes: unknown[]): string {
  return JSON.stringify({ recipes });
}

export function titles(recipes: readonly { title: string }[]): string[] {
  return recipes.map((r) => r.title);
}

/**
 * A scripted reply: text is returned, an Error is thrown, "hang" never
 * settles until the call's signal aborts, a function runs per call.
 */
export type FakeReply = string | Error | "hang" | ((callIndex: number) => string);

function playReply(reply: FakeReply | undefined, callIndex: number, options: CallOptions): Promise<string> {
  if (reply === undefined) return Promise.reject(new Error(`no reply scripted for call ${callIndex + 1}`));
  if (reply instanceof Error) return Promise.reject(reply);
  if (typeof reply === "function") return Promise.resolve(reply(callIndex));
  if (reply === "hang") {
    return new Promise<string>((_resolve, reject) => {
      options.signal?.addEventListener("abort", () => reject(new Error("aborted by caller")), { once: true });
    });
  }
  return Promise.resolve(reply);
}

export class FakeVision implements VisionCapability {
  readonly calls: ValidatedImage[] = [];

  constructor(private readonly replies: FakeReply[] = [], private readonly configured = true) {}

  isConfigured(): boolean {
    return this.configured;
  }

  detectFood(image: ValidatedImage, options: CallOptions = {}): Promise<string> {
    this.calls.push(image);
    return playReply(this.replies[this.calls.length - 1], this.calls.length - 1, options);
  }
}

export class FakeRecipeLlm implements TextGenerationCapability {
  readonly calls: GenerationRequest[] = [];

  constructor(private readonly replies: FakeReply[] = [], private readonly configured = true) {}

  isConfigured(): boolean {
    return this.configured;
  }

  generateRecipes(request: GenerationRequest, options: CallOptions = {}): Promise<string> {
    this.calls.push(request);
    return playReply(this.replies[this.calls.length - 1], this.calls.length - 1, options);
  }
}

export function solidImage(format: "png" | "jpeg" | "webp", size = 4): Promise<Buffer> {
  const base = sharp({
    create: { width: size, height: size, channels: 3, background: { r: 200, g: 120, b: 40 } },
  });
  if (format === "png") return base.png().toBuffer();
  if (format === "jpeg") return base.jpeg().toBuffer();
  return base.webp().toBuffer();
}

/** A buffer over the size ceiling that starts like a JPEG */
export function oversizedJpeg(bytes = 12 * 1024 * 1024): Buffer {
  const buf = Buffer.alloc(bytes);
  buf[0] = 0xff;
  buf[1] = 0xd8;
  buf[2] = 0xff;
  return buf;
}

export const EGG_AND_MILK = JSON.stringify({
  is_food: true,
  items: [
    { name: "egg", confidence: 0.9 },
    { name: "milk", confidence: 0.85 },
  ],
  notes: "dairy and eggs",
});

type ErrorClass<T> = new (...args: never[]) => T;

/** Awaits `promise` and returns its rejection, which must be a `type` */
export async function rejectionOf<T>(promise: Promise<unknown>, type: ErrorClass<T>): Promise<T> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof type) return err;
    throw err;
  }
  throw new Error(`expected a ${type.name} rejection`);
}

/** Runs `fn` and returns what it throws, which must be a `type` */
export function thrownBy<T>(fn: () => unknown, type: ErrorClass<T>): T {
  try {
    fn();
  } catch (err) {
    if (err instanceof type) return err;
    throw err;
  }
  throw new Error(`expected a ${type.name} to be thrown`);
}
