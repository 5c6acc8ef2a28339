// src/services/openaiCapabilities.ts
// OpenAI-backed implementations of the vision and text-generation capabilities.

import OpenAI from "openai";
import sharp from "sharp";
import type { ValidatedImage } from "../types/recipe";
import { CapabilityError, errMessage } from "../utils/errors";
import { RECIPE_PROMPTS, VISION_PROMPTS } from "./aiPromptTemplates";
import type {
  CallOptions,
  GenerationRequest,
  TextGenerationCapability,
  VisionCapability,
} from "./capabilities";

export interface OpenAICapabilityOptions {
  apiKey?: string;
  model: string;
}

/**
 * SDK failures become CapabilityError. Missing status (connection errors),
 * 408, 409, 429 and 5xx are retryable; other 4xx are not.
 */
export function toCapabilityError(err: unknown): CapabilityError {
  if (err instanceof CapabilityError) return err;
  if (err instanceof OpenAI.APIError) {
    const status = err.status;
    const retryable =
      status === undefined || status === 408 || status === 409 || status === 429 || status >= 500;
    return new CapabilityError(err.message, retryable, status);
  }
  return new CapabilityError(errMessage(err), false);
}

abstract class OpenAICapability {
  private client: OpenAI | null = null;

  constructor(protected readonly options: OpenAICapabilityOptions) {}

  isConfigured(): boolean {
    return Boolean(this.options.apiKey);
  }

  protected getClient(): OpenAI {
    if (!this.options.apiKey) {
      throw new CapabilityError("OpenAI API key is not configured", false);
    }
    if (!this.client) {
      // Retries are owned by the pipeline, never by the SDK
      this.client = new OpenAI({ apiKey: this.options.apiKey, maxRetries: 0 });
    }
    return this.client;
  }
}

export class OpenAIVisionCapability extends OpenAICapability implements VisionCapability {
  async detectFood(image: ValidatedImage, options: CallOptions = {}): Promise<string> {
    try {
      // Smaller upload for speed; the validated original stays untouched
      const processed = await sharp(image.bytes)
        .rotate()
        .resize({ width: 768, withoutEnlargement: true })
        .jpeg({ quality: 75 })
        .toBuffer();

      const completion = await this.getClient().chat.completions.create(
        {
          model: this.options.model,
          temperature: 0.2,
          max_tokens: 600,
          response_format: { type: "json_object" },
          messages: [
            { role: "system", content: VISION_PROMPTS.SYSTEM },
            {
              role: "user",
              content: [
                { type: "text", text: VISION_PROMPTS.DETECT },
                {
                  type: "image_url",
                  image_url: {
                    url: `data:image/jpeg;base64,${processed.toString("base64")}`,
                    detail: "low",
                  },
                },
              ],
            },
          ],
        },
        { signal: options.signal }
      );

      return completion.choices[0]?.message?.content ?? "";
    } catch (err) {
      throw toCapabilityError(err);
    }
  }
}

export class OpenAIRecipeCapability extends OpenAICapability implements TextGenerationCapability {
  async generateRecipes(request: GenerationRequest, options: CallOptions = {}): Promise<string> {
    try {
      const completion = await this.getClient().chat.completions.create(
        {
          model: this.options.model,
          temperature: request.temperature,
          max_tokens: 4000,
          response_format: { type: "json_object" },
          messages: [
            { role: "system", content: RECIPE_PROMPTS.SYSTEM },
            { role: "user", content: RECIPE_PROMPTS.GENERATE(request) },
          ],
        },
        { signal: options.signal }
      );

      return completion.choices[0]?.message?.content ?? "";
    } catch (err) {
      throw toCapabilityError(err);
    }
  }
}
