// src/routes/recipes.ts
// POST /api/v1/recipes — { items: string[], preferences: RecipePreferences }

import { Router } from "express";
import { asyncHandler } from "../middleware/asyncHandler";
import { sendSuccess } from "../middleware/responseHelper";
import type { RecipePipeline } from "../services/recipePipeline";

export const SHORTFALL_NOTICE =
  "We could only put together a few recipes from these ingredients. Try adding more items or loosening your preferences.";

export function createRecipesRouter(pipeline: RecipePipeline): Router {
  const router = Router();

  router.post(
    "/",
    asyncHandler(async (req, res) => {
      // Client went away: stop waiting and never issue the retry
      const controller = new AbortController();
      res.on("close", () => {
        if (!res.writableEnded) controller.abort();
      });

      const body: { items?: unknown; preferences?: unknown } = req.body ?? {};
      const result = await pipeline.generateRecipes(body.items, body.preferences, { signal: controller.signal });

      return sendSuccess(res, result, 200, result.shortfall ? { notice: SHORTFALL_NOTICE } : undefined);
    })
  );

  return router;
}
