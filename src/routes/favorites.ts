import { Router } from "express";
import { z } from "zod";
import { asyncHandler } from "../middleware/asyncHandler";
import { sendSuccess } from "../middleware/responseHelper";
import { validateFavoriteId, validateFavoritesFilter } from "../middleware/validation";
import { recipeSchema } from "../services/recipeValidator";
import type { RecipePipeline } from "../services/recipePipeline";

// Schema for saving a favorite recipe
const createFavoriteSchema = z.object({
  recipe: recipeSchema,
  items_used: z.array(z.string().max(100)).max(30).default([]),
});

export function createFavoritesRouter(pipeline: RecipePipeline): Router {
  const router = Router();

  // POST /api/v1/favorites - Save a recipe as favorite
  router.post(
    "/",
    asyncHandler(async (req, res) => {
      const parsed = createFavoriteSchema.parse(req.body);
      const favorite = await pipeline.saveFavorite(parsed.recipe, parsed.items_used);
      return sendSuccess(res, favorite, 201);
    })
  );

  // GET /api/v1/favorites?tag=&cuisine= - Most recent first
  router.get(
    "/",
    validateFavoritesFilter,
    asyncHandler(async (req, res) => {
      const tag = typeof req.query.tag === "string" ? req.query.tag : undefined;
      const cuisine = typeof req.query.cuisine === "string" ? req.query.cuisine : undefined;

      const favorites = await pipeline.listFavorites({ tag, cuisine });
      return sendSuccess(res, favorites);
    })
  );

  // DELETE /api/v1/favorites/:id - Remove a favorite (404 when already gone)
  router.delete(
    "/:id",
    validateFavoriteId,
    asyncHandler(async (req, res) => {
      await pipeline.deleteFavorite(Number(req.params.id));
      return res.status(204).send();
    })
  );

  return router;
}
