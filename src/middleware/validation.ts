// src/middleware/validation.ts
// Param / query validation middleware using express-validator.
// Request bodies are validated with zod inside the routes.

import { param, query, validationResult } from "express-validator";
import { Request, Response, NextFunction } from "express";
import { sendValidationError } from "./responseHelper";

/**
 * Validation error handler middleware
 * Returns 400 Bad Request with validation errors
 */
export function handleValidationErrors(req: Request, res: Response, next: NextFunction) {
  const errors = validationResult(req);
  if (!errors.isEmpty()) {
    return sendValidationError(
      res,
      errors.array().map((e) => String(e.msg))
    );
  }
  next();
}

/**
 * Favorite id (positive integer path param)
 */
export const validateFavoriteId = [
  param("id")
    .isInt({ min: 1 })
    .withMessage("Favorite id must be a positive integer")
    .toInt(),

  handleValidationErrors,
];

/**
 * Favorites list filters (?tag=&cuisine=)
 */
export const validateFavoritesFilter = [
  query("tag")
    .optional()
    .isString()
    .trim()
    .isLength({ min: 1, max: 40 })
    .withMessage("tag must be between 1 and 40 characters"),

  query("cuisine")
    .optional()
    .isString()
    .trim()
    .isLength({ min: 1, max: 40 })
    .withMessage("cuisine must be between 1 and 40 characters"),

  handleValidationErrors,
];
