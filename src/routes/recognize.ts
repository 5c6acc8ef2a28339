// src/routes/recognize.ts
// POST /api/v1/recognize — multipart photo upload (field "image" or "photo")

import { Router, Request } from "express";
import multer from "multer";
import { asyncHandler } from "../middleware/asyncHandler";
import { sendSuccess, sendValidationError } from "../middleware/responseHelper";
import type { RecipePipeline } from "../services/recipePipeline";

export interface RecognizeRouterOptions {
  maxImageBytes: number;
}

function getUploadedPhotoFile(req: Request): Express.Multer.File | null {
  const files = req.files;
  if (!files || Array.isArray(files)) return null;
  return files.image?.[0] || files.photo?.[0] || null;
}

export function createRecognizeRouter(pipeline: RecipePipeline, options: RecognizeRouterOptions): Router {
  const router = Router();

  // Multer's ceiling sits above the intake ceiling so ImageIntake makes the
  // size decision; it only guards memory against absurd uploads
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: options.maxImageBytes * 2, files: 1 },
  });

  router.post(
    "/",
    upload.fields([
      { name: "image", maxCount: 1 },
      { name: "photo", maxCount: 1 },
    ]),
    asyncHandler(async (req, res) => {
      const file = getUploadedPhotoFile(req);
      if (!file?.buffer) {
        return sendValidationError(res, "Missing image upload (send multipart with field name 'image' or 'photo')");
      }

      const outcome = await pipeline.recognize(file.buffer, file.mimetype);
      return sendSuccess(res, outcome);
    })
  );

  return router;
}
