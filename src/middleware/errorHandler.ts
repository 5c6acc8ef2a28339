// src/middleware/errorHandler.ts
import { Request, Response, NextFunction, ErrorRequestHandler } from "express";
import multer from "multer";
import { ZodError } from "zod";
import { AppError, ImageTooLargeError } from "../utils/errors";
import { sendError, sendServerError, sendValidationError } from "./responseHelper";

export interface ErrorHandlerOptions {
  maxImageBytes: number;
}

/**
 * Global error handler. Domain errors keep their own status and message;
 * anything unexpected is logged and reported as a generic 500.
 */
export function createErrorHandler(options: ErrorHandlerOptions): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      return next(err);
    }

    if (err instanceof AppError) {
      if (err.statusCode >= 500) {
        console.error("[error]", { path: req.originalUrl, code: err.code, msg: err.message });
      }
      return sendError(res, err.message, err.statusCode, { code: err.code, ...err.meta });
    }

    if (err instanceof multer.MulterError) {
      if (err.code === "LIMIT_FILE_SIZE") {
        const tooLarge = new ImageTooLargeError(Number(req.headers["content-length"] || 0), options.maxImageBytes);
        return sendError(res, tooLarge.message, tooLarge.statusCode, { code: tooLarge.code, maxBytes: options.maxImageBytes });
      }
      return sendValidationError(res, err.message);
    }

    if (err instanceof ZodError) {
      return sendValidationError(
        res,
        err.issues.map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message))
      );
    }

    // express.json() parse failures
    if (err instanceof SyntaxError && "body" in err) {
      return sendValidationError(res, "Request body is not valid JSON");
    }

    console.error("❌ SERVER ERROR:", err);
    return sendServerError(res);
  };
}
