import express, { Request, Response } from "express";
import cors from "cors";
import morgan from "morgan";

import { createErrorHandler } from "./middleware/errorHandler";
import { rateLimit } from "./middleware/rateLimiter";
import type { AppConfig } from "./middleware/validateEnv";
import { createFavoritesRouter } from "./routes/favorites";
import { createHealthRouter, type HealthStatus } from "./routes/health";
import { createRecipesRouter } from "./routes/recipes";
import { createRecognizeRouter } from "./routes/recognize";
import type { RecipePipeline } from "./services/recipePipeline";
import { OriginNotAllowedError } from "./utils/errors";

export interface AppDeps {
  config: AppConfig;
  pipeline: RecipePipeline;
  health: () => HealthStatus;
}

export function createApp({ config, pipeline, health }: AppDeps) {
  const app = express();

  // Proxy hops in front of the app; decides what req.ip reports
  app.set("trust proxy", config.http.trustProxy);

  // ======================================================================
  //                     CORE MIDDLEWARE (CORS, LOGGING, BODY)
  // ======================================================================

  const allowlist = config.http.allowedOrigins ? new Set(config.http.allowedOrigins) : null;

  app.use(
    cors({
      origin: (origin, cb) => {
        // Allow server-to-server/no-origin requests, and everything when no allow-list is set
        if (!origin || !allowlist) return cb(null, true);
        if (allowlist.has(origin)) return cb(null, true);
        return cb(new OriginNotAllowedError(origin));
      },
      methods: ["GET", "POST", "DELETE", "OPTIONS"],
      allowedHeaders: ["Content-Type", "Accept"],
    })
  );

  if (config.nodeEnv !== "test") {
    app.use(morgan("dev"));
  }

  // Recipes carry 5-10 steps each; favorites bodies stay small
  app.use(express.json({ limit: "1mb" }));

  app.use(
    rateLimit({
      windowMs: config.http.rateLimitWindowMs,
      maxRequests: config.http.rateLimitMaxRequests,
      message: "Too many requests, please try again later",
      skip: (req) => req.path === "/health",
    })
  );

  // ======================================================================
  //                       HEALTH CHECK + ROUTES
  // ======================================================================

  app.use("/health", createHealthRouter(health));

  // One budget shared by both AI routes
  const aiLimit = rateLimit({
    windowMs: config.http.rateLimitWindowMs,
    maxRequests: config.http.aiRateLimitMaxRequests,
    message: "AI request rate limit exceeded",
  });

  app.use(
    "/api/v1/recognize",
    aiLimit,
    createRecognizeRouter(pipeline, { maxImageBytes: config.intake.maxImageBytes })
  );
  app.use("/api/v1/recipes", aiLimit, createRecipesRouter(pipeline));
  app.use("/api/v1/favorites", createFavoritesRouter(pipeline));

  // ======================================================================
  //                 NOT FOUND HANDLER (clean JSON 404)
  // ======================================================================

  app.use((req: Request, res: Response) => {
    res.status(404).json({
      ok: false,
      error: "Not Found",
      path: req.originalUrl,
      method: req.method,
    });
  });

  // ======================================================================
  //                      GLOBAL ERROR HANDLER
  // ======================================================================

  app.use(createErrorHandler({ maxImageBytes: config.intake.maxImageBytes }));

  return app;
}
