// src/routes/health.ts
import { Router, Request, Response } from "express";

export interface HealthStatus {
  vision: boolean;
  generation: boolean;
  storage: "postgres" | "memory";
}

export function createHealthRouter(status: () => HealthStatus): Router {
  const router = Router();

  router.get("/", (_req: Request, res: Response) => {
    const { vision, generation, storage } = status();
    res.status(200).json({
      ok: true,
      service: "fridgesnap-backend",
      capabilities: { vision, generation },
      storage,
    });
  });

  return router;
}
