// src/app.ts
import express, { Express, Request, Response } from "express";
import cors from "cors";
import morgan from "morgan";

import { DEFAULT_PLANNER_SETTINGS, type PlannerSettings } from "./domain/settings";
import { rateLimitMiddleware, sendNotFound, type RateLimiter } from "./middleware";
import { errorHandler } from "./middlewares/errorHandler";
import { energyRouter } from "./routes/energy";
import { createIngredientsRouter } from "./routes/ingredients";
import { createPlansRouter } from "./routes/plans";
import { createRatiosRouter } from "./routes/ratios";
import { supplementsRouter } from "./routes/supplements";
import type { IngredientCatalog } from "./services/ingredientCatalog";

export interface AppOptions {
  catalog: IngredientCatalog;
  settings?: Readonly<PlannerSettings>;
  allowedOrigins?: string[];
  rateLimit?: { windowMs: number; maxRequests: number };
  requestLogging?: boolean;
  limiter?: RateLimiter;
}

export function createApp(options: AppOptions): Express {
  const settings = options.settings ?? DEFAULT_PLANNER_SETTINGS;
  const app = express();

  // ======================================================================
  //                     CORE MIDDLEWARE (CORS, LOGGING, BODY)
  // ======================================================================

  const allowlist = new Set<string>(options.allowedOrigins ?? []);
  app.use(
    cors({
      origin: (origin, cb) => {
        // Allow server-to-server/no-origin requests
        if (!origin) return cb(null, true);
        if (allowlist.has(origin)) return cb(null, true);
        return cb(null, false);
      },
      methods: ["GET", "POST", "OPTIONS"],
      allowedHeaders: ["Content-Type", "Accept"],
    })
  );

  if (options.requestLogging ?? true) {
    app.use(morgan("dev"));
  }

  app.use(express.json({ limit: "256kb" }));

  // ======================================================================
  //                       HEALTH CHECK + ROUTES
  // ======================================================================

  app.get("/health", (_req: Request, res: Response) => {
    res.status(200).send("ok");
  });

  const planLimiter = rateLimitMiddleware({
    windowMs: options.rateLimit?.windowMs,
    maxRequests: options.rateLimit?.maxRequests,
    limiter: options.limiter,
  });

  app.use("/api/v1/ingredients", createIngredientsRouter(options.catalog));
  app.use("/api/v1/energy", energyRouter);
  app.use("/api/v1/ratios", createRatiosRouter(settings));
  app.use("/api/v1/supplements", supplementsRouter);
  app.use("/api/v1/plans", createPlansRouter(options.catalog, settings, planLimiter));

  app.use((req: Request, res: Response) => {
    sendNotFound(res, `No route for ${req.method} ${req.originalUrl}`);
  });

  app.use(errorHandler);

  return app;
}
