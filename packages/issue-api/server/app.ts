import express from "express";
import cors from "cors";
import type { Request, Response, NextFunction } from "express";
import type { AppDeps } from "./deps";
import { requireApiToken } from "./auth";
import { requestLogger } from "./requestLogger";
import { apiError } from "./errors";
import { logger } from "./logger";
import { registerConfigRoutes } from "./routes/config";
import { registerSuggestedFixRoutes } from "./routes/suggestedFix";

export function createApp(deps: AppDeps) {
  const app = express();
  app.use(cors());
  app.use(express.json());
  app.use(requestLogger);

  // Config endpoint must be registered BEFORE requireApiToken (intentionally public)
  registerConfigRoutes(app, deps);

  app.use("/api", requireApiToken(deps.config.apiTokens));

  registerSuggestedFixRoutes(app, deps);

  app.use("/api", (_req, res) => {
    const e = apiError("RESOURCE_NOT_FOUND", "Unknown endpoint", { status: 404 });
    res.status(e.status).json(e.body);
  });

  // last resort for anything thrown synchronously by middleware
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    logger.error("[Server] Unhandled error", {
      error: err instanceof Error ? err.message : String(err)
    });
    const e = apiError("INTERNAL_ERROR", "Unexpected server error.");
    res.status(e.status).json(e.body);
  });

  return app;
}
