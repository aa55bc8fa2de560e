import type { Express } from "express";
import type { AppDeps } from "../deps";

/**
 * Public config endpoint: tells the UI whether suggestions can work at all.
 * Registered before the token middleware; exposes no secrets.
 */
export function registerConfigRoutes(app: Express, deps: AppDeps) {
  app.get("/api/config", (_req, res) => {
    res.json({ aiSuggestionsConfigured: Boolean(deps.config.openai.apiKey) });
  });
}
