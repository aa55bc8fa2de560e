import type { Express, Request, Response } from "express";
import type { AppDeps } from "../deps";
import { ANONYMOUS_ACTOR, canAccessOrganization } from "../auth";
import { AI_SUGGESTION_FEATURE } from "../features";
import { isKnownPolicy } from "../ai/policy";
import type { RateLimitResult } from "../ai/rateLimit";
import { apiError, HttpError, ResourceDoesNotExist } from "../errors";
import { getSuggestedFix } from "../suggestions";
import { logger } from "../logger";

export const SUGGESTED_FIX_PATH =
  "/api/0/projects/:organizationSlug/:projectSlug/events/:eventId/ai-fix-suggest/";

/* -----------------------------
   Rate limits
----------------------------- */

/**
 * Checks the IP, user and organization buckets. Returns false once a 429
 * has been written.
 */
function enforceRateLimits(
  req: Request,
  res: Response,
  deps: AppDeps,
  organizationSlug: string
): boolean {
  const { rateLimits } = deps.config;
  const actor = req.actor ?? ANONYMOUS_ACTOR;
  const now = deps.now ?? Date.now;

  const results: RateLimitResult[] = [
    deps.rateLimiter.check(`ai-fix:ip:${req.ip ?? "unknown"}`, rateLimits.ip),
    deps.rateLimiter.check(`ai-fix:org:${organizationSlug}`, rateLimits.organization)
  ];
  if (actor.userId !== null) {
    results.push(deps.rateLimiter.check(`ai-fix:user:${actor.userId}`, rateLimits.user));
  }

  const blocked = results.find((r) => !r.ok);
  const report =
    blocked ?? results.reduce((min, r) => (r.remaining < min.remaining ? r : min));

  res.setHeader("X-RateLimit-Remaining", String(report.remaining));
  res.setHeader("X-RateLimit-Reset", String(report.resetAt));

  if (!blocked) return true;

  const retryAfterMs = Math.max(blocked.resetAt - now(), 0);
  res.setHeader("Retry-After", String(Math.ceil(retryAfterMs / 1000)));
  const e = apiError("RATE_LIMITED", "Too many suggestion requests. Try again soon.", {
    status: 429,
    retryAfterMs
  });
  res.status(e.status).json(e.body);
  return false;
}

/* -----------------------------
   Route
----------------------------- */

export function registerSuggestedFixRoutes(app: Express, deps: AppDeps) {
  app.get(SUGGESTED_FIX_PATH, async (req, res) => {
    try {
      const { organizationSlug, projectSlug, eventId } = req.params;
      const actor = req.actor ?? ANONYMOUS_ACTOR;

      if (!enforceRateLimits(req, res, deps, organizationSlug)) return;

      const project = await deps.projects.getBySlug(organizationSlug, projectSlug);
      if (!project || !canAccessOrganization(actor, project.organization.slug)) {
        throw new ResourceDoesNotExist();
      }

      // needs the feature enabled and an OpenAI key configured
      if (
        !deps.config.openai.apiKey ||
        !(await deps.features.has(AI_SUGGESTION_FEATURE, project.organization, actor))
      ) {
        throw new ResourceDoesNotExist();
      }

      const event = await deps.events.getEventById(project.id, eventId);
      if (!event) throw new ResourceDoesNotExist();

      const policy = await deps.policies.resolve(project.organization);
      let restriction: string | null = null;
      if (!isKnownPolicy(policy)) {
        logger.warn("[Suggest] Unknown OpenAI policy state", {
          policy,
          organization: project.organization.slug
        });
      } else if (policy === "subprocessor") {
        restriction = "subprocessor";
      } else if (policy === "individual_consent" && req.query.consent !== "yes") {
        restriction = "individual_consent";
      }

      if (restriction !== null) {
        return res.status(403).json({ restriction });
      }

      const { suggestion, cached } = await getSuggestedFix(
        {
          cache: deps.cache,
          client: deps.client,
          ttlSeconds: deps.config.suggestionCacheTtlSeconds,
          random: deps.random
        },
        event
      );

      logger.info(`[Suggest] ${cached ? "cache hit" : "generated"} for event ${eventId}`, {
        project: project.slug
      });
      return res.json({ suggestion });
    } catch (err) {
      if (err instanceof HttpError) {
        const e = err.toResponse();
        return res.status(e.status).json(e.body);
      }

      logger.error("[Suggest] Unhandled suggestion error", {
        error: err instanceof Error ? err.stack ?? err.message : String(err)
      });
      const e = apiError("INTERNAL_ERROR", "Unexpected error while generating suggestion.");
      return res.status(e.status).json(e.body);
    }
  });
}
