import type { Request, Response, NextFunction } from "express";
import type { ApiTokensConfig } from "./config";
import { apiError } from "./errors";
import { logger } from "./logger";

/**
 * Who is calling. `organizations: null` means unrestricted, which is what
 * every caller gets when no API tokens are configured.
 */
export type Actor = {
  userId: string | null;
  organizations: string[] | null;
};

declare global {
  namespace Express {
    interface Request {
      actor?: Actor;
    }
  }
}

export const ANONYMOUS_ACTOR: Actor = { userId: null, organizations: null };

export function getBearerToken(header: string | undefined): string | null {
  const auth = header || "";
  return auth.startsWith("Bearer ") ? auth.slice("Bearer ".length).trim() || null : null;
}

export function canAccessOrganization(actor: Actor, organizationSlug: string): boolean {
  return actor.organizations === null || actor.organizations.includes(organizationSlug);
}

/**
 * Express middleware: resolve the caller from `Authorization: Bearer <token>`.
 *
 * With API_TOKENS_JSON empty every request passes through as anonymous
 * (local development). Otherwise the token must be one of the configured keys.
 */
export function requireApiToken(tokens: ApiTokensConfig) {
  const hasTokensConfig = Object.keys(tokens).length > 0;

  return (req: Request, res: Response, next: NextFunction) => {
    if (!hasTokensConfig) {
      req.actor = ANONYMOUS_ACTOR;
      return next();
    }

    const token = getBearerToken(req.headers.authorization);
    const entry = token && Object.hasOwn(tokens, token) ? tokens[token] : undefined;

    if (!entry) {
      logger.warn(`[Auth] rejected ${req.method} ${req.path}: missing or invalid API token`);
      const e = apiError("UNAUTHORIZED", "Missing or invalid API token", { status: 401 });
      return res.status(e.status).json(e.body);
    }

    req.actor = { userId: entry.userId, organizations: entry.organizations };
    next();
  };
}
