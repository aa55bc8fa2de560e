import type { SuggestionCache } from "../stores/cache";
import type { SuggestionClient } from "./ai";
import { describeEventForAi } from "./describe";
import { getSuggestionSystemPrompt } from "./prompt";
import type { StoredEvent } from "./types";
import { logger } from "../logger";

export type { StoredEvent };

export const DEFAULT_SUGGESTION_TTL_SECONDS = 300;

export type SuggestionDeps = {
  cache: SuggestionCache;
  client: SuggestionClient;
  ttlSeconds?: number;
  random?: () => number;
};

export type SuggestedFix = {
  suggestion: string;
  cached: boolean;
};

/**
 * Grouping hash shared by every event of the same issue; the event id
 * stands in when the event was stored without hashes.
 */
export function getPrimaryHash(event: StoredEvent): string {
  return event.data.hashes?.[0] ?? event.eventId;
}

export function suggestionCacheKey(event: StoredEvent): string {
  return "ai:" + getPrimaryHash(event);
}

/**
 * Cache-aside: one suggestion per issue, so new events of an already
 * explained issue reuse the same reply until it expires.
 */
export async function getSuggestedFix(
  deps: SuggestionDeps,
  event: StoredEvent
): Promise<SuggestedFix> {
  const key = suggestionCacheKey(event);

  const cached = await deps.cache.get(key);
  if (cached !== null) return { suggestion: cached, cached: true };

  const system = getSuggestionSystemPrompt(deps.random);
  const eventInfo = describeEventForAi(event.data);

  const suggestion = await deps.client.complete([
    { role: "system", content: system },
    { role: "user", content: JSON.stringify(eventInfo) }
  ]);

  await deps.cache.set(key, suggestion, deps.ttlSeconds ?? DEFAULT_SUGGESTION_TTL_SECONDS);
  logger.debug("[Suggest] cached suggestion", { key });

  return { suggestion, cached: false };
}
