import type { ServerConfig } from "./config";
import type { FeatureFlags } from "./features";
import type { OpenAiPolicyRegistry } from "./ai/policy";
import type { RateLimiter } from "./ai/rateLimit";
import type { SuggestionCache } from "./stores/cache";
import type { EventStore } from "./stores/eventStore";
import type { ProjectStore } from "./stores/projectStore";
import type { SuggestionClient } from "./suggestions/ai";

/**
 * Everything the HTTP layer talks to. The bootstrap wires the Mongo/OpenAI
 * adapters; tests hand in in-process fakes.
 */
export type AppDeps = {
  config: ServerConfig;
  projects: ProjectStore;
  events: EventStore;
  cache: SuggestionCache;
  client: SuggestionClient;
  features: FeatureFlags;
  policies: OpenAiPolicyRegistry;
  rateLimiter: RateLimiter;
  random?: () => number;
  now?: () => number;
};
