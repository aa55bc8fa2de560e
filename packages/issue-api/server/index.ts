import { createServer } from "http";
import { loadConfig } from "./config";
import { createApp } from "./app";
import { connectMongo } from "./models";
import { logger } from "./logger";
import { ConfigFeatureFlags } from "./features";
import { createOpenAiPolicyRegistry, staticPolicyReceiver } from "./ai/policy";
import { createRateLimiter } from "./ai/rateLimit";
import { MongoSuggestionCache } from "./stores/cache";
import { MongoEventStore } from "./stores/eventStore";
import { MongoProjectStore } from "./stores/projectStore";
import { createOpenAiSuggestionClient } from "./suggestions/ai";

/* -----------------------------
   Start
----------------------------- */

export async function startServer() {
  const config = loadConfig();
  if (config.logLevel === "silent") logger.silent = true;
  else logger.level = config.logLevel;

  await connectMongo(config.mongodbUri);
  logger.info("[Server] ✅ Mongo connected");

  const policies = createOpenAiPolicyRegistry();
  policies.connect(staticPolicyReceiver(config.aiPolicies));

  const rateLimiter = createRateLimiter();
  setInterval(() => {
    rateLimiter.sweep();
    logger.debug(`[RateLimit] ${rateLimiter.size()} live buckets after sweep`);
  }, 60_000).unref();

  const app = createApp({
    config,
    projects: new MongoProjectStore(),
    events: new MongoEventStore(),
    cache: new MongoSuggestionCache(),
    client: createOpenAiSuggestionClient(config.openai),
    features: new ConfigFeatureFlags(config.featureFlags),
    policies,
    rateLimiter
  });

  if (!config.openai.apiKey) {
    logger.warn("[Server] OPENAI_API_KEY not set; suggestion endpoint will answer 404");
  }

  const httpServer = createServer(app);
  await new Promise<void>((resolve) => httpServer.listen(config.port, resolve));
  logger.info(`[Server] running on port ${config.port}`);

  return httpServer;
}
