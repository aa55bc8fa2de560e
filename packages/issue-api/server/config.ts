import { z } from "zod";

/* -----------------------------
   Env helpers
----------------------------- */

function jsonEnv<T extends z.ZodTypeAny>(schema: T) {
  return z
    .string()
    .optional()
    .transform((raw, ctx): unknown => {
      if (!raw || raw.trim() === "") return undefined;
      try {
        const parsed: unknown = JSON.parse(raw);
        return parsed;
      } catch {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Invalid JSON" });
        return z.NEVER;
      }
    })
    .pipe(schema);
}

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() !== "" ? v.trim() : undefined));

// featureName -> true (everyone) | list of organization slugs
const FeatureFlagsSchema = z
  .record(z.union([z.boolean(), z.array(z.string())]))
  .default({});

// token -> actor
const ApiTokensSchema = z
  .record(
    z.object({
      userId: z.string(),
      organizations: z.array(z.string()).default([])
    })
  )
  .default({});

// organization slug -> OpenAI policy
const AiPolicySchema = z.record(z.string()).default({});

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(5050),
  MONGODB_URI: z.string().default("mongodb://localhost:27017/faultline"),
  LOG_LEVEL: z
    .enum(["silent", "error", "warn", "info", "http", "verbose", "debug"])
    .default("info"),

  OPENAI_API_KEY: optionalString,
  AI_SUGGESTION_MODEL: z.string().default("gpt-3.5-turbo"),
  AI_SUGGESTION_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.5),
  AI_SUGGESTION_TIMEOUT_MS: z.coerce.number().int().positive().default(12_000),
  AI_SUGGESTION_RETRIES: z.coerce.number().int().min(0).default(2),
  AI_SUGGESTION_CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(300),

  AI_RATE_LIMIT_MAX: z.coerce.number().int().positive().default(5),
  AI_RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(1_000),

  FEATURE_FLAGS_JSON: jsonEnv(FeatureFlagsSchema),
  API_TOKENS_JSON: jsonEnv(ApiTokensSchema),
  AI_POLICY_JSON: jsonEnv(AiPolicySchema)
});

/* -----------------------------
   Config
----------------------------- */

export type FeatureFlagsConfig = z.infer<typeof FeatureFlagsSchema>;
export type ApiTokensConfig = z.infer<typeof ApiTokensSchema>;

export type RateLimit = { limit: number; windowMs: number };

export type ServerConfig = {
  port: number;
  mongodbUri: string;
  logLevel: z.infer<typeof EnvSchema>["LOG_LEVEL"];
  openai: {
    apiKey?: string;
    model: string;
    temperature: number;
    timeoutMs: number;
    retries: number;
  };
  suggestionCacheTtlSeconds: number;
  rateLimits: {
    ip: RateLimit;
    user: RateLimit;
    organization: RateLimit;
  };
  featureFlags: FeatureFlagsConfig;
  apiTokens: ApiTokensConfig;
  aiPolicies: Record<string, string>;
};

export class ConfigError extends Error {
  constructor(readonly issues: z.ZodIssue[]) {
    super(
      "Invalid environment: " +
        issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")
    );
    this.name = "ConfigError";
  }
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env
): ServerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) throw new ConfigError(parsed.error.issues);

  const e = parsed.data;
  const rateLimit = { limit: e.AI_RATE_LIMIT_MAX, windowMs: e.AI_RATE_LIMIT_WINDOW_MS };

  return {
    port: e.PORT,
    mongodbUri: e.MONGODB_URI,
    logLevel: e.LOG_LEVEL,
    openai: {
      apiKey: e.OPENAI_API_KEY,
      model: e.AI_SUGGESTION_MODEL,
      temperature: e.AI_SUGGESTION_TEMPERATURE,
      timeoutMs: e.AI_SUGGESTION_TIMEOUT_MS,
      retries: e.AI_SUGGESTION_RETRIES
    },
    suggestionCacheTtlSeconds: e.AI_SUGGESTION_CACHE_TTL_SECONDS,
    rateLimits: {
      ip: rateLimit,
      user: { ...rateLimit },
      organization: { ...rateLimit }
    },
    featureFlags: e.FEATURE_FLAGS_JSON,
    apiTokens: e.API_TOKENS_JSON,
    aiPolicies: e.AI_POLICY_JSON
  };
}
