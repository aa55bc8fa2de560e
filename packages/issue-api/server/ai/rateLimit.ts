import type { RateLimit } from "../config";

type Bucket = { count: number; resetAt: number };

export type RateLimitResult = {
  ok: boolean;
  remaining: number;
  resetAt: number;
};

export type RateLimiter = {
  check(key: string, limit: RateLimit): RateLimitResult;
  sweep(): void;
  size(): number;
};

/**
 * Fixed-window counters keyed by caller. `now` is injectable for tests.
 */
export function createRateLimiter(now: () => number = Date.now): RateLimiter {
  const buckets = new Map<string, Bucket>();

  return {
    check(key, { limit, windowMs }) {
      const t = now();
      const cur = buckets.get(key);

      if (!cur || t >= cur.resetAt) {
        const next = { count: 1, resetAt: t + windowMs };
        buckets.set(key, next);
        return { ok: true, remaining: limit - 1, resetAt: next.resetAt };
      }

      if (cur.count >= limit) {
        return { ok: false, remaining: 0, resetAt: cur.resetAt };
      }

      cur.count += 1;
      return { ok: true, remaining: limit - cur.count, resetAt: cur.resetAt };
    },

    // keep the map from growing forever
    sweep() {
      const t = now();
      for (const [k, b] of Array.from(buckets)) if (t >= b.resetAt) buckets.delete(k);
    },

    size() {
      return buckets.size;
    }
  };
}
