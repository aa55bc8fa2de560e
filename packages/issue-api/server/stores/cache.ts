import { CacheEntryModel } from "../models";
import { logger } from "../logger";

/**
 * Port: string cache with per-entry TTL.
 */
export interface SuggestionCache {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
}

/**
 * Adapter: Mongo-backed cache. Expired entries are ignored on read even
 * before the TTL index reaps them.
 */
export class MongoSuggestionCache implements SuggestionCache {
  constructor(private readonly now: () => number = Date.now) {}

  async get(key: string): Promise<string | null> {
    try {
      const entry = await CacheEntryModel.findOne({ key }).lean().exec();
      if (!entry || entry.expiresAt.getTime() <= this.now()) return null;
      return entry.value;
    } catch (err) {
      logger.error("[Cache] read failed", { key, error: errorMessage(err) });
      return null;
    }
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    try {
      await CacheEntryModel.updateOne(
        { key },
        { $set: { key, value, expiresAt: new Date(this.now() + ttlSeconds * 1000) } },
        { upsert: true }
      ).exec();
    } catch (err) {
      logger.error("[Cache] write failed", { key, error: errorMessage(err) });
    }
  }
}

/**
 * Adapter: process-local cache for tests and single-process runs. Entries
 * do not survive a restart and are not shared between instances.
 */
export class MemorySuggestionCache implements SuggestionCache {
  private readonly entries = new Map<string, { value: string; expiresAt: number }>();

  constructor(private readonly now: () => number = Date.now) {}

  async get(key: string): Promise<string | null> {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.entries.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000 });
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
