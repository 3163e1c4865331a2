/**
 * Generation Cache
 *
 * SQLite-based cache for model generations, with TTL-based expiration, so
 * re-running a batch does not pay for identical prompts twice.
 *
 * Cache Key: sha256(task | generator name | prompt)
 *
 * Cache failures never fail a generation: reads degrade to a miss and
 * writes are logged and skipped.
 *
 * @module generation-cache
 */

import sqlite3 from "sqlite3";
import { open, type Database } from "sqlite";
import path from "path";
import crypto from "crypto";
import type { SummarizerConfig } from "./config-schemas";
import type { GenerateOptions, TextGenerator } from "./summarizer/generation";

// ============================================================================
// TYPES
// ============================================================================

export interface GenerationCacheOptions {
  /** File path, or ":memory:" */
  dbPath: string;
  ttlDays: number;
}

interface GenerationCacheRow {
  cache_key: string;
  task: string;
  generator: string;
  output_text: string;
  cached_at: string;
  expires_at: string;
}

export interface GenerationCacheStats {
  totalEntries: number;
  validEntries: number;
  expiredEntries: number;
  taskBreakdown: Record<string, number>;
}

export function generateCacheKey(task: string, generatorName: string, prompt: string): string {
  return crypto.createHash("sha256").update([task, generatorName, prompt].join("|")).digest("hex");
}

// ============================================================================
// CACHE
// ============================================================================

export class GenerationCache {
  private dbPromise: Promise<Database> | null = null;

  constructor(
    private readonly options: GenerationCacheOptions,
    private readonly now: () => Date = () => new Date(),
  ) {}

  static fromConfig(config: SummarizerConfig): GenerationCache {
    return new GenerationCache({ dbPath: config.cache.dbPath, ttlDays: config.cache.ttlDays });
  }

  private getDb(): Promise<Database> {
    if (!this.dbPromise) {
      this.dbPromise = (async () => {
        const filename = this.options.dbPath === ":memory:" ? ":memory:" : path.resolve(this.options.dbPath);
        console.log(`[Generation-Cache] Opening database at ${filename}`);

        const instance = await open({ filename, driver: sqlite3.Database });
        if (filename !== ":memory:") {
          await instance.exec("PRAGMA journal_mode=WAL");
        }
        await instance.exec(`
          CREATE TABLE IF NOT EXISTS generation_cache (
            cache_key TEXT PRIMARY KEY,
            task TEXT NOT NULL,
            generator TEXT NOT NULL,
            output_text TEXT NOT NULL,
            cached_at TEXT NOT NULL,
            expires_at TEXT NOT NULL
          );

          CREATE INDEX IF NOT EXISTS idx_generation_cache_expires ON generation_cache(expires_at);
        `);
        return instance;
      })();
    }
    return this.dbPromise;
  }

  async get(task: string, generatorName: string, prompt: string): Promise<string | null> {
    try {
      const database = await this.getDb();
      const row = await database.get<GenerationCacheRow>(
        "SELECT * FROM generation_cache WHERE cache_key = ? AND expires_at > ?",
        [generateCacheKey(task, generatorName, prompt), this.now().toISOString()],
      );
      return row ? row.output_text : null;
    } catch (err) {
      console.error("[Generation-Cache] Error reading cache:", err);
      return null;
    }
  }

  async set(task: string, generatorName: string, prompt: string, output: string): Promise<void> {
    try {
      const database = await this.getDb();
      const now = this.now();
      const expiresAt = new Date(now.getTime() + this.options.ttlDays * 24 * 60 * 60 * 1000);
      await database.run(
        `INSERT OR REPLACE INTO generation_cache
         (cache_key, task, generator, output_text, cached_at, expires_at)
         VALUES (?, ?, ?, ?, ?, ?)`,
        [
          generateCacheKey(task, generatorName, prompt),
          task,
          generatorName,
          output,
          now.toISOString(),
          expiresAt.toISOString(),
        ],
      );
    } catch (err) {
      console.error("[Generation-Cache] Error writing cache:", err);
    }
  }

  /** Delete expired entries; returns how many were removed. */
  async cleanupExpired(): Promise<number> {
    try {
      const database = await this.getDb();
      const result = await database.run("DELETE FROM generation_cache WHERE expires_at <= ?", [
        this.now().toISOString(),
      ]);
      const deleted = result.changes ?? 0;
      if (deleted > 0) console.log(`[Generation-Cache] Cleaned up ${deleted} expired entries`);
      return deleted;
    } catch (err) {
      console.error("[Generation-Cache] Error cleaning up cache:", err);
      return 0;
    }
  }

  async getStats(): Promise<GenerationCacheStats> {
    const database = await this.getDb();
    const now = this.now().toISOString();

    const totalRow = await database.get<{ count: number }>("SELECT COUNT(*) as count FROM generation_cache");
    const validRow = await database.get<{ count: number }>(
      "SELECT COUNT(*) as count FROM generation_cache WHERE expires_at > ?",
      [now],
    );
    const taskRows = await database.all<Array<{ task: string; count: number }>>(
      "SELECT task, COUNT(*) as count FROM generation_cache WHERE expires_at > ? GROUP BY task",
      [now],
    );

    const totalEntries = totalRow?.count ?? 0;
    const validEntries = validRow?.count ?? 0;
    const taskBreakdown: Record<string, number> = {};
    for (const row of taskRows) taskBreakdown[row.task] = row.count;

    return { totalEntries, validEntries, expiredEntries: totalEntries - validEntries, taskBreakdown };
  }

  async close(): Promise<void> {
    if (!this.dbPromise) return;
    const database = await this.dbPromise;
    this.dbPromise = null;
    await database.close();
    console.log("[Generation-Cache] Database closed");
  }
}

// ============================================================================
// CACHING GENERATOR
// ============================================================================

/** Serves repeated (task, prompt) pairs from the cache; only successful generations are stored. */
export class CachedTextGenerator implements TextGenerator {
  readonly name: string;

  constructor(
    private readonly inner: TextGenerator,
    private readonly cache: GenerationCache,
  ) {
    this.name = inner.name;
  }

  async generate(prompt: string, options: GenerateOptions): Promise<string> {
    const cached = await this.cache.get(options.task, this.name, prompt);
    if (cached !== null) {
      console.log(`[Generation-Cache] Cache HIT for ${options.task} (${this.name})`);
      return cached;
    }

    const text = await this.inner.generate(prompt, options);
    await this.cache.set(options.task, this.name, prompt, text);
    return text;
  }
}
