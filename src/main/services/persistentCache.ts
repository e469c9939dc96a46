/**
 * Persistent Cache Service (SQLite)
 *
 * Caches resolved MusicBrainz metadata across sessions so repeated requests
 * for the same artist/title pair skip the (rate-limited) API.
 *
 * Cache expiration: never (recording metadata doesn't change), or an explicit
 * clearAll(). PersistentMetadataCache implements the same interface as the
 * in-memory MetadataCache and can be handed to the resolver in its place.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import Database from 'better-sqlite3';
import { TrackMetadata } from '../../shared/types';
import type { IMetadataCache } from './metadataResolver';

// ─── Constants ───────────────────────────────────────────────────────────────

/** Current schema version for migration support */
const SCHEMA_VERSION = 1;

// ─── Database Default Path ───────────────────────────────────────────────────

/**
 * Returns the default directory for the cache database.
 * %APPDATA%/tunedrop/ on Windows, ~/.config/tunedrop/ elsewhere.
 */
export function getDefaultCacheDir(): string {
  if (process.platform === 'win32') {
    const appData = process.env.APPDATA || path.join(os.homedir(), 'AppData', 'Roaming');
    return path.join(appData, 'tunedrop');
  }
  return path.join(os.homedir(), '.config', 'tunedrop');
}

export function getDefaultCachePath(): string {
  return path.join(getDefaultCacheDir(), 'cache.db');
}

// ─── Row Validation ──────────────────────────────────────────────────────────

/**
 * Checks that a parsed JSON value has the TrackMetadata shape.
 * Rows written by an older schema are treated as cache misses.
 */
export function isTrackMetadata(value: unknown): value is TrackMetadata {
  if (value === null || typeof value !== 'object') return false;
  if (!('title' in value) || typeof value.title !== 'string') return false;
  if (!('artist' in value) || typeof value.artist !== 'string') return false;
  if (!('album' in value) || typeof value.album !== 'string') return false;
  if (!('year' in value) || (value.year !== null && typeof value.year !== 'number')) return false;
  if (!('genre' in value) || (value.genre !== null && typeof value.genre !== 'string')) return false;
  return 'source' in value && (value.source === 'resolved' || value.source === 'fallback');
}

// ─── Persistent Cache Database ───────────────────────────────────────────────

/** Options for PersistentCacheDatabase */
export interface PersistentCacheOptions {
  /** Path to the SQLite database file. Defaults to ~/.config/tunedrop/cache.db */
  dbPath?: string;
  /** Whether to use an in-memory database (for testing) */
  inMemory?: boolean;
}

/** Summary of cache contents */
export interface CacheStats {
  metadata: number;
  totalEntries: number;
}

/**
 * SQLite-based persistent cache database.
 *
 * Table `metadata`: cache_key → TrackMetadata (JSON). Keys are produced by
 * buildCacheKey() in the resolver.
 */
export class PersistentCacheDatabase {
  private db: Database.Database | null = null;
  private readonly dbPath: string;
  private readonly inMemory: boolean;

  constructor(options: PersistentCacheOptions = {}) {
    this.inMemory = options.inMemory ?? false;
    this.dbPath = this.inMemory ? ':memory:' : (options.dbPath ?? getDefaultCachePath());
  }

  /**
   * Opens the database and creates tables if they don't exist.
   * Must be called before any cache operations.
   */
  initialize(): void {
    if (!this.inMemory) {
      fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
    }

    const db = new Database(this.dbPath);
    db.pragma('journal_mode = WAL');

    db.exec(`
      CREATE TABLE IF NOT EXISTS schema_version (
        version INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS metadata (
        cache_key TEXT PRIMARY KEY,
        metadata_json TEXT NOT NULL,
        created_at TEXT NOT NULL DEFAULT (datetime('now'))
      );
    `);

    const versionRow = db
      .prepare<[], { version: number }>('SELECT version FROM schema_version LIMIT 1')
      .get();
    if (!versionRow) {
      db.prepare('INSERT INTO schema_version (version) VALUES (?)').run(SCHEMA_VERSION);
    }

    this.db = db;
  }

  // ─── Metadata Cache ────────────────────────────────────────────────────────

  /**
   * Stores metadata under a cache key, replacing any previous entry.
   */
  setMetadata(cacheKey: string, metadata: TrackMetadata): void {
    this.requireDb()
      .prepare(
        `INSERT OR REPLACE INTO metadata (cache_key, metadata_json, created_at)
           VALUES (?, ?, datetime('now'))`,
      )
      .run(cacheKey, JSON.stringify(metadata));
  }

  /**
   * Retrieves metadata for a cache key.
   * Returns undefined if not cached or if the stored row is unreadable.
   */
  getMetadata(cacheKey: string): TrackMetadata | undefined {
    const row = this.requireDb()
      .prepare<[string], { metadata_json: string }>(
        'SELECT metadata_json FROM metadata WHERE cache_key = ?',
      )
      .get(cacheKey);
    if (!row) return undefined;
    try {
      const parsed: unknown = JSON.parse(row.metadata_json);
      return isTrackMetadata(parsed) ? parsed : undefined;
    } catch {
      return undefined;
    }
  }

  hasMetadata(cacheKey: string): boolean {
    const row = this.requireDb()
      .prepare<[string], { found: number }>('SELECT 1 AS found FROM metadata WHERE cache_key = ?')
      .get(cacheKey);
    return row !== undefined;
  }

  deleteMetadata(cacheKey: string): boolean {
    const result = this.requireDb()
      .prepare('DELETE FROM metadata WHERE cache_key = ?')
      .run(cacheKey);
    return result.changes > 0;
  }

  getMetadataCount(): number {
    const row = this.requireDb()
      .prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM metadata')
      .get();
    return row?.count ?? 0;
  }

  // ─── Cache Management ──────────────────────────────────────────────────────

  /** Clears all cached data. */
  clearAll(): void {
    this.requireDb().exec('DELETE FROM metadata');
  }

  getStats(): CacheStats {
    const metadata = this.getMetadataCount();
    return { metadata, totalEntries: metadata };
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  /**
   * Returns the open database. Throws if initialize() has not been called.
   */
  private requireDb(): Database.Database {
    if (!this.db) {
      throw new Error('PersistentCacheDatabase is not initialized. Call initialize() first.');
    }
    return this.db;
  }
}

// ─── Adapter ─────────────────────────────────────────────────────────────────

/**
 * Persistent metadata cache that wraps PersistentCacheDatabase.
 * Drop-in replacement for the in-memory MetadataCache.
 */
export class PersistentMetadataCache implements IMetadataCache {
  private readonly db: PersistentCacheDatabase;

  constructor(db: PersistentCacheDatabase) {
    this.db = db;
  }

  has(key: string): boolean {
    return this.db.hasMetadata(key);
  }

  get(key: string): TrackMetadata | undefined {
    return this.db.getMetadata(key);
  }

  set(key: string, metadata: TrackMetadata): void {
    this.db.setMetadata(key, metadata);
  }

  delete(key: string): boolean {
    return this.db.deleteMetadata(key);
  }

  clear(): void {
    this.db.clearAll();
  }

  get size(): number {
    return this.db.getMetadataCount();
  }
}
