/**
 * MusicBrainz Metadata Resolution Service
 *
 * Resolves artist/title hints to a full tag set (title, artist, album, year,
 * genre) by searching MusicBrainz recordings in two tiers:
 *
 *   1. artist:"<artist>" AND recording:"<title>"   (when both are known)
 *   2. recording:"<title>" type:song
 *
 * The first tier with at least one recording wins. Requests go through a
 * shared FIFO rate limiter (1 request per 1.1s) and are retried with
 * exponential backoff on transient failures. Resolution never throws: any
 * failure yields fallback metadata built from the inputs.
 */

import axios from 'axios';
import { TrackMetadata } from '../../shared/types';
import { MetadataLookupError } from './errors';

// ─── Interfaces ──────────────────────────────────────────────────────────────

/** Interface for metadata cache (satisfied by both in-memory and persistent versions) */
export interface IMetadataCache {
  has(key: string): boolean;
  get(key: string): TrackMetadata | undefined;
  set(key: string, metadata: TrackMetadata): void;
  delete(key: string): boolean;
  clear(): void;
  readonly size: number;
}

/** Artist credit entry from the MusicBrainz API */
export interface MBArtistCredit {
  name?: string;
  joinphrase?: string;
  artist?: {
    id: string;
    name?: string;
  };
}

/** Release entry from the MusicBrainz API */
export interface MBRelease {
  id: string;
  title?: string;
  date?: string;
  status?: string;
}

/** Tag or genre entry from the MusicBrainz API */
export interface MBTag {
  name: string;
  count?: number;
}

/** Recording as returned by the MusicBrainz search endpoint */
export interface MBRecording {
  id: string;
  title?: string;
  score?: number;
  'artist-credit'?: MBArtistCredit[];
  releases?: MBRelease[];
  genres?: MBTag[];
  tags?: MBTag[];
}

/** MusicBrainz recording search response */
export interface MBRecordingSearchResponse {
  count?: number;
  recordings?: MBRecording[];
}

/** Options for the metadata resolver */
export interface MetadataResolverOptions {
  /** MusicBrainz API base URL (for testing) */
  apiBaseUrl?: string;
  /** Maximum number of retries per request */
  maxRetries?: number;
  /** Base delay in ms for exponential backoff */
  baseRetryDelay?: number;
  /** User-Agent string (MusicBrainz requires a descriptive User-Agent) */
  userAgent?: string;
  /** Number of recordings requested per search */
  searchLimit?: number;
  /** HTTP timeout in ms */
  timeoutMs?: number;
  /** When false, no request is made and the fallback is returned */
  enabled?: boolean;
  /** Called with the lookup error whenever the fallback is used because of a failure */
  onLookupFailure?: (error: MetadataLookupError) => void;
}

// ─── Constants ───────────────────────────────────────────────────────────────

const MUSICBRAINZ_API_URL = 'https://musicbrainz.org/ws/2';
const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_BASE_RETRY_DELAY = 1000;
const DEFAULT_USER_AGENT = 'tunedrop/1.0.0 ( tunedrop@example.com )';
const DEFAULT_SEARCH_LIMIT = 5;
const DEFAULT_TIMEOUT_MS = 10000;

/** MusicBrainz rate limit: 1 request per second for unauthenticated clients */
const MUSICBRAINZ_RATE_LIMIT_INTERVAL = 1100;

const DECADE_TAG = /^\d+s$/;
const VOCALIST_TAG = /\bvocal(?:s|ist|ists)?\b/i;
const SUBJECTIVE_TAGS: ReadonlySet<string> = new Set([
  'classic',
  'favorite',
  'favourite',
  'favorites',
  'beautiful',
  'awesome',
]);

// ─── Rate Limiter ────────────────────────────────────────────────────────────

/**
 * FIFO queue-based rate limiter for the MusicBrainz API.
 *
 * Concurrent callers are serialised and released in order, so any number of
 * jobs calling waitForSlot() at once never burst past the API limit.
 */
export class MusicBrainzRateLimiter {
  private lastRequestTime = 0;
  private readonly intervalMs: number;
  private readonly waitQueue: Array<() => void> = [];
  private isDraining = false;

  constructor(intervalMs: number = MUSICBRAINZ_RATE_LIMIT_INTERVAL) {
    this.intervalMs = intervalMs;
  }

  /**
   * Waits until the next request slot is available.
   */
  waitForSlot(): Promise<void> {
    return new Promise<void>((resolve) => {
      this.waitQueue.push(resolve);
      if (!this.isDraining) {
        void this.drain();
      }
    });
  }

  private async drain(): Promise<void> {
    this.isDraining = true;
    while (this.waitQueue.length > 0) {
      const remaining = this.intervalMs - (Date.now() - this.lastRequestTime);
      if (remaining > 0) {
        await new Promise<void>((r) => setTimeout(r, remaining));
      }
      this.lastRequestTime = Date.now();
      const next = this.waitQueue.shift();
      if (next) next();
    }
    this.isDraining = false;
  }
}

// ─── Metadata Cache ─────────────────────────────────────────────────────────

/**
 * Builds the cache key for an artist/title pair: lower-cased, NUL-separated.
 */
export function buildCacheKey(artist: string, title: string): string {
  return `${artist.trim().toLowerCase()}\u0000${title.trim().toLowerCase()}`;
}

/**
 * In-memory cache for resolved metadata, keyed by buildCacheKey().
 */
export class MetadataCache implements IMetadataCache {
  private cache: Map<string, TrackMetadata> = new Map();

  has(key: string): boolean {
    return this.cache.has(key);
  }

  get(key: string): TrackMetadata | undefined {
    return this.cache.get(key);
  }

  set(key: string, metadata: TrackMetadata): void {
    this.cache.set(key, metadata);
  }

  delete(key: string): boolean {
    return this.cache.delete(key);
  }

  clear(): void {
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }
}

// ─── Axios Error Detection ──────────────────────────────────────────────────

/** Type guard for axios-like errors (works with both real and mocked axios) */
interface AxiosLikeError extends Error {
  isAxiosError: boolean;
  response?: {
    status: number;
    data?: unknown;
  };
}

function isAxiosLikeError(error: unknown): error is AxiosLikeError {
  return (
    error !== null &&
    typeof error === 'object' &&
    'isAxiosError' in error &&
    error.isAxiosError === true
  );
}

// ─── Query Building ─────────────────────────────────────────────────────────

/** Escapes a value for use inside a quoted Lucene phrase */
function escapeLucenePhrase(value: string): string {
  return value.replace(/[\\"]/g, '\\$&');
}

/**
 * Builds the search queries to try, in tier order.
 * The artist tier is skipped when either input is empty.
 */
export function buildSearchQueries(artist: string, title: string): string[] {
  const queries: string[] = [];
  const a = artist.trim();
  const t = title.trim();

  if (a && t) {
    queries.push(`artist:"${escapeLucenePhrase(a)}" AND recording:"${escapeLucenePhrase(t)}"`);
  }
  if (t) {
    queries.push(`recording:"${escapeLucenePhrase(t)}" type:song`);
  }
  return queries;
}

// ─── Response Mapping ───────────────────────────────────────────────────────

/**
 * Primary artist from an artist-credit list: the credited name, else the
 * artist entity's name. Returns null when neither is present.
 */
export function parsePrimaryArtist(credits: MBArtistCredit[] | undefined): string | null {
  const primary = credits?.[0];
  if (!primary) return null;
  return primary.name || primary.artist?.name || null;
}

/**
 * Picks the release used for album and year: the first one with a date,
 * else the first one.
 */
export function selectRelease(releases: MBRelease[] | undefined): MBRelease | undefined {
  if (!releases || releases.length === 0) return undefined;
  return releases.find((release) => Boolean(release.date)) ?? releases[0];
}

/**
 * Extracts the year from a MusicBrainz date ("YYYY", "YYYY-MM" or "YYYY-MM-DD").
 */
export function extractYear(dateStr: string | undefined): number | null {
  if (!dateStr) return null;

  const yearMatch = dateStr.match(/^(\d{4})/);
  if (!yearMatch) return null;

  const year = parseInt(yearMatch[1], 10);
  if (isNaN(year) || year < 1000) return null;

  return year;
}

/**
 * Capitalizes a genre name.
 * "hip hop" -> "Hip Hop", "r&b" -> "R&B", "post-punk" -> "Post-Punk".
 */
export function capitalizeGenre(genre: string): string {
  return genre
    .split(/(\s+|-|&)/)
    .map((part) => {
      if (part === '&' || part === '-' || /^\s+$/.test(part)) return part;
      return part.charAt(0).toUpperCase() + part.slice(1);
    })
    .join('');
}

/** Whether a free-form tag can stand in for a genre */
export function isGenreLikeTag(tag: string): boolean {
  const normalized = tag.trim().toLowerCase();
  if (!normalized) return false;
  if (DECADE_TAG.test(normalized)) return false;
  if (VOCALIST_TAG.test(normalized)) return false;
  return !SUBJECTIVE_TAGS.has(normalized);
}

/**
 * Genre for a recording: the first explicit genre, else the first tag that
 * looks like one. Tags are taken in the order MusicBrainz returns them.
 */
export function selectGenre(recording: MBRecording): string | null {
  const explicit = recording.genres?.find((genre) => genre.name.trim().length > 0);
  if (explicit) {
    return capitalizeGenre(explicit.name.trim());
  }

  const tag = recording.tags?.find((entry) => isGenreLikeTag(entry.name));
  return tag ? capitalizeGenre(tag.name.trim()) : null;
}

/**
 * Maps a recording to TrackMetadata. Missing fields fall back to the inputs.
 */
export function mapRecordingToMetadata(
  recording: MBRecording,
  artist: string,
  title: string,
): TrackMetadata {
  const release = selectRelease(recording.releases);

  return {
    title: recording.title || title,
    artist: parsePrimaryArtist(recording['artist-credit']) ?? artist,
    album: release?.title ?? '',
    year: release ? extractYear(release.date) : null,
    genre: selectGenre(recording),
    source: 'resolved',
  };
}

/**
 * Fallback metadata built from the inputs alone.
 */
export function buildFallbackMetadata(artist: string, title: string): TrackMetadata {
  return { title, artist, album: '', year: null, genre: null, source: 'fallback' };
}

function isRecordingSearchResponse(data: unknown): data is MBRecordingSearchResponse {
  if (data === null || typeof data !== 'object') return false;
  if (!('recordings' in data)) return true;
  return data.recordings === undefined || Array.isArray(data.recordings);
}

// ─── API Query ──────────────────────────────────────────────────────────────

/**
 * Runs one recording search against MusicBrainz.
 *
 * Retries 5xx, 429 and network errors with exponential backoff; other 4xx
 * responses fail immediately.
 *
 * @returns The recordings in the response (possibly empty)
 * @throws MetadataLookupError when the request fails or the body is malformed
 */
export async function searchRecordings(
  query: string,
  options: MetadataResolverOptions,
  rateLimiter: MusicBrainzRateLimiter,
): Promise<MBRecording[]> {
  const apiUrl = options.apiBaseUrl || MUSICBRAINZ_API_URL;
  const maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
  const baseDelay = options.baseRetryDelay ?? DEFAULT_BASE_RETRY_DELAY;
  const userAgent = options.userAgent || DEFAULT_USER_AGENT;

  let lastError: MetadataLookupError | null = null;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    if (attempt > 0) {
      const delay = baseDelay * Math.pow(2, attempt - 1);
      await new Promise<void>((resolve) => setTimeout(resolve, delay));
    }

    await rateLimiter.waitForSlot();

    try {
      const response = await axios.get<unknown>(`${apiUrl}/recording`, {
        params: {
          query,
          fmt: 'json',
          limit: options.searchLimit ?? DEFAULT_SEARCH_LIMIT,
        },
        headers: {
          'User-Agent': userAgent,
          Accept: 'application/json',
        },
        timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      });

      if (!isRecordingSearchResponse(response.data)) {
        throw new MetadataLookupError('MusicBrainz returned a malformed search response');
      }
      return response.data.recordings ?? [];
    } catch (error: unknown) {
      if (error instanceof MetadataLookupError) {
        throw error;
      }

      if (isAxiosLikeError(error)) {
        const status = error.response?.status;

        if (status && status >= 400 && status < 500 && status !== 429) {
          throw new MetadataLookupError(`MusicBrainz API error (${status})`, {
            statusCode: status,
            cause: error,
          });
        }

        lastError = new MetadataLookupError(`MusicBrainz API request failed: ${error.message}`, {
          statusCode: status,
          cause: error,
        });
      } else {
        const cause = error instanceof Error ? error : new Error(String(error));
        lastError = new MetadataLookupError(cause.message, { cause });
      }

      if (attempt === maxRetries) {
        throw new MetadataLookupError(
          `MusicBrainz API request failed after ${maxRetries + 1} attempts: ${lastError.message}`,
          { statusCode: lastError.statusCode ?? undefined, cause: lastError },
        );
      }
    }
  }

  throw lastError ?? new MetadataLookupError('MusicBrainz API request failed');
}

// ─── Main Service ────────────────────────────────────────────────────────────

/**
 * Resolves metadata for an artist/title pair.
 *
 * 1. Returns the fallback right away when lookups are disabled
 * 2. Checks the cache
 * 3. Searches each tier in order until one returns a recording
 * 4. Caches and returns the mapped metadata
 *
 * Never throws; failures are reported through options.onLookupFailure.
 *
 * @param artist - Artist hint (may be empty)
 * @param title - Title hint
 */
export async function resolveMetadata(
  artist: string,
  title: string,
  options: MetadataResolverOptions = {},
  cache?: IMetadataCache,
  rateLimiter?: MusicBrainzRateLimiter,
): Promise<TrackMetadata> {
  const fallback = buildFallbackMetadata(artist, title);
  if (options.enabled === false) {
    return fallback;
  }

  const cacheKey = buildCacheKey(artist, title);
  const limiter = rateLimiter ?? new MusicBrainzRateLimiter();

  try {
    const cached = readCache(cache, cacheKey, options);
    if (cached) {
      return cached;
    }

    for (const query of buildSearchQueries(artist, title)) {
      const recordings = await searchRecordings(query, options, limiter);
      const first = recordings[0];
      if (first) {
        const metadata = mapRecordingToMetadata(first, artist, title);
        writeCache(cache, cacheKey, metadata, options);
        return metadata;
      }
    }
    return fallback;
  } catch (error: unknown) {
    options.onLookupFailure?.(toLookupError(error));
    return fallback;
  }
}

function toLookupError(error: unknown, prefix = ''): MetadataLookupError {
  if (error instanceof MetadataLookupError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new MetadataLookupError(`${prefix}${message}`, {
    cause: error instanceof Error ? error : undefined,
  });
}

/** A cache that cannot be read counts as a miss */
function readCache(
  cache: IMetadataCache | undefined,
  key: string,
  options: MetadataResolverOptions,
): TrackMetadata | undefined {
  if (!cache) {
    return undefined;
  }
  try {
    return cache.get(key);
  } catch (error: unknown) {
    options.onLookupFailure?.(toLookupError(error, 'Metadata cache read failed: '));
    return undefined;
  }
}

function writeCache(
  cache: IMetadataCache | undefined,
  key: string,
  metadata: TrackMetadata,
  options: MetadataResolverOptions,
): void {
  if (!cache) {
    return;
  }
  try {
    cache.set(key, metadata);
  } catch (error: unknown) {
    options.onLookupFailure?.(toLookupError(error, 'Metadata cache write failed: '));
  }
}
