/**
 * Search Provider Service
 *
 * Turns a free-text query into raw candidates. The default provider asks
 * yt-dlp for the first N YouTube results as JSON without downloading
 * anything.
 */

import { Candidate } from '../../shared/types';
import { NoSearchResultsError } from './errors';
import { YtDlpProcessError, YtDlpRunner, createYtDlpRunner } from './ytDlp';

// ─── Interfaces ──────────────────────────────────────────────────────────────

/** Anything that can list candidates for a query */
export interface SearchProvider {
  search(query: string, signal?: AbortSignal): Promise<Candidate[]>;
}

export interface YtDlpSearchOptions {
  /** Number of results to request (1-50) */
  limit?: number;
  /** yt-dlp binary, used when no runner is given */
  binaryPath?: string;
  /** Process runner (for testing) */
  runner?: YtDlpRunner;
}

// ─── Constants ───────────────────────────────────────────────────────────────

const DEFAULT_SEARCH_LIMIT = 10;
const MAX_SEARCH_LIMIT = 50;

// ─── Parsing ─────────────────────────────────────────────────────────────────

/** Non-negative finite number from a JSON field; anything else becomes 0 */
export function toCount(value: unknown): number {
  const parsed = typeof value === 'string' ? Number(value) : value;
  if (typeof parsed !== 'number' || !Number.isFinite(parsed) || parsed < 0) return 0;
  return parsed;
}

function toText(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

/**
 * Maps one yt-dlp info document to a Candidate.
 * Returns null for documents without an id or title.
 */
export function toCandidate(info: unknown): Candidate | null {
  if (info === null || typeof info !== 'object') return null;

  const id = 'id' in info ? toText(info.id) : '';
  const title = 'title' in info ? toText(info.title) : '';
  if (!id || !title) return null;

  const uploader = 'uploader' in info ? toText(info.uploader) : '';
  const channel = ('channel' in info ? toText(info.channel) : '') || uploader;

  return {
    id,
    title,
    channel,
    uploader,
    durationSeconds: 'duration' in info ? toCount(info.duration) : 0,
    viewCount: 'view_count' in info ? toCount(info.view_count) : 0,
    likeCount: 'like_count' in info ? toCount(info.like_count) : 0,
  };
}

/**
 * Parses yt-dlp --dump-json output: one JSON document per line.
 * Lines that are not JSON (warnings, blank lines) are skipped.
 */
export function parseSearchOutput(stdout: string): Candidate[] {
  const candidates: Candidate[] = [];

  for (const line of stdout.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed.startsWith('{')) continue;

    let info: unknown;
    try {
      info = JSON.parse(trimmed);
    } catch {
      continue;
    }

    const candidate = toCandidate(info);
    if (candidate) candidates.push(candidate);
  }

  return candidates;
}

// ─── Provider ────────────────────────────────────────────────────────────────

/**
 * YouTube search through `yt-dlp --dump-json --skip-download ytsearchN:<query>`.
 */
export class YtDlpSearchProvider implements SearchProvider {
  private readonly limit: number;
  private readonly run: YtDlpRunner;

  constructor(options: YtDlpSearchOptions = {}) {
    const limit = Math.round(options.limit ?? DEFAULT_SEARCH_LIMIT);
    this.limit = Math.min(Math.max(limit, 1), MAX_SEARCH_LIMIT);
    this.run = options.runner ?? createYtDlpRunner(options.binaryPath);
  }

  /** Arguments passed to yt-dlp for a query */
  buildArgs(query: string): string[] {
    return [
      '--dump-json',
      '--skip-download',
      '--no-warnings',
      '--no-playlist',
      `ytsearch${this.limit}:${query}`,
    ];
  }

  /**
   * @throws NoSearchResultsError when yt-dlp fails
   * @throws YtDlpProcessError (aborted) when the signal fires
   */
  async search(query: string, signal?: AbortSignal): Promise<Candidate[]> {
    try {
      const { stdout } = await this.run(this.buildArgs(query), { signal });
      return parseSearchOutput(stdout);
    } catch (error: unknown) {
      if (error instanceof YtDlpProcessError && error.aborted) {
        throw error;
      }
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new NoSearchResultsError(`Search failed: ${cause.message}`, { cause });
    }
  }
}
