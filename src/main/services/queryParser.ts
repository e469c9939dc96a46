/**
 * Query Parsing Service
 *
 * Splits free-text requests of the form "Artist - Title" into artist and
 * title hints. The same splitter is used by the scorer on video titles, and
 * cleanTrackTitle strips the decoration video titles carry before a
 * metadata lookup.
 */

import { SearchQuery } from '../../shared/types';

// ─── Constants ───────────────────────────────────────────────────────────────

/** "<left> <dash> <right>" where dash is '-', en dash or em dash, surrounded by whitespace */
const ARTIST_TITLE_PATTERN = /^(.+?)\s+[-–—]\s+(.+)$/s;

/** Decoration that video titles commonly start or end with */
const TITLE_DECORATIONS: readonly string[] = [
  '(Official Music Video)',
  '(Official Video)',
  '(Official Audio)',
  '(Lyric Video)',
  '(Music Video)',
  '[Official Music Video]',
  '[Official Video]',
  '[Official Audio]',
  '[Lyric Video]',
  '[Music Video]',
  '(HD)',
  '(HQ)',
  '(4K)',
  '(1080p)',
  '(720p)',
  '(Official)',
  '(Audio)',
  '(Lyrics)',
  'Official Music Video',
  'Official Video',
  'Official Audio',
  'Lyric Video',
  'Music Video',
];

/** "feat. X", "ft. X", "featuring X", optionally opened by a bracket */
const FEATURING_PATTERN = /\s*[([]?\s*\b(?:feat\.?|ft\.?|featuring)(?=\s|$).*$/i;

// ─── Splitting ───────────────────────────────────────────────────────────────

/**
 * Splits "Artist - Title" into its two halves.
 * Returns null when the text has no whitespace-surrounded dash.
 */
export function splitArtistTitle(text: string): { artist: string; title: string } | null {
  const match = text.trim().match(ARTIST_TITLE_PATTERN);
  if (!match) return null;

  const artist = match[1].trim();
  const title = match[2].trim();
  if (!artist || !title) return null;

  return { artist, title };
}

/**
 * Parses a raw user query. Never fails: a query without an artist part
 * becomes a title-only query.
 */
export function parseQuery(rawText: string): SearchQuery {
  const split = splitArtistTitle(rawText);
  if (split) {
    return { rawText, parsedArtist: split.artist, parsedTitle: split.title };
  }
  return { rawText, parsedArtist: '', parsedTitle: rawText.trim() };
}

// ─── Title Cleaning ─────────────────────────────────────────────────────────

/**
 * Removes decoration from a video title so it can be looked up as a
 * recording title: "(Official Video)"-style markers at either end, any
 * featuring tail, and trailing parenthesised or bracketed groups.
 *
 * Returns the trimmed input unchanged if cleaning would leave nothing.
 *
 * @example cleanTrackTitle('Levels (Official Video) [HD]') // 'Levels'
 */
export function cleanTrackTitle(title: string): string {
  const original = title.trim();
  let cleaned = original;

  for (const decoration of TITLE_DECORATIONS) {
    const lower = decoration.toLowerCase();
    if (cleaned.toLowerCase().endsWith(lower)) {
      cleaned = cleaned.slice(0, -decoration.length).trim();
    }
    if (cleaned.toLowerCase().startsWith(lower)) {
      cleaned = cleaned.slice(decoration.length).trim();
    }
  }

  const withoutFeaturing = cleaned.replace(FEATURING_PATTERN, '').trim();
  if (withoutFeaturing) {
    cleaned = withoutFeaturing;
  }

  while (/\s*\([^()]*\)$/.test(cleaned) || /\s*\[[^[\]]*\]$/.test(cleaned)) {
    const next = cleaned.replace(/\s*(?:\([^()]*\)|\[[^[\]]*\])$/, '').trim();
    if (!next || next === cleaned) break;
    cleaned = next;
  }

  return cleaned || original;
}
