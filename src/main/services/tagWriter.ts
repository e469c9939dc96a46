/**
 * Tag Writer Service
 *
 * Writes resolved metadata to MP3 ID3 tags and reads them back to confirm
 * the write took effect.
 *
 * - Uses `node-id3` for ID3v2 writing (update mode preserves unrelated frames)
 *   and for the verification read
 * - Does NOT re-encode audio (metadata-only modification)
 * - Read-only files are made writable for the duration of the write
 */

import * as fs from 'fs';
import * as path from 'path';
import NodeID3 from 'node-id3';
import { SUPPORTED_EXTENSIONS, TrackMetadata } from '../../shared/types';
import type { AudioFormat } from '../../shared/types';
import { TagWriteError } from './errors';

// ─── Types ────────────────────────────────────────────────────────────────────

/** Options for writing tags */
export interface WriteTagsOptions {
  /** Job the write belongs to (attached to errors) */
  jobId?: number;
}

/** Result of a tag write operation */
export interface WriteTagsResult {
  success: boolean;
  filePath: string;
  /** Error message if the write failed */
  error: string | null;
}

/** A tag whose read-back value differs from what was written */
export interface TagMismatch {
  field: 'title' | 'artist' | 'album' | 'year' | 'genre';
  expected: string;
  actual: string;
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

/**
 * Determines the audio format from a file path, or null if unsupported.
 */
export function getFormatFromPath(filePath: string): AudioFormat | null {
  const ext = path.extname(filePath).toLowerCase();
  if (!SUPPORTED_EXTENSIONS.includes(ext)) return null;
  return 'mp3';
}

/**
 * Builds the ID3 frames for a track. Empty album and null year/genre are
 * left out rather than written as blank frames.
 */
export function buildId3Tags(metadata: TrackMetadata): NodeID3.Tags {
  const tags: NodeID3.Tags = {
    title: metadata.title,
    artist: metadata.artist,
  };

  if (metadata.album) {
    tags.album = metadata.album;
  }
  if (metadata.year !== null) {
    tags.year = String(metadata.year);
  }
  if (metadata.genre) {
    tags.genre = metadata.genre;
  }

  return tags;
}

/**
 * Temporarily clears the read-only flag on a file.
 *
 * @returns A function that restores the original permissions
 */
function makeWritableTemporarily(filePath: string): () => void {
  let originalMode: number | null = null;
  try {
    const stat = fs.statSync(filePath);
    if (!(stat.mode & 0o200)) {
      originalMode = stat.mode & 0o777;
      fs.chmodSync(filePath, originalMode | 0o200);
    }
  } catch {
    // The write below reports the real error
  }

  return (): void => {
    if (originalMode !== null) {
      try {
        fs.chmodSync(filePath, originalMode);
      } catch {
        // Best-effort restore
      }
    }
  };
}

// ─── Writing ──────────────────────────────────────────────────────────────────

/**
 * Writes ID3 tags to an MP3 file. Never throws.
 */
export function writeMp3Tags(
  filePath: string,
  metadata: TrackMetadata,
  options: WriteTagsOptions = {},
): WriteTagsResult {
  let restorePermissions: (() => void) | null = null;
  try {
    if (!fs.existsSync(filePath)) {
      return { success: false, filePath, error: `File not found: ${filePath}` };
    }

    const format = getFormatFromPath(filePath);
    if (format !== 'mp3') {
      return {
        success: false,
        filePath,
        error: `Only MP3 files can be tagged, got: ${path.extname(filePath) || 'no extension'}`,
      };
    }

    restorePermissions = makeWritableTemporarily(filePath);

    const tags = buildId3Tags(metadata);
    const result = NodeID3.update(tags, filePath);

    restorePermissions();
    restorePermissions = null;

    if (result instanceof Error) {
      return { success: false, filePath, error: `Failed to write ID3 tags: ${result.message}` };
    }

    return { success: true, filePath, error: null };
  } catch (error: unknown) {
    restorePermissions?.();
    const message = error instanceof Error ? error.message : String(error);
    return { success: false, filePath, error: `Unexpected error writing tags: ${message}` };
  }
}

// ─── Verification ─────────────────────────────────────────────────────────────

/**
 * Compares tags read from a file with the metadata that was written.
 * Only the frames buildId3Tags() writes are checked.
 */
export function compareTags(expected: TrackMetadata, actual: NodeID3.Tags): TagMismatch[] {
  const written = buildId3Tags(expected);
  const mismatches: TagMismatch[] = [];
  const fields: TagMismatch['field'][] = ['title', 'artist', 'album', 'year', 'genre'];

  for (const field of fields) {
    const want = written[field];
    if (want === undefined) continue;
    const got = actual[field] ?? '';
    if (got !== want) {
      mismatches.push({ field, expected: want, actual: got });
    }
  }

  return mismatches;
}

/**
 * Writes tags to an MP3 file and reads them back.
 *
 * @throws TagWriteError if the write fails or any written frame reads back differently
 */
export function writeAndVerifyTags(
  filePath: string,
  metadata: TrackMetadata,
  options: WriteTagsOptions = {},
): void {
  const result = writeMp3Tags(filePath, metadata, options);
  if (!result.success) {
    throw new TagWriteError(result.error ?? 'Failed to write tags', { jobId: options.jobId });
  }

  let readBack: NodeID3.Tags;
  try {
    readBack = NodeID3.read(filePath);
  } catch (error: unknown) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new TagWriteError(`Failed to read back tags: ${cause.message}`, {
      jobId: options.jobId,
      cause,
    });
  }

  const mismatches = compareTags(metadata, readBack);
  if (mismatches.length > 0) {
    const details = mismatches
      .map((m) => `${m.field} expected "${m.expected}" got "${m.actual}"`)
      .join('; ');
    throw new TagWriteError(`Tag verification failed: ${details}`, { jobId: options.jobId });
  }
}
