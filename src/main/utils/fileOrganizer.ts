/**
 * File organizing utilities.
 * Name sanitising and moving downloaded artifacts into the music library
 * layout <musicRoot>/<userName>/<artist>/<title>.<ext>.
 */

import * as fs from 'fs';
import * as path from 'path';
import { OrganizeError } from '../services/errors';

/** Where an artifact should be filed */
export interface OrganizeTarget {
  musicRoot: string;
  userName: string;
  artist: string;
  title: string;
}

/**
 * Sanitises a track title for use as a file name: keeps letters and digits
 * of any script, underscores, whitespace and hyphens, then joins words with
 * underscores.
 * Idempotent. Returns "Unknown" when nothing is left.
 *
 * @example sanitizeTitle('Bohemian Rhapsody (Remastered)') // 'Bohemian_Rhapsody_Remastered'
 */
export function sanitizeTitle(title: string): string {
  const cleaned = title
    .replace(/[^\p{L}\p{M}\p{N}_\s-]/gu, '')
    .trim()
    .replace(/\s+/g, '_');
  return cleaned || 'Unknown';
}

/**
 * Sanitises an artist name for use as a directory name.
 * Removes characters invalid on Windows (/ \ : * ? " < > |), collapses
 * whitespace and strips leading/trailing dots so the result can never be
 * "." or "..". Returns "Unknown Artist" when nothing is left.
 */
export function sanitizeArtistDir(artist: string): string {
  const cleaned = artist
    .replace(/[/\\:*?"<>|]/g, '')
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/^[.\s]+|[.\s]+$/g, '');
  return cleaned || 'Unknown Artist';
}

/**
 * Builds <musicRoot>/<userName>/<artist>/<sanitizedTitle>.<ext>.
 * The extension may be given with or without its leading dot.
 */
export function buildDestinationPath(
  musicRoot: string,
  userName: string,
  artist: string,
  title: string,
  ext: string,
): string {
  const extension = ext.replace(/^\./, '').toLowerCase();
  return path.join(
    musicRoot,
    userName,
    sanitizeArtistDir(artist),
    `${sanitizeTitle(title)}.${extension}`,
  );
}

/**
 * Moves a file, overwriting the destination. Falls back to copy + unlink
 * when source and destination are on different devices.
 */
export function moveFile(sourcePath: string, destPath: string): void {
  try {
    fs.renameSync(sourcePath, destPath);
  } catch (error: unknown) {
    if (error instanceof Error && 'code' in error && error.code === 'EXDEV') {
      fs.copyFileSync(sourcePath, destPath);
      fs.unlinkSync(sourcePath);
      return;
    }
    throw error;
  }
}

/**
 * Files a downloaded artifact into the library, creating missing directories
 * and replacing any existing file with the same name.
 *
 * @returns The final path of the file
 * @throws OrganizeError when the artifact is missing or cannot be moved
 */
export function organizeArtifact(
  sourcePath: string,
  target: OrganizeTarget,
  jobId?: number,
): string {
  const destPath = buildDestinationPath(
    target.musicRoot,
    target.userName,
    target.artist,
    target.title,
    path.extname(sourcePath) || '.mp3',
  );

  try {
    if (!fs.existsSync(sourcePath)) {
      throw new Error(`Artifact not found: ${sourcePath}`);
    }
    fs.mkdirSync(path.dirname(destPath), { recursive: true });
    if (path.resolve(sourcePath) !== path.resolve(destPath)) {
      moveFile(sourcePath, destPath);
    }
    return destPath;
  } catch (error: unknown) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new OrganizeError(`Failed to move artifact to ${destPath}: ${cause.message}`, {
      jobId,
      cause,
    });
  }
}
