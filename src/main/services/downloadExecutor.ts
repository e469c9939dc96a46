/**
 * Download Executor Service
 *
 * Fetches the selected candidate's audio as an MP3 into a scratch directory.
 * The default executor runs yt-dlp with audio extraction and has it print the
 * final file path once post-processing is done.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Candidate } from '../../shared/types';
import { ArtifactMissingError, DownloadError } from './errors';
import { YtDlpProcessError, YtDlpRunner, createYtDlpRunner } from './ytDlp';

// ─── Interfaces ──────────────────────────────────────────────────────────────

/** A downloaded file */
export interface DownloadArtifact {
  filePath: string;
}

/** Anything that can download a candidate */
export interface DownloadExecutor {
  download(candidate: Candidate, signal?: AbortSignal): Promise<DownloadArtifact>;
}

export interface YtDlpDownloadOptions {
  /** Scratch directory for downloads (defaults to <tmp>/tunedrop) */
  workDir?: string | null;
  /** Value for --audio-quality ('192K', or a VBR level '0'-'10') */
  audioQuality?: string;
  /** Embed the video thumbnail as cover art (default: false) */
  embedThumbnail?: boolean;
  /** yt-dlp binary, used when no runner is given */
  binaryPath?: string;
  /** Process runner (for testing) */
  runner?: YtDlpRunner;
}

// ─── Constants ───────────────────────────────────────────────────────────────

const DEFAULT_AUDIO_QUALITY = '192K';
const WATCH_URL = 'https://www.youtube.com/watch?v=';

// ─── Helpers ─────────────────────────────────────────────────────────────────

export function getDefaultWorkDir(): string {
  return path.join(os.tmpdir(), 'tunedrop');
}

/** Watch URL for a candidate */
export function candidateUrl(candidate: Candidate): string {
  return `${WATCH_URL}${encodeURIComponent(candidate.id)}`;
}

/**
 * The file path yt-dlp printed: the last non-empty stdout line.
 */
export function parsePrintedPath(stdout: string): string | null {
  const lines = stdout
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  return lines[lines.length - 1] ?? null;
}

// ─── Executor ────────────────────────────────────────────────────────────────

/**
 * MP3 extraction through yt-dlp.
 */
export class YtDlpDownloadExecutor implements DownloadExecutor {
  private readonly workDir: string;
  private readonly audioQuality: string;
  private readonly embedThumbnail: boolean;
  private readonly run: YtDlpRunner;

  constructor(options: YtDlpDownloadOptions = {}) {
    this.workDir = options.workDir || getDefaultWorkDir();
    this.audioQuality = options.audioQuality || DEFAULT_AUDIO_QUALITY;
    this.embedThumbnail = options.embedThumbnail ?? false;
    this.run = options.runner ?? createYtDlpRunner(options.binaryPath);
  }

  getWorkDir(): string {
    return this.workDir;
  }

  /** Arguments passed to yt-dlp for a candidate */
  buildArgs(candidate: Candidate): string[] {
    const safeId = candidate.id.replace(/[^\w-]/g, '_');
    return [
      '--extract-audio',
      '--audio-format',
      'mp3',
      '--audio-quality',
      this.audioQuality,
      ...(this.embedThumbnail ? ['--embed-thumbnail'] : []),
      '--no-playlist',
      '--no-part',
      '--force-overwrites',
      '--no-warnings',
      '--output',
      path.join(this.workDir, `${safeId}.%(ext)s`),
      '--print',
      'after_move:filepath',
      candidateUrl(candidate),
    ];
  }

  /**
   * @throws DownloadError on a non-zero exit or when nothing was printed
   * @throws ArtifactMissingError when the printed file does not exist
   * @throws YtDlpProcessError (aborted) when the signal fires
   */
  async download(candidate: Candidate, signal?: AbortSignal): Promise<DownloadArtifact> {
    try {
      await fs.promises.mkdir(this.workDir, { recursive: true });
    } catch (error: unknown) {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new DownloadError(`Cannot create work directory "${this.workDir}": ${cause.message}`, {
        cause,
      });
    }

    let stdout: string;
    try {
      ({ stdout } = await this.run(this.buildArgs(candidate), { signal }));
    } catch (error: unknown) {
      if (error instanceof YtDlpProcessError) {
        if (error.aborted) throw error;
        throw new DownloadError(error.message, {
          exitCode: error.exitCode ?? undefined,
          cause: error,
        });
      }
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new DownloadError(cause.message, { cause });
    }

    const filePath = parsePrintedPath(stdout);
    if (!filePath) {
      throw new DownloadError(`yt-dlp produced no output for ${candidate.id}`);
    }
    if (!fs.existsSync(filePath)) {
      throw new ArtifactMissingError(`Downloaded file not found at ${filePath}`);
    }

    return { filePath };
  }
}
